/**
 * Clark County Assessor Source
 */

export * from "./constants";
export * from "./detail-resolution";
export * from "./fetcher";
export * from "./extract";
export { ClarkAssessorAdapter, createClarkAssessorAdapter } from "./adapter";
