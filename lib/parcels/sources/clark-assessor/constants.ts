/**
 * Clark County Assessor Constants
 */

import type { ExtractedField, SourceConfig } from "../../types";

export const CLARK_ASSESSOR_SOURCE_KEY = "nv-clark-assessor" as const;
export const CLARK_STATE_FIPS = "32";
export const CLARK_COUNTY_FIPS = "003";

export const CLARK_ASSESSOR_CONFIG: SourceConfig = {
  sourceKey: CLARK_ASSESSOR_SOURCE_KEY,
  name: "Clark County Assessor",
  stateFips: CLARK_STATE_FIPS,
  countyFips: CLARK_COUNTY_FIPS,
  sourceType: "county_assessor",
  platformFamily: "aspnet_webforms",
  baseUrl: "https://maps.clarkcountynv.gov/assessor/AssessorParcelDetail/",
  searchPath: "pcl.aspx",
  detailPath: "ParcelDetail.aspx",
  timeoutMs: 10000,
  // The portal's certificate chain does not verify from every host
  verifySsl: false,
  retry: {
    maxRetries: 3,
    backoffFactorMs: 300,
    statusForcelist: [500, 502, 503, 504],
    allowedMethods: ["GET", "HEAD", "OPTIONS"],
  },
  pool: {
    maxSockets: 20,
    maxFreeSockets: 10,
  },
};

export const PARSER_VERSION = "clark-assessor-v1.0.0";

// ============================================================================
// Search form
// ============================================================================

/** ASP.NET hidden fields echoed back with the search submission */
export const ANTI_FORGERY_FIELDS = [
  "__VIEWSTATE",
  "__VIEWSTATEGENERATOR",
  "__EVENTVALIDATION",
] as const;

export type AntiForgeryField = (typeof ANTI_FORGERY_FIELDS)[number];

export const SEARCH_FORM_FIELDS = {
  parcel: "tbParcel",
  submit: "btnSubmit",
  searchType: "r1",
} as const;

export const SEARCH_FORM_VALUES = {
  submit: "Submit",
  // Radio button selecting the parcel-number search
  searchType: "pcl7",
} as const;

export const AUTO_SUBMIT_FORM_ID = "aspnetForm";

export const FAILURE_PHRASES = ["not found", "no results", "invalid", "error"] as const;

// ============================================================================
// Detail page element ids
// ============================================================================

/**
 * Record field -> element id on ParcelDetail.aspx.
 * A markup change on the portal should only need an update here.
 */
export const ASSESSOR_FIELD_ELEMENTS = {
  parcelNumber: "lblParcel",
  owner: "lblOwner1",
  mailingAddressLine1: "lblAddr1",
  mailingAddressLine2: "lblAddr2",
  mailingAddressLine3: "lblAddr3",
  mailingAddressLine4: "lblAddr4",
  mailingAddressLine5: "lblAddr5",
  locationAddress: "lblLocation",
  cityUnincorporatedTown: "lblTown",
  assessorDescriptionLine1: "lblDesc1",
  assessorDescriptionLine2: "lblDesc2",
  assessorDescriptionLine3: "lblDesc3",
  recordedDocumentNumber: "lblRecDoc",
  recordedDate: "lblRecDate",
  vesting: "lblVest",
  comments: "litComments",
} as const satisfies Partial<Record<ExtractedField, string>>;

export type AssessorField = keyof typeof ASSESSOR_FIELD_ELEMENTS;
