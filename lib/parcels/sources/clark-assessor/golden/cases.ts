/**
 * Golden Parcel Test Cases for the Clark County Assessor
 *
 * These cases validate that extraction produces stable,
 * expected records from saved ParcelDetail.aspx pages.
 */

import type { PropertyRecord, ScrapeStatus } from "../../../types";

type ExpectedFields = Partial<Omit<PropertyRecord, "status" | "statusMessage" | "scrapedAt">>;

export interface GoldenParcelCase {
  id: string;
  name: string;
  apn: string;
  fixturePath: string;
  expect: {
    status: ScrapeStatus;
    errorMessage?: string;
    fields: ExpectedFields;
    /** Fields that must stay unset */
    absent?: Array<keyof PropertyRecord>;
  };
}

export const clarkAssessorGoldenCases: GoldenParcelCase[] = [
  {
    id: "clark-residential-two-owners",
    name: "Residential parcel with two owners",
    apn: "177-13-420-002",
    fixturePath: "./fixtures/residential-two-owners.html",
    expect: {
      status: "Success",
      fields: {
        parcelNumber: "177-13-420-002",
        owner: "SMITH JOHN",
        owner2: "SMITH JANE",
        mailingAddressLine1: "1234 DESERT BLOOM AVE",
        mailingAddressLine2: "LAS VEGAS NV",
        mailingAddressLine3: "89123-0001",
        locationAddress: "1234 DESERT BLOOM AVE",
        cityUnincorporatedTown: "ENTERPRISE",
        assessorDescriptionLine1: "SUNRISE VISTA UNIT 2",
        assessorDescriptionLine2: "PLAT BOOK 101 PAGE 42",
        assessorDescriptionLine3: "LOT 17 BLOCK 3",
        recordedDocumentNumber: "20250226:00938",
        recordedDate: "20250226:00938",
        recordedDateFormatted: "Feb 26 2025",
        vesting: "JT",
      },
      absent: ["mailingAddressLine4", "mailingAddressLine5", "comments", "errorMessage"],
    },
  },
  {
    id: "clark-commercial-single-owner",
    name: "Commercial parcel with an entity-encoded owner",
    apn: "162-21-301-010",
    fixturePath: "./fixtures/commercial-single-owner.html",
    expect: {
      status: "Success",
      fields: {
        parcelNumber: "162-21-301-010",
        owner: "DESERT & SONS HOLDINGS LLC",
        mailingAddressLine1: "C/O PROPERTY MANAGER",
        mailingAddressLine2: "500 EXAMPLE PKWY STE 100",
        mailingAddressLine3: "HENDERSON NV 89052",
        locationAddress: "500 EXAMPLE PKWY",
        cityUnincorporatedTown: "LAS VEGAS",
        assessorDescriptionLine1: "PT NE4 NE4 SEC 21 21 61",
        recordedDocumentNumber: "201903150001234",
        recordedDate: "03/15/2019",
        vesting: "NS",
        comments: "SPLIT FROM 162-21-301-001",
      },
      absent: ["owner2", "recordedDateFormatted", "assessorDescriptionLine2"],
    },
  },
  {
    id: "clark-empty-detail",
    name: "Detail page without owner, location or description",
    apn: "999-99-999-999",
    fixturePath: "./fixtures/empty-detail.html",
    expect: {
      status: "Error",
      errorMessage: "No data found",
      fields: {
        parcelNumber: "999-99-999-999",
      },
      absent: ["owner", "locationAddress", "assessorDescriptionLine1"],
    },
  },
];

/**
 * Validate an extracted record against expected values.
 */
export function validateGoldenCase(
  record: PropertyRecord,
  expected: GoldenParcelCase["expect"]
): { passed: boolean; failures: string[] } {
  const failures: string[] = [];

  if (record.status !== expected.status) {
    failures.push(`status: expected "${expected.status}", got "${record.status}" (${record.statusMessage})`);
  }

  if (expected.errorMessage !== undefined && record.errorMessage !== expected.errorMessage) {
    failures.push(`errorMessage: expected "${expected.errorMessage}", got "${record.errorMessage}"`);
  }

  for (const [field, value] of Object.entries(expected.fields)) {
    const actual: unknown = Reflect.get(record, field);
    if (actual !== value) {
      failures.push(`${field}: expected "${value}", got "${actual}"`);
    }
  }

  for (const field of expected.absent ?? []) {
    if (record[field] !== undefined) {
      failures.push(`${field}: expected to be unset, got "${record[field]}"`);
    }
  }

  return { passed: failures.length === 0, failures };
}
