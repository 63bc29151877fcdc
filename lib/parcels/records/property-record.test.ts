import { describe, expect, it } from "vitest";
import {
  createPropertyRecord,
  hasDecisiveField,
  markError,
  markSuccess,
  RECORD_CSV_COLUMNS,
  RecordStateError,
  toCsvRow,
} from "./property-record";

// 2025-02-26 14:05:09 local time
const NOW = new Date(2025, 1, 26, 14, 5, 9);

describe("createPropertyRecord", () => {
  it("starts pending with only the identifier", () => {
    expect(createPropertyRecord("177-13-420-002")).toEqual({
      apn: "177-13-420-002",
      status: "Pending",
      statusMessage: "Pending",
    });
  });
});

describe("markSuccess", () => {
  it("stamps the local clock time and ISO timestamp", () => {
    const record = markSuccess(createPropertyRecord("177-13-420-002"), NOW);

    expect(record.status).toBe("Success");
    expect(record.statusMessage).toBe("Success - Scraped at 14:05:09");
    expect(record.scrapedAt).toBe(NOW.toISOString());
    expect(record.errorMessage).toBeUndefined();
  });
});

describe("markError", () => {
  it("prefixes the reason and keeps it as the error message", () => {
    const record = markError(createPropertyRecord("177-13-420-002"), "No data found", NOW);

    expect(record.status).toBe("Error");
    expect(record.statusMessage).toBe("Error: No data found");
    expect(record.errorMessage).toBe("No data found");
    expect(record.scrapedAt).toBe(NOW.toISOString());
  });

  it("uses a generic reason by default", () => {
    expect(markError(createPropertyRecord("x"), undefined, NOW).statusMessage).toBe("Error: Error");
  });
});

describe("status transitions", () => {
  it("refuses a second transition", () => {
    const record = markSuccess(createPropertyRecord("177-13-420-002"), NOW);

    expect(() => markError(record, "late failure", NOW)).toThrow(RecordStateError);
    expect(() => markSuccess(record, NOW)).toThrow(
      "Cannot mark record 177-13-420-002 as Success: already Success"
    );
    expect(record.status).toBe("Success");
  });
});

describe("hasDecisiveField", () => {
  it("needs an owner, location or first description line", () => {
    const record = createPropertyRecord("x");
    record.parcelNumber = "x";
    record.mailingAddressLine1 = "1 MAIN ST";
    expect(hasDecisiveField(record)).toBe(false);

    record.assessorDescriptionLine1 = "LOT 1";
    expect(hasDecisiveField(record)).toBe(true);
  });
});

describe("toCsvRow", () => {
  it("projects the output columns and blanks missing values", () => {
    const record = createPropertyRecord("177-13-420-002");
    record.owner = "SMITH JOHN";
    record.owner2 = "SMITH JANE";
    record.mailingAddressLine1 = "1234 DESERT BLOOM AVE";
    record.locationAddress = "1234 DESERT BLOOM AVE";
    record.cityUnincorporatedTown = "ENTERPRISE";
    record.vesting = "JT";

    const row = toCsvRow(record);

    expect(Object.keys(row)).toEqual([...RECORD_CSV_COLUMNS]);
    expect(row).toEqual({
      APN: "177-13-420-002",
      Owner: "SMITH JOHN",
      Owner_2: "SMITH JANE",
      Mailing_Address_Line1: "1234 DESERT BLOOM AVE",
      Mailing_Address_Line2: "",
      Mailing_Address_Line3: "",
      Mailing_Address_Line4: "",
      Mailing_Address_Line5: "",
      Location_Address: "1234 DESERT BLOOM AVE",
      City_Unincorporated_Town: "ENTERPRISE",
    });
  });
});
