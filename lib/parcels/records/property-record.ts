/**
 * Property Record lifecycle
 *
 * A record starts Pending and moves exactly once, to Success or Error.
 */

import type { PropertyRecord } from "../types";

export class RecordStateError extends Error {
  constructor(
    message: string,
    public readonly apn: string
  ) {
    super(message);
    this.name = "RecordStateError";
  }
}

export function createPropertyRecord(apn: string): PropertyRecord {
  return {
    apn,
    status: "Pending",
    statusMessage: "Pending",
  };
}

function assertPending(record: PropertyRecord, target: string): void {
  if (record.status !== "Pending") {
    throw new RecordStateError(
      `Cannot mark record ${record.apn} as ${target}: already ${record.status}`,
      record.apn
    );
  }
}

/** HH:MM:SS in local time */
function clockTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, "0"))
    .join(":");
}

export function markSuccess(record: PropertyRecord, now: Date = new Date()): PropertyRecord {
  assertPending(record, "Success");
  record.status = "Success";
  record.statusMessage = `Success - Scraped at ${clockTime(now)}`;
  record.scrapedAt = now.toISOString();
  return record;
}

export function markError(
  record: PropertyRecord,
  reason = "Error",
  now: Date = new Date()
): PropertyRecord {
  assertPending(record, "Error");
  record.status = "Error";
  record.statusMessage = `Error: ${reason}`;
  record.errorMessage = reason;
  record.scrapedAt = now.toISOString();
  return record;
}

/**
 * Has at least one of the fields that make a scrape count as successful.
 */
export function hasDecisiveField(record: PropertyRecord): boolean {
  return Boolean(record.owner || record.locationAddress || record.assessorDescriptionLine1);
}

/** Output columns, in CSV order */
export const RECORD_CSV_COLUMNS = [
  "APN",
  "Owner",
  "Owner_2",
  "Mailing_Address_Line1",
  "Mailing_Address_Line2",
  "Mailing_Address_Line3",
  "Mailing_Address_Line4",
  "Mailing_Address_Line5",
  "Location_Address",
  "City_Unincorporated_Town",
] as const;

export type RecordCsvColumn = (typeof RECORD_CSV_COLUMNS)[number];

export function toCsvRow(record: Readonly<PropertyRecord>): Record<RecordCsvColumn, string> {
  return {
    APN: record.apn,
    Owner: record.owner ?? "",
    Owner_2: record.owner2 ?? "",
    Mailing_Address_Line1: record.mailingAddressLine1 ?? "",
    Mailing_Address_Line2: record.mailingAddressLine2 ?? "",
    Mailing_Address_Line3: record.mailingAddressLine3 ?? "",
    Mailing_Address_Line4: record.mailingAddressLine4 ?? "",
    Mailing_Address_Line5: record.mailingAddressLine5 ?? "",
    Location_Address: record.locationAddress ?? "",
    City_Unincorporated_Town: record.cityUnincorporatedTown ?? "",
  };
}
