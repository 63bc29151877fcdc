/**
 * Clark County Assessor Field Extraction
 *
 * Maps ParcelDetail.aspx into a PropertyRecord. Element ids come from
 * ASSESSOR_FIELD_ELEMENTS; each group of fields is one step so a fault
 * stops the remaining steps but keeps what was already filled in.
 */

import type { CheerioAPI } from "cheerio";
import type { PropertyRecord } from "../../types";
import type { ParcelIngestionObserver } from "../../observability/types";
import {
  createPropertyRecord,
  hasDecisiveField,
  markError,
  markSuccess,
} from "../../records/property-record";
import { splitMultiValueField } from "../../utils/multi-value";
import { parseCompactRecordedDate } from "../../utils/dates";
import { ASSESSOR_FIELD_ELEMENTS, type AssessorField } from "./constants";

export interface ExtractOptions {
  observer?: ParcelIngestionObserver;
  now?: () => Date;
}

type ExtractionStep = (
  $: CheerioAPI,
  record: PropertyRecord,
  observer?: ParcelIngestionObserver
) => void;

// ============================================================================
// Element access
// ============================================================================

function findElement($: CheerioAPI, field: AssessorField) {
  return $(`[id="${ASSESSOR_FIELD_ELEMENTS[field]}"]`).first();
}

function readText($: CheerioAPI, field: AssessorField): string | undefined {
  const element = findElement($, field);
  if (!element.length) return undefined;

  const text = element.text().trim();
  return text || undefined;
}

function copyFields(
  $: CheerioAPI,
  record: PropertyRecord,
  fields: AssessorField[],
  observer?: ParcelIngestionObserver
): void {
  for (const field of fields) {
    const value = readText($, field);
    if (value !== undefined) {
      record[field] = value;
      observer?.increment("extract.field", 1, { field });
    }
  }
}

// ============================================================================
// Steps
// ============================================================================

const extractParcelInfo: ExtractionStep = ($, record, observer) => {
  copyFields($, record, ["parcelNumber"], observer);
};

const extractOwners: ExtractionStep = ($, record, observer) => {
  const element = findElement($, "owner");
  if (!element.length) return;

  // Split the raw markup: owners are separated by <br> inside one label
  const owners = splitMultiValueField($.html(element));

  if (owners[0]) {
    record.owner = owners[0];
    observer?.increment("extract.field", 1, { field: "owner" });
  }
  if (owners[1]) {
    record.owner2 = owners[1];
    observer?.increment("extract.field", 1, { field: "owner2" });
  }
  if (owners.length > 2) {
    // Only two owner slots exist
    observer?.increment("extract.owner_dropped", owners.length - 2);
  }
};

const extractMailingAddress: ExtractionStep = ($, record, observer) => {
  copyFields(
    $,
    record,
    [
      "mailingAddressLine1",
      "mailingAddressLine2",
      "mailingAddressLine3",
      "mailingAddressLine4",
      "mailingAddressLine5",
    ],
    observer
  );
};

const extractLocation: ExtractionStep = ($, record, observer) => {
  copyFields($, record, ["locationAddress", "cityUnincorporatedTown"], observer);
};

const extractAssessorDescription: ExtractionStep = ($, record, observer) => {
  copyFields(
    $,
    record,
    ["assessorDescriptionLine1", "assessorDescriptionLine2", "assessorDescriptionLine3"],
    observer
  );
};

const extractRecordingInfo: ExtractionStep = ($, record, observer) => {
  copyFields($, record, ["recordedDocumentNumber", "recordedDate"], observer);

  if (record.recordedDate) {
    const formatted = parseCompactRecordedDate(record.recordedDate);
    if (formatted) {
      record.recordedDateFormatted = formatted;
    }
  }
};

const extractVestingAndComments: ExtractionStep = ($, record, observer) => {
  copyFields($, record, ["vesting", "comments"], observer);
};

export const EXTRACTION_STEPS: readonly ExtractionStep[] = [
  extractParcelInfo,
  extractOwners,
  extractMailingAddress,
  extractLocation,
  extractAssessorDescription,
  extractRecordingInfo,
  extractVestingAndComments,
];

// ============================================================================
// Main Extraction Function
// ============================================================================

export function extractPropertyRecord(
  $: CheerioAPI,
  apn: string,
  options: ExtractOptions = {}
): PropertyRecord {
  const now = options.now ?? (() => new Date());
  const record = createPropertyRecord(apn);

  try {
    for (const step of EXTRACTION_STEPS) {
      step($, record, options.observer);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ClarkAssessor] Error parsing property data for APN ${apn}: ${message}`);
    return markError(record, `Parse error: ${message}`, now());
  }

  if (hasDecisiveField(record)) {
    return markSuccess(record, now());
  }

  console.warn(`[ClarkAssessor] No data extracted for APN ${apn}`);
  return markError(record, "No data found", now());
}
