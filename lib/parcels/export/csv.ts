/**
 * CSV input and output
 *
 * Reads parcel identifiers from an input sheet and writes scraped
 * records as rows in RECORD_CSV_COLUMNS order.
 */

import { existsSync } from "fs";
import { appendFile, mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { PropertyRecord } from "../types";
import { RECORD_CSV_COLUMNS, toCsvRow } from "../records/property-record";

export const DEFAULT_ID_COLUMN = "apn";

/** Tried in order when the requested column is absent */
export const FALLBACK_ID_COLUMNS = ["apn", "APN", "Apn", "parcel", "Parcel", "PARCEL"];

const EMPTY_CELLS = new Set(["", "nan", "none"]);

export class CsvInputError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "CsvInputError";
  }
}

// ============================================================================
// Input
// ============================================================================

export function pickIdColumn(headers: readonly string[], requested: string): string | undefined {
  if (headers.includes(requested)) return requested;
  return FALLBACK_ID_COLUMNS.find((column) => headers.includes(column));
}

/**
 * Parse identifiers out of CSV text. Blank, "nan" and "none" cells are skipped.
 */
export function parseParcelIds(content: string, column: string = DEFAULT_ID_COLUMN): string[] {
  const rows: string[][] = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const [headers, ...body] = rows;
  if (!headers) return [];

  const idColumn = pickIdColumn(
    headers.map((header) => header.trim()),
    column
  );
  if (!idColumn) {
    throw new Error(
      `Column '${column}' not found in CSV. Available columns: ${headers.join(", ")}`
    );
  }

  const index = headers.findIndex((header) => header.trim() === idColumn);
  const ids: string[] = [];
  for (const row of body) {
    const value = (row[index] ?? "").trim();
    if (EMPTY_CELLS.has(value.toLowerCase())) continue;
    ids.push(value);
  }
  return ids;
}

export async function readParcelIdsFromCsv(
  path: string,
  column: string = DEFAULT_ID_COLUMN
): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CsvInputError(`Error reading CSV file: ${message}`, path);
  }

  try {
    const ids = parseParcelIds(content, column);
    console.log(`[CSV] Loaded ${ids.length} APNs from ${path}`);
    return ids;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CsvInputError(message, path);
  }
}

// ============================================================================
// Output
// ============================================================================

export function formatRecordsCsv(
  records: ReadonlyArray<Readonly<PropertyRecord>>,
  header = true
): string {
  return stringify(records.map(toCsvRow), {
    header,
    columns: [...RECORD_CSV_COLUMNS],
  });
}

/**
 * Overwrite `path` with a header plus one row per record.
 */
export async function writeRecordsToCsv(
  records: ReadonlyArray<Readonly<PropertyRecord>>,
  path: string
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatRecordsCsv(records), "utf8");
  console.log(`[CSV] Saved ${records.length} records to ${path}`);
}

/**
 * Append rows; the header is written only when the file is new.
 */
export async function appendRecordsToCsv(
  records: ReadonlyArray<Readonly<PropertyRecord>>,
  path: string
): Promise<void> {
  if (records.length === 0) return;
  await mkdir(dirname(path), { recursive: true });
  const isNew = !existsSync(path);
  await appendFile(path, formatRecordsCsv(records, isNew), "utf8");
}

export async function appendRecordToCsv(
  record: Readonly<PropertyRecord>,
  path: string
): Promise<void> {
  await appendRecordsToCsv([record], path);
}
