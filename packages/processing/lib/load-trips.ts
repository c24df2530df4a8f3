import { globSync, hasMagic } from "glob";
import { DERIVED_DURATION_COLUMN, REQUIRED_TRIP_COLUMNS, TRIP_COLUMNS, type TripColumns } from "./config";
import { readCsvFile } from "./csv";
import { TripLoadError } from "./errors";
import { parseTimestamp } from "./timestamps";
import type { CsvRow, LoadedTrips, TripRecord } from "./trip-types";

// Blank or non-numeric cells count as missing
export function parseNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const text = value.trim();
  if (text === "") return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

export function toTripRecord(row: CsvRow, columns: TripColumns = TRIP_COLUMNS): TripRecord {
  return {
    departureTime: parseTimestamp(row[columns.departure]),
    returnTime: parseTimestamp(row[columns.return]),
    departureStationId: (row[columns.departureStationId] ?? "").trim(),
    returnStationId: (row[columns.returnStationId] ?? "").trim(),
    recordedDurationSeconds: parseNumber(row[columns.duration]),
    coveredDistanceMeters: parseNumber(row[columns.distance]),
    raw: row,
  };
}

export function findMissingColumns(header: string[], columns: TripColumns = TRIP_COLUMNS): string[] {
  return REQUIRED_TRIP_COLUMNS.map((key) => columns[key]).filter((name) => !header.includes(name));
}

// Expands a glob (or passes a plain path through) into a sorted file list
export function resolveInputFiles(input: string): string[] {
  if (!hasMagic(input)) return [input];
  const matched = globSync(input, { nodir: true }).sort();
  if (matched.length === 0) {
    throw new TripLoadError(`No CSV files matched: ${input}`, "NO_MATCH", input);
  }
  return matched;
}

/**
 * Loads every trip CSV matched by `input` into memory.
 *
 * Timestamps that don't parse become null; no other column is validated here.
 * Any file that can't be read, decoded or parsed, or that lacks a required
 * column, fails the whole load.
 */
export async function loadTrips(
  input: string,
  options: { columns?: TripColumns } = {}
): Promise<LoadedTrips> {
  const columns = options.columns ?? TRIP_COLUMNS;
  const files = resolveInputFiles(input);

  let header: string[] | null = null;
  const records: TripRecord[] = [];
  let totalBytes = 0;

  for (const filePath of files) {
    const table = await readCsvFile(filePath);
    totalBytes += table.bytes;

    const missing = findMissingColumns(table.columns, columns);
    if (missing.length > 0) {
      throw new TripLoadError(
        `${filePath} is missing required column(s): ${missing.join(", ")}`,
        "MISSING_COLUMNS",
        filePath
      );
    }

    if (header === null) {
      header = table.columns;
    } else if (header.join("\u0000") !== table.columns.join("\u0000")) {
      throw new TripLoadError(
        `${filePath} header differs from ${files[0]}`,
        "HEADER_MISMATCH",
        filePath
      );
    }

    for (const row of table.rows) {
      records.push(toTripRecord(row, columns));
    }
  }

  return {
    // A derived column from an earlier run is recomputed, not carried
    columns: (header ?? []).filter((name) => name !== DERIVED_DURATION_COLUMN),
    records,
    initialCount: records.length,
    files,
    totalBytes,
  };
}
