import { DERIVED_DURATION_COLUMN, TRIP_COLUMNS, type TripColumns } from "./config";
import { writeCsvFile } from "./csv";
import { formatTimestamp } from "./timestamps";
import type { CleanTripRecord } from "./trip-types";

export function outputColumns(columns: string[]): string[] {
  return [...columns, DERIVED_DURATION_COLUMN];
}

// Original cells verbatim, except the two timestamps which are rewritten in
// one canonical layout
export function toOutputRow(
  record: CleanTripRecord,
  columns: string[],
  tripColumns: TripColumns = TRIP_COLUMNS
): string[] {
  const cells = columns.map((column) => {
    if (column === tripColumns.departure) return formatTimestamp(record.departureTime);
    if (column === tripColumns.return) return formatTimestamp(record.returnTime);
    return record.raw[column] ?? "";
  });
  cells.push(String(record.derivedDurationSeconds));
  return cells;
}

export async function writeCleanTrips(
  filePath: string,
  records: CleanTripRecord[],
  options: { columns: string[]; tripColumns?: TripColumns }
): Promise<void> {
  const { columns, tripColumns } = options;
  const rows = records.map((record) => toOutputRow(record, columns, tripColumns));
  await writeCsvFile(filePath, outputColumns(columns), rows);
}
