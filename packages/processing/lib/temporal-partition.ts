import { DAY_START_HOUR, NIGHT_START_HOUR, TRIP_COLUMNS, type TripColumns } from "./config";
import { isoWeekday, parseTimestamp, WEEKDAY_NAMES, type WeekdayName } from "./timestamps";
import type { CsvRow } from "./trip-types";

export type PartitionName = "night" | "day" | "weekday" | "weekend" | WeekdayName;

export const PARTITION_NAMES: PartitionName[] = ["night", "day", "weekday", "weekend", ...WEEKDAY_NAMES];

export function partitionFileName(name: PartitionName): string {
  return `clean_${name}.csv`;
}

// Every partition a departure falls into: one of night/day, one of
// weekday/weekend, and its own day of the week
export function partitionsFor(departure: Date): PartitionName[] {
  const hour = departure.getUTCHours();
  const weekday = isoWeekday(departure);
  const dayName = WEEKDAY_NAMES[weekday - 1];

  const partitions: PartitionName[] = [
    hour >= NIGHT_START_HOUR || hour < DAY_START_HOUR ? "night" : "day",
    weekday <= 5 ? "weekday" : "weekend",
  ];
  if (dayName) partitions.push(dayName);
  return partitions;
}

export type TemporalPartitions = {
  partitions: Map<PartitionName, CsvRow[]>;
  skipped: number; // rows whose departure didn't parse
};

// Rows keep their input order inside each partition
export function partitionTrips(rows: CsvRow[], columns: TripColumns = TRIP_COLUMNS): TemporalPartitions {
  const partitions = new Map<PartitionName, CsvRow[]>(PARTITION_NAMES.map((name) => [name, []]));
  let skipped = 0;

  for (const row of rows) {
    const departure = parseTimestamp(row[columns.departure]);
    if (!departure) {
      skipped++;
      continue;
    }
    for (const name of partitionsFor(departure)) {
      partitions.get(name)?.push(row);
    }
  }

  return { partitions, skipped };
}
