import type { CleanTripRecord } from "./trip-types";

// All null when there were no values to describe
export type Statistics = {
  count: number;
  mean: number | null;
  median: number | null;
  min: number | null;
  max: number | null;
};

export type TripSummary = {
  initialCount: number;
  finalCount: number;
  removedCount: number;
  retainedPercent: number | null; // null when there was no input
  recordedDuration: Statistics; // Duration (sec.) as supplied, not the derived one
  coveredDistance: Statistics;
  departureStations: number;
  returnStations: number;
};

export function describeValues(values: Array<number | null>): Statistics {
  const present = values.filter((v): v is number => v !== null).sort((a, b) => a - b);
  const count = present.length;
  const first = present[0];
  const last = present[count - 1];
  if (first === undefined || last === undefined) {
    return { count: 0, mean: null, median: null, min: null, max: null };
  }

  const sum = present.reduce((total, v) => total + v, 0);
  const middle = Math.floor(count / 2);
  const upper = present[middle] ?? last;
  const lower = present[middle - 1] ?? first;
  const median = count % 2 === 1 ? upper : (lower + upper) / 2;

  return { count, mean: sum / count, median, min: first, max: last };
}

export function summarizeTrips(records: CleanTripRecord[], initialCount: number): TripSummary {
  return {
    initialCount,
    finalCount: records.length,
    removedCount: initialCount - records.length,
    retainedPercent: initialCount === 0 ? null : (records.length / initialCount) * 100,
    recordedDuration: describeValues(records.map((r) => r.recordedDurationSeconds)),
    coveredDistance: describeValues(records.map((r) => r.coveredDistanceMeters)),
    departureStations: new Set(records.map((r) => r.departureStationId)).size,
    returnStations: new Set(records.map((r) => r.returnStationId)).size,
  };
}

const fmtStat = (value: number | null) => (value === null ? "no data" : value.toFixed(1)).padStart(10);
const fmtCount = (value: number) => value.toLocaleString("en-US").padStart(10);

function statisticLines(title: string, stats: Statistics): string[] {
  return [
    title,
    `  Mean:   ${fmtStat(stats.mean)}`,
    `  Median: ${fmtStat(stats.median)}`,
    `  Min:    ${fmtStat(stats.min)}`,
    `  Max:    ${fmtStat(stats.max)}`,
  ];
}

export function formatSummary(summary: TripSummary): string[] {
  const retained =
    summary.retainedPercent === null ? "no data" : `${summary.retainedPercent.toFixed(2)}%`;
  return [
    `Initial rows:        ${fmtCount(summary.initialCount)}`,
    `Final rows:          ${fmtCount(summary.finalCount)}`,
    `Rows removed:        ${fmtCount(summary.removedCount)}`,
    `Percentage retained: ${retained.padStart(10)}`,
    "",
    ...statisticLines("Duration statistics (seconds):", summary.recordedDuration),
    "",
    ...statisticLines("Distance statistics (meters):", summary.coveredDistance),
    "",
    "Unique stations:",
    `  Departure stations: ${summary.departureStations}`,
    `  Return stations:    ${summary.returnStations}`,
  ];
}
