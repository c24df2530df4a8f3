import { AUDIT_THRESHOLDS, CLEANING_THRESHOLDS, TRIP_COLUMNS, type TripColumns } from "./config";
import { duplicateKey, speedKmh } from "./clean-pipeline";
import type { TripRecord } from "./trip-types";
import { formatPercent } from "../utils";

export type StationCount = { name: string; trips: number };

// Issue counts over the raw (uncleaned) load
export type QualityAudit = {
  totalRows: number;
  issues: {
    invalidDeparture: number;
    invalidReturn: number;
    missingDistance: number;
    missingDuration: number;
    duplicateRows: number;
    negativeDuration: number;
    returnBeforeDeparture: number;
    veryShortTrips: number;
    veryLongTrips: number;
    zeroDistance: number;
    sameStationWithDistance: number;
    durationMismatch: number;
    unrealisticSpeed: number;
    slowTrips: number;
  };
  stations: {
    departureIds: number;
    returnIds: number;
    departureNames: number;
    returnNames: number;
  };
  topDepartureStations: StationCount[];
  topReturnStations: StationCount[];
};

export type AuditIssue = keyof QualityAudit["issues"];

// Report order
export const AUDIT_ISSUE_LABELS: Array<[AuditIssue, string]> = [
  ["invalidDeparture", "invalid departure datetime"],
  ["invalidReturn", "invalid return datetime"],
  ["missingDistance", "missing covered distance"],
  ["missingDuration", "missing recorded duration"],
  ["duplicateRows", "exact duplicate of an earlier row"],
  ["negativeDuration", "negative recorded duration"],
  ["returnBeforeDeparture", "return before departure"],
  ["veryShortTrips", `very short trips (<${AUDIT_THRESHOLDS.veryShortSeconds} sec)`],
  ["veryLongTrips", `very long trips (>${AUDIT_THRESHOLDS.veryLongSeconds / 3600} hours)`],
  ["zeroDistance", "zero distance"],
  ["sameStationWithDistance", `same station but distance > ${AUDIT_THRESHOLDS.sameStationDistanceMeters}m`],
  ["durationMismatch", "duration mismatch (calculated vs recorded)"],
  ["unrealisticSpeed", `unrealistic speed (>${AUDIT_THRESHOLDS.maxSpeedKmh} km/h)`],
  ["slowTrips", `very slow speed (<${AUDIT_THRESHOLDS.slowSpeedKmh} km/h, >${AUDIT_THRESHOLDS.slowMinDurationSeconds / 60} min)`],
];

// Most frequent first; equal counts keep first-seen order
function topCounts(names: string[], limit: number): StationCount[] {
  const counts = new Map<string, number>();
  for (const name of names) {
    if (name === "") continue;
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return Array.from(counts, ([name, trips]) => ({ name, trips }))
    .sort((a, b) => b.trips - a.trips)
    .slice(0, limit);
}

export function auditTrips(
  records: TripRecord[],
  options: { columns: string[]; tripColumns?: TripColumns }
): QualityAudit {
  const tripColumns = options.tripColumns ?? TRIP_COLUMNS;
  const context = {
    columns: options.columns,
    tripColumns,
    thresholds: CLEANING_THRESHOLDS,
  };
  const issues: QualityAudit["issues"] = {
    invalidDeparture: 0,
    invalidReturn: 0,
    missingDistance: 0,
    missingDuration: 0,
    duplicateRows: 0,
    negativeDuration: 0,
    returnBeforeDeparture: 0,
    veryShortTrips: 0,
    veryLongTrips: 0,
    zeroDistance: 0,
    sameStationWithDistance: 0,
    durationMismatch: 0,
    unrealisticSpeed: 0,
    slowTrips: 0,
  };
  const seen = new Set<string>();

  for (const record of records) {
    const { departureTime, returnTime, recordedDurationSeconds: duration } = record;
    const distance = record.coveredDistanceMeters;

    if (departureTime === null) issues.invalidDeparture++;
    if (returnTime === null) issues.invalidReturn++;
    if (distance === null) issues.missingDistance++;
    if (duration === null) issues.missingDuration++;

    const key = duplicateKey(record, context);
    if (seen.has(key)) issues.duplicateRows++;
    else seen.add(key);

    if (departureTime !== null && returnTime !== null) {
      const calculated = (returnTime.getTime() - departureTime.getTime()) / 1000;
      if (calculated < 0) issues.returnBeforeDeparture++;
      if (duration !== null && Math.abs(calculated - duration) > AUDIT_THRESHOLDS.durationMismatchSeconds) {
        issues.durationMismatch++;
      }
    }

    if (duration !== null) {
      if (duration < 0) issues.negativeDuration++;
      if (duration < AUDIT_THRESHOLDS.veryShortSeconds) issues.veryShortTrips++;
      if (duration > AUDIT_THRESHOLDS.veryLongSeconds) issues.veryLongTrips++;
    }

    if (distance !== null) {
      if (distance === 0) issues.zeroDistance++;
      if (
        record.departureStationId === record.returnStationId &&
        distance > AUDIT_THRESHOLDS.sameStationDistanceMeters
      ) {
        issues.sameStationWithDistance++;
      }
    }

    // Speed here uses the recorded duration; a 0 s trip with distance is
    // infinitely fast, 0 m in 0 s has no speed at all
    if (distance !== null && duration !== null) {
      const speed = speedKmh(distance, duration);
      if (speed > AUDIT_THRESHOLDS.maxSpeedKmh) issues.unrealisticSpeed++;
      if (duration > AUDIT_THRESHOLDS.slowMinDurationSeconds && speed < AUDIT_THRESHOLDS.slowSpeedKmh) {
        issues.slowTrips++;
      }
    }
  }

  const departureNames = records.map((r) => (r.raw[tripColumns.departureStationName] ?? "").trim());
  const returnNames = records.map((r) => (r.raw[tripColumns.returnStationName] ?? "").trim());
  const distinct = (values: string[]) => new Set(values.filter((v) => v !== "")).size;

  return {
    totalRows: records.length,
    issues,
    stations: {
      departureIds: distinct(records.map((r) => r.departureStationId)),
      returnIds: distinct(records.map((r) => r.returnStationId)),
      departureNames: distinct(departureNames),
      returnNames: distinct(returnNames),
    },
    topDepartureStations: topCounts(departureNames, AUDIT_THRESHOLDS.topStations),
    topReturnStations: topCounts(returnNames, AUDIT_THRESHOLDS.topStations),
  };
}

export function formatAuditWarnings(audit: QualityAudit): string[] {
  const warnings: string[] = [];
  for (const [issue, label] of AUDIT_ISSUE_LABELS) {
    const count = audit.issues[issue];
    if (count > 0) {
      warnings.push(`${count} rows (${formatPercent(count, audit.totalRows)}%) with ${label}`);
    }
  }
  return warnings;
}

export function formatAuditReport(audit: QualityAudit): string[] {
  const stationLines = (title: string, stations: StationCount[]) => [
    title,
    ...stations.map((s, i) => `  ${String(i + 1).padStart(2)}. ${s.name} (${s.trips})`),
  ];

  return [
    `Total rows: ${audit.totalRows}`,
    "",
    "Data quality issues:",
    ...AUDIT_ISSUE_LABELS.map(([issue, label]) => {
      const count = audit.issues[issue];
      return `  ${label}: ${count} rows (${formatPercent(count, audit.totalRows)}%)`;
    }),
    "",
    "Stations:",
    `  Unique departure stations: ${audit.stations.departureIds}`,
    `  Unique return stations: ${audit.stations.returnIds}`,
    `  Unique station names (departure): ${audit.stations.departureNames}`,
    `  Unique station names (return): ${audit.stations.returnNames}`,
    "",
    ...stationLines("Top departure stations:", audit.topDepartureStations),
    "",
    ...stationLines("Top return stations:", audit.topReturnStations),
  ];
}
