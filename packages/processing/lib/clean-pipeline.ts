import { CLEANING_THRESHOLDS, TRIP_COLUMNS, type CleaningThresholds, type TripColumns } from "./config";
import { parseNumber } from "./load-trips";
import type {
  CleanTripRecord,
  DerivedTripRecord,
  TimedTripRecord,
  TripRecord,
} from "./trip-types";

// ============================================================================
// Stage Contract
// ============================================================================

export type StageContext = {
  columns: string[]; // original columns, used for duplicate detection
  tripColumns: TripColumns;
  thresholds: CleaningThresholds;
};

export type StageResult<T> = {
  records: T[];
  removed: number;
};

export type CleaningStage<In, Out> = {
  name: string;
  description: string;
  run: (records: In[], context: StageContext) => StageResult<Out>;
};

export type StageReport = {
  name: string;
  description: string;
  recordsIn: number;
  removed: number;
  recordsOut: number;
};

function keep<T>(records: T[], predicate: (record: T) => boolean): StageResult<T> {
  const kept = records.filter(predicate);
  return { records: kept, removed: records.length - kept.length };
}

function hasTimestamps(record: TripRecord): record is TimedTripRecord {
  return record.departureTime !== null && record.returnTime !== null;
}

// Identity of a row across every original column. Timestamps compare by
// instant, station ids trimmed and the numeric columns by value, so "1200"
// and "1200.0" collide.
export function duplicateKey(record: TripRecord, context: StageContext): string {
  const { tripColumns } = context;
  const values = context.columns.map((column) => {
    if (column === tripColumns.departure) return record.departureTime?.getTime() ?? null;
    if (column === tripColumns.return) return record.returnTime?.getTime() ?? null;
    if (column === tripColumns.departureStationId) return record.departureStationId;
    if (column === tripColumns.returnStationId) return record.returnStationId;
    if (column === tripColumns.distance || column === tripColumns.duration) {
      return parseNumber(record.raw[column]);
    }
    return record.raw[column] ?? "";
  });
  return JSON.stringify(values);
}

// (km) / (h)
export function speedKmh(distanceMeters: number, durationSeconds: number): number {
  return distanceMeters / 1000 / (durationSeconds / 3600);
}

// ============================================================================
// Stages
// ============================================================================

// 1
export const timestampValidity: CleaningStage<TripRecord, TimedTripRecord> = {
  name: "timestamp-validity",
  description: "Removing rows with invalid datetime values",
  run: (records) => {
    const kept = records.filter(hasTimestamps);
    return { records: kept, removed: records.length - kept.length };
  },
};

// 2
export const exactDuplicates: CleaningStage<TimedTripRecord, TimedTripRecord> = {
  name: "exact-duplicates",
  description: "Removing duplicate rows",
  run: (records, context) => {
    const seen = new Set<string>();
    return keep(records, (record) => {
      const key = duplicateKey(record, context);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  },
};

// 3
export const temporalOrder: CleaningStage<TimedTripRecord, TimedTripRecord> = {
  name: "temporal-order",
  description: "Removing rows where return < departure",
  run: (records) =>
    keep(records, (record) => record.returnTime.getTime() >= record.departureTime.getTime()),
};

// 4
export const durationDerivation: CleaningStage<TimedTripRecord, DerivedTripRecord> = {
  name: "duration-derivation",
  description: "Calculating new duration from timestamps",
  run: (records) => ({
    records: records.map((record) => ({
      ...record,
      derivedDurationSeconds: Math.trunc(
        (record.returnTime.getTime() - record.departureTime.getTime()) / 1000
      ),
    })),
    removed: 0,
  }),
};

// 5
export const minimumDuration: CleaningStage<DerivedTripRecord, DerivedTripRecord> = {
  name: "minimum-duration",
  description: "Removing very short trips (<1 minute)",
  run: (records, { thresholds }) =>
    keep(records, (record) => record.derivedDurationSeconds >= thresholds.minDurationSeconds),
};

// 6
export const maximumDuration: CleaningStage<DerivedTripRecord, DerivedTripRecord> = {
  name: "maximum-duration",
  description: "Removing very long trips (>4 hours)",
  run: (records, { thresholds }) =>
    keep(records, (record) => record.derivedDurationSeconds <= thresholds.maxDurationSeconds),
};

// 7
export const distanceRepair: CleaningStage<DerivedTripRecord, CleanTripRecord> = {
  name: "distance-repair",
  description: "Handling missing distance values",
  run: (records) => {
    const repaired: CleanTripRecord[] = [];
    for (const record of records) {
      const { coveredDistanceMeters } = record;
      if (coveredDistanceMeters !== null) {
        repaired.push({ ...record, coveredDistanceMeters });
      } else if (record.departureStationId === record.returnStationId) {
        // Same-station trip with nothing recorded: assume it never moved
        repaired.push({ ...record, coveredDistanceMeters: 0 });
      }
    }
    return { records: repaired, removed: records.length - repaired.length };
  },
};

// 8
// NOTE: runs after the same-station repair, so round trips just set to 0 m
// are dropped here too (negative distances go with them)
export const zeroDistance: CleaningStage<CleanTripRecord, CleanTripRecord> = {
  name: "zero-distance",
  description: "Removing trips with zero distance",
  run: (records) => keep(records, (record) => record.coveredDistanceMeters > 0),
};

// 9
export const speedBound: CleaningStage<CleanTripRecord, CleanTripRecord> = {
  name: "speed-bound",
  description: "Removing trips with unrealistic speed (>50 km/h)",
  run: (records, { thresholds }) =>
    keep(
      records,
      (record) =>
        speedKmh(record.coveredDistanceMeters, record.derivedDurationSeconds) <=
        thresholds.maxSpeedKmh
    ),
};

// 10
export const zeroDurationGuard: CleaningStage<CleanTripRecord, CleanTripRecord> = {
  name: "zero-duration",
  description: "Removing trips with zero duration",
  run: (records) => keep(records, (record) => record.derivedDurationSeconds > 0),
};

// 11
// Array.prototype.sort is stable, so equal departures keep their input order
export const departureOrdering: CleaningStage<CleanTripRecord, CleanTripRecord> = {
  name: "departure-ordering",
  description: "Sorting by departure time (newest first)",
  run: (records) => ({
    records: [...records].sort(
      (a, b) => b.departureTime.getTime() - a.departureTime.getTime()
    ),
    removed: 0,
  }),
};

export const CLEANING_STAGES = [
  timestampValidity,
  exactDuplicates,
  temporalOrder,
  durationDerivation,
  minimumDuration,
  maximumDuration,
  distanceRepair,
  zeroDistance,
  speedBound,
  zeroDurationGuard,
  departureOrdering,
] as const;

// ============================================================================
// Driver
// ============================================================================

export type CleaningOptions = {
  columns: string[];
  tripColumns?: TripColumns;
  thresholds?: CleaningThresholds;
  onStage?: (report: StageReport, index: number) => void;
};

export type CleaningResult = {
  records: CleanTripRecord[];
  stages: StageReport[];
  initialCount: number;
  finalCount: number;
};

/**
 * Runs every cleaning stage in order. Each stage only sees the previous
 * stage's output; the input array is never modified.
 */
export function runCleaningPipeline(records: TripRecord[], options: CleaningOptions): CleaningResult {
  const context: StageContext = {
    columns: options.columns,
    tripColumns: options.tripColumns ?? TRIP_COLUMNS,
    thresholds: options.thresholds ?? CLEANING_THRESHOLDS,
  };
  const stages: StageReport[] = [];

  function apply<In, Out>(stage: CleaningStage<In, Out>, input: In[]): Out[] {
    const result = stage.run(input, context);
    const report: StageReport = {
      name: stage.name,
      description: stage.description,
      recordsIn: input.length,
      removed: result.removed,
      recordsOut: result.records.length,
    };
    stages.push(report);
    options.onStage?.(report, stages.length);
    return result.records;
  }

  const timed = apply(timestampValidity, records);
  const unique = apply(exactDuplicates, timed);
  const ordered = apply(temporalOrder, unique);
  const derived = apply(durationDerivation, ordered);
  const longEnough = apply(minimumDuration, derived);
  const shortEnough = apply(maximumDuration, longEnough);
  const withDistance = apply(distanceRepair, shortEnough);
  const moved = apply(zeroDistance, withDistance);
  const plausible = apply(speedBound, moved);
  const positive = apply(zeroDurationGuard, plausible);
  const sorted = apply(departureOrdering, positive);

  return {
    records: sorted,
    stages,
    initialCount: records.length,
    finalCount: sorted.length,
  };
}
