// Shared types for the trip cleaning pipeline and the scripts around it

// ============================================================================
// CSV Rows
// ============================================================================

// One parsed CSV row, keyed by header name. Values are the verbatim cell text.
export type CsvRow = Record<string, string>;

export type CsvTable = {
  columns: string[];
  rows: CsvRow[];
};

// ============================================================================
// Trip Records
// ============================================================================

// Trip as materialized by the loader
export type TripRecord = {
  departureTime: Date | null; // null if the cell couldn't be parsed
  returnTime: Date | null;
  departureStationId: string;
  returnStationId: string;
  recordedDurationSeconds: number | null; // as supplied by the source
  coveredDistanceMeters: number | null; // may be legitimately absent
  raw: CsvRow; // every original column, verbatim
};

// Trip after stage 1: both timestamps are known
export type TimedTripRecord = TripRecord & {
  departureTime: Date;
  returnTime: Date;
};

// Trip after stage 4: duration recomputed from timestamps (whole seconds)
export type DerivedTripRecord = TimedTripRecord & {
  derivedDurationSeconds: number;
};

// Trip that survived the whole pipeline
export type CleanTripRecord = DerivedTripRecord & {
  coveredDistanceMeters: number;
};

// ============================================================================
// Loader Output
// ============================================================================

export type LoadedTrips = {
  columns: string[]; // original columns in header order
  records: TripRecord[];
  initialCount: number;
  files: string[];
  totalBytes: number;
};
