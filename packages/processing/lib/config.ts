// =============================================================================
// Source Columns
// =============================================================================

// Header names of the city bike trip export. Override per call when a dataset
// uses different headers.
export const TRIP_COLUMNS = {
  departure: "Departure",
  return: "Return",
  departureStationId: "Departure station id",
  departureStationName: "Departure station name",
  returnStationId: "Return station id",
  returnStationName: "Return station name",
  distance: "Covered distance (m)",
  duration: "Duration (sec.)",
} as const;

export type TripColumns = { [K in keyof typeof TRIP_COLUMNS]: string };

// Columns the cleaning pipeline can't run without (station names are only
// needed by the geocoder and the audit)
export const REQUIRED_TRIP_COLUMNS = [
  "departure",
  "return",
  "departureStationId",
  "returnStationId",
  "distance",
  "duration",
] as const satisfies ReadonlyArray<keyof TripColumns>;

export const DERIVED_DURATION_COLUMN = "derived_duration_seconds";

// =============================================================================
// Cleaning Thresholds
// =============================================================================

export const CLEANING_THRESHOLDS = {
  // Shorter trips are false starts or entry errors
  minDurationSeconds: 60,
  // Longer trips are bikes that weren't properly returned
  maxDurationSeconds: 4 * 60 * 60,
  maxSpeedKmh: 50,
} as const;

export type CleaningThresholds = { [K in keyof typeof CLEANING_THRESHOLDS]: number };

// =============================================================================
// Data Quality Audit
// =============================================================================

export const AUDIT_THRESHOLDS = {
  veryShortSeconds: 10,
  veryLongSeconds: 24 * 60 * 60,
  sameStationDistanceMeters: 100,
  durationMismatchSeconds: 1,
  maxSpeedKmh: 50,
  slowSpeedKmh: 1,
  slowMinDurationSeconds: 5 * 60,
  topStations: 10,
} as const;

// =============================================================================
// Geocoding
// =============================================================================

export const GEOCODER_CONFIG = {
  baseUrl: process.env.NOMINATIM_URL ?? "https://nominatim.openstreetmap.org",
  userAgent: process.env.GEOCODER_USER_AGENT ?? "citybike-station-geocoder",
  // Appended to every station name before lookup
  addressSuffix: "Helsinki, Finland",
  // Public Nominatim allows 1 request per second
  minDelayMs: 1000,
} as const;

export const GEOCODE_CACHE_COLUMNS = ["station_id", "station_name", "lat", "lon"] as const;

export const COORDINATE_COLUMNS = {
  departureLat: "departure_lat",
  departureLon: "departure_lon",
  returnLat: "return_lat",
  returnLon: "return_lon",
} as const;

// =============================================================================
// Temporal Partitions
// =============================================================================

// Night wraps midnight: [20:00, 06:00)
export const NIGHT_START_HOUR = 20;
export const DAY_START_HOUR = 6;
