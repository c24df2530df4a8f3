import { COORDINATE_COLUMNS, TRIP_COLUMNS, type TripColumns } from "./config";
import type { GeocodedStation } from "./station-geocoder";
import type { CsvRow } from "./trip-types";

export type MergedTrips = {
  columns: string[];
  rows: string[][];
  missingDeparture: number;
  missingReturn: number;
};

function coordinateCells(station: GeocodedStation | undefined): [string, string] {
  if (!station?.coordinates) return ["", ""];
  return [String(station.coordinates.latitude), String(station.coordinates.longitude)];
}

/**
 * Left-joins station coordinates onto trips, once for the departure station
 * and once for the return station. Unknown stations get empty coordinates;
 * row order and count are unchanged.
 */
export function mergeCoordinates(
  table: { columns: string[]; rows: CsvRow[] },
  cache: Map<string, GeocodedStation>,
  columns: TripColumns = TRIP_COLUMNS
): MergedTrips {
  let missingDeparture = 0;
  let missingReturn = 0;

  const rows = table.rows.map((row) => {
    const departure = coordinateCells(cache.get((row[columns.departureStationId] ?? "").trim()));
    const ret = coordinateCells(cache.get((row[columns.returnStationId] ?? "").trim()));
    if (departure[0] === "") missingDeparture++;
    if (ret[0] === "") missingReturn++;
    return [...table.columns.map((column) => row[column] ?? ""), ...departure, ...ret];
  });

  return {
    columns: [
      ...table.columns,
      COORDINATE_COLUMNS.departureLat,
      COORDINATE_COLUMNS.departureLon,
      COORDINATE_COLUMNS.returnLat,
      COORDINATE_COLUMNS.returnLon,
    ],
    rows,
    missingDeparture,
    missingReturn,
  };
}
