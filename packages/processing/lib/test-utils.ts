import { mkdtempSync } from "fs";
import os from "os";
import path from "path";
import { TRIP_COLUMNS } from "./config";
import { toTripRecord } from "./load-trips";
import type { CsvRow, TripRecord } from "./trip-types";

export const TEST_COLUMNS: string[] = Object.values(TRIP_COLUMNS);

export type TripFixture = {
  departure?: string;
  return?: string;
  departureStationId?: string;
  departureStationName?: string;
  returnStationId?: string;
  returnStationName?: string;
  distance?: string;
  duration?: string;
};

export function makeRow(fixture: TripFixture = {}): CsvRow {
  return {
    [TRIP_COLUMNS.departure]: fixture.departure ?? "2021-04-01T08:00:00",
    [TRIP_COLUMNS.return]: fixture.return ?? "2021-04-01T08:30:00",
    [TRIP_COLUMNS.departureStationId]: fixture.departureStationId ?? "1",
    [TRIP_COLUMNS.departureStationName]: fixture.departureStationName ?? "Kaivopuisto",
    [TRIP_COLUMNS.returnStationId]: fixture.returnStationId ?? "2",
    [TRIP_COLUMNS.returnStationName]: fixture.returnStationName ?? "Laivasillankatu",
    [TRIP_COLUMNS.distance]: fixture.distance ?? "500",
    [TRIP_COLUMNS.duration]: fixture.duration ?? "1800",
  };
}

export function makeTrip(fixture: TripFixture = {}): TripRecord {
  return toTripRecord(makeRow(fixture));
}

export function csvLine(fixture: TripFixture = {}): string {
  const row = makeRow(fixture);
  return TEST_COLUMNS.map((column) => row[column] ?? "").join(",");
}

export function makeTempDir(prefix = "trips-"): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}
