import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { GEOCODE_CACHE_COLUMNS, GEOCODER_CONFIG, TRIP_COLUMNS, type TripColumns } from "./config";
import { readCsvFile, writeCsvFile } from "./csv";
import { GeocodeError } from "./errors";
import type { CsvRow } from "./trip-types";

export type Station = {
  id: string;
  name: string;
};

export type Coordinates = {
  latitude: number;
  longitude: number;
};

// Cache entry; coordinates are null when the lookup found nothing or failed
export type GeocodedStation = Station & {
  coordinates: Coordinates | null;
};

export interface StationGeocoder {
  geocode(query: string): Promise<Coordinates | null>;
}

// ============================================================================
// Station Extraction
// ============================================================================

// Departure columns first, then return columns; first name seen per id wins
export function extractStations(rows: CsvRow[], columns: TripColumns = TRIP_COLUMNS): Station[] {
  const stations = new Map<string, Station>();
  const sides = [
    { id: columns.departureStationId, name: columns.departureStationName },
    { id: columns.returnStationId, name: columns.returnStationName },
  ];
  for (const side of sides) {
    for (const row of rows) {
      const id = (row[side.id] ?? "").trim();
      if (id === "" || stations.has(id)) continue;
      stations.set(id, { id, name: (row[side.name] ?? "").trim() });
    }
  }
  return Array.from(stations.values());
}

// ============================================================================
// Nominatim
// ============================================================================

const NominatimResultSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
});

const NominatimResponseSchema = z.array(NominatimResultSchema);

export type FetchFn = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export class NominatimGeocoder implements StationGeocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  constructor(options?: { baseUrl?: string; userAgent?: string; fetchFn?: FetchFn }) {
    this.baseUrl = options?.baseUrl ?? GEOCODER_CONFIG.baseUrl;
    // Public Nominatim rejects requests without a user agent
    this.userAgent = options?.userAgent ?? GEOCODER_CONFIG.userAgent;
    this.fetchFn = options?.fetchFn ?? fetch;
  }

  async geocode(query: string): Promise<Coordinates | null> {
    const params = new URLSearchParams({ q: query, format: "json", limit: "1" });
    const url = `${this.baseUrl}/search?${params}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers: { "User-Agent": this.userAgent } });
    } catch (error) {
      throw new GeocodeError(
        error instanceof Error ? error.message : "Unknown error",
        "NETWORK_ERROR",
        query
      );
    }
    if (!response.ok) {
      throw new GeocodeError(`HTTP ${response.status}`, "PROVIDER_ERROR", query);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new GeocodeError("Nominatim response is not JSON", "INVALID_RESPONSE", query);
    }

    const parsed = NominatimResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new GeocodeError(`Invalid Nominatim response: ${parsed.error.message}`, "INVALID_RESPONSE", query);
    }
    const [best] = parsed.data;
    if (!best) return null;
    return { latitude: best.lat, longitude: best.lon };
  }
}

// ============================================================================
// Batch Lookup
// ============================================================================

export type GeocodeBatchOptions = {
  addressSuffix?: string;
  minDelayMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
  onProgress?: (done: number, total: number, station: GeocodedStation) => void;
};

export function stationQuery(name: string, addressSuffix: string): string {
  return addressSuffix ? `${name}, ${addressSuffix}` : name;
}

/**
 * Geocodes stations one at a time, waiting at least `minDelayMs` between
 * outbound lookups. A failed lookup is recorded as missing coordinates and the
 * batch carries on.
 */
export async function geocodeStations(
  stations: Station[],
  geocoder: StationGeocoder,
  options: GeocodeBatchOptions = {}
): Promise<{ stations: GeocodedStation[]; failures: GeocodeError[] }> {
  const addressSuffix = options.addressSuffix ?? GEOCODER_CONFIG.addressSuffix;
  const minDelayMs = options.minDelayMs ?? GEOCODER_CONFIG.minDelayMs;
  const sleep = options.sleep ?? delay;

  const results: GeocodedStation[] = [];
  const failures: GeocodeError[] = [];
  let lastLookupAt: number | null = null;

  for (const station of stations) {
    let coordinates: Coordinates | null = null;

    // Nameless stations have nothing to look up
    if (station.name !== "") {
      if (lastLookupAt !== null) {
        const wait = minDelayMs - (Date.now() - lastLookupAt);
        if (wait > 0) await sleep(wait);
      }
      lastLookupAt = Date.now();

      try {
        coordinates = await geocoder.geocode(stationQuery(station.name, addressSuffix));
      } catch (error) {
        if (!(error instanceof GeocodeError)) throw error;
        failures.push(error);
      }
    }

    const geocoded: GeocodedStation = { ...station, coordinates };
    results.push(geocoded);
    options.onProgress?.(results.length, stations.length, geocoded);
  }

  return { stations: results, failures };
}

// ============================================================================
// Cache File
// ============================================================================

const CacheRowSchema = z.object({
  station_id: z.string().trim().min(1),
  station_name: z.string(),
  lat: z.string().trim(),
  lon: z.string().trim(),
});

function parseCoordinate(value: string): number | null {
  if (value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export async function readGeocodeCache(filePath: string): Promise<Map<string, GeocodedStation>> {
  const table = await readCsvFile(filePath);
  const cache = new Map<string, GeocodedStation>();
  for (const row of table.rows) {
    const parsed = CacheRowSchema.safeParse(row);
    if (!parsed.success) continue;
    const { station_id, station_name, lat, lon } = parsed.data;
    const latitude = parseCoordinate(lat);
    const longitude = parseCoordinate(lon);
    cache.set(station_id, {
      id: station_id,
      name: station_name,
      coordinates: latitude !== null && longitude !== null ? { latitude, longitude } : null,
    });
  }
  return cache;
}

export async function writeGeocodeCache(filePath: string, stations: GeocodedStation[]): Promise<void> {
  const rows = stations.map((s) => [
    s.id,
    s.name,
    s.coordinates ? String(s.coordinates.latitude) : "",
    s.coordinates ? String(s.coordinates.longitude) : "",
  ]);
  await writeCsvFile(filePath, [...GEOCODE_CACHE_COLUMNS], rows);
}
