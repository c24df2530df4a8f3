import { writeFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { GeocodeError } from "./errors";
import {
  extractStations,
  geocodeStations,
  NominatimGeocoder,
  readGeocodeCache,
  writeGeocodeCache,
  type Coordinates,
  type FetchFn,
  type GeocodedStation,
  type StationGeocoder,
} from "./station-geocoder";
import { makeRow, makeTempDir } from "./test-utils";

function fakeFetch(respond: () => Response | Promise<Response>) {
  const calls: Array<{ url: URL; userAgent: string | undefined }> = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url: new URL(url), userAgent: init?.headers?.["User-Agent"] });
    return respond();
  };
  return { fetchFn, calls };
}

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

async function geocodeError(promise: Promise<unknown>): Promise<GeocodeError | null> {
  const error: unknown = await promise.catch((err: unknown) => err);
  return error instanceof GeocodeError ? error : null;
}

describe("extractStations", () => {
  it("collects departure stations first, then new return stations", () => {
    const rows = [
      makeRow(),
      makeRow({
        departureStationId: "2",
        departureStationName: "Laivasillankatu (new)",
        returnStationId: "3",
        returnStationName: "Kamppi",
      }),
      makeRow({ departureStationId: " ", returnStationId: "" }),
    ];

    expect(extractStations(rows)).toEqual([
      { id: "1", name: "Kaivopuisto" },
      { id: "2", name: "Laivasillankatu (new)" },
      { id: "3", name: "Kamppi" },
    ]);
  });
});

describe("NominatimGeocoder", () => {
  const baseUrl = "http://geocoder.test";

  it("queries the search endpoint with a user agent", async () => {
    const { fetchFn, calls } = fakeFetch(() => jsonResponse([{ lat: "60.1699", lon: "24.9384" }]));
    const geocoder = new NominatimGeocoder({ baseUrl, userAgent: "trip-tests", fetchFn });

    await expect(geocoder.geocode("Kamppi, Helsinki, Finland")).resolves.toEqual({
      latitude: 60.1699,
      longitude: 24.9384,
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url.pathname).toBe("/search");
    expect(calls[0]?.url.searchParams.get("q")).toBe("Kamppi, Helsinki, Finland");
    expect(calls[0]?.url.searchParams.get("format")).toBe("json");
    expect(calls[0]?.url.searchParams.get("limit")).toBe("1");
    expect(calls[0]?.userAgent).toBe("trip-tests");
  });

  it("returns null when nothing matches", async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse([]));
    await expect(new NominatimGeocoder({ baseUrl, fetchFn }).geocode("Nowhere")).resolves.toBeNull();
  });

  it("classifies failures", async () => {
    const unavailable = new NominatimGeocoder({ baseUrl, fetchFn: fakeFetch(() => jsonResponse({}, 503)).fetchFn });
    expect((await geocodeError(unavailable.geocode("a")))?.code).toBe("PROVIDER_ERROR");

    const offline = new NominatimGeocoder({
      baseUrl,
      fetchFn: fakeFetch(() => Promise.reject(new Error("connect ECONNREFUSED"))).fetchFn,
    });
    const networkError = await geocodeError(offline.geocode("b"));
    expect(networkError?.code).toBe("NETWORK_ERROR");
    expect(networkError?.message).toBe("connect ECONNREFUSED");
    expect(networkError?.query).toBe("b");

    const wrongShape = new NominatimGeocoder({ baseUrl, fetchFn: fakeFetch(() => jsonResponse({ error: "x" })).fetchFn });
    expect((await geocodeError(wrongShape.geocode("c")))?.code).toBe("INVALID_RESPONSE");

    const html = new NominatimGeocoder({ baseUrl, fetchFn: fakeFetch(() => new Response("<html>")).fetchFn });
    expect((await geocodeError(html.geocode("d")))?.code).toBe("INVALID_RESPONSE");
  });
});

describe("geocodeStations", () => {
  class FakeGeocoder implements StationGeocoder {
    queries: string[] = [];
    constructor(private readonly answer: (query: string) => Coordinates | null) {}

    async geocode(query: string): Promise<Coordinates | null> {
      this.queries.push(query);
      return this.answer(query);
    }
  }

  it("looks up named stations one at a time with a pause in between", async () => {
    const geocoder = new FakeGeocoder(() => ({ latitude: 60.17, longitude: 24.94 }));
    const sleeps: number[] = [];
    const progress: Array<[number, number]> = [];

    const { stations, failures } = await geocodeStations(
      [
        { id: "1", name: "Kamppi" },
        { id: "2", name: "" },
        { id: "3", name: "Töölöntori" },
      ],
      geocoder,
      {
        minDelayMs: 1000,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
        onProgress: (done, total) => progress.push([done, total]),
      }
    );

    expect(geocoder.queries).toEqual(["Kamppi, Helsinki, Finland", "Töölöntori, Helsinki, Finland"]);
    expect(sleeps).toHaveLength(1);
    expect(sleeps[0]).toBeGreaterThan(900);
    expect(sleeps[0]).toBeLessThanOrEqual(1000);
    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(failures).toEqual([]);
    expect(stations.map((s) => s.coordinates)).toEqual([
      { latitude: 60.17, longitude: 24.94 },
      null,
      { latitude: 60.17, longitude: 24.94 },
    ]);
  });

  it("records a failed lookup as missing and carries on", async () => {
    const geocoder = new FakeGeocoder((query) => {
      if (query.startsWith("Kamppi")) throw new GeocodeError("HTTP 500", "PROVIDER_ERROR", query);
      return { latitude: 60.18, longitude: 24.92 };
    });

    const { stations, failures } = await geocodeStations(
      [
        { id: "1", name: "Kamppi" },
        { id: "2", name: "Hakaniemi" },
      ],
      geocoder,
      { addressSuffix: "", sleep: async () => undefined }
    );

    expect(failures.map((f) => f.query)).toEqual(["Kamppi"]);
    expect(stations).toEqual([
      { id: "1", name: "Kamppi", coordinates: null },
      { id: "2", name: "Hakaniemi", coordinates: { latitude: 60.18, longitude: 24.92 } },
    ]);
  });

  it("stops on unexpected errors", async () => {
    const geocoder = new FakeGeocoder(() => {
      throw new Error("boom");
    });
    await expect(
      geocodeStations([{ id: "1", name: "Kamppi" }], geocoder, { sleep: async () => undefined })
    ).rejects.toThrow("boom");
  });
});

describe("geocode cache", () => {
  it("reads back what it wrote", async () => {
    const cachePath = path.join(makeTempDir(), "geocode_cache.csv");
    const stations: GeocodedStation[] = [
      { id: "1", name: "Kaivopuisto", coordinates: { latitude: 60.155, longitude: 24.95 } },
      { id: "2", name: "Kamppi, metro", coordinates: null },
    ];

    await writeGeocodeCache(cachePath, stations);
    const cache = await readGeocodeCache(cachePath);

    expect(Array.from(cache.values())).toEqual(stations);
  });

  it("skips rows without a station id and treats bad coordinates as missing", async () => {
    const cachePath = path.join(makeTempDir(), "geocode_cache.csv");
    writeFileSync(cachePath, "station_id,station_name,lat,lon\n,Ghost,1,2\n7,Hakaniemi,abc,24.9\n", "utf-8");

    const cache = await readGeocodeCache(cachePath);

    expect(Array.from(cache.keys())).toEqual(["7"]);
    expect(cache.get("7")?.coordinates).toBeNull();
  });
});
