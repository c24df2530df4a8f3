// Geocodes every station in a raw trip export through Nominatim and caches the
// coordinates as CSV.
//
// Usage: tsx geocode-stations.ts [raw-trips-csv] [cache-csv]
// Example: tsx geocode-stations.ts data/2021-04.csv data/geocode_cache.csv
//
// Output:
// - data/geocode_cache.csv: station_id,station_name,lat,lon (empty lat/lon when
//   the station couldn't be found)
//
// Skips everything when the cache file already exists. Delete it to rebuild.
import { existsSync, mkdirSync } from "fs";
import path from "path";
import { GEOCODER_CONFIG } from "./lib/config";
import { readCsvFile } from "./lib/csv";
import {
  extractStations,
  geocodeStations,
  NominatimGeocoder,
  writeGeocodeCache,
} from "./lib/station-geocoder";
import { defaultGeocodeCachePath, defaultRawTripsPath, secondsSince } from "./utils";

const tripsPath = path.resolve(process.argv[2] ?? defaultRawTripsPath);
const cachePath = path.resolve(process.argv[3] ?? defaultGeocodeCachePath);

async function main() {
  if (existsSync(cachePath)) {
    console.log(`Cache exists at ${cachePath}; exiting.`);
    return;
  }

  console.log(`Loading trips to extract unique stations from: ${tripsPath}`);
  const table = await readCsvFile(tripsPath);
  const stations = extractStations(table.rows);
  console.log(`  ${stations.length} unique stations`);

  console.log(`\nGeocoding ${stations.length} stations (${GEOCODER_CONFIG.addressSuffix}) via ${GEOCODER_CONFIG.baseUrl}...`);
  const startTime = Date.now();
  const geocoder = new NominatimGeocoder();
  let found = 0;

  const { stations: geocoded, failures } = await geocodeStations(stations, geocoder, {
    onProgress: (done, total, station) => {
      if (station.coordinates) found++;
      const pct = ((done / total) * 100).toFixed(1);
      process.stdout.write(`\r  [${pct}%] ${done}/${total} | ${found} found   `);
    },
  });
  console.log();

  const missing = geocoded.length - found;
  if (missing > 0) {
    console.warn(`${missing} stations without coordinates (${failures.length} lookups failed)`);
    for (const failure of failures) {
      console.warn(`  - ${failure.query}: ${failure.code} ${failure.message}`);
    }
  }

  mkdirSync(path.dirname(cachePath), { recursive: true });
  await writeGeocodeCache(cachePath, geocoded);
  console.log(`\nSaved cache to ${cachePath} in ${secondsSince(startTime)}s`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
