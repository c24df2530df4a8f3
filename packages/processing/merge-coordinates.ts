// Attaches cached station coordinates to the cleaned trips.
//
// Usage: tsx merge-coordinates.ts [cleaned-csv] [cache-csv] [output-csv]
//
// Prerequisites:
// - data/2021-04_cleaned.csv (from clean-trips.ts)
// - data/geocode_cache.csv (from geocode-stations.ts)
//
// Output:
// - data/2021-04_merged.csv: cleaned columns + departure_lat, departure_lon,
//   return_lat, return_lon
import { existsSync, mkdirSync } from "fs";
import path from "path";
import { mergeCoordinates } from "./lib/coordinate-merge";
import { readCsvFile, writeCsvFile } from "./lib/csv";
import { readGeocodeCache } from "./lib/station-geocoder";
import {
  defaultCleanedPath,
  defaultGeocodeCachePath,
  defaultMergedPath,
  formatPercent,
} from "./utils";

const tripsPath = path.resolve(process.argv[2] ?? defaultCleanedPath);
const cachePath = path.resolve(process.argv[3] ?? defaultGeocodeCachePath);
const outputPath = path.resolve(process.argv[4] ?? defaultMergedPath);

async function main() {
  if (!existsSync(cachePath)) {
    throw new Error(`Geocode cache not found at ${cachePath}. Run geocode-stations.ts first.`);
  }

  const cache = await readGeocodeCache(cachePath);
  console.log(`Geocode cache: ${cache.size} stations`);

  const trips = await readCsvFile(tripsPath);
  console.log(`Trips data: ${trips.rows.length} trips`);

  const merged = mergeCoordinates(trips, cache);

  mkdirSync(path.dirname(outputPath), { recursive: true });
  await writeCsvFile(outputPath, merged.columns, merged.rows);
  console.log(`\nMerged data saved to: ${outputPath}`);
  console.log(`Columns: ${merged.columns.join(", ")}`);

  const total = merged.rows.length;
  console.log(`\nMissing departure coordinates: ${merged.missingDeparture} (${formatPercent(merged.missingDeparture, total)}%)`);
  console.log(`Missing return coordinates: ${merged.missingReturn} (${formatPercent(merged.missingReturn, total)}%)`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
