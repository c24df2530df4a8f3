// Splits the cleaned trips into overlapping time-of-day / day-of-week subsets.
//
// Usage: tsx partition-trips.ts [cleaned-csv] [output-dir]
// Example: tsx partition-trips.ts data/2021-04_cleaned.csv data/temporal
//
// Output (same columns as the input):
// - clean_night.csv (20:00-06:00), clean_day.csv (06:00-20:00)
// - clean_weekday.csv (Mon-Fri), clean_weekend.csv (Sat-Sun)
// - clean_monday.csv ... clean_sunday.csv
import { mkdirSync } from "fs";
import path from "path";
import { readCsvFile, writeCsvFile } from "./lib/csv";
import { partitionFileName, partitionTrips } from "./lib/temporal-partition";
import { defaultCleanedPath, defaultTemporalDir, secondsSince } from "./utils";

const inputPath = path.resolve(process.argv[2] ?? defaultCleanedPath);
const outputDir = path.resolve(process.argv[3] ?? defaultTemporalDir);

async function main() {
  const startTime = Date.now();
  console.log(`Reading data from ${inputPath}...`);
  const table = await readCsvFile(inputPath);
  console.log(`Total records: ${table.rows.length}`);

  const { partitions, skipped } = partitionTrips(table.rows);
  if (skipped > 0) {
    console.warn(`${skipped} rows skipped (unparseable departure time)`);
  }

  mkdirSync(outputDir, { recursive: true });
  for (const [name, rows] of partitions) {
    const fileName = partitionFileName(name);
    await writeCsvFile(
      path.join(outputDir, fileName),
      table.columns,
      rows.map((row) => table.columns.map((column) => row[column] ?? ""))
    );
    console.log(`  ${fileName}: ${rows.length} records`);
  }

  console.log(`\nAll temporal files written to ${outputDir} in ${secondsSince(startTime)}s`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
