// Cleans a raw city bike trip export into a validated, de-duplicated dataset.
//
// Usage: tsx clean-trips.ts <input-csv-or-glob> [output-csv]
// Example: tsx clean-trips.ts "data/2021-04*.csv" data/2021-04_cleaned.csv
//
// Input:
// - UTF-8 trip CSV(s) (BOM tolerated), all with the same header
//
// Output:
// - data/2021-04_cleaned.csv (or the given path): original columns with the
//   timestamps rewritten as YYYY-MM-DDTHH:MM:SS, plus derived_duration_seconds,
//   newest departure first
import { mkdirSync } from "fs";
import path from "path";
import { runCleaningPipeline } from "./lib/clean-pipeline";
import { auditTrips, formatAuditWarnings } from "./lib/quality-audit";
import { formatSummary, summarizeTrips } from "./lib/summary";
import { loadTrips } from "./lib/load-trips";
import { writeCleanTrips } from "./lib/write-trips";
import {
  defaultCleanedPath,
  defaultRawTripsPath,
  formatHumanReadableBytes,
  formatPercent,
  secondsSince,
} from "./utils";

if (process.argv[2] === "--help" || process.argv[2] === "-h") {
  console.log("Usage: tsx clean-trips.ts <input-csv-or-glob> [output-csv]");
  process.exit(0);
}

const inputArg = process.argv[2] ?? defaultRawTripsPath;
const outputPath = path.resolve(process.argv[3] ?? defaultCleanedPath);

async function main() {
  const startTime = Date.now();

  // 1. Load
  console.log(`Loading trips from: ${inputArg}`);
  const loaded = await loadTrips(inputArg);
  console.log(`Matched CSVs: ${loaded.files.length}`);
  console.log(loaded.files.map((p) => `- ${p}`).join("\n"));
  console.log(`Total input size: ${formatHumanReadableBytes(loaded.totalBytes)}`);
  console.log(`Initial dataset: ${loaded.initialCount.toLocaleString("en-US")} rows`);

  // 2. Audit before touching anything
  const warnings = formatAuditWarnings(auditTrips(loaded.records, { columns: loaded.columns }));
  if (warnings.length > 0) {
    console.warn(`\nValidation warnings (rows will be dropped):\n  - ${warnings.join("\n  - ")}`);
  } else {
    console.log("No validation issues found.");
  }

  // 3. Clean
  console.log("\nCleaning steps:");
  let stepStart = Date.now();
  const result = runCleaningPipeline(loaded.records, {
    columns: loaded.columns,
    onStage: (report, index) => {
      console.log(`  Step ${index}: ${report.description}...`);
      console.log(
        `    Removed: ${report.removed.toLocaleString("en-US")} rows (${formatPercent(report.removed, report.recordsIn)}%)`
      );
      console.log(`    Remaining: ${report.recordsOut.toLocaleString("en-US")} rows`);
      console.log(`    Done in ${secondsSince(stepStart)}s`);
      stepStart = Date.now();
    },
  });

  // 4. Write
  console.log(`\nSaving cleaned data to: ${outputPath}`);
  mkdirSync(path.dirname(outputPath), { recursive: true });
  await writeCleanTrips(outputPath, result.records, { columns: loaded.columns });

  // 5. Summary
  console.log("\nCleaning summary:");
  const summary = summarizeTrips(result.records, result.initialCount);
  console.log(formatSummary(summary).map((line) => (line ? `  ${line}` : line)).join("\n"));

  const droppedCount = result.initialCount - result.finalCount;
  console.warn(
    `\nTotal data loss: ${droppedCount} rows (${formatPercent(droppedCount, result.initialCount)}%) dropped`
  );
  console.log(`\nDone in ${secondsSince(startTime)}s`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
