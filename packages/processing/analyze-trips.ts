// Prints a data quality report for a trip CSV (raw or cleaned).
//
// Usage: tsx analyze-trips.ts [csv-or-glob]
// Example: tsx analyze-trips.ts data/2021-04_cleaned.csv
import { loadTrips } from "./lib/load-trips";
import { auditTrips, formatAuditReport } from "./lib/quality-audit";
import { defaultCleanedPath, formatHumanReadableBytes, secondsSince } from "./utils";

const inputArg = process.argv[2] ?? defaultCleanedPath;

async function main() {
  const startTime = Date.now();
  console.log(`Loading trips from: ${inputArg}`);
  const loaded = await loadTrips(inputArg);
  console.log(`Loaded ${loaded.files.length} file(s), ${formatHumanReadableBytes(loaded.totalBytes)}`);
  console.log(`Columns: ${loaded.columns.join(", ")}\n`);

  const audit = auditTrips(loaded.records, { columns: loaded.columns });
  console.log(formatAuditReport(audit).join("\n"));

  console.log(`\nDone in ${secondsSince(startTime)}s`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
