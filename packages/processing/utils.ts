import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const repoRoot = path.resolve(__dirname, "../..");
export const dataDir = process.env.CITYBIKE_DATA_DIR ?? path.join(repoRoot, "data");

export const defaultRawTripsPath = path.join(dataDir, "2021-04.csv");
export const defaultCleanedPath = path.join(dataDir, "2021-04_cleaned.csv");
export const defaultMergedPath = path.join(dataDir, "2021-04_merged.csv");
export const defaultGeocodeCachePath = path.join(dataDir, "geocode_cache.csv");
export const defaultTemporalDir = path.join(dataDir, "temporal");

export function formatHumanReadableBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return `${bytes} B`;
  if (bytes < 1024) return `${Math.round(bytes)} B`;

  const units = ["KB", "MB", "GB", "TB"] as const;
  let value = bytes;
  let unitIndex = -1;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  const decimals = value >= 100 ? 0 : value >= 10 ? 1 : 2;
  return `${value.toFixed(decimals)} ${units[unitIndex]}`;
}

export function secondsSince(startMs: number): string {
  return ((Date.now() - startMs) / 1000).toFixed(1);
}

export function formatPercent(count: number, total: number): string {
  if (total === 0) return "0.00";
  return ((count / total) * 100).toFixed(2);
}
