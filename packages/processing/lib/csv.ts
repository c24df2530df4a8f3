import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "path";
import { TripLoadError, TripWriteError } from "./errors";
import type { CsvRow, CsvTable } from "./trip-types";

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

// Bytes -> text. UTF-8 only; a leading BOM is dropped by the decoder.
export function decodeUtf8(bytes: Uint8Array, filePath: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new TripLoadError(`${filePath} is not valid UTF-8`, "UNDECODABLE", filePath, {
      cause: err,
    });
  }
}

export function parseCsvText(text: string, filePath: string): CsvTable {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TripLoadError(`Malformed CSV in ${filePath}: ${reason}`, "MALFORMED_CSV", filePath, {
      cause: err,
    });
  }
  if (!isStringMatrix(records)) {
    throw new TripLoadError(`Unexpected CSV shape in ${filePath}`, "MALFORMED_CSV", filePath);
  }

  const [header, ...body] = records;
  if (!header) return { columns: [], rows: [] };

  const columns = header.map((name) => name.trim());
  const rows = body.map((cells) => {
    const row: CsvRow = {};
    columns.forEach((column, i) => {
      row[column] = cells[i] ?? "";
    });
    return row;
  });
  return { columns, rows };
}

export async function readCsvFile(filePath: string): Promise<CsvTable & { bytes: number }> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TripLoadError(`Cannot read ${filePath}: ${reason}`, "UNREADABLE", filePath, {
      cause: err,
    });
  }
  return { ...parseCsvText(decodeUtf8(bytes, filePath), filePath), bytes: bytes.length };
}

export function stringifyCsv(columns: string[], rows: string[][]): string {
  // Header goes through the same quoting rules as the body and is written even
  // when there are no rows
  return stringify([columns, ...rows]);
}

// Writes next to the target and renames over it, so a failed write never
// leaves a partial file behind
export async function writeCsvFile(filePath: string, columns: string[], rows: string[][]): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );
  try {
    await writeFile(tempPath, stringifyCsv(columns, rows), "utf-8");
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    const reason = err instanceof Error ? err.message : String(err);
    throw new TripWriteError(`Cannot write ${filePath}: ${reason}`, filePath, { cause: err });
  }
}
