import { mkdirSync, readdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { runCleaningPipeline } from "./clean-pipeline";
import { TripWriteError } from "./errors";
import { loadTrips } from "./load-trips";
import { csvLine, makeTempDir, makeTrip, TEST_COLUMNS } from "./test-utils";
import { outputColumns, toOutputRow, writeCleanTrips } from "./write-trips";

function readLines(filePath: string): string[] {
  return readFileSync(filePath, "utf-8").trimEnd().split("\n");
}

async function cleanFile(input: string, output: string): Promise<void> {
  const loaded = await loadTrips(input);
  const result = runCleaningPipeline(loaded.records, { columns: loaded.columns });
  await writeCleanTrips(output, result.records, { columns: loaded.columns });
}

describe("toOutputRow", () => {
  it("rewrites the timestamps and appends the derived duration", () => {
    const [record] = runCleaningPipeline([makeTrip({ departure: "01.04.2021 08:00" })], {
      columns: TEST_COLUMNS,
    }).records;
    if (!record) throw new Error("trip was dropped");

    expect(toOutputRow(record, TEST_COLUMNS)).toEqual([
      "2021-04-01T08:00:00",
      "2021-04-01T08:30:00",
      "1",
      "Kaivopuisto",
      "2",
      "Laivasillankatu",
      "500",
      "1800",
      "1800",
    ]);
    expect(outputColumns(TEST_COLUMNS).at(-1)).toBe("derived_duration_seconds");
  });
});

describe("writeCleanTrips", () => {
  it("writes the header and quotes cells that need it", async () => {
    const dir = makeTempDir();
    const output = path.join(dir, "clean.csv");
    const { records } = runCleaningPipeline([makeTrip({ returnStationName: "Kamppi, metro" })], {
      columns: TEST_COLUMNS,
    });

    await writeCleanTrips(output, records, { columns: TEST_COLUMNS });

    expect(readLines(output)).toEqual([
      `${TEST_COLUMNS.join(",")},derived_duration_seconds`,
      '2021-04-01T08:00:00,2021-04-01T08:30:00,1,Kaivopuisto,2,"Kamppi, metro",500,1800,1800',
    ]);
  });

  it("writes only the header when nothing survived", async () => {
    const dir = makeTempDir();
    const output = path.join(dir, "clean.csv");

    await writeCleanTrips(output, [], { columns: TEST_COLUMNS });

    expect(readLines(output)).toEqual([`${TEST_COLUMNS.join(",")},derived_duration_seconds`]);
  });

  it("fails with TripWriteError when the directory is missing", async () => {
    const dir = makeTempDir();
    const output = path.join(dir, "missing", "clean.csv");

    await expect(writeCleanTrips(output, [], { columns: TEST_COLUMNS })).rejects.toBeInstanceOf(
      TripWriteError
    );
  });

  it("leaves no partial file behind when the rename fails", async () => {
    const dir = makeTempDir();
    const output = path.join(dir, "clean.csv");
    mkdirSync(output);

    await expect(writeCleanTrips(output, [], { columns: TEST_COLUMNS })).rejects.toBeInstanceOf(
      TripWriteError
    );
    expect(readdirSync(dir)).toEqual(["clean.csv"]);
  });
});

describe("clean and reload", () => {
  it("produces the same file when a cleaned file is cleaned again", async () => {
    const dir = makeTempDir();
    const raw = path.join(dir, "raw.csv");
    writeFileSync(
      raw,
      [
        TEST_COLUMNS.join(","),
        csvLine({ departure: "2021-04-01 09:00:00", return: "2021-04-01 09:12:30" }),
        csvLine(),
        csvLine(),
        csvLine({ departure: "bad" }),
        csvLine({ departureStationId: "4", returnStationId: "4", distance: "" }),
        csvLine({ departure: "02.04.2021 07:15", return: "02.04.2021 07:40", distance: "2300" }),
      ].join("\n") + "\n",
      "utf-8"
    );
    const first = path.join(dir, "first.csv");
    const second = path.join(dir, "second.csv");

    await cleanFile(raw, first);
    await cleanFile(first, second);

    expect(readLines(first)).toHaveLength(4);
    expect(readFileSync(second, "utf-8")).toBe(readFileSync(first, "utf-8"));
  });

  it("writes timestamps that agree with the derived duration when the input has fractions", async () => {
    const dir = makeTempDir();
    const raw = path.join(dir, "raw.csv");
    writeFileSync(
      raw,
      [
        TEST_COLUMNS.join(","),
        csvLine({ departure: "2021-04-01T08:00:00.100" }),
        csvLine({ departure: "2021-04-01T08:00:00.200" }),
        csvLine({ departure: "2021-04-02T08:00:00.900", return: "2021-04-02T08:01:01" }),
      ].join("\n") + "\n",
      "utf-8"
    );
    const first = path.join(dir, "first.csv");
    const second = path.join(dir, "second.csv");

    await cleanFile(raw, first);
    await cleanFile(first, second);

    expect(readLines(first).slice(1)).toEqual([
      "2021-04-02T08:00:00,2021-04-02T08:01:01,1,Kaivopuisto,2,Laivasillankatu,500,1800,61",
      "2021-04-01T08:00:00,2021-04-01T08:30:00,1,Kaivopuisto,2,Laivasillankatu,500,1800,1800",
    ]);
    expect(readFileSync(second, "utf-8")).toBe(readFileSync(first, "utf-8"));
  });

  it("recomputes rather than duplicates the derived column", async () => {
    const dir = makeTempDir();
    const first = path.join(dir, "first.csv");
    const { records } = runCleaningPipeline([makeTrip()], { columns: TEST_COLUMNS });
    await writeCleanTrips(first, records, { columns: TEST_COLUMNS });

    const reloaded = await loadTrips(first);

    expect(reloaded.columns).toEqual(TEST_COLUMNS);
    expect(reloaded.records[0]?.raw["derived_duration_seconds"]).toBe("1800");
  });
});
