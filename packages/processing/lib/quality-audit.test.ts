import { describe, expect, it } from "vitest";
import { auditTrips, formatAuditReport, formatAuditWarnings } from "./quality-audit";
import { makeTrip, TEST_COLUMNS } from "./test-utils";

const records = [
  makeTrip(),
  makeTrip(),
  makeTrip({ departure: "bad" }),
  makeTrip({ return: "2021-04-01T08:00:05", duration: "5", distance: "0" }),
  makeTrip({ departureStationId: "9", returnStationId: "9", distance: "250", duration: "" }),
  makeTrip({ return: "2021-04-01T07:00:00", duration: "-3600", distance: "" }),
  makeTrip({ distance: "30000" }),
  makeTrip({ return: "2021-04-01T09:00:00", duration: "3000", distance: "100" }),
];

describe("auditTrips", () => {
  const audit = auditTrips(records, { columns: TEST_COLUMNS });

  it("counts every issue without dropping anything", () => {
    expect(audit.totalRows).toBe(8);
    expect(audit.issues).toEqual({
      invalidDeparture: 1,
      invalidReturn: 0,
      missingDistance: 1,
      missingDuration: 1,
      duplicateRows: 1,
      negativeDuration: 1,
      returnBeforeDeparture: 1,
      veryShortTrips: 2,
      veryLongTrips: 0,
      zeroDistance: 1,
      sameStationWithDistance: 1,
      durationMismatch: 1,
      unrealisticSpeed: 1,
      slowTrips: 1,
    });
  });

  it("counts distinct stations by id and by name", () => {
    expect(audit.stations).toEqual({ departureIds: 2, returnIds: 2, departureNames: 1, returnNames: 1 });
    expect(audit.topDepartureStations).toEqual([{ name: "Kaivopuisto", trips: 8 }]);
  });

  it("ranks stations by trips and keeps first-seen order for ties", () => {
    const ranked = auditTrips(
      ["b", "a", "b", "a", "c"].map((name, i) =>
        makeTrip({ departureStationName: name, departureStationId: String(i) })
      ),
      { columns: TEST_COLUMNS }
    );
    expect(ranked.topDepartureStations).toEqual([
      { name: "b", trips: 2 },
      { name: "a", trips: 2 },
      { name: "c", trips: 1 },
    ]);
  });

  it("reports nothing for clean input", () => {
    const clean = auditTrips([makeTrip()], { columns: TEST_COLUMNS });
    expect(formatAuditWarnings(clean)).toEqual([]);
  });
});

describe("formatAuditWarnings", () => {
  it("lists only non-zero issues with their share of rows", () => {
    const warnings = formatAuditWarnings(auditTrips(records, { columns: TEST_COLUMNS }));

    expect(warnings).toHaveLength(12);
    expect(warnings[0]).toBe("1 rows (12.50%) with invalid departure datetime");
    expect(warnings).toContain("2 rows (25.00%) with very short trips (<10 sec)");
    expect(warnings).toContain("1 rows (12.50%) with same station but distance > 100m");
  });
});

describe("formatAuditReport", () => {
  it("includes totals, every issue and the top stations", () => {
    const lines = formatAuditReport(auditTrips(records, { columns: TEST_COLUMNS }));

    expect(lines[0]).toBe("Total rows: 8");
    expect(lines).toContain("  very long trips (>24 hours): 0 rows (0.00%)");
    expect(lines).toContain("  very slow speed (<1 km/h, >5 min): 1 rows (12.50%)");
    expect(lines).toContain("  Unique departure stations: 2");
    expect(lines).toContain("   1. Kaivopuisto (8)");
  });
});
