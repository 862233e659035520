import { describe, expect, it } from "vitest";
import { DataMatcher } from "../matcher.js";
import { StaticStandResolver, seededRandom } from "../standCoordinates.js";
import type { RecordSet } from "../types.js";
import { makeFix, makeFlight, makeReport, makeTask } from "./fixtures/records.js";

function recordSet(overrides: Partial<RecordSet> = {}): RecordSet {
  return { flights: [], tasks: [], positionReports: [], vehicleFixes: [], ...overrides };
}

const stands = new StaticStandResolver({ "101": [31.145, 121.805], "202": [31.16, 121.79] });

describe("DataMatcher.matchFlightTasks", () => {
  const records = recordSet({
    flights: [makeFlight({ fuuid: "F1" }), makeFlight({ fuuid: "F2", flightNumber: "FM9001" })],
    tasks: [
      makeTask({ fuuid: "F1", id: "T1" }),
      makeTask({ fuuid: "F2", id: "T2", taskTypeCode: "CLEAN" }),
      makeTask({ fuuid: "F1", id: "T3", taskTypeCode: "FUEL" }),
      makeTask({ fuuid: "GHOST", id: "T4" }),
    ],
  });

  it("groups every task under its own FUUID, in input order", () => {
    const matcher = new DataMatcher(records, { quiet: true });
    const map = matcher.matchFlightTasks();

    expect([...map.keys()]).toEqual(["F1", "F2", "GHOST"]);
    expect(map.get("F1")?.map(t => t.id)).toEqual(["T1", "T3"]);

    let total = 0;
    for (const [fuuid, tasks] of map) {
      total += tasks.length;
      for (const task of tasks) expect(task.fuuid).toBe(fuuid);
    }
    expect(total).toBe(records.tasks.length);
  });

  it("keeps dangling FUUIDs as their own group", () => {
    const matcher = new DataMatcher(records, { quiet: true });
    expect(matcher.matchFlightTasks().get("GHOST")).toHaveLength(1);
  });

  it("is idempotent on unchanged data", () => {
    const matcher = new DataMatcher(records, { quiet: true });
    const first = new Map([...matcher.matchFlightTasks()].map(([k, v]) => [k, v.length]));
    const second = new Map([...matcher.matchFlightTasks()].map(([k, v]) => [k, v.length]));
    expect(second).toEqual(first);
  });

  it("counts towing tasks in the summary", () => {
    const matcher = new DataMatcher(records, { quiet: true });
    matcher.matchFlightTasks();
    const summary = matcher.getMatchSummary();
    expect(summary.flightsWithTasks).toBe(3);
    expect(summary.towingTasks).toBe(2);
    expect(summary.rates.flightTask).toBe(150);
  });

  it("produces an empty map for empty input", () => {
    const matcher = new DataMatcher(recordSet(), { quiet: true });
    expect(matcher.matchFlightTasks().size).toBe(0);
    expect(matcher.getMatchSummary().rates).toEqual({ flightTask: 0, flightAdsb: 0, taskVehicle: 0 });
  });
});

describe("DataMatcher.matchFlightAdsb", () => {
  it("matches primary or secondary flight number on the same calendar day", () => {
    const records = recordSet({
      flights: [makeFlight({ fuuid: "F1", flightNumber: " MU5101 ", scheduledDate: "2025/9/15" })],
      positionReports: [
        makeReport({ id: "A1", flightNumber: "MU5101", timestamp: "2025/9/15 08:40" }),
        makeReport({ id: "A2", flightNumber: "CES5101", flightNumber2: "MU5101", timestamp: "2025/9/15 23:59" }),
        makeReport({ id: "A3", flightNumber: "MU5101", timestamp: "2025/9/16 00:01" }),
        makeReport({ id: "A4", flightNumber: "MU5102", timestamp: "2025/9/15 08:40" }),
        makeReport({ id: "A5", flightNumber: "MU5101", timestamp: "garbage" }),
        makeReport({ id: "A6", flightNumber: "MU5101", timestamp: undefined }),
      ],
    });
    const matcher = new DataMatcher(records, { quiet: true });

    const map = matcher.matchFlightAdsb(120);
    expect(map.get("F1")?.map(r => r.id)).toEqual(["A1", "A2"]);
  });

  it("does not count a report twice when both flight numbers match", () => {
    const records = recordSet({
      flights: [makeFlight()],
      positionReports: [makeReport({ flightNumber: "MU5101", flightNumber2: "MU5101" })],
    });
    const map = new DataMatcher(records, { quiet: true }).matchFlightAdsb();
    expect(map.get("F1")).toHaveLength(1);
  });

  it("skips flights with empty or unparsable dates", () => {
    const records = recordSet({
      flights: [
        makeFlight({ fuuid: "F1", scheduledDate: "" }),
        makeFlight({ fuuid: "F2", scheduledDate: "15th of September" }),
      ],
      positionReports: [makeReport()],
    });
    const map = new DataMatcher(records, { quiet: true }).matchFlightAdsb();
    expect(map.size).toBe(0);
  });
});

describe("DataMatcher.matchTaskVehicle", () => {
  const flights = [makeFlight({ fuuid: "F1", standId: "101" })];

  it("matches towing fixes near the stand within 30 minutes of the task end", () => {
    const records = recordSet({
      flights,
      tasks: [makeTask({ id: "T1", actualEnd: "2025/9/15 08:30" })],
      vehicleFixes: [
        makeFix({ id: "V1", locationTime: "2025/9/15 08:00" }), // exactly 30 min before
        makeFix({ id: "V2", locationTime: "2025/9/15 09:01" }), // 31 min after
        makeFix({ id: "V3", lat: 31.2 }), // too far
        makeFix({ id: "V4", vehicleTypeName: "Fuel truck" }), // not a tug
        makeFix({ id: "V5", vehicleTypeName: "Tractor tug" }), // "TRACT" marker, case-insensitive
        makeFix({ id: "V6", locationTime: "bad" }),
      ],
    });
    const matcher = new DataMatcher(records, { quiet: true, standResolver: stands });

    const map = matcher.matchTaskVehicle(0.01);
    expect(map.get("T1")?.map(f => f.id)).toEqual(["V1", "V5"]);
  });

  it("treats missing flights, stands, coordinates and end times as no match", () => {
    const records = recordSet({
      flights: [
        ...flights,
        makeFlight({ fuuid: "F2", standId: undefined }),
        makeFlight({ fuuid: "F3", standId: "999" }),
      ],
      tasks: [
        makeTask({ id: "T1", fuuid: "MISSING" }),
        makeTask({ id: "T2", fuuid: "F2" }),
        makeTask({ id: "T3", fuuid: "F3" }),
        makeTask({ id: "T4", actualEnd: "" }),
        makeTask({ id: "T5", taskTypeCode: "FUEL" }),
        makeTask({ id: undefined }),
      ],
      vehicleFixes: [makeFix()],
    });
    const map = new DataMatcher(records, { quiet: true, standResolver: stands }).matchTaskVehicle();
    expect(map.size).toBe(0);
  });

  it("uses the first flight when FUUIDs are duplicated", () => {
    const records = recordSet({
      flights: [makeFlight({ fuuid: "F1", standId: "101" }), makeFlight({ fuuid: "F1", standId: "202" })],
    });
    const matcher = new DataMatcher(records, { quiet: true });
    expect(matcher.getFlightByFuuid("F1")?.standId).toBe("101");
  });

  it("only yields towing fixes within the threshold of some stand with the placeholder layout", () => {
    const records = recordSet({
      flights: [makeFlight({ standId: "101" })],
      tasks: [makeTask()],
      vehicleFixes: Array.from({ length: 20 }, (_, i) =>
        makeFix({ id: `V${i}`, lat: 31.13 + i * 0.0015, lon: 121.79 + i * 0.0015 })
      ),
    });
    const matcher = new DataMatcher(records, { quiet: true, random: seededRandom(7) });
    const map = matcher.matchTaskVehicle(0.01);

    for (const [taskId, fixes] of map) {
      expect(taskId).toBe("T1");
      for (const fix of fixes) {
        expect(fix.lat).toBeGreaterThanOrEqual(31.13 - 0.025);
        expect(fix.lat).toBeLessThanOrEqual(31.16 + 0.025);
      }
    }
    expect(matcher.getMatchSummary().vehiclePoints).toBeLessThanOrEqual(20);
  });

  it("keeps the placeholder stand layout for the matcher's lifetime", () => {
    const records = recordSet({
      flights: [makeFlight()],
      tasks: [makeTask()],
      vehicleFixes: Array.from({ length: 30 }, (_, i) => makeFix({ id: `V${i}`, lat: 31.13 + i * 0.001 })),
    });
    const matcher = new DataMatcher(records, { quiet: true });
    const first = matcher.matchTaskVehicle(0.005).get("T1")?.map(f => f.id);
    const second = matcher.matchTaskVehicle(0.005).get("T1")?.map(f => f.id);
    expect(second).toEqual(first);
  });
});

describe("DataMatcher.matchAll", () => {
  it("fills all three maps", () => {
    const records = recordSet({
      flights: [makeFlight()],
      tasks: [makeTask()],
      positionReports: [makeReport()],
      vehicleFixes: [makeFix()],
    });
    const matcher = new DataMatcher(records, { quiet: true, standResolver: stands });
    const summary = matcher.matchAll();

    expect(summary.flightsWithTasks).toBe(1);
    expect(summary.flightsWithAdsb).toBe(1);
    expect(summary.adsbPoints).toBe(1);
    expect(summary.tasksWithVehicles).toBe(1);
    expect(summary.vehiclePoints).toBe(1);
    expect(summary.rates.taskVehicle).toBe(100);
  });
});
