import { describe, expect, it } from "vitest";
import { Contract, isRuleName } from "../contract.js";

const fixedClock = () => new Date("2025-09-15T08:30:00.000Z");

function towingContract() {
  return new Contract("towing_safety", { max_speed: 3, min_distance: 5, required_brake_tests: 2 }, fixedClock);
}

describe("Contract.checkCompliance", () => {
  it("flags a single speed violation", () => {
    const contract = towingContract();
    const result = contract.checkCompliance({ speed: 5, distance_to_aircraft: 10, brake_test_count: 2 });

    expect(result.compliant).toBe(false);
    expect(result.violations).toEqual([
      {
        rule: "max_speed",
        violation: "Speed 5 km/h exceeds limit 3 km/h",
        severity: "high",
        timestamp: "2025-09-15T08:30:00.000Z",
      },
    ]);
    expect(result.checked_at).toBe("2025-09-15T08:30:00.000Z");
  });

  it("evaluates every rule independently, in table order", () => {
    const result = towingContract().checkCompliance({ speed: 4.2, distance_to_aircraft: 3.5, brake_test_count: 1 });

    expect(result.violations.map(v => [v.rule, v.severity])).toEqual([
      ["max_speed", "high"],
      ["min_distance", "critical"],
      ["required_brake_tests", "medium"],
    ]);
    expect(result.violations.map(v => v.violation)).toEqual([
      "Speed 4.2 km/h exceeds limit 3 km/h",
      "Distance 3.5 m is below safe distance 5 m",
      "Brake test performed 1 times, fewer than required 2",
    ]);
  });

  it("treats an empty sample as compliant", () => {
    const result = towingContract().checkCompliance({});
    expect(result).toEqual({ compliant: true, violations: [], checked_at: "2025-09-15T08:30:00.000Z" });
  });

  it("passes values exactly at the thresholds", () => {
    const result = towingContract().checkCompliance({ speed: 3, distance_to_aircraft: 5, brake_test_count: 2 });
    expect(result.compliant).toBe(true);
  });

  it("skips fields of the wrong type", () => {
    const result = towingContract().checkCompliance({
      speed: "fast",
      distance_to_aircraft: null,
      brake_test_count: 1.5,
    });
    expect(result.compliant).toBe(true);
  });

  it("records one history entry per violation", () => {
    const contract = towingContract();
    contract.checkCompliance({ speed: 4.2, distance_to_aircraft: 3.5 });
    contract.checkCompliance({ speed: 1 });

    expect(contract.violations).toHaveLength(2);
    expect(contract.violations[0]).toMatchObject({
      contract: "towing_safety",
      original_data: { speed: 4.2, distance_to_aircraft: 3.5 },
      recorded_at: "2025-09-15T08:30:00.000Z",
    });
  });
});

describe("Contract.withOverrides", () => {
  it("returns effective rules without touching the contract", () => {
    const contract = towingContract();
    const effective = contract.withOverrides({ max_speed: 10, min_distance: undefined });

    expect(effective).toEqual({ max_speed: 10, min_distance: 5, required_brake_tests: 2 });
    expect(contract.rules).toEqual({ max_speed: 3, min_distance: 5, required_brake_tests: 2 });
  });

  it("applies overrides through evaluate", () => {
    const contract = towingContract();
    const result = contract.evaluate({ speed: 5 }, contract.withOverrides({ max_speed: 10 }));
    expect(result.compliant).toBe(true);
    expect(contract.checkCompliance({ speed: 5 }).compliant).toBe(false);
  });

  it("skips rules without a threshold", () => {
    const contract = new Contract("speed_only", { max_speed: 3 }, fixedClock);
    const result = contract.checkCompliance({ speed: 2, distance_to_aircraft: 0, brake_test_count: 0 });
    expect(result.compliant).toBe(true);
  });
});

describe("Contract.updateRules", () => {
  it("merges the patch into the live rules", () => {
    const contract = towingContract();
    expect(contract.updateRules({ max_speed: 8 })).toEqual({ max_speed: 8, min_distance: 5, required_brake_tests: 2 });
    expect(contract.checkCompliance({ speed: 5 }).compliant).toBe(true);
  });
});

describe("isRuleName", () => {
  it("accepts only known rules", () => {
    expect(isRuleName("max_speed")).toBe(true);
    expect(isRuleName("max_altitude")).toBe(false);
  });
});
