import { describe, expect, it } from "vitest";
import { normalizeGpsRecord } from "../sampleAdapter.js";
import { makeFix } from "./fixtures/records.js";

describe("normalizeGpsRecord", () => {
  it("reads speed and vehicle id from a loaded fix", () => {
    const { sample, vehicleId, record } = normalizeGpsRecord(makeFix({ speed: 4 }));
    expect(sample).toEqual({ speed: 4 });
    expect(vehicleId).toBe("TUG-01");
    expect(record.VEHICLENO).toBe("TUG-01");
    expect(record.LATITUDE).toBe(31.145);
  });

  it("carries aircraft position and brake tests on a structured fix", () => {
    const { sample, record } = normalizeGpsRecord({
      ...makeFix({ speed: 4 }),
      plane_lat: 31.145,
      plane_lon: 121.805,
      brake_test_count: 1,
    });
    expect(sample).toEqual({ speed: 4, distance_to_aircraft: 0, brake_test_count: 1 });
    expect(record.plane_lat).toBe(31.145);
    expect(record.lat).toBeUndefined();
  });

  it("leaves speed out when a fix has none", () => {
    const { sample } = normalizeGpsRecord(makeFix({ speed: undefined }));
    expect(sample).toEqual({});
  });

  it("falls back to lowercase speed when SPEED is empty", () => {
    const { sample } = normalizeGpsRecord({ SPEED: "", speed: "4.5" });
    expect(sample.speed).toBe(4.5);
  });

  it("uses an explicit distance over plane coordinates", () => {
    const { sample } = normalizeGpsRecord({
      distance_to_aircraft: "3.5",
      LATITUDE: 0,
      LONGITUDE: 0,
      plane_lat: 10,
      plane_lon: 10,
    });
    expect(sample.distance_to_aircraft).toBe(3.5);
  });

  it("derives distance from the aircraft position", () => {
    const { sample } = normalizeGpsRecord({ lat: 0, lon: 0, plane_lat: 0, plane_lon: 0.0001 });
    expect(sample.distance_to_aircraft).toBeCloseTo(11.119, 2);
  });

  it("reads brake tests from either spelling and requires an integer", () => {
    expect(normalizeGpsRecord({ BRAKE_TEST_COUNT: "1" }).sample).toEqual({ brake_test_count: 1 });
    expect(normalizeGpsRecord({ brake_test_count: "1.5" }).sample).toEqual({});
  });

  it("drops values that are not numbers", () => {
    const { sample, vehicleId } = normalizeGpsRecord({ speed: "fast", vehicle_no: 42 });
    expect(sample).toEqual({});
    expect(vehicleId).toBe("42");
  });

  it("returns a null vehicle id when none is present", () => {
    expect(normalizeGpsRecord({ speed: 1 }).vehicleId).toBeNull();
  });
});
