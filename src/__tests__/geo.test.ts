import { describe, expect, it } from "vitest";
import { degreeDistance, haversine } from "../geo.js";

describe("haversine()", () => {
  it("returns 0 for identical points", () => {
    expect(haversine(31.145, 121.805, 31.145, 121.805)).toBe(0);
  });

  it("returns about 111,195 m for one degree of longitude at the equator", () => {
    const d = haversine(0, 0, 0, 1);
    expect(d).toBeGreaterThan(111_195 * 0.99);
    expect(d).toBeLessThan(111_195 * 1.01);
    expect(d).toBeCloseTo(111_194.93, 1);
  });

  it("is symmetric", () => {
    expect(haversine(31.1, 121.8, 31.2, 121.9)).toBeCloseTo(haversine(31.2, 121.9, 31.1, 121.8), 6);
  });
});

describe("degreeDistance()", () => {
  it("is planar in degree space", () => {
    expect(degreeDistance([0, 0], [3, 4])).toBe(5);
  });

  it("returns 0 for identical points", () => {
    expect(degreeDistance([31.145, 121.805], [31.145, 121.805])).toBe(0);
  });
});
