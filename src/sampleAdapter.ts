import { haversine } from "./geo.js";
import { isVehicleFix, vehicleFixToRow } from "./records.js";
import type { ComplianceSample, VehicleFix } from "./types.js";
import { toFloat, toInt } from "./utils/coerce.js";

/** Context a structured fix may carry for the distance and brake-test rules. */
export interface TowingContext {
  distance_to_aircraft?: number;
  plane_lat?: number;
  plane_lon?: number;
  brake_test_count?: number;
}

export type GpsRecordInput = (VehicleFix & TowingContext) | Record<string, unknown>;

export interface NormalizedRecord {
  /** Column-keyed view of the input, kept for alerts and the ledger. */
  record: Record<string, unknown>;
  sample: ComplianceSample;
  vehicleId: string | null;
}

const VEHICLE_ID_KEYS = ["VEHICLENO", "vehicleno", "vehicle_no", "vehicleNo"];

function has(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

function firstPresent(record: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (has(record, key)) return record[key];
  }
  return undefined;
}

function readSpeed(record: Record<string, unknown>): number | null {
  if (has(record, "SPEED") && record.SPEED !== "") return toFloat(record.SPEED);
  if (has(record, "speed")) return toFloat(record.speed);
  return null;
}

function readDistance(record: Record<string, unknown>): number | null {
  if (has(record, "distance_to_aircraft")) return toFloat(record.distance_to_aircraft);

  if (!has(record, "plane_lat") || !has(record, "plane_lon")) return null;
  const lat = toFloat(firstPresent(record, ["LATITUDE", "lat"]));
  const lon = toFloat(firstPresent(record, ["LONGITUDE", "lon"]));
  const planeLat = toFloat(record.plane_lat);
  const planeLon = toFloat(record.plane_lon);
  if (lat === null || lon === null || planeLat === null || planeLon === null) return null;
  return haversine(lat, lon, planeLat, planeLon);
}

function readBrakeTests(record: Record<string, unknown>): number | null {
  if (has(record, "brake_test_count")) return toInt(record.brake_test_count);
  if (has(record, "BRAKE_TEST_COUNT")) return toInt(record.BRAKE_TEST_COUNT);
  return null;
}

function readVehicleId(record: Record<string, unknown>): string | null {
  for (const key of VEHICLE_ID_KEYS) {
    const value = record[key];
    if (typeof value === "string" && value !== "") return value;
    if (typeof value === "number") return String(value);
  }
  return null;
}

/**
 * Turns a loaded fix or a loosely keyed mapping into a typed compliance sample.
 * Fields that are missing or cannot be converted are left out rather than zeroed.
 */
export function normalizeGpsRecord(input: GpsRecordInput): NormalizedRecord {
  const record = isVehicleFix(input) ? vehicleFixToRow(input) : { ...input };
  const sample: ComplianceSample = {};

  const speed = readSpeed(record);
  if (speed !== null) sample.speed = speed;

  const distance = readDistance(record);
  if (distance !== null) sample.distance_to_aircraft = distance;

  const brakeTests = readBrakeTests(record);
  if (brakeTests !== null) sample.brake_test_count = brakeTests;

  return { record, sample, vehicleId: readVehicleId(record) };
}
