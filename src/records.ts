import type { Coordinate, Flight, PositionReport, Task, VehicleFix } from "./types.js";
import { parseTimestamp } from "./utils/parseTimestamp.js";

export const TOWING_TASK_CODE = "TRACT";
// Vehicle type names in the GPS feed are Chinese ("牵引车" = tow tractor); some fleets use the code instead.
export const TOWING_VEHICLE_MARKERS = ["牵引车", "TRACT"];

export function isArrival(flight: Flight): boolean {
  return flight.direction === "A";
}

export function isDeparture(flight: Flight): boolean {
  return flight.direction === "D";
}

/** Actual block time: on-block for arrivals, off-block for everything else. */
export function actualBlockTime(flight: Flight): Date | null {
  return parseTimestamp(isArrival(flight) ? flight.actualOnBlock : flight.actualOffBlock);
}

export function isTowingTask(task: Task): boolean {
  return task.taskTypeCode === TOWING_TASK_CODE;
}

export function taskActualEnd(task: Task): Date | null {
  return parseTimestamp(task.actualEnd);
}

export function isTowingVehicle(fix: VehicleFix): boolean {
  const typeName = fix.vehicleTypeName.toUpperCase();
  return TOWING_VEHICLE_MARKERS.some(marker => typeName.includes(marker));
}

export function vehicleFixTime(fix: VehicleFix): Date | null {
  return parseTimestamp(fix.locationTime);
}

export function vehicleFixPosition(fix: VehicleFix): Coordinate {
  return [fix.lat, fix.lon];
}

export function positionReportTime(report: PositionReport): Date | null {
  return parseTimestamp(report.timestamp);
}

const VEHICLE_FIX_FIELDS: ReadonlySet<string> = new Set([
  "id",
  "locationTime",
  "vehicleNo",
  "vehicleTypeName",
  "department",
  "telephone",
  "isOnline",
  "simCode",
  "lon",
  "lat",
  "speed",
  "direction",
  "locationState",
  "x",
  "y",
  "airport",
]);

/**
 * Column-keyed view of a fix, matching the GPS export layout. Fields outside that layout
 * (a paired aircraft position, brake-test counts) are carried through under their own keys.
 */
export function vehicleFixToRow(fix: VehicleFix): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fix)) {
    if (!VEHICLE_FIX_FIELDS.has(key)) extra[key] = value;
  }
  return {
    ...extra,
    VEHICLELOCATION_PK: fix.id,
    LOCATIONTIME: fix.locationTime,
    VEHICLENO: fix.vehicleNo,
    VEHICLETYPENAME: fix.vehicleTypeName,
    DEPARTMENTNAME: fix.department,
    TELEPHONE: fix.telephone,
    ISONLINE: fix.isOnline,
    SIMCODE: fix.simCode,
    LONGITUDE: fix.lon,
    LATITUDE: fix.lat,
    SPEED: fix.speed ?? "",
    DIRECTION: fix.direction ?? "",
    AIRPORT: fix.airport ?? "",
  };
}

export function isVehicleFix(value: unknown): value is VehicleFix {
  if (typeof value !== "object" || value === null) return false;
  return (
    "vehicleNo" in value &&
    typeof value.vehicleNo === "string" &&
    "vehicleTypeName" in value &&
    typeof value.vehicleTypeName === "string" &&
    "lat" in value &&
    typeof value.lat === "number" &&
    "lon" in value &&
    typeof value.lon === "number"
  );
}
