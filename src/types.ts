/** Flight schedule row (clean_main.csv). Timestamps are kept as source strings. */
export interface Flight {
  fuuid: string;
  flightNumber: string;
  scheduledDate: string; // e.g. "2025/9/15"
  direction: string; // "A" arrival, "D" departure
  baseAirportIata: string;
  baseAirportIcao: string;
  standId?: string;
  scheduledOnBlock?: string;
  actualOnBlock?: string;
  scheduledOffBlock?: string;
  actualOffBlock?: string;
  scheduledTakeoff?: string;
  actualTakeoff?: string;
  operation?: string;
}

/** Ground-service task row (clean_task_info.csv) */
export interface Task {
  fuuid: string;
  taskTypeCode: string;
  taskTypeName: string;
  description?: string;
  taskCode?: string;
  taskName?: string;
  action?: string;
  resourceId?: string;
  tasker?: string;
  note?: string;
  scheduledOnPosition?: string;
  actualOnPosition?: string;
  scheduledBegin?: string;
  actualBegin?: string;
  scheduledEnd?: string;
  actualEnd?: string;
  station?: string;
  source?: string;
  messageType?: string;
  id?: string;
}

/** ADS-B position report (ADSB_PVG_merged.csv) */
export interface PositionReport {
  id: string;
  hex: string;
  lat: number;
  lon: number;
  altitude?: number;
  groundSpeed?: number;
  course?: number;
  flightNumber: string;
  flightNumber2?: string;
  registration?: string;
  aircraftType?: string;
  origin?: string;
  destination?: string;
  timestamp?: string;
  eta?: string;
  source?: string;
}

/** Tow-vehicle GPS fix (vehicle_gps_towing_merged.csv) */
export interface VehicleFix {
  id: string;
  locationTime: string;
  vehicleNo: string;
  vehicleTypeName: string;
  department: string;
  telephone: string;
  isOnline: string;
  simCode: string;
  lon: number;
  lat: number;
  speed?: number; // km/h
  direction?: number;
  locationState?: number;
  x?: number;
  y?: number;
  airport?: string;
}

export interface RecordSet {
  flights: Flight[];
  tasks: Task[];
  positionReports: PositionReport[];
  vehicleFixes: VehicleFix[];
}

/** [lat, lon] in degrees */
export type Coordinate = [number, number];

export type Severity = "medium" | "high" | "critical";

export type RuleName = "max_speed" | "min_distance" | "required_brake_tests";

export interface Violation {
  rule: RuleName;
  violation: string;
  severity: Severity;
  timestamp: string;
}

export interface ComplianceSample {
  speed?: number;
  distance_to_aircraft?: number;
  brake_test_count?: number;
}

export type RuleSet = Partial<Record<RuleName, number>>;

export interface ComplianceResult {
  compliant: boolean;
  violations: Violation[];
  checked_at: string;
}

export interface ViolationRecord {
  contract: string;
  violation: Violation;
  original_data: Record<string, unknown>;
  recorded_at: string;
}

/** Alert raised by an ad-hoc sample check */
export interface SampleAlert {
  contract: string;
  rule: RuleName;
  violation: string;
  severity: Severity;
  violation_time: string;
  sample_data: Record<string, unknown>;
  reported_at: string;
}

/** Alert raised by a batch check over vehicle fixes */
export interface GpsAlert {
  vehicle_id: string | null;
  rule: RuleName;
  violation: string;
  severity: Severity;
  violation_time: string;
  sample: Record<string, unknown>;
  checked_at: string;
}

export type AlertRecord = SampleAlert | GpsAlert;

export type NotFoundError = { kind: "NotFound"; message: string };

export type Result<T> = { ok: true; value: T } | { ok: false; error: NotFoundError };
