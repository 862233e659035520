import { parse } from "csv-parse/sync";
import fs from "fs";
import path from "path";
import { config } from "./config.js";
import type { Flight, PositionReport, RecordSet, Task, VehicleFix } from "./types.js";
import { optionalNumber } from "./utils/coerce.js";
import { isRecord } from "./utils/isRecord.js";

type CsvRow = Record<string, string>;

const text = (row: CsvRow, column: string): string => (row[column] ?? "").trim();

const optionalText = (row: CsvRow, column: string): string | undefined => text(row, column) || undefined;

const num = (row: CsvRow, column: string): number | undefined => optionalNumber(row[column]);

function isCsvRow(value: unknown): value is CsvRow {
  return isRecord(value) && Object.values(value).every(cell => typeof cell === "string");
}

export function parseCsv(content: string): CsvRow[] {
  const rows: unknown = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return Array.isArray(rows) ? rows.filter(isCsvRow) : [];
}

export function toFlight(row: CsvRow): Flight {
  return {
    fuuid: text(row, "FUUID"),
    flightNumber: text(row, "FLIGHTIDENTITY"),
    scheduledDate: text(row, "FLIGHTSCHEDULEDDATE"),
    direction: text(row, "FLIGHTDIRECTION"),
    baseAirportIata: text(row, "BASEAIRPORTIATACODE"),
    baseAirportIcao: text(row, "BASEAIRPORTICAOCODE"),
    standId: optionalText(row, "STANDID"),
    scheduledOnBlock: optionalText(row, "SCHEDULEDONBLOCKDATETIME"),
    actualOnBlock: optionalText(row, "ACTUALONBLOCKDATETIME"),
    scheduledOffBlock: optionalText(row, "SCHEDULEDOFFBLOCKDATETIME"),
    actualOffBlock: optionalText(row, "ACTUALOFFBLOCKDATETIME"),
    scheduledTakeoff: optionalText(row, "SCHEDULEDTAKEOFFDATETIME"),
    actualTakeoff: optionalText(row, "ACTUALTAKEOFFDATETIME"),
    operation: optionalText(row, "OPERATION"),
  };
}

export function toTask(row: CsvRow): Task {
  return {
    fuuid: text(row, "FUUID"),
    taskTypeCode: text(row, "TASKTYPECODE"),
    taskTypeName: text(row, "TASKTYPENAME"),
    description: optionalText(row, "TASKTYPEDESCRIPTION"),
    taskCode: optionalText(row, "TASKCODE"),
    taskName: optionalText(row, "TASKNAME"),
    action: optionalText(row, "TASKACTION"),
    resourceId: optionalText(row, "RESOURCEID"),
    tasker: optionalText(row, "TASKER"),
    note: optionalText(row, "TASKNOTE"),
    scheduledOnPosition: optionalText(row, "TASKSCHEDULEDONPOSITIONDATETIME"),
    actualOnPosition: optionalText(row, "TASKACTUALONPOSITIONDATETIME"),
    scheduledBegin: optionalText(row, "TASKSCHEDULEDBEGINDATETIME"),
    actualBegin: optionalText(row, "TASKACTUALBEGINDATETIME"),
    scheduledEnd: optionalText(row, "TASKSCHEDULEDENDDATETIME"),
    actualEnd: optionalText(row, "TASKACTUALENDDATETIME"),
    station: optionalText(row, "STATION"),
    source: optionalText(row, "SOURCE"),
    messageType: optionalText(row, "MESSAGETYPE"),
    id: optionalText(row, "ID"),
  };
}

export function toPositionReport(row: CsvRow): PositionReport | null {
  const lat = num(row, "LA");
  const lon = num(row, "LO");
  if (lat === undefined || lon === undefined) return null;

  return {
    id: text(row, "ID"),
    hex: text(row, "HX"),
    lat,
    lon,
    altitude: num(row, "HE"),
    groundSpeed: num(row, "GV"),
    course: num(row, "CO"),
    flightNumber: text(row, "FN"),
    flightNumber2: optionalText(row, "FN2"),
    registration: optionalText(row, "RE"),
    aircraftType: optionalText(row, "FT"),
    origin: optionalText(row, "OA"),
    destination: optionalText(row, "DA"),
    timestamp: optionalText(row, "TE"),
    eta: optionalText(row, "ETA"),
    source: optionalText(row, "SR"),
  };
}

export function toVehicleFix(row: CsvRow): VehicleFix | null {
  const lat = num(row, "LATITUDE");
  const lon = num(row, "LONGITUDE");
  if (lat === undefined || lon === undefined) return null;

  return {
    id: text(row, "VEHICLELOCATION_PK"),
    locationTime: text(row, "LOCATIONTIME"),
    vehicleNo: text(row, "VEHICLENO"),
    vehicleTypeName: text(row, "VEHICLETYPENAME"),
    department: text(row, "DEPARTMENTNAME"),
    telephone: text(row, "TELEPHONE"),
    isOnline: text(row, "ISONLINE"),
    simCode: text(row, "SIMCODE"),
    lon,
    lat,
    speed: num(row, "SPEED"),
    direction: num(row, "DIRECTION"),
    locationState: num(row, "LOCATIONSTATE"),
    x: num(row, "XCOOR"),
    y: num(row, "YCOOR"),
    airport: optionalText(row, "AIRPORT"),
  };
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

/**
 * Reads the four source tables from one directory. A missing file loads as an empty
 * collection; rows without coordinates are dropped from the position datasets.
 */
export class RecordLoader {
  constructor(private dataDir: string = config.dataDir, private files = config.files) {}

  private readRows(filename: string): CsvRow[] {
    const filePath = path.join(this.dataDir, filename);
    if (!fs.existsSync(filePath)) {
      console.warn(`Data file ${filePath} not found, loading no records`);
      return [];
    }
    return parseCsv(fs.readFileSync(filePath, "utf8"));
  }

  loadFlights(): Flight[] {
    const flights = this.readRows(this.files.flights).map(toFlight);
    console.log(`✓ Loaded flights: ${flights.length} records`);
    return flights;
  }

  loadTasks(): Task[] {
    const tasks = this.readRows(this.files.tasks).map(toTask);
    console.log(`✓ Loaded tasks: ${tasks.length} records`);
    return tasks;
  }

  loadPositionReports(): PositionReport[] {
    const reports = this.readRows(this.files.positionReports).map(toPositionReport).filter(isPresent);
    console.log(`✓ Loaded ADS-B reports: ${reports.length} records`);
    return reports;
  }

  loadVehicleFixes(): VehicleFix[] {
    const fixes = this.readRows(this.files.vehicleFixes).map(toVehicleFix).filter(isPresent);
    console.log(`✓ Loaded vehicle GPS fixes: ${fixes.length} records`);
    return fixes;
  }

  loadAll(): RecordSet {
    console.log(`Loading records from ${this.dataDir}...`);
    return {
      flights: this.loadFlights(),
      tasks: this.loadTasks(),
      positionReports: this.loadPositionReports(),
      vehicleFixes: this.loadVehicleFixes(),
    };
  }
}
