import { differenceInSeconds, isSameDay } from "date-fns";
import { config } from "./config.js";
import { degreeDistance } from "./geo.js";
import {
  isTowingTask,
  isTowingVehicle,
  taskActualEnd,
  vehicleFixPosition,
  vehicleFixTime,
} from "./records.js";
import { RandomStandResolver, type StandCoordinateResolver } from "./standCoordinates.js";
import type { Flight, PositionReport, RecordSet, Task, VehicleFix } from "./types.js";
import { parseCalendarDate, parseTimestampDate } from "./utils/parseTimestamp.js";

export interface MatcherOptions {
  /** Replaces the placeholder random stand layout. */
  standResolver?: StandCoordinateResolver;
  /** Source of randomness for the placeholder layout. */
  random?: () => number;
  /** Allowed gap between a fix and the task's actual end, in minutes. */
  taskVehicleWindowMin?: number;
  /** Suppress progress output. */
  quiet?: boolean;
}

export interface MatchSummary {
  flights: number;
  tasks: number;
  flightsWithTasks: number;
  towingTasks: number;
  flightsWithAdsb: number;
  adsbPoints: number;
  tasksWithVehicles: number;
  vehiclePoints: number;
  rates: {
    flightTask: number;
    flightAdsb: number;
    taskVehicle: number;
  };
}

function percent(part: number, whole: number): number {
  return whole ? (part / whole) * 100 : 0;
}

function countValues<T>(map: ReadonlyMap<string, T[]>): number {
  let total = 0;
  for (const list of map.values()) total += list.length;
  return total;
}

function countTowing(map: ReadonlyMap<string, Task[]>): number {
  let total = 0;
  for (const tasks of map.values()) total += tasks.filter(isTowingTask).length;
  return total;
}

export class DataMatcher {
  private flightTaskMap: Map<string, Task[]> = new Map();
  private flightAdsbMap: Map<string, PositionReport[]> = new Map();
  private taskVehicleMap: Map<string, VehicleFix[]> = new Map();
  private flightsByFuuid: Map<string, Flight> = new Map();
  private standResolver?: StandCoordinateResolver;

  constructor(private records: RecordSet, private options: MatcherOptions = {}) {
    // First flight wins when a load carries duplicate FUUIDs
    for (const flight of records.flights) {
      if (!this.flightsByFuuid.has(flight.fuuid)) {
        this.flightsByFuuid.set(flight.fuuid, flight);
      }
    }
    this.standResolver = options.standResolver;
  }

  get flightTasks(): ReadonlyMap<string, readonly Task[]> {
    return this.flightTaskMap;
  }

  get flightAdsb(): ReadonlyMap<string, readonly PositionReport[]> {
    return this.flightAdsbMap;
  }

  get taskVehicles(): ReadonlyMap<string, readonly VehicleFix[]> {
    return this.taskVehicleMap;
  }

  private log(message: string): void {
    if (!this.options.quiet) console.log(message);
  }

  getFlightByFuuid(fuuid: string): Flight | undefined {
    return this.flightsByFuuid.get(fuuid);
  }

  /**
   * Groups tasks under their flight's FUUID, keeping input order within each group.
   * Tasks whose FUUID has no flight in the current load are still grouped.
   */
  matchFlightTasks(): ReadonlyMap<string, readonly Task[]> {
    const grouped = new Map<string, Task[]>();
    let towingTasks = 0;

    for (const task of this.records.tasks) {
      const group = grouped.get(task.fuuid);
      if (group) group.push(task);
      else grouped.set(task.fuuid, [task]);
      if (isTowingTask(task)) towingTasks++;
    }

    this.flightTaskMap = grouped;
    this.log(`✓ Flight/task match: ${grouped.size}/${this.records.flights.length} flights have tasks, ${towingTasks} towing tasks`);
    return this.flightTaskMap;
  }

  /**
   * Links position reports to flights by flight number (primary or secondary) on the
   * flight's scheduled calendar date.
   *
   * The window is only reported; matching stays at calendar-day granularity.
   */
  matchFlightAdsb(timeWindowMinutes = config.matching.adsbTimeWindowMin): ReadonlyMap<string, readonly PositionReport[]> {
    this.log(`Matching flights to ADS-B reports (window ±${timeWindowMinutes} min, applied per calendar day)`);

    const byFlightNumber = new Map<string, PositionReport[]>();
    const index = (key: string | undefined, report: PositionReport) => {
      if (!key) return;
      const list = byFlightNumber.get(key);
      if (list) list.push(report);
      else byFlightNumber.set(key, [report]);
    };
    for (const report of this.records.positionReports) {
      index(report.flightNumber, report);
      if (report.flightNumber2 !== report.flightNumber) index(report.flightNumber2, report);
    }

    const matched = new Map<string, PositionReport[]>();
    for (const flight of this.records.flights) {
      const flightDate = parseCalendarDate(flight.scheduledDate);
      if (!flightDate) continue;

      const candidates = byFlightNumber.get(flight.flightNumber.trim());
      if (!candidates) continue;

      for (const report of candidates) {
        const reportDate = parseTimestampDate(report.timestamp);
        if (!reportDate || !isSameDay(reportDate, flightDate)) continue;

        const group = matched.get(flight.fuuid);
        if (group) group.push(report);
        else matched.set(flight.fuuid, [report]);
      }
    }

    this.flightAdsbMap = matched;
    this.log(`✓ Flight/ADS-B match: ${matched.size} flights with tracks, ${countValues(matched)} points`);
    return this.flightAdsbMap;
  }

  private resolver(): StandCoordinateResolver {
    if (!this.standResolver) {
      this.standResolver = new RandomStandResolver(this.records.flights, {
        ...config.stands,
        random: this.options.random,
      });
    }
    return this.standResolver;
  }

  /**
   * Links towing fixes to towing tasks: fix within `distanceThresholdDegrees` of the
   * flight's stand and within the time window of the task's actual end.
   */
  matchTaskVehicle(distanceThresholdDegrees = config.matching.vehicleDistanceDeg): ReadonlyMap<string, readonly VehicleFix[]> {
    const windowMin = this.options.taskVehicleWindowMin ?? config.matching.taskVehicleWindowMin;
    this.log(`Matching towing tasks to vehicle GPS (threshold ${distanceThresholdDegrees}°, ±${windowMin} min)`);

    const stands = this.resolver();
    const towingFixes = this.records.vehicleFixes
      .filter(isTowingVehicle)
      .map(fix => ({ fix, time: vehicleFixTime(fix) }))
      .filter((entry): entry is { fix: VehicleFix; time: Date } => entry.time !== null);

    const matched = new Map<string, VehicleFix[]>();
    for (const task of this.records.tasks) {
      if (!isTowingTask(task) || !task.id) continue;

      const flight = this.getFlightByFuuid(task.fuuid);
      if (!flight?.standId) continue;

      const standCoord = stands.resolve(flight.standId);
      if (!standCoord) continue;

      const taskEnd = taskActualEnd(task);
      if (!taskEnd) continue;

      for (const { fix, time } of towingFixes) {
        const gapMin = Math.abs(differenceInSeconds(time, taskEnd)) / 60;
        if (gapMin > windowMin) continue;
        if (degreeDistance(standCoord, vehicleFixPosition(fix)) > distanceThresholdDegrees) continue;

        const group = matched.get(task.id);
        if (group) group.push(fix);
        else matched.set(task.id, [fix]);
      }
    }

    this.taskVehicleMap = matched;
    this.log(`✓ Task/vehicle match: ${matched.size} tasks with vehicle tracks, ${countValues(matched)} points`);
    return this.taskVehicleMap;
  }

  /** Runs the three passes in order: tasks, position reports, vehicles. */
  matchAll(): MatchSummary {
    this.log("Running all matchers...");
    this.matchFlightTasks();
    this.matchFlightAdsb();
    this.matchTaskVehicle();
    this.log("All matchers complete");
    return this.getMatchSummary();
  }

  getMatchSummary(): MatchSummary {
    const flights = this.records.flights.length;
    const tasks = this.records.tasks.length;
    return {
      flights,
      tasks,
      flightsWithTasks: this.flightTaskMap.size,
      towingTasks: countTowing(this.flightTaskMap),
      flightsWithAdsb: this.flightAdsbMap.size,
      adsbPoints: countValues(this.flightAdsbMap),
      tasksWithVehicles: this.taskVehicleMap.size,
      vehiclePoints: countValues(this.taskVehicleMap),
      rates: {
        flightTask: percent(this.flightTaskMap.size, flights),
        flightAdsb: percent(this.flightAdsbMap.size, flights),
        taskVehicle: percent(this.taskVehicleMap.size, tasks),
      },
    };
  }
}
