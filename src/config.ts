import dotenv from "dotenv";

dotenv.config();

export const config = {
  port: Number(process.env.PORT ?? 3000),
  dataDir: process.env.DATA_DIR || "data",
  // Empty or ":memory:" keeps the ledger in process memory only.
  dbPath: process.env.DB_PATH ?? "data/ledger.db",
  matching: {
    adsbTimeWindowMin: Number(process.env.ADSB_TIME_WINDOW_MIN ?? 120),
    vehicleDistanceDeg: Number(process.env.VEHICLE_DISTANCE_DEG ?? 0.01),
    taskVehicleWindowMin: Number(process.env.TASK_VEHICLE_WINDOW_MIN ?? 30),
  },
  // Placeholder stand layout around the apron reference point; replace with a real table when available.
  stands: {
    baseLat: Number(process.env.STAND_BASE_LAT ?? 31.145),
    baseLon: Number(process.env.STAND_BASE_LON ?? 121.805),
    jitterDeg: Number(process.env.STAND_JITTER_DEG ?? 0.015),
  },
  towingSafety: {
    max_speed: Number(process.env.TOWING_MAX_SPEED_KMH ?? 3),
    min_distance: Number(process.env.TOWING_MIN_DISTANCE_M ?? 5),
    required_brake_tests: Number(process.env.TOWING_REQUIRED_BRAKE_TESTS ?? 2),
  },
  files: {
    flights: "clean_main.csv",
    tasks: "clean_task_info.csv",
    positionReports: "ADSB_PVG_merged.csv",
    vehicleFixes: "vehicle_gps_towing_merged.csv",
  },
};

export type AppConfig = typeof config;
