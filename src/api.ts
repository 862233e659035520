import { Router, Request, Response } from "express";
import type { AppContext } from "./context.js";
import { isRuleName } from "./contract.js";
import type { PlatformNode } from "./platform.js";
import type { GpsRecordInput } from "./sampleAdapter.js";
import type { Result, RuleSet } from "./types.js";
import { isRecord } from "./utils/isRecord.js";

const DEFAULT_MAP_LIMIT = 20;

function parseLimit(raw: unknown, fallback: number): number | null {
  if (raw === undefined) return fallback;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 0) return null;
  return limit;
}

function mapToObject<T>(map: ReadonlyMap<string, readonly T[]>, limit: number): Record<string, readonly T[]> {
  const out: Record<string, readonly T[]> = {};
  let count = 0;
  for (const [key, values] of map) {
    if (count++ >= limit) break;
    out[key] = values;
  }
  return out;
}

function optionalNumberField(body: Record<string, unknown>, key: string): number | undefined | null {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function sendResult<T>(res: Response, result: Result<T>, status = 200) {
  if (!result.ok) {
    return res.status(404).json({ error: result.error.message });
  }
  return res.status(status).json(result.value);
}

export function createApiRouter(ctx: AppContext): Router {
  const router = Router();
  const { matcher, platform, records } = ctx;

  // ---------- health ----------
  router.get("/health", (_req, res) => {
    const channels = platform.verifyAllChannels();
    const healthy = Object.values(channels).every(Boolean);
    res.status(healthy ? 200 : 503).json({ status: healthy ? "ok" : "integrity_failure", channels });
  });

  // ---------- records / matches ----------
  router.get("/records/summary", (_req, res) => {
    res.json({
      flights: records.flights.length,
      tasks: records.tasks.length,
      positionReports: records.positionReports.length,
      vehicleFixes: records.vehicleFixes.length,
    });
  });

  router.post("/matches/run", (_req, res) => {
    try {
      res.json(matcher.matchAll());
    } catch (error) {
      console.error("Error running matchers:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  });

  router.get("/matches/summary", (_req, res) => {
    res.json(matcher.getMatchSummary());
  });

  const matchRoutes = {
    "/matches/flight-tasks": () => matcher.flightTasks,
    "/matches/flight-adsb": () => matcher.flightAdsb,
    "/matches/task-vehicles": () => matcher.taskVehicles,
  };
  for (const [route, source] of Object.entries(matchRoutes)) {
    router.get(route, (req: Request, res: Response) => {
      const limit = parseLimit(req.query.limit, DEFAULT_MAP_LIMIT);
      if (limit === null) {
        return res.status(400).json({ error: "limit must be a non-negative integer" });
      }
      const map = source();
      res.json({ total: map.size, groups: mapToObject<unknown>(map, limit) });
    });
  }

  // ---------- channels ----------
  router.get("/channels", (_req, res) => {
    res.json(platform.listChannels());
  });

  // Registered before /channels/:name/... so "verify" is never taken as a channel name
  router.get("/channels/verify", (_req, res) => {
    res.json(platform.verifyAllChannels());
  });

  router.get("/channels/:name/blocks", (req: Request, res: Response) => {
    sendResult(res, platform.exportChannel(req.params.name));
  });

  router.post("/channels/:name/data", (req: Request, res: Response) => {
    if (!isRecord(req.body)) {
      return res.status(400).json({ error: "Payload must be a JSON object" });
    }

    const { nodeId, data } = req.body;
    const payload = isRecord(data) ? data : req.body;
    let node: PlatformNode | undefined;
    if (typeof nodeId === "string") {
      node = platform.getNode(nodeId);
      if (!node) return res.status(400).json({ error: `Unknown node ${nodeId}` });
    }

    const result = platform.uploadData(req.params.name, payload, node);
    if (!result.ok) return res.status(404).json({ error: result.error.message });
    res.status(201).json(result.value.toRow());
  });

  // ---------- contracts ----------
  router.get("/contracts", (_req, res) => {
    res.json(platform.listContracts());
  });

  router.post("/contracts/:name/check", (req: Request, res: Response) => {
    if (!isRecord(req.body)) {
      return res.status(400).json({ error: "Sample must be a JSON object" });
    }
    sendResult(res, platform.checkCompliance(req.params.name, req.body));
  });

  router.post("/contracts/:name/gps-check", (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};

    let input: GpsRecordInput[] = records.vehicleFixes;
    if (body.records !== undefined) {
      if (!Array.isArray(body.records) || !body.records.every(isRecord)) {
        return res.status(400).json({ error: "records must be an array of objects" });
      }
      input = body.records.filter(isRecord);
    }

    const speedThresholdKmh = optionalNumberField(body, "speedThresholdKmh");
    const distanceThresholdM = optionalNumberField(body, "distanceThresholdM");
    const maxRecords = optionalNumberField(body, "maxRecords");
    if (speedThresholdKmh === null || distanceThresholdM === null || maxRecords === null) {
      return res.status(400).json({ error: "Thresholds and maxRecords must be numbers" });
    }
    if (maxRecords !== undefined && (!Number.isInteger(maxRecords) || maxRecords < 0)) {
      return res.status(400).json({ error: "maxRecords must be a non-negative integer" });
    }

    try {
      const result = platform.runComplianceCheckOnGps(
        input,
        req.params.name,
        { speedThresholdKmh, distanceThresholdM },
        maxRecords
      );
      sendResult(res, result);
    } catch (error) {
      console.error("GPS compliance check failed:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  });

  router.patch("/contracts/:name/rules", (req: Request, res: Response) => {
    if (!isRecord(req.body)) {
      return res.status(400).json({ error: "Rules must be a JSON object" });
    }

    const patch: RuleSet = {};
    for (const [key, value] of Object.entries(req.body)) {
      if (!isRuleName(key)) {
        return res.status(400).json({ error: `Unknown rule ${key}` });
      }
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return res.status(400).json({ error: `Threshold for ${key} must be a number` });
      }
      patch[key] = value;
    }

    sendResult(res, platform.updateContractRules(req.params.name, patch));
  });

  // ---------- alerts / statistics ----------
  router.get("/alerts", (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit, 100);
    if (limit === null) {
      return res.status(400).json({ error: "limit must be a non-negative integer" });
    }
    res.json(platform.listAlerts(limit));
  });

  router.get("/statistics", (_req, res) => {
    res.json(platform.getStatistics());
  });

  return router;
}
