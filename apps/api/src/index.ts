import { Hono } from "hono";
import { logger } from "hono/logger";
import * as v from "valibot";

import { selectUpcoming } from "./lib/ztm";
import type { CurrentDepartures, DepartureSnapshot, StopMetadata } from "./lib/ztm";

const parseIntQuery = (defaultValue: number, minValue: number, maxValue: number) =>
  v.pipe(
    v.optional(v.string(), String(defaultValue)),
    v.transform((value) => Number(value)),
    v.number(),
    v.integer(),
    v.minValue(minValue),
    v.maxValue(maxValue),
  );

const departuresQuerySchema = (defaultLimit: number) =>
  v.object({
    limit: parseIntQuery(defaultLimit, 1, 20),
  });

export type AppDeps = {
  config: {
    stopId: string;
    stopNr: string;
    line: string;
    maxDepartures: number;
  };
  getCurrent: () => CurrentDepartures | null;
  getStopInfo: () => StopMetadata | null;
  refresh: () => Promise<DepartureSnapshot>;
  now?: () => Date;
};

const formatIssues = (issues: v.BaseIssue<unknown>[]) =>
  issues.map((issue) => ({
    message: issue.message,
    path: v.getDotPath(issue),
  }));

const withTimingHeaders = (response: Response, metricName: string, startedAtMs: number) => {
  const durationMs = Math.max(0, performance.now() - startedAtMs);
  response.headers.append("Server-Timing", `${metricName};dur=${durationMs.toFixed(1)}`);
  response.headers.set("X-Response-Time-Ms", durationMs.toFixed(1));
  return response;
};

export const createApp = (deps: AppDeps) => {
  const app = new Hono();
  const now = deps.now ?? (() => new Date());
  const querySchema = departuresQuerySchema(deps.config.maxDepartures);

  app.use(logger());

  app.get("/health", (c) => {
    return c.json({
      ok: true,
      service: "ztm-departures-api",
      city: "Warsaw",
      timestamp: now().toISOString(),
    });
  });

  app.get("/v1/departures", (c) => {
    const startedAtMs = performance.now();
    const parsed = v.safeParse(querySchema, c.req.query());
    if (!parsed.success) {
      return withTimingHeaders(c.json(
        {
          error: "Invalid query parameters",
          details: formatIssues(parsed.issues),
        },
        400,
      ), "departures", startedAtMs);
    }

    const current = deps.getCurrent();
    if (!current) {
      return withTimingHeaders(
        c.json({ error: "No data fetched yet" }, 503),
        "departures",
        startedAtMs,
      );
    }

    const servedAt = now();
    return withTimingHeaders(c.json({
      generatedAtUnix: Math.floor(servedAt.getTime() / 1000),
      lastUpdatedUnix: current.lastSuccessUnix,
      stale: current.stale,
      line: deps.config.line,
      stopId: deps.config.stopId,
      stopNr: deps.config.stopNr,
      stop: current.snapshot.stop,
      departures: selectUpcoming(current.snapshot, servedAt, parsed.output.limit),
    }), "departures", startedAtMs);
  });

  app.get("/v1/stop", (c) => {
    const stop = deps.getStopInfo();
    if (!stop) {
      return c.json({ error: "Stop metadata unavailable" }, 404);
    }
    return c.json({ stopId: deps.config.stopId, stopNr: deps.config.stopNr, stop });
  });

  app.post("/v1/refresh", async (c) => {
    const startedAtMs = performance.now();
    const snapshot = await deps.refresh();
    const current = deps.getCurrent();
    if (!current) {
      return withTimingHeaders(c.json(
        {
          error: "Failed to load departures",
          status: snapshot.status,
        },
        502,
      ), "refresh", startedAtMs);
    }

    return withTimingHeaders(c.json({
      status: snapshot.status,
      stale: current.stale,
      count: current.snapshot.departures.length,
      generatedAtUnix: current.snapshot.generatedAtUnix,
    }), "refresh", startedAtMs);
  });

  return app;
};
