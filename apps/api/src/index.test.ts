import { beforeEach, describe, expect, it, vi } from "vitest";
import * as v from "valibot";

import {
  refreshResponseSchema,
  stopDeparturesResponseSchema,
  stopResponseSchema,
} from "./contracts";
import { createApp } from "./index";
import type { AppDeps } from "./index";
import { snapshotOf } from "./lib/ztm/testing";
import type { CurrentDepartures } from "./lib/ztm";

const GENERATED_AT = 1_000_000;

const current: CurrentDepartures = {
  snapshot: {
    ...snapshotOf("ok", ["10:00:00", "10:10:00", "10:20:00"], GENERATED_AT),
    stop: { nazwa_zespolu: "Centrum", stop_name: "Centrum" },
  },
  stale: false,
  lastSuccessUnix: GENERATED_AT,
};

const errorBody = v.object({ error: v.string() });

const buildTestApp = (overrides: Partial<AppDeps> = {}) => {
  const getCurrent = vi.fn((): CurrentDepartures | null => current);
  const refresh = vi.fn(async () => current.snapshot);

  const app = createApp({
    config: { stopId: "7009", stopNr: "01", line: "N25", maxDepartures: 3 },
    getCurrent,
    getStopInfo: () => current.snapshot.stop,
    refresh,
    now: () => new Date((GENERATED_AT + 700) * 1000),
    ...overrides,
  });

  return { app, getCurrent, refresh };
};

describe("api routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("reports health", async () => {
    const { app } = buildTestApp();

    const response = await app.request("/health");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      ok: true,
      service: "ztm-departures-api",
      city: "Warsaw",
      timestamp: "1970-01-12T13:58:20.000Z",
    });
  });

  it("rejects an invalid limit", async () => {
    const { app } = buildTestApp();

    const response = await app.request("/v1/departures?limit=0");
    const json = v.parse(errorBody, await response.json());

    expect(response.status).toBe(400);
    expect(json.error).toBe("Invalid query parameters");
  });

  it("returns upcoming departures", async () => {
    const { app } = buildTestApp();

    const response = await app.request("/v1/departures");
    const json = v.parse(stopDeparturesResponseSchema, await response.json());

    expect(response.status).toBe(200);
    expect(response.headers.get("Server-Timing")).toMatch(/^departures;dur=/);
    expect(json.generatedAtUnix).toBe(GENERATED_AT + 700);
    expect(json.lastUpdatedUnix).toBe(GENERATED_AT);
    expect(json.stale).toBe(false);
    expect(json.line).toBe("N25");
    expect(json.stop?.stop_name).toBe("Centrum");
    expect(json.departures.map((departure) => departure.minutesUntilDeparture)).toEqual([8, 18]);
  });

  it("honours the limit", async () => {
    const { app } = buildTestApp();

    const response = await app.request("/v1/departures?limit=1");
    const json = v.parse(stopDeparturesResponseSchema, await response.json());

    expect(json.departures.map((departure) => departure.scheduledClock)).toEqual(["10:10:00"]);
  });

  it("answers 503 before the first successful refresh", async () => {
    const { app } = buildTestApp({ getCurrent: () => null });

    const response = await app.request("/v1/departures");
    const json = v.parse(errorBody, await response.json());

    expect(response.status).toBe(503);
    expect(json.error).toBe("No data fetched yet");
  });

  it("returns stop metadata", async () => {
    const { app } = buildTestApp();

    const response = await app.request("/v1/stop");
    const json = v.parse(stopResponseSchema, await response.json());

    expect(response.status).toBe(200);
    expect(json).toEqual({
      stopId: "7009",
      stopNr: "01",
      stop: { nazwa_zespolu: "Centrum", stop_name: "Centrum" },
    });
  });

  it("answers 404 without stop metadata", async () => {
    const { app } = buildTestApp({ getStopInfo: () => null });

    const response = await app.request("/v1/stop");

    expect(response.status).toBe(404);
  });

  it("triggers a refresh", async () => {
    const { app, refresh } = buildTestApp();

    const response = await app.request("/v1/refresh", { method: "POST" });
    const json = v.parse(refreshResponseSchema, await response.json());

    expect(response.status).toBe(200);
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(json).toEqual({
      status: "ok",
      stale: false,
      count: 3,
      generatedAtUnix: GENERATED_AT,
    });
  });

  it("maps a refresh without any data to 502", async () => {
    const { app } = buildTestApp({
      getCurrent: () => null,
      refresh: async () => snapshotOf("error"),
    });

    const response = await app.request("/v1/refresh", { method: "POST" });
    const json = v.parse(errorBody, await response.json());

    expect(response.status).toBe(502);
    expect(json.error).toBe("Failed to load departures");
  });
});
