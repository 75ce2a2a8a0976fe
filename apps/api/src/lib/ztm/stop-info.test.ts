import { beforeEach, describe, expect, it, vi } from "vitest";

import { toUnixSeconds } from "./helpers";
import { StopInfoCache } from "./stop-info";
import type { StopInfoCacheOptions } from "./stop-info";
import { jsonResponse, mutableClock, stopInfoPayload, TEST_STOP_INFO_URL } from "./testing";

const START = "2026-01-15T08:00:00Z";

const buildCache = (
  respond: () => Response,
  overrides: Partial<StopInfoCacheOptions> = {},
) => {
  const time = mutableClock(START);
  const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => respond());
  const sleep = vi.fn(async (_ms: number) => {});
  const cache = new StopInfoCache({
    url: TEST_STOP_INFO_URL,
    apiKey: "test-secret",
    stopId: "7009",
    stopNr: "01",
    ttlSeconds: null,
    clock: time.clock,
    http: { fetchImpl, sleep },
    sleep,
    ...overrides,
  });
  return { cache, fetchImpl, sleep, time };
};

describe("StopInfoCache", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  it("prefers the entry of the configured post and caches it", async () => {
    const { cache, fetchImpl } = buildCache(() => jsonResponse(stopInfoPayload));

    const first = await cache.fetchOrGetCached();
    const second = await cache.fetchOrGetCached();

    expect(first).toEqual({
      nazwa_zespolu: "Centrum",
      id_ulicy: "1234",
      szer_geo: "52.2299",
      dlug_geo: "21.0105",
      stop_name: "Centrum",
    });
    expect(second).toBe(first);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(
      "https://api.example.test/store/?id=ab75c33d-3a26-4342-b36a-6e5fef0a3ac3&apikey=test-secret",
    );
    expect(cache.key).toBe("7009/01");
  });

  it("falls back to the first post of the stop group", async () => {
    const { cache } = buildCache(() => jsonResponse(stopInfoPayload), { stopNr: "05" });

    expect(await cache.fetchOrGetCached()).toEqual({
      nazwa_zespolu: "Centrum",
      szer_geo: "52.2301",
      dlug_geo: "21.0110",
      stop_name: "Centrum",
    });
  });

  it("backs off and gives up after three failures", async () => {
    const { cache, fetchImpl, time } = buildCache(() => jsonResponse({ result: null }));
    const startUnix = toUnixSeconds(new Date(START));

    expect(await cache.fetchOrGetCached()).toBeNull();
    expect(cache.state.attempts).toBe(1);
    expect(cache.state.nextRetryAtUnix).toBe(startUnix + 7200);

    await cache.fetchOrGetCached();
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    time.advanceSeconds(7200);
    await cache.fetchOrGetCached();
    expect(cache.state.attempts).toBe(2);
    expect(cache.state.nextRetryAtUnix).toBe(startUnix + 7200 + 21600);

    time.advanceSeconds(21600);
    await cache.fetchOrGetCached();
    expect(cache.state.attempts).toBe(3);
    expect(cache.state.permanentMissing).toBe(true);
    expect(cache.state.nextRetryAtUnix).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(3);

    for (let i = 0; i < 2000; i += 1) {
      time.advanceSeconds(3600);
      expect(await cache.fetchOrGetCached()).toBeNull();
    }
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(cache.state.permanentMissing).toBe(true);

    cache.reset();
    expect(cache.state.permanentMissing).toBe(false);
    await cache.fetchOrGetCached();
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });

  it("retries a string result once after a short delay", async () => {
    const responses = [
      jsonResponse({ result: "Błędna metoda lub parametry wywołania" }),
      jsonResponse(stopInfoPayload),
    ];
    const { cache, fetchImpl, sleep } = buildCache(
      () => responses.shift() ?? jsonResponse({ result: null }),
    );

    const metadata = await cache.fetchOrGetCached();

    expect(metadata?.stop_name).toBe("Centrum");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(800);
    expect(cache.state.attempts).toBe(0);
  });

  it("counts a persistent string result as one failure", async () => {
    const { cache, fetchImpl } = buildCache(() => jsonResponse({ result: "false" }));

    expect(await cache.fetchOrGetCached()).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(cache.state.attempts).toBe(1);
  });

  it("counts a missing stop as a failure", async () => {
    const { cache } = buildCache(() => jsonResponse(stopInfoPayload), { stopId: "1111" });

    expect(await cache.fetchOrGetCached()).toBeNull();
    expect(cache.state.attempts).toBe(1);
  });

  it("counts a malformed lookup URL as a failure", async () => {
    const { cache, fetchImpl } = buildCache(() => jsonResponse(stopInfoPayload), {
      url: "not a url",
    });

    expect(await cache.fetchOrGetCached()).toBeNull();
    expect(cache.state.attempts).toBe(1);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("refreshes after the TTL and keeps the stale value on failure", async () => {
    const responses = [jsonResponse(stopInfoPayload)];
    const { cache, fetchImpl, time } = buildCache(
      () => responses.shift() ?? new Response("down", { status: 404 }),
      { ttlSeconds: 3600 },
    );

    const first = await cache.fetchOrGetCached();
    time.advanceSeconds(1800);
    await cache.fetchOrGetCached();
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    time.advanceSeconds(1800);
    const stale = await cache.fetchOrGetCached();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(stale).toBe(first);
    expect(cache.state.attempts).toBe(1);
  });

  it("shares one lookup between concurrent callers", async () => {
    const { cache, fetchImpl } = buildCache(() => jsonResponse(stopInfoPayload));

    const [a, b] = await Promise.all([cache.fetchOrGetCached(), cache.fetchOrGetCached()]);

    expect(a).toEqual(b);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
