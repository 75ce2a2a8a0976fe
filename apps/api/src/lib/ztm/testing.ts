import { WARSAW_TIME_ZONE } from "./helpers";
import type { CancelHandle, TimerFacility } from "./timers";
import type { Clock, DepartureSnapshot, FetchLike, SubscriptionConfig, WallClockTime } from "./types";

export type ManualTimer = {
  kind: "after" | "every" | "daily";
  delayMs: number;
  time: WallClockTime | null;
  callback: () => void;
  cancelled: boolean;
};

/** Timer facility whose timers only fire when a test fires them. */
export class ManualTimers implements TimerFacility {
  readonly timers: ManualTimer[] = [];

  after(delayMs: number, callback: () => void): CancelHandle {
    return this.add({ kind: "after", delayMs, time: null, callback, cancelled: false });
  }

  every(intervalMs: number, callback: () => void): CancelHandle {
    return this.add({ kind: "every", delayMs: intervalMs, time: null, callback, cancelled: false });
  }

  dailyAt(time: WallClockTime, callback: () => void): CancelHandle {
    return this.add({ kind: "daily", delayMs: 0, time, callback, cancelled: false });
  }

  active(kind?: ManualTimer["kind"]): ManualTimer[] {
    return this.timers.filter((timer) => !timer.cancelled && (!kind || timer.kind === kind));
  }

  fire(timer: ManualTimer | undefined) {
    if (!timer || timer.cancelled) {
      throw new Error("timer is not pending");
    }
    if (timer.kind === "after") {
      timer.cancelled = true;
    }
    timer.callback();
  }

  private add(timer: ManualTimer): CancelHandle {
    this.timers.push(timer);
    return {
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }
}

export const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

export const fixedClock = (iso: string): Clock => ({
  now: () => new Date(iso),
  timeZone: WARSAW_TIME_ZONE,
});

export const mutableClock = (iso: string) => {
  let nowMs = new Date(iso).getTime();
  const clock: Clock = { now: () => new Date(nowMs), timeZone: WARSAW_TIME_ZONE };
  return {
    clock,
    set: (next: string) => {
      nowMs = new Date(next).getTime();
    },
    advanceSeconds: (seconds: number) => {
      nowMs += seconds * 1000;
    },
  };
};

export const kv = (values: Record<string, string>) =>
  Object.entries(values).map(([key, value]) => ({ key, value }));

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

/** Fetch stand-in that answers by URL prefix; unknown URLs fail like a refused connection. */
export const routeFetch = (
  routes: Record<string, () => Response | Promise<Response>>,
): FetchLike => async (input) => {
  for (const [prefix, respond] of Object.entries(routes)) {
    if (input.startsWith(prefix)) {
      return respond();
    }
  }
  throw new TypeError("fetch failed");
};

export const TEST_TIMETABLE_URL = "https://api.example.test/timetable/";
export const TEST_STOP_INFO_URL = "https://api.example.test/store/";

export const testConfig = (overrides: Partial<SubscriptionConfig> = {}): SubscriptionConfig => ({
  apiKey: "test-secret",
  stopId: "7009",
  stopNr: "01",
  line: "N25",
  timeoutSeconds: 5,
  stopInfoTtlSeconds: null,
  maxDepartures: 3,
  refreshIntervalMinutes: 60,
  dailyRefreshTimes: [
    { hour: 0, minute: 3 },
    { hour: 2, minute: 30 },
  ],
  retryDelaySeconds: 120,
  jitterMaxSeconds: 45,
  timetableUrl: TEST_TIMETABLE_URL,
  stopInfoUrl: TEST_STOP_INFO_URL,
  ...overrides,
});

export const stopInfoPayload = {
  result: [
    {
      values: kv({
        zespol: "7008",
        slupek: "01",
        nazwa_zespolu: "Elsewhere",
      }),
    },
    {
      values: kv({
        zespol: "7009",
        slupek: "02",
        nazwa_zespolu: "Centrum",
        szer_geo: "52.2301",
        dlug_geo: "21.0110",
      }),
    },
    {
      values: kv({
        zespol: "7009",
        slupek: "01",
        nazwa_zespolu: "Centrum",
        id_ulicy: "1234",
        szer_geo: "52.2299",
        dlug_geo: "21.0105",
      }),
    },
  ],
};

export const snapshotOf = (
  status: DepartureSnapshot["status"],
  clocks: string[] = [],
  generatedAtUnix = 0,
): DepartureSnapshot => ({
  generatedAtUnix,
  status,
  departures: clocks.map((scheduledClock, index) => ({
    headsign: "Depot",
    scheduledClock,
    routeId: null,
    brigade: null,
    lineSymbols: null,
    isNightService: false,
    departureUnix: generatedAtUnix + (index + 1) * 600,
    departureIso: new Date((generatedAtUnix + (index + 1) * 600) * 1000).toISOString(),
    minutesUntilDeparture: (index + 1) * 10,
  })),
  stop: null,
});
