import * as v from "valibot";

import {
  DEFAULT_STOP_INFO_URL,
  DEFAULT_TIMETABLE_URL,
  parseWallClockTime,
} from "./lib/ztm";
import type { SubscriptionConfig } from "./lib/ztm";

const defaultDailyRefreshTimes = ["00:03", "02:30"];

// Node timers hold at most 2^31 - 1 ms.
const MAX_TIMER_MINUTES = Math.floor(2_147_483_647 / 60_000);
const MAX_TIMER_SECONDS = Math.floor(2_147_483_647 / 1_000);

const toInt = (defaultValue: number, minValue: number, maxValue = Number.MAX_SAFE_INTEGER) =>
  v.pipe(
    v.optional(v.string(), String(defaultValue)),
    v.transform((input) => Number(input)),
    v.number(),
    v.integer(),
    v.minValue(minValue),
    v.maxValue(maxValue),
  );

const toOptionalInt = (minValue: number) =>
  v.pipe(
    v.optional(v.string(), ""),
    v.trim(),
    v.transform((input) => (input === "" ? null : Number(input))),
    v.nullable(v.pipe(v.number(), v.integer(), v.minValue(minValue))),
  );

const envSchema = v.object({
  HOST: v.pipe(v.optional(v.string(), "0.0.0.0"), v.trim(), v.minLength(1)),
  PORT: toInt(3000, 1, 65535),
  ZTM_API_KEY: v.pipe(v.string(), v.trim(), v.minLength(1)),
  ZTM_STOP_ID: v.pipe(v.string(), v.trim(), v.regex(/^\d+$/)),
  ZTM_STOP_NR: v.pipe(v.string(), v.trim(), v.regex(/^\d{2}$/)),
  ZTM_LINE: v.pipe(v.string(), v.trim(), v.minLength(1), v.toUpperCase()),
  ZTM_TIMEOUT_SECONDS: toInt(20, 1, 120),
  ZTM_STOP_INFO_TTL_SECONDS: toOptionalInt(60),
  ZTM_MAX_DEPARTURES: toInt(3, 1, 20),
  ZTM_REFRESH_INTERVAL_MINUTES: toInt(60, 1, MAX_TIMER_MINUTES),
  ZTM_DAILY_REFRESH_TIMES: v.pipe(
    v.optional(v.string(), defaultDailyRefreshTimes.join(",")),
    v.transform((value) =>
      value
        .split(",")
        .map((time) => time.trim())
        .filter((time) => time.length > 0)
        .map(parseWallClockTime),
    ),
    v.array(v.object({ hour: v.number(), minute: v.number() }), "Expected HH:MM times"),
  ),
  ZTM_RETRY_DELAY_SECONDS: toInt(120, 1, MAX_TIMER_SECONDS),
  ZTM_JITTER_MAX_SECONDS: toInt(45, 0, 600),
  ZTM_TIMETABLE_URL: v.pipe(v.optional(v.string(), DEFAULT_TIMETABLE_URL), v.url()),
  ZTM_STOP_INFO_URL: v.pipe(v.optional(v.string(), DEFAULT_STOP_INFO_URL), v.url()),
});

type EnvInput = Partial<Record<string, string | undefined>>;

export type AppEnv = {
  host: string;
  port: number;
  subscription: SubscriptionConfig;
};

export const parseEnv = (input: EnvInput): AppEnv => {
  const parsed = v.parse(envSchema, input);

  return {
    host: parsed.HOST,
    port: parsed.PORT,
    subscription: {
      apiKey: parsed.ZTM_API_KEY,
      stopId: parsed.ZTM_STOP_ID,
      stopNr: parsed.ZTM_STOP_NR,
      line: parsed.ZTM_LINE,
      timeoutSeconds: parsed.ZTM_TIMEOUT_SECONDS,
      stopInfoTtlSeconds: parsed.ZTM_STOP_INFO_TTL_SECONDS,
      maxDepartures: parsed.ZTM_MAX_DEPARTURES,
      refreshIntervalMinutes: parsed.ZTM_REFRESH_INTERVAL_MINUTES,
      dailyRefreshTimes: parsed.ZTM_DAILY_REFRESH_TIMES,
      retryDelaySeconds: parsed.ZTM_RETRY_DELAY_SECONDS,
      jitterMaxSeconds: parsed.ZTM_JITTER_MAX_SECONDS,
      timetableUrl: parsed.ZTM_TIMETABLE_URL,
      stopInfoUrl: parsed.ZTM_STOP_INFO_URL,
    },
  };
};
