import type { WallClockTime, ZonedParts } from "./types";

export const WARSAW_TIME_ZONE = "Europe/Warsaw";

const WALL_CLOCK_RE = /^(\d{1,2}):(\d{2})$/;
const SAFE_LOG_VALUE_RE = /[^A-Za-z0-9_-]/g;

const partsFormatters = new Map<string, Intl.DateTimeFormat>();
const offsetFormatters = new Map<string, Intl.DateTimeFormat>();

const getPartsFormatter = (timeZone: string) => {
  let formatter = partsFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    partsFormatters.set(timeZone, formatter);
  }
  return formatter;
};

const getOffsetFormatter = (timeZone: string) => {
  let formatter = offsetFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      timeZoneName: "shortOffset",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    });
    offsetFormatters.set(timeZone, formatter);
  }
  return formatter;
};

export const getField = (row: Record<string, string>, key: string): string => {
  return row[key] ?? "";
};

export const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export const toZonedParts = (date: Date, timeZone: string): ZonedParts => {
  const parts = getPartsFormatter(timeZone).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");
  return {
    dateKey: pick("year") * 10000 + pick("month") * 100 + pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
    second: pick("second"),
  };
};

export const toZonedDateKey = (unixSeconds: number, timeZone: string): number =>
  toZonedParts(new Date(unixSeconds * 1000), timeZone).dateKey;

export const addDaysToDateKey = (dateKey: number, days: number): number => {
  const year = Math.floor(dateKey / 10000);
  const month = Math.floor((dateKey % 10000) / 100);
  const day = dateKey % 100;
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return (
    shifted.getUTCFullYear() * 10000 +
    (shifted.getUTCMonth() + 1) * 100 +
    shifted.getUTCDate()
  );
};

const parseOffsetSeconds = (offset: string): number => {
  const match = offset.match(/^GMT([+-])(\d{1,2})(?::?(\d{2}))?$/);
  if (!match) {
    return 0;
  }
  const sign = match[1] === "-" ? -1 : 1;
  const hours = Number(match[2] ?? "0");
  const minutes = Number(match[3] ?? "0");
  return sign * (hours * 3600 + minutes * 60);
};

const getOffsetSecondsAtUnix = (unixSeconds: number, timeZone: string): number => {
  const parts = getOffsetFormatter(timeZone).formatToParts(new Date(unixSeconds * 1000));
  const value = parts.find((part) => part.type === "timeZoneName")?.value ?? "GMT+0";
  return parseOffsetSeconds(value);
};

/**
 * Converts a local calendar date (`yyyymmdd`) plus seconds after local midnight
 * into a unix timestamp. The offset is looked up twice so that times on a DST
 * switch day land on the offset in force at that moment.
 */
export const toUnixFromZonedDateAndSeconds = (
  dateKey: number,
  secondsFromMidnight: number,
  timeZone: string,
): number => {
  const year = Math.floor(dateKey / 10000);
  const month = Math.floor((dateKey % 10000) / 100);
  const day = dateKey % 100;
  const utcMidnightUnix = Date.UTC(year, month - 1, day, 0, 0, 0) / 1000;
  let offset = getOffsetSecondsAtUnix(utcMidnightUnix, timeZone);
  let unix = utcMidnightUnix - offset + secondsFromMidnight;
  const refinedOffset = getOffsetSecondsAtUnix(unix, timeZone);
  if (refinedOffset !== offset) {
    offset = refinedOffset;
    unix = utcMidnightUnix - offset + secondsFromMidnight;
  }
  return unix;
};

export const parseWallClockTime = (value: string): WallClockTime | null => {
  const match = value.trim().match(WALL_CLOCK_RE);
  if (!match) {
    return null;
  }
  const hour = Number(match[1] ?? "0");
  const minute = Number(match[2] ?? "0");
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { hour, minute };
};

export const formatWallClockTime = (time: WallClockTime): string =>
  `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;

/**
 * Next unix second (strictly after `fromUnix`) at which the local wall clock
 * reads `time`.
 */
export const nextWallClockOccurrence = (
  time: WallClockTime,
  fromUnix: number,
  timeZone: string,
): number => {
  const todayKey = toZonedDateKey(fromUnix, timeZone);
  const seconds = time.hour * 3600 + time.minute * 60;
  const today = toUnixFromZonedDateAndSeconds(todayKey, seconds, timeZone);
  if (today > fromUnix) {
    return today;
  }
  return toUnixFromZonedDateAndSeconds(addDaysToDateKey(todayKey, 1), seconds, timeZone);
};

/**
 * Flattens an upstream `[{ key, value }, ...]` list into a plain mapping.
 * Returns null when the input is not a list at all.
 */
export const flattenKeyValues = (entries: unknown): Record<string, string> | null => {
  if (!Array.isArray(entries)) {
    return null;
  }
  const row: Record<string, string> = {};
  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null) {
      continue;
    }
    const key: unknown = Reflect.get(entry, "key");
    const value: unknown = Reflect.get(entry, "value");
    if (typeof key !== "string") {
      continue;
    }
    if (typeof value === "string") {
      row[key] = value;
    } else if (typeof value === "number" && Number.isFinite(value)) {
      row[key] = String(value);
    }
  }
  return row;
};

const safeLogValue = (value: string) => value.replace(SAFE_LOG_VALUE_RE, "*");

export const describeSubscription = (args: {
  stopId: string;
  stopNr: string;
  line?: string;
}): string => {
  const parts = [`stop_id=${safeLogValue(args.stopId)}`, `stop_nr=${safeLogValue(args.stopNr)}`];
  if (args.line !== undefined) {
    parts.push(`line=${safeLogValue(args.line)}`);
  }
  return parts.join(", ");
};

export const maskApiKey = (url: string): string => {
  const parsed = new URL(url);
  if (parsed.searchParams.has("apikey")) {
    parsed.searchParams.set("apikey", "****");
  }
  return parsed.toString();
};
