import * as v from "valibot";

import {
  addDaysToDateKey,
  flattenKeyValues,
  toUnixFromZonedDateAndSeconds,
  toUnixSeconds,
  toZonedParts,
} from "./helpers";
import type {
  Clock,
  DepartureReading,
  DepartureSnapshot,
  ResolvedDeparture,
} from "./types";

const CLOCK_RE = /^(\d{2}):(\d{2}):(\d{2})$/;

const optionalText = () =>
  v.pipe(
    v.optional(v.string()),
    v.transform((value) => value ?? null),
  );

const rawReadingSchema = v.object({
  czas: v.optional(v.pipe(v.string(), v.regex(CLOCK_RE)), "00:00:00"),
  kierunek: v.optional(v.string(), "unknown"),
  trasa: optionalText(),
  brygada: optionalText(),
  symbol_1: optionalText(),
  symbol_2: optionalText(),
});

export const parseReading = (row: Record<string, string>): DepartureReading | null => {
  const parsed = v.safeParse(rawReadingSchema, row);
  if (!parsed.success) {
    return null;
  }

  const { czas, kierunek, trasa, brygada, symbol_1, symbol_2 } = parsed.output;
  return {
    headsign: kierunek,
    scheduledClock: czas,
    routeId: trasa,
    brigade: brygada,
    lineSymbols:
      symbol_1 !== null || symbol_2 !== null ? [symbol_1 ?? "", symbol_2 ?? ""] : null,
  };
};

export const isNightService = (reading: DepartureReading): boolean => {
  const hour = Number(reading.scheduledClock.slice(0, 2));
  return Number.isInteger(hour) && hour >= 24;
};

/**
 * Resolves the absolute departure of a reading relative to `now`.
 *
 * Clock hours 24+ belong to the previous service day and are folded back onto
 * the 0-23 range. A time still ahead of the local hour/minute lands today,
 * anything else (including the current minute) lands tomorrow. Seconds are
 * ignored on both sides.
 */
export const resolveDeparture = (
  reading: DepartureReading,
  now: Date,
  timeZone: string,
): ResolvedDeparture | null => {
  const match = reading.scheduledClock.match(CLOCK_RE);
  if (!match) {
    return null;
  }
  const hour = Number(match[1] ?? "0");
  const minute = Number(match[2] ?? "0");
  if (minute > 59) {
    return null;
  }

  const dtHour = hour % 24;
  const local = toZonedParts(now, timeZone);
  const stillAhead =
    dtHour > local.hour || (dtHour === local.hour && minute > local.minute);
  const targetDateKey = stillAhead ? local.dateKey : addDaysToDateKey(local.dateKey, 1);
  const departureUnix = toUnixFromZonedDateAndSeconds(
    targetDateKey,
    dtHour * 3600 + minute * 60,
    timeZone,
  );

  return {
    ...reading,
    isNightService: isNightService(reading),
    departureUnix,
    departureIso: new Date(departureUnix * 1000).toISOString(),
    minutesUntilDeparture: Math.max(
      0,
      Math.floor((departureUnix * 1000 - now.getTime()) / 60000),
    ),
  };
};

export const minutesToDepart = (
  reading: DepartureReading,
  now: Date,
  timeZone: string,
): number => resolveDeparture(reading, now, timeZone)?.minutesUntilDeparture ?? -1;

export const compareDepartures = (a: ResolvedDeparture, b: ResolvedDeparture) =>
  a.departureUnix - b.departureUnix;

export type DecodedRows = {
  departures: ResolvedDeparture[];
  skipped: number;
};

export const decodeRows = (rows: unknown[], clock: Clock): DecodedRows => {
  const now = clock.now();
  const departures: ResolvedDeparture[] = [];
  let skipped = 0;

  for (const rawRow of rows) {
    const row = flattenKeyValues(rawRow);
    if (!row) {
      console.warn("[ztm] Unexpected entry format in timetable result");
      skipped += 1;
      continue;
    }

    try {
      const reading = parseReading(row);
      const resolved = reading ? resolveDeparture(reading, now, clock.timeZone) : null;
      if (!resolved) {
        console.debug(`[ztm] Invalid reading skipped: czas=${row.czas ?? "<missing>"}`);
        skipped += 1;
        continue;
      }
      departures.push(resolved);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.debug(`[ztm] Reading failed to decode: ${message}`);
      skipped += 1;
    }
  }

  departures.sort(compareDepartures);
  return { departures, skipped };
};

/**
 * Departures of a snapshot still ahead of `now`, with minutes recomputed for
 * the moment they are served.
 */
export const selectUpcoming = (
  snapshot: DepartureSnapshot,
  now: Date,
  limit: number,
): ResolvedDeparture[] => {
  const nowUnix = toUnixSeconds(now);
  return snapshot.departures
    .filter((departure) => departure.departureUnix >= nowUnix)
    .slice(0, limit)
    .map((departure) => ({
      ...departure,
      minutesUntilDeparture: Math.max(
        0,
        Math.floor((departure.departureUnix * 1000 - now.getTime()) / 60000),
      ),
    }));
};

export type SnapshotChange = "first" | "count" | "times";

export const describeSnapshotChange = (
  previous: DepartureSnapshot | null,
  next: DepartureSnapshot,
): SnapshotChange | null => {
  if (!previous) {
    return "first";
  }
  if (previous.departures.length !== next.departures.length) {
    return "count";
  }
  const changed = previous.departures.some(
    (departure, index) =>
      departure.scheduledClock !== next.departures[index]?.scheduledClock,
  );
  return changed ? "times" : null;
};
