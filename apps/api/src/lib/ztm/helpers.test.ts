import { describe, expect, it } from "vitest";

import {
  addDaysToDateKey,
  describeSubscription,
  flattenKeyValues,
  maskApiKey,
  nextWallClockOccurrence,
  parseWallClockTime,
  toUnixFromZonedDateAndSeconds,
  toZonedParts,
  WARSAW_TIME_ZONE,
} from "./helpers";

const unixOf = (iso: string) => new Date(iso).getTime() / 1000;

describe("zoned calendar", () => {
  it("reads local parts in Warsaw", () => {
    expect(toZonedParts(new Date("2026-01-14T23:05:09Z"), WARSAW_TIME_ZONE)).toEqual({
      dateKey: 20260115,
      hour: 0,
      minute: 5,
      second: 9,
    });
  });

  it("adds days across month and year ends", () => {
    expect(addDaysToDateKey(20261231, 1)).toBe(20270101);
    expect(addDaysToDateKey(20260228, 1)).toBe(20260301);
  });

  it("converts local times on the spring DST switch", () => {
    const unix = toUnixFromZonedDateAndSeconds(20260329, 3 * 3600, WARSAW_TIME_ZONE);
    expect(new Date(unix * 1000).toISOString()).toBe("2026-03-29T01:00:00.000Z");
  });

  it("finds the next wall-clock occurrence", () => {
    const time = { hour: 2, minute: 30 };
    expect(nextWallClockOccurrence(time, unixOf("2026-01-15T01:00:00Z"), WARSAW_TIME_ZONE)).toBe(
      unixOf("2026-01-15T01:30:00Z"),
    );
    expect(nextWallClockOccurrence(time, unixOf("2026-01-15T01:30:00Z"), WARSAW_TIME_ZONE)).toBe(
      unixOf("2026-01-16T01:30:00Z"),
    );
  });
});

describe("parseWallClockTime", () => {
  it("parses HH:MM", () => {
    expect(parseWallClockTime("02:30")).toEqual({ hour: 2, minute: 30 });
    expect(parseWallClockTime(" 7:05 ")).toEqual({ hour: 7, minute: 5 });
  });

  it("rejects out of range values", () => {
    expect(parseWallClockTime("24:00")).toBeNull();
    expect(parseWallClockTime("2:5")).toBeNull();
    expect(parseWallClockTime("noon")).toBeNull();
  });
});

describe("flattenKeyValues", () => {
  it("keeps string and number values", () => {
    expect(
      flattenKeyValues([
        { key: "a", value: "1" },
        { key: "b", value: 2 },
        { key: "c", value: null },
        "junk",
        { value: "x" },
      ]),
    ).toEqual({ a: "1", b: "2" });
  });

  it("returns null for non-lists", () => {
    expect(flattenKeyValues({ key: "a", value: "1" })).toBeNull();
  });
});

describe("log context", () => {
  it("masks the api key", () => {
    expect(maskApiKey("https://api.example.test/x?apikey=test-secret&line=N25")).toBe(
      "https://api.example.test/x?apikey=****&line=N25",
    );
  });

  it("sanitizes subscription values", () => {
    expect(describeSubscription({ stopId: "7009", stopNr: "01", line: "N 25" })).toBe(
      "stop_id=7009, stop_nr=01, line=N*25",
    );
  });
});
