import * as v from "valibot";

export const stopMetadataSchema = v.record(v.string(), v.string());

export const departureSchema = v.object({
  headsign: v.string(),
  scheduledClock: v.pipe(v.string(), v.regex(/^\d{2}:\d{2}:\d{2}$/)),
  routeId: v.nullable(v.string()),
  brigade: v.nullable(v.string()),
  lineSymbols: v.nullable(v.tuple([v.string(), v.string()])),
  isNightService: v.boolean(),
  departureUnix: v.number(),
  departureIso: v.string(),
  minutesUntilDeparture: v.pipe(v.number(), v.integer(), v.minValue(0)),
});

export const stopDeparturesResponseSchema = v.object({
  generatedAtUnix: v.number(),
  lastUpdatedUnix: v.number(),
  stale: v.boolean(),
  line: v.string(),
  stopId: v.string(),
  stopNr: v.string(),
  stop: v.nullable(stopMetadataSchema),
  departures: v.array(departureSchema),
});

export const stopResponseSchema = v.object({
  stopId: v.string(),
  stopNr: v.string(),
  stop: stopMetadataSchema,
});

export const refreshResponseSchema = v.object({
  status: v.picklist(["ok", "error"]),
  stale: v.boolean(),
  count: v.number(),
  generatedAtUnix: v.number(),
});
