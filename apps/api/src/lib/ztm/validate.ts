import { TIMETABLE_DATASET_ID } from "./client";
import { flattenKeyValues } from "./helpers";
import { getWithRetry, readUpstreamResult } from "./http";
import type { GetOptions, HttpResult, UpstreamResult } from "./http";
import { parseReading } from "./timetable";
import type { SubscriptionConfig } from "./types";

export const LINE_LISTING_DATASET_ID = "88cd555f-6f31-43ca-9de4-66c479ad5942";

export type SubscriptionCheckFailure =
  | "api_connection_error"
  | "api_http_error"
  | "invalid_api_key"
  | "line_check_failed"
  | "line_not_found"
  | "no_departures"
  | "no_valid_times";

export type SubscriptionCheck = { ok: true } | { ok: false; reason: SubscriptionCheckFailure };

type CheckedConfig = Pick<
  SubscriptionConfig,
  "apiKey" | "stopId" | "stopNr" | "line" | "timetableUrl" | "timeoutSeconds"
>;

const fail = (reason: SubscriptionCheckFailure): SubscriptionCheck => ({ ok: false, reason });

const toHttpFailure = (response: Extract<HttpResult, { ok: false }>) =>
  response.reason === "network" || response.reason === "timeout"
    ? fail("api_connection_error")
    : fail("api_http_error");

const isInvalidKey = (result: UpstreamResult) =>
  result.kind === "rejected" && result.message === "false";

export const listStopLines = (rows: unknown[]): string[] => {
  const lines: string[] = [];
  for (const entry of rows) {
    if (typeof entry !== "object" || entry === null) {
      continue;
    }
    const line = flattenKeyValues(Reflect.get(entry, "values"))?.linia;
    if (line) {
      lines.push(line);
    }
  }
  return lines;
};

/**
 * Confirms that the API key is accepted, that `line` calls at the stop post
 * and that its timetable holds at least one well-formed departure time.
 */
export const checkSubscription = async (
  config: CheckedConfig,
  http: GetOptions = {},
): Promise<SubscriptionCheck> => {
  const options: GetOptions = { timeoutMs: config.timeoutSeconds * 1000, ...http };
  const baseParams = {
    busstopId: config.stopId,
    busstopNr: config.stopNr,
    apikey: config.apiKey,
  };

  const linesResponse = await getWithRetry(
    config.timetableUrl,
    { id: LINE_LISTING_DATASET_ID, ...baseParams },
    options,
  );
  if (!linesResponse.ok) {
    return toHttpFailure(linesResponse);
  }
  const linesResult = readUpstreamResult(linesResponse.body);
  if (isInvalidKey(linesResult)) {
    return fail("invalid_api_key");
  }
  if (linesResult.kind !== "rows") {
    return fail("line_check_failed");
  }
  if (!listStopLines(linesResult.rows).includes(config.line)) {
    return fail("line_not_found");
  }

  const timetableResponse = await getWithRetry(
    config.timetableUrl,
    { id: TIMETABLE_DATASET_ID, ...baseParams, line: config.line },
    options,
  );
  if (!timetableResponse.ok) {
    return toHttpFailure(timetableResponse);
  }
  const timetableResult = readUpstreamResult(timetableResponse.body);
  if (isInvalidKey(timetableResult)) {
    return fail("invalid_api_key");
  }
  if (timetableResult.kind !== "rows") {
    return fail("no_departures");
  }

  const hasValidTime = timetableResult.rows.some((row) => {
    const values = flattenKeyValues(row);
    return values?.czas !== undefined && parseReading(values) !== null;
  });
  return hasValidTime ? { ok: true } : fail("no_valid_times");
};
