import { setTimeout as delay } from "node:timers/promises";

import * as v from "valibot";

import { maskApiKey } from "./helpers";
import type { FetchLike, Sleep } from "./types";

export const DEFAULT_TIMEOUT_MS = 20_000;
export const DEFAULT_MAX_RETRIES = 1;
export const DEFAULT_RETRY_BACKOFF_MS = 1_500;

export type HttpFailureReason = "http_status" | "timeout" | "network" | "invalid_json";

export type HttpResult =
  | { ok: true; status: number; body: unknown }
  | { ok: false; reason: HttpFailureReason; status: number | null };

export type GetOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  sleep?: Sleep;
};

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

const isTimeoutError = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "name" in error &&
  (error.name === "TimeoutError" || error.name === "AbortError");

/**
 * GET a JSON document. Timeouts and 5xx responses are retried with a linear
 * backoff; every other failure comes back as `{ ok: false }`. Never throws.
 */
export const getWithRetry = async (
  url: string,
  params: Record<string, string>,
  options: GetOptions = {},
): Promise<HttpResult> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
  const sleep = options.sleep ?? defaultSleep;

  let requestUrl: string;
  try {
    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
      target.searchParams.set(key, value);
    }
    requestUrl = target.toString();
  } catch {
    console.error(`[ztm] Invalid request URL: ${url}`);
    return { ok: false, reason: "network", status: null };
  }
  const logUrl = maskApiKey(requestUrl);

  let attempt = 0;
  while (true) {
    try {
      const response = await fetchImpl(requestUrl, {
        headers: { accept: "application/json" },
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });
      const text = await response.text();

      if (response.status >= 500 && response.status <= 599 && attempt < maxRetries) {
        attempt += 1;
        console.warn(
          `[ztm] HTTP ${response.status} from ${logUrl}; retrying (${attempt}/${maxRetries})`,
        );
        await sleep(retryBackoffMs * attempt);
        continue;
      }
      if (response.status !== 200) {
        console.error(`[ztm] HTTP ${response.status} from ${logUrl}`);
        return { ok: false, reason: "http_status", status: response.status };
      }

      try {
        const body: unknown = JSON.parse(text);
        return { ok: true, status: response.status, body };
      } catch {
        console.error(`[ztm] Invalid JSON from ${logUrl}`);
        return { ok: false, reason: "invalid_json", status: response.status };
      }
    } catch (error) {
      if (isTimeoutError(error)) {
        if (attempt < maxRetries) {
          attempt += 1;
          console.warn(
            `[ztm] Timeout talking to ${logUrl}; retrying (${attempt}/${maxRetries})`,
          );
          await sleep(retryBackoffMs * attempt);
          continue;
        }
        console.error(`[ztm] Timeout after ${timeoutMs}ms for ${logUrl}`);
        return { ok: false, reason: "timeout", status: null };
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ztm] Network error for ${logUrl}: ${message}`);
      return { ok: false, reason: "network", status: null };
    }
  }
};

const envelopeSchema = v.object({
  result: v.optional(v.union([v.array(v.unknown()), v.string(), v.null()])),
});

export type UpstreamResult =
  | { kind: "rows"; rows: unknown[] }
  | { kind: "empty" }
  | { kind: "rejected"; message: string }
  | { kind: "malformed" };

/**
 * Classifies the `result` field shared by the dbtimetable_get and dbstore_get
 * endpoints: a list of rows, null (no data), or a string such as "false" that
 * the API sends in place of an error status.
 */
export const readUpstreamResult = (body: unknown): UpstreamResult => {
  const parsed = v.safeParse(envelopeSchema, body);
  if (!parsed.success) {
    return { kind: "malformed" };
  }
  const { result } = parsed.output;
  if (result === undefined || result === null) {
    return { kind: "empty" };
  }
  if (typeof result === "string") {
    return { kind: "rejected", message: result };
  }
  return { kind: "rows", rows: result };
};
