import { describeSubscription, flattenKeyValues, toUnixSeconds } from "./helpers";
import { defaultSleep, getWithRetry, readUpstreamResult } from "./http";
import type { GetOptions } from "./http";
import type { Clock, Sleep, StopInfoEntry, StopMetadata } from "./types";

export const STOP_INFO_DATASET_ID = "ab75c33d-3a26-4342-b36a-6e5fef0a3ac3";
export const STOP_INFO_MAX_ATTEMPTS = 3;
export const STOP_INFO_BACKOFF_SECONDS = [2 * 3600, 6 * 3600] as const;
export const STRING_RESULT_RETRY_DELAY_MS = 800;

const MATCH_KEYS = new Set(["zespol", "slupek"]);

export type StopInfoCacheOptions = {
  url: string;
  apiKey: string;
  stopId: string;
  stopNr: string;
  ttlSeconds: number | null;
  clock: Clock;
  http?: GetOptions;
  sleep?: Sleep;
};

export type StopInfoState = Readonly<Omit<StopInfoEntry, "loadingPromise">>;

const createEntry = (): StopInfoEntry => ({
  value: null,
  lastFetchUnix: null,
  attempts: 0,
  nextRetryAtUnix: null,
  permanentMissing: false,
  loadingPromise: null,
});

export const toStopMetadata = (values: Record<string, string>): StopMetadata => {
  const metadata: StopMetadata = {};
  for (const [key, value] of Object.entries(values)) {
    if (!MATCH_KEYS.has(key)) {
      metadata[key] = value;
    }
  }
  if (metadata.nazwa_zespolu !== undefined) {
    metadata.stop_name = metadata.nazwa_zespolu;
  }
  return metadata;
};

/**
 * Picks the stop entry of `stopId`, preferring the one of post `stopNr` and
 * falling back to the first post of the same stop group.
 */
export const matchStopEntry = (
  rows: unknown[],
  stopId: string,
  stopNr: string,
): StopMetadata | null => {
  let fallback: StopMetadata | null = null;

  for (const entry of rows) {
    if (typeof entry !== "object" || entry === null) {
      continue;
    }
    const values = flattenKeyValues(Reflect.get(entry, "values"));
    if (!values || values.zespol !== stopId) {
      continue;
    }
    if (values.slupek === stopNr) {
      return toStopMetadata(values);
    }
    if (!fallback) {
      fallback = toStopMetadata(values);
    }
  }

  return fallback;
};

/**
 * Stop metadata for one subscription. A value, once found, is kept for the
 * process lifetime unless a TTL is configured. Failed lookups back off on a
 * fixed schedule and stop for good after `STOP_INFO_MAX_ATTEMPTS`, until
 * `reset()`.
 */
export class StopInfoCache {
  private entry: StopInfoEntry = createEntry();
  private generation = 0;

  constructor(private readonly options: StopInfoCacheOptions) {}

  get key(): string {
    return `${this.options.stopId}/${this.options.stopNr}`;
  }

  get state(): StopInfoState {
    const { loadingPromise: _loading, ...state } = this.entry;
    return state;
  }

  peek(): StopMetadata | null {
    return this.entry.value;
  }

  async fetchOrGetCached(): Promise<StopMetadata | null> {
    const entry = this.entry;
    const nowUnix = toUnixSeconds(this.options.clock.now());
    const ttl = this.options.ttlSeconds;

    if (
      entry.value &&
      (ttl === null || (entry.lastFetchUnix !== null && nowUnix - entry.lastFetchUnix < ttl))
    ) {
      return entry.value;
    }
    if (entry.permanentMissing) {
      return entry.value;
    }
    if (entry.nextRetryAtUnix !== null && nowUnix < entry.nextRetryAtUnix) {
      return entry.value;
    }
    if (entry.loadingPromise) {
      return entry.loadingPromise;
    }

    const generation = this.generation;
    entry.loadingPromise = (async () => {
      const found = await this.lookup();
      if (generation !== this.generation) {
        return null;
      }
      if (found) {
        this.recordSuccess(found);
        return found;
      }
      this.recordFailure();
      return entry.value;
    })();

    try {
      return await entry.loadingPromise;
    } finally {
      entry.loadingPromise = null;
    }
  }

  reset(): void {
    this.generation += 1;
    this.entry = createEntry();
  }

  private async lookup(): Promise<StopMetadata | null> {
    const { url, apiKey, stopId, stopNr } = this.options;
    const context = describeSubscription({ stopId, stopNr });
    const params = { id: STOP_INFO_DATASET_ID, apikey: apiKey };

    let response = await getWithRetry(url, params, this.options.http);
    if (!response.ok) {
      return null;
    }
    let result = readUpstreamResult(response.body);

    if (result.kind === "rejected") {
      // The API sometimes answers with a message string while its backend recovers.
      await (this.options.sleep ?? defaultSleep)(STRING_RESULT_RETRY_DELAY_MS);
      response = await getWithRetry(url, params, this.options.http);
      if (!response.ok) {
        return null;
      }
      result = readUpstreamResult(response.body);
      if (result.kind === "rejected") {
        console.debug(`[ztm] Stop info string result persisted after retry (${context})`);
        return null;
      }
    }

    switch (result.kind) {
      case "empty":
        console.warn(`[ztm] Stop info empty (${context})`);
        return null;
      case "malformed":
        console.error(`[ztm] Unexpected stop info payload (${context})`);
        return null;
      case "rows": {
        const metadata = matchStopEntry(result.rows, stopId, stopNr);
        if (!metadata) {
          console.warn(`[ztm] Stop not found in stop info (${context})`);
        }
        return metadata;
      }
    }
  }

  private recordSuccess(metadata: StopMetadata) {
    this.entry.value = metadata;
    this.entry.lastFetchUnix = toUnixSeconds(this.options.clock.now());
    this.entry.attempts = 0;
    this.entry.nextRetryAtUnix = null;
    this.entry.permanentMissing = false;
  }

  private recordFailure() {
    const entry = this.entry;
    const context = describeSubscription(this.options);
    entry.attempts += 1;

    if (entry.attempts >= STOP_INFO_MAX_ATTEMPTS) {
      entry.permanentMissing = true;
      entry.nextRetryAtUnix = null;
      console.warn(
        `[ztm] Stop info unavailable after ${entry.attempts} attempts; giving up until reload (${context})`,
      );
      return;
    }

    const backoffIndex = Math.min(entry.attempts - 1, STOP_INFO_BACKOFF_SECONDS.length - 1);
    const backoffSeconds = STOP_INFO_BACKOFF_SECONDS[backoffIndex] ?? 0;
    entry.nextRetryAtUnix = toUnixSeconds(this.options.clock.now()) + backoffSeconds;
    console.warn(
      `[ztm] Stop info lookup failed (attempt ${entry.attempts}); next try in ${backoffSeconds}s (${context})`,
    );
  }
}
