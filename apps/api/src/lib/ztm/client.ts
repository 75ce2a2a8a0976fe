import { describeSubscription, toUnixSeconds, WARSAW_TIME_ZONE } from "./helpers";
import { getWithRetry, readUpstreamResult } from "./http";
import type { GetOptions } from "./http";
import { StopInfoCache } from "./stop-info";
import { decodeRows } from "./timetable";
import type {
  Clock,
  DepartureSnapshot,
  FetchLike,
  Sleep,
  SnapshotStatus,
  StopMetadata,
  SubscriptionConfig,
} from "./types";

export const TIMETABLE_DATASET_ID = "e923fa0e-d96c-43f9-ae6e-60518c9f3238";
export const DEFAULT_TIMETABLE_URL = "https://api.um.warszawa.pl/api/action/dbtimetable_get/";
export const DEFAULT_STOP_INFO_URL = "https://api.um.warszawa.pl/api/action/dbstore_get/";

export type ClientDeps = {
  fetchImpl?: FetchLike;
  clock?: Clock;
  sleep?: Sleep;
};

export const systemClock = (timeZone = WARSAW_TIME_ZONE): Clock => ({
  now: () => new Date(),
  timeZone,
});

export class StopTimetableClient {
  readonly stopInfo: StopInfoCache;
  private readonly clock: Clock;
  private readonly http: GetOptions;
  private readonly context: string;

  constructor(
    private readonly config: SubscriptionConfig,
    deps: ClientDeps = {},
  ) {
    this.clock = deps.clock ?? systemClock();
    this.http = {
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
      timeoutMs: config.timeoutSeconds * 1000,
    };
    this.context = describeSubscription(config);
    this.stopInfo = new StopInfoCache({
      url: config.stopInfoUrl,
      apiKey: config.apiKey,
      stopId: config.stopId,
      stopNr: config.stopNr,
      ttlSeconds: config.stopInfoTtlSeconds,
      clock: this.clock,
      http: this.http,
      sleep: deps.sleep,
    });
  }

  /**
   * Fetches the timetable of the subscription. Always resolves to a snapshot;
   * `status: "error"` marks a fetch whose departures could not be read.
   */
  async fetch(): Promise<DepartureSnapshot> {
    try {
      const stop = await this.ensureStopInfo();

      const response = await getWithRetry(
        this.config.timetableUrl,
        {
          id: TIMETABLE_DATASET_ID,
          apikey: this.config.apiKey,
          busstopId: this.config.stopId,
          busstopNr: this.config.stopNr,
          line: this.config.line,
        },
        this.http,
      );
      if (!response.ok) {
        return this.emptySnapshot("error", stop);
      }

      const result = readUpstreamResult(response.body);
      switch (result.kind) {
        case "empty":
          console.info(`[ztm] No departures currently available (${this.context})`);
          return this.emptySnapshot("ok", stop);
        case "rejected":
          console.error(
            `[ztm] Timetable request rejected${result.message === "false" ? " (invalid API key?)" : ""} (${this.context})`,
          );
          return this.emptySnapshot("error", stop);
        case "malformed":
          console.error(`[ztm] Unexpected timetable payload (${this.context})`);
          return this.emptySnapshot("error", stop);
        case "rows": {
          const { departures, skipped } = decodeRows(result.rows, this.clock);
          console.debug(
            `[ztm] Loaded ${departures.length} departures, skipped ${skipped} (${this.context})`,
          );
          return {
            generatedAtUnix: toUnixSeconds(this.clock.now()),
            status: "ok",
            departures,
            stop,
          };
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ztm] Unexpected error in timetable fetch: ${message} (${this.context})`);
      return this.emptySnapshot("error", this.stopInfo.peek());
    }
  }

  private async ensureStopInfo(): Promise<StopMetadata | null> {
    try {
      return await this.stopInfo.fetchOrGetCached();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ztm] Stop info lookup crashed: ${message} (${this.context})`);
      return this.stopInfo.peek();
    }
  }

  private emptySnapshot(status: SnapshotStatus, stop: StopMetadata | null): DepartureSnapshot {
    return {
      generatedAtUnix: toUnixSeconds(this.clock.now()),
      status,
      departures: [],
      stop,
    };
  }
}
