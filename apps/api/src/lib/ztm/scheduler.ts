import { formatWallClockTime, toUnixSeconds, toZonedDateKey } from "./helpers";
import { describeSnapshotChange } from "./timetable";
import type { CancelHandle, TimerFacility } from "./timers";
import type { Clock, DepartureSnapshot, WallClockTime } from "./types";

export const DEFAULT_RETRY_DELAY_MS = 120_000;
export const DEFAULT_JITTER_MAX_SECONDS = 45;

export type RefreshSchedulerOptions = {
  name: string;
  fetchSnapshot: () => Promise<DepartureSnapshot>;
  timers: TimerFacility;
  clock: Clock;
  random?: () => number;
  intervalMs: number | null;
  dailyTimes: WallClockTime[];
  retryDelayMs?: number;
  jitterMaxSeconds?: number;
};

export type RefreshState = {
  lastSuccessDateKey: number | null;
  lastSuccessUnix: number | null;
  lastAttemptUnix: number | null;
  lastUpdateSuccess: boolean | null;
  consecutiveFailures: number;
  snapshot: DepartureSnapshot | null;
};

export type CurrentDepartures = {
  snapshot: DepartureSnapshot;
  stale: boolean;
  lastSuccessUnix: number;
};

type TimerHandles = {
  interval: CancelHandle | null;
  daily: CancelHandle[];
  jitter: CancelHandle | null;
  retry: CancelHandle | null;
};

type ScheduledReason = "daily" | "day-change";

const createState = (): RefreshState => ({
  lastSuccessDateKey: null,
  lastSuccessUnix: null,
  lastAttemptUnix: null,
  lastUpdateSuccess: null,
  consecutiveFailures: 0,
  snapshot: null,
});

/**
 * Drives refreshes for one subscription: an initial refresh, a fixed interval,
 * jittered daily wall-clock triggers with a one-off retry after a failed daily
 * run, and a catch-up refresh after an idle midnight. At most one refresh runs
 * at a time. A failed refresh never replaces a snapshot that is already served.
 */
export class RefreshScheduler {
  private readonly state: RefreshState = createState();
  private readonly handles: TimerHandles = {
    interval: null,
    daily: [],
    jitter: null,
    retry: null,
  };
  private inFlight: Promise<DepartureSnapshot> | null = null;
  private initialRefreshDone = false;
  private closed = false;

  constructor(private readonly options: RefreshSchedulerOptions) {}

  get name(): string {
    return this.options.name;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get refreshState(): Readonly<RefreshState> {
    return { ...this.state };
  }

  get pendingTimers() {
    return {
      interval: this.handles.interval !== null,
      daily: this.handles.daily.length,
      jitter: this.handles.jitter !== null,
      retry: this.handles.retry !== null,
    };
  }

  current(): CurrentDepartures | null {
    const { snapshot, lastSuccessUnix, lastUpdateSuccess } = this.state;
    if (!snapshot || lastSuccessUnix === null) {
      return null;
    }
    return { snapshot, stale: lastUpdateSuccess === false, lastSuccessUnix };
  }

  async start(): Promise<void> {
    if (this.closed) {
      console.warn(`[scheduler] [${this.name}] start() called after shutdown; ignoring`);
      return;
    }

    if (!this.initialRefreshDone) {
      console.debug(`[scheduler] [${this.name}] performing initial refresh`);
      await this.refresh();
      this.initialRefreshDone = true;
    }
    if (this.closed) {
      return;
    }

    this.cancelSchedules();

    const { intervalMs, dailyTimes, timers } = this.options;
    if (intervalMs !== null && intervalMs > 0) {
      this.handles.interval = timers.every(intervalMs, () => {
        if (this.dayChanged()) {
          console.info(`[scheduler] [${this.name}] day changed since last refresh; refreshing soon`);
          this.scheduleJittered("day-change");
          return;
        }
        this.track(this.refresh());
      });
    }
    for (const time of dailyTimes) {
      this.handles.daily.push(
        timers.dailyAt(time, () => {
          console.debug(
            `[scheduler] [${this.name}] daily refresh triggered (${formatWallClockTime(time)})`,
          );
          this.scheduleJittered("daily");
        }),
      );
    }
    console.debug(
      `[scheduler] [${this.name}] scheduled daily at ${dailyTimes.map(formatWallClockTime).join(", ") || "-"}`,
    );

    if (this.dayChanged()) {
      console.info(`[scheduler] [${this.name}] day changed since last refresh; refreshing soon`);
      this.scheduleJittered("day-change");
    }
  }

  refresh(): Promise<DepartureSnapshot> {
    if (this.closed) {
      console.debug(`[scheduler] [${this.name}] refresh requested after shutdown; skipping`);
      return Promise.resolve(this.errorSnapshot());
    }
    if (this.inFlight) {
      return this.inFlight;
    }
    const run = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  shutdown(): void {
    this.closed = true;
    this.cancelSchedules();
    this.state.snapshot = null;
    console.info(`[scheduler] [${this.name}] shutdown complete`);
  }

  private async runRefresh(): Promise<DepartureSnapshot> {
    let snapshot: DepartureSnapshot;
    try {
      snapshot = await this.options.fetchSnapshot();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[scheduler] [${this.name}] refresh failed: ${message}`);
      snapshot = this.errorSnapshot();
    }

    if (this.closed) {
      console.debug(`[scheduler] [${this.name}] discarding refresh result after shutdown`);
      return snapshot;
    }

    const nowUnix = this.nowUnix();
    this.state.lastAttemptUnix = nowUnix;

    if (snapshot.status === "ok") {
      this.logChange(snapshot);
      this.state.snapshot = snapshot;
      this.state.lastSuccessUnix = nowUnix;
      this.state.lastSuccessDateKey = this.todayKey();
      this.state.lastUpdateSuccess = true;
      this.state.consecutiveFailures = 0;
      this.cancelRetry();
      return snapshot;
    }

    this.state.lastUpdateSuccess = false;
    this.state.consecutiveFailures += 1;
    if (this.state.snapshot) {
      console.warn(
        `[scheduler] [${this.name}] refresh failed (${this.state.consecutiveFailures} in a row); serving snapshot from ${new Date((this.state.lastSuccessUnix ?? 0) * 1000).toISOString()}`,
      );
    } else {
      console.error(`[scheduler] [${this.name}] refresh failed and no data is available yet`);
    }
    return snapshot;
  }

  private scheduleJittered(reason: ScheduledReason) {
    const jitterMax = this.options.jitterMaxSeconds ?? DEFAULT_JITTER_MAX_SECONDS;
    const random = this.options.random ?? Math.random;
    const jitterSeconds = Math.floor(random() * (jitterMax + 1));

    this.handles.jitter?.cancel();
    this.handles.jitter = this.options.timers.after(jitterSeconds * 1000, () => {
      this.handles.jitter = null;
      this.track(this.runScheduled(reason));
    });
    console.debug(`[scheduler] [${this.name}] ${reason} refresh in ${jitterSeconds}s (jitter)`);
  }

  private async runScheduled(reason: ScheduledReason) {
    const snapshot = await this.refresh();
    if (this.closed || reason !== "daily" || snapshot.status === "ok") {
      return;
    }

    const delayMs = this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    console.warn(
      `[scheduler] [${this.name}] daily refresh failed; scheduling retry in ${Math.round(delayMs / 1000)}s`,
    );
    this.cancelRetry();
    this.handles.retry = this.options.timers.after(delayMs, () => {
      this.handles.retry = null;
      this.track(this.refresh());
    });
  }

  private logChange(next: DepartureSnapshot) {
    const change = describeSnapshotChange(this.state.snapshot, next);
    const count = next.departures.length;
    if (change === "first") {
      console.info(`[scheduler] [${this.name}] first data load (${count} departures)`);
    } else if (change === "count") {
      console.info(
        `[scheduler] [${this.name}] departure count changed: ${this.state.snapshot?.departures.length ?? 0} -> ${count}`,
      );
    } else if (change === "times") {
      console.info(`[scheduler] [${this.name}] departure times changed`);
    } else {
      console.debug(`[scheduler] [${this.name}] fetched ${count} departures${count === 0 ? " (empty set)" : ""}`);
    }
  }

  private track(promise: Promise<unknown>) {
    promise.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[scheduler] [${this.name}] scheduled refresh crashed: ${message}`);
    });
  }

  private cancelRetry() {
    this.handles.retry?.cancel();
    this.handles.retry = null;
  }

  private cancelSchedules() {
    this.handles.interval?.cancel();
    this.handles.interval = null;
    for (const handle of this.handles.daily) {
      handle.cancel();
    }
    this.handles.daily = [];
    this.handles.jitter?.cancel();
    this.handles.jitter = null;
    this.cancelRetry();
  }

  private errorSnapshot(): DepartureSnapshot {
    return { generatedAtUnix: this.nowUnix(), status: "error", departures: [], stop: null };
  }

  private dayChanged() {
    const { lastSuccessDateKey } = this.state;
    return lastSuccessDateKey !== null && lastSuccessDateKey !== this.todayKey();
  }

  private nowUnix() {
    return toUnixSeconds(this.options.clock.now());
  }

  private todayKey() {
    return toZonedDateKey(this.nowUnix(), this.options.clock.timeZone);
  }
}
