import { StopTimetableClient, systemClock } from "./client";
import type { ClientDeps } from "./client";
import { RefreshScheduler } from "./scheduler";
import type { CurrentDepartures } from "./scheduler";
import { createNodeTimers } from "./timers";
import type { TimerFacility } from "./timers";
import type { DepartureSnapshot, StopMetadata, SubscriptionConfig } from "./types";

export type SubscriptionDeps = ClientDeps & {
  timers?: TimerFacility;
  random?: () => number;
};

export type ClientHandle = {
  readonly config: SubscriptionConfig;
  readonly client: StopTimetableClient;
  readonly scheduler: RefreshScheduler;
  fetch: () => Promise<DepartureSnapshot>;
  start: () => Promise<void>;
  current: () => CurrentDepartures | null;
  stopInfo: () => StopMetadata | null;
  shutdown: () => void;
};

export const subscriptionName = (config: Pick<SubscriptionConfig, "line" | "stopId" | "stopNr">) =>
  `line_${config.line}_from_${config.stopId}_${config.stopNr}`;

/**
 * Wires the client, its stop-info cache and the refresh scheduler of one
 * stop/line subscription. `fetch()` goes through the scheduler so that it
 * joins a refresh already in flight.
 */
export const configure = (
  config: SubscriptionConfig,
  deps: SubscriptionDeps = {},
): ClientHandle => {
  const clock = deps.clock ?? systemClock();
  const client = new StopTimetableClient(config, { ...deps, clock });
  const scheduler = new RefreshScheduler({
    name: subscriptionName(config),
    fetchSnapshot: () => client.fetch(),
    timers: deps.timers ?? createNodeTimers(clock),
    clock,
    random: deps.random,
    intervalMs: config.refreshIntervalMinutes * 60_000,
    dailyTimes: config.dailyRefreshTimes,
    retryDelayMs: config.retryDelaySeconds * 1000,
    jitterMaxSeconds: config.jitterMaxSeconds,
  });

  return {
    config,
    client,
    scheduler,
    fetch: () => scheduler.refresh(),
    start: () => scheduler.start(),
    current: () => scheduler.current(),
    stopInfo: () => client.stopInfo.peek(),
    shutdown: () => {
      scheduler.shutdown();
      client.stopInfo.reset();
    },
  };
};
