import { nextWallClockOccurrence, toUnixSeconds } from "./helpers";
import type { Clock, WallClockTime } from "./types";

export type CancelHandle = {
  cancel: () => void;
};

export interface TimerFacility {
  after(delayMs: number, callback: () => void): CancelHandle;
  every(intervalMs: number, callback: () => void): CancelHandle;
  dailyAt(time: WallClockTime, callback: () => void): CancelHandle;
}

// Larger delays overflow Node's 32-bit timer and fire after 1ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const toTimerDelay = (delayMs: number) => Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS);

export const createNodeTimers = (clock: Clock): TimerFacility => ({
  after: (delayMs, callback) => {
    const timeout = setTimeout(callback, toTimerDelay(delayMs));
    return { cancel: () => clearTimeout(timeout) };
  },

  every: (intervalMs, callback) => {
    const interval = setInterval(callback, Math.max(1, toTimerDelay(intervalMs)));
    return { cancel: () => clearInterval(interval) };
  },

  dailyAt: (time, callback) => {
    let timeout: ReturnType<typeof setTimeout> | null = null;
    let cancelled = false;
    let lastTargetUnix = 0;

    const arm = () => {
      const nowMs = clock.now().getTime();
      // Timers may fire a few ms early; never pick the occurrence that just fired.
      const fromUnix = Math.max(toUnixSeconds(new Date(nowMs)), lastTargetUnix);
      const targetUnix = nextWallClockOccurrence(time, fromUnix, clock.timeZone);
      lastTargetUnix = targetUnix;
      timeout = setTimeout(() => {
        timeout = null;
        if (cancelled) {
          return;
        }
        arm();
        callback();
      }, toTimerDelay(targetUnix * 1000 - nowMs));
    };

    arm();

    return {
      cancel: () => {
        cancelled = true;
        if (timeout) {
          clearTimeout(timeout);
          timeout = null;
        }
      },
    };
  },
});
