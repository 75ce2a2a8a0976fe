export type {
  Clock,
  DepartureReading,
  DepartureSnapshot,
  ResolvedDeparture,
  StopMetadata,
  SubscriptionConfig,
  WallClockTime,
} from "./types";
export type { ClientHandle } from "./subscription";
export type { CurrentDepartures, RefreshState } from "./scheduler";
export type { SubscriptionCheck } from "./validate";

export {
  DEFAULT_STOP_INFO_URL,
  DEFAULT_TIMETABLE_URL,
  StopTimetableClient,
  systemClock,
} from "./client";
export { describeSubscription, parseWallClockTime, WARSAW_TIME_ZONE } from "./helpers";
export { RefreshScheduler } from "./scheduler";
export { StopInfoCache } from "./stop-info";
export { configure } from "./subscription";
export { selectUpcoming } from "./timetable";
export { checkSubscription } from "./validate";
