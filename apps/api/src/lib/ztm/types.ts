export type DepartureReading = {
  headsign: string;
  scheduledClock: string;
  routeId: string | null;
  brigade: string | null;
  lineSymbols: [string, string] | null;
};

export type ResolvedDeparture = DepartureReading & {
  isNightService: boolean;
  departureUnix: number;
  departureIso: string;
  minutesUntilDeparture: number;
};

export type StopMetadata = Record<string, string>;

export type SnapshotStatus = "ok" | "error";

export type DepartureSnapshot = {
  generatedAtUnix: number;
  status: SnapshotStatus;
  departures: ResolvedDeparture[];
  stop: StopMetadata | null;
};

export type Clock = {
  now: () => Date;
  timeZone: string;
};

export type ZonedParts = {
  dateKey: number;
  hour: number;
  minute: number;
  second: number;
};

export type WallClockTime = {
  hour: number;
  minute: number;
};

export type SubscriptionConfig = {
  apiKey: string;
  stopId: string;
  stopNr: string;
  line: string;
  timeoutSeconds: number;
  stopInfoTtlSeconds: number | null;
  maxDepartures: number;
  refreshIntervalMinutes: number;
  dailyRefreshTimes: WallClockTime[];
  retryDelaySeconds: number;
  jitterMaxSeconds: number;
  timetableUrl: string;
  stopInfoUrl: string;
};

export type Sleep = (ms: number) => Promise<void>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type StopInfoEntry = {
  value: StopMetadata | null;
  lastFetchUnix: number | null;
  attempts: number;
  nextRetryAtUnix: number | null;
  permanentMissing: boolean;
  loadingPromise: Promise<StopMetadata | null> | null;
};
