export type RawPrice = number | string;

export type IntervalPriceRecord = {
  /** 1-based hour of the delivery day, as the market reports it */
  interval: number;
  price: RawPrice;
  volume?: RawPrice;
};

export type TimestampPriceRecord = {
  timestamp: string;
  price: RawPrice;
  volume?: RawPrice;
};

export type RawPriceRecord = IntervalPriceRecord | TimestampPriceRecord;

export type HourlyPrice = {
  readonly start: string;
  readonly end: string;
  /** Local hour-of-day of `start`; repeats once on the fall-back day. */
  readonly hour: number;
  /** lei/MWh */
  readonly value: number;
};

export type DayPriceSet = {
  readonly date: string;
  readonly hours: readonly HourlyPrice[];
  readonly fetchedAt: string;
  readonly source: string;
};

export type PriceStatistics = {
  readonly average: number;
  readonly peak: number | null;
  readonly offPeak1: number | null;
  readonly offPeak2: number | null;
  readonly min: number;
  readonly max: number;
};

export type DaySnapshot = {
  readonly prices: DayPriceSet;
  readonly statistics: PriceStatistics;
};

export type DownloadState = "idle" | "fetching" | "success" | "error";

export type DownloadStatus = {
  readonly state: DownloadState;
  readonly lastAttempt: string | null;
  readonly lastErrorMessage: string | null;
  readonly lastSuccessTime: string | null;
};

export type IntegrationState = {
  readonly today: DaySnapshot | null;
  readonly tomorrow: DaySnapshot | null;
  readonly status: DownloadStatus;
};

export function isIntervalRecord(record: RawPriceRecord): record is IntervalPriceRecord {
  return "interval" in record;
}
