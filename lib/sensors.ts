import type { DateTime } from "luxon";
import type { DaySnapshot, DownloadState, HourlyPrice, IntegrationState } from "./priceTypes";

export const PRICE_UNIT = "lei/MWh";
export const CURRENCY = "RON";

export type RawPriceAttribute = { start: string; end: string; value: number };
export type ForecastPrice = { timestamp: string; price: number; hour: number };

export type PriceAttributes = {
  average: number | null;
  peak: number | null;
  off_peak_1: number | null;
  off_peak_2: number | null;
  min: number | null;
  max: number | null;
  mean: number | null;
  unit: string;
  currency: string;
  region: string;
  low_price: boolean;
  price_percent_to_average: number | null;
  today: number[];
  tomorrow: number[];
  tomorrow_valid: boolean;
  raw_today: RawPriceAttribute[];
  raw_tomorrow: RawPriceAttribute[];
  last_updated: string | null;
  source: string | null;
};

export type ForecastAttributes = {
  forecast_prices: ForecastPrice[];
  unit_of_measurement: string;
  source: string | null;
};

export type StatusAttributes = {
  last_attempt: string | null;
  last_error_message: string | null;
  last_success_time: string | null;
  today_valid: boolean;
  tomorrow_valid: boolean;
};

export type SensorKey = "current_hour_price" | "daily_average_price" | "download_status" | "next_hour_forecast";

export type SensorSnapshot = {
  key: SensorKey;
  name: string;
  uniqueId: string;
  value: number | string | null;
  unit: string | null;
  icon: string | null;
  deviceClass: "monetary" | null;
  attributes: PriceAttributes | ForecastAttributes | StatusAttributes | null;
};

export type SensorOptions = {
  region: string;
  /** Prepended to every sensor name, "Dynamic" gives "Dynamic Current Hour Price" */
  namePrefix?: string;
};

const STATUS_ICONS: Record<DownloadState, string> = {
  idle: "mdi:clock-outline",
  fetching: "mdi:progress-download",
  success: "mdi:check-circle",
  error: "mdi:alert-circle",
};

function hourAt(day: DaySnapshot | null, instant: DateTime): HourlyPrice | null {
  if (!day) return null;
  const at = instant.toMillis();
  return day.prices.hours.find((entry) => Date.parse(entry.start) <= at && at < Date.parse(entry.end)) ?? null;
}

function priceAt(state: IntegrationState, instant: DateTime) {
  return (hourAt(state.today, instant) ?? hourAt(state.tomorrow, instant))?.value ?? null;
}

export function currentHourPrice(state: IntegrationState, now: DateTime): number | null {
  return priceAt(state, now);
}

/** Crosses into tomorrow's series during the last hour of the day. */
export function nextHourForecast(state: IntegrationState, now: DateTime): number | null {
  return priceAt(state, now.plus({ hours: 1 }));
}

export function dailyAverage(state: IntegrationState): number | null {
  return state.today?.statistics.average ?? null;
}

export function downloadStatus(state: IntegrationState): DownloadState {
  return state.status.state;
}

function rawSeries(day: DaySnapshot | null): RawPriceAttribute[] {
  return day ? day.prices.hours.map((entry) => ({ start: entry.start, end: entry.end, value: entry.value })) : [];
}

export function priceAttributes(state: IntegrationState, now: DateTime, options: SensorOptions): PriceAttributes {
  const stats = state.today?.statistics ?? null;
  const current = currentHourPrice(state, now);
  const average = stats?.average ?? null;

  return {
    average,
    peak: stats?.peak ?? null,
    off_peak_1: stats?.offPeak1 ?? null,
    off_peak_2: stats?.offPeak2 ?? null,
    min: stats?.min ?? null,
    max: stats?.max ?? null,
    mean: average,
    unit: "MWh",
    currency: CURRENCY,
    region: options.region,
    low_price: current !== null && average !== null && current < average,
    price_percent_to_average:
      current !== null && average !== null && average !== 0 ? Math.round((current / average) * 10_000) / 10_000 : null,
    today: state.today ? state.today.prices.hours.map((entry) => entry.value) : [],
    tomorrow: state.tomorrow ? state.tomorrow.prices.hours.map((entry) => entry.value) : [],
    tomorrow_valid: state.tomorrow !== null,
    raw_today: rawSeries(state.today),
    raw_tomorrow: rawSeries(state.tomorrow),
    last_updated: state.today?.prices.fetchedAt ?? null,
    source: state.today?.prices.source ?? null,
  };
}

export function forecastAttributes(state: IntegrationState): ForecastAttributes {
  return {
    forecast_prices: state.tomorrow
      ? state.tomorrow.prices.hours.map((entry) => ({ timestamp: entry.start, price: entry.value, hour: entry.hour }))
      : [],
    unit_of_measurement: PRICE_UNIT,
    source: state.tomorrow?.prices.source ?? null,
  };
}

export function statusAttributes(state: IntegrationState): StatusAttributes {
  return {
    last_attempt: state.status.lastAttempt,
    last_error_message: state.status.lastErrorMessage,
    last_success_time: state.status.lastSuccessTime,
    today_valid: state.today !== null,
    tomorrow_valid: state.tomorrow !== null,
  };
}

/** Host-neutral description of the four sensors; a host adapter maps these onto its entity model. */
export function buildSensorSnapshot(state: IntegrationState, now: DateTime, options: SensorOptions): SensorSnapshot[] {
  const prefix = options.namePrefix ?? "Dynamic";
  const sensor = (key: SensorKey, title: string, rest: Omit<SensorSnapshot, "key" | "name" | "uniqueId">): SensorSnapshot => ({
    key,
    name: `${prefix} ${title}`,
    uniqueId: `${prefix} ${title}`.toLowerCase().replace(/\s+/g, "_"),
    ...rest,
  });
  const average = dailyAverage(state);

  return [
    sensor("current_hour_price", "Current Hour Price", {
      value: currentHourPrice(state, now),
      unit: PRICE_UNIT,
      icon: null,
      deviceClass: "monetary",
      attributes: priceAttributes(state, now, options),
    }),
    sensor("daily_average_price", "Daily Average Price", {
      value: average,
      unit: PRICE_UNIT,
      icon: null,
      deviceClass: "monetary",
      attributes: null,
    }),
    sensor("download_status", "Download Status", {
      value: downloadStatus(state),
      unit: null,
      icon: STATUS_ICONS[state.status.state],
      deviceClass: null,
      attributes: statusAttributes(state),
    }),
    sensor("next_hour_forecast", "Next Hour Forecast", {
      value: nextHourForecast(state, now),
      unit: PRICE_UNIT,
      icon: null,
      deviceClass: "monetary",
      attributes: forecastAttributes(state),
    }),
  ];
}
