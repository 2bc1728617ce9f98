import { DateTime } from "luxon";

export const MARKET_TIMEZONE = "Europe/Bucharest";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function nowInMarketZone(): DateTime {
  return DateTime.now().setZone(MARKET_TIMEZONE);
}

export function isIsoDate(value: string) {
  return ISO_DATE.test(value) && DateTime.fromISO(value, { zone: MARKET_TIMEZONE }).isValid;
}

/** Local midnight of `date` (YYYY-MM-DD) in Bucharest. */
export function startOfMarketDay(date: string): DateTime {
  const start = DateTime.fromISO(date, { zone: MARKET_TIMEZONE }).startOf("day");
  if (!start.isValid) {
    throw new RangeError(`Invalid date: ${date}`);
  }
  return start;
}

/** 23 on the spring-forward Sunday, 25 on the fall-back Sunday, 24 otherwise. */
export function hoursInMarketDay(date: string) {
  const start = startOfMarketDay(date);
  return Math.round(start.plus({ days: 1 }).diff(start, "hours").hours);
}

export function toMarketDate(instant: DateTime): string {
  return instant.setZone(MARKET_TIMEZONE).toFormat("yyyy-MM-dd");
}

export function addDays(date: string, days: number): string {
  return toMarketDate(startOfMarketDay(date).plus({ days }));
}

export function toIsoWithOffset(instant: DateTime): string {
  return instant.setZone(MARKET_TIMEZONE).toISO({ suppressMilliseconds: true }) ?? instant.toString();
}

export function msUntilNextMarketMidnight(now: DateTime) {
  const local = now.setZone(MARKET_TIMEZONE);
  return local.plus({ days: 1 }).startOf("day").diff(local).as("milliseconds");
}
