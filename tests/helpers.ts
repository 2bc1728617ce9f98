import { hoursInMarketDay } from "../lib/bucharestTime";
import { normalizePrices } from "../lib/priceNormalizer";
import type { DayPriceSet, HourlyPrice, IntervalPriceRecord } from "../lib/priceTypes";

export function intervalRecords(date: string, valueAt: (idx: number) => number = () => 100): IntervalPriceRecord[] {
  return Array.from({ length: hoursInMarketDay(date) }, (_, idx) => ({ interval: idx + 1, price: valueAt(idx) }));
}

export function hourlyPrices(date: string, valueAt?: (idx: number) => number): HourlyPrice[] {
  const result = normalizePrices(intervalRecords(date, valueAt), date);
  if (!result.success) throw result.error;
  return result.data;
}

export function dayPriceSet(date: string, valueAt?: (idx: number) => number): DayPriceSet {
  return { date, hours: hourlyPrices(date, valueAt), fetchedAt: `${date}T00:05:00+02:00`, source: "opcom" };
}
