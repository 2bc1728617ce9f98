import { EmptySeriesError } from "./errors";
import { fromScaled, meanOfScaled, toScaled } from "./priceMath";
import type { HourlyPrice, PriceStatistics } from "./priceTypes";

export const PEAK_WINDOW = { from: 8, to: 20 } as const;
export const OFF_PEAK_1_WINDOW = { from: 0, to: 8 } as const;
export const OFF_PEAK_2_WINDOW = { from: 20, to: 24 } as const;

type HourWindow = { from: number; to: number };

export function computeStatistics(sequence: readonly HourlyPrice[]): PriceStatistics {
  if (!sequence.length) {
    throw new EmptySeriesError();
  }

  const scaled = sequence.map((entry) => ({ hour: entry.hour, value: toScaled(entry.value) }));
  const all = scaled.map((entry) => entry.value);
  const inWindow = (window: HourWindow) =>
    scaled.filter((entry) => entry.hour >= window.from && entry.hour < window.to).map((entry) => entry.value);

  return {
    average: meanOfScaled(all) ?? 0,
    peak: meanOfScaled(inWindow(PEAK_WINDOW)),
    offPeak1: meanOfScaled(inWindow(OFF_PEAK_1_WINDOW)),
    offPeak2: meanOfScaled(inWindow(OFF_PEAK_2_WINDOW)),
    min: fromScaled(Math.min(...all)),
    max: fromScaled(Math.max(...all)),
  };
}
