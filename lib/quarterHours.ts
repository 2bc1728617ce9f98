import { ParseError } from "./errors";
import { meanOfScaled, parsePrice, toScaled } from "./priceMath";
import type { IntervalPriceRecord, RawPrice, TimestampPriceRecord } from "./priceTypes";

const HOUR_MS = 60 * 60 * 1000;

type Group<T> = { key: number; records: T[] };

function groupBy<T>(records: readonly T[], keyOf: (record: T) => number): Group<T>[] {
  const groups = new Map<number, T[]>();
  records.forEach((record) => {
    const key = keyOf(record);
    const bucket = groups.get(key) ?? [];
    bucket.push(record);
    groups.set(key, bucket);
  });
  return Array.from(groups.entries())
    .sort(([a], [b]) => a - b)
    .map(([key, bucket]) => ({ key, records: bucket }));
}

function averagePrice(prices: RawPrice[], label: string) {
  const scaled = prices.map((price) => {
    const parsed = parsePrice(price);
    if (parsed === null) {
      throw new ParseError(`Non-numeric quarter-hour price '${String(price)}' in ${label}`);
    }
    return toScaled(parsed);
  });
  return meanOfScaled(scaled) ?? 0;
}

function sumVolume(volumes: Array<RawPrice | undefined>) {
  const parsed = volumes.map((volume) => (volume === undefined ? null : parsePrice(volume)));
  if (parsed.some((volume) => volume === null)) return undefined;
  return parsed.reduce<number>((acc, volume) => acc + (volume ?? 0), 0);
}

function assertComplete<T>(group: Group<T>, label: string) {
  if (group.records.length !== 4) {
    throw new ParseError(`${label} has ${group.records.length} quarter-hours instead of 4`);
  }
}

/** Folds intervals 1..4 into hour 1, 5..8 into hour 2 and so on. */
export function aggregateQuarterHourIntervals(records: readonly IntervalPriceRecord[]): IntervalPriceRecord[] {
  return groupBy(records, (record) => Math.ceil(record.interval / 4)).map((group) => {
    const label = `hour ${group.key}`;
    assertComplete(group, label);
    return {
      interval: group.key,
      price: averagePrice(
        group.records.map((record) => record.price),
        label,
      ),
      volume: sumVolume(group.records.map((record) => record.volume)),
    };
  });
}

/** Bucharest offsets are whole hours, so the UTC hour boundary is also the local one. */
export function aggregateQuarterHourTimestamps(records: readonly TimestampPriceRecord[]): TimestampPriceRecord[] {
  return groupBy(records, (record) => Math.floor(Date.parse(record.timestamp) / HOUR_MS)).map((group) => {
    if (!Number.isFinite(group.key)) {
      throw new ParseError(`Invalid quarter-hour timestamp '${group.records[0]?.timestamp ?? ""}'`);
    }
    const timestamp = new Date(group.key * HOUR_MS).toISOString();
    assertComplete(group, timestamp);
    return {
      timestamp,
      price: averagePrice(
        group.records.map((record) => record.price),
        timestamp,
      ),
    };
  });
}
