import { DateTime } from "luxon";
import { hoursInMarketDay, MARKET_TIMEZONE, startOfMarketDay, toIsoWithOffset, toMarketDate } from "./bucharestTime";
import { fail, NormalizeError, ok, type Result } from "./errors";
import { parsePrice, roundPrice } from "./priceMath";
import { isIntervalRecord, type HourlyPrice, type RawPriceRecord } from "./priceTypes";

const ALLOWED_COUNTS = new Set([23, 24, 25]);
const HOUR_MS = 60 * 60 * 1000;

type Placed = { start: DateTime; value: number };

export function normalizePrices(raw: readonly RawPriceRecord[], date: string): Result<HourlyPrice[], NormalizeError> {
  try {
    return ok(normalizeOrThrow(raw, date));
  } catch (error) {
    if (error instanceof NormalizeError) {
      return fail(error);
    }
    throw error;
  }
}

function normalizeOrThrow(raw: readonly RawPriceRecord[], date: string): HourlyPrice[] {
  if (!ALLOWED_COUNTS.has(raw.length)) {
    throw new NormalizeError(`Expected 23, 24 or 25 hourly prices for ${date}, got ${raw.length}`);
  }

  let dayStart: DateTime;
  try {
    dayStart = startOfMarketDay(date);
  } catch {
    throw new NormalizeError(`Invalid delivery date: ${date}`);
  }
  const expected = hoursInMarketDay(date);
  if (raw.length !== expected) {
    throw new NormalizeError(`${date} has ${expected} hours in ${MARKET_TIMEZONE}, got ${raw.length} prices`);
  }

  const intervalRecords = raw.filter(isIntervalRecord);
  if (intervalRecords.length !== 0 && intervalRecords.length !== raw.length) {
    throw new NormalizeError(`Price records for ${date} mix interval and timestamp forms`);
  }

  const placed = raw
    .map<Placed>((record) => ({
      start: isIntervalRecord(record) ? placeInterval(dayStart, record.interval, date) : placeTimestamp(record.timestamp, date),
      value: toValue(record.price, date),
    }))
    .sort((a, b) => a.start.toMillis() - b.start.toMillis());

  placed.forEach((entry, idx) => {
    const expectedStart = dayStart.toMillis() + idx * HOUR_MS;
    const actual = entry.start.toMillis();
    if (actual === expectedStart) return;
    const previous = placed[idx - 1];
    if (previous && previous.start.toMillis() === actual) {
      throw new NormalizeError(`Duplicate price for ${toIsoWithOffset(entry.start)}`);
    }
    throw new NormalizeError(`Missing price for ${toIsoWithOffset(DateTime.fromMillis(expectedStart))}`);
  });

  return placed.map((entry) => {
    const start = entry.start.setZone(MARKET_TIMEZONE);
    return Object.freeze({
      start: toIsoWithOffset(start),
      end: toIsoWithOffset(start.plus({ hours: 1 })),
      hour: start.hour,
      value: entry.value,
    });
  });
}

function placeInterval(dayStart: DateTime, interval: number, date: string) {
  if (!Number.isInteger(interval) || interval < 1) {
    throw new NormalizeError(`Invalid interval ${interval} for ${date}`);
  }
  // hours are added as absolute time, so interval 4 is 04:00 on the spring-forward day
  return dayStart.plus({ hours: interval - 1 });
}

function placeTimestamp(timestamp: string, date: string) {
  const start = DateTime.fromISO(timestamp, { setZone: true }).setZone(MARKET_TIMEZONE);
  if (!start.isValid) {
    throw new NormalizeError(`Invalid timestamp '${timestamp}' for ${date}`);
  }
  if (toMarketDate(start) !== date) {
    throw new NormalizeError(`Timestamp ${timestamp} is outside ${date}`);
  }
  return start;
}

function toValue(price: RawPriceRecord["price"], date: string) {
  const parsed = parsePrice(price);
  if (parsed === null) {
    throw new NormalizeError(`Non-numeric price '${String(price)}' for ${date}`);
  }
  return roundPrice(parsed);
}
