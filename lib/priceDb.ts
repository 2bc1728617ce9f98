import Database from "better-sqlite3";
import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { describeError } from "./errors";
import type { DayPriceSet } from "./priceTypes";
import { applyMigrations } from "./schema";

export type DailyPriceStats = {
  day: string;
  min: number;
  max: number;
  average: number;
  hours: number;
};

export type PriceStore = {
  saveDay(day: DayPriceSet): void;
  loadDay(date: string): DayPriceSet | null;
  listDays(limit?: number): DayPriceSet[];
  listDailyStats(limit?: number): DailyPriceStats[];
};

const hourlyPriceSchema = z.object({
  start: z.string(),
  end: z.string(),
  hour: z.number().int().min(0).max(23),
  value: z.number(),
});

const dayPriceSetSchema = z.object({
  date: z.string(),
  hours: z.array(hourlyPriceSchema).min(1),
  fetchedAt: z.string(),
  source: z.string(),
});

const payloadRowSchema = z.object({ date: z.string(), payload: z.string() });
const statsRowSchema = z.object({
  day: z.string(),
  min: z.number(),
  max: z.number(),
  average: z.number(),
  hours: z.number(),
});

export function openPriceDb(dbPath: string) {
  const resolved = dbPath === ":memory:" ? dbPath : resolveDbPath(dbPath);
  const db = new Database(resolved);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  applyMigrations(db);
  return db;
}

export function createPriceStore(db: Database.Database): PriceStore {
  const upsertPayload = db.prepare(`
    INSERT INTO day_price_payloads (date, payload, source, fetched_at)
    VALUES (@date, @payload, @source, @fetchedAt)
    ON CONFLICT(date) DO UPDATE SET
      payload=excluded.payload,
      source=excluded.source,
      fetched_at=excluded.fetched_at
  `);
  const deleteHours = db.prepare(`DELETE FROM hourly_prices WHERE date = ?`);
  const upsertHour = db.prepare(`
    INSERT INTO hourly_prices (start, date, hour, price_lei_mwh, source)
    VALUES (@start, @date, @hour, @value, @source)
    ON CONFLICT(start) DO UPDATE SET
      date=excluded.date,
      hour=excluded.hour,
      price_lei_mwh=excluded.price_lei_mwh,
      source=excluded.source
  `);
  const selectPayload = db.prepare(`SELECT date, payload FROM day_price_payloads WHERE date = ?`);
  const selectPayloads = db.prepare(`SELECT date, payload FROM day_price_payloads ORDER BY date DESC LIMIT ?`);
  const selectStats = db.prepare(`
    SELECT date AS day,
           MIN(price_lei_mwh) AS min,
           MAX(price_lei_mwh) AS max,
           AVG(price_lei_mwh) AS average,
           COUNT(*) AS hours
    FROM hourly_prices
    GROUP BY date
    ORDER BY date DESC
    LIMIT ?
  `);

  const saveTx = db.transaction((day: DayPriceSet) => {
    upsertPayload.run({ date: day.date, payload: JSON.stringify(day), source: day.source, fetchedAt: day.fetchedAt });
    deleteHours.run(day.date);
    day.hours.forEach((entry) =>
      upsertHour.run({ start: entry.start, date: day.date, hour: entry.hour, value: entry.value, source: day.source }),
    );
  });

  return {
    saveDay(day) {
      saveTx(day);
    },
    loadDay(date) {
      const row = payloadRowSchema.safeParse(selectPayload.get(date));
      return row.success ? decodePayload(row.data) : null;
    },
    listDays(limit = 30) {
      return selectPayloads
        .all(limit)
        .map((raw) => payloadRowSchema.safeParse(raw))
        .map((row) => (row.success ? decodePayload(row.data) : null))
        .filter((day): day is DayPriceSet => day !== null);
    },
    listDailyStats(limit = 30) {
      return z.array(statsRowSchema).parse(selectStats.all(limit));
    },
  };
}

function decodePayload(row: { date: string; payload: string }): DayPriceSet | null {
  try {
    const parsed = dayPriceSetSchema.safeParse(JSON.parse(row.payload));
    if (parsed.success) return parsed.data;
    console.warn(`Stored prices for ${row.date} do not match the expected shape, ignoring them`);
  } catch (error) {
    console.warn(`Stored prices for ${row.date} are not valid JSON, ignoring them`, describeError(error));
  }
  return null;
}

function resolveDbPath(candidate: string) {
  const fallbackPath = path.join(os.tmpdir(), "ro-day-ahead-prices.db");

  if (ensureDir(path.dirname(candidate))) {
    return candidate;
  }

  console.warn(`PRICE_DB_PATH '${candidate}' cannot be created, using fallback '${fallbackPath}'.`);
  ensureDir(path.dirname(fallbackPath));
  return fallbackPath;
}

function ensureDir(dir: string) {
  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    return true;
  } catch (error) {
    console.warn("Cannot create the database directory", dir, error);
    return false;
  }
}
