import type { DateTime } from "luxon";
import {
  hoursInMarketDay,
  MARKET_TIMEZONE,
  msUntilNextMarketMidnight,
  nowInMarketZone,
  toIsoWithOffset,
  toMarketDate,
} from "./bucharestTime";
import type { SchedulerConfig } from "./config";
import { describeError, fail, ok, type Result } from "./errors";
import type { DayFetcher } from "./priceClient";
import type { PriceStore } from "./priceDb";
import { normalizePrices } from "./priceNormalizer";
import { computeStatistics } from "./priceStatistics";
import type { DayPriceSet, DaySnapshot, DownloadStatus, IntegrationState } from "./priceTypes";

type Slot = "today" | "tomorrow";

export type TickOutcome =
  | { status: "skipped" }
  | { status: "idle" }
  | { status: "success"; fetched: string[] }
  | { status: "error"; fetched: string[]; message: string };

export type StateListener = (state: IntegrationState) => void;

export type DownloadSchedulerOptions = {
  config: SchedulerConfig;
  fetchDay: DayFetcher;
  /** Recorded on every stored day, e.g. "opcom" */
  source: string;
  store?: PriceStore;
  now?: () => DateTime;
};

const INITIAL_STATUS: DownloadStatus = Object.freeze({
  state: "idle",
  lastAttempt: null,
  lastErrorMessage: null,
  lastSuccessTime: null,
});

export function createSnapshot(prices: DayPriceSet): DaySnapshot {
  return Object.freeze({
    prices: Object.freeze({ ...prices, hours: Object.freeze([...prices.hours]) }),
    statistics: Object.freeze(computeStatistics(prices.hours)),
  });
}

/**
 * Owns the today/tomorrow price snapshots and the download status. Every
 * change replaces the whole state object, so a reader holding a snapshot
 * never sees a half-applied update.
 */
export class PriceDownloadScheduler {
  private state: IntegrationState = Object.freeze({ today: null, tomorrow: null, status: INITIAL_STATUS });
  private inFlight = false;
  private controller: AbortController | null = null;
  private interval: NodeJS.Timeout | null = null;
  private midnight: NodeJS.Timeout | null = null;
  private readonly listeners = new Set<StateListener>();
  private readonly now: () => DateTime;

  constructor(private readonly options: DownloadSchedulerOptions) {
    this.now = options.now ?? nowInMarketZone;
  }

  getState(): IntegrationState {
    return this.state;
  }

  isFetching() {
    return this.inFlight;
  }

  onStateChange(listener: StateListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Loads today/tomorrow from the store, runs a first tick, then ticks on the configured interval. */
  async start() {
    if (this.interval) return;
    this.restore();
    this.interval = setInterval(() => {
      this.runScheduledTick("interval");
    }, this.options.config.downloadIntervalSeconds * 1000);
    this.armMidnightTimer();
    await this.tick();
  }

  stop() {
    if (this.interval) clearInterval(this.interval);
    if (this.midnight) clearTimeout(this.midnight);
    this.interval = null;
    this.midnight = null;
    this.controller?.abort();
  }

  restore() {
    const store = this.options.store;
    if (!store) return;
    const now = this.now();
    const today = this.loadStored(store, toMarketDate(now));
    const tomorrow = this.loadStored(store, toMarketDate(now.plus({ days: 1 })));
    if (!today && !tomorrow) return;
    this.update({ today: today ?? this.state.today, tomorrow: tomorrow ?? this.state.tomorrow });
  }

  async tick(): Promise<TickOutcome> {
    if (this.inFlight) {
      console.warn("Price download still running, skipping this tick");
      return { status: "skipped" };
    }
    this.inFlight = true;
    try {
      return await this.runCycle();
    } catch (error) {
      console.error("Price download cycle failed unexpectedly", error);
      this.setStatus({ state: "error", lastErrorMessage: describeError(error) });
      return { status: "error", fetched: [], message: describeError(error) };
    } finally {
      this.inFlight = false;
      this.controller = null;
    }
  }

  /** Promotes tomorrow to today once the local date has moved on and drops stale days. */
  rollover(now: DateTime = this.now()) {
    const todayDate = toMarketDate(now);
    const tomorrowDate = toMarketDate(now.plus({ days: 1 }));
    let { today, tomorrow } = this.state;

    if (today && today.prices.date !== todayDate) {
      today = null;
    }
    if (!today && tomorrow?.prices.date === todayDate) {
      today = tomorrow;
      tomorrow = null;
    }
    if (tomorrow && tomorrow.prices.date !== tomorrowDate) {
      tomorrow = null;
    }
    if (today !== this.state.today || tomorrow !== this.state.tomorrow) {
      if (today && today === this.state.tomorrow) {
        console.log(`Promoted prices for ${today.prices.date} from tomorrow to today`);
      }
      this.update({ today, tomorrow });
    }
  }

  private async runCycle(): Promise<TickOutcome> {
    const now = this.now();
    this.rollover(now);
    if (this.state.status.state !== "idle") {
      this.setStatus({ state: "idle" });
    }

    const targets: Array<{ slot: Slot; date: string }> = [];
    if (!this.state.today) {
      targets.push({ slot: "today", date: toMarketDate(now) });
    }
    if (now.setZone(MARKET_TIMEZONE).hour >= this.options.config.cutoffHour && !this.state.tomorrow) {
      targets.push({ slot: "tomorrow", date: toMarketDate(now.plus({ days: 1 })) });
    }
    if (!targets.length) {
      return { status: "idle" };
    }

    const controller = new AbortController();
    this.controller = controller;
    this.setStatus({ state: "fetching", lastAttempt: toIsoWithOffset(now) });

    const fetched: string[] = [];
    const failures: string[] = [];
    for (const target of targets) {
      const result = await this.download(target.date, controller.signal);
      if (controller.signal.aborted) {
        failures.push(`${target.date}: download aborted, scheduler stopped`);
        break;
      }
      if (!result.success) {
        console.warn(`Prices for ${target.date} (${target.slot}) not updated:`, result.error.message);
        failures.push(`${target.date}: ${result.error.message}`);
        continue;
      }
      if (this.commit(result.data)) {
        fetched.push(target.date);
      }
    }

    if (failures.length) {
      const message = failures.join("; ");
      this.setStatus({ state: "error", lastErrorMessage: message });
      return { status: "error", fetched, message };
    }
    this.setStatus({ state: "success", lastSuccessTime: toIsoWithOffset(this.now()) });
    return { status: "success", fetched };
  }

  private async download(date: string, signal: AbortSignal): Promise<Result<DaySnapshot, Error>> {
    const raw = await this.options.fetchDay(date, signal);
    if (!raw.success) return raw;

    const hours = normalizePrices(raw.data, date);
    if (!hours.success) return hours;

    try {
      return ok(
        createSnapshot({
          date,
          hours: hours.data,
          fetchedAt: toIsoWithOffset(this.now()),
          source: this.options.source,
        }),
      );
    } catch (error) {
      return fail(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /** The slot is decided at commit time: a download may finish after midnight moved the dates on. */
  private commit(snapshot: DaySnapshot) {
    const now = this.now();
    const date = snapshot.prices.date;
    const slot: Slot | null =
      date === toMarketDate(now) ? "today" : date === toMarketDate(now.plus({ days: 1 })) ? "tomorrow" : null;
    try {
      this.options.store?.saveDay(snapshot.prices);
    } catch (error) {
      console.warn(`Saving prices for ${date} failed`, error);
    }
    if (!slot) {
      console.warn(`Prices for ${date} arrived after the day passed, not publishing them`);
      return false;
    }
    this.update(slot === "today" ? { today: snapshot } : { tomorrow: snapshot });
    console.log(`Stored ${snapshot.prices.hours.length} hourly prices for ${date} (${slot})`);
    return true;
  }

  private loadStored(store: PriceStore, date: string): DaySnapshot | null {
    try {
      const prices = store.loadDay(date);
      if (!prices) return null;
      if (prices.date !== date || prices.hours.length !== hoursInMarketDay(date)) {
        console.warn(`Stored prices for ${date} are incomplete (${prices.date}, ${prices.hours.length} hours), ignoring them`);
        return null;
      }
      return createSnapshot(prices);
    } catch (error) {
      console.warn(`Loading stored prices for ${date} failed`, error);
      return null;
    }
  }

  private runScheduledTick(trigger: string) {
    this.tick().catch((error) => {
      console.error(`Scheduled price download (${trigger}) failed`, error);
    });
  }

  private armMidnightTimer() {
    this.midnight = setTimeout(() => {
      this.rollover();
      this.armMidnightTimer();
      this.runScheduledTick("midnight");
    }, msUntilNextMarketMidnight(this.now()) + 1000);
  }

  private setStatus(patch: Partial<DownloadStatus>) {
    this.update({ status: Object.freeze({ ...this.state.status, ...patch }) });
  }

  private update(patch: Partial<IntegrationState>) {
    this.state = Object.freeze({ ...this.state, ...patch });
    const state = this.state;
    this.listeners.forEach((listener) => {
      try {
        listener(state);
      } catch (error) {
        console.warn("Price state listener failed", error);
      }
    });
  }
}
