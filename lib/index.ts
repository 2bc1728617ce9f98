export * from "./errors";
export * from "./priceTypes";
export * from "./bucharestTime";
export * from "./config";
export { parsePrice, roundPrice, PRICE_DECIMALS } from "./priceMath";
export { normalizePrices } from "./priceNormalizer";
export { computeStatistics, PEAK_WINDOW, OFF_PEAK_1_WINDOW, OFF_PEAK_2_WINDOW } from "./priceStatistics";
export { parseOpcomCsv, type OpcomReport } from "./opcomCsv";
export { parseEntsoeXml, type EntsoeReport } from "./entsoeXml";
export { createDayFetcher, fetchDayAheadPrices, opcomReportUrl, entsoeRequestUrl, type DayFetcher, type FetchResult } from "./priceClient";
export { openPriceDb, createPriceStore, type PriceStore, type DailyPriceStats } from "./priceDb";
export { applyMigrations } from "./schema";
export {
  PriceDownloadScheduler,
  createSnapshot,
  type DownloadSchedulerOptions,
  type StateListener,
  type TickOutcome,
} from "./downloadScheduler";
export * from "./sensors";
