#!/usr/bin/env tsx
import { nowInMarketZone } from "../lib/bucharestTime";
import { loadConfig } from "../lib/config";
import { PriceDownloadScheduler } from "../lib/downloadScheduler";
import { createDayFetcher } from "../lib/priceClient";
import { createPriceStore, openPriceDb } from "../lib/priceDb";
import { buildSensorSnapshot } from "../lib/sensors";

async function main() {
  const config = loadConfig();
  const db = openPriceDb(config.dbPath);
  const scheduler = new PriceDownloadScheduler({
    config,
    fetchDay: createDayFetcher(config),
    source: config.source,
    store: createPriceStore(db),
  });

  scheduler.onStateChange((state) => {
    if (state.status.state === "fetching") return;
    const [current, average, status, next] = buildSensorSnapshot(state, nowInMarketZone(), { region: config.region });
    console.log(
      `[${status.value}] now ${current.value ?? "-"} | avg ${average.value ?? "-"} | next ${next.value ?? "-"} ${current.unit ?? ""}` +
        (state.status.state === "error" ? ` | ${state.status.lastErrorMessage ?? ""}` : ""),
    );
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, stopping the price scheduler`);
    scheduler.stop();
    db.close();
    process.exit(0);
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  console.log(
    `Price scheduler started (${config.source}, every ${config.downloadIntervalSeconds}s, tomorrow after ${config.cutoffHour}:00, db ${config.dbPath})`,
  );
  await scheduler.start();
}

main().catch((error) => {
  console.error("Price scheduler failed to start:", error);
  process.exit(1);
});
