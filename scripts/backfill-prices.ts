#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { addDays, isIsoDate, nowInMarketZone, toIsoWithOffset, toMarketDate } from "../lib/bucharestTime";
import { loadConfig } from "../lib/config";
import { fetchDayAheadPrices } from "../lib/priceClient";
import { createPriceStore, openPriceDb } from "../lib/priceDb";
import { normalizePrices } from "../lib/priceNormalizer";

async function main() {
  const config = loadConfig();
  const argv = await yargs(hideBin(process.argv))
    .option("from", {
      type: "string",
      default: config.startDate,
      describe: "First delivery date, YYYY-MM-DD",
    })
    .option("to", {
      type: "string",
      describe: "Last delivery date, YYYY-MM-DD (inclusive). Defaults to today.",
    })
    .strict()
    .help()
    .parse();

  const from = parseDate(argv.from);
  const to = argv.to ? parseDate(argv.to) : toMarketDate(nowInMarketZone());
  if (from > to) {
    throw new Error("--from must be on or before --to");
  }

  const db = openPriceDb(config.dbPath);
  const store = createPriceStore(db);
  let imported = 0;
  for (let date = from; date <= to; date = addDays(date, 1)) {
    process.stdout.write(`Fetching ${date}... `);
    const raw = await fetchDayAheadPrices(date, config);
    if (!raw.success) {
      console.warn(`skipped (${raw.error.kind}: ${raw.error.message})`);
      continue;
    }
    const hours = normalizePrices(raw.data, date);
    if (!hours.success) {
      console.warn(`skipped (${hours.error.message})`);
      continue;
    }
    store.saveDay({ date, hours: hours.data, fetchedAt: toIsoWithOffset(nowInMarketZone()), source: config.source });
    imported += 1;
    console.log(`saved ${hours.data.length} hours`);
  }
  db.close();

  console.log(`Done. Saved ${imported} days (${from}..${to}).`);
}

function parseDate(value: string) {
  if (!isIsoDate(value)) {
    throw new Error(`Invalid date: ${value}`);
  }
  return value;
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
