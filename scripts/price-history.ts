#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { loadConfig } from "../lib/config";
import { createPriceStore, openPriceDb } from "../lib/priceDb";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("limit", {
      type: "number",
      default: 30,
      describe: "Number of most recent days to show",
    })
    .strict()
    .help()
    .parse();

  const config = loadConfig();
  const db = openPriceDb(config.dbPath);
  const stats = createPriceStore(db).listDailyStats(argv.limit);
  db.close();

  if (!stats.length) {
    console.log(`No stored prices in ${config.dbPath}`);
    return;
  }
  console.log("day         hours      min      max  average  (lei/MWh)");
  stats.forEach((row) => {
    console.log(
      `${row.day}  ${String(row.hours).padStart(5)} ${row.min.toFixed(2).padStart(8)} ${row.max.toFixed(2).padStart(8)} ${row.average
        .toFixed(2)
        .padStart(8)}`,
    );
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
