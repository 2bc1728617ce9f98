import type Database from "better-sqlite3";

// Shared migrations for the scheduler and the CLI scripts.
export function applyMigrations(db: Database.Database) {
  let version = Number(db.pragma("user_version", { simple: true }));

  if (version < 1) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS day_price_payloads (
        date TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        source TEXT,
        fetched_at TEXT NOT NULL,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS hourly_prices (
        start TEXT PRIMARY KEY,
        date TEXT NOT NULL,
        hour INTEGER NOT NULL,
        price_lei_mwh REAL NOT NULL,
        source TEXT,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      );
    `);
    version = 1;
    db.pragma("user_version = 1");
  }

  if (version < 2) {
    db.exec(`CREATE INDEX IF NOT EXISTS idx_hourly_prices_date ON hourly_prices (date);`);
    version = 2;
    db.pragma("user_version = 2");
  }
}
