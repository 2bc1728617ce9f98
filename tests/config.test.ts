import path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_OPCOM_URL, loadConfig } from "../lib/config";
import { ConfigError } from "../lib/errors";

function configError(env: Record<string, string>) {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected the configuration to be rejected");
}

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      source: "opcom",
      apiBaseUrl: DEFAULT_OPCOM_URL,
      entsoeApiUrl: "https://web-api.tp.entsoe.eu/api",
      entsoeToken: undefined,
      biddingZone: "10YRO-TEL------P",
      startDate: "2023-12-14",
      requestTimeoutMs: 30_000,
      downloadIntervalSeconds: 3600,
      cutoffHour: 13,
      region: "RO",
      dbPath: path.join(process.cwd(), "data", "prices.db"),
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PRICE_API_URL: "https://prices.test/api/",
      PRICE_DOWNLOAD_INTERVAL: "900",
      PRICE_CUTOFF_HOUR: "14",
      PRICE_START_DATE: "2024-01-01",
      PRICE_DB_PATH: "/tmp/prices-test.db",
    });

    expect(config.apiBaseUrl).toBe("https://prices.test/api");
    expect(config.downloadIntervalSeconds).toBe(900);
    expect(config.cutoffHour).toBe(14);
    expect(config.startDate).toBe("2024-01-01");
    expect(config.dbPath).toBe("/tmp/prices-test.db");
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ PRICE_CUTOFF_HOUR: "", PRICE_REGION: "  " }).cutoffHour).toBe(13);
  });

  it("rejects an out-of-range cutoff hour", () => {
    const error = configError({ PRICE_CUTOFF_HOUR: "24" });

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^PRICE_CUTOFF_HOUR: /);
  });

  it("rejects an impossible start date", () => {
    expect(configError({ PRICE_START_DATE: "2024-02-30" }).issues).toEqual([
      "PRICE_START_DATE: expected a YYYY-MM-DD date",
    ]);
  });

  it("requires a token for ENTSO-E", () => {
    expect(configError({ PRICE_SOURCE: "entsoe" }).issues).toEqual(["ENTSOE_API_TOKEN: required when PRICE_SOURCE is entsoe"]);
    expect(loadConfig({ PRICE_SOURCE: "entsoe", ENTSOE_API_TOKEN: "test-secret" }).entsoeToken).toBe("test-secret");
  });

  it("rejects a download interval longer than a timer can wait", () => {
    const error = configError({ PRICE_DOWNLOAD_INTERVAL: "3000000" });

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^PRICE_DOWNLOAD_INTERVAL: /);
    expect(loadConfig({ PRICE_DOWNLOAD_INTERVAL: "2147483" }).downloadIntervalSeconds).toBe(2_147_483);
  });
});
