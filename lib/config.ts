import path from "path";
import { z } from "zod";
import { isIsoDate } from "./bucharestTime";
import { ConfigError } from "./errors";

export const DEFAULT_OPCOM_URL = "https://www.opcom.ro/rapoarte-pzu-raportPIP-export-csv";
export const DEFAULT_ENTSOE_URL = "https://web-api.tp.entsoe.eu/api";
export const ROMANIA_BIDDING_ZONE = "10YRO-TEL------P";
export const MAX_INTERVAL_SECONDS = 2_147_483;

const isoDate = z.string().trim().refine(isIsoDate, { message: "expected a YYYY-MM-DD date" });

const schema = z
  .object({
    PRICE_SOURCE: z.enum(["opcom", "entsoe"]).default("opcom"),
    PRICE_API_URL: z.string().trim().url().default(DEFAULT_OPCOM_URL),
    ENTSOE_API_URL: z.string().trim().url().default(DEFAULT_ENTSOE_URL),
    ENTSOE_API_TOKEN: z.string().trim().min(1).optional(),
    ENTSOE_BIDDING_ZONE: z.string().trim().min(1).default(ROMANIA_BIDDING_ZONE),
    PRICE_REGION: z.string().trim().min(1).default("RO"),
    PRICE_START_DATE: isoDate.default("2023-12-14"),
    // seconds; timers take at most 2^31-1 ms
    PRICE_DOWNLOAD_INTERVAL: z.coerce.number().int().positive().max(MAX_INTERVAL_SECONDS).default(3600),
    PRICE_CUTOFF_HOUR: z.coerce.number().int().min(0).max(23).default(13),
    PRICE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_INTERVAL_SECONDS * 1000).default(30_000),
    PRICE_DB_PATH: z.string().trim().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.PRICE_SOURCE === "entsoe" && !env.ENTSOE_API_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ENTSOE_API_TOKEN"],
        message: "required when PRICE_SOURCE is entsoe",
      });
    }
  });

export type PriceSource = "opcom" | "entsoe";

export type FetcherConfig = {
  source: PriceSource;
  apiBaseUrl: string;
  entsoeApiUrl: string;
  entsoeToken?: string;
  biddingZone: string;
  startDate: string;
  requestTimeoutMs: number;
};

export type SchedulerConfig = {
  downloadIntervalSeconds: number;
  cutoffHour: number;
};

export type AppConfig = FetcherConfig &
  SchedulerConfig & {
    region: string;
    dbPath: string;
  };

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // empty variables count as unset, the way shells export them
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const data = parsed.data;
  return {
    source: data.PRICE_SOURCE,
    apiBaseUrl: data.PRICE_API_URL.replace(/\/+$/, ""),
    entsoeApiUrl: data.ENTSOE_API_URL,
    entsoeToken: data.ENTSOE_API_TOKEN,
    biddingZone: data.ENTSOE_BIDDING_ZONE,
    startDate: data.PRICE_START_DATE,
    requestTimeoutMs: data.PRICE_REQUEST_TIMEOUT_MS,
    downloadIntervalSeconds: data.PRICE_DOWNLOAD_INTERVAL,
    cutoffHour: data.PRICE_CUTOFF_HOUR,
    region: data.PRICE_REGION,
    dbPath: data.PRICE_DB_PATH ?? path.join(process.cwd(), "data", "prices.db"),
  };
}
