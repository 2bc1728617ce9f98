import type { DateTime } from "luxon";
import { startOfMarketDay } from "./bucharestTime";
import type { FetcherConfig } from "./config";
import { parseEntsoeXml } from "./entsoeXml";
import { describeError, fail, NetworkError, ok, ParseError, PriceError, UpstreamError, type FetchError, type Result } from "./errors";
import { parseOpcomCsv } from "./opcomCsv";
import type { RawPriceRecord } from "./priceTypes";

export type FetchResult = Result<RawPriceRecord[], FetchError>;

export type DayFetcher = (date: string, signal?: AbortSignal) => Promise<FetchResult>;

const OPCOM_HEADERS = {
  Accept: "text/csv,application/csv,text/plain,*/*",
  "Accept-Language": "ro-RO,ro;q=0.9,en-US;q=0.8,en;q=0.7",
  "User-Agent": "ro-day-ahead-prices/0.1 (+https://www.opcom.ro)",
};

/**
 * Downloads the day-ahead price series for one delivery date. Never retries
 * and never throws: every failure comes back as a typed error.
 */
export async function fetchDayAheadPrices(date: string, config: FetcherConfig, signal?: AbortSignal): Promise<FetchResult> {
  if (date < config.startDate) {
    return fail(new UpstreamError(`${date} is before the configured start date ${config.startDate}`));
  }
  try {
    const records = config.source === "entsoe" ? await fetchFromEntsoe(date, config, signal) : await fetchFromOpcom(date, config, signal);
    return ok(records);
  } catch (error) {
    return fail(toFetchError(error));
  }
}

export function createDayFetcher(config: FetcherConfig): DayFetcher {
  return (date, signal) => fetchDayAheadPrices(date, config, signal);
}

export function opcomReportUrl(date: string, baseUrl: string) {
  const [year, month, day] = date.split("-");
  return `${baseUrl}/${day}/${month}/${year}/ro`;
}

export function entsoeRequestUrl(date: string, config: Pick<FetcherConfig, "entsoeApiUrl" | "entsoeToken" | "biddingZone">) {
  const start = startOfMarketDay(date);
  const params = new URLSearchParams({
    documentType: "A44",
    in_Domain: config.biddingZone,
    out_Domain: config.biddingZone,
    periodStart: toEntsoeTime(start),
    periodEnd: toEntsoeTime(start.plus({ days: 1 })),
    securityToken: config.entsoeToken ?? "",
  });
  return `${config.entsoeApiUrl}?${params.toString()}`;
}

async function fetchFromOpcom(date: string, config: FetcherConfig, signal?: AbortSignal) {
  const url = opcomReportUrl(date, config.apiBaseUrl);
  const res = await fetchWithTimeout(url, { headers: OPCOM_HEADERS }, config.requestTimeoutMs, signal);
  if (!res.ok) {
    throw new UpstreamError(`OPCOM responded with ${res.status} for ${date}`, {
      status: res.status,
      notPublished: res.status === 404,
    });
  }
  return parseOpcomCsv(decodeReport(res.body)).records;
}

async function fetchFromEntsoe(date: string, config: FetcherConfig, signal?: AbortSignal) {
  if (!config.entsoeToken) {
    throw new UpstreamError("ENTSO-E source selected but no API token is configured");
  }
  const res = await fetchWithTimeout(entsoeRequestUrl(date, config), {}, config.requestTimeoutMs, signal);
  const text = new TextDecoder("utf-8").decode(res.body);
  if (!res.ok) {
    // ENTSO-E answers "no data" with a 400 and an acknowledgement document
    if (text.includes("Acknowledgement_MarketDocument")) {
      return parseEntsoeXml(text, date).records;
    }
    throw new UpstreamError(`ENTSO-E responded with ${res.status} for ${date}`, { status: res.status });
  }
  return parseEntsoeXml(text, date).records;
}

type FetchedBody = { ok: boolean; status: number; body: Uint8Array };

/** The timeout and the caller's signal cover the whole exchange, body included. */
async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number, signal?: AbortSignal): Promise<FetchedBody> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });
  if (signal?.aborted) controller.abort();
  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    const body = new Uint8Array(await Promise.race([res.arrayBuffer(), rejectOnAbort(controller.signal)]));
    return { ok: res.ok, status: res.status, body };
  } catch (error) {
    const reason = signal?.aborted ? "aborted" : controller.signal.aborted ? `timed out after ${timeoutMs} ms` : describeError(error);
    throw new NetworkError(`Request to ${new URL(url).host} failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

function rejectOnAbort(signal: AbortSignal) {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/** OPCOM serves UTF-8 most of the time and Windows-1250 on older reports. */
function decodeReport(bytes: Uint8Array) {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder("windows-1250").decode(bytes);
  }
}

function toEntsoeTime(instant: DateTime) {
  return instant.toUTC().toFormat("yyyyMMddHHmm");
}

function toFetchError(error: unknown): FetchError {
  if (error instanceof NetworkError || error instanceof UpstreamError || error instanceof ParseError) {
    return error;
  }
  if (error instanceof PriceError) {
    return new ParseError(error.message, { cause: error });
  }
  return new ParseError(`Unexpected failure while reading prices: ${describeError(error)}`, { cause: error });
}
