import fs from "fs";
import { fileURLToPath } from "url";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { FetcherConfig } from "../lib/config";
import { entsoeRequestUrl, fetchDayAheadPrices, opcomReportUrl } from "../lib/priceClient";

const FIXTURE = fileURLToPath(new URL("./fixtures/opcom-pip-2024-01-15.csv", import.meta.url));

const config: FetcherConfig = {
  source: "opcom",
  apiBaseUrl: "https://opcom.test/export",
  entsoeApiUrl: "https://entsoe.test/api",
  biddingZone: "10YRO-TEL------P",
  startDate: "2023-12-14",
  requestTimeoutMs: 1000,
};

/** Sends headers and part of a report, then stalls until the request signal aborts. */
function stalledResponse(init?: RequestInit) {
  const signal = init?.signal;
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode("Zona de tranzactionare;Interval;"));
      const fail = () => controller.error(new DOMException("This operation was aborted", "AbortError"));
      if (signal?.aborted) fail();
      signal?.addEventListener("abort", fail, { once: true });
    },
  });
  return new Response(body, { status: 200 });
}

describe("priceClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the OPCOM report URL from the delivery date", () => {
    expect(opcomReportUrl("2024-01-05", "https://opcom.test/export")).toBe("https://opcom.test/export/05/01/2024/ro");
  });

  it("asks ENTSO-E for the local day in UTC", () => {
    const url = new URL(entsoeRequestUrl("2024-01-15", { ...config, entsoeToken: "test-secret" }));

    expect(url.searchParams.get("periodStart")).toBe("202401142200");
    expect(url.searchParams.get("periodEnd")).toBe("202401152200");
    expect(url.searchParams.get("in_Domain")).toBe("10YRO-TEL------P");
    expect(url.searchParams.get("securityToken")).toBe("test-secret");
  });

  it("returns the parsed OPCOM records", async () => {
    const fetchMock = vi.fn(async () => new Response(fs.readFileSync(FIXTURE, "utf8"), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchDayAheadPrices("2024-01-15", config);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.success && result.data.length).toBe(24);
    expect(result.success && result.data[0]).toEqual({ interval: 1, price: "401,25", volume: "1000,5" });
  });

  it("maps a 404 to a not-published upstream error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("Not found", { status: 404 })));

    const result = await fetchDayAheadPrices("2024-01-16", config);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("upstream");
    expect(result.error.message).toBe("OPCOM responded with 404 for 2024-01-16");
    expect("notPublished" in result.error && result.error.notPublished).toBe(true);
  });

  it("maps a failed request to a network error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("getaddrinfo ENOTFOUND opcom.test");
      }),
    );

    const result = await fetchDayAheadPrices("2024-01-16", config);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("network");
    expect(result.error.message).toBe("Request to opcom.test failed: getaddrinfo ENOTFOUND opcom.test");
  });

  it("reports an abort from the caller", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string, init?: RequestInit) => {
        if (init?.signal?.aborted) throw new DOMException("This operation was aborted", "AbortError");
        return new Response("unreachable");
      }),
    );
    const controller = new AbortController();
    controller.abort();

    const result = await fetchDayAheadPrices("2024-01-16", config, controller.signal);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Request to opcom.test failed: aborted");
  });

  it("refuses dates before the configured start date without a request", async () => {
    const fetchMock = vi.fn(async () => new Response(""));
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchDayAheadPrices("2023-12-01", config);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("2023-12-01 is before the configured start date 2023-12-14");
  });

  it("needs a token for ENTSO-E", async () => {
    const result = await fetchDayAheadPrices("2024-01-16", { ...config, source: "entsoe" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("ENTSO-E source selected but no API token is configured");
  });

  it("reads the ENTSO-E acknowledgement on a 400", async () => {
    const ack =
      "<Acknowledgement_MarketDocument><mRID>ack</mRID><Reason><code>999</code><text>No matching data found</text></Reason></Acknowledgement_MarketDocument>";
    vi.stubGlobal("fetch", vi.fn(async () => new Response(ack, { status: 400 })));

    const result = await fetchDayAheadPrices("2024-01-16", { ...config, source: "entsoe", entsoeToken: "test-secret" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("upstream");
    expect(result.error.message).toBe("ENTSO-E has no prices for 2024-01-16: No matching data found");
  });

  it("turns an unreadable report into a parse error", async () => {
    const body = "Indicator;Valoare;Unitate\n".repeat(10);
    vi.stubGlobal("fetch", vi.fn(async () => new Response(body, { status: 200 })));

    const result = await fetchDayAheadPrices("2024-01-16", config);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("parse");
  });

  it("times out a body that stops arriving", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string, init?: RequestInit) => stalledResponse(init)),
    );

    const result = await fetchDayAheadPrices("2024-01-16", { ...config, requestTimeoutMs: 50 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("network");
    expect(result.error.message).toBe("Request to opcom.test failed: timed out after 50 ms");
  });

  it("abandons a stalled body when the caller aborts", async () => {
    const fetchMock = vi.fn(async (_input: string, init?: RequestInit) => stalledResponse(init));
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();

    const pending = fetchDayAheadPrices("2024-01-16", { ...config, requestTimeoutMs: 60_000 }, controller.signal);
    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    controller.abort();
    const result = await pending;

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("network");
    expect(result.error.message).toBe("Request to opcom.test failed: aborted");
  });

  it("reports a connection dropped mid-body as a network error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(new TypeError("terminated"));
          },
        });
        return new Response(body, { status: 200 });
      }),
    );

    const result = await fetchDayAheadPrices("2024-01-16", config);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("network");
    expect(result.error.message).toBe("Request to opcom.test failed: terminated");
  });
});
