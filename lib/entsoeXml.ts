import { XMLParser } from "fast-xml-parser";
import { DateTime } from "luxon";
import { z } from "zod";
import { toMarketDate } from "./bucharestTime";
import { describeError, ParseError, UpstreamError } from "./errors";
import type { TimestampPriceRecord } from "./priceTypes";
import { aggregateQuarterHourTimestamps } from "./quarterHours";

const ARRAY_TAGS = new Set(["TimeSeries", "Period", "Point", "Reason"]);

const pointSchema = z.object({
  position: z.string(),
  "price.amount": z.string(),
});

const periodSchema = z.object({
  timeInterval: z.object({ start: z.string(), end: z.string() }),
  resolution: z.string(),
  Point: z.array(pointSchema),
});

const documentSchema = z.union([
  z.object({
    Publication_MarketDocument: z.object({
      TimeSeries: z.array(z.object({ Period: z.array(periodSchema) })),
    }),
  }),
  z.object({
    Acknowledgement_MarketDocument: z.object({
      Reason: z.array(z.object({ code: z.string().optional(), text: z.string().optional() })).optional(),
    }),
  }),
]);

type EntsoePeriod = z.infer<typeof periodSchema>;

const RESOLUTION_MINUTES: Record<string, number> = { PT60M: 60, PT15M: 15 };

export type EntsoeReport = {
  records: TimestampPriceRecord[];
  resolution: "1h" | "15m";
};

/** Day-ahead prices (A44) for one delivery date out of a Publication_MarketDocument. */
export function parseEntsoeXml(xml: string, date: string): EntsoeReport {
  const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    isArray: (name) => ARRAY_TAGS.has(name),
  });

  let raw: unknown;
  try {
    raw = parser.parse(xml);
  } catch (error) {
    throw new ParseError(`ENTSO-E response is not valid XML: ${describeError(error)}`, { cause: error });
  }

  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError("ENTSO-E response is neither a publication nor an acknowledgement document");
  }
  const document = parsed.data;
  if ("Acknowledgement_MarketDocument" in document) {
    const reason = document.Acknowledgement_MarketDocument.Reason?.[0]?.text ?? "no reason given";
    throw new UpstreamError(`ENTSO-E has no prices for ${date}: ${reason}`, { notPublished: true });
  }

  const periods = document.Publication_MarketDocument.TimeSeries.flatMap((series) => series.Period);
  const hourly = periods.filter((period) => period.resolution === "PT60M");
  const quarterly = periods.filter((period) => period.resolution === "PT15M");
  const chosen = hourly.length ? hourly : quarterly;
  if (!chosen.length) {
    const seen = periods.map((period) => period.resolution).join(", ") || "none";
    throw new ParseError(`ENTSO-E document has no PT60M or PT15M period (found: ${seen})`);
  }

  const byTimestamp = new Map<number, string>();
  chosen.forEach((period) => {
    expandPeriod(period).forEach(({ at, price }) => {
      if (!byTimestamp.has(at)) byTimestamp.set(at, price);
    });
  });

  const records = Array.from(byTimestamp.entries())
    .filter(([at]) => toMarketDate(DateTime.fromMillis(at)) === date)
    .sort(([a], [b]) => a - b)
    .map<TimestampPriceRecord>(([at, price]) => ({ timestamp: new Date(at).toISOString(), price }));

  if (!records.length) {
    throw new UpstreamError(`ENTSO-E document has no prices for ${date}`, { notPublished: true });
  }

  return hourly.length
    ? { records, resolution: "1h" }
    : { records: aggregateQuarterHourTimestamps(records), resolution: "15m" };
}

/** A03 curves omit positions whose price equals the previous one; those are filled forward. */
function expandPeriod(period: EntsoePeriod): Array<{ at: number; price: string }> {
  const minutes = RESOLUTION_MINUTES[period.resolution];
  const start = Date.parse(period.timeInterval.start);
  const end = Date.parse(period.timeInterval.end);
  if (!minutes || !Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
    throw new ParseError(`ENTSO-E period ${period.timeInterval.start}..${period.timeInterval.end} is invalid`);
  }
  const stepMs = minutes * 60 * 1000;
  const slots = Math.round((end - start) / stepMs);

  const prices = new Map<number, string>();
  period.Point.forEach((point) => {
    const position = Number(point.position);
    if (!Number.isInteger(position) || position < 1 || position > slots) {
      throw new ParseError(`ENTSO-E point position '${point.position}' is out of range 1..${slots}`);
    }
    prices.set(position, point["price.amount"]);
  });

  const expanded: Array<{ at: number; price: string }> = [];
  let previous: string | undefined;
  for (let position = 1; position <= slots; position += 1) {
    const price = prices.get(position) ?? previous;
    if (price === undefined) {
      throw new ParseError(`ENTSO-E period starting ${period.timeInterval.start} has no price at position 1`);
    }
    expanded.push({ at: start + (position - 1) * stepMs, price });
    previous = price;
  }
  return expanded;
}
