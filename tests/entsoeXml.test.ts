import { describe, expect, it } from "vitest";
import { ParseError, UpstreamError } from "../lib/errors";
import { parseEntsoeXml } from "../lib/entsoeXml";
import { normalizePrices } from "../lib/priceNormalizer";

type Point = { position: number; price: string };

function publication(resolution: string, points: Point[], start = "2024-01-14T22:00Z", end = "2024-01-15T22:00Z") {
  const body = points
    .map((point) => `<Point><position>${point.position}</position><price.amount>${point.price}</price.amount></Point>`)
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<Publication_MarketDocument xmlns="urn:iec62325.351:tc57wg16:451-3:publicationdocument:7:0">
  <mRID>test-document</mRID>
  <TimeSeries>
    <mRID>1</mRID>
    <currency_Unit.name>EUR</currency_Unit.name>
    <Period>
      <timeInterval><start>${start}</start><end>${end}</end></timeInterval>
      <resolution>${resolution}</resolution>
      ${body}
    </Period>
  </TimeSeries>
</Publication_MarketDocument>`;
}

function hourlyPoints(count: number): Point[] {
  return Array.from({ length: count }, (_, idx) => ({ position: idx + 1, price: `${80 + idx}.5` }));
}

describe("parseEntsoeXml", () => {
  it("reads an hourly publication document", () => {
    const report = parseEntsoeXml(publication("PT60M", hourlyPoints(24)), "2024-01-15");

    expect(report.resolution).toBe("1h");
    expect(report.records).toHaveLength(24);
    expect(report.records[0]).toEqual({ timestamp: "2024-01-14T22:00:00.000Z", price: "80.5" });
    expect(report.records[23]).toEqual({ timestamp: "2024-01-15T21:00:00.000Z", price: "103.5" });
  });

  it("produces records the normalizer accepts", () => {
    const report = parseEntsoeXml(publication("PT60M", hourlyPoints(24)), "2024-01-15");
    const hours = normalizePrices(report.records, "2024-01-15");

    expect(hours.success && hours.data[0]).toEqual({
      start: "2024-01-15T00:00:00+02:00",
      end: "2024-01-15T01:00:00+02:00",
      hour: 0,
      value: 80.5,
    });
  });

  it("fills omitted positions with the previous price", () => {
    const points = [
      { position: 1, price: "50" },
      { position: 2, price: "60" },
      { position: 5, price: "70" },
    ];
    const report = parseEntsoeXml(publication("PT60M", points), "2024-01-15");

    expect(report.records.map((record) => record.price).slice(0, 6)).toEqual(["50", "60", "60", "60", "70", "70"]);
    expect(report.records[23].price).toBe("70");
  });

  it("averages a quarter-hour period into hours", () => {
    const points = Array.from({ length: 96 }, (_, idx) => ({ position: idx + 1, price: String(10 * ((idx % 4) + 1)) }));
    const report = parseEntsoeXml(publication("PT15M", points), "2024-01-15");

    expect(report.resolution).toBe("15m");
    expect(report.records).toHaveLength(24);
    expect(report.records[0]).toEqual({ timestamp: "2024-01-14T22:00:00.000Z", price: 25 });
  });

  it("keeps only the hours of the requested local date", () => {
    const points = hourlyPoints(25);
    const report = parseEntsoeXml(publication("PT60M", points, "2024-01-14T21:00Z", "2024-01-15T22:00Z"), "2024-01-15");

    expect(report.records).toHaveLength(24);
    expect(report.records[0].price).toBe("81.5");
  });

  it("reports an acknowledgement as not yet published", () => {
    const xml = `<Acknowledgement_MarketDocument>
  <mRID>ack</mRID>
  <Reason><code>999</code><text>No matching data found</text></Reason>
</Acknowledgement_MarketDocument>`;

    expect(() => parseEntsoeXml(xml, "2024-01-16")).toThrow(
      new UpstreamError("ENTSO-E has no prices for 2024-01-16: No matching data found"),
    );
  });

  it("rejects a point outside the period", () => {
    expect(() => parseEntsoeXml(publication("PT60M", [{ position: 30, price: "1" }]), "2024-01-15")).toThrow(ParseError);
  });

  it("rejects unknown documents", () => {
    expect(() => parseEntsoeXml("<Something><else>1</else></Something>", "2024-01-15")).toThrow(ParseError);
  });
});
