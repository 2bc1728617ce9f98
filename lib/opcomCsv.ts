import { parse } from "csv-parse/sync";
import { z } from "zod";
import { describeError, ParseError, UpstreamError } from "./errors";
import type { IntervalPriceRecord } from "./priceTypes";
import { aggregateQuarterHourIntervals } from "./quarterHours";

const MIN_REPORT_LENGTH = 100;
const ZONE = "romania";

const rowsSchema = z.array(z.array(z.string()));

export type OpcomReport = {
  records: IntervalPriceRecord[];
  resolution: "1h" | "15m";
};

/**
 * Parses the OPCOM PZU "PIP" CSV export. The report stacks several tables;
 * hourly prices follow the header row carrying both an "Interval" and a
 * "Pret de Inchidere" column, one row per interval for zone "Romania".
 */
export function parseOpcomCsv(content: string): OpcomReport {
  const text = content.trim();
  if (text.length < MIN_REPORT_LENGTH) {
    throw new UpstreamError(`OPCOM report too short (${text.length} characters), prices not yet published`, {
      notPublished: true,
    });
  }

  const rows = readRows(text);
  const headerIndex = rows.findIndex((row) => findColumn(row, "interval") !== -1 && findColumn(row, "pret de inchidere") !== -1);
  if (headerIndex === -1) {
    throw new ParseError("OPCOM report has no hourly section (missing 'Interval' / 'Pret de Inchidere' header)");
  }
  const header = rows[headerIndex];
  const intervalCol = findColumn(header, "interval");
  const priceCol = findColumn(header, "pret de inchidere");
  const volumeCol = findColumn(header, "volum");

  const records = rows
    .slice(headerIndex + 1)
    .filter((row) => normalizeText(row[0] ?? "") === ZONE)
    .map<IntervalPriceRecord>((row) => {
      const intervalText = row[intervalCol] ?? "";
      const interval = Number(intervalText);
      if (!/^\d+$/.test(intervalText) || !Number.isSafeInteger(interval)) {
        throw new ParseError(`OPCOM row has a non-numeric interval '${intervalText}'`);
      }
      const volume = volumeCol === -1 ? undefined : row[volumeCol];
      return {
        interval,
        price: row[priceCol] ?? "",
        volume: volume === undefined || volume === "" ? undefined : volume,
      };
    });

  if (!records.length) {
    throw new UpstreamError("OPCOM report has no price rows, prices not yet published", { notPublished: true });
  }

  const maxInterval = Math.max(...records.map((record) => record.interval));
  if (maxInterval > 25) {
    return { records: aggregateQuarterHourIntervals(records), resolution: "15m" };
  }
  return { records, resolution: "1h" };
}

function readRows(text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      delimiter: detectDelimiter(text),
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new ParseError(`OPCOM report is not valid CSV: ${describeError(error)}`, { cause: error });
  }
  const rows = rowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new ParseError("OPCOM report did not parse into rows of text");
  }
  return rows.data;
}

// Semicolon exports keep decimal commas unquoted, so the delimiter is fixed per report.
function detectDelimiter(text: string) {
  const headerLine = text.split(/\r?\n/).find(isHourlyHeader) ?? "";
  return [";", "\t", ","].find((delimiter) => headerLine.split(delimiter).length >= 3) ?? ",";
}

function isHourlyHeader(line: string) {
  const normalized = normalizeText(line);
  return normalized.includes("interval") && normalized.includes("pret de inchidere");
}

function findColumn(row: string[], label: string) {
  return row.findIndex((cell) => normalizeText(cell).includes(label));
}

/** Lower-cases and strips Romanian diacritics (ț, ș, î, â, ă). */
function normalizeText(value: string) {
  return value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .trim();
}
