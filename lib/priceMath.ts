import type { RawPrice } from "./priceTypes";

// Prices are handled as integer hundredths of a leu so sums never drift.
export const PRICE_DECIMALS = 2;
const SCALE = 10 ** PRICE_DECIMALS;
const NUMERIC = /^[+-]?\d+(\.\d+)?$/;

/**
 * Accepts numbers and the formats the Romanian reports use: "443,76",
 * "1 145,50", "1.145,50" as well as plain "443.76".
 */
export function parsePrice(value: RawPrice): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  let text = value.replace(/\s/g, "");
  const lastComma = text.lastIndexOf(",");
  const lastDot = text.lastIndexOf(".");
  if (lastComma !== -1 && lastDot !== -1) {
    text = lastComma > lastDot ? text.replace(/\./g, "").replace(",", ".") : text.replace(/,/g, "");
  } else if (lastComma !== -1) {
    text = text.replace(",", ".");
  }
  if (!NUMERIC.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

export function roundHalfAwayFromZero(value: number) {
  const rounded = Math.round(Math.abs(value));
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

export function toScaled(value: number) {
  // toPrecision strips binary noise such as 1.005 * 100 = 100.49999999999999
  return roundHalfAwayFromZero(Number((value * SCALE).toPrecision(15)));
}

export function fromScaled(scaled: number) {
  return scaled / SCALE;
}

export function roundPrice(value: number) {
  return fromScaled(toScaled(value));
}

export function meanOfScaled(values: number[]): number | null {
  if (!values.length) return null;
  const sum = values.reduce((acc, value) => acc + value, 0);
  return fromScaled(roundHalfAwayFromZero(sum / values.length));
}
