import { Percentage } from "./percentage";
import type { PriceRow } from "./day-prices";

export type PriceType = "market" | "consumer";
export type PriceUnit = "mwh" | "kwh";

export interface ConsumerSettings {
  enableKwh: boolean;
  enableHourly: boolean;
  consumerPriceEnabled: boolean;
  /** Per kWh, in the market currency. */
  energyTax: number;
  /** Per kWh, in the market currency. */
  supplierMarkup: number;
  /** Fraction, e.g. 0.21. */
  vat: number;
}

export const DEFAULT_ENERGY_TAX = 0.09161;
export const DEFAULT_SUPPLIER_MARKUP = 0.0165289256198347;
export const DEFAULT_VAT = 0.21;

export const DEFAULT_CONSUMER_SETTINGS: Readonly<ConsumerSettings> = {
  enableKwh: true,
  enableHourly: true,
  consumerPriceEnabled: true,
  energyTax: DEFAULT_ENERGY_TAX,
  supplierMarkup: DEFAULT_SUPPLIER_MARKUP,
  vat: DEFAULT_VAT,
};

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : roundTo(value, decimals);
}

export function mwhToKwh(pricePerMwh: number | null): number | null {
  if (pricePerMwh === null) {
    return null;
  }
  return pricePerMwh / 1000;
}

/**
 * Consumer price per kWh: `(market + energyTax + supplierMarkup) * (1 + vat)`.
 */
export function consumerPriceKwh(
  marketPriceKwh: number | null,
  energyTax: number,
  supplierMarkup: number,
  vat: number,
): number | null {
  if (marketPriceKwh === null) {
    return null;
  }
  const exclVat = marketPriceKwh + energyTax + supplierMarkup;
  return Percentage.fromRatio(vat).applyOnTop(exclVat);
}

export function convertPrice(
  mwhValue: number | null,
  priceType: PriceType,
  unit: PriceUnit,
  settings: Pick<ConsumerSettings, "energyTax" | "supplierMarkup" | "vat">,
): number | null {
  if (mwhValue === null) {
    return null;
  }
  if (priceType === "market") {
    return unit === "mwh" ? mwhValue : mwhToKwh(mwhValue);
  }
  return consumerPriceKwh(mwhToKwh(mwhValue), settings.energyTax, settings.supplierMarkup, settings.vat);
}

/** Per-kWh price of a row in the requested price type, or null for an unpriced row. */
export function rowPriceKwh(
  row: PriceRow,
  priceType: PriceType,
  settings: Pick<ConsumerSettings, "energyTax" | "supplierMarkup" | "vat">,
): number | null {
  return convertPrice(row.value, priceType, "kwh", settings);
}

export interface EnrichedPriceRow {
  startTime: string;
  endTime: string;
  marketMwh: number | null;
  marketKwh: number | null;
  consumerKwh: number | null;
}

export function buildPriceRows(rows: readonly PriceRow[], settings: ConsumerSettings): EnrichedPriceRow[] {
  return rows.map((row) => {
    const mwh = row.value;
    const consumer = settings.consumerPriceEnabled
      ? consumerPriceKwh(mwhToKwh(mwh), settings.energyTax, settings.supplierMarkup, settings.vat)
      : null;
    return {
      startTime: row.startTime,
      endTime: row.endTime,
      marketMwh: roundOrNull(mwh, 5),
      marketKwh: settings.enableKwh ? roundOrNull(mwhToKwh(mwh), 6) : null,
      consumerKwh: roundOrNull(consumer, 6),
    };
  });
}
