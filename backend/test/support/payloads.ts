import type { DayAheadPayload } from "@dayahead/domain";
import { DayPrices, parseDayAheadPayload } from "@dayahead/domain";
import type { DayAheadPriceSource, FetchOutcome } from "../../src/nordpool/nordpool-client.service";

const QUARTER_MS = 15 * 60_000;

export interface PayloadOptions {
  /** CET delivery date; fixtures stay in winter time (UTC+1). */
  deliveryDate: string;
  /** Quarter-hour prices per area in €/MWh. */
  prices: Record<string, (number | null)[]>;
  state?: string;
  currency?: string;
  blocks?: DayAheadPayload["blockPriceAggregates"];
}

export function quarterStart(deliveryDate: string, index: number): string {
  return new Date(Date.parse(`${deliveryDate}T00:00:00+01:00`) + index * QUARTER_MS).toISOString();
}

/** Repeats every hourly price for the four quarters of its hour. */
export function quartersFromHourly(hourly: readonly (number | null)[]): (number | null)[] {
  return hourly.flatMap((price) => [price, price, price, price]);
}

export function buildPayload(options: PayloadOptions): DayAheadPayload {
  const areas = Object.keys(options.prices);
  const length = Math.max(0, ...Object.values(options.prices).map((values) => values.length));
  const multiAreaEntries = Array.from({length}, (_, index) => {
    const entryPerArea: Record<string, number | null> = {};
    for (const area of areas) {
      const value = options.prices[area]?.[index];
      if (value !== undefined) {
        entryPerArea[area] = value;
      }
    }
    return {
      deliveryStart: quarterStart(options.deliveryDate, index),
      deliveryEnd: quarterStart(options.deliveryDate, index + 1),
      entryPerArea,
    };
  });
  return parseDayAheadPayload({
    deliveryDateCET: options.deliveryDate,
    currency: options.currency ?? "EUR",
    updatedAt: `${options.deliveryDate}T11:45:00Z`,
    version: 2,
    areaStates: [{state: options.state ?? "Final", areas}],
    multiAreaEntries,
    blockPriceAggregates: options.blocks ?? [],
  });
}

export function buildDayPrices(options: PayloadOptions, area = "NL"): DayPrices {
  return new DayPrices(buildPayload(options), area);
}

export function requestUrl(area: string, date: string): string {
  return `https://prices.test/api/DayAheadPrices?date=${date}&area=${area}`;
}

/** In-process stand-in for the Nord Pool client. */
export class FakePriceSource implements DayAheadPriceSource {
  readonly calls: { area: string; date: string; currency: string }[] = [];
  private readonly days = new Map<string, DayPrices>();

  publish(data: DayPrices): void {
    this.days.set(`${data.area}/${data.deliveryDate}`, data);
  }

  fetchDay(area: string, date: string, currency: string): Promise<FetchOutcome> {
    this.calls.push({area, date, currency});
    const url = requestUrl(area, date);
    const data = this.days.get(`${area}/${date}`);
    return Promise.resolve(data ? {kind: "ok", url, data} : {kind: "no-data", url});
  }
}
