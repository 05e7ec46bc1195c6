import { TimeSlot } from "./time-slot";
import { roundTo } from "./pricing";
import type { DayAheadPayload } from "./nordpool-payload";

export const STATUS_PRELIMINARY = "Preliminary";
export const STATUS_FINAL = "Final";

export type Resolution = "quarter" | "hour";
export type DayKey = "today" | "tomorrow";

export interface PriceRow {
  startTime: string;
  endTime: string;
  /** Market price per MWh; null when the area has no price for the slot. */
  value: number | null;
}

export interface PricedRow extends PriceRow {
  value: number;
}

export interface BlockAggregate {
  blockName: string;
  deliveryStart: string;
  deliveryEnd: string;
  averageMwh: number | null;
  minMwh: number | null;
  maxMwh: number | null;
}

export interface PriceStats {
  min: number | null;
  max: number | null;
  average: number | null;
  count: number;
}

const QUARTERS_PER_HOUR = 4;

export function isPriced(row: PriceRow): row is PricedRow {
  return row.value !== null;
}

/**
 * Prices for one delivery area and one CET delivery day, as published by the
 * Nord Pool day-ahead auction.
 */
export class DayPrices {
  readonly deliveryDate: string;
  readonly currency: string;
  readonly updatedAt: string | null;
  readonly version: number | null;
  readonly status: string;
  readonly areaAvailable: boolean;
  readonly quarterRows: readonly PriceRow[];
  readonly hourRows: readonly PriceRow[];
  readonly blockAggregates: readonly BlockAggregate[];

  constructor(
    payload: DayAheadPayload,
    readonly area: string,
  ) {
    this.deliveryDate = payload.deliveryDateCET;
    this.currency = payload.currency;
    this.updatedAt = payload.updatedAt ?? null;
    this.version = payload.version ?? null;
    this.status = payload.areaStates.find((entry) => entry.areas.includes(area))?.state ?? STATUS_PRELIMINARY;
    this.areaAvailable = payload.multiAreaEntries.some((entry) => area in entry.entryPerArea);
    this.quarterRows = payload.multiAreaEntries.map((entry) => ({
      startTime: entry.deliveryStart,
      endTime: entry.deliveryEnd,
      value: entry.entryPerArea[area] ?? null,
    }));
    this.hourRows = deriveHourlyRows(this.quarterRows);
    this.blockAggregates = payload.blockPriceAggregates.flatMap((block) => {
      const areaData = block.averagePricePerArea[area];
      if (!areaData) {
        return [];
      }
      return [{
        blockName: block.blockName,
        deliveryStart: block.deliveryStart,
        deliveryEnd: block.deliveryEnd,
        averageMwh: areaData.average ?? null,
        minMwh: areaData.min ?? null,
        maxMwh: areaData.max ?? null,
      }];
    });
  }

  get isFinal(): boolean {
    return this.status === STATUS_FINAL;
  }

  get isPreliminary(): boolean {
    return this.status === STATUS_PRELIMINARY;
  }

  rows(resolution: Resolution): readonly PriceRow[] {
    return resolution === "quarter" ? this.quarterRows : this.hourRows;
  }

  pricedRows(resolution: Resolution): PricedRow[] {
    return this.rows(resolution).filter(isPriced);
  }

  priceAt(instant: Date, resolution: Resolution): number | null {
    for (const row of this.rows(resolution)) {
      const slot = TimeSlot.tryFromIso(row.startTime, row.endTime);
      if (slot?.contains(instant)) {
        return row.value;
      }
    }
    return null;
  }

  stats(resolution: Resolution): PriceStats {
    const values = this.pricedRows(resolution).map((row) => row.value);
    if (!values.length) {
      return {min: null, max: null, average: null, count: 0};
    }
    const sum = values.reduce((acc, value) => acc + value, 0);
    return {
      min: roundTo(Math.min(...values), 5),
      max: roundTo(Math.max(...values), 5),
      average: roundTo(sum / values.length, 5),
      count: values.length,
    };
  }

  /**
   * The `count` cheapest priced rows. With `contiguous` the rows form one run
   * of consecutive priced rows with the lowest mean (earliest run on ties);
   * otherwise the individually cheapest rows are returned in time order.
   */
  cheapestBlocks(count: number, resolution: Resolution, contiguous: boolean): PricedRow[] {
    const valid = this.pricedRows(resolution);
    if (!valid.length || count <= 0 || count > valid.length) {
      return [];
    }
    if (contiguous) {
      return cheapestContiguousWindow(valid, count, (row) => row.value) ?? [];
    }
    return sortByStartTime([...valid].sort((a, b) => a.value - b.value).slice(0, count));
  }
}

/** Averages each run of four quarter rows into one hourly row. */
export function deriveHourlyRows(quarters: readonly PriceRow[]): PriceRow[] {
  const hours: PriceRow[] = [];
  for (let index = 0; index < quarters.length; index += QUARTERS_PER_HOUR) {
    const group = quarters.slice(index, index + QUARTERS_PER_HOUR);
    const first = group[0];
    const last = group[group.length - 1];
    if (!first || !last) {
      continue;
    }
    const values = group.filter(isPriced).map((row) => row.value);
    const average = values.length ? values.reduce((acc, value) => acc + value, 0) / values.length : null;
    hours.push({
      startTime: first.startTime,
      endTime: last.endTime,
      value: average === null ? null : roundTo(average, 5),
    });
  }
  return hours;
}

/**
 * Sliding window over `rows` returning the `size` consecutive rows with the
 * lowest mean price. Windows containing a row priced as null are skipped.
 */
export function cheapestContiguousWindow<T>(
  rows: readonly T[],
  size: number,
  price: (row: T) => number | null,
): T[] | null {
  let best: T[] | null = null;
  let bestAverage = Number.POSITIVE_INFINITY;
  for (let start = 0; start + size <= rows.length; start += 1) {
    const window = rows.slice(start, start + size);
    let sum = 0;
    let complete = true;
    for (const row of window) {
      const value = price(row);
      if (value === null) {
        complete = false;
        break;
      }
      sum += value;
    }
    if (!complete) {
      continue;
    }
    const average = sum / size;
    if (average < bestAverage) {
      bestAverage = average;
      best = window;
    }
  }
  return best;
}

export function sortByStartTime<T extends { startTime: string }>(rows: T[]): T[] {
  return rows.sort((a, b) => {
    if (a.startTime === b.startTime) {
      return 0;
    }
    return a.startTime < b.startTime ? -1 : 1;
  });
}
