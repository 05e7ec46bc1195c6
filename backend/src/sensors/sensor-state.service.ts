import { Inject, Injectable } from "@nestjs/common";

import type { ConsumerSettings, DayKey, DayPrices, PriceType, PriceUnit, Resolution } from "@dayahead/domain";
import {
  buildPriceRows,
  convertPrice,
  currencyUnitPrefix,
  isPriced,
  nextHourBoundary,
  nextQuarterBoundary,
  roundOrNull,
  sameLocalTimeTomorrow,
} from "@dayahead/domain";
import { ConsumerSettingsService } from "../config/consumer-settings.service";
import { PriceCoordinatorService } from "../nordpool/price-coordinator.service";
import type {
  ApiLastFetchSensor,
  CurrentPriceSensor,
  SensorDefinition,
  StatisticSensor,
  TomorrowFinalSensor,
} from "./sensor-catalog";
import { buildSensorCatalog } from "./sensor-catalog";

const NAME_LABELS = {
  day: {today: "", tomorrow: "Tomorrow "},
  priceType: {market: "Market", consumer: "Consumer"},
  resolution: {quarter: "Quarter-hour", hour: "Hourly"},
  unit: {mwh: "MWh", kwh: "kWh"},
  stat: {min: "Min", max: "Max", average: "Average"},
} as const;

const STAT_ICONS = {
  min: "mdi:arrow-collapse-down",
  max: "mdi:arrow-collapse-up",
  average: "mdi:arrow-expand-vertical",
} as const;

export interface PriceAttributes {
  status: string;
  deliveryDate: string | null;
  area: string;
  currency: string;
  resolution: Resolution;
  priceType: PriceType;
}

export interface PriceListEntry {
  startTime: string;
  endTime: string;
  price: number | null;
}

export interface ConvertedBlockAggregate {
  blockName: string;
  deliveryStart: string;
  deliveryEnd: string;
  average: number | null;
  min: number | null;
  max: number | null;
}

interface SensorStateBase {
  uniqueId: string;
  area: string;
  name: string;
  icon: string;
  available: boolean;
  enabledByDefault: boolean;
}

export interface CurrentPriceState extends SensorStateBase {
  kind: "current_price";
  value: number | null;
  unitOfMeasurement: string;
  /** When the value switches to the next quarter or hour. */
  nextUpdate: string;
  attributes: PriceAttributes & { prices: PriceListEntry[]; blockAggregates?: ConvertedBlockAggregate[] };
}

export interface StatisticState extends SensorStateBase {
  kind: "statistic";
  value: number | null;
  unitOfMeasurement: string;
  attributes: PriceAttributes & { min: number | null; max: number | null; average: number | null; count: number };
}

export interface TomorrowFinalState extends SensorStateBase {
  kind: "tomorrow_final";
  value: boolean;
  attributes: { status: string; deliveryDate: string | null; area: string };
}

export interface ApiLastFetchState extends SensorStateBase {
  kind: "api_last_fetch";
  value: string | null;
  attributes: {
    area: string;
    day: DayKey;
    status: string;
    deliveryDateCet: string | null;
    apiUpdatedAt: string | null;
    apiVersion: number | null;
    apiUrl: string | null;
  };
}

export type SensorState = CurrentPriceState | StatisticState | TomorrowFinalState | ApiLastFetchState;

function priceName(day: DayKey, priceType: PriceType, resolution: Resolution, unit: PriceUnit): string {
  return `${NAME_LABELS.day[day]}${NAME_LABELS.priceType[priceType]} ${NAME_LABELS.resolution[resolution]} ${NAME_LABELS.unit[unit]}`;
}

function roundForUnit(value: number | null, unit: PriceUnit): number | null {
  return roundOrNull(value, unit === "kwh" ? 6 : 4);
}

/**
 * Sensor-style read models of the cached prices: one current value per
 * price variant and day, daily statistics, the tomorrow-final flag and
 * API diagnostics.
 */
@Injectable()
export class SensorStateService {
  constructor(
    @Inject(PriceCoordinatorService) private readonly coordinator: PriceCoordinatorService,
    @Inject(ConsumerSettingsService) private readonly consumerSettings: ConsumerSettingsService,
  ) {
  }

  catalog(area?: string): SensorDefinition[] {
    const areas = area ? this.coordinator.deliveryAreas.filter((candidate) => candidate === area) : this.coordinator.deliveryAreas;
    return buildSensorCatalog(areas, (code) => this.consumerSettings.get(code));
  }

  listStates(now: Date, area?: string): SensorState[] {
    return this.catalog(area).map((definition) => this.stateOf(definition, now));
  }

  getState(uniqueId: string, now: Date): SensorState | null {
    const definition = this.catalog().find((candidate) => candidate.uniqueId === uniqueId);
    return definition ? this.stateOf(definition, now) : null;
  }

  stateOf(definition: SensorDefinition, now: Date): SensorState {
    switch (definition.kind) {
      case "current_price":
        return this.currentPrice(definition, now);
      case "statistic":
        return this.statistic(definition);
      case "tomorrow_final":
        return this.tomorrowFinal(definition);
      case "api_last_fetch":
        return this.apiLastFetch(definition);
    }
  }

  private currentPrice(definition: CurrentPriceSensor, now: Date): CurrentPriceState {
    const {area, day, priceType, unit, resolution} = definition;
    const settings = this.consumerSettings.get(area);
    const data = this.coordinator.getDayData(area, day);
    const nextUpdate = resolution === "quarter" ? nextQuarterBoundary(now) : nextHourBoundary(now);
    const base = {
      kind: "current_price" as const,
      uniqueId: definition.uniqueId,
      area,
      name: priceName(day, priceType, resolution, unit),
      icon: priceType === "market" ? "mdi:cash" : "mdi:account-cash-outline",
      enabledByDefault: definition.enabledByDefault,
      unitOfMeasurement: this.unitOfMeasurement(unit),
      nextUpdate: nextUpdate.toISOString(),
    };
    if (!data) {
      return {
        ...base,
        available: false,
        value: null,
        attributes: {...this.unavailableAttributes(area, definition), prices: []},
      };
    }

    const raw = day === "today" ? data.priceAt(now, resolution) : this.tomorrowRaw(data, now, resolution);
    const convert = (mwh: number | null): number | null =>
      roundForUnit(convertPrice(mwh, priceType, unit, settings), unit);

    const attributes: CurrentPriceState["attributes"] = {
      ...this.priceAttributes(data, definition),
      prices: this.priceList(data, definition, settings),
    };
    if (data.blockAggregates.length) {
      attributes.blockAggregates = data.blockAggregates.map((block) => ({
        blockName: block.blockName,
        deliveryStart: block.deliveryStart,
        deliveryEnd: block.deliveryEnd,
        average: convert(block.averageMwh),
        min: convert(block.minMwh),
        max: convert(block.maxMwh),
      }));
    }
    return {...base, available: true, value: convert(raw), attributes};
  }

  // Tomorrow's sensor mirrors the current local time one day ahead.
  private tomorrowRaw(data: DayPrices, now: Date, resolution: Resolution): number | null {
    const sameTime = data.priceAt(sameLocalTimeTomorrow(now), resolution);
    if (sameTime !== null) {
      return sameTime;
    }
    return data.rows(resolution).find(isPriced)?.value ?? null;
  }

  private priceList(data: DayPrices, definition: CurrentPriceSensor, settings: ConsumerSettings): PriceListEntry[] {
    const enriched = buildPriceRows(data.rows(definition.resolution), settings);
    return enriched.map((row) => {
      let price: number | null;
      if (definition.priceType === "consumer") {
        price = row.consumerKwh;
      } else {
        price = definition.unit === "mwh" ? row.marketMwh : row.marketKwh;
      }
      return {startTime: row.startTime, endTime: row.endTime, price};
    });
  }

  private statistic(definition: StatisticSensor): StatisticState {
    const {area, day, priceType, unit, resolution, stat} = definition;
    const settings = this.consumerSettings.get(area);
    const data = this.coordinator.getDayData(area, day);
    const base = {
      kind: "statistic" as const,
      uniqueId: definition.uniqueId,
      area,
      name: `${priceName(day, priceType, resolution, unit)} ${NAME_LABELS.stat[stat]}`,
      icon: STAT_ICONS[stat],
      enabledByDefault: definition.enabledByDefault,
      unitOfMeasurement: this.unitOfMeasurement(unit),
    };
    if (!data) {
      return {
        ...base,
        available: false,
        value: null,
        attributes: {...this.unavailableAttributes(area, definition), min: null, max: null, average: null, count: 0},
      };
    }
    const convert = (mwh: number | null): number | null =>
      roundForUnit(convertPrice(mwh, priceType, unit, settings), unit);
    const stats = data.stats(resolution);
    const converted = {min: convert(stats.min), max: convert(stats.max), average: convert(stats.average)};
    return {
      ...base,
      available: true,
      value: converted[stat],
      attributes: {...this.priceAttributes(data, definition), ...converted, count: stats.count},
    };
  }

  private tomorrowFinal(definition: TomorrowFinalSensor): TomorrowFinalState {
    const data = this.coordinator.getTomorrow(definition.area);
    let icon = "mdi:timer-sand-empty";
    if (data) {
      icon = data.isFinal ? "mdi:timer-sand-complete" : "mdi:timer-sand";
    }
    return {
      kind: "tomorrow_final",
      uniqueId: definition.uniqueId,
      area: definition.area,
      name: "Tomorrow prices final",
      icon,
      available: true,
      enabledByDefault: definition.enabledByDefault,
      value: data?.isFinal ?? false,
      attributes: {
        status: data?.status ?? "unavailable",
        deliveryDate: data?.deliveryDate ?? null,
        area: definition.area,
      },
    };
  }

  private apiLastFetch(definition: ApiLastFetchSensor): ApiLastFetchState {
    const {area, day} = definition;
    const data = this.coordinator.getDayData(area, day);
    return {
      kind: "api_last_fetch",
      uniqueId: definition.uniqueId,
      area,
      name: `${NAME_LABELS.day[day]}API last fetch`.trim(),
      icon: "mdi:api",
      available: true,
      enabledByDefault: definition.enabledByDefault,
      value: this.coordinator.getLastFetch(area, day)?.toISOString() ?? null,
      attributes: {
        area,
        day,
        status: data?.status ?? "unavailable",
        deliveryDateCet: data?.deliveryDate ?? null,
        apiUpdatedAt: data?.updatedAt ?? null,
        apiVersion: data?.version ?? null,
        apiUrl: this.coordinator.getLastRequestUrl(area, day),
      },
    };
  }

  private priceAttributes(data: DayPrices, definition: CurrentPriceSensor | StatisticSensor): PriceAttributes {
    return {
      status: data.status,
      deliveryDate: data.deliveryDate,
      area: definition.area,
      currency: this.coordinator.currency,
      resolution: definition.resolution,
      priceType: definition.priceType,
    };
  }

  private unavailableAttributes(area: string, definition: CurrentPriceSensor | StatisticSensor): PriceAttributes {
    return {
      status: "unavailable",
      deliveryDate: null,
      area,
      currency: this.coordinator.currency,
      resolution: definition.resolution,
      priceType: definition.priceType,
    };
  }

  private unitOfMeasurement(unit: PriceUnit): string {
    const prefix = currencyUnitPrefix(this.coordinator.currency);
    return unit === "mwh" ? `${prefix}/MWh` : `${prefix}/kWh`;
  }
}
