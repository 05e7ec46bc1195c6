import { Inject, Injectable, Logger } from "@nestjs/common";

import type { ConsumerSettings, DayKey, EnrichedPriceRow, DayPrices, PricedRow, PriceRow, PriceType, Resolution } from "@dayahead/domain";
import {
  buildPriceRows,
  cheapestContiguousWindow,
  Energy,
  EnergyPrice,
  Power,
  roundTo,
  rowPriceKwh,
  ServiceValidationError,
  sortByStartTime,
  TimeSlot,
} from "@dayahead/domain";
import { ConsumerSettingsService } from "../config/consumer-settings.service";
import { PriceCoordinatorService } from "../nordpool/price-coordinator.service";
import type {
  BestNextWindowInput,
  CheapestBlocksInput,
  ChargeMode,
  ExportStrategyInput,
  ForecastDeviceCostInput,
  PriceAlertsInput,
  SearchScope,
} from "./inputs";

export interface PricedBlock {
  startTime: string;
  endTime: string;
  priceKwh: number;
}

export interface WindowBlock extends PricedBlock {
  durationHours: number;
  energyKwh: number;
  cost: number;
}

export interface WindowSummary {
  area: string;
  day: DayKey;
  resolution: Resolution;
  priceType: PriceType;
  powerKw: number;
  currency: string;
  totalEnergyKwh: number;
  totalCost: number;
  averagePriceKwh: number;
  windowStart: string;
  windowEnd: string;
  blocks: WindowBlock[];
}

export interface CheapestBlocksResult {
  area: string;
  day: DayKey;
  resolution: Resolution;
  priceType: PriceType;
  contiguous: boolean;
  nBlocks: number;
  totalDurationMinutes: number;
  averagePriceKwh: number;
  status: string;
  deliveryDate: string;
  blocks: PricedBlock[];
}

export interface DayPricesResult {
  area: string;
  day: DayKey;
  resolution: Resolution;
  deliveryDate: string;
  status: string;
  currency: string;
  rows: EnrichedPriceRow[];
}

export interface BestNextWindowResult extends WindowSummary {
  searchScope: SearchScope;
}

export interface ExportStrategyResult {
  area: string;
  day: DayKey;
  resolution: Resolution;
  priceType: PriceType;
  chargeMode: ChargeMode;
  chargeBlocks: PricedBlock[];
  dischargeBlocks: PricedBlock[];
}

export interface PriceAlertsResult {
  area: string;
  day: DayKey;
  resolution: Resolution;
  priceType: PriceType;
  thresholdKwh: number | null;
  thresholdTriggered: boolean;
  negativeTriggered: boolean;
  topN: number;
  topCheapest: PricedBlock[];
  thresholdMatches: PricedBlock[];
  negativeMatches: PricedBlock[];
}

interface RowWithPrice {
  row: PricedRow;
  priceKwh: number;
}

const MAX_BLOCKS: Record<Resolution, number> = {quarter: 96, hour: 24};
const BLOCK_MINUTES: Record<Resolution, number> = {quarter: 15, hour: 60};

export function validateMaxBlocks(resolution: Resolution, count: number): void {
  const maxBlocks = MAX_BLOCKS[resolution];
  if (count > maxBlocks) {
    throw new ServiceValidationError(
      `n_blocks=${count} is too high for resolution '${resolution}'. Maximum is ${maxBlocks}.`,
    );
  }
}

function toBlock({row, priceKwh}: RowWithPrice): PricedBlock {
  return {startTime: row.startTime, endTime: row.endTime, priceKwh: roundTo(priceKwh, 6)};
}

function byPriceAscending(a: RowWithPrice, b: RowWithPrice): number {
  return a.priceKwh - b.priceKwh;
}

/**
 * Answers price questions for configured areas from the coordinator cache:
 * cheapest blocks, device running costs, the best upcoming window, battery
 * charge/discharge slots and price alerts.
 */
@Injectable()
export class PriceAnalysisService {
  private readonly logger = new Logger(PriceAnalysisService.name);

  constructor(
    @Inject(PriceCoordinatorService) private readonly coordinator: PriceCoordinatorService,
    @Inject(ConsumerSettingsService) private readonly consumerSettings: ConsumerSettingsService,
  ) {
  }

  getDayPrices(area: string, day: DayKey, resolution: Resolution): DayPricesResult {
    this.requireArea(area);
    const data = this.requireDayData(area, day);
    return {
      area,
      day,
      resolution,
      deliveryDate: data.deliveryDate,
      status: data.status,
      currency: data.currency,
      rows: buildPriceRows(data.rows(resolution), this.consumerSettings.get(area)),
    };
  }

  getCheapestBlocks(input: CheapestBlocksInput): CheapestBlocksResult {
    const {area, day, resolution, priceType, nBlocks, contiguous} = input;
    validateMaxBlocks(resolution, nBlocks);
    this.requireArea(area);
    const settings = this.requirePriceType(area, priceType);
    const data = this.requireDayData(area, day);

    const blocks = data.cheapestBlocks(nBlocks, resolution, contiguous);
    if (!blocks.length) {
      throw new ServiceValidationError(
        `Could not find ${nBlocks} ${contiguous ? "contiguous " : ""}${resolution} blocks for ${area} (${day}).`,
      );
    }
    const priced = this.withPrices(blocks, priceType, settings);
    if (!priced.length) {
      throw new ServiceValidationError("No valid priced blocks found.");
    }
    const average = priced.reduce((acc, item) => acc + item.priceKwh, 0) / priced.length;
    this.logger.verbose(`Cheapest ${nBlocks} ${resolution} blocks for ${area} (${day}) average ${average}`);

    return {
      area,
      day,
      resolution,
      priceType,
      contiguous,
      nBlocks,
      totalDurationMinutes: blocks.length * BLOCK_MINUTES[resolution],
      averagePriceKwh: roundTo(average, 6),
      status: data.status,
      deliveryDate: data.deliveryDate,
      blocks: priced.map(toBlock),
    };
  }

  forecastDeviceCost(input: ForecastDeviceCostInput): WindowSummary {
    const {area, powerKw, day, resolution, priceType, nBlocks, contiguous, startTime, endTime} = input;
    validateMaxBlocks(resolution, nBlocks);
    this.requireArea(area);
    this.requirePriceType(area, priceType);
    const data = this.requireDayData(area, day);

    if (Boolean(startTime) !== Boolean(endTime)) {
      throw new ServiceValidationError("Provide both startTime and endTime, or neither.");
    }

    const rows = startTime && endTime
      ? this.selectRowsByWindow(data.rows(resolution), startTime, endTime)
      : data.cheapestBlocks(nBlocks, resolution, contiguous);

    return this.windowSummary({area, day, resolution, priceType, powerKw, rows});
  }

  getBestNextWindow(input: BestNextWindowInput, now: Date = new Date()): BestNextWindowResult {
    const {area, resolution, priceType, nBlocks, contiguous, powerKw, searchScope} = input;
    validateMaxBlocks(resolution, nBlocks);
    this.requireArea(area);
    const settings = this.requirePriceType(area, priceType);

    const dayOrder: DayKey[] = searchScope === "today_or_tomorrow" ? ["today", "tomorrow"] : [searchScope];
    let candidates: PricedRow[] = [];
    let candidateDay: DayKey = "today";
    for (const day of dayOrder) {
      const data = this.coordinator.getDayData(area, day);
      if (!data) {
        continue;
      }
      const futureRows = data
        .pricedRows(resolution)
        .filter((row) => TimeSlot.tryFromIso(row.startTime, row.endTime)?.endsAfter(now) ?? false);
      if (futureRows.length >= nBlocks) {
        candidates = futureRows;
        candidateDay = day;
        break;
      }
    }
    if (!candidates.length) {
      throw new ServiceValidationError("No future priced blocks available for the requested scope.");
    }

    let selected: PricedRow[];
    if (contiguous) {
      const window = cheapestContiguousWindow(candidates, nBlocks, (row) => rowPriceKwh(row, priceType, settings));
      if (!window) {
        throw new ServiceValidationError("No contiguous window found.");
      }
      selected = window;
    } else {
      selected = sortByStartTime(
        this.withPrices(candidates, priceType, settings)
          .sort(byPriceAscending)
          .slice(0, nBlocks)
          .map((item) => item.row),
      );
    }

    const summary = this.windowSummary({area, day: candidateDay, resolution, priceType, powerKw, rows: selected});
    return {...summary, searchScope};
  }

  getExportStrategy(input: ExportStrategyInput): ExportStrategyResult {
    const {area, day, resolution, priceType, chargeBlocks, dischargeBlocks, chargeMode} = input;
    validateMaxBlocks(resolution, chargeBlocks);
    validateMaxBlocks(resolution, dischargeBlocks);
    this.requireArea(area);
    const settings = this.requirePriceType(area, priceType);
    const data = this.requireDayData(area, day);

    const valid = this.withPrices(data.pricedRows(resolution), priceType, settings);
    if (!valid.length) {
      throw new ServiceValidationError("No valid prices available for export strategy.");
    }

    const negatives = valid.filter((item) => item.priceKwh < 0);
    const chargeSource = chargeMode === "lowest" || (chargeMode === "negative_or_lowest" && !negatives.length)
      ? valid
      : negatives;

    const charge = [...chargeSource].sort(byPriceAscending).slice(0, chargeBlocks);
    const discharge = [...valid].sort((a, b) => b.priceKwh - a.priceKwh).slice(0, dischargeBlocks);

    return {
      area,
      day,
      resolution,
      priceType,
      chargeMode,
      chargeBlocks: sortByStartTime(charge.map(toBlock)),
      dischargeBlocks: sortByStartTime(discharge.map(toBlock)),
    };
  }

  getPriceAlerts(input: PriceAlertsInput): PriceAlertsResult {
    const {area, day, resolution, priceType, thresholdKwh, topN, includeNegative} = input;
    validateMaxBlocks(resolution, topN);
    this.requireArea(area);
    const settings = this.requirePriceType(area, priceType);
    const data = this.requireDayData(area, day);

    const valid = this.withPrices(data.pricedRows(resolution), priceType, settings);
    const thresholdMatches = thresholdKwh === undefined ? [] : valid.filter((item) => item.priceKwh < thresholdKwh);
    const negativeMatches = valid.filter((item) => item.priceKwh < 0);
    const topCheapest = [...valid].sort(byPriceAscending).slice(0, topN);

    return {
      area,
      day,
      resolution,
      priceType,
      thresholdKwh: thresholdKwh ?? null,
      thresholdTriggered: thresholdMatches.length > 0,
      negativeTriggered: includeNegative && negativeMatches.length > 0,
      topN,
      topCheapest: topCheapest.map(toBlock),
      thresholdMatches: thresholdMatches.map(toBlock),
      negativeMatches: negativeMatches.map(toBlock),
    };
  }

  private requireArea(area: string): void {
    if (!this.coordinator.hasArea(area)) {
      throw new ServiceValidationError(`Area '${area}' is not configured.`);
    }
  }

  private requireDayData(area: string, day: DayKey): DayPrices {
    const data = this.coordinator.getDayData(area, day);
    if (!data) {
      throw new ServiceValidationError(
        `No price data available for area '${area}' (${day}). Tomorrow's prices are only available after 13:00 CET.`,
      );
    }
    return data;
  }

  private requirePriceType(area: string, priceType: PriceType): ConsumerSettings {
    const settings = this.consumerSettings.get(area);
    if (priceType === "consumer" && !settings.consumerPriceEnabled) {
      throw new ServiceValidationError(`Consumer price is disabled for area '${area}'.`);
    }
    return settings;
  }

  private withPrices(rows: readonly PricedRow[], priceType: PriceType, settings: ConsumerSettings): RowWithPrice[] {
    return rows.flatMap((row) => {
      const priceKwh = rowPriceKwh(row, priceType, settings);
      return priceKwh === null ? [] : [{row, priceKwh}];
    });
  }

  private selectRowsByWindow(rows: readonly PriceRow[], startTime: string, endTime: string): PricedRow[] {
    const window = TimeSlot.tryFromIso(startTime, endTime);
    if (!window) {
      if (Number.isFinite(Date.parse(startTime)) && Number.isFinite(Date.parse(endTime))) {
        throw new ServiceValidationError("startTime must be before endTime");
      }
      throw new ServiceValidationError("startTime and endTime must be ISO 8601 timestamps");
    }
    return rows.filter((row): row is PricedRow => {
      const slot = TimeSlot.tryFromIso(row.startTime, row.endTime);
      return row.value !== null && slot !== null && slot.overlaps(window.start, window.end);
    });
  }

  private windowSummary(params: {
    area: string;
    day: DayKey;
    resolution: Resolution;
    priceType: PriceType;
    powerKw: number;
    rows: readonly PricedRow[];
  }): WindowSummary {
    const {area, day, resolution, priceType, powerKw, rows} = params;
    const settings = this.consumerSettings.get(area);
    const power = Power.fromKilowatts(powerKw);
    const blocks: WindowBlock[] = [];
    let totalEnergy = Energy.zero();
    let totalCost = 0;

    for (const row of rows) {
      const slot = TimeSlot.tryFromIso(row.startTime, row.endTime);
      const priceKwh = rowPriceKwh(row, priceType, settings);
      if (!slot || priceKwh === null) {
        continue;
      }
      const duration = slot.duration;
      const energy = power.forDuration(duration);
      const cost = EnergyPrice.perKilowattHour(priceKwh).costFor(energy);
      totalEnergy = totalEnergy.add(energy);
      totalCost += cost;
      blocks.push({
        startTime: row.startTime,
        endTime: row.endTime,
        durationHours: roundTo(duration.hours, 4),
        priceKwh: roundTo(priceKwh, 6),
        energyKwh: roundTo(energy.kilowattHours, 4),
        cost: roundTo(cost, 4),
      });
    }

    const first = blocks[0];
    const last = blocks[blocks.length - 1];
    if (!first || !last) {
      throw new ServiceValidationError("No valid priced blocks found for the requested window.");
    }

    const totalEnergyKwh = totalEnergy.kilowattHours;
    const averagePriceKwh = totalEnergyKwh > 0 ? totalCost / totalEnergyKwh : 0;
    return {
      area,
      day,
      resolution,
      priceType,
      powerKw,
      currency: this.coordinator.currency,
      totalEnergyKwh: roundTo(totalEnergyKwh, 4),
      totalCost: roundTo(totalCost, 4),
      averagePriceKwh: roundTo(averagePriceKwh, 6),
      windowStart: first.startTime,
      windowEnd: last.endTime,
      blocks,
    };
  }
}
