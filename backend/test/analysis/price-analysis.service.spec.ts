import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ServiceValidationError } from "@dayahead/domain";
import {
  bestNextWindowInputSchema,
  cheapestBlocksInputSchema,
  exportStrategyInputSchema,
  forecastDeviceCostInputSchema,
  priceAlertsInputSchema,
} from "../../src/analysis/inputs";
import { PriceAnalysisService, validateMaxBlocks } from "../../src/analysis/price-analysis.service";
import { ConsumerSettingsService } from "../../src/config/consumer-settings.service";
import { clearRuntimeConfig, setRuntimeConfig } from "../../src/config/runtime-config";
import { RuntimeConfigService } from "../../src/config/runtime-config.service";
import { parseConfigDocument } from "../../src/config/schemas";
import { PriceCoordinatorService } from "../../src/nordpool/price-coordinator.service";
import { buildDayPrices, FakePriceSource, quarterStart, quartersFromHourly } from "../support/payloads";

const TODAY = "2025-01-15";
const HOURLY = [50, 40, 30, -10, -20, 10, 60, 80, 100, 120, 110, 90, 70, 60, 50, 40, 80, 150, 200, 180, 120, 90, 70, 60];

function hourStart(hour: number): string {
  return quarterStart(TODAY, hour * 4);
}

describe("validateMaxBlocks", () => {
  it("limits the block count per resolution", () => {
    expect(() => validateMaxBlocks("quarter", 96)).not.toThrow();
    expect(() => validateMaxBlocks("hour", 25)).toThrow(
      new ServiceValidationError("n_blocks=25 is too high for resolution 'hour'. Maximum is 24."),
    );
  });
});

describe("PriceAnalysisService", () => {
  let coordinator: PriceCoordinatorService;
  let analysis: PriceAnalysisService;

  beforeEach(async () => {
    setRuntimeConfig(
      parseConfigDocument({
        delivery_areas: ["NL", "SE3"],
        consumer_settings: {SE3: {consumer_price_enabled: false}},
      }),
    );
    const runtime = new RuntimeConfigService();
    const source = new FakePriceSource();
    source.publish(buildDayPrices({deliveryDate: TODAY, prices: {NL: quartersFromHourly(HOURLY)}}));
    coordinator = new PriceCoordinatorService(runtime, source);
    analysis = new PriceAnalysisService(coordinator, new ConsumerSettingsService(runtime));
    await coordinator.refresh(new Date("2025-01-15T03:00:00Z"));
  });

  afterEach(() => {
    coordinator.stop();
    clearRuntimeConfig();
  });

  describe("getCheapestBlocks", () => {
    it("returns the cheapest contiguous hours", () => {
      const result = analysis.getCheapestBlocks(
        cheapestBlocksInputSchema.parse({area: "nl", resolution: "hour", nBlocks: 2}),
      );

      expect(result).toEqual({
        area: "NL",
        day: "today",
        resolution: "hour",
        priceType: "market",
        contiguous: true,
        nBlocks: 2,
        totalDurationMinutes: 120,
        averagePriceKwh: -0.015,
        status: "Final",
        deliveryDate: TODAY,
        blocks: [
          {startTime: hourStart(3), endTime: hourStart(4), priceKwh: -0.01},
          {startTime: hourStart(4), endTime: hourStart(5), priceKwh: -0.02},
        ],
      });
    });

    it("returns the cheapest quarters in time order when not contiguous", () => {
      const result = analysis.getCheapestBlocks(
        cheapestBlocksInputSchema.parse({area: "NL", nBlocks: 6, contiguous: false}),
      );

      expect(result.totalDurationMinutes).toBe(90);
      expect(result.blocks.map((block) => block.priceKwh)).toEqual([-0.01, -0.01, -0.02, -0.02, -0.02, -0.02]);
      expect(result.blocks[0]?.startTime).toBe(quarterStart(TODAY, 12));
    });

    it("rejects areas that are not configured", () => {
      expect(() => analysis.getCheapestBlocks(cheapestBlocksInputSchema.parse({area: "DK1"}))).toThrow(
        new ServiceValidationError("Area 'DK1' is not configured."),
      );
    });

    it("rejects a day without data", () => {
      expect(() => analysis.getCheapestBlocks(cheapestBlocksInputSchema.parse({area: "NL", day: "tomorrow"}))).toThrow(
        new ServiceValidationError(
          "No price data available for area 'NL' (tomorrow). Tomorrow's prices are only available after 13:00 CET.",
        ),
      );
    });

    it("rejects consumer prices where they are disabled", () => {
      expect(() =>
        analysis.getCheapestBlocks(cheapestBlocksInputSchema.parse({area: "SE3", priceType: "consumer"})),
      ).toThrow(new ServiceValidationError("Consumer price is disabled for area 'SE3'."));
    });
  });

  describe("forecastDeviceCost", () => {
    it("prices the rows overlapping an explicit window", () => {
      const result = analysis.forecastDeviceCost(
        forecastDeviceCostInputSchema.parse({
          area: "NL",
          powerKw: 2,
          resolution: "hour",
          startTime: hourStart(3),
          endTime: hourStart(5),
        }),
      );

      expect(result).toMatchObject({
        currency: "EUR",
        powerKw: 2,
        totalEnergyKwh: 4,
        totalCost: -0.06,
        averagePriceKwh: -0.015,
        windowStart: hourStart(3),
        windowEnd: hourStart(5),
      });
      expect(result.blocks).toEqual([
        {startTime: hourStart(3), endTime: hourStart(4), durationHours: 1, priceKwh: -0.01, energyKwh: 2, cost: -0.02},
        {startTime: hourStart(4), endTime: hourStart(5), durationHours: 1, priceKwh: -0.02, energyKwh: 2, cost: -0.04},
      ]);
    });

    it("includes quarters that only partly overlap the window", () => {
      const result = analysis.forecastDeviceCost(
        forecastDeviceCostInputSchema.parse({
          area: "NL",
          powerKw: 1,
          startTime: "2025-01-14T23:10:00Z",
          endTime: "2025-01-14T23:20:00Z",
        }),
      );

      expect(result.blocks.map((block) => block.startTime)).toEqual([quarterStart(TODAY, 0), quarterStart(TODAY, 1)]);
      expect(result.totalEnergyKwh).toBe(0.5);
      expect(result.totalCost).toBe(0.025);
    });

    it("falls back to the cheapest blocks without a window", () => {
      const result = analysis.forecastDeviceCost(
        forecastDeviceCostInputSchema.parse({area: "NL", powerKw: 1, resolution: "hour", nBlocks: 2}),
      );

      expect(result.windowStart).toBe(hourStart(3));
      expect(result.windowEnd).toBe(hourStart(5));
      expect(result.totalCost).toBe(-0.03);
    });

    it("requires both window bounds", () => {
      expect(() =>
        analysis.forecastDeviceCost(
          forecastDeviceCostInputSchema.parse({area: "NL", powerKw: 1, startTime: hourStart(3)}),
        ),
      ).toThrow(new ServiceValidationError("Provide both startTime and endTime, or neither."));
    });

    it("requires the window to start before it ends", () => {
      expect(() =>
        analysis.forecastDeviceCost(
          forecastDeviceCostInputSchema.parse({area: "NL", powerKw: 1, startTime: hourStart(5), endTime: hourStart(3)}),
        ),
      ).toThrow(new ServiceValidationError("startTime must be before endTime"));
    });

    it("fails for a window outside the day", () => {
      expect(() =>
        analysis.forecastDeviceCost(
          forecastDeviceCostInputSchema.parse({
            area: "NL",
            powerKw: 1,
            startTime: "2025-02-01T00:00:00Z",
            endTime: "2025-02-01T01:00:00Z",
          }),
        ),
      ).toThrow(new ServiceValidationError("No valid priced blocks found for the requested window."));
    });
  });

  describe("getBestNextWindow", () => {
    it("only considers rows that have not ended yet", () => {
      const result = analysis.getBestNextWindow(
        bestNextWindowInputSchema.parse({area: "NL", resolution: "hour", nBlocks: 2}),
        new Date("2025-01-15T03:30:00Z"),
      );

      expect(result.searchScope).toBe("today_or_tomorrow");
      expect(result.day).toBe("today");
      expect(result.windowStart).toBe(hourStart(4));
      expect(result.windowEnd).toBe(hourStart(6));
      expect(result.totalEnergyKwh).toBe(2);
      expect(result.totalCost).toBe(-0.01);
      expect(result.averagePriceKwh).toBe(-0.005);
    });

    it("picks the cheapest future rows when not contiguous", () => {
      const result = analysis.getBestNextWindow(
        bestNextWindowInputSchema.parse({area: "NL", resolution: "hour", nBlocks: 2, contiguous: false}),
        new Date("2025-01-15T05:00:00Z"),
      );

      expect(result.blocks.map((block) => block.startTime)).toEqual([hourStart(14), hourStart(15)]);
    });

    it("fails when the scope has no data", () => {
      expect(() =>
        analysis.getBestNextWindow(
          bestNextWindowInputSchema.parse({area: "NL", searchScope: "tomorrow"}),
          new Date("2025-01-15T03:30:00Z"),
        ),
      ).toThrow(new ServiceValidationError("No future priced blocks available for the requested scope."));
    });
  });

  describe("getExportStrategy", () => {
    it("charges on negative prices and discharges on the highest", () => {
      const result = analysis.getExportStrategy(
        exportStrategyInputSchema.parse({area: "NL", resolution: "hour", chargeBlocks: 3, dischargeBlocks: 2}),
      );

      expect(result.chargeMode).toBe("negative_or_lowest");
      expect(result.chargeBlocks).toEqual([
        {startTime: hourStart(3), endTime: hourStart(4), priceKwh: -0.01},
        {startTime: hourStart(4), endTime: hourStart(5), priceKwh: -0.02},
      ]);
      expect(result.dischargeBlocks).toEqual([
        {startTime: hourStart(18), endTime: hourStart(19), priceKwh: 0.2},
        {startTime: hourStart(19), endTime: hourStart(20), priceKwh: 0.18},
      ]);
    });

    it("charges on the lowest prices regardless of sign", () => {
      const result = analysis.getExportStrategy(
        exportStrategyInputSchema.parse({area: "NL", resolution: "hour", chargeBlocks: 3, chargeMode: "lowest"}),
      );

      expect(result.chargeBlocks.map((block) => block.startTime)).toEqual([hourStart(3), hourStart(4), hourStart(5)]);
    });
  });

  describe("getPriceAlerts", () => {
    it("reports threshold, negative and cheapest matches", () => {
      const result = analysis.getPriceAlerts(priceAlertsInputSchema.parse({area: "NL", thresholdKwh: 0.035}));

      expect(result.resolution).toBe("hour");
      expect(result.thresholdTriggered).toBe(true);
      expect(result.negativeTriggered).toBe(true);
      expect(result.thresholdMatches.map((block) => block.startTime)).toEqual([
        hourStart(2),
        hourStart(3),
        hourStart(4),
        hourStart(5),
      ]);
      expect(result.negativeMatches.map((block) => block.priceKwh)).toEqual([-0.01, -0.02]);
      expect(result.topCheapest.map((block) => block.priceKwh)).toEqual([-0.02, -0.01, 0.01]);
    });

    it("suppresses the negative trigger on request", () => {
      const result = analysis.getPriceAlerts(priceAlertsInputSchema.parse({area: "NL", includeNegative: false}));

      expect(result.thresholdKwh).toBeNull();
      expect(result.thresholdTriggered).toBe(false);
      expect(result.thresholdMatches).toEqual([]);
      expect(result.negativeTriggered).toBe(false);
      expect(result.negativeMatches).toHaveLength(2);
    });
  });

  it("returns enriched rows for a day", () => {
    const result = analysis.getDayPrices("NL", "today", "hour");

    expect(result.rows).toHaveLength(24);
    expect(result.rows[4]).toEqual({
      startTime: hourStart(4),
      endTime: hourStart(5),
      marketMwh: -20,
      marketKwh: -0.02,
      consumerKwh: 0.106648,
    });
  });
});
