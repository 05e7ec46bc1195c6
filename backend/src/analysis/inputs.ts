import { z } from "zod";

const area = z.string().trim().min(1).toUpperCase();
const day = z.enum(["today", "tomorrow"]).default("today");
const resolution = z.enum(["quarter", "hour"]);
const priceType = z.enum(["market", "consumer"]).default("market");
const blockCount = z.coerce.number().int().min(1).max(96);
const powerKw = z.coerce.number().min(0.01);

export const cheapestBlocksInputSchema = z.object({
  area,
  day,
  resolution: resolution.default("quarter"),
  priceType,
  nBlocks: blockCount.default(4),
  contiguous: z.boolean().default(true),
});

export const forecastDeviceCostInputSchema = z.object({
  area,
  powerKw,
  day,
  resolution: resolution.default("quarter"),
  priceType,
  nBlocks: blockCount.default(4),
  contiguous: z.boolean().default(true),
  startTime: z.string().optional(),
  endTime: z.string().optional(),
});

export const bestNextWindowInputSchema = z.object({
  area,
  resolution: resolution.default("quarter"),
  priceType,
  nBlocks: blockCount.default(4),
  contiguous: z.boolean().default(true),
  powerKw: powerKw.default(1),
  searchScope: z.enum(["today", "tomorrow", "today_or_tomorrow"]).default("today_or_tomorrow"),
});

export const exportStrategyInputSchema = z.object({
  area,
  day,
  resolution: resolution.default("quarter"),
  priceType,
  chargeBlocks: blockCount.default(4),
  dischargeBlocks: blockCount.default(4),
  chargeMode: z.enum(["negative_only", "negative_or_lowest", "lowest"]).default("negative_or_lowest"),
});

export const priceAlertsInputSchema = z.object({
  area,
  day,
  resolution: resolution.default("hour"),
  priceType,
  thresholdKwh: z.coerce.number().optional(),
  topN: z.coerce.number().int().min(1).max(24).default(3),
  includeNegative: z.boolean().default(true),
});

export type CheapestBlocksInput = z.infer<typeof cheapestBlocksInputSchema>;
export type ForecastDeviceCostInput = z.infer<typeof forecastDeviceCostInputSchema>;
export type BestNextWindowInput = z.infer<typeof bestNextWindowInputSchema>;
export type ExportStrategyInput = z.infer<typeof exportStrategyInputSchema>;
export type PriceAlertsInput = z.infer<typeof priceAlertsInputSchema>;
export type SearchScope = BestNextWindowInput["searchScope"];
export type ChargeMode = ExportStrategyInput["chargeMode"];
