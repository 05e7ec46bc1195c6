import { z } from "zod";

// Only the fields the service reads; the API adds more over time.
const areaStateSchema = z.object({
  state: z.string().default("Preliminary"),
  areas: z.array(z.string()).default([]),
});

const multiAreaEntrySchema = z.object({
  deliveryStart: z.string(),
  deliveryEnd: z.string(),
  entryPerArea: z.record(z.number().nullable()).default({}),
});

const areaAggregateSchema = z.object({
  average: z.number().nullable().optional(),
  min: z.number().nullable().optional(),
  max: z.number().nullable().optional(),
});

const blockPriceAggregateSchema = z.object({
  blockName: z.string(),
  deliveryStart: z.string(),
  deliveryEnd: z.string(),
  averagePricePerArea: z.record(areaAggregateSchema.nullable()).default({}),
});

export const dayAheadPayloadSchema = z.object({
  deliveryDateCET: z.string().default(""),
  currency: z.string().default("EUR"),
  updatedAt: z.string().nullable().optional(),
  version: z.number().nullable().optional(),
  areaStates: z.array(areaStateSchema).default([]),
  multiAreaEntries: z.array(multiAreaEntrySchema).default([]),
  blockPriceAggregates: z.array(blockPriceAggregateSchema).default([]),
});

export type DayAheadPayload = z.infer<typeof dayAheadPayloadSchema>;
export type MultiAreaEntry = z.infer<typeof multiAreaEntrySchema>;
export type BlockPriceAggregate = z.infer<typeof blockPriceAggregateSchema>;

export function parseDayAheadPayload(raw: unknown): DayAheadPayload {
  return dayAheadPayloadSchema.parse(raw);
}
