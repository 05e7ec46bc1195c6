import { z } from "zod";

import { CURRENCIES, DEFAULT_CURRENCY, isDeliveryArea } from "@dayahead/domain";

const consumerOverridesSchema = z.object({
  enable_kwh: z.boolean().optional(),
  enable_hourly: z.boolean().optional(),
  consumer_price_enabled: z.boolean().optional(),
  energy_tax: z.number().finite().optional(),
  supplier_markup: z.number().finite().optional(),
  vat: z.number().finite().min(0, "vat must be a non-negative fraction").optional(),
});

const areaCodeSchema = z.string().trim().min(1).toUpperCase();

const deliveryAreasSchema = z
  .array(areaCodeSchema)
  .min(1, "delivery_areas must list at least one area")
  .superRefine((areas, ctx) => {
    for (const area of areas) {
      if (!isDeliveryArea(area)) {
        ctx.addIssue({code: z.ZodIssueCode.custom, message: `Unknown delivery area '${area}'`});
      }
    }
  })
  .transform((areas) => [...new Set(areas)]);

const apiSchema = z.object({
  base_url: z.string().url().optional(),
  timeout_ms: z.number().int().positive().optional(),
});

const loggingSchema = z.object({
  level: z.string().optional(),
});

export const configDocumentSchema = consumerOverridesSchema.extend({
  delivery_areas: deliveryAreasSchema.default(["NL"]),
  currency: z.string().trim().toUpperCase().pipe(z.enum(CURRENCIES)).default(DEFAULT_CURRENCY),
  consumer_settings: z.record(areaCodeSchema, consumerOverridesSchema).optional(),
  api: apiSchema.optional(),
  logging: loggingSchema.optional(),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type ConfigDocumentInput = z.input<typeof configDocumentSchema>;
export type ConsumerOverrides = z.infer<typeof consumerOverridesSchema>;
export type ApiConfig = z.infer<typeof apiSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}
