import { Inject, Injectable } from "@nestjs/common";

import type { ConsumerSettings } from "@dayahead/domain";
import { DEFAULT_CONSUMER_SETTINGS } from "@dayahead/domain";
import type { ConfigDocument, ConsumerOverrides } from "./schemas";
import { RuntimeConfigService } from "./runtime-config.service";

function resolveSettings(overrides: ConsumerOverrides, fallback: ConsumerSettings): ConsumerSettings {
  return {
    enableKwh: overrides.enable_kwh ?? fallback.enableKwh,
    enableHourly: overrides.enable_hourly ?? fallback.enableHourly,
    consumerPriceEnabled: overrides.consumer_price_enabled ?? fallback.consumerPriceEnabled,
    energyTax: overrides.energy_tax ?? fallback.energyTax,
    supplierMarkup: overrides.supplier_markup ?? fallback.supplierMarkup,
    vat: overrides.vat ?? fallback.vat,
  };
}

/**
 * Per-area consumer settings. Each key comes from the area's entry under
 * `consumer_settings`, then from the flat top-level key, then the default.
 */
export function buildConsumerSettings(document: ConfigDocument): Record<string, ConsumerSettings> {
  const flatDefaults = resolveSettings(document, DEFAULT_CONSUMER_SETTINGS);
  const perArea = document.consumer_settings ?? {};
  const result: Record<string, ConsumerSettings> = {};
  for (const area of document.delivery_areas) {
    result[area] = resolveSettings(perArea[area] ?? {}, flatDefaults);
  }
  return result;
}

@Injectable()
export class ConsumerSettingsService {
  private readonly settings: Record<string, ConsumerSettings>;

  constructor(@Inject(RuntimeConfigService) configState: RuntimeConfigService) {
    this.settings = buildConsumerSettings(configState.getDocumentRef());
  }

  get(area: string | null | undefined): ConsumerSettings {
    const configured = area ? this.settings[area] : undefined;
    return configured ? {...configured} : {...DEFAULT_CONSUMER_SETTINGS};
  }

  all(): Record<string, ConsumerSettings> {
    return Object.fromEntries(Object.entries(this.settings).map(([area, value]) => [area, {...value}]));
  }
}
