import { Inject, Injectable } from "@nestjs/common";

import type { ConsumerSettings } from "@dayahead/domain";
import { ConsumerSettingsService } from "../config/consumer-settings.service";
import type { CoordinatorSnapshot } from "../nordpool/price-coordinator.service";
import { PriceCoordinatorService } from "../nordpool/price-coordinator.service";

export interface Diagnostics {
  generatedAt: string;
  config: {
    deliveryAreas: string[];
    currency: string;
    consumerSettings: Record<string, ConsumerSettings>;
  };
  coordinator: CoordinatorSnapshot;
}

@Injectable()
export class DiagnosticsService {
  constructor(
    @Inject(PriceCoordinatorService) private readonly coordinator: PriceCoordinatorService,
    @Inject(ConsumerSettingsService) private readonly consumerSettings: ConsumerSettingsService,
  ) {
  }

  getDiagnostics(now: Date = new Date()): Diagnostics {
    return {
      generatedAt: now.toISOString(),
      config: {
        deliveryAreas: this.coordinator.deliveryAreas,
        currency: this.coordinator.currency,
        consumerSettings: this.consumerSettings.all(),
      },
      coordinator: this.coordinator.getDiagnosticsSnapshot(),
    };
  }
}
