import { Module } from "@nestjs/common";

import { PriceAnalysisService } from "./analysis/price-analysis.service";
import { ConfigFileService } from "./config/config-file.service";
import { ConsumerSettingsService } from "./config/consumer-settings.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { DiagnosticsService } from "./diagnostics/diagnostics.service";
import { NordpoolClientService } from "./nordpool/nordpool-client.service";
import { PriceCoordinatorService } from "./nordpool/price-coordinator.service";
import { SensorStateService } from "./sensors/sensor-state.service";

@Module({
  providers: [
    ConfigFileService,
    RuntimeConfigService,
    ConsumerSettingsService,
    NordpoolClientService,
    PriceCoordinatorService,
    SensorStateService,
    PriceAnalysisService,
    DiagnosticsService,
  ],
  exports: [
    ConfigFileService,
    RuntimeConfigService,
    ConsumerSettingsService,
    NordpoolClientService,
    PriceCoordinatorService,
    SensorStateService,
    PriceAnalysisService,
    DiagnosticsService,
  ],
})
export class DayAheadServicesModule {}
