import type { ConsumerSettings, DayKey, PriceType, PriceUnit, Resolution } from "@dayahead/domain";

export const SENSOR_ID_PREFIX = "nordpool_";
export const DAYS: readonly DayKey[] = ["today", "tomorrow"];
export const STATS = ["min", "max", "average"] as const;
export type StatKind = (typeof STATS)[number];

export interface PriceVariant {
  priceType: PriceType;
  unit: PriceUnit;
  resolution: Resolution;
}

interface SensorBase {
  uniqueId: string;
  area: string;
  enabledByDefault: boolean;
}

export interface CurrentPriceSensor extends SensorBase, PriceVariant {
  kind: "current_price";
  day: DayKey;
}

export interface StatisticSensor extends SensorBase, PriceVariant {
  kind: "statistic";
  day: DayKey;
  stat: StatKind;
}

export interface ApiLastFetchSensor extends SensorBase {
  kind: "api_last_fetch";
  day: DayKey;
}

export interface TomorrowFinalSensor extends SensorBase {
  kind: "tomorrow_final";
}

export type SensorDefinition = CurrentPriceSensor | StatisticSensor | ApiLastFetchSensor | TomorrowFinalSensor;

function priceTypes(settings: ConsumerSettings): PriceType[] {
  return settings.consumerPriceEnabled ? ["market", "consumer"] : ["market"];
}

// Consumer prices only exist per kWh.
function unitsFor(priceType: PriceType, settings: ConsumerSettings): PriceUnit[] {
  if (priceType === "consumer") {
    return ["kwh"];
  }
  return settings.enableKwh ? ["mwh", "kwh"] : ["mwh"];
}

function resolutions(settings: ConsumerSettings): Resolution[] {
  return settings.enableHourly ? ["quarter", "hour"] : ["quarter"];
}

export function priceVariants(settings: ConsumerSettings): PriceVariant[] {
  const variants: PriceVariant[] = [];
  for (const priceType of priceTypes(settings)) {
    for (const unit of unitsFor(priceType, settings)) {
      for (const resolution of resolutions(settings)) {
        variants.push({priceType, unit, resolution});
      }
    }
  }
  return variants;
}

export function currentPriceSensorId(area: string, day: DayKey, variant: PriceVariant): string {
  return `${SENSOR_ID_PREFIX}${area}_${day}_${variant.priceType}_${variant.unit}_${variant.resolution}`;
}

export function buildSensorCatalog(
  areas: readonly string[],
  settingsFor: (area: string) => ConsumerSettings,
): SensorDefinition[] {
  const sensors: SensorDefinition[] = [];
  for (const area of areas) {
    const settings = settingsFor(area);
    sensors.push({
      kind: "tomorrow_final",
      uniqueId: `${SENSOR_ID_PREFIX}${area}_tomorrow_final`,
      area,
      enabledByDefault: true,
    });

    for (const day of DAYS) {
      sensors.push({
        kind: "api_last_fetch",
        uniqueId: `${SENSOR_ID_PREFIX}${area}_${day}_api_last_fetch`,
        area,
        day,
        enabledByDefault: false,
      });

      for (const variant of priceVariants(settings)) {
        sensors.push({
          kind: "current_price",
          uniqueId: currentPriceSensorId(area, day, variant),
          area,
          day,
          ...variant,
          enabledByDefault: true,
        });
      }

      // Averages are only published per quarter.
      for (const stat of STATS) {
        const statResolutions: Resolution[] = stat === "average" ? ["quarter"] : resolutions(settings);
        for (const resolution of statResolutions) {
          for (const priceType of priceTypes(settings)) {
            for (const unit of unitsFor(priceType, settings)) {
              const variant = {priceType, unit, resolution};
              sensors.push({
                kind: "statistic",
                uniqueId: `${currentPriceSensorId(area, day, variant)}_${stat}`,
                area,
                day,
                stat,
                ...variant,
                enabledByDefault: false,
              });
            }
          }
        }
      }
    }
  }
  return sensors;
}

/** Area code embedded in a sensor id such as `nordpool_NL_today_market_mwh_quarter`. */
export function areaFromSensorId(uniqueId: string | null | undefined): string | null {
  if (!uniqueId?.startsWith(SENSOR_ID_PREFIX)) {
    return null;
  }
  const rest = uniqueId.slice(SENSOR_ID_PREFIX.length);
  const separator = rest.indexOf("_");
  if (separator <= 0) {
    return null;
  }
  return rest.slice(0, separator);
}
