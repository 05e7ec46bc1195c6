export const DELIVERY_AREAS = {
  Baltic: ["EE", "LT", "LV"],
  CWE: ["AT", "BE", "FR", "GER", "NL", "PL"],
  Nordic: ["DK1", "DK2", "FI", "NO1", "NO2", "NO3", "NO4", "NO5", "SE1", "SE2", "SE3", "SE4"],
  SEE: ["BG", "TEL"],
} as const;

export type DeliveryAreaGroup = keyof typeof DELIVERY_AREAS;
export type DeliveryArea = (typeof DELIVERY_AREAS)[DeliveryAreaGroup][number];

export const ALL_DELIVERY_AREAS: readonly DeliveryArea[] = Object.values(DELIVERY_AREAS).flat();

export const DELIVERY_AREA_LABELS: Record<DeliveryArea, string> = {
  EE: "Estonia",
  LT: "Lithuania",
  LV: "Latvia",
  AT: "Austria",
  BE: "Belgium",
  FR: "France",
  GER: "Germany",
  NL: "Netherlands",
  PL: "Poland",
  DK1: "Denmark 1",
  DK2: "Denmark 2",
  FI: "Finland",
  NO1: "Norway 1",
  NO2: "Norway 2",
  NO3: "Norway 3",
  NO4: "Norway 4",
  NO5: "Norway 5",
  SE1: "Sweden 1",
  SE2: "Sweden 2",
  SE3: "Sweden 3",
  SE4: "Sweden 4",
  BG: "Bulgaria",
  TEL: "TEL",
};

export const CURRENCIES = ["BGN", "DKK", "EUR", "NOK", "PLN", "RON", "SEK"] as const;
export type Currency = (typeof CURRENCIES)[number];
export const DEFAULT_CURRENCY: Currency = "EUR";

export function isDeliveryArea(value: string): value is DeliveryArea {
  return ALL_DELIVERY_AREAS.some((area) => area === value);
}

export function isCurrency(value: string): value is Currency {
  return CURRENCIES.some((currency) => currency === value);
}

export function deliveryAreaLabel(area: string): string {
  return isDeliveryArea(area) ? DELIVERY_AREA_LABELS[area] : area;
}

export function currencyUnitPrefix(currency: string): string {
  return currency.toUpperCase() === "EUR" ? "€" : currency;
}
