import { DateTime } from "luxon";

/** Nord Pool publishes and delivers on the CET/CEST calendar. */
export const MARKET_TIME_ZONE = "Europe/Amsterdam";

/** Local hour at which tomorrow's auction results become available. */
export const TOMORROW_PRICES_HOUR_CET = 13;

const QUARTER_MS = 15 * 60_000;
const HOUR_MS = 3_600_000;

export function toMarketTime(now: Date): DateTime {
  return DateTime.fromJSDate(now, {zone: MARKET_TIME_ZONE});
}

function formatDate(value: DateTime): string {
  return value.toFormat("yyyy-MM-dd");
}

export function cetToday(now: Date): string {
  return formatDate(toMarketTime(now));
}

export function cetTomorrow(now: Date): string {
  return formatDate(toMarketTime(now).plus({days: 1}));
}

export function isAfterPublication(now: Date): boolean {
  return toMarketTime(now).hour >= TOMORROW_PRICES_HOUR_CET;
}

export function secondsUntilPublication(now: Date): number {
  const local = toMarketTime(now);
  const target = local.set({hour: TOMORROW_PRICES_HOUR_CET, minute: 0, second: 0, millisecond: 0});
  if (local.toMillis() >= target.toMillis()) {
    return 0;
  }
  return Math.max(0, Math.floor(target.diff(local, "seconds").seconds));
}

export function secondsUntilMidnight(now: Date): number {
  const local = toMarketTime(now);
  const nextMidnight = local.plus({days: 1}).startOf("day");
  return Math.max(0, Math.floor(nextMidnight.diff(local, "seconds").seconds));
}

/** Next :00, :15, :30 or :45 mark strictly after `now`. */
export function nextQuarterBoundary(now: Date): Date {
  return new Date((Math.floor(now.getTime() / QUARTER_MS) + 1) * QUARTER_MS);
}

export function nextHourBoundary(now: Date): Date {
  return new Date((Math.floor(now.getTime() / HOUR_MS) + 1) * HOUR_MS);
}

export function sameLocalTimeTomorrow(now: Date): Date {
  return toMarketTime(now).plus({days: 1}).toJSDate();
}
