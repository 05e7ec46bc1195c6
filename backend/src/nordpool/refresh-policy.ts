import type { DayKey, DayPrices } from "@dayahead/domain";
import {
  cetToday,
  cetTomorrow,
  isAfterPublication,
  secondsUntilMidnight,
  secondsUntilPublication,
} from "@dayahead/domain";

export const POLL_INTERVAL_PENDING_SECONDS = 60;
export const POLL_INTERVAL_IDLE_SECONDS = 3600;

export interface CachedDay {
  data: DayPrices;
  fetchedAt: Date;
  requestUrl: string;
}

export interface AreaCache {
  today?: CachedDay;
  tomorrow?: CachedDay;
}

export type PriceCache = Map<string, AreaCache>;

export interface PlannedFetch {
  area: string;
  day: DayKey;
  date: string;
}

export type RolloverEvent =
  | { kind: "promoted"; area: string; deliveryDate: string }
  | { kind: "discarded"; area: string; deliveryDate: string };

/**
 * Applies the CET day change to the cache. Tomorrow's entry that is already
 * for the new day becomes today's; tomorrow data for any other date is stale
 * and dropped. Today's entry stays until a fetch replaces it.
 */
export function rollOver(cache: PriceCache, areas: readonly string[], now: Date): RolloverEvent[] {
  const today = cetToday(now);
  const tomorrow = cetTomorrow(now);
  const events: RolloverEvent[] = [];
  for (const area of areas) {
    const entry = cache.get(area);
    if (!entry) {
      continue;
    }
    if (entry.today?.data.deliveryDate !== today && entry.tomorrow?.data.deliveryDate === today) {
      entry.today = entry.tomorrow;
      delete entry.tomorrow;
      events.push({kind: "promoted", area, deliveryDate: today});
      continue;
    }
    const staleTomorrow = entry.tomorrow;
    if (staleTomorrow && staleTomorrow.data.deliveryDate !== tomorrow) {
      delete entry.tomorrow;
      events.push({kind: "discarded", area, deliveryDate: staleTomorrow.data.deliveryDate});
    }
  }
  return events;
}

export function planFetches(cache: PriceCache, areas: readonly string[], now: Date): PlannedFetch[] {
  const today = cetToday(now);
  const tomorrow = cetTomorrow(now);
  const afterPublication = isAfterPublication(now);
  const fetches: PlannedFetch[] = [];
  for (const area of areas) {
    const entry = cache.get(area);
    if (entry?.today?.data.deliveryDate !== today) {
      fetches.push({area, day: "today", date: today});
    }
    if (afterPublication && !isFinalFor(entry?.tomorrow, tomorrow)) {
      fetches.push({area, day: "tomorrow", date: tomorrow});
    }
  }
  return fetches;
}

/**
 * Seconds until the next poll.
 *
 * - today's data missing for any area: every minute
 * - before 13:00 CET: hourly, cut short at 13:00 and at midnight
 * - after 13:00 with final tomorrow data everywhere: hourly, cut short at midnight
 * - after 13:00 otherwise: every minute
 */
export function nextPollSeconds(cache: PriceCache, areas: readonly string[], now: Date): number {
  const today = cetToday(now);
  const tomorrow = cetTomorrow(now);

  const todayPending = areas.some((area) => cache.get(area)?.today?.data.deliveryDate !== today);
  if (todayPending) {
    return POLL_INTERVAL_PENDING_SECONDS;
  }

  const untilMidnight = secondsUntilMidnight(now);
  if (!isAfterPublication(now)) {
    let interval = POLL_INTERVAL_IDLE_SECONDS;
    const untilPublication = secondsUntilPublication(now);
    if (untilPublication > 0 && untilPublication < interval) {
      interval = untilPublication;
    }
    if (untilMidnight > 0 && untilMidnight < interval) {
      interval = untilMidnight;
    }
    return Math.max(POLL_INTERVAL_PENDING_SECONDS, interval);
  }

  const allFinal = areas.every((area) => isFinalFor(cache.get(area)?.tomorrow, tomorrow));
  if (!allFinal) {
    return POLL_INTERVAL_PENDING_SECONDS;
  }
  if (untilMidnight > 0 && untilMidnight < POLL_INTERVAL_IDLE_SECONDS) {
    return Math.max(POLL_INTERVAL_PENDING_SECONDS, untilMidnight);
  }
  return POLL_INTERVAL_IDLE_SECONDS;
}

function isFinalFor(entry: CachedDay | undefined, date: string): boolean {
  return entry !== undefined && entry.data.deliveryDate === date && entry.data.isFinal;
}
