import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import type { DayKey, DayPrices } from "@dayahead/domain";
import { describeError, UpdateFailedError } from "@dayahead/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import type { DayAheadPriceSource, FetchOutcome } from "./nordpool-client.service";
import { NordpoolClientService } from "./nordpool-client.service";
import type { CachedDay, PlannedFetch, PriceCache, RolloverEvent } from "./refresh-policy";
import { nextPollSeconds, planFetches, POLL_INTERVAL_PENDING_SECONDS, rollOver } from "./refresh-policy";

export interface FetchReport {
  area: string;
  day: DayKey;
  date: string;
  outcome: FetchOutcome["kind"];
}

export interface RefreshSummary {
  startedAt: string;
  rollover: RolloverEvent[];
  fetches: FetchReport[];
  nextPollSeconds: number;
}

export interface DaySnapshot {
  deliveryDate: string;
  status: string;
  quarterCount: number;
  hourCount: number;
  blockCount: number;
  lastFetch: string;
  requestUrl: string;
}

export interface CoordinatorSnapshot {
  deliveryAreas: string[];
  currency: string;
  updateIntervalSeconds: number;
  hasSuccessfulFetch: boolean;
  lastRefresh: RefreshSummary | null;
  lastRefreshError: string | null;
  areas: Record<string, { today: DaySnapshot | null; tomorrow: DaySnapshot | null; lastRequestUrl: Record<DayKey, string | null> }>;
}

/**
 * Owns the price cache. A self-rescheduling timer refreshes today's and
 * tomorrow's prices for every configured area with a cadence derived from
 * the CET calendar and the state of the cache.
 */
@Injectable()
export class PriceCoordinatorService implements OnModuleDestroy {
  private readonly logger = new Logger(PriceCoordinatorService.name);
  private readonly cache: PriceCache = new Map();
  private readonly lastRequestUrls = new Map<string, string>();
  private readonly areas: string[];
  private readonly marketCurrency: string;
  private schedulerTimer: ReturnType<typeof setTimeout> | null = null;
  private runInProgress = false;
  private inFlight: Promise<RefreshSummary> | null = null;
  private destroyed = false;
  private hasSuccessfulFetch = false;
  private intervalSeconds = POLL_INTERVAL_PENDING_SECONDS;
  private lastRefresh: RefreshSummary | null = null;
  private lastRefreshError: string | null = null;

  constructor(
    @Inject(RuntimeConfigService) configState: RuntimeConfigService,
    @Inject(NordpoolClientService) private readonly source: DayAheadPriceSource,
  ) {
    this.areas = configState.deliveryAreas;
    this.marketCurrency = configState.currency;
  }

  get deliveryAreas(): string[] {
    return [...this.areas];
  }

  get currency(): string {
    return this.marketCurrency;
  }

  get updateIntervalSeconds(): number {
    return this.intervalSeconds;
  }

  get lastRefreshSucceeded(): boolean {
    return this.lastRefreshError === null && this.lastRefresh !== null;
  }

  hasArea(area: string): boolean {
    return this.areas.includes(area);
  }

  getToday(area: string): DayPrices | null {
    return this.getDayData(area, "today");
  }

  getTomorrow(area: string): DayPrices | null {
    return this.getDayData(area, "tomorrow");
  }

  getDayData(area: string, day: DayKey): DayPrices | null {
    return this.cache.get(area)?.[day]?.data ?? null;
  }

  getLastFetch(area: string, day: DayKey): Date | null {
    return this.cache.get(area)?.[day]?.fetchedAt ?? null;
  }

  getLastRequestUrl(area: string, day: DayKey): string | null {
    return this.lastRequestUrls.get(`${area}/${day}`) ?? this.cache.get(area)?.[day]?.requestUrl ?? null;
  }

  /**
   * Runs one refresh cycle. Fetch failures for single areas are logged and
   * left for the next cycle; the call only fails while no fetch has ever
   * succeeded. A call made while a cycle is running joins that cycle.
   */
  refresh(now: Date = new Date()): Promise<RefreshSummary> {
    if (this.inFlight) {
      this.logger.debug("Refresh already running; joining it.");
      return this.inFlight;
    }
    const run = this.runRefresh(now).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async runRefresh(now: Date): Promise<RefreshSummary> {
    const rollover = rollOver(this.cache, this.areas, now);
    for (const event of rollover) {
      if (event.kind === "promoted") {
        const promotedUrl = this.cache.get(event.area)?.today?.requestUrl;
        if (promotedUrl) {
          this.lastRequestUrls.set(`${event.area}/today`, promotedUrl);
        }
        this.lastRequestUrls.delete(`${event.area}/tomorrow`);
        this.logger.log(`Day rolled over for ${event.area}; promoted cached prices for ${event.deliveryDate}`);
      } else {
        this.logger.debug(`Day rolled over for ${event.area}; discarded stale prices for ${event.deliveryDate}`);
      }
    }

    const planned = planFetches(this.cache, this.areas, now);
    const fetches: FetchReport[] = await Promise.all(
      planned.map(async (fetch) => ({...fetch, outcome: await this.fetchAndStore(fetch, now)})),
    );

    if (!this.hasSuccessfulFetch) {
      this.intervalSeconds = POLL_INTERVAL_PENDING_SECONDS;
      const error = new UpdateFailedError("No Nord Pool data fetched yet; retrying on next update cycle");
      this.lastRefreshError = error.message;
      throw error;
    }

    this.intervalSeconds = nextPollSeconds(this.cache, this.areas, now);
    this.logger.debug(`Next poll interval: ${this.intervalSeconds}s`);
    const summary: RefreshSummary = {
      startedAt: now.toISOString(),
      rollover,
      fetches,
      nextPollSeconds: this.intervalSeconds,
    };
    this.lastRefresh = summary;
    this.lastRefreshError = null;
    return summary;
  }

  /** Initial refresh at start-up; keeps polling even when it fails. */
  async firstRefresh(): Promise<void> {
    await this.runScheduled();
  }

  stop(): void {
    if (this.schedulerTimer) {
      clearTimeout(this.schedulerTimer);
      this.schedulerTimer = null;
    }
  }

  onModuleDestroy(): void {
    this.destroyed = true;
    this.stop();
  }

  getDiagnosticsSnapshot(): CoordinatorSnapshot {
    const areas: CoordinatorSnapshot["areas"] = {};
    for (const area of this.areas) {
      const entry = this.cache.get(area);
      areas[area] = {
        today: snapshotDay(entry?.today),
        tomorrow: snapshotDay(entry?.tomorrow),
        lastRequestUrl: {
          today: this.getLastRequestUrl(area, "today"),
          tomorrow: this.getLastRequestUrl(area, "tomorrow"),
        },
      };
    }
    return {
      deliveryAreas: this.deliveryAreas,
      currency: this.marketCurrency,
      updateIntervalSeconds: this.intervalSeconds,
      hasSuccessfulFetch: this.hasSuccessfulFetch,
      lastRefresh: this.lastRefresh,
      lastRefreshError: this.lastRefreshError,
      areas,
    };
  }

  private async runScheduled(): Promise<void> {
    if (this.runInProgress) {
      this.logger.warn("Refresh already running; skipping new request.");
      return;
    }
    this.runInProgress = true;
    try {
      await this.refresh();
    } catch (error) {
      this.lastRefreshError = describeError(error);
      if (error instanceof UpdateFailedError) {
        this.logger.warn(`Price data not ready: ${error.message}`);
      } else {
        this.logger.error(`Price refresh failed: ${describeError(error)}`);
      }
    } finally {
      this.runInProgress = false;
      this.scheduleNextRun();
    }
  }

  private scheduleNextRun(): void {
    this.stop();
    if (this.destroyed) {
      return;
    }
    const delayMs = Math.max(1, this.intervalSeconds) * 1000;
    this.schedulerTimer = setTimeout(() => {
      this.runScheduled().catch((error) => this.logger.error(`Scheduled refresh failed: ${describeError(error)}`));
    }, delayMs);
    this.logger.log(`Next price refresh scheduled in ${(delayMs / 60000).toFixed(2)} minutes`);
  }

  private async fetchAndStore(fetch: PlannedFetch, now: Date): Promise<FetchOutcome["kind"]> {
    const outcome = await this.source.fetchDay(fetch.area, fetch.date, this.marketCurrency);
    this.lastRequestUrls.set(`${fetch.area}/${fetch.day}`, outcome.url);
    if (outcome.kind !== "ok") {
      return outcome.kind;
    }
    const entry = this.cache.get(fetch.area) ?? {};
    const cached: CachedDay = {data: outcome.data, fetchedAt: now, requestUrl: outcome.url};
    entry[fetch.day] = cached;
    this.cache.set(fetch.area, entry);
    this.hasSuccessfulFetch = true;
    this.logger.log(
      `Fetched ${fetch.day} prices for ${fetch.area} (${fetch.date}): status=${outcome.data.status}`,
    );
    return outcome.kind;
  }
}

function snapshotDay(entry: CachedDay | undefined): DaySnapshot | null {
  if (!entry) {
    return null;
  }
  return {
    deliveryDate: entry.data.deliveryDate,
    status: entry.data.status,
    quarterCount: entry.data.quarterRows.length,
    hourCount: entry.data.hourRows.length,
    blockCount: entry.data.blockAggregates.length,
    lastFetch: entry.fetchedAt.toISOString(),
    requestUrl: entry.requestUrl,
  };
}
