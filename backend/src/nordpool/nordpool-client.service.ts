import { Inject, Injectable, Logger } from "@nestjs/common";

import { DayPrices, describeError, parseDayAheadPayload } from "@dayahead/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";

export const DEFAULT_API_BASE_URL = "https://dataportal-api.nordpoolgroup.com/api/DayAheadPrices";
export const MARKET = "DayAhead";
const REQUEST_TIMEOUT_MS = 30000;

export type FetchOutcome =
  | { kind: "ok"; url: string; data: DayPrices }
  | { kind: "no-data"; url: string }
  | { kind: "area-missing"; url: string }
  | { kind: "http-error"; url: string; status: number }
  | { kind: "invalid-payload"; url: string; message: string }
  | { kind: "network-error"; url: string; message: string };

/** Anything that can deliver one area's prices for one CET delivery date. */
export interface DayAheadPriceSource {
  fetchDay(area: string, date: string, currency: string): Promise<FetchOutcome>;
}

export function buildRequestUrl(baseUrl: string, date: string, area: string, currency: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("date", date);
  url.searchParams.set("market", MARKET);
  url.searchParams.set("deliveryArea", area);
  url.searchParams.set("currency", currency);
  return url.toString();
}

@Injectable()
export class NordpoolClientService implements DayAheadPriceSource {
  private readonly logger = new Logger(NordpoolClientService.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(@Inject(RuntimeConfigService) configState: RuntimeConfigService) {
    const api = configState.getDocumentRef().api;
    this.baseUrl = api?.base_url ?? DEFAULT_API_BASE_URL;
    this.timeoutMs = api?.timeout_ms ?? REQUEST_TIMEOUT_MS;
  }

  async fetchDay(area: string, date: string, currency: string): Promise<FetchOutcome> {
    const url = buildRequestUrl(this.baseUrl, date, area, currency);
    this.logger.debug(`Fetching Nord Pool data: ${url}`);

    let response: Response;
    let body = "";
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      response = await fetch(url, {signal: controller.signal, headers: {Accept: "application/json"}});
      if (response.status === 200) {
        body = await response.text();
      }
    } catch (error) {
      const message = controller.signal.aborted ? `Request timed out after ${this.timeoutMs}ms` : describeError(error);
      this.logger.error(`Network error fetching Nord Pool data for ${area}: ${message}`);
      return {kind: "network-error", url, message};
    } finally {
      clearTimeout(timer);
    }

    if (response.status === 204) {
      this.logger.debug(`No data yet for ${area} ${date} (204)`);
      return {kind: "no-data", url};
    }
    if (response.status !== 200) {
      this.logger.warn(`Unexpected HTTP ${response.status} fetching ${area} ${date}`);
      return {kind: "http-error", url, status: response.status};
    }

    let data: DayPrices;
    try {
      const payload: unknown = JSON.parse(body);
      data = new DayPrices(parseDayAheadPayload(payload), area);
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Unreadable Nord Pool payload for ${area} ${date}: ${message}`);
      return {kind: "invalid-payload", url, message};
    }

    if (!data.areaAvailable) {
      this.logger.warn(`Area ${area} not found in API response for ${date}`);
      return {kind: "area-missing", url};
    }
    this.logger.verbose(
      `Fetched ${area} ${date}: status=${data.status}, quarters=${data.quarterRows.length}`,
    );
    return {kind: "ok", url, data};
  }
}
