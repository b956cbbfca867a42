import { MalformedResponseError } from '../../errors';
import type { HttpClient } from '../../http/httpClient';
import type { Logger } from '../../logger';
import type { MeterRef, TariffRef } from '../../records/types';
import { consumptionPath, discoverActiveTariffs, formatQueryTimestamp, listAccountMeters, unitRatePath } from './tariffs';
import { accountSchema, pageSchema } from './types';
import type { OctopusAccount, OctopusPage } from './types';

export const OCTOPUS_BASE_URL = 'https://api.octopus.energy/v1';
export const OCTOPUS_PAGE_SIZE = 250;
const DEFAULT_MAX_PAGES = 10_000;

export type OctopusClientOptions = {
  http: HttpClient;
  accountNumber: string;
  pageSize?: number;
  maxPages?: number;
  logger?: Logger;
};

export class OctopusClient {
  private readonly http: HttpClient;
  private readonly accountNumber: string;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly logger?: Logger;

  constructor(options: OctopusClientOptions) {
    this.http = options.http;
    this.accountNumber = options.accountNumber;
    this.pageSize = options.pageSize ?? OCTOPUS_PAGE_SIZE;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.logger = options.logger;
  }

  /** Half-hourly readings with `interval_start` in `[start, end]`, oldest first. */
  getConsumption(meter: MeterRef, start: Date, end: Date): Promise<unknown[]> {
    return this.paginate(consumptionPath(meter), {
      period_from: formatQueryTimestamp(start),
      period_to: formatQueryTimestamp(end),
      order_by: 'period',
      page_size: this.pageSize
    });
  }

  getUnitRates(tariff: Pick<TariffRef, 'productCode' | 'tariffCode'>, start: Date, end: Date): Promise<unknown[]> {
    return this.paginate(unitRatePath(tariff), {
      period_from: formatQueryTimestamp(start),
      period_to: formatQueryTimestamp(end),
      order_by: 'period',
      page_size: this.pageSize
    });
  }

  async getAccount(): Promise<OctopusAccount> {
    const path = `/accounts/${encodeURIComponent(this.accountNumber)}/`;
    const body = await this.http.getJson(path);
    const parsed = accountSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError('Account response has an unexpected shape', this.http.buildUrl(path), {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    return parsed.data;
  }

  async listAllMeters(): Promise<MeterRef[]> {
    return listAccountMeters(await this.getAccount());
  }

  async discoverActiveTariffs(asOf: Date): Promise<TariffRef[]> {
    return discoverActiveTariffs(await this.getAccount(), asOf);
  }

  close(): Promise<void> {
    return this.http.close();
  }

  private async fetchPage(path: string, query: Record<string, string | number>): Promise<OctopusPage> {
    const body = await this.http.getJson(path, query);
    const parsed = pageSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError('Paged response is missing a results array', this.http.buildUrl(path, query));
    }
    return parsed.data;
  }

  private async paginate(path: string, query: Record<string, string | number>): Promise<unknown[]> {
    const results: unknown[] = [];
    for (let page = 1; ; page += 1) {
      if (page > this.maxPages) {
        throw new MalformedResponseError(`Pagination exceeded ${this.maxPages} pages`, this.http.buildUrl(path, query));
      }
      const data = await this.fetchPage(path, { ...query, page });
      results.push(...data.results);
      if (page === 1 || page % 25 === 0) {
        this.logger?.debug({ path, page, records: results.length }, 'fetched page');
      }
      if (!data.next) {
        return results;
      }
    }
  }
}
