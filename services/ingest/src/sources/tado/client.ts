import { HttpRequestError, MalformedResponseError } from '../../errors';
import type { HttpClient } from '../../http/httpClient';
import type { Logger } from '../../logger';
import type { DeviceRef } from '../../records/types';
import { zonesSchema } from './types';

export const TADO_BASE_URL = 'https://my.tado.com/api/v2';
export const TADO_TOKEN_URL = 'https://login.tado.com/oauth2/token';

export type TadoClientOptions = {
  http: HttpClient;
  homeId: string;
  logger?: Logger;
};

/** Day reports of one tado home. Each heating zone is treated as one device. */
export class TadoClient {
  private readonly http: HttpClient;
  private readonly homeId: string;
  private readonly logger?: Logger;

  constructor(options: TadoClientOptions) {
    this.http = options.http;
    this.homeId = options.homeId;
    this.logger = options.logger;
  }

  async listHeatingZones(): Promise<DeviceRef[]> {
    const path = `/homes/${encodeURIComponent(this.homeId)}/zones`;
    const parsed = zonesSchema.safeParse(await this.http.getJson(path));
    if (!parsed.success) {
      throw new MalformedResponseError('Zones response is not a list of zones', this.http.buildUrl(path));
    }
    const devices = parsed.data
      .filter((zone) => zone.type === 'HEATING')
      .map((zone) => ({ deviceId: String(zone.id), zoneId: String(zone.id), name: zone.name ?? undefined }));
    this.logger?.info({ homeId: this.homeId, zones: devices.length }, 'discovered heating zones');
    return devices;
  }

  /** Raw day report for `date` (`YYYY-MM-DD`), or `null` when tado has none for that day. */
  async getDayReport(device: DeviceRef, date: string): Promise<unknown> {
    try {
      return await this.http.getJson(this.dayReportPath(device), { date });
    } catch (error) {
      if (error instanceof HttpRequestError && error.status === 404) {
        this.logger?.info({ zoneId: device.zoneId, date }, 'no day report available');
        return null;
      }
      throw error;
    }
  }

  dayReportUrl(device: DeviceRef, date: string): string {
    return this.http.buildUrl(this.dayReportPath(device), { date });
  }

  private dayReportPath(device: DeviceRef): string {
    return `/homes/${encodeURIComponent(this.homeId)}/zones/${encodeURIComponent(device.zoneId)}/dayReport`;
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
