import axios, { AxiosInstance } from 'axios';
import logger from '../../utils/logger';
import { UpstreamFormatError } from '../../core/errors';
import type { RadioConfig } from '../../config/config';
import { parseSpots } from './pota';
import { parseSolarXml } from './solar';
import { SolarReport, Spot } from './types';

/** Raw access to the public radio data services. No caching or throttling here. */
export interface RadioUpstream {
  fetchSolar(): Promise<SolarReport>;
  fetchSpots(): Promise<Spot[]>;
}

export type RadioUpstreamOptions = Pick<RadioConfig, 'solarUrl' | 'spotsUrl' | 'httpTimeoutMs'>;

const USER_AGENT = 'seabird-radio';

export class HttpRadioUpstream implements RadioUpstream {
  constructor(
    private readonly options: RadioUpstreamOptions,
    private readonly http: AxiosInstance = axios.create(),
  ) {}

  async fetchSolar(): Promise<SolarReport> {
    const response = await this.http.get<unknown>(this.options.solarUrl, {
      timeout: this.options.httpTimeoutMs,
      responseType: 'text',
      headers: { 'User-Agent': USER_AGENT },
    });
    if (typeof response.data !== 'string') {
      throw new UpstreamFormatError('solar feed did not return text');
    }
    const report = parseSolarXml(response.data);
    logger.debug(`[RadioUpstream] Solar report updated ${report.updated} (${report.bands.length} bands)`);
    return report;
  }

  async fetchSpots(): Promise<Spot[]> {
    const response = await this.http.get<unknown>(this.options.spotsUrl, {
      timeout: this.options.httpTimeoutMs,
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
    });
    const spots = parseSpots(response.data);
    logger.debug(`[RadioUpstream] Loaded ${spots.length} activation spots`);
    return spots;
  }
}

export default HttpRadioUpstream;
