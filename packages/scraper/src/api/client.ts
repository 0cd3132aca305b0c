import https from 'https';
import axios, { AxiosInstance } from 'axios';
import type { FetcherConfig, PageFetcher } from './types';

const keepAliveAgent = new https.Agent({ keepAlive: true, maxSockets: 32 });

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows; U; Windows NT 6.1; rv:2.2) Gecko/20110201',
  'Opera/9.80 (X11; Linux i686; Ubuntu/14.10) Presto/2.12.388 Version/12.16',
  'Mozilla/5.0 (X11; Linux x86_64; rv:60.0) Gecko/20100101 Firefox/60.0',
];

export function pickUserAgent(random: () => number = Math.random): string {
  return USER_AGENTS[Math.floor(random() * USER_AGENTS.length)] ?? USER_AGENTS[0];
}

export class TransportError extends Error {
  constructor(
    readonly url: string,
    readonly status: number | undefined,
    options?: { cause?: unknown }
  ) {
    super(status ? `GET ${url} failed with HTTP ${status}` : `GET ${url} failed`, options);
    this.name = 'TransportError';
  }
}

export class HttpPageFetcher implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(config: FetcherConfig, instance?: AxiosInstance) {
    this.http = instance ?? axios.create({ httpsAgent: keepAliveAgent });
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.headers = {
      'User-Agent': config.userAgent,
      Accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
    };
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.http.get<string>(url, {
        responseType: 'text',
        timeout: this.timeoutMs,
        headers: this.headers,
        signal,
      });
      return response.data ?? '';
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      throw new TransportError(url, status, { cause: err });
    }
  }
}

export function createPageFetcher(config: FetcherConfig): HttpPageFetcher {
  return new HttpPageFetcher(config);
}
