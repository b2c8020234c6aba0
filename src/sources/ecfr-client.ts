import { Config, FetchError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('ecfr-client');

export interface EcfrClientOptions {
  baseUrl: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Attempts per request */
  retries?: number;
  /** Delay between retries in milliseconds, multiplied by the attempt number */
  retryDelayMs?: number;
  userAgent?: string;
}

const DEFAULT_OPTIONS: Required<Omit<EcfrClientOptions, 'baseUrl'>> = {
  timeoutMs: 60000,
  retries: 3,
  retryDelayMs: 1000,
  userAgent: 'regulatory-metrics/1.0',
};

/**
 * HTTP client for the public eCFR API
 */
export class EcfrClient {
  private options: Required<EcfrClientOptions>;

  constructor(options: EcfrClientOptions) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  titleXmlUrl(titleNumber: number, date: string): string {
    return this.url(`/api/versioner/v1/full/${date}/title-${titleNumber}.xml`);
  }

  async fetchAgencies(): Promise<unknown> {
    const response = await this.fetchWithRetry(this.url('/api/admin/v1/agencies.json'), 'application/json');
    return this.readJson(response);
  }

  async fetchTitlesSummary(): Promise<unknown> {
    const response = await this.fetchWithRetry(this.url('/api/versioner/v1/titles.json'), 'application/json');
    return this.readJson(response);
  }

  async fetchTitleXml(titleNumber: number, date: string): Promise<Buffer> {
    const url = this.titleXmlUrl(titleNumber, date);
    const response = await this.fetchWithRetry(url, 'application/xml');
    const content = Buffer.from(await response.arrayBuffer());

    logger.info({ titleNumber, date, bytes: content.length }, 'Downloaded title XML');

    return content;
  }

  private url(path: string): string {
    return new URL(path, this.options.baseUrl).href;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throw new FetchError(`Invalid JSON from ${response.url}`, error);
    }
  }

  /**
   * Fetch with retry. 404s are not retried: the title does not exist at that date.
   */
  private async fetchWithRetry(url: string, accept: string): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.options.retries; attempt++) {
      try {
        logger.debug({ url, attempt }, 'Fetching URL');

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

        let response: Response;
        try {
          response = await fetch(url, {
            headers: {
              'User-Agent': this.options.userAgent,
              Accept: accept,
            },
            signal: controller.signal,
          });
        } finally {
          clearTimeout(timeoutId);
        }

        if (response.status === 404) {
          throw new FetchError(`Not found: ${url}`, { status: 404 });
        }

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }

        return response;
      } catch (error) {
        if (error instanceof FetchError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn({ url, attempt, error: lastError.message }, 'Fetch attempt failed');

        if (attempt < this.options.retries) {
          await this.sleep(this.options.retryDelayMs * attempt);
        }
      }
    }

    throw new FetchError(
      `Failed to fetch ${url} after ${this.options.retries} attempts: ${lastError?.message}`,
      lastError
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function createEcfrClient(config: Config['ecfr']): EcfrClient {
  return new EcfrClient(config);
}
