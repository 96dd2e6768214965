import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { createSilentLogger, type Logger } from '@dwdbulk/shared';
import { ResourceFetchError } from './errors';
import { parseResourceListing, type ResolveIndexOptions, type ResourceUri } from './resourceIndex';
import { DEFAULT_USER_AGENT, type PipelineConfig } from './config';

export interface OpenDataClientOptions {
  userAgent?: string;
  /** Transport timeout; the pipeline itself never retries or times out. */
  fetchTimeoutMs?: number | null;
  logger?: Logger;
}

/**
 * Thin HTTP client for the open-data file server. Every non-2xx answer and every
 * transport failure surfaces as a {@link ResourceFetchError}.
 */
export class OpenDataClient {
  private readonly userAgent: string;
  private readonly fetchTimeoutMs: number | null;
  readonly logger: Logger;

  constructor(options: OpenDataClientOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? null;
    this.logger = options.logger ?? createSilentLogger();
  }

  static fromConfig(config: PipelineConfig, logger?: Logger): OpenDataClient {
    return new OpenDataClient({
      userAgent: config.userAgent,
      fetchTimeoutMs: config.fetchTimeoutMs,
      logger
    });
  }

  async resolveIndex(uri: string, options: ResolveIndexOptions = {}): Promise<ResourceUri[]> {
    this.logger.info({ uri }, 'Requesting resource index');
    const html = await this.fetchText(uri);
    return parseResourceListing(html, uri, options);
  }

  async fetchText(uri: string): Promise<string> {
    const response = await this.get(uri);
    return response.text();
  }

  async fetchBytes(uri: string): Promise<Uint8Array> {
    const response = await this.get(uri);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async get(uri: string): Promise<Response> {
    this.logger.debug({ uri }, 'Fetching resource');
    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    const init: RequestInit = {
      method: 'GET',
      headers: new Headers({ 'User-Agent': this.userAgent }),
      signal: controller.signal
    };

    let response: Response;
    try {
      response = await fetch(uri, init);
    } catch (err) {
      throw new ResourceFetchError({ uri, status: null, cause: err });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new ResourceFetchError({ uri, status: response.status });
    }
    return response;
  }
}
