import { injectable, inject } from 'inversify';
import got, { Got, Response } from 'got';
import * as fs from 'fs';
import { pipeline } from 'stream/promises';
import { TYPES } from '../di/types';
import { HttpSettings, IConfigService, IHttpClient } from '../interfaces';
import { hostOf } from '../core/urlNormalizer';
import { RateGate } from '../core/rateGate';
import { PageResponse, ProbeResponse } from '../types';

type GotStream = ReturnType<Got['stream']>;

const HTML_TYPES = new Set(['text/html', 'application/xhtml+xml']);

function headerValue(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value.join(', ');
  return value ?? '';
}

export function mediaType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export function isHtmlContentType(contentType: string): boolean {
  return HTML_TYPES.has(mediaType(contentType));
}

function toProbe(response: Response<unknown>): ProbeResponse {
  return {
    url: response.url,
    statusCode: response.statusCode,
    contentType: headerValue(response.headers['content-type']),
    contentDisposition: headerValue(response.headers['content-disposition']),
  };
}

function waitForResponse(stream: GotStream): Promise<Response<unknown>> {
  return new Promise((resolve, reject) => {
    stream.on('error', reject);
    stream.on('response', (response: Response<unknown>) => resolve(response));
  });
}

/**
 * got-backed transport. Every request waits for its turn at the per-host
 * rate gate and honours the configured timeout; redirects are followed and
 * HTTP error statuses come back as responses, not exceptions.
 *
 * `configure()` replaces the got instance and the rate gate; until it is
 * called the settings come from the ConfigService.
 */
@injectable()
export class HttpClient implements IHttpClient {
  private client: Got | null = null;
  private gate: RateGate | null = null;

  constructor(@inject(TYPES.ConfigService) private configService: IConfigService) {}

  configure(settings: HttpSettings): void {
    this.client = got.extend({
      headers: { 'user-agent': settings.userAgent },
      timeout: settings.timeout,
      followRedirect: true,
      throwHttpErrors: false,
      retry: 0,
    });
    this.gate = new RateGate(settings.politeDelay);
  }

  private setup(): { client: Got; gate: RateGate } {
    if (!this.client || !this.gate) {
      this.configure(this.configService.getCrawlConfig());
    }
    if (!this.client || !this.gate) {
      throw new Error('HTTP client is not configured');
    }
    return { client: this.client, gate: this.gate };
  }

  private async acquire(url: string): Promise<Got> {
    const { client, gate } = this.setup();
    await gate.wait(hostOf(url) ?? url);
    return client;
  }

  /** GET a page; only HTML bodies are read, anything else is cut off after the headers. */
  async fetchPage(url: string): Promise<PageResponse> {
    const client = await this.acquire(url);
    const stream = client.stream(url);
    const response = await waitForResponse(stream);
    const { statusCode, contentType } = toProbe(response);

    if (statusCode >= 400 || !isHtmlContentType(contentType)) {
      stream.destroy();
      return { url: response.url, statusCode, contentType, body: '' };
    }

    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.from(chunk));
    }
    return { url: response.url, statusCode, contentType, body: Buffer.concat(chunks).toString('utf-8') };
  }

  /** GET with the whole body read as text, whatever the content type. */
  async fetchText(url: string): Promise<PageResponse> {
    const client = await this.acquire(url);
    const response = await client.get(url, { responseType: 'text' });
    const { statusCode, contentType } = toProbe(response);
    return { url: response.url, statusCode, contentType, body: response.body };
  }

  async head(url: string): Promise<ProbeResponse> {
    const client = await this.acquire(url);
    const response = await client.head(url);
    return toProbe(response);
  }

  /** GET that stops after the response headers; for hosts that answer HEAD badly. */
  async probe(url: string): Promise<ProbeResponse> {
    const client = await this.acquire(url);
    const stream = client.stream(url);
    const response = await waitForResponse(stream);
    stream.destroy();
    return toProbe(response);
  }

  async download(url: string, filePath: string): Promise<ProbeResponse> {
    const client = await this.acquire(url);
    const stream = client.stream(url);
    const response = await waitForResponse(stream);
    await pipeline(stream, fs.createWriteStream(filePath));
    return toProbe(response);
  }
}
