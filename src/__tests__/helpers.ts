import { IConfigService, IHttpClient, ILoggerService } from '../interfaces';
import { defaultConfig } from '../config';
import { toCrawlConfig } from '../services/configService';
import { CrawlOptions, PageResponse, ProbeResponse } from '../types';

export function createLoggerMock(): jest.Mocked<ILoggerService> {
  return {
    logInfo: jest.fn(),
    logSuccess: jest.fn(),
    log: jest.fn(),
    error: jest.fn(),
    infoWithoutInterference: jest.fn(),
    warnWithoutInterference: jest.fn(),
    errorWithoutInterference: jest.fn(),
    debugWithoutInterference: jest.fn(),
    createMultiBar: jest.fn(),
  };
}

export function createHttpClientMock(): jest.Mocked<IHttpClient> {
  return {
    configure: jest.fn(),
    fetchPage: jest.fn(),
    fetchText: jest.fn(),
    head: jest.fn(),
    probe: jest.fn(),
    download: jest.fn(),
  };
}

export function createConfigServiceMock(overrides: Partial<CrawlOptions> = {}): IConfigService {
  const options: CrawlOptions = { ...defaultConfig, url: 'https://example.com/', ...overrides };
  return {
    getConfig: jest.fn(() => options),
    setConfig: jest.fn(),
    getCrawlConfig: jest.fn(() => toCrawlConfig(options)),
  };
}

export function htmlPage(url: string, body: string): PageResponse {
  return { url, statusCode: 200, contentType: 'text/html; charset=utf-8', body };
}

export function probeResponse(url: string, overrides: Partial<ProbeResponse> = {}): ProbeResponse {
  return { url, statusCode: 200, contentType: '', contentDisposition: '', ...overrides };
}
