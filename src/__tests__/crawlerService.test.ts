import { Container } from 'inversify';
import { CrawlerService } from '../core/crawler';
import { LinkExtractor } from '../core/linkExtractor';
import { CloudLinkResolver } from '../core/cloudLinkResolver';
import { Verifier } from '../core/verifier';
import { createClassifier } from '../core/candidateClassifier';
import {
  ClassifierFactory,
  ICloudLinkResolver,
  IHttpClient,
  ILinkExtractor,
  ILoggerService,
  IRobotsPolicy,
  IVerifier,
} from '../interfaces';
import { TYPES } from '../di/types';
import { CrawlConfig, CrawlState, PageResponse, SkipReason } from '../types';
import { createHttpClientMock, createLoggerMock, htmlPage, probeResponse } from './helpers';

const SEED = 'https://example.com/';

const SITE: Record<string, string> = {
  [SEED]: `
    <html><body>
      <nav><a href="/about">About us</a></nav>
      <p><a href="/files/handbook.pdf">Student Handbook</a></p>
      <p><a href="https://other.org/page">Partner</a></p>
    </body></html>`,
  'https://example.com/about': `
    <html><body>
      <p><a href="/files/handbook.pdf#page=3">Handbook (PDF)</a></p>
      <p><a href="/deeper">Deeper</a></p>
      <p>Dates are listed in https://example.com/files/calendar.pdf for everyone.</p>
    </body></html>`,
};

function baseConfig(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
  return {
    url: SEED,
    maxDepth: 1,
    maxPages: 50,
    timeout: 5000,
    politeDelay: 0,
    workers: 1,
    allowSubdomains: true,
    classifier: 'aggressive',
    catchAll: false,
    respectRobots: true,
    userAgent: 'doc-hunter-test',
    ...overrides,
  };
}

describe('CrawlerService', () => {
  let container: Container;
  let crawlerService: CrawlerService;
  let httpClient: jest.Mocked<IHttpClient>;
  let loggerService: jest.Mocked<ILoggerService>;
  let robotsPolicy: jest.Mocked<IRobotsPolicy>;
  let site: Record<string, string>;

  beforeEach(() => {
    container = new Container();
    site = { ...SITE };

    loggerService = createLoggerMock();
    container.bind<ILoggerService>(TYPES.LoggerService).toConstantValue(loggerService);

    httpClient = createHttpClientMock();
    httpClient.fetchPage.mockImplementation(async (url: string): Promise<PageResponse> => {
      const body = site[url];
      if (body === undefined) return { url, statusCode: 404, contentType: 'text/html', body: '' };
      return htmlPage(url, body);
    });
    container.bind<IHttpClient>(TYPES.HttpClient).toConstantValue(httpClient);

    robotsPolicy = { canFetch: jest.fn().mockResolvedValue(true) };
    container.bind<IRobotsPolicy>(TYPES.RobotsPolicy).toConstantValue(robotsPolicy);

    container.bind<ILinkExtractor>(TYPES.LinkExtractor).to(LinkExtractor);
    container.bind<ClassifierFactory>(TYPES.ClassifierFactory).toConstantValue(createClassifier);
    container.bind<ICloudLinkResolver>(TYPES.CloudLinkResolver).to(CloudLinkResolver);
    container.bind<IVerifier>(TYPES.Verifier).to(Verifier);
    container.bind<CrawlerService>(TYPES.CrawlerService).to(CrawlerService);

    crawlerService = container.get<CrawlerService>(TYPES.CrawlerService);
  });

  it('crawls to the configured depth and verifies the documents it found', async () => {
    const result = await crawlerService.crawl(baseConfig());

    expect(result.state).toBe('Completed');
    expect(result.pages.map((page) => page.url)).toEqual([SEED, 'https://example.com/about']);
    expect(result.candidates.map((candidate) => candidate.url)).toEqual([
      'https://example.com/files/handbook.pdf',
      'https://example.com/files/calendar.pdf',
    ]);
    expect(result.verified.map((document) => document.method)).toEqual(['extension-match', 'extension-match']);
    expect(result.stats).toEqual({
      pagesCrawled: 2,
      candidatesSeen: 2,
      verifiedCount: 2,
      rejectedCount: 0,
      pendingPages: 0,
    });
    expect(httpClient.fetchPage).toHaveBeenCalledTimes(2);
    expect(httpClient.head).not.toHaveBeenCalled();
    expect(httpClient.probe).not.toHaveBeenCalled();
    expect(crawlerService.getState()).toBe('Completed');
  });

  it('merges repeat sightings of a candidate across pages', async () => {
    const result = await crawlerService.crawl(baseConfig());
    const handbook = result.candidates[0];

    expect(handbook.priority).toBe('high');
    expect([...handbook.reasons].sort()).toEqual(['extension', 'text-hint', 'text-pdf']);
    expect([...handbook.foundOnPages]).toEqual([SEED, 'https://example.com/about']);
    expect([...handbook.linkTexts]).toEqual(['Student Handbook', 'Handbook (PDF)']);

    const calendar = result.candidates[1];
    expect([...calendar.reasons].sort()).toEqual(['extension', 'inline-url']);
  });

  it('folds an anchor on one page and an inline URL on another into one candidate', async () => {
    site['https://example.com/about'] = '<p>See https://example.com/files/handbook.pdf for details.</p>';

    const result = await crawlerService.crawl(baseConfig());

    expect(result.candidates).toHaveLength(1);
    const handbook = result.candidates[0];
    expect(handbook.priority).toBe('high');
    expect([...handbook.reasons].sort()).toEqual(['extension', 'inline-url', 'text-hint']);
    expect([...handbook.foundOnPages]).toEqual([SEED, 'https://example.com/about']);
    expect([...handbook.linkTexts]).toEqual(['Student Handbook']);
  });

  it('takes the HTTP settings and the classifier from each run config', async () => {
    site[SEED] = '<p><a href="https://bit.ly/abc">Student Handbook</a></p>';
    httpClient.head.mockResolvedValue(probeResponse('https://bit.ly/abc', { contentType: 'text/html' }));
    httpClient.probe.mockResolvedValue(probeResponse('https://bit.ly/abc', { contentType: 'text/html' }));

    const basicConfig = baseConfig({ classifier: 'basic' });
    const basic = await crawlerService.crawl(basicConfig);
    expect(httpClient.configure).toHaveBeenLastCalledWith(basicConfig);
    expect(robotsPolicy.canFetch).toHaveBeenLastCalledWith(SEED, 'doc-hunter-test');
    expect(basic.candidates).toEqual([]);

    const aggressiveConfig = baseConfig({ timeout: 900, politeDelay: 250, userAgent: 'other-agent/2.0' });
    const aggressive = await crawlerService.crawl(aggressiveConfig);
    expect(httpClient.configure).toHaveBeenLastCalledWith(aggressiveConfig);
    expect(robotsPolicy.canFetch).toHaveBeenLastCalledWith(SEED, 'other-agent/2.0');
    expect(aggressive.candidates.map((candidate) => candidate.url)).toEqual(['https://bit.ly/abc']);
    expect(aggressive.verified.map((document) => document.method)).toEqual(['heuristic-accepted']);
    expect(httpClient.configure).toHaveBeenCalledTimes(2);
  });

  it('does not verify an embedded video player as a document', async () => {
    const video = 'https://www.youtube.com/embed/abc123';
    site[SEED] = `
      <div><iframe src="${video}"></iframe></div>
      <p><a href="/files/handbook.pdf">Handbook</a></p>`;
    httpClient.head.mockResolvedValue(probeResponse(video, { contentType: 'text/html; charset=utf-8' }));
    httpClient.probe.mockResolvedValue(probeResponse(video, { contentType: 'text/html; charset=utf-8' }));

    const result = await crawlerService.crawl(baseConfig());

    expect(result.candidates.map((candidate) => [candidate.url, candidate.priority])).toEqual([
      ['https://example.com/files/handbook.pdf', 'high'],
      [video, 'medium'],
    ]);
    expect(result.verified.map((document) => document.finalUrl)).toEqual(['https://example.com/files/handbook.pdf']);
    expect(result.rejected.map((rejection) => rejection.url)).toEqual([video]);
  });

  it('only fetches the seed at depth zero', async () => {
    const skips: SkipReason[] = [];
    crawlerService.events.on('skip', (_url, reason) => skips.push(reason));

    const result = await crawlerService.crawl(baseConfig({ maxDepth: 0 }));

    expect(result.stats.pagesCrawled).toBe(1);
    expect(httpClient.fetchPage).toHaveBeenCalledTimes(1);
    expect(skips).toEqual([]);
  });

  it('never fetches a page twice with several workers', async () => {
    site[SEED] = `
      <a href="/a">A</a><a href="/b">B</a><a href="/a#top">A again</a>
      <iframe src="/b"></iframe>`;
    site['https://example.com/a'] = '<a href="/b">B</a><a href="/">Home</a>';
    site['https://example.com/b'] = '<a href="/a">A</a>';

    const result = await crawlerService.crawl(baseConfig({ workers: 3 }));

    expect(httpClient.fetchPage).toHaveBeenCalledTimes(3);
    expect(result.pages.map((page) => page.url).sort()).toEqual([
      SEED,
      'https://example.com/a',
      'https://example.com/b',
    ]);
  });

  it('stops at the page limit', async () => {
    const result = await crawlerService.crawl(baseConfig({ maxPages: 1 }));

    expect(result.state).toBe('Completed');
    expect(result.stats.pagesCrawled).toBe(1);
    expect(result.stats.pendingPages).toBe(0);
  });

  it('drops a redirect onto a visited page without spending the page limit on it', async () => {
    site[SEED] = '<a href="/new">New</a><a href="/old">Old</a><a href="/other">Other</a>';
    site['https://example.com/new'] = '<p>new</p>';
    site['https://example.com/other'] = '<p>other</p>';
    httpClient.fetchPage.mockImplementation(async (url: string) => {
      const target = url === 'https://example.com/old' ? 'https://example.com/new' : url;
      return htmlPage(target, site[target] ?? '');
    });

    const result = await crawlerService.crawl(baseConfig({ maxPages: 3 }));

    expect(httpClient.fetchPage).toHaveBeenCalledTimes(4);
    expect(result.pages.map((page) => page.url)).toEqual([SEED, 'https://example.com/new', 'https://example.com/other']);
  });

  it('skips pages denied by robots.txt without fetching them', async () => {
    robotsPolicy.canFetch.mockImplementation(async (url: string) => url !== 'https://example.com/about');
    const skipped: Array<[string, SkipReason]> = [];
    crawlerService.events.on('skip', (url, reason) => skipped.push([url, reason]));

    const result = await crawlerService.crawl(baseConfig());

    expect(skipped).toEqual([['https://example.com/about', 'robots']]);
    expect(httpClient.fetchPage).toHaveBeenCalledTimes(1);
    expect(result.stats.pagesCrawled).toBe(1);
  });

  it('does not consult robots.txt when told to ignore it', async () => {
    await crawlerService.crawl(baseConfig({ respectRobots: false }));

    expect(robotsPolicy.canFetch).not.toHaveBeenCalled();
  });

  it('keeps crawling after a failed fetch or an HTTP error', async () => {
    site[SEED] = '<a href="/broken">Broken</a><a href="/missing">Missing</a><a href="/fine">Fine</a>';
    site['https://example.com/fine'] = '<p>ok</p>';
    httpClient.fetchPage.mockImplementationOnce(async (url: string) => htmlPage(url, site[url]));
    httpClient.fetchPage.mockRejectedValueOnce(new Error('socket hang up'));

    const skipped: Array<[string, SkipReason, string]> = [];
    crawlerService.events.on('skip', (url, reason, detail) => skipped.push([url, reason, detail]));

    const result = await crawlerService.crawl(baseConfig());

    expect(skipped).toEqual([
      ['https://example.com/broken', 'fetch-failed', 'socket hang up'],
      ['https://example.com/missing', 'http-error', 'HTTP 404'],
    ]);
    expect(result.pages.map((page) => [page.url, page.status])).toEqual([
      [SEED, 200],
      ['https://example.com/missing', 404],
      ['https://example.com/fine', 200],
    ]);
  });

  it('treats a same-site page that answers with a PDF as a candidate', async () => {
    site[SEED] = '<a href="/download?id=9">Get it</a>';
    httpClient.fetchPage.mockImplementation(async (url: string): Promise<PageResponse> => {
      if (url === 'https://example.com/download?id=9') {
        return { url, statusCode: 200, contentType: 'application/pdf', body: '' };
      }
      return htmlPage(url, site[url] ?? '');
    });
    httpClient.head.mockResolvedValue(probeResponse('https://example.com/download?id=9', { contentType: 'application/pdf' }));

    const result = await crawlerService.crawl(baseConfig());

    expect(result.candidates).toHaveLength(1);
    expect(result.candidates[0].url).toBe('https://example.com/download?id=9');
    expect(result.candidates[0].priority).toBe('high');
    expect([...result.candidates[0].reasons]).toEqual(['content-type']);
    expect([...result.candidates[0].foundOnPages]).toEqual([SEED]);
    expect(result.verified[0].method).toBe('header-confirmed');
  });

  it('stops cooperatively, clears the queue and skips verification', async () => {
    const controller = new AbortController();
    const states: CrawlState[] = [];
    crawlerService.events.on('state', (state) => states.push(state));
    crawlerService.events.on('page', () => controller.abort());

    const result = await crawlerService.crawl(baseConfig(), { signal: controller.signal });

    expect(result.state).toBe('Stopped');
    expect(result.stats.pagesCrawled).toBe(1);
    expect(result.stats.pendingPages).toBe(0);
    expect(result.verified).toEqual([]);
    expect(result.candidates).toHaveLength(1);
    expect(states).toEqual(['Running', 'Stopped']);
  });

  it('returns the outcomes gathered so far when stopped during verification', async () => {
    const controller = new AbortController();
    crawlerService.events.on('verified', () => controller.abort());

    const result = await crawlerService.crawl(baseConfig(), { signal: controller.signal });

    expect(result.state).toBe('Stopped');
    expect(result.stats.pagesCrawled).toBe(2);
    expect(result.verified).toHaveLength(1);
    expect(result.candidates).toHaveLength(2);
  });

  it('keeps running when an event listener throws', async () => {
    crawlerService.events.on('candidate', () => {
      throw new Error('listener broke');
    });

    const result = await crawlerService.crawl(baseConfig());

    expect(result.state).toBe('Completed');
    expect(result.stats.candidatesSeen).toBe(2);
    expect(loggerService.error).toHaveBeenCalledWith('Crawl event listener failed', expect.any(Error));
  });

  it('starts every run from a clean session', async () => {
    await crawlerService.crawl(baseConfig());
    const second = await crawlerService.crawl(baseConfig());

    expect(second.stats.pagesCrawled).toBe(2);
    expect(httpClient.fetchPage).toHaveBeenCalledTimes(4);
  });

  it('leaves the Running state when a collaborator throws', async () => {
    robotsPolicy.canFetch.mockImplementation(async (url: string) => {
      if (url === 'https://example.com/about') throw new Error('robots exploded');
      return true;
    });
    const states: CrawlState[] = [];
    crawlerService.events.on('state', (state) => states.push(state));

    await expect(crawlerService.crawl(baseConfig({ workers: 3 }))).rejects.toThrow('robots exploded');
    expect(crawlerService.getState()).toBe('Stopped');
    expect(states).toEqual(['Running', 'Stopped']);

    robotsPolicy.canFetch.mockResolvedValue(true);
    const next = await crawlerService.crawl(baseConfig());
    expect(next.state).toBe('Completed');
    expect(next.stats.pagesCrawled).toBe(2);
  });
});
