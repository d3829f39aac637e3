import cliProgress from 'cli-progress';
import {
  Classification,
  ClassifierKind,
  CrawlConfig,
  CrawlOptions,
  CrawlResult,
  CrawlRunOptions,
  CrawlState,
  CandidateURL,
  DiscoveredLink,
  DownloadOutcome,
  LinkSource,
  PageResponse,
  ProbeResponse,
  VerificationOutcome,
  VerifiedDocument,
} from '../types';
import { CrawlEvents } from '../core/crawlEvents';

export interface ICrawlerService {
  readonly events: CrawlEvents;
  getState(): CrawlState;
  crawl(config: CrawlConfig, runOptions?: CrawlRunOptions): Promise<CrawlResult>;
}

export interface IConfigService {
  getConfig(): CrawlOptions;
  setConfig(partialConfig: Partial<CrawlOptions>): void;
  getCrawlConfig(): CrawlConfig;
}

export interface ILoggerService {
  logInfo(message: string): void;
  logSuccess(message: string): void;

  log(message: string): void;
  error(message: string, error?: Error): void;

  infoWithoutInterference(message: string, ...meta: unknown[]): void;
  warnWithoutInterference(message: string, ...meta: unknown[]): void;
  errorWithoutInterference(message: string, ...meta: unknown[]): void;
  debugWithoutInterference(message: string, ...meta: unknown[]): void;

  createMultiBar(options?: cliProgress.Options): cliProgress.MultiBar;
}

export interface IFileSystemService {
  saveToFile(content: string, filePath: string): Promise<void>;
  ensureDirectory(dirPath: string): Promise<void>;
  readHead(filePath: string, length: number): Promise<Buffer>;
  fileSize(filePath: string): Promise<number>;
  removeFile(filePath: string): Promise<void>;
}

/** Per-run transport settings, taken from the `CrawlConfig` of the run. */
export type HttpSettings = Pick<CrawlConfig, 'timeout' | 'politeDelay' | 'userAgent'>;

export interface IHttpClient {
  configure(settings: HttpSettings): void;
  fetchPage(url: string): Promise<PageResponse>;
  fetchText(url: string): Promise<PageResponse>;
  head(url: string): Promise<ProbeResponse>;
  probe(url: string): Promise<ProbeResponse>;
  download(url: string, filePath: string): Promise<ProbeResponse>;
}

export interface IRobotsPolicy {
  canFetch(url: string, userAgent: string): Promise<boolean>;
}

export interface ILinkExtractor {
  extractLinks(html: string, pageUrl: string): DiscoveredLink[];
}

export interface ICandidateClassifier {
  classify(url: string, linkText?: string, contextText?: string, source?: LinkSource): Classification;
}

export type ClassifierFactory = (kind: ClassifierKind, options: { catchAll?: boolean }) => ICandidateClassifier;

export interface ICloudLinkResolver {
  resolve(url: string): string;
}

export interface IVerifier {
  verify(candidate: CandidateURL): Promise<VerificationOutcome>;
}

export interface IDocumentDownloader {
  download(document: VerifiedDocument, outputDir: string): Promise<DownloadOutcome>;
}

export interface IResultExporter {
  export(result: CrawlResult, outputDir: string, downloads?: readonly DownloadOutcome[]): Promise<string[]>;
}
