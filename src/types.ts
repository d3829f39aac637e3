export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type ClassifierKind = 'basic' | 'aggressive';

/** Raw options as they arrive from the command line or config.json. */
export interface CrawlOptions {
  url: string;
  output: string;
  depth: string;
  maxPages: string;
  timeout: string;
  delay: string;
  workers: string;
  subdomains: boolean;
  classifier: string;
  catchAll: boolean;
  ignoreRobots: boolean;
  download: boolean;
  userAgent: string;
  logLevel?: LogLevel;
}

/** Validated configuration of one crawl run. Durations are milliseconds. */
export interface CrawlConfig {
  url: string;
  maxDepth: number;
  maxPages: number;
  timeout: number;
  politeDelay: number;
  workers: number;
  allowSubdomains: boolean;
  classifier: ClassifierKind;
  catchAll: boolean;
  respectRobots: boolean;
  userAgent: string;
}

export type Priority = 'high' | 'medium' | 'low';

export type ReasonTag =
  | 'extension'
  | 'embed-tag'
  | 'query-param'
  | 'viewer-host'
  | 'viewer-path'
  | 'cdn-host'
  | 'shortened-url'
  | 'text-hint'
  | 'text-pdf'
  | 'inline-url'
  | 'script-ref'
  | 'data-attribute'
  | 'content-type'
  | 'fallback';

/** Where on a page a URL was found. */
export type LinkSource = 'anchor' | 'embed' | 'object' | 'iframe' | 'link' | 'inline' | 'script' | 'data-attribute';

export interface DiscoveredLink {
  url: string;
  source: LinkSource;
  linkText: string;
  contextText: string;
}

export interface Classification {
  isCandidate: boolean;
  reasons: Set<ReasonTag>;
  priority: Priority | null;
}

export interface PageRecord {
  url: string;
  depth: number;
  fetchedAt: Date;
  status: number;
  contentType: string;
}

export interface CandidateURL {
  url: string;
  reasons: Set<ReasonTag>;
  foundOnPages: Set<string>;
  priority: Priority;
  linkTexts: Set<string>;
}

export type VerificationMethod = 'extension-match' | 'header-confirmed' | 'redirect-confirmed' | 'heuristic-accepted';

export interface VerifiedDocument {
  readonly finalUrl: string;
  readonly sourceCandidate: string;
  readonly method: VerificationMethod;
  readonly httpStatus: number | null;
  readonly contentType: string | null;
}

export interface Rejection {
  url: string;
  reason: string;
}

export type VerificationOutcome =
  | { accepted: true; document: VerifiedDocument; note: string }
  | ({ accepted: false } & Rejection);

export type DownloadOutcome =
  | { status: 'saved'; url: string; filePath: string; bytes: number }
  | { status: 'failed'; url: string; reason: string };

export interface PageTask {
  url: string;
  depth: number;
  parentUrl: string;
}

export type CrawlState = 'Idle' | 'Running' | 'Stopped' | 'Completed';

export type SkipReason = 'depth' | 'robots' | 'fetch-failed' | 'http-error';

export interface CrawlStats {
  pagesCrawled: number;
  candidatesSeen: number;
  verifiedCount: number;
  rejectedCount: number;
  pendingPages: number;
}

export interface CrawlResult {
  state: CrawlState;
  pages: PageRecord[];
  candidates: CandidateURL[];
  verified: VerifiedDocument[];
  rejected: Rejection[];
  stats: CrawlStats;
}

export interface CrawlRunOptions {
  signal?: AbortSignal;
}

/** Response of a page fetch. The body is only read for HTML. */
export interface PageResponse {
  url: string;
  statusCode: number;
  contentType: string;
  body: string;
}

/** Headers of a HEAD or a header-only GET, after redirects. */
export interface ProbeResponse {
  url: string;
  statusCode: number;
  contentType: string;
  contentDisposition: string;
}
