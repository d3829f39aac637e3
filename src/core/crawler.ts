import { injectable, inject } from 'inversify';
import colors from 'ansi-colors';
import { TYPES } from '../di/types';
import {
  ClassifierFactory,
  ICandidateClassifier,
  ICrawlerService,
  IHttpClient,
  ILinkExtractor,
  ILoggerService,
  IRobotsPolicy,
  IVerifier,
} from '../interfaces';
import {
  Classification,
  CrawlConfig,
  CrawlResult,
  CrawlRunOptions,
  CrawlState,
  DiscoveredLink,
  PageRecord,
  PageResponse,
  PageTask,
} from '../types';
import { CrawlSession } from '../services/crawlSession';
import { isHtmlContentType, mediaType } from '../services/httpClient';
import { describeFetchError } from '../errors';
import { CrawlEvents } from './crawlEvents';
import { matchesDocumentExtension } from './classificationRules';
import { DOCUMENT_CONTENT_TYPES } from './verifier';
import { normalize, sameSite } from './urlNormalizer';
import { sleep } from './rateGate';

type StopCheck = () => boolean;

/** Everything one `crawl()` call works with. */
interface CrawlRun {
  session: CrawlSession;
  config: CrawlConfig;
  classifier: ICandidateClassifier;
  stopped: StopCheck;
  /** Set when a worker fails, so the others stop taking pages. */
  halted: boolean;
}

const FOLLOWED_SOURCES = new Set<DiscoveredLink['source']>(['anchor', 'iframe']);
const IDLE_POLL_MS = 50;

@injectable()
export class CrawlerService implements ICrawlerService {
  readonly events: CrawlEvents;
  private state: CrawlState = 'Idle';

  constructor(
    @inject(TYPES.LoggerService) private loggerService: ILoggerService,
    @inject(TYPES.HttpClient) private httpClient: IHttpClient,
    @inject(TYPES.RobotsPolicy) private robotsPolicy: IRobotsPolicy,
    @inject(TYPES.LinkExtractor) private linkExtractor: ILinkExtractor,
    @inject(TYPES.ClassifierFactory) private classifierFactory: ClassifierFactory,
    @inject(TYPES.Verifier) private verifier: IVerifier,
  ) {
    this.events = new CrawlEvents((error) => {
      this.loggerService.error('Crawl event listener failed', error instanceof Error ? error : undefined);
    });
  }

  public getState(): CrawlState {
    return this.state;
  }

  /**
   * Breadth-first crawl from `config.url`, then verification of every
   * candidate found. The HTTP settings and the classifier come from `config`.
   * The signal is polled before each dequeue, before each fetch and before
   * each verification; in-flight requests are never aborted.
   */
  public async crawl(config: CrawlConfig, runOptions: CrawlRunOptions = {}): Promise<CrawlResult> {
    if (this.state === 'Running') {
      throw new Error('A crawl is already running on this crawler');
    }

    this.httpClient.configure(config);
    const run: CrawlRun = {
      session: new CrawlSession(normalize(config.url)),
      config,
      classifier: this.classifierFactory(config.classifier, { catchAll: config.catchAll }),
      stopped: () => runOptions.signal?.aborted === true,
      halted: false,
    };
    this.setState('Running');

    try {
      return await this.execute(run);
    } catch (error) {
      this.setState('Stopped');
      throw error;
    }
  }

  private async execute(run: CrawlRun): Promise<CrawlResult> {
    const { session, config, stopped } = run;
    this.loggerService.infoWithoutInterference(`🚀 Crawling ${config.url} (depth ${config.maxDepth}, ${config.workers} worker(s))`);
    await this.crawlWithWorkers(run);

    if (stopped()) {
      this.loggerService.warnWithoutInterference(`🛑 Stopped after ${session.pages.length} page(s); verification skipped`);
      return this.finish(session, 'Stopped');
    }

    this.loggerService.infoWithoutInterference(`🔎 Verifying ${session.stats().candidatesSeen} candidate(s)...`);
    await this.verifyCandidates(session, stopped);
    return this.finish(session, stopped() ? 'Stopped' : 'Completed');
  }

  private setState(state: CrawlState): void {
    this.state = state;
    this.events.emit('state', state);
  }

  private finish(session: CrawlSession, state: 'Stopped' | 'Completed'): CrawlResult {
    this.setState(state);
    const stats = session.stats();
    this.loggerService.debugWithoutInterference(
      `📊 pages ${stats.pagesCrawled}, candidates ${stats.candidatesSeen}, verified ${stats.verifiedCount}, rejected ${stats.rejectedCount}`,
    );
    return {
      state,
      pages: [...session.pages],
      candidates: session.orderedCandidates(),
      verified: [...session.verified],
      rejected: [...session.rejected],
      stats,
    };
  }

  private async crawlWithWorkers(run: CrawlRun): Promise<void> {
    const workers = Array.from({ length: run.config.workers }, (_, workerId) =>
      this.workerCrawl(workerId, run).catch((error: unknown) => {
        run.halted = true;
        throw error;
      }),
    );
    const outcomes = await Promise.allSettled(workers);
    const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failure) throw failure.reason;
  }

  private async workerCrawl(workerId: number, run: CrawlRun): Promise<void> {
    const { session } = run;
    while (!run.halted) {
      if (run.stopped()) {
        session.clearQueue();
        return;
      }

      const next = session.dequeue();
      if (!next) {
        if (session.busyWorkers === 0) return;
        await sleep(IDLE_POLL_MS);
        continue;
      }

      session.workerStarted();
      try {
        await this.crawlPage(next, run);
      } finally {
        session.workerFinished();
      }
      this.loggerService.debugWithoutInterference(`👷 Worker ${workerId}: ${session.queueSize} page(s) queued`);
    }
  }

  private async crawlPage(task: PageTask, run: CrawlRun): Promise<void> {
    const { session, config } = run;
    const { url, depth } = task;
    if (depth > config.maxDepth) {
      this.events.emit('skip', url, 'depth', `depth ${depth} > ${config.maxDepth}`);
      return;
    }
    if (!session.markVisited(url)) return;

    if (config.respectRobots && !(await this.robotsPolicy.canFetch(url, config.userAgent))) {
      this.loggerService.warnWithoutInterference(`🤖 Skipped by robots.txt: ${url}`);
      this.events.emit('skip', url, 'robots', 'disallowed by robots.txt');
      return;
    }
    if (run.stopped()) return;

    if (!session.reserveFetch(config.maxPages)) {
      session.clearQueue();
      return;
    }

    this.loggerService.infoWithoutInterference(colors.yellow(`🕷️ Crawling: ${url}`));
    let response: PageResponse;
    try {
      response = await this.httpClient.fetchPage(url);
    } catch (error) {
      session.releaseFetch();
      const failure = describeFetchError(error);
      this.loggerService.errorWithoutInterference(`Error crawling ${url}: ${failure.message}`);
      this.events.emit('skip', url, 'fetch-failed', failure.message);
      return;
    }
    session.releaseFetch();

    const pageUrl = normalize(response.url || url);
    if (pageUrl !== url && !session.markVisited(pageUrl)) {
      this.loggerService.debugWithoutInterference(`↪️ ${url} redirected to ${pageUrl}, already visited`);
      return;
    }

    const page: PageRecord = {
      url,
      depth,
      fetchedAt: new Date(),
      status: response.statusCode,
      contentType: mediaType(response.contentType),
    };
    session.recordPage(page);

    if (response.statusCode >= 400) {
      this.loggerService.warnWithoutInterference(`HTTP ${response.statusCode} for ${url}`);
      this.events.emit('skip', url, 'http-error', `HTTP ${response.statusCode}`);
    } else if (isHtmlContentType(response.contentType)) {
      this.processHtml(response.body, pageUrl, task, run);
    } else {
      this.inspectNonHtml(pageUrl, task, response, run);
    }

    this.events.emit('page', page, session.stats());
  }

  private processHtml(html: string, pageUrl: string, task: PageTask, run: CrawlRun): void {
    const { session, config, classifier } = run;
    const links = this.linkExtractor.extractLinks(html, pageUrl);
    let queued = 0;

    for (const link of links) {
      const classification = classifier.classify(link.url, link.linkText, link.contextText, link.source);
      this.recordCandidate(link.url, classification, task.url, link.linkText, session);

      if (task.depth < config.maxDepth && this.isFollowable(link, config)) {
        if (session.enqueue({ url: link.url, depth: task.depth + 1, parentUrl: task.url })) {
          queued++;
        }
      }
    }

    this.loggerService.debugWithoutInterference(`🔗 ${links.length} link(s) on ${pageUrl}, ${queued} new page(s) queued`);
  }

  private isFollowable(link: DiscoveredLink, config: CrawlConfig): boolean {
    return (
      FOLLOWED_SOURCES.has(link.source) &&
      !matchesDocumentExtension(link.url) &&
      sameSite(link.url, config.url, config.allowSubdomains)
    );
  }

  /** A page that turned out not to be HTML may itself be the document. */
  private inspectNonHtml(pageUrl: string, task: PageTask, response: PageResponse, run: CrawlRun): void {
    const classification = run.classifier.classify(pageUrl);
    if (DOCUMENT_CONTENT_TYPES.has(mediaType(response.contentType))) {
      classification.reasons.add('content-type');
      classification.isCandidate = true;
      classification.priority = 'high';
    }
    this.recordCandidate(pageUrl, classification, task.parentUrl || task.url, '', run.session);
  }

  private recordCandidate(
    url: string,
    classification: Classification,
    foundOn: string,
    linkText: string,
    session: CrawlSession,
  ): void {
    const merged = session.mergeCandidate(url, classification, foundOn, linkText);
    if (!merged) return;

    if (merged.isNew) {
      const reasons = [...merged.candidate.reasons].join(', ');
      this.loggerService.debugWithoutInterference(`📄 Candidate (${merged.candidate.priority}; ${reasons}): ${url}`);
    }
    this.events.emit('candidate', merged.candidate, merged.isNew);
  }

  private async verifyCandidates(session: CrawlSession, stopped: StopCheck): Promise<void> {
    for (const candidate of session.orderedCandidates()) {
      if (stopped()) return;

      const outcome = await this.verifier.verify(candidate);
      if (outcome.accepted) {
        session.verified.push(outcome.document);
        this.loggerService.infoWithoutInterference(
          colors.green(`✅ ${outcome.document.method}: ${outcome.document.finalUrl}`),
        );
        this.events.emit('verified', outcome.document, outcome.note);
      } else {
        const rejection = { url: outcome.url, reason: outcome.reason };
        session.rejected.push(rejection);
        this.loggerService.debugWithoutInterference(`❌ Rejected ${outcome.url}: ${outcome.reason}`);
        this.events.emit('rejected', rejection);
      }
    }
  }
}
