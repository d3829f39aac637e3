import { CandidateURL, Classification, CrawlStats, PageRecord, PageTask, Priority, Rejection, VerifiedDocument } from '../types';
import { PRIORITY_RANK, higherPriority } from '../core/classificationRules';

/**
 * Mutable state of exactly one crawl run. A new session is created by every
 * call to `crawl()` and dropped when it returns, so nothing leaks between runs.
 *
 * The visited check-and-insert and the candidate merge never await, which on
 * a single event loop makes each of them atomic with respect to other workers.
 */
export class CrawlSession {
  private readonly visited = new Set<string>();
  private readonly queue: PageTask[] = [];
  private readonly discovered = new Set<string>();
  private readonly candidates = new Map<string, CandidateURL>();
  readonly pages: PageRecord[] = [];
  readonly verified: VerifiedDocument[] = [];
  readonly rejected: Rejection[] = [];
  private activeWorkers = 0;
  private pendingFetches = 0;

  constructor(seedUrl: string) {
    this.enqueue({ url: seedUrl, depth: 0, parentUrl: '' });
  }

  /** Queues a page unless it was queued or visited before. */
  enqueue(task: PageTask): boolean {
    if (this.discovered.has(task.url) || this.visited.has(task.url)) return false;
    this.discovered.add(task.url);
    this.queue.push(task);
    return true;
  }

  dequeue(): PageTask | undefined {
    return this.queue.shift();
  }

  clearQueue(): void {
    this.queue.length = 0;
  }

  get queueSize(): number {
    return this.queue.length;
  }

  /** Marks the URL visited; false when another worker got there first. */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) return false;
    this.visited.add(url);
    return true;
  }

  /**
   * Claims one of the `maxPages` fetch slots. Recorded pages and fetches still
   * in flight both hold a slot; release it once the page is recorded or dropped.
   */
  reserveFetch(maxPages: number): boolean {
    if (this.pages.length + this.pendingFetches >= maxPages) return false;
    this.pendingFetches++;
    return true;
  }

  releaseFetch(): void {
    this.pendingFetches--;
  }

  recordPage(page: PageRecord): void {
    this.pages.push(page);
  }

  /**
   * Adds a classified URL to the candidate table, or folds a repeat sighting
   * into the existing entry. Returns the entry and whether it is new.
   */
  mergeCandidate(
    url: string,
    classification: Classification,
    foundOn: string,
    linkText: string,
  ): { candidate: CandidateURL; isNew: boolean } | null {
    const { isCandidate, reasons, priority } = classification;
    if (!isCandidate || priority === null || reasons.size === 0) return null;

    const existing = this.candidates.get(url);
    if (existing) {
      reasons.forEach((reason) => existing.reasons.add(reason));
      existing.foundOnPages.add(foundOn);
      if (linkText) existing.linkTexts.add(linkText);
      existing.priority = higherPriority(existing.priority, priority);
      return { candidate: existing, isNew: false };
    }

    const candidate: CandidateURL = {
      url,
      reasons: new Set(reasons),
      foundOnPages: new Set([foundOn]),
      priority,
      linkTexts: new Set(linkText ? [linkText] : []),
    };
    this.candidates.set(url, candidate);
    return { candidate, isNew: true };
  }

  /** High priority first; ties keep the order in which candidates were first seen. */
  orderedCandidates(): CandidateURL[] {
    const byPriority = (a: Priority, b: Priority) => PRIORITY_RANK[b] - PRIORITY_RANK[a];
    return [...this.candidates.values()].sort((a, b) => byPriority(a.priority, b.priority));
  }

  workerStarted(): void {
    this.activeWorkers++;
  }

  workerFinished(): void {
    this.activeWorkers--;
  }

  get busyWorkers(): number {
    return this.activeWorkers;
  }

  stats(): CrawlStats {
    return {
      pagesCrawled: this.pages.length,
      candidatesSeen: this.candidates.size,
      verifiedCount: this.verified.length,
      rejectedCount: this.rejected.length,
      pendingPages: this.queue.length,
    };
  }
}
