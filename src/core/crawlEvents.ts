import { EventEmitter } from 'events';
import { CandidateURL, CrawlState, CrawlStats, PageRecord, Rejection, SkipReason, VerifiedDocument } from '../types';

export interface CrawlEventMap {
  state: [state: CrawlState];
  page: [page: PageRecord, stats: CrawlStats];
  skip: [url: string, reason: SkipReason, detail: string];
  candidate: [candidate: CandidateURL, isNew: boolean];
  verified: [document: VerifiedDocument, note: string];
  rejected: [rejection: Rejection];
}

type Listener<K extends keyof CrawlEventMap> = (...args: CrawlEventMap[K]) => void;

/**
 * Progress stream of a crawl. The crawler writes to it whether or not anyone
 * listens; the CLI progress bar and tests subscribe independently. Listeners
 * run inline, so they must return quickly.
 */
export class CrawlEvents {
  private readonly emitter = new EventEmitter();

  constructor(private readonly onListenerError: (error: unknown) => void = () => undefined) {}

  on<K extends keyof CrawlEventMap>(event: K, listener: Listener<K>): this {
    this.emitter.on(event, listener);
    return this;
  }

  emit<K extends keyof CrawlEventMap>(event: K, ...args: CrawlEventMap[K]): void {
    try {
      this.emitter.emit(event, ...args);
    } catch (error) {
      this.onListenerError(error);
    }
  }
}
