import { injectable, inject } from 'inversify';
import { TYPES } from '../di/types';
import { IHttpClient, ILoggerService, IRobotsPolicy } from '../interfaces';
import { describeFetchError } from '../errors';
import { parseUrl } from '../core/urlNormalizer';

export interface RobotsRules {
  allow: string[];
  disallow: string[];
}

const ALLOW_ALL: RobotsRules = { allow: [], disallow: [] };

/**
 * Rules of the group addressed to `agent` (matched on the product token),
 * falling back to the `*` group.
 */
export function parseRobotsTxt(content: string, agent = '*'): RobotsRules {
  const groups = new Map<string, RobotsRules>();
  let currentAgents: string[] = [];
  let collectingAgents = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (key === 'user-agent') {
      if (!collectingAgents) currentAgents = [];
      collectingAgents = true;
      const name = value.toLowerCase();
      currentAgents.push(name);
      if (!groups.has(name)) groups.set(name, { allow: [], disallow: [] });
      continue;
    }

    collectingAgents = false;
    if (key !== 'allow' && key !== 'disallow') continue;
    for (const name of currentAgents) {
      groups.get(name)?.[key].push(value);
    }
  }

  const token = agent.split('/')[0].toLowerCase();
  return groups.get(token) ?? groups.get('*') ?? ALLOW_ALL;
}

function patternToRegex(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

function longestMatch(pathAndQuery: string, patterns: string[]): number {
  let longest = -1;
  for (const pattern of patterns) {
    if (pattern && patternToRegex(pattern).test(pathAndQuery)) {
      longest = Math.max(longest, pattern.length);
    }
  }
  return longest;
}

/** Longest matching rule wins; Allow wins a tie. */
export function isAllowed(url: string, rules: RobotsRules): boolean {
  const parsed = parseUrl(url);
  if (!parsed) return false;
  const pathAndQuery = `${parsed.pathname}${parsed.search}`;
  const disallowed = longestMatch(pathAndQuery, rules.disallow);
  if (disallowed < 0) return true;
  return longestMatch(pathAndQuery, rules.allow) >= disallowed;
}

/**
 * Reads robots.txt once per origin and keeps the file, so every crawl can
 * pick the group for its own user agent. A missing or unreadable file allows everything.
 */
@injectable()
export class RobotsPolicy implements IRobotsPolicy {
  private readonly cache = new Map<string, Promise<string | null>>();

  constructor(
    @inject(TYPES.HttpClient) private httpClient: IHttpClient,
    @inject(TYPES.LoggerService) private loggerService: ILoggerService,
  ) {}

  async canFetch(url: string, userAgent: string): Promise<boolean> {
    const parsed = parseUrl(url);
    if (!parsed) return false;

    let content = this.cache.get(parsed.origin);
    if (!content) {
      content = this.load(parsed.origin);
      this.cache.set(parsed.origin, content);
    }
    const body = await content;
    return body === null ? true : isAllowed(url, parseRobotsTxt(body, userAgent));
  }

  private async load(origin: string): Promise<string | null> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const response = await this.httpClient.fetchText(robotsUrl);
      if (response.statusCode >= 400) {
        this.loggerService.debugWithoutInterference(`No robots.txt at ${origin} (HTTP ${response.statusCode})`);
        return null;
      }
      return response.body;
    } catch (error) {
      this.loggerService.warnWithoutInterference(`Could not read ${robotsUrl}: ${describeFetchError(error).message}`);
      return null;
    }
  }
}
