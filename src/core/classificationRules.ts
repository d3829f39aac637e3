import signals from '../data/signals.json';
import { LinkSource, Priority, ReasonTag } from '../types';
import { hostMatches } from './urlNormalizer';

export interface RuleInput {
  url: URL;
  href: string;
  host: string;
  path: string;
  linkText: string;
  contextText: string;
  source: LinkSource;
}

export interface RuleMatch {
  reasons: ReasonTag[];
  priority: Priority;
}

export type ClassificationRule = (input: RuleInput) => RuleMatch | null;

const DOCUMENT_EXTENSION = /\.(pdf|docx?)(?:$|[?#])/i;
const DOCUMENT_TOKEN = /\.(pdf|docx?)(?![a-z0-9])/i;
const EMBED_SOURCES: ReadonlySet<LinkSource> = new Set<LinkSource>(['embed', 'object', 'iframe']);
const QUERY_PARAMETERS: ReadonlySet<string> = new Set(signals.queryParameters);

const keywordPatterns = signals.documentKeywords.map(
  (keyword) => new RegExp(`(^|[^a-z])${keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}`),
);

export const PRIORITY_RANK: Record<Priority, number> = { high: 3, medium: 2, low: 1 };

export function higherPriority(a: Priority, b: Priority): Priority {
  return PRIORITY_RANK[a] >= PRIORITY_RANK[b] ? a : b;
}

/** `.pdf`, `.doc` or `.docx` at the very end, optionally followed by `?` or `#`. */
export function matchesDocumentExtension(url: string): boolean {
  return DOCUMENT_EXTENSION.test(url);
}

export function containsDocumentToken(value: string): boolean {
  return DOCUMENT_TOKEN.test(value);
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function hasDocumentKeyword(text: string): boolean {
  if (!text) return false;
  return keywordPatterns.some((pattern) => pattern.test(text));
}

export function storageProvider(host: string): string | null {
  const entry = signals.storageHosts.find(({ domains }) => domains.some((domain) => hostMatches(host, domain)));
  return entry ? entry.provider : null;
}

export function isShortenerHost(host: string): boolean {
  return signals.shortenerHosts.some((domain) => hostMatches(host, domain));
}

export function isSocialHost(host: string): boolean {
  return signals.socialHosts.some((domain) => hostMatches(host, domain));
}

function hasViewerPath(path: string): boolean {
  return signals.viewerPathHints.some((hint) => path.includes(hint));
}

function isCdnHost(host: string): boolean {
  return signals.cdnHostPrefixes.some((prefix) => host.startsWith(prefix));
}

export const extensionRule: ClassificationRule = ({ href }) =>
  matchesDocumentExtension(href) ? { reasons: ['extension'], priority: 'high' } : null;

/** Video and map players also live under viewer paths, so an embed needs a document token or a storage host. */
export const embedRule: ClassificationRule = ({ href, host, source }) => {
  if (!EMBED_SOURCES.has(source)) return null;
  if (containsDocumentToken(href) || storageProvider(host) !== null) {
    return { reasons: ['embed-tag'], priority: 'high' };
  }
  return null;
};

export const queryParameterRule: ClassificationRule = ({ url }) => {
  for (const [key, value] of url.searchParams) {
    if (!QUERY_PARAMETERS.has(key.toLowerCase())) continue;
    if (containsDocumentToken(value) || value.toLowerCase().includes('pdf')) {
      return { reasons: ['query-param'], priority: 'medium' };
    }
  }
  return null;
};

export const viewerRule: ClassificationRule = ({ href, host, path, linkText, contextText }) => {
  const reasons: ReasonTag[] = [];
  if (storageProvider(host) !== null) reasons.push('viewer-host');
  if (hasViewerPath(path)) reasons.push('viewer-path');
  if (isCdnHost(host) && containsDocumentToken(href)) reasons.push('cdn-host');
  if (reasons.length === 0) return null;

  const keyworded = hasDocumentKeyword(linkText) || hasDocumentKeyword(contextText);
  return { reasons, priority: keyworded ? 'high' : 'medium' };
};

export const shortenedUrlRule: ClassificationRule = ({ host, linkText, contextText }) => {
  if (!isShortenerHost(host)) return null;
  if (!hasDocumentKeyword(linkText) && !hasDocumentKeyword(contextText)) return null;
  return { reasons: ['shortened-url'], priority: 'medium' };
};

export const textIndicatorRule: ClassificationRule = ({ linkText }) => {
  if (!linkText) return null;
  if (linkText.includes('pdf')) return { reasons: ['text-pdf'], priority: 'high' };
  if (hasDocumentKeyword(linkText)) return { reasons: ['text-hint'], priority: 'medium' };
  return null;
};

/**
 * Accepts almost any anchor with real words in it. Trades precision for
 * recall on sites that host documents behind unknown URL schemes.
 */
export const fallbackRule: ClassificationRule = ({ host, linkText, source }) => {
  if (source !== 'anchor') return null;
  if (linkText.length <= 3 || !/[a-z]/.test(linkText)) return null;
  if (isSocialHost(host)) return null;
  return { reasons: ['fallback'], priority: 'low' };
};

export const BASIC_RULES: readonly ClassificationRule[] = [extensionRule, embedRule, queryParameterRule, viewerRule];

export const AGGRESSIVE_RULES: readonly ClassificationRule[] = [
  ...BASIC_RULES,
  shortenedUrlRule,
  textIndicatorRule,
];
