import { ICandidateClassifier } from '../interfaces';
import { Classification, ClassifierKind, LinkSource, Priority, ReasonTag } from '../types';
import {
  AGGRESSIVE_RULES,
  BASIC_RULES,
  ClassificationRule,
  RuleInput,
  cleanText,
  fallbackRule,
  higherPriority,
} from './classificationRules';
import { hostOf, isWebUrl, parseUrl } from './urlNormalizer';

export interface ClassifierOptions {
  catchAll?: boolean;
}

const SOURCE_TAGS: Partial<Record<LinkSource, ReasonTag>> = {
  inline: 'inline-url',
  script: 'script-ref',
  'data-attribute': 'data-attribute',
};

function foldMatches(rules: readonly ClassificationRule[], input: RuleInput): Classification {
  const reasons = new Set<ReasonTag>();
  let priority: Priority | null = null;

  for (const rule of rules) {
    const match = rule(input);
    if (!match) continue;
    match.reasons.forEach((reason) => reasons.add(reason));
    priority = priority === null ? match.priority : higherPriority(priority, match.priority);
  }

  return { isCandidate: priority !== null, reasons, priority };
}

/**
 * Runs every rule and folds the matches: reasons accumulate, the priority is
 * the highest one any rule assigned. The fallback rule only gets a say when
 * nothing else matched.
 */
export function evaluateRules(
  rules: readonly ClassificationRule[],
  input: RuleInput,
  fallback: ClassificationRule | null,
): Classification {
  let result = foldMatches(rules, input);
  if (!result.isCandidate && fallback) {
    result = foldMatches([fallback], input);
  }
  if (!result.isCandidate) return result;

  const sourceTag = SOURCE_TAGS[input.source];
  if (sourceTag) result.reasons.add(sourceTag);
  return result;
}

function buildInput(url: string, linkText: string, contextText: string, source: LinkSource): RuleInput | null {
  const parsed = isWebUrl(url) ? parseUrl(url) : null;
  const host = hostOf(url);
  if (!parsed || !host) return null;
  return {
    url: parsed,
    href: url,
    host,
    path: parsed.pathname.toLowerCase(),
    linkText: cleanText(linkText),
    contextText: cleanText(contextText),
    source,
  };
}

/**
 * A classifier is a rule set plus an optional fallback. The basic and the
 * aggressive flavours differ only in what they are built with.
 */
export class CandidateClassifier implements ICandidateClassifier {
  constructor(
    private readonly rules: readonly ClassificationRule[],
    private readonly fallback: ClassificationRule | null = null,
  ) {}

  classify(url: string, linkText = '', contextText = '', source: LinkSource = 'anchor'): Classification {
    const input = buildInput(url, linkText, contextText, source);
    if (!input) return { isCandidate: false, reasons: new Set(), priority: null };
    return evaluateRules(this.rules, input, this.fallback);
  }
}

/** URL-shape signals only: extension, embeds, query parameters, viewer hosts and paths. */
export function createBasicClassifier(): CandidateClassifier {
  return new CandidateClassifier(BASIC_RULES);
}

/** Adds shortener and link-text signals, and the catch-all fallback when enabled. */
export function createAggressiveClassifier(options: ClassifierOptions = {}): CandidateClassifier {
  return new CandidateClassifier(AGGRESSIVE_RULES, options.catchAll ? fallbackRule : null);
}

export function createClassifier(kind: ClassifierKind, options: ClassifierOptions = {}): CandidateClassifier {
  return kind === 'basic' ? createBasicClassifier() : createAggressiveClassifier(options);
}
