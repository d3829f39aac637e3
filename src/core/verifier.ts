import { injectable, inject } from 'inversify';
import { TYPES } from '../di/types';
import { ICloudLinkResolver, IHttpClient, ILoggerService, IVerifier } from '../interfaces';
import { CandidateURL, ProbeResponse, ReasonTag, VerificationMethod, VerificationOutcome } from '../types';
import { describeFetchError } from '../errors';
import { matchesDocumentExtension } from './classificationRules';
import { mediaType } from '../services/httpClient';

export const DOCUMENT_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'application/x-pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/vnd.ms-excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
]);

/** Detection paths that are trusted even when no probe could confirm them. */
const RELIABLE_REASONS: readonly ReasonTag[] = ['extension', 'embed-tag'];
/** Medium-priority paths trusted without confirmation: storage hosts and shorteners. */
const TRUSTED_MEDIUM_REASONS: readonly ReasonTag[] = ['viewer-host', 'shortened-url'];

type ProbeVerdict =
  | { kind: 'confirmed'; method: VerificationMethod; response: ProbeResponse; note: string }
  | { kind: 'inconclusive'; note: string };

function describesDocument(response: ProbeResponse): boolean {
  if (response.statusCode >= 400) return false;
  if (DOCUMENT_CONTENT_TYPES.has(mediaType(response.contentType))) return true;
  return /filename\*?=[^;]*\.(pdf|docx?)/i.test(response.contentDisposition);
}

@injectable()
export class Verifier implements IVerifier {
  constructor(
    @inject(TYPES.HttpClient) private httpClient: IHttpClient,
    @inject(TYPES.CloudLinkResolver) private resolver: ICloudLinkResolver,
    @inject(TYPES.LoggerService) private loggerService: ILoggerService,
  ) {}

  async verify(candidate: CandidateURL): Promise<VerificationOutcome> {
    const resolved = this.resolver.resolve(candidate.url);
    if (resolved !== candidate.url) {
      this.loggerService.debugWithoutInterference(`Resolved ${candidate.url} → ${resolved}`);
    }

    if (matchesDocumentExtension(resolved)) {
      return this.accept(candidate, resolved, 'extension-match', null, 'document extension in URL');
    }

    const head = await this.runProbe('HEAD', resolved, () => this.httpClient.head(resolved), 'header-confirmed');
    if (head.kind === 'confirmed') {
      return this.accept(candidate, head.response.url, head.method, head.response, head.note);
    }

    const get = await this.runProbe('GET', resolved, () => this.httpClient.probe(resolved), 'redirect-confirmed');
    if (get.kind === 'confirmed') {
      return this.accept(candidate, get.response.url, get.method, get.response, get.note);
    }

    return this.applyHeuristics(candidate, resolved, `${head.note}; ${get.note}`);
  }

  private async runProbe(
    label: 'HEAD' | 'GET',
    url: string,
    request: () => Promise<ProbeResponse>,
    method: VerificationMethod,
  ): Promise<ProbeVerdict> {
    let response: ProbeResponse;
    try {
      response = await request();
    } catch (error) {
      return { kind: 'inconclusive', note: `${label} failed: ${describeFetchError(error).message}` };
    }

    if (describesDocument(response)) {
      return { kind: 'confirmed', method, response, note: `${label} ${response.statusCode} ${mediaType(response.contentType)}` };
    }
    if (response.statusCode < 400 && response.url !== url && matchesDocumentExtension(response.url)) {
      return { kind: 'confirmed', method: 'redirect-confirmed', response, note: `${label} redirected to ${response.url}` };
    }
    const shown = mediaType(response.contentType) || 'no content-type';
    return { kind: 'inconclusive', note: `${label} ${response.statusCode} ${shown}` };
  }

  private applyHeuristics(candidate: CandidateURL, resolved: string, probes: string): VerificationOutcome {
    const has = (tags: readonly ReasonTag[]) => tags.some((tag) => candidate.reasons.has(tag));

    if (candidate.priority === 'high' || has(RELIABLE_REASONS)) {
      return this.accept(candidate, resolved, 'heuristic-accepted', null, `unconfirmed ${candidate.priority} candidate (${probes})`);
    }
    if (candidate.priority === 'medium' && has(TRUSTED_MEDIUM_REASONS)) {
      return this.accept(candidate, resolved, 'heuristic-accepted', null, `storage or short link (${probes})`);
    }
    return { accepted: false, url: candidate.url, reason: `unverified ${candidate.priority} candidate (${probes})` };
  }

  private accept(
    candidate: CandidateURL,
    finalUrl: string,
    method: VerificationMethod,
    response: ProbeResponse | null,
    note: string,
  ): VerificationOutcome {
    return {
      accepted: true,
      note,
      document: {
        finalUrl,
        sourceCandidate: candidate.url,
        method,
        httpStatus: response ? response.statusCode : null,
        contentType: response ? mediaType(response.contentType) || null : null,
      },
    };
  }
}
