import { Container } from 'inversify';
import { TYPES } from '../di/types';
import { ICloudLinkResolver, IHttpClient, ILoggerService, IVerifier } from '../interfaces';
import { CloudLinkResolver } from '../core/cloudLinkResolver';
import { Verifier } from '../core/verifier';
import { CandidateURL, Priority, ReasonTag } from '../types';
import { createHttpClientMock, createLoggerMock, probeResponse } from './helpers';

function candidate(url: string, priority: Priority, reasons: ReasonTag[]): CandidateURL {
  return {
    url,
    priority,
    reasons: new Set(reasons),
    foundOnPages: new Set(['https://example.com/']),
    linkTexts: new Set(),
  };
}

describe('Verifier', () => {
  let verifier: IVerifier;
  let httpClient: jest.Mocked<IHttpClient>;

  beforeEach(() => {
    const container = new Container();
    httpClient = createHttpClientMock();
    container.bind<IHttpClient>(TYPES.HttpClient).toConstantValue(httpClient);
    container.bind<ILoggerService>(TYPES.LoggerService).toConstantValue(createLoggerMock());
    container.bind<ICloudLinkResolver>(TYPES.CloudLinkResolver).to(CloudLinkResolver);
    container.bind<IVerifier>(TYPES.Verifier).to(Verifier);
    verifier = container.get<IVerifier>(TYPES.Verifier);
  });

  it('accepts a document extension without touching the network', async () => {
    const outcome = await verifier.verify(candidate('https://example.com/files/guide.pdf', 'high', ['extension']));

    expect(outcome).toEqual({
      accepted: true,
      note: 'document extension in URL',
      document: {
        finalUrl: 'https://example.com/files/guide.pdf',
        sourceCandidate: 'https://example.com/files/guide.pdf',
        method: 'extension-match',
        httpStatus: null,
        contentType: null,
      },
    });
    expect(httpClient.head).not.toHaveBeenCalled();
    expect(httpClient.probe).not.toHaveBeenCalled();
  });

  it('confirms through HEAD and reports the URL after redirects', async () => {
    httpClient.head.mockResolvedValue(
      probeResponse('https://cdn.example.com/guide-final', { contentType: 'application/pdf; charset=binary' }),
    );

    const outcome = await verifier.verify(candidate('https://example.com/download?id=7', 'medium', ['query-param']));

    expect(outcome.accepted).toBe(true);
    if (!outcome.accepted) return;
    expect(outcome.document).toEqual({
      finalUrl: 'https://cdn.example.com/guide-final',
      sourceCandidate: 'https://example.com/download?id=7',
      method: 'header-confirmed',
      httpStatus: 200,
      contentType: 'application/pdf',
    });
    expect(httpClient.probe).not.toHaveBeenCalled();
  });

  it('resolves storage links before probing and falls back to a header-only GET', async () => {
    const direct = 'https://drive.google.com/uc?export=download&id=ABC123';
    httpClient.head.mockResolvedValue(probeResponse(direct, { contentType: 'text/html' }));
    httpClient.probe.mockResolvedValue(
      probeResponse(direct, {
        contentType: 'application/octet-stream',
        contentDisposition: 'attachment; filename="menu.pdf"',
      }),
    );

    const outcome = await verifier.verify(
      candidate('https://drive.google.com/file/d/ABC123/view', 'medium', ['viewer-host', 'viewer-path']),
    );

    expect(httpClient.head).toHaveBeenCalledWith(direct);
    expect(httpClient.probe).toHaveBeenCalledWith(direct);
    expect(outcome.accepted && outcome.document.method).toBe('redirect-confirmed');
  });

  it('accepts a redirect that lands on a document URL', async () => {
    httpClient.head.mockResolvedValue(
      probeResponse('https://example.com/real/file.pdf', { contentType: 'application/octet-stream' }),
    );

    const outcome = await verifier.verify(candidate('https://example.com/go/42', 'medium', ['text-hint']));

    expect(outcome.accepted).toBe(true);
    if (!outcome.accepted) return;
    expect(outcome.document.method).toBe('redirect-confirmed');
    expect(outcome.document.finalUrl).toBe('https://example.com/real/file.pdf');
  });

  describe('when probes are inconclusive', () => {
    beforeEach(() => {
      httpClient.head.mockRejectedValue(new Error('socket hang up'));
      httpClient.probe.mockResolvedValue(probeResponse('https://example.com/x', { contentType: 'text/html' }));
    });

    it('still accepts high-priority candidates', async () => {
      const outcome = await verifier.verify(candidate('https://example.com/get/17', 'high', ['text-pdf']));

      expect(outcome.accepted).toBe(true);
      if (!outcome.accepted) return;
      expect(outcome.document.method).toBe('heuristic-accepted');
      expect(outcome.document.finalUrl).toBe('https://example.com/get/17');
      expect(outcome.note).toBe('unconfirmed high candidate (HEAD failed: socket hang up; GET 200 text/html)');
    });

    it('accepts medium storage and shortener links', async () => {
      const outcome = await verifier.verify(candidate('https://bit.ly/abc', 'medium', ['shortened-url', 'text-hint']));

      expect(outcome.accepted && outcome.document.method).toBe('heuristic-accepted');
    });

    it('rejects other medium and low candidates', async () => {
      const medium = await verifier.verify(candidate('https://example.com/forms', 'medium', ['text-hint']));
      const low = await verifier.verify(candidate('https://example.com/about', 'low', ['fallback']));

      expect(medium).toEqual({
        accepted: false,
        url: 'https://example.com/forms',
        reason: 'unverified medium candidate (HEAD failed: socket hang up; GET 200 text/html)',
      });
      expect(low.accepted).toBe(false);
    });
  });
});
