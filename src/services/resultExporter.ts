import { injectable, inject } from 'inversify';
import * as path from 'path';
import { TYPES } from '../di/types';
import { IFileSystemService, IResultExporter } from '../interfaces';
import { CandidateURL, CrawlResult, DownloadOutcome, VerifiedDocument } from '../types';

const CSV_HEADER = [
  'url',
  'priority',
  'reasons',
  'verified',
  'method',
  'final_url',
  'found_on',
  'link_texts',
  'download',
  'download_detail',
];

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function downloadsByUrl(downloads: readonly DownloadOutcome[]): Map<string, DownloadOutcome> {
  return new Map(downloads.map((outcome) => [outcome.url, outcome]));
}

/** `saved` with the file path, `failed` with the reason, or two blanks when nothing was downloaded. */
function downloadColumns(outcome: DownloadOutcome | undefined): [string, string] {
  if (!outcome) return ['', ''];
  return outcome.status === 'saved' ? ['saved', outcome.filePath] : ['failed', outcome.reason];
}

function candidateRow(
  candidate: CandidateURL,
  document: VerifiedDocument | undefined,
  download: DownloadOutcome | undefined,
): string[] {
  return [
    candidate.url,
    candidate.priority,
    [...candidate.reasons].join(' '),
    document ? 'yes' : 'no',
    document?.method ?? '',
    document?.finalUrl ?? '',
    [...candidate.foundOnPages].join(' '),
    [...candidate.linkTexts].join(' | '),
    ...downloadColumns(download),
  ];
}

export function toCsv(result: CrawlResult, downloads: readonly DownloadOutcome[] = []): string {
  const verifiedBySource = new Map(result.verified.map((document) => [document.sourceCandidate, document]));
  const downloaded = downloadsByUrl(downloads);
  const rows = result.candidates.map((candidate) => {
    const document = verifiedBySource.get(candidate.url);
    return candidateRow(candidate, document, document && downloaded.get(document.finalUrl));
  });
  return [CSV_HEADER, ...rows].map((row) => row.map(csvField).join(',')).join('\n') + '\n';
}

/** Plain JSON view of a result; sets become arrays and dates ISO strings. */
export function toJson(result: CrawlResult, downloads: readonly DownloadOutcome[] = []): string {
  const downloaded = downloadsByUrl(downloads);
  const record = {
    state: result.state,
    stats: result.stats,
    verified: result.verified.map((document) => {
      const download = downloaded.get(document.finalUrl);
      return download ? { ...document, download } : document;
    }),
    rejected: result.rejected,
    candidates: result.candidates.map((candidate) => ({
      url: candidate.url,
      priority: candidate.priority,
      reasons: [...candidate.reasons],
      foundOnPages: [...candidate.foundOnPages],
      linkTexts: [...candidate.linkTexts],
    })),
    pages: result.pages.map((page) => ({ ...page, fetchedAt: page.fetchedAt.toISOString() })),
  };
  return JSON.stringify(record, null, 2);
}

@injectable()
export class ResultExporter implements IResultExporter {
  constructor(@inject(TYPES.FileSystemService) private fileSystemService: IFileSystemService) {}

  async export(result: CrawlResult, outputDir: string, downloads: readonly DownloadOutcome[] = []): Promise<string[]> {
    const jsonPath = path.join(outputDir, 'results.json');
    const csvPath = path.join(outputDir, 'candidates.csv');
    await this.fileSystemService.saveToFile(toJson(result, downloads), jsonPath);
    await this.fileSystemService.saveToFile(toCsv(result, downloads), csvPath);
    return [jsonPath, csvPath];
  }
}
