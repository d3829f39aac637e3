import { injectable, inject } from 'inversify';
import * as path from 'path';
import { TYPES } from '../di/types';
import { IDocumentDownloader, IFileSystemService, IHttpClient, ILoggerService } from '../interfaces';
import { DownloadOutcome, ProbeResponse, VerifiedDocument } from '../types';
import { describeFetchError } from '../errors';
import { parseUrl } from '../core/urlNormalizer';
import { mediaType } from './httpClient';

export type DocumentFormat = 'pdf' | 'ole' | 'zip';

const SIGNATURES: Record<DocumentFormat, Buffer> = {
  pdf: Buffer.from('%PDF', 'ascii'),
  ole: Buffer.from([0xd0, 0xcf, 0x11, 0xe0]),
  zip: Buffer.from([0x50, 0x4b, 0x03, 0x04]),
};

const FORMAT_BY_TYPE: Record<string, DocumentFormat> = {
  'application/msword': 'ole',
  'application/vnd.ms-excel': 'ole',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'zip',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'zip',
};

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.doc': 'ole',
  '.xls': 'ole',
  '.docx': 'zip',
  '.xlsx': 'zip',
};

const EXTENSION_BY_FORMAT: Record<DocumentFormat, string> = {
  pdf: '.pdf',
  ole: '.doc',
  zip: '.docx',
};

function urlExtension(url: string): string {
  const parsed = parseUrl(url);
  return parsed ? path.extname(parsed.pathname).toLowerCase() : '';
}

/** Office formats are recognised by content type or extension; everything else must be a PDF. */
export function expectedFormat(contentType: string, url: string): DocumentFormat {
  return FORMAT_BY_TYPE[mediaType(contentType)] ?? FORMAT_BY_EXTENSION[urlExtension(url)] ?? 'pdf';
}

export function hasSignature(head: Buffer, format: DocumentFormat): boolean {
  const signature = SIGNATURES[format];
  return head.length >= signature.length && head.subarray(0, signature.length).equals(signature);
}

/** File name from the last path segment, reduced to a safe character set. */
export function fileNameFor(url: string, format: DocumentFormat): string {
  const parsed = parseUrl(url);
  const segment = parsed ? decodeURIComponentSafe(path.posix.basename(parsed.pathname)) : '';
  let name = segment.replace(/[^a-zA-Z0-9._-]+/g, '_').replace(/^[._]+/, '').slice(0, 120);
  if (!name) name = 'document';
  if (!path.extname(name)) name += EXTENSION_BY_FORMAT[format];
  return name;
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Stores verified documents on disk. A download that does not start with the
 * signature of its format is deleted again and reported as failed.
 */
@injectable()
export class DocumentDownloader implements IDocumentDownloader {
  private usedNames = new Set<string>();

  constructor(
    @inject(TYPES.HttpClient) private httpClient: IHttpClient,
    @inject(TYPES.FileSystemService) private fileSystemService: IFileSystemService,
    @inject(TYPES.LoggerService) private loggerService: ILoggerService,
  ) {}

  async download(document: VerifiedDocument, outputDir: string): Promise<DownloadOutcome> {
    const url = document.finalUrl;
    const directory = path.join(outputDir, 'documents');
    await this.fileSystemService.ensureDirectory(directory);

    const filePath = path.join(directory, this.uniqueName(fileNameFor(url, expectedFormat(document.contentType ?? '', url))));

    let response: ProbeResponse;
    try {
      response = await this.httpClient.download(url, filePath);
    } catch (error) {
      await this.fileSystemService.removeFile(filePath);
      return this.fail(url, describeFetchError(error).message);
    }

    if (response.statusCode >= 400) {
      await this.fileSystemService.removeFile(filePath);
      return this.fail(url, `HTTP ${response.statusCode}`);
    }

    const format = expectedFormat(response.contentType || document.contentType || '', response.url || url);
    const head = await this.fileSystemService.readHead(filePath, 4);
    if (!hasSignature(head, format)) {
      await this.fileSystemService.removeFile(filePath);
      return this.fail(url, `signature mismatch: expected ${format} content`);
    }

    const bytes = await this.fileSystemService.fileSize(filePath);
    this.loggerService.debugWithoutInterference(`💾 Saved ${url} → ${filePath} (${bytes} bytes)`);
    return { status: 'saved', url, filePath, bytes };
  }

  private uniqueName(name: string): string {
    const extension = path.extname(name);
    const stem = name.slice(0, name.length - extension.length);
    let candidate = name;
    for (let counter = 1; this.usedNames.has(candidate); counter++) {
      candidate = `${stem}-${counter}${extension}`;
    }
    this.usedNames.add(candidate);
    return candidate;
  }

  private fail(url: string, reason: string): DownloadOutcome {
    this.loggerService.warnWithoutInterference(`Download failed for ${url}: ${reason}`);
    return { status: 'failed', url, reason };
  }
}
