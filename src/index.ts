#!/usr/bin/env node
import 'reflect-metadata';
import { container } from './di/container';
import { TYPES } from './di/types';
import {
  ICrawlerService,
  IConfigService,
  IDocumentDownloader,
  ILoggerService,
  IResultExporter,
} from './interfaces';
import { program } from './cli';
import { ConfigurationError } from './errors';
import { CrawlOptions, CrawlResult, DownloadOutcome, LogLevel } from './types';

interface CliValues {
  url?: string;
  output?: string;
  depth?: string;
  maxPages?: string;
  timeout?: string;
  delay?: string;
  workers?: string;
  subdomains?: boolean;
  classifier?: string;
  catchAll?: boolean;
  ignoreRobots?: boolean;
  download?: boolean;
  userAgent?: string;
  logLevel?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

function toLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigurationError(`log-level must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return level;
}

/** Only the options actually present, so absent flags do not mask config.json. */
function toCrawlOptions(values: CliValues): Partial<CrawlOptions> {
  const { logLevel, ...rest } = values;
  const options: Partial<CrawlOptions> = {};
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) Object.assign(options, { [key]: value });
  }
  if (logLevel !== undefined) options.logLevel = toLogLevel(logLevel);
  return options;
}

async function downloadAll(result: CrawlResult, outputDir: string, loggerService: ILoggerService): Promise<DownloadOutcome[]> {
  const downloader = container.get<IDocumentDownloader>(TYPES.DocumentDownloader);
  const outcomes: DownloadOutcome[] = [];
  for (const document of result.verified) {
    outcomes.push(await downloader.download(document, outputDir));
  }
  const saved = outcomes.filter((outcome) => outcome.status === 'saved').length;
  loggerService.logInfo(`💾 Downloaded ${saved}/${result.verified.length} document(s)`);
  return outcomes;
}

async function main() {
  const configService = container.get<IConfigService>(TYPES.ConfigService);
  const loggerService = container.get<ILoggerService>(TYPES.LoggerService);

  try {
    program.parse(process.argv);

    loggerService.log('📚 Document Hunter Starting Up!');
    loggerService.log('🔧 Updating configuration...');
    configService.setConfig(toCrawlOptions(program.opts<CliValues>()));

    const options = configService.getConfig();
    const config = configService.getCrawlConfig();

    loggerService.logInfo(`🌐 Starting crawl of ${config.url}`);
    loggerService.logInfo(`📁 Output directory: ${options.output}`);
    loggerService.logInfo(`🔍 Crawl depth: ${config.maxDepth}, page limit: ${config.maxPages}`);
    loggerService.logInfo(`👷 Number of workers: ${config.workers}`);

    const crawlerService = container.get<ICrawlerService>(TYPES.CrawlerService);
    const controller = new AbortController();
    process.on('SIGINT', () => {
      if (controller.signal.aborted) process.exit(130);
      loggerService.warnWithoutInterference('🛑 Stopping after the current requests... (Ctrl+C again to quit)');
      controller.abort();
    });

    const multibar = loggerService.createMultiBar();
    const progressBar = multibar.create(config.maxPages, 0, { candidates: 0, status: 'crawling' });
    crawlerService.events.on('page', (_page, stats) => {
      progressBar.update(stats.pagesCrawled, { candidates: stats.candidatesSeen, status: `${stats.pendingPages} queued` });
    });
    crawlerService.events.on('verified', () => {
      progressBar.update({ status: 'verifying' });
    });

    let result: CrawlResult;
    try {
      result = await crawlerService.crawl(config, { signal: controller.signal });
    } finally {
      multibar.stop();
    }

    const downloads =
      options.download && result.verified.length > 0 ? await downloadAll(result, options.output, loggerService) : [];

    const files = await container.get<IResultExporter>(TYPES.ResultExporter).export(result, options.output, downloads);
    files.forEach((file) => loggerService.logInfo(`📝 Wrote ${file}`));

    const { stats } = result;
    loggerService.logSuccess(
      `🎉 ${result.state}: ${stats.pagesCrawled} page(s), ${stats.candidatesSeen} candidate(s), ` +
        `${stats.verifiedCount} verified, ${stats.rejectedCount} rejected`,
    );
  } catch (error) {
    if (error instanceof ConfigurationError) {
      loggerService.error(`Configuration error: ${error.message}`);
    } else if (error instanceof Error) {
      loggerService.error('Fatal error during crawling:', error);
    } else {
      loggerService.error('An unknown error occurred during crawling.');
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
