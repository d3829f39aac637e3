import { Command } from 'commander';
import { defaultConfig } from '../config';

export const program = new Command();

program
  .name('doc-hunter')
  .version('1.0.0')
  .description('A CLI tool to crawl a website and find the PDF and Word documents it links to')
  .requiredOption('-u, --url <url>', 'URL of the website to crawl (scheme optional)')
  .option('-o, --output <output>', 'Output directory for results and downloads', defaultConfig.output)
  .option('-d, --depth <depth>', 'Maximum link depth to crawl', defaultConfig.depth)
  .option('-m, --max-pages <count>', 'Maximum number of pages to visit', defaultConfig.maxPages)
  .option('-t, --timeout <seconds>', 'Timeout in seconds for each request', defaultConfig.timeout)
  .option('--delay <seconds>', 'Polite delay in seconds between requests to the same host', defaultConfig.delay)
  .option('-w, --workers <workers>', 'Number of concurrent workers', defaultConfig.workers)
  .option('--no-subdomains', 'Stay on the exact host of the seed URL')
  .option('-c, --classifier <kind>', 'Candidate classifier (basic, aggressive)', defaultConfig.classifier)
  .option('--catch-all', 'Treat any descriptive link as a low-priority candidate')
  .option('--ignore-robots', 'Do not consult robots.txt')
  .option('--download', 'Download verified documents into <output>/documents')
  .option('--user-agent <agent>', 'User-Agent header sent with every request', defaultConfig.userAgent)
  .option('--log-level <level>', 'Set the log level (silent, error, warn, info, debug)', defaultConfig.logLevel);
