import { CrawlOptions } from '../types';

export const defaultConfig: CrawlOptions = {
  url: '',
  output: 'output',
  depth: '2',
  maxPages: '500',
  timeout: '30',
  delay: '0.5',
  workers: '1',
  subdomains: true,
  classifier: 'aggressive',
  catchAll: false,
  ignoreRobots: false,
  download: false,
  userAgent: 'doc-hunter/1.0',
  logLevel: 'info',
};

export { ConfigService } from '../services/configService';
