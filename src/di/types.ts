const TYPES = {
  CrawlerService: Symbol.for('CrawlerService'),
  ConfigService: Symbol.for('ConfigService'),
  LoggerService: Symbol.for('LoggerService'),
  FileSystemService: Symbol.for('FileSystemService'),
  HttpClient: Symbol.for('HttpClient'),
  RobotsPolicy: Symbol.for('RobotsPolicy'),
  LinkExtractor: Symbol.for('LinkExtractor'),
  ClassifierFactory: Symbol.for('ClassifierFactory'),
  CloudLinkResolver: Symbol.for('CloudLinkResolver'),
  Verifier: Symbol.for('Verifier'),
  DocumentDownloader: Symbol.for('DocumentDownloader'),
  ResultExporter: Symbol.for('ResultExporter'),
};

export { TYPES };
