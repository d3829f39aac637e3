import { Container } from 'inversify';
import { CrawlerService } from '../core/crawler';
import { FileSystemService } from '../services/fileSystemService';
import { ConfigService } from '../services/configService';
import { LoggerService } from '../core/loggerService';
import { LinkExtractor } from '../core/linkExtractor';
import { CloudLinkResolver } from '../core/cloudLinkResolver';
import { Verifier } from '../core/verifier';
import { createClassifier } from '../core/candidateClassifier';
import { HttpClient } from '../services/httpClient';
import { RobotsPolicy } from '../services/robotsPolicy';
import { DocumentDownloader } from '../services/documentDownloader';
import { ResultExporter } from '../services/resultExporter';
import { ClassifierFactory } from '../interfaces';
import { TYPES } from './types';

const container = new Container();

// Shared per process: one config, one HTTP client, one robots cache.
container.bind<ConfigService>(TYPES.ConfigService).to(ConfigService).inSingletonScope();
container.bind<LoggerService>(TYPES.LoggerService).to(LoggerService).inSingletonScope();
container.bind<HttpClient>(TYPES.HttpClient).to(HttpClient).inSingletonScope();
container.bind<RobotsPolicy>(TYPES.RobotsPolicy).to(RobotsPolicy).inSingletonScope();

container.bind<FileSystemService>(TYPES.FileSystemService).to(FileSystemService);
container.bind<LinkExtractor>(TYPES.LinkExtractor).to(LinkExtractor);
container.bind<CloudLinkResolver>(TYPES.CloudLinkResolver).to(CloudLinkResolver);
container.bind<Verifier>(TYPES.Verifier).to(Verifier);
container.bind<DocumentDownloader>(TYPES.DocumentDownloader).to(DocumentDownloader);
container.bind<ResultExporter>(TYPES.ResultExporter).to(ResultExporter);
container.bind<CrawlerService>(TYPES.CrawlerService).to(CrawlerService);

// Each crawl builds its classifier from the config it was given.
container.bind<ClassifierFactory>(TYPES.ClassifierFactory).toConstantValue(createClassifier);

export { container };
