import { injectable } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { defaultConfig } from '../config';
import { ConfigurationError } from '../errors';
import { ensureScheme, parseUrl } from '../core/urlNormalizer';
import { ClassifierKind, CrawlConfig, CrawlOptions } from '../types';
import { IConfigService } from '../interfaces';

const CLASSIFIERS: readonly ClassifierKind[] = ['basic', 'aggressive'];

function parseCount(value: string, name: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

function parseSeconds(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number of seconds, got "${value}"`);
  }
  return Math.round(parsed * 1000);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Keeps only the keys of a stored config.json whose value has the expected type. */
function pickStoredOptions(stored: unknown): Partial<CrawlOptions> {
  if (typeof stored !== 'object' || stored === null) return {};
  const picked: Partial<CrawlOptions> = {};
  const defaults = new Map<string, unknown>(Object.entries(defaultConfig));
  for (const [key, value] of Object.entries(stored)) {
    if (key === 'logLevel' || !defaults.has(key)) continue;
    if (typeof value === typeof defaults.get(key)) {
      Object.assign(picked, { [key]: value });
    }
  }
  return picked;
}

function isClassifierKind(value: string): value is ClassifierKind {
  return CLASSIFIERS.some((kind) => kind === value);
}

/** Turns raw options into a validated run configuration. */
export function toCrawlConfig(options: CrawlOptions): CrawlConfig {
  const url = ensureScheme(options.url);
  const parsed = parseUrl(url);
  if (!parsed || !parsed.hostname || !['http:', 'https:'].includes(parsed.protocol)) {
    throw new ConfigurationError(`Invalid seed URL: "${options.url}"`);
  }
  if (!isClassifierKind(options.classifier)) {
    throw new ConfigurationError(`classifier must be one of ${CLASSIFIERS.join(', ')}, got "${options.classifier}"`);
  }

  const timeout = parseSeconds(options.timeout, 'timeout');
  if (timeout === 0) {
    throw new ConfigurationError('timeout must be greater than zero');
  }

  return {
    url,
    maxDepth: parseCount(options.depth, 'depth', 0),
    maxPages: parseCount(options.maxPages, 'max-pages', 1),
    timeout,
    politeDelay: parseSeconds(options.delay, 'delay'),
    workers: parseCount(options.workers, 'workers', 1),
    allowSubdomains: options.subdomains,
    classifier: options.classifier,
    catchAll: options.catchAll,
    respectRobots: !options.ignoreRobots,
    userAgent: options.userAgent,
  };
}

@injectable()
export class ConfigService implements IConfigService {
  private config: CrawlOptions;
  private configPath: string | null = null;

  constructor() {
    this.config = this.getDefaultConfig();
  }

  public getConfig(): CrawlOptions {
    return this.config;
  }

  public setConfig(partialConfig: Partial<CrawlOptions>): void {
    const output = partialConfig.output ?? this.config.output;
    this.configPath = path.join(output, 'config.json');
    this.config = { ...this.getDefaultConfig(), ...this.loadConfig(), ...partialConfig };
    this.saveConfig();
  }

  public getCrawlConfig(): CrawlConfig {
    return toCrawlConfig(this.config);
  }

  private loadConfig(): Partial<CrawlOptions> {
    if (this.configPath && fs.existsSync(this.configPath)) {
      const configFile = fs.readFileSync(this.configPath, 'utf-8');
      try {
        return pickStoredOptions(JSON.parse(configFile));
      } catch (error) {
        throw new ConfigurationError(`Cannot parse ${this.configPath}: ${errorMessage(error)}`);
      }
    }
    return {};
  }

  private saveConfig(): void {
    if (!this.configPath) return;
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
    } catch (error) {
      throw new ConfigurationError(`Output directory is not writable: ${errorMessage(error)}`);
    }
  }

  private getDefaultConfig(): CrawlOptions {
    return { ...defaultConfig };
  }
}
