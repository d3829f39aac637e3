import { injectable, inject } from 'inversify';
import { ILoggerService, IConfigService } from '../interfaces';
import { TYPES } from '../di/types';
import { LogLevel } from '../types';
import colors from 'ansi-colors';
import cliProgress from 'cli-progress';

const LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

@injectable()
export class LoggerService implements ILoggerService {
  constructor(@inject(TYPES.ConfigService) private configService: IConfigService) {}

  private get logLevel(): LogLevel {
    return this.configService.getConfig().logLevel ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
  }

  log(message: string): void {
    if (this.shouldLog('info')) {
      console.log(message);
    }
  }

  error(message: string, error?: Error): void {
    if (this.shouldLog('error')) {
      console.error(colors.red(`❌ ${message}`));
      if (error?.stack && this.shouldLog('debug')) {
        console.error(colors.gray(error.stack));
      } else if (error) {
        console.error(colors.red(error.message));
      }
    }
  }

  logInfo(message: string): void {
    if (this.shouldLog('info')) {
      console.log(colors.cyan(`ℹ️ ${message}`));
    }
  }

  logSuccess(message: string): void {
    if (this.shouldLog('info')) {
      console.log(colors.green(`✅ ${message}`));
    }
  }

  createMultiBar(options?: cliProgress.Options): cliProgress.MultiBar {
    return new cliProgress.MultiBar({
      clearOnComplete: false,
      hideCursor: true,
      format: colors.cyan('{bar}') + ' {value}/{total} pages | {candidates} candidates | {status}',
      ...options,
    }, cliProgress.Presets.shades_classic);
  }

  private logWithoutInterference(message: string, ...meta: unknown[]): void {
    if (process.stderr.isTTY) {
      process.stderr.clearLine(1);
    }
    console.log(message, ...meta);
  }

  infoWithoutInterference(message: string, ...meta: unknown[]): void {
    if (this.shouldLog('info')) {
      this.logWithoutInterference(colors.cyan(`ℹ️ ${message}`), ...meta);
    }
  }

  warnWithoutInterference(message: string, ...meta: unknown[]): void {
    if (this.shouldLog('warn')) {
      this.logWithoutInterference(colors.yellow(`⚠️ ${message}`), ...meta);
    }
  }

  errorWithoutInterference(message: string, ...meta: unknown[]): void {
    if (this.shouldLog('error')) {
      this.logWithoutInterference(colors.red(`❌ ${message}`), ...meta);
    }
  }

  debugWithoutInterference(message: string, ...meta: unknown[]): void {
    if (this.shouldLog('debug')) {
      this.logWithoutInterference(colors.gray(`🔍 ${message}`), ...meta);
    }
  }
}
