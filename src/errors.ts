import { HTTPError, RequestError, TimeoutError } from 'got';

/** Bad seed URL, bad numeric option or unusable output directory. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export enum FetchErrorType {
  TIMEOUT = 'TIMEOUT',
  NETWORK = 'NETWORK',
  HTTP_STATUS = 'HTTP_STATUS',
  UNKNOWN = 'UNKNOWN',
}

export interface FetchFailure {
  type: FetchErrorType;
  message: string;
  statusCode?: number;
}

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH']);

/**
 * Sorts a failed request into the transient buckets the crawler logs.
 * None of them stop a crawl.
 */
export function describeFetchError(error: unknown): FetchFailure {
  if (error instanceof TimeoutError) {
    return { type: FetchErrorType.TIMEOUT, message: `timed out (${error.event})` };
  }
  if (error instanceof HTTPError) {
    const statusCode = error.response.statusCode;
    return { type: FetchErrorType.HTTP_STATUS, message: `HTTP ${statusCode}`, statusCode };
  }
  if (error instanceof RequestError) {
    const code = error.code ?? '';
    if (code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT') {
      return { type: FetchErrorType.TIMEOUT, message: error.message };
    }
    if (NETWORK_CODES.has(code)) {
      return { type: FetchErrorType.NETWORK, message: `${code}: ${error.message}` };
    }
  }
  const message = error instanceof Error ? error.message : String(error);
  return { type: FetchErrorType.UNKNOWN, message };
}
