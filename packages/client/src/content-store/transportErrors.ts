import { ContentStoreError } from '../errors/ContentStoreError';

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const TIMEOUT_STATUSES = new Set([408, 504]);

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject => typeof value === 'object' && value !== null;

const isTimeoutFailure = (error: unknown): boolean => {
  if (!isObject(error)) return false;
  if (error.name === 'TimeoutError') return true;
  if (typeof error.code === 'string' && TIMEOUT_CODES.has(error.code)) return true;
  return isObject(error.cause) && isTimeoutFailure(error.cause);
};

/**
 * Classifies a rejected fetch as Timeout or Other.
 */
export const classifyFetchFailure = (error: unknown, action: string): ContentStoreError => {
  if (error instanceof ContentStoreError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  if (isTimeoutFailure(error)) {
    return new ContentStoreError('Timeout', `${action} timed out: ${detail}`, { cause: error });
  }
  return new ContentStoreError('Other', `${action} failed: ${detail}`, { cause: error });
};

/**
 * Classifies a non-2xx response. Gateway and request timeouts count as timeouts.
 */
export const classifyStatus = (status: number, action: string): ContentStoreError =>
  TIMEOUT_STATUSES.has(status)
    ? new ContentStoreError('Timeout', `${action} timed out (status ${status})`)
    : new ContentStoreError('Other', `${action} failed (status ${status})`);
