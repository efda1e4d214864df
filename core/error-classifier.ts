/**
 * Failure Classifier
 *
 * Maps any thrown value onto the retry policy's failure classes.
 * Structured hints (error codes, HTTP status) win over message keywords.
 */

import { ErrorCode, IngestionError } from './errors';

export enum FailureClass {
  AUTH_EXPIRED = 'auth_expired',
  RATE_LIMITED = 'rate_limited',
  NETWORK = 'network',
  PAGINATION_GLITCH = 'pagination_glitch',
  UNKNOWN = 'unknown',
}

export interface ClassifiedFailure {
  failureClass: FailureClass;
  message: string;
  statusCode?: number;
}

const AUTH_KEYWORDS = [
  'unauthorized',
  'forbidden',
  'authentication',
  'token',
  'expired',
  '401',
  '403',
  'login',
  'credential',
  'session',
  'invalid cookie',
  'cookie expired',
  'not authenticated',
  'bad authentication',
];

const RATE_LIMIT_KEYWORDS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  '429',
  'slow down',
  'try again later',
  'exceeded',
  'throttle',
];

const NETWORK_KEYWORDS = [
  'connection',
  'timeout',
  'timed out',
  'network',
  'unreachable',
  'connection reset',
  'connection refused',
  'temporary failure',
  'temporarily unavailable',
  'getaddrinfo',
  'name resolution',
  'ssl',
  'certificate',
  'handshake',
  'eof',
  'broken pipe',
  'socket',
  'dns',
  'econnreset',
  'econnrefused',
  'etimedout',
  'enetunreach',
  'ehostunreach',
  'epipe',
  'no route to host',
  '500',
  '502',
  '503',
  '504',
  'service unavailable',
  'bad gateway',
];

const PAGINATION_GLITCH_KEYWORDS = [
  'not found',
  '404',
  'nonetype',
  'no data',
  'cannot iterate',
  'empty response',
];

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'EAI_AGAIN',
]);

const INGESTION_CODE_CLASSES: Partial<Record<ErrorCode, FailureClass>> = {
  [ErrorCode.AUTH_EXPIRED]: FailureClass.AUTH_EXPIRED,
  [ErrorCode.RATE_LIMITED]: FailureClass.RATE_LIMITED,
  [ErrorCode.NETWORK_UNAVAILABLE]: FailureClass.NETWORK,
  [ErrorCode.PAGINATION_GLITCH]: FailureClass.PAGINATION_GLITCH,
  [ErrorCode.UNKNOWN_ERROR]: FailureClass.UNKNOWN,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (error instanceof IngestionError && error.statusCode !== undefined) {
    return error.statusCode;
  }
  const direct = error.status ?? error.statusCode;
  if (typeof direct === 'number') return direct;
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  return undefined;
}

function classifyStatus(status: number): FailureClass | undefined {
  if (status === 401 || status === 403) return FailureClass.AUTH_EXPIRED;
  if (status === 429) return FailureClass.RATE_LIMITED;
  if (status === 404) return FailureClass.PAGINATION_GLITCH;
  if (status >= 500 && status <= 504) return FailureClass.NETWORK;
  return undefined;
}

function containsAny(haystack: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => haystack.includes(keyword));
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function classifyFailure(error: unknown): ClassifiedFailure {
  const message = messageOf(error);
  const statusCode = extractStatus(error);

  if (error instanceof IngestionError) {
    const mapped = INGESTION_CODE_CLASSES[error.code];
    if (mapped) return { failureClass: mapped, message, statusCode };
  }

  if (statusCode !== undefined) {
    const mapped = classifyStatus(statusCode);
    if (mapped) return { failureClass: mapped, message, statusCode };
  }

  if (isRecord(error) && typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code)) {
    return { failureClass: FailureClass.NETWORK, message, statusCode };
  }

  // Keyword scan, in priority order
  const lower = message.toLowerCase();
  if (containsAny(lower, AUTH_KEYWORDS)) {
    return { failureClass: FailureClass.AUTH_EXPIRED, message, statusCode };
  }
  if (containsAny(lower, RATE_LIMIT_KEYWORDS)) {
    return { failureClass: FailureClass.RATE_LIMITED, message, statusCode };
  }
  if (containsAny(lower, NETWORK_KEYWORDS)) {
    return { failureClass: FailureClass.NETWORK, message, statusCode };
  }
  if (containsAny(lower, PAGINATION_GLITCH_KEYWORDS)) {
    return { failureClass: FailureClass.PAGINATION_GLITCH, message, statusCode };
  }

  return { failureClass: FailureClass.UNKNOWN, message, statusCode };
}
