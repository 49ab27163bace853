import axios from 'axios';
import { RelayError } from '../middleware/error.js';

/**
 * Map an axios failure to a RelayError:
 * - 401 -> unauthorized
 * - 408, 429, 5xx and network faults -> transient (with Retry-After when sent)
 * - other 4xx -> providerRejected, carrying the Graph error message when present
 */
export function toRelayError(error: unknown, action: string): RelayError {
  if (error instanceof RelayError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return RelayError.transient(`${action} failed: ${message}`, { cause: error });
  }

  const response = error.response;
  if (!response) {
    const code = error.code ? ` (${error.code})` : '';
    return RelayError.transient(`${action} failed: ${error.message}${code}`, { cause: error });
  }

  const status = response.status;
  const detail = extractErrorMessage(response.data) ?? error.message;
  const message = `${action} failed with ${status}: ${detail}`;

  if (status === 401) {
    return RelayError.unauthorized(message, { cause: error });
  }
  if (isRetryableStatus(status)) {
    return RelayError.transient(message, {
      cause: error,
      retryAfterMs: parseRetryAfter(headerValue(response.headers, 'retry-after'))
    });
  }
  return RelayError.providerRejected(message, status, { cause: error });
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Retry-After as milliseconds; accepts delta-seconds or an HTTP date
 */
export function parseRetryAfter(raw: string | undefined, now: number = Date.now()): number | undefined {
  if (!raw) return undefined;
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Pull `error.message` out of a Graph error body; falls back to a plain string body
 */
export function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data.length > 0 ? data : undefined;
  }
  if (typeof data !== 'object' || data === null || !('error' in data)) {
    return undefined;
  }
  const inner = data.error;
  if (typeof inner === 'string') {
    // OAuth token endpoint: { error, error_description }
    const description = 'error_description' in data ? data.error_description : undefined;
    return typeof description === 'string' ? `${inner}: ${description}` : inner;
  }
  if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
    return inner.message;
  }
  return undefined;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null) return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' ? value : undefined;
}
