import { BrokerError, TransportError } from './BrokerError.js';
import { isAbortError } from './cancellation.js';

/** System error codes meaning the endpoint could not be reached */
const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

function extractSystemCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * True for transport-level failures: TransportError, or a raw Node system
 * error with a connectivity code.
 */
export function isConnectivityError(error: unknown): boolean {
  if (error instanceof TransportError) return true;
  if (error instanceof BrokerError) return false;
  const code = extractSystemCode(error);
  return code !== undefined && CONNECTIVITY_CODES.has(code);
}

/**
 * Default retry predicate.
 *
 * Cancellation is never retryable. Broker errors decide for themselves;
 * everything else is retried only when it is a connectivity failure.
 */
export function isRetryableError(error: unknown): boolean {
  if (isAbortError(error)) return false;
  if (error instanceof BrokerError) return error.retryable;
  return isConnectivityError(error);
}
