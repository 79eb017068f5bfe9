export * from './BrokerError.js';
export { isAbortError, throwIfCancelled } from './cancellation.js';
export { isConnectivityError, isRetryableError } from './classification.js';
