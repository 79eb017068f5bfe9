/**
 * Error taxonomy for broker operations.
 *
 * Every broker-side failure is a BrokerError carrying a code and a retryable
 * flag that the default retry predicate reads. Transport-level connectivity
 * failures are TransportError, which sits outside the taxonomy.
 */

export const BrokerErrorCodes = {
  UNKNOWN: 'UNKNOWN',
  CONNECTION: 'CONNECTION',
  AUTHENTICATION: 'AUTHENTICATION',
  AUTHORIZATION: 'AUTHORIZATION',
  TOPIC_NOT_FOUND: 'TOPIC_NOT_FOUND',
  TIMEOUT: 'TIMEOUT',
  PRODUCER: 'PRODUCER',
  CONSUMER: 'CONSUMER',
  SERIALIZATION: 'SERIALIZATION',
  CONFIGURATION: 'CONFIGURATION',
} as const;

export type BrokerErrorCode = (typeof BrokerErrorCodes)[keyof typeof BrokerErrorCodes];

export interface BrokerErrorOptions {
  retryable?: boolean;
  /** Short suggestion for resolving the error */
  hint?: string;
  cause?: unknown;
}

export class BrokerError extends Error {
  public readonly code: BrokerErrorCode;
  public readonly retryable: boolean;
  public readonly hint?: string;

  constructor(
    message: string,
    code: BrokerErrorCode = BrokerErrorCodes.UNKNOWN,
    options: BrokerErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BrokerError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.hint = options.hint;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ConnectionError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.CONNECTION, {
      retryable: true,
      hint: 'Check that the broker is running and reachable',
      cause,
    });
    this.name = 'ConnectionError';
  }
}

export class AuthenticationError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.AUTHENTICATION, {
      hint: 'Verify your credentials and authentication mechanism',
      cause,
    });
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.AUTHORIZATION, {
      hint: 'Check ACL permissions for this operation',
      cause,
    });
    this.name = 'AuthorizationError';
  }
}

export class TopicNotFoundError extends BrokerError {
  public readonly topic: string;

  constructor(topic: string) {
    super(`Topic not found: ${topic}`, BrokerErrorCodes.TOPIC_NOT_FOUND, {
      hint: `Create the topic "${topic}" before using it`,
    });
    this.name = 'TopicNotFoundError';
    this.topic = topic;
  }
}

export class BrokerTimeoutError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.TIMEOUT, {
      retryable: true,
      hint: 'Consider increasing timeout settings or checking broker load',
      cause,
    });
    this.name = 'BrokerTimeoutError';
  }
}

export class ProducerError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.PRODUCER, { retryable: true, cause });
    this.name = 'ProducerError';
  }
}

export class ConsumerError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.CONSUMER, { retryable: true, cause });
    this.name = 'ConsumerError';
  }
}

export class SerializationError extends BrokerError {
  constructor(message: string, cause?: unknown) {
    super(message, BrokerErrorCodes.SERIALIZATION, { cause });
    this.name = 'SerializationError';
  }
}

/** Invalid option detected while building a component */
export class ConfigurationError extends BrokerError {
  constructor(message: string) {
    super(message, BrokerErrorCodes.CONFIGURATION);
    this.name = 'ConfigurationError';
  }
}

/**
 * The transport could not reach the broker (refused, reset, DNS, connect timeout).
 */
export class TransportError extends Error {
  /** System error code such as ECONNREFUSED, when known */
  public readonly code?: string;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
    this.code = code;
  }
}
