export { BrokerClient, type BrokerClientOptions } from './presentation/BrokerClient.js';

export {
  ConnectionManager,
  DEFAULT_HEALTH_CHECK_INTERVAL_MS,
  DEFAULT_HEALTH_PATH,
  type ConnectionManagerOptions,
} from './application/ConnectionManager.js';
export {
  RetryPolicy,
  createRetryPolicyOptions,
  DEFAULT_RETRY_POLICY_OPTIONS,
  type RandomSource,
  type RetryablePredicate,
  type RetryAttempt,
  type RetryPolicyOptions,
} from './application/RetryPolicy.js';
export { ProduceRecord, type ProduceRecordInput } from './application/use-cases/ProduceRecord.js';
export { RecordConsumer, CONSUME_POLL_TIMEOUT_MS } from './application/RecordConsumer.js';

export type { ConnectionState, ConnectionStateHandler } from './domain/entities/ConnectionState.js';
export { RecordHeaders } from './domain/entities/RecordHeaders.js';
export type { ConsumerRecord, ProducerRecord, RecordMetadata } from './domain/entities/Record.js';
export * from './domain/errors/index.js';
export type { IBrokerClient } from './domain/ports/IBrokerClient.js';
export type {
  HttpMethod,
  IHttpTransport,
  TransportHandle,
  TransportRequest,
  TransportResponse,
} from './domain/ports/IHttpTransport.js';
export type { ILogger, LogLevel } from './domain/ports/ILogger.js';
export type { IRecordProducer } from './domain/ports/IRecordProducer.js';
export type {
  AutoOffsetReset,
  ConsumerOptions,
  IRecordConsumer,
  RecordConsumerFactory,
} from './domain/ports/IRecordConsumer.js';
export type { IRecordTracer, TraceScope } from './domain/ports/IRecordTracer.js';

export {
  loadConfig,
  resolveConfig,
  resolveControlPlaneUrl,
  validateConfig,
  validateConsumerOptions,
  type ClientConfig,
  type ClientConfigOverrides,
} from './infrastructure/config/Config.js';
export { NodeHttpTransport, type NodeHttpTransportConfig } from './infrastructure/http/NodeHttpTransport.js';
export { PinoLogger, type PinoLoggerOptions } from './infrastructure/logging/PinoLogger.js';
export {
  OpenTelemetryRecordTracer,
  MESSAGING_SYSTEM,
  TRACER_NAME,
  TRACER_VERSION,
} from './infrastructure/telemetry/OpenTelemetryRecordTracer.js';
export { createSeededRandom } from './infrastructure/utils/random.js';
