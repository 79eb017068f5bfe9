import { ConnectionManager } from '../application/ConnectionManager.js';
import { RecordConsumer } from '../application/RecordConsumer.js';
import { RetryPolicy } from '../application/RetryPolicy.js';
import { ProduceRecord } from '../application/use-cases/ProduceRecord.js';
import type {
  ConnectionState,
  ConnectionStateHandler,
} from '../domain/entities/ConnectionState.js';
import type { RecordHeaders } from '../domain/entities/RecordHeaders.js';
import type { RecordMetadata } from '../domain/entities/Record.js';
import { ConfigurationError, ConnectionError } from '../domain/errors/BrokerError.js';
import type { IBrokerClient } from '../domain/ports/IBrokerClient.js';
import type {
  IHttpTransport,
  TransportHandle,
  TransportRequest,
  TransportResponse,
} from '../domain/ports/IHttpTransport.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ConsumerOptions, RecordConsumerFactory } from '../domain/ports/IRecordConsumer.js';
import type { IRecordProducer } from '../domain/ports/IRecordProducer.js';
import type { IRecordTracer } from '../domain/ports/IRecordTracer.js';
import {
  resolveConfig,
  resolveControlPlaneUrl,
  validateConfig,
  validateConsumerOptions,
  type ClientConfig,
  type ClientConfigOverrides,
} from '../infrastructure/config/Config.js';
import { NodeHttpTransport } from '../infrastructure/http/NodeHttpTransport.js';
import { PinoLogger } from '../infrastructure/logging/PinoLogger.js';
import { OpenTelemetryRecordTracer } from '../infrastructure/telemetry/OpenTelemetryRecordTracer.js';

export interface BrokerClientOptions {
  config?: ClientConfigOverrides;
  logger?: ILogger;
  /** Caller-owned transport; the client never closes it */
  transport?: IHttpTransport;
  /** Data-plane producer; closed together with the client */
  producer?: IRecordProducer;
  /** Builds data-plane consumers for createConsumer() */
  consumerFactory?: RecordConsumerFactory;
  /** Policy for produce calls; built from producer.retries / retryBackoffMs otherwise */
  retryPolicy?: RetryPolicy;
  /** Messaging spans; the global OpenTelemetry tracer otherwise */
  tracer?: IRecordTracer;
}

/**
 * Main entry point of the library
 *
 * @example
 * const client = new BrokerClient('localhost:9092');
 * await client.connect();
 * const res = await client.request({ method: 'GET', path: '/api/v1/topics' });
 * await client.close();
 */
export class BrokerClient implements IBrokerClient {
  readonly config: ClientConfig;
  readonly retryPolicy: RetryPolicy;
  readonly connectionManager: ConnectionManager;
  private readonly logger: ILogger;
  private readonly rootLogger: ILogger;
  private readonly tracer: IRecordTracer;
  private readonly producer: IRecordProducer | null;
  private readonly consumerFactory: RecordConsumerFactory | null;
  private readonly consumers = new Set<RecordConsumer>();
  private readonly produceRecord: ProduceRecord;
  private closed = false;

  constructor(bootstrapServersOrOptions: string | BrokerClientOptions = {}) {
    const options: BrokerClientOptions =
      typeof bootstrapServersOrOptions === 'string'
        ? { config: { bootstrapServers: bootstrapServersOrOptions } }
        : bootstrapServersOrOptions;

    this.config = resolveConfig(options.config);
    validateConfig(this.config);

    const rootLogger =
      options.logger ??
      new PinoLogger({
        level: this.config.logging.level,
        pretty: this.config.logging.pretty,
      });
    this.rootLogger = rootLogger;
    this.logger = rootLogger.child({ component: 'BrokerClient' });
    this.tracer = options.tracer ?? new OpenTelemetryRecordTracer();

    this.retryPolicy =
      options.retryPolicy ??
      new RetryPolicy(
        {
          maxRetries: this.config.producer.retries,
          baseDelayMs: this.config.producer.retryBackoffMs,
          maxDelayMs: Math.max(10_000, this.config.producer.retryBackoffMs),
        },
        rootLogger
      );

    const handle: TransportHandle = options.transport
      ? { kind: 'borrowed', transport: options.transport }
      : {
          kind: 'owned',
          transport: new NodeHttpTransport(
            {
              baseUrl: resolveControlPlaneUrl(
                this.config.bootstrapServers,
                this.config.controlPort
              ),
              connectionPoolSize: this.config.connectionPoolSize,
              connectTimeoutMs: this.config.connectTimeoutMs,
              requestTimeoutMs: this.config.requestTimeoutMs,
            },
            rootLogger
          ),
        };

    this.connectionManager = new ConnectionManager(handle, rootLogger, {
      healthCheckIntervalMs: this.config.healthCheckIntervalMs,
    });

    this.producer = options.producer ?? null;
    this.consumerFactory = options.consumerFactory ?? null;
    this.produceRecord = new ProduceRecord(
      this.producer,
      this.retryPolicy,
      this.tracer,
      this.logger
    );

    this.logger.info('Broker client initialized', {
      bootstrapServers: this.config.bootstrapServers,
      controlPlane: handle.transport.baseUrl,
    });
  }

  get state(): ConnectionState {
    return this.connectionManager.state;
  }

  onStateChange(handler: ConnectionStateHandler): () => void {
    return this.connectionManager.onStateChange(handler);
  }

  async connect(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    await this.connectionManager.connect(signal);
  }

  async request(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    this.assertOpen();
    return this.connectionManager.send(request, signal);
  }

  async produce(
    topic: string,
    key: string | null,
    value: string | Uint8Array,
    headers?: RecordHeaders,
    signal?: AbortSignal
  ): Promise<RecordMetadata> {
    this.assertOpen();
    return this.produceRecord.execute({ topic, key, value, headers }, signal);
  }

  async flush(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    await this.producer?.flush(signal);
  }

  /**
   * Consumer for one topic, configured from the client's consumer options
   * with overrides on top. Closed together with the client.
   */
  createConsumer(topic: string, overrides: Partial<ConsumerOptions> = {}): RecordConsumer {
    this.assertOpen();
    const name = topic.trim();
    if (!name) {
      throw new ConfigurationError('Topic name must not be empty');
    }
    if (!this.consumerFactory) {
      throw new ConfigurationError('No record consumer factory configured for this client');
    }

    const options: ConsumerOptions = { ...this.config.consumer, ...overrides };
    validateConsumerOptions(options);

    const consumer = new RecordConsumer(
      name,
      this.consumerFactory(name, options),
      this.tracer,
      this.rootLogger
    );
    this.consumers.add(consumer);
    this.logger.debug('Consumer created', { topic: name, groupId: options.groupId });
    return consumer;
  }

  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    if (this.closed) {
      return false;
    }
    return this.connectionManager.checkHealth(signal);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    await this.connectionManager.close();
    await Promise.all(Array.from(this.consumers, (consumer) => consumer.close()));
    this.consumers.clear();
    await this.producer?.close();
    this.logger.info('Broker client closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionError('Client is closed');
    }
  }
}
