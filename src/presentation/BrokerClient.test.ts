import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BrokerClient } from './BrokerClient.js';
import { RetryPolicy } from '../application/RetryPolicy.js';
import { RecordHeaders } from '../domain/entities/RecordHeaders.js';
import type { RecordMetadata } from '../domain/entities/Record.js';
import { ConfigurationError, ConnectionError } from '../domain/errors/BrokerError.js';
import type { TransportRequest, TransportResponse } from '../domain/ports/IHttpTransport.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ConsumerOptions } from '../domain/ports/IRecordConsumer.js';
import type { IRecordTracer } from '../domain/ports/IRecordTracer.js';

function respond(status: number): TransportResponse {
  return { status, headers: {}, body: new Uint8Array() };
}

describe('BrokerClient', () => {
  let mockLogger: ILogger;
  let status: number;
  const metadata: RecordMetadata = {
    topic: 'orders',
    partition: 0,
    offset: 7,
    timestamp: new Date('2024-01-01T00:00:00Z'),
  };

  function createTransport() {
    return {
      baseUrl: 'http://broker-1:9094',
      send: vi.fn(async (request: TransportRequest, _signal?: AbortSignal) =>
        respond(request.path === '/health' ? status : 202)
      ),
      close: vi.fn(async () => {}),
    };
  }

  function createProducer() {
    return {
      send: vi.fn().mockResolvedValue(metadata),
      flush: vi.fn().mockResolvedValue(undefined),
      close: vi.fn().mockResolvedValue(undefined),
    };
  }

  function createConsumerFactory() {
    const consumer = {
      subscribe: vi.fn().mockResolvedValue(undefined),
      poll: vi.fn().mockResolvedValue([]),
      commit: vi.fn().mockResolvedValue(undefined),
      seekToBeginning: vi.fn().mockResolvedValue(undefined),
      seekToEnd: vi.fn().mockResolvedValue(undefined),
      seek: vi.fn().mockResolvedValue(undefined),
      close: vi.fn().mockResolvedValue(undefined),
    };
    const factory = vi.fn((_topic: string, _options: ConsumerOptions) => consumer);
    return { consumer, factory };
  }

  beforeEach(() => {
    status = 200;
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
  });

  it('should connect and route requests through the connection manager', async () => {
    const transport = createTransport();
    const client = new BrokerClient({ logger: mockLogger, transport });
    const states: string[] = [];
    client.onStateChange((s) => states.push(s));

    expect(client.state).toBe('disconnected');
    await client.connect();
    const response = await client.request({ method: 'POST', path: '/api/v1/topics' });

    expect(client.state).toBe('connected');
    expect(states).toEqual(['connected']);
    expect(response.status).toBe(202);
    await client.close();
  });

  it('should reject requests before connect', async () => {
    const transport = createTransport();
    const client = new BrokerClient({ logger: mockLogger, transport });

    await expect(client.request({ method: 'GET', path: '/api/v1/topics' })).rejects.toBeInstanceOf(
      ConnectionError
    );
    expect(transport.send).not.toHaveBeenCalled();
    await client.close();
  });

  it('should report health without throwing', async () => {
    status = 500;
    const client = new BrokerClient({ logger: mockLogger, transport: createTransport() });

    await expect(client.isHealthy()).resolves.toBe(false);

    status = 200;
    await expect(client.isHealthy()).resolves.toBe(true);
    await client.close();
  });

  it('should produce records through the configured producer', async () => {
    const producer = createProducer();
    const client = new BrokerClient({
      logger: mockLogger,
      transport: createTransport(),
      producer,
    });
    const headers = new RecordHeaders().add('source', 'billing');

    const result = await client.produce('orders', 'order-1', '{"total":10}', headers);
    await client.flush();

    expect(result).toBe(metadata);
    expect(producer.send).toHaveBeenCalledWith(
      { topic: 'orders', key: 'order-1', value: '{"total":10}', headers },
      undefined
    );
    expect(producer.flush).toHaveBeenCalledTimes(1);
    await client.close();
  });

  it('should reject produce without a producer', async () => {
    const client = new BrokerClient({ logger: mockLogger, transport: createTransport() });

    await expect(client.produce('orders', null, 'v')).rejects.toBeInstanceOf(ConfigurationError);
    await client.close();
  });

  it('should build its retry policy from the producer settings', async () => {
    const client = new BrokerClient({
      logger: mockLogger,
      transport: createTransport(),
      config: { producer: { retries: 5, retryBackoffMs: 20 } },
    });

    expect(client.retryPolicy.options.maxRetries).toBe(5);
    expect(client.retryPolicy.options.baseDelayMs).toBe(20);
    await client.close();
  });

  it('should use a supplied retry policy for produce', async () => {
    const retryPolicy = new RetryPolicy({ maxRetries: 0 }, mockLogger);
    const client = new BrokerClient({
      logger: mockLogger,
      transport: createTransport(),
      retryPolicy,
    });

    expect(client.retryPolicy).toBe(retryPolicy);
    await client.close();
  });

  it('should pass the health check interval to the connection manager', async () => {
    const client = new BrokerClient({
      logger: mockLogger,
      transport: createTransport(),
      config: { healthCheckIntervalMs: 1234 },
    });

    expect(client.connectionManager.healthCheckIntervalMs).toBe(1234);
    await client.close();
  });

  it('should create its own transport for the first bootstrap server', async () => {
    const client = new BrokerClient({
      logger: mockLogger,
      config: { bootstrapServers: 'broker-1:9092,broker-2:9092', controlPort: 9094 },
    });

    expect(mockLogger.info).toHaveBeenCalledWith('Broker client initialized', {
      bootstrapServers: 'broker-1:9092,broker-2:9092',
      controlPlane: 'http://broker-1:9094',
    });
    await client.close();
  });

  it('should fail fast on invalid configuration', () => {
    expect(
      () =>
        new BrokerClient({
          logger: mockLogger,
          transport: createTransport(),
          config: { connectionPoolSize: 0 },
        })
    ).toThrow(ConfigurationError);
  });

  it('should trace produce calls with the supplied tracer', async () => {
    const producer = createProducer();
    const scope = { setAttribute: vi.fn(), recordError: vi.fn(), end: vi.fn() };
    const tracer: IRecordTracer = {
      startProduce: vi.fn((_topic: string, headers: RecordHeaders) => {
        headers.add('traceparent', '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01');
        return scope;
      }),
      startConsume: vi.fn(() => scope),
      startProcess: vi.fn(() => scope),
    };
    const client = new BrokerClient({
      logger: mockLogger,
      transport: createTransport(),
      producer,
      tracer,
    });

    await client.produce('orders', null, 'v');

    const sent = producer.send.mock.calls[0]?.[0];
    expect(sent.headers.getString('traceparent')).toBe(
      '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01'
    );
    expect(scope.end).toHaveBeenCalledTimes(1);
    await client.close();
  });

  describe('createConsumer', () => {
    it('should build a consumer from the configured options and overrides', async () => {
      const { consumer, factory } = createConsumerFactory();
      const client = new BrokerClient({
        logger: mockLogger,
        transport: createTransport(),
        consumerFactory: factory,
        config: { consumer: { groupId: 'billing' } },
      });

      const recordConsumer = client.createConsumer(' orders ', { maxPollRecords: 10 });
      await recordConsumer.subscribe();

      expect(recordConsumer.topic).toBe('orders');
      expect(factory).toHaveBeenCalledWith(
        'orders',
        expect.objectContaining({ groupId: 'billing', maxPollRecords: 10 })
      );
      expect(consumer.subscribe).toHaveBeenCalledWith(['orders'], undefined);
      await client.close();
    });

    it('should require a consumer factory', async () => {
      const client = new BrokerClient({ logger: mockLogger, transport: createTransport() });

      expect(() => client.createConsumer('orders')).toThrow(
        'No record consumer factory configured for this client'
      );
      await client.close();
    });

    it('should validate the merged options before building the consumer', async () => {
      const { factory } = createConsumerFactory();
      const client = new BrokerClient({
        logger: mockLogger,
        transport: createTransport(),
        consumerFactory: factory,
      });

      expect(() => client.createConsumer('orders', { maxPollRecords: 0 })).toThrow(
        ConfigurationError
      );
      expect(() => client.createConsumer('  ')).toThrow('Topic name must not be empty');
      expect(factory).not.toHaveBeenCalled();
      await client.close();
    });

    it('should close its consumers with the client', async () => {
      const { consumer, factory } = createConsumerFactory();
      const client = new BrokerClient({
        logger: mockLogger,
        transport: createTransport(),
        consumerFactory: factory,
      });
      const recordConsumer = client.createConsumer('orders');

      await client.close();

      expect(consumer.close).toHaveBeenCalledTimes(1);
      expect(recordConsumer.isClosed).toBe(true);
      expect(() => client.createConsumer('orders')).toThrow('Client is closed');
    });
  });

  describe('close', () => {
    it('should close the producer once and leave a borrowed transport open', async () => {
      const transport = createTransport();
      const producer = createProducer();
      const client = new BrokerClient({ logger: mockLogger, transport, producer });
      await client.connect();

      await client.close();
      await client.close();

      expect(producer.close).toHaveBeenCalledTimes(1);
      expect(transport.close).not.toHaveBeenCalled();
      expect(client.connectionManager.isClosed).toBe(true);
    });

    it('should reject further work and report unhealthy', async () => {
      const transport = createTransport();
      const client = new BrokerClient({ logger: mockLogger, transport });
      await client.close();

      await expect(client.connect()).rejects.toThrow('Client is closed');
      await expect(client.request({ method: 'GET', path: '/' })).rejects.toThrow(
        'Client is closed'
      );
      await expect(client.produce('orders', null, 'v')).rejects.toThrow('Client is closed');
      await expect(client.isHealthy()).resolves.toBe(false);
      expect(transport.send).not.toHaveBeenCalled();
    });
  });
});
