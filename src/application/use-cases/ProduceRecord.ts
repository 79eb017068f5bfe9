import { RecordHeaders } from '../../domain/entities/RecordHeaders.js';
import type { RecordMetadata } from '../../domain/entities/Record.js';
import { ConfigurationError } from '../../domain/errors/BrokerError.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { IRecordProducer } from '../../domain/ports/IRecordProducer.js';
import type { IRecordTracer } from '../../domain/ports/IRecordTracer.js';
import type { RetryPolicy } from '../RetryPolicy.js';

export interface ProduceRecordInput {
  topic: string;
  key: string | null;
  value: string | Uint8Array;
  headers?: RecordHeaders;
}

/**
 * Use case for publishing one record through the data-plane producer.
 * The whole retried send is one produce span; its context is propagated in a
 * copy of the caller's headers.
 */
export class ProduceRecord {
  constructor(
    private readonly producer: IRecordProducer | null,
    private readonly retryPolicy: RetryPolicy,
    private readonly tracer: IRecordTracer,
    private readonly logger: ILogger
  ) {}

  async execute(input: ProduceRecordInput, signal?: AbortSignal): Promise<RecordMetadata> {
    const topic = input.topic.trim();
    if (!topic) {
      throw new ConfigurationError('Topic name must not be empty');
    }

    const producer = this.producer;
    if (!producer) {
      throw new ConfigurationError('No record producer configured for this client');
    }

    const headers = new RecordHeaders(input.headers);
    const scope = this.tracer.startProduce(topic, headers);
    const record = {
      topic,
      key: input.key,
      value: input.value,
      headers: input.headers || !headers.isEmpty ? headers : undefined,
    };

    try {
      const metadata = await this.retryPolicy.execute(() => {
        this.logger.debug('Producing record', { topic });
        return producer.send(record, signal);
      }, signal);

      scope.setAttribute('messaging.destination.partition.id', String(metadata.partition));
      scope.setAttribute('messaging.message.id', String(metadata.offset));
      this.logger.debug('Record produced', {
        topic: metadata.topic,
        partition: metadata.partition,
        offset: metadata.offset,
      });
      return metadata;
    } catch (error) {
      scope.recordError(error);
      throw error;
    } finally {
      scope.end();
    }
  }
}
