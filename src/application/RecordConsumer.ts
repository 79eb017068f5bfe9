import type { ConsumerRecord } from "../domain/entities/Record.js";
import { BrokerError, BrokerErrorCodes, ConfigurationError } from "../domain/errors/BrokerError.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import type { IRecordConsumer } from "../domain/ports/IRecordConsumer.js";
import type { IRecordTracer } from "../domain/ports/IRecordTracer.js";

/** Poll window used by consume() between cancellation checks */
export const CONSUME_POLL_TIMEOUT_MS = 100;

function assertPosition(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer`);
  }
}

/**
 * Consumes one topic through a data-plane consumer.
 *
 * Every poll is a consume span; process() runs a handler inside a process span
 * parented on the producer's context from the record headers.
 */
export class RecordConsumer {
  private readonly logger: ILogger;
  private subscribed = false;
  private closing: Promise<void> | null = null;

  constructor(
    readonly topic: string,
    private readonly consumer: IRecordConsumer,
    private readonly tracer: IRecordTracer,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: "RecordConsumer", topic });
  }

  get isSubscribed(): boolean {
    return this.subscribed;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  async subscribe(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    if (this.subscribed) {
      return;
    }
    await this.consumer.subscribe([this.topic], signal);
    this.subscribed = true;
    this.logger.info("Subscribed to topic");
  }

  async poll(timeoutMs: number, signal?: AbortSignal): Promise<ConsumerRecord[]> {
    this.assertSubscribed();
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new ConfigurationError("Poll timeout must be a non-negative number");
    }

    const scope = this.tracer.startConsume(this.topic);
    try {
      const records = await this.consumer.poll(timeoutMs, signal);
      scope.setAttribute("messaging.batch.message_count", records.length);
      if (records.length > 0) {
        this.logger.debug("Polled records", { count: records.length });
      }
      return records;
    } catch (error) {
      scope.recordError(error);
      throw error;
    } finally {
      scope.end();
    }
  }

  /**
   * Yields records until the signal is aborted or the consumer is closed
   */
  async *consume(signal?: AbortSignal): AsyncGenerator<ConsumerRecord, void, undefined> {
    this.assertSubscribed();

    while (!signal?.aborted && !this.isClosed) {
      let records: ConsumerRecord[];
      try {
        records = await this.poll(CONSUME_POLL_TIMEOUT_MS, signal);
      } catch (error) {
        if (signal?.aborted) return;
        throw error;
      }
      for (const record of records) {
        yield record;
      }
    }
  }

  /**
   * Run handler for one record inside a process span
   */
  async process<T>(
    record: ConsumerRecord,
    handler: (record: ConsumerRecord) => Promise<T> | T
  ): Promise<T> {
    const scope = this.tracer.startProcess(record);
    try {
      return await handler(record);
    } catch (error) {
      scope.recordError(error);
      throw error;
    } finally {
      scope.end();
    }
  }

  async commit(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    await this.consumer.commit(signal);
    this.logger.debug("Offsets committed");
  }

  async seekToBeginning(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    await this.consumer.seekToBeginning(signal);
    this.logger.debug("Seeking to beginning");
  }

  async seekToEnd(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    await this.consumer.seekToEnd(signal);
    this.logger.debug("Seeking to end");
  }

  async seek(partition: number, offset: number, signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    assertPosition("partition", partition);
    assertPosition("offset", offset);
    await this.consumer.seek(this.topic, partition, offset, signal);
    this.logger.debug("Seeking to offset", { partition, offset });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.consumer.close().then(() => {
        this.logger.info("Consumer closed");
      });
    }
    return this.closing;
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new BrokerError("Consumer is closed", BrokerErrorCodes.CONSUMER);
    }
  }

  private assertSubscribed(): void {
    this.assertOpen();
    if (!this.subscribed) {
      throw new BrokerError("Consumer is not subscribed", BrokerErrorCodes.CONSUMER);
    }
  }
}
