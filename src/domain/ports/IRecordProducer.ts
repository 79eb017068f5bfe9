import type { ProducerRecord, RecordMetadata } from '../entities/Record.js';

/**
 * Port interface for the data-plane producer.
 * Implemented by a wire-protocol client; this library only drives it.
 */
export interface IRecordProducer {
  send(record: ProducerRecord, signal?: AbortSignal): Promise<RecordMetadata>;

  /** Wait until buffered records are delivered */
  flush(signal?: AbortSignal): Promise<void>;

  close(): Promise<void>;
}
