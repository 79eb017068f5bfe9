import type { RecordHeaders } from './RecordHeaders.js';

/**
 * A record to publish on the data plane
 */
export interface ProducerRecord {
  topic: string;
  key: string | null;
  value: string | Uint8Array;
  headers?: RecordHeaders;
}

/**
 * Where the broker stored a produced record
 */
export interface RecordMetadata {
  topic: string;
  partition: number;
  offset: number;
  timestamp: Date;
}

/**
 * A record fetched by a consumer poll
 */
export interface ConsumerRecord {
  topic: string;
  partition: number;
  offset: number;
  timestamp: Date;
  key: string | null;
  value: Uint8Array;
  headers: RecordHeaders;
}
