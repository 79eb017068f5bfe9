import type { ConsumerRecord } from '../entities/Record.js';

export type AutoOffsetReset = 'earliest' | 'latest';

export interface ConsumerOptions {
  /** Consumer group; standalone consumption when absent */
  groupId?: string;
  autoOffsetReset: AutoOffsetReset;
  enableAutoCommit: boolean;
  autoCommitIntervalMs: number;
  sessionTimeoutMs: number;
  heartbeatIntervalMs: number;
  maxPollRecords: number;
}

/**
 * Port interface for the data-plane consumer.
 * Implemented by a wire-protocol client; this library only drives it.
 */
export interface IRecordConsumer {
  subscribe(topics: string[], signal?: AbortSignal): Promise<void>;

  /**
   * Fetch whatever arrives within timeoutMs, at most maxPollRecords records
   */
  poll(timeoutMs: number, signal?: AbortSignal): Promise<ConsumerRecord[]>;

  commit(signal?: AbortSignal): Promise<void>;

  seekToBeginning(signal?: AbortSignal): Promise<void>;

  seekToEnd(signal?: AbortSignal): Promise<void>;

  seek(topic: string, partition: number, offset: number, signal?: AbortSignal): Promise<void>;

  close(): Promise<void>;
}

/**
 * Builds a data-plane consumer for one topic
 */
export type RecordConsumerFactory = (topic: string, options: ConsumerOptions) => IRecordConsumer;
