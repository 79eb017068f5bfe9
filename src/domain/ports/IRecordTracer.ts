import type { ConsumerRecord } from '../entities/Record.js';
import type { RecordHeaders } from '../entities/RecordHeaders.js';

/**
 * One traced operation. end() must be called exactly once.
 */
export interface TraceScope {
  setAttribute(key: string, value: string | number): void;
  recordError(error: unknown): void;
  end(): void;
}

/**
 * Port for messaging spans and trace-context propagation through record headers
 */
export interface IRecordTracer {
  /**
   * Start a produce span and write its context into headers
   */
  startProduce(topic: string, headers: RecordHeaders): TraceScope;

  startConsume(topic: string): TraceScope;

  /**
   * Start a process span, parented on the context carried by the record headers
   */
  startProcess(record: ConsumerRecord): TraceScope;
}
