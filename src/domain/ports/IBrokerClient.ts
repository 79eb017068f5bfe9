import type { ConnectionState, ConnectionStateHandler } from '../entities/ConnectionState.js';
import type { RecordHeaders } from '../entities/RecordHeaders.js';
import type { RecordMetadata } from '../entities/Record.js';
import type { TransportRequest, TransportResponse } from './IHttpTransport.js';

/**
 * Public contract of the broker client
 */
export interface IBrokerClient {
  readonly state: ConnectionState;

  /**
   * Probe the control plane and start background health checks
   */
  connect(signal?: AbortSignal): Promise<void>;

  /**
   * Send a control-plane request through the managed, retried connection
   */
  request(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;

  produce(
    topic: string,
    key: string | null,
    value: string | Uint8Array,
    headers?: RecordHeaders,
    signal?: AbortSignal
  ): Promise<RecordMetadata>;

  flush(signal?: AbortSignal): Promise<void>;

  /**
   * Single health probe. Never throws except on cancellation.
   */
  isHealthy(signal?: AbortSignal): Promise<boolean>;

  /**
   * Subscribe to connection state changes; returns an unsubscribe function
   */
  onStateChange(handler: ConnectionStateHandler): () => void;

  close(): Promise<void>;
}
