export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  /** Path relative to the transport's base URL, e.g. `/health` */
  path: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: Uint8Array;
}

/**
 * Port interface for the broker control-plane transport.
 *
 * Implementations must be safe for concurrent send() calls. A connectivity
 * failure rejects with TransportError, an exceeded request deadline with
 * BrokerTimeoutError, and an aborted signal with an AbortError. Any HTTP
 * status, including 5xx, resolves as a response.
 */
export interface IHttpTransport {
  readonly baseUrl: string;

  send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;

  /**
   * Release pooled sockets. Later sends reject with TransportError.
   */
  close(): Promise<void>;
}

/**
 * Transport handed to a ConnectionManager. An owned transport is closed by the
 * manager on teardown; a borrowed one is left to its creator.
 */
export type TransportHandle =
  | { kind: 'owned'; transport: IHttpTransport }
  | { kind: 'borrowed'; transport: IHttpTransport };
