import { Agent, request as httpRequest } from "http";
import type { IncomingMessage } from "http";
import {
  BrokerTimeoutError,
  TransportError,
} from "../../domain/errors/BrokerError.js";
import { isAbortError } from "../../domain/errors/cancellation.js";
import type {
  IHttpTransport,
  TransportRequest,
  TransportResponse,
} from "../../domain/ports/IHttpTransport.js";
import type { ILogger } from "../../domain/ports/ILogger.js";

export interface NodeHttpTransportConfig {
  /** e.g. http://localhost:9094 */
  baseUrl: string;
  /** Max concurrent sockets to the control plane */
  connectionPoolSize?: number;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
}

function systemCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object" || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * HTTP control-plane transport over Node's http module with a keep-alive pool.
 */
export class NodeHttpTransport implements IHttpTransport {
  readonly baseUrl: string;
  private readonly agent: Agent;
  private readonly connectTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private closed = false;

  constructor(
    config: NodeHttpTransportConfig,
    private readonly logger: ILogger
  ) {
    this.baseUrl = config.baseUrl;
    this.connectTimeoutMs = config.connectTimeoutMs ?? 30_000;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
    this.agent = new Agent({
      keepAlive: true,
      maxSockets: config.connectionPoolSize ?? 4,
    });
    this.logger = logger.child({ component: "NodeHttpTransport" });
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
    signal?.throwIfAborted();

    const url = new URL(request.path, this.baseUrl);
    this.logger.trace("Sending request", { method: request.method, url: url.href });

    return new Promise<TransportResponse>((resolve, reject) => {
      let settled = false;
      let connectTimer: NodeJS.Timeout | null = null;

      const req = httpRequest(url, {
        method: request.method,
        headers: request.headers,
        agent: this.agent,
        signal,
      });

      const finish = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(requestTimer);
        if (connectTimer) clearTimeout(connectTimer);
        outcome();
      };

      const fail = (error: Error): void => {
        finish(() => reject(this.mapError(error)));
        req.destroy();
      };

      const requestTimer = setTimeout(() => {
        fail(
          new BrokerTimeoutError(
            `Request ${request.method} ${request.path} timed out after ${this.requestTimeoutMs}ms`
          )
        );
      }, this.requestTimeoutMs);

      req.on("socket", (socket) => {
        // Reused keep-alive sockets are already connected
        if (!socket.connecting) return;
        connectTimer = setTimeout(() => {
          fail(
            new TransportError(
              `Connecting to ${this.baseUrl} timed out after ${this.connectTimeoutMs}ms`,
              "ETIMEDOUT"
            )
          );
        }, this.connectTimeoutMs);
        socket.once("connect", () => {
          if (connectTimer) clearTimeout(connectTimer);
        });
      });

      req.on("response", (res: IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          finish(() =>
            resolve({
              status: res.statusCode ?? 0,
              headers: res.headers,
              body: Buffer.concat(chunks),
            })
          );
        });
        res.on("error", fail);
      });

      req.on("error", fail);

      req.end(request.body);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.agent.destroy();
    this.logger.debug("Transport closed", { baseUrl: this.baseUrl });
  }

  private mapError(error: Error): Error {
    if (
      error instanceof BrokerTimeoutError ||
      error instanceof TransportError ||
      isAbortError(error)
    ) {
      return error;
    }
    return new TransportError(error.message, systemCode(error), error);
  }
}
