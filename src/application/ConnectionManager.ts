import { setTimeout as sleep } from "timers/promises";
import type {
  ConnectionState,
  ConnectionStateHandler,
} from "../domain/entities/ConnectionState.js";
import { ConfigurationError, ConnectionError } from "../domain/errors/BrokerError.js";
import { throwIfCancelled } from "../domain/errors/cancellation.js";
import { isConnectivityError } from "../domain/errors/classification.js";
import type {
  IHttpTransport,
  TransportHandle,
  TransportRequest,
  TransportResponse,
} from "../domain/ports/IHttpTransport.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import { RetryPolicy } from "./RetryPolicy.js";

export const DEFAULT_HEALTH_CHECK_INTERVAL_MS = 30_000;
export const DEFAULT_HEALTH_PATH = "/health";

export interface ConnectionManagerOptions {
  healthCheckIntervalMs?: number;
  healthPath?: string;
  /** Shared policy for probes and requests; a 3 × 500ms..5s policy is built otherwise */
  retryPolicy?: RetryPolicy;
}

function assertInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new ConfigurationError("healthCheckIntervalMs must be a positive number");
  }
}

/**
 * Owns one logical connection to the broker control plane.
 *
 * connect() probes the health endpoint (retrying through the RetryPolicy) and
 * starts a background loop that re-probes every interval and reconnects when
 * a probe fails. send() routes requests through the same policy and moves the
 * state to reconnecting when the transport loses connectivity.
 *
 * State changes go through a single synchronous compare-and-set in
 * transitionState(), so a health probe and a failing request can never
 * interleave inside a transition. Handlers run after the value changed.
 */
export class ConnectionManager {
  private readonly transport: IHttpTransport;
  private readonly ownsTransport: boolean;
  private readonly logger: ILogger;
  private readonly retryPolicy: RetryPolicy;
  private readonly healthPath: string;
  private readonly shutdown = new AbortController();
  private readonly stateHandlers = new Set<ConnectionStateHandler>();

  private _state: ConnectionState = "disconnected";
  private _healthCheckIntervalMs: number;
  private healthCheckTask: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    handle: TransportHandle,
    logger: ILogger,
    options: ConnectionManagerOptions = {}
  ) {
    this.transport = handle.transport;
    this.ownsTransport = handle.kind === "owned";
    this.logger = logger.child({ component: "ConnectionManager" });
    this.healthPath = options.healthPath ?? DEFAULT_HEALTH_PATH;
    this._healthCheckIntervalMs =
      options.healthCheckIntervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS;
    assertInterval(this._healthCheckIntervalMs);
    this.retryPolicy =
      options.retryPolicy ??
      new RetryPolicy({ maxRetries: 3, baseDelayMs: 500, maxDelayMs: 5_000 }, logger);
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isClosed(): boolean {
    return this.shutdown.signal.aborted;
  }

  get healthCheckIntervalMs(): number {
    return this._healthCheckIntervalMs;
  }

  /** Read by the loop before each sleep, so changes apply from the next iteration */
  set healthCheckIntervalMs(intervalMs: number) {
    assertInterval(intervalMs);
    this._healthCheckIntervalMs = intervalMs;
  }

  onStateChange(handler: ConnectionStateHandler): () => void {
    this.stateHandlers.add(handler);
    return () => this.offStateChange(handler);
  }

  offStateChange(handler: ConnectionStateHandler): void {
    this.stateHandlers.delete(handler);
  }

  async connect(signal?: AbortSignal): Promise<void> {
    if (this.isClosed) {
      throw new ConnectionError("Connection manager is closed");
    }
    if (this._state === "connected") {
      return;
    }

    await this.performHealthCheck(signal);
    this.startHealthCheckLoop();
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (this._state === "disconnected") {
      throw new ConnectionError("Not connected to broker. Call connect() first.");
    }

    return this.retryPolicy.execute(async () => {
      if (this._state === "disconnected") {
        throw new ConnectionError("Not connected to broker. Call connect() first.");
      }

      try {
        return await this.transport.send(request, signal);
      } catch (error) {
        if (isConnectivityError(error)) {
          this.transitionState("reconnecting");
          const message = error instanceof Error ? error.message : String(error);
          throw new ConnectionError(`Request failed: ${message}`, error);
        }
        throw error;
      }
    }, signal);
  }

  /**
   * One probe of the health endpoint. Any 2xx means connected; every other
   * outcome except cancellation means disconnected.
   */
  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.transport.send(
        { method: "GET", path: this.healthPath },
        signal
      );
      const healthy = response.status >= 200 && response.status < 300;
      if (!healthy) {
        this.logger.debug("Health check returned non-success status", {
          status: response.status,
        });
      }
      this.transitionState(healthy ? "connected" : "disconnected");
      return healthy;
    } catch (error) {
      throwIfCancelled(error, signal);
      this.logger.debug("Health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      this.transitionState("disconnected");
      return false;
    }
  }

  /**
   * Stop the health loop and release the transport if this manager created it.
   * Later calls return the first call's promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    this.shutdown.abort();

    if (this.healthCheckTask) {
      await this.healthCheckTask;
    }

    if (this.ownsTransport) {
      await this.transport.close();
    }

    this.stateHandlers.clear();
    this.logger.info("Connection manager closed");
  }

  private async performHealthCheck(signal?: AbortSignal): Promise<void> {
    const healthy = await this.checkHealth(signal);
    if (healthy) {
      return;
    }

    await this.retryPolicy.execute(async () => {
      const ok = await this.checkHealth(signal);
      if (!ok) {
        throw new ConnectionError("Health check failed during connect");
      }
      return ok;
    }, signal);
  }

  private startHealthCheckLoop(): void {
    if (this.healthCheckTask) {
      return;
    }
    this.healthCheckTask = this.runHealthCheckLoop(this.shutdown.signal);
  }

  private async runHealthCheckLoop(signal: AbortSignal): Promise<void> {
    this.logger.debug("Health check loop started", {
      intervalMs: this._healthCheckIntervalMs,
    });

    while (!signal.aborted) {
      try {
        await sleep(this._healthCheckIntervalMs, undefined, { signal });
        await this.checkHealth(signal);

        if (this._state === "disconnected") {
          this.transitionState("reconnecting");
          await this.performHealthCheck(signal);
        }
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.logger.warn("Health check loop encountered an error", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.debug("Health check loop stopped");
  }

  private transitionState(next: ConnectionState): void {
    const previous = this._state;
    if (previous === next) {
      return;
    }
    this._state = next;
    this.logger.info("Connection state changed", { from: previous, to: next });

    for (const handler of [...this.stateHandlers]) {
      try {
        handler(next);
      } catch (err) {
        this.logger.error("State change handler failed", err, { state: next });
      }
    }
  }
}
