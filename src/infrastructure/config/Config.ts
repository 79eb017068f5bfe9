import dotenv from "dotenv";
import { ConfigurationError } from "../../domain/errors/BrokerError.js";
import { LOG_LEVELS, type LogLevel } from "../../domain/ports/ILogger.js";
import type { AutoOffsetReset, ConsumerOptions } from "../../domain/ports/IRecordConsumer.js";

// Load environment variables from .env when present
dotenv.config();

export type Env = Record<string, string | undefined>;

export interface ClientConfig {
  /** Comma-separated host:port pairs; the first one locates the control plane */
  bootstrapServers: string;
  /** HTTP control-plane port on the bootstrap host */
  controlPort: number;
  connectionPoolSize: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  healthCheckIntervalMs: number;
  producer: {
    retries: number;
    retryBackoffMs: number;
  };
  consumer: ConsumerOptions;
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

export interface ClientConfigOverrides
  extends Partial<Omit<ClientConfig, "producer" | "consumer" | "logging">> {
  producer?: Partial<ClientConfig["producer"]>;
  consumer?: Partial<ConsumerOptions>;
  logging?: Partial<ClientConfig["logging"]>;
}

export const DEFAULT_BOOTSTRAP_SERVERS = "localhost:9092";
export const DEFAULT_CONTROL_PORT = 9094;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  const value = env[key]?.trim();
  return value ? value : defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (value === "true") return true;
  if (value === "false") return false;
  return defaultValue;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isAutoOffsetReset(value: string): value is AutoOffsetReset {
  return value === "earliest" || value === "latest";
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ClientConfig {
  const level = getEnvOrDefault(env, "LOG_LEVEL", "info");
  const offsetReset = getEnvOrDefault(env, "BROKER_CONSUMER_AUTO_OFFSET_RESET", "earliest");

  return {
    bootstrapServers: getEnvOrDefault(
      env,
      "BROKER_BOOTSTRAP_SERVERS",
      DEFAULT_BOOTSTRAP_SERVERS
    ),
    controlPort: getEnvNumber(env, "BROKER_CONTROL_PORT", DEFAULT_CONTROL_PORT),
    connectionPoolSize: getEnvNumber(env, "BROKER_CONNECTION_POOL_SIZE", 4),
    connectTimeoutMs: getEnvNumber(env, "BROKER_CONNECT_TIMEOUT_MS", 30_000),
    requestTimeoutMs: getEnvNumber(env, "BROKER_REQUEST_TIMEOUT_MS", 30_000),
    healthCheckIntervalMs: getEnvNumber(
      env,
      "BROKER_HEALTH_CHECK_INTERVAL_MS",
      30_000
    ),
    producer: {
      retries: getEnvNumber(env, "BROKER_PRODUCER_RETRIES", 3),
      retryBackoffMs: getEnvNumber(env, "BROKER_RETRY_BACKOFF_MS", 100),
    },
    consumer: {
      groupId: env.BROKER_CONSUMER_GROUP_ID?.trim() || undefined,
      autoOffsetReset: isAutoOffsetReset(offsetReset) ? offsetReset : "earliest",
      enableAutoCommit: getEnvBoolean(env, "BROKER_CONSUMER_ENABLE_AUTO_COMMIT", true),
      autoCommitIntervalMs: getEnvNumber(env, "BROKER_CONSUMER_AUTO_COMMIT_INTERVAL_MS", 5_000),
      sessionTimeoutMs: getEnvNumber(env, "BROKER_CONSUMER_SESSION_TIMEOUT_MS", 30_000),
      heartbeatIntervalMs: getEnvNumber(env, "BROKER_CONSUMER_HEARTBEAT_INTERVAL_MS", 3_000),
      maxPollRecords: getEnvNumber(env, "BROKER_CONSUMER_MAX_POLL_RECORDS", 500),
    },
    logging: {
      // Unknown levels are caught by validateConfig
      level: isLogLevel(level) ? level : "info",
      pretty: env.NODE_ENV !== "production",
    },
  };
}

/**
 * Environment configuration with caller overrides layered on top
 */
export function resolveConfig(
  overrides: ClientConfigOverrides = {},
  env: Env = process.env
): ClientConfig {
  const base = loadConfig(env);
  return {
    ...base,
    ...overrides,
    producer: { ...base.producer, ...overrides.producer },
    consumer: { ...base.consumer, ...overrides.consumer },
    logging: { ...base.logging, ...overrides.logging },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ClientConfig): void {
  const firstServer = config.bootstrapServers.split(",")[0]?.trim() ?? "";
  if (!firstServer) {
    throw new ConfigurationError("bootstrapServers must list at least one host:port");
  }

  if (
    !Number.isInteger(config.controlPort) ||
    config.controlPort < 1 ||
    config.controlPort > 65535
  ) {
    throw new ConfigurationError("controlPort must be between 1 and 65535");
  }

  if (!Number.isInteger(config.connectionPoolSize) || config.connectionPoolSize < 1) {
    throw new ConfigurationError("connectionPoolSize must be at least 1");
  }

  for (const [name, value] of [
    ["connectTimeoutMs", config.connectTimeoutMs],
    ["requestTimeoutMs", config.requestTimeoutMs],
    ["healthCheckIntervalMs", config.healthCheckIntervalMs],
  ] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be a positive number`);
    }
  }

  if (!Number.isInteger(config.producer.retries) || config.producer.retries < 0) {
    throw new ConfigurationError("producer.retries must be a non-negative integer");
  }

  if (!Number.isFinite(config.producer.retryBackoffMs) || config.producer.retryBackoffMs < 0) {
    throw new ConfigurationError("producer.retryBackoffMs must be non-negative");
  }

  validateConsumerOptions(config.consumer);

  if (!isLogLevel(config.logging.level)) {
    throw new ConfigurationError(`Unknown log level: ${String(config.logging.level)}`);
  }
}

/**
 * Validate consumer options, also when they come from createConsumer() overrides
 */
export function validateConsumerOptions(options: ConsumerOptions): void {
  if (options.groupId !== undefined && !options.groupId.trim()) {
    throw new ConfigurationError("consumer.groupId must not be empty");
  }

  if (!isAutoOffsetReset(options.autoOffsetReset)) {
    throw new ConfigurationError(
      `Unknown auto offset reset policy: ${String(options.autoOffsetReset)}`
    );
  }

  for (const [name, value] of [
    ["consumer.autoCommitIntervalMs", options.autoCommitIntervalMs],
    ["consumer.sessionTimeoutMs", options.sessionTimeoutMs],
    ["consumer.heartbeatIntervalMs", options.heartbeatIntervalMs],
  ] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be a positive number`);
    }
  }

  if (options.heartbeatIntervalMs >= options.sessionTimeoutMs) {
    throw new ConfigurationError(
      "consumer.heartbeatIntervalMs must be lower than consumer.sessionTimeoutMs"
    );
  }

  if (!Number.isInteger(options.maxPollRecords) || options.maxPollRecords < 1) {
    throw new ConfigurationError("consumer.maxPollRecords must be at least 1");
  }
}

/**
 * Control-plane base URL: the first bootstrap host on the control port.
 */
export function resolveControlPlaneUrl(
  bootstrapServers: string,
  controlPort: number = DEFAULT_CONTROL_PORT
): string {
  const server = bootstrapServers.split(",")[0]?.trim() ?? "";
  if (!server) {
    throw new ConfigurationError("bootstrapServers must list at least one host:port");
  }
  // A bracketed IPv6 literal without a port keeps its colons
  const separator = server.endsWith("]") ? -1 : server.lastIndexOf(":");
  const host = separator === -1 ? server : server.slice(0, separator);
  return `http://${host}:${controlPort}`;
}
