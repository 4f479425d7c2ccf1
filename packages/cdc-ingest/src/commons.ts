import { createClient, type ClickHouseClient } from "@clickhouse/client";
import { Kafka, logLevel, type LogEntry, type SASLOptions } from "kafkajs";

export const MAX_RETRIES = 150;
export const MAX_RETRY_TIME_MS = 1000;
export const RETRY_INITIAL_TIME_MS = 100;

/**
 * Interface for logging functionality
 */
export interface Logger {
  logPrefix: string;
  log: (message: string) => void;
  error: (message: string) => void;
  warn: (message: string) => void;
}

/**
 * Creates a Logger instance that prefixes all log messages
 *
 * @example
 * ```ts
 * const logger = createLogger("dbserver1.inventory.customers [partition 0]");
 * logger.log("message"); // Outputs: "dbserver1.inventory.customers [partition 0]: message"
 * ```
 */
export const createLogger = (logPrefix: string): Logger => ({
  logPrefix,
  log: (message: string): void => {
    console.log(`${logPrefix}: ${message}`);
  },
  error: (message: string): void => {
    console.error(`${logPrefix}: ${message}`);
  },
  warn: (message: string): void => {
    console.warn(`${logPrefix}: ${message}`);
  },
});

export const logError = (logger: Logger, e: Error): void => {
  logger.error(e.message);
  const stack = e.stack;
  if (stack) {
    logger.error(stack);
  }
  if (e.cause instanceof Error) {
    logger.error(`Caused by: ${e.cause.message}`);
  }
};

export interface Clock {
  now: () => number;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * Quote a ClickHouse identifier with backticks if not already quoted.
 */
export const quoteIdentifier = (name: string): string => {
  return name.startsWith("`") && name.endsWith("`") ? name : `\`${name}\``;
};

/**
 * Parses a comma-separated broker string into an array of valid broker addresses.
 * Handles whitespace trimming and filters out empty elements.
 *
 * @param brokerString - Comma-separated broker addresses (e.g., "broker1:9092, broker2:9092, , broker3:9092")
 * @returns Array of trimmed, non-empty broker addresses
 */
export const parseBrokerString = (brokerString: string): string[] =>
  brokerString
    .split(",")
    .map((b) => b.trim())
    .filter((b) => b.length > 0);

export type KafkaClientConfig = {
  clientId: string;
  broker: string;
  securityProtocol?: string; // e.g. "SASL_SSL" or "PLAINTEXT"
  saslUsername?: string;
  saslPassword?: string;
  saslMechanism?: string; // e.g. "scram-sha-256", "plain"
};

/**
 * Builds SASL configuration for Kafka client authentication
 */
export const buildSaslConfig = (
  logger: Logger,
  args: KafkaClientConfig,
): SASLOptions | undefined => {
  if (!args.saslMechanism) {
    return undefined;
  }
  const username = args.saslUsername || "";
  const password = args.saslPassword || "";
  switch (args.saslMechanism.toLowerCase()) {
    case "plain":
      return { mechanism: "plain", username, password };
    case "scram-sha-256":
      return { mechanism: "scram-sha-256", username, password };
    case "scram-sha-512":
      return { mechanism: "scram-sha-512", username, password };
    default:
      logger.warn(`Unsupported SASL mechanism: ${args.saslMechanism}`);
      return undefined;
  }
};

/**
 * Routes the Kafka client's own log lines through our Logger.
 */
const kafkaLogCreator =
  (logger: Logger) =>
  (_level: logLevel) =>
  ({ namespace, level, log }: LogEntry): void => {
    const message = `[kafka:${namespace}] ${log.message}`;
    if (level === logLevel.ERROR || level === logLevel.NOTHING) {
      logger.error(message);
    } else if (level === logLevel.WARN) {
      logger.warn(message);
    } else {
      logger.log(message);
    }
  };

/**
 * Creates a Kafka client configured with provided settings.
 * Use this to construct producers/consumers/admins with custom options.
 */
export const getKafkaClient = (
  cfg: KafkaClientConfig,
  logger: Logger,
): Kafka => {
  const brokers = parseBrokerString(cfg.broker || "");
  if (brokers.length === 0) {
    throw new Error(`No valid broker addresses found in: "${cfg.broker}"`);
  }

  logger.log(`Creating Kafka client with brokers: ${brokers.join(", ")}`);
  logger.log(`Security protocol: ${cfg.securityProtocol || "plaintext"}`);
  logger.log(`Client ID: ${cfg.clientId}`);

  const saslConfig = buildSaslConfig(logger, cfg);

  return new Kafka({
    clientId: cfg.clientId,
    brokers,
    ssl: cfg.securityProtocol === "SASL_SSL",
    ...(saslConfig && { sasl: saslConfig }),
    logLevel: logLevel.WARN,
    logCreator: kafkaLogCreator(logger),
    retry: {
      initialRetryTime: RETRY_INITIAL_TIME_MS,
      maxRetryTime: MAX_RETRY_TIME_MS,
      retries: MAX_RETRIES,
    },
  });
};

export interface ClickHouseConnectionConfig {
  username: string;
  password: string;
  useSSL: boolean;
  host: string;
  port: string;
}

export const getClickhouseClient = (
  { username, password, useSSL, host, port }: ClickHouseConnectionConfig,
  application: string,
  logger: Logger,
): ClickHouseClient => {
  const protocol = useSSL ? "https" : "http";
  logger.log(`Connecting to Clickhouse at ${protocol}://${host}:${port}`);
  return createClient({
    url: `${protocol}://${host}:${port}`,
    username: username,
    password: password,
    application,
  });
};
