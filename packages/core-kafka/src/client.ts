import type { KafkaConfig } from "@sysbridge/core-config";
import type { Logger } from "@sysbridge/core-telemetry";
import {
	Kafka,
	type KafkaConfig as KafkaJSConfig,
	type SASLOptions,
	logLevel,
} from "kafkajs";

export interface KafkaClientOptions {
	config: KafkaConfig;
	logger: Logger;
}

function toKafkaLogLevel(level: string): logLevel {
	switch (level) {
		case "debug":
			return logLevel.DEBUG;
		case "warn":
			return logLevel.WARN;
		case "error":
			return logLevel.ERROR;
		default:
			return logLevel.INFO;
	}
}

export function saslOptions(config: KafkaConfig): SASLOptions | undefined {
	if (config.securityProtocol !== "SASL_SSL") {
		return undefined;
	}

	const username = config.saslUsername ?? "";
	const password = config.saslPassword ?? "";
	switch (config.saslMechanism) {
		case "PLAIN":
			return { mechanism: "plain", username, password };
		case "SCRAM-SHA-256":
			return { mechanism: "scram-sha-256", username, password };
		case "SCRAM-SHA-512":
			return { mechanism: "scram-sha-512", username, password };
	}
}

export function createKafkaClient(options: KafkaClientOptions, level = "info"): Kafka {
	const { config } = options;
	const logger = options.logger.child({ component: "kafkajs" });

	const kafkaConfig: KafkaJSConfig = {
		clientId: config.clientId,
		brokers: config.bootstrapServers.split(",").map((b) => b.trim()),
		logLevel: toKafkaLogLevel(level),
		logCreator: () => {
			return ({ level: entryLevel, namespace, log }) => {
				const { message, ...extra } = log;
				const context = { ...extra, namespace };
				switch (entryLevel) {
					case logLevel.ERROR:
						logger.error(message, context);
						break;
					case logLevel.WARN:
						logger.warn(message, context);
						break;
					case logLevel.INFO:
						logger.info(message, context);
						break;
					default:
						logger.debug(message, context);
				}
			};
		},
		retry: {
			retries: config.maxRetries,
			initialRetryTime: config.retryBackoffMs,
			maxRetryTime: 30000,
		},
	};

	if (config.securityProtocol !== "PLAINTEXT") {
		kafkaConfig.ssl = true;
	}

	const sasl = saslOptions(config);
	if (sasl) {
		kafkaConfig.sasl = sasl;
	}

	return new Kafka(kafkaConfig);
}
