import { Global, Module } from "@nestjs/common";
import { createKafkaClient, createRecordProducer } from "@sysbridge/core-kafka";
import type { Logger } from "@sysbridge/core-telemetry";
import { CONNECTOR_CONFIG, type ConnectorConfig } from "../config/config.module.js";
import { LOGGER } from "../telemetry/telemetry.module.js";

export const RECORD_PRODUCER = "RECORD_PRODUCER";

@Global()
@Module({
	providers: [
		{
			provide: RECORD_PRODUCER,
			useFactory: (config: ConnectorConfig, logger: Logger) => {
				const kafkaLogger = logger.child({ component: "kafka" });
				return createRecordProducer({
					kafka: createKafkaClient({ config: config.kafka, logger: kafkaLogger }, config.base.logLevel),
					logger: kafkaLogger,
					serviceName: config.base.service.name,
					serviceVersion: config.base.service.version,
				});
			},
			inject: [CONNECTOR_CONFIG, LOGGER],
		},
	],
	exports: [RECORD_PRODUCER],
})
export class KafkaModule {}
