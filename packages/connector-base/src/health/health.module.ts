import { Module } from "@nestjs/common";
import type { RecordProducer } from "@sysbridge/core-kafka";
import { RECORD_PRODUCER } from "../kafka/kafka.module.js";
import { HealthController } from "./health.controller.js";
import { HEALTH_SERVICE, HealthService, SOURCE_STATUS, type SourceStatus } from "./health.service.js";

@Module({
	controllers: [HealthController],
	providers: [
		{
			provide: HEALTH_SERVICE,
			useFactory: (producer: RecordProducer, source?: SourceStatus) => {
				return new HealthService(producer, source);
			},
			inject: [RECORD_PRODUCER, { token: SOURCE_STATUS, optional: true }],
		},
	],
	exports: [HEALTH_SERVICE],
})
export class HealthModule {}
