import { Module } from "@nestjs/common";
import {
	ConnectorConfigModule,
	HealthModule,
	KafkaModule,
	LifecycleModule,
	TelemetryModule,
} from "@sysbridge/connector-base";
import { ConnectorModule } from "./connector/connector.module.js";

@Module({
	imports: [
		// Core infrastructure
		ConnectorConfigModule.forRoot({
			envFilePath: ".env",
		}),
		TelemetryModule,
		LifecycleModule,
		KafkaModule,

		// Source side, also reported by the health checks
		ConnectorModule,
		HealthModule,
	],
})
export class AppModule {}
