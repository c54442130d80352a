import { Global, Module } from "@nestjs/common";
import { type Logger, createLogger, createServiceTags } from "@sysbridge/core-telemetry";
import { CONNECTOR_CONFIG, type ConnectorConfig } from "../config/config.module.js";
import { NestLoggerAdapter } from "./nest-logger.js";

export const LOGGER = "LOGGER";

export function createConnectorLogger(config: ConnectorConfig): Logger {
	return createLogger({
		level: config.base.logLevel,
		serviceTags: createServiceTags(config.base.service, config.base.env),
		pretty: config.base.logFormat === "pretty",
	});
}

@Global()
@Module({
	providers: [
		{
			provide: LOGGER,
			useFactory: createConnectorLogger,
			inject: [CONNECTOR_CONFIG],
		},
		{
			provide: NestLoggerAdapter,
			useFactory: (logger: Logger) => new NestLoggerAdapter(logger.child({ component: "nest" })),
			inject: [LOGGER],
		},
	],
	exports: [LOGGER, NestLoggerAdapter],
})
export class TelemetryModule {}
