import "reflect-metadata";
import { CONNECTOR_CONFIG, type ConnectorConfig, LOGGER, NestLoggerAdapter } from "@sysbridge/connector-base";
import type { Logger } from "@sysbridge/core-telemetry";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";

async function bootstrap() {
	const app = await NestFactory.create(AppModule, {
		bufferLogs: true,
	});

	app.useLogger(app.get(NestLoggerAdapter));
	app.enableShutdownHooks(["SIGTERM", "SIGINT"]);

	const config = app.get<ConnectorConfig>(CONNECTOR_CONFIG);
	const logger = app.get<Logger>(LOGGER);

	await app.listen(config.health.port);
	logger.info(`Health endpoints available on port ${config.health.port}`);
}

bootstrap().catch((error: unknown) => {
	console.error("Failed to start application:", error);
	process.exit(1);
});
