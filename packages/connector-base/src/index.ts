// Config
export {
	CONNECTOR_CONFIG,
	type ConnectorConfig,
	ConnectorConfigModule,
	type ConnectorConfigOptions,
} from "./config/config.module.js";

// Telemetry
export { LOGGER, TelemetryModule, createConnectorLogger } from "./telemetry/telemetry.module.js";
export { NestLoggerAdapter } from "./telemetry/nest-logger.js";

// Kafka
export { KafkaModule, RECORD_PRODUCER } from "./kafka/kafka.module.js";

// Health
export { HealthController } from "./health/health.controller.js";
export { HealthModule } from "./health/health.module.js";
export {
	type CheckStatus,
	HEALTH_SERVICE,
	type HealthCheck,
	type HealthResponse,
	HealthService,
	SOURCE_STATUS,
	type SourceStatus,
} from "./health/health.service.js";

// Lifecycle
export { EXIT_DELAY_MS, LifecycleService, type ProcessHooks } from "./lifecycle/lifecycle.service.js";
export { LifecycleModule } from "./lifecycle/lifecycle.module.js";
