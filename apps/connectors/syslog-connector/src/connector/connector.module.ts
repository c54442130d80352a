import { Global, Module } from "@nestjs/common";
import {
	CONNECTOR_CONFIG,
	type ConnectorConfig,
	LOGGER,
	LifecycleService,
	RECORD_PRODUCER,
	SOURCE_STATUS,
} from "@sysbridge/connector-base";
import type { RecordProducer } from "@sysbridge/core-kafka";
import type { Logger } from "@sysbridge/core-telemetry";
import { SyslogSourceConnector } from "@sysbridge/syslog-source";
import { SyslogConnectorService } from "./syslog-connector.service.js";

@Global()
@Module({
	providers: [
		{
			provide: SyslogSourceConnector,
			useFactory: () => new SyslogSourceConnector(),
		},
		{
			provide: SyslogConnectorService,
			useFactory: (
				connector: SyslogSourceConnector,
				producer: RecordProducer,
				lifecycle: LifecycleService,
				logger: Logger,
				config: ConnectorConfig,
			) => {
				return new SyslogConnectorService(connector, producer, lifecycle, logger, config);
			},
			inject: [SyslogSourceConnector, RECORD_PRODUCER, LifecycleService, LOGGER, CONNECTOR_CONFIG],
		},
		{
			provide: SOURCE_STATUS,
			useExisting: SyslogConnectorService,
		},
	],
	exports: [SyslogConnectorService, SOURCE_STATUS],
})
export class ConnectorModule {}
