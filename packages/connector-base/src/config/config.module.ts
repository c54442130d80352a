import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { type FullConfig, loadConfig } from "@sysbridge/core-config";

export const CONNECTOR_CONFIG = "CONNECTOR_CONFIG";

export type ConnectorConfig = Readonly<FullConfig>;

export interface ConnectorConfigOptions {
	envFilePath?: string;
	/** Read this object instead of process.env */
	env?: Record<string, string | undefined>;
}

@Global()
@Module({})
export class ConnectorConfigModule {
	static forRoot(options: ConnectorConfigOptions = {}): DynamicModule {
		return {
			module: ConnectorConfigModule,
			imports: [
				ConfigModule.forRoot({
					...(options.envFilePath ? { envFilePath: options.envFilePath } : {}),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: CONNECTOR_CONFIG,
					// .env has been merged into process.env by ConfigModule at this point
					useFactory: (): ConnectorConfig =>
						Object.freeze(loadConfig({ env: options.env ?? process.env })),
				},
			],
			exports: [CONNECTOR_CONFIG],
		};
	}
}
