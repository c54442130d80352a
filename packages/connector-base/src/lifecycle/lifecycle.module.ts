import { Global, Module } from "@nestjs/common";
import type { Logger } from "@sysbridge/core-telemetry";
import { LOGGER } from "../telemetry/telemetry.module.js";
import { LifecycleService } from "./lifecycle.service.js";

@Global()
@Module({
	providers: [
		{
			provide: LifecycleService,
			useFactory: (logger: Logger) => new LifecycleService(logger.child({ component: "lifecycle" })),
			inject: [LOGGER],
		},
	],
	exports: [LifecycleService],
})
export class LifecycleModule {}
