import type { LoggerService as NestLoggerService } from "@nestjs/common";
import type { LogContext, Logger } from "@sysbridge/core-telemetry";

function nestContext(optionalParams: unknown[]): LogContext {
	const last = optionalParams[optionalParams.length - 1];
	return typeof last === "string" ? { nest_context: last } : {};
}

/**
 * Routes Nest's own framework logs through the service logger, so startup
 * and routing messages carry the same tags as everything else.
 */
export class NestLoggerAdapter implements NestLoggerService {
	constructor(private readonly logger: Logger) {}

	log(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.info(String(message), nestContext(optionalParams));
	}

	error(message: unknown, ...optionalParams: unknown[]): void {
		const context = nestContext(optionalParams);
		const [trace] = optionalParams;
		if (optionalParams.length > 1 && typeof trace === "string") {
			context.stack = trace;
		}
		this.logger.error(String(message), context);
	}

	warn(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.warn(String(message), nestContext(optionalParams));
	}

	debug(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.debug(String(message), nestContext(optionalParams));
	}

	verbose(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.debug(String(message), nestContext(optionalParams));
	}
}
