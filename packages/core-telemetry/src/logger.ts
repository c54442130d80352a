import pino from "pino";
import type { RequiredTag, ServiceTags } from "./tags.js";
import { validateTags } from "./tags.js";

export interface LogContext extends Record<string, unknown> {
	remote_address?: string;
	topic?: string;
	stage?: string;
	error?: string;
	error_code?: string;
	stack?: string;
	duration_ms?: number;
}

export interface Logger {
	debug(msg: string, context?: LogContext): void;
	info(msg: string, context?: LogContext): void;
	warn(msg: string, context?: LogContext): void;
	error(msg: string, context?: LogContext): void;
	child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
	level?: string;
	serviceTags: ServiceTags;
	pretty?: boolean;
	/** Write to this stream instead of stdout */
	destination?: pino.DestinationStream;
}

/**
 * Redact sensitive fields from log context
 */
const REDACTED_PATTERNS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/private/i,
];

function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (REDACTED_PATTERNS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		if (value && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date)) {
			result[key] = redactSensitive({ ...value });
			continue;
		}

		result[key] = value;
	}

	return result;
}

/**
 * Log fields for an error of unknown shape. Codes come from the
 * error's `code` property when it has a string one.
 */
export function errorContext(error: unknown): LogContext {
	if (error instanceof Error) {
		const context: LogContext = { error: error.message };
		const code: unknown = Reflect.get(error, "code");
		if (typeof code === "string") context.error_code = code;
		if (error.stack) context.stack = error.stack;
		return context;
	}
	return { error: String(error) };
}

class PinoLogger implements Logger {
	private pino: pino.Logger;
	// env/service/version live in pino's base bindings
	private contextTags: Omit<ServiceTags, RequiredTag>;

	constructor(pinoInstance: pino.Logger, contextTags: Omit<ServiceTags, RequiredTag>) {
		this.pino = pinoInstance;
		this.contextTags = contextTags;
	}

	private formatContext(context?: LogContext): Record<string, unknown> {
		if (!context) {
			return { ...this.contextTags };
		}

		return {
			...this.contextTags,
			...redactSensitive(context),
		};
	}

	debug(msg: string, context?: LogContext): void {
		this.pino.debug(this.formatContext(context), msg);
	}

	info(msg: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), msg);
	}

	warn(msg: string, context?: LogContext): void {
		this.pino.warn(this.formatContext(context), msg);
	}

	error(msg: string, context?: LogContext): void {
		this.pino.error(this.formatContext(context), msg);
	}

	child(bindings: Record<string, unknown>): Logger {
		return new PinoLogger(
			this.pino.child(redactSensitive(bindings)),
			this.contextTags,
		);
	}
}

export function createLogger(options: LoggerOptions): Logger {
	validateTags(options.serviceTags, "logger");
	const { env, service, version, ...contextTags } = options.serviceTags;

	const pinoOptions: pino.LoggerOptions = {
		level: options.level ?? "info",
		base: { env, service, version },
		formatters: {
			level: (label) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (options.pretty && !options.destination) {
		pinoOptions.transport = {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "SYS:standard",
				ignore: "pid,hostname",
			},
		};
	}

	const pinoInstance = options.destination
		? pino(pinoOptions, options.destination)
		: pino(pinoOptions);
	return new PinoLogger(pinoInstance, contextTags);
}
