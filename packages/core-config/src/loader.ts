import type { ZodTypeAny, output } from "zod";
import { MissingEnvVarError, ValidationError, type ValidationIssue } from "./errors.js";
import {
	type BaseConfig,
	type HealthConfig,
	type KafkaConfig,
	type SyslogSourceConfig,
	baseConfigSchema,
	healthConfigSchema,
	kafkaConfigSchema,
	syslogSourceConfigSchema,
} from "./schemas.js";

export interface ConfigLoaderOptions {
	/** Throw on missing required vars instead of letting validation report them */
	strict?: boolean;
	/** Custom environment object (defaults to process.env) */
	env?: Record<string, string | undefined>;
}

type RawValue = string | number | boolean | undefined;

interface EnvVarDef {
	key: string;
	required?: boolean;
	default?: string | number | boolean;
	transform?: (value: string) => string | number | boolean;
}

function getEnvVar(
	env: Record<string, string | undefined>,
	def: EnvVarDef,
	strict: boolean,
): RawValue {
	const value = env[def.key];

	if (value === undefined || value === "") {
		if (def.required && strict) {
			throw new MissingEnvVarError(def.key);
		}
		return def.default;
	}

	if (def.transform) {
		return def.transform(value);
	}

	return value;
}

const toBool = (v: string): boolean => v.toLowerCase() === "true" || v === "1";
const toInt = (v: string): number => (/^-?\d+$/.test(v.trim()) ? Number.parseInt(v, 10) : Number.NaN);

function issuesOf(error: { errors: Array<{ path: Array<string | number>; message: string }> }): ValidationIssue[] {
	return error.errors.map((e) => ({
		path: e.path.join("."),
		message: e.message,
	}));
}

function validateSchema<S extends ZodTypeAny>(schema: S, data: unknown, name: string): output<S> {
	const result = schema.safeParse(data);
	if (!result.success) {
		throw new ValidationError(`Invalid ${name} configuration`, issuesOf(result.error));
	}
	return result.data;
}

export interface FullConfig {
	base: BaseConfig;
	kafka: KafkaConfig;
	syslog: SyslogSourceConfig;
	health: HealthConfig;
}

export function loadConfig(options: ConfigLoaderOptions = {}): FullConfig {
	const env = options.env ?? process.env;
	const strict = options.strict ?? false;

	const serviceName = getEnvVar(env, { key: "SERVICE_NAME", default: "syslog-connector" }, strict);
	const serviceVersion = getEnvVar(env, { key: "SERVICE_VERSION", default: "0.1.0" }, strict);

	const baseRaw = {
		env: getEnvVar(env, { key: "ENV", default: "dev" }, strict),
		nodeEnv: getEnvVar(env, { key: "NODE_ENV", default: "development" }, strict),
		service: {
			name: serviceName,
			version: serviceVersion,
			team: getEnvVar(env, { key: "TEAM", default: "platform" }, strict),
			region: getEnvVar(env, { key: "REGION", default: "local" }, strict),
			domain: getEnvVar(env, { key: "DOMAIN", default: "syslog" }, strict),
		},
		logLevel: getEnvVar(env, { key: "LOG_LEVEL", default: "info" }, strict),
		logFormat: getEnvVar(env, { key: "LOG_FORMAT", default: "json" }, strict),
	};

	const kafkaRaw = {
		bootstrapServers: getEnvVar(env, { key: "KAFKA_BOOTSTRAP_SERVERS", required: true }, strict),
		securityProtocol: getEnvVar(env, { key: "KAFKA_SECURITY_PROTOCOL", default: "PLAINTEXT" }, strict),
		saslMechanism: getEnvVar(env, { key: "KAFKA_SASL_MECHANISM", default: "PLAIN" }, strict),
		saslUsername: getEnvVar(env, { key: "KAFKA_SASL_USERNAME" }, strict),
		saslPassword: getEnvVar(env, { key: "KAFKA_SASL_PASSWORD" }, strict),
		clientId: getEnvVar(env, { key: "KAFKA_CLIENT_ID", default: String(serviceName) }, strict),
		maxRetries: getEnvVar(env, { key: "KAFKA_MAX_RETRIES", default: 5, transform: toInt }, strict),
		retryBackoffMs: getEnvVar(env, { key: "KAFKA_RETRY_BACKOFF_MS", default: 100, transform: toInt }, strict),
	};

	const syslogRaw = {
		topic: getEnvVar(env, { key: "SYSLOG_TOPIC", required: true }, strict),
		protocol: getEnvVar(env, { key: "SYSLOG_PROTOCOL" }, strict),
		host: getEnvVar(env, { key: "SYSLOG_HOST" }, strict),
		port: getEnvVar(env, { key: "SYSLOG_PORT", transform: toInt }, strict),
		charset: getEnvVar(env, { key: "SYSLOG_CHARSET" }, strict),
		maxMessageSize: getEnvVar(env, { key: "SYSLOG_MAX_MESSAGE_SIZE", transform: toInt }, strict),
		reverseDns: getEnvVar(env, { key: "SYSLOG_REVERSE_DNS", transform: toBool }, strict),
		reverseDnsTimeoutMs: getEnvVar(env, { key: "SYSLOG_REVERSE_DNS_TIMEOUT_MS", transform: toInt }, strict),
		batchSize: getEnvVar(env, { key: "SYSLOG_BATCH_SIZE", transform: toInt }, strict),
		pollIntervalMs: getEnvVar(env, { key: "SYSLOG_POLL_INTERVAL_MS", transform: toInt }, strict),
	};

	const healthRaw = {
		port: getEnvVar(env, { key: "HEALTH_PORT", transform: toInt }, strict),
	};

	// Validate with Zod - it applies defaults and transforms
	return {
		base: validateSchema(baseConfigSchema, baseRaw, "base"),
		kafka: validateSchema(kafkaConfigSchema, kafkaRaw, "kafka"),
		syslog: validateSchema(syslogSourceConfigSchema, syslogRaw, "syslog"),
		health: validateSchema(healthConfigSchema, healthRaw, "health"),
	};
}

/**
 * Connector property keys, as accepted by {@link parseSyslogProperties}.
 */
export const SYSLOG_PROPERTY_KEYS = {
	topic: "topic",
	protocol: "syslog.protocol",
	host: "syslog.host",
	port: "syslog.port",
	charset: "syslog.charset",
	maxMessageSize: "syslog.max.message.size",
	reverseDns: "syslog.reverse.dns.remote.ip",
	reverseDnsTimeoutMs: "syslog.reverse.dns.timeout.ms",
	batchSize: "syslog.batch.size",
	pollIntervalMs: "syslog.poll.interval.ms",
} as const;

function syslogRawFromProperties(props: Readonly<Record<string, string | undefined>>) {
	const read = (key: string, transform?: (value: string) => string | number | boolean): RawValue =>
		getEnvVar(props, transform ? { key, transform } : { key }, false);
	const k = SYSLOG_PROPERTY_KEYS;

	return {
		topic: read(k.topic),
		protocol: read(k.protocol),
		host: read(k.host),
		port: read(k.port, toInt),
		charset: read(k.charset),
		maxMessageSize: read(k.maxMessageSize, toInt),
		reverseDns: read(k.reverseDns, toBool),
		reverseDnsTimeoutMs: read(k.reverseDnsTimeoutMs, toInt),
		batchSize: read(k.batchSize, toInt),
		pollIntervalMs: read(k.pollIntervalMs, toInt),
	};
}

function propertyKeyFor(field: string): string {
	for (const [name, key] of Object.entries(SYSLOG_PROPERTY_KEYS)) {
		if (name === field) return key;
	}
	return field;
}

/**
 * Validate connector properties without throwing. Issue paths use the
 * property keys, not the config field names.
 */
export function validateSyslogProperties(
	props: Readonly<Record<string, string | undefined>>,
): ValidationIssue[] {
	const result = syslogSourceConfigSchema.safeParse(syslogRawFromProperties(props));
	if (result.success) {
		return [];
	}
	return issuesOf(result.error).map((issue) => ({
		...issue,
		path: propertyKeyFor(issue.path),
	}));
}

export function parseSyslogProperties(
	props: Readonly<Record<string, string | undefined>>,
): SyslogSourceConfig {
	const issues = validateSyslogProperties(props);
	if (issues.length > 0) {
		throw new ValidationError("Invalid syslog connector properties", issues);
	}
	return validateSchema(syslogSourceConfigSchema, syslogRawFromProperties(props), "syslog");
}
