import { z } from "zod";

export const serviceIdentitySchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
	team: z.string().min(1).default("platform"),
	region: z.string().default("local"),
	domain: z.string().default("syslog"),
});

export type ServiceIdentity = z.infer<typeof serviceIdentitySchema>;

export const baseConfigSchema = z.object({
	env: z.enum(["dev", "staging", "prod"]).default("dev"),
	nodeEnv: z.enum(["development", "production", "test"]).default("development"),
	service: serviceIdentitySchema,
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logFormat: z.enum(["json", "pretty"]).default("json"),
});

export type BaseConfig = z.infer<typeof baseConfigSchema>;

export const kafkaConfigSchema = z.object({
	bootstrapServers: z.string().min(1),
	securityProtocol: z
		.enum(["SASL_SSL", "PLAINTEXT", "SSL"])
		.default("PLAINTEXT"),
	saslMechanism: z
		.enum(["PLAIN", "SCRAM-SHA-256", "SCRAM-SHA-512"])
		.default("PLAIN"),
	saslUsername: z.string().optional(),
	saslPassword: z.string().optional(),
	clientId: z.string().min(1),
	maxRetries: z.number().int().nonnegative().default(5),
	retryBackoffMs: z.number().int().positive().default(100),
});

export type KafkaConfig = z.infer<typeof kafkaConfigSchema>;

function isSupportedCharset(label: string): boolean {
	try {
		new TextDecoder(label);
		return true;
	} catch {
		return false;
	}
}

/**
 * Settings of one syslog source task. Read once at startup and treated as
 * immutable afterwards.
 */
export const syslogSourceConfigSchema = z.object({
	/** Kafka topic every translated record is written to */
	topic: z
		.string()
		.min(1)
		.max(249)
		.regex(/^[a-zA-Z0-9._-]+$/, "must contain only letters, digits, '.', '_' or '-'"),
	protocol: z.enum(["udp", "tcp"]).default("udp"),
	host: z.string().min(1).default("0.0.0.0"),
	port: z.number().int().min(0).max(65535).default(514),
	charset: z
		.string()
		.default("utf-8")
		.refine(isSupportedCharset, { message: "unsupported character set" }),
	maxMessageSize: z.number().int().positive().default(8192),
	/** Resolve the sender's IP to a hostname with a reverse DNS lookup */
	reverseDns: z.boolean().default(false),
	reverseDnsTimeoutMs: z.number().int().positive().default(2000),
	batchSize: z.number().int().positive().default(1000),
	pollIntervalMs: z.number().int().positive().default(1000),
});

export type SyslogSourceConfig = z.infer<typeof syslogSourceConfigSchema>;
export type SyslogSourceConfigInput = z.input<typeof syslogSourceConfigSchema>;

export const healthConfigSchema = z.object({
	port: z.number().int().min(0).max(65535).default(3000),
});

export type HealthConfig = z.infer<typeof healthConfigSchema>;
