export {
	loadConfig,
	parseSyslogProperties,
	validateSyslogProperties,
	SYSLOG_PROPERTY_KEYS,
	type ConfigLoaderOptions,
	type FullConfig,
} from "./loader.js";
export {
	baseConfigSchema,
	kafkaConfigSchema,
	syslogSourceConfigSchema,
	healthConfigSchema,
	serviceIdentitySchema,
} from "./schemas.js";
export type {
	BaseConfig,
	KafkaConfig,
	SyslogSourceConfig,
	SyslogSourceConfigInput,
	HealthConfig,
	ServiceIdentity,
} from "./schemas.js";
export {
	ConfigError,
	MissingEnvVarError,
	ValidationError,
	type ValidationIssue,
} from "./errors.js";
