export {
	createLogger,
	errorContext,
	type Logger,
	type LogContext,
	type LoggerOptions,
} from "./logger.js";
export {
	REQUIRED_TAGS,
	validateTags,
	sanitizeTagValue,
	createServiceTags,
	type ServiceTags,
	type RequiredTag,
} from "./tags.js";
