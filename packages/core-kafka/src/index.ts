export { createKafkaClient, saslOptions, type KafkaClientOptions } from "./client.js";
export {
	createRecordProducer,
	type AnySourceRecord,
	type KafkaProducerClient,
	type ProducerFactory,
	type RecordProducer,
	type RecordProducerOptions,
} from "./producer.js";
export {
	CONNECT_TIMESTAMP_NAME,
	serializeConnectJson,
	toConnectJson,
	toConnectJsonSchema,
	type ConnectJson,
	type ConnectJsonFieldSchema,
	type ConnectJsonSchema,
	type ConnectJsonValue,
} from "./converter.js";
export { assertTopicName, checkTopicName } from "./topics.js";
export {
	KafkaError,
	type KafkaErrorCode,
	isRetryable,
	RetryableError,
	NonRetryableError,
	SchemaValidationError,
} from "./errors.js";
