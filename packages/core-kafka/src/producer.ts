import { SOURCE_PARTITION_HOST, type SourceRecord } from "@sysbridge/core-contracts";
import type { Logger } from "@sysbridge/core-telemetry";
import kafkajs, {
	type Message as KafkaMessage,
	type Producer,
	type ProducerConfig,
	type RecordMetadata,
} from "kafkajs";
import { v4 as uuidv4 } from "uuid";
import { serializeConnectJson } from "./converter.js";
import { NonRetryableError, RetryableError } from "./errors.js";
import { assertTopicName } from "./topics.js";

// kafkajs assembles its error exports at run time, out of sight of ESM named-export detection
const { KafkaJSError } = kafkajs;

export type AnySourceRecord = SourceRecord<object, object>;

export interface RecordProducer {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
	/** Serialize and send a batch; records keep their relative order per topic */
	sendRecords(records: readonly AnySourceRecord[]): Promise<RecordMetadata[]>;
}

/** The slice of a kafkajs producer this module drives */
export type KafkaProducerClient = Pick<Producer, "connect" | "disconnect" | "sendBatch">;

export interface ProducerFactory {
	producer(config?: ProducerConfig): KafkaProducerClient;
}

export interface RecordProducerOptions {
	kafka: ProducerFactory;
	logger: Logger;
	serviceName: string;
	serviceVersion: string;
}

class RecordProducerImpl implements RecordProducer {
	private producer: KafkaProducerClient;
	private logger: Logger;
	private serviceName: string;
	private serviceVersion: string;
	private connected = false;

	constructor(options: RecordProducerOptions) {
		this.producer = options.kafka.producer({
			idempotent: true,
			maxInFlightRequests: 5,
		});
		this.logger = options.logger;
		this.serviceName = options.serviceName;
		this.serviceVersion = options.serviceVersion;
	}

	isConnected(): boolean {
		return this.connected;
	}

	async connect(): Promise<void> {
		if (this.connected) return;
		await this.producer.connect();
		this.connected = true;
		this.logger.info("Kafka producer connected");
	}

	async disconnect(): Promise<void> {
		if (!this.connected) return;
		await this.producer.disconnect();
		this.connected = false;
		this.logger.info("Kafka producer disconnected");
	}

	toMessage(record: AnySourceRecord): KafkaMessage {
		const headers: Record<string, string> = {
			"x-sysbridge-service": this.serviceName,
			"x-sysbridge-version": this.serviceVersion,
			"x-sysbridge-schema": record.valueSchema.name,
			"x-sysbridge-schema-version": String(record.valueSchema.version),
			"x-sysbridge-message-id": uuidv4(),
		};
		const sourceHost = record.sourcePartition[SOURCE_PARTITION_HOST];
		if (sourceHost) headers["x-sysbridge-source-host"] = sourceHost;

		const message: KafkaMessage = {
			key: serializeConnectJson(record.keySchema, record.key),
			value: serializeConnectJson(record.valueSchema, record.value),
			headers,
		};
		if (record.kafkaPartition !== null) message.partition = record.kafkaPartition;
		return message;
	}

	async sendRecords(records: readonly AnySourceRecord[]): Promise<RecordMetadata[]> {
		if (records.length === 0) return [];
		if (!this.connected) {
			throw new RetryableError("Kafka producer is not connected", "PRODUCER_NOT_CONNECTED");
		}

		const topicMessages = new Map<string, KafkaMessage[]>();
		for (const record of records) {
			assertTopicName(record.topic);
			const existing = topicMessages.get(record.topic) ?? [];
			existing.push(this.toMessage(record));
			topicMessages.set(record.topic, existing);
		}

		let result: RecordMetadata[];
		try {
			result = await this.producer.sendBatch({
				topicMessages: Array.from(topicMessages.entries()).map(([topic, messages]) => ({
					topic,
					messages,
				})),
			});
		} catch (error) {
			if (error instanceof KafkaJSError) {
				throw error.retriable
					? new RetryableError(error.message, "KAFKA_SEND_FAILED", { cause: error })
					: new NonRetryableError(error.message, "KAFKA_SEND_FAILED", { cause: error });
			}
			throw error;
		}

		this.logger.debug("Batch sent", {
			message_count: records.length,
			topic_count: topicMessages.size,
		});

		return result;
	}
}

export function createRecordProducer(options: RecordProducerOptions): RecordProducer {
	return new RecordProducerImpl(options);
}
