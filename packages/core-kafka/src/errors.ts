export type KafkaErrorCode =
	| "PRODUCER_NOT_CONNECTED"
	| "KAFKA_SEND_FAILED"
	| "INVALID_TOPIC"
	| "SCHEMA_VALIDATION_FAILED";

/** Failure on the producing side; `retryable` says whether resending may help. */
export class KafkaError extends Error {
	constructor(
		message: string,
		public readonly code: KafkaErrorCode,
		public readonly retryable: boolean,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "KafkaError";
	}
}

export class RetryableError extends KafkaError {
	constructor(message: string, code: KafkaErrorCode, options?: { cause?: unknown }) {
		super(message, code, true, options);
		this.name = "RetryableError";
	}
}

export class NonRetryableError extends KafkaError {
	constructor(message: string, code: KafkaErrorCode, options?: { cause?: unknown }) {
		super(message, code, false, options);
		this.name = "NonRetryableError";
	}
}

/** A record that does not match the schema it is sent under */
export class SchemaValidationError extends NonRetryableError {
	constructor(
		message: string,
		public readonly schemaName: string,
		public readonly schemaVersion: number,
		public readonly validationErrors: string[],
	) {
		super(message, "SCHEMA_VALIDATION_FAILED");
		this.name = "SchemaValidationError";
	}
}

/** Errors of unknown origin are treated as permanent */
export function isRetryable(error: unknown): boolean {
	return error instanceof KafkaError && error.retryable;
}
