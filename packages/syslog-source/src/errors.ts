export class SyslogSourceError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "SyslogSourceError";
	}
}

/** Reverse lookup failed or timed out. The hostname is left absent. */
export class ResolutionError extends SyslogSourceError {
	constructor(
		message: string,
		code: "RESOLUTION_FAILED" | "RESOLUTION_TIMEOUT" = "RESOLUTION_FAILED",
		options?: { cause?: unknown },
	) {
		super(message, code, options);
		this.name = "ResolutionError";
	}
}

/** An event could not be turned into a record and was dropped. */
export class TranslationError extends SyslogSourceError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "TRANSLATION_FAILED", options);
		this.name = "TranslationError";
	}
}

export class TransportError extends SyslogSourceError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "TRANSPORT_ERROR", options);
		this.name = "TransportError";
	}
}

export class QueueClosedError extends SyslogSourceError {
	constructor() {
		super("Queue is closed", "QUEUE_CLOSED");
		this.name = "QueueClosedError";
	}
}
