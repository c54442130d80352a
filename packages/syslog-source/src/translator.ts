import {
	SOURCE_PARTITION_HOST,
	SYSLOG_KEY_SCHEMA,
	SYSLOG_VALUE_SCHEMA,
	type SyslogKey,
	type SyslogSourceRecord,
	type SyslogValue,
	validateStruct,
} from "@sysbridge/core-contracts";
import { type Logger, errorContext } from "@sysbridge/core-telemetry";
import { type SocketAddress, formatSocketAddress, numericHost } from "./address.js";
import { TransportError, TranslationError } from "./errors.js";
import { type SyslogEvent, syslogEventSchema } from "./event.js";
import type { HandoffQueue } from "./queue.js";
import type { HostnameResolver } from "./resolver.js";

/**
 * Observer a listener reports to. `onEvent` and `onError` are called from
 * socket callbacks and must return without throwing.
 */
export interface SyslogEventHandler {
	initialize?(): void | Promise<void>;
	onEvent(address: SocketAddress, event: SyslogEvent): void;
	onError(address: SocketAddress, error: unknown): void;
	destroy?(): void | Promise<void>;
}

export interface EventTranslatorOptions {
	readonly queue: HandoffQueue<SyslogSourceRecord>;
	readonly topic: string;
	/** Look up hostnames instead of copying the address literal */
	readonly reverseDns: boolean;
	readonly resolver: HostnameResolver;
	readonly logger: Logger;
}

type Translation =
	| { readonly ok: true; readonly record: SyslogSourceRecord }
	| { readonly ok: false; readonly error: unknown };

function describeIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
	return issues.map((issue) => `${issue.path.join(".") || "event"}: ${issue.message}`).join("; ");
}

export class SyslogEventTranslator implements SyslogEventHandler {
	private readonly options: Readonly<EventTranslatorOptions>;
	private readonly logger: Logger;
	/** Last pending enqueue per remote address */
	private readonly tails = new Map<string, Promise<void>>();
	private readonly inFlight = new Set<Promise<void>>();
	private closing = false;

	constructor(options: EventTranslatorOptions) {
		this.options = Object.freeze({ ...options });
		this.logger = options.logger.child({ component: "event-translator" });
	}

	/** Translations started but not yet enqueued or dropped */
	get pending(): number {
		return this.inFlight.size;
	}

	initialize(): void {
		this.logger.info("Event translator ready", {
			topic: this.options.topic,
			reverse_dns: this.options.reverseDns,
		});
	}

	async destroy(): Promise<void> {
		await this.close();
	}

	/**
	 * Build the record for one event. Rejects with TranslationError when the
	 * event is malformed; a failed hostname lookup only leaves the hostname
	 * absent.
	 */
	async translate(address: SocketAddress, event: SyslogEvent): Promise<SyslogSourceRecord> {
		const parsed = syslogEventSchema.safeParse(event);
		if (!parsed.success) {
			throw new TranslationError(`Malformed syslog event: ${describeIssues(parsed.error.issues)}`);
		}
		const raw = parsed.data;
		const remoteAddress = formatSocketAddress(address);

		const key: SyslogKey = { remote_address: remoteAddress };
		const value: SyslogValue = {};
		if (raw.date != null) value.date = raw.date;
		if (raw.facility != null) value.facility = raw.facility;
		if (raw.host != null) value.host = raw.host;
		if (raw.level != null) value.level = raw.level;
		value.message = raw.message;
		if (raw.charset != null) value.charset = raw.charset;
		value.remote_address = remoteAddress;

		const hostname = await this.hostnameFor(address, remoteAddress);
		if (hostname !== undefined) value.hostname = hostname;

		const problems = [
			...validateStruct(SYSLOG_KEY_SCHEMA, key),
			...validateStruct(SYSLOG_VALUE_SCHEMA, value),
		];
		if (problems.length > 0) {
			throw new TranslationError(`Record does not match schema: ${problems.join("; ")}`);
		}

		return {
			sourcePartition: { [SOURCE_PARTITION_HOST]: raw.host ?? null },
			sourceOffset: {},
			topic: this.options.topic,
			kafkaPartition: null,
			keySchema: SYSLOG_KEY_SCHEMA,
			key,
			valueSchema: SYSLOG_VALUE_SCHEMA,
			value,
		};
	}

	/**
	 * Start translating an event and return immediately. Records from one
	 * remote address are enqueued in arrival order; addresses do not wait
	 * on each other.
	 */
	onEvent(address: SocketAddress, event: SyslogEvent): void {
		const remoteAddress = formatSocketAddress(address);
		if (this.closing) {
			this.logger.warn("Dropping syslog event received after close", {
				remote_address: remoteAddress,
			});
			return;
		}

		const translation: Promise<Translation> = this.translate(address, event).then(
			(record) => ({ ok: true as const, record }),
			(error: unknown) => ({ ok: false as const, error }),
		);
		const previous = this.tails.get(remoteAddress) ?? Promise.resolve();
		const tracked: Promise<void> = previous
			.then(() => translation)
			.then((outcome) => this.complete(remoteAddress, outcome))
			.finally(() => this.release(remoteAddress, tracked));

		this.tails.set(remoteAddress, tracked);
		this.inFlight.add(tracked);
	}

	onError(address: SocketAddress, error: unknown): void {
		const transportError =
			error instanceof TransportError
				? error
				: new TransportError(error instanceof Error ? error.message : String(error), {
						cause: error,
					});
		this.logger.error("Syslog transport error", {
			remote_address: formatSocketAddress(address),
			...errorContext(transportError),
		});
	}

	/** Resolves once every translation started so far has settled. */
	async flush(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	/** Stop accepting events and wait for in-flight translations. */
	async close(): Promise<void> {
		this.closing = true;
		await this.flush();
	}

	private async hostnameFor(
		address: SocketAddress,
		remoteAddress: string,
	): Promise<string | undefined> {
		if (!this.options.reverseDns) {
			return numericHost(address) ?? remoteAddress;
		}

		try {
			const resolved = await this.options.resolver.resolve(address);
			return resolved.hostname;
		} catch (error) {
			this.logger.warn("Hostname resolution failed; hostname omitted", {
				remote_address: remoteAddress,
				...errorContext(error),
			});
			return undefined;
		}
	}

	private complete(remoteAddress: string, outcome: Translation): void {
		if (!outcome.ok) {
			this.logger.error("Dropping syslog event that could not be translated", {
				remote_address: remoteAddress,
				...errorContext(outcome.error),
			});
			return;
		}

		try {
			this.options.queue.offer(outcome.record);
		} catch (error) {
			this.logger.error("Dropping translated record", {
				remote_address: remoteAddress,
				...errorContext(error),
			});
		}
	}

	private release(remoteAddress: string, tracked: Promise<void>): void {
		this.inFlight.delete(tracked);
		if (this.tails.get(remoteAddress) === tracked) {
			this.tails.delete(remoteAddress);
		}
	}
}
