import type { StructSchema } from "./schema.js";
import type { SyslogKey, SyslogValue } from "./syslog.js";

/** Source partition key: the host name reported by the sender */
export const SOURCE_PARTITION_HOST = "host";

/**
 * A record produced by a source and handed to the forwarding side.
 * Offsets are never tracked, so `sourceOffset` is always empty.
 */
export interface SourceRecord<K extends object, V extends object> {
	readonly sourcePartition: Readonly<Record<string, string | null>>;
	readonly sourceOffset: Readonly<Record<string, never>>;
	readonly topic: string;
	/** Explicit partition; null lets the producer partition by key */
	readonly kafkaPartition: number | null;
	readonly keySchema: StructSchema;
	readonly key: Readonly<K>;
	readonly valueSchema: StructSchema;
	readonly value: Readonly<V>;
}

export type SyslogSourceRecord = SourceRecord<SyslogKey, SyslogValue>;
