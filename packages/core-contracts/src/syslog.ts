import { defineStruct, field } from "./schema.js";
import { SCHEMA_VERSIONS } from "./versions.js";

/** Field names of the syslog key and value structs */
export const SYSLOG_FIELDS = {
	DATE: "date",
	FACILITY: "facility",
	HOST: "host",
	LEVEL: "level",
	MESSAGE: "message",
	CHARSET: "charset",
	REMOTE_ADDRESS: "remote_address",
	HOSTNAME: "hostname",
} as const;

/**
 * Record key: routes every message from one remote address to the same
 * partition.
 */
export interface SyslogKey {
	remote_address: string;
}

/**
 * Record value. Fields the sender did not supply are absent, never
 * defaulted.
 */
export interface SyslogValue {
	date?: Date;
	facility?: number;
	host?: string;
	level?: number;
	message?: string;
	charset?: string;
	remote_address?: string;
	hostname?: string;
}

export const SYSLOG_KEY_SCHEMA = defineStruct({
	name: "sysbridge.syslog.SyslogKey",
	version: SCHEMA_VERSIONS.SYSLOG_KEY,
	doc:
		"This schema represents the key that is written to Kafka for syslog data. " +
		"This will ensure that all data for a host ends up in the same partition.",
	fields: [
		field(SYSLOG_FIELDS.REMOTE_ADDRESS, "string", {
			doc: "The ip address of the host that sent the syslog message.",
		}),
	],
});

export const SYSLOG_VALUE_SCHEMA = defineStruct({
	name: "sysbridge.syslog.SyslogValue",
	version: SCHEMA_VERSIONS.SYSLOG_VALUE,
	doc: "This schema represents a syslog message that is written to Kafka.",
	fields: [
		field(SYSLOG_FIELDS.DATE, "timestamp", {
			optional: true,
			doc: "The timestamp of the message.",
		}),
		field(SYSLOG_FIELDS.FACILITY, "int32", {
			optional: true,
			doc: "The facility of the message.",
		}),
		field(SYSLOG_FIELDS.HOST, "string", {
			optional: true,
			doc: "The host of the message.",
		}),
		field(SYSLOG_FIELDS.LEVEL, "int32", {
			optional: true,
			doc: "The level of the syslog message as defined by [rfc5424](https://tools.ietf.org/html/rfc5424)",
		}),
		field(SYSLOG_FIELDS.MESSAGE, "string", {
			optional: true,
			doc: "The text for the message.",
		}),
		field(SYSLOG_FIELDS.CHARSET, "string", {
			optional: true,
			doc: "The character set of the message.",
		}),
		field(SYSLOG_FIELDS.REMOTE_ADDRESS, "string", {
			optional: true,
			doc: "The ip address of the host that sent the syslog message.",
		}),
		field(SYSLOG_FIELDS.HOSTNAME, "string", {
			optional: true,
			doc: `The reverse DNS of the \`${SYSLOG_FIELDS.REMOTE_ADDRESS}\` field.`,
		}),
	],
});
