/**
 * Current schema versions for all record shapes. Bump on any change to
 * field names, types or optionality.
 */
export const SCHEMA_VERSIONS = {
	SYSLOG_KEY: 1,
	SYSLOG_VALUE: 1,
} as const;

export type SchemaVersion =
	(typeof SCHEMA_VERSIONS)[keyof typeof SCHEMA_VERSIONS];
