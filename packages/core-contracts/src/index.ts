// Record schema model
export {
	defineStruct,
	field,
	findField,
	validateStruct,
	type FieldSchema,
	type FieldType,
	type StructDefinition,
	type StructSchema,
} from "./schema.js";

// Syslog record contracts
export {
	SYSLOG_FIELDS,
	SYSLOG_KEY_SCHEMA,
	SYSLOG_VALUE_SCHEMA,
	type SyslogKey,
	type SyslogValue,
} from "./syslog.js";
export {
	SOURCE_PARTITION_HOST,
	type SourceRecord,
	type SyslogSourceRecord,
} from "./record.js";

// Schema versions
export { SCHEMA_VERSIONS, type SchemaVersion } from "./versions.js";
