import {
	type FieldSchema,
	type FieldType,
	type StructSchema,
	validateStruct,
} from "@sysbridge/core-contracts";
import { SchemaValidationError } from "./errors.js";

/** Logical name Kafka Connect uses for millisecond timestamps */
export const CONNECT_TIMESTAMP_NAME = "org.apache.kafka.connect.data.Timestamp";

export interface ConnectJsonFieldSchema {
	type: "string" | "int32" | "int64";
	optional: boolean;
	field: string;
	doc: string;
	name?: string;
	version?: number;
}

export interface ConnectJsonSchema {
	type: "struct";
	name: string;
	version: number;
	doc: string;
	optional: false;
	fields: ConnectJsonFieldSchema[];
}

export type ConnectJsonValue = string | number | null;

/**
 * JSON with an embedded schema, the shape Kafka Connect's JSON converter
 * reads when schemas are enabled.
 */
export interface ConnectJson {
	schema: ConnectJsonSchema;
	payload: Record<string, ConnectJsonValue>;
}

function physicalType(type: FieldType): ConnectJsonFieldSchema["type"] {
	switch (type) {
		case "string":
			return "string";
		case "int32":
			return "int32";
		case "timestamp":
			return "int64";
	}
}

function fieldSchema(f: FieldSchema): ConnectJsonFieldSchema {
	const json: ConnectJsonFieldSchema = {
		type: physicalType(f.type),
		optional: f.optional,
		field: f.name,
		doc: f.doc,
	};
	if (f.type === "timestamp") {
		json.name = CONNECT_TIMESTAMP_NAME;
		json.version = 1;
	}
	return json;
}

const schemaCache = new WeakMap<StructSchema, ConnectJsonSchema>();

export function toConnectJsonSchema(schema: StructSchema): ConnectJsonSchema {
	const cached = schemaCache.get(schema);
	if (cached) return cached;

	const json: ConnectJsonSchema = {
		type: "struct",
		name: schema.name,
		version: schema.version,
		doc: schema.doc,
		optional: false,
		fields: schema.fields.map(fieldSchema),
	};
	schemaCache.set(schema, json);
	return json;
}

function toJsonValue(value: unknown): ConnectJsonValue {
	if (value instanceof Date) return value.getTime();
	if (typeof value === "string" || typeof value === "number") return value;
	return null;
}

/**
 * Convert a struct value to schema-and-payload JSON. Absent optional
 * fields are written as null; timestamps as epoch milliseconds.
 */
export function toConnectJson(schema: StructSchema, value: object): ConnectJson {
	const errors = validateStruct(schema, value);
	if (errors.length > 0) {
		throw new SchemaValidationError(
			`Value does not match schema ${schema.name}: ${errors.join("; ")}`,
			schema.name,
			schema.version,
			errors,
		);
	}

	const entries = new Map<string, unknown>(Object.entries(value));
	const payload: Record<string, ConnectJsonValue> = {};
	for (const f of schema.fields) {
		payload[f.name] = toJsonValue(entries.get(f.name));
	}

	return { schema: toConnectJsonSchema(schema), payload };
}

export function serializeConnectJson(schema: StructSchema, value: object): string {
	return JSON.stringify(toConnectJson(schema, value));
}
