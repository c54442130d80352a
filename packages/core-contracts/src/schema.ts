/**
 * Minimal structured-record schema model: named, versioned structs of
 * primitive fields with documentation and optionality.
 */

export type FieldType = "string" | "int32" | "timestamp";

export interface FieldSchema {
	readonly name: string;
	readonly type: FieldType;
	readonly optional: boolean;
	readonly doc: string;
}

export interface StructSchema {
	readonly name: string;
	readonly version: number;
	readonly doc: string;
	readonly fields: readonly FieldSchema[];
}

export interface StructDefinition {
	name: string;
	version: number;
	doc: string;
	fields: FieldSchema[];
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

export function field(
	name: string,
	type: FieldType,
	options: { optional?: boolean; doc: string },
): FieldSchema {
	return { name, type, optional: options.optional ?? false, doc: options.doc };
}

/**
 * Build an immutable struct schema. Field names must be unique.
 */
export function defineStruct(definition: StructDefinition): StructSchema {
	const seen = new Set<string>();
	for (const f of definition.fields) {
		if (seen.has(f.name)) {
			throw new Error(`Duplicate field "${f.name}" in schema ${definition.name}`);
		}
		seen.add(f.name);
	}

	return Object.freeze({
		name: definition.name,
		version: definition.version,
		doc: definition.doc,
		fields: Object.freeze(definition.fields.map((f) => Object.freeze({ ...f }))),
	});
}

export function findField(schema: StructSchema, name: string): FieldSchema | undefined {
	return schema.fields.find((f) => f.name === name);
}

function matchesType(type: FieldType, value: unknown): boolean {
	switch (type) {
		case "string":
			return typeof value === "string";
		case "int32":
			return (
				typeof value === "number" &&
				Number.isInteger(value) &&
				value >= INT32_MIN &&
				value <= INT32_MAX
			);
		case "timestamp":
			return value instanceof Date && !Number.isNaN(value.getTime());
	}
}

/**
 * Check a struct value against its schema. Returns one message per
 * violation; an empty list means the value conforms. Optional fields may
 * be absent, but a present field must hold a value of its declared type.
 */
export function validateStruct(schema: StructSchema, value: object): string[] {
	const errors: string[] = [];
	const entries = new Map<string, unknown>(Object.entries(value));

	for (const key of entries.keys()) {
		if (!findField(schema, key)) {
			errors.push(`Unknown field: ${key}`);
		}
	}

	for (const f of schema.fields) {
		if (!entries.has(f.name)) {
			if (!f.optional) errors.push(`Missing required field: ${f.name}`);
			continue;
		}
		const fieldValue = entries.get(f.name);
		if (!matchesType(f.type, fieldValue)) {
			errors.push(`Field ${f.name} must be of type ${f.type}`);
		}
	}

	return errors;
}
