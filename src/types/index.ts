/**
 * Shared type definitions
 */

// Generic types for common patterns
export type Primitive = string | number | boolean | null | undefined;
export type JSONValue = Primitive | JSONObject | JSONArray;
export interface JSONObject {
	[key: string]: JSONValue;
}
export type JSONArray = JSONValue[];

// Logger context type
export interface LogContext {
	[key: string]: Primitive | JSONObject | JSONArray | Error;
}

function toJSONValue(value: unknown, seen: WeakSet<object>): JSONValue {
	if (
		value === null ||
		value === undefined ||
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean'
	) {
		return value;
	}
	if (typeof value !== 'object') {
		return String(value);
	}
	if (seen.has(value)) {
		return '[Circular]';
	}
	seen.add(value);
	if (Array.isArray(value)) {
		return value.map((item) => toJSONValue(item, seen));
	}
	const result: JSONObject = {};
	for (const [key, entry] of Object.entries(value)) {
		result[key] = toJSONValue(entry, seen);
	}
	return result;
}

// Utility function to safely convert objects to LogContext
export function toLogContext(obj: Record<string, unknown>): LogContext {
	const result: LogContext = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = value instanceof Error ? value : toJSONValue(value, new WeakSet());
	}
	return result;
}

// Validation rule schema
export interface ValidationRule {
	type?: 'string' | 'number' | 'boolean' | 'array' | 'object';
	required?: boolean;
	minLength?: number;
	maxLength?: number;
	min?: number;
	max?: number;
	pattern?: RegExp;
	enum?: ReadonlyArray<unknown>;
	custom?: (value: unknown) => boolean | string;
}

export type ValidationSchema = Record<string, ValidationRule>;
