/**
 * Centralized validation system
 */

import type { ValidationSchema } from '../types/index.js';
import { AppError, ErrorCode } from './errors.js';

export type { ValidationRule, ValidationSchema } from '../types/index.js';

export interface ValidationResult {
	valid: boolean;
	errors: string[];
}

/** Validate input against schema */
export function validateInput(
	input: Record<string, unknown>,
	schema: ValidationSchema,
	throwOnError = true
): ValidationResult {
	const errors: string[] = [];

	for (const [field, rules] of Object.entries(schema)) {
		const value = input[field];

		if (rules.required && (value === undefined || value === null)) {
			errors.push(`${field} is required`);
			continue;
		}

		if (value === undefined || value === null) continue;

		const type = Array.isArray(value) ? 'array' : typeof value;
		if (rules.type && type !== rules.type) {
			errors.push(`${field} must be ${rules.type}, got ${type}`);
			continue;
		}

		if (typeof value === 'string') {
			if (rules.minLength !== undefined && value.length < rules.minLength)
				errors.push(`${field} min length ${rules.minLength}`);
			if (rules.maxLength !== undefined && value.length > rules.maxLength)
				errors.push(`${field} max length ${rules.maxLength}`);
			if (rules.pattern && !rules.pattern.test(value)) errors.push(`${field} pattern mismatch`);
		}

		if (typeof value === 'number') {
			if (rules.min !== undefined && value < rules.min) errors.push(`${field} >= ${rules.min}`);
			if (rules.max !== undefined && value > rules.max) errors.push(`${field} <= ${rules.max}`);
		}

		if (Array.isArray(value)) {
			if (rules.minLength !== undefined && value.length < rules.minLength)
				errors.push(`${field} requires ${rules.minLength}+ items`);
			if (rules.maxLength !== undefined && value.length > rules.maxLength)
				errors.push(`${field} max ${rules.maxLength} items`);
		}

		if (rules.enum && !rules.enum.includes(value))
			errors.push(`${field} must be one of: ${rules.enum.join(', ')}`);

		if (rules.custom) {
			const result = rules.custom(value);
			if (result !== true) errors.push(typeof result === 'string' ? result : `${field} invalid`);
		}
	}

	if (throwOnError && errors.length)
		throw new AppError(
			`Validation failed: ${errors.join('; ')}`,
			ErrorCode.VALIDATION_ERROR,
			{ errors },
			400
		);

	return { valid: errors.length === 0, errors };
}

/**
 * Type guards
 */
export function isObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
