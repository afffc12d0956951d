/**
 * Validation tests
 */

import { isObject, isStringArray, validateInput } from '../../../src/core/validation.js';
import { AppError, ErrorCode } from '../../../src/core/errors.js';
import type { ValidationSchema } from '../../../src/types/index.js';

describe('Validation', () => {
	describe('validateInput', () => {
		const schema: ValidationSchema = {
			text: { type: 'string', required: true, maxLength: 20 },
			metrics: { type: 'array', required: false, maxLength: 3 },
			metric: { type: 'string', enum: ['smog', 'lix'] },
			limit: { type: 'number', min: 1, max: 10 },
		};

		it('should validate valid data', () => {
			expect(validateInput({ text: 'Short text.', metrics: ['smog'], limit: 5 }, schema)).toEqual({
				valid: true,
				errors: [],
			});
		});

		it('should accept an empty string for a required field', () => {
			expect(() => validateInput({ text: '' }, schema)).not.toThrow();
		});

		it('should reject missing required fields', () => {
			expect(() => validateInput({}, schema)).toThrow(AppError);
		});

		it('should report every problem without throwing when asked', () => {
			const result = validateInput(
				{ text: 'This sentence is far too long.', metrics: ['a', 'b', 'c', 'd'], limit: 0 },
				schema,
				false
			);
			expect(result).toEqual({
				valid: false,
				errors: ['text max length 20', 'metrics max 3 items', 'limit >= 1'],
			});
		});

		it('should reject invalid types', () => {
			const result = validateInput({ text: 123 }, schema, false);
			expect(result.errors).toEqual(['text must be string, got number']);
		});

		it('should check enums and custom rules', () => {
			const result = validateInput(
				{ text: 'ok', metric: 'ari' },
				{ ...schema, text: { type: 'string', custom: (value) => value !== 'ok' || 'text is too plain' } },
				false
			);
			expect(result.errors).toEqual(['text is too plain', 'metric must be one of: smog, lix']);
		});

		it('should throw a validation error carrying the messages', () => {
			try {
				validateInput({ text: 42 }, schema);
				throw new Error('expected validation to fail');
			} catch (error) {
				expect(error).toBeInstanceOf(AppError);
				expect(error).toMatchObject({
					message: 'Validation failed: text must be string, got number',
					code: ErrorCode.VALIDATION_ERROR,
					statusCode: 400,
					details: { errors: ['text must be string, got number'] },
				});
			}
		});
	});

	describe('type guards', () => {
		it('should recognize plain objects', () => {
			expect(isObject({})).toBe(true);
			expect(isObject([])).toBe(false);
			expect(isObject(null)).toBe(false);
		});

		it('should recognize string arrays', () => {
			expect(isStringArray(['a', 'b'])).toBe(true);
			expect(isStringArray([])).toBe(true);
			expect(isStringArray(['a', 1])).toBe(false);
			expect(isStringArray('a')).toBe(false);
		});
	});
});
