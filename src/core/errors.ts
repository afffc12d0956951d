/**
 * Centralized error handling
 */

/** Error codes for standardized error handling */
export enum ErrorCode {
	// Validation & Input Errors
	INVALID_INPUT = 'INVALID_INPUT',
	VALIDATION_ERROR = 'VALIDATION_ERROR',
	TYPE_MISMATCH = 'TYPE_MISMATCH',

	// System & Runtime Errors
	RUNTIME_ERROR = 'RUNTIME_ERROR',
	UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export const ErrorMessages: Readonly<Record<ErrorCode, string>> = {
	[ErrorCode.INVALID_INPUT]: 'Invalid input',
	[ErrorCode.VALIDATION_ERROR]: 'Validation failed',
	[ErrorCode.TYPE_MISMATCH]: 'Type mismatch',
	[ErrorCode.RUNTIME_ERROR]: 'Runtime error',
	[ErrorCode.UNKNOWN_ERROR]: 'An unknown error occurred',
};

const STATUS_CODES: Readonly<Record<ErrorCode, number>> = {
	[ErrorCode.INVALID_INPUT]: 400,
	[ErrorCode.VALIDATION_ERROR]: 400,
	[ErrorCode.TYPE_MISMATCH]: 400,
	[ErrorCode.RUNTIME_ERROR]: 500,
	[ErrorCode.UNKNOWN_ERROR]: 500,
};

/** Standard application error */
export class AppError extends Error {
	constructor(
		message: string,
		public code: ErrorCode,
		public details?: unknown,
		public statusCode: number = 500
	) {
		super(message);
		this.name = 'AppError';
		Error.captureStackTrace?.(this, this.constructor);
	}

	toJSON(): { name: string; message: string; code: ErrorCode; details?: unknown; statusCode: number } {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			details: this.details,
			statusCode: this.statusCode,
		};
	}
}

/**
 * Build an AppError for a code, falling back to the code's standard message
 */
export function createError(code: ErrorCode, details?: unknown, message?: string): AppError {
	return new AppError(message ?? ErrorMessages[code], code, details, STATUS_CODES[code]);
}

/** Wrap unknown errors into AppError */
export function handleError(error: unknown, context?: string): AppError {
	if (error instanceof AppError) return error;

	if (error instanceof Error) {
		return new AppError(
			error.message || 'Unknown error',
			ErrorCode.RUNTIME_ERROR,
			{ context, stack: error.stack },
			500
		);
	}

	if (typeof error === 'string') {
		return new AppError(error, ErrorCode.UNKNOWN_ERROR, { context }, 500);
	}

	return new AppError('Unexpected error', ErrorCode.UNKNOWN_ERROR, { error: String(error), context }, 500);
}
