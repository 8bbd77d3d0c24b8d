import { ErrorCode } from './types.js';

/**
 * Base class for sql-composer specific errors
 * Provides error code support
 */
export class ComposerError extends Error {
	public code: ErrorCode;
	public cause?: Error;

	constructor(message: string, code: ErrorCode, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'ComposerError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, ComposerError);
		}
	}
}

/**
 * Raised while rendering a tree to text.
 * The partially rendered buffer must be discarded.
 */
export class RenderError extends ComposerError {
	constructor(message: string, code: ErrorCode, cause?: Error) {
		super(message, code, cause);
		this.name = 'RenderError';
		Object.setPrototypeOf(this, RenderError.prototype);
	}
}

/**
 * Raised by placeholder generation and value binding
 */
export class PlaceholderError extends ComposerError {
	constructor(message: string, code: ErrorCode) {
		super(message, code);
		this.name = 'PlaceholderError';
		Object.setPrototypeOf(this, PlaceholderError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly.
 * These are programmer defects found while building a tree, not data-dependent failures.
 */
export class MisuseError extends ComposerError {
	constructor(message: string = "API misuse") {
		super(message, ErrorCode.Misuse);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}
