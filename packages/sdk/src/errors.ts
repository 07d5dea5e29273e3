/**
 * Classified errors raised while running payload functions.
 *
 * Every error carries the name of the transform it came from so operators
 * can attribute a failure to one user-authored script.
 */

export type PayloadFunctionErrorCode =
	| 'INVALID_RETURN_TYPE'
	| 'OUT_OF_RANGE'
	| 'MISSING_ENCODER'
	| 'EXECUTION_TIMEOUT'
	| 'SCRIPT_RUNTIME_ERROR'
	| 'INVALID_SCRIPT'
	| 'INVALID_ARGUMENT';

export class PayloadFunctionError extends Error {
	readonly code: PayloadFunctionErrorCode;
	/** Transform name, e.g. "Decoder" */
	readonly transform: string;
	/** Whether the caller may reasonably retry the same call */
	readonly retryable: boolean;

	constructor(
		code: PayloadFunctionErrorCode,
		transform: string,
		message: string,
		options?: { cause?: unknown; retryable?: boolean },
	) {
		super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
		this.name = 'PayloadFunctionError';
		this.code = code;
		this.transform = transform;
		this.retryable = options?.retryable ?? false;
	}
}

/** Script returned a value that violates the contract of its slot */
export class InvalidReturnTypeError extends PayloadFunctionError {
	readonly reason: string;

	constructor(transform: string, reason: string) {
		super('INVALID_RETURN_TYPE', transform, `${transform} ${reason}`);
		this.name = 'InvalidReturnTypeError';
		this.reason = reason;
	}
}

/** Encoder produced a number outside [0, 255] */
export class OutOfRangeError extends PayloadFunctionError {
	readonly index: number;
	readonly value: number;

	constructor(transform: string, index: number, value: number) {
		super(
			'OUT_OF_RANGE',
			transform,
			`${transform} output: numbers in Array should be between 0 and 255 (got ${value} at index ${index})`,
		);
		this.name = 'OutOfRangeError';
		this.index = index;
		this.value = value;
	}
}

/** Downlink fields were supplied but no Encoder is configured */
export class MissingEncoderError extends PayloadFunctionError {
	constructor() {
		super('MISSING_ENCODER', 'Encoder', 'Fields supplied, but no Encoder function set');
		this.name = 'MissingEncoderError';
	}
}

/** Script did not finish within its budget. Retryable by the caller. */
export class ExecutionTimeoutError extends PayloadFunctionError {
	readonly timeoutMs: number;

	constructor(transform: string, timeoutMs: number) {
		super('EXECUTION_TIMEOUT', transform, `${transform} interrupted after ${timeoutMs}ms`, {
			retryable: true,
		});
		this.name = 'ExecutionTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

/** Script threw, or failed to compile */
export class ScriptRuntimeError extends PayloadFunctionError {
	constructor(transform: string, cause: unknown) {
		super('SCRIPT_RUNTIME_ERROR', transform, `${transform} failed: ${describeCause(cause)}`, {
			cause,
		});
		this.name = 'ScriptRuntimeError';
	}
}

/** Script source was rejected before execution (encoding, size) */
export class InvalidScriptError extends PayloadFunctionError {
	constructor(transform: string, reason: string) {
		super('INVALID_SCRIPT', transform, `${transform} script ${reason}`);
		this.name = 'InvalidScriptError';
	}
}

/** Caller passed an argument the pipeline cannot work with */
export class InvalidArgumentError extends PayloadFunctionError {
	constructor(subject: string, reason: string) {
		super('INVALID_ARGUMENT', subject, `${subject}: ${reason}`);
		this.name = 'InvalidArgumentError';
	}
}

export function isPayloadFunctionError(value: unknown): value is PayloadFunctionError {
	return value instanceof PayloadFunctionError;
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	if (cause && typeof cause === 'object' && 'message' in cause && typeof cause.message === 'string') {
		return cause.message;
	}
	return String(cause);
}
