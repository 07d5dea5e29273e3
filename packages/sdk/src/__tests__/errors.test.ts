import { describe, expect, it } from 'vitest';
import {
	ExecutionTimeoutError,
	InvalidArgumentError,
	InvalidReturnTypeError,
	InvalidScriptError,
	isPayloadFunctionError,
	MissingEncoderError,
	OutOfRangeError,
	PayloadFunctionError,
	ScriptRuntimeError,
} from '../errors.js';

describe('errors', () => {
	it('InvalidReturnTypeError names the transform and reason', () => {
		const err = new InvalidReturnTypeError('Decoder', 'does not return an object');
		expect(err.message).toBe('Decoder does not return an object');
		expect(err.code).toBe('INVALID_RETURN_TYPE');
		expect(err.transform).toBe('Decoder');
		expect(err.reason).toBe('does not return an object');
		expect(err.retryable).toBe(false);
		expect(err.name).toBe('InvalidReturnTypeError');
	});

	it('OutOfRangeError records the offending index and value', () => {
		const err = new OutOfRangeError('Encoder', 2, 256);
		expect(err.code).toBe('OUT_OF_RANGE');
		expect(err.index).toBe(2);
		expect(err.value).toBe(256);
		expect(err.message).toBe(
			'Encoder output: numbers in Array should be between 0 and 255 (got 256 at index 2)',
		);
	});

	it('MissingEncoderError is attributed to the Encoder', () => {
		const err = new MissingEncoderError();
		expect(err.code).toBe('MISSING_ENCODER');
		expect(err.transform).toBe('Encoder');
	});

	it('ExecutionTimeoutError is retryable', () => {
		const err = new ExecutionTimeoutError('Validator', 100);
		expect(err.retryable).toBe(true);
		expect(err.timeoutMs).toBe(100);
		expect(err.message).toBe('Validator interrupted after 100ms');
	});

	it('ScriptRuntimeError keeps the underlying cause', () => {
		const cause = new TypeError('x is not a function');
		const err = new ScriptRuntimeError('Converter', cause);
		expect(err.cause).toBe(cause);
		expect(err.message).toBe('Converter failed: x is not a function');
	});

	it('ScriptRuntimeError describes non-Error causes', () => {
		expect(new ScriptRuntimeError('Decoder', 'boom').message).toBe('Decoder failed: boom');
		expect(new ScriptRuntimeError('Decoder', { message: 'thrown object' }).message).toBe(
			'Decoder failed: thrown object',
		);
	});

	it('InvalidScriptError and InvalidArgumentError carry their codes', () => {
		expect(new InvalidScriptError('Decoder', 'is too large').code).toBe('INVALID_SCRIPT');
		expect(new InvalidArgumentError('port', 'must be an integer').message).toBe(
			'port: must be an integer',
		);
	});

	it('isPayloadFunctionError recognizes every subclass', () => {
		expect(isPayloadFunctionError(new MissingEncoderError())).toBe(true);
		expect(isPayloadFunctionError(new OutOfRangeError('Encoder', 0, -1))).toBe(true);
		expect(isPayloadFunctionError(new Error('plain'))).toBe(false);
		expect(isPayloadFunctionError('Decoder failed')).toBe(false);
		expect(new MissingEncoderError()).toBeInstanceOf(PayloadFunctionError);
	});
});
