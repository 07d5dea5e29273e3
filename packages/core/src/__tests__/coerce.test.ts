import type { JsonValue, TypedResult } from '@payloadfn/sdk';
import { InvalidReturnTypeError, OutOfRangeError } from '@payloadfn/sdk';
import { describe, expect, it } from 'vitest';
import { toBoolean, toByteSequence, toFieldMap } from '../coerce.js';

describe('toFieldMap', () => {
	it('returns the fields of an object result', () => {
		expect(toFieldMap('Decoder', { kind: 'object', value: { a: 1, b: 'x' } })).toEqual({
			a: 1,
			b: 'x',
		});
	});

	it('rejects scalars, arrays, null and booleans', () => {
		const results: TypedResult[] = [
			{ kind: 'other', type: 'number', value: 42 },
			{ kind: 'other', type: 'null', value: null },
			{ kind: 'array', value: [1] },
			{ kind: 'boolean', value: true },
		];
		for (const result of results) {
			expect(() => toFieldMap('Decoder', result)).toThrow(InvalidReturnTypeError);
			expect(() => toFieldMap('Decoder', result)).toThrow('Decoder does not return an object');
		}
	});

	it('names the transform it was called for', () => {
		expect(() => toFieldMap('Converter', { kind: 'other', type: 'string', value: 'x' })).toThrow(
			'Converter does not return an object',
		);
	});
});

describe('toBoolean', () => {
	it('returns boolean results as-is', () => {
		expect(toBoolean('Validator', { kind: 'boolean', value: true })).toBe(true);
		expect(toBoolean('Validator', { kind: 'boolean', value: false })).toBe(false);
	});

	it('rejects truthy non-booleans', () => {
		expect(() => toBoolean('Validator', { kind: 'other', type: 'string', value: 'true' })).toThrow(
			'Validator does not return a boolean',
		);
		expect(() => toBoolean('Validator', { kind: 'other', type: 'number', value: 1 })).toThrow(
			InvalidReturnTypeError,
		);
	});
});

describe('toByteSequence', () => {
	it('converts whole numbers in range into bytes of the same length', () => {
		const bytes = toByteSequence('Encoder', { kind: 'array', value: [0, 255, 16, 1] });
		expect(bytes).toBeInstanceOf(Uint8Array);
		expect(Array.from(bytes)).toEqual([0, 255, 16, 1]);
	});

	it('accepts floating-point values without a fractional part', () => {
		expect(Array.from(toByteSequence('Encoder', { kind: 'array', value: [2.0, 10 / 2] }))).toEqual([2, 5]);
	});

	it('returns an empty sequence for an empty array', () => {
		expect(toByteSequence('Encoder', { kind: 'array', value: [] })).toHaveLength(0);
	});

	it('rejects fractional numbers', () => {
		expect(() => toByteSequence('Encoder', { kind: 'array', value: [1.5] })).toThrow(
			'Encoder should return an Array of integer numbers',
		);
	});

	it('rejects non-numeric elements', () => {
		const arrays: JsonValue[][] = [['1'], [null], [true], [[1]], [{ a: 1 }]];
		for (const value of arrays) {
			expect(() => toByteSequence('Encoder', { kind: 'array', value })).toThrow(
				InvalidReturnTypeError,
			);
		}
	});

	it('rejects values above 255 and below 0', () => {
		expect(() => toByteSequence('Encoder', { kind: 'array', value: [256] })).toThrow(OutOfRangeError);
		expect(() => toByteSequence('Encoder', { kind: 'array', value: [-1] })).toThrow(OutOfRangeError);
	});

	it('reports the first offending index', () => {
		try {
			toByteSequence('Encoder', { kind: 'array', value: [1, 2, 300, 400] });
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(OutOfRangeError);
			if (err instanceof OutOfRangeError) {
				expect(err.index).toBe(2);
				expect(err.value).toBe(300);
			}
		}
	});

	it('rejects results that are not arrays', () => {
		expect(() => toByteSequence('Encoder', { kind: 'object', value: { 0: 1 } })).toThrow(
			'Encoder does not return an Array',
		);
		expect(() => toByteSequence('Encoder', { kind: 'other', type: 'undefined', value: undefined })).toThrow(
			InvalidReturnTypeError,
		);
	});
});
