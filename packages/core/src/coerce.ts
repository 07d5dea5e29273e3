/**
 * Return-value coercion — turns a tagged script result into a trusted
 * pipeline value, or rejects it.
 */

import type { ByteSequence, FieldMap, TypedResult } from '@payloadfn/sdk';
import { InvalidReturnTypeError, OutOfRangeError } from '@payloadfn/sdk';

/** Object mode (Decoder, Converter) */
export function toFieldMap(name: string, result: TypedResult): FieldMap {
	if (result.kind !== 'object') {
		throw new InvalidReturnTypeError(name, 'does not return an object');
	}
	return result.value;
}

/** Boolean mode (Validator) */
export function toBoolean(name: string, result: TypedResult): boolean {
	if (result.kind !== 'boolean') {
		throw new InvalidReturnTypeError(name, 'does not return a boolean');
	}
	return result.value;
}

/**
 * Byte-array mode (Encoder).
 *
 * Every element must be a whole number in [0, 255]; the output keeps the
 * length and order of the returned Array.
 */
export function toByteSequence(name: string, result: TypedResult): ByteSequence {
	if (result.kind !== 'array') {
		throw new InvalidReturnTypeError(name, 'does not return an Array');
	}

	const bytes = new Uint8Array(result.value.length);
	result.value.forEach((element, index) => {
		if (typeof element !== 'number' || !Number.isInteger(element)) {
			throw new InvalidReturnTypeError(name, 'should return an Array of integer numbers');
		}
		if (element < 0 || element > 255) {
			throw new OutOfRangeError(name, index, element);
		}
		bytes[index] = element;
	});
	return bytes;
}
