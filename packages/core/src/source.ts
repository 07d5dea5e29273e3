/**
 * Script source checks and code templates.
 *
 * User scripts are untrusted text. They are checked before they are stored in
 * a transform set and again before each run, then combined with a fixed
 * invocation expression per slot.
 */

import type { TransformKind } from '@payloadfn/sdk';
import { InvalidScriptError, TRANSFORM_NAMES } from '@payloadfn/sdk';

/** Invocation appended after each user script. Never built from caller input. */
const INVOCATIONS: Readonly<Record<TransformKind, string>> = {
	decoder: 'Decoder(payload.slice(0), port)',
	converter: 'Converter(fields, port)',
	validator: 'Validator(fields, port)',
	encoder: 'Encoder(payload, port)',
};

// Lone surrogates do not survive a UTF-8 round trip
function isWellFormed(source: string): boolean {
	return Buffer.from(source, 'utf8').toString('utf8') === source;
}

/**
 * Throw InvalidScriptError when `source` is not acceptable as a script body.
 */
export function checkScriptSource(kind: TransformKind, source: string, maxBytes: number): void {
	const name = TRANSFORM_NAMES[kind];
	if (source.includes('\u0000')) {
		throw new InvalidScriptError(name, 'contains a NUL character');
	}
	if (!isWellFormed(source)) {
		throw new InvalidScriptError(name, 'is not valid UTF-8 text');
	}
	const size = Buffer.byteLength(source, 'utf8');
	if (size > maxBytes) {
		throw new InvalidScriptError(name, `is too large (${size} bytes, limit ${maxBytes})`);
	}
}

/**
 * Combine a user script with the invocation expression of its slot.
 */
export function buildProgram(kind: TransformKind, source: string): string {
	return `${source}\n;\n${INVOCATIONS[kind]};\n`;
}
