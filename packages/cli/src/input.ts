/**
 * Command-line argument parsing for payloads, fields and ports.
 */

import type { ByteSequence, FieldMap, JsonValue } from '@payloadfn/sdk';
import { InvalidArgumentError } from '@payloadfn/sdk';
import { InvalidArgumentError as CommanderArgumentError } from 'commander';

/**
 * Parse a hex payload such as "0a1b", "0x0A1B" or "0a 1b".
 * An empty string is an empty payload.
 */
export function parseHexPayload(hex: string): ByteSequence {
	const digits = hex.trim().replace(/^0x/i, '').replace(/[\s:]/g, '');
	if (!/^[0-9a-f]*$/i.test(digits)) {
		throw new InvalidArgumentError('payload', `"${hex}" is not a hex string`);
	}
	if (digits.length % 2 !== 0) {
		throw new InvalidArgumentError('payload', `"${hex}" has an odd number of hex digits`);
	}
	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

export function toHex(payload: ByteSequence): string {
	return Array.from(payload, (byte) => byte.toString(16).padStart(2, '0')).join('');
}

/** Parse a JSON object of downlink fields */
export function parseFields(text: string): FieldMap {
	let parsed: JsonValue;
	try {
		parsed = JSON.parse(text);
	} catch (err) {
		throw new InvalidArgumentError('fields', err instanceof Error ? err.message : String(err));
	}
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new InvalidArgumentError('fields', 'expected a JSON object');
	}
	return parsed;
}

export function parsePort(value: string): number {
	if (!/^\d+$/.test(value.trim())) {
		throw new InvalidArgumentError('port', `"${value}" is not an integer`);
	}
	return Number.parseInt(value, 10);
}

/** Commander argument parser for --port */
export function portOption(value: string): number {
	try {
		return parsePort(value);
	} catch (err) {
		throw new CommanderArgumentError(err instanceof Error ? err.message : String(err));
	}
}
