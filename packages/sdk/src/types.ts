/**
 * Core data types shared by every payload-functions package.
 */

// ─── Values ───────────────────────────────────────────────────────────────────

/** JSON-like value a script can hand back across the sandbox boundary */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Structured message fields produced by Decoder/Converter and consumed by Encoder */
export type FieldMap = { [key: string]: JsonValue };

/** Raw device payload. Every element is in [0, 255]. */
export type ByteSequence = Uint8Array;

// ─── Transforms ───────────────────────────────────────────────────────────────

/** The four script slots a device can configure */
export type TransformKind = 'decoder' | 'converter' | 'validator' | 'encoder';

/** Human-readable transform names, used in errors, logs and invocation expressions */
export const TRANSFORM_NAMES: Readonly<Record<TransformKind, string>> = {
	decoder: 'Decoder',
	converter: 'Converter',
	validator: 'Validator',
	encoder: 'Encoder',
};

/**
 * Variables made visible to a script during one execution.
 * `payload` + `port` for decode/encode, `fields` + `port` for convert/validate.
 */
export type Bindings = Readonly<Record<string, JsonValue>>;

/**
 * Tagged result of one script execution. Coercion always checks `kind`
 * before trusting `value`.
 */
export type TypedResult =
	| { kind: 'object'; value: FieldMap }
	| { kind: 'boolean'; value: boolean }
	| { kind: 'array'; value: JsonValue[] }
	| { kind: 'other'; type: string; value: JsonValue | undefined };

// ─── Duration ─────────────────────────────────────────────────────────────────

const DURATION_UNITS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/**
 * Parse a duration string such as "100ms", "2s" or "5m" into milliseconds.
 */
export function parseDuration(duration: string): number {
	const match = duration.trim().match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(`Invalid duration format: "${duration}". Use e.g. 100ms, 2s, 5m`);
	}
	return Number.parseInt(match[1], 10) * DURATION_UNITS[match[2]];
}
