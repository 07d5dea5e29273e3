/**
 * Transform set construction.
 */

import type { TransformKind, TransformSet, TransformSetInput } from '@payloadfn/sdk';
import { DEFAULT_MAX_SCRIPT_BYTES } from './config.js';
import { checkScriptSource } from './source.js';

const KINDS: readonly TransformKind[] = ['decoder', 'converter', 'validator', 'encoder'];

/**
 * Build an immutable transform set. Missing scripts become empty strings;
 * every configured script is checked up front so a bad script is rejected at
 * configuration time rather than on the first message.
 */
export function createTransformSet(
	input: TransformSetInput,
	maxScriptBytes: number = DEFAULT_MAX_SCRIPT_BYTES,
): TransformSet {
	const set: TransformSet = {
		decoder: input.decoder ?? '',
		converter: input.converter ?? '',
		validator: input.validator ?? '',
		encoder: input.encoder ?? '',
		logger: input.logger,
	};
	for (const kind of KINDS) {
		if (set[kind] !== '') checkScriptSource(kind, set[kind], maxScriptBytes);
	}
	return Object.freeze(set);
}

/** True when no uplink script is configured */
export function isPassThrough(set: TransformSet): boolean {
	return set.decoder === '' && set.converter === '' && set.validator === '';
}
