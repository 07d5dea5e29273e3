/**
 * Uplink pipeline: Decode → Convert → Validate.
 *
 * Linear with early exit. The first failing stage aborts the pipeline and no
 * partial output is surfaced. A Validator returning false is a rejection,
 * not an error.
 */

import type { ByteSequence, FieldMap, TransformSet, UplinkResult } from '@payloadfn/sdk';
import { InvalidArgumentError, TRANSFORM_NAMES } from '@payloadfn/sdk';
import { toBoolean, toFieldMap } from './coerce.js';
import { type PipelineOptions, resolveOptions } from './config.js';
import { runTransform } from './gateway.js';
import { emitLog } from './logger.js';

export function assertPort(port: number): void {
	if (!Number.isInteger(port) || port < 0 || port > 255) {
		throw new InvalidArgumentError('port', `must be an integer between 0 and 255 (got ${port})`);
	}
}

/**
 * Decode a raw payload into fields. Returns null when no Decoder is set.
 * The Decoder receives its own copy of the payload.
 */
export async function decode(
	set: TransformSet,
	payload: ByteSequence,
	port: number,
	options: PipelineOptions = resolveOptions(),
): Promise<FieldMap | null> {
	if (set.decoder === '') return null;

	const result = await runTransform(
		'decoder',
		set.decoder,
		{ payload: Array.from(payload), port },
		set.logger,
		options,
	);
	return toFieldMap(TRANSFORM_NAMES.decoder, result);
}

/**
 * Convert decoded fields. Returns the input unchanged when no Converter is set.
 */
export async function convert(
	set: TransformSet,
	fields: FieldMap | null,
	port: number,
	options: PipelineOptions = resolveOptions(),
): Promise<FieldMap | null> {
	if (set.converter === '') return fields;

	const result = await runTransform(
		'converter',
		set.converter,
		{ fields, port },
		set.logger,
		options,
	);
	return toFieldMap(TRANSFORM_NAMES.converter, result);
}

/**
 * Validate converted fields. Returns true when no Validator is set.
 */
export async function validate(
	set: TransformSet,
	fields: FieldMap | null,
	port: number,
	options: PipelineOptions = resolveOptions(),
): Promise<boolean> {
	if (set.validator === '') return true;

	const result = await runTransform(
		'validator',
		set.validator,
		{ fields, port },
		set.logger,
		options,
	);
	return toBoolean(TRANSFORM_NAMES.validator, result);
}

/**
 * Run the full uplink pipeline for one message.
 * Rejects with the first stage error; resolves with the converted fields and
 * the Validator's verdict otherwise.
 */
export async function processUplink(
	set: TransformSet,
	payload: ByteSequence,
	port: number,
	options: PipelineOptions = resolveOptions(),
): Promise<UplinkResult> {
	assertPort(port);

	const decoded = await decode(set, payload, port, options);
	const converted = await convert(set, decoded, port, options);
	const valid = await validate(set, converted, port, options);

	await emitLog(set.logger, valid ? 'uplink.complete' : 'uplink.rejected', {
		port,
		result: valid ? 'valid' : 'invalid',
		metadata: { payload_bytes: payload.length, fields: converted ? Object.keys(converted).length : 0 },
	});
	return { fields: converted, valid };
}
