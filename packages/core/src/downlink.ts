/**
 * Downlink pipeline: Encode.
 *
 * There is no identity mapping from arbitrary fields to bytes, so an empty
 * Encoder is always an error.
 */

import type { ByteSequence, DownlinkResult, FieldMap, TransformSet } from '@payloadfn/sdk';
import { MissingEncoderError, TRANSFORM_NAMES } from '@payloadfn/sdk';
import { toByteSequence } from './coerce.js';
import { type PipelineOptions, resolveOptions } from './config.js';
import { runTransform } from './gateway.js';
import { emitLog } from './logger.js';
import { assertPort } from './uplink.js';

/**
 * Encode fields into a byte payload with the Encoder.
 */
export async function encode(
	set: TransformSet,
	fields: FieldMap,
	port: number,
	options: PipelineOptions = resolveOptions(),
): Promise<ByteSequence> {
	if (set.encoder === '') throw new MissingEncoderError();

	const result = await runTransform(
		'encoder',
		set.encoder,
		{ payload: fields, port },
		set.logger,
		options,
	);
	return toByteSequence(TRANSFORM_NAMES.encoder, result);
}

/**
 * Run the downlink pipeline for one message.
 */
export async function processDownlink(
	set: TransformSet,
	fields: FieldMap,
	port: number,
	options: PipelineOptions = resolveOptions(),
): Promise<DownlinkResult> {
	assertPort(port);

	const payload = await encode(set, fields, port, options);
	await emitLog(set.logger, 'downlink.complete', {
		port,
		result: 'encoded',
		metadata: { payload_bytes: payload.length },
	});
	return { payload, ok: true };
}
