/**
 * PayloadFunctions — the per-device entry point.
 *
 * Library-first API:
 *   const fns = new PayloadFunctions({ decoder, encoder, logger });
 *   const { fields, valid } = await fns.uplink(payload, port);
 *   const { payload } = await fns.downlink(fields, port);
 *
 * Dry runs execute the same pipeline but collect the log entries (including
 * script console output) and report failures as values, so scripts can be
 * tried out before they are attached to a device.
 */

import type {
	ByteSequence,
	DownlinkResult,
	FieldMap,
	LogEntry,
	TransformSet,
	TransformSetInput,
	UplinkResult,
} from '@payloadfn/sdk';
import { isPayloadFunctionError, PayloadFunctionError, ScriptRuntimeError } from '@payloadfn/sdk';
import { type PipelineOptions, resolveOptions } from './config.js';
import { processDownlink } from './downlink.js';
import { CaptureLogger } from './logger.js';
import { createTransformSet } from './transform-set.js';
import { processUplink } from './uplink.js';

export type DryRunOutcome<T> =
	| { ok: true; result: T; logs: LogEntry[] }
	| { ok: false; error: PayloadFunctionError; logs: LogEntry[] };

export class PayloadFunctions {
	readonly transforms: TransformSet;
	readonly options: PipelineOptions;

	constructor(input: TransformSetInput, options: Partial<PipelineOptions> = {}) {
		this.options = resolveOptions(options);
		this.transforms = createTransformSet(input, this.options.maxScriptBytes);
	}

	uplink(payload: ByteSequence, port: number): Promise<UplinkResult> {
		return processUplink(this.transforms, payload, port, this.options);
	}

	downlink(fields: FieldMap, port: number): Promise<DownlinkResult> {
		return processDownlink(this.transforms, fields, port, this.options);
	}

	dryUplink(payload: ByteSequence, port: number): Promise<DryRunOutcome<UplinkResult>> {
		return this.dryRun((set) => processUplink(set, payload, port, this.options));
	}

	dryDownlink(fields: FieldMap, port: number): Promise<DryRunOutcome<DownlinkResult>> {
		return this.dryRun((set) => processDownlink(set, fields, port, this.options));
	}

	private async dryRun<T>(run: (set: TransformSet) => Promise<T>): Promise<DryRunOutcome<T>> {
		const capture = new CaptureLogger(this.transforms.logger);
		const set: TransformSet = Object.freeze({ ...this.transforms, logger: capture });
		try {
			const result = await run(set);
			return { ok: true, result, logs: capture.entries };
		} catch (err) {
			const error = isPayloadFunctionError(err) ? err : new ScriptRuntimeError('Pipeline', err);
			return { ok: false, error, logs: capture.entries };
		}
	}
}
