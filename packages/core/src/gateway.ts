/**
 * Execution gateway — one call into the script runtime.
 *
 * Checks the script, appends the slot's invocation expression, runs it under
 * the configured timeout and classifies whatever goes wrong. No caching and
 * no retries: every call is a fresh, independent execution.
 */

import { performance } from 'node:perf_hooks';
import type { Bindings, Logger, TransformKind, TypedResult } from '@payloadfn/sdk';
import {
	ExecutionTimeoutError,
	isPayloadFunctionError,
	ScriptRuntimeError,
	TRANSFORM_NAMES,
} from '@payloadfn/sdk';
import type { PipelineOptions } from './config.js';
import { emitLog } from './logger.js';
import { buildProgram, checkScriptSource } from './source.js';

export async function runTransform(
	kind: TransformKind,
	script: string,
	bindings: Bindings,
	logger: Logger,
	options: PipelineOptions,
): Promise<TypedResult> {
	const name = TRANSFORM_NAMES[kind];
	const port = typeof bindings.port === 'number' ? bindings.port : undefined;

	checkScriptSource(kind, script, options.maxScriptBytes);

	await emitLog(logger, 'transform.start', { transform: name, port });
	const started = performance.now();
	const elapsed = (): number => Math.round(performance.now() - started);

	try {
		const result = await options.runtime.run({
			name,
			code: buildProgram(kind, script),
			bindings,
			timeoutMs: options.timeoutMs,
			logger,
		});
		await emitLog(logger, 'transform.success', {
			transform: name,
			port,
			duration_ms: elapsed(),
			result: result.kind,
		});
		return result;
	} catch (err) {
		// Runtimes are external: anything unclassified is a script failure
		const error = isPayloadFunctionError(err) ? err : new ScriptRuntimeError(name, err);
		await emitLog(logger, error instanceof ExecutionTimeoutError ? 'transform.timeout' : 'transform.error', {
			transform: name,
			port,
			duration_ms: elapsed(),
			error: error.message,
		});
		throw error;
	}
}
