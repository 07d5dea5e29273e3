/**
 * Pipeline configuration.
 *
 * Every pipeline call receives a resolved PipelineOptions value; there is no
 * module-level timeout. Resolution order: defaults, environment, overrides.
 *
 * Environment:
 *   PAYLOADFN_TIMEOUT           = duration, e.g. 100ms, 1s (default: 100ms)
 *   PAYLOADFN_MAX_SCRIPT_BYTES  = integer (default: 65536)
 */

import type { ScriptRuntime } from '@payloadfn/sdk';
import { InvalidArgumentError, parseDuration } from '@payloadfn/sdk';
import { VmScriptRuntime } from './runtime.js';

export const DEFAULT_TIMEOUT_MS = 100;
export const DEFAULT_MAX_SCRIPT_BYTES = 64 * 1024;

export interface PipelineOptions {
	/** Hard wall-clock budget for one script execution */
	timeoutMs: number;
	/** Largest accepted script, in UTF-8 bytes */
	maxScriptBytes: number;
	/** Executes the scripts */
	runtime: ScriptRuntime;
}

// Stateless: every run builds its own context
const defaultRuntime = new VmScriptRuntime();

export function resolveOptions(
	overrides: Partial<PipelineOptions> = {},
	env: NodeJS.ProcessEnv = process.env,
): PipelineOptions {
	const timeoutMs = overrides.timeoutMs ?? timeoutFromEnv(env.PAYLOADFN_TIMEOUT) ?? DEFAULT_TIMEOUT_MS;
	const maxScriptBytes =
		overrides.maxScriptBytes ??
		integerFromEnv('PAYLOADFN_MAX_SCRIPT_BYTES', env.PAYLOADFN_MAX_SCRIPT_BYTES) ??
		DEFAULT_MAX_SCRIPT_BYTES;

	if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
		throw new InvalidArgumentError('timeoutMs', `must be a positive integer (got ${timeoutMs})`);
	}
	if (!Number.isInteger(maxScriptBytes) || maxScriptBytes <= 0) {
		throw new InvalidArgumentError(
			'maxScriptBytes',
			`must be a positive integer (got ${maxScriptBytes})`,
		);
	}

	return {
		timeoutMs,
		maxScriptBytes,
		runtime: overrides.runtime ?? defaultRuntime,
	};
}

function timeoutFromEnv(value: string | undefined): number | undefined {
	if (value === undefined || value === '') return undefined;
	try {
		return parseDuration(value);
	} catch (err) {
		throw new InvalidArgumentError('PAYLOADFN_TIMEOUT', err instanceof Error ? err.message : String(err));
	}
}

function integerFromEnv(name: string, value: string | undefined): number | undefined {
	if (value === undefined || value === '') return undefined;
	if (!/^\d+$/.test(value.trim())) {
		throw new InvalidArgumentError(name, `must be an integer (got "${value}")`);
	}
	return Number.parseInt(value, 10);
}
