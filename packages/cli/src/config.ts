/**
 * Functions file loading.
 *
 * A functions file is a YAML mapping holding up to four scripts, each given
 * inline or as a path relative to the file itself:
 *
 *   timeout: 200ms
 *   decoder: |
 *     function Decoder(bytes, port) { return { temp: bytes[0] }; }
 *   encoder_file: encoder.js
 *   logger:
 *     level: debug
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { TransformKind } from '@payloadfn/sdk';
import { InvalidArgumentError, parseDuration } from '@payloadfn/sdk';
import yaml from 'js-yaml';

const KINDS: readonly TransformKind[] = ['decoder', 'converter', 'validator', 'encoder'];

const KNOWN_KEYS = new Set<string>([
	...KINDS,
	...KINDS.map((kind) => `${kind}_file`),
	'timeout',
	'max_script_bytes',
	'logger',
]);

export type ScriptSources = Partial<Record<TransformKind, string>>;

export interface FunctionsConfig {
	/** Absolute path of the loaded file */
	path: string;
	scripts: ScriptSources;
	timeoutMs?: number;
	maxScriptBytes?: number;
	/** Passed to the console logger's init */
	logger: Record<string, unknown>;
}

export async function loadFunctionsConfig(configPath: string): Promise<FunctionsConfig> {
	const path = resolve(configPath);
	let content: string;
	try {
		content = await readFile(path, 'utf-8');
	} catch (err) {
		throw new InvalidArgumentError(configPath, `cannot read functions file (${errorMessage(err)})`);
	}

	let doc: unknown;
	try {
		doc = yaml.load(content);
	} catch (err) {
		throw new InvalidArgumentError(configPath, `invalid YAML (${errorMessage(err)})`);
	}
	// An empty file configures nothing
	if (doc === undefined || doc === null) doc = {};
	if (!isRecord(doc)) {
		throw new InvalidArgumentError(configPath, 'expected a YAML mapping');
	}

	for (const key of Object.keys(doc)) {
		if (!KNOWN_KEYS.has(key)) {
			throw new InvalidArgumentError(configPath, `unknown key "${key}"`);
		}
	}

	const scripts: ScriptSources = {};
	for (const kind of KINDS) {
		const script = await loadScript(configPath, path, kind, doc[kind], doc[`${kind}_file`]);
		if (script !== undefined) scripts[kind] = script;
	}

	return {
		path,
		scripts,
		timeoutMs: readTimeout(configPath, doc.timeout),
		maxScriptBytes: readMaxScriptBytes(configPath, doc.max_script_bytes),
		logger: readLogger(configPath, doc.logger),
	};
}

async function loadScript(
	configPath: string,
	path: string,
	kind: TransformKind,
	inline: unknown,
	file: unknown,
): Promise<string | undefined> {
	if (inline !== undefined && file !== undefined) {
		throw new InvalidArgumentError(configPath, `set either "${kind}" or "${kind}_file", not both`);
	}
	if (inline !== undefined) {
		if (typeof inline !== 'string') {
			throw new InvalidArgumentError(configPath, `"${kind}" must be a string`);
		}
		return inline;
	}
	if (file === undefined) return undefined;
	if (typeof file !== 'string' || file === '') {
		throw new InvalidArgumentError(configPath, `"${kind}_file" must be a file path`);
	}

	const scriptPath = resolve(dirname(path), file);
	try {
		return await readFile(scriptPath, 'utf-8');
	} catch (err) {
		throw new InvalidArgumentError(configPath, `cannot read ${kind} script ${file} (${errorMessage(err)})`);
	}
}

function readTimeout(configPath: string, value: unknown): number | undefined {
	if (value === undefined) return undefined;
	// YAML reads a bare number as milliseconds
	if (typeof value === 'number') return value;
	if (typeof value !== 'string') {
		throw new InvalidArgumentError(configPath, '"timeout" must be a duration such as 100ms');
	}
	try {
		return parseDuration(value);
	} catch (err) {
		throw new InvalidArgumentError(configPath, errorMessage(err));
	}
}

function readMaxScriptBytes(configPath: string, value: unknown): number | undefined {
	if (value === undefined) return undefined;
	if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
		throw new InvalidArgumentError(configPath, '"max_script_bytes" must be a positive integer');
	}
	return value;
}

function readLogger(configPath: string, value: unknown): Record<string, unknown> {
	if (value === undefined || value === null) return {};
	if (!isRecord(value)) {
		throw new InvalidArgumentError(configPath, '"logger" must be a mapping');
	}
	return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
