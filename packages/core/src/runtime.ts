/**
 * VmScriptRuntime — runs payload functions in a fresh node:vm context.
 *
 * Per call:
 *   1. A new context is created from a null-prototype global with string
 *      code generation (eval, new Function) and WebAssembly disabled.
 *   2. A trusted bootstrap parses the bindings from a JSON string, installs
 *      a buffering console and a frozen export API under a random global name.
 *   3. The program runs under the timeout; queued microtasks run inside the
 *      same budget.
 *   4. The completion value is tagged and serialized inside the context, on
 *      the remaining budget, so no getter or proxy trap of the script ever
 *      runs on the host without a timeout. The host only sees JSON strings.
 *
 * No host object crosses into the context and no timers are exposed, so
 * nothing can outlive the call.
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { types } from 'node:util';
import vm from 'node:vm';
import type {
	JsonValue,
	LogEntry,
	Logger,
	ScriptRunRequest,
	ScriptRuntime,
	TypedResult,
} from '@payloadfn/sdk';
import { ExecutionTimeoutError, ScriptRuntimeError } from '@payloadfn/sdk';
import { emitLog } from './logger.js';

/** Budget for reading buffered console output after the script has finished */
const DRAIN_TIMEOUT_MS = 50;

const BOOTSTRAP_SOURCE = `(function (bindingsJson, apiName) {
	'use strict';
	var stringify = JSON.stringify;
	var parse = JSON.parse;
	var isArray = Array.isArray;
	var isView = ArrayBuffer.isView;
	var arrayFrom = Array.from;
	var maxSafe = Number.MAX_SAFE_INTEGER;
	var toNumber = Number;
	var keys = Object.keys;
	var freeze = Object.freeze;
	var defineProperty = Object.defineProperty;
	var toTag = Object.prototype.toString;
	var call = Function.prototype.call;
	var global = globalThis;

	var bindings = parse(bindingsJson);
	var names = keys(bindings);
	for (var i = 0; i < names.length; i++) {
		global[names[i]] = bindings[names[i]];
	}

	function replacer(key, value) {
		if (typeof value !== 'bigint') return value;
		if (value > maxSafe || value < -maxSafe) {
			throw new RangeError('BigInt ' + value + ' is outside the safe integer range');
		}
		return toNumber(value);
	}

	function tagOf(value) {
		return call.call(toTag, value);
	}

	var lines = [];
	function format(args) {
		var out = '';
		for (var i = 0; i < args.length; i++) {
			var arg = args[i];
			var text;
			if (typeof arg === 'string') {
				text = arg;
			} else {
				try {
					text = stringify(arg, replacer);
				} catch (e) {
					text = undefined;
				}
				if (text === undefined) {
					try {
						text = String(arg);
					} catch (e) {
						text = '[unprintable]';
					}
				}
			}
			out += (i === 0 ? '' : ' ') + text;
		}
		return out;
	}
	function writer(level) {
		return function () {
			lines[lines.length] = { level: level, message: format(arguments) };
		};
	}
	global.console = freeze({
		log: writer('info'),
		info: writer('info'),
		debug: writer('debug'),
		warn: writer('warn'),
		error: writer('error'),
	});

	function tag(value) {
		if (typeof value === 'boolean') return { kind: 'boolean', value: value };
		if (isArray(value)) return { kind: 'array', value: value };
		if (isView(value) && tagOf(value) !== '[object DataView]') {
			return { kind: 'array', value: arrayFrom(value) };
		}
		if (value === null) return { kind: 'other', type: 'null', value: null };
		if (typeof value === 'object') {
			if (typeof value.then === 'function') return { kind: 'other', type: 'promise' };
			if (tagOf(value) !== '[object Object]') return { kind: 'other', type: tagOf(value) };
			return { kind: 'object', value: value };
		}
		if (typeof value === 'function' || typeof value === 'undefined' || typeof value === 'symbol') {
			return { kind: 'other', type: typeof value };
		}
		return { kind: 'other', type: typeof value, value: value };
	}

	defineProperty(global, apiName, {
		value: freeze({
			result: function (value) {
				return stringify(tag(value), replacer);
			},
			describe: function (error) {
				try {
					if (error !== null && typeof error === 'object' && typeof error.message === 'string') {
						return (typeof error.name === 'string' ? error.name + ': ' : '') + error.message;
					}
					return String(error);
				} catch (e) {
					return 'uncaught exception';
				}
			},
			drain: function () {
				var out = stringify(lines);
				lines = [];
				return out;
			},
		}),
		writable: false,
		enumerable: false,
		configurable: false,
	});
})`;

const bootstrapScript = new vm.Script(BOOTSTRAP_SOURCE, { filename: 'payloadfn:bootstrap.js' });

export class VmScriptRuntime implements ScriptRuntime {
	async run(request: ScriptRunRequest): Promise<TypedResult> {
		const { name, code, bindings, timeoutMs, logger } = request;
		const sandbox: Record<string, unknown> = Object.create(null);
		const context = vm.createContext(sandbox, {
			name,
			codeGeneration: { strings: false, wasm: false },
			microtaskMode: 'afterEvaluate',
		});

		const apiName = uniqueName('api');
		const bootstrap: unknown = bootstrapScript.runInContext(context);
		if (typeof bootstrap !== 'function') {
			throw new ScriptRuntimeError(name, 'runtime bootstrap did not load');
		}
		bootstrap(JSON.stringify(bindings), apiName);

		let program: vm.Script;
		try {
			program = new vm.Script(code, { filename: `${name}.js` });
		} catch (err) {
			throw new ScriptRuntimeError(name, err);
		}

		const started = performance.now();
		const remaining = (): number => Math.max(1, Math.ceil(timeoutMs - (performance.now() - started)));

		try {
			let completion: unknown;
			try {
				completion = program.runInContext(context, { timeout: timeoutMs });
			} catch (err) {
				throw this.classify(name, err, timeoutMs, context, sandbox, apiName, remaining);
			}

			const resultName = uniqueName('result');
			if (!Reflect.set(sandbox, resultName, completion)) {
				throw new ScriptRuntimeError(name, 'global scope was sealed by the script');
			}
			let exported: unknown;
			try {
				exported = vm.runInContext(`${apiName}.result(${resultName})`, context, {
					timeout: remaining(),
				});
			} catch (err) {
				throw this.classify(name, err, timeoutMs, context, sandbox, apiName, remaining);
			}
			if (typeof exported !== 'string') {
				throw new ScriptRuntimeError(name, 'result could not be exported');
			}
			return parseTypedResult(name, exported);
		} finally {
			await drainConsole(name, context, apiName, logger);
		}
	}

	private classify(
		name: string,
		err: unknown,
		timeoutMs: number,
		context: vm.Context,
		sandbox: Record<string, unknown>,
		apiName: string,
		remaining: () => number,
	): Error {
		// The timeout error may belong to either realm
		if (isTimeout(err)) return new ExecutionTimeoutError(name, timeoutMs);
		if (err instanceof Error) return new ScriptRuntimeError(name, err);

		const errorName = uniqueName('error');
		if (!Reflect.set(sandbox, errorName, err)) {
			return new ScriptRuntimeError(name, new Error('uncaught exception'));
		}
		try {
			const description: unknown = vm.runInContext(`${apiName}.describe(${errorName})`, context, {
				timeout: remaining(),
			});
			return new ScriptRuntimeError(name, new Error(String(description)));
		} catch (describeErr) {
			if (isTimeout(describeErr)) return new ExecutionTimeoutError(name, timeoutMs);
			return new ScriptRuntimeError(name, new Error('uncaught exception'));
		}
	}
}

/**
 * Reads `code` as an own data property so no getter of the script runs here.
 */
function isTimeout(err: unknown): boolean {
	if (!types.isNativeError(err)) return false;
	return Object.getOwnPropertyDescriptor(err, 'code')?.value === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

function uniqueName(kind: string): string {
	return `__payloadfn_${kind}_${randomUUID().replace(/-/g, '')}`;
}

function parseJson(text: string): JsonValue {
	return JSON.parse(text);
}

function parseTypedResult(name: string, json: string): TypedResult {
	const parsed = parseJson(json);
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new ScriptRuntimeError(name, 'result could not be exported');
	}
	const { kind, value } = parsed;
	switch (kind) {
		case 'boolean':
			if (typeof value === 'boolean') return { kind, value };
			break;
		case 'array':
			if (Array.isArray(value)) return { kind, value };
			break;
		case 'object':
			if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
				return { kind, value };
			}
			break;
		case 'other':
			return { kind, type: typeof parsed.type === 'string' ? parsed.type : 'unknown', value };
	}
	throw new ScriptRuntimeError(name, 'result could not be exported');
}

interface ConsoleLine {
	level: NonNullable<LogEntry['level']>;
	message: string;
}

function toConsoleLines(value: JsonValue): ConsoleLine[] {
	if (!Array.isArray(value)) return [];
	const lines: ConsoleLine[] = [];
	for (const item of value) {
		if (typeof item !== 'object' || item === null || Array.isArray(item)) continue;
		const { level, message } = item;
		if (typeof message !== 'string') continue;
		if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
			lines.push({ level, message });
		}
	}
	return lines;
}

async function drainConsole(
	name: string,
	context: vm.Context,
	apiName: string,
	logger: Logger,
): Promise<void> {
	let lines: ConsoleLine[];
	try {
		const drained: unknown = vm.runInContext(`${apiName}.drain()`, context, {
			timeout: DRAIN_TIMEOUT_MS,
		});
		lines = typeof drained === 'string' ? toConsoleLines(parseJson(drained)) : [];
	} catch (err) {
		lines = [{ level: 'warn', message: `console output lost: ${String(err)}` }];
	}

	for (const line of lines) {
		await emitLog(logger, 'script.console', {
			transform: name,
			level: line.level,
			message: line.message,
		});
	}
}
