import {
	ExecutionTimeoutError,
	InvalidScriptError,
	MockLogger,
	MockRuntime,
	ScriptRuntimeError,
} from '@payloadfn/sdk';
import { describe, expect, it } from 'vitest';
import { resolveOptions } from '../config.js';
import { runTransform } from '../gateway.js';
import { buildProgram } from '../source.js';

const SCRIPT = 'function Decoder(bytes) { return { n: bytes.length }; }';

describe('runTransform', () => {
	it('submits the templated program, bindings and timeout to the runtime', async () => {
		const runtime = new MockRuntime().respond('Decoder', { kind: 'object', value: { n: 2 } });
		const logger = new MockLogger();
		const options = resolveOptions({ runtime, timeoutMs: 250 }, {});

		const result = await runTransform('decoder', SCRIPT, { payload: [1, 2], port: 9 }, logger, options);

		expect(result).toEqual({ kind: 'object', value: { n: 2 } });
		expect(runtime.requests).toHaveLength(1);
		const [request] = runtime.requests;
		expect(request.name).toBe('Decoder');
		expect(request.code).toBe(buildProgram('decoder', SCRIPT));
		expect(request.bindings).toEqual({ payload: [1, 2], port: 9 });
		expect(request.timeoutMs).toBe(250);
		expect(request.logger).toBe(logger);
	});

	it('logs start and success with the result kind', async () => {
		const runtime = new MockRuntime().respond('Validator', { kind: 'boolean', value: true });
		const logger = new MockLogger();

		await runTransform('validator', 'function Validator() { return true; }', { fields: {}, port: 4 }, logger, resolveOptions({ runtime }, {}));

		expect(logger.entries.map((e) => e.phase)).toEqual(['transform.start', 'transform.success']);
		const success = logger.entriesForPhase('transform.success')[0];
		expect(success.transform).toBe('Validator');
		expect(success.port).toBe(4);
		expect(success.result).toBe('boolean');
		expect(typeof success.duration_ms).toBe('number');
	});

	it('wraps unclassified runtime failures in ScriptRuntimeError', async () => {
		const runtime = new MockRuntime().respond('Converter', new Error('runtime crashed'));
		const logger = new MockLogger();

		const promise = runTransform('converter', 'function Converter(f) { return f; }', { fields: {}, port: 1 }, logger, resolveOptions({ runtime }, {}));

		await expect(promise).rejects.toBeInstanceOf(ScriptRuntimeError);
		await expect(promise).rejects.toThrow('Converter failed: runtime crashed');
		const [entry] = logger.entriesForPhase('transform.error');
		expect(entry.error).toBe('Converter failed: runtime crashed');
	});

	it('passes classified errors through and logs timeouts separately', async () => {
		const timeout = new ExecutionTimeoutError('Decoder', 100);
		const runtime = new MockRuntime().respond('Decoder', timeout);
		const logger = new MockLogger();

		await expect(
			runTransform('decoder', SCRIPT, { payload: [], port: 1 }, logger, resolveOptions({ runtime }, {})),
		).rejects.toBe(timeout);
		expect(logger.entriesForPhase('transform.timeout')).toHaveLength(1);
		expect(logger.entriesForPhase('transform.error')).toHaveLength(0);
	});

	it('rejects oversized scripts without running them', async () => {
		const runtime = new MockRuntime();
		const logger = new MockLogger();

		await expect(
			runTransform('decoder', SCRIPT, { payload: [], port: 1 }, logger, resolveOptions({ runtime, maxScriptBytes: 8 }, {})),
		).rejects.toBeInstanceOf(InvalidScriptError);
		expect(runtime.requests).toHaveLength(0);
		expect(logger.entries).toHaveLength(0);
	});
});
