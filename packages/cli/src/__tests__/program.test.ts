import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram } from '../index.js';

describe('payloadfn program', () => {
	let tempDir: string;
	let stdout: string[];
	let stderr: string[];

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'payloadfn-cli-'));
		stdout = [];
		stderr = [];
		vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
			stdout.push(args.map(String).join(' '));
		});
		vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
			stderr.push(args.map(String).join(' '));
		});
		vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
			stderr.push(args.map(String).join(' '));
		});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		process.exitCode = undefined;
		await rm(tempDir, { recursive: true, force: true });
	});

	async function functionsFile(content: string): Promise<string> {
		const path = join(tempDir, 'functions.yaml');
		await writeFile(path, content);
		return path;
	}

	async function runCli(args: string[]): Promise<void> {
		await createProgram().parseAsync(args, { from: 'user' });
	}

	function jsonOutput(): unknown {
		return JSON.parse(stdout.join('\n'));
	}

	it('decodes an uplink', async () => {
		const config = await functionsFile(
			'decoder: "function Decoder(bytes, port) { return { sum: bytes[0] + bytes[1], port: port }; }"\n',
		);

		await runCli(['--json', 'uplink', '0102', '--port', '1', '--config', config]);

		expect(jsonOutput()).toMatchObject({
			ok: true,
			port: 1,
			payload: '0102',
			fields: { sum: 3, port: 1 },
			valid: true,
		});
		expect(process.exitCode).toBeUndefined();
	});

	it('exits with 2 when the Validator rejects the uplink', async () => {
		const config = await functionsFile(
			[
				'decoder: "function Decoder(bytes) { return { n: bytes.length }; }"',
				'validator: "function Validator(fields) { return fields.n > 4; }"',
				'',
			].join('\n'),
		);

		await runCli(['--json', 'uplink', 'ff', '-p', '3', '-c', config]);

		expect(jsonOutput()).toMatchObject({ ok: true, fields: { n: 1 }, valid: false });
		expect(process.exitCode).toBe(2);
	});

	it('encodes a downlink', async () => {
		const config = await functionsFile(
			'encoder: "function Encoder(fields, port) { return [fields.level, port]; }"\n',
		);

		await runCli(['--json', 'downlink', '{"level":7}', '--port', '2', '--config', config]);

		expect(jsonOutput()).toMatchObject({ ok: true, port: 2, payload: '0702', bytes: [7, 2] });
	});

	it('reports an out-of-range Encoder result', async () => {
		const config = await functionsFile('encoder: "function Encoder() { return [256]; }"\n');

		await runCli(['--json', 'downlink', '{}', '--port', '1', '--config', config]);

		expect(jsonOutput()).toMatchObject({
			ok: false,
			error: {
				code: 'OUT_OF_RANGE',
				transform: 'Encoder',
				message: 'Encoder output: numbers in Array should be between 0 and 255 (got 256 at index 0)',
			},
		});
		expect(process.exitCode).toBe(1);
	});

	it('applies --timeout to scripts', async () => {
		const config = await functionsFile('decoder: "function Decoder() { while (true) {} }"\n');

		await runCli(['--json', '--timeout', '50ms', 'uplink', '00', '--port', '1', '--config', config]);

		expect(jsonOutput()).toMatchObject({
			ok: false,
			error: { code: 'EXECUTION_TIMEOUT', message: 'Decoder interrupted after 50ms' },
		});
		expect(process.exitCode).toBe(1);
	});

	it('reports a missing functions file', async () => {
		await runCli(['--json', 'uplink', '00', '--port', '1', '--config', join(tempDir, 'missing.yaml')]);

		expect(jsonOutput()).toMatchObject({ ok: false, error: { code: 'INVALID_ARGUMENT' } });
		expect(process.exitCode).toBe(1);
	});

	it('prints a human-readable uplink summary', async () => {
		const config = await functionsFile('decoder: "function Decoder(bytes) { return { first: bytes[0] }; }"\n');

		await runCli(['uplink', '2a00', '--port', '1', '--config', config]);

		const text = stdout.join('\n');
		expect(text).toContain('Uplink accepted (port 1, 2 bytes)');
		expect(text).toContain('"first": 42');
	});

	it('reports a rejection even when no Decoder is configured', async () => {
		const config = await functionsFile('validator: "function Validator(fields) { return fields !== null; }"\n');

		await runCli(['uplink', '01', '--port', '1', '--config', config]);

		const text = stderr.join('\n');
		expect(text).toContain('Uplink rejected by Validator (port 1)');
		expect(text).not.toContain('payload passed through');
		expect(process.exitCode).toBe(2);
	});

	it('rejects logger options the console logger does not declare', async () => {
		const config = await functionsFile('logger:\n  colour: false\n');

		await runCli(['--json', 'uplink', '00', '--port', '1', '--config', config]);

		expect(jsonOutput()).toMatchObject({
			ok: false,
			error: { code: 'INVALID_ARGUMENT', message: `${config}: unknown console logger option "colour"` },
		});
		expect(process.exitCode).toBe(1);
	});

	it('checks logger options against the declared values', async () => {
		const config = await functionsFile('logger:\n  level: loud\n');

		await runCli(['--json', 'uplink', '00', '--port', '1', '--config', config]);

		expect(jsonOutput()).toMatchObject({
			ok: false,
			error: {
				message: `${config}: console logger option "level" must be one of debug, info, warn, error`,
			},
		});
	});

	it('prints version info', async () => {
		await runCli(['--json', 'version']);

		expect(jsonOutput()).toEqual({
			payloadfn: '0.3.0',
			node: process.version,
			defaults: { timeout_ms: 100, max_script_bytes: 65536 },
		});
	});
});
