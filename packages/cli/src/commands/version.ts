/**
 * payloadfn version — Print the CLI version, the runtime it runs on and
 * the pipeline limits scripts are held to.
 */

import { readFile } from 'node:fs/promises';
import { DEFAULT_MAX_SCRIPT_BYTES, DEFAULT_TIMEOUT_MS } from '@payloadfn/core';
import type { Command } from 'commander';
import * as output from '../output.js';

const PACKAGE_JSON = new URL('../../package.json', import.meta.url);

export async function readCliVersion(): Promise<string> {
	let pkg: unknown;
	try {
		pkg = JSON.parse(await readFile(PACKAGE_JSON, 'utf-8'));
	} catch {
		return 'unknown';
	}
	return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
		? pkg.version
		: 'unknown';
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info and script limits')
		.action(async () => {
			const info = {
				payloadfn: await readCliVersion(),
				node: process.version,
				defaults: {
					timeout_ms: DEFAULT_TIMEOUT_MS,
					max_script_bytes: DEFAULT_MAX_SCRIPT_BYTES,
				},
			};

			if (output.isJsonMode()) {
				output.json(info);
				return;
			}

			output.field('payloadfn', info.payloadfn);
			output.field('node', info.node);
			output.field('timeout', `${DEFAULT_TIMEOUT_MS}ms (PAYLOADFN_TIMEOUT, --timeout)`);
			output.field('scripts', `${DEFAULT_MAX_SCRIPT_BYTES} bytes max (PAYLOADFN_MAX_SCRIPT_BYTES)`);
		});
}
