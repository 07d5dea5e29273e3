/**
 * @payloadfn/cli — command-line runner for payload functions.
 */

import { Command } from 'commander';
import { registerDownlinkCommand } from './commands/downlink.js';
import { registerUplinkCommand } from './commands/uplink.js';
import { registerVersionCommand } from './commands/version.js';
import type { GlobalOptions } from './functions.js';
import * as output from './output.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('payloadfn')
		.description('Run device payload Decoder, Converter, Validator and Encoder scripts')
		.option('--json', 'Machine-readable JSON output')
		.option('-q, --quiet', 'Only print errors')
		.option('--timeout <duration>', 'Script timeout, e.g. 100ms or 1s')
		.option('--trace', 'Stream pipeline logs to stderr while running')
		.hook('preAction', () => {
			const opts = program.opts<GlobalOptions>();
			output.setJsonMode(opts.json === true);
			output.setQuietMode(opts.quiet === true);
		});

	registerUplinkCommand(program);
	registerDownlinkCommand(program);
	registerVersionCommand(program);

	return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
	await createProgram().parseAsync(argv);
}

export { loadFunctionsConfig } from './config.js';
export type { FunctionsConfig, ScriptSources } from './config.js';
export { parseFields, parseHexPayload, parsePort, toHex } from './input.js';
