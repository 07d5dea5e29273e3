/**
 * payloadfn downlink — Encode a fields object into a downlink payload.
 */

import type { Command } from 'commander';
import { type CommandOptions, type GlobalOptions, loadFunctions, reportFailure } from '../functions.js';
import { parseFields, portOption, toHex } from '../input.js';
import * as output from '../output.js';

export function registerDownlinkCommand(program: Command): void {
	program
		.command('downlink <fields-json>')
		.description('Encode a JSON object of fields into a downlink payload')
		.requiredOption('-p, --port <port>', 'Port the payload is sent on', portOption)
		.option('-c, --config <path>', 'Functions file', 'functions.yaml')
		.action(async (fieldsJson: string, opts: CommandOptions) => {
			try {
				const fields = parseFields(fieldsJson);
				const { functions, logLevel, manager } = await loadFunctions(
					opts.config,
					program.opts<GlobalOptions>(),
				);

				const outcome = await functions.dryDownlink(fields, opts.port);
				await manager.flush();

				if (!outcome.ok) {
					reportFailure(outcome.error, outcome.logs, logLevel);
					return;
				}

				const hex = toHex(outcome.result.payload);
				if (output.isJsonMode()) {
					output.json({
						ok: true,
						port: opts.port,
						payload: hex,
						bytes: Array.from(outcome.result.payload),
						logs: outcome.logs,
					});
					return;
				}

				output.success(`Downlink encoded (port ${opts.port}, ${outcome.result.payload.length} bytes)`);
				output.field('hex', hex === '' ? '(empty)' : hex);
				output.field('bytes', `[${Array.from(outcome.result.payload).join(', ')}]`);
				output.logs(outcome.logs, logLevel);
			} catch (err) {
				reportFailure(err);
			}
		});
}
