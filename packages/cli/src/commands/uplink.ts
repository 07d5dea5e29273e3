/**
 * payloadfn uplink — Run an uplink payload through the configured
 * Decoder, Converter and Validator.
 *
 * Exit codes: 0 accepted, 1 pipeline error, 2 rejected by the Validator.
 */

import type { Command } from 'commander';
import { type CommandOptions, type GlobalOptions, loadFunctions, reportFailure } from '../functions.js';
import { parseHexPayload, portOption, toHex } from '../input.js';
import * as output from '../output.js';

export function registerUplinkCommand(program: Command): void {
	program
		.command('uplink <payload-hex>')
		.description('Decode, convert and validate an uplink payload')
		.requiredOption('-p, --port <port>', 'Port the payload arrived on', portOption)
		.option('-c, --config <path>', 'Functions file', 'functions.yaml')
		.action(async (payloadHex: string, opts: CommandOptions) => {
			try {
				const payload = parseHexPayload(payloadHex);
				const { functions, logLevel, manager } = await loadFunctions(
					opts.config,
					program.opts<GlobalOptions>(),
				);

				const outcome = await functions.dryUplink(payload, opts.port);
				await manager.flush();

				if (!outcome.ok) {
					reportFailure(outcome.error, outcome.logs, logLevel);
					return;
				}

				const { fields, valid } = outcome.result;
				if (!valid) process.exitCode = 2;

				if (output.isJsonMode()) {
					output.json({ ok: true, port: opts.port, payload: toHex(payload), fields, valid, logs: outcome.logs });
					return;
				}

				if (!valid) {
					output.warn(`Uplink rejected by Validator (port ${opts.port})`);
				} else if (fields === null) {
					output.warn('No Decoder configured; payload passed through');
				} else {
					output.success(`Uplink accepted (port ${opts.port}, ${payload.length} bytes)`);
				}

				if (fields !== null) {
					output.subheading('Fields');
					output.value(fields);
				}
				output.logs(outcome.logs, logLevel);
			} catch (err) {
				reportFailure(err);
			}
		});
}
