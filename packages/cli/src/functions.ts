/**
 * Builds a PayloadFunctions instance from a functions file and the global
 * command-line options, and reports pipeline failures.
 */

import { LoggerManager, PayloadFunctions } from '@payloadfn/core';
import { register as registerConsoleLogger } from '@payloadfn/logger-console';
import type { LogEntry, LoggerRegistration } from '@payloadfn/sdk';
import { InvalidArgumentError, isPayloadFunctionError, parseDuration } from '@payloadfn/sdk';
import { loadFunctionsConfig } from './config.js';
import * as output from './output.js';

export type GlobalOptions = {
	json?: boolean;
	quiet?: boolean;
	timeout?: string;
	/** Stream pipeline logs to stderr while running */
	trace?: boolean;
};

export interface CommandOptions {
	port: number;
	config: string;
}

export interface LoadedFunctions {
	functions: PayloadFunctions;
	/** Minimum level for printed logs */
	logLevel: string;
	manager: LoggerManager;
}

export async function loadFunctions(configPath: string, globals: GlobalOptions): Promise<LoadedFunctions> {
	const config = await loadFunctionsConfig(configPath);
	const registration = registerConsoleLogger();
	checkLoggerConfig(configPath, registration, config.logger);
	const manager = new LoggerManager();

	if (globals.trace) {
		const consoleLogger = new registration.logger();
		await consoleLogger.init({ ...config.logger, level: 'debug' });
		manager.addLogger(consoleLogger);
	}

	const functions = new PayloadFunctions(
		{ ...config.scripts, logger: manager },
		{
			timeoutMs: globals.timeout !== undefined ? timeoutOption(globals.timeout) : config.timeoutMs,
			maxScriptBytes: config.maxScriptBytes,
		},
	);

	const level = config.logger.level;
	return { functions, logLevel: typeof level === 'string' ? level : 'info', manager };
}

/**
 * Checks the functions file's `logger` section against the logger's config
 * schema: only declared properties, and enum values where the schema has them.
 */
export function checkLoggerConfig(
	configPath: string,
	registration: LoggerRegistration,
	config: Record<string, unknown>,
): void {
	const properties = registration.configSchema?.properties;
	if (!isRecord(properties)) return;

	for (const [key, value] of Object.entries(config)) {
		const property = properties[key];
		if (!isRecord(property)) {
			throw new InvalidArgumentError(configPath, `unknown ${registration.id} logger option "${key}"`);
		}
		const allowed = property.enum;
		if (Array.isArray(allowed) && !allowed.includes(value)) {
			throw new InvalidArgumentError(
				configPath,
				`${registration.id} logger option "${key}" must be one of ${allowed.join(', ')}`,
			);
		}
		if (typeof property.type === 'string' && typeof value !== property.type) {
			throw new InvalidArgumentError(
				configPath,
				`${registration.id} logger option "${key}" must be a ${property.type}`,
			);
		}
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function timeoutOption(value: string): number {
	try {
		return parseDuration(value);
	} catch (err) {
		throw new InvalidArgumentError('--timeout', err instanceof Error ? err.message : String(err));
	}
}

/**
 * Print a pipeline failure and set a failing exit code.
 * Anything that is not a PayloadFunctionError is a bug and propagates.
 */
export function reportFailure(err: unknown, logs: LogEntry[] = [], logLevel = 'info'): void {
	if (!isPayloadFunctionError(err)) throw err;
	process.exitCode = 1;

	if (output.isJsonMode()) {
		output.json({
			ok: false,
			error: { code: err.code, transform: err.transform, message: err.message },
			logs,
		});
		return;
	}

	output.error(err.message);
	output.logs(logs, logLevel);
}
