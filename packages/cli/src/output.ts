/**
 * Output formatting utilities for the CLI.
 *
 * Provides colored output, JSON mode and quiet mode.
 */

import type { LogEntry } from '@payloadfn/sdk';
import { formatCompact, shouldLog } from '@payloadfn/logger-console';
import chalk from 'chalk';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.warn(chalk.yellow(`  ! ${message}`));
}

export function blank(): void {
	if (quietMode || jsonMode) return;
	console.log();
}

// ─── Styled output ───────────────────────────────────────────────────────────

export function subheading(text: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.bold.dim(`\n  ${text}:`));
}

/** Indented, pretty-printed value */
export function value(data: unknown): void {
	if (quietMode || jsonMode) return;
	for (const line of JSON.stringify(data, null, 2).split('\n')) {
		console.log(`    ${line}`);
	}
}

export function field(label: string, text: string): void {
	if (quietMode || jsonMode) return;
	console.log(`  ${chalk.dim(label.padEnd(8))} ${text}`);
}

/** Pipeline log entries at or above the given level */
export function logs(entries: LogEntry[], level: string): void {
	if (quietMode || jsonMode) return;
	const shown = entries.filter((entry) => shouldLog(entry, level));
	if (shown.length === 0) return;
	subheading('Logs');
	for (const entry of shown) {
		console.log(`    ${formatCompact(entry, chalk.level > 0)}`);
	}
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}
