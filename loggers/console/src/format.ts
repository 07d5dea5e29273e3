/**
 * Formatting for console log lines.
 *
 * Compact: one line per entry.
 *   10:30:45.123 ✓ transform.success xform=Decoder port=1 result=object 3ms
 * Verbose: compact line plus indented metadata.
 */

import type { LogEntry, LogPhase } from '@payloadfn/sdk';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const PHASE_LEVELS: Record<LogPhase, Level> = {
	'transform.start': 'debug',
	'transform.success': 'debug',
	'transform.error': 'error',
	'transform.timeout': 'error',
	'script.console': 'info',
	'uplink.complete': 'info',
	'uplink.rejected': 'warn',
	'downlink.complete': 'info',
};

const PHASE_ICONS: Record<LogPhase, string> = {
	'transform.start': '◆',
	'transform.success': '✓',
	'transform.error': '⚠',
	'transform.timeout': '⌛',
	'script.console': '›',
	'uplink.complete': '▲',
	'uplink.rejected': '✗',
	'downlink.complete': '▼',
};

const LEVEL_COLORS: Record<Level, string> = {
	debug: DIM,
	info: GREEN,
	warn: YELLOW,
	error: RED,
};

function isLevel(value: string): value is Level {
	return value in LEVEL_ORDER;
}

/** Effective level of an entry: console entries carry their own */
export function entryLevel(entry: LogEntry): Level {
	if (entry.phase === 'script.console' && entry.level) return entry.level;
	return PHASE_LEVELS[entry.phase] ?? 'info';
}

/**
 * Whether an entry should be shown at the configured minimum level.
 * Unknown levels show everything.
 */
export function shouldLog(entry: LogEntry, minLevel: string): boolean {
	if (!isLevel(minLevel)) return true;
	return LEVEL_ORDER[entryLevel(entry)] >= LEVEL_ORDER[minLevel];
}

function formatTime(timestamp: string): string {
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) return '--:--:--.---';
	const pad = (n: number, width = 2) => String(n).padStart(width, '0');
	return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

function paint(text: string, color: string, useColor: boolean): string {
	return useColor ? `${color}${text}${RESET}` : text;
}

export function formatCompact(entry: LogEntry, useColor: boolean): string {
	const level = entryLevel(entry);
	const icon = PHASE_ICONS[entry.phase] ?? '●';
	const parts: string[] = [
		paint(formatTime(entry.timestamp), DIM, useColor),
		paint(`${icon} ${entry.phase}`, LEVEL_COLORS[level], useColor),
	];

	if (entry.transform) parts.push(`xform=${entry.transform}`);
	if (entry.port !== undefined) parts.push(`port=${entry.port}`);
	if (entry.message !== undefined) parts.push(paint(entry.message, CYAN, useColor));
	if (entry.result) parts.push(`result=${entry.result}`);
	if (entry.error) parts.push(paint(`err=${entry.error}`, RED, useColor));
	if (entry.duration_ms !== undefined) parts.push(paint(`${entry.duration_ms}ms`, DIM, useColor));

	return parts.join(' ');
}

export function formatVerbose(entry: LogEntry, useColor: boolean, showMetadata: boolean): string {
	const line = formatCompact(entry, useColor);
	if (!showMetadata || !entry.metadata || Object.keys(entry.metadata).length === 0) {
		return line;
	}
	const body = JSON.stringify(entry.metadata, null, 2)
		.split('\n')
		.map((l) => `    ${l}`)
		.join('\n');
	return `${line}\n${paint(`  metadata:\n${body}`, DIM, useColor)}`;
}
