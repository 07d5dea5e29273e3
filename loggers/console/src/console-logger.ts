/**
 * Console logger — human-readable colored output for development.
 *
 * Writes to process.stderr so stdout stays clean for pipeline output.
 */

import type { LogEntry, Logger } from '@payloadfn/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

interface ConsoleLoggerConfig {
	level?: 'debug' | 'info' | 'warn' | 'error';
	color?: boolean;
	compact?: boolean;
	show_metadata?: boolean;
}

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private level = 'info';
	private useColor = true;
	private compact = true;
	private showMetadata = false;

	async init(config: Record<string, unknown>): Promise<void> {
		const cfg: ConsoleLoggerConfig = {
			level: isLevel(config.level) ? config.level : undefined,
			color: typeof config.color === 'boolean' ? config.color : undefined,
			compact: typeof config.compact === 'boolean' ? config.compact : undefined,
			show_metadata: typeof config.show_metadata === 'boolean' ? config.show_metadata : undefined,
		};
		if (cfg.level) this.level = cfg.level;
		if (cfg.color !== undefined) this.useColor = cfg.color;
		if (cfg.compact !== undefined) this.compact = cfg.compact;
		if (cfg.show_metadata !== undefined) this.showMetadata = cfg.show_metadata;
	}

	async log(entry: LogEntry): Promise<void> {
		try {
			if (!shouldLog(entry, this.level)) return;

			const formatted = this.compact
				? formatCompact(entry, this.useColor)
				: formatVerbose(entry, this.useColor, this.showMetadata);

			process.stderr.write(`${formatted}\n`);
		} catch {
			// Loggers must not throw
		}
	}

	async flush(): Promise<void> {
		// Console output is unbuffered — nothing to flush
	}

	async shutdown(): Promise<void> {
		// No resources to clean up
	}
}

function isLevel(value: unknown): value is NonNullable<ConsoleLoggerConfig['level']> {
	return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}
