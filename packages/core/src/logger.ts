/**
 * Logger plumbing for the pipeline.
 *
 * - LoggerManager fans entries out to several loggers.
 * - CaptureLogger keeps entries in memory (dry runs).
 * - emitLog stamps an entry and delivers it without ever throwing.
 */

import type { LogEntry, LogPhase, Logger } from '@payloadfn/sdk';

/**
 * Fan-out logger. A failing logger never affects the others or the caller.
 */
export class LoggerManager implements Logger {
	readonly id = 'manager';
	private readonly loggers: Logger[] = [];

	constructor(loggers: Logger[] = []) {
		this.loggers.push(...loggers);
	}

	addLogger(logger: Logger): void {
		this.loggers.push(logger);
	}

	get size(): number {
		return this.loggers.length;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		await Promise.allSettled(this.loggers.map((l) => l.init(config)));
	}

	async log(entry: LogEntry): Promise<void> {
		await Promise.allSettled(this.loggers.map((l) => l.log(entry)));
	}

	async flush(): Promise<void> {
		await Promise.allSettled(this.loggers.map((l) => l.flush()));
	}

	async shutdown(): Promise<void> {
		await Promise.allSettled(this.loggers.map((l) => l.shutdown()));
	}
}

/**
 * In-memory logger. Optionally forwards every entry to another logger.
 */
export class CaptureLogger implements Logger {
	readonly id = 'capture';
	readonly entries: LogEntry[] = [];
	private readonly forward?: Logger;

	constructor(forward?: Logger) {
		this.forward = forward;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		// Nothing to configure
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
		if (this.forward) await emit(this.forward, entry);
	}

	async flush(): Promise<void> {
		// Entries are kept in memory
	}

	async shutdown(): Promise<void> {
		// No resources to clean up
	}
}

export async function emitLog(
	logger: Logger,
	phase: LogPhase,
	fields: Omit<LogEntry, 'timestamp' | 'phase'> = {},
): Promise<void> {
	await emit(logger, { timestamp: new Date().toISOString(), phase, ...fields });
}

async function emit(logger: Logger, entry: LogEntry): Promise<void> {
	try {
		await logger.log(entry);
	} catch {
		// Loggers must not throw
	}
}
