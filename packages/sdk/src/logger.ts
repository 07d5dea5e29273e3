/**
 * Logger interface — passive observers of payload function execution.
 *
 * Loggers receive LogEntry records for every transform run, for console
 * output produced by scripts, and for pipeline outcomes.
 */

/** Pipeline phase a log entry describes */
export type LogPhase =
	| 'transform.start'
	| 'transform.success'
	| 'transform.error'
	| 'transform.timeout'
	| 'script.console'
	| 'uplink.complete'
	| 'uplink.rejected'
	| 'downlink.complete';

export interface LogEntry {
	/** ISO 8601 */
	timestamp: string;
	phase: LogPhase;
	/** Transform name, e.g. "Decoder" */
	transform?: string;
	port?: number;
	duration_ms?: number;
	result?: string;
	error?: string;
	/** Console level for script.console entries */
	level?: 'debug' | 'info' | 'warn' | 'error';
	/** Console message for script.console entries */
	message?: string;
	metadata?: Record<string, unknown>;
}

/**
 * Logger interface.
 *
 * Implement this to create a new log destination. Loggers may be called
 * concurrently from many in-flight transforms and should be fast.
 */
export interface Logger {
	/** Unique logger ID */
	readonly id: string;

	/** Initialize with config */
	init(config: Record<string, unknown>): Promise<void>;

	/**
	 * Called for every pipeline event.
	 * Should not throw — log errors should be handled internally.
	 */
	log(entry: LogEntry): Promise<void>;

	/** Flush any buffered entries */
	flush(): Promise<void>;

	/** Clean shutdown (flush + close) */
	shutdown(): Promise<void>;
}

/**
 * Logger registration — what a logger package exports.
 */
export interface LoggerRegistration {
	/** Unique logger ID */
	id: string;
	/** Logger class */
	logger: new () => Logger;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}
