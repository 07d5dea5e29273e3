/**
 * Test harness for payload-functions.
 *
 * Provides mock implementations and helpers for testing pipelines,
 * runtimes and loggers in isolation.
 */

import type { LogEntry, Logger } from './logger.js';
import type { ScriptRunRequest, ScriptRuntime } from './runtime.js';
import type { TransformSet, TransformSetInput } from './transform.js';
import type { TypedResult } from './types.js';

// ─── Mock Logger ──────────────────────────────────────────────────────────────

/**
 * Mock logger for testing.
 * Records all log entries for assertion.
 */
export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	initialized = false;
	flushed = false;
	shutdownCalled = false;

	constructor(id = 'mock-logger') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushed = true;
	}

	async shutdown(): Promise<void> {
		this.flushed = true;
		this.shutdownCalled = true;
	}

	/** Get entries for a specific phase */
	entriesForPhase(phase: LogEntry['phase']): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}

	/** Get entries for a specific transform */
	entriesForTransform(transform: string): LogEntry[] {
		return this.entries.filter((e) => e.transform === transform);
	}

	/** Console messages written by scripts, in order */
	get consoleMessages(): string[] {
		return this.entriesForPhase('script.console').map((e) => e.message ?? '');
	}
}

// ─── Mock Runtime ─────────────────────────────────────────────────────────────

type MockResponse = TypedResult | Error;

/**
 * Mock script runtime for testing.
 * Returns pre-configured results per transform name and records every request.
 */
export class MockRuntime implements ScriptRuntime {
	readonly requests: ScriptRunRequest[] = [];
	private readonly responses = new Map<string, MockResponse>();

	/** Make runs of `name` resolve with `result`, or reject when given an Error */
	respond(name: string, response: MockResponse): this {
		this.responses.set(name, response);
		return this;
	}

	async run(request: ScriptRunRequest): Promise<TypedResult> {
		this.requests.push(request);
		const response = this.responses.get(request.name);
		if (!response) {
			throw new Error(`MockRuntime: no response configured for ${request.name}`);
		}
		if (response instanceof Error) throw response;
		return response;
	}

	/** Requests for a specific transform */
	requestsFor(name: string): ScriptRunRequest[] {
		return this.requests.filter((r) => r.name === name);
	}
}

// ─── Factories ────────────────────────────────────────────────────────────────

/**
 * Create an unchecked transform set with a MockLogger.
 * Use createTransformSet from @payloadfn/core to get source checks.
 */
export function createTestTransformSet(overrides?: Partial<TransformSetInput>): TransformSet {
	return Object.freeze({
		decoder: overrides?.decoder ?? '',
		converter: overrides?.converter ?? '',
		validator: overrides?.validator ?? '',
		encoder: overrides?.encoder ?? '',
		logger: overrides?.logger ?? new MockLogger(),
	});
}
