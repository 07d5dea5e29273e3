/**
 * Script runtime contract — the capability that actually executes a script.
 *
 * The pipeline only depends on this shape. A runtime must give every call
 * a fresh execution context and must stop the script at `timeoutMs`.
 */

import type { Logger } from './logger.js';
import type { Bindings, TypedResult } from './types.js';

export interface ScriptRunRequest {
	/** Transform name, used in errors and logs */
	name: string;
	/** Full program: user script followed by its invocation expression */
	code: string;
	/** Variables defined in the script's global scope */
	bindings: Bindings;
	/** Hard wall-clock budget */
	timeoutMs: number;
	/** Receives console output produced by the script */
	logger: Logger;
}

export interface ScriptRuntime {
	/**
	 * Run one script.
	 *
	 * Resolves with the tagged completion value. Rejects with
	 * ExecutionTimeoutError when the budget is exceeded and with
	 * ScriptRuntimeError when the script throws or fails to compile.
	 */
	run(request: ScriptRunRequest): Promise<TypedResult>;
}
