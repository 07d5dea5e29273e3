/**
 * @payloadfn/core — sandboxed payload functions for device uplinks and downlinks.
 */

export { toBoolean, toByteSequence, toFieldMap } from './coerce.js';
export type { PipelineOptions } from './config.js';
export { DEFAULT_MAX_SCRIPT_BYTES, DEFAULT_TIMEOUT_MS, resolveOptions } from './config.js';
export { encode, processDownlink } from './downlink.js';
export type { DryRunOutcome } from './functions.js';
export { PayloadFunctions } from './functions.js';
export { runTransform } from './gateway.js';
export { CaptureLogger, emitLog, LoggerManager } from './logger.js';
export { VmScriptRuntime } from './runtime.js';
export { buildProgram, checkScriptSource } from './source.js';
export { createTransformSet, isPassThrough } from './transform-set.js';
export { assertPort, convert, decode, processUplink, validate } from './uplink.js';
