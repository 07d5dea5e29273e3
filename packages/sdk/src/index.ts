/**
 * @payloadfn/sdk — shared types, errors and test harness.
 */

export type { Bindings, ByteSequence, FieldMap, JsonValue, TransformKind, TypedResult } from './types.js';
export { TRANSFORM_NAMES, parseDuration } from './types.js';

export type { LogEntry, Logger, LoggerRegistration, LogPhase } from './logger.js';

export type { ScriptRunRequest, ScriptRuntime } from './runtime.js';

export type {
	DownlinkResult,
	TransformSet,
	TransformSetInput,
	UplinkResult,
} from './transform.js';

export type { PayloadFunctionErrorCode } from './errors.js';
export {
	ExecutionTimeoutError,
	InvalidArgumentError,
	InvalidReturnTypeError,
	InvalidScriptError,
	isPayloadFunctionError,
	MissingEncoderError,
	OutOfRangeError,
	PayloadFunctionError,
	ScriptRuntimeError,
} from './errors.js';

export { createTestTransformSet, MockLogger, MockRuntime } from './testing.js';
