/**
 * Transform set — the scripts configured for one device or application.
 */

import type { Logger } from './logger.js';
import type { ByteSequence, FieldMap } from './types.js';

/**
 * Four script bodies plus the logger that receives their output.
 * An empty string means the slot is not configured.
 *
 * Immutable once created; safe to share across concurrent calls.
 */
export interface TransformSet {
	/** Accepts `payload` (byte array) and `port`, returns an object of fields */
	readonly decoder: string;
	/** Accepts decoded `fields` and `port`, returns an object of converted fields */
	readonly converter: string;
	/** Accepts converted `fields` and `port`, returns a boolean */
	readonly validator: string;
	/** Accepts `payload` (fields object) and `port`, returns an Array of bytes */
	readonly encoder: string;
	readonly logger: Logger;
}

/** Input accepted when building a transform set; missing scripts are empty */
export interface TransformSetInput {
	decoder?: string;
	converter?: string;
	validator?: string;
	encoder?: string;
	logger: Logger;
}

/** Outcome of the uplink pipeline */
export interface UplinkResult {
	/** Converted fields; null when no Decoder is configured */
	fields: FieldMap | null;
	/** false means the Validator rejected the message (not an error) */
	valid: boolean;
}

/** Outcome of the downlink pipeline */
export interface DownlinkResult {
	payload: ByteSequence;
	ok: true;
}
