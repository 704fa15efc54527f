/**
 * Smart Colors Protocol Constants
 *
 * Constants shared by the color tracks, the scanner and the codec.
 */

import { Utils } from '@bsv/sdk'

// ---------------------------------------------------------------------------
// Marker Constants
// ---------------------------------------------------------------------------

/** Payload of the marker output carried by every color-aware transaction */
export const SMART_ASSET_MARKER = 'SMARTASS'

/** Marker payload bytes (hex 534d415254415353) */
export const SMART_ASSET_MARKER_BYTES: readonly number[] = Utils.toArray(SMART_ASSET_MARKER, 'utf8')

/**
 * The exact marker script: OP_RETURN followed by a single 8-byte push of the
 * marker payload.
 */
export const MARKER_SCRIPT_HEX = '6a08' + Utils.toHex([...SMART_ASSET_MARKER_BYTES])

// ---------------------------------------------------------------------------
// Value Encoding Constants
// ---------------------------------------------------------------------------

/** Ledger values below this are padded with msb-drop encoding */
export const MINIMUM_PADDED_VALUE = 5460

/** One input-sequence bit per output, least significant bit first */
export const MAX_COLORED_OUTPUTS = 32

/** Sequence number used when an input does not carry one */
export const DEFAULT_SEQUENCE = 0xffffffff

// ---------------------------------------------------------------------------
// Definition Constants
// ---------------------------------------------------------------------------

/** Hash reserved for the UNKNOWN definition sentinel */
export const UNKNOWN_DEFINITION_HASH = '00'.repeat(32)

// ---------------------------------------------------------------------------
// Persistence Constants
// ---------------------------------------------------------------------------

/** Identifier of the wallet extension holding scanner state */
export const WALLET_EXTENSION_ID = 'org.smartcolors'

/** Version written at the head of every encoded scanner state */
export const CODEC_VERSION = 1
