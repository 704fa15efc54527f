/**
 * @smartcolors/core - colored-coin tracking engine
 *
 * Determines which outputs carry which asset by replaying transaction history
 * from each asset's genesis points, and keeps that answer consistent across
 * chain reorganizations and SPV (filtered) delivery.
 *
 * This library provides:
 * - Asset identities (ColorDefinition, GenesisPoint)
 * - Per-asset provenance tracks with reorg-safe undo (ColorTrack)
 * - A scanner driving all tracks from ledger events (ColorScanner)
 * - Peer filter construction for filtered block delivery
 * - A codec for persisting scanner state in wallet extension storage
 *
 * @example
 * ```typescript
 * import { ColorDefinition, ColorScanner, txOutGenesisPoint } from '@smartcolors/core'
 *
 * const scanner = new ColorScanner()
 * const gold = new ColorDefinition([txOutGenesisPoint(genesisTxid, 0)], { name: 'gold' })
 * scanner.addDefinition(gold)
 *
 * scanner.receiveFromBlock(tx, { hash: blockHash, height }, 'best-chain', 0)
 * const change = scanner.getNetAssetChange(tx, wallet)
 * ```
 *
 * @packageDocumentation
 */

// Engine
export { ColorScanner } from './ColorScanner.js'
export type { ColorScannerState } from './ColorScanner.js'
export { ColorTrack } from './ColorTrack.js'
export { SortedTransaction } from './SortedTransaction.js'

// Asset identity
export { AssetChange } from './AssetChange.js'
export { ColorDefinition } from './ColorDefinition.js'
export type { ColorDefinitionJSON } from './ColorDefinition.js'
export {
  compareGenesisPoints,
  genesisPointFromJSON,
  genesisPointToJSON,
  txOutGenesisPoint
} from './GenesisPoint.js'
export type { GenesisPoint, GenesisPointJSON, TxOutGenesisPoint } from './GenesisPoint.js'

// Persistence
export { ScannerCodec } from './ScannerCodec.js'
export { ColorWalletExtension } from './ColorWalletExtension.js'

// Transaction views and value encoding
export {
  getColorMask,
  getColoredOutputIndexes,
  getInputOutpoint,
  getOutputOutpoint,
  getTxid,
  hasMarkerOutput,
  isMarkerScript
} from './coloring.js'
export { addMsbdropValuePadding, makeAssetValue, removeMsbdropValuePadding } from './valuePadding.js'

// Concurrency
export { Deferred, ScannerLock } from './concurrency.js'

// Errors and logging
export {
  ColorError,
  ColorDefinitionError,
  ContractViolationError,
  MalformedStateError,
  ScanningError,
  formatColorError
} from './errors.js'
export type { ColorErrorCode } from './errors.js'
export { configureLogging, createLogger, silentLogger } from './logging.js'
export type { LogLevel, Logger } from './logging.js'

// Types
export type {
  BlockRef,
  BloomFilterSink,
  ColorScannerConfig,
  ColorTrackState,
  ColorWallet,
  NewBlockType,
  OutpointString,
  ResolvedColorScannerConfig,
  TransactionPool
} from './types.js'

// Constants
export {
  CODEC_VERSION,
  MARKER_SCRIPT_HEX,
  MAX_COLORED_OUTPUTS,
  MINIMUM_PADDED_VALUE,
  SMART_ASSET_MARKER,
  SMART_ASSET_MARKER_BYTES,
  UNKNOWN_DEFINITION_HASH,
  WALLET_EXTENSION_ID
} from './constants.js'
