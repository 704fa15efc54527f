/**
 * Smart Colors Core Type Definitions
 *
 * Shapes shared by the tracks, the scanner, the codec and the wallet host.
 */

import type { Transaction, TransactionOutput } from '@bsv/sdk'
import type { Logger } from './logging.js'
import type { SortedTransaction } from './SortedTransaction.js'

// ---------------------------------------------------------------------------
// Ledger Types
// ---------------------------------------------------------------------------

/** `{txid}.{outputIndex}` reference to a transaction output */
export type OutpointString = string

/**
 * A block as delivered by the chain-sync layer.
 */
export interface BlockRef {
  /** Block hash (hex) */
  hash: string
  /** Height of the block in its chain */
  height: number
}

/**
 * Whether a block extends the best chain or a competing side chain
 */
export type NewBlockType = 'best-chain' | 'side-chain'

// ---------------------------------------------------------------------------
// Wallet Types
// ---------------------------------------------------------------------------

/** Transaction pools a wallet keeps */
export type TransactionPool = 'unspent' | 'spent' | 'pending'

/**
 * The parts of a wallet the scanner consults to attribute asset movements.
 */
export interface ColorWallet {
  /** Whether the wallet holds the key that can spend this output */
  isMine: (output: TransactionOutput) => boolean
  /** Known transactions of a pool, keyed by txid */
  getTransactionPool: (pool: TransactionPool) => ReadonlyMap<string, Transaction>
}

// ---------------------------------------------------------------------------
// Filter Types
// ---------------------------------------------------------------------------

/**
 * A peer-side probabilistic filter that elements can be inserted into.
 */
export interface BloomFilterSink {
  insert: (data: Buffer) => unknown
}

// ---------------------------------------------------------------------------
// Track State
// ---------------------------------------------------------------------------

/**
 * Provenance state of a track, as installed by the codec.
 */
export interface ColorTrackState {
  /** Every colored output ever seen, spent or not */
  outputs: Map<OutpointString, number>
  /** Colored outputs not yet spent */
  unspentOutputs: Map<OutpointString, number>
  /** Applied transactions, in application order */
  transactions: SortedTransaction[]
}

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * Scanner configuration options
 */
export interface ColorScannerConfig {
  /** Logger for scanner events (default: console logger scoped 'ColorScanner') */
  logger?: Logger
  /** Source of the current time in unix seconds (default: wall clock) */
  clock?: () => number
}

export interface ResolvedColorScannerConfig {
  logger: Logger
  clock: () => number
}
