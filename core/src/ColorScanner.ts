/**
 * ColorScanner - keeps a set of color tracks in step with the chain
 *
 * The scanner receives ledger events (transactions seen by peers, transactions
 * confirmed in blocks, reorganizations, new best blocks), indexes the
 * transactions of every block it hears about and drives each track's
 * add/undo so tracks always reflect the accepted chain.
 *
 * It also answers wallet questions (net asset movement of a transaction) and
 * builds the peer filter asking for color-aware transactions.
 */

/// <reference path="./bloom-filter.d.ts" />
import BloomFilter from 'bloom-filter'
import type { Transaction, TransactionInput, TransactionOutput } from '@bsv/sdk'
import { AssetChange } from './AssetChange.js'
import { ColorDefinition } from './ColorDefinition.js'
import { ColorTrack } from './ColorTrack.js'
import { SortedTransaction } from './SortedTransaction.js'
import {
  getColoredOutputIndexes,
  getInputOutpoint,
  getOutputOutpoint,
  getTxid,
  hasMarkerOutput,
  parseOutpoint
} from './coloring.js'
import { Deferred, ScannerLock } from './concurrency.js'
import { ColorDefinitionError, MalformedStateError, ScanningError } from './errors.js'
import { createLogger } from './logging.js'
import type {
  BlockRef,
  ColorScannerConfig,
  ColorTrackState,
  ColorWallet,
  NewBlockType,
  OutpointString,
  ResolvedColorScannerConfig,
  TransactionPool
} from './types.js'
import { removeMsbdropValuePadding } from './valuePadding.js'

/**
 * Everything the scanner persists.
 */
export interface ColorScannerState {
  tracks: Array<{ definition: ColorDefinition, state: ColorTrackState, creationTime: number }>
  mapBlockTx: Map<string, SortedTransaction[]>
  pending: Map<string, Transaction>
}

interface UnknownAssetWaiter {
  tx: Transaction
  result: Deferred<Transaction>
}

const CONNECTED_POOLS: TransactionPool[] = ['unspent', 'spent', 'pending']

/**
 * @example
 * ```typescript
 * const scanner = new ColorScanner()
 * scanner.addDefinition(gold)
 *
 * // wire to the chain-sync layer
 * scanner.receiveFromBlock(tx, block, 'best-chain', indexInBlock)
 *
 * const change = scanner.getNetAssetChange(tx, wallet)
 * ```
 */
export class ColorScanner {
  private config: ResolvedColorScannerConfig
  private readonly lock = new ScannerLock('colorScanner')
  private tracks = new Map<string, ColorTrack>()
  private mapBlockTx = new Map<string, SortedTransaction[]>()
  private pending = new Map<string, Transaction>()
  private unknownAssetWaiters = new Map<string, UnknownAssetWaiter>()

  constructor(config: ColorScannerConfig = {}) {
    this.config = this.resolveConfig(config)
  }

  getLock(): ScannerLock {
    return this.lock
  }

  // ---------------------------------------------------------------------------
  // Definitions
  // ---------------------------------------------------------------------------

  /**
   * Start tracking an asset.
   *
   * @throws ColorDefinitionError if the definition is UNKNOWN or shares a
   * genesis point with a tracked definition
   */
  addDefinition(definition: ColorDefinition): ColorTrack {
    return this.lock.runExclusive(() => {
      this.checkDefinitionConflict(definition, [...this.tracks.values()].map((track) => track.getDefinition()))
      const track = new ColorTrack(definition, this.config.clock())
      this.tracks.set(definition.hash, track)
      this.config.logger.info('Tracking asset', definition.getName(), definition.hash)
      return track
    })
  }

  getColorDefinitions(): ColorDefinition[] {
    return this.lock.runExclusive(() => [...this.tracks.values()].map((track) => track.getDefinition()))
  }

  getColorTracks(): ColorTrack[] {
    return this.lock.runExclusive(() => [...this.tracks.values()])
  }

  getColorTrackByHash(hash: string): ColorTrack | undefined {
    return this.lock.runExclusive(() => this.tracks.get(hash))
  }

  getColorTrackByDefinition(definition: ColorDefinition): ColorTrack | undefined {
    return this.getColorTrackByHash(definition.hash)
  }

  // ---------------------------------------------------------------------------
  // Ledger Events
  // ---------------------------------------------------------------------------

  /** A peer announced a transaction that is not in a block yet */
  onTransaction(tx: Transaction): void {
    this.lock.runExclusive(() => {
      this.pending.set(getTxid(tx), tx)
    })
  }

  /**
   * Whether a transaction may move a colored asset. Any transaction carrying
   * the marker qualifies, since the asset behind a marked output cannot be
   * known before its history is replayed.
   */
  isTransactionRelevant(tx: Transaction): boolean {
    return this.lock.runExclusive(() => this.isRelevant(tx))
  }

  /**
   * A transaction was confirmed in a block.
   *
   * @param relativityOffset - Position of the transaction inside the block
   */
  receiveFromBlock(tx: Transaction, block: BlockRef, blockType: NewBlockType, relativityOffset: number): void {
    this.lock.runExclusive(() => {
      this.receive(tx, block, blockType, relativityOffset)
    })
  }

  /**
   * A filtered block says a transaction is in it; only transactions already
   * seen as pending can be processed.
   *
   * @returns true if the transaction was known and relevant
   */
  notifyTransactionIsInBlock(txid: string, block: BlockRef, blockType: NewBlockType, relativityOffset: number): boolean {
    return this.lock.runExclusive(() => {
      const tx = this.pending.get(txid)
      this.config.logger.debug('In block', txid, block.hash, relativityOffset)
      return tx !== undefined && this.receive(tx, block, blockType, relativityOffset)
    })
  }

  /**
   * Replace a chain suffix. Transactions of the old blocks are undone, then
   * those of the new blocks are replayed, oldest block first. If any track
   * cannot follow, every track is put back as it was and the error is thrown.
   */
  reorganize(splitPoint: BlockRef, oldBlocks: BlockRef[], newBlocks: BlockRef[]): void {
    this.lock.runExclusive(() => {
      this.config.logger.info(`Reorganize at ${splitPoint.hash}: ${oldBlocks.length} -> ${newBlocks.length} blocks`)

      const newestFirst = [...oldBlocks].sort((a, b) => b.height - a.height)
      const oldestFirst = [...newBlocks].sort((a, b) => a.height - b.height)
      const snapshots = new Map<ColorTrack, ColorTrackState>()
      const applied = new Set<string>()

      try {
        for (const track of this.tracks.values()) {
          snapshots.set(track, track.snapshot())

          for (const block of newestFirst) {
            const first = this.getBlockTransactions(block.hash).find((stx) => track.contains(stx))
            // Undo truncates everything applied after `first`, which covers the rest of the block
            if (first !== undefined) {
              track.undo(first)
            }
          }

          for (const block of oldestFirst) {
            for (const stx of this.getBlockTransactions(block.hash)) {
              if (!track.contains(stx) && track.isTransactionRelevant(stx.tx)) {
                track.add(stx)
                applied.add(stx.txid)
              }
            }
          }
        }
      } catch (error) {
        for (const [track, state] of snapshots) {
          track.restore(state)
        }
        this.config.logger.error('Reorganize failed, tracks restored', error)
        throw error
      }

      for (const txid of applied) {
        this.resolveWaiter(txid)
      }
    })
  }

  /**
   * Once a block is final, an output whose asset is still unknown will stay
   * unknown, so everyone still waiting is told.
   */
  notifyNewBestBlock(block: BlockRef): void {
    this.lock.runExclusive(() => {
      for (const [txid, waiter] of this.unknownAssetWaiters) {
        this.config.logger.warn(`Asset of ${txid} still unknown at block ${block.hash}`)
        waiter.result.reject(new ScanningError(txid))
      }
      this.unknownAssetWaiters.clear()
    })
  }

  // ---------------------------------------------------------------------------
  // Peer Filter
  // ---------------------------------------------------------------------------

  /** Earliest track creation time, in unix seconds */
  getEarliestKeyCreationTime(): number {
    return this.lock.runExclusive(() => {
      let creationTime = Number.MAX_SAFE_INTEGER
      for (const track of this.tracks.values()) {
        creationTime = Math.min(creationTime, track.getCreationTime())
      }
      return creationTime
    })
  }

  getBloomFilterElementCount(): number {
    return this.lock.runExclusive(() => {
      let count = 0
      for (const track of this.tracks.values()) {
        count += track.getBloomFilterElementCount()
      }
      return count
    })
  }

  getBloomFilter(size: number, falsePositiveRate: number, tweak: number): BloomFilter {
    return this.lock.runExclusive(() => {
      const filter = BloomFilter.create(Math.max(size, 1), falsePositiveRate, tweak >>> 0)
      for (const track of this.tracks.values()) {
        track.updateBloomFilter(filter)
      }
      return filter
    })
  }

  /** Any track change can change what peers must send, so the filter is always rebuilt */
  isRequiringUpdateAllBloomFilter(): boolean {
    return true
  }

  // ---------------------------------------------------------------------------
  // Wallet Queries
  // ---------------------------------------------------------------------------

  /**
   * Net movement of assets caused by a transaction, from the wallet's point
   * of view.
   *
   * A wallet output that is marked as colored but claimed by no track is
   * counted under {@link ColorDefinition.UNKNOWN}. Entries are looked up by
   * definition hash.
   */
  getNetAssetChange(tx: Transaction, wallet: ColorWallet): AssetChange {
    return this.lock.runExclusive(() => this.computeNetAssetChange(tx, wallet))
  }

  /**
   * Resolves with `tx` once every asset it brings to the wallet is known.
   *
   * The promise is pending while a wallet output is of unknown asset; it
   * resolves when the transaction is next applied to a track and rejects with
   * a ScanningError at the next best block.
   */
  getTransactionWithKnownAssets(tx: Transaction, wallet: ColorWallet): Promise<Transaction> {
    const waiter = this.lock.runExclusive(() => {
      const change = this.computeNetAssetChange(tx, wallet)
      if (!change.has(ColorDefinition.UNKNOWN)) {
        return undefined
      }
      const txid = getTxid(tx)
      const existing = this.unknownAssetWaiters.get(txid)
      if (existing !== undefined) {
        return existing
      }
      const created: UnknownAssetWaiter = { tx, result: new Deferred<Transaction>() }
      this.unknownAssetWaiters.set(txid, created)
      return created
    })
    return waiter === undefined ? Promise.resolve(tx) : waiter.result.promise
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  getMapBlockTx(): ReadonlyMap<string, readonly SortedTransaction[]> {
    return this.lock.runExclusive(() => this.mapBlockTx)
  }

  getPending(): ReadonlyMap<string, Transaction> {
    return this.lock.runExclusive(() => this.pending)
  }

  snapshotState(): ColorScannerState {
    return this.lock.runExclusive(() => ({
      tracks: [...this.tracks.values()].map((track) => ({
        definition: track.getDefinition(),
        state: track.snapshot(),
        creationTime: track.getCreationTime()
      })),
      mapBlockTx: new Map([...this.mapBlockTx].map(([hash, txs]) => [hash, [...txs]])),
      pending: new Map(this.pending)
    }))
  }

  /**
   * Install persisted state. Definitions not tracked yet are registered.
   * Nothing is installed unless the whole state is consistent.
   *
   * @throws MalformedStateError on conflicting definitions or inconsistent tracks
   */
  restoreState(state: ColorScannerState): void {
    this.lock.runExclusive(() => {
      const known = [...this.tracks.values()].map((track) => track.getDefinition())
      const added: ColorDefinition[] = []
      for (const { definition, state: trackState } of state.tracks) {
        for (const [outpoint, value] of trackState.unspentOutputs) {
          if (trackState.outputs.get(outpoint) !== value) {
            throw new MalformedStateError(`Unspent output ${outpoint} of ${definition.getName()} is not among its outputs`)
          }
        }
        if (this.tracks.has(definition.hash)) {
          continue
        }
        try {
          this.checkDefinitionConflict(definition, [...known, ...added])
        } catch (error) {
          throw new MalformedStateError(error instanceof Error ? error.message : 'Definition conflict')
        }
        added.push(definition)
      }

      for (const { definition, state: trackState, creationTime } of state.tracks) {
        let track = this.tracks.get(definition.hash)
        if (track === undefined) {
          track = new ColorTrack(definition, creationTime)
          this.tracks.set(definition.hash, track)
          this.config.logger.info('Tracking restored asset', definition.getName(), definition.hash)
        }
        track.restore(trackState)
      }

      this.mapBlockTx = new Map()
      for (const [hash, txs] of state.mapBlockTx) {
        for (const stx of txs) {
          this.indexTransaction(hash, stx)
        }
      }
      this.pending = new Map(state.pending)
    })
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private resolveConfig(config: ColorScannerConfig): ResolvedColorScannerConfig {
    return {
      logger: config.logger ?? createLogger('ColorScanner'),
      clock: config.clock ?? (() => Math.floor(Date.now() / 1000))
    }
  }

  private checkDefinitionConflict(definition: ColorDefinition, tracked: ColorDefinition[]): void {
    if (definition.equals(ColorDefinition.UNKNOWN)) {
      throw new ColorDefinitionError('The UNKNOWN definition cannot be tracked')
    }
    for (const other of tracked) {
      if (other.equals(definition) || other.overlaps(definition)) {
        throw new ColorDefinitionError(
          `${definition.getName()} shares genesis points with tracked asset ${other.getName()}`,
          'DEFINITION_CONFLICT'
        )
      }
    }
  }

  private isRelevant(tx: Transaction): boolean {
    if (hasMarkerOutput(tx)) {
      return true
    }
    for (const track of this.tracks.values()) {
      if (track.isTransactionRelevant(tx)) {
        return true
      }
    }
    return false
  }

  private receive(tx: Transaction, block: BlockRef, blockType: NewBlockType, relativityOffset: number): boolean {
    if (!this.isRelevant(tx)) {
      return false
    }
    const stx = SortedTransaction.fromTransaction(tx, relativityOffset)
    this.config.logger.debug('Receive', stx.txid, block.hash, blockType, relativityOffset)
    this.indexTransaction(block.hash, stx)

    if (blockType === 'best-chain') {
      let applied = false
      for (const track of this.tracks.values()) {
        if (!track.contains(stx) && track.isTransactionRelevant(tx)) {
          track.add(stx)
          applied = true
        }
      }
      if (applied) {
        this.resolveWaiter(stx.txid)
      }
    }
    return true
  }

  private indexTransaction(blockHash: string, stx: SortedTransaction): void {
    const txs = this.mapBlockTx.get(blockHash) ?? []
    if (txs.some((existing) => existing.txid === stx.txid)) {
      return
    }
    txs.push(stx)
    txs.sort(SortedTransaction.compare)
    this.mapBlockTx.set(blockHash, txs)
  }

  private getBlockTransactions(blockHash: string): readonly SortedTransaction[] {
    return this.mapBlockTx.get(blockHash) ?? []
  }

  private resolveWaiter(txid: string): void {
    const waiter = this.unknownAssetWaiters.get(txid)
    if (waiter === undefined) {
      return
    }
    this.unknownAssetWaiters.delete(txid)
    waiter.result.resolve(waiter.tx)
  }

  private findTrackForOutput(outpoint: OutpointString): ColorTrack | undefined {
    for (const track of this.tracks.values()) {
      if (track.getOutputs().has(outpoint)) {
        return track
      }
    }
    return undefined
  }

  private computeNetAssetChange(tx: Transaction, wallet: ColorWallet): AssetChange {
    const result = new AssetChange()

    const txid = getTxid(tx)
    for (const outputIndex of getColoredOutputIndexes(tx)) {
      const output = tx.outputs[outputIndex]
      if (!wallet.isMine(output)) {
        continue
      }
      const outpoint = getOutputOutpoint(txid, outputIndex)
      const track = this.findTrackForOutput(outpoint)
      const value = track?.getOutputs().get(outpoint)
      if (track !== undefined && value !== undefined) {
        result.add(track.getDefinition(), value)
      } else {
        result.add(ColorDefinition.UNKNOWN, removeMsbdropValuePadding(output.satoshis ?? 0))
      }
    }

    for (const input of tx.inputs) {
      if (!this.isInputMine(input, wallet)) {
        continue
      }
      const outpoint = getInputOutpoint(input)
      const track = this.findTrackForOutput(outpoint)
      const value = track?.getOutputs().get(outpoint)
      if (track !== undefined && value !== undefined) {
        result.add(track.getDefinition(), -value)
      }
    }

    result.prune()
    return result
  }

  /**
   * An input is the wallet's when the output it spends is. The connected
   * output may be change returned to a sender, in which case it is not.
   */
  private isInputMine(input: TransactionInput, wallet: ColorWallet): boolean {
    const connected = this.getConnectedOutput(input, wallet)
    return connected !== undefined && wallet.isMine(connected)
  }

  private getConnectedOutput(input: TransactionInput, wallet: ColorWallet): TransactionOutput | undefined {
    const { txid, outputIndex } = parseOutpoint(getInputOutpoint(input))
    for (const pool of CONNECTED_POOLS) {
      const source = wallet.getTransactionPool(pool).get(txid)
      if (source !== undefined) {
        return source.outputs[outputIndex]
      }
    }
    return undefined
  }
}
