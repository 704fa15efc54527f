/**
 * ColorTrack - provenance of one asset
 *
 * A track replays the transactions that move its asset and keeps:
 * - every output ever known to carry the asset (`outputs`)
 * - the subset that is still unspent (`unspentOutputs`)
 * - the transactions applied so far, in application order
 *
 * Value only enters a track through a genesis output or by carrying forward
 * already-colored inputs. Tracks have no locking of their own; the scanner
 * holds its lock around every mutation.
 */

import type { Transaction } from '@bsv/sdk'
import { ColorDefinition } from './ColorDefinition.js'
import { SortedTransaction } from './SortedTransaction.js'
import { SMART_ASSET_MARKER_BYTES } from './constants.js'
import {
  getColoredOutputIndexes,
  getInputOutpoint,
  getOutputOutpoint,
  getTxid
} from './coloring.js'
import { ContractViolationError, MalformedStateError, assertContract } from './errors.js'
import type { BloomFilterSink, ColorTrackState, OutpointString } from './types.js'
import { removeMsbdropValuePadding } from './valuePadding.js'

type TransactionLike = Transaction | SortedTransaction

const toSorted = (tx: TransactionLike, index: number): SortedTransaction =>
  tx instanceof SortedTransaction ? tx : SortedTransaction.fromTransaction(tx, index)

const txidOf = (tx: TransactionLike): string =>
  tx instanceof SortedTransaction ? tx.txid : getTxid(tx)

export class ColorTrack {
  private outputs = new Map<OutpointString, number>()
  private unspentOutputs = new Map<OutpointString, number>()
  private transactions: SortedTransaction[] = []
  private appliedTxids = new Set<string>()

  constructor(
    private readonly definition: ColorDefinition,
    private readonly creationTime: number = Math.floor(Date.now() / 1000)
  ) {
    assertContract(!definition.equals(ColorDefinition.UNKNOWN), 'Cannot track the UNKNOWN definition')
  }

  getDefinition(): ColorDefinition {
    return this.definition
  }

  /** Unix seconds; chain sync must start no later than this */
  getCreationTime(): number {
    return this.creationTime
  }

  getOutputs(): ReadonlyMap<OutpointString, number> {
    return this.outputs
  }

  getUnspentOutputs(): ReadonlyMap<OutpointString, number> {
    return this.unspentOutputs
  }

  getTransactions(): readonly SortedTransaction[] {
    return this.transactions
  }

  /**
   * True if the transaction spends an output of this asset or mints it.
   */
  isTransactionRelevant(tx: Transaction): boolean {
    if (this.definition.isGenesisTransaction(getTxid(tx))) {
      return true
    }
    return tx.inputs.some((input) => this.outputs.has(getInputOutpoint(input)))
  }

  contains(tx: TransactionLike): boolean {
    return this.appliedTxids.has(txidOf(tx))
  }

  /**
   * Replay a transaction: spend its colored inputs and color its outputs.
   *
   * @param tx - Transaction to apply, or a block-sorted one
   * @param index - Position in its block when `tx` is a bare transaction
   * @throws ContractViolationError if the transaction is irrelevant or already applied
   */
  add(tx: TransactionLike, index = 0): void {
    const sorted = toSorted(tx, index)
    if (this.appliedTxids.has(sorted.txid)) {
      throw new ContractViolationError(`Transaction ${sorted.txid} is already applied to ${this.definition.getName()}`)
    }
    if (!this.isTransactionRelevant(sorted.tx)) {
      throw new ContractViolationError(`Transaction ${sorted.txid} is not relevant to ${this.definition.getName()}`)
    }

    const txid = sorted.txid
    const outputs = sorted.tx.outputs

    let colorIn = 0
    for (const input of sorted.tx.inputs) {
      const outpoint = getInputOutpoint(input)
      const value = this.outputs.get(outpoint)
      if (value === undefined) {
        continue
      }
      this.unspentOutputs.delete(outpoint)
      colorIn += value
    }

    if (this.definition.isGenesisTransaction(txid)) {
      // Genesis outputs are minted from their own value; colored inputs are burned
      for (const outputIndex of this.definition.getGenesisOutputIndexes(txid)) {
        const output = outputs[outputIndex]
        if (output === undefined) {
          continue
        }
        this.colorOutput(getOutputOutpoint(txid, outputIndex), removeMsbdropValuePadding(output.satoshis ?? 0))
      }
    } else {
      for (const outputIndex of getColoredOutputIndexes(sorted.tx)) {
        const amount = removeMsbdropValuePadding(outputs[outputIndex].satoshis ?? 0)
        if (amount === 0) {
          continue
        }
        // Outputs are funded in order; the first one that cannot be covered ends allocation
        if (amount > colorIn) {
          break
        }
        colorIn -= amount
        this.colorOutput(getOutputOutpoint(txid, outputIndex), amount)
      }
    }

    this.transactions.push(sorted)
    this.appliedTxids.add(txid)
  }

  /**
   * Reverse a transaction and every transaction applied after it, newest
   * first. Later transactions in the same block may spend its outputs, so
   * they cannot stay once it is gone.
   *
   * @throws ContractViolationError if the transaction was never applied
   */
  undo(tx: TransactionLike): void {
    const txid = txidOf(tx)
    const position = this.transactions.findIndex((applied) => applied.txid === txid)
    if (position < 0) {
      throw new ContractViolationError(`Transaction ${txid} is not applied to ${this.definition.getName()}`)
    }

    while (this.transactions.length > position) {
      const last = this.transactions.pop()
      if (last === undefined) break
      this.revert(last)
    }
  }

  private revert(sorted: SortedTransaction): void {
    for (let i = 0; i < sorted.tx.outputs.length; i++) {
      const outpoint = getOutputOutpoint(sorted.txid, i)
      this.outputs.delete(outpoint)
      this.unspentOutputs.delete(outpoint)
    }
    for (const input of sorted.tx.inputs) {
      const outpoint = getInputOutpoint(input)
      const value = this.outputs.get(outpoint)
      if (value !== undefined) {
        this.unspentOutputs.set(outpoint, value)
      }
    }
    this.appliedTxids.delete(sorted.txid)
  }

  private colorOutput(outpoint: OutpointString, amount: number): void {
    this.outputs.set(outpoint, amount)
    this.unspentOutputs.set(outpoint, amount)
  }

  /**
   * Every colored transfer carries the marker output, so the marker payload
   * is the one element peers need to match.
   */
  updateBloomFilter(filter: BloomFilterSink): void {
    filter.insert(Buffer.from(SMART_ASSET_MARKER_BYTES))
  }

  getBloomFilterElementCount(): number {
    return 1
  }

  /** Copy of the provenance state, for rollback and persistence */
  snapshot(): ColorTrackState {
    return {
      outputs: new Map(this.outputs),
      unspentOutputs: new Map(this.unspentOutputs),
      transactions: [...this.transactions]
    }
  }

  /**
   * Replace the provenance state wholesale.
   *
   * @throws MalformedStateError if an unspent output is not a known output
   */
  restore(state: ColorTrackState): void {
    for (const [outpoint, value] of state.unspentOutputs) {
      if (state.outputs.get(outpoint) !== value) {
        throw new MalformedStateError(`Unspent output ${outpoint} of ${this.definition.getName()} is not among its outputs`)
      }
    }
    this.outputs = new Map(state.outputs)
    this.unspentOutputs = new Map(state.unspentOutputs)
    this.transactions = [...state.transactions]
    this.appliedTxids = new Set(state.transactions.map((sorted) => sorted.txid))
  }
}
