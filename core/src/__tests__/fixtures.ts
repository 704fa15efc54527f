/**
 * Shared builders for the engine tests. Transactions are unsigned; only their
 * structure and ids matter to color tracking.
 */

import { Hash, LockingScript, P2PKH, Transaction, UnlockingScript, Utils } from '@bsv/sdk'
import type { TransactionOutput } from '@bsv/sdk'
import { MARKER_SCRIPT_HEX } from '../constants.js'
import type { BlockRef, ColorWallet, TransactionPool } from '../types.js'

export const ZERO_TXID = '00'.repeat(32)

export interface InputSpec {
  txid: string
  index: number
  sequence?: number
}

export interface OutputSpec {
  satoshis: number
  lockingScript: LockingScript
}

export function markerScript(): LockingScript {
  return LockingScript.fromHex(MARKER_SCRIPT_HEX)
}

export function markerOutput(): OutputSpec {
  return { satoshis: 0, lockingScript: markerScript() }
}

/** Deterministic pay-to-public-key-hash script, one per seed */
export function p2pkhScript(seed: number): LockingScript {
  return new P2PKH().lock(new Array<number>(20).fill(seed))
}

export function createTransaction(inputs: InputSpec[], outputs: OutputSpec[]): Transaction {
  const tx = new Transaction()
  for (const input of inputs) {
    tx.addInput({
      sourceTXID: input.txid,
      sourceOutputIndex: input.index,
      unlockingScript: new UnlockingScript(),
      sequence: input.sequence ?? 0xffffffff
    })
  }
  for (const output of outputs) {
    tx.addOutput({ satoshis: output.satoshis, lockingScript: output.lockingScript })
  }
  return tx
}

export function spend(tx: Transaction, index: number, sequence?: number): InputSpec {
  return { txid: tx.id('hex'), index, sequence }
}

export function block(label: string, height: number): BlockRef {
  return { hash: Utils.toHex(Hash.sha256(Utils.toArray(label, 'utf8'))), height }
}

/**
 * In-memory wallet: owns the scripts it is given and keeps its transactions
 * in the pools the scanner asks about.
 */
export class TestWallet implements ColorWallet {
  private readonly owned = new Set<string>()
  private readonly pools: Record<TransactionPool, Map<string, Transaction>> = {
    unspent: new Map(),
    spent: new Map(),
    pending: new Map()
  }

  constructor(private readonly ownsEveryP2pkh = false) {}

  own(script: LockingScript): this {
    this.owned.add(script.toHex())
    return this
  }

  addTransaction(tx: Transaction, pool: TransactionPool = 'unspent'): this {
    this.pools[pool].set(tx.id('hex'), tx)
    return this
  }

  isMine(output: TransactionOutput): boolean {
    const hex = output.lockingScript.toHex()
    if (this.ownsEveryP2pkh && hex.startsWith('76a914')) {
      return true
    }
    return this.owned.has(hex)
  }

  getTransactionPool(pool: TransactionPool): ReadonlyMap<string, Transaction> {
    return this.pools[pool]
  }
}
