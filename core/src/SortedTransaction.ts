import { Hash, Transaction, Utils } from '@bsv/sdk'
import { MalformedStateError } from './errors.js'

/**
 * A transaction paired with its position inside a block. Outputs of an
 * earlier transaction may be spent by a later one in the same block, so
 * replay follows `index`.
 *
 * The raw bytes are kept as received so persisted state writes back exactly
 * what the ledger delivered.
 */
export class SortedTransaction {
  readonly txid: string

  private constructor(
    readonly tx: Transaction,
    readonly index: number,
    readonly raw: readonly number[]
  ) {
    this.txid = Utils.toHex(Hash.hash256([...raw]).reverse())
  }

  static fromTransaction(tx: Transaction, index: number): SortedTransaction {
    return new SortedTransaction(tx, index, tx.toBinary())
  }

  /**
   * Parse stored bytes. They must hold exactly one transaction that
   * serializes back to the same bytes.
   *
   * @throws MalformedStateError otherwise
   */
  static fromBinary(raw: number[], index: number): SortedTransaction {
    const reader = new Utils.Reader(raw)
    const tx = Transaction.fromReader(reader)
    if (reader.pos !== raw.length) {
      throw new MalformedStateError(`Transaction spans ${reader.pos} of ${raw.length} bytes`)
    }
    const written = tx.toBinary()
    if (written.length !== raw.length || written.some((byte, i) => byte !== raw[i])) {
      throw new MalformedStateError('Transaction does not serialize back to its stored bytes')
    }
    return new SortedTransaction(tx, index, [...raw])
  }

  static compare(a: SortedTransaction, b: SortedTransaction): number {
    if (a.index !== b.index) {
      return a.index - b.index
    }
    if (a.txid === b.txid) {
      return 0
    }
    return a.txid < b.txid ? -1 : 1
  }
}
