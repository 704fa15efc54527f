/**
 * Stateless views over ledger transactions: outpoints, the marker output and
 * the sequence-number bitmask that says which outputs carry color.
 */

import type { Script, Transaction, TransactionInput } from '@bsv/sdk'
import { DEFAULT_SEQUENCE, MARKER_SCRIPT_HEX, MAX_COLORED_OUTPUTS } from './constants.js'
import { ContractViolationError } from './errors.js'
import type { OutpointString } from './types.js'

export function getTxid(tx: Transaction): string {
  return tx.id('hex')
}

export function getOutputOutpoint(txid: string, outputIndex: number): OutpointString {
  return `${txid}.${outputIndex}`
}

export function getInputOutpoint(input: TransactionInput): OutpointString {
  const sourceTxid = input.sourceTXID ?? input.sourceTransaction?.id('hex')
  if (sourceTxid === undefined) {
    throw new ContractViolationError('Input does not reference a source transaction')
  }
  return getOutputOutpoint(sourceTxid, input.sourceOutputIndex)
}

export function parseOutpoint(outpoint: OutpointString): { txid: string, outputIndex: number } {
  const [txid, outputIndexStr] = outpoint.split('.')
  return { txid, outputIndex: Number(outputIndexStr) }
}

/** True if the script is exactly `OP_RETURN <marker>` */
export function isMarkerScript(script: Script): boolean {
  return script.toHex() === MARKER_SCRIPT_HEX
}

export function hasMarkerOutput(tx: Transaction): boolean {
  return tx.outputs.some((output) => isMarkerScript(output.lockingScript))
}

/**
 * Bitwise AND of every input's sequence number, as an unsigned 32-bit value.
 */
export function getColorMask(tx: Transaction): number {
  let mask = DEFAULT_SEQUENCE
  for (const input of tx.inputs) {
    mask = (mask & (input.sequence ?? DEFAULT_SEQUENCE)) >>> 0
  }
  return mask
}

/**
 * Indexes of the outputs marked as colored, in output order. Bit `i` of the
 * mask (least significant first) colors output `i`.
 */
export function getColoredOutputIndexes(tx: Transaction): number[] {
  const mask = getColorMask(tx)
  const indexes: number[] = []
  const limit = Math.min(tx.outputs.length, MAX_COLORED_OUTPUTS)
  for (let i = 0; i < limit; i++) {
    if (((mask >>> i) & 1) === 1) {
      indexes.push(i)
    }
  }
  return indexes
}
