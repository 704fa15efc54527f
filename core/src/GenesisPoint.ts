/**
 * GenesisPoint - where an asset's supply is minted
 *
 * Genesis points are a tagged union so new kinds can be added without
 * touching the code that orders, hashes or stores them.
 */

import { Utils } from '@bsv/sdk'
import { ColorDefinitionError } from './errors.js'
import { getOutputOutpoint } from './coloring.js'

/**
 * The output at `outpoint` is minted with the amount encoded in its value.
 */
export interface TxOutGenesisPoint {
  kind: 'tx-out'
  outpoint: {
    txid: string
    index: number
  }
}

export type GenesisPoint = TxOutGenesisPoint

/** Serialized description of a genesis point */
export interface GenesisPointJSON {
  type: GenesisPoint['kind']
  outpoint: string
}

const KIND_ORDER: Record<GenesisPoint['kind'], number> = {
  'tx-out': 1
}

export function txOutGenesisPoint(txid: string, index: number): TxOutGenesisPoint {
  if (!/^[a-fA-F0-9]{64}$/.test(txid)) {
    throw new ColorDefinitionError(`Invalid genesis txid: ${txid}`)
  }
  if (!Number.isInteger(index) || index < 0 || index > 0xffffffff) {
    throw new ColorDefinitionError(`Invalid genesis output index: ${index}`)
  }
  return { kind: 'tx-out', outpoint: { txid: txid.toLowerCase(), index } }
}

/**
 * Total order over genesis points: kind, then txid, then output index.
 */
export function compareGenesisPoints(a: GenesisPoint, b: GenesisPoint): number {
  if (a.kind !== b.kind) {
    return KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
  }
  if (a.outpoint.txid !== b.outpoint.txid) {
    return a.outpoint.txid < b.outpoint.txid ? -1 : 1
  }
  return a.outpoint.index - b.outpoint.index
}

export function genesisPointKey(point: GenesisPoint): string {
  return `${point.kind}:${getOutputOutpoint(point.outpoint.txid, point.outpoint.index)}`
}

/** Binary form: kind byte, 32-byte txid, uint32 LE output index */
export function writeGenesisPoint(writer: Utils.Writer, point: GenesisPoint): void {
  writer.writeUInt8(KIND_ORDER[point.kind])
  writer.write(Utils.toArray(point.outpoint.txid, 'hex'))
  writer.writeUInt32LE(point.outpoint.index)
}

export function genesisPointToJSON(point: GenesisPoint): GenesisPointJSON {
  return {
    type: point.kind,
    outpoint: getOutputOutpoint(point.outpoint.txid, point.outpoint.index)
  }
}

export function genesisPointFromJSON(json: unknown): GenesisPoint {
  if (typeof json !== 'object' || json === null) {
    throw new ColorDefinitionError('Genesis point must be an object')
  }
  const type = 'type' in json ? json.type : undefined
  const outpoint = 'outpoint' in json ? json.outpoint : undefined
  if (type !== 'tx-out') {
    throw new ColorDefinitionError(`Unsupported genesis point type: ${String(type)}`)
  }
  if (typeof outpoint !== 'string') {
    throw new ColorDefinitionError('Genesis point outpoint must be a string')
  }
  const parts = outpoint.split('.')
  if (parts.length !== 2 || !/^\d+$/.test(parts[1])) {
    throw new ColorDefinitionError(`Invalid genesis outpoint: ${outpoint}`)
  }
  return txOutGenesisPoint(parts[0], Number(parts[1]))
}
