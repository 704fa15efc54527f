/**
 * ScannerCodec - durable form of the scanner state
 *
 * Layout (varints are Bitcoin-style):
 *
 * ```
 * varint version
 * varint trackCount, per track:
 *   varint outputCount,   per output: 32-byte txid, uint32 LE index, varint amount
 *   varint unspentCount,  same layout
 *   varint txCount,       per tx: varint index, varint length, raw tx
 *   varint creationTime
 *   32-byte definition hash, varint length, UTF-8 JSON description
 * varint blockEntryCount, per entry: 32-byte block hash, varint index, varint length, raw tx
 * varint pendingCount,    per entry: varint length, raw tx
 * ```
 *
 * Raw transactions are written exactly as they were received.
 */

import { Transaction, Utils } from '@bsv/sdk'
import { ColorDefinition } from './ColorDefinition.js'
import type { ColorScanner, ColorScannerState } from './ColorScanner.js'
import { SortedTransaction } from './SortedTransaction.js'
import { getOutputOutpoint, getTxid, parseOutpoint } from './coloring.js'
import { CODEC_VERSION } from './constants.js'
import { ColorDefinitionError, MalformedStateError } from './errors.js'
import type { ColorTrackState, OutpointString } from './types.js'

const HASH_LENGTH = 32

/**
 * Bounds-checked reads over a Utils.Reader; running past the end of the data
 * is a MalformedStateError instead of a silent short read.
 */
class StateReader {
  private readonly reader: Utils.Reader

  constructor(private readonly bin: number[]) {
    this.reader = new Utils.Reader(bin)
  }

  private require(length: number, what: string): void {
    if (this.reader.pos + length > this.bin.length) {
      throw new MalformedStateError(`Truncated ${what}`)
    }
  }

  bytes(length: number, what: string): number[] {
    this.require(length, what)
    return this.reader.read(length)
  }

  hex(length: number, what: string): string {
    return Utils.toHex(this.bytes(length, what))
  }

  uint32(what: string): number {
    this.require(4, what)
    return this.reader.readUInt32LE() >>> 0
  }

  varint(what: string): number {
    this.require(1, what)
    const value = this.reader.readVarIntNum()
    if (this.reader.pos > this.bin.length || !Number.isSafeInteger(value) || value < 0) {
      throw new MalformedStateError(`Invalid ${what}`)
    }
    return value
  }

  raw(what: string): number[] {
    return this.bytes(this.varint(`${what} length`), what)
  }

  get done(): boolean {
    return this.reader.pos === this.bin.length
  }
}

function writeOutpointTable(writer: Utils.Writer, table: ReadonlyMap<OutpointString, number>): void {
  writer.writeVarIntNum(table.size)
  for (const [outpoint, amount] of table) {
    const { txid, outputIndex } = parseOutpoint(outpoint)
    writer.write(Utils.toArray(txid, 'hex'))
    writer.writeUInt32LE(outputIndex)
    writer.writeVarIntNum(amount)
  }
}

function readOutpointTable(reader: StateReader, what: string): Map<OutpointString, number> {
  const table = new Map<OutpointString, number>()
  const count = reader.varint(`${what} count`)
  for (let i = 0; i < count; i++) {
    const txid = reader.hex(HASH_LENGTH, `${what} txid`)
    const outputIndex = reader.uint32(`${what} index`)
    table.set(getOutputOutpoint(txid, outputIndex), reader.varint(`${what} amount`))
  }
  return table
}

function writeRaw(writer: Utils.Writer, raw: readonly number[]): void {
  writer.writeVarIntNum(raw.length)
  writer.write([...raw])
}

function parseSorted(raw: number[], index: number): SortedTransaction {
  try {
    return SortedTransaction.fromBinary(raw, index)
  } catch (error) {
    if (error instanceof MalformedStateError) {
      throw error
    }
    throw new MalformedStateError(`Invalid transaction: ${error instanceof Error ? error.message : 'Unknown error'}`)
  }
}

export class ScannerCodec {
  static encode(scanner: ColorScanner): number[] {
    const state = scanner.snapshotState()
    const writer = new Utils.Writer()
    writer.writeVarIntNum(CODEC_VERSION)

    writer.writeVarIntNum(state.tracks.length)
    for (const { definition, state: trackState, creationTime } of state.tracks) {
      writeOutpointTable(writer, trackState.outputs)
      writeOutpointTable(writer, trackState.unspentOutputs)
      writer.writeVarIntNum(trackState.transactions.length)
      for (const stx of trackState.transactions) {
        writer.writeVarIntNum(stx.index)
        writeRaw(writer, stx.raw)
      }
      writer.writeVarIntNum(creationTime)
      writer.write(Utils.toArray(definition.hash, 'hex'))
      writeRaw(writer, Utils.toArray(JSON.stringify(definition.toJSON()), 'utf8'))
    }

    const blockEntries = [...state.mapBlockTx].flatMap(([hash, txs]) => txs.map((stx) => ({ hash, stx })))
    writer.writeVarIntNum(blockEntries.length)
    for (const { hash, stx } of blockEntries) {
      writer.write(Utils.toArray(hash, 'hex'))
      writer.writeVarIntNum(stx.index)
      writeRaw(writer, stx.raw)
    }

    writer.writeVarIntNum(state.pending.size)
    for (const tx of state.pending.values()) {
      writeRaw(writer, tx.toBinary())
    }

    return writer.toArray()
  }

  /**
   * Parse `bytes` completely, then install the result into `scanner`.
   * Definitions the scanner does not track yet are materialized from their
   * stored description.
   *
   * @throws MalformedStateError if the data cannot be parsed; the scanner is left untouched
   */
  static decode(bytes: number[], scanner: ColorScanner): void {
    scanner.restoreState(ScannerCodec.parse(bytes, scanner))
  }

  static parse(bytes: number[], scanner: ColorScanner): ColorScannerState {
    const reader = new StateReader(bytes)
    const version = reader.varint('version')
    if (version !== CODEC_VERSION) {
      throw new MalformedStateError(`Unsupported state version ${version}`)
    }

    const tracks: ColorScannerState['tracks'] = []
    const trackCount = reader.varint('track count')
    for (let i = 0; i < trackCount; i++) {
      const outputs = readOutpointTable(reader, 'output')
      const unspentOutputs = readOutpointTable(reader, 'unspent output')
      const transactions: SortedTransaction[] = []
      const txCount = reader.varint('track transaction count')
      for (let j = 0; j < txCount; j++) {
        const index = reader.varint('track transaction index')
        transactions.push(parseSorted(reader.raw('track transaction'), index))
      }
      const creationTime = reader.varint('creation time')
      const hash = reader.hex(HASH_LENGTH, 'definition hash')
      const description = Utils.toUTF8(reader.raw('definition description'))

      const state: ColorTrackState = { outputs, unspentOutputs, transactions }
      tracks.push({ definition: ScannerCodec.resolveDefinition(hash, description, scanner), state, creationTime })
    }

    const mapBlockTx = new Map<string, SortedTransaction[]>()
    const blockEntryCount = reader.varint('block entry count')
    for (let i = 0; i < blockEntryCount; i++) {
      const hash = reader.hex(HASH_LENGTH, 'block hash')
      const index = reader.varint('block transaction index')
      const stx = parseSorted(reader.raw('block transaction'), index)
      mapBlockTx.set(hash, [...(mapBlockTx.get(hash) ?? []), stx])
    }

    const pending = new Map<string, Transaction>()
    const pendingCount = reader.varint('pending count')
    for (let i = 0; i < pendingCount; i++) {
      const { tx } = parseSorted(reader.raw('pending transaction'), 0)
      pending.set(getTxid(tx), tx)
    }

    if (!reader.done) {
      throw new MalformedStateError('Trailing bytes after scanner state')
    }
    return { tracks, mapBlockTx, pending }
  }

  private static resolveDefinition(hash: string, description: string, scanner: ColorScanner): ColorDefinition {
    const tracked = scanner.getColorTrackByHash(hash)
    if (tracked !== undefined) {
      return tracked.getDefinition()
    }

    let definition: ColorDefinition
    try {
      definition = ColorDefinition.fromJSON(description)
    } catch (error) {
      if (error instanceof ColorDefinitionError) {
        throw new MalformedStateError(`Definition ${hash}: ${error.message}`)
      }
      throw error
    }
    if (definition.hash !== hash) {
      throw new MalformedStateError(`Definition description does not match hash ${hash}`)
    }
    return definition
  }
}
