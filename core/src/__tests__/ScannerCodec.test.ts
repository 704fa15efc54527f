/**
 * ScannerCodec and ColorWalletExtension Tests
 */

import { Utils } from '@bsv/sdk'
import { ColorDefinition } from '../ColorDefinition.js'
import { ColorScanner } from '../ColorScanner.js'
import { ColorWalletExtension } from '../ColorWalletExtension.js'
import { txOutGenesisPoint } from '../GenesisPoint.js'
import { ScannerCodec } from '../ScannerCodec.js'
import { MalformedStateError } from '../errors.js'
import { silentLogger } from '../logging.js'
import { makeAssetValue } from '../valuePadding.js'
import { TestWallet, ZERO_TXID, block, createTransaction, markerOutput, p2pkhScript, spend } from './fixtures.js'

const CREATED_AT = 1_700_000_000

const genesisTx = createTransaction(
  [{ txid: ZERO_TXID, index: 0 }],
  [{ satoshis: makeAssetValue(10), lockingScript: p2pkhScript(1) }, markerOutput()]
)
const widgets = new ColorDefinition([txOutGenesisPoint(genesisTx.id('hex'), 0)], { name: 'widgets' })
const tx2 = createTransaction(
  [spend(genesisTx, 0)],
  [{ satoshis: makeAssetValue(5), lockingScript: p2pkhScript(2) }, { satoshis: makeAssetValue(5), lockingScript: p2pkhScript(1) }, markerOutput()]
)
const tx3 = createTransaction(
  [spend(tx2, 0)],
  [{ satoshis: makeAssetValue(2), lockingScript: p2pkhScript(2) }, markerOutput()]
)
const altTx2 = createTransaction(
  [spend(genesisTx, 0)],
  [{ satoshis: makeAssetValue(7), lockingScript: p2pkhScript(3) }, markerOutput()]
)

const block1 = block('block1', 1)
const block2 = block('block2', 2)
const block3 = block('block3', 3)
const altBlock2 = block('alt-block2', 2)

const newScanner = (clock = () => CREATED_AT): ColorScanner => new ColorScanner({ logger: silentLogger, clock })

const trackOf = (scanner: ColorScanner) => {
  const track = scanner.getColorTrackByHash(widgets.hash)
  if (track === undefined) {
    throw new Error('widgets is not tracked')
  }
  return track
}

/** Scanner state with a single track and nothing else, written by hand */
function handWrittenState(options: {
  hash: string
  description: string
  unspent?: Array<[string, number, number]>
  pending?: number[][]
}): number[] {
  const writer = new Utils.Writer()
  writer.writeVarIntNum(1)
  writer.writeVarIntNum(1)
  writer.writeVarIntNum(0)
  const unspent = options.unspent ?? []
  writer.writeVarIntNum(unspent.length)
  for (const [txid, index, amount] of unspent) {
    writer.write(Utils.toArray(txid, 'hex'))
    writer.writeUInt32LE(index)
    writer.writeVarIntNum(amount)
  }
  writer.writeVarIntNum(0)
  writer.writeVarIntNum(0)
  writer.write(Utils.toArray(options.hash, 'hex'))
  const description = Utils.toArray(options.description, 'utf8')
  writer.writeVarIntNum(description.length)
  writer.write(description)
  writer.writeVarIntNum(0)
  const pending = options.pending ?? []
  writer.writeVarIntNum(pending.length)
  for (const raw of pending) {
    writer.writeVarIntNum(raw.length)
    writer.write(raw)
  }
  return writer.toArray()
}

describe('ScannerCodec', () => {
  let scanner: ColorScanner
  let bytes: number[]

  beforeEach(() => {
    scanner = newScanner()
    scanner.addDefinition(widgets)
    scanner.receiveFromBlock(genesisTx, block1, 'best-chain', 0)
    scanner.receiveFromBlock(tx2, block2, 'best-chain', 0)
    scanner.receiveFromBlock(altTx2, altBlock2, 'side-chain', 0)
    scanner.onTransaction(tx3)
    bytes = ScannerCodec.encode(scanner)
  })

  describe('round trip', () => {
    it('should materialize definitions the scanner does not track yet', () => {
      const restored = newScanner(() => 42)
      ScannerCodec.decode(bytes, restored)

      const [definition] = restored.getColorDefinitions()
      expect(restored.getColorDefinitions()).toHaveLength(1)
      expect(definition.hash).toBe(widgets.hash)
      expect(definition.getName()).toBe('widgets')
      expect(trackOf(restored).getCreationTime()).toBe(CREATED_AT)
    })

    it('should reuse a definition the scanner already tracks', () => {
      const restored = newScanner()
      restored.addDefinition(widgets)
      ScannerCodec.decode(bytes, restored)

      expect(restored.getColorDefinitions()).toHaveLength(1)
      expect(trackOf(restored).getDefinition()).toBe(widgets)
    })

    it('should restore track provenance', () => {
      const restored = newScanner()
      ScannerCodec.decode(bytes, restored)

      const original = trackOf(scanner)
      const track = trackOf(restored)
      expect([...track.getOutputs()]).toEqual([...original.getOutputs()])
      expect([...track.getUnspentOutputs()]).toEqual([...original.getUnspentOutputs()])
      expect(track.getTransactions().map((stx) => stx.txid)).toEqual([genesisTx.id('hex'), tx2.id('hex')])
      expect(track.getTransactions().map((stx) => stx.raw)).toEqual([genesisTx.toBinary(), tx2.toBinary()])
    })

    it('should restore the block index and pending transactions', () => {
      const restored = newScanner()
      ScannerCodec.decode(bytes, restored)

      const index = restored.getMapBlockTx()
      expect([...index.keys()]).toEqual([block1.hash, block2.hash, altBlock2.hash])
      expect(index.get(altBlock2.hash)?.map((stx) => stx.txid)).toEqual([altTx2.id('hex')])
      expect([...restored.getPending().keys()]).toEqual([tx3.id('hex')])
    })

    it('should write back the bytes it read', () => {
      const restored = newScanner()
      ScannerCodec.decode(bytes, restored)

      expect(ScannerCodec.encode(restored)).toEqual(bytes)
    })

    it('should keep tracking from the restored state', () => {
      const restored = newScanner()
      ScannerCodec.decode(bytes, restored)

      expect(restored.notifyTransactionIsInBlock(tx3.id('hex'), block3, 'best-chain', 0)).toBe(true)
      expect([...trackOf(restored).getUnspentOutputs()]).toEqual([
        [`${tx2.id('hex')}.1`, 5],
        [`${tx3.id('hex')}.0`, 2]
      ])
    })

    it('should report asset changes for definitions held outside the scanner', () => {
      const restored = newScanner()
      ScannerCodec.decode(bytes, restored)
      const wallet = new TestWallet().own(p2pkhScript(2))

      expect(trackOf(restored).getDefinition()).not.toBe(widgets)
      expect(restored.getNetAssetChange(tx2, wallet).get(widgets)).toBe(5)
    })

    it('should reorganize onto a side chain from the restored index', () => {
      const restored = newScanner()
      ScannerCodec.decode(bytes, restored)
      restored.reorganize(block1, [block2], [altBlock2])

      expect([...trackOf(restored).getUnspentOutputs()]).toEqual([[`${altTx2.id('hex')}.0`, 7]])
    })
  })

  describe('malformed data', () => {
    const consistent = { hash: widgets.hash, description: JSON.stringify(widgets.toJSON()) }
    const expectUntouched = (restored: ColorScanner): void => {
      expect(restored.getColorTracks()).toHaveLength(0)
      expect(restored.getMapBlockTx().size).toBe(0)
      expect(restored.getPending().size).toBe(0)
    }

    it('should reject truncated data', () => {
      const restored = newScanner()
      expect(() => ScannerCodec.decode(bytes.slice(0, bytes.length - 1), restored)).toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject an unsupported version', () => {
      const restored = newScanner()
      expect(() => ScannerCodec.decode([2, ...bytes.slice(1)], restored)).toThrow('Unsupported state version 2')
      expectUntouched(restored)
    })

    it('should reject trailing bytes', () => {
      const restored = newScanner()
      expect(() => ScannerCodec.decode([...bytes, 0], restored)).toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject empty data', () => {
      expect(() => ScannerCodec.decode([], newScanner())).toThrow(MalformedStateError)
    })

    it('should accept a consistent hand-written state', () => {
      const restored = newScanner()
      ScannerCodec.decode(handWrittenState({ hash: widgets.hash, description: JSON.stringify(widgets.toJSON()) }), restored)

      expect(restored.getColorDefinitions().map((definition) => definition.hash)).toEqual([widgets.hash])
      expect(trackOf(restored).getCreationTime()).toBe(0)
    })

    it('should accept a well-formed pending transaction', () => {
      const restored = newScanner()
      ScannerCodec.decode(handWrittenState({ ...consistent, pending: [tx3.toBinary()] }), restored)

      expect([...restored.getPending().keys()]).toEqual([tx3.id('hex')])
    })

    it('should reject garbage transaction bytes', () => {
      const restored = newScanner()

      expect(() => ScannerCodec.decode(handWrittenState({ ...consistent, pending: [[1, 2, 3]] }), restored))
        .toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject a truncated transaction', () => {
      const restored = newScanner()

      expect(() => ScannerCodec.decode(handWrittenState({ ...consistent, pending: [tx2.toBinary().slice(0, 20)] }), restored))
        .toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject bytes trailing a transaction', () => {
      const restored = newScanner()

      expect(() => ScannerCodec.decode(handWrittenState({ ...consistent, pending: [[...tx2.toBinary(), 0]] }), restored))
        .toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject a description that does not match its hash', () => {
      const restored = newScanner()
      const state = handWrittenState({ hash: 'ff'.repeat(32), description: JSON.stringify(widgets.toJSON()) })

      expect(() => ScannerCodec.decode(state, restored)).toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject an unreadable description', () => {
      const state = handWrittenState({ hash: 'ff'.repeat(32), description: 'not json' })
      expect(() => ScannerCodec.decode(state, newScanner())).toThrow(MalformedStateError)
    })

    it('should reject unspent outputs missing from the outputs table', () => {
      const restored = newScanner()
      const state = handWrittenState({
        hash: widgets.hash,
        description: JSON.stringify(widgets.toJSON()),
        unspent: [['aa'.repeat(32), 0, 5]]
      })

      expect(() => ScannerCodec.decode(state, restored)).toThrow(MalformedStateError)
      expectUntouched(restored)
    })

    it('should reject a definition conflicting with a tracked one', () => {
      const restored = newScanner()
      const wider = new ColorDefinition([txOutGenesisPoint(genesisTx.id('hex'), 0), txOutGenesisPoint('cc'.repeat(32), 1)])
      restored.addDefinition(wider)

      expect(() => ScannerCodec.decode(bytes, restored)).toThrow(MalformedStateError)
      expect(restored.getColorDefinitions()).toEqual([wider])
      expect(restored.getMapBlockTx().size).toBe(0)
    })
  })
})

describe('ColorWalletExtension', () => {
  it('should identify itself as an optional extension', () => {
    const extension = new ColorWalletExtension(newScanner())
    expect(extension.getWalletExtensionID()).toBe('org.smartcolors')
    expect(extension.isWalletExtensionMandatory()).toBe(false)
  })

  it('should carry scanner state through wallet storage', () => {
    const scanner = newScanner()
    scanner.addDefinition(widgets)
    scanner.receiveFromBlock(genesisTx, block1, 'best-chain', 0)
    const stored = new ColorWalletExtension(scanner).serializeWalletExtension()

    const loaded = new ColorWalletExtension(newScanner())
    loaded.deserializeWalletExtension(stored)

    expect([...trackOf(loaded.getScanner()).getUnspentOutputs()]).toEqual([[`${genesisTx.id('hex')}.0`, 10]])
  })
})
