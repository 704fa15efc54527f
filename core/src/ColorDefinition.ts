/**
 * ColorDefinition - the identity of an asset
 *
 * A definition is an ordered set of genesis points plus free-form metadata.
 * Its hash covers the genesis points only, so two definitions minted from the
 * same points are the same asset whatever their metadata says.
 */

import { Hash, Utils } from '@bsv/sdk'
import { UNKNOWN_DEFINITION_HASH } from './constants.js'
import { ColorDefinitionError } from './errors.js'
import {
  GenesisPoint,
  GenesisPointJSON,
  compareGenesisPoints,
  genesisPointFromJSON,
  genesisPointKey,
  genesisPointToJSON,
  writeGenesisPoint
} from './GenesisPoint.js'

/** String-encodable description of a definition */
export interface ColorDefinitionJSON {
  genesis: GenesisPointJSON[]
  metadata: Record<string, string>
}

/**
 * @example
 * ```typescript
 * const gold = new ColorDefinition(
 *   [txOutGenesisPoint(genesisTxid, 0)],
 *   { name: 'gold' }
 * )
 * scanner.addDefinition(gold)
 * ```
 */
export class ColorDefinition {
  /**
   * Marks an output recognized as colored whose asset is not known yet.
   */
  static readonly UNKNOWN = new ColorDefinition([], { name: 'Unknown' }, true)

  readonly genesisPoints: readonly GenesisPoint[]
  readonly metadata: Readonly<Record<string, string>>
  readonly hash: string
  private readonly genesisKeys: ReadonlySet<string>

  constructor(genesisPoints: GenesisPoint[], metadata: Record<string, string> = {}, sentinel = false) {
    if (!sentinel && genesisPoints.length === 0) {
      throw new ColorDefinitionError('A color definition needs at least one genesis point')
    }

    const sorted = [...genesisPoints].sort(compareGenesisPoints)
    const unique: GenesisPoint[] = []
    for (const point of sorted) {
      const previous = unique[unique.length - 1]
      if (previous === undefined || compareGenesisPoints(previous, point) !== 0) {
        unique.push(point)
      }
    }

    this.genesisPoints = Object.freeze(unique)
    this.metadata = Object.freeze({ ...metadata })
    this.genesisKeys = new Set(unique.map(genesisPointKey))
    this.hash = sentinel ? UNKNOWN_DEFINITION_HASH : ColorDefinition.computeHash(unique)
  }

  private static computeHash(points: GenesisPoint[]): string {
    const writer = new Utils.Writer()
    for (const point of points) {
      writeGenesisPoint(writer, point)
    }
    return Utils.toHex(Hash.sha256(writer.toArray()))
  }

  getName(): string {
    return this.metadata.name ?? this.hash.slice(0, 16)
  }

  equals(other: ColorDefinition): boolean {
    return this.hash === other.hash
  }

  /** Whether any output of the transaction is a genesis point of this asset */
  isGenesisTransaction(txid: string): boolean {
    return this.genesisPoints.some((point) => point.outpoint.txid === txid)
  }

  getGenesisOutputIndexes(txid: string): number[] {
    return this.genesisPoints
      .filter((point) => point.outpoint.txid === txid)
      .map((point) => point.outpoint.index)
  }

  /** True when both definitions mint from at least one common genesis point */
  overlaps(other: ColorDefinition): boolean {
    return other.genesisPoints.some((point) => this.genesisKeys.has(genesisPointKey(point)))
  }

  toJSON(): ColorDefinitionJSON {
    return {
      genesis: this.genesisPoints.map(genesisPointToJSON),
      metadata: { ...this.metadata }
    }
  }

  static fromJSON(json: string): ColorDefinition {
    let parsed: unknown
    try {
      parsed = JSON.parse(json)
    } catch (error) {
      throw new ColorDefinitionError(`Definition is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`)
    }
    if (typeof parsed !== 'object' || parsed === null) {
      throw new ColorDefinitionError('Definition must be a JSON object')
    }

    const genesis = 'genesis' in parsed ? parsed.genesis : undefined
    if (!Array.isArray(genesis)) {
      throw new ColorDefinitionError('Definition is missing its genesis points')
    }

    const metadata: Record<string, string> = {}
    const rawMetadata = 'metadata' in parsed ? parsed.metadata : undefined
    if (rawMetadata !== undefined) {
      if (typeof rawMetadata !== 'object' || rawMetadata === null || Array.isArray(rawMetadata)) {
        throw new ColorDefinitionError('Definition metadata must be an object')
      }
      for (const [key, value] of Object.entries(rawMetadata)) {
        if (typeof value !== 'string') {
          throw new ColorDefinitionError(`Metadata value for ${key} must be a string`)
        }
        metadata[key] = value
      }
    }

    return new ColorDefinition(genesis.map(genesisPointFromJSON), metadata)
  }

  toString(): string {
    return `ColorDefinition(${this.getName()}, ${this.hash})`
  }
}
