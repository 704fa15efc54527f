import type { ColorDefinition } from './ColorDefinition.js'

/**
 * Signed asset amounts keyed by definition. Definitions are matched by hash,
 * so any instance describing the same asset finds the same entry.
 */
export class AssetChange implements Iterable<[ColorDefinition, number]> {
  private readonly amounts = new Map<string, { definition: ColorDefinition, amount: number }>()

  get size(): number {
    return this.amounts.size
  }

  get(definition: ColorDefinition): number | undefined {
    return this.amounts.get(definition.hash)?.amount
  }

  has(definition: ColorDefinition): boolean {
    return this.amounts.has(definition.hash)
  }

  /** Adds `amount` to the running total for `definition` */
  add(definition: ColorDefinition, amount: number): void {
    const entry = this.amounts.get(definition.hash)
    if (entry === undefined) {
      this.amounts.set(definition.hash, { definition, amount })
    } else {
      entry.amount += amount
    }
  }

  /** Drops every asset whose total is zero */
  prune(): void {
    for (const [hash, { amount }] of this.amounts) {
      if (amount === 0) {
        this.amounts.delete(hash)
      }
    }
  }

  definitions(): ColorDefinition[] {
    return [...this.amounts.values()].map(({ definition }) => definition)
  }

  * [Symbol.iterator](): Iterator<[ColorDefinition, number]> {
    for (const { definition, amount } of this.amounts.values()) {
      yield [definition, amount]
    }
  }
}
