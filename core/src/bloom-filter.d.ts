// The bloom-filter package ships no type declarations.
declare module 'bloom-filter' {
  class BloomFilter {
    constructor(options: BloomFilter.Options)
    static create(elements: number, falsePositiveRate: number, nTweak?: number, nFlags?: number): BloomFilter
    vData: number[]
    nHashFuncs: number
    nTweak: number
    nFlags: number
    insert(data: Buffer): BloomFilter
    contains(data: Buffer): boolean
    clear(): void
    toObject(): BloomFilter.Options
  }

  namespace BloomFilter {
    interface Options {
      vData: number[]
      nHashFuncs: number
      nTweak?: number
      nFlags?: number
    }
  }

  export = BloomFilter
}
