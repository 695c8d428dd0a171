import { sha256_sync } from '@ton/crypto'

import { TonError } from '../errors'
import { copyBits, padBits, setBit } from './bits'
import { MAX_CELL_BITS } from './BitWriter'
import { CellParser } from './CellParser'
import {
  CellType,
  computeLevelMask,
  HashedNode,
  isMerkle,
  prunedEntries,
  resolveExoticType,
  validateExotic,
} from './CellType'
import { LevelMask, MAX_LEVEL } from './LevelMask'

export const MAX_CELL_REFS = 4

export interface CellOptions {
  data?: Buffer
  bitLength?: number
  refs?: readonly Cell[]
  exotic?: boolean
}

// d1: refs count, exotic flag and level mask
export const refsDescriptor = (refs: number, exotic: boolean, mask: number): number =>
  refs + (exotic ? 8 : 0) + mask * 32

// d2: ceil(bits / 8) + floor(bits / 8)
export const bitsDescriptor = (bitLength: number): number => Math.ceil(bitLength / 8) + Math.floor(bitLength / 8)

/**
 * Immutable tree node: up to 1023 data bits and 4 references. Hashes and depths for every level are
 * computed once, in the constructor, so equal cells can be shared freely.
 */
export class Cell implements HashedNode {
  static readonly EMPTY = new Cell()

  readonly type: CellType
  readonly bits: Buffer
  readonly bitLength: number
  readonly refs: readonly Cell[]
  readonly levelMask: LevelMask

  private readonly hashes: Buffer[]
  private readonly depths: number[]

  constructor(options: CellOptions = {}) {
    const bitLength = options.bitLength ?? (options.data ? options.data.length * 8 : 0)
    const refs = options.refs ?? []
    if (bitLength > MAX_CELL_BITS) {
      throw new TonError('CapacityExceeded', `cell can't hold ${bitLength} bits, max is ${MAX_CELL_BITS}`)
    }
    if (refs.length > MAX_CELL_REFS) {
      throw new TonError('TooManyReferences', `cell can't hold ${refs.length} refs, max is ${MAX_CELL_REFS}`)
    }
    const source = options.data ?? Buffer.alloc(0)
    if (source.length * 8 < bitLength) {
      throw new TonError('InvalidArgument', `${bitLength} bits requested, data holds ${source.length * 8}`)
    }
    const data = Buffer.alloc(Math.ceil(bitLength / 8))
    copyBits(data, 0, source, 0, bitLength)

    this.type = options.exotic ? resolveExoticType(data, bitLength) : CellType.Ordinary
    validateExotic(this.type, data, bitLength, refs)

    this.bits = data
    this.bitLength = bitLength
    this.refs = Object.freeze([...refs])
    this.levelMask = computeLevelMask(this.type, data, bitLength, refs)

    const { hashes, depths } = this.computeHashes()
    this.hashes = hashes
    this.depths = depths
  }

  get isExotic(): boolean {
    return this.type !== CellType.Ordinary
  }

  get level(): number {
    return this.levelMask.level
  }

  // Levels above the maximum read as the maximum.
  private levelIndex(level: number): number {
    if (!Number.isInteger(level) || level < 0) {
      throw new TonError('InvalidArgument', `cell level must be a non-negative integer, got ${level}`)
    }
    return Math.min(level, MAX_LEVEL)
  }

  hash(level: number = MAX_LEVEL): Buffer {
    return Buffer.from(this.hashes[this.levelIndex(level)])
  }

  depth(level: number = MAX_LEVEL): number {
    return this.depths[this.levelIndex(level)]
  }

  hashBase64(level: number = MAX_LEVEL): string {
    return this.hash(level).toString('base64url')
  }

  beginParse(allowExotic = false): CellParser {
    if (this.isExotic && !allowExotic) {
      throw new TonError('InvalidExoticCell', `can't parse ${CellType[this.type]} cell as ordinary`)
    }
    return new CellParser(this)
  }

  equals(other: Cell): boolean {
    return this.hash().equals(other.hash())
  }

  // Descriptor bytes as written in a bag of cells and in the level-0 representation.
  descriptors(level: number = MAX_LEVEL): Buffer {
    return Buffer.from([
      refsDescriptor(this.refs.length, this.isExotic, this.levelMask.apply(level).mask),
      bitsDescriptor(this.bitLength),
    ])
  }

  toString(indent = ''): string {
    const tag = this.type === CellType.Ordinary || this.type === CellType.Library ? 'x' : this.type === CellType.MerkleUpdate ? 'u' : 'p'
    let result = `${indent}${tag}{${formatBits(this.bits, this.bitLength)}}`
    for (const ref of this.refs) {
      result += '\n' + ref.toString(indent + ' ')
    }
    return result
  }

  private childLevel(level: number): number {
    return isMerkle(this.type) ? level + 1 : level
  }

  private computeHashes(): { hashes: Buffer[]; depths: number[] } {
    const mask = this.levelMask
    const pruned = this.type === CellType.PrunedBranch
    const hashCount = pruned ? 1 : mask.hashCount
    const offset = mask.hashCount - hashCount

    const computedHashes: Buffer[] = []
    const computedDepths: number[] = []
    let hashIndex = 0
    for (let level = 0; level <= mask.level; level++) {
      if (!mask.isSignificant(level)) continue
      if (hashIndex < offset) {
        hashIndex++
        continue
      }
      const childLevel = this.childLevel(level)

      let depth = 0
      for (const ref of this.refs) {
        depth = Math.max(depth, ref.depth(childLevel) + 1)
      }

      const parts: Buffer[] = [this.descriptors(level)]
      if (hashIndex === offset) {
        parts.push(padBits(this.bits, this.bitLength))
      } else {
        parts.push(computedHashes[hashIndex - offset - 1])
      }
      for (const ref of this.refs) {
        const depthBytes = Buffer.alloc(2)
        depthBytes.writeUInt16BE(ref.depth(childLevel))
        parts.push(depthBytes)
      }
      for (const ref of this.refs) {
        parts.push(ref.hash(childLevel))
      }

      computedHashes.push(sha256_sync(Buffer.concat(parts)))
      computedDepths.push(depth)
      hashIndex++
    }

    const hashes: Buffer[] = []
    const depths: number[] = []
    const entries = pruned ? prunedEntries(this.bits, this.bitLength, mask) : []
    for (let level = 0; level <= MAX_LEVEL; level++) {
      const index = mask.apply(level).hashIndex
      if (pruned && index !== mask.hashIndex) {
        hashes.push(entries[index].hash)
        depths.push(entries[index].depth)
      } else {
        hashes.push(computedHashes[index - offset])
        depths.push(computedDepths[index - offset])
      }
    }
    return { hashes, depths }
  }
}

// Hex with the completion tag: a trailing `_` means the last nibble is padded with `1` then `0`s.
const formatBits = (data: Buffer, bitLength: number): string => {
  if (bitLength % 4 === 0) {
    return data.toString('hex').slice(0, bitLength / 4).toUpperCase()
  }
  const padded = Buffer.alloc(Math.ceil((bitLength + 1) / 8))
  copyBits(padded, 0, data, 0, bitLength)
  setBit(padded, bitLength, true)
  return padded.toString('hex').slice(0, Math.ceil((bitLength + 1) / 4)).toUpperCase() + '_'
}
