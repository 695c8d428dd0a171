import { TonError } from '../errors'
import { LevelMask, MAX_LEVEL } from './LevelMask'

export enum CellType {
  Ordinary = -1,
  PrunedBranch = 1,
  Library = 2,
  MerkleProof = 3,
  MerkleUpdate = 4,
}

export const HASH_BYTES = 32
export const DEPTH_BYTES = 2

// What the type rules need to know about a child cell.
export interface HashedNode {
  readonly levelMask: LevelMask
  hash(level?: number): Buffer
  depth(level?: number): number
}

export interface PrunedEntry {
  hash: Buffer
  depth: number
}

// Legacy config proofs carry a pruned branch without the mask byte.
const CONFIG_PROOF_BITS = 280

const isConfigProof = (type: CellType, bitLength: number) =>
  type === CellType.PrunedBranch && bitLength === CONFIG_PROOF_BITS

const invalid = (message: string) => new TonError('InvalidExoticCell', message)

export const resolveExoticType = (data: Buffer, bitLength: number): CellType => {
  if (bitLength < 8) {
    throw invalid('not enough data for an exotic cell')
  }
  switch (data[0]) {
    case 1:
      return CellType.PrunedBranch
    case 2:
      return CellType.Library
    case 3:
      return CellType.MerkleProof
    case 4:
      return CellType.MerkleUpdate
    default:
      throw invalid(`invalid exotic cell type byte ${data[0]}`)
  }
}

export const isMerkle = (type: CellType) => type === CellType.MerkleProof || type === CellType.MerkleUpdate

const prunedLevelMask = (data: Buffer, bitLength: number): LevelMask => {
  if (isConfigProof(CellType.PrunedBranch, bitLength)) {
    return new LevelMask(1)
  }
  if (bitLength < 16) {
    throw invalid('not enough data for a pruned branch cell')
  }
  return new LevelMask(data[1])
}

export const computeLevelMask = (
  type: CellType,
  data: Buffer,
  bitLength: number,
  refs: readonly HashedNode[],
): LevelMask => {
  switch (type) {
    case CellType.Ordinary:
      return refs.reduce((mask, ref) => mask.or(ref.levelMask), new LevelMask(0))
    case CellType.PrunedBranch:
      return prunedLevelMask(data, bitLength)
    case CellType.Library:
      return new LevelMask(0)
    case CellType.MerkleProof:
      return refs[0].levelMask.shiftRight()
    case CellType.MerkleUpdate:
      return refs[0].levelMask.or(refs[1].levelMask).shiftRight()
  }
}

const checkChild = (data: Buffer, hashOffset: number, depthOffset: number, child: HashedNode, label: string) => {
  const hash = data.subarray(hashOffset, hashOffset + HASH_BYTES)
  const depth = data.readUInt16BE(depthOffset)
  if (depth !== child.depth(0)) {
    throw invalid(`${label} depth ${depth} doesn't match child depth ${child.depth(0)}`)
  }
  if (!hash.equals(child.hash(0))) {
    throw invalid(`${label} hash doesn't match child hash`)
  }
}

export const validateExotic = (
  type: CellType,
  data: Buffer,
  bitLength: number,
  refs: readonly HashedNode[],
): void => {
  switch (type) {
    case CellType.Ordinary:
      return
    case CellType.PrunedBranch: {
      if (refs.length !== 0) {
        throw invalid(`pruned branch cell can't have refs, got ${refs.length}`)
      }
      if (isConfigProof(type, bitLength)) return
      const mask = prunedLevelMask(data, bitLength)
      if (mask.level === 0 || mask.level > MAX_LEVEL) {
        throw invalid(`pruned branch level must be in 1..3, got ${mask.level}`)
      }
      const expected = (2 + mask.apply(mask.level - 1).hashCount * (HASH_BYTES + DEPTH_BYTES)) * 8
      if (bitLength !== expected) {
        throw invalid(`pruned branch cell must have exactly ${expected} bits, got ${bitLength}`)
      }
      return
    }
    case CellType.Library: {
      const expected = (1 + HASH_BYTES) * 8
      if (bitLength !== expected) {
        throw invalid(`library cell must have exactly ${expected} bits, got ${bitLength}`)
      }
      return
    }
    case CellType.MerkleProof: {
      const expected = (1 + HASH_BYTES + DEPTH_BYTES) * 8
      if (bitLength !== expected) {
        throw invalid(`merkle proof cell must have exactly ${expected} bits, got ${bitLength}`)
      }
      if (refs.length !== 1) {
        throw invalid(`merkle proof cell must have exactly 1 ref, got ${refs.length}`)
      }
      checkChild(data, 1, 1 + HASH_BYTES, refs[0], 'merkle proof')
      return
    }
    case CellType.MerkleUpdate: {
      const expected = 8 + 2 * (HASH_BYTES + DEPTH_BYTES) * 8
      if (bitLength !== expected) {
        throw invalid(`merkle update cell must have exactly ${expected} bits, got ${bitLength}`)
      }
      if (refs.length !== 2) {
        throw invalid(`merkle update cell must have exactly 2 refs, got ${refs.length}`)
      }
      checkChild(data, 1, 1 + 2 * HASH_BYTES, refs[0], 'merkle update (old)')
      checkChild(data, 1 + HASH_BYTES, 3 + 2 * HASH_BYTES, refs[1], 'merkle update (new)')
      return
    }
  }
}

// Hashes and depths a pruned branch stores for the levels below its own.
export const prunedEntries = (data: Buffer, bitLength: number, mask: LevelMask): PrunedEntry[] => {
  const offset = isConfigProof(CellType.PrunedBranch, bitLength) ? 1 : 2
  const count = mask.apply(mask.level - 1).hashCount
  const entries: PrunedEntry[] = []
  for (let i = 0; i < count; i++) {
    const hashStart = offset + i * HASH_BYTES
    const depthStart = offset + count * HASH_BYTES + i * DEPTH_BYTES
    entries.push({
      hash: Buffer.from(data.subarray(hashStart, hashStart + HASH_BYTES)),
      depth: data.readUInt16BE(depthStart),
    })
  }
  return entries
}
