import { Cell } from './Cell'
import { CellType, HASH_BYTES } from './CellType'

/**
 * Hashes of the code libraries referenced anywhere under `roots`, in breadth-first order of first
 * appearance. Shared subtrees are visited once.
 */
export const libraryHashes = (roots: readonly Cell[]): Buffer[] => {
  const visited = new Set<string>()
  const found = new Map<string, Buffer>()
  const queue = [...roots]
  for (let i = 0; i < queue.length; i++) {
    const cell = queue[i]
    const key = cell.hash().toString('hex')
    if (visited.has(key)) continue
    visited.add(key)
    queue.push(...cell.refs)
    if (cell.type === CellType.Library) {
      // library cell: 8-bit type tag, then the library code hash
      const hash = cell.bits.subarray(1, 1 + HASH_BYTES)
      found.set(hash.toString('hex'), Buffer.from(hash))
    }
  }
  return [...found.values()]
}
