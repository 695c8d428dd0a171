import { Cell } from '../cell/Cell'
import { CellBuilder } from '../cell/CellBuilder'
import { TonError } from '../errors'
import { DictionaryKey } from './keys'
import { Label, storeLabel } from './labels'
import { DictionaryValue } from './values'

interface Entry<V> {
  path: bigint
  value: V
}

const bitAt = (path: bigint, index: number) => (path >> BigInt(index)) & 1n

// Number of leading bits (counting from bit `bitsLeft - 1` down) shared by `a` and `b`.
const commonPrefixLength = (a: bigint, b: bigint, bitsLeft: number): number => {
  let length = 0
  while (length < bitsLeft && bitAt(a, bitsLeft - 1 - length) === bitAt(b, bitsLeft - 1 - length)) {
    length++
  }
  return length
}

const topBits = (path: bigint, bitsLeft: number, length: number): Label => ({
  value: (path >> BigInt(bitsLeft - length)) & ((1n << BigInt(length)) - 1n),
  length,
})

// Writes the node holding `entries` (sorted, unique, non-empty) whose paths have `bitsLeft`
// unconsumed low bits.
const storeNode = <V>(builder: CellBuilder, entries: Entry<V>[], bitsLeft: number, value: DictionaryValue<V>): void => {
  if (entries.length === 1) {
    storeLabel(builder, topBits(entries[0].path, bitsLeft, bitsLeft), bitsLeft)
    value.write(builder, entries[0].value)
    return
  }
  const first = entries[0].path
  const prefixLength = commonPrefixLength(first, entries[entries.length - 1].path, bitsLeft)
  storeLabel(builder, topBits(first, bitsLeft, prefixLength), bitsLeft)

  const branchBit = bitsLeft - prefixLength - 1
  const split = entries.findIndex((entry) => bitAt(entry.path, branchBit) === 1n)
  for (const side of [entries.slice(0, split), entries.slice(split)]) {
    const child = new CellBuilder()
    storeNode(child, side, branchBit, value)
    builder.storeRef(child.build())
  }
}

const sortedEntries = <K, V>(map: ReadonlyMap<K, V>, key: DictionaryKey<K>): Entry<V>[] => {
  const entries: Entry<V>[] = []
  for (const [k, v] of map) {
    entries.push({ path: key.serialize(k), value: v })
  }
  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
  for (let i = 1; i < entries.length; i++) {
    if (entries[i].path === entries[i - 1].path) {
      throw new TonError('InvalidArgument', `duplicate dictionary key ${entries[i].path}`)
    }
  }
  return entries
}

// Root cell of the trie, or null for an empty map.
export const buildDictRoot = <K, V>(
  map: ReadonlyMap<K, V>,
  key: DictionaryKey<K>,
  value: DictionaryValue<V>,
): Cell | null => {
  if (map.size === 0) return null
  const builder = new CellBuilder()
  storeNode(builder, sortedEntries(map, key), key.bits, value)
  return builder.build()
}

// HashmapE: 0 for an empty map, otherwise 1 and a reference to the root.
export const storeDict = <K, V>(
  builder: CellBuilder,
  map: ReadonlyMap<K, V>,
  key: DictionaryKey<K>,
  value: DictionaryValue<V>,
): CellBuilder => builder.storeDictRoot(buildDictRoot(map, key, value))

// Hashmap: the root node inline. An empty map has no such encoding.
export const storeDictData = <K, V>(
  builder: CellBuilder,
  map: ReadonlyMap<K, V>,
  key: DictionaryKey<K>,
  value: DictionaryValue<V>,
): CellBuilder => {
  if (map.size === 0) {
    throw new TonError('InvalidArgument', "can't store an empty dictionary inline")
  }
  storeNode(builder, sortedEntries(map, key), key.bits, value)
  return builder
}
