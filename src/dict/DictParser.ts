import { Cell } from '../cell/Cell'
import { CellParser } from '../cell/CellParser'
import { rethrowAs, TonError } from '../errors'
import { DictionaryKey } from './keys'
import { loadLabel } from './labels'
import { DictionaryValue } from './values'

// Largest number of entries a decoded dictionary may hold.
export const MAX_DICT_ENTRIES = 1 << 20

const forkRefs = (parser: CellParser, remaining: number): [Cell, Cell] => {
  if (parser.remainingRefs < 2) {
    throw new TonError('CorruptDict', `fork at ${remaining} key bits left has ${parser.remainingRefs} refs`)
  }
  return [parser.loadRef(), parser.loadRef()]
}

// Leaves below `cell`, counted once per (cell, key bits left) pair, so a subtree reached
// through many forks costs one walk.
const countEntries = (cell: Cell, bitsLeft: number, memo: Map<string, number>): number => {
  const memoKey = `${cell.hash().toString('hex')}:${bitsLeft}`
  const known = memo.get(memoKey)
  if (known !== undefined) return known
  const parser = cell.beginParse()
  const remaining = bitsLeft - loadLabel(parser, bitsLeft).length
  let count = 1
  if (remaining > 0) {
    const [left, right] = forkRefs(parser, remaining)
    count = countEntries(left, remaining - 1, memo) + countEntries(right, remaining - 1, memo)
  }
  memo.set(memoKey, count)
  return count
}

const loadNode = <V>(
  parser: CellParser,
  prefix: bigint,
  bitsLeft: number,
  value: DictionaryValue<V>,
  visit: (path: bigint, value: V) => void,
  memo: Map<string, number>,
): void => {
  const label = loadLabel(parser, bitsLeft)
  const path = (prefix << BigInt(label.length)) | label.value
  const remaining = bitsLeft - label.length
  if (remaining === 0) {
    visit(path, value.read(parser))
    return
  }
  const [left, right] = forkRefs(parser, remaining)
  const entries = countEntries(left, remaining - 1, memo) + countEntries(right, remaining - 1, memo)
  if (entries > MAX_DICT_ENTRIES) {
    throw new TonError('CorruptDict', `trie expands to ${entries} entries, at most ${MAX_DICT_ENTRIES} are decoded`)
  }
  loadNode(left.beginParse(), path << 1n, remaining - 1, value, visit, memo)
  loadNode(right.beginParse(), (path << 1n) | 1n, remaining - 1, value, visit, memo)
}

const loadEntries = <K, V>(
  parser: CellParser,
  key: DictionaryKey<K>,
  value: DictionaryValue<V>,
): Map<K, V> => {
  const result = new Map<K, V>()
  const seen = new Set<bigint>()
  const memo = new Map<string, number>()
  rethrowAs('CorruptDict', 'malformed dictionary', () =>
    loadNode(
      parser,
      0n,
      key.bits,
      value,
      (path, v) => {
        if (seen.has(path)) {
          throw new TonError('CorruptDict', `duplicate key ${path}`)
        }
        seen.add(path)
        result.set(key.parse(path), v)
      },
      memo,
    ),
  )
  return result
}

// Entries of the trie rooted at `root`, in ascending order of their unsigned key paths.
export const parseDictRoot = <K, V>(root: Cell, key: DictionaryKey<K>, value: DictionaryValue<V>): Map<K, V> =>
  loadEntries(root.beginParse(), key, value)

// HashmapE
export const loadDict = <K, V>(parser: CellParser, key: DictionaryKey<K>, value: DictionaryValue<V>): Map<K, V> => {
  const root = parser.loadDictRoot()
  return root ? parseDictRoot(root, key, value) : new Map<K, V>()
}

// Hashmap with the root node inline; consumes the rest of the parser's root node.
export const loadDictData = <K, V>(
  parser: CellParser,
  key: DictionaryKey<K>,
  value: DictionaryValue<V>,
): Map<K, V> => loadEntries(parser, key, value)
