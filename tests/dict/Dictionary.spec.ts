import { Address, beginCell as coreBeginCell, Dictionary } from '@ton/core'

import { TonAddress } from '../../src/address/TonAddress'
import { BagOfCells } from '../../src/boc/BagOfCells'
import { beginCell } from '../../src/cell/CellBuilder'
import { buildDictRoot, storeDict, storeDictData } from '../../src/dict/DictBuilder'
import { loadDict, loadDictData, parseDictRoot } from '../../src/dict/DictParser'
import { DictionaryKeys } from '../../src/dict/keys'
import { labelKind, loadLabel, storeLabel } from '../../src/dict/labels'
import { DictionaryValues } from '../../src/dict/values'
import { thrown } from '../helpers/errors'
import { hex } from '../helpers/interop'

const DICT_BOC =
  'te6cckEBBgEAWgABGccNPKUADZm5MepOjMABAgHNAgMCASAEBQAnQAAAAAAAAAAAAAABMlF4tR2RgCAAJgAAAAAAAAAAAAABaFhaZZhr6AAAJgAAAAAAAAAAAAAAR8sYU4eC4AA1PIC5'
const DICT_HEADER = 0xc70d3ca5000d99b931ea4e8cn
const DICT_ENTRIES = new Map<number, bigint>([
  [0, 25965603044000000000n],
  [1, 5173255344000000000n],
  [2, 344883687000000000n],
])

describe('labels', () => {
  it('picks the cheapest encoding', () => {
    expect(labelKind({ value: 0n, length: 6 }, 8)).toBe('same')
    expect(labelKind({ value: 0b101101n, length: 6 }, 8)).toBe('long')
    expect(labelKind({ value: 0n, length: 1 }, 1)).toBe('short')
    expect(labelKind({ value: 1n, length: 1 }, 1000)).toBe('short')
    expect(labelKind({ value: 0n, length: 0 }, 0)).toBe('short')
  })

  it('writes and reads each kind', () => {
    for (const label of [
      { value: 0n, length: 6 },
      { value: 0b101101n, length: 6 },
      { value: 0b10n, length: 2 },
    ]) {
      const cell = beginCell().store((builder) => storeLabel(builder, label, 8)).build()
      expect(loadLabel(cell.beginParse(), 8)).toEqual(label)
    }
    const same = beginCell().store((builder) => storeLabel(builder, { value: 0n, length: 6 }, 8)).build()
    expect(same.bitLength).toBe(7)
    expect(same.bits).toEqual(Buffer.from([0b11001100]))
  })
})

describe('Dictionary', () => {
  it('reads a known dictionary', () => {
    const parser = BagOfCells.parseBase64(DICT_BOC).singleRoot().beginParse()
    expect(parser.loadUintBig(96)).toBe(DICT_HEADER)
    const entries = loadDict(parser, DictionaryKeys.Uint(8), DictionaryValues.BigUint(150))
    parser.ensureEmpty()
    expect(entries).toEqual(DICT_ENTRIES)
  })

  it('rebuilds the known dictionary cell for cell', () => {
    const original = BagOfCells.parseBase64(DICT_BOC).singleRoot()
    const rebuilt = beginCell()
      .storeUint(DICT_HEADER, 96)
      .store((builder) => storeDict(builder, DICT_ENTRIES, DictionaryKeys.Uint(8), DictionaryValues.BigUint(150)))
      .build()
    expect(hex(rebuilt.hash())).toBe(hex(original.hash()))
  })

  it('builds the same trie as @ton/core', () => {
    const keys = [1, 5, 300, 65535, 1024, 777, 0]
    const ours = new Map(keys.map((key) => [key, key * 3] as const))
    const core = Dictionary.empty(Dictionary.Keys.Uint(16), Dictionary.Values.Uint(32))
    for (const key of keys) core.set(key, key * 3)

    const root = buildDictRoot(ours, DictionaryKeys.Uint(16), DictionaryValues.Uint(32))
    expect(root).not.toBeNull()
    expect(hex(root?.hash() ?? Buffer.alloc(0))).toBe(hex(coreBeginCell().storeDictDirect(core).endCell().hash()))
  })

  it('builds address-keyed tries like @ton/core', () => {
    const first = new TonAddress(0, Buffer.alloc(32, 0x11))
    const second = new TonAddress(-1, Buffer.alloc(32, 0x22))
    const ours = new Map([
      [first, 10n],
      [second, 20n],
    ])
    const core = Dictionary.empty(Dictionary.Keys.Address(), Dictionary.Values.BigVarUint(4))
    core.set(Address.parseRaw(first.toRaw()), 10n)
    core.set(Address.parseRaw(second.toRaw()), 20n)

    const cell = beginCell()
      .store((builder) => storeDict(builder, ours, DictionaryKeys.Address(), DictionaryValues.Coins()))
      .build()
    expect(hex(cell.hash())).toBe(hex(coreBeginCell().storeDict(core).endCell().hash()))

    const parsed = loadDict(cell.beginParse(), DictionaryKeys.Address(), DictionaryValues.Coins())
    expect([...parsed.entries()].map(([address, amount]) => [address.toRaw(), amount])).toEqual([
      [first.toRaw(), 10n],
      [second.toRaw(), 20n],
    ])
  })

  it('returns signed keys in trie order', () => {
    const map = new Map([
      [-1, true],
      [0, false],
      [1, true],
    ])
    const cell = beginCell()
      .store((builder) => storeDict(builder, map, DictionaryKeys.Int(8), DictionaryValues.Bool()))
      .build()
    const parsed = loadDict(cell.beginParse(), DictionaryKeys.Int(8), DictionaryValues.Bool())
    expect([...parsed.keys()]).toEqual([0, 1, -1])
    expect(parsed.get(-1)).toBe(true)
  })

  it('stores an empty map as a single zero bit', () => {
    const cell = beginCell()
      .store((builder) => storeDict(builder, new Map<number, number>(), DictionaryKeys.Uint(8), DictionaryValues.Uint(8)))
      .build()
    expect(cell.bitLength).toBe(1)
    expect(loadDict(cell.beginParse(), DictionaryKeys.Uint(8), DictionaryValues.Uint(8)).size).toBe(0)
    expect(
      thrown(() => storeDictData(beginCell(), new Map<number, number>(), DictionaryKeys.Uint(8), DictionaryValues.Uint(8))),
    ).toMatchObject({ kind: 'InvalidArgument' })
  })

  it('stores the root inline as Hashmap', () => {
    const map = new Map([
      [7, Buffer.from('ab', 'hex')],
      [9, Buffer.from('cd', 'hex')],
    ])
    const cell = beginCell()
      .store((builder) => storeDictData(builder, map, DictionaryKeys.Uint(32), DictionaryValues.Buffer(1)))
      .build()
    const root = buildDictRoot(map, DictionaryKeys.Uint(32), DictionaryValues.Buffer(1))
    expect(root?.equals(cell)).toBe(true)
    expect(loadDictData(cell.beginParse(), DictionaryKeys.Uint(32), DictionaryValues.Buffer(1))).toEqual(map)
  })

  it('keeps ref and TL-B values', () => {
    const inner = beginCell().storeUint(99, 8).build()
    const map = new Map([[3n, inner]])
    const root = buildDictRoot(map, DictionaryKeys.BigUint(64), DictionaryValues.Cell())
    expect(root).not.toBeNull()
    if (root) {
      expect(parseDictRoot(root, DictionaryKeys.BigUint(64), DictionaryValues.Cell()).get(3n)?.equals(inner)).toBe(true)
    }
  })

  it('rejects keys that collide or overflow', () => {
    const map = new Map([
      [Buffer.from('01', 'hex'), 1],
      [Buffer.from('01', 'hex'), 2],
    ])
    expect(thrown(() => buildDictRoot(map, DictionaryKeys.Buffer(1), DictionaryValues.Uint(8)))).toMatchObject({
      kind: 'InvalidArgument',
    })
    expect(
      thrown(() => buildDictRoot(new Map([[256, 1]]), DictionaryKeys.Uint(8), DictionaryValues.Uint(8))),
    ).toMatchObject({ kind: 'InvalidArgument' })
  })

  describe('corrupt tries', () => {
    const parse = (cell: ReturnType<typeof beginCell>) =>
      thrown(() => parseDictRoot(cell.build(), DictionaryKeys.Uint(8), DictionaryValues.Uint(8)))

    it('rejects a fork without two refs', () => {
      expect(parse(beginCell().storeUint(0, 2))).toMatchObject({ kind: 'CorruptDict' })
    })

    it('rejects a label longer than the key', () => {
      expect(parse(beginCell().storeBit(false).storeUnary(9))).toMatchObject({ kind: 'CorruptDict' })
    })

    it('rejects a leaf without its value', () => {
      expect(parse(beginCell().storeUint(0b110, 3).storeUint(8, 4))).toMatchObject({ kind: 'CorruptDict' })
    })

    // Every fork points twice at the node below it.
    const sharedTrie = (levels: number) => {
      let node = beginCell().storeUint(0, 2).storeUint(7, 8).build()
      for (let i = 0; i < levels; i++) {
        node = beginCell().storeUint(0, 2).storeRef(node).storeRef(node).build()
      }
      return node
    }

    it('decodes shared subtrees of a legitimate trie', () => {
      const entries = parseDictRoot(sharedTrie(8), DictionaryKeys.Uint(8), DictionaryValues.Uint(8))
      expect(entries.size).toBe(256)
      expect(entries.get(0)).toBe(7)
      expect(entries.get(255)).toBe(7)
    })

    it('refuses a trie that expands past the entry limit', () => {
      const root = sharedTrie(32)
      expect(
        thrown(() => parseDictRoot(root, DictionaryKeys.Uint(32), DictionaryValues.Uint(8))),
      ).toMatchObject({ kind: 'CorruptDict' })
      const extra = beginCell().storeDictRoot(root).build()
      expect(
        thrown(() => loadDict(extra.beginParse(), DictionaryKeys.Uint(32), DictionaryValues.Uint(8))),
      ).toMatchObject({ kind: 'CorruptDict' })
    })
  })
})
