import { beginCell as coreBeginCell, BitString, Cell as CoreCell } from '@ton/core'

import { beginCell } from '../../src/cell/CellBuilder'
import { Cell } from '../../src/cell/Cell'
import { CellType } from '../../src/cell/CellType'
import { thrown } from '../helpers/errors'
import { hex } from '../helpers/interop'

const EMPTY_CELL_HASH = '96a296d224f285c67bee93c30f8a309157f0daa35dc5b87e410b78630a09cfc7'

const depthBytes = (depth: number) => {
  const bytes = Buffer.alloc(2)
  bytes.writeUInt16BE(depth)
  return bytes
}

describe('Cell', () => {
  it('hashes the empty cell', () => {
    expect(hex(Cell.EMPTY.hash())).toBe(EMPTY_CELL_HASH)
    expect(hex(new CoreCell().hash())).toBe(EMPTY_CELL_HASH)
    expect(Cell.EMPTY.depth()).toBe(0)
    expect(Cell.EMPTY.level).toBe(0)
  })

  it('holds at most 1023 bits', () => {
    const full = beginCell().storeBits(Buffer.alloc(128), 1023)
    expect(full.build().bitLength).toBe(1023)
    expect(thrown(() => full.storeBit(true))).toMatchObject({ kind: 'CapacityExceeded' })
    expect(thrown(() => new Cell({ data: Buffer.alloc(128), bitLength: 1024 }))).toMatchObject({
      kind: 'CapacityExceeded',
    })
  })

  it('holds at most 4 refs', () => {
    const builder = beginCell()
    for (let i = 0; i < 4; i++) builder.storeRef(Cell.EMPTY)
    expect(builder.build().refs).toHaveLength(4)
    expect(thrown(() => builder.storeRef(Cell.EMPTY))).toMatchObject({ kind: 'TooManyReferences' })
    expect(
      thrown(() => new Cell({ refs: [Cell.EMPTY, Cell.EMPTY, Cell.EMPTY, Cell.EMPTY, Cell.EMPTY] })),
    ).toMatchObject({ kind: 'TooManyReferences' })
  })

  it('matches @ton/core hashes and depths', () => {
    const ours = beginCell()
      .storeUint(0xdeadbeef, 32)
      .storeBit(true)
      .storeRef(beginCell().storeInt(-5, 7).storeRef(Cell.EMPTY).build())
      .storeRef(beginCell().storeCoins(1_000_000_000n).build())
      .build()
    const core = coreBeginCell()
      .storeUint(0xdeadbeef, 32)
      .storeBit(true)
      .storeRef(coreBeginCell().storeInt(-5, 7).storeRef(new CoreCell()).endCell())
      .storeRef(coreBeginCell().storeCoins(1_000_000_000n).endCell())
      .endCell()
    expect(hex(ours.hash())).toBe(hex(core.hash()))
    expect(ours.depth()).toBe(2)
    expect(ours.depth()).toBe(core.depth())
  })

  it('reads levels past the maximum as the maximum and rejects negative ones', () => {
    expect(hex(Cell.EMPTY.hash(0))).toBe(EMPTY_CELL_HASH)
    expect(hex(Cell.EMPTY.hash(7))).toBe(EMPTY_CELL_HASH)
    expect(thrown(() => Cell.EMPTY.hash(-1))).toMatchObject({ kind: 'InvalidArgument' })
    expect(thrown(() => Cell.EMPTY.depth(-1))).toMatchObject({ kind: 'InvalidArgument' })
    expect(thrown(() => Cell.EMPTY.depth(1.5))).toMatchObject({ kind: 'InvalidArgument' })
  })

  it('compares by hash', () => {
    const a = beginCell().storeUint(1, 8).build()
    const b = beginCell().storeUint(1, 8).build()
    expect(a.equals(b)).toBe(true)
    expect(a.equals(Cell.EMPTY)).toBe(false)
    expect(a.hashBase64()).toBe(a.hash().toString('base64url'))
  })

  it('prints the fift-style tree', () => {
    expect(beginCell().storeUint(0xb, 4).build().toString()).toBe('x{B}')
    expect(beginCell().storeUint(0b101, 3).storeRef(Cell.EMPTY).build().toString()).toBe('x{B_}\n x{}')
  })

  describe('exotic cells', () => {
    const child = beginCell().storeUint(42, 16).storeRef(Cell.EMPTY).build()

    it('computes merkle proof hashes like @ton/core', () => {
      const data = Buffer.concat([Buffer.from([3]), child.hash(0), depthBytes(child.depth(0))])
      const proof = new Cell({ data, bitLength: 280, refs: [child], exotic: true })
      expect(proof.type).toBe(CellType.MerkleProof)
      expect(proof.level).toBe(0)

      const coreChild = coreBeginCell().storeUint(42, 16).storeRef(new CoreCell()).endCell()
      const coreProof = new CoreCell({ exotic: true, bits: new BitString(data, 0, 280), refs: [coreChild] })
      expect(hex(proof.hash())).toBe(hex(coreProof.hash()))
    })

    it('rejects a merkle proof with a foreign hash', () => {
      const data = Buffer.concat([Buffer.from([3]), Cell.EMPTY.hash(0), depthBytes(child.depth(0))])
      expect(thrown(() => new Cell({ data, bitLength: 280, refs: [child], exotic: true }))).toMatchObject({
        kind: 'InvalidExoticCell',
      })
    })

    it('serves stored hashes below a pruned branch level', () => {
      const stored = child.hash(0)
      const data = Buffer.concat([Buffer.from([1, 1]), stored, depthBytes(7)])
      const pruned = new Cell({ data, bitLength: 288, exotic: true })
      expect(pruned.type).toBe(CellType.PrunedBranch)
      expect(pruned.level).toBe(1)
      expect(pruned.hash(0)).toEqual(stored)
      expect(pruned.depth(0)).toBe(7)
      expect(pruned.hash(1).equals(stored)).toBe(false)

      const corePruned = new CoreCell({ exotic: true, bits: new BitString(data, 0, 288), refs: [] })
      expect(hex(pruned.hash())).toBe(hex(corePruned.hash()))
    })

    it('rejects malformed exotic cells', () => {
      expect(thrown(() => new Cell({ data: Buffer.from([2]), bitLength: 8, exotic: true }))).toMatchObject({
        kind: 'InvalidExoticCell',
      })
      expect(thrown(() => new Cell({ data: Buffer.from([9]), bitLength: 8, exotic: true }))).toMatchObject({
        kind: 'InvalidExoticCell',
      })
      expect(thrown(() => new Cell({ data: Buffer.from([1, 0]), bitLength: 16, exotic: true }))).toMatchObject({
        kind: 'InvalidExoticCell',
      })
    })

    it('parses exotic cells only on request', () => {
      const library = new Cell({ data: Buffer.concat([Buffer.from([2]), child.hash()]), bitLength: 264, exotic: true })
      expect(library.type).toBe(CellType.Library)
      expect(thrown(() => library.beginParse())).toMatchObject({ kind: 'InvalidExoticCell' })
      expect(library.beginParse(true).loadUint(8)).toBe(2)
    })
  })
})
