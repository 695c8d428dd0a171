import { BitReader } from '../../src/cell/BitReader'
import { BitWriter } from '../../src/cell/BitWriter'
import { bitLengthOf, bitsToString, padBits, sliceBits } from '../../src/cell/bits'
import { thrown } from '../helpers/errors'

describe('bits', () => {
  it('writes most significant bit first', () => {
    const writer = new BitWriter()
    writer.writeUint(5, 3)
    writer.writeBit(true)
    expect(writer.bitLength).toBe(4)
    expect(writer.toBuffer()).toEqual(Buffer.from([0xb0]))
  })

  it('writes two complement integers', () => {
    const writer = new BitWriter()
    writer.writeInt(-1, 8)
    writer.writeInt(-128, 8)
    writer.writeInt(127, 8)
    expect(writer.toBuffer()).toEqual(Buffer.from([0xff, 0x80, 0x7f]))
    expect(thrown(() => writer.writeInt(128, 8))).toMatchObject({ kind: 'InvalidArgument' })
    expect(thrown(() => writer.writeUint(-1, 8))).toMatchObject({ kind: 'InvalidArgument' })
  })

  it('refuses to write past capacity', () => {
    const writer = new BitWriter()
    writer.writeBits(Buffer.alloc(128), 1023)
    expect(writer.availableBits).toBe(0)
    expect(thrown(() => writer.writeBit(false))).toMatchObject({ kind: 'CapacityExceeded' })
    expect(writer.bitLength).toBe(1023)
  })

  it('reads back what was written', () => {
    const reader = new BitReader(Buffer.from([0xb0]), 4)
    expect(reader.readUint(3)).toBe(5n)
    expect(reader.readBit()).toBe(true)
    expect(thrown(() => reader.readBit())).toMatchObject({ kind: 'BufferUnderflow' })
  })

  it('reads signed values', () => {
    const reader = new BitReader(Buffer.from([0xff, 0x80]), 16)
    expect(reader.preloadInt(8)).toBe(-1n)
    expect(reader.readInt(8)).toBe(-1n)
    expect(reader.readInt(8)).toBe(-128n)
  })

  it('slices unaligned ranges', () => {
    expect(sliceBits(Buffer.from([0x12, 0x34]), 4, 8)).toEqual(Buffer.from([0x23]))
    expect(sliceBits(Buffer.from([0xff]), 1, 3)).toEqual(Buffer.from([0xe0]))
  })

  it('pads with the completion tag', () => {
    expect(padBits(Buffer.from([0xa0]), 3)).toEqual(Buffer.from([0xb0]))
    expect(padBits(Buffer.from([0xab]), 8)).toEqual(Buffer.from([0xab]))
    expect(padBits(Buffer.from([0x00, 0x00]), 9)).toEqual(Buffer.from([0x00, 0x40]))
  })

  it('counts significant bits', () => {
    expect(bitLengthOf(0)).toBe(0)
    expect(bitLengthOf(1)).toBe(1)
    expect(bitLengthOf(255)).toBe(8)
    expect(bitLengthOf(256)).toBe(9)
    expect(bitLengthOf(2 ** 40)).toBe(41)
    expect(bitLengthOf(1n << 100n)).toBe(101)
  })

  it('prints bit strings', () => {
    expect(bitsToString(Buffer.from([0xb0]), 5)).toBe('10110')
  })
})
