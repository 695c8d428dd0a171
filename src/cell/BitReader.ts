import { TonError } from '../errors'
import { getBit, sliceBits } from './bits'

// Read cursor over a fixed bit string. The cursor only moves forward unless `seek` is used.
export class BitReader {
  private position = 0

  constructor(
    private readonly data: Buffer,
    readonly bitLength: number,
  ) {}

  get offset(): number {
    return this.position
  }

  get remainingBits(): number {
    return this.bitLength - this.position
  }

  private ensure(bits: number) {
    if (bits < 0 || !Number.isInteger(bits)) {
      throw new TonError('InvalidArgument', `invalid bit count ${bits}`)
    }
    if (bits > this.remainingBits) {
      throw new TonError('BufferUnderflow', `can't read ${bits} bits, only ${this.remainingBits} left`)
    }
  }

  seek(offset: number) {
    if (offset < 0 || offset > this.bitLength) {
      throw new TonError('BufferUnderflow', `can't seek to bit ${offset} of ${this.bitLength}`)
    }
    this.position = offset
  }

  skip(bits: number) {
    this.ensure(bits)
    this.position += bits
  }

  preloadBit(): boolean {
    this.ensure(1)
    return getBit(this.data, this.position)
  }

  readBit(): boolean {
    const bit = this.preloadBit()
    this.position++
    return bit
  }

  preloadBits(bits: number): Buffer {
    this.ensure(bits)
    return sliceBits(this.data, this.position, bits)
  }

  readBits(bits: number): Buffer {
    const result = this.preloadBits(bits)
    this.position += bits
    return result
  }

  readBuffer(bytes: number): Buffer {
    return this.readBits(bytes * 8)
  }

  preloadUint(bits: number): bigint {
    this.ensure(bits)
    if (bits === 0) return 0n
    const bytes = sliceBits(this.data, this.position, bits)
    // sliceBits left-aligns, so drop the padding of the last byte
    return BigInt('0x' + bytes.toString('hex')) >> BigInt(bytes.length * 8 - bits)
  }

  readUint(bits: number): bigint {
    const value = this.preloadUint(bits)
    this.position += bits
    return value
  }

  preloadInt(bits: number): bigint {
    if (bits === 0) return 0n
    const value = this.preloadUint(bits)
    const sign = 1n << BigInt(bits - 1)
    return value >= sign ? value - (sign << 1n) : value
  }

  readInt(bits: number): bigint {
    const value = this.preloadInt(bits)
    this.position += bits
    return value
  }
}
