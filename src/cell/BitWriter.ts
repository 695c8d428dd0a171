import { TonError } from '../errors'
import { copyBits, setBit } from './bits'

export const MAX_CELL_BITS = 1023

export class BitWriter {
  private readonly buffer: Buffer
  private length = 0

  constructor(readonly capacity: number = MAX_CELL_BITS) {
    this.buffer = Buffer.alloc(Math.ceil(capacity / 8))
  }

  get bitLength(): number {
    return this.length
  }

  get availableBits(): number {
    return this.capacity - this.length
  }

  private ensureCapacity(bits: number) {
    if (bits < 0 || !Number.isInteger(bits)) {
      throw new TonError('InvalidArgument', `invalid bit count ${bits}`)
    }
    if (this.length + bits > this.capacity) {
      throw new TonError(
        'CapacityExceeded',
        `can't write ${bits} bits, only ${this.availableBits} of ${this.capacity} available`,
      )
    }
  }

  writeBit(value: boolean | number) {
    this.ensureCapacity(1)
    setBit(this.buffer, this.length, typeof value === 'boolean' ? value : value !== 0)
    this.length++
  }

  // Copies `bitLength` bits of `source`, starting at bit `offset`.
  writeBits(source: Buffer, bitLength: number, offset = 0) {
    this.ensureCapacity(bitLength)
    if (offset + bitLength > source.length * 8) {
      throw new TonError('InvalidArgument', `source holds ${source.length * 8} bits, asked for ${offset + bitLength}`)
    }
    copyBits(this.buffer, this.length, source, offset, bitLength)
    this.length += bitLength
  }

  writeBuffer(source: Buffer) {
    this.writeBits(source, source.length * 8)
  }

  writeUint(value: bigint | number, bits: number) {
    const v = BigInt(value)
    if (v < 0n || v >= 1n << BigInt(bits)) {
      throw new TonError('InvalidArgument', `value ${v} doesn't fit in ${bits} unsigned bits`)
    }
    this.ensureCapacity(bits)
    if (bits === 0) return
    const bytes = Math.ceil(bits / 8)
    const encoded = Buffer.from(v.toString(16).padStart(bytes * 2, '0'), 'hex')
    this.writeBits(encoded, bits, bytes * 8 - bits)
  }

  writeInt(value: bigint | number, bits: number) {
    const v = BigInt(value)
    if (bits === 0) {
      if (v !== 0n) throw new TonError('InvalidArgument', `value ${v} doesn't fit in 0 bits`)
      return
    }
    const limit = 1n << BigInt(bits - 1)
    if (v < -limit || v >= limit) {
      throw new TonError('InvalidArgument', `value ${v} doesn't fit in ${bits} signed bits`)
    }
    this.writeUint(v < 0n ? (1n << BigInt(bits)) + v : v, bits)
  }

  // Bytes holding the written bits, trailing bits of the last byte zeroed.
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, Math.ceil(this.length / 8)))
  }
}
