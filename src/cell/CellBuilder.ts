import type { TonAddress } from '../address/TonAddress'
import { TonError } from '../errors'
import { bitLengthOf } from './bits'
import { BitWriter } from './BitWriter'
import { Cell, MAX_CELL_REFS } from './Cell'
import { CellParser } from './CellParser'

// Length prefix width and byte count of `v` as a VarUInteger `bytesLimit`.
const varUintLayout = (v: bigint, bytesLimit: number): { prefixBits: number; size: number } => {
  if (v < 0n) {
    throw new TonError('InvalidArgument', `VarUInteger can't hold negative ${v}`)
  }
  const size = Math.ceil(bitLengthOf(v) / 8)
  if (size >= bytesLimit) {
    throw new TonError('InvalidArgument', `${v} needs ${size} bytes, VarUInteger ${bytesLimit} holds ${bytesLimit - 1}`)
  }
  return { prefixBits: bitLengthOf(bytesLimit - 1), size }
}

/**
 * Single-owner staging value for a cell. Every store checks capacity first and throws a TonError
 * (`CapacityExceeded`, `TooManyReferences`, `InvalidArgument`) instead of truncating; a failed store
 * leaves the builder unchanged.
 */
export class CellBuilder {
  private readonly writer = new BitWriter()
  private readonly refList: Cell[] = []

  get bits(): number {
    return this.writer.bitLength
  }

  get refs(): number {
    return this.refList.length
  }

  get availableBits(): number {
    return this.writer.availableBits
  }

  get availableRefs(): number {
    return MAX_CELL_REFS - this.refList.length
  }

  // Throws unless `bits` more bits and `refs` more refs fit; stores nothing.
  ensureCapacity(bits: number, refs = 0): this {
    this.ensureBits(bits)
    this.ensureRefs(refs)
    return this
  }

  private ensureRefs(count: number) {
    if (this.refList.length + count > MAX_CELL_REFS) {
      throw new TonError(
        'TooManyReferences',
        `can't store ${count} more refs, ${this.availableRefs} of ${MAX_CELL_REFS} available`,
      )
    }
  }

  private ensureBits(count: number) {
    if (count > this.availableBits) {
      throw new TonError('CapacityExceeded', `can't store ${count} more bits, ${this.availableBits} available`)
    }
  }

  storeBit(value: boolean | number): this {
    this.writer.writeBit(value)
    return this
  }

  storeBoolean(value: boolean): this {
    return this.storeBit(value)
  }

  // `bitLength` bits of `data`, starting from its most significant bit.
  storeBits(data: Buffer, bitLength: number = data.length * 8): this {
    this.writer.writeBits(data, bitLength)
    return this
  }

  storeBuffer(data: Buffer, bytes: number = data.length): this {
    if (data.length !== bytes) {
      throw new TonError('InvalidArgument', `expected ${bytes} bytes, got ${data.length}`)
    }
    this.writer.writeBuffer(data)
    return this
  }

  storeUint(value: number | bigint, bits: number): this {
    this.writer.writeUint(value, bits)
    return this
  }

  storeInt(value: number | bigint, bits: number): this {
    this.writer.writeInt(value, bits)
    return this
  }

  storeMaybeUint(value: number | bigint | null | undefined, bits: number): this {
    if (value === null || value === undefined) {
      return this.storeBit(false)
    }
    if (BigInt(value) < 0n || BigInt(value) >= 1n << BigInt(bits)) {
      throw new TonError('InvalidArgument', `value ${value} doesn't fit in ${bits} unsigned bits`)
    }
    this.ensureBits(1 + bits)
    return this.storeBit(true).storeUint(value, bits)
  }

  // VarUInteger n: byte length in ceil(log2 n) bits, then the minimal big-endian magnitude.
  storeVarUint(value: number | bigint, bytesLimit: number): this {
    const v = BigInt(value)
    const { prefixBits, size } = varUintLayout(v, bytesLimit)
    this.ensureBits(prefixBits + size * 8)
    return this.storeUint(size, prefixBits).storeUint(v, size * 8)
  }

  // VarInteger n, two's complement magnitude.
  storeVarInt(value: number | bigint, bytesLimit: number): this {
    const v = BigInt(value)
    const size = v === 0n ? 0 : Math.ceil((bitLengthOf(v < 0n ? -v - 1n : v) + 1) / 8)
    if (size >= bytesLimit) {
      throw new TonError('InvalidArgument', `${v} doesn't fit in VarInteger ${bytesLimit}`)
    }
    const prefixBits = bitLengthOf(bytesLimit - 1)
    this.ensureBits(prefixBits + size * 8)
    return this.storeUint(size, prefixBits).storeInt(v, size * 8)
  }

  storeCoins(amount: number | bigint): this {
    return this.storeVarUint(amount, 16)
  }

  storeMaybeCoins(amount: number | bigint | null | undefined): this {
    if (amount === null || amount === undefined) {
      return this.storeBit(false)
    }
    const { prefixBits, size } = varUintLayout(BigInt(amount), 16)
    this.ensureBits(1 + prefixBits + size * 8)
    return this.storeBit(true).storeCoins(amount)
  }

  // Unary length: `length` ones and a terminating zero.
  storeUnary(length: number): this {
    this.ensureBits(length + 1)
    for (let i = 0; i < length; i++) this.storeBit(true)
    return this.storeBit(false)
  }

  storeRef(cell: Cell | CellBuilder): this {
    this.ensureRefs(1)
    this.refList.push(cell instanceof CellBuilder ? cell.build() : cell)
    return this
  }

  storeMaybeRef(cell: Cell | CellBuilder | null | undefined): this {
    if (!cell) {
      return this.storeBit(false)
    }
    this.ensureBits(1)
    this.ensureRefs(1)
    return this.storeBit(true).storeRef(cell)
  }

  // Root of an optional dictionary (HashmapE): presence bit plus reference.
  storeDictRoot(root: Cell | null): this {
    return this.storeMaybeRef(root)
  }

  // Inlines data and refs of `cell`.
  storeCell(cell: Cell): this {
    this.ensureBits(cell.bitLength)
    this.ensureRefs(cell.refs.length)
    this.writer.writeBits(cell.bits, cell.bitLength)
    this.refList.push(...cell.refs)
    return this
  }

  storeBuilder(builder: CellBuilder): this {
    return this.storeCell(builder.build())
  }

  // Inlines what `parser` has left, consuming it.
  storeSlice(parser: CellParser): this {
    this.ensureBits(parser.remainingBits)
    this.ensureRefs(parser.remainingRefs)
    return this.storeCell(parser.loadRemainder())
  }

  // `addr_none` for null and TonAddress.NULL, `addr_std` without anycast otherwise.
  storeAddress(address: TonAddress | null | undefined): this {
    if (!address || address.isNull()) {
      return this.storeUint(0, 2)
    }
    if (address.workchain < -128 || address.workchain > 127) {
      throw new TonError('InvalidWorkchain', `workchain ${address.workchain} doesn't fit addr_std`)
    }
    this.ensureBits(267)
    return this.storeUint(0b10, 2).storeBit(false).storeInt(address.workchain, 8).storeBuffer(address.hash, 32)
  }

  // Applies a writer function; lets TL-B codecs and helpers chain with the builder methods.
  store(writer: (builder: CellBuilder) => void): this {
    writer(this)
    return this
  }

  build(options: { exotic?: boolean } = {}): Cell {
    return new Cell({
      data: this.writer.toBuffer(),
      bitLength: this.writer.bitLength,
      refs: this.refList,
      exotic: options.exotic,
    })
  }
}

export const beginCell = (): CellBuilder => new CellBuilder()
