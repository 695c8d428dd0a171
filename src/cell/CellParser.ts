import { TonAddress } from '../address/TonAddress'
import { TonError } from '../errors'
import { BitReader } from './BitReader'
import { bitLengthOf } from './bits'
import { Cell } from './Cell'

// Read cursor over one cell. Bit and ref cursors only move forward (`seek` aside) and the cell is
// never touched.
export class CellParser {
  private readonly reader: BitReader
  private refIndex = 0

  constructor(readonly cell: Cell) {
    this.reader = new BitReader(cell.bits, cell.bitLength)
  }

  get remainingBits(): number {
    return this.reader.remainingBits
  }

  get remainingRefs(): number {
    return this.cell.refs.length - this.refIndex
  }

  get bitOffset(): number {
    return this.reader.offset
  }

  get refOffset(): number {
    return this.refIndex
  }

  isEmpty(): boolean {
    return this.remainingBits === 0 && this.remainingRefs === 0
  }

  ensureEmpty() {
    if (!this.isEmpty()) {
      throw new TonError(
        'UnexpectedData',
        `${this.remainingBits} bits and ${this.remainingRefs} refs left unread`,
      )
    }
  }

  // Moves the bit cursor by `delta` bits, backwards when negative.
  seek(delta: number) {
    this.reader.seek(this.reader.offset + delta)
  }

  skip(bits: number): this {
    this.reader.skip(bits)
    return this
  }

  loadBit(): boolean {
    return this.reader.readBit()
  }

  preloadBit(): boolean {
    return this.reader.preloadBit()
  }

  loadBoolean(): boolean {
    return this.loadBit()
  }

  // `bits` bits, left-aligned in ceil(bits / 8) bytes.
  loadBits(bits: number): Buffer {
    return this.reader.readBits(bits)
  }

  preloadBits(bits: number): Buffer {
    return this.reader.preloadBits(bits)
  }

  loadBuffer(bytes: number): Buffer {
    return this.reader.readBuffer(bytes)
  }

  loadUintBig(bits: number): bigint {
    return this.reader.readUint(bits)
  }

  preloadUintBig(bits: number): bigint {
    return this.reader.preloadUint(bits)
  }

  loadIntBig(bits: number): bigint {
    return this.reader.readInt(bits)
  }

  loadUint(bits: number): number {
    return toSafeNumber(this.loadUintBig(bits))
  }

  preloadUint(bits: number): number {
    return toSafeNumber(this.preloadUintBig(bits))
  }

  loadInt(bits: number): number {
    return toSafeNumber(this.loadIntBig(bits))
  }

  loadMaybeUint(bits: number): number | null {
    return this.loadBit() ? this.loadUint(bits) : null
  }

  loadVarUintBig(bytesLimit: number): bigint {
    const size = this.loadUint(bitLengthOf(bytesLimit - 1))
    return this.loadUintBig(size * 8)
  }

  loadVarUint(bytesLimit: number): number {
    return toSafeNumber(this.loadVarUintBig(bytesLimit))
  }

  loadVarIntBig(bytesLimit: number): bigint {
    const size = this.loadUint(bitLengthOf(bytesLimit - 1))
    return this.loadIntBig(size * 8)
  }

  // VarUInteger 16
  loadCoins(): bigint {
    return this.loadVarUintBig(16)
  }

  loadMaybeCoins(): bigint | null {
    return this.loadBit() ? this.loadCoins() : null
  }

  // Number of consecutive 1 bits, consuming the terminating 0.
  loadUnary(): number {
    let length = 0
    while (this.loadBit()) length++
    return length
  }

  loadRef(): Cell {
    if (this.refIndex >= this.cell.refs.length) {
      throw new TonError('RefUnderflow', `no refs left, cell has ${this.cell.refs.length}`)
    }
    return this.cell.refs[this.refIndex++]
  }

  preloadRef(): Cell {
    if (this.refIndex >= this.cell.refs.length) {
      throw new TonError('RefUnderflow', `no refs left, cell has ${this.cell.refs.length}`)
    }
    return this.cell.refs[this.refIndex]
  }

  loadMaybeRef(): Cell | null {
    return this.loadBit() ? this.loadRef() : null
  }

  // The unread bits and refs as a standalone cell; consumes them.
  loadRemainder(): Cell {
    const bits = this.remainingBits
    const data = this.loadBits(bits)
    const refs: Cell[] = []
    while (this.remainingRefs > 0) refs.push(this.loadRef())
    return new Cell({ data, bitLength: bits, refs })
  }

  // 32-byte hash
  loadHash(): Buffer {
    return this.loadBuffer(32)
  }

  // Root of an optional dictionary (HashmapE): presence bit plus reference.
  loadDictRoot(): Cell | null {
    return this.loadMaybeRef()
  }

  // addr_none or addr_std. addr_none reads as TonAddress.NULL; an anycast prefix is applied to the
  // hash. Use the MsgAddress codec for extern and var addresses.
  loadAddress(): TonAddress {
    const tag = this.loadUint(2)
    if (tag === 0b00) {
      return TonAddress.NULL
    }
    if (tag !== 0b10) {
      this.seek(-2)
      throw new TonError('SchemaMismatch', `expected addr_none or addr_std, got tag ${tag.toString(2).padStart(2, '0')}`)
    }
    let prefix: { depth: number; bits: Buffer } | null = null
    if (this.loadBit()) {
      const depth = this.loadUint(5)
      prefix = { depth, bits: this.loadBits(depth) }
    }
    const workchain = this.loadInt(8)
    const hash = this.loadHash()
    return prefix ? TonAddress.withRewrittenPrefix(workchain, hash, prefix.bits, prefix.depth) : new TonAddress(workchain, hash)
  }
}

// Runs `reader` over the whole cell and requires it to consume every bit and ref.
export function parseFully<T>(cell: Cell, reader: (parser: CellParser) => T): T {
  const parser = cell.beginParse()
  const value = reader(parser)
  parser.ensureEmpty()
  return value
}

const toSafeNumber = (value: bigint): number => {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new TonError('InvalidArgument', `${value} is out of safe integer range, use the bigint loader`)
  }
  return Number(value)
}
