import { bitLengthOf } from '../cell/bits'
import { MAX_CELL_BITS } from '../cell/BitWriter'
import { MAX_CELL_REFS } from '../cell/Cell'
import { LevelMask } from '../cell/LevelMask'
import { TonError } from '../errors'
import { crc32c, crc32cBytes } from './crc32c'

export const BOC_MAGIC = 0xb5ee9c72
export const BOC_INDEXED_MAGIC = 0x68ff65f3
export const BOC_INDEXED_CRC32C_MAGIC = 0xacc3a728

// Cell with references replaced by indices into the bag.
export interface RawCell {
  data: Buffer
  bitLength: number
  refs: number[]
  exotic: boolean
  levelMask: number
}

// `cells` is topologically sorted: every reference points to a later index.
export interface RawBagOfCells {
  cells: RawCell[]
  roots: number[]
}

export interface SerializeOptions {
  index?: boolean
  crc32c?: boolean
}

const malformed = (message: string) => new TonError('MalformedBoc', message)

// Bounds-checked big-endian reader over the serialized bytes.
class ByteCursor {
  offset = 0

  constructor(private readonly data: Buffer) {}

  get remaining(): number {
    return this.data.length - this.offset
  }

  bytes(count: number): Buffer {
    if (count > this.remaining) {
      throw malformed(`unexpected end of data: need ${count} bytes at offset ${this.offset}, have ${this.remaining}`)
    }
    const result = this.data.subarray(this.offset, this.offset + count)
    this.offset += count
    return result
  }

  uint(size: number): number {
    let value = 0
    for (const byte of this.bytes(size)) {
      value = value * 256 + byte
    }
    if (!Number.isSafeInteger(value)) {
      throw malformed(`${size}-byte field at offset ${this.offset - size} is too large`)
    }
    return value
  }
}

const bytesFor = (value: number): number => Math.max(1, Math.ceil(bitLengthOf(value) / 8))

const readCell = (cursor: ByteCursor, index: number, cellCount: number, size: number): RawCell => {
  const [d1, d2] = cursor.bytes(2)
  const refCount = d1 & 7
  const exotic = (d1 & 8) !== 0
  const hasHashes = (d1 & 16) !== 0
  const levelMask = d1 >> 5
  if (refCount > MAX_CELL_REFS) {
    throw malformed(`cell ${index} has ${refCount} refs, max is ${MAX_CELL_REFS}`)
  }
  if (hasHashes) {
    cursor.bytes(new LevelMask(levelMask).hashCount * (32 + 2))
  }

  const dataBytes = Math.ceil(d2 / 2)
  const aligned = (d2 & 1) === 0
  const data = Buffer.from(cursor.bytes(dataBytes))
  let bitLength = dataBytes * 8
  if (!aligned) {
    const last = data[dataBytes - 1]
    if (last === 0) {
      throw malformed(`cell ${index} has a zero padding byte`)
    }
    const trailingZeros = 31 - Math.clz32(last & -last)
    data[dataBytes - 1] = last & ~(1 << trailingZeros)
    bitLength -= trailingZeros + 1
  }
  if (bitLength > MAX_CELL_BITS) {
    throw malformed(`cell ${index} has ${bitLength} bits, max is ${MAX_CELL_BITS}`)
  }

  const refs: number[] = []
  for (let i = 0; i < refCount; i++) {
    const ref = cursor.uint(size)
    if (ref <= index || ref >= cellCount) {
      throw malformed(`cell ${index} references index ${ref}, expected ${index + 1}..${cellCount - 1}`)
    }
    refs.push(ref)
  }
  return { data, bitLength, refs, exotic, levelMask }
}

export const parseRawBoc = (serial: Buffer): RawBagOfCells => {
  const cursor = new ByteCursor(serial)
  const magic = cursor.uint(4)

  let hasIndex: boolean
  let hasCrc: boolean
  let size: number
  switch (magic) {
    case BOC_MAGIC: {
      const [flags] = cursor.bytes(1)
      hasIndex = (flags & 0x80) !== 0
      hasCrc = (flags & 0x40) !== 0
      size = flags & 7
      break
    }
    case BOC_INDEXED_MAGIC:
    case BOC_INDEXED_CRC32C_MAGIC:
      hasIndex = true
      hasCrc = magic === BOC_INDEXED_CRC32C_MAGIC
      size = cursor.uint(1)
      break
    default:
      throw malformed(`unknown magic 0x${magic.toString(16).padStart(8, '0')}`)
  }
  if (size < 1 || size > 4) {
    throw malformed(`ref size must be in 1..4, got ${size}`)
  }
  const offsetBytes = cursor.uint(1)
  if (offsetBytes < 1 || offsetBytes > 8) {
    throw malformed(`offset size must be in 1..8, got ${offsetBytes}`)
  }

  const cellCount = cursor.uint(size)
  const rootCount = cursor.uint(size)
  const absent = cursor.uint(size)
  const totalCellsSize = cursor.uint(offsetBytes)
  if (rootCount < 1 || rootCount + absent > cellCount) {
    throw malformed(`inconsistent counts: ${cellCount} cells, ${rootCount} roots, ${absent} absent`)
  }
  if (absent !== 0) {
    throw malformed(`bag declares ${absent} absent cells, only complete bags are read`)
  }
  // Every cell takes at least its two descriptor bytes.
  if (cellCount * 2 > cursor.remaining) {
    throw malformed(`${cellCount} cells can't fit in ${cursor.remaining} bytes`)
  }

  const roots: number[] = []
  if (magic === BOC_MAGIC) {
    for (let i = 0; i < rootCount; i++) {
      const root = cursor.uint(size)
      if (root >= cellCount) {
        throw malformed(`root index ${root} out of range, ${cellCount} cells`)
      }
      roots.push(root)
    }
  } else {
    if (rootCount !== 1) {
      throw malformed(`indexed bag must have exactly one root, got ${rootCount}`)
    }
    roots.push(0)
  }

  if (hasIndex) {
    cursor.bytes(cellCount * offsetBytes)
  }

  const start = cursor.offset
  const cells: RawCell[] = []
  for (let i = 0; i < cellCount; i++) {
    cells.push(readCell(cursor, i, cellCount, size))
  }
  if (cursor.offset - start !== totalCellsSize) {
    throw malformed(`cell data takes ${cursor.offset - start} bytes, header says ${totalCellsSize}`)
  }

  if (hasCrc) {
    const payload = serial.subarray(0, cursor.offset)
    const expected = cursor.bytes(4).readUInt32LE()
    const actual = crc32c(payload)
    if (actual !== expected) {
      throw malformed(`crc32c mismatch: expected ${expected.toString(16)}, computed ${actual.toString(16)}`)
    }
  }
  if (cursor.remaining !== 0) {
    throw malformed(`${cursor.remaining} trailing bytes`)
  }
  return { cells, roots }
}

const rawCellSize = (cell: RawCell, size: number) => 2 + Math.ceil(cell.bitLength / 8) + cell.refs.length * size

const writeUint = (target: number[], value: number, bytes: number) => {
  for (let i = bytes - 1; i >= 0; i--) {
    target.push(Math.floor(value / 256 ** i) % 256)
  }
}

export const serializeRawBoc = (raw: RawBagOfCells, options: SerializeOptions = {}): Buffer => {
  const size = bytesFor(raw.cells.length)
  const cellSizes = raw.cells.map((cell) => rawCellSize(cell, size))
  const totalCellsSize = cellSizes.reduce((sum, cellSize) => sum + cellSize, 0)
  const offsetBytes = bytesFor(totalCellsSize)

  const out: number[] = []
  writeUint(out, BOC_MAGIC, 4)
  out.push((options.index ? 0x80 : 0) | (options.crc32c ? 0x40 : 0) | size)
  out.push(offsetBytes)
  writeUint(out, raw.cells.length, size)
  writeUint(out, raw.roots.length, size)
  writeUint(out, 0, size)
  writeUint(out, totalCellsSize, offsetBytes)
  for (const root of raw.roots) {
    writeUint(out, root, size)
  }
  if (options.index) {
    let offset = 0
    for (const cellSize of cellSizes) {
      offset += cellSize
      writeUint(out, offset, offsetBytes)
    }
  }

  for (const cell of raw.cells) {
    const dataBytes = Math.ceil(cell.bitLength / 8)
    const aligned = cell.bitLength % 8 === 0
    out.push(cell.refs.length + (cell.exotic ? 8 : 0) + cell.levelMask * 32)
    out.push(dataBytes * 2 - (aligned ? 0 : 1))
    for (let i = 0; i < dataBytes; i++) {
      out.push(i === dataBytes - 1 && !aligned ? cell.data[i] | (0x80 >> cell.bitLength % 8) : cell.data[i])
    }
    for (const ref of cell.refs) {
      writeUint(out, ref, size)
    }
  }

  const body = Buffer.from(out)
  return options.crc32c ? Buffer.concat([body, crc32cBytes(body)]) : body
}
