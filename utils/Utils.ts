import { Cell } from '../src/cell/Cell'
import { CellBuilder } from '../src/cell/CellBuilder'
import { CellParser } from '../src/cell/CellParser'
import { TonError } from '../src/errors'

// Big-endian bytes of `value`, left-padded to `bytes` (32 by default).
export function bigIntToBuffer(value: bigint, bytes = 32): Buffer {
  if (value < 0n || value >= 1n << BigInt(bytes * 8)) {
    throw new TonError('InvalidArgument', `${value} doesn't fit in ${bytes} bytes`)
  }
  return Buffer.from(value.toString(16).padStart(bytes * 2, '0'), 'hex')
}

export function bufferToBigInt(bytes: Uint8Array): bigint {
  let result = 0n
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte)
  }
  return result
}

// Packs items into a chain of cells, each holding as many items as fit plus a ref to the next.
export function asSnakeData<T>(array: T[], builderFn: (item: T) => CellBuilder): Cell {
  const cells: CellBuilder[] = []
  let builder = new CellBuilder()

  for (const value of array) {
    const itemBuilder = builderFn(value)
    if (itemBuilder.refs > 3) {
      throw new TonError('TooManyReferences', 'Cannot pack more than 3 refs per item, use storeRef to a cell containing the item')
    }
    if (builder.availableBits < itemBuilder.bits || builder.availableRefs - 1 < itemBuilder.refs) {
      cells.push(builder)
      builder = new CellBuilder()
    }
    builder.storeBuilder(itemBuilder)
  }
  cells.push(builder)

  // Build the linked structure from the end
  let current = cells[cells.length - 1].build()
  for (let i = cells.length - 2; i >= 0; i--) {
    current = cells[i].storeRef(current).build()
  }
  return current
}

export function fromSnakeData<T>(data: Cell, readerFn: (cs: CellParser) => T): T[] {
  const array: T[] = []
  let cs = data.beginParse()
  while (!cs.isEmpty()) {
    if (cs.remainingBits > 0) {
      array.push(readerFn(cs))
    } else {
      cs = cs.loadRef().beginParse()
    }
  }
  return array
}

const SNAKE_PREFIX = 0x00

// Bytes spread over a cell chain: as many whole bytes per cell as fit, then a ref to the rest.
export function storeSnakeBytes(builder: CellBuilder, data: Buffer): CellBuilder {
  const head = Math.min(data.length, Math.floor(builder.availableBits / 8))
  builder.storeBuffer(data.subarray(0, head))
  if (head < data.length) {
    builder.storeRef(storeSnakeBytes(new CellBuilder(), data.subarray(head)))
  }
  return builder
}

export function loadSnakeBytes(parser: CellParser): Buffer {
  const chunks: Buffer[] = []
  let cs = parser
  for (;;) {
    if (cs.remainingBits % 8 !== 0) {
      throw new TonError('UnexpectedData', `snake chunk has ${cs.remainingBits} bits, not whole bytes`)
    }
    chunks.push(cs.loadBuffer(cs.remainingBits / 8))
    if (cs.remainingRefs === 0) break
    cs = cs.loadRef().beginParse()
  }
  return Buffer.concat(chunks)
}

// Off-chain text content: 0x00 prefix, then UTF-8 snake bytes.
export function storeSnakeString(builder: CellBuilder, text: string): CellBuilder {
  return storeSnakeBytes(builder.storeUint(SNAKE_PREFIX, 8), Buffer.from(text, 'utf8'))
}

export function loadSnakeString(parser: CellParser): string {
  const prefix = parser.loadUint(8)
  if (prefix !== SNAKE_PREFIX) {
    throw new TonError('SchemaMismatch', `expected snake prefix 0x00, got 0x${prefix.toString(16)}`)
  }
  return loadSnakeBytes(parser).toString('utf8')
}

export const snakeString = (text: string): Cell => storeSnakeString(new CellBuilder(), text).build()
