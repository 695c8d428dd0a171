import { BagOfCells } from '../boc/BagOfCells'
import { SerializeOptions } from '../boc/RawBagOfCells'
import { Cell } from '../cell/Cell'
import { CellBuilder } from '../cell/CellBuilder'
import { CellParser } from '../cell/CellParser'
import { TonError } from '../errors'

// Constructor tag written before the fields, e.g. `transfer#0f8a7ea5` is `{ bits: 32, value: 0x0f8a7ea5 }`.
export interface TLBPrefix {
  bits: number
  value: number
}

/**
 * Schema of a TL-B type: how `T` is read from and written to a cell. The prefix, when present, is
 * checked and written by `readTLB`/`writeTLB`; the definition functions handle the fields only.
 */
export interface TLBCodec<T> {
  prefix?: TLBPrefix
  readDefinition(parser: CellParser): T
  writeDefinition(builder: CellBuilder, value: T): void
}

export function readTLB<T>(parser: CellParser, codec: TLBCodec<T>): T {
  const { prefix } = codec
  if (prefix) {
    const tag = parser.loadUint(prefix.bits)
    if (tag !== prefix.value) {
      parser.seek(-prefix.bits)
      throw new TonError(
        'SchemaMismatch',
        `expected prefix 0x${prefix.value.toString(16)}, got 0x${tag.toString(16)}`,
      )
    }
  }
  return codec.readDefinition(parser)
}

export function writeTLB<T>(builder: CellBuilder, codec: TLBCodec<T>, value: T): CellBuilder {
  if (codec.prefix) {
    builder.storeUint(codec.prefix.value, codec.prefix.bits)
  }
  codec.writeDefinition(builder, value)
  return builder
}

export const toCell = <T>(codec: TLBCodec<T>, value: T): Cell => writeTLB(new CellBuilder(), codec, value).build()

// Reads the whole cell; leftover bits or refs are `UnexpectedData`.
export const fromCell = <T>(codec: TLBCodec<T>, cell: Cell): T => {
  const parser = cell.beginParse()
  const value = readTLB(parser, codec)
  parser.ensureEmpty()
  return value
}

export const fromBoc = <T>(codec: TLBCodec<T>, serial: Buffer): T => fromCell(codec, BagOfCells.parse(serial).singleRoot())

export const fromBocHex = <T>(codec: TLBCodec<T>, hex: string): T =>
  fromCell(codec, BagOfCells.parseHex(hex).singleRoot())

export const fromBocBase64 = <T>(codec: TLBCodec<T>, base64: string): T =>
  fromCell(codec, BagOfCells.parseBase64(base64).singleRoot())

export const toBoc = <T>(codec: TLBCodec<T>, value: T, options?: SerializeOptions): Buffer =>
  BagOfCells.fromRoot(toCell(codec, value)).serialize(options)

export const toBocHex = <T>(codec: TLBCodec<T>, value: T, options?: SerializeOptions): string =>
  toBoc(codec, value, options).toString('hex')

export const toBocBase64 = <T>(codec: TLBCodec<T>, value: T, options?: SerializeOptions): string =>
  toBoc(codec, value, options).toString('base64')

export const cellHash = <T>(codec: TLBCodec<T>, value: T): Buffer => toCell(codec, value).hash()
