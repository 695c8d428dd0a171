import { Cell } from '../cell/Cell'
import { readTLB, TLBCodec, fromCell, toCell, writeTLB } from './TLB'

export type Either<L, R> = { kind: 'left'; value: L } | { kind: 'right'; value: R }

// Either L R: 0 + L, or 1 + R.
export const EitherCodec = <L, R>(left: TLBCodec<L>, right: TLBCodec<R>): TLBCodec<Either<L, R>> => ({
  readDefinition: (parser) =>
    parser.loadBit() ? { kind: 'right', value: readTLB(parser, right) } : { kind: 'left', value: readTLB(parser, left) },
  writeDefinition: (builder, either) => {
    if (either.kind === 'left') {
      writeTLB(builder.storeBit(false), left, either.value)
    } else {
      writeTLB(builder.storeBit(true), right, either.value)
    }
  },
})

// Where an `Either X ^X` value goes when written. `Native` inlines it only if it fits.
export type EitherRefLayout = 'ToCell' | 'ToRef' | 'Native'

export interface EitherRef<T> {
  value: T
  layout: EitherRefLayout
}

export const EitherRefCodec = <T>(codec: TLBCodec<T>): TLBCodec<EitherRef<T>> => ({
  readDefinition: (parser) =>
    parser.loadBit()
      ? { value: fromCell(codec, parser.loadRef()), layout: 'ToRef' }
      : { value: readTLB(parser, codec), layout: 'ToCell' },
  writeDefinition: (builder, { value, layout }) => {
    const cell = toCell(codec, value)
    const inline =
      layout === 'ToCell' ||
      (layout === 'Native' && cell.bitLength < builder.availableBits && cell.refs.length <= builder.availableRefs)
    if (inline) {
      builder.ensureCapacity(1 + cell.bitLength, cell.refs.length).storeBit(false).storeCell(cell)
    } else {
      builder.ensureCapacity(1, 1).storeBit(true).storeRef(cell)
    }
  },
})

// Maybe X: 0, or 1 + X.
export const MaybeCodec = <T>(codec: TLBCodec<T>): TLBCodec<T | null> => ({
  readDefinition: (parser) => (parser.loadBit() ? readTLB(parser, codec) : null),
  writeDefinition: (builder, value) => {
    if (value === null) {
      builder.storeBit(false)
    } else {
      writeTLB(builder.storeBit(true), codec, value)
    }
  },
})

// ^X
export const RefCodec = <T>(codec: TLBCodec<T>): TLBCodec<T> => ({
  readDefinition: (parser) => fromCell(codec, parser.loadRef()),
  writeDefinition: (builder, value) => {
    builder.storeRef(toCell(codec, value))
  },
})

// The rest of the cell, as is.
export const CellCodec: TLBCodec<Cell> = {
  readDefinition: (parser) => parser.loadRemainder(),
  writeDefinition: (builder, cell) => {
    builder.storeCell(cell)
  },
}

// ^Cell
export const RefCellCodec: TLBCodec<Cell> = RefCodec(CellCodec)
