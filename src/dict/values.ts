import { Cell } from '../cell/Cell'
import { CellBuilder } from '../cell/CellBuilder'
import { CellParser } from '../cell/CellParser'
import { readTLB, TLBCodec, writeTLB } from '../tlb/TLB'

// How a leaf value is written after its label, and read back.
export interface DictionaryValue<V> {
  write(builder: CellBuilder, value: V): void
  read(parser: CellParser): V
}

export const DictionaryValues = {
  Uint: (bits: number): DictionaryValue<number> => ({
    write: (builder, value) => builder.storeUint(value, bits),
    read: (parser) => parser.loadUint(bits),
  }),

  Int: (bits: number): DictionaryValue<number> => ({
    write: (builder, value) => builder.storeInt(value, bits),
    read: (parser) => parser.loadInt(bits),
  }),

  BigUint: (bits: number): DictionaryValue<bigint> => ({
    write: (builder, value) => builder.storeUint(value, bits),
    read: (parser) => parser.loadUintBig(bits),
  }),

  BigInt: (bits: number): DictionaryValue<bigint> => ({
    write: (builder, value) => builder.storeInt(value, bits),
    read: (parser) => parser.loadIntBig(bits),
  }),

  Bool: (): DictionaryValue<boolean> => ({
    write: (builder, value) => builder.storeBit(value),
    read: (parser) => parser.loadBit(),
  }),

  Coins: (): DictionaryValue<bigint> => ({
    write: (builder, value) => builder.storeCoins(value),
    read: (parser) => parser.loadCoins(),
  }),

  VarUint: (bytesLimit: number): DictionaryValue<bigint> => ({
    write: (builder, value) => builder.storeVarUint(value, bytesLimit),
    read: (parser) => parser.loadVarUintBig(bytesLimit),
  }),

  Buffer: (bytes: number): DictionaryValue<Buffer> => ({
    write: (builder, value) => builder.storeBuffer(value, bytes),
    read: (parser) => parser.loadBuffer(bytes),
  }),

  // ^Cell
  Cell: (): DictionaryValue<Cell> => ({
    write: (builder, value) => builder.storeRef(value),
    read: (parser) => parser.loadRef(),
  }),

  // Whatever follows the label, inline.
  Remainder: (): DictionaryValue<Cell> => ({
    write: (builder, value) => builder.storeCell(value),
    read: (parser) => parser.loadRemainder(),
  }),

  TLB: <T>(codec: TLBCodec<T>): DictionaryValue<T> => ({
    write: (builder, value) => writeTLB(builder, codec, value),
    read: (parser) => readTLB(parser, codec),
  }),
}
