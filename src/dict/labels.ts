import { bitLengthOf } from '../cell/bits'
import { CellBuilder } from '../cell/CellBuilder'
import { CellParser } from '../cell/CellParser'
import { TonError } from '../errors'

// A run of key bits shared by every key below a node, stored as a bigint of `length` bits.
export interface Label {
  value: bigint
  length: number
}

export type LabelKind = 'short' | 'long' | 'same'

const isSame = ({ value, length }: Label) => value === 0n || value === (1n << BigInt(length)) - 1n

// `maxLength` is the number of key bits left at the node.
export const labelKind = (label: Label, maxLength: number): LabelKind => {
  const lengthBits = bitLengthOf(maxLength)
  let kind: LabelKind = 'short'
  let cost = 2 * label.length + 2
  const longCost = 2 + lengthBits + label.length
  if (longCost < cost) {
    kind = 'long'
    cost = longCost
  }
  if (isSame(label) && 3 + lengthBits < cost) {
    kind = 'same'
  }
  return kind
}

export const storeLabel = (builder: CellBuilder, label: Label, maxLength: number): void => {
  const lengthBits = bitLengthOf(maxLength)
  switch (labelKind(label, maxLength)) {
    case 'short':
      builder.storeBit(false).storeUnary(label.length).storeUint(label.value, label.length)
      return
    case 'long':
      builder.storeUint(0b10, 2).storeUint(label.length, lengthBits).storeUint(label.value, label.length)
      return
    case 'same':
      builder.storeUint(0b11, 2).storeBit(label.value !== 0n).storeUint(label.length, lengthBits)
      return
  }
}

const corrupt = (message: string) => new TonError('CorruptDict', message)

export const loadLabel = (parser: CellParser, maxLength: number): Label => {
  const lengthBits = bitLengthOf(maxLength)
  if (!parser.loadBit()) {
    const length = parser.loadUnary()
    if (length > maxLength) throw corrupt(`short label of ${length} bits, ${maxLength} key bits left`)
    return { value: parser.loadUintBig(length), length }
  }
  if (!parser.loadBit()) {
    const length = parser.loadUint(lengthBits)
    if (length > maxLength) throw corrupt(`long label of ${length} bits, ${maxLength} key bits left`)
    return { value: parser.loadUintBig(length), length }
  }
  const bit = parser.loadBit()
  const length = parser.loadUint(lengthBits)
  if (length > maxLength) throw corrupt(`same label of ${length} bits, ${maxLength} key bits left`)
  return { value: bit ? (1n << BigInt(length)) - 1n : 0n, length }
}
