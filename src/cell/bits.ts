// Bit-level helpers shared by the writer, the reader and the cell hasher. Bit 0 is the most
// significant bit of byte 0.

export const getBit = (buffer: Buffer, index: number): boolean =>
  (buffer[index >> 3] & (0x80 >> (index & 7))) !== 0

export const setBit = (buffer: Buffer, index: number, value: boolean): void => {
  const mask = 0x80 >> (index & 7)
  if (value) {
    buffer[index >> 3] |= mask
  } else {
    buffer[index >> 3] &= ~mask
  }
}

export const copyBits = (
  target: Buffer,
  targetOffset: number,
  source: Buffer,
  sourceOffset: number,
  length: number,
): void => {
  if ((targetOffset & 7) === 0 && (sourceOffset & 7) === 0 && (length & 7) === 0) {
    source.copy(target, targetOffset >> 3, sourceOffset >> 3, (sourceOffset + length) >> 3)
    return
  }
  for (let i = 0; i < length; i++) {
    setBit(target, targetOffset + i, getBit(source, sourceOffset + i))
  }
}

// Buffer of ceil(length / 8) bytes holding `length` bits of `source` starting at `offset`,
// trailing bits zeroed.
export const sliceBits = (source: Buffer, offset: number, length: number): Buffer => {
  const result = Buffer.alloc(Math.ceil(length / 8))
  copyBits(result, 0, source, offset, length)
  return result
}

// Appends the completion tag (a single 1 bit, then 0 bits) when `bitLength` is not byte aligned.
export const padBits = (data: Buffer, bitLength: number): Buffer => {
  const bytes = Math.ceil(bitLength / 8)
  const result = Buffer.alloc(bytes)
  data.copy(result, 0, 0, bytes)
  if (bitLength % 8 !== 0) {
    result[bytes - 1] |= 0x80 >> (bitLength % 8)
  }
  return result
}

export const bitLengthOf = (value: number | bigint): number => {
  if (typeof value === 'number') {
    if (value === 0) return 0
    return value < 2 ** 32 ? 32 - Math.clz32(value) : value.toString(2).length
  }
  return value === 0n ? 0 : value.toString(2).length
}

export const bitsToString = (data: Buffer, bitLength: number): string => {
  let result = ''
  for (let i = 0; i < bitLength; i++) {
    result += getBit(data, i) ? '1' : '0'
  }
  return result
}
