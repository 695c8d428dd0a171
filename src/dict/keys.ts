import { TonAddress } from '../address/TonAddress'
import { TonError } from '../errors'

// Maps a key to the unsigned `bits`-wide integer whose bits form the trie path, and back.
export interface DictionaryKey<K> {
  bits: number
  serialize(key: K): bigint
  parse(path: bigint): K
}

const checkUnsigned = (value: bigint, bits: number) => {
  if (value < 0n || value >= 1n << BigInt(bits)) {
    throw new TonError('InvalidArgument', `key ${value} doesn't fit in ${bits} unsigned bits`)
  }
  return value
}

const toSigned = (value: bigint, bits: number) => {
  const limit = 1n << BigInt(bits - 1)
  if (value < -limit || value >= limit) {
    throw new TonError('InvalidArgument', `key ${value} doesn't fit in ${bits} signed bits`)
  }
  return value < 0n ? value + (limit << 1n) : value
}

const fromSigned = (path: bigint, bits: number) => {
  const limit = 1n << BigInt(bits - 1)
  return path >= limit ? path - (limit << 1n) : path
}

const safeNumber = (value: bigint) => {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new TonError('InvalidArgument', `key ${value} is out of safe integer range`)
  }
  return Number(value)
}

// addr_std$10 anycast:0 workchain_id:int8 address:bits256
const ADDRESS_KEY_BITS = 267

export const DictionaryKeys = {
  Uint: (bits: number): DictionaryKey<number> => ({
    bits,
    serialize: (key) => checkUnsigned(BigInt(key), bits),
    parse: safeNumber,
  }),

  Int: (bits: number): DictionaryKey<number> => ({
    bits,
    serialize: (key) => toSigned(BigInt(key), bits),
    parse: (path) => safeNumber(fromSigned(path, bits)),
  }),

  BigUint: (bits: number): DictionaryKey<bigint> => ({
    bits,
    serialize: (key) => checkUnsigned(key, bits),
    parse: (path) => path,
  }),

  BigInt: (bits: number): DictionaryKey<bigint> => ({
    bits,
    serialize: (key) => toSigned(key, bits),
    parse: (path) => fromSigned(path, bits),
  }),

  Buffer: (bytes: number): DictionaryKey<Buffer> => ({
    bits: bytes * 8,
    serialize: (key) => {
      if (key.length !== bytes) {
        throw new TonError('InvalidArgument', `key must be ${bytes} bytes, got ${key.length}`)
      }
      return bytes === 0 ? 0n : BigInt('0x' + key.toString('hex'))
    },
    parse: (path) => Buffer.from(path.toString(16).padStart(bytes * 2, '0'), 'hex'),
  }),

  Address: (): DictionaryKey<TonAddress> => ({
    bits: ADDRESS_KEY_BITS,
    serialize: (key) => {
      if (key.workchain < -128 || key.workchain > 127) {
        throw new TonError('InvalidWorkchain', `workchain ${key.workchain} doesn't fit addr_std`)
      }
      const workchain = BigInt(key.workchain & 0xff)
      return (0b100n << 264n) | (workchain << 256n) | BigInt('0x' + key.hash.toString('hex'))
    },
    parse: (path) => {
      if (path >> 264n !== 0b100n) {
        throw new TonError('CorruptDict', `address key doesn't start with addr_std`)
      }
      const workchain = Number((path >> 256n) & 0xffn)
      const hash = Buffer.from((path & ((1n << 256n) - 1n)).toString(16).padStart(64, '0'), 'hex')
      return new TonAddress(workchain >= 128 ? workchain - 256 : workchain, hash)
    },
  }),
}
