import { TonError } from '../errors'
import type { Cell } from '../cell/Cell'
import { crc16 } from './crc16'

const BOUNCEABLE_TAG = 0x11
const NON_BOUNCEABLE_TAG = 0x51
const TESTNET_FLAG = 0x80

const FRIENDLY_LENGTH = 48
const FRIENDLY_BYTES = 36

export interface AddressFormat {
  bounceable?: boolean
  testnet?: boolean
  urlSafe?: boolean
}

export interface ParsedAddress {
  address: TonAddress
  bounceable: boolean
  testnet: boolean
  urlSafe: boolean
}

const BASE64_STD = /^[A-Za-z0-9+/]+$/
const BASE64_URL = /^[A-Za-z0-9_-]+$/

export class TonAddress {
  static readonly NULL = new TonAddress(0, Buffer.alloc(32))

  readonly hash: Buffer

  constructor(
    readonly workchain: number,
    hash: Buffer,
  ) {
    if (!Number.isInteger(workchain) || workchain < -(2 ** 31) || workchain >= 2 ** 31) {
      throw new TonError('InvalidWorkchain', `workchain ${workchain} is not a 32-bit integer`)
    }
    if (hash.length !== 32) {
      throw new TonError('InvalidLength', `address hash must be 32 bytes, got ${hash.length}`)
    }
    this.hash = Buffer.from(hash)
  }

  // Contract address: hash of the serialized StateInit cell.
  static derive(workchain: number, stateInit: Cell): TonAddress {
    return new TonAddress(workchain, stateInit.hash())
  }

  // Applies an anycast rewrite prefix of `depth` bits to the first bits of `hash`.
  static withRewrittenPrefix(workchain: number, hash: Buffer, prefix: Buffer, depth: number): TonAddress {
    if (depth > hash.length * 8 || prefix.length * 8 < depth) {
      throw new TonError('InvalidAddress', `can't rewrite ${depth} bits of a ${hash.length * 8}-bit address`)
    }
    const rewritten = Buffer.from(hash)
    for (let i = 0; i < depth; i++) {
      const mask = 0x80 >> (i & 7)
      if (prefix[i >> 3] & mask) {
        rewritten[i >> 3] |= mask
      } else {
        rewritten[i >> 3] &= ~mask
      }
    }
    return new TonAddress(workchain, rewritten)
  }

  static parse(source: string): TonAddress {
    return TonAddress.parseFlags(source).address
  }

  // Raw (`wc:hex`) or user-friendly form; also reports the flags of a friendly string.
  static parseFlags(source: string): ParsedAddress {
    if (source.includes(':')) {
      return { address: TonAddress.parseRaw(source), bounceable: true, testnet: false, urlSafe: true }
    }
    return TonAddress.parseFriendly(source)
  }

  static isFriendly(source: string): boolean {
    return source.length === FRIENDLY_LENGTH && (BASE64_URL.test(source) || BASE64_STD.test(source))
  }

  static parseRaw(source: string): TonAddress {
    const parts = source.split(':')
    if (parts.length !== 2) {
      throw new TonError('InvalidAddress', `'${source}' is not in wc:hex form`)
    }
    const [wc, hex] = parts
    if (!/^-?\d+$/.test(wc)) {
      throw new TonError('InvalidWorkchain', `'${wc}' is not a workchain number`)
    }
    if (!/^[0-9a-fA-F]*$/.test(hex)) {
      throw new TonError('InvalidAddress', `'${hex}' is not hex`)
    }
    if (hex.length !== 64) {
      throw new TonError('InvalidLength', `address hash must be 64 hex chars, got ${hex.length}`)
    }
    return new TonAddress(Number(wc), Buffer.from(hex, 'hex'))
  }

  static parseFriendly(source: string): ParsedAddress {
    if (source.length !== FRIENDLY_LENGTH) {
      throw new TonError('InvalidLength', `user-friendly address must be ${FRIENDLY_LENGTH} chars, got ${source.length}`)
    }
    const urlSafe = source.includes('-') || source.includes('_')
    if (!(urlSafe ? BASE64_URL : BASE64_STD).test(source)) {
      throw new TonError('InvalidAddress', `'${source}' is not base64${urlSafe ? 'url' : ''}`)
    }
    const bytes = Buffer.from(source, urlSafe ? 'base64url' : 'base64')
    if (bytes.length !== FRIENDLY_BYTES) {
      throw new TonError('InvalidLength', `user-friendly address must decode to ${FRIENDLY_BYTES} bytes, got ${bytes.length}`)
    }

    const checksum = bytes.readUInt16BE(34)
    if (crc16(bytes.subarray(0, 34)) !== checksum) {
      throw new TonError('InvalidChecksum', `checksum mismatch in '${source}'`)
    }

    let tag = bytes[0]
    const testnet = (tag & TESTNET_FLAG) !== 0
    if (testnet) tag ^= TESTNET_FLAG
    if (tag !== BOUNCEABLE_TAG && tag !== NON_BOUNCEABLE_TAG) {
      throw new TonError('InvalidAddress', `unknown address tag 0x${bytes[0].toString(16)}`)
    }

    const workchain = bytes.readInt8(1)
    return {
      address: new TonAddress(workchain, bytes.subarray(2, 34)),
      bounceable: tag === BOUNCEABLE_TAG,
      testnet,
      urlSafe,
    }
  }

  isNull(): boolean {
    return this.equals(TonAddress.NULL)
  }

  equals(other: TonAddress): boolean {
    return this.workchain === other.workchain && this.hash.equals(other.hash)
  }

  // Orders by workchain, then by hash bytes.
  compare(other: TonAddress): number {
    if (this.workchain !== other.workchain) {
      return this.workchain < other.workchain ? -1 : 1
    }
    return Buffer.compare(this.hash, other.hash)
  }

  toRaw(): string {
    return `${this.workchain}:${this.hash.toString('hex')}`
  }

  toString(format: AddressFormat = {}): string {
    const { bounceable = true, testnet = false, urlSafe = true } = format
    if (this.workchain < -128 || this.workchain > 127) {
      throw new TonError('InvalidWorkchain', `workchain ${this.workchain} doesn't fit a user-friendly address`)
    }
    const bytes = Buffer.alloc(FRIENDLY_BYTES)
    bytes[0] = (bounceable ? BOUNCEABLE_TAG : NON_BOUNCEABLE_TAG) | (testnet ? TESTNET_FLAG : 0)
    bytes.writeInt8(this.workchain, 1)
    this.hash.copy(bytes, 2)
    bytes.writeUInt16BE(crc16(bytes.subarray(0, 34)), 34)
    return bytes.toString(urlSafe ? 'base64url' : 'base64')
  }

  toJSON(): string {
    return this.toString()
  }
}
