import { TonError } from '../errors'

const HASH_BYTES = 32
const HEX_HASH = /^[0-9a-fA-F]{64}$/
const BASE64_HASH = /^[A-Za-z0-9+/_-]{43}=?$/

const decodeHash = (text: string): Buffer => {
  if (HEX_HASH.test(text)) return Buffer.from(text, 'hex')
  if (BASE64_HASH.test(text)) {
    // Node's base64 decoder takes both alphabets, padded or not
    const hash = Buffer.from(text, 'base64')
    if (hash.length === HASH_BYTES) return hash
  }
  throw new TonError('InvalidArgument', `transaction hash ${JSON.stringify(text)} is neither 64 hex digits nor base64`)
}

/** A transaction's logical time and hash, written `lt:hex`. */
export class TxId {
  static readonly NULL = new TxId(0n, Buffer.alloc(HASH_BYTES))

  readonly lt: bigint
  readonly hash: Buffer

  constructor(lt: bigint, hash: Buffer) {
    if (hash.length !== HASH_BYTES) {
      throw new TonError('InvalidArgument', `transaction hash must be ${HASH_BYTES} bytes, got ${hash.length}`)
    }
    this.lt = lt
    this.hash = Buffer.from(hash)
  }

  // The hash may be given as hex or as base64 in either alphabet.
  static fromLtHash(lt: bigint, hash: string): TxId {
    return new TxId(lt, decodeHash(hash))
  }

  static parse(text: string): TxId {
    const parts = text.split(':')
    if (parts.length !== 2 || !/^-?\d+$/.test(parts[0])) {
      throw new TonError('InvalidArgument', `transaction id ${JSON.stringify(text)} is not lt:hash`)
    }
    return TxId.fromLtHash(BigInt(parts[0]), parts[1])
  }

  get hashHex(): string {
    return this.hash.toString('hex')
  }

  equals(other: TxId): boolean {
    return this.lt === other.lt && this.hash.equals(other.hash)
  }

  toString(): string {
    return `${this.lt}:${this.hashHex}`
  }
}
