import { TonAddress } from '../../address/TonAddress'
import { TonError } from '../../errors'
import { MaybeCodec } from '../primitives'
import { readTLB, TLBCodec, writeTLB } from '../TLB'

// anycast_info$_ depth:(#<= 30) { depth >= 1 } rewrite_pfx:(bits depth)
export interface Anycast {
  depth: number
  // `depth` bits, left-aligned
  prefix: Buffer
}

export type MsgAddressNone = { kind: 'none' }
export type MsgAddressExtern = { kind: 'extern'; bitLength: number; address: Buffer }
export type MsgAddressStd = { kind: 'std'; anycast: Anycast | null; workchain: number; address: Buffer }
export type MsgAddressVar = {
  kind: 'var'
  anycast: Anycast | null
  workchain: number
  bitLength: number
  address: Buffer
}

export type MsgAddressInt = MsgAddressStd | MsgAddressVar
export type MsgAddressExt = MsgAddressNone | MsgAddressExtern
export type MsgAddress = MsgAddressInt | MsgAddressExt

export const ADDR_NONE: MsgAddressNone = { kind: 'none' }

const MAX_ANYCAST_DEPTH = 30

export const AnycastCodec: TLBCodec<Anycast> = {
  readDefinition: (parser) => {
    const depth = parser.loadUint(5)
    if (depth < 1 || depth > MAX_ANYCAST_DEPTH) {
      throw new TonError('SchemaMismatch', `anycast depth must be in 1..${MAX_ANYCAST_DEPTH}, got ${depth}`)
    }
    return { depth, prefix: parser.loadBits(depth) }
  },
  writeDefinition: (builder, { depth, prefix }) => {
    if (depth < 1 || depth > MAX_ANYCAST_DEPTH) {
      throw new TonError('InvalidArgument', `anycast depth must be in 1..${MAX_ANYCAST_DEPTH}, got ${depth}`)
    }
    builder.storeUint(depth, 5).storeBits(prefix, depth)
  },
}

const MaybeAnycast = MaybeCodec(AnycastCodec)

const tagOf = (kind: MsgAddress['kind']): number => {
  switch (kind) {
    case 'none':
      return 0b00
    case 'extern':
      return 0b01
    case 'std':
      return 0b10
    case 'var':
      return 0b11
  }
}

// addr_none$00 | addr_extern$01 | addr_std$10 | addr_var$11
export const MsgAddressCodec: TLBCodec<MsgAddress> = {
  readDefinition: (parser) => {
    switch (parser.loadUint(2)) {
      case 0b00:
        return ADDR_NONE
      case 0b01: {
        const bitLength = parser.loadUint(9)
        return { kind: 'extern', bitLength, address: parser.loadBits(bitLength) }
      }
      case 0b10: {
        const anycast = readTLB(parser, MaybeAnycast)
        const workchain = parser.loadInt(8)
        return { kind: 'std', anycast, workchain, address: parser.loadBits(256) }
      }
      default: {
        const anycast = readTLB(parser, MaybeAnycast)
        const bitLength = parser.loadUint(9)
        const workchain = parser.loadInt(32)
        return { kind: 'var', anycast, workchain, bitLength, address: parser.loadBits(bitLength) }
      }
    }
  },
  writeDefinition: (builder, address) => {
    builder.storeUint(tagOf(address.kind), 2)
    switch (address.kind) {
      case 'none':
        return
      case 'extern':
        builder.storeUint(address.bitLength, 9).storeBits(address.address, address.bitLength)
        return
      case 'std':
        writeTLB(builder, MaybeAnycast, address.anycast)
        builder.storeInt(address.workchain, 8).storeBits(address.address, 256)
        return
      case 'var':
        writeTLB(builder, MaybeAnycast, address.anycast)
        builder
          .storeUint(address.bitLength, 9)
          .storeInt(address.workchain, 32)
          .storeBits(address.address, address.bitLength)
        return
    }
  },
}

// Same encoding, restricted to the internal variants.
export const MsgAddressIntCodec: TLBCodec<MsgAddressInt> = {
  readDefinition: (parser) => {
    const tag = parser.preloadUint(2)
    if (tag < 0b10) {
      throw new TonError('SchemaMismatch', `expected an internal address, got tag ${tag.toString(2).padStart(2, '0')}`)
    }
    const address = readTLB(parser, MsgAddressCodec)
    if (address.kind === 'none' || address.kind === 'extern') {
      throw new TonError('SchemaMismatch', `expected an internal address, got addr_${address.kind}`)
    }
    return address
  },
  writeDefinition: (builder, address) => MsgAddressCodec.writeDefinition(builder, address),
}

// Same encoding, restricted to addr_none and addr_extern.
export const MsgAddressExtCodec: TLBCodec<MsgAddressExt> = {
  readDefinition: (parser) => {
    const tag = parser.preloadUint(2)
    if (tag >= 0b10) {
      throw new TonError('SchemaMismatch', `expected an external address, got tag ${tag.toString(2)}`)
    }
    const address = readTLB(parser, MsgAddressCodec)
    if (address.kind === 'std' || address.kind === 'var') {
      throw new TonError('SchemaMismatch', `expected an external address, got addr_${address.kind}`)
    }
    return address
  },
  writeDefinition: (builder, address) => MsgAddressCodec.writeDefinition(builder, address),
}

// `TonAddress.NULL` becomes addr_none.
export const toMsgAddress = (address: TonAddress): MsgAddressNone | MsgAddressStd =>
  address.isNull() ? ADDR_NONE : { kind: 'std', anycast: null, workchain: address.workchain, address: address.hash }

// Internal address with the anycast prefix applied; addr_none becomes `TonAddress.NULL`.
export const toTonAddress = (address: MsgAddress): TonAddress => {
  switch (address.kind) {
    case 'none':
      return TonAddress.NULL
    case 'extern':
      throw new TonError('InvalidAddress', "external addresses can't be converted to a TonAddress")
    case 'std':
    case 'var': {
      const bitLength = address.kind === 'std' ? 256 : address.bitLength
      if (bitLength !== 256) {
        throw new TonError('InvalidLength', `address must have 256 bits, got ${bitLength}`)
      }
      const { anycast } = address
      return anycast
        ? TonAddress.withRewrittenPrefix(address.workchain, address.address, anycast.prefix, anycast.depth)
        : new TonAddress(address.workchain, address.address)
    }
  }
}
