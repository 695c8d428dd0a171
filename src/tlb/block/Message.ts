import { Cell } from '../../cell/Cell'
import { CellBuilder } from '../../cell/CellBuilder'
import { TonError } from '../../errors'
import { CellCodec, EitherRef, EitherRefCodec, MaybeCodec } from '../primitives'
import { readTLB, TLBCodec, toCell, writeTLB } from '../TLB'
import { CurrencyCollection, CurrencyCollectionCodec, currencies } from './Coins'
import {
  ADDR_NONE,
  MsgAddress,
  MsgAddressCodec,
  MsgAddressExt,
  MsgAddressExtCodec,
  MsgAddressInt,
  MsgAddressIntCodec,
} from './MsgAddress'
import { StateInit, StateInitCodec } from './StateInit'

export interface IntMsgInfo {
  kind: 'int'
  ihrDisabled: boolean
  bounce: boolean
  bounced: boolean
  // addr_none in outgoing messages, filled in by the network
  src: MsgAddress
  dest: MsgAddressInt
  value: CurrencyCollection
  ihrFee: bigint
  fwdFee: bigint
  createdLt: bigint
  createdAt: number
}

export interface ExtInMsgInfo {
  kind: 'extIn'
  src: MsgAddressExt
  dest: MsgAddressInt
  importFee: bigint
}

export interface ExtOutMsgInfo {
  kind: 'extOut'
  // addr_none in outgoing messages, as for internal ones
  src: MsgAddress
  dest: MsgAddressExt
  createdLt: bigint
  createdAt: number
}

export type CommonMsgInfo = IntMsgInfo | ExtInMsgInfo | ExtOutMsgInfo

export interface Message {
  info: CommonMsgInfo
  init: EitherRef<StateInit> | null
  body: EitherRef<Cell>
}

// int_msg_info$0 ihr_disabled:Bool bounce:Bool bounced:Bool src:MsgAddressInt dest:MsgAddressInt
//   value:CurrencyCollection ihr_fee:Grams fwd_fee:Grams created_lt:uint64 created_at:uint32
export const IntMsgInfoCodec: TLBCodec<IntMsgInfo> = {
  prefix: { bits: 1, value: 0b0 },
  readDefinition: (parser) => ({
    kind: 'int',
    ihrDisabled: parser.loadBit(),
    bounce: parser.loadBit(),
    bounced: parser.loadBit(),
    src: readTLB(parser, MsgAddressCodec),
    dest: readTLB(parser, MsgAddressIntCodec),
    value: readTLB(parser, CurrencyCollectionCodec),
    ihrFee: parser.loadCoins(),
    fwdFee: parser.loadCoins(),
    createdLt: parser.loadUintBig(64),
    createdAt: parser.loadUint(32),
  }),
  writeDefinition: (builder, info) => {
    builder.storeBit(info.ihrDisabled).storeBit(info.bounce).storeBit(info.bounced)
    writeTLB(builder, MsgAddressCodec, info.src)
    writeTLB(builder, MsgAddressIntCodec, info.dest)
    writeTLB(builder, CurrencyCollectionCodec, info.value)
    builder
      .storeCoins(info.ihrFee)
      .storeCoins(info.fwdFee)
      .storeUint(info.createdLt, 64)
      .storeUint(info.createdAt, 32)
  },
}

// ext_in_msg_info$10 src:MsgAddressExt dest:MsgAddressInt import_fee:Grams
export const ExtInMsgInfoCodec: TLBCodec<ExtInMsgInfo> = {
  prefix: { bits: 2, value: 0b10 },
  readDefinition: (parser) => ({
    kind: 'extIn',
    src: readTLB(parser, MsgAddressExtCodec),
    dest: readTLB(parser, MsgAddressIntCodec),
    importFee: parser.loadCoins(),
  }),
  writeDefinition: (builder, info) => {
    writeTLB(builder, MsgAddressExtCodec, info.src)
    writeTLB(builder, MsgAddressIntCodec, info.dest)
    builder.storeCoins(info.importFee)
  },
}

// ext_out_msg_info$11 src:MsgAddressInt dest:MsgAddressExt created_lt:uint64 created_at:uint32
export const ExtOutMsgInfoCodec: TLBCodec<ExtOutMsgInfo> = {
  prefix: { bits: 2, value: 0b11 },
  readDefinition: (parser) => ({
    kind: 'extOut',
    src: readTLB(parser, MsgAddressCodec),
    dest: readTLB(parser, MsgAddressExtCodec),
    createdLt: parser.loadUintBig(64),
    createdAt: parser.loadUint(32),
  }),
  writeDefinition: (builder, info) => {
    writeTLB(builder, MsgAddressCodec, info.src)
    writeTLB(builder, MsgAddressExtCodec, info.dest)
    builder.storeUint(info.createdLt, 64).storeUint(info.createdAt, 32)
  },
}

export const CommonMsgInfoCodec: TLBCodec<CommonMsgInfo> = {
  readDefinition: (parser) => {
    if (!parser.preloadBit()) {
      return readTLB(parser, IntMsgInfoCodec)
    }
    return parser.preloadUint(2) === 0b10 ? readTLB(parser, ExtInMsgInfoCodec) : readTLB(parser, ExtOutMsgInfoCodec)
  },
  writeDefinition: (builder, info) => {
    switch (info.kind) {
      case 'int':
        writeTLB(builder, IntMsgInfoCodec, info)
        return
      case 'extIn':
        writeTLB(builder, ExtInMsgInfoCodec, info)
        return
      case 'extOut':
        writeTLB(builder, ExtOutMsgInfoCodec, info)
        return
    }
  },
}

const MaybeStateInitRef = MaybeCodec(EitherRefCodec(StateInitCodec))
const BodyCodec = EitherRefCodec(CellCodec)

// `Native` init goes inline while the body bits still fit after it, keeping two bits for the
// either flags. Refs are left to the body, which moves to a ref when they run out.
const storeInit = (builder: CellBuilder, init: EitherRef<StateInit>, body: Cell) => {
  const cell = toCell(StateInitCodec, init.value)
  let byRef = init.layout === 'ToRef'
  if (init.layout === 'Native') {
    byRef = builder.availableBits - 2 < cell.bitLength + body.bitLength
  }
  if (byRef) {
    builder.storeBit(true).storeRef(cell)
  } else {
    builder.storeBit(false).storeCell(cell)
  }
}

const storeBody = (builder: CellBuilder, body: EitherRef<Cell>) => {
  let byRef = body.layout === 'ToRef'
  if (body.layout === 'Native') {
    byRef = builder.availableBits - 1 < body.value.bitLength || builder.refs + body.value.refs.length > 4
  }
  if (byRef) {
    builder.storeBit(true).storeRef(body.value)
  } else {
    builder.storeBit(false).storeCell(body.value)
  }
}

// message$_ {X:Type} info:CommonMsgInfo init:(Maybe (Either StateInit ^StateInit))
//   body:(Either X ^X) = Message X;
export const MessageCodec: TLBCodec<Message> = {
  readDefinition: (parser) => ({
    info: readTLB(parser, CommonMsgInfoCodec),
    init: readTLB(parser, MaybeStateInitRef),
    body: readTLB(parser, BodyCodec),
  }),
  writeDefinition: (builder, message) => {
    writeTLB(builder, CommonMsgInfoCodec, message.info)
    if (message.init) {
      storeInit(builder.storeBit(true), message.init, message.body.value)
    } else {
      builder.storeBit(false)
    }
    storeBody(builder, message.body)
  },
}

export interface InternalMessageArgs {
  dest: MsgAddress
  value: bigint | CurrencyCollection
  bounce?: boolean
  body?: Cell
  init?: StateInit | null
  src?: MsgAddress
}

const internalDest = (dest: MsgAddress, message: string): MsgAddressInt => {
  if (dest.kind !== 'std' && dest.kind !== 'var') {
    throw new TonError('InvalidAddress', `${message} destination must be internal, got addr_${dest.kind}`)
  }
  return dest
}

// Outgoing internal message as a contract sends it: fees, lt and timestamp are left for the
// network to fill in.
export const internalMessage = (args: InternalMessageArgs): Message => ({
  info: {
    kind: 'int',
    ihrDisabled: true,
    bounce: args.bounce ?? true,
    bounced: false,
    src: args.src ?? ADDR_NONE,
    dest: internalDest(args.dest, 'internal message'),
    value: typeof args.value === 'bigint' ? currencies(args.value) : args.value,
    ihrFee: 0n,
    fwdFee: 0n,
    createdLt: 0n,
    createdAt: 0,
  },
  init: args.init ? { value: args.init, layout: 'Native' } : null,
  body: { value: args.body ?? Cell.EMPTY, layout: 'Native' },
})

export interface ExternalMessageArgs {
  dest: MsgAddress
  body: Cell
  init?: StateInit | null
  src?: MsgAddressExt
  importFee?: bigint
}

export const externalInMessage = (args: ExternalMessageArgs): Message => ({
  info: {
    kind: 'extIn',
    src: args.src ?? ADDR_NONE,
    dest: internalDest(args.dest, 'external message'),
    importFee: args.importFee ?? 0n,
  },
  init: args.init ? { value: args.init, layout: 'Native' } : null,
  body: { value: args.body, layout: 'Native' },
})
