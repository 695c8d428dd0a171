import { Cell } from '../../cell/Cell'
import { CellBuilder } from '../../cell/CellBuilder'
import { TonError } from '../../errors'
import { Either, EitherCodec, RefCellCodec } from '../primitives'
import { readTLB, TLBCodec, writeTLB } from '../TLB'
import { CurrencyCollection, CurrencyCollectionCodec } from './Coins'

export interface ActionSendMsg {
  kind: 'sendMsg'
  mode: number
  outMsg: Cell
}

export interface ActionSetCode {
  kind: 'setCode'
  newCode: Cell
}

export interface ActionReserveCurrency {
  kind: 'reserveCurrency'
  mode: number
  currency: CurrencyCollection
}

export interface ActionChangeLibrary {
  kind: 'changeLibrary'
  mode: number
  // library code hash, or the code itself
  library: Either<Buffer, Cell>
}

export type OutAction = ActionSendMsg | ActionSetCode | ActionReserveCurrency | ActionChangeLibrary

export abstract class OutActionOpcodes {
  static SEND_MSG = 0x0ec3c86d
  static SET_CODE = 0xad4de08e
  static RESERVE_CURRENCY = 0x36e6b809
  static CHANGE_LIBRARY = 0x26fa1dd4
}

// action_send_msg#0ec3c86d mode:(## 8) out_msg:^(MessageRelaxed Any)
export const ActionSendMsgCodec: TLBCodec<ActionSendMsg> = {
  prefix: { bits: 32, value: OutActionOpcodes.SEND_MSG },
  readDefinition: (parser) => ({ kind: 'sendMsg', mode: parser.loadUint(8), outMsg: parser.loadRef() }),
  writeDefinition: (builder, action) => {
    builder.storeUint(action.mode, 8).storeRef(action.outMsg)
  },
}

// action_set_code#ad4de08e new_code:^Cell
export const ActionSetCodeCodec: TLBCodec<ActionSetCode> = {
  prefix: { bits: 32, value: OutActionOpcodes.SET_CODE },
  readDefinition: (parser) => ({ kind: 'setCode', newCode: parser.loadRef() }),
  writeDefinition: (builder, action) => {
    builder.storeRef(action.newCode)
  },
}

// action_reserve_currency#36e6b809 mode:(## 8) currency:CurrencyCollection
export const ActionReserveCurrencyCodec: TLBCodec<ActionReserveCurrency> = {
  prefix: { bits: 32, value: OutActionOpcodes.RESERVE_CURRENCY },
  readDefinition: (parser) => ({
    kind: 'reserveCurrency',
    mode: parser.loadUint(8),
    currency: readTLB(parser, CurrencyCollectionCodec),
  }),
  writeDefinition: (builder, action) => {
    writeTLB(builder.storeUint(action.mode, 8), CurrencyCollectionCodec, action.currency)
  },
}

const Hash256Codec: TLBCodec<Buffer> = {
  readDefinition: (parser) => parser.loadHash(),
  writeDefinition: (builder, hash) => {
    builder.storeBuffer(hash, 32)
  },
}

const LibRefCodec = EitherCodec(Hash256Codec, RefCellCodec)

// action_change_library#26fa1dd4 mode:(## 7) libref:LibRef
export const ActionChangeLibraryCodec: TLBCodec<ActionChangeLibrary> = {
  prefix: { bits: 32, value: OutActionOpcodes.CHANGE_LIBRARY },
  readDefinition: (parser) => ({
    kind: 'changeLibrary',
    mode: parser.loadUint(7),
    library: readTLB(parser, LibRefCodec),
  }),
  writeDefinition: (builder, action) => {
    writeTLB(builder.storeUint(action.mode, 7), LibRefCodec, action.library)
  },
}

export const OutActionCodec: TLBCodec<OutAction> = {
  readDefinition: (parser) => {
    const tag = parser.preloadUint(32)
    switch (tag) {
      case OutActionOpcodes.SEND_MSG:
        return readTLB(parser, ActionSendMsgCodec)
      case OutActionOpcodes.SET_CODE:
        return readTLB(parser, ActionSetCodeCodec)
      case OutActionOpcodes.RESERVE_CURRENCY:
        return readTLB(parser, ActionReserveCurrencyCodec)
      case OutActionOpcodes.CHANGE_LIBRARY:
        return readTLB(parser, ActionChangeLibraryCodec)
      default:
        throw new TonError('SchemaMismatch', `unknown out action 0x${tag.toString(16).padStart(8, '0')}`)
    }
  },
  writeDefinition: (builder, action) => {
    switch (action.kind) {
      case 'sendMsg':
        writeTLB(builder, ActionSendMsgCodec, action)
        return
      case 'setCode':
        writeTLB(builder, ActionSetCodeCodec, action)
        return
      case 'reserveCurrency':
        writeTLB(builder, ActionReserveCurrencyCodec, action)
        return
      case 'changeLibrary':
        writeTLB(builder, ActionChangeLibraryCodec, action)
        return
    }
  },
}

export const MAX_OUT_ACTIONS = 255

// out_list_empty$_ = OutList 0;
// out_list$_ {n:#} prev:^(OutList n) action:OutAction = OutList (n + 1);
// The list is written inline; the last action is the outermost one.
export const OutListCodec: TLBCodec<OutAction[]> = {
  readDefinition: (parser) => {
    const actions: OutAction[] = []
    let current = parser
    while (current.remainingBits > 0) {
      const prev = current.loadRef()
      actions.push(readTLB(current, OutActionCodec))
      current.ensureEmpty()
      if (actions.length > MAX_OUT_ACTIONS) {
        throw new TonError('SchemaMismatch', `out list holds more than ${MAX_OUT_ACTIONS} actions`)
      }
      current = prev.beginParse()
    }
    current.ensureEmpty()
    return actions.reverse()
  },
  writeDefinition: (builder, actions) => {
    if (actions.length > MAX_OUT_ACTIONS) {
      throw new TonError('InvalidArgument', `out list can hold at most ${MAX_OUT_ACTIONS} actions, got ${actions.length}`)
    }
    let list = Cell.EMPTY
    for (const action of actions.slice(0, -1)) {
      list = writeTLB(new CellBuilder().storeRef(list), OutActionCodec, action).build()
    }
    const last = actions[actions.length - 1]
    if (last) {
      writeTLB(builder.storeRef(list), OutActionCodec, last)
    }
  },
}
