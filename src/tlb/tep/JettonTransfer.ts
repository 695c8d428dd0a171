import { Cell } from '../../cell/Cell'
import { MsgAddress, MsgAddressCodec } from '../block/MsgAddress'
import { CellCodec, EitherRef, EitherRefCodec, MaybeCodec, RefCellCodec } from '../primitives'
import { readTLB, TLBCodec, writeTLB } from '../TLB'

export const JettonOpcodes = {
  TRANSFER: 0x0f8a7ea5,
  TRANSFER_NOTIFICATION: 0x7362d09c,
  INTERNAL_TRANSFER: 0x178d4519,
  EXCESSES: 0xd53276db,
}

const ForwardPayloadCodec = EitherRefCodec(CellCodec)
const MaybeRefCell = MaybeCodec(RefCellCodec)

export const emptyForwardPayload = (): EitherRef<Cell> => ({ value: Cell.EMPTY, layout: 'ToCell' })

export interface JettonTransfer {
  queryId: bigint
  amount: bigint
  destination: MsgAddress
  responseDestination: MsgAddress
  customPayload: Cell | null
  forwardTonAmount: bigint
  forwardPayload: EitherRef<Cell>
}

// transfer#0f8a7ea5 query_id:uint64 amount:(VarUInteger 16) destination:MsgAddress
//   response_destination:MsgAddress custom_payload:(Maybe ^Cell) forward_ton_amount:(VarUInteger 16)
//   forward_payload:(Either Cell ^Cell) = InternalMsgBody;
export const JettonTransferCodec: TLBCodec<JettonTransfer> = {
  prefix: { bits: 32, value: JettonOpcodes.TRANSFER },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    amount: parser.loadCoins(),
    destination: readTLB(parser, MsgAddressCodec),
    responseDestination: readTLB(parser, MsgAddressCodec),
    customPayload: readTLB(parser, MaybeRefCell),
    forwardTonAmount: parser.loadCoins(),
    forwardPayload: readTLB(parser, ForwardPayloadCodec),
  }),
  writeDefinition: (builder, transfer) => {
    builder.storeUint(transfer.queryId, 64).storeCoins(transfer.amount)
    writeTLB(builder, MsgAddressCodec, transfer.destination)
    writeTLB(builder, MsgAddressCodec, transfer.responseDestination)
    writeTLB(builder, MaybeRefCell, transfer.customPayload)
    builder.storeCoins(transfer.forwardTonAmount)
    writeTLB(builder, ForwardPayloadCodec, transfer.forwardPayload)
  },
}

export interface JettonInternalTransfer {
  queryId: bigint
  amount: bigint
  from: MsgAddress
  responseAddress: MsgAddress
  forwardTonAmount: bigint
  forwardPayload: EitherRef<Cell>
}

// internal_transfer#178d4519 query_id:uint64 amount:(VarUInteger 16) from:MsgAddress
//   response_address:MsgAddress forward_ton_amount:(VarUInteger 16)
//   forward_payload:(Either Cell ^Cell) = InternalMsgBody;
export const JettonInternalTransferCodec: TLBCodec<JettonInternalTransfer> = {
  prefix: { bits: 32, value: JettonOpcodes.INTERNAL_TRANSFER },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    amount: parser.loadCoins(),
    from: readTLB(parser, MsgAddressCodec),
    responseAddress: readTLB(parser, MsgAddressCodec),
    forwardTonAmount: parser.loadCoins(),
    forwardPayload: readTLB(parser, ForwardPayloadCodec),
  }),
  writeDefinition: (builder, transfer) => {
    builder.storeUint(transfer.queryId, 64).storeCoins(transfer.amount)
    writeTLB(builder, MsgAddressCodec, transfer.from)
    writeTLB(builder, MsgAddressCodec, transfer.responseAddress)
    builder.storeCoins(transfer.forwardTonAmount)
    writeTLB(builder, ForwardPayloadCodec, transfer.forwardPayload)
  },
}

export interface JettonTransferNotification {
  queryId: bigint
  amount: bigint
  sender: MsgAddress
  forwardPayload: EitherRef<Cell>
}

// transfer_notification#7362d09c query_id:uint64 amount:(VarUInteger 16) sender:MsgAddress
//   forward_payload:(Either Cell ^Cell) = InternalMsgBody;
export const JettonTransferNotificationCodec: TLBCodec<JettonTransferNotification> = {
  prefix: { bits: 32, value: JettonOpcodes.TRANSFER_NOTIFICATION },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    amount: parser.loadCoins(),
    sender: readTLB(parser, MsgAddressCodec),
    forwardPayload: readTLB(parser, ForwardPayloadCodec),
  }),
  writeDefinition: (builder, notification) => {
    builder.storeUint(notification.queryId, 64).storeCoins(notification.amount)
    writeTLB(builder, MsgAddressCodec, notification.sender)
    writeTLB(builder, ForwardPayloadCodec, notification.forwardPayload)
  },
}

// excesses#d53276db query_id:uint64 = InternalMsgBody;
export const ExcessesCodec: TLBCodec<{ queryId: bigint }> = {
  prefix: { bits: 32, value: JettonOpcodes.EXCESSES },
  readDefinition: (parser) => ({ queryId: parser.loadUintBig(64) }),
  writeDefinition: (builder, { queryId }) => {
    builder.storeUint(queryId, 64)
  },
}
