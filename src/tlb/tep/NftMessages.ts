import { Cell } from '../../cell/Cell'
import { MsgAddress, MsgAddressCodec } from '../block/MsgAddress'
import { CellCodec, EitherRef, EitherRefCodec, MaybeCodec, RefCellCodec } from '../primitives'
import { readTLB, TLBCodec, writeTLB } from '../TLB'

// TEP-62
export const NftOpcodes = {
  TRANSFER: 0x5fcc3d14,
  OWNERSHIP_ASSIGNED: 0x05138d91,
  GET_STATIC_DATA: 0x2fcb26a2,
  REPORT_STATIC_DATA: 0x8b771735,
}

const ForwardPayloadCodec = EitherRefCodec(CellCodec)
const MaybeRefCell = MaybeCodec(RefCellCodec)

export interface NftTransfer {
  queryId: bigint
  newOwner: MsgAddress
  responseDestination: MsgAddress
  customPayload: Cell | null
  forwardAmount: bigint
  forwardPayload: EitherRef<Cell>
}

// transfer#5fcc3d14 query_id:uint64 new_owner:MsgAddress response_destination:MsgAddress
//   custom_payload:(Maybe ^Cell) forward_amount:(VarUInteger 16)
//   forward_payload:(Either Cell ^Cell) = InternalMsgBody;
export const NftTransferCodec: TLBCodec<NftTransfer> = {
  prefix: { bits: 32, value: NftOpcodes.TRANSFER },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    newOwner: readTLB(parser, MsgAddressCodec),
    responseDestination: readTLB(parser, MsgAddressCodec),
    customPayload: readTLB(parser, MaybeRefCell),
    forwardAmount: parser.loadCoins(),
    forwardPayload: readTLB(parser, ForwardPayloadCodec),
  }),
  writeDefinition: (builder, transfer) => {
    builder.storeUint(transfer.queryId, 64)
    writeTLB(builder, MsgAddressCodec, transfer.newOwner)
    writeTLB(builder, MsgAddressCodec, transfer.responseDestination)
    writeTLB(builder, MaybeRefCell, transfer.customPayload)
    builder.storeCoins(transfer.forwardAmount)
    writeTLB(builder, ForwardPayloadCodec, transfer.forwardPayload)
  },
}

export interface NftOwnershipAssigned {
  queryId: bigint
  prevOwner: MsgAddress
  forwardPayload: EitherRef<Cell>
}

// ownership_assigned#05138d91 query_id:uint64 prev_owner:MsgAddress
//   forward_payload:(Either Cell ^Cell) = InternalMsgBody;
export const NftOwnershipAssignedCodec: TLBCodec<NftOwnershipAssigned> = {
  prefix: { bits: 32, value: NftOpcodes.OWNERSHIP_ASSIGNED },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    prevOwner: readTLB(parser, MsgAddressCodec),
    forwardPayload: readTLB(parser, ForwardPayloadCodec),
  }),
  writeDefinition: (builder, assigned) => {
    builder.storeUint(assigned.queryId, 64)
    writeTLB(builder, MsgAddressCodec, assigned.prevOwner)
    writeTLB(builder, ForwardPayloadCodec, assigned.forwardPayload)
  },
}

// get_static_data#2fcb26a2 query_id:uint64 = InternalMsgBody;
export const NftGetStaticDataCodec: TLBCodec<{ queryId: bigint }> = {
  prefix: { bits: 32, value: NftOpcodes.GET_STATIC_DATA },
  readDefinition: (parser) => ({ queryId: parser.loadUintBig(64) }),
  writeDefinition: (builder, { queryId }) => {
    builder.storeUint(queryId, 64)
  },
}

export interface NftReportStaticData {
  queryId: bigint
  index: bigint
  collection: MsgAddress
}

// report_static_data#8b771735 query_id:uint64 index:uint256 collection:MsgAddress = InternalMsgBody;
export const NftReportStaticDataCodec: TLBCodec<NftReportStaticData> = {
  prefix: { bits: 32, value: NftOpcodes.REPORT_STATIC_DATA },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    index: parser.loadUintBig(256),
    collection: readTLB(parser, MsgAddressCodec),
  }),
  writeDefinition: (builder, report) => {
    builder.storeUint(report.queryId, 64).storeUint(report.index, 256)
    writeTLB(builder, MsgAddressCodec, report.collection)
  },
}
