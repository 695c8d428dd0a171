import { Cell } from '../../cell/Cell'
import { MsgAddress, MsgAddressCodec } from '../block/MsgAddress'
import { MaybeCodec, RefCellCodec } from '../primitives'
import { readTLB, TLBCodec, writeTLB } from '../TLB'

// TEP-85 soulbound items
export const SbtOpcodes = {
  PROVE_OWNERSHIP: 0x04ded148,
  OWNERSHIP_PROOF: 0x0524c7ae,
  REQUEST_OWNER: 0xd0c3bfea,
  OWNER_INFO: 0x0dd607e3,
  DESTROY: 0x1f04537a,
  REVOKE: 0x6f89f5e3,
}

const MaybeRefCell = MaybeCodec(RefCellCodec)

/** Body of both prove_ownership and request_owner. */
export interface SbtOwnershipRequest {
  queryId: bigint
  dest: MsgAddress
  forwardPayload: Cell
  withContent: boolean
}

const ownershipRequestCodec = (op: number): TLBCodec<SbtOwnershipRequest> => ({
  prefix: { bits: 32, value: op },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    dest: readTLB(parser, MsgAddressCodec),
    forwardPayload: parser.loadRef(),
    withContent: parser.loadBoolean(),
  }),
  writeDefinition: (builder, request) => {
    builder.storeUint(request.queryId, 64)
    writeTLB(builder, MsgAddressCodec, request.dest)
    builder.storeRef(request.forwardPayload).storeBit(request.withContent)
  },
})

// prove_ownership#04ded148 query_id:uint64 dest:MsgAddress forward_payload:^Cell with_content:Bool = InternalMsgBody;
export const SbtProveOwnershipCodec = ownershipRequestCodec(SbtOpcodes.PROVE_OWNERSHIP)

// request_owner#d0c3bfea query_id:uint64 dest:MsgAddress forward_payload:^Cell with_content:Bool = InternalMsgBody;
export const SbtRequestOwnerCodec = ownershipRequestCodec(SbtOpcodes.REQUEST_OWNER)

export interface SbtOwnershipProof {
  queryId: bigint
  itemId: bigint
  owner: MsgAddress
  data: Cell
  revokedAt: bigint
  content: Cell | null
}

// ownership_proof#0524c7ae query_id:uint64 item_id:uint256 owner:MsgAddress data:^Cell
//   revoked_at:uint64 content:(Maybe ^Cell) = InternalMsgBody;
export const SbtOwnershipProofCodec: TLBCodec<SbtOwnershipProof> = {
  prefix: { bits: 32, value: SbtOpcodes.OWNERSHIP_PROOF },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    itemId: parser.loadUintBig(256),
    owner: readTLB(parser, MsgAddressCodec),
    data: parser.loadRef(),
    revokedAt: parser.loadUintBig(64),
    content: readTLB(parser, MaybeRefCell),
  }),
  writeDefinition: (builder, proof) => {
    builder.storeUint(proof.queryId, 64).storeUint(proof.itemId, 256)
    writeTLB(builder, MsgAddressCodec, proof.owner)
    builder.storeRef(proof.data).storeUint(proof.revokedAt, 64)
    writeTLB(builder, MaybeRefCell, proof.content)
  },
}

export interface SbtOwnerInfo extends SbtOwnershipProof {
  initiator: MsgAddress
}

// owner_info#0dd607e3 query_id:uint64 item_id:uint256 initiator:MsgAddress owner:MsgAddress
//   data:^Cell revoked_at:uint64 content:(Maybe ^Cell) = InternalMsgBody;
export const SbtOwnerInfoCodec: TLBCodec<SbtOwnerInfo> = {
  prefix: { bits: 32, value: SbtOpcodes.OWNER_INFO },
  readDefinition: (parser) => ({
    queryId: parser.loadUintBig(64),
    itemId: parser.loadUintBig(256),
    initiator: readTLB(parser, MsgAddressCodec),
    owner: readTLB(parser, MsgAddressCodec),
    data: parser.loadRef(),
    revokedAt: parser.loadUintBig(64),
    content: readTLB(parser, MaybeRefCell),
  }),
  writeDefinition: (builder, info) => {
    builder.storeUint(info.queryId, 64).storeUint(info.itemId, 256)
    writeTLB(builder, MsgAddressCodec, info.initiator)
    writeTLB(builder, MsgAddressCodec, info.owner)
    builder.storeRef(info.data).storeUint(info.revokedAt, 64)
    writeTLB(builder, MaybeRefCell, info.content)
  },
}

const queryOnlyCodec = (op: number): TLBCodec<{ queryId: bigint }> => ({
  prefix: { bits: 32, value: op },
  readDefinition: (parser) => ({ queryId: parser.loadUintBig(64) }),
  writeDefinition: (builder, { queryId }) => {
    builder.storeUint(queryId, 64)
  },
})

// destroy#1f04537a query_id:uint64 = InternalMsgBody;
export const SbtDestroyCodec = queryOnlyCodec(SbtOpcodes.DESTROY)

// revoke#6f89f5e3 query_id:uint64 = InternalMsgBody;
export const SbtRevokeCodec = queryOnlyCodec(SbtOpcodes.REVOKE)
