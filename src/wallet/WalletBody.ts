import { sign, signVerify } from '@ton/crypto'

import { Cell } from '../cell/Cell'
import { CellBuilder } from '../cell/CellBuilder'
import { CellParser } from '../cell/CellParser'
import { TonError } from '../errors'
import { MAX_OUT_ACTIONS, OutAction, OutListCodec } from '../tlb/block/OutAction'
import { MaybeCodec, RefCodec } from '../tlb/primitives'
import { readTLB, TLBCodec, writeTLB } from '../tlb/TLB'
import { WalletFamily, walletIdWord } from './WalletVersion'

export const SIGNATURE_BYTES = 64
// pay fees separately, ignore errors
export const DEFAULT_SEND_MODE = 3
export const MAX_MESSAGES_V1_V4 = 4

export interface WalletTransfer {
  mode: number
  // MessageRelaxed cell
  message: Cell
}

/**
 * Unsigned external request. `walletId` and `validUntil` are absent for the families whose layout
 * has no such field (v1 has neither, v2 has no wallet id).
 */
export interface WalletBody {
  walletId?: number
  validUntil?: number
  seqno: number
  transfers: WalletTransfer[]
}

const required = (value: number | undefined, field: string, family: WalletFamily): number => {
  if (value === undefined) {
    throw new TonError('InvalidArgument', `${family} wallet body needs ${field}`)
  }
  return value
}

const storeTransfers = (builder: CellBuilder, transfers: WalletTransfer[]) => {
  if (transfers.length > MAX_MESSAGES_V1_V4) {
    throw new TonError('InvalidArgument', `at most ${MAX_MESSAGES_V1_V4} messages per request, got ${transfers.length}`)
  }
  for (const { mode, message } of transfers) {
    builder.storeUint(mode, 8).storeRef(message)
  }
}

const loadTransfers = (parser: CellParser): WalletTransfer[] => {
  const transfers: WalletTransfer[] = []
  while (parser.remainingRefs > 0) {
    transfers.push({ mode: parser.loadUint(8), message: parser.loadRef() })
  }
  return transfers
}

export const WalletBodyV1Codec: TLBCodec<WalletBody> = {
  readDefinition: (parser) => ({ seqno: parser.loadUint(32), transfers: loadTransfers(parser) }),
  writeDefinition: (builder, body) => {
    storeTransfers(builder.storeUint(body.seqno, 32), body.transfers)
  },
}

export const WalletBodyV2Codec: TLBCodec<WalletBody> = {
  readDefinition: (parser) => ({
    seqno: parser.loadUint(32),
    validUntil: parser.loadUint(32),
    transfers: loadTransfers(parser),
  }),
  writeDefinition: (builder, body) => {
    builder.storeUint(body.seqno, 32).storeUint(required(body.validUntil, 'validUntil', 'v2'), 32)
    storeTransfers(builder, body.transfers)
  },
}

export const WalletBodyV3Codec: TLBCodec<WalletBody> = {
  readDefinition: (parser) => ({
    walletId: parser.loadUint(32),
    validUntil: parser.loadUint(32),
    seqno: parser.loadUint(32),
    transfers: loadTransfers(parser),
  }),
  writeDefinition: (builder, body) => {
    builder
      .storeUint(walletIdWord('v3', required(body.walletId, 'walletId', 'v3')), 32)
      .storeUint(required(body.validUntil, 'validUntil', 'v3'), 32)
      .storeUint(body.seqno, 32)
    storeTransfers(builder, body.transfers)
  },
}

// Simple send is op 0; plugin ops are not produced.
export const WalletBodyV4Codec: TLBCodec<WalletBody> = {
  readDefinition: (parser) => {
    const walletId = parser.loadUint(32)
    const validUntil = parser.loadUint(32)
    const seqno = parser.loadUint(32)
    const op = parser.loadUint(8)
    if (op !== 0) {
      throw new TonError('SchemaMismatch', `unsupported v4 wallet op ${op}`)
    }
    return { walletId, validUntil, seqno, transfers: loadTransfers(parser) }
  },
  writeDefinition: (builder, body) => {
    builder
      .storeUint(walletIdWord('v4', required(body.walletId, 'walletId', 'v4')), 32)
      .storeUint(required(body.validUntil, 'validUntil', 'v4'), 32)
      .storeUint(body.seqno, 32)
      .storeUint(0, 8)
    storeTransfers(builder, body.transfers)
  },
}

const MaybeOutList = MaybeCodec(RefCodec(OutListCodec))

// signed_request$_ wallet_id:(## 32) valid_until:(## 32) msg_seqno:(## 32) inner:InnerRequest
// actions$_ out_actions:(Maybe OutList) has_other_actions:(## 1) {m:#} {n:#} other_actions:(ActionList n m)
export const WalletBodyV5Codec: TLBCodec<WalletBody> = {
  prefix: { bits: 32, value: 0x7369676e },
  readDefinition: (parser) => {
    const walletId = parser.loadInt(32)
    const validUntil = parser.loadUint(32)
    const seqno = parser.loadUint(32)
    const actions = readTLB(parser, MaybeOutList) ?? []
    if (parser.loadBit()) {
      throw new TonError('SchemaMismatch', 'extended wallet actions are not supported')
    }
    const transfers = actions.map((action) => {
      if (action.kind !== 'sendMsg') {
        throw new TonError('SchemaMismatch', `unsupported v5 out action ${action.kind}`)
      }
      return { mode: action.mode, message: action.outMsg }
    })
    return { walletId, validUntil, seqno, transfers }
  },
  writeDefinition: (builder, body) => {
    if (body.transfers.length > MAX_OUT_ACTIONS) {
      throw new TonError('InvalidArgument', `at most ${MAX_OUT_ACTIONS} messages per request, got ${body.transfers.length}`)
    }
    const actions: OutAction[] = body.transfers.map(({ mode, message }) => ({ kind: 'sendMsg', mode, outMsg: message }))
    builder
      .storeInt(walletIdWord('v5', required(body.walletId, 'walletId', 'v5')), 32)
      .storeUint(required(body.validUntil, 'validUntil', 'v5'), 32)
      .storeUint(body.seqno, 32)
    writeTLB(builder, MaybeOutList, actions.length > 0 ? actions : null)
    builder.storeBit(false)
  },
}

export const walletBodyCodec = (family: WalletFamily): TLBCodec<WalletBody> => {
  switch (family) {
    case 'v1':
      return WalletBodyV1Codec
    case 'v2':
      return WalletBodyV2Codec
    case 'v3':
      return WalletBodyV3Codec
    case 'v4':
      return WalletBodyV4Codec
    case 'v5':
      return WalletBodyV5Codec
    case 'highloadV2':
      throw new TonError('InvalidArgument', 'highload wallets take query-based requests, not seqno bodies')
  }
}

// v5 appends the signature, older families prepend it.
const signatureAtEnd = (family: WalletFamily) => family === 'v5'

export const signBody = (family: WalletFamily, body: Cell, secretKey: Buffer): Cell => {
  const signature = sign(body.hash(), secretKey)
  const builder = new CellBuilder()
  if (signatureAtEnd(family)) {
    return builder.storeCell(body).storeBuffer(signature, SIGNATURE_BYTES).build()
  }
  return builder.storeBuffer(signature, SIGNATURE_BYTES).storeCell(body).build()
}

export interface SignedBody {
  signature: Buffer
  body: Cell
}

export const splitSignedBody = (family: WalletFamily, signed: Cell): SignedBody => {
  const parser = signed.beginParse()
  if (signatureAtEnd(family)) {
    const bodyBits = parser.remainingBits - SIGNATURE_BYTES * 8
    if (bodyBits < 0) {
      throw new TonError('BufferUnderflow', `signed body has ${parser.remainingBits} bits, signature alone takes 512`)
    }
    const data = parser.loadBits(bodyBits)
    const signature = parser.loadBuffer(SIGNATURE_BYTES)
    return { signature, body: new Cell({ data, bitLength: bodyBits, refs: signed.refs }) }
  }
  const signature = parser.loadBuffer(SIGNATURE_BYTES)
  return { signature, body: parser.loadRemainder() }
}

export const verifyBody = (family: WalletFamily, signed: Cell, publicKey: Buffer): boolean => {
  const { signature, body } = splitSignedBody(family, signed)
  return signVerify(body.hash(), signature, publicKey)
}
