import { Cell } from '../cell/Cell'
import { MaybeCodec, RefCellCodec } from '../tlb/primitives'
import { readTLB, TLBCodec, toCell, writeTLB } from '../tlb/TLB'
import { walletFamily, walletIdWord, WalletVersion } from './WalletVersion'

const MaybeRefCell = MaybeCodec(RefCellCodec)

export interface WalletDataV1V2 {
  seqno: number
  publicKey: Buffer
}

export interface WalletDataV3 {
  seqno: number
  walletId: number
  publicKey: Buffer
}

export interface WalletDataV4 extends WalletDataV3 {
  plugins: Cell | null
}

export interface WalletDataV5 {
  signatureAllowed: boolean
  seqno: number
  walletId: number
  publicKey: Buffer
  extensions: Cell | null
}

export interface WalletDataHighloadV2 {
  walletId: number
  lastCleaned: bigint
  publicKey: Buffer
  queries: Cell | null
}

export const WalletDataV1V2Codec: TLBCodec<WalletDataV1V2> = {
  readDefinition: (parser) => ({ seqno: parser.loadUint(32), publicKey: parser.loadBuffer(32) }),
  writeDefinition: (builder, data) => {
    builder.storeUint(data.seqno, 32).storeBuffer(data.publicKey, 32)
  },
}

export const WalletDataV3Codec: TLBCodec<WalletDataV3> = {
  readDefinition: (parser) => ({
    seqno: parser.loadUint(32),
    walletId: parser.loadUint(32),
    publicKey: parser.loadBuffer(32),
  }),
  writeDefinition: (builder, data) => {
    builder.storeUint(data.seqno, 32).storeUint(walletIdWord('v3', data.walletId), 32).storeBuffer(data.publicKey, 32)
  },
}

export const WalletDataV4Codec: TLBCodec<WalletDataV4> = {
  readDefinition: (parser) => ({
    ...WalletDataV3Codec.readDefinition(parser),
    plugins: readTLB(parser, MaybeRefCell),
  }),
  writeDefinition: (builder, data) => {
    WalletDataV3Codec.writeDefinition(builder, data)
    writeTLB(builder, MaybeRefCell, data.plugins)
  },
}

// contract_state$_ is_signature_allowed:(## 1) seqno:# wallet_id:(## 32) public_key:(## 256)
//   extensions_dict:(HashmapE 256 int1) = ContractState;
export const WalletDataV5Codec: TLBCodec<WalletDataV5> = {
  readDefinition: (parser) => ({
    signatureAllowed: parser.loadBit(),
    seqno: parser.loadUint(32),
    walletId: parser.loadInt(32),
    publicKey: parser.loadBuffer(32),
    extensions: readTLB(parser, MaybeRefCell),
  }),
  writeDefinition: (builder, data) => {
    builder
      .storeBit(data.signatureAllowed)
      .storeUint(data.seqno, 32)
      .storeInt(walletIdWord('v5', data.walletId), 32)
      .storeBuffer(data.publicKey, 32)
    writeTLB(builder, MaybeRefCell, data.extensions)
  },
}

export const WalletDataHighloadV2Codec: TLBCodec<WalletDataHighloadV2> = {
  readDefinition: (parser) => ({
    walletId: parser.loadInt(32),
    lastCleaned: parser.loadUintBig(64),
    publicKey: parser.loadBuffer(32),
    queries: readTLB(parser, MaybeRefCell),
  }),
  writeDefinition: (builder, data) => {
    builder.storeInt(walletIdWord('highloadV2', data.walletId), 32).storeUint(data.lastCleaned, 64).storeBuffer(data.publicKey, 32)
    writeTLB(builder, MaybeRefCell, data.queries)
  },
}

// Data cell of a freshly deployed wallet: seqno 0, no plugins, extensions or queries.
export const initialWalletData = (version: WalletVersion, publicKey: Buffer, walletId: number): Cell => {
  switch (walletFamily(version)) {
    case 'v1':
    case 'v2':
      return toCell(WalletDataV1V2Codec, { seqno: 0, publicKey })
    case 'v3':
      return toCell(WalletDataV3Codec, { seqno: 0, walletId, publicKey })
    case 'v4':
      return toCell(WalletDataV4Codec, { seqno: 0, walletId, publicKey, plugins: null })
    case 'v5':
      return toCell(WalletDataV5Codec, { signatureAllowed: true, seqno: 0, walletId, publicKey, extensions: null })
    case 'highloadV2':
      return toCell(WalletDataHighloadV2Codec, { walletId, lastCleaned: 0n, publicKey, queries: null })
  }
}
