import { TonError } from '../errors'

export enum WalletVersion {
  V1R1 = 'V1R1',
  V1R2 = 'V1R2',
  V1R3 = 'V1R3',
  V2R1 = 'V2R1',
  V2R2 = 'V2R2',
  V3R1 = 'V3R1',
  V3R2 = 'V3R2',
  V4R1 = 'V4R1',
  V4R2 = 'V4R2',
  V5R1 = 'V5R1',
  HighloadV2R2 = 'HighloadV2R2',
}

// Revisions of one family share their data and body layouts.
export type WalletFamily = 'v1' | 'v2' | 'v3' | 'v4' | 'v5' | 'highloadV2'

export const walletFamily = (version: WalletVersion): WalletFamily => {
  switch (version) {
    case WalletVersion.V1R1:
    case WalletVersion.V1R2:
    case WalletVersion.V1R3:
      return 'v1'
    case WalletVersion.V2R1:
    case WalletVersion.V2R2:
      return 'v2'
    case WalletVersion.V3R1:
    case WalletVersion.V3R2:
      return 'v3'
    case WalletVersion.V4R1:
    case WalletVersion.V4R2:
      return 'v4'
    case WalletVersion.V5R1:
      return 'v5'
    case WalletVersion.HighloadV2R2:
      return 'highloadV2'
  }
}

export const DEFAULT_WALLET_ID = 0x29a9a317
// mainnet, workchain 0, subwallet 0
export const DEFAULT_WALLET_ID_V5R1 = 0x7fffff11

export const defaultWalletId = (version: WalletVersion): number =>
  version === WalletVersion.V5R1 ? DEFAULT_WALLET_ID_V5R1 : DEFAULT_WALLET_ID

// Wallet ids are 32-bit words: v5 and highload contracts read them signed, the older families
// unsigned. Either reading of the same word is accepted.
export const walletIdWord = (family: WalletFamily, walletId: number): number => {
  if (!Number.isInteger(walletId) || walletId < -(2 ** 31) || walletId >= 2 ** 32) {
    throw new TonError('InvalidArgument', `wallet id ${walletId} is not a 32-bit word`)
  }
  return family === 'v5' || family === 'highloadV2' ? walletId | 0 : walletId >>> 0
}
