import { keyPairFromSeed } from '@ton/crypto'
import { WalletContractV3R1, WalletContractV3R2, WalletContractV4, WalletContractV5R1 } from '@ton/ton'

import { TonAddress } from '../../src/address/TonAddress'
import { BagOfCells } from '../../src/boc/BagOfCells'
import { Cell } from '../../src/cell/Cell'
import { CellBuilder } from '../../src/cell/CellBuilder'
import { Mnemonic } from '../../src/mnemonic/Mnemonic'
import { fromCell, toCell } from '../../src/tlb/TLB'
import { TonWallet } from '../../src/wallet/TonWallet'
import { splitSignedBody, WalletBodyV4Codec, WalletBodyV5Codec } from '../../src/wallet/WalletBody'
import { DEFAULT_WALLET_ID, DEFAULT_WALLET_ID_V5R1, WalletVersion } from '../../src/wallet/WalletVersion'
import { fromCore } from '../helpers/interop'

const PHRASE =
  'fancy carpet hello mandate penalty trial consider property top vicious exit rebuild tragic profit urban major total month holiday sudden rib gather media vicious'
const PHRASE_V5 =
  'section garden tomato dinner season dice renew length useful spin trade intact use universe what post spike keen mandate behind concert egg doll rug'

// Request bodies taken from mainnet wallet transactions.
const SIGNED_V4 =
  'b5ee9c7201010201008700019c9dcd3a68926ad6fb9d094c5b72901bfc359ada50f22b648c6c2223c767135d397c7489c121071e45a5316a94a533d80c41450049ebeed406c419fea99117f40629a9a31767ad328900000013000301006842007847b4630eb08d9f486fe846d5496878556dfd5a084f82a9a3fb01224e67c84c200989680000000000000000000000000000'
const SIGNED_V5 =
  'b5ee9c720101040100940001a17369676e7fffff11ffffffff00000000bc04889cb28b36a3a00810e363a413763ec34860bf0fce552c5d36e37289fafd442f1983d740f92378919d969dd530aec92d258a0779fb371d4659f10ca1b3826001020a0ec3c86d030302006642007847b4630eb08d9f486fe846d5496878556dfd5a084f82a9a3fb01224e67c84c187a1200000000000000000000000000000000'

const { publicKey } = keyPairFromSeed(Buffer.alloc(32, 3))

// Compiled wallet code as shipped with @ton/ton.
const walletCode = (version: WalletVersion): Cell => {
  switch (version) {
    case WalletVersion.V3R1:
      return fromCore(WalletContractV3R1.create({ workchain: 0, publicKey }).init.code)
    case WalletVersion.V3R2:
      return fromCore(WalletContractV3R2.create({ workchain: 0, publicKey }).init.code)
    case WalletVersion.V4R2:
      return fromCore(WalletContractV4.create({ workchain: 0, publicKey }).init.code)
    default:
      return fromCore(WalletContractV5R1.create({ publicKey }).init.code)
  }
}

const walletFromPhrase = async (phrase: string, version: WalletVersion) =>
  TonWallet.fromMnemonic(await Mnemonic.parse(phrase), { version, code: walletCode(version) })

describe('wallets on real contract code', () => {
  it.each([
    [WalletVersion.V3R1, 'EQBiMfDMivebQb052Z6yR3jHrmwNhw1kQ5bcAUOBYsK_VPuK'],
    [WalletVersion.V3R2, 'EQA-RswW9QONn88ziVm4UKnwXDEot5km7GEEXsfie_0TFOCO'],
    [WalletVersion.V4R2, 'EQCDM_QGggZ3qMa_f3lRPk4_qLDnLTqdi6OkMAV2NB9r5TG3'],
  ])(
    'derives the known %s address of a mnemonic',
    async (version, expected) => {
      const wallet = await walletFromPhrase(PHRASE, version)
      expect(wallet.address.equals(TonAddress.parse(expected))).toBe(true)
    },
    30_000,
  )

  it('derives the known v5 address of a mnemonic', async () => {
    const wallet = await walletFromPhrase(PHRASE_V5, WalletVersion.V5R1)
    expect(wallet.address.equals(TonAddress.parse('UQDv2YSmlrlLH3hLNOVxC8FcQf4F9eGNs4vb2zKma4txo6i3'))).toBe(true)
  }, 30_000)

  it('agrees with the @ton/ton wallet contracts on addresses', () => {
    const keyPair = keyPairFromSeed(Buffer.alloc(32, 3))
    const ours = (version: WalletVersion) => new TonWallet({ version, keyPair, code: walletCode(version) }).address
    expect(ours(WalletVersion.V4R2).toRaw()).toBe(WalletContractV4.create({ workchain: 0, publicKey }).address.toRawString())
    expect(ours(WalletVersion.V5R1).toRaw()).toBe(
      WalletContractV5R1.create({ publicKey }).address.toRawString(),
    )
  })
})

describe('signed request vectors', () => {
  it('reads and rewrites a v4 request', () => {
    const signed = BagOfCells.parseHex(SIGNED_V4).singleRoot()
    const { signature, body } = splitSignedBody('v4', signed)
    const request = fromCell(WalletBodyV4Codec, body)
    expect(request.walletId).toBe(DEFAULT_WALLET_ID)
    expect(request.validUntil).toBe(1739403913)
    expect(request.seqno).toBe(19)
    expect(request.transfers.map(({ mode }) => mode)).toEqual([3])

    const rebuilt = new CellBuilder().storeBuffer(signature, 64).storeCell(toCell(WalletBodyV4Codec, request)).build()
    expect(rebuilt.equals(signed)).toBe(true)
    expect(BagOfCells.fromRoot(rebuilt).toHex()).toBe(SIGNED_V4)
  })

  it('reads and rewrites a v5 request', () => {
    const signed = BagOfCells.parseHex(SIGNED_V5).singleRoot()
    const { signature, body } = splitSignedBody('v5', signed)
    const request = fromCell(WalletBodyV5Codec, body)
    expect(request.walletId).toBe(DEFAULT_WALLET_ID_V5R1)
    expect(request.validUntil).toBe(4294967295)
    expect(request.seqno).toBe(0)
    expect(request.transfers.map(({ mode }) => mode)).toEqual([3])

    const rebuilt = new CellBuilder().storeCell(toCell(WalletBodyV5Codec, request)).storeBuffer(signature, 64).build()
    expect(rebuilt.equals(signed)).toBe(true)
  })
})
