import type { KeyPair } from '@ton/crypto'

import { TonAddress } from '../address/TonAddress'
import { Cell } from '../cell/Cell'
import { TonError } from '../errors'
import { moduleLogger } from '../logger'
import { Mnemonic } from '../mnemonic/Mnemonic'
import { externalInMessage, MessageCodec } from '../tlb/block/Message'
import { toMsgAddress } from '../tlb/block/MsgAddress'
import { StateInit, stateInit, StateInitCodec } from '../tlb/block/StateInit'
import { fromCell, toCell } from '../tlb/TLB'
import { DEFAULT_SEND_MODE, signBody, splitSignedBody, verifyBody, WalletBody, walletBodyCodec, WalletTransfer } from './WalletBody'
import { initialWalletData } from './WalletData'
import { defaultWalletId, walletFamily, WalletFamily, walletIdWord, WalletVersion } from './WalletVersion'

const log = moduleLogger('wallet')

export interface TonWalletOptions {
  version: WalletVersion
  keyPair: KeyPair
  // compiled contract code of `version`
  code: Cell
  workchain?: number
  walletId?: number
}

export interface ParsedExternalBody {
  signature: Buffer
  body: WalletBody
}

const toTransfer = (message: Cell | WalletTransfer): WalletTransfer =>
  message instanceof Cell ? { mode: DEFAULT_SEND_MODE, message } : message

/**
 * A wallet contract owned by a key pair. The address is derived from `StateInit { code, data }`
 * where data is the version's initial storage layout.
 */
export class TonWallet {
  readonly version: WalletVersion
  readonly keyPair: KeyPair
  readonly code: Cell
  readonly workchain: number
  readonly walletId: number
  readonly address: TonAddress

  private readonly family: WalletFamily

  constructor(options: TonWalletOptions) {
    this.version = options.version
    this.keyPair = options.keyPair
    this.code = options.code
    this.workchain = options.workchain ?? 0
    this.family = walletFamily(options.version)
    this.walletId = walletIdWord(this.family, options.walletId ?? defaultWalletId(options.version))
    this.address = TonAddress.derive(this.workchain, toCell(StateInitCodec, this.stateInit))
    log.debug({ version: this.version, workchain: this.workchain, walletId: this.walletId, address: this.address.toRaw() }, 'derived wallet address')
  }

  static async fromMnemonic(mnemonic: Mnemonic, options: Omit<TonWalletOptions, 'keyPair'>): Promise<TonWallet> {
    return new TonWallet({ ...options, keyPair: await mnemonic.toKeyPair() })
  }

  get data(): Cell {
    return initialWalletData(this.version, this.keyPair.publicKey, this.walletId)
  }

  get stateInit(): StateInit {
    return stateInit(this.code, this.data)
  }

  // Plain cells are sent with mode 3.
  createExternalBody(validUntil: number, seqno: number, messages: readonly (Cell | WalletTransfer)[]): Cell {
    const body: WalletBody = { walletId: this.walletId, validUntil, seqno, transfers: messages.map(toTransfer) }
    return toCell(walletBodyCodec(this.family), body)
  }

  signExternalBody(body: Cell): Cell {
    return signBody(this.family, body, this.keyPair.secretKey)
  }

  // External message to the wallet; `withStateInit` deploys it along the way.
  wrapSignedBody(signed: Cell, withStateInit = false): Cell {
    const message = externalInMessage({
      dest: toMsgAddress(this.address),
      body: signed,
      init: withStateInit ? this.stateInit : null,
    })
    return toCell(MessageCodec, message)
  }

  createExternalMessage(
    validUntil: number,
    seqno: number,
    messages: readonly (Cell | WalletTransfer)[],
    withStateInit = false,
  ): Cell {
    const body = this.createExternalBody(validUntil, seqno, messages)
    const signed = this.signExternalBody(body)
    log.debug({ seqno, validUntil, messages: messages.length, withStateInit }, 'signed wallet request')
    return this.wrapSignedBody(signed, withStateInit)
  }

  verifyExternalBody(signed: Cell): boolean {
    return verifyBody(this.family, signed, this.keyPair.publicKey)
  }

  parseExternalBody(signed: Cell): ParsedExternalBody {
    const { signature, body } = splitSignedBody(this.family, signed)
    const parsed = fromCell(walletBodyCodec(this.family), body)
    if (parsed.walletId !== undefined && parsed.walletId !== this.walletId) {
      throw new TonError('SchemaMismatch', `body is for wallet id ${parsed.walletId}, this wallet is ${this.walletId}`)
    }
    return { signature, body: parsed }
  }
}
