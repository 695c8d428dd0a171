import { Address, beginCell as coreBeginCell } from '@ton/core'

import { TonAddress } from '../../src/address/TonAddress'
import { beginCell } from '../../src/cell/CellBuilder'
import { ADDR_NONE, toMsgAddress } from '../../src/tlb/block/MsgAddress'
import { fromCell, toCell } from '../../src/tlb/TLB'
import { emptyForwardPayload } from '../../src/tlb/tep/JettonTransfer'
import {
  NftGetStaticDataCodec,
  NftOpcodes,
  NftOwnershipAssignedCodec,
  NftReportStaticDataCodec,
  NftTransfer,
  NftTransferCodec,
} from '../../src/tlb/tep/NftMessages'
import { thrown } from '../helpers/errors'
import { hex } from '../helpers/interop'

const owner = new TonAddress(0, Buffer.alloc(32, 0x0a))
const buyer = new TonAddress(0, Buffer.alloc(32, 0x0b))

const transfer: NftTransfer = {
  queryId: 7n,
  newOwner: toMsgAddress(buyer),
  responseDestination: toMsgAddress(owner),
  customPayload: null,
  forwardAmount: 10_000_000n,
  forwardPayload: emptyForwardPayload(),
}

describe('nft messages', () => {
  it('writes transfer like a hand-built @ton/core cell', () => {
    const core = coreBeginCell()
      .storeUint(NftOpcodes.TRANSFER, 32)
      .storeUint(7n, 64)
      .storeAddress(Address.parseRaw(buyer.toRaw()))
      .storeAddress(Address.parseRaw(owner.toRaw()))
      .storeMaybeRef(null)
      .storeCoins(10_000_000n)
      .storeBit(false)
      .endCell()
    expect(hex(toCell(NftTransferCodec, transfer).hash())).toBe(hex(core.hash()))
  })

  it('reads back a transfer with a custom payload and a ref forward payload', () => {
    const value: NftTransfer = {
      ...transfer,
      responseDestination: ADDR_NONE,
      customPayload: beginCell().storeUint(1, 8).build(),
      forwardPayload: { value: beginCell().storeUint(0xabcd, 16).build(), layout: 'ToRef' },
    }
    const cell = toCell(NftTransferCodec, value)
    expect(cell.refs).toHaveLength(2)
    expect(fromCell(NftTransferCodec, cell)).toEqual(value)
  })

  it('reads back ownership_assigned and the static data pair', () => {
    const assigned = { queryId: 1n, prevOwner: toMsgAddress(owner), forwardPayload: emptyForwardPayload() }
    expect(fromCell(NftOwnershipAssignedCodec, toCell(NftOwnershipAssignedCodec, assigned))).toEqual(assigned)

    const request = toCell(NftGetStaticDataCodec, { queryId: 2n })
    expect(request.beginParse().preloadUint(32)).toBe(0x2fcb26a2)
    expect(fromCell(NftGetStaticDataCodec, request)).toEqual({ queryId: 2n })

    const report = { queryId: 2n, index: (1n << 255n) + 3n, collection: toMsgAddress(owner) }
    const reportCell = toCell(NftReportStaticDataCodec, report)
    expect(reportCell.bitLength).toBe(32 + 64 + 256 + 267)
    expect(fromCell(NftReportStaticDataCodec, reportCell)).toEqual(report)
  })

  it('refuses a body with another opcode', () => {
    const request = toCell(NftGetStaticDataCodec, { queryId: 2n })
    expect(thrown(() => fromCell(NftOwnershipAssignedCodec, request))).toMatchObject({ kind: 'SchemaMismatch' })
  })
})
