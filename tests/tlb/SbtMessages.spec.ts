import { Address, beginCell as coreBeginCell } from '@ton/core'

import { TonAddress } from '../../src/address/TonAddress'
import { beginCell } from '../../src/cell/CellBuilder'
import { toMsgAddress } from '../../src/tlb/block/MsgAddress'
import { fromCell, toCell } from '../../src/tlb/TLB'
import {
  SbtDestroyCodec,
  SbtOpcodes,
  SbtOwnerInfo,
  SbtOwnerInfoCodec,
  SbtOwnershipProof,
  SbtOwnershipProofCodec,
  SbtProveOwnershipCodec,
  SbtRequestOwnerCodec,
  SbtRevokeCodec,
} from '../../src/tlb/tep/SbtMessages'
import { thrown } from '../helpers/errors'
import { hex } from '../helpers/interop'

const owner = new TonAddress(0, Buffer.alloc(32, 0x0c))
const verifier = new TonAddress(-1, Buffer.alloc(32, 0x0d))
const payload = beginCell().storeUint(0x1234, 16).build()

describe('sbt messages', () => {
  it('writes prove_ownership like a hand-built @ton/core cell', () => {
    const core = coreBeginCell()
      .storeUint(SbtOpcodes.PROVE_OWNERSHIP, 32)
      .storeUint(11n, 64)
      .storeAddress(Address.parseRaw(verifier.toRaw()))
      .storeRef(coreBeginCell().storeUint(0x1234, 16).endCell())
      .storeBit(true)
      .endCell()
    const request = { queryId: 11n, dest: toMsgAddress(verifier), forwardPayload: payload, withContent: true }
    expect(hex(toCell(SbtProveOwnershipCodec, request).hash())).toBe(hex(core.hash()))
  })

  it('shares one layout between prove_ownership and request_owner', () => {
    const request = { queryId: 12n, dest: toMsgAddress(verifier), forwardPayload: payload, withContent: false }
    const cell = toCell(SbtRequestOwnerCodec, request)
    expect(cell.beginParse().preloadUint(32)).toBe(0xd0c3bfea)
    expect(fromCell(SbtRequestOwnerCodec, cell)).toEqual(request)
    expect(thrown(() => fromCell(SbtProveOwnershipCodec, cell))).toMatchObject({ kind: 'SchemaMismatch' })
  })

  it('reads back ownership_proof with and without content', () => {
    const proof: SbtOwnershipProof = {
      queryId: 13n,
      itemId: 5n,
      owner: toMsgAddress(owner),
      data: payload,
      revokedAt: 0n,
      content: null,
    }
    expect(fromCell(SbtOwnershipProofCodec, toCell(SbtOwnershipProofCodec, proof))).toEqual(proof)

    const withContent = { ...proof, revokedAt: 1_700_000_000n, content: beginCell().storeUint(1, 1).build() }
    const cell = toCell(SbtOwnershipProofCodec, withContent)
    expect(cell.refs).toHaveLength(2)
    expect(fromCell(SbtOwnershipProofCodec, cell)).toEqual(withContent)
  })

  it('reads back owner_info with the initiator before the owner', () => {
    const info: SbtOwnerInfo = {
      queryId: 14n,
      itemId: 6n,
      initiator: toMsgAddress(verifier),
      owner: toMsgAddress(owner),
      data: payload,
      revokedAt: 0n,
      content: null,
    }
    const cell = toCell(SbtOwnerInfoCodec, info)
    const parser = cell.beginParse().skip(32 + 64 + 256 + 3)
    expect(parser.loadInt(8)).toBe(-1)
    expect(fromCell(SbtOwnerInfoCodec, cell)).toEqual(info)
  })

  it('keeps destroy and revoke apart', () => {
    const destroy = toCell(SbtDestroyCodec, { queryId: 15n })
    const revoke = toCell(SbtRevokeCodec, { queryId: 15n })
    expect(destroy.beginParse().preloadUint(32)).toBe(0x1f04537a)
    expect(revoke.beginParse().preloadUint(32)).toBe(0x6f89f5e3)
    expect(thrown(() => fromCell(SbtDestroyCodec, revoke))).toMatchObject({ kind: 'SchemaMismatch' })
  })
})
