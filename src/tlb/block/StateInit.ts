import { Cell } from '../../cell/Cell'
import { MaybeCodec, RefCellCodec } from '../primitives'
import { readTLB, TLBCodec, writeTLB } from '../TLB'

export interface TickTock {
  tick: boolean
  tock: boolean
}

export interface StateInit {
  splitDepth: number | null
  special: TickTock | null
  code: Cell | null
  data: Cell | null
  library: Cell | null
}

export const TickTockCodec: TLBCodec<TickTock> = {
  readDefinition: (parser) => ({ tick: parser.loadBit(), tock: parser.loadBit() }),
  writeDefinition: (builder, { tick, tock }) => {
    builder.storeBit(tick).storeBit(tock)
  },
}

const MaybeTickTock = MaybeCodec(TickTockCodec)
const MaybeRefCell = MaybeCodec(RefCellCodec)

export const stateInit = (code: Cell | null, data: Cell | null): StateInit => ({
  splitDepth: null,
  special: null,
  code,
  data,
  library: null,
})

// _ split_depth:(Maybe (## 5)) special:(Maybe TickTock) code:(Maybe ^Cell) data:(Maybe ^Cell)
//   library:(Maybe ^Cell) = StateInit;
export const StateInitCodec: TLBCodec<StateInit> = {
  readDefinition: (parser) => ({
    splitDepth: parser.loadMaybeUint(5),
    special: readTLB(parser, MaybeTickTock),
    code: readTLB(parser, MaybeRefCell),
    data: readTLB(parser, MaybeRefCell),
    library: readTLB(parser, MaybeRefCell),
  }),
  writeDefinition: (builder, value) => {
    builder.storeMaybeUint(value.splitDepth, 5)
    writeTLB(builder, MaybeTickTock, value.special)
    writeTLB(builder, MaybeRefCell, value.code)
    writeTLB(builder, MaybeRefCell, value.data)
    writeTLB(builder, MaybeRefCell, value.library)
  },
}
