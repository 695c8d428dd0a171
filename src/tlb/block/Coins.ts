import { loadDict } from '../../dict/DictParser'
import { storeDict } from '../../dict/DictBuilder'
import { DictionaryKeys } from '../../dict/keys'
import { DictionaryValues } from '../../dict/values'
import { TLBCodec } from '../TLB'

// nanograms$_ amount:(VarUInteger 16)
export const CoinsCodec: TLBCodec<bigint> = {
  readDefinition: (parser) => parser.loadCoins(),
  writeDefinition: (builder, value) => {
    builder.storeCoins(value)
  },
}

export interface CurrencyCollection {
  grams: bigint
  // extra_currencies: HashmapE 32 (VarUInteger 32), keyed by currency id
  other: Map<number, bigint>
}

const ExtraCurrencyKey = DictionaryKeys.Uint(32)
const ExtraCurrencyValue = DictionaryValues.VarUint(32)

export const currencies = (grams: bigint, other: Map<number, bigint> = new Map()): CurrencyCollection => ({ grams, other })

// currencies$_ grams:Grams other:ExtraCurrencyCollection
export const CurrencyCollectionCodec: TLBCodec<CurrencyCollection> = {
  readDefinition: (parser) => ({
    grams: parser.loadCoins(),
    other: loadDict(parser, ExtraCurrencyKey, ExtraCurrencyValue),
  }),
  writeDefinition: (builder, { grams, other }) => {
    storeDict(builder.storeCoins(grams), other, ExtraCurrencyKey, ExtraCurrencyValue)
  },
}
