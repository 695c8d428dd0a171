export * from './errors'
export { logger, moduleLogger } from './logger'
export { parseEnv, EnvSchema } from './env'
export type { Env } from './env'

export * from './cell/bits'
export { BitWriter, MAX_CELL_BITS } from './cell/BitWriter'
export { BitReader } from './cell/BitReader'
export { LevelMask, MAX_LEVEL } from './cell/LevelMask'
export { CellType } from './cell/CellType'
export { Cell, CellOptions, MAX_CELL_REFS } from './cell/Cell'
export { CellBuilder, beginCell } from './cell/CellBuilder'
export { CellParser, parseFully } from './cell/CellParser'
export { libraryHashes } from './cell/libraries'

export { BagOfCells } from './boc/BagOfCells'
export { RawBagOfCells, RawCell, SerializeOptions, parseRawBoc, serializeRawBoc } from './boc/RawBagOfCells'
export { crc32c } from './boc/crc32c'

export { DictionaryKey, DictionaryKeys } from './dict/keys'
export { DictionaryValue, DictionaryValues } from './dict/values'
export { buildDictRoot, storeDict, storeDictData } from './dict/DictBuilder'
export { MAX_DICT_ENTRIES, parseDictRoot, loadDict, loadDictData } from './dict/DictParser'

export * from './tlb/TLB'
export * from './tlb/primitives'
export * from './tlb/block/MsgAddress'
export * from './tlb/block/Coins'
export * from './tlb/block/StateInit'
export * from './tlb/block/Message'
export * from './tlb/block/OutAction'
export * from './tlb/tep/JettonTransfer'
export * from './tlb/tep/NftMessages'
export * from './tlb/tep/SbtMessages'

export { TxId } from './tx/TxId'

export { TonAddress, AddressFormat, ParsedAddress } from './address/TonAddress'
export { crc16 } from './address/crc16'
export { Mnemonic, MnemonicOptions, validateMnemonic, MNEMONIC_WORDS } from './mnemonic/Mnemonic'

export * from './wallet/WalletVersion'
export * from './wallet/WalletData'
export * from './wallet/WalletBody'
export { TonWallet, TonWalletOptions, ParsedExternalBody } from './wallet/TonWallet'

export * from '../utils/Utils'
