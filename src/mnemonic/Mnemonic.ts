import { hmac_sha512, KeyPair, keyPairFromSeed, mnemonicWordList, pbkdf2_sha512 } from '@ton/crypto'

import { TonError } from '../errors'
import { moduleLogger } from '../logger'

const log = moduleLogger('mnemonic')

export const MNEMONIC_WORDS = 24
const SEED_ITERATIONS = 100000

const WORDS = new Set(mnemonicWordList)

export interface MnemonicOptions {
  password?: string | null
  // Accept the phrase even if it fails the word list or seed checks.
  skipValidation?: boolean
}

const toEntropy = (words: string[], password: string | null): Promise<Buffer> =>
  hmac_sha512(words.join(' '), password ?? '')

const isBasicSeed = async (entropy: Buffer): Promise<boolean> => {
  const seed = await pbkdf2_sha512(entropy, 'TON seed version', Math.max(1, Math.floor(SEED_ITERATIONS / 256)), 64)
  return seed[0] === 0
}

const isPasswordSeed = async (entropy: Buffer): Promise<boolean> => {
  const seed = await pbkdf2_sha512(entropy, 'TON fast seed version', 1, 64)
  return seed[0] === 1
}

const invalid = (message: string) => new TonError('InvalidMnemonic', message)

export const validateMnemonic = async (words: string[], password: string | null = null): Promise<void> => {
  if (words.length !== MNEMONIC_WORDS) {
    throw invalid(`expected ${MNEMONIC_WORDS} words, got ${words.length}`)
  }
  const unknown = words.find((word) => !WORDS.has(word))
  if (unknown !== undefined) {
    throw invalid(`'${unknown}' is not in the word list`)
  }
  if (password) {
    // A password phrase must not also work without its password.
    const passless = await toEntropy(words, null)
    if (!(await isPasswordSeed(passless)) || (await isBasicSeed(passless))) {
      throw invalid('phrase is not a password-protected mnemonic')
    }
  }
  if (!(await isBasicSeed(await toEntropy(words, password)))) {
    throw invalid('phrase fails the seed version check')
  }
}

/**
 * 24-word seed phrase with an optional password. Words are normalized (trimmed, lower-cased) and
 * checked on creation; `toKeyPair` derives the ed25519 key pair from
 * PBKDF2-SHA512(HMAC-SHA512(phrase, password), "TON default seed", 100000).
 */
export class Mnemonic {
  private constructor(
    readonly words: readonly string[],
    readonly password: string | null,
  ) {}

  static async fromWords(words: string[], options: MnemonicOptions = {}): Promise<Mnemonic> {
    const normalized = words.map((word) => word.trim().toLowerCase())
    const password = options.password || null
    if (options.skipValidation) {
      log.warn({ words: normalized.length }, 'mnemonic validation skipped')
    } else {
      await validateMnemonic(normalized, password)
    }
    return new Mnemonic(normalized, password)
  }

  static parse(phrase: string, options: MnemonicOptions = {}): Promise<Mnemonic> {
    return Mnemonic.fromWords(phrase.split(/\s+/).filter((word) => word.length > 0), options)
  }

  async toSeed(): Promise<Buffer> {
    const entropy = await toEntropy([...this.words], this.password)
    return pbkdf2_sha512(entropy, 'TON default seed', SEED_ITERATIONS, 64)
  }

  async toKeyPair(): Promise<KeyPair> {
    const seed = await this.toSeed()
    return keyPairFromSeed(seed.subarray(0, 32))
  }
}
