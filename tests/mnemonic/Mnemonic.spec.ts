import { mnemonicNew, mnemonicToPrivateKey } from '@ton/crypto'

import { Mnemonic, validateMnemonic } from '../../src/mnemonic/Mnemonic'

// Fails the seed version check.
const UNCHECKED = Array.from({ length: 24 }, () => 'abandon')

describe('Mnemonic', () => {
  let words: string[]

  beforeAll(async () => {
    words = await mnemonicNew(24)
  }, 60_000)

  it('derives the same key pair as @ton/crypto', async () => {
    const keyPair = await (await Mnemonic.fromWords(words)).toKeyPair()
    const expected = await mnemonicToPrivateKey(words)
    expect(keyPair.publicKey.toString('hex')).toBe(expected.publicKey.toString('hex'))
    expect(keyPair.secretKey.toString('hex')).toBe(expected.secretKey.toString('hex'))
    expect(keyPair.publicKey).toHaveLength(32)
  }, 30_000)

  it('normalizes words and splits phrases on any whitespace', async () => {
    const shouted = await Mnemonic.fromWords(words.map((word) => `  ${word.toUpperCase()} `))
    expect(shouted.words).toEqual(words)
    const parsed = await Mnemonic.parse(`  ${words.join('\n  ')}\t`)
    expect(parsed.words).toEqual(words)
    expect(parsed.password).toBeNull()
  }, 30_000)

  it('rejects a wrong word count', async () => {
    await expect(Mnemonic.fromWords(words.slice(1))).rejects.toMatchObject({ kind: 'InvalidMnemonic' })
  })

  it('rejects words outside the list', async () => {
    await expect(Mnemonic.fromWords(['notaword', ...words.slice(1)])).rejects.toMatchObject({
      kind: 'InvalidMnemonic',
    })
  })

  it('rejects a phrase that fails the seed version check', async () => {
    await expect(validateMnemonic(UNCHECKED)).rejects.toMatchObject({ kind: 'InvalidMnemonic' })
  })

  it('rejects a password on a passwordless phrase', async () => {
    await expect(Mnemonic.fromWords(words, { password: 'test-password' })).rejects.toMatchObject({
      kind: 'InvalidMnemonic',
    })
    await expect(Mnemonic.fromWords(UNCHECKED, { password: 'test-password' })).rejects.toMatchObject({
      kind: 'InvalidMnemonic',
    })
  })

  it('derives keys without validation when asked to', async () => {
    const mnemonic = await Mnemonic.fromWords(UNCHECKED, { skipValidation: true })
    const keyPair = await mnemonic.toKeyPair()
    const expected = await mnemonicToPrivateKey(UNCHECKED)
    expect(keyPair.publicKey.toString('hex')).toBe(expected.publicKey.toString('hex'))
  }, 30_000)

  it('mixes the password into the seed', async () => {
    const plain = await Mnemonic.fromWords(UNCHECKED, { skipValidation: true })
    const withPassword = await Mnemonic.fromWords(UNCHECKED, { password: 'test-password', skipValidation: true })
    expect((await plain.toSeed()).equals(await withPassword.toSeed())).toBe(false)
    const expected = await mnemonicToPrivateKey(UNCHECKED, 'test-password')
    expect((await withPassword.toKeyPair()).publicKey.toString('hex')).toBe(expected.publicKey.toString('hex'))
  }, 30_000)
})
