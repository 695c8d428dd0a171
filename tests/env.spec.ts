import { ZodError } from 'zod'

import { parseEnv } from '../src/env'

describe('env', () => {
  it('fills in defaults', () => {
    expect(parseEnv({})).toEqual({ NODE_ENV: 'development', LOG_LEVEL: 'warn' })
  })

  it('takes a known log level', () => {
    expect(parseEnv({ NODE_ENV: 'test', LOG_LEVEL: 'debug' })).toEqual({ NODE_ENV: 'test', LOG_LEVEL: 'debug' })
  })

  it('rejects an unknown log level', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow(ZodError)
  })
})
