import { z } from 'zod'

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
})

export type Env = z.infer<typeof EnvSchema>

export const parseEnv = (source: Record<string, string | undefined>): Env => EnvSchema.parse(source)

const env: Env = parseEnv(process.env)

export default env
