import { pino, Logger } from 'pino'

import env from './env'

export const logger: Logger = pino({
  name: 'ton-cells',
  level: env.LOG_LEVEL,
})

export const moduleLogger = (module: string): Logger => logger.child({ module })
