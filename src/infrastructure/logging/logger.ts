import pino from 'pino'
import { ENV } from '@infrastructure/config/env.ts'

export const logger = pino({
  name: 'recipe-track',
  level: ENV.LOG_LEVEL,
  base: { env: ENV.NODE_ENV },
})

export const parserLogger = logger.child({ module: 'parser' })
export const cliLogger = logger.child({ module: 'cli' })
