import dotenv from 'dotenv'

dotenv.config()

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase()) ?? 'info'
}

export const ENV = {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
  // Default input for scripts/parse-ingredients.ts
  INGREDIENTS_FILE: process.env.INGREDIENTS_FILE ?? 'data/ingredients.txt',
}
