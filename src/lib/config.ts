/**
 * Environment configuration for the command-line scripts
 *
 * OTHELLO_DEFAULT_BOT     bot used when none is named (default: Sasha senior)
 * OTHELLO_TIME_BUDGET_MS  soft per-move budget for the deep search bots
 * OTHELLO_MATCH_GAMES     games per bot-vs-bot match (default: 1)
 */

import { z } from 'zod'
import { hasBot } from '../ai/bots'
import { formatZodError } from './schemas'

export const DEFAULT_BOT = 'Sasha senior'

const envSchema = z.object({
  OTHELLO_DEFAULT_BOT: z
    .string()
    .default(DEFAULT_BOT)
    .refine(hasBot, (name) => ({ message: `Unknown bot: ${name}` })),
  OTHELLO_TIME_BUDGET_MS: z.coerce
    .number()
    .int('Time budget must be a whole number of milliseconds')
    .positive('Time budget must be positive')
    .optional(),
  OTHELLO_MATCH_GAMES: z.coerce
    .number()
    .int('Match games must be a whole number')
    .positive('Match games must be positive')
    .default(1),
})

export interface AppConfig {
  defaultBot: string
  timeBudget?: number
  matchGames: number
}

/**
 * Reads and validates the configuration.
 *
 * @throws Error naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodError(parsed.error)}`)
  }

  return {
    defaultBot: parsed.data.OTHELLO_DEFAULT_BOT,
    timeBudget: parsed.data.OTHELLO_TIME_BUDGET_MS,
    matchGames: parsed.data.OTHELLO_MATCH_GAMES,
  }
}
