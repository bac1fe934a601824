/**
 * Run a bot on a saved game file and print its move.
 *
 * Usage: tsx src/scripts/run-bot.ts [--bot NAME] [--verbose] <saved-game.json>
 */

import { readFileSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { strategyFor } from '../ai/bots'
import { parseSavedGame } from '../game/serialization'
import { loadConfig, type AppConfig } from '../lib/config'
import { getErrorMessage } from '../lib/errorUtils'
import type { MoveResult } from '../ai/ai-engine'

export interface RunBotOptions {
  file: string
  bot: string
  verbose: boolean
}

/**
 * @throws Error on an unknown flag, a flag missing its value, or no file
 */
export function parseRunBotArgs(args: string[], config: AppConfig): RunBotOptions {
  let file: string | null = null
  let bot = config.defaultBot
  let verbose = false

  for (let i = 0; i < args.length; i++) {
    const token = args[i]
    if (token === '--bot' || token === '-b') {
      const value = args[i + 1]
      if (value === undefined) throw new Error(`${token} needs a bot name`)
      bot = value
      i++
    } else if (token === '--verbose' || token === '-v') {
      verbose = true
    } else if (token.startsWith('-')) {
      throw new Error(`Unknown option: ${token}`)
    } else if (file === null) {
      file = token
    } else {
      throw new Error(`Unexpected argument: ${token}`)
    }
  }

  if (file === null) {
    throw new Error('Usage: run-bot [--bot NAME] [--verbose] <saved-game.json>')
  }
  return { file, bot, verbose }
}

/**
 * One line per completed search depth.
 */
export function describeSearch(result: MoveResult): string[] {
  const info = result.searchInfo
  if (!info) return []
  if (info.fromBook) return ['Opening book move']

  const lines = (info.iterations ?? []).map(
    (step) => `depth ${step.depth}: (${step.move.row},${step.move.col}) score ${step.score}, ${step.nodesSearched} nodes`
  )
  lines.push(`searched ${info.nodesSearched ?? 0} nodes in ${info.timeUsed ?? 0}ms`)
  return lines
}

function main(): void {
  const config = loadConfig()
  const options = parseRunBotArgs(process.argv.slice(2), config)
  const strategy = strategyFor(options.bot, { timeBudget: config.timeBudget })

  const parsed = parseSavedGame(JSON.parse(readFileSync(options.file, 'utf-8')))
  if (!parsed.success) {
    console.error(`[RunBot] ${options.file}: ${parsed.error}`)
    process.exitCode = 1
    return
  }

  const state = parsed.data
  if (state.currentPlayer === null) {
    console.log('Game over.')
    return
  }

  const result = strategy.analyze(state, state.currentPlayer)
  if (!result) {
    console.log('No valid moves available.')
    return
  }

  if (options.verbose) {
    for (const line of describeSearch(result)) {
      console.log(`[RunBot] ${line}`)
    }
  }
  console.log(`Next move: ${result.move.row} ${result.move.col}`)
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main()
  } catch (err) {
    console.error(`[RunBot] ${getErrorMessage(err)}`)
    process.exitCode = 1
  }
}
