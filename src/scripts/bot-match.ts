/**
 * Play bot-vs-bot matches and print the tally.
 *
 * Usage: tsx src/scripts/bot-match.ts <first bot> <second bot> [--games N] [--verbose]
 *
 * Colors alternate between games, the first bot taking black in game 1.
 */

import { pathToFileURL } from 'node:url'
import { strategyFor } from '../ai/bots'
import { playMatch, type MatchResult } from '../ai/match'
import { loadConfig, type AppConfig } from '../lib/config'
import { getErrorMessage } from '../lib/errorUtils'

export interface BotMatchOptions {
  first: string
  second: string
  games: number
  verbose: boolean
}

export interface MatchTally {
  wins: Record<string, number>
  draws: number
  games: number
}

/**
 * @throws Error on a bad flag, a bad game count, or not exactly two bots
 */
export function parseBotMatchArgs(args: string[], config: AppConfig): BotMatchOptions {
  const names: string[] = []
  let games = config.matchGames
  let verbose = false

  for (let i = 0; i < args.length; i++) {
    const token = args[i]
    if (token === '--games' || token === '-n') {
      const value = Number(args[i + 1])
      if (!Number.isInteger(value) || value < 1) {
        throw new Error(`${token} needs a positive whole number`)
      }
      games = value
      i++
    } else if (token === '--verbose' || token === '-v') {
      verbose = true
    } else if (token.startsWith('-')) {
      throw new Error(`Unknown option: ${token}`)
    } else {
      names.push(token)
    }
  }

  if (names.length !== 2) {
    throw new Error('Usage: bot-match <first bot> <second bot> [--games N] [--verbose]')
  }
  return { first: names[0], second: names[1], games, verbose }
}

/**
 * Counts wins per bot name across a series of games.
 */
export function tallyResults(results: MatchResult[]): MatchTally {
  const tally: MatchTally = { wins: {}, draws: 0, games: results.length }
  for (const result of results) {
    for (const name of Object.values(result.players)) {
      tally.wins[name] ??= 0
    }
    if (result.winner === 'draw') {
      tally.draws++
    } else {
      tally.wins[result.players[result.winner]]++
    }
  }
  return tally
}

function main(): void {
  const config = loadConfig()
  const options = parseBotMatchArgs(process.argv.slice(2), config)
  const overrides = { timeBudget: config.timeBudget }
  const first = strategyFor(options.first, overrides)
  const second = strategyFor(options.second, overrides)

  const results: MatchResult[] = []
  for (let game = 1; game <= options.games; game++) {
    const [black, white] = game % 2 === 1 ? [first, second] : [second, first]
    const result = playMatch(black, white, {
      onMove: options.verbose
        ? (move) => {
            const where = move.move ? `(${move.move.row},${move.move.col})` : 'pass'
            console.log(`[Match] game ${game} ply ${move.ply}: ${move.player} ${where}`)
          }
        : undefined,
    })
    results.push(result)
    console.log(
      `[Match] game ${game}: ${black.name} (black) ${result.score.black} - ${result.score.white} ${white.name} (white)`
    )
  }

  const tally = tallyResults(results)
  console.log(`[Match] ${tally.games} games, ${tally.draws} draws`)
  for (const [name, wins] of Object.entries(tally.wins)) {
    console.log(`[Match] ${name}: ${wins} wins`)
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main()
  } catch (err) {
    console.error(`[Match] ${getErrorMessage(err)}`)
    process.exitCode = 1
  }
}
