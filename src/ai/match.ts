/**
 * Match runner
 *
 * Plays one full game between two bots, committing each chosen move
 * through applyMove so the turn-passing rule is applied exactly as in a
 * live game.
 */

import { strategyFor, type Strategy } from './bots'
import {
  type Coordinate,
  type GameState,
  type Player,
  applyMove,
  cloneGameState,
  createGameState,
  getOpponent,
  getScore,
  getWinner,
  hasValidMove,
} from '../game/othello'

export interface MatchMove {
  ply: number
  player: Player
  /** null when the side had to pass */
  move: Coordinate | null
}

export interface MatchOptions {
  /** Position to start from; a fresh game when omitted */
  state?: GameState
  /** Side to move in a fresh game */
  startingPlayer?: Player
  /** Called after every ply with the updated state */
  onMove?: (move: MatchMove, state: GameState) => void
}

export interface MatchResult {
  state: GameState
  score: { black: number; white: number }
  winner: Player | 'draw'
  moves: MatchMove[]
  players: Record<Player, string>
}

function resolve(bot: Strategy | string): Strategy {
  return typeof bot === 'string' ? strategyFor(bot) : bot
}

/**
 * Plays until neither side can move.
 *
 * @throws Error if a bot proposes an illegal move, or declines to move
 *   while it still has a legal one
 */
export function playMatch(
  blackBot: Strategy | string,
  whiteBot: Strategy | string,
  options: MatchOptions = {}
): MatchResult {
  const bots: Record<Player, Strategy> = {
    black: resolve(blackBot),
    white: resolve(whiteBot),
  }
  const state = options.state ? cloneGameState(options.state) : createGameState(options.startingPlayer)
  const moves: MatchMove[] = []

  while (state.currentPlayer !== null) {
    const player = state.currentPlayer
    const bot = bots[player]
    const move = bot.selectMove(state, player)
    const record: MatchMove = { ply: moves.length + 1, player, move }

    if (move === null) {
      if (hasValidMove(state.board, player)) {
        throw new Error(`${bot.name} returned no move for ${player} with legal moves available`)
      }
      const opponent = getOpponent(player)
      state.currentPlayer = hasValidMove(state.board, opponent) ? opponent : null
    } else if (!applyMove(state, move, player)) {
      throw new Error(`${bot.name} played an illegal move for ${player} at (${move.row},${move.col})`)
    }

    moves.push(record)
    options.onMove?.(record, state)
  }

  return {
    state,
    score: getScore(state.board),
    winner: getWinner(state.board),
    moves,
    players: { black: bots.black.name, white: bots.white.name },
  }
}
