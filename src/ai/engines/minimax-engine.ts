/**
 * Minimax Engine
 *
 * Plain fixed-depth minimax over a static positional weight table.
 * No pruning, caching or move ordering: every line is searched to the
 * configured depth in scan order.
 */

import type { AIEngine, EngineConfig, MoveResult } from '../ai-engine'
import {
  type Board,
  type Coordinate,
  type GameState,
  type Player,
  BOARD_SIZE,
  cloneBoard,
  getOpponent,
  getValidMoves,
  hasValidMove,
  placeDisc,
  removeDisc,
} from '../../game/othello'

// ============================================================================
// POSITIONAL WEIGHTS
// ============================================================================

/**
 * Static cell values: corners high, cells next to corners negative.
 */
export const POSITIONAL_WEIGHTS: ReadonlyArray<ReadonlyArray<number>> = [
  [100, -20, 10, 5, 5, 10, -20, 100],
  [-20, -50, -2, -2, -2, -2, -50, -20],
  [10, -2, -1, -1, -1, -1, -2, 10],
  [5, -2, -1, -1, -1, -1, -2, 5],
  [5, -2, -1, -1, -1, -1, -2, 5],
  [10, -2, -1, -1, -1, -1, -2, 10],
  [-20, -50, -2, -2, -2, -2, -50, -20],
  [100, -20, 10, 5, 5, 10, -20, 100],
]

/**
 * Sum of cell weights, own discs positive and opponent discs negative.
 */
export function evaluatePositional(board: Board, player: Player): number {
  let score = 0
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const cell = board[row][col]
      if (cell === null) continue
      score += cell === player ? POSITIONAL_WEIGHTS[row][col] : -POSITIONAL_WEIGHTS[row][col]
    }
  }
  return score
}

// ============================================================================
// MINIMAX SEARCH
// ============================================================================

interface MinimaxSearchResult {
  score: number
  nodesSearched: number
}

/**
 * Minimax from `player`'s perspective with `currentPlayer` to move.
 * A side with no move passes (using up one ply) while the other can still play.
 */
function minimaxSearch(
  board: Board,
  depth: number,
  player: Player,
  currentPlayer: Player,
  nodesSearched: number
): MinimaxSearchResult {
  nodesSearched++

  if (depth === 0) {
    return { score: evaluatePositional(board, player), nodesSearched }
  }

  const nextPlayer = getOpponent(currentPlayer)
  const moves = getValidMoves(board, currentPlayer)

  if (moves.length === 0) {
    if (hasValidMove(board, nextPlayer)) {
      return minimaxSearch(board, depth - 1, player, nextPlayer, nodesSearched)
    }
    return { score: evaluatePositional(board, player), nodesSearched }
  }

  const maximizing = currentPlayer === player
  let bestScore = maximizing ? -Infinity : Infinity

  for (const move of moves) {
    const flipped = placeDisc(board, move, currentPlayer)
    if (flipped === null) continue

    const result = minimaxSearch(board, depth - 1, player, nextPlayer, nodesSearched)
    removeDisc(board, move, flipped, currentPlayer)
    nodesSearched = result.nodesSearched

    bestScore = maximizing ? Math.max(bestScore, result.score) : Math.min(bestScore, result.score)
  }

  return { score: bestScore, nodesSearched }
}

// ============================================================================
// MINIMAX ENGINE
// ============================================================================

export class MinimaxEngine implements AIEngine {
  readonly name = 'minimax'
  readonly description = 'Fixed-depth minimax over a positional weight table'

  selectMove(state: GameState, player: Player, config: EngineConfig): MoveResult | null {
    const startTime = Date.now()
    const board = cloneBoard(state.board)
    const moves = getValidMoves(board, player)
    if (moves.length === 0) {
      return null
    }

    const depth = Math.max(1, config.searchDepth)
    const opponent = getOpponent(player)
    let bestMove: Coordinate = moves[0]
    let bestScore = -Infinity
    let nodesSearched = 0

    for (const move of moves) {
      const flipped = placeDisc(board, move, player)
      if (flipped === null) continue

      const result = minimaxSearch(board, depth - 1, player, opponent, nodesSearched)
      removeDisc(board, move, flipped, player)
      nodesSearched = result.nodesSearched

      if (result.score > bestScore) {
        bestScore = result.score
        bestMove = move
      }
    }

    return {
      move: bestMove,
      score: bestScore,
      searchInfo: {
        depth,
        nodesSearched,
        timeUsed: Date.now() - startTime,
      },
    }
  }

  evaluatePosition(board: Board, player: Player): number {
    return evaluatePositional(board, player)
  }
}

export const minimaxEngine = new MinimaxEngine()
