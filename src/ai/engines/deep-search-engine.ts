/**
 * Deep Search Engine
 *
 * Alpha-beta search with iterative deepening, a per-call transposition
 * table, corner-first move ordering, a one-move opening book and an
 * exhaustive endgame solver once few empty cells remain.
 */

import type { AIEngine, EngineConfig, MoveResult, SearchIteration } from '../ai-engine'
import {
  type Board,
  type Coordinate,
  type GameState,
  type Player,
  BOARD_SIZE,
  cloneBoard,
  countDiscs,
  getOpponent,
  getValidMoves,
  hasValidMove,
  isValidMove,
  placeDisc,
  removeDisc,
} from '../../game/othello'
import { evaluatePosition, orderMoves } from './engine-utils'
import { TranspositionTable, TTEntryType, boundType } from './transposition-table'

/**
 * At or below this many empty cells the search runs to the end of the game.
 */
export const ENDGAME_EMPTIES = 12

/**
 * Book replies for the starting position, by side to move.
 */
export const OPENING_BOOK: Record<Player, Coordinate> = {
  white: { row: 2, col: 4 },
  black: { row: 2, col: 3 },
}

const STARTING_DISCS = 4

// ============================================================================
// ALPHA-BETA
// ============================================================================

/**
 * Everything one top-level search owns. Created per selectMove call and
 * threaded through the recursion.
 */
interface SearchContext {
  /** Private copy of the position; moves are applied and undone in place */
  board: Board
  /** Side the search is run for; scores are from its perspective */
  root: Player
  tt: TranspositionTable
  nodesSearched: number
}

function alphaBeta(ctx: SearchContext, depth: number, alpha: number, beta: number, turn: Player): number {
  ctx.nodesSearched++

  const cached = ctx.tt.lookup(ctx.board, turn, depth, alpha, beta)
  if (cached !== null) {
    return cached
  }

  const opponent = getOpponent(turn)
  const moves = getValidMoves(ctx.board, turn)

  // Leaf: horizon reached or game over
  if (depth === 0 || (moves.length === 0 && !hasValidMove(ctx.board, opponent))) {
    const score = evaluatePosition(ctx.board, ctx.root)
    ctx.tt.store(ctx.board, turn, depth, score, TTEntryType.EXACT)
    return score
  }

  // Pass: the opponent moves instead, value passes through
  if (moves.length === 0) {
    const score = alphaBeta(ctx, depth - 1, alpha, beta, opponent)
    ctx.tt.store(ctx.board, turn, depth, score, boundType(score, alpha, beta))
    return score
  }

  const alphaOrig = alpha
  const betaOrig = beta
  const maximizing = turn === ctx.root
  let bestScore = maximizing ? -Infinity : Infinity

  for (const move of orderMoves(ctx.board, moves, turn)) {
    const flipped = placeDisc(ctx.board, move, turn)
    if (flipped === null) continue

    const score = alphaBeta(ctx, depth - 1, alpha, beta, opponent)
    removeDisc(ctx.board, move, flipped, turn)

    if (maximizing) {
      bestScore = Math.max(bestScore, score)
      alpha = Math.max(alpha, bestScore)
    } else {
      bestScore = Math.min(bestScore, score)
      beta = Math.min(beta, bestScore)
    }

    if (alpha >= beta) break
  }

  ctx.tt.store(ctx.board, turn, depth, bestScore, boundType(bestScore, alphaOrig, betaOrig))
  return bestScore
}

/**
 * Searches every root move to `depth` plies with a full window.
 * The first move reaching the best score wins ties.
 */
function searchRoot(ctx: SearchContext, rootMoves: Coordinate[], depth: number): { move: Coordinate; score: number } {
  const opponent = getOpponent(ctx.root)
  let bestMove = rootMoves[0]
  let bestScore = -Infinity

  for (const move of rootMoves) {
    const flipped = placeDisc(ctx.board, move, ctx.root)
    if (flipped === null) continue

    const score = alphaBeta(ctx, depth - 1, -Infinity, Infinity, opponent)
    removeDisc(ctx.board, move, flipped, ctx.root)

    if (score > bestScore) {
      bestScore = score
      bestMove = move
    }
  }

  return { move: bestMove, score: bestScore }
}

// ============================================================================
// DEEP SEARCH ENGINE
// ============================================================================

/**
 * Deep search engine for the strongest bots.
 *
 * Characteristics:
 * - Opening book for the starting position
 * - Iterative deepening up to the configured depth, or to the end of the
 *   game once ENDGAME_EMPTIES or fewer cells are empty
 * - Fresh transposition table per call, so no state leaks between searches
 * - Optional time budget, checked only between completed depths
 */
export class DeepSearchEngine implements AIEngine {
  readonly name = 'deep-search'
  readonly description = 'Alpha-beta with iterative deepening, caching and exact endgame search'

  selectMove(state: GameState, player: Player, config: EngineConfig): MoveResult | null {
    const startTime = Date.now()
    const board = cloneBoard(state.board)
    const moves = getValidMoves(board, player)
    if (moves.length === 0) {
      return null
    }

    const discs = countDiscs(board)
    if (discs === STARTING_DISCS) {
      const bookMove = OPENING_BOOK[player]
      if (isValidMove(board, bookMove, player)) {
        return {
          move: { ...bookMove },
          searchInfo: {
            depth: 0,
            nodesSearched: 0,
            timeUsed: Date.now() - startTime,
            fromBook: true,
          },
        }
      }
    }

    const empties = BOARD_SIZE * BOARD_SIZE - discs
    const maxDepth = empties <= ENDGAME_EMPTIES ? empties : Math.max(1, config.searchDepth)

    const ctx: SearchContext = {
      board,
      root: player,
      tt: new TranspositionTable(),
      nodesSearched: 0,
    }
    const rootMoves = orderMoves(board, moves, player)
    const iterations: SearchIteration[] = []
    let bestMove = rootMoves[0]
    let bestScore = -Infinity

    for (let depth = 1; depth <= maxDepth; depth++) {
      // Only stop between depths; an unfinished depth has no usable result
      if (depth > 1 && config.timeBudget !== undefined && Date.now() - startTime >= config.timeBudget) {
        break
      }

      const nodesBefore = ctx.nodesSearched
      const result = searchRoot(ctx, rootMoves, depth)
      bestMove = result.move
      bestScore = result.score
      iterations.push({
        depth,
        move: { ...result.move },
        score: result.score,
        nodesSearched: ctx.nodesSearched - nodesBefore,
      })
    }

    return {
      move: { ...bestMove },
      score: bestScore,
      searchInfo: {
        depth: iterations.length,
        nodesSearched: ctx.nodesSearched,
        timeUsed: Date.now() - startTime,
        iterations,
        ttHitRate: ctx.tt.getStats().hitRate,
      },
    }
  }

  evaluatePosition(board: Board, player: Player): number {
    return evaluatePosition(board, player)
  }
}

export const deepSearchEngine = new DeepSearchEngine()
