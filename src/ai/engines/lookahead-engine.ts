/**
 * Lookahead Engine
 *
 * One-ply mobility restriction: plays the move that leaves the opponent
 * the fewest legal replies.
 */

import type { AIEngine, EngineConfig, MoveResult } from '../ai-engine'
import {
  type GameState,
  type Player,
  type Coordinate,
  cloneBoard,
  getOpponent,
  getValidMoves,
  placeDisc,
  removeDisc,
} from '../../game/othello'

export class LookaheadEngine implements AIEngine {
  readonly name = 'lookahead'
  readonly description = 'Leaves the opponent the fewest replies one move ahead'

  selectMove(state: GameState, player: Player, _config: EngineConfig): MoveResult | null {
    const startTime = Date.now()
    const board = cloneBoard(state.board)
    const moves = getValidMoves(board, player)
    if (moves.length === 0) {
      return null
    }

    const opponent = getOpponent(player)
    let bestMove: Coordinate = moves[0]
    let fewestReplies = Infinity

    for (const move of moves) {
      const flipped = placeDisc(board, move, player)
      if (flipped === null) continue
      const replies = getValidMoves(board, opponent).length
      removeDisc(board, move, flipped, player)

      if (replies < fewestReplies) {
        fewestReplies = replies
        bestMove = move
      }
    }

    return {
      move: bestMove,
      // Fewer replies is better for the mover
      score: -fewestReplies,
      searchInfo: {
        depth: 1,
        nodesSearched: moves.length,
        timeUsed: Date.now() - startTime,
      },
    }
  }
}

export const lookaheadEngine = new LookaheadEngine()
