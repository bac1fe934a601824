/**
 * Greedy Engine
 *
 * Plays the move that flips the most discs right now. No search.
 */

import type { AIEngine, EngineConfig, MoveResult } from '../ai-engine'
import { type GameState, type Player, type Coordinate, getValidMoves, getCaptures } from '../../game/othello'

export class GreedyEngine implements AIEngine {
  readonly name = 'greedy'
  readonly description = 'Maximizes discs flipped this turn; ties go to scan order'

  selectMove(state: GameState, player: Player, _config: EngineConfig): MoveResult | null {
    const startTime = Date.now()
    const moves = getValidMoves(state.board, player)
    if (moves.length === 0) {
      return null
    }

    let bestMove: Coordinate = moves[0]
    let bestCount = -1
    for (const move of moves) {
      const count = getCaptures(state.board, move, player).length
      if (count > bestCount) {
        bestCount = count
        bestMove = move
      }
    }

    return {
      move: bestMove,
      score: bestCount,
      searchInfo: {
        depth: 1,
        nodesSearched: moves.length,
        timeUsed: Date.now() - startTime,
      },
    }
  }
}

export const greedyEngine = new GreedyEngine()
