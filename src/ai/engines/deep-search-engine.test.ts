/**
 * Deep Search Engine Tests
 */

import { describe, it, expect } from 'vitest'
import { DeepSearchEngine, OPENING_BOOK } from './deep-search-engine'
import { evaluatePosition } from './engine-utils'
import {
  createGameState,
  cloneGameState,
  applyMove,
  boardFromRows,
  cloneBoard,
  countEmpty,
  getOpponent,
  getValidMoves,
  hasValidMove,
  placeDisc,
  removeDisc,
  type Board,
  type GameState,
  type Player,
} from '../../game/othello'

function stateFromRows(rows: string[], currentPlayer: Player): GameState {
  return { board: boardFromRows(rows), currentPlayer, lastMove: null }
}

/**
 * Full-width minimax with the same evaluation and pass rule as the engine,
 * without pruning or caching.
 */
function bruteForce(board: Board, turn: Player, depth: number, root: Player): number {
  const opponent = getOpponent(turn)
  const moves = getValidMoves(board, turn)
  if (depth === 0 || (moves.length === 0 && !hasValidMove(board, opponent))) {
    return evaluatePosition(board, root)
  }
  if (moves.length === 0) {
    return bruteForce(board, opponent, depth - 1, root)
  }

  const scores = moves.map((move) => {
    const flipped = placeDisc(board, move, turn)
    const score = bruteForce(board, opponent, depth - 1, root)
    if (flipped) removeDisc(board, move, flipped, turn)
    return score
  })
  return turn === root ? Math.max(...scores) : Math.min(...scores)
}

function rootScores(state: GameState, player: Player): number[] {
  const board = cloneBoard(state.board)
  const depth = countEmpty(board)
  return getValidMoves(board, player).map((move) => {
    const flipped = placeDisc(board, move, player)
    const score = bruteForce(board, getOpponent(player), depth - 1, player)
    if (flipped) removeDisc(board, move, flipped, player)
    return score
  })
}

// Four empty cells on the bottom row, black to move, white cannot move.
const FOUR_EMPTY = stateFromRows(
  [
    'BBBBBBBB',
    'BBBBBBBB',
    'BBBBBBBB',
    'BBBBBBBB',
    'BBBBBBBB',
    'WWWWWWWW',
    'WWWWWWWW',
    'W..WW..W',
  ],
  'black'
)

const FIVE_EMPTY = stateFromRows(
  [
    'BBBBBBBB',
    'BBBBBBBB',
    'BBBBBBBB',
    'BBBBBBBB',
    'BBBBBBBB',
    'WWWWWWWW',
    'WWWWWWWW',
    'W..W...W',
  ],
  'black'
)

// A hole in the middle of concentric rings; only white can play.
const RING = stateFromRows(
  [
    'BBBBBBBB',
    'BWWWWWWB',
    'BWBBBBWB',
    'BWB..BWB',
    'BWB..BWB',
    'BWBBBBWB',
    'BWWWWWWB',
    'BBBBBBBB',
  ],
  'white'
)

describe('DeepSearchEngine', () => {
  const engine = new DeepSearchEngine()

  describe('opening book', () => {
    it('should answer the starting position without searching', () => {
      const white = engine.selectMove(createGameState(), 'white', { searchDepth: 6 })
      expect(white?.move).toEqual(OPENING_BOOK.white)
      expect(white?.move).toEqual({ row: 2, col: 4 })
      expect(white?.searchInfo?.fromBook).toBe(true)
      expect(white?.searchInfo?.nodesSearched).toBe(0)

      const black = engine.selectMove(createGameState('black'), 'black', { searchDepth: 6 })
      expect(black?.move).toEqual({ row: 2, col: 3 })
    })

    it('should search once a move has been played', () => {
      const state = createGameState()
      applyMove(state, { row: 2, col: 4 }, 'white')
      const result = engine.selectMove(state, 'black', { searchDepth: 2 })
      expect(result?.searchInfo?.fromBook).toBeUndefined()
      expect(result?.searchInfo?.depth).toBe(2)
      expect(result?.searchInfo?.iterations?.map((i) => i.depth)).toEqual([1, 2])
    })
  })

  describe('endgame solver', () => {
    it('should search to the end with four empty cells', () => {
      const result = engine.selectMove(FOUR_EMPTY, 'black', { searchDepth: 1 })
      expect(result?.searchInfo?.depth).toBe(4)
      expect(result?.move).toEqual({ row: 7, col: 2 })
      expect(result?.score).toBe(3080)
    })

    it('should search to the end with five empty cells', () => {
      const result = engine.selectMove(FIVE_EMPTY, 'black', { searchDepth: 1 })
      expect(result?.searchInfo?.depth).toBe(5)
      expect(result?.move).toEqual({ row: 7, col: 5 })
      expect(result?.score).toBe(4680)
    })

    const cases: Array<{ name: string; state: GameState; player: Player }> = [
      { name: 'four empty cells', state: FOUR_EMPTY, player: 'black' },
      { name: 'five empty cells', state: FIVE_EMPTY, player: 'black' },
      { name: 'a central hole', state: RING, player: 'white' },
    ]

    for (const { name, state, player } of cases) {
      it(`should match brute-force minimax with ${name}`, () => {
        const result = engine.selectMove(state, player, { searchDepth: 6 })
        expect(result).not.toBeNull()
        if (!result) return

        const scores = rootScores(state, player)
        const best = Math.max(...scores)
        expect(result.score).toBe(best)

        const moves = getValidMoves(state.board, player)
        const chosen = moves.findIndex((m) => m.row === result.move.row && m.col === result.move.col)
        expect(chosen).toBeGreaterThanOrEqual(0)
        expect(scores[chosen]).toBe(best)
      })
    }

    it('should report the ring position as lost for white', () => {
      const result = engine.selectMove(RING, 'white', { searchDepth: 6 })
      expect(result?.score).toBe(-7080)
      expect(result?.move).toEqual({ row: 3, col: 3 })
    })
  })

  describe('iterative deepening', () => {
    it('should stop after depth 1 when the time budget is spent', () => {
      const state = createGameState()
      applyMove(state, { row: 2, col: 4 }, 'white')
      const result = engine.selectMove(state, 'black', { searchDepth: 6, timeBudget: 0 })
      expect(result?.searchInfo?.depth).toBe(1)
      expect(result?.searchInfo?.iterations?.length).toBe(1)
    })

    it('should record one iteration per completed depth', () => {
      const state = createGameState()
      applyMove(state, { row: 2, col: 4 }, 'white')
      const result = engine.selectMove(state, 'black', { searchDepth: 3 })
      const iterations = result?.searchInfo?.iterations ?? []
      expect(iterations.map((i) => i.depth)).toEqual([1, 2, 3])
      expect(result?.move).toEqual(iterations[2].move)
      expect(result?.score).toBe(iterations[2].score)
    })
  })

  describe('determinism', () => {
    it('should return identical results for identical inputs', () => {
      const state = createGameState()
      applyMove(state, { row: 2, col: 4 }, 'white')
      applyMove(state, { row: 2, col: 3 }, 'black')

      const first = engine.selectMove(state, 'white', { searchDepth: 4 })
      const second = new DeepSearchEngine().selectMove(state, 'white', { searchDepth: 4 })
      const third = engine.selectMove(state, 'white', { searchDepth: 4 })

      expect(second?.move).toEqual(first?.move)
      expect(second?.score).toBe(first?.score)
      expect(second?.searchInfo?.nodesSearched).toBe(first?.searchInfo?.nodesSearched)
      expect(third?.move).toEqual(first?.move)
      expect(third?.searchInfo?.nodesSearched).toBe(first?.searchInfo?.nodesSearched)
    })
  })

  it('should not mutate the caller state', () => {
    const state = cloneGameState(FIVE_EMPTY)
    engine.selectMove(state, 'black', { searchDepth: 6 })
    expect(state).toEqual(FIVE_EMPTY)
  })

  it('should return null when the side has no move', () => {
    expect(engine.selectMove(FOUR_EMPTY, 'white', { searchDepth: 6 })).toBeNull()
  })
})
