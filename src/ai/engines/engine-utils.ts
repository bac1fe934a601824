/**
 * Shared Engine Utilities
 *
 * Board classification, the phase-aware evaluation and move ordering used
 * by the deep search engine. Kept separate so the scoring can be tested
 * without running a search.
 */

import {
  type Board,
  type Coordinate,
  type Player,
  BOARD_SIZE,
  getCaptures,
  getOpponent,
  getValidMoves,
} from '../../game/othello'

// ============================================================================
// CELL CLASSES
// ============================================================================

const LAST = BOARD_SIZE - 1

/**
 * Cells next to a corner. Taking one usually hands the corner to the opponent.
 */
export const UNSAFE_CELLS: ReadonlyArray<Coordinate> = [
  { row: 0, col: 1 },
  { row: 1, col: 0 },
  { row: 1, col: 1 },
  { row: 0, col: 6 },
  { row: 1, col: 7 },
  { row: 1, col: 6 },
  { row: 6, col: 0 },
  { row: 7, col: 1 },
  { row: 6, col: 1 },
  { row: 6, col: 6 },
  { row: 6, col: 7 },
  { row: 7, col: 6 },
]

const UNSAFE_KEYS = new Set(UNSAFE_CELLS.map(({ row, col }) => row * BOARD_SIZE + col))

export function isCorner(row: number, col: number): boolean {
  return (row === 0 || row === LAST) && (col === 0 || col === LAST)
}

/**
 * Border cell that is not a corner.
 */
export function isEdge(row: number, col: number): boolean {
  const onBorder = row === 0 || row === LAST || col === 0 || col === LAST
  return onBorder && !isCorner(row, col)
}

export function isUnsafe(row: number, col: number): boolean {
  return UNSAFE_KEYS.has(row * BOARD_SIZE + col)
}

// ============================================================================
// EVALUATION WEIGHTS
// ============================================================================

/**
 * Weights for one game phase.
 */
export interface PhaseWeights {
  disc: number
  mobility: number
  corner: number
  edge: number
  unsafe: number
}

export const OPENING_WEIGHTS: PhaseWeights = {
  disc: 10,
  mobility: 80,
  corner: 800,
  edge: 40,
  unsafe: 60,
}

export const MIDGAME_WEIGHTS: PhaseWeights = {
  disc: 30,
  mobility: 60,
  corner: 800,
  edge: 60,
  unsafe: 40,
}

export const ENDGAME_WEIGHTS: PhaseWeights = {
  disc: 100,
  mobility: 20,
  corner: 800,
  edge: 20,
  unsafe: 0,
}

/**
 * Picks the weight set for the number of discs on the board.
 */
export function getPhaseWeights(totalDiscs: number): PhaseWeights {
  if (totalDiscs <= 20) return OPENING_WEIGHTS
  if (totalDiscs <= 52) return MIDGAME_WEIGHTS
  return ENDGAME_WEIGHTS
}

// ============================================================================
// POSITION EVALUATION
// ============================================================================

interface SideTally {
  discs: number
  corners: number
  edges: number
  unsafe: number
}

function emptyTally(): SideTally {
  return { discs: 0, corners: 0, edges: 0, unsafe: 0 }
}

/**
 * Evaluates the board from the perspective of the given player.
 *
 * Five terms, each a difference (player minus opponent): discs, legal
 * moves, corners, non-corner edges, and unsafe cells (subtracted).
 *
 * @returns Score from player's perspective (positive = good for player)
 */
export function evaluatePosition(board: Board, player: Player): number {
  const own = emptyTally()
  const other = emptyTally()

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const cell = board[row][col]
      if (cell === null) continue

      const tally = cell === player ? own : other
      tally.discs++
      if (isCorner(row, col)) {
        tally.corners++
      } else if (isEdge(row, col)) {
        tally.edges++
      }
      if (isUnsafe(row, col)) {
        tally.unsafe++
      }
    }
  }

  const ownMobility = getValidMoves(board, player).length
  const otherMobility = getValidMoves(board, getOpponent(player)).length
  const weights = getPhaseWeights(own.discs + other.discs)

  return (
    weights.disc * (own.discs - other.discs) +
    weights.mobility * (ownMobility - otherMobility) +
    weights.corner * (own.corners - other.corners) +
    weights.edge * (own.edges - other.edges) -
    weights.unsafe * (own.unsafe - other.unsafe)
  )
}

// ============================================================================
// MOVE ORDERING
// ============================================================================

/**
 * Orders moves for better alpha-beta pruning.
 *
 * Corners first, then other edge cells, then interior cells, with unsafe
 * cells last. Within the edge and interior groups, moves that flip more
 * discs come first. The sort is stable, so equal keys keep scan order.
 */
export function orderMoves(board: Board, moves: Coordinate[], player: Player): Coordinate[] {
  const keyed = moves.map((move) => {
    const { row, col } = move
    if (isCorner(row, col)) return { move, priority: 0, flips: 0 }
    if (isUnsafe(row, col)) return { move, priority: 3, flips: 0 }
    const priority = isEdge(row, col) ? 1 : 2
    return { move, priority, flips: getCaptures(board, move, player).length }
  })

  return keyed
    .sort((a, b) => a.priority - b.priority || b.flips - a.flips)
    .map((entry) => entry.move)
}
