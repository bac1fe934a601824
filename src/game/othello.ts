/**
 * Othello Game Engine
 *
 * A pure TypeScript implementation of the disc-flipping game logic.
 * This module contains no UI dependencies and is shared by the bots,
 * the match runner and the scripts.
 */

// Board dimensions
export const BOARD_SIZE = 8

// Player identifiers
export type Player = 'black' | 'white'
export type Cell = Player | null

// Board is represented as a 2D array: board[row][col]
export type Board = Cell[][]

export interface Coordinate {
  row: number
  col: number
}

export interface GameState {
  board: Board
  /** Side to move, or null once neither side has a legal move */
  currentPlayer: Player | null
  /** Most recently placed disc, null before the first move */
  lastMove: Coordinate | null
}

/**
 * Inverse delta of an applied move, enough to undo it exactly.
 */
export interface MoveRecord {
  move: Coordinate
  player: Player
  flipped: Coordinate[]
  previousPlayer: Player | null
  previousLastMove: Coordinate | null
}

// Scan order matters: capture sets list flips direction by direction.
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
]

/**
 * Creates an empty game board.
 */
export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null))
}

/**
 * Creates a new game with the four center discs in place.
 * White moves first unless told otherwise.
 */
export function createGameState(startingPlayer: Player = 'white'): GameState {
  const board = createEmptyBoard()
  const mid = BOARD_SIZE / 2
  board[mid - 1][mid - 1] = 'white'
  board[mid][mid] = 'white'
  board[mid - 1][mid] = 'black'
  board[mid][mid - 1] = 'black'
  return {
    board,
    currentPlayer: startingPlayer,
    lastMove: null,
  }
}

/**
 * Deep clones a board to avoid mutations.
 */
export function cloneBoard(board: Board): Board {
  return board.map((row) => [...row])
}

export function cloneGameState(state: GameState): GameState {
  return {
    board: cloneBoard(state.board),
    currentPlayer: state.currentPlayer,
    lastMove: state.lastMove ? { ...state.lastMove } : null,
  }
}

export function getOpponent(player: Player): Player {
  return player === 'black' ? 'white' : 'black'
}

export function isOnBoard(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < BOARD_SIZE &&
    col >= 0 &&
    col < BOARD_SIZE
  )
}

// ============================================================================
// MOVE GENERATION
// ============================================================================

/**
 * Returns the opponent discs that would flip if `player` played at `move`.
 * Occupancy of the target cell is not checked here.
 *
 * @param board - The current board
 * @param move - Target cell
 * @param player - The player placing the disc
 * @returns Captured coordinates, empty when the move captures nothing
 */
export function getCaptures(board: Board, move: Coordinate, player: Player): Coordinate[] {
  const opponent = getOpponent(player)
  const captured: Coordinate[] = []

  for (const [dr, dc] of DIRECTIONS) {
    let row = move.row + dr
    let col = move.col + dc
    const run: Coordinate[] = []

    while (isOnBoard(row, col) && board[row][col] === opponent) {
      run.push({ row, col })
      row += dr
      col += dc
    }

    if (run.length > 0 && isOnBoard(row, col) && board[row][col] === player) {
      captured.push(...run)
    }
  }

  return captured
}

/**
 * Checks if a move is legal: on the board, empty, and capturing.
 */
export function isValidMove(board: Board, move: Coordinate, player: Player): boolean {
  if (!isOnBoard(move.row, move.col)) return false
  if (board[move.row][move.col] !== null) return false
  return getCaptures(board, move, player).length > 0
}

/**
 * Returns all legal moves for `player` in row-major scan order.
 */
export function getValidMoves(board: Board, player: Player): Coordinate[] {
  const moves: Coordinate[] = []
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] === null && getCaptures(board, { row, col }, player).length > 0) {
        moves.push({ row, col })
      }
    }
  }
  return moves
}

export function hasValidMove(board: Board, player: Player): boolean {
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] === null && getCaptures(board, { row, col }, player).length > 0) {
        return true
      }
    }
  }
  return false
}

// ============================================================================
// MOVE APPLICATION
// ============================================================================

/**
 * Places a disc and flips its captures, touching nothing but the board.
 * Search code uses this with removeDisc and tracks the turn itself.
 *
 * @returns The flipped coordinates, or null if the move is illegal
 */
export function placeDisc(board: Board, move: Coordinate, player: Player): Coordinate[] | null {
  if (!isOnBoard(move.row, move.col) || board[move.row][move.col] !== null) {
    return null
  }
  const flipped = getCaptures(board, move, player)
  if (flipped.length === 0) {
    return null
  }
  board[move.row][move.col] = player
  for (const { row, col } of flipped) {
    board[row][col] = player
  }
  return flipped
}

/**
 * Reverts a placeDisc call.
 */
export function removeDisc(board: Board, move: Coordinate, flipped: Coordinate[], player: Player): void {
  const opponent = getOpponent(player)
  board[move.row][move.col] = null
  for (const { row, col } of flipped) {
    board[row][col] = opponent
  }
}

/**
 * Works out who moves after `mover` has played on `board`.
 * The turn passes back to the mover if the opponent is stuck, and the
 * game ends (null) when neither side can move.
 */
export function nextPlayerAfter(board: Board, mover: Player): Player | null {
  const opponent = getOpponent(mover)
  if (hasValidMove(board, opponent)) return opponent
  if (hasValidMove(board, mover)) return mover
  return null
}

/**
 * Plays a move in place and returns its inverse delta.
 *
 * @returns The move record, or null (with no mutation) if the move is illegal
 */
export function playMove(state: GameState, move: Coordinate, player: Player): MoveRecord | null {
  const previousPlayer = state.currentPlayer
  const previousLastMove = state.lastMove
  const flipped = placeDisc(state.board, move, player)
  if (flipped === null) {
    return null
  }

  state.lastMove = { row: move.row, col: move.col }
  state.currentPlayer = nextPlayerAfter(state.board, player)

  return {
    move: { row: move.row, col: move.col },
    player,
    flipped,
    previousPlayer,
    previousLastMove,
  }
}

/**
 * Restores the state as it was before the recorded move.
 */
export function undoMove(state: GameState, record: MoveRecord): void {
  removeDisc(state.board, record.move, record.flipped, record.player)
  state.currentPlayer = record.previousPlayer
  state.lastMove = record.previousLastMove
}

/**
 * Places a disc for `player` at `move`, mutating the state.
 *
 * @returns True if the move was legal and applied, false (no mutation) otherwise
 */
export function applyMove(state: GameState, move: Coordinate, player: Player): boolean {
  return playMove(state, move, player) !== null
}

// ============================================================================
// SCORING
// ============================================================================

export function getScore(board: Board): { black: number; white: number } {
  let black = 0
  let white = 0
  for (const row of board) {
    for (const cell of row) {
      if (cell === 'black') black++
      else if (cell === 'white') white++
    }
  }
  return { black, white }
}

export function countDiscs(board: Board): number {
  const { black, white } = getScore(board)
  return black + white
}

export function countEmpty(board: Board): number {
  return BOARD_SIZE * BOARD_SIZE - countDiscs(board)
}

export function isGameOver(state: GameState): boolean {
  return state.currentPlayer === null
}

/**
 * Result by disc count. Only meaningful once the game is over.
 */
export function getWinner(board: Board): Player | 'draw' {
  const { black, white } = getScore(board)
  if (black > white) return 'black'
  if (white > black) return 'white'
  return 'draw'
}

/**
 * Canonical 64-character encoding of a board, row by row.
 * '.' = empty, 'B' = black, 'W' = white
 */
export function boardKey(board: Board): string {
  return board.map((row) => row.map(cellToChar).join('')).join('')
}

export function cellToChar(cell: Cell): string {
  if (cell === 'black') return 'B'
  if (cell === 'white') return 'W'
  return '.'
}

export function charToCell(char: string): Cell {
  if (char === 'B') return 'black'
  if (char === 'W') return 'white'
  return null
}

/**
 * Builds a board from 8 row strings of '.', 'B' and 'W'.
 * Any other character reads as empty; callers that need strictness
 * validate first (see serialization).
 */
export function boardFromRows(rows: string[]): Board {
  const board = createEmptyBoard()
  for (let row = 0; row < BOARD_SIZE; row++) {
    const line = rows[row] ?? ''
    for (let col = 0; col < BOARD_SIZE; col++) {
      board[row][col] = charToCell(line.charAt(col))
    }
  }
  return board
}

export function boardToRows(board: Board): string[] {
  return board.map((row) => row.map(cellToChar).join(''))
}
