/**
 * Game state serialization
 *
 * JSON layout for saving and resuming a game. Parsing is strict: anything
 * that is not an 8x8 board of known cells with a consistent side to move is
 * rejected before a live state is touched.
 */

import { z } from 'zod'
import {
  BOARD_SIZE,
  boardFromRows,
  boardToRows,
  hasValidMove,
  type Coordinate,
  type GameState,
  type Player,
} from './othello'
import { formatZodError, type ParseResult } from '../lib/schemas'

// ============================================================================
// SCHEMAS
// ============================================================================

const boardRowSchema = z
  .string()
  .regex(/^[.BW]{8}$/, 'Board rows must be 8 characters of ".", "B" or "W"')

export const boardRowsSchema = z.array(boardRowSchema).length(BOARD_SIZE, 'Board must have 8 rows')

export const playerSchema = z.enum(['black', 'white'])

const coordinateIndexSchema = z.number().int().min(0).max(BOARD_SIZE - 1)

export const coordinateSchema = z.tuple([coordinateIndexSchema, coordinateIndexSchema])

const gameStateShapeSchema = z.object({
  board: boardRowsSchema,
  currentPlayer: playerSchema.nullable(),
  lastMove: coordinateSchema.nullable(),
})

type GameStateShape = z.infer<typeof gameStateShapeSchema>

function checkConsistency(data: GameStateShape, ctx: z.RefinementCtx): void {
  const board = boardFromRows(data.board)

  if (data.lastMove !== null) {
    const [row, col] = data.lastMove
    if (board[row][col] === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lastMove'],
        message: 'Last move must point at an occupied cell',
      })
    }
  }

  const blackCanMove = hasValidMove(board, 'black')
  const whiteCanMove = hasValidMove(board, 'white')

  if (data.currentPlayer === null) {
    if (blackCanMove || whiteCanMove) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['currentPlayer'],
        message: 'Game cannot be over while a side still has a legal move',
      })
    }
    return
  }

  const canMove = data.currentPlayer === 'black' ? blackCanMove : whiteCanMove
  if (!canMove) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['currentPlayer'],
      message: `${data.currentPlayer} is to move but has no legal move`,
    })
  }
}

const consistentGameStateSchema = gameStateShapeSchema.superRefine(checkConsistency)

// The pipe stops on any shape issue, so the consistency checks only see
// in-range coordinates and full 8x8 boards.
export const serializedGameStateSchema = gameStateShapeSchema.pipe(consistentGameStateSchema)

export type SerializedGameState = z.infer<typeof serializedGameStateSchema>

// Older saves store cells as 1 (black), -1 (white) or 0 (empty), and the
// side to move as 1, -1 or 0 when the game is over.
const numericCodeSchema = z.union([z.literal(1), z.literal(-1), z.literal(0)])

type NumericCode = z.infer<typeof numericCodeSchema>

function cellFromCode(code: NumericCode): string {
  if (code === 1) return 'B'
  if (code === -1) return 'W'
  return '.'
}

function playerFromCode(code: NumericCode): Player | null {
  if (code === 1) return 'black'
  if (code === -1) return 'white'
  return null
}

const numericGameStateSchema = z
  .object({
    board: z
      .array(z.array(numericCodeSchema).length(BOARD_SIZE, 'Board rows must have 8 cells'))
      .length(BOARD_SIZE, 'Board must have 8 rows'),
    current: numericCodeSchema,
    last: coordinateSchema.nullable().optional(),
  })
  .transform(
    (data): GameStateShape => ({
      board: data.board.map((row) => row.map(cellFromCode).join('')),
      currentPlayer: playerFromCode(data.current),
      lastMove: data.last ?? null,
    })
  )

const numericSavedStateSchema = numericGameStateSchema.pipe(consistentGameStateSchema)

function isNumericLayout(data: unknown): boolean {
  return typeof data === 'object' && data !== null && 'current' in data
}

/**
 * Saved game files hold either one state or the full history,
 * in which case the last entry is the current position.
 */
const savedHistorySchema = z.object({
  history: z.array(z.unknown()).min(1, 'History must contain at least one state'),
})

// ============================================================================
// SERIALIZE / PARSE
// ============================================================================

export function serializeGameState(state: GameState): SerializedGameState {
  return {
    board: boardToRows(state.board),
    currentPlayer: state.currentPlayer,
    lastMove: state.lastMove ? [state.lastMove.row, state.lastMove.col] : null,
  }
}

/**
 * Parses an unknown value (usually from JSON.parse) into a fresh GameState.
 * Accepts the row-string layout and the older numeric one.
 */
export function parseGameState(data: unknown): ParseResult<GameState> {
  const schema = isNumericLayout(data) ? numericSavedStateSchema : serializedGameStateSchema
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    return { success: false, error: formatZodError(parsed.error) }
  }

  const lastMove: Coordinate | null = parsed.data.lastMove
    ? { row: parsed.data.lastMove[0], col: parsed.data.lastMove[1] }
    : null

  return {
    success: true,
    data: {
      board: boardFromRows(parsed.data.board),
      currentPlayer: parsed.data.currentPlayer,
      lastMove,
    },
  }
}

/**
 * Parses a saved game file: a single state or `{ history: [...] }`.
 */
export function parseSavedGame(data: unknown): ParseResult<GameState> {
  if (typeof data === 'object' && data !== null && 'history' in data) {
    const wrapper = savedHistorySchema.safeParse(data)
    if (!wrapper.success) {
      return { success: false, error: formatZodError(wrapper.error) }
    }
    const history = wrapper.data.history
    return parseGameState(history[history.length - 1])
  }
  return parseGameState(data)
}

/**
 * Replaces the contents of `target` with a parsed state.
 * On failure `target` is left exactly as it was.
 */
export function restoreGameState(target: GameState, data: unknown): ParseResult<GameState> {
  const result = parseGameState(data)
  if (!result.success) {
    return result
  }

  target.board = result.data.board
  target.currentPlayer = result.data.currentPlayer
  target.lastMove = result.data.lastMove
  return { success: true, data: target }
}
