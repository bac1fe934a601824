import { describe, it, expect } from 'vitest'
import { playMatch, type MatchMove } from './match'
import type { Strategy } from './bots'
import { createGameState, hasValidMove, isValidMove, boardFromRows, type GameState } from '../game/othello'

describe('playMatch', () => {
  it('plays David against Roger to the end', () => {
    const result = playMatch('David', 'Roger')
    expect(result.players).toEqual({ black: 'David', white: 'Roger' })
    expect(result.moves.length).toBe(60)
    expect(result.score).toEqual({ black: 14, white: 50 })
    expect(result.winner).toBe('white')
    expect(result.moves.slice(0, 4)).toEqual([
      { ply: 1, player: 'white', move: { row: 2, col: 4 } },
      { ply: 2, player: 'black', move: { row: 2, col: 3 } },
      { ply: 3, player: 'white', move: { row: 2, col: 2 } },
      { ply: 4, player: 'black', move: { row: 1, col: 3 } },
    ])
  })

  it('plays Minnie against David to the end', () => {
    const result = playMatch('Minnie', 'David')
    expect(result.score).toEqual({ black: 41, white: 23 })
    expect(result.winner).toBe('black')
    expect(result.moves[1]).toEqual({ ply: 2, player: 'black', move: { row: 4, col: 5 } })
  })

  it('ends only at a terminal state with every move legal', () => {
    const seen: MatchMove[] = []
    let previous: GameState = createGameState()
    const result = playMatch('Roger', 'David', {
      onMove: (move, state) => {
        expect(move.move).not.toBeNull()
        if (move.move) expect(isValidMove(previous.board, move.move, move.player)).toBe(true)
        seen.push(move)
        previous = { ...state, board: state.board.map((row) => [...row]) }
      },
    })

    expect(seen).toEqual(result.moves)
    expect(result.state.currentPlayer).toBeNull()
    expect(hasValidMove(result.state.board, 'black')).toBe(false)
    expect(hasValidMove(result.state.board, 'white')).toBe(false)
    expect(result.score).toEqual({ black: 11, white: 53 })
  })

  it('does not mutate a supplied starting state', () => {
    const start = createGameState('black')
    const result = playMatch('David', 'David', { state: start })
    expect(start).toEqual(createGameState('black'))
    expect(result.moves[0].player).toBe('black')
  })

  it('passes for a side that cannot move', () => {
    // White is named to move but has no capture; black can still play.
    const state: GameState = {
      board: boardFromRows([
        'BW......',
        '........',
        '........',
        '........',
        '........',
        '........',
        '......WW',
        '.......B',
      ]),
      currentPlayer: 'white',
      lastMove: null,
    }
    const result = playMatch('David', 'David', { state })
    expect(result.moves[0]).toEqual({ ply: 1, player: 'white', move: null })
    expect(result.moves[1].player).toBe('black')
    expect(result.state.currentPlayer).toBeNull()
  })

  it('throws when a bot plays an illegal move', () => {
    const cheater: Strategy = {
      name: 'Cheater',
      description: 'Always plays the top-left corner',
      selectMove: () => ({ row: 0, col: 0 }),
      analyze: () => null,
    }
    expect(() => playMatch('David', cheater)).toThrow(
      'Cheater played an illegal move for white at (0,0)'
    )
  })

  it('throws when a bot declines a legal move', () => {
    const idle: Strategy = {
      name: 'Idle',
      description: 'Never moves',
      selectMove: () => null,
      analyze: () => null,
    }
    expect(() => playMatch('David', idle)).toThrow(
      'Idle returned no move for white with legal moves available'
    )
  })

  it('rejects unknown bot names', () => {
    expect(() => playMatch('Nobody', 'David')).toThrow('Bot not found: Nobody')
  })
})
