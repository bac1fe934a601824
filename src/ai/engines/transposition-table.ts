/**
 * Transposition Table
 *
 * Memoizes search values by (board, side to move, remaining depth).
 * One table belongs to one top-level search call and is dropped with it.
 */

import { type Board, type Player, boardKey } from '../../game/othello'

/**
 * Entry types for transposition table bounds.
 */
export enum TTEntryType {
  EXACT = 0, // Exact score
  LOWER = 1, // Score is a lower bound (beta cutoff)
  UPPER = 2, // Score is an upper bound (alpha cutoff)
}

export interface TTEntry {
  score: number
  type: TTEntryType
}

export interface TTStats {
  size: number
  hits: number
  misses: number
  hitRate: number
}

/**
 * Classifies a search result against the window it was searched with.
 */
export function boundType(score: number, alpha: number, beta: number): TTEntryType {
  if (score <= alpha) return TTEntryType.UPPER
  if (score >= beta) return TTEntryType.LOWER
  return TTEntryType.EXACT
}

/**
 * Uses string-based hashing for reliability (not Zobrist hashing).
 */
export class TranspositionTable {
  private table: Map<string, TTEntry> = new Map()
  private maxSize: number
  private hits = 0
  private misses = 0

  constructor(maxSize = 1000000) {
    this.maxSize = maxSize
  }

  private hashNode(board: Board, turn: Player, depth: number): string {
    return `${boardKey(board)}|${turn === 'black' ? 'B' : 'W'}|${depth}`
  }

  /**
   * Store a search value for a node.
   */
  store(board: Board, turn: Player, depth: number, score: number, type: TTEntryType): void {
    if (this.table.size >= this.maxSize) {
      // Simple eviction: keep the older half
      const entries = Array.from(this.table.entries())
      this.table.clear()
      for (let i = 0; i < entries.length / 2; i++) {
        this.table.set(entries[i][0], entries[i][1])
      }
    }

    this.table.set(this.hashNode(board, turn, depth), { score, type })
  }

  /**
   * Returns a stored value if it settles the node for the given window.
   * Bound entries only count when they fall outside the window.
   */
  lookup(board: Board, turn: Player, depth: number, alpha: number, beta: number): number | null {
    const entry = this.table.get(this.hashNode(board, turn, depth))

    if (!entry) {
      this.misses++
      return null
    }

    switch (entry.type) {
      case TTEntryType.EXACT:
        this.hits++
        return entry.score
      case TTEntryType.LOWER:
        if (entry.score >= beta) {
          this.hits++
          return entry.score
        }
        break
      case TTEntryType.UPPER:
        if (entry.score <= alpha) {
          this.hits++
          return entry.score
        }
        break
    }

    this.misses++
    return null
  }

  getStats(): TTStats {
    const total = this.hits + this.misses
    return {
      size: this.table.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    }
  }
}
