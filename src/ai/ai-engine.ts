/**
 * AI Engine Abstraction Layer
 *
 * Provides a pluggable interface for the bot engines. Engines differ in how
 * they pick a move (capture count, mobility lookahead, fixed-depth minimax,
 * alpha-beta search) but share one synchronous contract.
 */

import { z } from 'zod'
import type { Board, Coordinate, GameState, Player } from '../game/othello'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Configuration passed to engines for move selection.
 */
export interface EngineConfig {
  /** Search depth for tree-search algorithms */
  searchDepth: number
  /**
   * Soft time budget in milliseconds. Iterative deepening only stops between
   * completed depths, so the first depth always finishes.
   */
  timeBudget?: number
}

export const engineConfigSchema = z.object({
  searchDepth: z.number().int().min(1).max(60),
  timeBudget: z.number().int().min(0).optional(),
})

/**
 * One completed iterative-deepening pass.
 */
export interface SearchIteration {
  depth: number
  move: Coordinate
  score: number
  nodesSearched: number
}

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Maximum depth completed during search */
  depth?: number
  /** Number of positions visited */
  nodesSearched?: number
  /** Time spent on move selection (ms) */
  timeUsed?: number
  /** Per-depth results, shallowest first */
  iterations?: SearchIteration[]
  /** Transposition table hit rate (0-1) */
  ttHitRate?: number
  /** Whether the move came straight from the opening book */
  fromBook?: boolean
}

/**
 * Result returned from move selection.
 */
export interface MoveResult {
  move: Coordinate
  /** Engine's score for the move, from the mover's perspective */
  score?: number
  searchInfo?: SearchInfo
}

/**
 * Pluggable AI engine interface.
 *
 * Engines are stateless: everything a search needs lives for one call.
 * They never mutate the state they are given.
 */
export interface AIEngine {
  /** Unique engine identifier */
  readonly name: EngineType

  /** Human-readable description */
  readonly description: string

  /**
   * Select a move for `player` in the given position.
   *
   * @returns The selected move, or null if `player` has no legal move
   */
  selectMove(state: GameState, player: Player, config: EngineConfig): MoveResult | null

  /**
   * Static evaluation from the perspective of the given player.
   * Optional - not all engines have one.
   */
  evaluatePosition?(board: Board, player: Player): number
}

// ============================================================================
// ENGINE REGISTRY
// ============================================================================

/**
 * Registry for AI engines, looked up by name.
 */
export class EngineRegistry {
  private engines: Map<string, AIEngine> = new Map()

  /**
   * Register an engine, replacing any engine with the same name.
   */
  register(engine: AIEngine): void {
    this.engines.set(engine.name, engine)
  }

  unregister(name: string): void {
    this.engines.delete(name)
  }

  /**
   * Get an engine by name.
   *
   * @returns Engine instance or null if not found
   */
  get(name: string): AIEngine | null {
    return this.engines.get(name) ?? null
  }

  /**
   * Get an engine by name.
   *
   * @throws Error if the engine is not registered
   */
  require(name: string): AIEngine {
    const engine = this.engines.get(name)
    if (!engine) {
      throw new Error(`Engine "${name}" not registered`)
    }
    return engine
  }

  has(name: string): boolean {
    return this.engines.has(name)
  }

  list(): Array<{ name: string; description: string }> {
    return Array.from(this.engines.values()).map((engine) => ({
      name: engine.name,
      description: engine.description,
    }))
  }
}

// Global engine registry instance
export const engineRegistry = new EngineRegistry()

// ============================================================================
// ENGINE TYPE DEFINITIONS
// ============================================================================

/**
 * Supported engine types.
 * Used in bot persona configuration to specify which engine to use.
 */
export type EngineType =
  | 'greedy' // Most discs flipped right now
  | 'lookahead' // Leave the opponent the fewest replies
  | 'minimax' // Fixed-depth minimax over a positional weight table
  | 'deep-search' // Alpha-beta with iterative deepening, caching and endgame solving

/**
 * Default engine configurations by type.
 */
export const DEFAULT_ENGINE_CONFIGS: Record<EngineType, EngineConfig> = {
  greedy: { searchDepth: 1 },
  lookahead: { searchDepth: 1 },
  minimax: { searchDepth: 3 },
  'deep-search': { searchDepth: 6 },
}
