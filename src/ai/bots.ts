/**
 * Bot registry
 *
 * Named bot personas, each bound to one engine and one engine
 * configuration, exposed through a single Strategy contract.
 */

import { engineConfigSchema, type EngineConfig, type EngineType, type MoveResult } from './ai-engine'
import { engineRegistry } from './engines'
import type { Coordinate, GameState, Player } from '../game/othello'

// ============================================================================
// PERSONAS
// ============================================================================

export interface BotPersona {
  name: string
  description: string
  engine: EngineType
  config: EngineConfig
}

export const BOT_PERSONAS: readonly BotPersona[] = [
  {
    name: 'David',
    description: 'Flips as many discs as he can',
    engine: 'greedy',
    config: { searchDepth: 1 },
  },
  {
    name: 'Roger',
    description: 'Leaves you as few moves as possible',
    engine: 'lookahead',
    config: { searchDepth: 1 },
  },
  {
    name: 'Minnie',
    description: 'Looks three moves ahead and loves corners',
    engine: 'minimax',
    config: { searchDepth: 3 },
  },
  {
    name: 'Sasha senior',
    description: 'Deep search with an endgame solver',
    engine: 'deep-search',
    config: { searchDepth: 6 },
  },
  {
    name: 'Sasha junior',
    description: 'Deep search, one ply shallower',
    engine: 'deep-search',
    config: { searchDepth: 5 },
  },
  {
    name: 'Sasha intern',
    description: 'Deep search, still learning',
    engine: 'deep-search',
    config: { searchDepth: 4 },
  },
]

export const BOT_NAMES: readonly string[] = BOT_PERSONAS.map((persona) => persona.name)

// ============================================================================
// STRATEGY
// ============================================================================

/**
 * Uniform bot contract: given a position and a side, produce a move or null.
 */
export interface Strategy {
  readonly name: string
  readonly description: string
  /** The move to play, or null when `player` has no legal move */
  selectMove(state: GameState, player: Player): Coordinate | null
  /** Same decision with the engine's score and search statistics */
  analyze(state: GameState, player: Player): MoveResult | null
}

class BotStrategy implements Strategy {
  readonly name: string
  readonly description: string
  private readonly engine: EngineType
  private readonly config: EngineConfig

  constructor(persona: BotPersona, config: EngineConfig) {
    this.name = persona.name
    this.description = persona.description
    this.engine = persona.engine
    this.config = config
  }

  analyze(state: GameState, player: Player): MoveResult | null {
    return engineRegistry.require(this.engine).selectMove(state, player, this.config)
  }

  selectMove(state: GameState, player: Player): Coordinate | null {
    return this.analyze(state, player)?.move ?? null
  }
}

// ============================================================================
// LOOKUP
// ============================================================================

export function getBotPersona(name: string): BotPersona | null {
  return BOT_PERSONAS.find((persona) => persona.name === name) ?? null
}

export function hasBot(name: string): boolean {
  return getBotPersona(name) !== null
}

export function listBots(): Array<{ name: string; description: string; engine: EngineType }> {
  return BOT_PERSONAS.map(({ name, description, engine }) => ({ name, description, engine }))
}

/**
 * Creates the strategy for a named bot.
 *
 * @param name - Bot name, e.g. 'Sasha senior'
 * @param overrides - Engine configuration merged over the persona's own
 * @throws Error if the name is unknown or the merged configuration is invalid
 */
export function strategyFor(name: string, overrides?: Partial<EngineConfig>): Strategy {
  const persona = getBotPersona(name)
  if (!persona) {
    throw new Error(`Bot not found: ${name}`)
  }
  const config = engineConfigSchema.parse({ ...persona.config, ...overrides })
  return new BotStrategy(persona, config)
}
