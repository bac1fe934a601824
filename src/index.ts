/**
 * Public API
 */

export * from './game/othello'
export {
  serializeGameState,
  parseGameState,
  parseSavedGame,
  restoreGameState,
  serializedGameStateSchema,
  type SerializedGameState,
} from './game/serialization'
export { formatZodError, type ParseResult } from './lib/schemas'
export {
  EngineRegistry,
  engineRegistry,
  engineConfigSchema,
  DEFAULT_ENGINE_CONFIGS,
  type AIEngine,
  type EngineConfig,
  type EngineType,
  type MoveResult,
  type SearchInfo,
  type SearchIteration,
} from './ai/ai-engine'
export { greedyEngine, lookaheadEngine, minimaxEngine, deepSearchEngine } from './ai/engines'
export { evaluatePosition, getPhaseWeights, orderMoves, type PhaseWeights } from './ai/engines/engine-utils'
export {
  BOT_NAMES,
  BOT_PERSONAS,
  strategyFor,
  hasBot,
  listBots,
  getBotPersona,
  type BotPersona,
  type Strategy,
} from './ai/bots'
export { playMatch, type MatchMove, type MatchOptions, type MatchResult } from './ai/match'
