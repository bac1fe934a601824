/**
 * AI Engines Index
 *
 * Registers all available AI engines with the global registry.
 * Import this module to ensure engines are registered before use.
 */

import { engineRegistry } from '../ai-engine'
import { greedyEngine } from './greedy-engine'
import { lookaheadEngine } from './lookahead-engine'
import { minimaxEngine } from './minimax-engine'
import { deepSearchEngine } from './deep-search-engine'

// Register all available engines
engineRegistry.register(greedyEngine)
engineRegistry.register(lookaheadEngine)
engineRegistry.register(minimaxEngine)
engineRegistry.register(deepSearchEngine)

// Re-export engines for direct access if needed
export { greedyEngine, lookaheadEngine, minimaxEngine, deepSearchEngine }

// Re-export registry utilities
export { engineRegistry }
