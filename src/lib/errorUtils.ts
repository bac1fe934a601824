/**
 * Error handling utilities
 *
 * Consistent error message extraction for the command-line scripts.
 */

import { ZodError } from 'zod'
import { formatZodError } from './schemas'

/**
 * Extract a readable error message from an unknown error value.
 * Zod errors are reduced to their first issue.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted
 *
 * @example
 * try {
 *   run()
 * } catch (err) {
 *   console.error(`[RunBot] ${getErrorMessage(err)}`)
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof ZodError) {
    return formatZodError(err)
  }

  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  return fallback
}
