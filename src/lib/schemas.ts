/**
 * Shared validation helpers
 */

import { z } from 'zod'

/**
 * Outcome of validating untrusted input.
 */
export type ParseResult<T> = { success: true; data: T } | { success: false; error: string }

/**
 * Formats the first zod issue as a single line, prefixed with its path.
 */
export function formatZodError(error: z.ZodError): string {
  const issue = error.errors[0]
  if (!issue) return 'Validation error'
  const path = issue.path.join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}
