import { QueryFailedError } from 'typeorm'

/**
 * Whether a failed write was rejected by a UNIQUE constraint
 *
 * sql.js raises plain errors without a code, so the sqlite message is
 * the only signal.
 */
export const isUniqueViolation = (error: unknown): boolean =>
  error instanceof QueryFailedError && error.message.includes('UNIQUE constraint failed')
