/**
 * User as seen by the order service
 *
 * A read-only copy of what the user service returns; the order service
 * never stores it.
 */
export type UserRecord = {
  id: number
  firstName: string
  lastName: string
  email: string
}

export type UserLookupResult =
  | { kind: 'found'; user: UserRecord }
  | { kind: 'not_found' }
  | { kind: 'unavailable'; reason: string }

/**
 * User Lookup
 *
 * Answers whether a user exists, as far as the order service can tell.
 * `unavailable` means the answer could not be obtained at all and says
 * nothing about the user.
 */
export interface UserLookup {
  getUser(id: number): Promise<UserLookupResult>
}

export const USER_LOOKUP = Symbol('USER_LOOKUP')

export const isUserRecord = (value: unknown): value is UserRecord => {
  if (!value || typeof value !== 'object') {
    return false
  }

  const user = value as Record<string, unknown>

  return (
    typeof user.id === 'number' &&
    Number.isInteger(user.id) &&
    typeof user.firstName === 'string' &&
    typeof user.lastName === 'string' &&
    typeof user.email === 'string'
  )
}
