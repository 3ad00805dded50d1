/**
 * User Created Event
 *
 * Published to the users:created stream after a user is stored.
 */
export class UserCreatedEvent {
  userId: number
  email: string
  createdAt: Date

  constructor(userId: number, email: string, createdAt: Date) {
    this.userId = userId
    this.email = email
    this.createdAt = createdAt
  }
}
