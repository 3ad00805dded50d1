import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm'

/**
 * User record owned by the user service
 *
 * Immutable once created. Email uniqueness is enforced by the
 * storage layer through the unique column.
 */
@Entity({ name: 'users' })
export class User {
  @PrimaryGeneratedColumn()
  id!: number

  @Column({ name: 'first_name', type: 'varchar', length: 100 })
  firstName!: string

  @Column({ name: 'last_name', type: 'varchar', length: 100 })
  lastName!: string

  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string
}
