import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator'

/**
 * Create User DTO
 *
 * All three fields are required.
 */
export class CreateUserDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  firstName!: string

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  lastName!: string

  @IsEmail()
  @MaxLength(255)
  email!: string
}
