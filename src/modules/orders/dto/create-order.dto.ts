import { Type } from 'class-transformer'
import {
  IsDate,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator'

/**
 * Create Order DTO
 *
 * Defines the shape and validation rules for creating a new order.
 * Whether userId refers to an existing user is checked against the
 * user service, not here.
 */
export class CreateOrderDto {
  @IsInt()
  @IsPositive()
  @Max(Number.MAX_SAFE_INTEGER)
  userId!: number

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  productName!: string

  @IsInt()
  @IsPositive()
  quantity!: number

  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @Min(0)
  totalPrice!: number

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  orderDate?: Date
}
