import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common'

export type FieldError = {
  field: string
  constraints: string[]
}

/**
 * Flatten nested class-validator errors into dotted field paths
 */
export const flattenValidationErrors = (
  errors: ValidationError[],
  parentPath = ''
): FieldError[] =>
  errors.flatMap((error) => {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property
    const own: FieldError[] = error.constraints
      ? [{ field, constraints: Object.values(error.constraints) }]
      : []
    return [...own, ...flattenValidationErrors(error.children ?? [], field)]
  })

/**
 * Global Validation Pipe
 *
 * Validates every request DTO with class-validator:
 * - unknown properties are rejected
 * - payloads are transformed into DTO instances
 * - failures become 400 { message: 'Validation failed', error: 'Bad Request', errors: [...] }
 */
export class GlobalValidationPipe extends ValidationPipe {
  constructor() {
    super({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: (errors: ValidationError[]) =>
        new BadRequestException({
          statusCode: 400,
          message: 'Validation failed',
          error: 'Bad Request',
          errors: flattenValidationErrors(errors),
        }),
    })
  }
}
