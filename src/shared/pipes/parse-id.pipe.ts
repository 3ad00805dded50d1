import { ArgumentMetadata, BadRequestException, Injectable, ParseIntPipe } from '@nestjs/common'

/**
 * Parses a numeric route id
 *
 * Same as ParseIntPipe, but also rejects values beyond Number.MAX_SAFE_INTEGER,
 * which would otherwise lose precision or print in exponent form.
 */
@Injectable()
export class ParseIdPipe extends ParseIntPipe {
  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const id = await super.transform(value, metadata)

    if (!Number.isSafeInteger(id)) {
      throw new BadRequestException(
        `Validation failed (${metadata.data ?? 'id'} must not be greater than ${Number.MAX_SAFE_INTEGER})`
      )
    }

    return id
  }
}
