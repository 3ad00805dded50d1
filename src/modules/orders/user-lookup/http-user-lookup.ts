import { HttpService } from '@nestjs/axios'
import { HttpStatus, Injectable, Logger } from '@nestjs/common'
import { isAxiosError } from 'axios'
import { firstValueFrom } from 'rxjs'

import { isUserRecord, UserLookup, UserLookupResult } from './user-lookup'

const describeFailure = (error: unknown): string => {
  if (!isAxiosError(error)) {
    return error instanceof Error ? error.message : String(error)
  }

  if (error.response) {
    return `User service responded with ${error.response.status}`
  }

  return `User service unreachable: ${error.code ?? error.message}`
}

/**
 * HTTP User Lookup
 *
 * Calls GET /users/:id on the user service. Base URL and timeout are set on
 * the HttpModule when OrdersModule is built. Only a 404 means the user does
 * not exist; every other failure is reported as unavailable. No retries.
 */
@Injectable()
export class HttpUserLookup implements UserLookup {
  private readonly logger = new Logger(HttpUserLookup.name)

  constructor(private readonly httpService: HttpService) {}

  async getUser(id: number): Promise<UserLookupResult> {
    try {
      const response = await firstValueFrom(this.httpService.get<unknown>(`/users/${id}`))

      if (!isUserRecord(response.data) || response.data.id !== id) {
        this.logger.warn(`User service returned a malformed payload for user ${id}`)
        return { kind: 'unavailable', reason: 'Malformed response from user service' }
      }

      return { kind: 'found', user: response.data }
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === HttpStatus.NOT_FOUND) {
        return { kind: 'not_found' }
      }

      const reason = describeFailure(error)

      this.logger.warn(`Lookup of user ${id} failed: ${reason}`)
      return { kind: 'unavailable', reason }
    }
  }
}
