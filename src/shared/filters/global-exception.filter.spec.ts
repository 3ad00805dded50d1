import {
  ArgumentsHost,
  BadRequestException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common'

import { GlobalExceptionFilter } from './global-exception.filter'

describe('GlobalExceptionFilter', () => {
  let filter: GlobalExceptionFilter
  let json: jest.Mock
  let status: jest.Mock
  let host: ArgumentsHost

  beforeEach(() => {
    filter = new GlobalExceptionFilter()
    json = jest.fn()
    status = jest.fn(() => ({ json }))

    const request = {
      method: 'POST',
      url: '/api/orders',
      headers: { 'x-request-id': 'req-1' },
    }
    const response = { status }

    host = {
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => response,
      }),
    } as unknown as ArgumentsHost
  })

  it('should keep status and message of HTTP exceptions', () => {
    filter.catch(new NotFoundException('Order with ID 42 not found'), host)

    expect(status).toHaveBeenCalledWith(404)
    expect(json).toHaveBeenCalledWith({
      statusCode: 404,
      message: 'Order with ID 42 not found',
      error: 'Not Found',
      path: '/api/orders',
      timestamp: expect.any(String),
      requestId: 'req-1',
    })
  })

  it('should pass field errors through from validation failures', () => {
    const errors = [{ field: 'email', constraints: ['email must be an email'] }]
    filter.catch(
      new BadRequestException({
        statusCode: 400,
        message: 'Validation failed',
        error: 'Bad Request',
        errors,
      }),
      host
    )

    expect(status).toHaveBeenCalledWith(400)
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        message: 'Validation failed',
        error: 'Bad Request',
        errors,
      })
    )
  })

  it('should report upstream failures as 503', () => {
    filter.catch(new ServiceUnavailableException('User service unavailable'), host)

    expect(status).toHaveBeenCalledWith(503)
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 503, message: 'User service unavailable' })
    )
  })

  it('should hide details of unknown errors behind a 500', () => {
    filter.catch(new Error('SQLITE_BUSY: database is locked'), host)

    expect(status).toHaveBeenCalledWith(500)
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 500,
        message: 'Internal server error',
        error: 'Internal Server Error',
      })
    )
  })
})
