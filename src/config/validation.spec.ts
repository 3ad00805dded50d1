import { environmentConfig } from './environment'
import { validate } from './validation'

describe('validate', () => {
  it('should accept an empty environment', () => {
    expect(() => validate({})).not.toThrow()
  })

  it('should convert numeric variables', () => {
    const config = validate({ PORT: '8082', USER_SERVICE_TIMEOUT_MS: '1500' })

    expect(config.PORT).toBe(8082)
    expect(config.USER_SERVICE_TIMEOUT_MS).toBe(1500)
  })

  it('should reject a user service URL without protocol', () => {
    expect(() => validate({ USER_SERVICE_URL: 'user-service:8081' })).toThrow(
      /USER_SERVICE_URL/
    )
  })

  it('should reject a non-positive timeout', () => {
    expect(() => validate({ USER_SERVICE_TIMEOUT_MS: '0' })).toThrow(/USER_SERVICE_TIMEOUT_MS/)
  })

  it('should reject an unknown NODE_ENV', () => {
    expect(() => validate({ NODE_ENV: 'qa' })).toThrow(/NODE_ENV/)
  })
})

describe('environmentConfig', () => {
  const saved = { ...process.env }

  afterEach(() => {
    process.env = { ...saved }
  })

  it('should fall back to the service defaults', () => {
    delete process.env.SERVICE_NAME
    delete process.env.PORT
    delete process.env.USER_SERVICE_URL
    delete process.env.USER_SERVICE_TIMEOUT_MS
    delete process.env.ENABLE_MESSAGING

    const config = environmentConfig({ name: 'order-service', port: 8082 })()

    expect(config.service.name).toBe('order-service')
    expect(config.app.port).toBe(8082)
    expect(config.services.userService).toEqual({
      url: 'http://localhost:8081/api',
      timeoutMs: 3000,
    })
    expect(config.features.enableMessaging).toBe(false)
  })

  it('should read overrides from the environment', () => {
    process.env.PORT = '9000'
    process.env.USER_SERVICE_URL = 'http://users.internal/api'
    process.env.DATABASE_PATH = '/var/lib/orders.sqlite'

    const config = environmentConfig({ name: 'order-service', port: 8082 })()

    expect(config.app.port).toBe(9000)
    expect(config.services.userService.url).toBe('http://users.internal/api')
    expect(config.database.path).toBe('/var/lib/orders.sqlite')
  })
})
