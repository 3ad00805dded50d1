import { Controller, Get } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

export type ServiceInfo = {
  service: string | undefined
  version: string | undefined
  environment: string | undefined
  timestamp: string
}

/**
 * App Controller
 *
 * Root controller for basic service information.
 */
@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService) {}

  /**
   * Service information endpoint
   *
   * Useful for verifying which service answers on a port.
   */
  @Get()
  getInfo(): ServiceInfo {
    return {
      service: this.configService.get<string>('config.service.name'),
      version: this.configService.get<string>('config.service.version'),
      environment: this.configService.get<string>('config.app.env'),
      timestamp: new Date().toISOString(),
    }
  }
}
