import {
  Controller,
  Get,
  HttpStatus,
  NotFoundException,
  Param,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { HealthService } from './health.service';
import {
  ComponentHealthDto,
  HealthCheckDto,
} from '../common/dto/health-check.dto';

export function httpStatusFor(status: string): HttpStatus {
  return status === 'healthy' ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE;
}

@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * `/health` stays unprefixed for platform liveness and readiness probes
   */
  @Get(['health', 'api/health'])
  async getHealth(
    @Res({ passthrough: true }) res: Response,
  ): Promise<HealthCheckDto> {
    const health = await this.healthService.getHealth();
    res.status(httpStatusFor(health.status));
    return health;
  }

  @Get('api/health/:component')
  async getComponentHealth(
    @Param('component') component: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<ComponentHealthDto> {
    const health = await this.healthService.getComponentHealth(component);
    if (!health) {
      throw new NotFoundException(`Unknown health component: ${component}`);
    }
    res.status(httpStatusFor(health.status));
    return health;
  }
}
