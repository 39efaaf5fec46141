import { Injectable } from '@nestjs/common';
import { HealthService } from './health/health.service';

export interface ApiInfo {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}

@Injectable()
export class AppService {
  constructor(private readonly healthService: HealthService) {}

  getApiInfo(): ApiInfo {
    const endpoints: Record<string, string> = { health: '/api/health' };
    for (const component of this.healthService.listComponents()) {
      endpoints[`health:${component.name}`] = component.path;
    }

    return {
      message: 'Stack Health API',
      version: this.getVersion(),
      endpoints,
    };
  }

  private getVersion(): string {
    return process.env.npm_package_version || '0.1.0';
  }
}
