import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ComponentHealthDto,
  ComponentStatus,
  HealthCheckDto,
  HealthEndpointInfo,
} from '../common/dto/health-check.dto';
import { errorMessage } from '../common/utils/error-message';
import { withTimeout } from '../common/utils/with-timeout';
import { HEALTH_PROBES, HealthProbe } from './probes/health-probe.interface';

interface ProbeOutcome {
  name: string;
  status: ComponentStatus;
  error?: string;
}

/**
 * Folds the registered probes into one composite status.
 * A fresh result is built for every call; nothing is cached.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly probeTimeoutMs: number;

  constructor(
    @Inject(HEALTH_PROBES) private readonly probes: HealthProbe[],
    configService: ConfigService,
  ) {
    this.probeTimeoutMs = configService.get<number>('PROBE_TIMEOUT_MS', 2000);
  }

  async getHealth(): Promise<HealthCheckDto> {
    try {
      const outcomes = await Promise.all(this.probes.map((probe) => this.runProbe(probe)));
      return this.summarize(outcomes);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        `Health aggregation failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      return {
        status: 'error',
        timestamp: new Date().toISOString(),
        error: message,
      };
    }
  }

  /**
   * Reads one probe directly, without touching any other component.
   * Resolves `null` when no probe is registered under `route`.
   */
  async getComponentHealth(route: string): Promise<ComponentHealthDto | null> {
    const probe = this.probes.find((candidate) => candidate.route === route);
    if (!probe) {
      return null;
    }

    const outcome = await this.runProbe(probe);
    const health: ComponentHealthDto = {
      status: outcome.status,
      timestamp: new Date().toISOString(),
    };
    if (outcome.error !== undefined) {
      health.error = outcome.error;
    }
    return health;
  }

  listComponents(): HealthEndpointInfo[] {
    return this.probes.map((probe) => ({
      name: probe.name,
      route: probe.route,
      path: `/api/health/${probe.route}`,
    }));
  }

  private async runProbe(probe: HealthProbe): Promise<ProbeOutcome> {
    try {
      const passed = await withTimeout(
        Promise.resolve().then(() => probe.check()),
        this.probeTimeoutMs,
        `${probe.name} probe`,
      );
      return { name: probe.name, status: passed ? 'healthy' : 'unhealthy' };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Probe "${probe.name}" failed: ${message}`);
      return { name: probe.name, status: 'unhealthy', error: message };
    }
  }

  private summarize(outcomes: ProbeOutcome[]): HealthCheckDto {
    const services: Record<string, ComponentStatus> = {};

    for (const outcome of outcomes) {
      if (Object.hasOwn(services, outcome.name)) {
        throw new Error(`Duplicate health probe registered for "${outcome.name}"`);
      }
      services[outcome.name] = outcome.status;
    }

    const healthy = outcomes.every((outcome) => outcome.status === 'healthy');

    return {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services,
    };
  }
}
