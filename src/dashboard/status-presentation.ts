import { HealthStatus, parseHealthStatus } from '../common/health/health-status';

export type StatusTone = 'success' | 'danger' | 'warning' | 'neutral';

export interface StatusPresentation {
  readonly status: HealthStatus;
  readonly tone: StatusTone;
  readonly icon: string;
  readonly label: string;
}

const PRESENTATIONS: Record<HealthStatus, StatusPresentation> = {
  healthy: { status: 'healthy', tone: 'success', icon: '✓', label: 'healthy' },
  unhealthy: { status: 'unhealthy', tone: 'danger', icon: '✗', label: 'unhealthy' },
  error: { status: 'error', tone: 'warning', icon: '⚠', label: 'error' },
  unknown: { status: 'unknown', tone: 'neutral', icon: '⏺', label: 'unknown' },
};

/**
 * Total over its input: any value outside the recognised statuses,
 * including `undefined`, gets the neutral presentation.
 */
export function presentStatus(value: unknown): StatusPresentation {
  return PRESENTATIONS[parseHealthStatus(value)];
}
