import { HealthStatus, parseHealthStatus } from '../common/health/health-status';

export const CONNECTION_ERROR_MESSAGE = 'Failed to connect to API';

/**
 * Immutable result of one evaluation as seen by the dashboard
 */
export interface HealthState {
  readonly overall: HealthStatus;
  readonly timestamp: string;
  readonly components?: Readonly<Record<string, HealthStatus>>;
  readonly error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a composite health body. Returns `null` when the body is not an
 * object at all; individual fields degrade to `unknown` instead.
 */
export function parseHealthResponse(body: unknown, now: Date = new Date()): HealthState | null {
  if (!isRecord(body)) {
    return null;
  }

  const overall = parseHealthStatus(body.status);
  const state: {
    overall: HealthStatus;
    timestamp: string;
    components?: Record<string, HealthStatus>;
    error?: string;
  } = {
    overall,
    timestamp: typeof body.timestamp === 'string' ? body.timestamp : now.toISOString(),
  };

  if (isRecord(body.services)) {
    // fromEntries defines own properties, so a `__proto__` key stays a component
    const components: Record<string, HealthStatus> = Object.fromEntries(
      Object.entries(body.services).map(([name, status]) => [name, parseHealthStatus(status)]),
    );
    state.components = Object.freeze(components);
  }

  if (overall === 'error') {
    state.error = typeof body.error === 'string' && body.error.length > 0 ? body.error : 'Unknown error';
  }

  return Object.freeze(state);
}

export function connectionErrorState(now: Date = new Date()): HealthState {
  return Object.freeze({
    overall: 'error',
    timestamp: now.toISOString(),
    error: CONNECTION_ERROR_MESSAGE,
  });
}
