export const HEALTH_STATUSES = ['healthy', 'unhealthy', 'error', 'unknown'] as const;

export type HealthStatus = (typeof HEALTH_STATUSES)[number];

function isHealthStatus(value: string): value is HealthStatus {
  return (HEALTH_STATUSES as readonly string[]).includes(value);
}

/**
 * Maps any received status value onto the closed set.
 * Matching ignores case and surrounding whitespace; anything else is `unknown`.
 */
export function parseHealthStatus(value: unknown): HealthStatus {
  if (typeof value !== 'string') {
    return 'unknown';
  }
  const normalized = value.trim().toLowerCase();
  return isHealthStatus(normalized) ? normalized : 'unknown';
}
