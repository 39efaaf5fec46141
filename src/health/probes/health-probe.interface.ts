export const HEALTH_PROBES = Symbol('HEALTH_PROBES');

/**
 * Liveness check for a single backing service.
 *
 * `check` resolves `true` when the dependency is reachable and responsive.
 * It may resolve `false` or reject; the aggregator turns both into
 * `unhealthy`.
 */
export interface HealthProbe {
  /** Component key in the composite `services` map, e.g. `database` */
  readonly name: string;
  /** Sub-path under `/api/health/`, e.g. `db` */
  readonly route: string;
  check(): Promise<boolean>;
}
