export type ComponentStatus = 'healthy' | 'unhealthy';

/**
 * Composite status a server evaluation can produce.
 * `unknown` is never emitted by the API; it only exists on the client side.
 */
export type ServerHealthStatus = ComponentStatus | 'error';

/**
 * Body of `GET /health` and `GET /api/health`
 */
export interface HealthCheckDto {
  status: ServerHealthStatus;
  timestamp: string;
  services?: Record<string, ComponentStatus>;
  error?: string;
}

/**
 * Body of the per-component endpoints (`GET /api/health/:component`)
 */
export interface ComponentHealthDto {
  status: ComponentStatus;
  timestamp: string;
  error?: string;
}

export interface HealthEndpointInfo {
  name: string;
  route: string;
  path: string;
}
