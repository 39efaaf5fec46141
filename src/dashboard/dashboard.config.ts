import * as Joi from 'joi';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_REQUEST_TIMEOUT_MS } from './health-poller';

export interface DashboardConfig {
  apiUrl: string;
  intervalMs: number;
  requestTimeoutMs: number;
}

interface DashboardEnv {
  HEALTH_API_URL: string;
  HEALTH_POLL_INTERVAL_MS: number;
  REQUEST_TIMEOUT_MS: number;
}

export const dashboardConfigSchema = Joi.object<DashboardEnv>({
  HEALTH_API_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('http://localhost:8080'),
  HEALTH_POLL_INTERVAL_MS: Joi.number().integer().min(1).default(DEFAULT_POLL_INTERVAL_MS),
  REQUEST_TIMEOUT_MS: Joi.number().integer().min(1).default(DEFAULT_REQUEST_TIMEOUT_MS),
}).unknown(true);

export function loadDashboardConfig(env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  const { error, value } = dashboardConfigSchema.validate(env);
  if (error || value === undefined) {
    throw new Error(`Invalid dashboard configuration: ${error?.message ?? 'empty environment'}`);
  }

  return {
    apiUrl: value.HEALTH_API_URL,
    intervalMs: value.HEALTH_POLL_INTERVAL_MS,
    requestTimeoutMs: value.REQUEST_TIMEOUT_MS,
  };
}
