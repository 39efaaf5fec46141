import * as Joi from 'joi';
import { WaitTarget } from './wait-for-services';

export interface WaitConfig {
  host: string;
  apiPort: number;
  frontendPort: number;
  maxWaitMs: number;
  intervalMs: number;
  requestTimeoutMs: number;
  verbose: boolean;
}

interface WaitEnv {
  HEALTH_HOST: string;
  API_PORT: number;
  FRONTEND_PORT: number;
  MAX_WAIT: number;
  CHECK_INTERVAL: number;
  REQUEST_TIMEOUT: number;
  VERBOSE: boolean;
}

// Durations are given in seconds
export const waitConfigSchema = Joi.object<WaitEnv>({
  HEALTH_HOST: Joi.string().hostname().default('localhost'),
  API_PORT: Joi.number().port().default(8080),
  FRONTEND_PORT: Joi.number().port().default(3000),
  MAX_WAIT: Joi.number().min(0).default(60),
  CHECK_INTERVAL: Joi.number().greater(0).default(2),
  REQUEST_TIMEOUT: Joi.number().greater(0).default(5),
  VERBOSE: Joi.boolean().default(false),
}).unknown(true);

export function loadWaitConfig(env: NodeJS.ProcessEnv = process.env): WaitConfig {
  const { error, value } = waitConfigSchema.validate(env);
  if (error || value === undefined) {
    throw new Error(`Invalid wait configuration: ${error?.message ?? 'empty environment'}`);
  }

  return {
    host: value.HEALTH_HOST,
    apiPort: value.API_PORT,
    frontendPort: value.FRONTEND_PORT,
    maxWaitMs: Math.round(value.MAX_WAIT * 1000),
    intervalMs: Math.round(value.CHECK_INTERVAL * 1000),
    requestTimeoutMs: Math.round(value.REQUEST_TIMEOUT * 1000),
    verbose: value.VERBOSE,
  };
}

export function defaultTargets(config: Pick<WaitConfig, 'host' | 'apiPort' | 'frontendPort'>): WaitTarget[] {
  const api = `http://${config.host}:${config.apiPort}`;
  return [
    { name: 'API', url: `${api}/health` },
    { name: 'Frontend', url: `http://${config.host}:${config.frontendPort}/` },
    { name: 'Database', url: `${api}/api/health/db` },
    { name: 'Redis', url: `${api}/api/health/redis` },
  ];
}

/** Entry points printed once the stack is up */
export function accessUrls(config: Pick<WaitConfig, 'host' | 'apiPort' | 'frontendPort'>): string[] {
  const api = `http://${config.host}:${config.apiPort}`;
  return [
    `Frontend: http://${config.host}:${config.frontendPort}`,
    `API: ${api}`,
    `API Info: ${api}/api`,
  ];
}

/**
 * Parses a `--target name=url` value. Only http and https URLs are accepted.
 */
export function parseTargetFlag(raw: string): WaitTarget {
  const separator = raw.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Invalid target "${raw}": expected name=url`);
  }

  const name = raw.slice(0, separator).trim();
  const url = raw.slice(separator + 1).trim();
  if (!name) {
    throw new Error(`Invalid target "${raw}": name is empty`);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid target "${raw}": "${url}" is not a URL`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Invalid target "${raw}": only http and https are supported`);
  }

  return { name, url };
}
