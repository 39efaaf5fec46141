import { Logger, LoggerService } from '@nestjs/common';
import { BehaviorSubject, Observable, Subscription, interval } from 'rxjs';
import { mergeMap, startWith } from 'rxjs/operators';
import { errorMessage } from '../common/utils/error-message';
import { connectionErrorState, HealthState, parseHealthResponse } from './health-state';

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export type DashboardState =
  | { readonly phase: 'loading' }
  | { readonly phase: 'displaying'; readonly health: HealthState };

export interface HealthResponseLike {
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { signal: AbortSignal },
) => Promise<HealthResponseLike>;

export interface HealthPollerOptions {
  /** Base URL of the API, e.g. `http://localhost:8080` */
  apiUrl: string;
  intervalMs?: number;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Pick<LoggerService, 'warn'>;
}

/**
 * Polls the composite health endpoint: once on `start()`, then on a fixed
 * interval with no backoff.
 *
 * Evaluations are independent and may overlap; whichever completes last is
 * displayed. `stop()` cancels the schedule and drops in-flight results.
 */
export class HealthPoller {
  private readonly state = new BehaviorSubject<DashboardState>({ phase: 'loading' });
  private subscription: Subscription | null = null;
  private stopped = false;

  private readonly healthUrl: string;
  private readonly intervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchHealth: FetchLike;
  private readonly logger: Pick<LoggerService, 'warn'>;

  readonly state$: Observable<DashboardState> = this.state.asObservable();

  constructor(options: HealthPollerOptions) {
    this.healthUrl = `${options.apiUrl.replace(/\/+$/, '')}/health`;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchHealth = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? new Logger(HealthPoller.name);
  }

  get snapshot(): DashboardState {
    return this.state.getValue();
  }

  get isRunning(): boolean {
    return this.subscription !== null;
  }

  start(): void {
    if (this.subscription || this.stopped) {
      return;
    }

    this.subscription = interval(this.intervalMs)
      .pipe(
        startWith(-1),
        mergeMap(() => this.evaluate()),
      )
      .subscribe((health) => this.state.next({ phase: 'displaying', health }));
  }

  /**
   * Idempotent. A stopped poller cannot be restarted.
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.state.complete();
  }

  /**
   * One evaluation. Never rejects: transport failures become an `error` state.
   */
  async evaluate(): Promise<HealthState> {
    try {
      const response = await this.fetchHealth(this.healthUrl, {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      const body = await response.json();
      const health = parseHealthResponse(body);
      if (!health) {
        this.logger.warn(`Unexpected health response from ${this.healthUrl}`);
        return connectionErrorState();
      }
      return health;
    } catch (error) {
      this.logger.warn(`Failed to fetch health from ${this.healthUrl}: ${errorMessage(error)}`);
      return connectionErrorState();
    }
  }
}
