import { setTimeout as delay } from 'node:timers/promises';
import { errorMessage } from '../common/utils/error-message';

export interface WaitTarget {
  name: string;
  url: string;
}

export interface TargetOutcome extends WaitTarget {
  ok: boolean;
  attempts: number;
  /** Accumulated wait when the loop ended */
  elapsedMs: number;
}

export interface AttemptReport {
  attempt: number;
  elapsedMs: number;
  ok: boolean;
  error?: string;
}

export interface WaitSummary {
  ok: boolean;
  /** One entry per target, in completion order */
  outcomes: TargetOutcome[];
}

/** Resolves `true` for a ready target; may reject on transport failure */
export type AttemptProbe = (url: string, timeoutMs: number) => Promise<boolean>;

export type Sleep = (ms: number) => Promise<void>;

export interface WaitOptions {
  maxWaitMs: number;
  intervalMs: number;
  requestTimeoutMs: number;
  probe?: AttemptProbe;
  sleep?: Sleep;
  onAttempt?: (target: WaitTarget, report: AttemptReport) => void;
  /** Called once per target as its loop finishes */
  onSettled?: (outcome: TargetOutcome) => void;
}

/**
 * Single GET bounded by `timeoutMs`; any 2xx answer counts as ready.
 */
export async function httpProbe(url: string, timeoutMs: number): Promise<boolean> {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  await response.body?.cancel();
  return response.ok;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Polls one target until it answers successfully or the accumulated wait
 * reaches `maxWaitMs`. Attempts happen at elapsed 0, interval, 2 x interval...
 * Never rejects.
 */
export async function waitForTarget(target: WaitTarget, options: WaitOptions): Promise<TargetOutcome> {
  const probe = options.probe ?? httpProbe;
  const sleep = options.sleep ?? defaultSleep;
  let elapsedMs = 0;
  let attempts = 0;

  while (elapsedMs < options.maxWaitMs) {
    attempts++;
    const report: AttemptReport = { attempt: attempts, elapsedMs, ok: false };

    try {
      report.ok = await probe(target.url, options.requestTimeoutMs);
    } catch (error) {
      report.error = errorMessage(error);
    }
    options.onAttempt?.(target, report);

    if (report.ok) {
      return { ...target, ok: true, attempts, elapsedMs };
    }

    await sleep(options.intervalMs);
    elapsedMs += options.intervalMs;
  }

  return { ...target, ok: false, attempts, elapsedMs };
}

/**
 * Runs one wait loop per target and waits for all of them. A failing target
 * never cancels its siblings.
 */
export async function waitForAll(targets: WaitTarget[], options: WaitOptions): Promise<WaitSummary> {
  if (!(options.intervalMs > 0)) {
    throw new RangeError(`Poll interval must be positive, got ${options.intervalMs}`);
  }

  const outcomes: TargetOutcome[] = [];

  const settled = await Promise.allSettled(
    targets.map(async (target) => {
      const outcome = await waitForTarget(target, options);
      outcomes.push(outcome);
      options.onSettled?.(outcome);
    }),
  );

  settled.forEach((result, index) => {
    if (result.status === 'rejected') {
      const target = targets[index];
      outcomes.push({ ...target, ok: false, attempts: 0, elapsedMs: 0 });
    }
  });

  return {
    ok: outcomes.every((outcome) => outcome.ok),
    outcomes,
  };
}
