import { TargetOutcome, WaitSummary } from './wait-for-services';

const ESC = '\x1b[';

export const c = {
  reset: `${ESC}0m`,
  bold: `${ESC}1m`,

  red: (s: string) => `${ESC}31m${s}${ESC}0m`,
  green: (s: string) => `${ESC}32m${s}${ESC}0m`,
  yellow: (s: string) => `${ESC}33m${s}${ESC}0m`,
  cyan: (s: string) => `${ESC}36m${s}${ESC}0m`,
  gray: (s: string) => `${ESC}90m${s}${ESC}0m`,
};

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface SpinnerStream {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

/** Progress indicator; draws nothing when the stream is not a terminal. */
export class Spinner {
  private frame = 0;
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private message: string,
    private readonly stream: SpinnerStream = process.stderr,
  ) {}

  start(): void {
    if (!this.stream.isTTY || this.interval) return;
    this.interval = setInterval(() => {
      const f = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
      this.stream.write(`\r${c.cyan(f)} ${this.message}`);
      this.frame++;
    }, 80);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    this.stream.write('\r\x1b[K');
  }
}

export function waitingMessage(pending: string[]): string {
  return pending.length > 0 ? `Waiting for ${pending.join(', ')}...` : 'Finishing...';
}

export function outcomeLine(outcome: TargetOutcome): string {
  return outcome.ok ? `✅ ${outcome.name} is healthy` : `❌ ${outcome.name} health check failed`;
}

/**
 * Summary printed once every target has finished.
 */
export function renderSummary(summary: WaitSummary, accessUrls: string[]): string[] {
  const lines = ['', `${c.bold}Health check results${c.reset}`];
  lines.push(...summary.outcomes.map((outcome) => `  ${outcomeLine(outcome)}`));
  lines.push('');

  if (summary.ok) {
    lines.push(c.green('All services are healthy'));
    if (accessUrls.length > 0) {
      lines.push('', 'Access URLs:', ...accessUrls.map((url) => `  ${c.cyan(url)}`));
    }
    return lines;
  }

  const failed = summary.outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.name);
  lines.push(c.red(`Some services failed health checks: ${failed.join(', ')}`));
  lines.push(
    '',
    c.yellow('Troubleshooting:'),
    `  ${c.gray('•')} Check that the containers or processes are running`,
    `  ${c.gray('•')} Inspect the service logs for startup errors`,
    `  ${c.gray('•')} Raise MAX_WAIT if the services need longer to start`,
  );
  return lines;
}
