import { c, outcomeLine, renderSummary, Spinner, SpinnerStream, waitingMessage } from './render';
import { WaitSummary } from './wait-for-services';

describe('outcomeLine', () => {
  it('should describe passing and failing targets', () => {
    expect(outcomeLine({ name: 'API', url: 'http://a', ok: true, attempts: 1, elapsedMs: 0 })).toBe('✅ API is healthy');
    expect(outcomeLine({ name: 'Redis', url: 'http://r', ok: false, attempts: 3, elapsedMs: 6000 })).toBe(
      '❌ Redis health check failed',
    );
  });
});

describe('waitingMessage', () => {
  it('should name the pending targets', () => {
    expect(waitingMessage(['API', 'Redis'])).toBe('Waiting for API, Redis...');
    expect(waitingMessage([])).toBe('Finishing...');
  });
});

describe('renderSummary', () => {
  it('should list access URLs when every target passed', () => {
    const summary: WaitSummary = {
      ok: true,
      outcomes: [{ name: 'API', url: 'http://localhost:8080/health', ok: true, attempts: 1, elapsedMs: 0 }],
    };

    const lines = renderSummary(summary, ['API: http://localhost:8080/health']);

    expect(lines).toContain('  ✅ API is healthy');
    expect(lines).toContain(c.green('All services are healthy'));
    expect(lines.slice(-2)).toEqual(['Access URLs:', `  ${c.cyan('API: http://localhost:8080/health')}`]);
    expect(lines).not.toContain(c.yellow('Troubleshooting:'));
  });

  it('should name failed targets and print troubleshooting hints', () => {
    const summary: WaitSummary = {
      ok: false,
      outcomes: [
        { name: 'API', url: 'http://a', ok: true, attempts: 1, elapsedMs: 0 },
        { name: 'Redis', url: 'http://r', ok: false, attempts: 3, elapsedMs: 6000 },
      ],
    };

    const lines = renderSummary(summary, ['API: http://a']);

    expect(lines).toContain('  ❌ Redis health check failed');
    expect(lines).toContain(c.red('Some services failed health checks: Redis'));
    expect(lines).toContain(c.yellow('Troubleshooting:'));
    expect(lines).not.toContain('Access URLs:');
  });
});

describe('Spinner', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  const stream = (isTTY: boolean): SpinnerStream & { write: jest.Mock } => ({ isTTY, write: jest.fn() });

  it('should draw frames on a terminal and clear the line on stop', () => {
    jest.useFakeTimers();
    const out = stream(true);
    const spinner = new Spinner('Waiting', out);

    spinner.start();
    jest.advanceTimersByTime(160);
    spinner.stop();

    expect(out.write).toHaveBeenCalledTimes(3);
    expect(out.write).toHaveBeenNthCalledWith(1, `\r${c.cyan('⠋')} Waiting`);
    expect(out.write).toHaveBeenNthCalledWith(2, `\r${c.cyan('⠙')} Waiting`);
    expect(out.write).toHaveBeenLastCalledWith('\r\x1b[K');
  });

  it('should draw the updated message on the next frame', () => {
    jest.useFakeTimers();
    const out = stream(true);
    const spinner = new Spinner('Waiting for API, Redis...', out);

    spinner.start();
    spinner.update('Waiting for Redis...');
    jest.advanceTimersByTime(80);
    spinner.stop();

    expect(out.write).toHaveBeenNthCalledWith(1, `\r${c.cyan('⠋')} Waiting for Redis...`);
  });

  it('should stay silent when the stream is not a terminal', () => {
    jest.useFakeTimers();
    const out = stream(false);
    const spinner = new Spinner('Waiting', out);

    spinner.start();
    jest.advanceTimersByTime(400);
    spinner.stop();

    expect(out.write).not.toHaveBeenCalled();
  });
});
