import { LoggerService } from '@nestjs/common';
import { parseArgs } from 'node:util';
import { errorMessage } from '../common/utils/error-message';
import { accessUrls, defaultTargets, loadWaitConfig, parseTargetFlag } from './wait-config';
import { renderSummary, Spinner, SpinnerStream, waitingMessage } from './render';
import { AttemptProbe, Sleep, waitForAll } from './wait-for-services';

export interface WaitCommandIo {
  env: NodeJS.ProcessEnv;
  stdout: { write(chunk: string): unknown };
  stderr: SpinnerStream;
  logger: Pick<LoggerService, 'log' | 'error'>;
  probe?: AttemptProbe;
  sleep?: Sleep;
}

/**
 * Runs `wait-for-services` and resolves the process exit code: 0 when every
 * target answered in time, 1 otherwise (including bad flags or config).
 */
export async function runWaitCommand(argv: string[], io: WaitCommandIo): Promise<number> {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        target: { type: 'string', multiple: true },
        verbose: { type: 'boolean', short: 'v' },
      },
    });

    const config = loadWaitConfig(io.env);
    const verbose = values.verbose ?? config.verbose;
    const targets = values.target ? values.target.map(parseTargetFlag) : defaultTargets(config);

    const pending = new Set(targets.map((target) => target.name));
    const spinner = new Spinner(waitingMessage([...pending]), io.stderr);
    spinner.start();

    const summary = await waitForAll(targets, {
      maxWaitMs: config.maxWaitMs,
      intervalMs: config.intervalMs,
      requestTimeoutMs: config.requestTimeoutMs,
      probe: io.probe,
      sleep: io.sleep,
      onAttempt: (target, report) => {
        if (!verbose) return;
        const detail = report.ok ? 'ok' : (report.error ?? 'not ready');
        io.logger.log(`${target.name} attempt ${report.attempt} at ${report.elapsedMs}ms: ${detail}`);
      },
      onSettled: (outcome) => {
        pending.delete(outcome.name);
        spinner.update(waitingMessage([...pending]));
      },
    }).finally(() => spinner.stop());

    io.stdout.write(`${renderSummary(summary, accessUrls(config)).join('\n')}\n`);
    return summary.ok ? 0 : 1;
  } catch (error) {
    io.logger.error(errorMessage(error));
    return 1;
  }
}
