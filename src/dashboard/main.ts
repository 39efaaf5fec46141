import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { loadDashboardConfig } from './dashboard.config';
import { buildDashboardView } from './dashboard-view';
import { HealthPoller } from './health-poller';
import { renderDashboard } from './render';
import { errorMessage } from '../common/utils/error-message';

dotenv.config();

function run(): void {
  const logger = new Logger('Dashboard');
  const config = loadDashboardConfig();
  const poller = new HealthPoller(config);

  poller.state$.subscribe((state) => {
    const lines = renderDashboard(buildDashboardView(state, config.apiUrl));
    process.stdout.write(`\x1b[2J\x1b[H${lines.join('\n')}\n`);
  });

  const shutdown = (): void => {
    poller.stop();
    logger.log('Stopped polling');
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.log(`Polling ${config.apiUrl}/health every ${config.intervalMs}ms`);
  poller.start();
}

try {
  run();
} catch (error) {
  new Logger('Dashboard').error(errorMessage(error));
  process.exitCode = 1;
}
