import { renderDashboard } from './render';

describe('renderDashboard', () => {
  it('should render the loading view', () => {
    expect(renderDashboard({ loading: true, rows: [] })).toEqual([
      '\x1b[1mSystem Health\x1b[0m',
      '',
      '  Checking...',
    ]);
  });

  it('should align rows and colour badges by tone', () => {
    const lines = renderDashboard({
      loading: false,
      rows: [
        {
          label: 'Overall Status',
          presentation: { status: 'healthy', tone: 'success', icon: '✓', label: 'healthy' },
        },
        {
          label: 'Redis',
          presentation: { status: 'unhealthy', tone: 'danger', icon: '✗', label: 'unhealthy' },
        },
      ],
      lastChecked: '12:00:00',
    });

    expect(lines).toEqual([
      '\x1b[1mSystem Health\x1b[0m',
      '',
      '  Overall Status  \x1b[32m✓ healthy\x1b[0m',
      '  Redis           \x1b[31m✗ unhealthy\x1b[0m',
      '',
      '  Last checked: 12:00:00',
    ]);
  });

  it('should render the error and hint', () => {
    const lines = renderDashboard({
      loading: false,
      rows: [
        {
          label: 'Overall Status',
          presentation: { status: 'error', tone: 'warning', icon: '⚠', label: 'error' },
        },
      ],
      error: { message: 'Failed to connect to API', hint: 'Make sure the API server is running at http://localhost:8080' },
    });

    expect(lines.slice(-3)).toEqual([
      '',
      '  \x1b[31mError:\x1b[0m Failed to connect to API',
      '  Make sure the API server is running at http://localhost:8080',
    ]);
  });
});
