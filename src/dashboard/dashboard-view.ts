import { DashboardState } from './health-poller';
import { presentStatus, StatusPresentation } from './status-presentation';

const COMPONENT_LABELS = new Map<string, string>([
  ['database', 'PostgreSQL'],
  ['redis', 'Redis'],
]);

export interface DashboardRow {
  label: string;
  presentation: StatusPresentation;
}

export interface DashboardError {
  message: string;
  hint: string;
}

export interface DashboardView {
  loading: boolean;
  rows: DashboardRow[];
  error?: DashboardError;
  /** `HH:MM:SS` (UTC) of the displayed evaluation */
  lastChecked?: string;
}

function formatTime(timestamp: string): string | undefined {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return date.toISOString().slice(11, 19);
}

export function componentLabel(name: string): string {
  return COMPONENT_LABELS.get(name) ?? name;
}

export function buildDashboardView(state: DashboardState, apiUrl: string): DashboardView {
  if (state.phase === 'loading') {
    return { loading: true, rows: [] };
  }

  const { health } = state;
  const rows: DashboardRow[] = [
    { label: 'Overall Status', presentation: presentStatus(health.overall) },
  ];

  for (const [name, status] of Object.entries(health.components ?? {})) {
    rows.push({ label: componentLabel(name), presentation: presentStatus(status) });
  }

  const view: DashboardView = { loading: false, rows };

  if (health.error) {
    view.error = {
      message: health.error,
      hint: `Make sure the API server is running at ${apiUrl}`,
    };
  }

  const lastChecked = formatTime(health.timestamp);
  if (lastChecked) {
    view.lastChecked = lastChecked;
  }

  return view;
}
