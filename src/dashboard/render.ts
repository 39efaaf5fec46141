import { DashboardView } from './dashboard-view';
import { StatusTone } from './status-presentation';

const ESC = '\x1b[';

const TONE_COLORS: Record<StatusTone, string> = {
  success: `${ESC}32m`,
  danger: `${ESC}31m`,
  warning: `${ESC}33m`,
  neutral: `${ESC}90m`,
};

const RESET = `${ESC}0m`;
const BOLD = `${ESC}1m`;

export function renderDashboard(view: DashboardView): string[] {
  const lines = [`${BOLD}System Health${RESET}`, ''];

  if (view.loading) {
    lines.push('  Checking...');
    return lines;
  }

  const width = Math.max(...view.rows.map((row) => row.label.length));
  for (const { label, presentation } of view.rows) {
    const badge = `${TONE_COLORS[presentation.tone]}${presentation.icon} ${presentation.label}${RESET}`;
    lines.push(`  ${label.padEnd(width)}  ${badge}`);
  }

  if (view.error) {
    lines.push('', `  ${TONE_COLORS.danger}Error:${RESET} ${view.error.message}`, `  ${view.error.hint}`);
  }

  if (view.lastChecked) {
    lines.push('', `  Last checked: ${view.lastChecked}`);
  }

  return lines;
}
