import type { TerminalStatus } from '../supervisor/types';
import type { ServiceReport, StackReport } from './Orchestrator';

const STATUS_LABELS: Record<TerminalStatus, string> = {
  'healthy': 'OK',
  'exhausted-port-range': 'NO PORT',
  'executable-not-found': 'NOT FOUND',
  'dependency-unavailable': 'BLOCKED',
  'not-running': 'DOWN',
  'aborted': 'ABORTED',
};

export function hintFor(name: string, report: ServiceReport): string | undefined {
  switch (report.status) {
    case 'exhausted-port-range':
      return `${name}: no free port in configured range (tried ${report.attemptedPorts.join(', ') || 'none'}); ` +
        `free a port or widen --${name}-ports`;
    case 'executable-not-found':
      return `${name}: executable not found; check installation path or pass --${name}-exe`;
    case 'dependency-unavailable':
      return `${name}: ${report.detail ?? 'an upstream service never became healthy'}`;
    case 'not-running':
      return `${name}: not running; start it with \`stackup up\``;
    case 'aborted':
      return `${name}: run aborted before the service became healthy`;
    default:
      return undefined;
  }
}

function ownerLabel(report: ServiceReport): string {
  if (report.status !== 'healthy') {
    return '-';
  }
  if (report.ownedByUs) {
    return report.pid === undefined ? 'started' : `started pid=${report.pid}`;
  }
  return report.softSuccess ? 'external (unconfirmed)' : 'external';
}

export function formatSummary(report: StackReport): string {
  const names = Object.keys(report.services);
  const width = Math.max(8, ...names.map((name) => name.length));
  const lines = [ '--- Observability Stack Summary ---' ];

  for (const name of names) {
    const service = report.services[name];
    const status = STATUS_LABELS[service.status].padEnd(9);
    const location = service.url ?? '-';
    const flag = service.required ? '' : ' (optional)';
    lines.push(`${name.padEnd(width)} ${status} ${location}  ${ownerLabel(service)}${flag}`);
  }
  lines.push('-----------------------------------');

  const hints = names
    .filter((name) => report.services[name].required)
    .map((name) => hintFor(name, report.services[name]))
    .filter((hint): hint is string => hint !== undefined);
  if (hints.length > 0) {
    lines.push('Required services failed:');
    for (const hint of hints) {
      lines.push(`  - ${hint}`);
    }
  }

  return lines.join('\n');
}
