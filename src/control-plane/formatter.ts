import { ScenarioState, type Artifact, type ScenarioReport, type VerifyOutcome } from '../types/index.js';
import { formatMissingEntry } from '../scenario/errors.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a scenario state with appropriate color.
 */
export function formatState(state: ScenarioState): string {
  const stateColors: Record<ScenarioState, keyof typeof colors> = {
    [ScenarioState.PENDING]: 'gray',
    [ScenarioState.BUILT]: 'cyan',
    [ScenarioState.LOCATED]: 'cyan',
    [ScenarioState.EXECUTED]: 'cyan',
    [ScenarioState.VERIFIED]: 'cyan',
    [ScenarioState.PASSED]: 'green',
    [ScenarioState.FAILED]: 'red',
  };

  return colorize(state.toUpperCase(), stateColors[state]);
}

/**
 * Format a duration in milliseconds.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export interface TableColumn<T> {
  header: string;
  width: number;
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  lines.push(columns.map((col) => bold(col.header.padEnd(col.width))).join('  '));
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    lines.push(
      columns.map((col) => truncate(col.value(item), col.width).padEnd(col.width)).join('  ')
    );
  }

  return lines.join('\n');
}

export function formatArtifactList(artifacts: Artifact[]): string {
  if (artifacts.length === 0) {
    return dim('No executable file was found.');
  }

  return formatTable(artifacts, [
    { header: 'ID', width: 24, value: (a) => a.id },
    { header: 'SUFFIX', width: 6, value: (a) => a.suffix ?? '-' },
    { header: 'PATH', width: 80, value: (a) => a.path },
  ]);
}

export function formatVerifyOutcome(outcome: VerifyOutcome): string {
  const lines: string[] = [];

  for (const check of outcome.checks) {
    const target = check.artifact ?? red('no executable');
    lines.push(`  ${check.manifest} -> ${target} (${check.matched} matched, ${check.missing} missing)`);
  }
  for (const entry of outcome.missing) {
    lines.push(`  ${red('•')} ${formatMissingEntry(entry)}`);
  }

  return lines.join('\n');
}

/**
 * Human-readable summary of one scenario.
 */
export function formatScenarioReport(report: ScenarioReport): string {
  const lines: string[] = [];

  lines.push(
    `${bold(report.script)} [${report.mode}] ${formatState(report.state)} ${dim(formatDuration(report.durationMs))}`
  );

  for (const execution of report.executions) {
    const code = execution.timedOut ? 'timeout' : String(execution.exitCode ?? execution.signal);
    lines.push(`  ran ${execution.artifact.path} ${dim(`exit ${code}`)}`);
  }

  if (report.verification) {
    lines.push(formatVerifyOutcome(report.verification));
  }

  if (report.failure) {
    lines.push(`  ${red(`failed at ${report.failure.stage}:`)}`);
    for (const line of report.failure.message.split('\n')) {
      lines.push(`    ${line}`);
    }
  }

  return lines.join('\n');
}

/**
 * Report as plain JSON; the failure's Error is reduced to name and message.
 */
export function toReportJson(report: ScenarioReport): Record<string, unknown> {
  return {
    ...report,
    failure: report.failure
      ? {
          stage: report.failure.stage,
          message: report.failure.message,
          name: report.failure.error.name,
        }
      : null,
  };
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
