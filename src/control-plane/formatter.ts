import { WorkflowStatus, type RunOutcome, type TemplateInfo, type WorkflowTemplate } from '../types/index.js';

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
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
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

/**
 * Apply color to text if colors are enabled.
 */
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
 * Format a workflow status with appropriate color.
 */
export function formatStatus(status: WorkflowStatus): string {
  const statusColors: Record<WorkflowStatus, keyof typeof colors> = {
    [WorkflowStatus.RUNNING]: 'blue',
    [WorkflowStatus.PAUSED]: 'yellow',
    [WorkflowStatus.COMPLETED]: 'green',
    [WorkflowStatus.COMPLETED_WITH_ERRORS]: 'red',
  };

  return colorize(status, statusColors[status]);
}

/**
 * Format a duration in seconds, e.g. 0.42s, 3m 5s, 1h 2m.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const remainingSeconds = whole % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition.
 */
export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row.trimEnd());
  }

  return lines.join('\n');
}

/**
 * Format the templates directory listing as a table.
 */
export function formatTemplateList(templates: TemplateInfo[]): string {
  if (templates.length === 0) {
    return dim('No workflow templates found.');
  }

  const columns: TableColumn<TemplateInfo>[] = [
    {
      header: 'TYPE',
      width: 20,
      value: t => t.workflowType ?? '-',
    },
    {
      header: 'NAME',
      width: 32,
      value: t => t.name ?? '-',
    },
    {
      header: 'PHASES',
      width: 6,
      align: 'right',
      value: t => String(t.phases),
    },
    {
      header: 'PROJECT TYPES',
      width: 24,
      value: t => (t.projectTypes.length > 0 ? t.projectTypes.join(', ') : '-'),
    },
    {
      header: 'FILE',
      width: 28,
      value: t => t.file,
    },
  ];

  return formatTable(templates, columns);
}

/**
 * Phase and task outline of a template.
 */
export function formatTemplateOutline(template: WorkflowTemplate): string {
  const lines: string[] = [];

  for (const [index, phase] of template.phases.entries()) {
    lines.push(`${bold(`${index + 1}. ${phase.name}`)} ${dim(`(${phase.tasks.length} tasks)`)}`);
    for (const task of phase.tasks) {
      const method = task.method.trim().length > 0 ? task.method : 'custom';
      lines.push(`   ${task.id}  ${dim(method)}  ${task.description}`);
    }
  }

  return lines.join('\n');
}

/**
 * Summary of a finished (or paused) run.
 */
export function formatRunOutcome(outcome: RunOutcome): string {
  const lines: string[] = [];

  lines.push(bold('Workflow Run'));
  lines.push('');
  lines.push(`${bold('ID:')}         ${outcome.workflowId}`);
  lines.push(`${bold('Type:')}       ${outcome.workflowType}`);
  lines.push(`${bold('Status:')}     ${formatStatus(outcome.status)}`);
  lines.push(`${bold('Completed:')}  ${outcome.tasksCompleted}`);
  lines.push(`${bold('Failed:')}     ${outcome.tasksFailed > 0 ? red(String(outcome.tasksFailed)) : '0'}`);
  lines.push(`${bold('Decisions:')}  ${outcome.decisionsMade}`);
  lines.push(`${bold('Duration:')}   ${formatDuration(outcome.executionTimeSeconds)}`);

  const phases = Object.entries(outcome.phases);
  if (phases.length > 0) {
    lines.push('');
    lines.push(bold('Phases:'));
    for (const [name, summary] of phases) {
      lines.push(
        `  ${name}: ${summary.tasksCompleted} completed, ${summary.tasksFailed} failed, ${summary.decisionsRecorded} decisions`
      );
    }
  }

  return lines.join('\n');
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

/**
 * Format validation errors, one bullet per error.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
