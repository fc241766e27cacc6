/**
 * tooleval CLI theme
 * Shared colors, icons and formatting helpers for terminal output
 */

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',

  brightBlack: '\x1b[90m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
};

export const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,

  success: (text: string) => `${colors.green}${text}${colors.reset}`,
  error: (text: string) => `${colors.red}${text}${colors.reset}`,
  warning: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  info: (text: string) => `${colors.cyan}${text}${colors.reset}`,
  highlight: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,
  muted: (text: string) => `${colors.brightBlack}${text}${colors.reset}`,

  primary: (text: string) => `${colors.brightCyan}${text}${colors.reset}`,
  accent: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,

  command: (text: string) => `${colors.bold}${colors.cyan}${text}${colors.reset}`,
  path: (text: string) => `${colors.brightBlue}${text}${colors.reset}`,
  number: (text: string) => `${colors.brightYellow}${text}${colors.reset}`,
  label: (text: string) => `${colors.dim}${text}${colors.reset}`,
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  arrowRight: '▸',
  bullet: '•',
  check: '✓',
  cross: '✗',

  folder: '📁',
  suite: '📋',
  trace: '📊',
};

export const box = {
  horizontal: '─',
  dHorizontal: '═',
};

export const BANNER_MINIMAL = `${style.accent('tooleval')} ${style.muted('·')} ${style.dim('tool-call accuracy evals for LLM agents')}`;

export function subheader(title: string): string {
  return `\n${style.bold(title)}\n${style.dim(box.horizontal.repeat(40))}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.label(key + ':')} ${value}`;
}

export function bullet(text: string, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.dim(icons.bullet)} ${text}`;
}

// Spinner for async operations
export class Spinner {
  private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private frameIndex = 0;
  private intervalId: NodeJS.Timeout | null = null;
  private text: string;

  constructor(text: string) {
    this.text = text;
  }

  start(): void {
    process.stdout.write('\x1b[?25l'); // Hide cursor
    this.render();
    this.intervalId = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % this.frames.length;
      this.render();
    }, 80);
  }

  private render(): void {
    process.stdout.write(`\r${style.info(this.frames[this.frameIndex])} ${this.text}`);
  }

  update(text: string): void {
    this.text = text;
    this.render();
  }

  succeed(text?: string): void {
    this.stop();
    console.log(`\r${style.success(icons.success)} ${text || this.text}`);
  }

  fail(text?: string): void {
    this.stop();
    console.log(`\r${style.error(icons.error)} ${text || this.text}`);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    process.stdout.write('\x1b[?25h'); // Show cursor
    process.stdout.write('\r' + ' '.repeat(80) + '\r'); // Clear line
  }
}

/** Runs `task` under the spinner; a failing task stops it before the error surfaces. */
export async function withSpinner<T>(spinner: Spinner | null, task: () => Promise<T>): Promise<T> {
  spinner?.start();
  try {
    return await task();
  } catch (error) {
    spinner?.stop();
    throw error;
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

// Error formatting with suggestions
export function formatError(message: string, suggestions?: string[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.error(`${icons.error} Error:`)} ${message}`);

  if (suggestions && suggestions.length > 0) {
    lines.push('');
    lines.push(style.dim('  Suggestions:'));
    for (const suggestion of suggestions) {
      lines.push(`    ${style.dim(icons.arrowRight)} ${suggestion}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

export function commandExample(command: string, description?: string): string {
  if (description) {
    return `  ${style.command(command)}  ${style.dim(description)}`;
  }
  return `  ${style.command(command)}`;
}

export function nextSteps(steps: { command: string; description: string }[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.bold('Next steps:')}`);

  for (const step of steps) {
    lines.push(commandExample(step.command, step.description));
  }

  lines.push('');
  return lines.join('\n');
}

export function welcomeMessage(): string {
  return `
${BANNER_MINIMAL}

Score the tool calls your model makes against the ones it should make.

${style.bold('Quick Start:')}

  ${style.command('tooleval validate evals/email.yaml')}   ${style.dim('Check a suite file')}
  ${style.command('tooleval run evals/email.yaml')}        ${style.dim('Run a suite against the default model')}
  ${style.command('tooleval view')}                        ${style.dim('Show the latest report')}

${style.bold('Learn More:')}

  ${style.command('tooleval --help')}         ${style.dim('Show all commands')}
  ${style.command('tooleval <cmd> --help')}   ${style.dim('Help for specific command')}
`;
}
