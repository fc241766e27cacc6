import type { CaseReport, ModelRun, SuiteReport } from '../evals/suite.js';
import type { Classification, FieldResult } from '../evals/types.js';
import { box, style, icons } from '../cli/theme.js';
import type { ReportListItem } from './store.js';

export interface ViewOptions {
  json: boolean;
  verbose: boolean;
}

const DEFAULT_VIEW_OPTIONS: ViewOptions = {
  json: false,
  verbose: false,
};

export function formatReport(report: SuiteReport, options: Partial<ViewOptions> = {}): string {
  const opts = { ...DEFAULT_VIEW_OPTIONS, ...options };

  if (opts.json) {
    return JSON.stringify(report, null, 2);
  }

  const lines: string[] = [];
  const w = 60;

  lines.push('');
  lines.push(style.primary(box.dHorizontal.repeat(w)));
  lines.push(`  ${icons.trace} ${style.bold(report.suite)} ${style.muted(report.id)}`);
  lines.push(style.primary(box.dHorizontal.repeat(w)));
  lines.push(kv('Provider', report.provider));
  lines.push(kv('Started', style.muted(report.startedAt)));
  lines.push('');

  for (const run of report.runs) {
    lines.push(...formatModelRun(run, opts.verbose));
  }

  lines.push(style.primary(box.dHorizontal.repeat(w)));
  lines.push('');
  return lines.join('\n');
}

function formatModelRun(run: ModelRun, verbose: boolean): string[] {
  const { summary } = run;
  const lines: string[] = [];
  lines.push(sectionHeader(`Model: ${run.model}`));

  for (const report of orderedCases(run)) {
    lines.push(formatCase(report));
    if (verbose) {
      for (const field of report.evaluation.fieldResults) {
        lines.push(formatField(field));
      }
    }
  }

  lines.push('');
  lines.push(
    `   ${style.success(`${summary.passed} passed`)}, ${style.warning(`${summary.warned} warned`)}, ` +
      `${style.error(`${summary.failed} failed`)}` +
      (summary.errored > 0 ? `, ${style.error(`${summary.errored} errored`)}` : '') +
      ` ${style.dim('·')} average ${style.number(percent(summary.averageScore))}`
  );
  lines.push('');
  return lines;
}

/** Case reports in authoring order. */
export function orderedCases(run: ModelRun): CaseReport[] {
  return run.caseOrder.flatMap(name => (Object.hasOwn(run.cases, name) ? [run.cases[name]] : []));
}

export function formatCase(report: CaseReport): string {
  const score = style.number(percent(report.evaluation.score).padStart(6));
  const line = `   ${formatClassification(report.evaluation.classification)} ${score}  ${report.name}`;
  if (report.error) {
    return `${line}\n      ${style.dim(`${report.error.kind} error:`)} ${style.error(report.error.message)}`;
  }
  return line;
}

function formatField(field: FieldResult): string {
  const mark = field.matched ? style.success(icons.check) : style.error(icons.cross);
  const score = `${field.score.toFixed(2)}/${field.weight.toFixed(2)}`;
  return `      ${mark} ${field.field.padEnd(20)} ${style.dim(score)}  ${style.muted(`expected ${JSON.stringify(field.expected)}, got ${JSON.stringify(field.actual)}`)}`;
}

export function formatClassification(classification: Classification): string {
  switch (classification) {
    case 'PASS':
      return style.success(`${icons.check} PASS`);
    case 'WARN':
      return style.warning(`${icons.warning} WARN`);
    case 'FAIL':
      return style.error(`${icons.cross} FAIL`);
  }
}

export function formatReportList(reports: ReportListItem[]): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(`  ${style.bold(`${icons.suite} Stored Reports`)}`);
  lines.push(style.primary(`  ${box.dHorizontal.repeat(76)}`));

  const header = [
    'ID'.padEnd(40),
    'Models'.padEnd(18),
    'Pass'.padStart(6),
    'Warn'.padStart(6),
    'Fail'.padStart(6),
  ].join('');
  lines.push(`  ${style.dim(header)}`);
  lines.push(style.dim(`  ${box.horizontal.repeat(76)}`));

  for (const r of reports) {
    const id = style.muted(r.id.slice(0, 38).padEnd(40));
    const models = r.models.join(',').slice(0, 16).padEnd(18);
    const passed = style.success(String(r.passed).padStart(6));
    const warned = style.warning(String(r.warned).padStart(6));
    const failed = r.failed > 0 ? style.error(String(r.failed).padStart(6)) : style.dim(String(r.failed).padStart(6));
    lines.push(`  ${id}${models}${passed}${warned}${failed}`);
  }

  lines.push('');
  lines.push(`  ${style.dim('View a report:')} ${style.info('tooleval view <report-id>')}`);
  lines.push('');
  return lines.join('\n');
}

export function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function sectionHeader(title: string): string {
  return `${style.dim(box.horizontal.repeat(3))} ${style.bold(title)} ${style.dim(box.horizontal.repeat(Math.max(0, 35 - title.length)))}`;
}

function kv(key: string, value: string): string {
  return `   ${style.dim(key + ':')} ${value}`;
}
