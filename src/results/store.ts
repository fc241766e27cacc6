import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import type { SuiteReport } from '../evals/suite.js';

const LATEST_FILE = 'latest.json';

export interface ReportListItem {
  id: string;
  suite: string;
  startedAt: string;
  models: string[];
  passed: number;
  warned: number;
  failed: number;
}

export class ResultStore {
  private resultsDir: string;

  constructor(resultsDir: string) {
    this.resultsDir = resultsDir;
  }

  get dir(): string {
    return this.resultsDir;
  }

  async save(report: SuiteReport): Promise<string> {
    await mkdir(this.resultsDir, { recursive: true });
    const content = JSON.stringify(report, null, 2);
    const filePath = join(this.resultsDir, `${report.id}.json`);
    await writeFile(filePath, content);
    await writeFile(join(this.resultsDir, LATEST_FILE), content);
    return filePath;
  }

  async load(reportId: string): Promise<SuiteReport | null> {
    const filePath = join(this.resultsDir, `${reportId}.json`);
    if (!existsSync(filePath)) {
      return null;
    }
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as SuiteReport;
  }

  async latest(): Promise<SuiteReport | null> {
    return this.load(LATEST_FILE.replace(/\.json$/, ''));
  }

  async list(): Promise<ReportListItem[]> {
    if (!existsSync(this.resultsDir)) {
      return [];
    }

    const files = await readdir(this.resultsDir);
    const reports: ReportListItem[] = [];

    for (const file of files) {
      if (!file.endsWith('.json') || file === LATEST_FILE) {
        continue;
      }
      const report = await this.load(file.replace(/\.json$/, ''));
      if (!report) {
        continue;
      }

      const totals = report.runs.reduce(
        (acc, run) => ({
          passed: acc.passed + run.summary.passed,
          warned: acc.warned + run.summary.warned,
          failed: acc.failed + run.summary.failed,
        }),
        { passed: 0, warned: 0, failed: 0 }
      );
      reports.push({
        id: report.id,
        suite: report.suite,
        startedAt: report.startedAt,
        models: report.runs.map(run => run.model),
        ...totals,
      });
    }

    return reports.sort((a, b) =>
      new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime()
    );
  }
}
