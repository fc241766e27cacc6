import { Command } from 'commander';
import { getEnv } from '../../config/env.js';
import { ResultStore, formatReport, formatReportList } from '../../results/index.js';
import { style, icons, formatError, nextSteps } from '../theme.js';

interface ViewCommandOptions {
  list?: boolean;
  json?: boolean;
  verbose?: boolean;
  limit: string;
  resultsDir?: string;
}

export const viewCommand = new Command('view')
  .description('Show stored eval reports')
  .argument('[report-id]', 'Specific report to show (default: latest)')
  .option('--list', 'List stored reports')
  .option('--json', 'Output as raw JSON')
  .option('-v, --verbose', 'Show per-field scores')
  .option('-n, --limit <count>', 'Limit number of reports listed', '20')
  .option('--results-dir <dir>', 'Where reports are stored (default: $TOOLEVAL_RESULTS_DIR)')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('tooleval view')}              ${style.dim('Show the most recent report')}
  ${style.command('tooleval view --list')}       ${style.dim('List stored reports')}
  ${style.command('tooleval view <id> -v')}      ${style.dim('Show a report with field scores')}
`)
  .action(async (reportId: string | undefined, options: ViewCommandOptions) => {
    try {
      const store = new ResultStore(options.resultsDir ?? getEnv().TOOLEVAL_RESULTS_DIR);

      if (options.list) {
        const reports = await store.list();
        if (reports.length === 0) {
          console.log(`\n${style.warning(`${icons.warning} No reports found in ${store.dir}.`)}`);
          console.log(nextSteps([{ command: 'tooleval run <suite-file>', description: 'Run a suite to create one' }]));
          return;
        }
        console.log(formatReportList(reports.slice(0, parseInt(options.limit, 10))));
        return;
      }

      const report = reportId ? await store.load(reportId) : await store.latest();
      if (!report) {
        console.log(formatError(
          reportId ? `Report not found: ${reportId}` : 'No reports found.',
          [`Run ${style.command('tooleval view --list')} to see stored reports`]
        ));
        process.exit(1);
      }

      console.log(formatReport(report, { json: options.json, verbose: options.verbose }));
    } catch (error) {
      console.error(formatError(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });
