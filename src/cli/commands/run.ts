import { Command } from 'commander';
import { getEnv } from '../../config/env.js';
import { loadSuite, loadToolCallScript } from '../../loader/index.js';
import {
  AnthropicToolCallProvider,
  ScriptedToolCallProvider,
  type ToolCallProvider,
} from '../../providers/index.js';
import { ResultStore, formatReport } from '../../results/index.js';
import { style, icons, Spinner, withSpinner, formatError, formatDuration, nextSteps, keyValue } from '../theme.js';

interface RunCommandOptions {
  model?: string[];
  concurrency?: string;
  dryRun?: string;
  json: boolean;
  verbose: boolean;
  save: boolean;
  resultsDir?: string;
}

export const runCommand = new Command('run')
  .description('Run an eval suite against one or more models')
  .argument('<suite-file>', 'Path to the suite YAML file')
  .option('-m, --model <models...>', 'Models to evaluate (default: $TOOLEVAL_DEFAULT_MODEL)')
  .option('-c, --concurrency <n>', 'Cases evaluated in parallel per model')
  .option('--dry-run <script>', 'Answer from a YAML script of tool calls instead of a model')
  .option('--json', 'Print the report as JSON', false)
  .option('-v, --verbose', 'Show per-field scores', false)
  .option('--no-save', 'Do not store the report')
  .option('--results-dir <dir>', 'Where reports are stored (default: $TOOLEVAL_RESULTS_DIR)')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('tooleval run evals/email.yaml')}                         ${style.dim('Run with the default model')}
  ${style.command('tooleval run evals/email.yaml -m model-a model-b')}      ${style.dim('Compare two models')}
  ${style.command('tooleval run evals/email.yaml --dry-run script.yaml')}   ${style.dim('Score scripted tool calls')}
`)
  .action(async (suiteFile: string, options: RunCommandOptions) => {
    try {
      const env = getEnv();
      const suite = loadSuite(suiteFile);
      const models = options.model && options.model.length > 0 ? options.model : [env.TOOLEVAL_DEFAULT_MODEL];
      const concurrency = options.concurrency ? parseInt(options.concurrency, 10) : env.TOOLEVAL_CONCURRENCY;

      const provider: ToolCallProvider = options.dryRun
        ? new ScriptedToolCallProvider(loadToolCallScript(options.dryRun))
        : new AnthropicToolCallProvider();

      if (!options.json) {
        console.log(`\n${icons.suite} ${style.bold('Running suite')} ${style.highlight(suite.name)}\n`);
        console.log(keyValue('Cases', style.number(String(suite.cases.length)), 1));
        console.log(keyValue('Models', models.join(', '), 1));
        console.log(keyValue('Provider', provider.name, 1));
        console.log(keyValue('Concurrency', style.number(String(concurrency)), 1));
        console.log();
      }

      const spinner = options.json ? null : new Spinner('Evaluating...');
      const startTime = Date.now();
      const total = suite.cases.length * models.length;
      let done = 0;

      const report = await withSpinner(spinner, () =>
        suite.run(models, provider, {
          concurrency,
          onCaseComplete: (model, caseReport) => {
            done++;
            spinner?.update(`[${done}/${total}] ${model} ${style.dim(caseReport.name)}`);
          },
        })
      );

      const failed = report.runs.reduce((sum, run) => sum + run.summary.failed, 0);
      if (failed > 0) {
        spinner?.fail(`Suite finished with ${style.error(`${failed} failing cases`)}`);
      } else {
        spinner?.succeed(`Suite finished in ${style.number(formatDuration(Date.now() - startTime))}`);
      }

      console.log(formatReport(report, { json: options.json, verbose: options.verbose }));

      if (options.save) {
        const store = new ResultStore(options.resultsDir ?? env.TOOLEVAL_RESULTS_DIR);
        const savedPath = await store.save(report);
        if (!options.json) {
          console.log(`${icons.folder} Report saved to: ${style.path(savedPath)}`);
          console.log(nextSteps([
            { command: `tooleval view ${report.id}`, description: 'Show this report again' },
            { command: 'tooleval view --list', description: 'List stored reports' },
          ]));
        }
      }

      if (failed > 0) {
        process.exit(1);
      }
    } catch (error) {
      console.error(formatError(
        error instanceof Error ? error.message : String(error),
        [
          `Check the suite with ${style.command(`tooleval validate ${suiteFile}`)}`,
          'Ensure ANTHROPIC_API_KEY is set, or pass --dry-run',
        ]
      ));
      process.exit(1);
    }
  });
