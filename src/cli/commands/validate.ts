import { Command } from 'commander';
import { describeCritic } from '../../critics/index.js';
import { ValidationError } from '../../evals/errors.js';
import { loadSuite } from '../../loader/index.js';
import { style, icons, formatError, subheader, keyValue, bullet } from '../theme.js';

export const validateCommand = new Command('validate')
  .description('Load a suite file and check every case, critic and rubric')
  .argument('<suite-file>', 'Path to the suite YAML file')
  .action((suiteFile: string) => {
    try {
      const suite = loadSuite(suiteFile);

      console.log(`\n${style.success(icons.success)} ${style.bold(suite.name)} is valid`);
      console.log(keyValue('Cases', style.number(String(suite.cases.length)), 1));
      console.log(keyValue('Tools', suite.tools.map(t => t.name).join(', ') || style.dim('none'), 1));

      console.log(subheader('Cases'));
      for (const evalCase of suite.cases) {
        const expected = evalCase.expectedToolCalls.map(c => c.name).join(', ') || style.dim('no calls');
        console.log(bullet(`${style.bold(evalCase.name)} ${style.dim('→')} ${expected}`));
        for (const critic of evalCase.critics) {
          console.log(bullet(style.muted(describeCritic(critic)), 2));
        }
      }
      console.log();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(formatError(
        message,
        error instanceof ValidationError
          ? ['Critic weights must be in (0, 1] and sum to at most 1.0', 'Rubric thresholds need 0 <= fail <= warn <= 1']
          : ['Check that the file exists and is valid YAML']
      ));
      process.exit(1);
    }
  });
