#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';
import { viewCommand } from './commands/view.js';
import { criticsCommand } from './commands/critics.js';
import { BANNER_MINIMAL, style, welcomeMessage } from './theme.js';

const program = new Command();

program
  .name('tooleval')
  .description(`${BANNER_MINIMAL}\n\nScore LLM tool calls against expected calls.`)
  .version('0.1.0')
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Check a suite file')}
  $ tooleval validate evals/email.yaml

  ${style.dim('# Run it against two models')}
  $ tooleval run evals/email.yaml -m claude-sonnet-4-20250514 claude-3-5-haiku-latest

  ${style.dim('# Show the latest report')}
  $ tooleval view -v
`);

const welcomeCmd = new Command('welcome')
  .description('Show welcome message and quick start guide')
  .action(() => {
    console.log(welcomeMessage());
  });

program.addCommand(runCommand);
program.addCommand(validateCommand);
program.addCommand(viewCommand);
program.addCommand(criticsCommand);
program.addCommand(welcomeCmd);

if (process.argv.length === 2) {
  console.log(welcomeMessage());
  process.exit(0);
}

await program.parseAsync(process.argv);
