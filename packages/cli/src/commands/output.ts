import chalk from 'chalk';
import { Command } from 'commander';

import { displayOutputs, reportError } from '../display';
import { openWorkspace } from '../workspace';

export function createOutputCommand(): Command {
  return new Command('output')
    .description('Show output values from the state')
    .argument('[name]', 'a single output')
    .option('--json', 'print as JSON', false)
    .action(async (name: string | undefined, options: { json: boolean }) => {
      try {
        const outputs = await openWorkspace().orchestrator.outputs();

        if (name !== undefined) {
          if (!(name in outputs)) {
            console.error(chalk.red(`Output "${name}" not found.`));
            process.exit(1);
            return;
          }
          console.log(JSON.stringify(outputs[name], null, options.json ? 2 : undefined));
          return;
        }

        if (options.json) console.log(JSON.stringify(outputs, null, 2));
        else if (Object.keys(outputs).length === 0) console.log(chalk.yellow('No outputs found. Run apply first.'));
        else displayOutputs(outputs);
      } catch (error) {
        reportError('Failed to read outputs', error);
        process.exit(1);
      }
    });
}
