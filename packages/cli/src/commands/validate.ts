import { Address } from '@stratum/contracts';
import { readConfigDirectory } from '@stratum/orchestrator';
import chalk from 'chalk';
import { Command } from 'commander';

import { reportError } from '../display';
import { addVariableOptions, loadVariables, type VariableOptions } from '../variables';
import { openWorkspace, resolvePath } from '../workspace';

export function createValidateCommand(): Command {
  const command = new Command('validate').description('Check configuration syntax and resource schemas').argument('[dir]', 'configuration directory', '.');

  return addVariableOptions(command).action(async (dir: string, options: VariableOptions) => {
    const directory = resolvePath(dir);
    console.log(chalk.bold(`\nValidating ${directory}...\n`));

    try {
      const files = await readConfigDirectory(directory);
      const desired = await openWorkspace().orchestrator.validate(files, await loadVariables(options));

      for (const resource of desired.resources) console.log(chalk.green(`  ✓ ${Address.of(resource).toString()}`));
      console.log(chalk.bold.green(`\n✓ Configuration is valid (${desired.resources.length} resources, ${desired.outputs.length} outputs)\n`));
    } catch (error) {
      reportError('✗ Validation failed', error);
      process.exit(1);
    }
  });
}
