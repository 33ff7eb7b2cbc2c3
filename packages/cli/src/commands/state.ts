import { Address } from '@stratum/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { reportError } from '../display';
import { openWorkspace } from '../workspace';

function createListCommand(): Command {
  return new Command('list').description('List resources in the state').action(async () => {
    try {
      const state = await openWorkspace().stateManager.load();
      const addresses = Object.keys(state.resources).sort(Address.compareKeys);

      if (addresses.length === 0) {
        console.log(chalk.yellow('No resources in state.'));
        return;
      }
      for (const address of addresses) console.log(address);
    } catch (error) {
      reportError('Failed to read state', error);
      process.exit(1);
    }
  });
}

function createShowCommand(): Command {
  return new Command('show')
    .description('Show the attributes of one resource')
    .argument('<address>', 'resource address, e.g. aws_vpc.main')
    .action(async (address: string) => {
      try {
        const state = await openWorkspace().stateManager.load();
        const record = state.resources[address];
        if (!record) {
          console.error(chalk.red(`Resource "${address}" not found in state.`));
          process.exit(1);
          return;
        }

        console.log(chalk.bold(`# ${address}:`));
        console.log(`id = ${JSON.stringify(record.id)}`);
        for (const key of Object.keys(record.attributes).sort()) console.log(`${key} = ${JSON.stringify(record.attributes[key])}`);
        if (record.dependencies.length > 0) console.log(chalk.gray(`depends on: ${record.dependencies.join(', ')}`));
      } catch (error) {
        reportError('Failed to read state', error);
        process.exit(1);
      }
    });
}

function createRemoveCommand(): Command {
  return new Command('rm')
    .description('Forget a resource without destroying it')
    .argument('<address>', 'resource address, e.g. aws_vpc.main')
    .action(async (address: string) => {
      try {
        const { stateManager } = openWorkspace();
        const removed = await stateManager.withLock('state rm', () => stateManager.remove(address));
        if (!removed) {
          console.error(chalk.red(`Resource "${address}" not found in state.`));
          process.exit(1);
          return;
        }
        console.log(chalk.green(`Removed ${address} from state.`));
      } catch (error) {
        reportError('Failed to update state', error);
        process.exit(1);
      }
    });
}

export function createStateCommand(): Command {
  return new Command('state')
    .description('Inspect and edit the state')
    .addCommand(createListCommand())
    .addCommand(createShowCommand())
    .addCommand(createRemoveCommand());
}
