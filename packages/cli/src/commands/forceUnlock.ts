import chalk from 'chalk';
import { Command } from 'commander';

import { confirm, reportError } from '../display';
import { openWorkspace } from '../workspace';

export function createForceUnlockCommand(): Command {
  return new Command('force-unlock')
    .description('Release a state lock left behind by an interrupted run')
    .option('-y, --auto-approve', 'skip interactive approval', false)
    .action(async (options: { autoApprove: boolean }) => {
      try {
        const { backend, stateManager } = openWorkspace();
        const holder = await backend.getLock();
        if (!holder) {
          console.log(chalk.green('State is not locked.'));
          return;
        }

        console.log(`Lock ${holder.id}: ${holder.operation} by ${holder.who} since ${holder.created}`);
        if (!(await confirm('Release this lock? Only do this if no other run is in progress.', options.autoApprove))) {
          console.log(chalk.yellow('Force-unlock cancelled.'));
          return;
        }

        await stateManager.forceUnlock();
        console.log(chalk.green('State lock released.'));
      } catch (error) {
        reportError('Failed to release lock', error);
        process.exit(1);
      }
    });
}
