import chalk from 'chalk';
import { Command } from 'commander';

import { confirm, displayPlan, displayResult, reportError } from '../display';
import { addRunOptions, runControl, type RunOptions } from '../run';
import { openWorkspace } from '../workspace';

export function createDestroyCommand(): Command {
  const command = new Command('destroy').description('Destroy every resource recorded in the state');

  return addRunOptions(command).action(async (options: RunOptions) => {
    const workspace = openWorkspace();

    try {
      const actions = await workspace.orchestrator.planDestroy();
      if (actions.length === 0) {
        console.log(chalk.green('No resources to destroy.'));
        return;
      }

      displayPlan(actions);
      if (!(await confirm('Do you really want to destroy all resources?', options.autoApprove))) {
        console.log(chalk.yellow('Destroy cancelled.'));
        return;
      }

      const run = runControl(options);
      try {
        const result = await workspace.orchestrator.destroy({ ...run.options, plan: actions });
        displayResult(result, 'Destroy');
        if (!result.complete) process.exit(1);
      } finally {
        run.release();
      }
    } catch (error) {
      reportError('Destroy failed', error);
      process.exit(1);
    }
  });
}
