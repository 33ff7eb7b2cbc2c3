import { StratumError } from '@stratum/contracts';
import { configContent, readConfigDirectory, type VariableValues } from '@stratum/orchestrator';
import { hashConfig, parsePlanFile, type PlanAction } from '@stratum/planner';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';

import { confirm, displayPlan, displayResult, reportError } from '../display';
import { addRunOptions, runControl, type RunOptions } from '../run';
import { addVariableOptions, loadVariables, type VariableOptions } from '../variables';
import { openWorkspace, resolvePath } from '../workspace';

type ApplyCommandOptions = RunOptions & VariableOptions;

export function createApplyCommand(): Command {
  const command = new Command('apply').description('Create, update or destroy infrastructure to match the configuration').argument('[plan-file]', 'saved plan to apply');

  return addVariableOptions(addRunOptions(command)).action(async (planPath: string | undefined, options: ApplyCommandOptions) => {
    const workspace = openWorkspace();

    try {
      const files = await readConfigDirectory(workspace.root);
      let variables: VariableValues;
      let saved: PlanAction[] | undefined;

      if (planPath) {
        const planFile = parsePlanFile(JSON.parse(await fs.readFile(resolvePath(planPath), 'utf8')));
        if (planFile.config_hash !== hashConfig(configContent(files)))
          throw new StratumError(`Saved plan ${planPath} was created for a different configuration. Run plan again.`);

        console.log(chalk.blue(`Applying saved plan from ${planPath}`));
        variables = planFile.variables;
        saved = planFile.actions;
        if (saved.length > 0) displayPlan(saved);
      } else {
        variables = await loadVariables(options);
        const { actions } = await workspace.orchestrator.plan(files, variables);

        if (actions.length === 0) {
          console.log(chalk.green('No changes. Your infrastructure matches the configuration.'));
          return;
        }

        displayPlan(actions);
        if (!(await confirm('Do you want to perform these actions?', options.autoApprove))) {
          console.log(chalk.yellow('Apply cancelled.'));
          return;
        }
        saved = actions;
      }

      const run = runControl(options);
      try {
        const result = await workspace.orchestrator.apply(files, variables, { ...run.options, plan: saved });
        displayResult(result, 'Apply');
        if (!result.complete) process.exit(1);
      } finally {
        run.release();
      }
    } catch (error) {
      reportError('Apply failed', error);
      process.exit(1);
    }
  });
}
