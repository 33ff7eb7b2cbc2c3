import { configContent, readConfigDirectory } from '@stratum/orchestrator';
import { serializePlan } from '@stratum/planner';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';

import { displayPlan, reportError } from '../display';
import { addVariableOptions, loadVariables, type VariableOptions } from '../variables';
import { openWorkspace, resolvePath } from '../workspace';

interface PlanOptions extends VariableOptions {
  out?: string;
}

/** Exit code of a plan that could not be computed */
const PLAN_ERROR_EXIT_CODE = 2;

export function createPlanCommand(): Command {
  const command = new Command('plan').description('Show changes required by the current configuration').option('-o, --out <file>', 'save the plan to a file');

  return addVariableOptions(command).action(async (options: PlanOptions) => {
    const workspace = openWorkspace();

    try {
      const files = await readConfigDirectory(workspace.root);
      const variables = await loadVariables(options);

      console.log(chalk.blue('Refreshing state...'));
      const { actions } = await workspace.orchestrator.plan(files, variables);

      if (actions.length === 0) console.log(chalk.green('No changes. Your infrastructure matches the configuration.'));
      else displayPlan(actions);

      if (options.out) {
        const planFile = serializePlan(actions, configContent(files), variables);
        await fs.writeFile(resolvePath(options.out), `${JSON.stringify(planFile, null, 2)}\n`, 'utf8');
        console.log(chalk.cyan(`\nPlan saved to ${options.out}. Apply it with: stratum apply ${options.out}`));
      }
    } catch (error) {
      reportError('Planning failed', error);
      process.exit(PLAN_ERROR_EXIT_CODE);
    }
  });
}
