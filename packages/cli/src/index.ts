import { Command } from 'commander';

import { createApplyCommand } from './commands/apply';
import { createDestroyCommand } from './commands/destroy';
import { createForceUnlockCommand } from './commands/forceUnlock';
import { createInitCommand } from './commands/init';
import { createOutputCommand } from './commands/output';
import { createPlanCommand } from './commands/plan';
import { createStateCommand } from './commands/state';
import { createValidateCommand } from './commands/validate';
import { reportError } from './display';

const program = new Command();

program.name('stratum').description('Declarative infrastructure reconciliation').version('1.0.0');

program.addCommand(createInitCommand());
program.addCommand(createValidateCommand());
program.addCommand(createPlanCommand());
program.addCommand(createApplyCommand());
program.addCommand(createDestroyCommand());
program.addCommand(createOutputCommand());
program.addCommand(createStateCommand());
program.addCommand(createForceUnlockCommand());

program.parseAsync().catch((error: unknown) => {
  reportError('Error', error);
  process.exit(1);
});
