import { emptyState } from '@stratum/state';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs/promises';

import { reportError } from '../display';
import { openWorkspace } from '../workspace';

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export function createInitCommand(): Command {
  return new Command('init').description('Initialize a new Stratum workspace').action(async () => {
    const workspace = openWorkspace();
    console.log(chalk.blue('Initializing Stratum workspace...'));

    try {
      if (await exists(workspace.backend.statePath)) {
        console.log(chalk.yellow(`Workspace already initialized: ${workspace.backend.statePath}`));
        return;
      }

      await fs.mkdir(workspace.directory, { recursive: true });
      console.log(chalk.green(`✓ Created ${workspace.directory}`));

      await workspace.stateManager.write(emptyState());
      console.log(chalk.green(`✓ Initialized ${workspace.backend.statePath}`));

      console.log(chalk.bold.green('\nStratum initialized successfully!'));
    } catch (error) {
      reportError('Failed to initialize workspace', error);
      process.exit(1);
    }
  });
}
