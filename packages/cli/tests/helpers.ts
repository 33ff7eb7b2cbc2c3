import chalk from 'chalk';
import type { Command } from 'commander';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { type MockInstance, vi } from 'vitest';

export const NETWORK_CONFIG = `
resource "aws_vpc" "main" {
  cidr_block = "10.0.0.0/16"
}

resource "aws_subnet" "public" {
  vpc_id     = aws_vpc.main.id
  cidr_block = "10.0.1.0/24"
}

output "vpc_id" {
  value = aws_vpc.main.id
}
`;

export interface TestWorkspace {
  root: string;
  statePath: string;
  lockPath: string;
  logs: () => string[];
  errors: () => string[];
  exitSpy: MockInstance<Parameters<typeof process.exit>, never>;
  run: (factory: () => Command, args?: string[]) => Promise<void>;
  writeConfig: (content: string, file?: string) => Promise<void>;
  cleanup: () => Promise<void>;
}

/**
 * A temporary project directory that commands see as the working directory,
 * with console output captured and process.exit stubbed.
 */
export async function createWorkspace(config: string = NETWORK_CONFIG): Promise<TestWorkspace> {
  chalk.level = 0;
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'stratum-cli-'));

  vi.spyOn(process, 'cwd').mockReturnValue(root);
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);

  const writeConfig = (content: string, file: string = 'main.stf') => fs.writeFile(path.join(root, file), content, 'utf8');
  await writeConfig(config);

  return {
    root,
    statePath: path.join(root, '.stratum', 'state.json'),
    lockPath: path.join(root, '.stratum', 'state.json.lock'),
    logs: () => logSpy.mock.calls.map((call) => call.join(' ')),
    errors: () => errorSpy.mock.calls.map((call) => call.join(' ')),
    exitSpy,
    run: async (factory, args = []) => {
      await factory().parseAsync(['node', 'stratum', ...args]);
    },
    writeConfig,
    cleanup: async () => {
      vi.restoreAllMocks();
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}

export async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
