import { type LockInfo, StateLockedError, StratumError } from '@stratum/contracts';
import * as fs from 'node:fs/promises';
import path from 'node:path';

import { emptyState, IState } from '../IState';
import { IStateBackend } from '../IStateBackend';
import { lockInfoSchema, parseState } from '../schema';

export const STATE_FILENAME = 'state.json';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/**
 * Local file system backend for state storage.
 * Stores state in a JSON file with locking and backup support.
 */
export class LocalBackend implements IStateBackend {
  private filePath: string;
  private lockFilePath: string;

  constructor(
    private directory: string,
    filename: string = STATE_FILENAME
  ) {
    this.filePath = path.join(directory, filename);
    this.lockFilePath = `${this.filePath}.lock`;
  }

  get statePath(): string {
    return this.filePath;
  }

  async read(): Promise<IState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      // First run: nothing applied yet
      if (errorCode(error) === 'ENOENT') return emptyState();
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new StratumError(`State file ${this.filePath} is not valid JSON`, { cause: error });
    }
    return parseState(data, this.filePath);
  }

  async write(state: IState): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }

    // Write then rename so a crash never leaves a truncated state file
    const temporaryPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(temporaryPath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
    await fs.rename(temporaryPath, this.filePath);
  }

  async lock(info: LockInfo): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    try {
      // 'wx' flag fails if file exists
      await fs.writeFile(this.lockFilePath, JSON.stringify(info, null, 2), { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') throw new StateLockedError((await this.getLock()) ?? undefined);
      throw error;
    }
  }

  async unlock(id: string): Promise<void> {
    const holder = await this.getLock();
    if (holder && holder.id !== id) return;
    await this.removeLockFile();
  }

  async forceUnlock(): Promise<void> {
    await this.removeLockFile();
  }

  async getLock(): Promise<LockInfo | null> {
    let content: string;
    try {
      content = await fs.readFile(this.lockFilePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw error;
    }

    const parsed = lockInfoSchema.safeParse(safeJson(content));
    // A lock file we cannot read is still a lock
    return parsed.success ? parsed.data : { id: 'unknown', operation: 'unknown', who: 'unknown', created: 'unknown' };
  }

  private async removeLockFile(): Promise<void> {
    try {
      await fs.unlink(this.lockFilePath);
    } catch (error) {
      // Already unlocked
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }
}

function safeJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return null;
  }
}
