import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createForceUnlockCommand } from '../src/commands/forceUnlock';
import { createWorkspace, exists, type TestWorkspace } from './helpers';

describe('CLI: force-unlock command', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('should report an unlocked state', async () => {
    await workspace.run(createForceUnlockCommand, ['-y']);

    expect(workspace.logs()).toEqual(['State is not locked.']);
  });

  it('should release a stale lock', async () => {
    await fs.mkdir(path.dirname(workspace.lockPath), { recursive: true });
    const lock = { id: 'lock-1', operation: 'apply', who: 'tester@host', created: '2026-01-01T00:00:00.000Z' };
    await fs.writeFile(workspace.lockPath, JSON.stringify(lock), 'utf8');

    await workspace.run(createForceUnlockCommand, ['-y']);

    expect(workspace.logs()).toEqual(['Lock lock-1: apply by tester@host since 2026-01-01T00:00:00.000Z', 'State lock released.']);
    expect(await exists(workspace.lockPath)).toBe(false);
  });
});
