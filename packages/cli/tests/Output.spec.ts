import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createApplyCommand } from '../src/commands/apply';
import { createOutputCommand } from '../src/commands/output';
import { createWorkspace, type TestWorkspace } from './helpers';

describe('CLI: output command', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('should tell the user to apply first', async () => {
    await workspace.run(createOutputCommand);

    expect(workspace.logs()).toEqual(['No outputs found. Run apply first.']);
  });

  describe('after apply', () => {
    beforeEach(async () => {
      await workspace.run(createApplyCommand, ['-y']);
    });

    it('should print every output', async () => {
      const before = workspace.logs().length;

      await workspace.run(createOutputCommand);

      expect(workspace.logs().slice(before)).toEqual(['\nOutputs:\n', 'vpc_id = "vpc-00000001"']);
    });

    it('should print JSON with --json', async () => {
      await workspace.run(createOutputCommand, ['--json']);

      expect(JSON.parse(workspace.logs().at(-1) ?? '')).toEqual({ vpc_id: 'vpc-00000001' });
    });

    it('should print a single output', async () => {
      await workspace.run(createOutputCommand, ['vpc_id']);

      expect(workspace.logs().at(-1)).toBe('"vpc-00000001"');
    });

    it('should fail on an unknown output', async () => {
      await workspace.run(createOutputCommand, ['missing']);

      expect(workspace.errors()).toEqual(['Output "missing" not found.']);
      expect(workspace.exitSpy).toHaveBeenCalledWith(1);
    });
  });
});
