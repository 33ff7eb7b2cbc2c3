import { ResourceState, StateLockedError } from '@stratum/contracts';
import { beforeEach, describe, expect, it } from 'vitest';

import { MemoryBackend } from '../src/backends/MemoryBackend';
import { IState } from '../src/IState';
import { StateManager } from '../src/StateManager';

function record(name: string, id: string = `id-${name}`): ResourceState {
  return { resourceType: 'aws_subnet', name, id, inputs: { cidr_block: '10.0.1.0/24' }, attributes: { cidr_block: '10.0.1.0/24' }, dependencies: ['aws_vpc.main'] };
}

class FlakyBackend extends MemoryBackend {
  failNext: boolean = true;

  async write(state: IState): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    return super.write(state);
  }
}

describe('StateManager', () => {
  let backend: MemoryBackend;
  let stateManager: StateManager;

  beforeEach(() => {
    backend = new MemoryBackend();
    stateManager = new StateManager(backend);
  });

  it('should load an empty state on first run', async () => {
    const state = await stateManager.load();

    expect(state.serial).toBe(0);
    expect(state.resources).toEqual({});
    expect(backend.writes).toBe(0);
  });

  it('should upsert a record, bump the serial and write through', async () => {
    await stateManager.save(record('a'));
    await stateManager.save(record('a', 'id-replaced'));

    const state = await stateManager.snapshot();
    expect(state.serial).toBe(2);
    expect(state.resources['aws_subnet.a'].id).toBe('id-replaced');
    expect(backend.writes).toBe(2);
    expect((await backend.read()).resources['aws_subnet.a'].id).toBe('id-replaced');
  });

  it('should serialize concurrent saves', async () => {
    const names = Array.from({ length: 20 }, (_, index) => `s${index}`);
    await Promise.all(names.map((name) => stateManager.save(record(name))));

    const state = await stateManager.snapshot();
    expect(Object.keys(state.resources)).toHaveLength(20);
    expect(state.serial).toBe(20);
  });

  it('should return snapshots that do not share structure with the live state', async () => {
    await stateManager.save(record('a'));

    const snapshot = await stateManager.snapshot();
    snapshot.resources['aws_subnet.a'].inputs.cidr_block = 'changed';
    delete snapshot.resources['aws_subnet.a'];

    expect((await stateManager.snapshot()).resources['aws_subnet.a'].inputs.cidr_block).toBe('10.0.1.0/24');
  });

  it('should remove records', async () => {
    await stateManager.save(record('a'));

    expect(await stateManager.remove('aws_subnet.a')).toBe(true);
    expect(await stateManager.remove('aws_subnet.a')).toBe(false);
    expect((await stateManager.snapshot()).resources).toEqual({});
  });

  it('should persist outputs', async () => {
    await stateManager.setOutputs({ vpc_id: 'vpc-1', subnets: ['a', 'b'] });

    expect((await backend.read()).outputs).toEqual({ vpc_id: 'vpc-1', subnets: ['a', 'b'] });
  });

  it('should keep serial and lineage when replacing the whole state', async () => {
    const { lineage } = await stateManager.load();
    await stateManager.save(record('a'));

    await stateManager.write({ version: 1, serial: 0, lineage: 'other', resources: {}, outputs: { x: 1 } });

    const state = await stateManager.snapshot();
    expect(state).toEqual({ version: 1, serial: 2, lineage, resources: {}, outputs: { x: 1 } });
  });

  it('should not advance the state when the backend write fails', async () => {
    const flaky = new FlakyBackend();
    const manager = new StateManager(flaky);

    await expect(manager.save(record('a'))).rejects.toThrow('disk full');
    expect(await manager.snapshot()).toMatchObject({ serial: 0, resources: {} });

    await manager.save(record('b'));
    const state = await manager.snapshot();
    expect(state.serial).toBe(1);
    expect(Object.keys(state.resources)).toEqual(['aws_subnet.b']);
  });

  describe('Locking', () => {
    it('should reject a second writer', async () => {
      await stateManager.lock('apply');
      const other = new StateManager(backend);

      await expect(other.lock('plan')).rejects.toBeInstanceOf(StateLockedError);
      await expect(other.lock('plan')).rejects.toThrow(/State is locked by another process \(lock [\da-f-]+, apply by /);
    });

    it('should refuse to lock twice in the same process', async () => {
      await stateManager.lock('apply');

      await expect(stateManager.lock('apply')).rejects.toThrow('State lock already held by this process for "apply"');
    });

    it('should release the lock after withLock even when the task throws', async () => {
      const task = stateManager.withLock('apply', async () => {
        expect((await backend.getLock())?.operation).toBe('apply');
        throw new Error('boom');
      });

      await expect(task).rejects.toThrow('boom');
      expect(await backend.getLock()).toBeNull();
    });

    it('should return the previous holder on forceUnlock', async () => {
      const info = await new StateManager(backend).lock('destroy');

      expect(await stateManager.forceUnlock()).toEqual(info);
      expect(await backend.getLock()).toBeNull();
    });

    it('should accept unlock even if not locked', async () => {
      await expect(stateManager.unlock()).resolves.toBeUndefined();
    });
  });
});
