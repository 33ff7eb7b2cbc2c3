import { Orchestrator } from '@stratum/orchestrator';
import { SimulatedCloudProvider } from '@stratum/provider-sim';
import { LocalBackend, StateManager } from '@stratum/state';
import path from 'node:path';

/** Per-project directory holding state, its lock and backup, and the simulated cloud */
export const WORKSPACE_DIR = '.stratum';
export const CLOUD_FILENAME = 'cloud.json';

export interface Workspace {
  root: string;
  directory: string;
  backend: LocalBackend;
  stateManager: StateManager;
  orchestrator: Orchestrator;
}

export function openWorkspace(root: string = process.cwd()): Workspace {
  const directory = path.join(root, WORKSPACE_DIR);
  const backend = new LocalBackend(directory);
  const stateManager = new StateManager(backend);

  const orchestrator = new Orchestrator(stateManager);
  orchestrator.registerProvider(new SimulatedCloudProvider({ file: path.join(directory, CLOUD_FILENAME) }));

  return { root, directory, backend, stateManager, orchestrator };
}

/** Resolves a path given on the command line against the working directory */
export function resolvePath(file: string): string {
  return path.resolve(process.cwd(), file);
}
