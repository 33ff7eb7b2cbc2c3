import { type ResolvedAttributes, type ResolvedValue, StratumError } from '@stratum/contracts';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

export interface CloudObject {
  id: string;
  resourceType: string;
  attributes: ResolvedAttributes;
}

export interface CloudData {
  sequence: number;
  objects: Record<string, CloudObject>;
}

const resolvedValueSchema: z.ZodType<ResolvedValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(resolvedValueSchema), z.record(resolvedValueSchema)])
);

const cloudDataSchema = z.object({
  sequence: z.number().int().nonnegative(),
  objects: z.record(
    z.object({
      id: z.string(),
      resourceType: z.string(),
      attributes: z.record(resolvedValueSchema),
    })
  ),
});

/**
 * Holds the simulated cloud's objects, in memory or in a JSON file.
 * Transactions run one at a time, so concurrent provider calls see each other's writes.
 */
export class CloudStore {
  private data: CloudData = { sequence: 0, objects: {} };
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private file?: string) {}

  async transaction<T>(task: (data: CloudData) => T | Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const data = await this.read();
      const result = await task(data);
      await this.write(data);
      return result;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  async list(): Promise<CloudObject[]> {
    return this.transaction((data) => Object.values(data.objects).sort((a, b) => a.id.localeCompare(b.id)));
  }

  private async read(): Promise<CloudData> {
    if (!this.file) return structuredClone(this.data);

    let content: string;
    try {
      content = await fs.readFile(this.file, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return { sequence: 0, objects: {} };
      throw error;
    }

    const result = cloudDataSchema.safeParse(JSON.parse(content));
    if (!result.success) throw new StratumError(`Invalid simulated cloud file ${this.file}: ${result.error.issues.map((issue) => issue.message).join('; ')}`);
    return result.data;
  }

  private async write(data: CloudData): Promise<void> {
    if (!this.file) {
      this.data = data;
      return;
    }

    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, JSON.stringify(data, null, 2), 'utf8');
  }
}
