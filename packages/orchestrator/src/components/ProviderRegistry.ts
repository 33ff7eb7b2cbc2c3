import type { CreateResult, IProvider, ISchema, ResolvedAttributes } from '@stratum/contracts';

/** Routes each resource type to the provider that registered it */
export class ProviderRegistry implements IProvider {
  readonly name = 'registry';
  private providers: Map<string, IProvider> = new Map();

  get resources(): string[] {
    return [...this.providers.keys()].sort();
  }

  register(provider: IProvider): void {
    for (const resourceType of provider.resources)
      if (this.providers.has(resourceType)) throw new Error(`Provider for resource type "${resourceType}" already registered`);

    for (const resourceType of provider.resources) this.providers.set(resourceType, provider);
  }

  has(resourceType: string): boolean {
    return this.providers.has(resourceType);
  }

  async getSchema(type: string): Promise<ISchema> {
    return this.get(type).getSchema(type);
  }

  async getSchemas(types: Iterable<string>): Promise<Record<string, ISchema>> {
    const schemas: Record<string, ISchema> = {};
    for (const type of new Set(types)) if (this.has(type)) schemas[type] = await this.getSchema(type);
    return schemas;
  }

  async create(type: string, inputs: ResolvedAttributes): Promise<CreateResult> {
    return this.get(type).create(type, inputs);
  }

  async update(type: string, id: string, inputs: ResolvedAttributes): Promise<ResolvedAttributes> {
    return this.get(type).update(type, id, inputs);
  }

  async delete(type: string, id: string): Promise<void> {
    return this.get(type).delete(type, id);
  }

  private get(type: string): IProvider {
    const provider = this.providers.get(type);
    if (!provider) throw new Error(`No provider registered for resource type "${type}"`);
    return provider;
  }
}
