import { type CreateResult, type IResourceHandler, type ISchema, ProviderError, type ResolvedAttributes, type ResolvedValue } from '@stratum/contracts';

import type { CloudData, CloudObject, CloudStore } from '../CloudStore';
import { type KindDefinition, schemaOf } from '../kinds';

function namesOf(value: ResolvedValue | undefined): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  return [];
}

function render(template: string, id: string, sequence: number, inputs: ResolvedAttributes): string {
  return template.replace(/{(\w+)}/g, (placeholder: string, key: string) => {
    if (key === 'id') return id;
    if (key === 'octet') return String((sequence % 254) + 1);

    const value = inputs[key];
    return typeof value === 'string' || typeof value === 'number' ? String(value) : placeholder;
  });
}

/**
 * One simulated resource type. Objects live in the shared store, and a
 * reference to another object must name one that exists, the way a cloud API
 * rejects a subnet in a VPC it does not know.
 */
export class SimulatedResource implements IResourceHandler {
  constructor(
    private resourceType: string,
    private kind: KindDefinition,
    private store: CloudStore
  ) {}

  getSchema(): ISchema {
    return schemaOf(this.kind);
  }

  async create(inputs: ResolvedAttributes): Promise<CreateResult> {
    return this.store.transaction((data) => {
      this.checkReferences(data, inputs);

      data.sequence++;
      const id = `${this.kind.idPrefix}-${data.sequence.toString(16).padStart(8, '0')}`;

      const attributes: ResolvedAttributes = { ...inputs };
      for (const [name, definition] of Object.entries(this.kind.attributes))
        if (definition.computed && definition.template) attributes[name] = render(definition.template, id, data.sequence, inputs);

      data.objects[id] = { id, resourceType: this.resourceType, attributes };
      return { id, attributes };
    });
  }

  async update(id: string, inputs: ResolvedAttributes): Promise<ResolvedAttributes> {
    return this.store.transaction((data) => {
      const existing = this.find(data, id);
      this.checkReferences(data, inputs);

      const attributes: ResolvedAttributes = { ...inputs };
      for (const [name, definition] of Object.entries(this.kind.attributes)) {
        const current = existing.attributes[name];
        if (definition.computed && current !== undefined) attributes[name] = current;
      }

      existing.attributes = attributes;
      return attributes;
    });
  }

  async delete(id: string): Promise<void> {
    await this.store.transaction((data) => {
      const existing = this.find(data, id);
      const handles = [existing.id, existing.attributes.arn].filter((handle): handle is string => typeof handle === 'string');

      for (const other of Object.values(data.objects)) {
        if (other.id === id) continue;
        const users = Object.values(other.attributes).flatMap((value) => namesOf(value));
        if (users.some((name) => handles.includes(name)))
          throw new ProviderError(`${this.resourceType} ${id} is still in use by ${other.resourceType} ${other.id}`, false, 'DependencyViolation');
      }

      delete data.objects[id];
    });
  }

  private find(data: CloudData, id: string): CloudObject {
    const existing = data.objects[id];
    if (!existing || existing.resourceType !== this.resourceType) throw new ProviderError(`${this.resourceType} ${id} does not exist`, false, 'NotFound');
    return existing;
  }

  private checkReferences(data: CloudData, inputs: ResolvedAttributes): void {
    for (const [name, definition] of Object.entries(this.kind.attributes)) {
      const target = definition.references;
      if (!target) continue;

      for (const handle of namesOf(inputs[name])) {
        const found = Object.values(data.objects).some((object) => object.resourceType === target && (object.id === handle || object.attributes.arn === handle));
        if (!found) throw new ProviderError(`${this.resourceType}.${name}: ${target} "${handle}" does not exist`, false, 'InvalidReference');
      }
    }
  }
}
