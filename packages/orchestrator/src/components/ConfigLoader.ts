import { Address, type DesiredState, type OutputDeclaration, type ResolvedValue, type Resource, SchemaError, type Value, fromLiteral } from '@stratum/contracts';
import { type AttributeValue, parseConfig, type Program, type ResourceBlock } from '@stratum/parser';
import * as fs from 'node:fs/promises';
import path from 'node:path';

import { META_ARGUMENTS } from '../constants';
import { ReferenceResolver } from '../resolvers/ReferenceResolver';
import { VariableDefinition } from '../resolvers/VariableResolver';

export const CONFIG_EXTENSION = '.stf';

export interface ConfigFile {
  path?: string;
  content: string;
}

/** Configuration text, or several files that together form one configuration */
export type ConfigSource = string | ConfigFile[];

export type VariableValues = Record<string, ResolvedValue>;

const VARIABLE_ATTRIBUTES = new Set(['default', 'description']);

export function toConfigFiles(source: ConfigSource): ConfigFile[] {
  return typeof source === 'string' ? [{ content: source }] : source;
}

/** Concatenated file contents, the input of a plan file's configuration hash */
export function configContent(source: ConfigSource): string {
  return toConfigFiles(source)
    .map((file) => file.content)
    .join('\n');
}

/** Reads every configuration file of a directory, in name order */
export async function readConfigDirectory(directory: string): Promise<ConfigFile[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(CONFIG_EXTENSION))
    .map((entry) => entry.name)
    .sort();
  if (names.length === 0) throw new Error(`No ${CONFIG_EXTENSION} configuration files found in ${directory}`);

  return Promise.all(names.map(async (name) => ({ path: name, content: await fs.readFile(path.join(directory, name), 'utf8') })));
}

/** Value without references, or undefined */
function literalOf(value: AttributeValue): Value | undefined {
  switch (value.type) {
    case 'Reference': {
      return undefined;
    }
    case 'List': {
      const items: Value[] = [];
      for (const item of value.value) {
        const literal = literalOf(item);
        if (!literal) return undefined;
        items.push(literal);
      }
      return { type: 'List', value: items };
    }
    case 'Map': {
      const entries: Record<string, Value> = {};
      for (const [key, item] of Object.entries(value.value)) {
        const literal = literalOf(item);
        if (!literal) return undefined;
        entries[key] = literal;
      }
      return { type: 'Map', value: entries };
    }
    default: {
      return value;
    }
  }
}

/**
 * Builds the desired state from parsed configuration: variables get their
 * values, counted resources are expanded into one resource per instance and
 * references become typed. Nothing past this point sees variables or count.
 */
export class ConfigLoader {
  load(source: ConfigSource, values: VariableValues = {}): DesiredState {
    const program: Program = [];
    for (const file of toConfigFiles(source)) program.push(...parseConfig(file.content, file.path));
    return this.loadProgram(program, values);
  }

  loadProgram(program: Program, values: VariableValues = {}): DesiredState {
    const variables = this.collectVariables(program, values);
    const blocks = program.filter((statement): statement is ResourceBlock => statement.type === 'Resource');
    for (const block of blocks)
      if (block.resourceType.includes('.') || block.name.includes('.'))
        throw new SchemaError(`${block.resourceType}.${block.name}`, ['Resource type and name must not contain "."']);

    const resolver = new ReferenceResolver(variables, this.collectCounts(blocks, new ReferenceResolver(variables)));

    const resources: Resource[] = [];
    const seen = new Set<string>();
    for (const block of blocks)
      for (const resource of this.expand(block, resolver)) {
        const address = Address.of(resource).toString();
        if (seen.has(address)) throw new SchemaError(address, [`Resource "${address}" is declared more than once`]);
        seen.add(address);
        resources.push(resource);
      }

    const outputs: OutputDeclaration[] = [];
    for (const statement of program) {
      if (statement.type !== 'Output') continue;
      if (outputs.some((output) => output.name === statement.name)) throw new SchemaError(undefined, [`Output "${statement.name}" is declared more than once`]);
      outputs.push({ name: statement.name, value: resolver.convert(statement.value, { address: `output.${statement.name}` }) });
    }

    return { resources, outputs };
  }

  private collectVariables(program: Program, values: VariableValues): Map<string, VariableDefinition> {
    const variables = new Map<string, VariableDefinition>();

    for (const statement of program) {
      if (statement.type !== 'Variable') continue;
      if (variables.has(statement.name)) throw new SchemaError(undefined, [`Variable "${statement.name}" is declared more than once`]);

      for (const key of Object.keys(statement.attributes))
        if (!VARIABLE_ATTRIBUTES.has(key)) throw new SchemaError(undefined, [`Variable "${statement.name}": unknown attribute "${key}"`]);

      const definition: VariableDefinition = {};
      const { default: defaultValue, description } = statement.attributes;
      if (defaultValue) {
        definition.value = literalOf(defaultValue);
        if (!definition.value) throw new SchemaError(undefined, [`Variable "${statement.name}": default values cannot contain references`]);
      }
      if (description?.type === 'String') definition.description = description.value;

      const override = values[statement.name];
      if (override !== undefined) definition.value = fromLiteral(override);

      variables.set(statement.name, definition);
    }

    return variables;
  }

  private collectCounts(blocks: ResourceBlock[], resolver: ReferenceResolver): Map<string, number> {
    const counts = new Map<string, number>();

    for (const block of blocks) {
      const countValue: AttributeValue | undefined = block.attributes.count;
      if (!countValue) continue;

      const address = `${block.resourceType}.${block.name}`;
      const count = resolver.convert(countValue, { address });
      if (count.type !== 'Number' || !Number.isInteger(count.value) || count.value < 0) throw new SchemaError(address, ['"count" must be a non-negative integer']);
      counts.set(address, count.value);
    }

    return counts;
  }

  private expand(block: ResourceBlock, resolver: ReferenceResolver): Resource[] {
    const base = `${block.resourceType}.${block.name}`;
    const count = block.attributes.count ? resolver.convert(block.attributes.count, { address: base }) : undefined;

    if (count?.type !== 'Number') return [this.instance(block, block.name, undefined, resolver)];
    return Array.from({ length: count.value }, (_, index) => this.instance(block, `${block.name}[${index}]`, index, resolver));
  }

  private instance(block: ResourceBlock, name: string, countIndex: number | undefined, resolver: ReferenceResolver): Resource {
    const context = { address: `${block.resourceType}.${name}`, countIndex };
    const attributes: Record<string, Value> = {};

    for (const [key, value] of Object.entries(block.attributes)) {
      if (META_ARGUMENTS.some((meta) => meta === key)) continue;
      attributes[key] = resolver.convert(value, context);
    }

    return { resourceType: block.resourceType, name, attributes, dependsOn: this.dependsOn(block, context, resolver) };
  }

  private dependsOn(block: ResourceBlock, context: { address: string; countIndex?: number }, resolver: ReferenceResolver): Address[] {
    const declared: AttributeValue | undefined = block.attributes.depends_on;
    if (!declared) return [];

    if (declared.type !== 'List') throw new SchemaError(context.address, ['"depends_on" must be a list of resource addresses']);

    const addresses: Address[] = [];
    for (const item of declared.value) {
      if (item.type !== 'Reference') throw new SchemaError(context.address, ['"depends_on" must be a list of resource addresses']);
      addresses.push(...resolver.addresses(item.value, context));
    }
    return addresses;
  }
}
