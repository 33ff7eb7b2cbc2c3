import { ParseError, type ResolvedValue, StratumError } from '@stratum/contracts';
import type { VariableValues } from '@stratum/orchestrator';
import { type AttributeValue, parseValuesFile } from '@stratum/parser';
import { type Command, Option } from 'commander';
import fs from 'node:fs/promises';

import { resolvePath } from './workspace';

export interface VariableOptions {
  var: string[];
  varFile: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function addVariableOptions(command: Command): Command {
  return command
    .addOption(new Option('--var <name=value>', 'set a variable (repeatable)').argParser(collect).default([]))
    .addOption(new Option('--var-file <file>', 'read variables from a values file (repeatable)').argParser(collect).default([]));
}

/** Plain value of a literal, or undefined when it contains a reference */
function literalValue(value: AttributeValue): ResolvedValue | undefined {
  switch (value.type) {
    case 'Reference': {
      return undefined;
    }
    case 'List': {
      const items: ResolvedValue[] = [];
      for (const item of value.value) {
        const literal = literalValue(item);
        if (literal === undefined) return undefined;
        items.push(literal);
      }
      return items;
    }
    case 'Map': {
      const entries: Record<string, ResolvedValue> = {};
      for (const [key, item] of Object.entries(value.value)) {
        const literal = literalValue(item);
        if (literal === undefined) return undefined;
        entries[key] = literal;
      }
      return entries;
    }
    default: {
      return value.value;
    }
  }
}

/**
 * `name=value`. The value is read like a values file entry when it is a
 * literal (`3`, `true`, `["a", "b"]`, `"quoted"`) and taken as a string otherwise.
 */
export function parseVarFlag(flag: string): [string, ResolvedValue] {
  const separator = flag.indexOf('=');
  if (separator <= 0) throw new StratumError(`Invalid --var "${flag}": expected name=value`);

  const raw = flag.slice(separator + 1);
  return [flag.slice(0, separator), parseLiteral(raw) ?? raw];
}

function parseLiteral(raw: string): ResolvedValue | undefined {
  try {
    const assignments = parseValuesFile(`value = ${raw}`);
    return assignments.length === 1 ? literalValue(assignments[0].value) : undefined;
  } catch (error) {
    if (error instanceof ParseError) return undefined;
    throw error;
  }
}

export async function readValuesFile(file: string): Promise<VariableValues> {
  const values: VariableValues = {};

  for (const assignment of parseValuesFile(await fs.readFile(resolvePath(file), 'utf8'), file)) {
    const value = literalValue(assignment.value);
    if (value === undefined) throw new StratumError(`${file}: line ${assignment.line}: "${assignment.name}" must be a literal value`);
    values[assignment.name] = value;
  }

  return values;
}

/** Values files in the order given, then --var flags; later sources win */
export async function loadVariables(options: VariableOptions): Promise<VariableValues> {
  let values: VariableValues = {};
  for (const file of options.varFile) values = { ...values, ...(await readValuesFile(file)) };
  for (const flag of options.var) {
    const [name, value] = parseVarFlag(flag);
    values[name] = value;
  }
  return values;
}
