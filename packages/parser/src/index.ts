import { ParseError } from '@stratum/contracts';

import type { Assignment, Program } from './ast';
import { Lexer } from './Lexer';
import { Parser } from './Parser';

/** Rethrows parse errors with the name of the file they came from */
function inFile<T>(file: string | undefined, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (file && error instanceof ParseError) throw new ParseError(error.reason, error.line, error.column, file);
    throw error;
  }
}

export function parseConfig(source: string, file?: string): Program {
  return inFile(file, () => new Parser(new Lexer(source).tokenize()).parse());
}

export function parseValuesFile(source: string, file?: string): Assignment[] {
  return inFile(file, () => new Parser(new Lexer(source).tokenize()).parseAssignments());
}

export { renderReference } from './format';
export { Lexer } from './Lexer';
export { Parser } from './Parser';
export { TokenType } from './tokens';
export type { Token } from './tokens';
export type { Assignment, AttributeValue, OutputBlock, Program, ReferenceSegment, ResourceBlock, Statement, VariableBlock } from './ast';
