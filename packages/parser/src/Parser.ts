import { ParseError } from '@stratum/contracts';

import { Assignment, AttributeValue, OutputBlock, Program, ReferenceSegment, ResourceBlock, Statement, VariableBlock } from './ast';
import { NAME_TOKENS, Token, TokenType } from './tokens';

export class Parser {
  private tokens: Token[];
  private current: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  public parse(): Program {
    const program: Program = [];
    while (!this.isAtEnd()) program.push(this.parseStatement());
    return program;
  }

  /** Parses a values file: a flat list of `name = value` lines */
  public parseAssignments(): Assignment[] {
    const assignments: Assignment[] = [];
    while (!this.isAtEnd()) {
      const nameToken = this.consumeName('Expect variable name.');
      this.consume(TokenType.Assign, "Expect '=' after variable name.");
      assignments.push({ name: nameToken.value, value: this.parseValue(), line: nameToken.line });
    }
    return assignments;
  }

  private statementParsers: Partial<Record<TokenType, () => Statement>> = {
    [TokenType.Resource]: this.parseResource.bind(this),
    [TokenType.Variable]: this.parseVariable.bind(this),
    [TokenType.Output]: this.parseOutput.bind(this),
  };

  private parseStatement(): Statement {
    const handler = this.statementParsers[this.peek().type];
    if (!handler) return this.error(`Unexpected token: ${this.peek().value}`);

    this.advance();
    return handler();
  }

  private parseResource(): ResourceBlock {
    // resource "type" "name" { ... }
    const line = this.previous().line;
    const typeToken = this.consume(TokenType.String, "Expect resource type string after 'resource'.");
    const nameToken = this.consume(TokenType.String, 'Expect resource name string after resource type.');

    return {
      type: 'Resource',
      resourceType: typeToken.value,
      name: nameToken.value,
      attributes: this.parseBody(),
      line,
    };
  }

  private parseVariable(): VariableBlock {
    // variable "name" { ... }
    const line = this.previous().line;
    const nameToken = this.consume(TokenType.String, "Expect variable name string after 'variable'.");

    return {
      type: 'Variable',
      name: nameToken.value,
      attributes: this.parseBody(),
      line,
    };
  }

  private parseOutput(): OutputBlock {
    // output "name" { value = ... }
    const line = this.previous().line;
    const nameToken = this.consume(TokenType.String, "Expect output name string after 'output'.");
    const attributes = this.parseBody();

    const value = attributes.value;
    if (!value) return this.error(`Output "${nameToken.value}" requires a "value" attribute.`);

    return {
      type: 'Output',
      name: nameToken.value,
      value,
      line,
    };
  }

  /**
   * Block body: `key = value` pairs and nested blocks.
   * Repeated nested blocks (`ingress { ... }`) collect into a list of maps.
   */
  private parseBody(): Record<string, AttributeValue> {
    this.consume(TokenType.LBrace, "Expect '{' to open block.");

    const attributes: Record<string, AttributeValue> = {};
    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      const key = this.consumeName('Expect attribute name.').value;

      if (this.check(TokenType.LBrace)) {
        this.appendNestedBlock(attributes, key);
        continue;
      }

      this.consume(TokenType.Assign, "Expect '=' after attribute name.");
      if (key in attributes) return this.error(`Duplicate attribute "${key}".`);
      attributes[key] = this.parseValue();
      this.matchToken(TokenType.Comma);
    }

    this.consume(TokenType.RBrace, "Expect '}' after block body.");
    return attributes;
  }

  private appendNestedBlock(attributes: Record<string, AttributeValue>, key: string): void {
    const block: AttributeValue = { type: 'Map', value: this.parseBody() };
    const existing = attributes[key];

    if (!existing) attributes[key] = { type: 'List', value: [block] };
    else if (existing.type === 'List') existing.value.push(block);
    else this.error(`Attribute "${key}" cannot be both an attribute and a nested block.`);
  }

  private parseValue(): AttributeValue {
    if (this.matchToken(TokenType.String)) return { type: 'String', value: this.previous().value };
    if (this.matchToken(TokenType.Number)) return { type: 'Number', value: Number(this.previous().value) };
    if (this.matchToken(TokenType.Boolean)) return { type: 'Boolean', value: this.previous().value === 'true' };
    if (this.matchToken(TokenType.LBracket)) return this.parseList();
    if (this.matchToken(TokenType.LBrace)) return this.parseMap();

    // Reference Parsing: identifier.key[index].subkey
    if (this.checkName()) {
      const segments: ReferenceSegment[] = [this.parseSegment()];

      while (this.matchToken(TokenType.Dot)) {
        if (!this.checkName()) return this.error('Expect property name after dot.');
        segments.push(this.parseSegment());
      }

      return { type: 'Reference', value: segments };
    }

    return this.error(`Unexpected value: ${this.peek().value || this.peek().type}`);
  }

  private parseSegment(): ReferenceSegment {
    const name = this.advance().value;
    if (!this.matchToken(TokenType.LBracket)) return { name };

    const index = this.parseValue();
    this.consume(TokenType.RBracket, "Expect ']' after index.");
    return { name, index };
  }

  private parseList(): AttributeValue {
    const items: AttributeValue[] = [];
    while (!this.check(TokenType.RBracket) && !this.isAtEnd()) {
      items.push(this.parseValue());
      if (!this.matchToken(TokenType.Comma)) break;
    }
    this.consume(TokenType.RBracket, "Expect ']' after list items.");
    return { type: 'List', value: items };
  }

  private parseMap(): AttributeValue {
    const entries: Record<string, AttributeValue> = {};
    while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
      const key = this.checkName() || this.check(TokenType.String) ? this.advance().value : this.error('Expect map key.');
      this.consume(TokenType.Assign, "Expect '=' after map key.");
      entries[key] = this.parseValue();
      this.matchToken(TokenType.Comma);
    }
    this.consume(TokenType.RBrace, "Expect '}' after map entries.");
    return { type: 'Map', value: entries };
  }

  private matchToken(...types: TokenType[]): boolean {
    for (const type of types)
      if (this.check(type)) {
        this.advance();
        return true;
      }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    return this.error(message);
  }

  private consumeName(message: string): Token {
    if (this.checkName()) return this.advance();
    return this.error(message);
  }

  private error(message: string): never {
    const token = this.peek();
    throw new ParseError(message, token.line, token.column);
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private checkName(): boolean {
    return !this.isAtEnd() && NAME_TOKENS.has(this.peek().type);
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current] ?? this.tokens[this.tokens.length - 1];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}
