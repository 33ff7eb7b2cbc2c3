export enum TokenType {
  Resource = 'RESOURCE', // 'resource' keyword
  Variable = 'VARIABLE', // 'variable' keyword
  Output = 'OUTPUT', // 'output' keyword
  Identifier = 'IDENTIFIER', // Attribute names, reference segments
  String = 'STRING', // "value"
  Number = 'NUMBER', // 123, -1.5
  Boolean = 'BOOLEAN', // true, false
  LBrace = 'LBRACE', // {
  RBrace = 'RBRACE', // }
  LBracket = 'LBRACKET', // [
  RBracket = 'RBRACKET', // ]
  Assign = 'ASSIGN', // =
  Dot = 'DOT', // . (for references)
  Comma = 'COMMA', // ,
  EOF = 'EOF', // End of File
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

/** Keywords that may still appear as plain names inside blocks and references */
export const NAME_TOKENS: ReadonlySet<TokenType> = new Set([TokenType.Identifier, TokenType.Resource, TokenType.Variable, TokenType.Output]);
