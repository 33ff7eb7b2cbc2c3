import { ParseError } from '@stratum/contracts';

import { Token, TokenType } from './tokens';

interface TokenSpec {
  type: TokenType;
  regex: RegExp;
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '"': '"', '\\': '\\' };

export class Lexer {
  private input: string = '';
  private cursor: number = 0;
  private line: number = 1;
  private column: number = 1;

  // Regex rules (Order matters!)
  private specs: TokenSpec[] = [
    { type: TokenType.Resource, regex: /^resource\b/ },
    { type: TokenType.Variable, regex: /^variable\b/ },
    { type: TokenType.Output, regex: /^output\b/ },
    { type: TokenType.Boolean, regex: /^(true|false)\b/ },
    { type: TokenType.Identifier, regex: /^[A-Z_a-z][\w-]*/ },
    { type: TokenType.String, regex: /^"(?:[^"\\\n]|\\.)*"/ },
    { type: TokenType.Number, regex: /^-?\d+(\.\d+)?/ },
    { type: TokenType.LBrace, regex: /^{/ },
    { type: TokenType.RBrace, regex: /^}/ },
    { type: TokenType.LBracket, regex: /^\[/ },
    { type: TokenType.RBracket, regex: /^]/ },
    { type: TokenType.Dot, regex: /^\./ },
    { type: TokenType.Comma, regex: /^,/ },
    { type: TokenType.Assign, regex: /^=/ },
  ];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.cursor = 0;
    this.line = 1;
    this.column = 1;

    while (this.cursor < this.input.length) {
      const remaining = this.input.slice(this.cursor);

      // 1. Skip Whitespace
      const whitespaceMatch = remaining.match(/^\s+/);
      if (whitespaceMatch) {
        this.advance(whitespaceMatch[0]);
        continue;
      }

      // 2. Skip Comments (# or //)
      if (remaining.startsWith('#') || remaining.startsWith('//')) {
        const lineEndIndex = remaining.indexOf('\n');
        if (lineEndIndex === -1) {
          this.advance(remaining);
          break;
        }
        this.advance(remaining.slice(0, lineEndIndex + 1));
        continue;
      }

      // 3. Match Token
      const token = this.matchToken(remaining);
      if (!token) throw new ParseError(`Unexpected character "${remaining[0]}"`, this.line, this.column);

      tokens.push(token.token);
      this.advance(token.text);
    }

    tokens.push({ type: TokenType.EOF, value: '', line: this.line, column: this.column });
    return tokens;
  }

  private matchToken(remaining: string): { token: Token; text: string } | null {
    for (const spec of this.specs) {
      const match = remaining.match(spec.regex);
      if (!match) continue;

      const text = match[0];
      const value = spec.type === TokenType.String ? this.unescape(text.slice(1, -1)) : text;
      return { token: { type: spec.type, value, line: this.line, column: this.column }, text };
    }

    if (remaining.startsWith('"')) throw new ParseError('Unterminated string', this.line, this.column);
    return null;
  }

  private unescape(raw: string): string {
    return raw.replace(/\\(.)/g, (sequence: string, char: string) => {
      const replacement = ESCAPES[char];
      if (replacement === undefined) throw new ParseError(`Unknown escape sequence "${sequence}"`, this.line, this.column);
      return replacement;
    });
  }

  private advance(text: string) {
    for (const char of text)
      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else this.column++;
    this.cursor += text.length;
  }
}
