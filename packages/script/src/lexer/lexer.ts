import { LexerError } from './lexer-error.js';
import type { SourcePosition, Token } from './token.js';
import { TokenType } from './token-types.js';

const FORBIDDEN_KEYWORDS: Record<string, string> = {
  function: 'Function definitions are not allowed',
  this: "The 'this' keyword is not allowed",
  new: "The 'new' keyword is not allowed",
  for: 'Loops are not allowed',
  while: 'Loops are not allowed',
  do: 'Loops are not allowed',
  if: "Conditional statements are not allowed; use the ternary operator",
  else: "Conditional statements are not allowed; use the ternary operator",
  var: 'Variable declarations are not allowed; assign with name = value',
  let: 'Variable declarations are not allowed; assign with name = value',
  const: 'Variable declarations are not allowed; assign with name = value',
  class: 'Class definitions are not allowed',
  async: 'Async/await is not allowed',
  await: 'Async/await is not allowed',
  yield: 'Generators are not allowed',
  import: 'Import/export is not allowed',
  export: 'Import/export is not allowed',
  return: "The 'return' keyword is not allowed",
  throw: "The 'throw' keyword is not allowed; use abort() or fail()",
  try: 'Exception handling is not allowed',
  catch: 'Exception handling is not allowed',
  delete: "The 'delete' keyword is not allowed",
  typeof: "The 'typeof' keyword is not allowed",
  instanceof: "The 'instanceof' keyword is not allowed",
  void: "The 'void' keyword is not allowed",
  in: "The 'in' keyword is not allowed; use includes()",
};

/**
 * Lexer for script syntax
 *
 * Tokenizes a safe subset of JavaScript. Line breaks separate statements
 * unless they appear inside parentheses, brackets or braces.
 */
export class Lexer {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;
  private depth: number = 0;

  tokenize(input: string): Token[] {
    this.input = input;
    this.position = 0;
    this.line = 1;
    this.column = 0;
    this.depth = 0;

    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipTrivia();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    tokens.push(this.makeToken(TokenType.EOF, ''));
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.position,
    };
  }

  private makeToken(type: TokenType, value: string, startPos?: SourcePosition): Token {
    const start = startPos ?? this.currentPosition();
    const end = this.currentPosition();
    return {
      type,
      value,
      loc: { start, end },
    };
  }

  private error(message: string, position?: SourcePosition): never {
    throw new LexerError(message, this.input, position ?? this.currentPosition());
  }

  /** Skip blanks and comments; newlines only count as blanks inside brackets */
  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\r') {
        this.advance();
      } else if (char === '\n' && this.depth > 0) {
        this.advance();
      } else if (char === '/' && this.peekNext() === '/') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const start = this.currentPosition();
    const char = this.peek();

    if (char === '\n') {
      this.advance();
      return this.makeToken(TokenType.NEWLINE, '\n', start);
    }

    if (char === '"' || char === "'") {
      return this.string(char, start);
    }

    if (this.isDigit(char)) {
      return this.number(start);
    }

    if (this.isAlpha(char)) {
      return this.identifier(start);
    }

    return this.operator(start);
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_' || char === '$';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private string(quote: string, start: SourcePosition): Token {
    this.advance(); // opening quote
    let value = '';

    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) {
          this.error('Unterminated string literal', start);
        }
        const escaped = this.advance();
        switch (escaped) {
          case 'n':
            value += '\n';
            break;
          case 't':
            value += '\t';
            break;
          case 'r':
            value += '\r';
            break;
          default:
            // \\, \', \" and any other escaped character stand for themselves
            value += escaped;
        }
      } else if (this.peek() === '\n') {
        this.error('Unterminated string literal', start);
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      this.error('Unterminated string literal', start);
    }

    this.advance(); // closing quote
    return this.makeToken(TokenType.STRING, value, start);
  }

  private number(start: SourcePosition): Token {
    let value = '';

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      value += this.advance();
    }

    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      value += this.advance();
      while (!this.isAtEnd() && this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    return this.makeToken(TokenType.NUMBER, value, start);
  }

  private identifier(start: SourcePosition): Token {
    let value = '';

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    switch (value) {
      case 'true':
      case 'false':
        return this.makeToken(TokenType.BOOLEAN, value, start);
      case 'null':
        return this.makeToken(TokenType.NULL, value, start);
    }

    if (Object.prototype.hasOwnProperty.call(FORBIDDEN_KEYWORDS, value)) {
      this.error(FORBIDDEN_KEYWORDS[value], start);
    }

    return this.makeToken(TokenType.IDENTIFIER, value, start);
  }

  private rejectCompoundAssignment(operator: string): void {
    if (this.peek() === operator) {
      this.error(operator === '+' ? 'Increment operator (++) is not allowed' : 'Decrement operator (--) is not allowed');
    }
    if (this.peek() === '=') {
      this.error('Compound assignment is not allowed');
    }
  }

  private operator(start: SourcePosition): Token {
    const char = this.advance();

    switch (char) {
      case '(':
        this.depth++;
        return this.makeToken(TokenType.LPAREN, char, start);
      case ')':
        this.depth = Math.max(0, this.depth - 1);
        return this.makeToken(TokenType.RPAREN, char, start);
      case '[':
        this.depth++;
        return this.makeToken(TokenType.LBRACKET, char, start);
      case ']':
        this.depth = Math.max(0, this.depth - 1);
        return this.makeToken(TokenType.RBRACKET, char, start);
      case '{':
        this.depth++;
        return this.makeToken(TokenType.LBRACE, char, start);
      case '}':
        this.depth = Math.max(0, this.depth - 1);
        return this.makeToken(TokenType.RBRACE, char, start);
      case ',':
        return this.makeToken(TokenType.COMMA, char, start);
      case ':':
        return this.makeToken(TokenType.COLON, char, start);
      case ';':
        return this.makeToken(TokenType.SEMICOLON, char, start);
      case '?':
        return this.makeToken(TokenType.QUESTION, char, start);
      case '+':
        this.rejectCompoundAssignment('+');
        return this.makeToken(TokenType.PLUS, char, start);
      case '-':
        this.rejectCompoundAssignment('-');
        return this.makeToken(TokenType.MINUS, char, start);
      case '*':
        if (this.peek() === '=') this.error('Compound assignment is not allowed');
        return this.makeToken(TokenType.STAR, char, start);
      case '/':
        if (this.peek() === '=') this.error('Compound assignment is not allowed');
        return this.makeToken(TokenType.SLASH, char, start);
      case '%':
        if (this.peek() === '=') this.error('Compound assignment is not allowed');
        return this.makeToken(TokenType.PERCENT, char, start);

      case '.':
        if (this.peek() === '.' && this.peekNext() === '.') {
          this.advance();
          this.advance();
          return this.makeToken(TokenType.SPREAD, '...', start);
        }
        return this.makeToken(TokenType.DOT, char, start);

      case '>':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(TokenType.GTE, '>=', start);
        }
        return this.makeToken(TokenType.GT, char, start);

      case '<':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(TokenType.LTE, '<=', start);
        }
        return this.makeToken(TokenType.LT, char, start);

      case '=':
        if (this.peek() === '=' && this.peekNext() === '=') {
          this.advance();
          this.advance();
          return this.makeToken(TokenType.EQ, '===', start);
        }
        if (this.peek() === '=') {
          this.error("Loose equality is not allowed; use '==='", start);
        }
        if (this.peek() === '>') {
          this.error('Arrow functions are not allowed', start);
        }
        return this.makeToken(TokenType.ASSIGN, char, start);

      case '!':
        if (this.peek() === '=' && this.peekNext() === '=') {
          this.advance();
          this.advance();
          return this.makeToken(TokenType.NEQ, '!==', start);
        }
        if (this.peek() === '=') {
          this.error("Loose inequality is not allowed; use '!=='", start);
        }
        return this.makeToken(TokenType.NOT, char, start);

      case '&':
        if (this.peek() === '&') {
          this.advance();
          return this.makeToken(TokenType.AND, '&&', start);
        }
        this.error("Invalid operator '&'. Use '&&' for logical AND", start);

      case '|':
        if (this.peek() === '|') {
          this.advance();
          return this.makeToken(TokenType.OR, '||', start);
        }
        this.error("Invalid operator '|'. Use '||' for logical OR", start);

      default:
        this.error(`Unexpected character '${char}'`, start);
    }
  }
}
