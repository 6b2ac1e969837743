import { Lexer } from '../lexer/lexer.js';
import type { SourceLocation, Token } from '../lexer/token.js';
import { TokenType } from '../lexer/token-types.js';
import type {
  ArrayExpression,
  AssignmentStatement,
  BinaryOperator,
  CallExpression,
  Expression,
  ExpressionStatement,
  Identifier,
  Literal,
  ObjectExpression,
  Program,
  Property,
  SpreadElement,
  Statement,
} from './ast.js';
import { ParserError } from './parser-error.js';

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
  [TokenType.PLUS]: '+',
  [TokenType.MINUS]: '-',
  [TokenType.STAR]: '*',
  [TokenType.SLASH]: '/',
  [TokenType.PERCENT]: '%',
  [TokenType.EQ]: '===',
  [TokenType.NEQ]: '!==',
  [TokenType.GT]: '>',
  [TokenType.GTE]: '>=',
  [TokenType.LT]: '<',
  [TokenType.LTE]: '<=',
};

/**
 * Recursive descent parser for script syntax
 *
 * A script is a list of statements separated by newlines or semicolons.
 * A statement is either `name = expression` or a bare expression.
 *
 * Operator precedence (lowest to highest):
 * 1. Ternary (?:)
 * 2. Logical OR (||)
 * 3. Logical AND (&&)
 * 4. Equality (===, !==)
 * 5. Comparison (>, >=, <, <=)
 * 6. Additive (+, -)
 * 7. Multiplicative (*, /, %)
 * 8. Unary (!, -)
 * 9. Member access (., []) and calls (())
 * 10. Primary (literals, identifiers, grouping)
 */
export class Parser {
  private tokens: Token[] = [];
  private current: number = 0;
  private input: string = '';

  parse(input: string): Program {
    this.input = input;
    this.tokens = new Lexer().tokenize(input);
    this.current = 0;

    const body: Statement[] = [];
    this.skipSeparators();
    const first = this.peek();

    while (!this.isAtEnd()) {
      body.push(this.statement());

      if (!this.isAtEnd() && !this.check(TokenType.SEMICOLON) && !this.check(TokenType.NEWLINE)) {
        throw this.error(`Unexpected token '${this.peek().value}'`);
      }
      this.skipSeparators();
    }

    return {
      type: 'Program',
      body,
      loc: body.length > 0 ? this.makeLoc(first, this.previous()) : null,
    };
  }

  // Token navigation

  private peek(): Token {
    return this.tokens[this.current];
  }

  private peekNext(): Token {
    return this.tokens[Math.min(this.current + 1, this.tokens.length - 1)];
  }

  private previous(): Token {
    return this.tokens[Math.max(this.current - 1, 0)];
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.current++;
    }
    return this.previous();
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(message);
  }

  private error(message: string): ParserError {
    return new ParserError(message, this.input, this.peek().loc.start);
  }

  private makeLoc(start: Token, end: Token): SourceLocation {
    return {
      start: start.loc.start,
      end: end.loc.end,
    };
  }

  private skipSeparators(): void {
    while (this.match(TokenType.SEMICOLON, TokenType.NEWLINE)) {
      // keep skipping
    }
  }

  // Statements

  private statement(): Statement {
    const startToken = this.peek();

    if (this.check(TokenType.IDENTIFIER) && this.peekNext().type === TokenType.ASSIGN) {
      const name = this.advance();
      this.advance(); // '='
      const value = this.expression();

      const node: AssignmentStatement = {
        type: 'AssignmentStatement',
        target: { type: 'Identifier', name: name.value, loc: name.loc },
        value,
        loc: this.makeLoc(startToken, this.previous()),
      };
      return node;
    }

    const expression = this.expression();
    if (this.check(TokenType.ASSIGN)) {
      throw this.error('Only plain names can be assigned');
    }

    const node: ExpressionStatement = {
      type: 'ExpressionStatement',
      expression,
      loc: this.makeLoc(startToken, this.previous()),
    };
    return node;
  }

  // Expressions - precedence climbing

  private expression(): Expression {
    return this.ternary();
  }

  private ternary(): Expression {
    const startToken = this.peek();
    const test = this.logicalOr();

    if (this.match(TokenType.QUESTION)) {
      const consequent = this.expression(); // right-associative
      this.consume(TokenType.COLON, "Expected ':' in ternary expression");
      const alternate = this.expression();

      return {
        type: 'ConditionalExpression',
        test,
        consequent,
        alternate,
        loc: this.makeLoc(startToken, this.previous()),
      };
    }

    return test;
  }

  private logicalOr(): Expression {
    const startToken = this.peek();
    let left = this.logicalAnd();

    while (this.match(TokenType.OR)) {
      const right = this.logicalAnd();
      left = {
        type: 'LogicalExpression',
        operator: '||',
        left,
        right,
        loc: this.makeLoc(startToken, this.previous()),
      };
    }

    return left;
  }

  private logicalAnd(): Expression {
    const startToken = this.peek();
    let left = this.equality();

    while (this.match(TokenType.AND)) {
      const right = this.equality();
      left = {
        type: 'LogicalExpression',
        operator: '&&',
        left,
        right,
        loc: this.makeLoc(startToken, this.previous()),
      };
    }

    return left;
  }

  /** Shared loop for left-associative binary operator levels */
  private binaryLevel(operand: () => Expression, ...types: TokenType[]): Expression {
    const startToken = this.peek();
    let left = operand();

    while (this.match(...types)) {
      const operator = BINARY_OPERATORS[this.previous().type];
      if (operator === undefined) {
        throw this.error(`Unexpected operator '${this.previous().value}'`);
      }
      const right = operand();
      left = {
        type: 'BinaryExpression',
        operator,
        left,
        right,
        loc: this.makeLoc(startToken, this.previous()),
      };
    }

    return left;
  }

  private equality(): Expression {
    return this.binaryLevel(() => this.comparison(), TokenType.EQ, TokenType.NEQ);
  }

  private comparison(): Expression {
    return this.binaryLevel(
      () => this.additive(),
      TokenType.GT,
      TokenType.GTE,
      TokenType.LT,
      TokenType.LTE,
    );
  }

  private additive(): Expression {
    return this.binaryLevel(() => this.multiplicative(), TokenType.PLUS, TokenType.MINUS);
  }

  private multiplicative(): Expression {
    return this.binaryLevel(
      () => this.unary(),
      TokenType.STAR,
      TokenType.SLASH,
      TokenType.PERCENT,
    );
  }

  private unary(): Expression {
    const startToken = this.peek();

    if (this.match(TokenType.NOT, TokenType.MINUS)) {
      const operator = this.previous().type === TokenType.NOT ? '!' : '-';
      const argument = this.unary();
      return {
        type: 'UnaryExpression',
        operator,
        argument,
        loc: this.makeLoc(startToken, this.previous()),
      };
    }

    return this.callAndMember();
  }

  private callAndMember(): Expression {
    const startToken = this.peek();
    let expr = this.primary();

    while (true) {
      if (this.match(TokenType.DOT)) {
        const name = this.consume(TokenType.IDENTIFIER, 'Expected property name after "."');
        const property: Identifier = {
          type: 'Identifier',
          name: name.value,
          loc: name.loc,
        };

        expr = {
          type: 'MemberExpression',
          object: expr,
          property,
          computed: false,
          loc: this.makeLoc(startToken, name),
        };
      } else if (this.match(TokenType.LBRACKET)) {
        const property = this.expression();
        const endToken = this.consume(TokenType.RBRACKET, 'Expected "]" after computed property');

        expr = {
          type: 'MemberExpression',
          object: expr,
          property,
          computed: true,
          loc: this.makeLoc(startToken, endToken),
        };
      } else if (this.match(TokenType.LPAREN)) {
        if (expr.type !== 'Identifier') {
          throw new ParserError(
            'Method calls are not allowed; use built-in functions',
            this.input,
            expr.loc?.start ?? null,
          );
        }

        const args = this.listElements(TokenType.RPAREN);
        const endToken = this.consume(TokenType.RPAREN, 'Expected ")" after arguments');

        const node: CallExpression = {
          type: 'CallExpression',
          callee: expr,
          arguments: args,
          loc: this.makeLoc(startToken, endToken),
        };
        expr = node;
      } else {
        break;
      }
    }

    return expr;
  }

  private primary(): Expression {
    const token = this.peek();

    if (this.match(TokenType.STRING)) {
      return this.literal(this.previous().value);
    }

    if (this.match(TokenType.NUMBER)) {
      return this.literal(parseFloat(this.previous().value));
    }

    if (this.match(TokenType.BOOLEAN)) {
      return this.literal(this.previous().value === 'true');
    }

    if (this.match(TokenType.NULL)) {
      return this.literal(null);
    }

    if (this.match(TokenType.IDENTIFIER)) {
      const node: Identifier = {
        type: 'Identifier',
        name: this.previous().value,
        loc: this.previous().loc,
      };
      return node;
    }

    if (this.match(TokenType.LPAREN)) {
      const expr = this.expression();
      this.consume(TokenType.RPAREN, 'Expected ")" after expression');
      return expr;
    }

    if (this.match(TokenType.LBRACKET)) {
      return this.arrayLiteral(token);
    }

    if (this.match(TokenType.LBRACE)) {
      return this.objectLiteral(token);
    }

    if (token.type === TokenType.EOF) {
      throw this.error('Unexpected end of script');
    }
    if (token.type === TokenType.NEWLINE) {
      throw this.error('Unexpected end of line');
    }
    throw this.error(`Unexpected token '${token.value}'`);
  }

  private literal(value: Literal['value']): Literal {
    return {
      type: 'Literal',
      value,
      loc: this.previous().loc,
    };
  }

  private spread(): SpreadElement {
    const spreadStart = this.previous();
    const argument = this.expression();
    return {
      type: 'SpreadElement',
      argument,
      loc: this.makeLoc(spreadStart, this.previous()),
    };
  }

  /** Comma-separated expressions (with spreads) up to, not including, `closing` */
  private listElements(closing: TokenType): (Expression | SpreadElement)[] {
    const elements: (Expression | SpreadElement)[] = [];

    if (!this.check(closing)) {
      do {
        if (this.check(closing)) break; // trailing comma
        elements.push(this.match(TokenType.SPREAD) ? this.spread() : this.expression());
      } while (this.match(TokenType.COMMA));
    }

    return elements;
  }

  private arrayLiteral(startToken: Token): ArrayExpression {
    const elements = this.listElements(TokenType.RBRACKET);
    const endToken = this.consume(TokenType.RBRACKET, 'Expected "]" after array elements');

    return {
      type: 'ArrayExpression',
      elements,
      loc: this.makeLoc(startToken, endToken),
    };
  }

  private objectLiteral(startToken: Token): ObjectExpression {
    const properties: (Property | SpreadElement)[] = [];

    if (!this.check(TokenType.RBRACE)) {
      do {
        if (this.check(TokenType.RBRACE)) break; // trailing comma

        if (this.match(TokenType.SPREAD)) {
          properties.push(this.spread());
          continue;
        }

        const keyToken = this.peek();
        let key: Identifier | Literal;
        if (this.match(TokenType.IDENTIFIER)) {
          key = { type: 'Identifier', name: this.previous().value, loc: this.previous().loc };
        } else if (this.match(TokenType.STRING)) {
          key = this.literal(this.previous().value);
        } else {
          throw this.error('Expected property name');
        }

        let value: Expression;
        let shorthand = false;

        if (this.match(TokenType.COLON)) {
          value = this.expression();
        } else {
          if (key.type !== 'Identifier') {
            throw this.error('Shorthand property must be an identifier');
          }
          value = key;
          shorthand = true;
        }

        properties.push({
          type: 'Property',
          key,
          value,
          shorthand,
          loc: this.makeLoc(keyToken, this.previous()),
        });
      } while (this.match(TokenType.COMMA));
    }

    const endToken = this.consume(TokenType.RBRACE, 'Expected "}" after object properties');

    return {
      type: 'ObjectExpression',
      properties,
      loc: this.makeLoc(startToken, endToken),
    };
  }
}
