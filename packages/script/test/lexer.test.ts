import { describe, expect, it } from 'vitest';
import { Lexer, LexerError, TokenType } from '../src/lexer/index.js';

describe('Lexer', () => {
  const lexer = new Lexer();

  function tokenTypes(input: string): string[] {
    return lexer.tokenize(input).map((t) => t.type);
  }

  function tokenValues(input: string): string[] {
    return lexer.tokenize(input).map((t) => t.value);
  }

  describe('literals', () => {
    it('tokenizes single- and double-quoted strings', () => {
      expect(lexer.tokenize("'hello'")[0]).toMatchObject({ type: TokenType.STRING, value: 'hello' });
      expect(lexer.tokenize('"world"')[0]).toMatchObject({ type: TokenType.STRING, value: 'world' });
    });

    it('handles escape sequences', () => {
      expect(lexer.tokenize("'a\\nb'")[0].value).toBe('a\nb');
      expect(lexer.tokenize("'a\\tb'")[0].value).toBe('a\tb');
      expect(lexer.tokenize("'back\\\\slash'")[0].value).toBe('back\\slash');
      expect(lexer.tokenize("'it\\'s'")[0].value).toBe("it's");
    });

    it('throws on unterminated strings', () => {
      expect(() => lexer.tokenize("'open")).toThrow(LexerError);
      expect(() => lexer.tokenize("'line1\nline2'")).toThrow(/Unterminated string literal/);
    });

    it('tokenizes integers and decimals', () => {
      expect(tokenValues('42 3.5')).toEqual(['42', '3.5', '']);
      expect(tokenTypes('42')).toEqual([TokenType.NUMBER, TokenType.EOF]);
    });

    it('tokenizes booleans and null', () => {
      expect(tokenTypes('true false null')).toEqual([
        TokenType.BOOLEAN,
        TokenType.BOOLEAN,
        TokenType.NULL,
        TokenType.EOF,
      ]);
    });
  });

  describe('statements', () => {
    it('tokenizes assignment', () => {
      expect(tokenTypes('x = 1')).toEqual([
        TokenType.IDENTIFIER,
        TokenType.ASSIGN,
        TokenType.NUMBER,
        TokenType.EOF,
      ]);
    });

    it('emits newlines between statements', () => {
      expect(tokenTypes('a\nb')).toEqual([
        TokenType.IDENTIFIER,
        TokenType.NEWLINE,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
    });

    it('treats newlines inside brackets as blanks', () => {
      expect(tokenTypes('f(\na,\nb\n)')).toEqual([
        TokenType.IDENTIFIER,
        TokenType.LPAREN,
        TokenType.IDENTIFIER,
        TokenType.COMMA,
        TokenType.IDENTIFIER,
        TokenType.RPAREN,
        TokenType.EOF,
      ]);
    });

    it('tokenizes semicolons', () => {
      expect(tokenTypes('a; b')).toEqual([
        TokenType.IDENTIFIER,
        TokenType.SEMICOLON,
        TokenType.IDENTIFIER,
        TokenType.EOF,
      ]);
    });

    it('skips line comments', () => {
      expect(tokenValues('a // note\nb')).toEqual(['a', '\n', 'b', '']);
    });
  });

  describe('operators', () => {
    it('tokenizes strict equality and comparison', () => {
      expect(tokenValues('a === b !== c >= d <= e')).toEqual([
        'a', '===', 'b', '!==', 'c', '>=', 'd', '<=', 'e', '',
      ]);
    });

    it('tokenizes spread', () => {
      expect(tokenTypes('[...a]')).toEqual([
        TokenType.LBRACKET,
        TokenType.SPREAD,
        TokenType.IDENTIFIER,
        TokenType.RBRACKET,
        TokenType.EOF,
      ]);
    });

    it('rejects loose equality', () => {
      expect(() => lexer.tokenize('a == b')).toThrow(/Loose equality is not allowed/);
      expect(() => lexer.tokenize('a != b')).toThrow(/Loose inequality is not allowed/);
    });

    it('rejects increment and compound assignment', () => {
      expect(() => lexer.tokenize('x++')).toThrow(/Increment operator/);
      expect(() => lexer.tokenize('x--')).toThrow(/Decrement operator/);
      expect(() => lexer.tokenize('x += 1')).toThrow(/Compound assignment/);
      expect(() => lexer.tokenize('x *= 1')).toThrow(/Compound assignment/);
    });

    it('rejects single & and |', () => {
      expect(() => lexer.tokenize('a & b')).toThrow(/Use '&&'/);
      expect(() => lexer.tokenize('a | b')).toThrow(/Use '\|\|'/);
    });

    it('rejects unknown characters', () => {
      expect(() => lexer.tokenize('a # b')).toThrow("Unexpected character '#'");
    });
  });

  describe('forbidden keywords', () => {
    it.each([
      ['function', /Function definitions/],
      ['while', /Loops are not allowed/],
      ['if', /ternary operator/],
      ['let', /Variable declarations/],
      ['new', /'new' keyword/],
      ['this', /'this' keyword/],
      ['import', /Import\/export/],
      ['throw', /use abort\(\) or fail\(\)/],
    ])('rejects %s', (keyword, message) => {
      expect(() => lexer.tokenize(`${keyword} x`)).toThrow(message);
    });

    it('allows keywords as part of longer names', () => {
      expect(tokenValues('format')).toEqual(['format', '']);
      expect(tokenValues('ifdef')).toEqual(['ifdef', '']);
    });
  });

  describe('positions', () => {
    it('tracks line and column', () => {
      const tokens = lexer.tokenize('a\n  b');
      expect(tokens[2].loc.start).toEqual({ line: 2, column: 2, offset: 4 });
    });

    it('reports the error position', () => {
      try {
        lexer.tokenize('x = 1\ny == 2');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LexerError);
        if (error instanceof LexerError) {
          expect(error.position).toEqual({ line: 2, column: 2, offset: 8 });
          expect(error.reason).toBe("Loose equality is not allowed; use '==='");
          expect(error.message).toBe("Loose equality is not allowed; use '===' at line 2, column 2");
        }
      }
    });
  });
});
