import { describe, expect, it } from 'vitest';
import { Parser, ParserError, type Expression, type Program } from '../src/parser/index.js';

describe('Parser', () => {
  const parser = new Parser();

  function parseExpression(input: string): Expression {
    const program = parser.parse(input);
    const [statement] = program.body;
    if (statement?.type !== 'ExpressionStatement') {
      throw new Error(`Expected a single expression in ${input}`);
    }
    return statement.expression;
  }

  describe('statements', () => {
    it('parses an empty script', () => {
      expect(parser.parse('')).toEqual({ type: 'Program', body: [], loc: null });
      expect(parser.parse('\n;\n').body).toEqual([]);
    });

    it('parses assignments', () => {
      const program = parser.parse('total = 1 + 2');
      expect(program.body).toHaveLength(1);
      expect(program.body[0]).toMatchObject({
        type: 'AssignmentStatement',
        target: { type: 'Identifier', name: 'total' },
        value: { type: 'BinaryExpression', operator: '+' },
      });
    });

    it('splits statements on newlines and semicolons', () => {
      const program: Program = parser.parse('a = 1\nb = 2; c');
      expect(program.body.map((s) => s.type)).toEqual([
        'AssignmentStatement',
        'AssignmentStatement',
        'ExpressionStatement',
      ]);
    });

    it('keeps multi-line calls together', () => {
      const program = parser.parse('f(\n  1,\n  2,\n)');
      expect(program.body).toHaveLength(1);
      expect(program.body[0]).toMatchObject({
        type: 'ExpressionStatement',
        expression: { type: 'CallExpression', arguments: [{ value: 1 }, { value: 2 }] },
      });
    });

    it('rejects assignment to anything but a name', () => {
      expect(() => parser.parse('a.b = 1')).toThrow(/Only plain names can be assigned/);
      expect(() => parser.parse('a[0] = 1')).toThrow(/Only plain names can be assigned/);
    });

    it('rejects two expressions on one line', () => {
      expect(() => parser.parse('a b')).toThrow("Unexpected token 'b'");
    });

    it('reports an incomplete statement', () => {
      expect(() => parser.parse('x =')).toThrow(/Unexpected end of script/);
      expect(() => parser.parse('x = \ny')).toThrow(/Unexpected end of line/);
    });
  });

  describe('expressions', () => {
    it('respects precedence', () => {
      expect(parseExpression('1 + 2 * 3')).toMatchObject({
        type: 'BinaryExpression',
        operator: '+',
        left: { value: 1 },
        right: { type: 'BinaryExpression', operator: '*' },
      });
    });

    it('parses logical operators below equality', () => {
      expect(parseExpression('a === 1 && b')).toMatchObject({
        type: 'LogicalExpression',
        operator: '&&',
        left: { type: 'BinaryExpression', operator: '===' },
      });
    });

    it('parses ternaries right-associatively', () => {
      expect(parseExpression('a ? 1 : b ? 2 : 3')).toMatchObject({
        type: 'ConditionalExpression',
        alternate: { type: 'ConditionalExpression' },
      });
    });

    it('parses member access', () => {
      expect(parseExpression('a.b[0]')).toMatchObject({
        type: 'MemberExpression',
        computed: true,
        object: { type: 'MemberExpression', computed: false, property: { name: 'b' } },
      });
    });

    it('parses calls with spread arguments', () => {
      expect(parseExpression('f(...xs, 1)')).toMatchObject({
        type: 'CallExpression',
        callee: { name: 'f' },
        arguments: [{ type: 'SpreadElement' }, { type: 'Literal', value: 1 }],
      });
    });

    it('rejects method calls', () => {
      expect(() => parser.parse('a.b()')).toThrow(/Method calls are not allowed/);
    });

    it('parses object literals with shorthand and string keys', () => {
      expect(parseExpression("{ a, 'b c': 2 }")).toMatchObject({
        type: 'ObjectExpression',
        properties: [
          { key: { name: 'a' }, shorthand: true },
          { key: { value: 'b c' }, shorthand: false },
        ],
      });
    });

    it('throws ParserError with a position', () => {
      try {
        parser.parse('x = (1 + 2');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ParserError);
        if (error instanceof ParserError) {
          expect(error.reason).toBe('Expected ")" after expression');
          expect(error.position?.line).toBe(1);
        }
      }
    });
  });
});
