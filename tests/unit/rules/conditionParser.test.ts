import { describe, it, expect } from 'vitest';
import { Condition, formatCondition, parseCondition } from '../../../src/rules/conditionParser';
import { ConditionSyntaxError } from '../../../src/shared/errors';

function syntaxError(source: string): ConditionSyntaxError {
  try {
    parseCondition(source);
  } catch (error) {
    if (error instanceof ConditionSyntaxError) return error;
    throw error;
  }
  throw new Error(`Expected a syntax error for: ${source}`);
}

describe('unit: condition parser', () => {
  it('parses a net class test combined with a negated area test', () => {
    expect(parseCondition("A.NetClass == 'HV' && !A.insideArea('Shield*')")).toEqual({
      type: 'logical',
      operator: '&&',
      left: {
        type: 'comparison',
        operator: '==',
        left: { type: 'property', path: ['A', 'NetClass'] },
        right: { type: 'string', value: 'HV', quote: "'" },
      },
      right: {
        type: 'not',
        operand: {
          type: 'call',
          target: ['A'],
          name: 'insideArea',
          args: [{ type: 'string', value: 'Shield*', quote: "'" }],
        },
      },
    });
  });

  it('binds && tighter than ||', () => {
    const expr = parseCondition('a || b && c');
    expect(expr.type === 'logical' && expr.operator).toBe('||');
    expect(expr.type === 'logical' && expr.right.type === 'logical' && expr.right.operator).toBe('&&');
  });

  it('reads numbers with units', () => {
    expect(parseCondition('A.Width > 0.5mm')).toEqual({
      type: 'comparison',
      operator: '>',
      left: { type: 'property', path: ['A', 'Width'] },
      right: { type: 'number', value: 0.5, unit: 'mm', text: '0.5mm' },
    });
  });

  it('reads unary minus and calls without arguments', () => {
    expect(parseCondition('-1')).toEqual({ type: 'negate', operand: { type: 'number', value: 1, unit: undefined, text: '1' } });
    expect(parseCondition('A.isPlated()')).toEqual({ type: 'call', target: ['A'], name: 'isPlated', args: [] });
  });

  it('reads calls with several arguments', () => {
    const expr = parseCondition("A.intersectsArea('Zone', \"B\")");
    expect(expr.type === 'call' && expr.args.map((a) => a.type === 'string' && a.value)).toEqual(['Zone', 'B']);
  });

  it('unescapes the quote character inside strings', () => {
    expect(parseCondition("A.Name == 'it\\'s'")).toMatchObject({ right: { type: 'string', value: "it's" } });
  });

  it('reports where the condition ends too early', () => {
    const error = syntaxError('A.NetClass == ');
    expect(error.offset).toBe(14);
    expect(error.message).toContain('Unexpected end of condition');
  });

  it('reports unterminated strings at their opening quote', () => {
    const error = syntaxError("A.Name == 'x");
    expect(error.offset).toBe(10);
    expect(error.message).toContain('Unterminated string');
  });

  it('reports unknown characters', () => {
    const error = syntaxError('A.x @ 1');
    expect(error.offset).toBe(4);
    expect(error.message).toContain("Unexpected character '@'");
  });

  it('reports missing parentheses, names and trailing tokens', () => {
    expect(syntaxError('(a').message).toContain("Expected ')', found end of condition");
    expect(syntaxError("A.'x'").message).toContain("Expected a name after '.', found 'x'");
    expect(syntaxError('a b').offset).toBe(2);
    expect(syntaxError('   ').message).toContain('Empty condition');
  });
});

describe('unit: condition printing', () => {
  it('keeps only the parentheses the structure needs', () => {
    expect(formatCondition(parseCondition('(a || b) && c'))).toBe('(a || b) && c');
    expect(formatCondition(parseCondition('a && (b && c)'))).toBe('a && (b && c)');
    expect(formatCondition(parseCondition('((a && b)) && c'))).toBe('a && b && c');
    expect(formatCondition(parseCondition('!(a == b)'))).toBe('!(a == b)');
  });

  it('prints calls, numbers and escaped strings as written', () => {
    const text = "A.insideArea('it\\'s') || B.Width <= 0.2mm";
    expect(formatCondition(parseCondition(text))).toBe(text);
  });
});

describe('unit: Condition', () => {
  it('keeps the original text and parses lazily', () => {
    const condition = new Condition('A.x @ 1');
    expect(condition.toString()).toBe('A.x @ 1');
    expect(() => condition.expression).toThrow(ConditionSyntaxError);
  });

  it('builds text from an expression tree', () => {
    const condition = Condition.from({
      type: 'comparison',
      operator: '!=',
      left: { type: 'property', path: ['A', 'Type'] },
      right: { type: 'string', value: 'Pad', quote: "'" },
    });
    expect(condition.text).toBe("A.Type != 'Pad'");
    expect(condition.expression.type).toBe('comparison');
  });
});
