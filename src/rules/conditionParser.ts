/**
 * Design Rule Condition Parser
 *
 * Parses the expression strings found in `(condition "...")` of custom design
 * rules, e.g. `A.NetClass == 'HV' && !A.insideArea('Shield*')`, into a tree.
 * Conditions are never evaluated here.
 *
 * Precedence, lowest first: `||`, `&&`, comparisons, unary `!` and `-`,
 * member access and calls.
 */

import { ConditionSyntaxError } from '../shared/errors';

// --- Types ---

export type LogicalOperator = '&&' | '||';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type ConditionExpr =
  | { type: 'logical'; operator: LogicalOperator; left: ConditionExpr; right: ConditionExpr }
  | { type: 'comparison'; operator: ComparisonOperator; left: ConditionExpr; right: ConditionExpr }
  | { type: 'not'; operand: ConditionExpr }
  | { type: 'negate'; operand: ConditionExpr }
  /** `A.NetClass` -> ['A', 'NetClass'] */
  | { type: 'property'; path: string[] }
  /** `A.insideArea('X')` -> target ['A'], name 'insideArea' */
  | { type: 'call'; target: string[]; name: string; args: ConditionExpr[] }
  | { type: 'string'; value: string; quote: '\'' | '"' }
  /** `0.5mm` -> value 0.5, unit 'mm' */
  | { type: 'number'; value: number; unit?: string; text: string };

type ConditionToken =
  | { kind: 'identifier'; text: string; offset: number }
  | { kind: 'string'; text: string; quote: '\'' | '"'; offset: number }
  | { kind: 'number'; text: string; value: number; unit?: string; offset: number }
  | { kind: 'operator'; text: string; offset: number }
  | { kind: 'end'; text: ''; offset: number };

const OPERATORS = ['==', '!=', '<=', '>=', '&&', '||', '<', '>', '!', '-', '(', ')', '.', ','];

const COMPARISON_OPERATORS: readonly string[] = ['==', '!=', '<', '<=', '>', '>='];

// --- Lexer ---

class ConditionLexer {
  private pos = 0;

  constructor(private readonly source: string) {}

  tokenize(): ConditionToken[] {
    const tokens: ConditionToken[] = [];
    while (true) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) {
        tokens.push({ kind: 'end', text: '', offset: this.pos });
        return tokens;
      }
      tokens.push(this.scanToken());
    }
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) this.pos++;
  }

  private scanToken(): ConditionToken {
    const start = this.pos;
    const ch = this.source[start];

    if (ch === '\'' || ch === '"') return this.scanString(ch);
    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(this.source[start + 1] ?? ''))) return this.scanNumber();
    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.source.slice(start));
      const text = match ? match[0] : ch;
      this.pos += text.length;
      return { kind: 'identifier', text, offset: start };
    }

    const operator = OPERATORS.find((op) => this.source.startsWith(op, start));
    if (operator === undefined) {
      throw new ConditionSyntaxError(`Unexpected character '${ch}'`, this.source, start);
    }
    this.pos += operator.length;
    return { kind: 'operator', text: operator, offset: start };
  }

  private scanString(quote: '\'' | '"'): ConditionToken {
    const start = this.pos;
    let text = '';
    this.pos++; // opening quote
    while (this.pos < this.source.length && this.source[this.pos] !== quote) {
      if (this.source[this.pos] === '\\' && this.source[this.pos + 1] === quote) this.pos++;
      text += this.source[this.pos];
      this.pos++;
    }
    if (this.pos >= this.source.length) {
      throw new ConditionSyntaxError('Unterminated string', this.source, start);
    }
    this.pos++; // closing quote
    return { kind: 'string', text, quote, offset: start };
  }

  private scanNumber(): ConditionToken {
    const start = this.pos;
    const match = /^(\d*\.?\d+|\d+\.)([A-Za-z]+)?/.exec(this.source.slice(start));
    if (!match) {
      throw new ConditionSyntaxError('Malformed number', this.source, start);
    }
    this.pos += match[0].length;
    return { kind: 'number', text: match[0], value: Number(match[1]), unit: match[2], offset: start };
  }
}

// --- Parser ---

class ConditionParser {
  private readonly tokens: ConditionToken[];
  private index = 0;

  constructor(private readonly source: string) {
    this.tokens = new ConditionLexer(source).tokenize();
  }

  parse(): ConditionExpr {
    if (this.peek().kind === 'end') {
      throw new ConditionSyntaxError('Empty condition', this.source, 0);
    }
    const expr = this.parseOr();
    const rest = this.peek();
    if (rest.kind !== 'end') {
      throw new ConditionSyntaxError(`Unexpected '${rest.text}'`, this.source, rest.offset);
    }
    return expr;
  }

  private peek(): ConditionToken {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private next(): ConditionToken {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) this.index++;
    return token;
  }

  private isOperator(...operators: string[]): boolean {
    const token = this.peek();
    return token.kind === 'operator' && operators.includes(token.text);
  }

  private expect(operator: string): void {
    const token = this.next();
    if (token.kind !== 'operator' || token.text !== operator) {
      const found = token.kind === 'end' ? 'end of condition' : `'${token.text}'`;
      throw new ConditionSyntaxError(`Expected '${operator}', found ${found}`, this.source, token.offset);
    }
  }

  private parseOr(): ConditionExpr {
    let left = this.parseAnd();
    while (this.isOperator('||')) {
      this.next();
      left = { type: 'logical', operator: '||', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionExpr {
    let left = this.parseComparison();
    while (this.isOperator('&&')) {
      this.next();
      left = { type: 'logical', operator: '&&', left, right: this.parseComparison() };
    }
    return left;
  }

  private parseComparison(): ConditionExpr {
    let left = this.parseUnary();
    while (this.isOperator(...COMPARISON_OPERATORS)) {
      const operator = this.next().text;
      if (!isComparisonOperator(operator)) break;
      left = { type: 'comparison', operator, left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionExpr {
    if (this.isOperator('!')) {
      this.next();
      return { type: 'not', operand: this.parseUnary() };
    }
    if (this.isOperator('-')) {
      this.next();
      return { type: 'negate', operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): ConditionExpr {
    const token = this.next();

    switch (token.kind) {
      case 'string':
        return { type: 'string', value: token.text, quote: token.quote };
      case 'number':
        return { type: 'number', value: token.value, unit: token.unit, text: token.text };
      case 'identifier':
        return this.parseMemberChain(token.text);
      case 'operator':
        if (token.text === '(') {
          const inner = this.parseOr();
          this.expect(')');
          return inner;
        }
        throw new ConditionSyntaxError(`Unexpected '${token.text}'`, this.source, token.offset);
      case 'end':
        throw new ConditionSyntaxError('Unexpected end of condition', this.source, token.offset);
    }
  }

  /** `A.B.c(args)` or `A.B` after the first identifier */
  private parseMemberChain(first: string): ConditionExpr {
    const path = [first];
    while (true) {
      if (this.isOperator('(')) {
        this.next();
        const name = path.pop() ?? first;
        return { type: 'call', target: path, name, args: this.parseArguments() };
      }
      if (!this.isOperator('.')) return { type: 'property', path };
      this.next();
      const member = this.next();
      if (member.kind !== 'identifier') {
        const found = member.kind === 'end' ? 'end of condition' : `'${member.text}'`;
        throw new ConditionSyntaxError(`Expected a name after '.', found ${found}`, this.source, member.offset);
      }
      path.push(member.text);
    }
  }

  private parseArguments(): ConditionExpr[] {
    const args: ConditionExpr[] = [];
    if (this.isOperator(')')) {
      this.next();
      return args;
    }
    args.push(this.parseOr());
    while (this.isOperator(',')) {
      this.next();
      args.push(this.parseOr());
    }
    this.expect(')');
    return args;
  }
}

function isComparisonOperator(text: string): text is ComparisonOperator {
  return COMPARISON_OPERATORS.includes(text);
}

export function parseCondition(source: string): ConditionExpr {
  return new ConditionParser(source).parse();
}

// --- Condition value ---

/**
 * A rule condition as written in the file. The text is kept verbatim; the tree is
 * built on first access, so unparseable conditions only fail when inspected.
 */
export class Condition {
  private parsed?: ConditionExpr;

  constructor(readonly text: string) {}

  static from(expression: ConditionExpr): Condition {
    const condition = new Condition(formatCondition(expression));
    condition.parsed = expression;
    return condition;
  }

  get expression(): ConditionExpr {
    if (!this.parsed) this.parsed = parseCondition(this.text);
    return this.parsed;
  }

  toString(): string {
    return this.text;
  }
}

// --- Printing ---

function precedence(expr: ConditionExpr): number {
  switch (expr.type) {
    case 'logical': return expr.operator === '||' ? 1 : 2;
    case 'comparison': return 3;
    case 'not':
    case 'negate': return 4;
    default: return 5;
  }
}

function wrap(expr: ConditionExpr, parenthesize: boolean): string {
  const text = formatCondition(expr);
  return parenthesize ? `(${text})` : text;
}

function quoteConditionString(value: string, quote: '\'' | '"'): string {
  return quote + value.split(quote).join(`\\${quote}`) + quote;
}

/** Print a condition tree with the fewest parentheses that keep its structure */
export function formatCondition(expr: ConditionExpr): string {
  switch (expr.type) {
    case 'logical':
    case 'comparison': {
      const own = precedence(expr);
      const left = wrap(expr.left, precedence(expr.left) < own);
      const right = wrap(expr.right, precedence(expr.right) <= own);
      return `${left} ${expr.operator} ${right}`;
    }
    case 'not':
      return `!${wrap(expr.operand, precedence(expr.operand) < 4)}`;
    case 'negate':
      return `-${wrap(expr.operand, precedence(expr.operand) < 4)}`;
    case 'property':
      return expr.path.join('.');
    case 'call': {
      const args = expr.args.map(formatCondition).join(', ');
      const callee = [...expr.target, expr.name].join('.');
      return `${callee}(${args})`;
    }
    case 'string':
      return quoteConditionString(expr.value, expr.quote);
    case 'number':
      return expr.text;
  }
}
