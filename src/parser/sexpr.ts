/**
 * KiCad S-Expression Tokenizer & Parser
 *
 * Parses KiCad's S-expression format used in .kicad_sch, .kicad_pcb, etc. into a
 * generic tree of lists and atoms. Parsed atoms keep their original text and parsed
 * lists keep their original whitespace, so the formatter can reproduce the input.
 */

import { EmptyDocumentError, SExprSyntaxError, type SourcePosition } from '../shared/errors';

// --- Types ---

export interface SymbolAtom {
  readonly kind: 'symbol';
  readonly value: string;
  readonly raw?: string;
}

export interface StringAtom {
  readonly kind: 'string';
  readonly value: string;
  readonly raw?: string;
}

export interface NumberAtom {
  readonly kind: 'integer' | 'float';
  readonly value: number;
  readonly raw?: string;
}

export type SExprAtom = SymbolAtom | StringAtom | NumberAtom;

/** Whitespace before each item, plus the whitespace before the closing paren */
export interface ListLayout {
  gaps: string[];
}

export interface SExprList {
  readonly kind: 'list';
  items: SExpr[];
  layout?: ListLayout;
  position?: SourcePosition;
}

export type SExpr = SExprAtom | SExprList;

/** All top-level lists of one file */
export interface SExprDocument {
  forms: SExprList[];
  layout?: ListLayout;
}

export type Token =
  | { type: 'open'; leading: string; position: SourcePosition }
  | { type: 'close'; leading: string; position: SourcePosition }
  | { type: 'atom'; leading: string; position: SourcePosition; atom: SExprAtom }
  | { type: 'end'; leading: string; position: SourcePosition };

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// --- Constructors ---

export function sym(value: string): SymbolAtom {
  return { kind: 'symbol', value };
}

/** A bare boolean flag such as `locked` or `hide` */
export const flag = sym;

export function str(value: string): StringAtom {
  return { kind: 'string', value };
}

export function num(value: number): NumberAtom {
  return { kind: Number.isInteger(value) ? 'integer' : 'float', value };
}

/** Build a list. Plain strings become symbols and plain numbers become numeric atoms. */
export function list(keyword: string, ...items: Array<SExpr | string | number>): SExprList {
  return {
    kind: 'list',
    items: [sym(keyword), ...items.map(toExpr)],
  };
}

export function toExpr(item: SExpr | string | number): SExpr {
  if (typeof item === 'string') return sym(item);
  if (typeof item === 'number') return num(item);
  return item;
}

export function isList(expr: SExpr | undefined): expr is SExprList {
  return expr !== undefined && expr.kind === 'list';
}

export function isAtom(expr: SExpr | undefined): expr is SExprAtom {
  return expr !== undefined && expr.kind !== 'list';
}

export function isNumberAtom(expr: SExpr | undefined): expr is NumberAtom {
  return expr !== undefined && (expr.kind === 'integer' || expr.kind === 'float');
}

/** Classify a bareword as symbol, integer or float, keeping its text */
export function bareword(text: string): SymbolAtom | NumberAtom {
  if (NUMBER_PATTERN.test(text)) {
    const isFloat = text.includes('.') || text.includes('e') || text.includes('E');
    return { kind: isFloat ? 'float' : 'integer', value: Number(text), raw: text };
  }
  return { kind: 'symbol', value: text, raw: text };
}

/** Atom for a value held as text: numeric text becomes a number, anything else a symbol */
export function atomFromText(text: string): SymbolAtom | NumberAtom {
  const atom = bareword(text);
  return atom.kind === 'symbol' ? sym(text) : atom;
}

// --- Tokenizer ---

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function unescape(body: string): string {
  if (!body.includes('\\')) return body;
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\' || i + 1 >= body.length) {
      out += ch;
      continue;
    }
    const next = body[++i];
    switch (next) {
      case '"': case '\\': out += next; break;
      case 'n': out += '\n'; break;
      case 'r': out += '\r'; break;
      default: out += '\\' + next;
    }
  }
  return out;
}

export interface ParseOptions {
  /** Read `#` as the start of a comment when it opens a line, as design rules files allow */
  lineComments?: boolean;
}

/**
 * Lex raw text into parenthesis boundaries and atoms. Each token carries the
 * whitespace (and comment lines) before it; the final `end` token carries what trails.
 */
export function* tokenize(input: string, options: ParseOptions = {}): Generator<Token, void, undefined> {
  const len = input.length;
  let i = 0;
  let line = 1;
  let lineStart = 0;

  const here = (offset: number): SourcePosition => ({
    offset,
    line,
    column: offset - lineStart + 1,
  });

  while (true) {
    const wsStart = i;
    while (i < len) {
      if (isWhitespace(input[i])) {
        if (input[i] === '\n') {
          line++;
          lineStart = i + 1;
        }
        i++;
      } else if (options.lineComments && input[i] === '#' && input.slice(lineStart, i).trim() === '') {
        while (i < len && input[i] !== '\n') i++;
      } else {
        break;
      }
    }
    const leading = input.slice(wsStart, i);

    if (i >= len) {
      yield { type: 'end', leading, position: here(i) };
      return;
    }

    const ch = input[i];
    const position = here(i);

    if (ch === '(') {
      i++;
      yield { type: 'open', leading, position };
    } else if (ch === ')') {
      i++;
      yield { type: 'close', leading, position };
    } else if (ch === '"') {
      const start = i;
      i++; // skip opening quote
      while (i < len && input[i] !== '"') {
        if (input[i] === '\\') i++;
        if (i < len && input[i] === '\n') {
          line++;
          lineStart = i + 1;
        }
        i++;
      }
      if (i >= len) {
        throw new SExprSyntaxError('Unterminated string', position);
      }
      i++; // skip closing quote
      const raw = input.slice(start, i);
      yield { type: 'atom', leading, position, atom: { kind: 'string', value: unescape(raw.slice(1, -1)), raw } };
    } else {
      const start = i;
      while (i < len && !isWhitespace(input[i]) && input[i] !== '(' && input[i] !== ')' && input[i] !== '"') {
        i++;
      }
      yield { type: 'atom', leading, position, atom: bareword(input.slice(start, i)) };
    }
  }
}

// --- Parser ---

interface OpenList {
  list: SExprList;
  gaps: string[];
}

/** Parse every top-level list of a file */
export function parseSExpression(input: string, options: ParseOptions = {}): SExprDocument {
  const forms: SExprList[] = [];
  const topGaps: string[] = [];
  const stack: OpenList[] = [];

  for (const token of tokenize(input, options)) {
    const current = stack.length > 0 ? stack[stack.length - 1] : undefined;

    switch (token.type) {
      case 'open': {
        const opened: OpenList = { list: { kind: 'list', items: [], position: token.position }, gaps: [] };
        if (current) {
          current.list.items.push(opened.list);
          current.gaps.push(token.leading);
        } else {
          forms.push(opened.list);
          topGaps.push(token.leading);
        }
        stack.push(opened);
        break;
      }
      case 'close': {
        if (!current) {
          throw new SExprSyntaxError('Unexpected closing parenthesis', token.position);
        }
        current.gaps.push(token.leading);
        current.list.layout = { gaps: current.gaps };
        stack.pop();
        break;
      }
      case 'atom': {
        if (!current) {
          throw new SExprSyntaxError('Atom outside of a list', token.position);
        }
        current.list.items.push(token.atom);
        current.gaps.push(token.leading);
        break;
      }
      case 'end': {
        if (stack.length > 0) {
          const outermost = stack[0].list;
          throw new SExprSyntaxError(
            `Unclosed list, ${stack.length} still open at end of input; outermost opened`,
            outermost.position ?? token.position,
            stack.length,
          );
        }
        if (forms.length === 0) {
          throw new EmptyDocumentError();
        }
        topGaps.push(token.leading);
      }
    }
  }

  return { forms, layout: { gaps: topGaps } };
}

/** Parse a file that must contain exactly one top-level list */
export function parseSingle(input: string): SExprList {
  const doc = parseSExpression(input);
  if (doc.forms.length > 1) {
    const extra = doc.forms[1].position ?? { offset: 0, line: 1, column: 1 };
    throw new SExprSyntaxError('Expected a single top-level list', extra);
  }
  return doc.forms[0];
}

// --- Structural equality ---

export function atomsEqual(a: SExprAtom, b: SExprAtom): boolean {
  return a.kind === b.kind && a.value === b.value;
}

/**
 * Compare two trees by kinds and values, ignoring raw text and layout.
 * Iterative so that deeply nested trees do not exhaust the call stack.
 */
export function sexprEqual(a: SExpr, b: SExpr): boolean {
  const pending: Array<[SExpr, SExpr]> = [[a, b]];
  while (pending.length > 0) {
    const pair = pending.pop();
    if (!pair) break;
    const [x, y] = pair;
    if (x.kind === 'list' || y.kind === 'list') {
      if (x.kind !== 'list' || y.kind !== 'list') return false;
      if (x.items.length !== y.items.length) return false;
      for (let i = 0; i < x.items.length; i++) {
        pending.push([x.items[i], y.items[i]]);
      }
    } else if (!atomsEqual(x, y)) {
      return false;
    }
  }
  return true;
}
