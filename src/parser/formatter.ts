/**
 * S-expression writer
 *
 * Lists that still carry the whitespace recorded by the parser are replayed as they
 * were read. Everything else is laid out the way KiCad's own writer does it:
 * one list per line, one indent unit per depth, runs of (xy) points packed onto a
 * line, long atom runs wrapped, and a newline at the end of the file.
 */

import { DEFAULT_FORMAT, type FormatOptions } from '../shared/config';
import { FormatError } from '../shared/errors';
import { isList, type SExprAtom, type SExprDocument, type SExprList } from './sexpr';

export interface SerializeOptions extends Partial<FormatOptions> {
  /** Replay recorded whitespace where it still fits (default true) */
  preserveLayout?: boolean;
}

/** Consecutive (xy) lists share a line until this column */
const XY_COLUMN_LIMIT = 99;
/** Whitespace after this column wraps to a new line */
const TOKEN_WRAP_COLUMN = 72;
/** Kept inline in compact mode */
const SHORT_FORM_KEYWORDS = new Set(['font', 'stroke', 'fill', 'teardrop', 'offset', 'rotate', 'scale']);

// --- Atoms ---

/** Shortest decimal text that reads back as the same number, never in exponent form */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new FormatError(`Cannot write non-finite number ${value}`);
  }
  if (Object.is(value, -0)) return '0';
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  // Position of the decimal point within `digits`
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + '0'.repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}

function needsQuotes(value: string): boolean {
  return value === '' || /[\s()"]/.test(value);
}

export function formatAtom(atom: SExprAtom): string {
  if (atom.raw !== undefined) return atom.raw;
  switch (atom.kind) {
    case 'string': return quoteString(atom.value);
    case 'symbol': return needsQuotes(atom.value) ? quoteString(atom.value) : atom.value;
    default: return formatNumber(atom.value);
  }
}

// --- Lists ---

function hasUsableLayout(list: SExprList): boolean {
  return list.layout !== undefined && list.layout.gaps.length === list.items.length + 1;
}

function leadingKeyword(list: SExprList): string {
  const head = list.items[0];
  return head !== undefined && head.kind === 'symbol' ? head.value : '';
}

/** Leading alphabetic run of the keyword, as KiCad compares it */
function shortFormToken(keyword: string): string {
  const match = /^[A-Za-z]*/.exec(keyword);
  return match ? match[0] : '';
}

interface Frame {
  list: SExprList;
  index: number;
  depth: number;
  replay: boolean;
}

class SExprWriter {
  private readonly out: string[] = [];
  private column = 0;
  private last: 'none' | 'open' | 'close' | 'atom' = 'none';
  private inXY = false;
  private inShortForm = false;
  private shortFormDepth = 0;
  private inMultiLineList = false;

  constructor(private readonly options: Required<SerializeOptions>) {}

  toString(): string {
    return this.out.join('');
  }

  private write(text: string, countColumns: boolean = true): void {
    if (text.length === 0) return;
    this.out.push(text);
    if (!countColumns) return;
    const newline = text.lastIndexOf('\n');
    if (newline >= 0) {
      this.column = Buffer.byteLength(text.slice(newline + 1), 'utf8');
    } else {
      this.column += Buffer.byteLength(text, 'utf8');
    }
  }

  private indent(depth: number): string {
    return this.options.indent.repeat(depth);
  }

  writeList(root: SExprList): void {
    const stack: Frame[] = [];
    this.open(root, 0, false, stack);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const items = frame.list.items;

      if (frame.index >= items.length) {
        stack.pop();
        this.close(frame);
        continue;
      }

      const index = frame.index++;
      const item = items[index];
      if (frame.replay && frame.list.layout) {
        this.write(frame.list.layout.gaps[index]);
      } else if (index > 0 && !isList(item)) {
        this.separator(frame.depth + 1);
      }

      if (isList(item)) {
        this.open(item, frame.depth + 1, frame.replay, stack);
      } else {
        this.write(formatAtom(item));
        this.last = 'atom';
      }
    }
  }

  private open(list: SExprList, depth: number, placed: boolean, stack: Frame[]): void {
    const keyword = leadingKeyword(list);
    const isXY = keyword === 'xy' && list.items.length > 1;

    if (placed || this.last === 'none') {
      this.write('(');
    } else if (this.inXY && isXY && this.column < XY_COLUMN_LIMIT) {
      this.write(' (');
    } else if (this.inShortForm) {
      this.write(' (');
    } else {
      this.write(`\n${this.indent(depth)}(`);
    }

    this.inXY = isXY;
    if (this.options.compact && SHORT_FORM_KEYWORDS.has(shortFormToken(keyword))) {
      this.inShortForm = true;
      this.shortFormDepth = depth;
    }

    this.last = 'open';
    stack.push({ list, index: 0, depth, replay: this.options.preserveLayout && hasUsableLayout(list) });
  }

  private separator(listDepth: number): void {
    if (this.last === 'open') return;
    if (this.inXY || this.column < TOKEN_WRAP_COLUMN) {
      this.write(' ');
    } else if (this.inShortForm) {
      this.write(' ', false);
    } else {
      this.write(`\n${this.indent(listDepth)}`);
      this.inMultiLineList = true;
    }
  }

  private close(frame: Frame): void {
    if (frame.replay && frame.list.layout) {
      this.write(frame.list.layout.gaps[frame.list.items.length]);
      this.write(')');
    } else if (this.inShortForm) {
      this.write(')');
    } else if (this.last === 'close' || this.inMultiLineList) {
      this.write(`\n${this.indent(frame.depth)})`);
      this.inMultiLineList = false;
    } else {
      this.write(')');
    }

    if (this.shortFormDepth === frame.depth) {
      this.inShortForm = false;
      this.shortFormDepth = 0;
    }
    this.last = 'close';
  }
}

function resolveOptions(options: SerializeOptions): Required<SerializeOptions> {
  return {
    indent: options.indent ?? DEFAULT_FORMAT.indent,
    compact: options.compact ?? DEFAULT_FORMAT.compact,
    preserveLayout: options.preserveLayout ?? true,
  };
}

function writeForm(form: SExprList, options: Required<SerializeOptions>): string {
  const writer = new SExprWriter(options);
  writer.writeList(form);
  return writer.toString();
}

/** Serialize a single list, without a trailing newline */
export function formatList(expr: SExprList, options: SerializeOptions = {}): string {
  return writeForm(expr, resolveOptions(options));
}

/** Serialize a list or a whole document back to file text */
export function serializeSExpression(expr: SExprList | SExprDocument, options: SerializeOptions = {}): string {
  const resolved = resolveOptions(options);

  if (!('forms' in expr)) {
    return writeForm(expr, resolved) + '\n';
  }

  const gaps = expr.layout?.gaps;
  if (resolved.preserveLayout && gaps && gaps.length === expr.forms.length + 1) {
    let text = '';
    expr.forms.forEach((form, i) => {
      text += gaps[i] + writeForm(form, resolved);
    });
    return text + gaps[expr.forms.length];
  }

  return expr.forms.map((form) => writeForm(form, resolved) + '\n').join('');
}
