/**
 * Typed lookups over the generic S-expression tree.
 */

import { SchemaError } from '../shared/errors';
import { formatNumber } from './formatter';
import { isAtom, isList, isNumberAtom, type SExpr, type SExprAtom, type SExprList } from './sexpr';

/** Text of an atom as written, numbers included */
export function atomText(atom: SExprAtom): string {
  if (isNumberAtom(atom)) return atom.raw ?? formatNumber(atom.value);
  return atom.value;
}

/** Leading keyword of a list, if it has one */
export function keywordOf(expr: SExpr | undefined): string | undefined {
  if (!isList(expr)) return undefined;
  const head = expr.items[0];
  return head !== undefined && head.kind === 'symbol' ? head.value : undefined;
}

/**
 * Identity used to anchor preserved children: a list's keyword or an atom's text.
 * Numbers use their canonical form so `0.0` read and `0` written match.
 */
export function keyOf(expr: SExpr): string {
  if (isList(expr)) return `(${keywordOf(expr) ?? ''}`;
  if (isNumberAtom(expr)) return formatNumber(expr.value);
  return expr.value;
}

export function describe(expr: SExpr | undefined): string {
  if (expr === undefined) return 'nothing';
  if (isList(expr)) return `list '(${keywordOf(expr) ?? ''} ...)'`;
  return `${expr.kind} '${atomText(expr)}'`;
}

/** Find a child expression by its first element (keyword) */
export function findExpr(expr: SExprList, keyword: string): SExprList | undefined {
  for (let i = 1; i < expr.items.length; i++) {
    const child = expr.items[i];
    if (isList(child) && keywordOf(child) === keyword) return child;
  }
  return undefined;
}

/** Find all child expressions matching a keyword */
export function findAllExpr(expr: SExprList, keyword: string): SExprList[] {
  const results: SExprList[] = [];
  for (let i = 1; i < expr.items.length; i++) {
    const child = expr.items[i];
    if (isList(child) && keywordOf(child) === keyword) results.push(child);
  }
  return results;
}

export function getAtom(expr: SExprList, index: number): SExprAtom | undefined {
  const item = expr.items[index];
  return isAtom(item) ? item : undefined;
}

/** Get a string value from a tagged expression: (tag "value") -> "value" */
export function getStringValue(expr: SExprList, keyword: string): string | undefined {
  const found = findExpr(expr, keyword);
  const atom = found ? getAtom(found, 1) : undefined;
  return atom ? atomText(atom) : undefined;
}

/** Get a number value from a tagged expression: (tag 123) -> 123 */
export function getNumberValue(expr: SExprList, keyword: string): number | undefined {
  const found = findExpr(expr, keyword);
  const atom = found ? found.items[1] : undefined;
  return isNumberAtom(atom) ? atom.value : undefined;
}

/** Get XY coordinates from: (at 10 20) or (xy 10 20) */
export function getXY(expr: SExprList, keyword: string = 'at'): { x: number; y: number; rotation?: number } | undefined {
  const found = findExpr(expr, keyword);
  if (!found) return undefined;
  const [, x, y, rotation] = found.items;
  if (!isNumberAtom(x) || !isNumberAtom(y)) return undefined;
  return {
    x: x.value,
    y: y.value,
    rotation: isNumberAtom(rotation) ? rotation.value : undefined,
  };
}

/** Get size from: (size 10 20) */
export function getSize(expr: SExprList, keyword: string = 'size'): { w: number; h: number } | undefined {
  const found = findExpr(expr, keyword);
  if (!found) return undefined;
  const [, w, h] = found.items;
  if (!isNumberAtom(w) || !isNumberAtom(h)) return undefined;
  return { w: w.value, h: h.value };
}

/** Presence of a bare flag among the children: (pad "1" smd rect locked ...) */
export function hasFlag(expr: SExprList, name: string): boolean {
  for (let i = 1; i < expr.items.length; i++) {
    const child = expr.items[i];
    if (child.kind === 'symbol' && child.value === name) return true;
  }
  return false;
}

/** Boolean from `(hide yes)`, `(hide no)`, `(hide)` or a bare `hide` */
export function getBoolValue(expr: SExprList, name: string): boolean | undefined {
  const found = findExpr(expr, name);
  if (found) {
    const value = getAtom(found, 1);
    return value === undefined || atomText(value) !== 'no';
  }
  return hasFlag(expr, name) ? true : undefined;
}

// --- Coercions ---

export function asString(expr: SExpr | undefined, construct: string, field: string): string {
  if (!isAtom(expr)) throw new SchemaError(construct, field, 'an atom', describe(expr));
  return atomText(expr);
}

export function asNumber(expr: SExpr | undefined, construct: string, field: string): number {
  if (!isNumberAtom(expr)) throw new SchemaError(construct, field, 'a number', describe(expr));
  return expr.value;
}

export function asInteger(expr: SExpr | undefined, construct: string, field: string): number {
  if (!isNumberAtom(expr) || !Number.isInteger(expr.value)) {
    throw new SchemaError(construct, field, 'an integer', describe(expr));
  }
  return expr.value;
}

// --- Reader ---

/** A child the schema did not recognize, kept for verbatim re-emission */
export interface ExtraItem {
  item: SExpr;
  /** Key of the nearest recognized child before this one */
  after: string;
  /** Which occurrence of that key (1-based) */
  occurrence: number;
  /** Nothing with the same key came after it, so it stays behind the last one */
  endOfRun?: boolean;
}

/** Leftovers of a child list that was read field by field, e.g. `(start 0 0 9)` */
export interface NestedExtras {
  key: string;
  occurrence: number;
  extras: ExtraItem[];
  nested?: NestedExtras[];
}

/** How a boolean token was written: `locked`, `(locked)` or `(locked yes)` */
export type FlagForm = 'bare' | 'empty' | 'yes-no';

export interface BoolToken {
  value: boolean;
  form: FlagForm;
}

/**
 * Decoding cursor over one list. Every read marks the child it used; whatever is
 * left unread at the end is returned by extras(). Child lists entered through
 * nested() get a reader of their own, and their leftovers come back from
 * nestedExtras().
 */
export class NodeReader {
  readonly keyword: string;
  private readonly consumed: boolean[];
  private readonly entered = new Map<number, NodeReader>();

  private constructor(readonly node: SExprList, keyword: string, readonly construct: string) {
    this.keyword = keyword;
    this.consumed = new Array<boolean>(node.items.length).fill(false);
    this.consumed[0] = true;
  }

  /** Verify the leading keyword and start reading */
  static of(expr: SExpr | undefined, keywords: string | readonly string[], construct?: string): NodeReader {
    const accepted: readonly string[] = typeof keywords === 'string' ? [keywords] : keywords;
    const name = construct ?? accepted[0];
    if (!isList(expr)) {
      throw new SchemaError(name, 'keyword', `list '(${accepted[0]} ...)'`, describe(expr));
    }
    const keyword = keywordOf(expr);
    if (keyword === undefined || !accepted.includes(keyword)) {
      throw new SchemaError(name, 'keyword', accepted.map((k) => `'${k}'`).join(' or '), `'${keyword ?? describe(expr.items[0])}'`);
    }
    return new NodeReader(expr, keyword, name);
  }

  get length(): number {
    return this.node.items.length;
  }

  /** Peek at an item without consuming it */
  peek(index: number): SExpr | undefined {
    return this.node.items[index];
  }

  // --- Positional atoms ---

  string(index: number, field: string): string {
    const value = asString(this.node.items[index], this.construct, field);
    this.consumed[index] = true;
    return value;
  }

  optionalString(index: number, field: string): string | undefined {
    return isAtom(this.node.items[index]) && !this.consumed[index] ? this.string(index, field) : undefined;
  }

  number(index: number, field: string): number {
    const value = asNumber(this.node.items[index], this.construct, field);
    this.consumed[index] = true;
    return value;
  }

  optionalNumber(index: number, field: string): number | undefined {
    return isNumberAtom(this.node.items[index]) ? this.number(index, field) : undefined;
  }

  integer(index: number, field: string): number {
    const value = asInteger(this.node.items[index], this.construct, field);
    this.consumed[index] = true;
    return value;
  }

  /** All remaining unread atoms from `start` on, as text */
  atomsFrom(start: number): string[] {
    const values: string[] = [];
    for (let i = start; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (isAtom(item) && !this.consumed[i]) {
        values.push(atomText(item));
        this.consumed[i] = true;
      }
    }
    return values;
  }

  // --- Child lists ---

  child(keyword: string): SExprList | undefined {
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (!this.consumed[i] && isList(item) && keywordOf(item) === keyword) {
        this.consumed[i] = true;
        return item;
      }
    }
    return undefined;
  }

  children(keyword: string): SExprList[] {
    const found: SExprList[] = [];
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (!this.consumed[i] && isList(item) && keywordOf(item) === keyword) {
        this.consumed[i] = true;
        found.push(item);
      }
    }
    return found;
  }

  requireChild(keyword: string): SExprList {
    const found = this.child(keyword);
    if (!found) throw new SchemaError(this.construct, keyword, `'(${keyword} ...)'`, 'nothing');
    return found;
  }

  /** Children in source order whose keyword is accepted by `accept` */
  childrenWhere(accept: (keyword: string) => boolean): SExprList[] {
    const found: SExprList[] = [];
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      const keyword = keywordOf(item);
      if (!this.consumed[i] && isList(item) && keyword !== undefined && accept(keyword)) {
        this.consumed[i] = true;
        found.push(item);
      }
    }
    return found;
  }

  // --- Nested readers ---

  /** Reader over the first unread `(keyword ...)` child */
  nested(keyword: string): NodeReader | undefined {
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (!this.consumed[i] && isList(item) && keywordOf(item) === keyword) return this.enter(i, item);
    }
    return undefined;
  }

  requireNested(keyword: string): NodeReader {
    const found = this.nested(keyword);
    if (!found) throw new SchemaError(this.construct, keyword, `'(${keyword} ...)'`, 'nothing');
    return found;
  }

  nestedAll(keyword: string): NodeReader[] {
    const found: NodeReader[] = [];
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (!this.consumed[i] && isList(item) && keywordOf(item) === keyword) found.push(this.enter(i, item));
    }
    return found;
  }

  /** Readers over every unread child list, whatever its head: `(layers (0 "F.Cu" signal) ...)` */
  nestedLists(): NodeReader[] {
    const found: NodeReader[] = [];
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (!this.consumed[i] && isList(item)) found.push(this.enter(i, item));
    }
    return found;
  }

  private enter(index: number, item: SExprList): NodeReader {
    const reader = new NodeReader(item, keywordOf(item) ?? '', this.construct);
    this.consumed[index] = true;
    this.entered.set(index, reader);
    return reader;
  }

  decodeChild<T>(keyword: string, decode: (node: SExprList) => T): T | undefined {
    const found = this.child(keyword);
    return found ? decode(found) : undefined;
  }

  decodeChildren<T>(keyword: string, decode: (node: SExprList) => T): T[] {
    return this.children(keyword).map(decode);
  }

  /** (keyword value) -> value as text */
  childString(keyword: string): string | undefined {
    return this.nested(keyword)?.string(1, keyword);
  }

  childNumber(keyword: string): number | undefined {
    return this.nested(keyword)?.number(1, keyword);
  }

  childInteger(keyword: string): number | undefined {
    return this.nested(keyword)?.integer(1, keyword);
  }

  /** `(keyword a b c)` -> ['a', 'b', 'c'] */
  childStrings(keyword: string): string[] | undefined {
    return this.nested(keyword)?.atomsFrom(1);
  }

  // --- Flags ---

  /** Bare flag among the children */
  flag(name: string): boolean {
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (!this.consumed[i] && item.kind === 'symbol' && item.value === name) {
        this.consumed[i] = true;
        return true;
      }
    }
    return false;
  }

  /** Boolean written as bare flag, `(name)` or `(name yes|no)` */
  bool(name: string): BoolToken | undefined {
    if (this.flag(name)) return { value: true, form: 'bare' };
    const found = this.nested(name);
    if (!found) return undefined;
    if (found.length < 2) return { value: true, form: 'empty' };
    return { value: found.string(1, name) !== 'no', form: 'yes-no' };
  }

  // --- Leftovers ---

  /** Keys of the children read so far, in file order */
  consumedKeys(): string[] {
    const keys: string[] = [];
    for (let i = 1; i < this.node.items.length; i++) {
      if (this.consumed[i]) keys.push(keyOf(this.node.items[i]));
    }
    return keys;
  }

  extras(): ExtraItem[] {
    const extras: ExtraItem[] = [];
    const seen = new Map<string, number>();
    let after = keyOf(this.node.items[0]);
    let occurrence = 1;
    seen.set(after, 1);
    for (let i = 1; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (this.consumed[i]) {
        after = keyOf(item);
        occurrence = (seen.get(after) ?? 0) + 1;
        seen.set(after, occurrence);
      } else {
        extras.push({ item, after, occurrence });
      }
    }
    for (const extra of extras) {
      if (extra.occurrence < (seen.get(extra.after) ?? 0)) continue;
      extra.endOfRun = true;
    }
    return extras;
  }

  /** Leftovers of the entered child lists, keyed by the child's key and occurrence */
  nestedExtras(): NestedExtras[] {
    const result: NestedExtras[] = [];
    const seen = new Map<string, number>();
    for (let i = 1; i < this.node.items.length; i++) {
      if (!this.consumed[i]) continue;
      const key = keyOf(this.node.items[i]);
      const occurrence = (seen.get(key) ?? 0) + 1;
      seen.set(key, occurrence);
      const reader = this.entered.get(i);
      if (!reader) continue;
      const extras = reader.extras();
      const nested = reader.nestedExtras();
      if (extras.length === 0 && nested.length === 0) continue;
      result.push(nested.length > 0 ? { key, occurrence, extras, nested } : { key, occurrence, extras });
    }
    return result;
  }
}
