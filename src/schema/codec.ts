/**
 * Schema codec contract
 *
 * Every construct (a via, a pad, a title block, ...) is described by one codec:
 * decode() turns a list into a typed entity, encode() turns the entity back into a
 * list by running an ordered emit plan, and create() builds a new entity with the
 * defaults KiCad gives a freshly inserted item.
 */

import { DEFAULT_CONFIG, type LibraryConfig } from '../shared/config';
import { SchemaError } from '../shared/errors';
import { NodeReader, describe, keyOf, keywordOf, type BoolToken, type ExtraItem, type FlagForm, type NestedExtras } from '../parser/nodeAccessor';
import { flag, isList, list, sym, type SExpr, type SExprList } from '../parser/sexpr';

// --- Types ---

export interface Entity {
  /** Children this schema does not model, re-emitted after the child they followed */
  extras: ExtraItem[];
  /** How boolean tokens were written, so they are written back the same way */
  flagForms?: Partial<Record<string, FlagForm>>;
  /** Keys of the children that were read, in file order */
  order?: string[];
  /** Unread items inside children that were read field by field */
  nested?: NestedExtras[];
}

/** Entity that is part of a keyword-dispatched union */
export interface TaggedEntity extends Entity {
  type: string;
}

/** A construct no registered codec knows, kept verbatim */
export interface RawItem extends TaggedEntity {
  type: 'raw';
  node: SExprList;
}

/**
 * One step of an encode plan. Steps run in order; a step is skipped when `when`
 * returns false or `emit` returns undefined.
 */
export interface EmitStep<T> {
  readonly field: string;
  when?(entity: T): boolean;
  emit(entity: T): SExpr | readonly SExpr[] | undefined;
}

export interface SchemaCodec<T extends Entity> {
  readonly keyword: string;
  readonly aliases: readonly string[];
  readonly plan: readonly EmitStep<T>[];
  decode(node: SExpr): T;
  encode(entity: T): SExprList;
  create(config?: LibraryConfig): T;
}

export interface CodecDefinition<T extends Entity> {
  keyword: string;
  aliases?: readonly string[];
  /** Keyword to write when it depends on the entity (legacy `module` footprints) */
  writeKeyword?(entity: T): string;
  /** Read the fields; extras are filled in afterwards from what was left unread */
  read(reader: NodeReader): T;
  plan: readonly EmitStep<T>[];
  create(config: LibraryConfig): T;
}

// --- Codec construction ---

export function defineCodec<T extends Entity>(definition: CodecDefinition<T>): SchemaCodec<T> {
  const aliases = definition.aliases ?? [];
  const accepted = [definition.keyword, ...aliases];
  return {
    keyword: definition.keyword,
    aliases,
    plan: definition.plan,
    decode(node: SExpr): T {
      const reader = NodeReader.of(node, accepted, definition.keyword);
      const entity = definition.read(reader);
      entity.extras = reader.extras();
      entity.order = reader.consumedKeys();
      const nested = reader.nestedExtras();
      if (nested.length > 0) entity.nested = nested;
      return entity;
    },
    encode(entity: T): SExprList {
      const keyword = definition.writeKeyword ? definition.writeKeyword(entity) : definition.keyword;
      return encodeWithPlan(keyword, entity, definition.plan);
    },
    create(config: LibraryConfig = DEFAULT_CONFIG): T {
      return definition.create(config);
    },
  };
}

/** Run an emit plan and put the entity's extras back in place */
export function encodeWithPlan<T extends Entity>(keyword: string, entity: T, plan: readonly EmitStep<T>[]): SExprList {
  const known: SExpr[] = [];
  for (const step of plan) {
    if (step.when && !step.when(entity)) continue;
    const emitted = step.emit(entity);
    if (emitted === undefined) continue;
    if (isExprArray(emitted)) {
      for (const item of emitted) known.push(item);
    } else {
      known.push(emitted);
    }
  }
  const children = restoreNested(restoreOrder(known, entity.order), entity.nested);
  return { kind: 'list', items: placeExtras([sym(keyword), ...children], entity.extras) };
}

/** Put the leftovers of field-by-field children back inside the matching emitted child */
export function restoreNested(items: SExpr[], nested: readonly NestedExtras[] | undefined): SExpr[] {
  if (!nested || nested.length === 0) return items;
  const seen = new Map<string, number>();
  return items.map((item) => {
    const key = keyOf(item);
    const occurrence = (seen.get(key) ?? 0) + 1;
    seen.set(key, occurrence);
    const left = nested.find((n) => n.key === key && n.occurrence === occurrence);
    if (!left || !isList(item) || item.items.length === 0) return item;
    const [head, ...rest] = item.items;
    return { ...item, items: placeExtras([head, ...restoreNested(rest, left.nested)], left.extras) };
  });
}

/**
 * Put emitted children that were read from a file back in the order they were read.
 * Only the slots holding such children are permuted; new children keep their plan slot.
 */
export function restoreOrder(items: SExpr[], order: readonly string[] | undefined): SExpr[] {
  if (!order || order.length === 0) return items;

  const sourceIndices = new Map<string, number[]>();
  order.forEach((key, index) => {
    const found = sourceIndices.get(key);
    if (found) found.push(index);
    else sourceIndices.set(key, [index]);
  });

  const seen = new Map<string, number>();
  const slots: number[] = [];
  const ranked: Array<{ rank: number; item: SExpr }> = [];
  items.forEach((item, index) => {
    const key = keyOf(item);
    const occurrence = seen.get(key) ?? 0;
    seen.set(key, occurrence + 1);
    const rank = sourceIndices.get(key)?.[occurrence];
    if (rank !== undefined) {
      slots.push(index);
      ranked.push({ rank, item });
    }
  });

  ranked.sort((a, b) => a.rank - b.rank);
  const result = [...items];
  slots.forEach((slot, i) => {
    result[slot] = ranked[i].item;
  });
  return result;
}

function isExprArray(value: SExpr | readonly SExpr[]): value is readonly SExpr[] {
  return Array.isArray(value);
}

/**
 * Insert each extra right after the same occurrence of the child it followed when
 * read. If that occurrence no longer exists, or the extra closed a run of that key,
 * it goes after the last occurrence of the key; if the key is gone altogether it
 * goes at the end.
 */
export function placeExtras(known: SExpr[], extras: readonly ExtraItem[]): SExpr[] {
  if (extras.length === 0) return known;

  const positions = new Map<string, number[]>();
  known.forEach((item, index) => {
    const key = keyOf(item);
    const found = positions.get(key);
    if (found) found.push(index);
    else positions.set(key, [index]);
  });

  const attached: SExpr[][] = known.map(() => []);
  const tail: SExpr[] = [];
  for (const extra of extras) {
    const found = positions.get(extra.after);
    if (!found) {
      tail.push(extra.item);
      continue;
    }
    const occurrence = extra.endOfRun ? found.length : Math.min(extra.occurrence, found.length);
    attached[found[occurrence - 1]].push(extra.item);
  }

  const items: SExpr[] = [];
  known.forEach((item, index) => {
    items.push(item);
    for (const extra of attached[index]) items.push(extra);
  });
  for (const extra of tail) items.push(extra);
  return items;
}

// --- Emit helpers ---

/** Write a boolean the way it was read, or in `defaultForm` for new entities */
export function emitBool(entity: Entity, name: string, value: boolean | undefined, defaultForm: FlagForm): SExpr | undefined {
  const form = entity.flagForms?.[name];
  if (!value) {
    return form === 'yes-no' && value === false ? list(name, 'no') : undefined;
  }
  switch (form ?? defaultForm) {
    case 'bare': return flag(name);
    case 'empty': return list(name);
    case 'yes-no': return list(name, 'yes');
  }
}

/** Remember how a boolean was written and return its value */
export function readBool(entity: Entity, token: BoolToken | undefined, name: string): boolean | undefined {
  if (!token) return undefined;
  entity.flagForms = { ...entity.flagForms, [name]: token.form };
  return token.value;
}

/** `(yes|no)` valued token that is always written */
export function yesNo(name: string, value: boolean): SExprList {
  return list(name, value ? 'yes' : 'no');
}

export function optionalYesNo(name: string, value: boolean | undefined): SExprList | undefined {
  return value === undefined ? undefined : yesNo(name, value);
}

// --- Registry ---

export function isRawItem(item: TaggedEntity): item is RawItem {
  return item.type === 'raw' && 'node' in item;
}

export function rawItem(node: SExprList): RawItem {
  return { type: 'raw', node, extras: [] };
}

/**
 * Keyword-dispatched set of codecs for one family of items. Unknown keywords decode
 * to RawItem and are written back unchanged.
 */
export class CodecRegistry<T extends TaggedEntity> {
  private readonly byKeyword = new Map<string, SchemaCodec<T>>();
  private readonly byType = new Map<string, SchemaCodec<T>>();

  constructor(codecs: readonly SchemaCodec<T>[] = []) {
    for (const codec of codecs) this.register(codec);
  }

  register(codec: SchemaCodec<T>): this {
    this.byType.set(codec.keyword, codec);
    for (const keyword of [codec.keyword, ...codec.aliases]) {
      this.byKeyword.set(keyword, codec);
    }
    return this;
  }

  has(keyword: string): boolean {
    return this.byKeyword.has(keyword);
  }

  get keywords(): string[] {
    return [...this.byKeyword.keys()];
  }

  decode(node: SExpr): T | RawItem {
    if (!isList(node)) {
      throw new SchemaError('item', 'keyword', 'a list', describe(node));
    }
    const codec = this.byKeyword.get(keywordOf(node) ?? '');
    return codec ? codec.decode(node) : rawItem(node);
  }

  encode(item: T | RawItem): SExprList {
    if (isRawItem(item)) return item.node;
    const codec = this.byType.get(item.type);
    if (!codec) {
      throw new SchemaError('item', 'type', this.keywords.join(', '), `'${item.type}'`);
    }
    return codec.encode(item);
  }
}
