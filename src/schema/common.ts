/**
 * Constructs shared by several file kinds: positions, strokes, text effects,
 * title blocks, paper settings, properties and nets.
 */

import { randomUUID } from 'crypto';
import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, num, str, type SExpr, type SExprList } from '../parser/sexpr';
import { defineCodec, emitBool, readBool, type EmitStep, type Entity } from './codec';

// --- Positions ---

export interface Point {
  x: number;
  y: number;
}

export interface Position extends Point {
  angle?: number;
  /** Text that does not rotate with its parent footprint */
  unlocked?: boolean;
}

/** (xy x y), (start x y), (end x y), (center x y), (mid x y) */
export function readPoint(reader: NodeReader): Point {
  return { x: reader.number(1, 'x'), y: reader.number(2, 'y') };
}

export function point(keyword: string, p: Point): SExprList {
  return list(keyword, p.x, p.y);
}

/** (at x y [angle] [unlocked]) */
export function readPosition(reader: NodeReader): Position {
  const position: Position = {
    x: reader.number(1, 'x'),
    y: reader.number(2, 'y'),
    angle: reader.optionalNumber(3, 'angle'),
  };
  if (reader.flag('unlocked')) position.unlocked = true;
  return position;
}

export function optionalPosition(reader: NodeReader): Position | undefined {
  const found = reader.nested('at');
  return found ? readPosition(found) : undefined;
}

export function position(p: Position): SExprList {
  const node = list('at', p.x, p.y);
  if (p.angle !== undefined) node.items.push(num(p.angle));
  if (p.unlocked) node.items.push(flag('unlocked'));
  return node;
}

/** (pts (xy ..) (xy ..) ...) */
export function readPoints(reader: NodeReader): Point[] {
  return reader.nestedAll('xy').map(readPoint);
}

export function points(pts: readonly Point[]): SExprList {
  const node = list('pts');
  for (const p of pts) node.items.push(point('xy', p));
  return node;
}

// --- File header ---

/** `(version N) (generator "name") (generator_version "8.0")` of a root list */
export interface FileHeader {
  /** Absent in files older than the versioned format */
  version?: number;
  generator?: string;
  generatorVersion?: string;
}

export function readHeader(reader: NodeReader): FileHeader {
  return {
    version: reader.childInteger('version'),
    generator: reader.childString('generator'),
    generatorVersion: reader.childString('generator_version'),
  };
}

export function headerSteps<T extends FileHeader & Entity>(): EmitStep<T>[] {
  return [
    { field: 'version', emit: (h) => optionalNumber('version', h.version) },
    { field: 'generator', when: (h) => h.generator !== undefined, emit: (h) => list('generator', str(h.generator ?? '')) },
    {
      field: 'generator_version',
      when: (h) => h.generatorVersion !== undefined,
      emit: (h) => list('generator_version', str(h.generatorVersion ?? '')),
    },
  ];
}

// --- Identifiers ---

/** uuid (KiCad 6+) or tstamp (older files) */
export interface Identifier {
  key: 'uuid' | 'tstamp';
  value: string;
}

export function readIdentifier(reader: NodeReader): Identifier | undefined {
  const uuid = reader.childString('uuid');
  if (uuid !== undefined) return { key: 'uuid', value: uuid };
  const tstamp = reader.childString('tstamp');
  return tstamp !== undefined ? { key: 'tstamp', value: tstamp } : undefined;
}

/** Fresh identifier for a newly created item */
export function newUuid(): Identifier {
  return { key: 'uuid', value: randomUUID() };
}

export function identifier(id: Identifier | undefined): SExprList | undefined {
  if (!id) return undefined;
  return list(id.key, id.key === 'uuid' ? str(id.value) : id.value);
}

// --- Colors ---

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export function readColor(reader: NodeReader): Color {
  return {
    r: reader.number(1, 'r'),
    g: reader.number(2, 'g'),
    b: reader.number(3, 'b'),
    a: reader.number(4, 'a'),
  };
}

export function optionalColor(reader: NodeReader): Color | undefined {
  const found = reader.nested('color');
  return found ? readColor(found) : undefined;
}

export function color(c: Color): SExprList {
  return list('color', c.r, c.g, c.b, c.a);
}

// --- Stroke ---

export interface Stroke extends Entity {
  width: number;
  type: string;
  color?: Color;
}

export const strokeCodec = defineCodec<Stroke>({
  keyword: 'stroke',
  read(reader) {
    return {
      width: reader.childNumber('width') ?? 0,
      type: reader.childString('type') ?? 'default',
      color: optionalColor(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'width', emit: (s) => list('width', s.width) },
    { field: 'type', emit: (s) => list('type', s.type) },
    { field: 'color', when: (s) => s.color !== undefined, emit: (s) => (s.color ? color(s.color) : undefined) },
  ],
  create: () => ({ width: 0, type: 'default', extras: [] }),
});

// --- Text effects ---

export interface Font extends Entity {
  face?: string;
  height: number;
  width: number;
  thickness?: number;
  bold: boolean;
  italic: boolean;
  lineSpacing?: number;
  color?: Color;
}

export const fontCodec = defineCodec<Font>({
  keyword: 'font',
  read(reader) {
    const font: Font = { height: 1.27, width: 1.27, bold: false, italic: false, extras: [] };
    font.face = reader.childString('face');
    const size = reader.nested('size');
    if (size) {
      font.height = size.number(1, 'height');
      font.width = size.number(2, 'width');
    }
    font.thickness = reader.childNumber('thickness');
    font.bold = readBool(font, reader.bool('bold'), 'bold') ?? false;
    font.italic = readBool(font, reader.bool('italic'), 'italic') ?? false;
    font.lineSpacing = reader.childNumber('line_spacing');
    font.color = optionalColor(reader);
    return font;
  },
  plan: [
    { field: 'face', when: (f) => f.face !== undefined, emit: (f) => list('face', str(f.face ?? '')) },
    { field: 'size', emit: (f) => list('size', f.height, f.width) },
    { field: 'line_spacing', when: (f) => f.lineSpacing !== undefined, emit: (f) => list('line_spacing', f.lineSpacing ?? 1) },
    { field: 'thickness', when: (f) => f.thickness !== undefined, emit: (f) => list('thickness', f.thickness ?? 0) },
    { field: 'bold', emit: (f) => emitBool(f, 'bold', f.bold, 'yes-no') },
    { field: 'italic', emit: (f) => emitBool(f, 'italic', f.italic, 'yes-no') },
    { field: 'color', when: (f) => f.color !== undefined, emit: (f) => (f.color ? color(f.color) : undefined) },
  ],
  create: () => ({ height: 1.27, width: 1.27, bold: false, italic: false, extras: [] }),
});

export interface Effects extends Entity {
  font: Font;
  /** left/right/top/bottom/mirror */
  justify: string[];
  hide: boolean;
  href?: string;
}

export const effectsCodec = defineCodec<Effects>({
  keyword: 'effects',
  read(reader) {
    const effects: Effects = { font: fontCodec.create(), justify: [], hide: false, extras: [] };
    effects.font = reader.decodeChild('font', fontCodec.decode) ?? effects.font;
    effects.justify = reader.childStrings('justify') ?? [];
    effects.hide = readBool(effects, reader.bool('hide'), 'hide') ?? false;
    effects.href = reader.childString('href');
    return effects;
  },
  plan: [
    { field: 'font', emit: (e) => fontCodec.encode(e.font) },
    { field: 'justify', when: (e) => e.justify.length > 0, emit: (e) => list('justify', ...e.justify) },
    { field: 'href', when: (e) => e.href !== undefined, emit: (e) => list('href', str(e.href ?? '')) },
    { field: 'hide', emit: (e) => emitBool(e, 'hide', e.hide, 'yes-no') },
  ],
  create: () => ({ font: fontCodec.create(), justify: [], hide: false, extras: [] }),
});

// --- Paper / title block ---

export interface PageSettings extends Entity {
  /** A0..A5, A, B, C, D, E, USLetter, USLegal, USLedger or User */
  paperSize: string;
  width?: number;
  height?: number;
  portrait: boolean;
}

export const pageSettingsCodec = defineCodec<PageSettings>({
  keyword: 'paper',
  read(reader) {
    const paperSize = reader.string(1, 'paperSize');
    return {
      paperSize,
      width: paperSize === 'User' ? reader.number(2, 'width') : undefined,
      height: paperSize === 'User' ? reader.number(3, 'height') : undefined,
      portrait: reader.flag('portrait'),
      extras: [],
    };
  },
  plan: [
    { field: 'paperSize', emit: (p) => str(p.paperSize) },
    {
      field: 'size',
      when: (p) => p.paperSize === 'User',
      emit: (p) => [num(p.width ?? 0), num(p.height ?? 0)],
    },
    { field: 'portrait', when: (p) => p.portrait, emit: () => flag('portrait') },
  ],
  create: () => ({ paperSize: 'A4', portrait: false, extras: [] }),
});

export interface TitleBlockComment {
  number: number;
  text: string;
}

export interface TitleBlock extends Entity {
  title?: string;
  date?: string;
  revision?: string;
  company?: string;
  comments: TitleBlockComment[];
}

export const titleBlockCodec = defineCodec<TitleBlock>({
  keyword: 'title_block',
  read(reader) {
    return {
      title: reader.childString('title'),
      date: reader.childString('date'),
      revision: reader.childString('rev'),
      company: reader.childString('company'),
      comments: reader.nestedAll('comment').map((comment) => ({
        number: comment.integer(1, 'number'),
        text: comment.string(2, 'text'),
      })),
      extras: [],
    };
  },
  plan: [
    { field: 'title', when: (t) => t.title !== undefined, emit: (t) => list('title', str(t.title ?? '')) },
    { field: 'date', when: (t) => t.date !== undefined, emit: (t) => list('date', str(t.date ?? '')) },
    { field: 'rev', when: (t) => t.revision !== undefined, emit: (t) => list('rev', str(t.revision ?? '')) },
    { field: 'company', when: (t) => t.company !== undefined, emit: (t) => list('company', str(t.company ?? '')) },
    { field: 'comments', emit: (t) => t.comments.map((c) => list('comment', c.number, str(c.text))) },
  ],
  create: () => ({ comments: [], extras: [] }),
});

// --- Properties ---

export interface Property extends Entity {
  name: string;
  value: string;
  /** Numeric field id written by KiCad 6/7 schematics */
  id?: number;
  position?: Position;
  layer?: string;
  hide: boolean;
  unlocked?: boolean;
  uuid?: Identifier;
  effects?: Effects;
}

export const propertyCodec = defineCodec<Property>({
  keyword: 'property',
  read(reader) {
    const property: Property = {
      name: reader.string(1, 'name'),
      value: reader.string(2, 'value'),
      hide: false,
      extras: [],
    };
    property.id = reader.childInteger('id');
    property.position = optionalPosition(reader);
    property.unlocked = readBool(property, reader.bool('unlocked'), 'unlocked');
    property.layer = reader.childString('layer');
    property.hide = readBool(property, reader.bool('hide'), 'hide') ?? false;
    property.uuid = readIdentifier(reader);
    property.effects = reader.decodeChild('effects', effectsCodec.decode);
    return property;
  },
  plan: [
    { field: 'name', emit: (p) => str(p.name) },
    { field: 'value', emit: (p) => str(p.value) },
    { field: 'id', when: (p) => p.id !== undefined, emit: (p) => list('id', p.id ?? 0) },
    { field: 'at', when: (p) => p.position !== undefined, emit: (p) => (p.position ? position(p.position) : undefined) },
    { field: 'unlocked', emit: (p) => emitBool(p, 'unlocked', p.unlocked, 'yes-no') },
    { field: 'layer', when: (p) => p.layer !== undefined, emit: (p) => list('layer', str(p.layer ?? '')) },
    { field: 'hide', emit: (p) => emitBool(p, 'hide', p.hide, 'yes-no') },
    { field: 'uuid', emit: (p) => identifier(p.uuid) },
    { field: 'effects', when: (p) => p.effects !== undefined, emit: (p) => (p.effects ? effectsCodec.encode(p.effects) : undefined) },
  ],
  create: () => ({ name: '', value: '', hide: false, extras: [] }),
});

// --- Nets ---

export interface Net extends Entity {
  number: number;
  name: string;
}

export const netCodec = defineCodec<Net>({
  keyword: 'net',
  read(reader) {
    return {
      number: reader.integer(1, 'number'),
      name: reader.optionalString(2, 'name') ?? '',
      extras: [],
    };
  },
  plan: [
    { field: 'number', emit: (n) => num(n.number) },
    { field: 'name', emit: (n) => str(n.name) },
  ],
  create: () => ({ number: 0, name: '', extras: [] }),
});

/** Helper for optional `(keyword "text")` children */
export function optionalString(keyword: string, value: string | undefined): SExpr | undefined {
  return value === undefined ? undefined : list(keyword, str(value));
}

/** Helper for optional `(keyword number)` children */
export function optionalNumber(keyword: string, value: number | undefined): SExpr | undefined {
  return value === undefined ? undefined : list(keyword, value);
}
