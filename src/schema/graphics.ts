/**
 * Graphic primitives shared by boards (gr_*) and footprints (fp_*).
 * Both families have the same fields and differ only in the keyword prefix.
 */

import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, str, type SExprList } from '../parser/sexpr';
import { CodecRegistry, defineCodec, emitBool, optionalYesNo, readBool, type EmitStep, type SchemaCodec, type TaggedEntity } from './codec';
import {
  effectsCodec, identifier, newUuid, optionalNumber, point, points, readIdentifier, readPoint, readPoints, strokeCodec,
  type Effects, type Identifier, type Point, type Stroke,
} from './common';

// --- Types ---

export type ShapeKind = 'line' | 'rect' | 'circle' | 'arc' | 'poly' | 'curve';
export type ShapePrefix = 'gr' | 'fp';

export interface GraphicShape extends TaggedEntity {
  /** Keyword, e.g. `gr_line` or `fp_circle` */
  type: string;
  shape: ShapeKind;
  /** line/rect/arc start; unused by circles */
  start?: Point;
  /** arc midpoint */
  mid?: Point;
  /** line/rect/arc end; circle point on the circumference */
  end?: Point;
  /** circle center */
  center?: Point;
  /** polygon outline; the four control points of a bezier curve */
  points?: Point[];
  stroke?: Stroke;
  /** Line width of files written before (stroke) existed */
  width?: number;
  /** `none`, `solid`, `yes` or `no` depending on the version */
  fill?: string;
  locked: boolean;
  layer: string;
  uuid?: Identifier;
}

const SHAPE_KINDS: readonly ShapeKind[] = ['line', 'rect', 'circle', 'arc', 'poly', 'curve'];

/** Geometry children each shape writes, in order */
const GEOMETRY: Record<ShapeKind, ReadonlyArray<'start' | 'mid' | 'end' | 'center' | 'pts'>> = {
  line: ['start', 'end'],
  rect: ['start', 'end'],
  circle: ['center', 'end'],
  arc: ['start', 'mid', 'end'],
  poly: ['pts'],
  curve: ['pts'],
};

// --- Codec factory ---

function geometryStep(name: 'start' | 'mid' | 'end' | 'center' | 'pts'): EmitStep<GraphicShape> {
  if (name === 'pts') {
    return { field: 'pts', emit: (g) => points(g.points ?? []) };
  }
  return { field: name, emit: (g) => point(name, g[name] ?? { x: 0, y: 0 }) };
}

/** A bare `locked` sits right after the keyword; `(locked yes)` sits after the fill */
function isBareLocked(g: GraphicShape): boolean {
  return g.flagForms?.locked === 'bare';
}

function shapeCodec(prefix: ShapePrefix, shape: ShapeKind): SchemaCodec<GraphicShape> {
  const keyword = `${prefix}_${shape}`;
  const hasFill = shape !== 'line' && shape !== 'arc' && shape !== 'curve';

  const plan: EmitStep<GraphicShape>[] = [
    { field: 'locked', when: isBareLocked, emit: (g) => emitBool(g, 'locked', g.locked, 'bare') },
    ...GEOMETRY[shape].map(geometryStep),
    { field: 'stroke', when: (g) => g.stroke !== undefined, emit: (g) => (g.stroke ? strokeCodec.encode(g.stroke) : undefined) },
    { field: 'fill', when: (g) => g.fill !== undefined, emit: (g) => list('fill', g.fill ?? 'none') },
    { field: 'locked', when: (g) => !isBareLocked(g), emit: (g) => emitBool(g, 'locked', g.locked, 'yes-no') },
    { field: 'layer', emit: (g) => list('layer', str(g.layer)) },
    { field: 'width', when: (g) => g.width !== undefined, emit: (g) => list('width', g.width ?? 0) },
    { field: 'uuid', emit: (g) => identifier(g.uuid) },
  ];

  return defineCodec<GraphicShape>({
    keyword,
    read(reader) {
      const g: GraphicShape = { type: keyword, shape, locked: false, layer: '', extras: [] };
      g.locked = readBool(g, reader.bool('locked'), 'locked') ?? false;
      for (const name of GEOMETRY[shape]) {
        if (name === 'pts') {
          const pts = reader.nested('pts');
          g.points = pts ? readPoints(pts) : [];
        } else {
          g[name] = readPoint(reader.requireNested(name));
        }
      }
      g.stroke = reader.decodeChild('stroke', strokeCodec.decode);
      g.fill = reader.childString('fill');
      g.layer = reader.childString('layer') ?? '';
      g.width = reader.childNumber('width');
      g.uuid = readIdentifier(reader);
      return g;
    },
    plan,
    create: () => {
      const g: GraphicShape = {
        type: keyword,
        shape,
        stroke: { width: 0.1, type: 'default', extras: [] },
        locked: false,
        layer: prefix === 'gr' ? 'Edge.Cuts' : 'F.SilkS',
        uuid: newUuid(),
        extras: [],
      };
      for (const name of GEOMETRY[shape]) {
        if (name === 'pts') g.points = [];
        else g[name] = { x: 0, y: 0 };
      }
      if (hasFill) g.fill = 'none';
      return g;
    },
  });
}

// --- Text layers ---

/** `(layer "F.SilkS" knockout)` of a text item */
export function readTextLayer(reader: NodeReader): { name: string; knockout: boolean } {
  return { name: reader.string(1, 'layer'), knockout: reader.flag('knockout') };
}

export function textLayer(name: string, knockout: boolean): SExprList {
  return knockout ? list('layer', str(name), flag('knockout')) : list('layer', str(name));
}

/** Index of the text atom, which a bare `locked` pushes back by one */
export function textIndex(reader: NodeReader): number {
  const first = reader.peek(1);
  return first !== undefined && first.kind === 'symbol' && first.value === 'locked' ? 2 : 1;
}

// --- Text boxes ---

/**
 * Framed multi-line text (KiCad 7+). An axis-aligned box is written with start and
 * end; a rotated one with its four corners and an angle.
 */
export interface TextBox extends TaggedEntity {
  /** `gr_text_box` or `fp_text_box` */
  type: string;
  text: string;
  locked: boolean;
  start?: Point;
  end?: Point;
  points?: Point[];
  angle?: number;
  /** left, top, right, bottom */
  margins?: number[];
  layer: string;
  knockout: boolean;
  uuid?: Identifier;
  effects?: Effects;
  border?: boolean;
  stroke?: Stroke;
}

function textBoxCodec(prefix: ShapePrefix): SchemaCodec<TextBox> {
  const keyword = `${prefix}_text_box`;
  return defineCodec<TextBox>({
    keyword,
    read(reader) {
      const box: TextBox = { type: keyword, text: '', locked: false, layer: '', knockout: false, extras: [] };
      box.locked = readBool(box, reader.bool('locked'), 'locked') ?? false;
      box.text = reader.string(textIndex(reader), 'text');
      const start = reader.nested('start');
      if (start) box.start = readPoint(start);
      const end = reader.nested('end');
      if (end) box.end = readPoint(end);
      const pts = reader.nested('pts');
      if (pts) box.points = readPoints(pts);
      box.angle = reader.childNumber('angle');
      const margins = reader.nested('margins');
      if (margins) box.margins = [0, 1, 2, 3].map((i) => margins.number(i + 1, 'margins'));
      const layer = readTextLayer(reader.requireNested('layer'));
      box.layer = layer.name;
      box.knockout = layer.knockout;
      box.uuid = readIdentifier(reader);
      box.effects = reader.decodeChild('effects', effectsCodec.decode);
      box.border = readBool(box, reader.bool('border'), 'border');
      box.stroke = reader.decodeChild('stroke', strokeCodec.decode);
      return box;
    },
    plan: [
      { field: 'locked', when: (b) => b.flagForms?.locked === 'bare', emit: (b) => emitBool(b, 'locked', b.locked, 'bare') },
      { field: 'text', emit: (b) => str(b.text) },
      { field: 'locked', when: (b) => b.flagForms?.locked !== 'bare', emit: (b) => emitBool(b, 'locked', b.locked, 'yes-no') },
      { field: 'start', when: (b) => b.start !== undefined, emit: (b) => (b.start ? point('start', b.start) : undefined) },
      { field: 'end', when: (b) => b.end !== undefined, emit: (b) => (b.end ? point('end', b.end) : undefined) },
      { field: 'pts', when: (b) => b.points !== undefined, emit: (b) => points(b.points ?? []) },
      { field: 'margins', when: (b) => b.margins !== undefined, emit: (b) => list('margins', ...(b.margins ?? [])) },
      { field: 'angle', emit: (b) => optionalNumber('angle', b.angle) },
      { field: 'layer', emit: (b) => textLayer(b.layer, b.knockout) },
      { field: 'uuid', emit: (b) => identifier(b.uuid) },
      { field: 'effects', when: (b) => b.effects !== undefined, emit: (b) => (b.effects ? effectsCodec.encode(b.effects) : undefined) },
      { field: 'border', emit: (b) => optionalYesNo('border', b.border) },
      { field: 'stroke', when: (b) => b.stroke !== undefined, emit: (b) => (b.stroke ? strokeCodec.encode(b.stroke) : undefined) },
    ],
    create: () => ({
      type: keyword,
      text: '',
      locked: false,
      start: { x: 0, y: 0 },
      end: { x: 10, y: 5 },
      margins: [1, 1, 1, 1],
      layer: prefix === 'gr' ? 'F.SilkS' : 'F.Fab',
      knockout: false,
      uuid: newUuid(),
      effects: effectsCodec.create(),
      border: true,
      stroke: { width: 0.1, type: 'solid', extras: [] },
      extras: [],
    }),
  });
}

export const boardTextBoxCodec = textBoxCodec('gr');
export const footprintTextBoxCodec = textBoxCodec('fp');

export function createShapeCodecs(prefix: ShapePrefix): Record<ShapeKind, SchemaCodec<GraphicShape>> {
  return {
    line: shapeCodec(prefix, 'line'),
    rect: shapeCodec(prefix, 'rect'),
    circle: shapeCodec(prefix, 'circle'),
    arc: shapeCodec(prefix, 'arc'),
    poly: shapeCodec(prefix, 'poly'),
    curve: shapeCodec(prefix, 'curve'),
  };
}

export const boardShapes = createShapeCodecs('gr');
export const footprintShapes = createShapeCodecs('fp');

export function shapeRegistry(prefix: ShapePrefix): CodecRegistry<GraphicShape> {
  const codecs = prefix === 'gr' ? boardShapes : footprintShapes;
  return new CodecRegistry<GraphicShape>(SHAPE_KINDS.map((kind) => codecs[kind]));
}

/** Keywords of graphic items in one family, including those without a codec (text, dimensions) */
export function isGraphicKeyword(prefix: ShapePrefix, keyword: string): boolean {
  return keyword.startsWith(`${prefix}_`);
}

export function isShape(item: TaggedEntity): item is GraphicShape {
  return 'shape' in item && SHAPE_KINDS.some((kind) => item.type.endsWith(`_${kind}`));
}
