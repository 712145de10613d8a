/**
 * Footprints (.kicad_mod files and footprints placed on a board) with their pads,
 * text items, graphic items and 3-D models.
 */

import type { LibraryConfig } from '../shared/config';
import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, num, str, type SExprList } from '../parser/sexpr';
import { CodecRegistry, defineCodec, emitBool, readBool, type EmitStep, type RawItem, type TaggedEntity } from './codec';
import {
  effectsCodec, identifier, netCodec, newUuid, optionalNumber, optionalPosition, optionalString, point, position,
  propertyCodec, readIdentifier, readPoint, readPosition,
  type Effects, type FileHeader, type Identifier, type Net, type Point, type Position, type Property,
} from './common';
import {
  footprintShapes, footprintTextBoxCodec, isGraphicKeyword, readTextLayer, textLayer, type GraphicShape, type TextBox,
} from './graphics';

// --- Types ---

export interface PadDrill {
  oval: boolean;
  /** Diameter, or slot width for oval drills */
  diameter?: number;
  /** Slot height for oval drills */
  width?: number;
  offset?: Point;
}

export interface PadOptions {
  clearance: string;
  anchor: string;
}

export interface PcbPad extends TaggedEntity {
  type: 'pad';
  number: string;
  /** thru_hole, smd, connect, np_thru_hole */
  padType: string;
  /** circle, rect, oval, trapezoid, roundrect, custom */
  shape: string;
  locked: boolean;
  position: Position;
  size: { w: number; h: number };
  drill?: PadDrill;
  layers: string[];
  removeUnusedLayers?: boolean;
  keepEndLayers?: boolean;
  roundrectRatio?: number;
  chamferRatio?: number;
  chamfer?: string[];
  /** Absent when the pad is not connected to a net */
  net?: Net;
  pinFunction?: string;
  pinType?: string;
  dieLength?: number;
  solderMaskMargin?: number;
  solderPasteMargin?: number;
  solderPasteMarginRatio?: number;
  clearance?: number;
  zoneConnect?: number;
  thermalBridgeWidth?: number;
  thermalGap?: number;
  options?: PadOptions;
  /** Custom pad shape primitives, kept as written */
  primitives?: SExprList;
  uuid?: Identifier;
}

export interface FpText extends TaggedEntity {
  type: 'fp_text';
  /** reference, value or user */
  textType: string;
  text: string;
  position: Position;
  layer: string;
  knockout: boolean;
  hide: boolean;
  uuid?: Identifier;
  effects: Effects;
}

export interface XYZ {
  x: number;
  y: number;
  z: number;
}

export interface FootprintModel extends TaggedEntity {
  type: 'model';
  path: string;
  hide: boolean;
  opacity?: number;
  offset: XYZ;
  /** `at` in KiCad 5 files, where the offset is in inches; `offset` (millimetres) since */
  offsetKeyword?: 'offset' | 'at';
  scale: XYZ;
  rotate: XYZ;
}

export type FootprintGraphic = FpText | TextBox | GraphicShape | RawItem;

export interface PcbFootprint extends TaggedEntity, Partial<FileHeader> {
  type: 'footprint';
  /** Footprint name, or `library:name` once placed on a board */
  libId: string;
  /** Written as the legacy `module` keyword */
  legacy: boolean;
  locked: boolean;
  placed: boolean;
  layer: string;
  tedit?: string;
  uuid?: Identifier;
  position?: Position;
  description?: string;
  tags?: string;
  properties: Property[];
  path?: string;
  sheetName?: string;
  sheetFile?: string;
  attributes?: string[];
  /** Text and graphic items in file order */
  graphics: FootprintGraphic[];
  pads: PcbPad[];
  models: FootprintModel[];
}

// --- Pad ---

function readDrill(reader: NodeReader): PadDrill {
  const drill: PadDrill = { oval: reader.flag('oval') };
  let index = drill.oval ? 2 : 1;
  drill.diameter = reader.optionalNumber(index, 'diameter');
  if (drill.diameter !== undefined) index++;
  drill.width = reader.optionalNumber(index, 'width');
  const offset = reader.nested('offset');
  if (offset) drill.offset = readPoint(offset);
  return drill;
}

function drillList(drill: PadDrill): SExprList {
  const node = list('drill');
  if (drill.oval) node.items.push(flag('oval'));
  if (drill.diameter !== undefined) node.items.push(num(drill.diameter));
  if (drill.width !== undefined) node.items.push(num(drill.width));
  if (drill.offset) node.items.push(point('offset', drill.offset));
  return node;
}

const padPlan: EmitStep<PcbPad>[] = [
  { field: 'number', emit: (p) => str(p.number) },
  { field: 'type', emit: (p) => flag(p.padType) },
  { field: 'shape', emit: (p) => flag(p.shape) },
  { field: 'locked', emit: (p) => emitBool(p, 'locked', p.locked, 'bare') },
  { field: 'at', emit: (p) => position(p.position) },
  { field: 'size', emit: (p) => list('size', p.size.w, p.size.h) },
  { field: 'drill', when: (p) => p.drill !== undefined, emit: (p) => (p.drill ? drillList(p.drill) : undefined) },
  { field: 'layers', emit: (p) => list('layers', ...p.layers.map(str)) },
  { field: 'remove_unused_layers', emit: (p) => emitBool(p, 'remove_unused_layers', p.removeUnusedLayers, 'empty') },
  { field: 'keep_end_layers', emit: (p) => emitBool(p, 'keep_end_layers', p.keepEndLayers, 'empty') },
  { field: 'roundrect_rratio', emit: (p) => optionalNumber('roundrect_rratio', p.roundrectRatio) },
  { field: 'chamfer_ratio', emit: (p) => optionalNumber('chamfer_ratio', p.chamferRatio) },
  { field: 'chamfer', when: (p) => p.chamfer !== undefined, emit: (p) => list('chamfer', ...(p.chamfer ?? [])) },
  { field: 'net', when: (p) => p.net !== undefined, emit: (p) => (p.net ? netCodec.encode(p.net) : undefined) },
  { field: 'pinfunction', emit: (p) => optionalString('pinfunction', p.pinFunction) },
  { field: 'pintype', emit: (p) => optionalString('pintype', p.pinType) },
  { field: 'die_length', emit: (p) => optionalNumber('die_length', p.dieLength) },
  { field: 'solder_mask_margin', emit: (p) => optionalNumber('solder_mask_margin', p.solderMaskMargin) },
  { field: 'solder_paste_margin', emit: (p) => optionalNumber('solder_paste_margin', p.solderPasteMargin) },
  { field: 'solder_paste_margin_ratio', emit: (p) => optionalNumber('solder_paste_margin_ratio', p.solderPasteMarginRatio) },
  { field: 'clearance', emit: (p) => optionalNumber('clearance', p.clearance) },
  { field: 'zone_connect', emit: (p) => optionalNumber('zone_connect', p.zoneConnect) },
  { field: 'thermal_bridge_width', emit: (p) => optionalNumber('thermal_bridge_width', p.thermalBridgeWidth) },
  { field: 'thermal_gap', emit: (p) => optionalNumber('thermal_gap', p.thermalGap) },
  {
    field: 'options',
    when: (p) => p.options !== undefined,
    emit: (p) => list('options', list('clearance', p.options?.clearance ?? 'outline'), list('anchor', p.options?.anchor ?? 'rect')),
  },
  { field: 'primitives', emit: (p) => p.primitives },
  { field: 'uuid', emit: (p) => identifier(p.uuid) },
];

export const padCodec = defineCodec<PcbPad>({
  keyword: 'pad',
  read(reader) {
    const pad: PcbPad = {
      type: 'pad',
      number: reader.string(1, 'number'),
      padType: reader.string(2, 'type'),
      shape: reader.string(3, 'shape'),
      locked: false,
      position: readPosition(reader.requireNested('at')),
      size: { w: 0, h: 0 },
      layers: [],
      extras: [],
    };
    pad.locked = readBool(pad, reader.bool('locked'), 'locked') ?? false;
    const size = reader.requireNested('size');
    pad.size = { w: size.number(1, 'width'), h: size.number(2, 'height') };
    const drill = reader.nested('drill');
    if (drill) pad.drill = readDrill(drill);
    pad.layers = reader.childStrings('layers') ?? [];
    pad.removeUnusedLayers = readBool(pad, reader.bool('remove_unused_layers'), 'remove_unused_layers');
    pad.keepEndLayers = readBool(pad, reader.bool('keep_end_layers'), 'keep_end_layers');
    pad.roundrectRatio = reader.childNumber('roundrect_rratio');
    pad.chamferRatio = reader.childNumber('chamfer_ratio');
    pad.chamfer = reader.childStrings('chamfer');
    pad.net = reader.decodeChild('net', netCodec.decode);
    pad.pinFunction = reader.childString('pinfunction');
    pad.pinType = reader.childString('pintype');
    pad.dieLength = reader.childNumber('die_length');
    pad.solderMaskMargin = reader.childNumber('solder_mask_margin');
    pad.solderPasteMargin = reader.childNumber('solder_paste_margin');
    pad.solderPasteMarginRatio = reader.childNumber('solder_paste_margin_ratio');
    pad.clearance = reader.childNumber('clearance');
    pad.zoneConnect = reader.childInteger('zone_connect');
    pad.thermalBridgeWidth = reader.childNumber('thermal_bridge_width');
    pad.thermalGap = reader.childNumber('thermal_gap');
    const options = reader.nested('options');
    if (options) {
      pad.options = {
        clearance: options.childString('clearance') ?? 'outline',
        anchor: options.childString('anchor') ?? 'rect',
      };
    }
    pad.primitives = reader.child('primitives');
    pad.uuid = readIdentifier(reader);
    return pad;
  },
  plan: padPlan,
  create: () => ({
    type: 'pad',
    number: '1',
    padType: 'smd',
    shape: 'roundrect',
    locked: false,
    position: { x: 0, y: 0 },
    size: { w: 1.5, h: 1.5 },
    layers: ['F.Cu', 'F.Paste', 'F.Mask'],
    roundrectRatio: 0.25,
    uuid: newUuid(),
    extras: [],
  }),
});

// --- Text ---

export const fpTextCodec = defineCodec<FpText>({
  keyword: 'fp_text',
  read(reader) {
    const text: FpText = {
      type: 'fp_text',
      textType: reader.string(1, 'type'),
      text: reader.string(2, 'text'),
      position: readPosition(reader.requireNested('at')),
      layer: '',
      knockout: false,
      hide: false,
      effects: effectsCodec.create(),
      extras: [],
    };
    const layer = readTextLayer(reader.requireNested('layer'));
    text.layer = layer.name;
    text.knockout = layer.knockout;
    text.hide = readBool(text, reader.bool('hide'), 'hide') ?? false;
    text.uuid = readIdentifier(reader);
    text.effects = reader.decodeChild('effects', effectsCodec.decode) ?? text.effects;
    return text;
  },
  plan: [
    { field: 'type', emit: (t) => flag(t.textType) },
    { field: 'text', emit: (t) => str(t.text) },
    { field: 'at', emit: (t) => position(t.position) },
    { field: 'layer', emit: (t) => textLayer(t.layer, t.knockout) },
    { field: 'hide', emit: (t) => emitBool(t, 'hide', t.hide, 'bare') },
    { field: 'uuid', emit: (t) => identifier(t.uuid) },
    { field: 'effects', emit: (t) => effectsCodec.encode(t.effects) },
  ],
  create: () => ({
    type: 'fp_text',
    textType: 'user',
    text: '',
    position: { x: 0, y: 0 },
    layer: 'F.SilkS',
    knockout: false,
    hide: false,
    uuid: newUuid(),
    effects: effectsCodec.create(),
    extras: [],
  }),
});

// --- 3-D model ---

function readXYZ(reader: NodeReader | undefined, fallback: XYZ): XYZ {
  if (!reader) return fallback;
  const xyz = reader.requireNested('xyz');
  return { x: xyz.number(1, 'x'), y: xyz.number(2, 'y'), z: xyz.number(3, 'z') };
}

function xyzList(keyword: string, v: XYZ): SExprList {
  return list(keyword, list('xyz', v.x, v.y, v.z));
}

export const modelCodec = defineCodec<FootprintModel>({
  keyword: 'model',
  read(reader) {
    const model: FootprintModel = {
      type: 'model',
      path: reader.string(1, 'path'),
      hide: false,
      offset: { x: 0, y: 0, z: 0 },
      scale: { x: 1, y: 1, z: 1 },
      rotate: { x: 0, y: 0, z: 0 },
      extras: [],
    };
    model.hide = readBool(model, reader.bool('hide'), 'hide') ?? false;
    model.opacity = reader.childNumber('opacity');
    const offset = reader.nested('offset');
    const legacyOffset = offset ? undefined : reader.nested('at');
    if (legacyOffset) model.offsetKeyword = 'at';
    model.offset = readXYZ(offset ?? legacyOffset, model.offset);
    model.scale = readXYZ(reader.nested('scale'), model.scale);
    model.rotate = readXYZ(reader.nested('rotate'), model.rotate);
    return model;
  },
  plan: [
    { field: 'path', emit: (m) => str(m.path) },
    { field: 'hide', emit: (m) => emitBool(m, 'hide', m.hide, 'bare') },
    { field: 'opacity', emit: (m) => optionalNumber('opacity', m.opacity) },
    { field: 'offset', emit: (m) => xyzList(m.offsetKeyword ?? 'offset', m.offset) },
    { field: 'scale', emit: (m) => xyzList('scale', m.scale) },
    { field: 'rotate', emit: (m) => xyzList('rotate', m.rotate) },
  ],
  create: () => ({
    type: 'model',
    path: '',
    hide: false,
    offset: { x: 0, y: 0, z: 0 },
    scale: { x: 1, y: 1, z: 1 },
    rotate: { x: 0, y: 0, z: 0 },
    extras: [],
  }),
});

// --- Footprint ---

export const footprintGraphics = new CodecRegistry<FpText | TextBox | GraphicShape>([
  fpTextCodec,
  footprintTextBoxCodec,
  footprintShapes.line,
  footprintShapes.rect,
  footprintShapes.circle,
  footprintShapes.arc,
  footprintShapes.poly,
  footprintShapes.curve,
]);

function isBare(f: PcbFootprint, name: string): boolean {
  return f.flagForms?.[name] === 'bare';
}

const footprintPlan: EmitStep<PcbFootprint>[] = [
  { field: 'name', emit: (f) => str(f.libId) },
  { field: 'locked', when: (f) => isBare(f, 'locked'), emit: (f) => emitBool(f, 'locked', f.locked, 'bare') },
  { field: 'placed', when: (f) => isBare(f, 'placed'), emit: (f) => emitBool(f, 'placed', f.placed, 'bare') },
  { field: 'version', emit: (f) => optionalNumber('version', f.version) },
  { field: 'generator', emit: (f) => optionalString('generator', f.generator) },
  { field: 'generator_version', emit: (f) => optionalString('generator_version', f.generatorVersion) },
  { field: 'layer', emit: (f) => list('layer', str(f.layer)) },
  { field: 'locked', when: (f) => !isBare(f, 'locked'), emit: (f) => emitBool(f, 'locked', f.locked, 'yes-no') },
  { field: 'placed', when: (f) => !isBare(f, 'placed'), emit: (f) => emitBool(f, 'placed', f.placed, 'yes-no') },
  { field: 'tedit', emit: (f) => (f.tedit !== undefined ? list('tedit', f.tedit) : undefined) },
  { field: 'uuid', emit: (f) => identifier(f.uuid) },
  { field: 'at', when: (f) => f.position !== undefined, emit: (f) => (f.position ? position(f.position) : undefined) },
  { field: 'descr', emit: (f) => optionalString('descr', f.description) },
  { field: 'tags', emit: (f) => optionalString('tags', f.tags) },
  { field: 'property', emit: (f) => f.properties.map(propertyCodec.encode) },
  { field: 'path', emit: (f) => optionalString('path', f.path) },
  { field: 'sheetname', emit: (f) => optionalString('sheetname', f.sheetName) },
  { field: 'sheetfile', emit: (f) => optionalString('sheetfile', f.sheetFile) },
  { field: 'attr', when: (f) => f.attributes !== undefined, emit: (f) => list('attr', ...(f.attributes ?? [])) },
  { field: 'graphics', emit: (f) => f.graphics.map((g) => footprintGraphics.encode(g)) },
  { field: 'pad', emit: (f) => f.pads.map(padCodec.encode) },
  { field: 'model', emit: (f) => f.models.map(modelCodec.encode) },
];

export const footprintCodec = defineCodec<PcbFootprint>({
  keyword: 'footprint',
  aliases: ['module'],
  writeKeyword: (f) => (f.legacy ? 'module' : 'footprint'),
  read(reader) {
    const footprint: PcbFootprint = {
      type: 'footprint',
      libId: reader.string(1, 'name'),
      legacy: reader.keyword === 'module',
      locked: false,
      placed: false,
      layer: '',
      properties: [],
      graphics: [],
      pads: [],
      models: [],
      extras: [],
    };
    footprint.locked = readBool(footprint, reader.bool('locked'), 'locked') ?? false;
    footprint.placed = readBool(footprint, reader.bool('placed'), 'placed') ?? false;
    // Only library files carry a header; footprints placed on a board do not
    footprint.version = reader.childInteger('version');
    footprint.generator = reader.childString('generator');
    footprint.generatorVersion = reader.childString('generator_version');
    footprint.layer = reader.childString('layer') ?? 'F.Cu';
    footprint.tedit = reader.childString('tedit');
    footprint.uuid = readIdentifier(reader);
    footprint.position = optionalPosition(reader);
    footprint.description = reader.childString('descr');
    footprint.tags = reader.childString('tags');
    footprint.properties = reader.decodeChildren('property', propertyCodec.decode);
    footprint.path = reader.childString('path');
    footprint.sheetName = reader.childString('sheetname');
    footprint.sheetFile = reader.childString('sheetfile');
    footprint.attributes = reader.childStrings('attr');
    footprint.graphics = reader
      .childrenWhere((keyword) => isGraphicKeyword('fp', keyword))
      .map((node) => footprintGraphics.decode(node));
    footprint.pads = reader.decodeChildren('pad', padCodec.decode);
    footprint.models = reader.decodeChildren('model', modelCodec.decode);
    return footprint;
  },
  plan: footprintPlan,
  create: (config: LibraryConfig) => ({
    type: 'footprint',
    libId: '',
    legacy: false,
    version: config.versions.footprint,
    generator: config.generators.footprint,
    generatorVersion: config.generatorVersion,
    locked: false,
    placed: false,
    layer: 'F.Cu',
    properties: [],
    graphics: [],
    pads: [],
    models: [],
    extras: [],
  }),
});
