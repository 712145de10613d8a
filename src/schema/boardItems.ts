/**
 * Board items outside the track and shape families: free text, dimensions,
 * alignment targets, zones, and the general and setup blocks.
 */

import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, str, sym, type SExprList } from '../parser/sexpr';
import { defineCodec, emitBool, optionalYesNo, readBool, type Entity, type TaggedEntity } from './codec';
import {
  effectsCodec, identifier, newUuid, optionalNumber, optionalString, point, points, position, readIdentifier,
  readPoint, readPoints, readPosition,
  type Effects, type Identifier, type Point, type Position,
} from './common';
import { readTextLayer, textIndex, textLayer } from './graphics';

// --- Text ---

export interface BoardText extends TaggedEntity {
  type: 'gr_text';
  text: string;
  locked: boolean;
  position: Position;
  layer: string;
  knockout: boolean;
  uuid?: Identifier;
  effects: Effects;
}

export const boardTextCodec = defineCodec<BoardText>({
  keyword: 'gr_text',
  read(reader) {
    const text: BoardText = {
      type: 'gr_text',
      text: '',
      locked: false,
      position: { x: 0, y: 0 },
      layer: '',
      knockout: false,
      effects: effectsCodec.create(),
      extras: [],
    };
    text.locked = readBool(text, reader.bool('locked'), 'locked') ?? false;
    text.text = reader.string(textIndex(reader), 'text');
    text.position = readPosition(reader.requireNested('at'));
    const layer = readTextLayer(reader.requireNested('layer'));
    text.layer = layer.name;
    text.knockout = layer.knockout;
    text.uuid = readIdentifier(reader);
    text.effects = reader.decodeChild('effects', effectsCodec.decode) ?? text.effects;
    return text;
  },
  plan: [
    { field: 'locked', when: (t) => t.flagForms?.locked === 'bare', emit: (t) => emitBool(t, 'locked', t.locked, 'bare') },
    { field: 'text', emit: (t) => str(t.text) },
    { field: 'locked', when: (t) => t.flagForms?.locked !== 'bare', emit: (t) => emitBool(t, 'locked', t.locked, 'yes-no') },
    { field: 'at', emit: (t) => position(t.position) },
    { field: 'layer', emit: (t) => textLayer(t.layer, t.knockout) },
    { field: 'uuid', emit: (t) => identifier(t.uuid) },
    { field: 'effects', emit: (t) => effectsCodec.encode(t.effects) },
  ],
  create: () => ({
    type: 'gr_text',
    text: '',
    locked: false,
    position: { x: 0, y: 0 },
    layer: 'F.SilkS',
    knockout: false,
    uuid: newUuid(),
    effects: effectsCodec.create(),
    extras: [],
  }),
});

// --- Dimensions ---

export interface DimensionFormat extends Entity {
  prefix?: string;
  suffix?: string;
  /** 0 inches, 1 mils, 2 millimetres, 3 automatic */
  units: number;
  /** 0 no suffix, 1 bare suffix, 2 suffix in parentheses */
  unitsFormat: number;
  precision: number;
  overrideValue?: string;
  suppressZeroes?: boolean;
}

export const dimensionFormatCodec = defineCodec<DimensionFormat>({
  keyword: 'format',
  read(reader) {
    const format: DimensionFormat = {
      prefix: reader.childString('prefix'),
      suffix: reader.childString('suffix'),
      units: reader.childInteger('units') ?? 3,
      unitsFormat: reader.childInteger('units_format') ?? 1,
      precision: reader.childInteger('precision') ?? 4,
      overrideValue: reader.childString('override_value'),
      extras: [],
    };
    format.suppressZeroes = readBool(format, reader.bool('suppress_zeroes'), 'suppress_zeroes');
    return format;
  },
  plan: [
    { field: 'prefix', emit: (f) => optionalString('prefix', f.prefix) },
    { field: 'suffix', emit: (f) => optionalString('suffix', f.suffix) },
    { field: 'units', emit: (f) => list('units', f.units) },
    { field: 'units_format', emit: (f) => list('units_format', f.unitsFormat) },
    { field: 'precision', emit: (f) => list('precision', f.precision) },
    { field: 'override_value', emit: (f) => optionalString('override_value', f.overrideValue) },
    { field: 'suppress_zeroes', emit: (f) => emitBool(f, 'suppress_zeroes', f.suppressZeroes, 'yes-no') },
  ],
  create: () => ({ prefix: '', suffix: '', units: 3, unitsFormat: 1, precision: 4, extras: [] }),
});

export interface DimensionStyle extends Entity {
  thickness: number;
  arrowLength: number;
  /** 0 outside, 1 inline, 2 manual */
  textPositionMode: number;
  arrowDirection?: string;
  extensionHeight?: number;
  textFrame?: number;
  extensionOffset?: number;
  keepTextAligned?: boolean;
}

export const dimensionStyleCodec = defineCodec<DimensionStyle>({
  keyword: 'style',
  read(reader) {
    const style: DimensionStyle = {
      thickness: reader.childNumber('thickness') ?? 0.1,
      arrowLength: reader.childNumber('arrow_length') ?? 1.27,
      textPositionMode: reader.childInteger('text_position_mode') ?? 0,
      arrowDirection: reader.childString('arrow_direction'),
      extensionHeight: reader.childNumber('extension_height'),
      textFrame: reader.childInteger('text_frame'),
      extensionOffset: reader.childNumber('extension_offset'),
      extras: [],
    };
    style.keepTextAligned = readBool(style, reader.bool('keep_text_aligned'), 'keep_text_aligned');
    return style;
  },
  plan: [
    { field: 'thickness', emit: (s) => list('thickness', s.thickness) },
    { field: 'arrow_length', emit: (s) => list('arrow_length', s.arrowLength) },
    { field: 'text_position_mode', emit: (s) => list('text_position_mode', s.textPositionMode) },
    { field: 'arrow_direction', when: (s) => s.arrowDirection !== undefined, emit: (s) => list('arrow_direction', s.arrowDirection ?? 'outward') },
    { field: 'extension_height', emit: (s) => optionalNumber('extension_height', s.extensionHeight) },
    { field: 'text_frame', emit: (s) => optionalNumber('text_frame', s.textFrame) },
    { field: 'extension_offset', emit: (s) => optionalNumber('extension_offset', s.extensionOffset) },
    { field: 'keep_text_aligned', emit: (s) => emitBool(s, 'keep_text_aligned', s.keepTextAligned, 'yes-no') },
  ],
  create: () => ({
    thickness: 0.1,
    arrowLength: 1.27,
    textPositionMode: 0,
    extensionHeight: 0.58642,
    extensionOffset: 0.5,
    keepTextAligned: true,
    extras: [],
  }),
});

/**
 * Measurement annotation. KiCad 5 dimensions have no `(type ...)` and store their
 * geometry in feature and crossbar children, which stay among the extras.
 */
export interface PcbDimension extends TaggedEntity {
  type: 'dimension';
  /** aligned, leader, center, orthogonal or radial */
  dimensionType?: string;
  locked: boolean;
  layer: string;
  uuid?: Identifier;
  points: Point[];
  height?: number;
  orientation?: number;
  leaderLength?: number;
  text?: BoardText;
  format?: DimensionFormat;
  style?: DimensionStyle;
}

export const dimensionCodec = defineCodec<PcbDimension>({
  keyword: 'dimension',
  read(reader) {
    const dimension: PcbDimension = { type: 'dimension', locked: false, layer: '', points: [], extras: [] };
    dimension.locked = readBool(dimension, reader.bool('locked'), 'locked') ?? false;
    dimension.dimensionType = reader.childString('type');
    dimension.layer = reader.childString('layer') ?? '';
    dimension.uuid = readIdentifier(reader);
    const pts = reader.nested('pts');
    if (pts) dimension.points = readPoints(pts);
    dimension.height = reader.childNumber('height');
    dimension.orientation = reader.childNumber('orientation');
    dimension.leaderLength = reader.childNumber('leader_length');
    dimension.text = reader.decodeChild('gr_text', boardTextCodec.decode);
    dimension.format = reader.decodeChild('format', dimensionFormatCodec.decode);
    dimension.style = reader.decodeChild('style', dimensionStyleCodec.decode);
    return dimension;
  },
  plan: [
    { field: 'locked', when: (d) => d.flagForms?.locked === 'bare', emit: (d) => emitBool(d, 'locked', d.locked, 'bare') },
    { field: 'type', when: (d) => d.dimensionType !== undefined, emit: (d) => list('type', d.dimensionType ?? 'aligned') },
    { field: 'locked', when: (d) => d.flagForms?.locked !== 'bare', emit: (d) => emitBool(d, 'locked', d.locked, 'yes-no') },
    { field: 'layer', emit: (d) => list('layer', str(d.layer)) },
    { field: 'uuid', emit: (d) => identifier(d.uuid) },
    { field: 'pts', when: (d) => d.points.length > 0, emit: (d) => points(d.points) },
    { field: 'height', emit: (d) => optionalNumber('height', d.height) },
    { field: 'orientation', emit: (d) => optionalNumber('orientation', d.orientation) },
    { field: 'leader_length', emit: (d) => optionalNumber('leader_length', d.leaderLength) },
    { field: 'gr_text', when: (d) => d.text !== undefined, emit: (d) => (d.text ? boardTextCodec.encode(d.text) : undefined) },
    { field: 'format', when: (d) => d.format !== undefined, emit: (d) => (d.format ? dimensionFormatCodec.encode(d.format) : undefined) },
    { field: 'style', when: (d) => d.style !== undefined, emit: (d) => (d.style ? dimensionStyleCodec.encode(d.style) : undefined) },
  ],
  create: () => ({
    type: 'dimension',
    dimensionType: 'aligned',
    locked: false,
    layer: 'Dwgs.User',
    uuid: newUuid(),
    points: [{ x: 0, y: 0 }, { x: 10, y: 0 }],
    height: 2,
    format: dimensionFormatCodec.create(),
    style: dimensionStyleCodec.create(),
    extras: [],
  }),
});

// --- Targets ---

export interface PcbTarget extends TaggedEntity {
  type: 'target';
  /** plus or x */
  shape: string;
  position: Position;
  size: number;
  width: number;
  layer: string;
  uuid?: Identifier;
}

export const targetCodec = defineCodec<PcbTarget>({
  keyword: 'target',
  read(reader) {
    return {
      type: 'target',
      shape: reader.string(1, 'shape'),
      position: readPosition(reader.requireNested('at')),
      size: reader.childNumber('size') ?? 5,
      width: reader.childNumber('width') ?? 0.1,
      layer: reader.childString('layer') ?? '',
      uuid: readIdentifier(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'shape', emit: (t) => flag(t.shape) },
    { field: 'at', emit: (t) => position(t.position) },
    { field: 'size', emit: (t) => list('size', t.size) },
    { field: 'width', emit: (t) => list('width', t.width) },
    { field: 'layer', emit: (t) => list('layer', str(t.layer)) },
    { field: 'uuid', emit: (t) => identifier(t.uuid) },
  ],
  create: () => ({
    type: 'target',
    shape: 'plus',
    position: { x: 0, y: 0 },
    size: 5,
    width: 0.1,
    layer: 'Edge.Cuts',
    uuid: newUuid(),
    extras: [],
  }),
});

// --- Zones ---

export interface ZoneFill extends Entity {
  /** The `yes` after the keyword, written once the zone has been filled */
  filled: boolean;
  /** hatch; solid fills write no mode */
  mode?: string;
  thermalGap?: number;
  thermalBridgeWidth?: number;
  smoothing?: string;
  radius?: number;
  islandRemovalMode?: number;
  islandAreaMin?: number;
}

export const zoneFillCodec = defineCodec<ZoneFill>({
  keyword: 'fill',
  read(reader) {
    const first = reader.peek(1);
    const filled = first !== undefined && first.kind === 'symbol' && first.value === 'yes';
    if (filled) reader.string(1, 'filled');
    return {
      filled,
      mode: reader.childString('mode'),
      thermalGap: reader.childNumber('thermal_gap'),
      thermalBridgeWidth: reader.childNumber('thermal_bridge_width'),
      smoothing: reader.childString('smoothing'),
      radius: reader.childNumber('radius'),
      islandRemovalMode: reader.childInteger('island_removal_mode'),
      islandAreaMin: reader.childNumber('island_area_min'),
      extras: [],
    };
  },
  plan: [
    { field: 'filled', when: (f) => f.filled, emit: () => sym('yes') },
    { field: 'mode', emit: (f) => (f.mode !== undefined ? list('mode', f.mode) : undefined) },
    { field: 'thermal_gap', emit: (f) => optionalNumber('thermal_gap', f.thermalGap) },
    { field: 'thermal_bridge_width', emit: (f) => optionalNumber('thermal_bridge_width', f.thermalBridgeWidth) },
    { field: 'smoothing', emit: (f) => (f.smoothing !== undefined ? list('smoothing', f.smoothing) : undefined) },
    { field: 'radius', emit: (f) => optionalNumber('radius', f.radius) },
    { field: 'island_removal_mode', emit: (f) => optionalNumber('island_removal_mode', f.islandRemovalMode) },
    { field: 'island_area_min', emit: (f) => optionalNumber('island_area_min', f.islandAreaMin) },
  ],
  create: () => ({ filled: false, thermalGap: 0.5, thermalBridgeWidth: 0.5, extras: [] }),
});

/** Copper computed by the last zone fill, one per layer and island */
export interface FilledPolygon extends Entity {
  layer?: string;
  island?: boolean;
  points: Point[];
}

export const filledPolygonCodec = defineCodec<FilledPolygon>({
  keyword: 'filled_polygon',
  read(reader) {
    const polygon: FilledPolygon = { layer: reader.childString('layer'), points: [], extras: [] };
    polygon.island = readBool(polygon, reader.bool('island'), 'island');
    const pts = reader.nested('pts');
    if (pts) polygon.points = readPoints(pts);
    return polygon;
  },
  plan: [
    { field: 'layer', emit: (p) => optionalString('layer', p.layer) },
    { field: 'island', emit: (p) => emitBool(p, 'island', p.island, 'empty') },
    { field: 'pts', emit: (p) => points(p.points) },
  ],
  create: () => ({ points: [], extras: [] }),
});

export interface KeepoutRule {
  /** tracks, vias, pads, copperpour or footprints */
  item: string;
  /** allowed or not_allowed */
  rule: string;
}

export interface PcbZone extends TaggedEntity {
  type: 'zone';
  locked: boolean;
  net: number;
  netName?: string;
  /** Single-layer zones write `(layer ...)`, others `(layers ...)` */
  layer?: string;
  layers?: string[];
  uuid?: Identifier;
  name?: string;
  hatch?: { style: string; pitch: number };
  priority?: number;
  connectPads?: { mode?: string; clearance?: number };
  minThickness?: number;
  filledAreasThickness?: boolean;
  keepout?: KeepoutRule[];
  fill?: ZoneFill;
  /** Outline and cutouts, each a closed point list */
  polygons: Point[][];
  filledPolygons: FilledPolygon[];
}

function readConnectPads(reader: NodeReader): { mode?: string; clearance?: number } {
  return { mode: reader.optionalString(1, 'mode'), clearance: reader.childNumber('clearance') };
}

function connectPadsList(connect: { mode?: string; clearance?: number }): SExprList {
  const node = list('connect_pads');
  if (connect.mode !== undefined) node.items.push(sym(connect.mode));
  if (connect.clearance !== undefined) node.items.push(list('clearance', connect.clearance));
  return node;
}

export const zoneCodec = defineCodec<PcbZone>({
  keyword: 'zone',
  read(reader) {
    const zone: PcbZone = {
      type: 'zone',
      locked: false,
      net: 0,
      polygons: [],
      filledPolygons: [],
      extras: [],
    };
    zone.locked = readBool(zone, reader.bool('locked'), 'locked') ?? false;
    zone.net = reader.childInteger('net') ?? 0;
    zone.netName = reader.childString('net_name');
    zone.layer = reader.childString('layer');
    zone.layers = reader.childStrings('layers');
    zone.uuid = readIdentifier(reader);
    zone.name = reader.childString('name');
    const hatch = reader.nested('hatch');
    if (hatch) zone.hatch = { style: hatch.string(1, 'hatch'), pitch: hatch.number(2, 'hatch') };
    zone.priority = reader.childInteger('priority');
    const connect = reader.nested('connect_pads');
    if (connect) zone.connectPads = readConnectPads(connect);
    zone.minThickness = reader.childNumber('min_thickness');
    zone.filledAreasThickness = readBool(zone, reader.bool('filled_areas_thickness'), 'filled_areas_thickness');
    const keepout = reader.nested('keepout');
    if (keepout) {
      zone.keepout = keepout.nestedLists().map((rule) => ({ item: rule.keyword, rule: rule.string(1, 'keepout') }));
    }
    zone.fill = reader.decodeChild('fill', zoneFillCodec.decode);
    zone.polygons = reader.nestedAll('polygon').map((polygon) => readPoints(polygon.requireNested('pts')));
    zone.filledPolygons = reader.decodeChildren('filled_polygon', filledPolygonCodec.decode);
    return zone;
  },
  plan: [
    { field: 'locked', when: (z) => z.flagForms?.locked === 'bare', emit: (z) => emitBool(z, 'locked', z.locked, 'bare') },
    { field: 'net', emit: (z) => list('net', z.net) },
    { field: 'net_name', emit: (z) => optionalString('net_name', z.netName) },
    { field: 'locked', when: (z) => z.flagForms?.locked !== 'bare', emit: (z) => emitBool(z, 'locked', z.locked, 'yes-no') },
    { field: 'layer', emit: (z) => optionalString('layer', z.layer) },
    { field: 'layers', when: (z) => z.layers !== undefined, emit: (z) => list('layers', ...(z.layers ?? []).map(str)) },
    { field: 'uuid', emit: (z) => identifier(z.uuid) },
    { field: 'name', emit: (z) => optionalString('name', z.name) },
    { field: 'hatch', emit: (z) => (z.hatch ? list('hatch', z.hatch.style, z.hatch.pitch) : undefined) },
    { field: 'priority', emit: (z) => optionalNumber('priority', z.priority) },
    { field: 'connect_pads', when: (z) => z.connectPads !== undefined, emit: (z) => connectPadsList(z.connectPads ?? {}) },
    { field: 'min_thickness', emit: (z) => optionalNumber('min_thickness', z.minThickness) },
    { field: 'filled_areas_thickness', emit: (z) => optionalYesNo('filled_areas_thickness', z.filledAreasThickness) },
    {
      field: 'keepout',
      when: (z) => z.keepout !== undefined,
      emit: (z) => list('keepout', ...(z.keepout ?? []).map((k) => list(k.item, k.rule))),
    },
    { field: 'fill', when: (z) => z.fill !== undefined, emit: (z) => (z.fill ? zoneFillCodec.encode(z.fill) : undefined) },
    { field: 'polygon', emit: (z) => z.polygons.map((outline) => list('polygon', points(outline))) },
    { field: 'filled_polygon', emit: (z) => z.filledPolygons.map(filledPolygonCodec.encode) },
  ],
  create: () => ({
    type: 'zone',
    locked: false,
    net: 0,
    netName: '',
    layer: 'F.Cu',
    uuid: newUuid(),
    hatch: { style: 'edge', pitch: 0.5 },
    connectPads: { clearance: 0.5 },
    minThickness: 0.25,
    filledAreasThickness: false,
    fill: zoneFillCodec.create(),
    polygons: [],
    filledPolygons: [],
    extras: [],
  }),
});

// --- General and setup ---

/** Board thickness, plus the item counts KiCad 5 wrote here */
export interface BoardGeneral extends Entity {
  thickness: number;
  legacyTeardrops?: boolean;
  drawings?: number;
  tracks?: number;
  zones?: number;
  modules?: number;
  nets?: number;
}

const GENERAL_COUNTS = ['drawings', 'tracks', 'zones', 'modules', 'nets'] as const;

export const boardGeneralCodec = defineCodec<BoardGeneral>({
  keyword: 'general',
  read(reader) {
    const general: BoardGeneral = { thickness: reader.childNumber('thickness') ?? 1.6, extras: [] };
    general.legacyTeardrops = readBool(general, reader.bool('legacy_teardrops'), 'legacy_teardrops');
    for (const count of GENERAL_COUNTS) general[count] = reader.childInteger(count);
    return general;
  },
  plan: [
    { field: 'thickness', emit: (g) => list('thickness', g.thickness) },
    { field: 'legacy_teardrops', emit: (g) => optionalYesNo('legacy_teardrops', g.legacyTeardrops) },
    ...GENERAL_COUNTS.map((count) => ({ field: count, emit: (g: BoardGeneral) => optionalNumber(count, g[count]) })),
  ],
  create: () => ({ thickness: 1.6, legacyTeardrops: false, extras: [] }),
});

/** Board-wide settings; the stackup and plot parameters stay among the extras */
export interface BoardSetup extends Entity {
  padToMaskClearance?: number;
  solderMaskMinWidth?: number;
  padToPasteClearance?: number;
  padToPasteClearanceRatio?: number;
  allowSolderMaskBridgesInFootprints?: boolean;
  auxAxisOrigin?: Point;
  gridOrigin?: Point;
}

export const boardSetupCodec = defineCodec<BoardSetup>({
  keyword: 'setup',
  read(reader) {
    const setup: BoardSetup = {
      padToMaskClearance: reader.childNumber('pad_to_mask_clearance'),
      solderMaskMinWidth: reader.childNumber('solder_mask_min_width'),
      padToPasteClearance: reader.childNumber('pad_to_paste_clearance'),
      padToPasteClearanceRatio: reader.childNumber('pad_to_paste_clearance_ratio'),
      extras: [],
    };
    setup.allowSolderMaskBridgesInFootprints = readBool(
      setup,
      reader.bool('allow_soldermask_bridges_in_footprints'),
      'allow_soldermask_bridges_in_footprints',
    );
    const aux = reader.nested('aux_axis_origin');
    if (aux) setup.auxAxisOrigin = readPoint(aux);
    const grid = reader.nested('grid_origin');
    if (grid) setup.gridOrigin = readPoint(grid);
    return setup;
  },
  plan: [
    { field: 'pad_to_mask_clearance', emit: (s) => optionalNumber('pad_to_mask_clearance', s.padToMaskClearance) },
    { field: 'solder_mask_min_width', emit: (s) => optionalNumber('solder_mask_min_width', s.solderMaskMinWidth) },
    { field: 'pad_to_paste_clearance', emit: (s) => optionalNumber('pad_to_paste_clearance', s.padToPasteClearance) },
    {
      field: 'pad_to_paste_clearance_ratio',
      emit: (s) => optionalNumber('pad_to_paste_clearance_ratio', s.padToPasteClearanceRatio),
    },
    {
      field: 'allow_soldermask_bridges_in_footprints',
      emit: (s) => emitBool(s, 'allow_soldermask_bridges_in_footprints', s.allowSolderMaskBridgesInFootprints, 'yes-no'),
    },
    { field: 'aux_axis_origin', when: (s) => s.auxAxisOrigin !== undefined, emit: (s) => (s.auxAxisOrigin ? point('aux_axis_origin', s.auxAxisOrigin) : undefined) },
    { field: 'grid_origin', when: (s) => s.gridOrigin !== undefined, emit: (s) => (s.gridOrigin ? point('grid_origin', s.gridOrigin) : undefined) },
  ],
  create: () => ({ padToMaskClearance: 0, extras: [] }),
});
