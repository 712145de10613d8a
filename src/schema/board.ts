/**
 * KiCad PCB (.kicad_pcb) schema
 *
 * Layer stack, nets, footprints, drawings, tracks, zones and groups are decoded into
 * typed entities. Anything else (images, embedded files, generated items) is carried
 * through unchanged.
 */

import type { LibraryConfig } from '../shared/config';
import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, num, str, type SExprList } from '../parser/sexpr';
import { CodecRegistry, defineCodec, emitBool, readBool, type EmitStep, type RawItem, type TaggedEntity } from './codec';
import {
  headerSteps, identifier, netCodec, newUuid, pageSettingsCodec, point, position, propertyCodec, readHeader, readIdentifier,
  readPoint, readPosition, titleBlockCodec,
  type FileHeader, type Identifier, type Net, type PageSettings, type Point, type Position, type Property, type TitleBlock,
} from './common';
import { footprintCodec, type PcbFootprint } from './footprint';
import {
  boardGeneralCodec, boardSetupCodec, boardTextCodec, dimensionCodec, targetCodec, zoneCodec,
  type BoardGeneral, type BoardSetup, type BoardText, type PcbDimension, type PcbTarget, type PcbZone,
} from './boardItems';
import { boardShapes, boardTextBoxCodec, isGraphicKeyword, type GraphicShape, type TextBox } from './graphics';

// --- Types ---

export interface PcbLayer {
  id: number;
  name: string;
  /** signal, power, mixed, jumper or user */
  type: string;
  userName?: string;
}

export interface PcbSegment extends TaggedEntity {
  type: 'segment';
  start: Point;
  end: Point;
  width: number;
  layer: string;
  locked: boolean;
  net: number;
  uuid?: Identifier;
}

export interface PcbArc extends TaggedEntity {
  type: 'arc';
  start: Point;
  mid: Point;
  end: Point;
  width: number;
  layer: string;
  locked: boolean;
  net: number;
  uuid?: Identifier;
}

export interface PcbVia extends TaggedEntity {
  type: 'via';
  /** blind or micro; through vias have none */
  viaType?: 'blind' | 'micro';
  locked: boolean;
  position: Position;
  size: number;
  drill?: number;
  layers: string[];
  removeUnusedLayers?: boolean;
  keepEndLayers?: boolean;
  free?: boolean;
  net?: number;
  uuid?: Identifier;
}

export type PcbTrack = PcbSegment | PcbArc | PcbVia;

export interface PcbGroup extends TaggedEntity {
  type: 'group';
  name: string;
  locked: boolean;
  uuid?: Identifier;
  members: string[];
}

export type BoardGraphic = GraphicShape | BoardText | TextBox;

export interface PcbBoard extends TaggedEntity, FileHeader {
  type: 'kicad_pcb';
  general?: BoardGeneral;
  paper?: PageSettings;
  titleBlock?: TitleBlock;
  layers: PcbLayer[];
  setup?: BoardSetup;
  properties: Property[];
  nets: Net[];
  footprints: PcbFootprint[];
  /** gr_* items in file order; those without a codec (gr_bbox, gr_vector) stay raw */
  graphics: Array<BoardGraphic | RawItem>;
  dimensions: PcbDimension[];
  targets: PcbTarget[];
  tracks: Array<PcbTrack | RawItem>;
  zones: PcbZone[];
  groups: PcbGroup[];
}

// --- Layers ---

/** Layer entries are keyed by their ordinal: (0 "F.Cu" signal) */
function readLayer(reader: NodeReader): PcbLayer {
  return {
    id: reader.integer(0, 'id'),
    name: reader.string(1, 'name'),
    type: reader.string(2, 'type'),
    userName: reader.optionalString(3, 'userName'),
  };
}

function layerList(layer: PcbLayer): SExprList {
  const node: SExprList = { kind: 'list', items: [num(layer.id), str(layer.name), flag(layer.type)] };
  if (layer.userName !== undefined) node.items.push(str(layer.userName));
  return node;
}

function layersList(layers: readonly PcbLayer[]): SExprList {
  const node = list('layers');
  for (const layer of layers) node.items.push(layerList(layer));
  return node;
}

function readLayers(reader: NodeReader): PcbLayer[] {
  return reader.nestedLists().map(readLayer);
}

// --- Tracks ---

export const segmentCodec = defineCodec<PcbSegment>({
  keyword: 'segment',
  read(reader) {
    const segment: PcbSegment = {
      type: 'segment',
      start: readPoint(reader.requireNested('start')),
      end: readPoint(reader.requireNested('end')),
      width: reader.childNumber('width') ?? 0,
      layer: reader.childString('layer') ?? '',
      locked: false,
      net: reader.childInteger('net') ?? 0,
      extras: [],
    };
    segment.locked = readBool(segment, reader.bool('locked'), 'locked') ?? false;
    segment.uuid = readIdentifier(reader);
    return segment;
  },
  plan: [
    { field: 'locked', when: (s) => s.flagForms?.locked === 'bare', emit: (s) => emitBool(s, 'locked', s.locked, 'bare') },
    { field: 'start', emit: (s) => point('start', s.start) },
    { field: 'end', emit: (s) => point('end', s.end) },
    { field: 'width', emit: (s) => list('width', s.width) },
    { field: 'locked', when: (s) => s.flagForms?.locked !== 'bare', emit: (s) => emitBool(s, 'locked', s.locked, 'yes-no') },
    { field: 'layer', emit: (s) => list('layer', str(s.layer)) },
    { field: 'net', emit: (s) => list('net', s.net) },
    { field: 'uuid', emit: (s) => identifier(s.uuid) },
  ],
  create: () => ({
    type: 'segment',
    start: { x: 0, y: 0 },
    end: { x: 0, y: 0 },
    width: 0.25,
    layer: 'F.Cu',
    locked: false,
    net: 0,
    uuid: newUuid(),
    extras: [],
  }),
});

export const arcCodec = defineCodec<PcbArc>({
  keyword: 'arc',
  read(reader) {
    const arc: PcbArc = {
      type: 'arc',
      start: readPoint(reader.requireNested('start')),
      mid: readPoint(reader.requireNested('mid')),
      end: readPoint(reader.requireNested('end')),
      width: reader.childNumber('width') ?? 0,
      layer: reader.childString('layer') ?? '',
      locked: false,
      net: reader.childInteger('net') ?? 0,
      extras: [],
    };
    arc.locked = readBool(arc, reader.bool('locked'), 'locked') ?? false;
    arc.uuid = readIdentifier(reader);
    return arc;
  },
  plan: [
    { field: 'locked', when: (a) => a.flagForms?.locked === 'bare', emit: (a) => emitBool(a, 'locked', a.locked, 'bare') },
    { field: 'start', emit: (a) => point('start', a.start) },
    { field: 'mid', emit: (a) => point('mid', a.mid) },
    { field: 'end', emit: (a) => point('end', a.end) },
    { field: 'width', emit: (a) => list('width', a.width) },
    { field: 'locked', when: (a) => a.flagForms?.locked !== 'bare', emit: (a) => emitBool(a, 'locked', a.locked, 'yes-no') },
    { field: 'layer', emit: (a) => list('layer', str(a.layer)) },
    { field: 'net', emit: (a) => list('net', a.net) },
    { field: 'uuid', emit: (a) => identifier(a.uuid) },
  ],
  create: () => ({
    type: 'arc',
    start: { x: 0, y: 0 },
    mid: { x: 0, y: 0 },
    end: { x: 0, y: 0 },
    width: 0.25,
    layer: 'F.Cu',
    locked: false,
    net: 0,
    uuid: newUuid(),
    extras: [],
  }),
});

const viaPlan: EmitStep<PcbVia>[] = [
  { field: 'type', when: (v) => v.viaType !== undefined, emit: (v) => flag(v.viaType ?? '') },
  { field: 'locked', when: (v) => v.flagForms?.locked === 'bare', emit: (v) => emitBool(v, 'locked', v.locked, 'bare') },
  { field: 'at', emit: (v) => position(v.position) },
  { field: 'size', emit: (v) => list('size', v.size) },
  { field: 'drill', when: (v) => v.drill !== undefined, emit: (v) => list('drill', v.drill ?? 0) },
  { field: 'layers', emit: (v) => list('layers', ...v.layers.map(str)) },
  { field: 'remove_unused_layers', emit: (v) => emitBool(v, 'remove_unused_layers', v.removeUnusedLayers, 'empty') },
  { field: 'keep_end_layers', emit: (v) => emitBool(v, 'keep_end_layers', v.keepEndLayers, 'empty') },
  { field: 'free', emit: (v) => emitBool(v, 'free', v.free, 'empty') },
  { field: 'locked', when: (v) => v.flagForms?.locked !== 'bare', emit: (v) => emitBool(v, 'locked', v.locked, 'yes-no') },
  { field: 'net', when: (v) => v.net !== undefined, emit: (v) => list('net', v.net ?? 0) },
  { field: 'uuid', emit: (v) => identifier(v.uuid) },
];

export const viaCodec = defineCodec<PcbVia>({
  keyword: 'via',
  read(reader) {
    const via: PcbVia = {
      type: 'via',
      locked: false,
      position: readPosition(reader.requireNested('at')),
      size: 0,
      layers: [],
      extras: [],
    };
    if (reader.flag('blind')) via.viaType = 'blind';
    else if (reader.flag('micro')) via.viaType = 'micro';
    via.locked = readBool(via, reader.bool('locked'), 'locked') ?? false;
    via.size = reader.requireNested('size').number(1, 'size');
    via.drill = reader.childNumber('drill');
    via.layers = reader.childStrings('layers') ?? [];
    via.removeUnusedLayers = readBool(via, reader.bool('remove_unused_layers'), 'remove_unused_layers');
    via.keepEndLayers = readBool(via, reader.bool('keep_end_layers'), 'keep_end_layers');
    via.free = readBool(via, reader.bool('free'), 'free');
    via.net = reader.childInteger('net');
    via.uuid = readIdentifier(reader);
    return via;
  },
  plan: viaPlan,
  create: () => ({
    type: 'via',
    locked: false,
    position: { x: 0, y: 0 },
    size: 0.6,
    drill: 0.3,
    layers: ['F.Cu', 'B.Cu'],
    net: 0,
    uuid: newUuid(),
    extras: [],
  }),
});

export const trackRegistry = new CodecRegistry<PcbTrack>([segmentCodec, arcCodec, viaCodec]);

export const boardGraphicRegistry = new CodecRegistry<BoardGraphic>([
  boardTextCodec,
  boardTextBoxCodec,
  boardShapes.line,
  boardShapes.rect,
  boardShapes.circle,
  boardShapes.arc,
  boardShapes.poly,
  boardShapes.curve,
]);

// --- Groups ---

export const groupCodec = defineCodec<PcbGroup>({
  keyword: 'group',
  read(reader) {
    const group: PcbGroup = {
      type: 'group',
      name: reader.string(1, 'name'),
      locked: false,
      members: [],
      extras: [],
    };
    group.locked = readBool(group, reader.bool('locked'), 'locked') ?? false;
    group.uuid = readIdentifier(reader) ?? readGroupId(reader);
    group.members = reader.childStrings('members') ?? [];
    return group;
  },
  plan: [
    { field: 'name', emit: (g) => str(g.name) },
    { field: 'locked', when: (g) => g.flagForms?.locked === 'bare', emit: (g) => emitBool(g, 'locked', g.locked, 'bare') },
    { field: 'uuid', emit: (g) => groupId(g.uuid) },
    { field: 'locked', when: (g) => g.flagForms?.locked !== 'bare', emit: (g) => emitBool(g, 'locked', g.locked, 'yes-no') },
    { field: 'members', emit: (g) => list('members', ...g.members.map(str)) },
  ],
  create: () => ({ type: 'group', name: '', locked: false, uuid: newUuid(), members: [], extras: [] }),
});

/** KiCad 6 groups write their identifier as (id ...) */
function readGroupId(reader: NodeReader): Identifier | undefined {
  const id = reader.childString('id');
  return id !== undefined ? { key: 'tstamp', value: id } : undefined;
}

function groupId(id: Identifier | undefined): SExprList | undefined {
  if (id?.key === 'tstamp') return list('id', id.value);
  return identifier(id);
}

// --- Board ---

const boardPlan: EmitStep<PcbBoard>[] = [
  ...headerSteps<PcbBoard>(),
  { field: 'general', when: (b) => b.general !== undefined, emit: (b) => (b.general ? boardGeneralCodec.encode(b.general) : undefined) },
  { field: 'paper', when: (b) => b.paper !== undefined, emit: (b) => (b.paper ? pageSettingsCodec.encode(b.paper) : undefined) },
  {
    field: 'title_block',
    when: (b) => b.titleBlock !== undefined,
    emit: (b) => (b.titleBlock ? titleBlockCodec.encode(b.titleBlock) : undefined),
  },
  { field: 'layers', emit: (b) => layersList(b.layers) },
  { field: 'setup', when: (b) => b.setup !== undefined, emit: (b) => (b.setup ? boardSetupCodec.encode(b.setup) : undefined) },
  { field: 'property', emit: (b) => b.properties.map(propertyCodec.encode) },
  { field: 'net', emit: (b) => b.nets.map(netCodec.encode) },
  { field: 'footprint', emit: (b) => b.footprints.map(footprintCodec.encode) },
  { field: 'graphics', emit: (b) => b.graphics.map((g) => boardGraphicRegistry.encode(g)) },
  { field: 'dimension', emit: (b) => b.dimensions.map(dimensionCodec.encode) },
  { field: 'target', emit: (b) => b.targets.map(targetCodec.encode) },
  { field: 'tracks', emit: (b) => b.tracks.map((t) => trackRegistry.encode(t)) },
  { field: 'zone', emit: (b) => b.zones.map(zoneCodec.encode) },
  { field: 'group', emit: (b) => b.groups.map(groupCodec.encode) },
];

export const boardCodec = defineCodec<PcbBoard>({
  keyword: 'kicad_pcb',
  read(reader) {
    const header = readHeader(reader);
    const layers = reader.nested('layers');
    return {
      type: 'kicad_pcb',
      ...header,
      general: reader.decodeChild('general', boardGeneralCodec.decode),
      paper: reader.decodeChild('paper', pageSettingsCodec.decode),
      titleBlock: reader.decodeChild('title_block', titleBlockCodec.decode),
      layers: layers ? readLayers(layers) : [],
      setup: reader.decodeChild('setup', boardSetupCodec.decode),
      properties: reader.decodeChildren('property', propertyCodec.decode),
      nets: reader.decodeChildren('net', netCodec.decode),
      footprints: reader.decodeChildren('footprint', footprintCodec.decode),
      graphics: reader
        .childrenWhere((keyword) => isGraphicKeyword('gr', keyword))
        .map((node) => boardGraphicRegistry.decode(node)),
      dimensions: reader.decodeChildren('dimension', dimensionCodec.decode),
      targets: reader.decodeChildren('target', targetCodec.decode),
      tracks: reader.childrenWhere((keyword) => trackRegistry.has(keyword)).map((node) => trackRegistry.decode(node)),
      zones: reader.decodeChildren('zone', zoneCodec.decode),
      groups: reader.decodeChildren('group', groupCodec.decode),
      extras: [],
    };
  },
  plan: boardPlan,
  create: (config: LibraryConfig) => ({
    type: 'kicad_pcb',
    version: config.versions.board,
    generator: config.generators.board,
    generatorVersion: config.generatorVersion,
    general: boardGeneralCodec.create(config),
    paper: pageSettingsCodec.create(config),
    layers: defaultLayers(),
    setup: boardSetupCodec.create(config),
    properties: [],
    nets: [{ number: 0, name: '', extras: [] }],
    footprints: [],
    graphics: [],
    dimensions: [],
    targets: [],
    tracks: [],
    zones: [],
    groups: [],
    extras: [],
  }),
});

function defaultLayers(): PcbLayer[] {
  return [
    { id: 0, name: 'F.Cu', type: 'signal' },
    { id: 31, name: 'B.Cu', type: 'signal' },
    { id: 32, name: 'B.Adhes', type: 'user', userName: 'B.Adhesive' },
    { id: 33, name: 'F.Adhes', type: 'user', userName: 'F.Adhesive' },
    { id: 34, name: 'B.Paste', type: 'user' },
    { id: 35, name: 'F.Paste', type: 'user' },
    { id: 36, name: 'B.SilkS', type: 'user', userName: 'B.Silkscreen' },
    { id: 37, name: 'F.SilkS', type: 'user', userName: 'F.Silkscreen' },
    { id: 38, name: 'B.Mask', type: 'user' },
    { id: 39, name: 'F.Mask', type: 'user' },
    { id: 44, name: 'Edge.Cuts', type: 'user' },
    { id: 46, name: 'B.CrtYd', type: 'user', userName: 'B.Courtyard' },
    { id: 47, name: 'F.CrtYd', type: 'user', userName: 'F.Courtyard' },
    { id: 48, name: 'B.Fab', type: 'user' },
    { id: 49, name: 'F.Fab', type: 'user' },
  ];
}
