/**
 * KiCad Schematic (.kicad_sch) schema
 *
 * Connectivity items (wires, buses, junctions, labels), placed symbols, sheets and
 * drawings are decoded in file order. Images, tables, rule areas and shapes without
 * a codec stay as written.
 */

import type { LibraryConfig } from '../shared/config';
import type { NodeReader } from '../parser/nodeAccessor';
import { list, str, type SExprList } from '../parser/sexpr';
import {
  CodecRegistry, defineCodec, emitBool, optionalYesNo, readBool, yesNo,
  type EmitStep, type RawItem, type TaggedEntity,
} from './codec';
import {
  color, effectsCodec, headerSteps, identifier, newUuid, optionalColor, pageSettingsCodec, points, position, propertyCodec,
  readHeader, readIdentifier, readPoints, readPosition, strokeCodec, titleBlockCodec,
  type Color, type Effects, type FileHeader, type Identifier, type PageSettings, type Point, type Position,
  type Property, type Stroke, type TitleBlock,
} from './common';
import {
  busEntryCodec, instancePathList, instancesList, polylineCodec, readInstancePath, readProjectInstances,
  schematicTextBoxCodec, schematicTextCodec, sheetCodec,
  type BusEntry, type InstancePath, type Polyline, type ProjectInstance, type SchematicText, type SchematicTextBox,
  type Sheet,
} from './schematicItems';
import { libSymbolCodec, type LibSymbol } from './symbolLib';

// --- Types ---

export interface Junction extends TaggedEntity {
  type: 'junction';
  position: Position;
  diameter: number;
  color: Color;
  uuid?: Identifier;
}

export interface NoConnect extends TaggedEntity {
  type: 'no_connect';
  position: Position;
  uuid?: Identifier;
}

export interface Wire extends TaggedEntity {
  type: 'wire' | 'bus';
  points: Point[];
  stroke: Stroke;
  uuid?: Identifier;
}

export interface Label extends TaggedEntity {
  type: 'label' | 'global_label' | 'hierarchical_label';
  text: string;
  /** Port shape of global and hierarchical labels: input, output, bidirectional, ... */
  shape?: string;
  position: Position;
  fieldsAutoplaced: boolean;
  effects: Effects;
  uuid?: Identifier;
  properties: Property[];
}

export interface SymbolPinRef {
  number: string;
  alternate?: string;
  uuid?: Identifier;
}

export interface SchematicSymbol extends TaggedEntity {
  type: 'symbol';
  /** Name of the embedded library symbol when it differs from lib_id */
  libName?: string;
  libId: string;
  position: Position;
  mirror?: 'x' | 'y';
  unit: number;
  convert?: number;
  excludeFromSim?: boolean;
  inBom: boolean;
  onBoard: boolean;
  dnp?: boolean;
  fieldsAutoplaced: boolean;
  uuid?: Identifier;
  properties: Property[];
  pins: SymbolPinRef[];
  /** Per-project references of KiCad 7+ */
  instances?: ProjectInstance[];
}

export type SchematicItem =
  | Junction | NoConnect | Wire | Label | SchematicSymbol | Sheet | SchematicText | SchematicTextBox | BusEntry | Polyline;

export interface KicadSchematic extends TaggedEntity, FileHeader {
  type: 'kicad_sch';
  uuid?: Identifier;
  paper?: PageSettings;
  titleBlock?: TitleBlock;
  libSymbols?: LibSymbol[];
  /** Drawing items in file order */
  items: Array<SchematicItem | RawItem>;
  /** Page numbers of the sheet hierarchy */
  sheetInstances?: InstancePath[];
  /** References of every symbol, written at the root by KiCad 6 */
  symbolInstances?: InstancePath[];
}

// --- Connectivity ---

export const junctionCodec = defineCodec<Junction>({
  keyword: 'junction',
  read(reader) {
    return {
      type: 'junction',
      position: readPosition(reader.requireNested('at')),
      diameter: reader.childNumber('diameter') ?? 0,
      color: optionalColor(reader) ?? { r: 0, g: 0, b: 0, a: 0 },
      uuid: readIdentifier(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'at', emit: (j) => position(j.position) },
    { field: 'diameter', emit: (j) => list('diameter', j.diameter) },
    { field: 'color', emit: (j) => color(j.color) },
    { field: 'uuid', emit: (j) => identifier(j.uuid) },
  ],
  create: () => ({
    type: 'junction',
    position: { x: 0, y: 0 },
    diameter: 0,
    color: { r: 0, g: 0, b: 0, a: 0 },
    uuid: newUuid(),
    extras: [],
  }),
});

export const noConnectCodec = defineCodec<NoConnect>({
  keyword: 'no_connect',
  read(reader) {
    return {
      type: 'no_connect',
      position: readPosition(reader.requireNested('at')),
      uuid: readIdentifier(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'at', emit: (n) => position(n.position) },
    { field: 'uuid', emit: (n) => identifier(n.uuid) },
  ],
  create: () => ({ type: 'no_connect', position: { x: 0, y: 0 }, uuid: newUuid(), extras: [] }),
});

function wireCodec(keyword: 'wire' | 'bus') {
  return defineCodec<Wire>({
    keyword,
    read(reader) {
      return {
        type: keyword,
        points: readPoints(reader.requireNested('pts')),
        stroke: reader.decodeChild('stroke', strokeCodec.decode) ?? strokeCodec.create(),
        uuid: readIdentifier(reader),
        extras: [],
      };
    },
    plan: [
      { field: 'pts', emit: (w) => points(w.points) },
      { field: 'stroke', emit: (w) => strokeCodec.encode(w.stroke) },
      { field: 'uuid', emit: (w) => identifier(w.uuid) },
    ],
    create: () => ({ type: keyword, points: [], stroke: strokeCodec.create(), uuid: newUuid(), extras: [] }),
  });
}

export const wireSegmentCodec = wireCodec('wire');
export const busCodec = wireCodec('bus');

function labelCodec(keyword: Label['type']) {
  const hasShape = keyword !== 'label';
  const plan: EmitStep<Label>[] = [
    { field: 'text', emit: (l) => str(l.text) },
    { field: 'shape', when: (l) => l.shape !== undefined, emit: (l) => list('shape', l.shape ?? 'input') },
    { field: 'at', emit: (l) => position(l.position) },
    { field: 'fields_autoplaced', emit: (l) => emitBool(l, 'fields_autoplaced', l.fieldsAutoplaced, 'yes-no') },
    { field: 'effects', emit: (l) => effectsCodec.encode(l.effects) },
    { field: 'uuid', emit: (l) => identifier(l.uuid) },
    { field: 'property', emit: (l) => l.properties.map(propertyCodec.encode) },
  ];
  return defineCodec<Label>({
    keyword,
    read(reader) {
      const label: Label = {
        type: keyword,
        text: reader.string(1, 'text'),
        shape: reader.childString('shape'),
        position: readPosition(reader.requireNested('at')),
        fieldsAutoplaced: false,
        effects: effectsCodec.create(),
        properties: [],
        extras: [],
      };
      label.fieldsAutoplaced = readBool(label, reader.bool('fields_autoplaced'), 'fields_autoplaced') ?? false;
      label.effects = reader.decodeChild('effects', effectsCodec.decode) ?? label.effects;
      label.uuid = readIdentifier(reader);
      label.properties = reader.decodeChildren('property', propertyCodec.decode);
      return label;
    },
    plan,
    create: () => ({
      type: keyword,
      text: '',
      shape: hasShape ? 'input' : undefined,
      position: { x: 0, y: 0, angle: 0 },
      fieldsAutoplaced: false,
      effects: effectsCodec.create(),
      uuid: newUuid(),
      properties: [],
      extras: [],
    }),
  });
}

export const localLabelCodec = labelCodec('label');
export const globalLabelCodec = labelCodec('global_label');
export const hierarchicalLabelCodec = labelCodec('hierarchical_label');

// --- Symbols ---

function readPinRef(reader: NodeReader): SymbolPinRef {
  return {
    number: reader.string(1, 'number'),
    alternate: reader.childString('alternate'),
    uuid: readIdentifier(reader),
  };
}

function pinRefList(pin: SymbolPinRef): SExprList {
  const node = list('pin', str(pin.number));
  if (pin.alternate !== undefined) node.items.push(list('alternate', str(pin.alternate)));
  const id = identifier(pin.uuid);
  if (id) node.items.push(id);
  return node;
}

function readMirror(reader: NodeReader): 'x' | 'y' | undefined {
  const mirror = reader.childString('mirror');
  return mirror === 'x' || mirror === 'y' ? mirror : undefined;
}

export const schematicSymbolCodec = defineCodec<SchematicSymbol>({
  keyword: 'symbol',
  read(reader) {
    const symbol: SchematicSymbol = {
      type: 'symbol',
      libName: reader.childString('lib_name'),
      libId: reader.childString('lib_id') ?? '',
      position: readPosition(reader.requireNested('at')),
      mirror: readMirror(reader),
      unit: reader.childInteger('unit') ?? 1,
      convert: reader.childInteger('convert'),
      excludeFromSim: reader.bool('exclude_from_sim')?.value,
      inBom: reader.bool('in_bom')?.value ?? true,
      onBoard: reader.bool('on_board')?.value ?? true,
      dnp: reader.bool('dnp')?.value,
      fieldsAutoplaced: false,
      properties: [],
      pins: [],
      extras: [],
    };
    symbol.fieldsAutoplaced = readBool(symbol, reader.bool('fields_autoplaced'), 'fields_autoplaced') ?? false;
    symbol.uuid = readIdentifier(reader);
    symbol.properties = reader.decodeChildren('property', propertyCodec.decode);
    symbol.pins = reader.nestedAll('pin').map(readPinRef);
    const instances = reader.nested('instances');
    if (instances) symbol.instances = readProjectInstances(instances);
    return symbol;
  },
  plan: [
    { field: 'lib_name', when: (s) => s.libName !== undefined, emit: (s) => list('lib_name', str(s.libName ?? '')) },
    { field: 'lib_id', emit: (s) => list('lib_id', str(s.libId)) },
    { field: 'at', emit: (s) => position(s.position) },
    { field: 'mirror', when: (s) => s.mirror !== undefined, emit: (s) => list('mirror', s.mirror ?? 'x') },
    { field: 'unit', emit: (s) => list('unit', s.unit) },
    { field: 'convert', when: (s) => s.convert !== undefined, emit: (s) => list('convert', s.convert ?? 1) },
    { field: 'exclude_from_sim', emit: (s) => optionalYesNo('exclude_from_sim', s.excludeFromSim) },
    { field: 'in_bom', emit: (s) => yesNo('in_bom', s.inBom) },
    { field: 'on_board', emit: (s) => yesNo('on_board', s.onBoard) },
    { field: 'dnp', emit: (s) => optionalYesNo('dnp', s.dnp) },
    { field: 'fields_autoplaced', emit: (s) => emitBool(s, 'fields_autoplaced', s.fieldsAutoplaced, 'yes-no') },
    { field: 'uuid', emit: (s) => identifier(s.uuid) },
    { field: 'property', emit: (s) => s.properties.map(propertyCodec.encode) },
    { field: 'pin', emit: (s) => s.pins.map(pinRefList) },
    { field: 'instances', when: (s) => s.instances !== undefined, emit: (s) => instancesList(s.instances ?? []) },
  ],
  create: () => ({
    type: 'symbol',
    libId: '',
    position: { x: 0, y: 0, angle: 0 },
    unit: 1,
    excludeFromSim: false,
    inBom: true,
    onBoard: true,
    dnp: false,
    fieldsAutoplaced: false,
    uuid: newUuid(),
    properties: [],
    pins: [],
    extras: [],
  }),
});

// --- Schematic ---

export const schematicItems = new CodecRegistry<SchematicItem>([
  junctionCodec,
  noConnectCodec,
  wireSegmentCodec,
  busCodec,
  localLabelCodec,
  globalLabelCodec,
  hierarchicalLabelCodec,
  schematicSymbolCodec,
  sheetCodec,
  schematicTextCodec,
  schematicTextBoxCodec,
  busEntryCodec,
  polylineCodec,
]);

/** Drawing items kept in file order alongside the decoded ones */
const RAW_ITEM_KEYWORDS = new Set([
  'arc', 'bezier', 'bus_alias', 'circle', 'directive_label', 'image', 'netclass_flag', 'rectangle', 'rule_area', 'table',
]);

function readInstancePaths(reader: NodeReader | undefined): InstancePath[] | undefined {
  return reader ? reader.nestedAll('path').map(readInstancePath) : undefined;
}

function instancePathsList(keyword: string, paths: readonly InstancePath[] | undefined): SExprList | undefined {
  return paths ? list(keyword, ...paths.map(instancePathList)) : undefined;
}

function isItemKeyword(keyword: string): boolean {
  return schematicItems.has(keyword) || RAW_ITEM_KEYWORDS.has(keyword);
}

export const schematicCodec = defineCodec<KicadSchematic>({
  keyword: 'kicad_sch',
  read(reader) {
    const header = readHeader(reader);
    const uuid = readIdentifier(reader);
    const paper = reader.decodeChild('paper', pageSettingsCodec.decode);
    const titleBlock = reader.decodeChild('title_block', titleBlockCodec.decode);
    const libSymbols = reader.nested('lib_symbols');
    return {
      type: 'kicad_sch',
      ...header,
      uuid,
      paper,
      titleBlock,
      libSymbols: libSymbols?.decodeChildren('symbol', libSymbolCodec.decode),
      items: reader.childrenWhere(isItemKeyword).map((node) => schematicItems.decode(node)),
      sheetInstances: readInstancePaths(reader.nested('sheet_instances')),
      symbolInstances: readInstancePaths(reader.nested('symbol_instances')),
      extras: [],
    };
  },
  plan: [
    ...headerSteps<KicadSchematic>(),
    { field: 'uuid', emit: (s) => identifier(s.uuid) },
    { field: 'paper', when: (s) => s.paper !== undefined, emit: (s) => (s.paper ? pageSettingsCodec.encode(s.paper) : undefined) },
    {
      field: 'title_block',
      when: (s) => s.titleBlock !== undefined,
      emit: (s) => (s.titleBlock ? titleBlockCodec.encode(s.titleBlock) : undefined),
    },
    {
      field: 'lib_symbols',
      when: (s) => s.libSymbols !== undefined,
      emit: (s) => {
        const node = list('lib_symbols');
        for (const symbol of s.libSymbols ?? []) node.items.push(libSymbolCodec.encode(symbol));
        return node;
      },
    },
    { field: 'items', emit: (s) => s.items.map((item) => schematicItems.encode(item)) },
    { field: 'sheet_instances', emit: (s) => instancePathsList('sheet_instances', s.sheetInstances) },
    { field: 'symbol_instances', emit: (s) => instancePathsList('symbol_instances', s.symbolInstances) },
  ],
  create: (config: LibraryConfig) => ({
    type: 'kicad_sch',
    version: config.versions.schematic,
    generator: config.generators.schematic,
    generatorVersion: config.generatorVersion,
    uuid: newUuid(),
    paper: pageSettingsCodec.create(config),
    libSymbols: [],
    items: [],
    sheetInstances: [{ path: '/', page: '1' }],
    extras: [],
  }),
});
