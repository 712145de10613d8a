/**
 * Schematic drawing items besides wires, labels and symbols: free text, text boxes,
 * bus entries, polylines and hierarchical sheets, plus the instance paths that tie
 * symbols and sheets to a project.
 */

import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, str, type SExprList } from '../parser/sexpr';
import { defineCodec, emitBool, optionalYesNo, readBool, type Entity, type TaggedEntity } from './codec';
import {
  color, effectsCodec, identifier, newUuid, optionalColor, points, position, propertyCodec, readIdentifier, readPoints,
  readPosition, strokeCodec,
  type Color, type Effects, type Identifier, type Point, type Position, type Property, type Stroke,
} from './common';

// --- Shared pieces ---

/** `(fill (type none))`, `(fill (type color) (color ...))`, or a bare `(fill (color ...))` on KiCad 6 sheets */
export interface Fill {
  /** none, outline, background or color */
  type?: string;
  color?: Color;
}

export function readFill(reader: NodeReader): Fill {
  return { type: reader.childString('type'), color: optionalColor(reader) };
}

export function fillList(fill: Fill): SExprList {
  const node = list('fill');
  if (fill.type !== undefined) node.items.push(list('type', fill.type));
  if (fill.color) node.items.push(color(fill.color));
  return node;
}

function optionalFill(reader: NodeReader): Fill | undefined {
  const found = reader.nested('fill');
  return found ? readFill(found) : undefined;
}

export interface Size {
  w: number;
  h: number;
}

function readSize(reader: NodeReader): Size {
  const size = reader.requireNested('size');
  return { w: size.number(1, 'width'), h: size.number(2, 'height') };
}

// --- Instances ---

/** One `(path ...)` entry of an instance block */
export interface InstancePath {
  path: string;
  reference?: string;
  unit?: number;
  value?: string;
  footprint?: string;
  page?: string;
}

export interface ProjectInstance {
  project: string;
  paths: InstancePath[];
}

export function readInstancePath(reader: NodeReader): InstancePath {
  return {
    path: reader.string(1, 'path'),
    reference: reader.childString('reference'),
    unit: reader.childInteger('unit'),
    value: reader.childString('value'),
    footprint: reader.childString('footprint'),
    page: reader.childString('page'),
  };
}

export function instancePathList(entry: InstancePath): SExprList {
  const node = list('path', str(entry.path));
  if (entry.reference !== undefined) node.items.push(list('reference', str(entry.reference)));
  if (entry.unit !== undefined) node.items.push(list('unit', entry.unit));
  if (entry.value !== undefined) node.items.push(list('value', str(entry.value)));
  if (entry.footprint !== undefined) node.items.push(list('footprint', str(entry.footprint)));
  if (entry.page !== undefined) node.items.push(list('page', str(entry.page)));
  return node;
}

/** `(instances (project "name" (path ...) ...) ...)` of KiCad 7+ symbols and sheets */
export function readProjectInstances(reader: NodeReader): ProjectInstance[] {
  return reader.nestedAll('project').map((project) => ({
    project: project.string(1, 'project'),
    paths: project.nestedAll('path').map(readInstancePath),
  }));
}

export function instancesList(projects: readonly ProjectInstance[]): SExprList {
  const node = list('instances');
  for (const project of projects) {
    node.items.push(list('project', str(project.project), ...project.paths.map(instancePathList)));
  }
  return node;
}

// --- Text ---

export interface SchematicText extends TaggedEntity {
  type: 'text';
  text: string;
  excludeFromSim?: boolean;
  position: Position;
  fieldsAutoplaced?: boolean;
  effects?: Effects;
  uuid?: Identifier;
}

export const schematicTextCodec = defineCodec<SchematicText>({
  keyword: 'text',
  read(reader) {
    const text: SchematicText = {
      type: 'text',
      text: reader.string(1, 'text'),
      excludeFromSim: reader.bool('exclude_from_sim')?.value,
      position: readPosition(reader.requireNested('at')),
      extras: [],
    };
    text.fieldsAutoplaced = readBool(text, reader.bool('fields_autoplaced'), 'fields_autoplaced');
    text.effects = reader.decodeChild('effects', effectsCodec.decode);
    text.uuid = readIdentifier(reader);
    return text;
  },
  plan: [
    { field: 'text', emit: (t) => str(t.text) },
    { field: 'exclude_from_sim', emit: (t) => optionalYesNo('exclude_from_sim', t.excludeFromSim) },
    { field: 'at', emit: (t) => position(t.position) },
    { field: 'fields_autoplaced', emit: (t) => emitBool(t, 'fields_autoplaced', t.fieldsAutoplaced, 'yes-no') },
    { field: 'effects', when: (t) => t.effects !== undefined, emit: (t) => (t.effects ? effectsCodec.encode(t.effects) : undefined) },
    { field: 'uuid', emit: (t) => identifier(t.uuid) },
  ],
  create: () => ({
    type: 'text',
    text: '',
    excludeFromSim: false,
    position: { x: 0, y: 0, angle: 0 },
    effects: effectsCodec.create(),
    uuid: newUuid(),
    extras: [],
  }),
});

export interface SchematicTextBox extends TaggedEntity {
  type: 'text_box';
  text: string;
  excludeFromSim?: boolean;
  position: Position;
  size: Size;
  /** left, top, right, bottom */
  margins?: number[];
  stroke?: Stroke;
  fill?: Fill;
  effects?: Effects;
  uuid?: Identifier;
}

export const schematicTextBoxCodec = defineCodec<SchematicTextBox>({
  keyword: 'text_box',
  read(reader) {
    const box: SchematicTextBox = {
      type: 'text_box',
      text: reader.string(1, 'text'),
      excludeFromSim: reader.bool('exclude_from_sim')?.value,
      position: readPosition(reader.requireNested('at')),
      size: readSize(reader),
      extras: [],
    };
    const margins = reader.nested('margins');
    if (margins) box.margins = [0, 1, 2, 3].map((i) => margins.number(i + 1, 'margins'));
    box.stroke = reader.decodeChild('stroke', strokeCodec.decode);
    box.fill = optionalFill(reader);
    box.effects = reader.decodeChild('effects', effectsCodec.decode);
    box.uuid = readIdentifier(reader);
    return box;
  },
  plan: [
    { field: 'text', emit: (b) => str(b.text) },
    { field: 'exclude_from_sim', emit: (b) => optionalYesNo('exclude_from_sim', b.excludeFromSim) },
    { field: 'at', emit: (b) => position(b.position) },
    { field: 'size', emit: (b) => list('size', b.size.w, b.size.h) },
    { field: 'margins', when: (b) => b.margins !== undefined, emit: (b) => list('margins', ...(b.margins ?? [])) },
    { field: 'stroke', when: (b) => b.stroke !== undefined, emit: (b) => (b.stroke ? strokeCodec.encode(b.stroke) : undefined) },
    { field: 'fill', when: (b) => b.fill !== undefined, emit: (b) => (b.fill ? fillList(b.fill) : undefined) },
    { field: 'effects', when: (b) => b.effects !== undefined, emit: (b) => (b.effects ? effectsCodec.encode(b.effects) : undefined) },
    { field: 'uuid', emit: (b) => identifier(b.uuid) },
  ],
  create: () => ({
    type: 'text_box',
    text: '',
    excludeFromSim: false,
    position: { x: 0, y: 0, angle: 0 },
    size: { w: 20, h: 10 },
    margins: [0.9525, 0.9525, 0.9525, 0.9525],
    stroke: strokeCodec.create(),
    fill: { type: 'none' },
    effects: effectsCodec.create(),
    uuid: newUuid(),
    extras: [],
  }),
});

// --- Lines ---

export interface BusEntry extends TaggedEntity {
  type: 'bus_entry';
  position: Position;
  size: Size;
  stroke?: Stroke;
  uuid?: Identifier;
}

export const busEntryCodec = defineCodec<BusEntry>({
  keyword: 'bus_entry',
  read(reader) {
    return {
      type: 'bus_entry',
      position: readPosition(reader.requireNested('at')),
      size: readSize(reader),
      stroke: reader.decodeChild('stroke', strokeCodec.decode),
      uuid: readIdentifier(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'at', emit: (b) => position(b.position) },
    { field: 'size', emit: (b) => list('size', b.size.w, b.size.h) },
    { field: 'stroke', when: (b) => b.stroke !== undefined, emit: (b) => (b.stroke ? strokeCodec.encode(b.stroke) : undefined) },
    { field: 'uuid', emit: (b) => identifier(b.uuid) },
  ],
  create: () => ({
    type: 'bus_entry',
    position: { x: 0, y: 0 },
    size: { w: 2.54, h: 2.54 },
    stroke: strokeCodec.create(),
    uuid: newUuid(),
    extras: [],
  }),
});

/** Graphic line in a schematic or a symbol body */
export interface Polyline extends TaggedEntity {
  type: 'polyline';
  points: Point[];
  stroke?: Stroke;
  fill?: Fill;
  uuid?: Identifier;
}

export const polylineCodec = defineCodec<Polyline>({
  keyword: 'polyline',
  read(reader) {
    const pts = reader.nested('pts');
    return {
      type: 'polyline',
      points: pts ? readPoints(pts) : [],
      stroke: reader.decodeChild('stroke', strokeCodec.decode),
      fill: optionalFill(reader),
      uuid: readIdentifier(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'pts', emit: (p) => points(p.points) },
    { field: 'stroke', when: (p) => p.stroke !== undefined, emit: (p) => (p.stroke ? strokeCodec.encode(p.stroke) : undefined) },
    { field: 'fill', when: (p) => p.fill !== undefined, emit: (p) => (p.fill ? fillList(p.fill) : undefined) },
    { field: 'uuid', emit: (p) => identifier(p.uuid) },
  ],
  create: () => ({
    type: 'polyline',
    points: [],
    stroke: strokeCodec.create(),
    fill: { type: 'none' },
    uuid: newUuid(),
    extras: [],
  }),
});

// --- Sheets ---

export interface SheetPin extends Entity {
  name: string;
  /** input, output, bidirectional, tri_state or passive */
  electricalType: string;
  position: Position;
  uuid?: Identifier;
  effects?: Effects;
}

export const sheetPinCodec = defineCodec<SheetPin>({
  keyword: 'pin',
  read(reader) {
    return {
      name: reader.string(1, 'name'),
      electricalType: reader.string(2, 'electricalType'),
      position: readPosition(reader.requireNested('at')),
      uuid: readIdentifier(reader),
      effects: reader.decodeChild('effects', effectsCodec.decode),
      extras: [],
    };
  },
  plan: [
    { field: 'name', emit: (p) => str(p.name) },
    { field: 'electricalType', emit: (p) => flag(p.electricalType) },
    { field: 'at', emit: (p) => position(p.position) },
    { field: 'uuid', emit: (p) => identifier(p.uuid) },
    { field: 'effects', when: (p) => p.effects !== undefined, emit: (p) => (p.effects ? effectsCodec.encode(p.effects) : undefined) },
  ],
  create: () => ({
    name: '',
    electricalType: 'input',
    position: { x: 0, y: 0, angle: 180 },
    uuid: newUuid(),
    effects: effectsCodec.create(),
    extras: [],
  }),
});

/** Hierarchical sheet; its name and file are the `Sheetname` and `Sheetfile` properties */
export interface Sheet extends TaggedEntity {
  type: 'sheet';
  position: Position;
  size: Size;
  excludeFromSim?: boolean;
  inBom?: boolean;
  onBoard?: boolean;
  dnp?: boolean;
  fieldsAutoplaced?: boolean;
  stroke?: Stroke;
  fill?: Fill;
  uuid?: Identifier;
  properties: Property[];
  pins: SheetPin[];
  instances?: ProjectInstance[];
}

export const sheetCodec = defineCodec<Sheet>({
  keyword: 'sheet',
  read(reader) {
    const sheet: Sheet = {
      type: 'sheet',
      position: readPosition(reader.requireNested('at')),
      size: readSize(reader),
      excludeFromSim: reader.bool('exclude_from_sim')?.value,
      inBom: reader.bool('in_bom')?.value,
      onBoard: reader.bool('on_board')?.value,
      dnp: reader.bool('dnp')?.value,
      properties: [],
      pins: [],
      extras: [],
    };
    sheet.fieldsAutoplaced = readBool(sheet, reader.bool('fields_autoplaced'), 'fields_autoplaced');
    sheet.stroke = reader.decodeChild('stroke', strokeCodec.decode);
    sheet.fill = optionalFill(reader);
    sheet.uuid = readIdentifier(reader);
    sheet.properties = reader.decodeChildren('property', propertyCodec.decode);
    sheet.pins = reader.decodeChildren('pin', sheetPinCodec.decode);
    const instances = reader.nested('instances');
    if (instances) sheet.instances = readProjectInstances(instances);
    return sheet;
  },
  plan: [
    { field: 'at', emit: (s) => position(s.position) },
    { field: 'size', emit: (s) => list('size', s.size.w, s.size.h) },
    { field: 'exclude_from_sim', emit: (s) => optionalYesNo('exclude_from_sim', s.excludeFromSim) },
    { field: 'in_bom', emit: (s) => optionalYesNo('in_bom', s.inBom) },
    { field: 'on_board', emit: (s) => optionalYesNo('on_board', s.onBoard) },
    { field: 'dnp', emit: (s) => optionalYesNo('dnp', s.dnp) },
    { field: 'fields_autoplaced', emit: (s) => emitBool(s, 'fields_autoplaced', s.fieldsAutoplaced, 'yes-no') },
    { field: 'stroke', when: (s) => s.stroke !== undefined, emit: (s) => (s.stroke ? strokeCodec.encode(s.stroke) : undefined) },
    { field: 'fill', when: (s) => s.fill !== undefined, emit: (s) => (s.fill ? fillList(s.fill) : undefined) },
    { field: 'uuid', emit: (s) => identifier(s.uuid) },
    { field: 'property', emit: (s) => s.properties.map(propertyCodec.encode) },
    { field: 'pin', emit: (s) => s.pins.map(sheetPinCodec.encode) },
    { field: 'instances', when: (s) => s.instances !== undefined, emit: (s) => instancesList(s.instances ?? []) },
  ],
  create: () => ({
    type: 'sheet',
    position: { x: 0, y: 0 },
    size: { w: 20, h: 15 },
    excludeFromSim: false,
    inBom: true,
    onBoard: true,
    dnp: false,
    fieldsAutoplaced: true,
    stroke: { width: 0.1524, type: 'solid', extras: [] },
    fill: { color: { r: 0, g: 0, b: 0, a: 0 } },
    uuid: newUuid(),
    properties: [],
    pins: [],
    extras: [],
  }),
});
