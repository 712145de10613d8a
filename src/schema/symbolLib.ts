/**
 * Symbol libraries (.kicad_sym) and the symbol definitions embedded in schematics.
 */

import type { LibraryConfig } from '../shared/config';
import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, str, type SExprList } from '../parser/sexpr';
import { CodecRegistry, defineCodec, emitBool, optionalYesNo, readBool, type EmitStep, type Entity, type RawItem, type TaggedEntity } from './codec';
import {
  effectsCodec, headerSteps, optionalString, position, propertyCodec, readHeader, readPosition,
  type Effects, type FileHeader, type Position, type Property,
} from './common';
import { polylineCodec, schematicTextBoxCodec, schematicTextCodec, type Polyline, type SchematicText, type SchematicTextBox } from './schematicItems';

// --- Types ---

export interface PinAlternate {
  name: string;
  electricalType: string;
  graphicStyle: string;
}

export interface SymbolPin extends TaggedEntity {
  type: 'pin';
  /** input, output, bidirectional, passive, power_in, ... */
  electricalType: string;
  /** line, inverted, clock, ... */
  graphicStyle: string;
  position: Position;
  length: number;
  hide: boolean;
  name: string;
  nameEffects?: Effects;
  number: string;
  numberEffects?: Effects;
  alternates: PinAlternate[];
}

export type UnitItem = SymbolPin | Polyline | SchematicText | SchematicTextBox;

/** `symbol` sub-unit such as `R_1_1`: unit 1, body style 1 */
export interface SymbolUnit extends Entity {
  id: string;
  unitName?: string;
  /** Pins and graphic items in file order; arcs, circles, rectangles and curves stay as written */
  items: Array<UnitItem | RawItem>;
}

export interface PinNames extends Entity {
  offset?: number;
  hide: boolean;
}

export interface PinNumbers extends Entity {
  hide: boolean;
}

export interface LibSymbol extends Entity {
  /** `name` in a library, `library:name` inside a schematic */
  id: string;
  extends?: string;
  power: boolean;
  pinNumbers?: PinNumbers;
  pinNames?: PinNames;
  excludeFromSim?: boolean;
  inBom?: boolean;
  onBoard?: boolean;
  properties: Property[];
  units: SymbolUnit[];
}

export interface SymbolLibrary extends Entity, FileHeader {
  symbols: LibSymbol[];
}

// --- Pins ---

function readAlternate(reader: NodeReader): PinAlternate {
  return {
    name: reader.string(1, 'name'),
    electricalType: reader.string(2, 'electricalType'),
    graphicStyle: reader.string(3, 'graphicStyle'),
  };
}

/** (name "VCC" (effects ...)) or (number "1" (effects ...)) */
function readLabel(reader: NodeReader, keyword: 'name' | 'number'): { text: string; effects?: Effects } {
  return { text: reader.string(1, keyword), effects: reader.decodeChild('effects', effectsCodec.decode) };
}

function labelList(keyword: 'name' | 'number', text: string, effects: Effects | undefined): SExprList {
  const node = list(keyword, str(text));
  if (effects) node.items.push(effectsCodec.encode(effects));
  return node;
}

export const pinCodec = defineCodec<SymbolPin>({
  keyword: 'pin',
  read(reader) {
    const pin: SymbolPin = {
      type: 'pin',
      electricalType: reader.string(1, 'electricalType'),
      graphicStyle: reader.string(2, 'graphicStyle'),
      position: readPosition(reader.requireNested('at')),
      length: reader.childNumber('length') ?? 0,
      hide: false,
      name: '~',
      number: '',
      alternates: [],
      extras: [],
    };
    pin.hide = readBool(pin, reader.bool('hide'), 'hide') ?? false;
    const name = reader.nested('name');
    if (name) {
      const label = readLabel(name, 'name');
      pin.name = label.text;
      pin.nameEffects = label.effects;
    }
    const number = reader.nested('number');
    if (number) {
      const label = readLabel(number, 'number');
      pin.number = label.text;
      pin.numberEffects = label.effects;
    }
    pin.alternates = reader.nestedAll('alternate').map(readAlternate);
    return pin;
  },
  plan: [
    { field: 'electricalType', emit: (p) => flag(p.electricalType) },
    { field: 'graphicStyle', emit: (p) => flag(p.graphicStyle) },
    { field: 'at', emit: (p) => position(p.position) },
    { field: 'length', emit: (p) => list('length', p.length) },
    { field: 'hide', emit: (p) => emitBool(p, 'hide', p.hide, 'yes-no') },
    { field: 'name', emit: (p) => labelList('name', p.name, p.nameEffects) },
    { field: 'number', emit: (p) => labelList('number', p.number, p.numberEffects) },
    {
      field: 'alternate',
      emit: (p) => p.alternates.map((a) => list('alternate', str(a.name), a.electricalType, a.graphicStyle)),
    },
  ],
  create: () => ({
    type: 'pin',
    electricalType: 'passive',
    graphicStyle: 'line',
    position: { x: 0, y: 0, angle: 0 },
    length: 2.54,
    hide: false,
    name: '~',
    nameEffects: effectsCodec.create(),
    number: '1',
    numberEffects: effectsCodec.create(),
    alternates: [],
    extras: [],
  }),
});

const unitItems = new CodecRegistry<UnitItem>([pinCodec, polylineCodec, schematicTextCodec, schematicTextBoxCodec]);

const UNIT_GRAPHIC_KEYWORDS = new Set(['arc', 'bezier', 'circle', 'pin', 'polyline', 'rectangle', 'text', 'text_box']);

export const symbolUnitCodec = defineCodec<SymbolUnit>({
  keyword: 'symbol',
  read(reader) {
    return {
      id: reader.string(1, 'id'),
      unitName: reader.childString('unit_name'),
      items: reader.childrenWhere((keyword) => UNIT_GRAPHIC_KEYWORDS.has(keyword)).map((node) => unitItems.decode(node)),
      extras: [],
    };
  },
  plan: [
    { field: 'id', emit: (u) => str(u.id) },
    { field: 'unit_name', emit: (u) => optionalString('unit_name', u.unitName) },
    { field: 'items', emit: (u) => u.items.map((item) => unitItems.encode(item)) },
  ],
  create: () => ({ id: '', items: [], extras: [] }),
});

// --- Symbols ---

export const pinNamesCodec = defineCodec<PinNames>({
  keyword: 'pin_names',
  read(reader) {
    const pinNames: PinNames = { offset: reader.childNumber('offset'), hide: false, extras: [] };
    pinNames.hide = readBool(pinNames, reader.bool('hide'), 'hide') ?? false;
    return pinNames;
  },
  plan: [
    { field: 'offset', when: (p) => p.offset !== undefined, emit: (p) => list('offset', p.offset ?? 0) },
    { field: 'hide', emit: (p) => emitBool(p, 'hide', p.hide, 'yes-no') },
  ],
  create: () => ({ hide: false, extras: [] }),
});

export const pinNumbersCodec = defineCodec<PinNumbers>({
  keyword: 'pin_numbers',
  read(reader) {
    const pinNumbers: PinNumbers = { hide: false, extras: [] };
    pinNumbers.hide = readBool(pinNumbers, reader.bool('hide'), 'hide') ?? false;
    return pinNumbers;
  },
  plan: [{ field: 'hide', emit: (p) => emitBool(p, 'hide', p.hide, 'yes-no') }],
  create: () => ({ hide: false, extras: [] }),
});

const symbolPlan: EmitStep<LibSymbol>[] = [
  { field: 'id', emit: (s) => str(s.id) },
  { field: 'extends', emit: (s) => optionalString('extends', s.extends) },
  { field: 'power', emit: (s) => emitBool(s, 'power', s.power, 'empty') },
  { field: 'pin_numbers', when: (s) => s.pinNumbers !== undefined, emit: (s) => (s.pinNumbers ? pinNumbersCodec.encode(s.pinNumbers) : undefined) },
  { field: 'pin_names', when: (s) => s.pinNames !== undefined, emit: (s) => (s.pinNames ? pinNamesCodec.encode(s.pinNames) : undefined) },
  { field: 'exclude_from_sim', emit: (s) => optionalYesNo('exclude_from_sim', s.excludeFromSim) },
  { field: 'in_bom', emit: (s) => optionalYesNo('in_bom', s.inBom) },
  { field: 'on_board', emit: (s) => optionalYesNo('on_board', s.onBoard) },
  { field: 'property', emit: (s) => s.properties.map(propertyCodec.encode) },
  { field: 'symbol', emit: (s) => s.units.map(symbolUnitCodec.encode) },
];

export const libSymbolCodec = defineCodec<LibSymbol>({
  keyword: 'symbol',
  read(reader) {
    const symbol: LibSymbol = {
      id: reader.string(1, 'id'),
      extends: reader.childString('extends'),
      power: false,
      pinNumbers: reader.decodeChild('pin_numbers', pinNumbersCodec.decode),
      pinNames: reader.decodeChild('pin_names', pinNamesCodec.decode),
      excludeFromSim: reader.bool('exclude_from_sim')?.value,
      inBom: reader.bool('in_bom')?.value,
      onBoard: reader.bool('on_board')?.value,
      properties: reader.decodeChildren('property', propertyCodec.decode),
      units: reader.decodeChildren('symbol', symbolUnitCodec.decode),
      extras: [],
    };
    symbol.power = readBool(symbol, reader.bool('power'), 'power') ?? false;
    return symbol;
  },
  plan: symbolPlan,
  create: () => ({
    id: '',
    power: false,
    excludeFromSim: false,
    inBom: true,
    onBoard: true,
    properties: [],
    units: [],
    extras: [],
  }),
});

// --- Library ---

export const symbolLibraryCodec = defineCodec<SymbolLibrary>({
  keyword: 'kicad_symbol_lib',
  read(reader) {
    return {
      ...readHeader(reader),
      symbols: reader.decodeChildren('symbol', libSymbolCodec.decode),
      extras: [],
    };
  },
  plan: [
    ...headerSteps<SymbolLibrary>(),
    { field: 'symbol', emit: (l) => l.symbols.map(libSymbolCodec.encode) },
  ],
  create: (config: LibraryConfig) => ({
    version: config.versions['symbol-lib'],
    generator: config.generators['symbol-lib'],
    generatorVersion: config.generatorVersion,
    symbols: [],
    extras: [],
  }),
});
