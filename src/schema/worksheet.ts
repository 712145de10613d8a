/**
 * Worksheets / page layouts (.kicad_wks): the drawing frame and title block template.
 */

import type { LibraryConfig } from '../shared/config';
import type { NodeReader } from '../parser/nodeAccessor';
import { flag, list, num, str, type SExpr, type SExprList } from '../parser/sexpr';
import { CodecRegistry, defineCodec, type EmitStep, type Entity, type RawItem, type TaggedEntity } from './codec';
import { headerSteps, optionalNumber, optionalString, readHeader, type FileHeader } from './common';

// --- Types ---

/** Coordinates relative to one page corner: ltcorner, lbcorner, rbcorner (default) or rtcorner */
export interface WksPoint {
  x: number;
  y: number;
  corner?: string;
}

export interface WksSetup extends Entity {
  textSize?: { w: number; h: number };
  lineWidth?: number;
  textLineWidth?: number;
  leftMargin?: number;
  rightMargin?: number;
  topMargin?: number;
  bottomMargin?: number;
}

interface WksRepeat {
  /** page1only or notonpage1 */
  option?: string;
  repeat?: number;
  incrx?: number;
  incry?: number;
  comment?: string;
}

export interface WksShape extends TaggedEntity, WksRepeat {
  type: 'line' | 'rect';
  name: string;
  start: WksPoint;
  end: WksPoint;
  lineWidth?: number;
}

export interface WksText extends TaggedEntity, WksRepeat {
  type: 'tbtext';
  text: string;
  name: string;
  position: WksPoint;
  /** (font ...) block, kept as written */
  font?: SExprList;
  justify?: string[];
  rotate?: number;
  maxLength?: number;
  maxHeight?: number;
  incrLabel?: number;
}

export type WksItem = WksShape | WksText;

export interface Worksheet extends Entity, FileHeader {
  /** Written as the pre-6.0 `page_layout` keyword */
  legacy: boolean;
  setup?: WksSetup;
  items: Array<WksItem | RawItem>;
}

// --- Helpers ---

function readWksPoint(reader: NodeReader): WksPoint {
  return {
    x: reader.number(1, 'x'),
    y: reader.number(2, 'y'),
    corner: reader.optionalString(3, 'corner'),
  };
}

function wksPoint(keyword: string, p: WksPoint): SExprList {
  const node = list(keyword, p.x, p.y);
  if (p.corner !== undefined) node.items.push(flag(p.corner));
  return node;
}

function readRepeat(reader: NodeReader): WksRepeat {
  return {
    option: reader.childString('option'),
    repeat: reader.childInteger('repeat'),
    incrx: reader.childNumber('incrx'),
    incry: reader.childNumber('incry'),
    comment: reader.childString('comment'),
  };
}

function repeatSteps<T extends WksRepeat & Entity>(): EmitStep<T>[] {
  return [
    { field: 'repeat', emit: (r) => optionalNumber('repeat', r.repeat) },
    { field: 'incrx', emit: (r) => optionalNumber('incrx', r.incrx) },
    { field: 'incry', emit: (r) => optionalNumber('incry', r.incry) },
  ];
}

// --- Setup ---

export const wksSetupCodec = defineCodec<WksSetup>({
  keyword: 'setup',
  read(reader) {
    const textSize = reader.nested('textsize');
    return {
      textSize: textSize ? { w: textSize.number(1, 'width'), h: textSize.number(2, 'height') } : undefined,
      lineWidth: reader.childNumber('linewidth'),
      textLineWidth: reader.childNumber('textlinewidth'),
      leftMargin: reader.childNumber('left_margin'),
      rightMargin: reader.childNumber('right_margin'),
      topMargin: reader.childNumber('top_margin'),
      bottomMargin: reader.childNumber('bottom_margin'),
      extras: [],
    };
  },
  plan: [
    { field: 'textsize', when: (s) => s.textSize !== undefined, emit: (s) => list('textsize', s.textSize?.w ?? 0, s.textSize?.h ?? 0) },
    { field: 'linewidth', emit: (s) => optionalNumber('linewidth', s.lineWidth) },
    { field: 'textlinewidth', emit: (s) => optionalNumber('textlinewidth', s.textLineWidth) },
    { field: 'left_margin', emit: (s) => optionalNumber('left_margin', s.leftMargin) },
    { field: 'right_margin', emit: (s) => optionalNumber('right_margin', s.rightMargin) },
    { field: 'top_margin', emit: (s) => optionalNumber('top_margin', s.topMargin) },
    { field: 'bottom_margin', emit: (s) => optionalNumber('bottom_margin', s.bottomMargin) },
  ],
  create: () => ({
    textSize: { w: 1.5, h: 1.5 },
    lineWidth: 0.15,
    textLineWidth: 0.15,
    leftMargin: 10,
    rightMargin: 10,
    topMargin: 10,
    bottomMargin: 10,
    extras: [],
  }),
});

// --- Drawing items ---

function shapeCodec(keyword: WksShape['type']) {
  return defineCodec<WksShape>({
    keyword,
    read(reader) {
      return {
        type: keyword,
        name: reader.childString('name') ?? '',
        start: readWksPoint(reader.requireNested('start')),
        end: readWksPoint(reader.requireNested('end')),
        lineWidth: reader.childNumber('linewidth'),
        ...readRepeat(reader),
        extras: [],
      };
    },
    plan: [
      { field: 'name', emit: (s) => list('name', str(s.name)) },
      { field: 'start', emit: (s) => wksPoint('start', s.start) },
      { field: 'end', emit: (s) => wksPoint('end', s.end) },
      { field: 'option', emit: (s) => (s.option !== undefined ? list('option', s.option) : undefined) },
      { field: 'linewidth', emit: (s) => optionalNumber('linewidth', s.lineWidth) },
      ...repeatSteps<WksShape>(),
      { field: 'comment', emit: (s) => optionalString('comment', s.comment) },
    ],
    create: () => ({
      type: keyword,
      name: '',
      start: { x: 0, y: 0, corner: 'ltcorner' },
      end: { x: 0, y: 0, corner: 'ltcorner' },
      extras: [],
    }),
  });
}

export const wksLineCodec = shapeCodec('line');
export const wksRectCodec = shapeCodec('rect');

export const wksTextCodec = defineCodec<WksText>({
  keyword: 'tbtext',
  read(reader) {
    return {
      type: 'tbtext',
      text: reader.string(1, 'text'),
      name: reader.childString('name') ?? '',
      position: readWksPoint(reader.requireNested('pos')),
      font: reader.child('font'),
      justify: reader.childStrings('justify'),
      rotate: reader.childNumber('rotate'),
      maxLength: reader.childNumber('maxlen'),
      maxHeight: reader.childNumber('maxheight'),
      incrLabel: reader.childInteger('incrlabel'),
      ...readRepeat(reader),
      extras: [],
    };
  },
  plan: [
    { field: 'text', emit: (t) => str(t.text) },
    { field: 'name', emit: (t) => list('name', str(t.name)) },
    { field: 'pos', emit: (t) => wksPoint('pos', t.position) },
    { field: 'option', emit: (t) => (t.option !== undefined ? list('option', t.option) : undefined) },
    { field: 'rotate', emit: (t) => optionalNumber('rotate', t.rotate) },
    { field: 'font', emit: (t) => t.font },
    { field: 'justify', when: (t) => t.justify !== undefined, emit: (t) => list('justify', ...(t.justify ?? [])) },
    { field: 'maxlen', emit: (t) => optionalNumber('maxlen', t.maxLength) },
    { field: 'maxheight', emit: (t) => optionalNumber('maxheight', t.maxHeight) },
    ...repeatSteps<WksText>(),
    { field: 'incrlabel', emit: (t) => optionalNumber('incrlabel', t.incrLabel) },
    { field: 'comment', emit: (t) => optionalString('comment', t.comment) },
  ],
  create: () => ({
    type: 'tbtext',
    text: '',
    name: '',
    position: { x: 0, y: 0, corner: 'ltcorner' },
    font: list('font', list('size', num(1.5), num(1.5))),
    extras: [],
  }),
});

export const worksheetItems = new CodecRegistry<WksItem>([wksLineCodec, wksRectCodec, wksTextCodec]);

const RAW_ITEM_KEYWORDS = new Set(['polygon', 'bitmap']);

// --- Worksheet ---

export const worksheetCodec = defineCodec<Worksheet>({
  keyword: 'kicad_wks',
  aliases: ['page_layout'],
  writeKeyword: (w) => (w.legacy ? 'page_layout' : 'kicad_wks'),
  read(reader) {
    return {
      legacy: reader.keyword === 'page_layout',
      ...readHeader(reader),
      setup: reader.decodeChild('setup', wksSetupCodec.decode),
      items: reader
        .childrenWhere((keyword) => worksheetItems.has(keyword) || RAW_ITEM_KEYWORDS.has(keyword))
        .map((node) => worksheetItems.decode(node)),
      extras: [],
    };
  },
  plan: [
    ...headerSteps<Worksheet>(),
    { field: 'setup', when: (w) => w.setup !== undefined, emit: (w) => (w.setup ? wksSetupCodec.encode(w.setup) : undefined) },
    { field: 'items', emit: (w) => w.items.map((item): SExpr => worksheetItems.encode(item)) },
  ],
  create: (config: LibraryConfig) => ({
    legacy: false,
    version: config.versions.worksheet,
    generator: config.generators.worksheet,
    generatorVersion: config.generatorVersion,
    setup: wksSetupCodec.create(config),
    items: [],
    extras: [],
  }),
});
