import { describe, it, expect } from 'vitest';
import { effectsCodec, netCodec, pageSettingsCodec, propertyCodec, strokeCodec, titleBlockCodec } from '../../../src/schema/common';
import { boardShapes, boardTextBoxCodec, footprintShapes, footprintTextBoxCodec, isShape } from '../../../src/schema/graphics';
import { boardGraphicRegistry } from '../../../src/schema/board';
import type { Entity, SchemaCodec } from '../../../src/schema/codec';
import { formatList } from '../../../src/parser/formatter';
import { carryLayout } from '../../../src/parser/layout';
import { keywordOf } from '../../../src/parser/nodeAccessor';
import { parseSingle, type SExprList } from '../../../src/parser/sexpr';

function rewrite<T extends Entity>(codec: SchemaCodec<T>, source: SExprList, entity: T): string {
  const fresh = codec.encode(entity);
  carryLayout(fresh, source);
  return formatList(fresh);
}

function roundTrip<T extends Entity>(codec: SchemaCodec<T>, text: string): string {
  const source = parseSingle(text);
  return rewrite(codec, source, codec.decode(source));
}

describe('unit: shared constructs', () => {
  it('reads strokes with a color', () => {
    const stroke = strokeCodec.decode(parseSingle('(stroke (width 0.254) (type dash) (color 255 0 0 1))'));
    expect(stroke).toMatchObject({ width: 0.254, type: 'dash', color: { r: 255, g: 0, b: 0, a: 1 } });
  });

  it('reads text effects', () => {
    const effects = effectsCodec.decode(parseSingle('(effects (font (size 1.5 1) (bold yes)) (justify left bottom) (hide yes))'));
    expect(effects.font.height).toBe(1.5);
    expect(effects.font.width).toBe(1);
    expect(effects.font.bold).toBe(true);
    expect(effects.justify).toEqual(['left', 'bottom']);
    expect(effects.hide).toBe(true);
  });

  it('round-trips effects with a bare hide', () => {
    const text = '(effects (font (size 1.27 1.27)) (justify right) hide)';
    expect(roundTrip(effectsCodec, text)).toBe(text);
  });

  it('round-trips user paper sizes', () => {
    const text = '(paper "User" 200 100 portrait)';
    const paper = pageSettingsCodec.decode(parseSingle(text));
    expect(paper).toMatchObject({ paperSize: 'User', width: 200, height: 100, portrait: true });
    expect(roundTrip(pageSettingsCodec, text)).toBe(text);
  });

  it('reads title block comments', () => {
    const block = titleBlockCodec.decode(parseSingle('(title_block (title "Demo") (rev "A") (comment 1 "first") (comment 4 "fourth"))'));
    expect(block.title).toBe('Demo');
    expect(block.revision).toBe('A');
    expect(block.comments).toEqual([{ number: 1, text: 'first' }, { number: 4, text: 'fourth' }]);
  });

  it('round-trips properties', () => {
    const text = '(property "Reference" "R1" (at 0 -1.43 0) (layer "F.SilkS") (uuid "p-1") (effects (font (size 1 1) (thickness 0.15))))';
    expect(roundTrip(propertyCodec, text)).toBe(text);
  });

  it('writes an empty name for nets that had none', () => {
    expect(roundTrip(netCodec, '(net 0)')).toBe('(net 0 "")');
  });
});

describe('unit: graphic shapes', () => {
  it('round-trips a filled rectangle', () => {
    const text = '(gr_rect (start 0 0) (end 10 5) (stroke (width 0.1) (type default)) (fill none) (layer "Edge.Cuts") (uuid "r-1"))';
    expect(roundTrip(boardShapes.rect, text)).toBe(text);
  });

  it('round-trips polygons', () => {
    const text = '(fp_poly (pts (xy 0 0) (xy 1 0) (xy 1 1)) (stroke (width 0.1) (type solid)) (fill solid) (layer "F.Cu") (uuid "g-1"))';
    const source = parseSingle(text);
    const poly = footprintShapes.poly.decode(source);
    expect(poly.points).toEqual([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }]);
    expect(rewrite(footprintShapes.poly, source, poly)).toBe(text);
  });

  it('keeps the width of files written before strokes', () => {
    const text = '(fp_line (start 0 0) (end 1 0) (layer F.SilkS) (width 0.12))';
    const line = footprintShapes.line.decode(parseSingle(text));
    expect(line.width).toBe(0.12);
    expect(line.stroke).toBeUndefined();
    expect(roundTrip(footprintShapes.line, text)).toBe(text);
  });

  it('creates circles with a center and an empty fill', () => {
    const circle = boardShapes.circle.create();
    expect(circle.center).toEqual({ x: 0, y: 0 });
    expect(circle.fill).toBe('none');
    expect(circle.layer).toBe('Edge.Cuts');
    expect(isShape(circle)).toBe(true);
  });

  it('creates footprint lines on the silkscreen', () => {
    const line = footprintShapes.line.create();
    line.uuid = undefined;
    line.end = { x: 2, y: 0 };
    expect(formatList(footprintShapes.line.encode(line))).toBe(
      '(fp_line\n\t(start 0 0)\n\t(end 2 0)\n\t(stroke\n\t\t(width 0.1)\n\t\t(type default)\n\t)\n\t(layer "F.SilkS")\n)',
    );
  });
});

describe('unit: curves and text boxes', () => {
  it('round-trips a bezier curve without a fill', () => {
    const text = '(gr_curve (pts (xy 0 0) (xy 1 2) (xy 3 2) (xy 4 0)) (stroke (width 0.1) (type default)) (layer "Edge.Cuts") (uuid "c-1"))';
    const source = parseSingle(text);
    const curve = boardShapes.curve.decode(source);
    expect(curve.shape).toBe('curve');
    expect(curve.points).toHaveLength(4);
    expect(curve.fill).toBeUndefined();
    expect(rewrite(boardShapes.curve, source, curve)).toBe(text);
  });

  it('creates footprint curves with control points and a stroke', () => {
    const node = footprintShapes.curve.encode(footprintShapes.curve.create());
    expect(node.items.slice(1).map(keywordOf)).toEqual(['pts', 'stroke', 'layer', 'uuid']);
  });

  it('dispatches board curves and text boxes by keyword', () => {
    const curve = boardGraphicRegistry.decode(parseSingle('(gr_curve (pts (xy 0 0) (xy 1 1) (xy 2 1) (xy 3 0)) (layer "F.SilkS"))'));
    expect(curve.type).toBe('gr_curve');
    expect(isShape(curve)).toBe(true);
    const box = boardGraphicRegistry.decode(parseSingle('(gr_text_box "T" (start 0 0) (end 1 1) (layer "F.SilkS"))'));
    expect(box.type).toBe('gr_text_box');
    expect(isShape(box)).toBe(false);
  });

  it('round-trips an axis-aligned text box', () => {
    const text =
      '(gr_text_box "Note" (start 0 0) (end 20 10) (margins 1 1 1 1) (layer "F.SilkS") (uuid "tb-1") (effects (font (size 1 1))) (border yes) (stroke (width 0.1) (type solid)))';
    const source = parseSingle(text);
    const box = boardTextBoxCodec.decode(source);
    expect(box).toMatchObject({ text: 'Note', start: { x: 0, y: 0 }, end: { x: 20, y: 10 }, margins: [1, 1, 1, 1], border: true });
    expect(rewrite(boardTextBoxCodec, source, box)).toBe(text);
  });

  it('round-trips a rotated text box given by its corners', () => {
    const text =
      '(fp_text_box "R" (pts (xy 0 0) (xy 10 0) (xy 10 5) (xy 0 5)) (angle 30) (layer "F.Fab" knockout) (uuid "tb-2") (effects (font (size 1 1))))';
    const source = parseSingle(text);
    const box = footprintTextBoxCodec.decode(source);
    expect(box.start).toBeUndefined();
    expect(box.points).toHaveLength(4);
    expect(box.angle).toBe(30);
    expect(box.knockout).toBe(true);
    expect(rewrite(footprintTextBoxCodec, source, box)).toBe(text);
  });

  it('creates text boxes with a border', () => {
    const node = boardTextBoxCodec.encode(boardTextBoxCodec.create());
    expect(node.items.slice(2).map(keywordOf)).toEqual(['start', 'end', 'margins', 'layer', 'uuid', 'effects', 'border', 'stroke']);
  });
});
