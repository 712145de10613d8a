import { describe, it, expect } from 'vitest';
import {
  NodeReader,
  atomText,
  findAllExpr,
  findExpr,
  getBoolValue,
  getNumberValue,
  getSize,
  getStringValue,
  getXY,
  hasFlag,
  keyOf,
  keywordOf,
} from '../../../src/parser/nodeAccessor';
import { isAtom, num, parseSingle, str, sym } from '../../../src/parser/sexpr';
import { SchemaError } from '../../../src/shared/errors';

describe('unit: tree lookups', () => {
  const pad = parseSingle('(pad "1" smd roundrect (at 1.5 -2 90) (size 0.8 0.95) (layers "F.Cu" "F.Mask") (net 1 "GND") locked)');

  it('reads keywords and atom text', () => {
    expect(keywordOf(pad)).toBe('pad');
    expect(keywordOf(str('x'))).toBeUndefined();
    expect(atomText(num(0.5))).toBe('0.5');
    const width = parseSingle('(w 0.250)').items[1];
    if (!isAtom(width)) throw new Error('Expected an atom');
    expect(atomText(width)).toBe('0.250');
  });

  it('finds children by keyword', () => {
    expect(findExpr(pad, 'size')?.items).toHaveLength(3);
    expect(findExpr(pad, 'drill')).toBeUndefined();
    expect(findAllExpr(pad, 'layers')).toHaveLength(1);
  });

  it('reads tagged values', () => {
    expect(getNumberValue(pad, 'net')).toBe(1);
    expect(getStringValue(pad, 'net')).toBe('1');
    expect(getXY(pad)).toEqual({ x: 1.5, y: -2, rotation: 90 });
    expect(getSize(pad)).toEqual({ w: 0.8, h: 0.95 });
  });

  it('detects bare flags', () => {
    expect(hasFlag(pad, 'locked')).toBe(true);
    expect(hasFlag(pad, 'hide')).toBe(false);
  });

  it('reads booleans in every written form', () => {
    expect(getBoolValue(parseSingle('(x (hide yes))'), 'hide')).toBe(true);
    expect(getBoolValue(parseSingle('(x (hide no))'), 'hide')).toBe(false);
    expect(getBoolValue(parseSingle('(x (hide))'), 'hide')).toBe(true);
    expect(getBoolValue(parseSingle('(x hide)'), 'hide')).toBe(true);
    expect(getBoolValue(parseSingle('(x)'), 'hide')).toBeUndefined();
  });

  it('keys lists by keyword and atoms by text', () => {
    expect(keyOf(pad)).toBe('(pad');
    expect(keyOf(sym('locked'))).toBe('locked');
  });
});

describe('unit: NodeReader', () => {
  it('rejects a list with the wrong keyword', () => {
    const node = parseSingle('(pad "1")');
    expect(() => NodeReader.of(node, 'via')).toThrow("Invalid 'via': field 'keyword' expected 'via', found 'pad'");
  });

  it('rejects an atom where a list is expected', () => {
    expect(() => NodeReader.of(sym('via'), 'via')).toThrow(SchemaError);
  });

  it('accepts alternative keywords and reports the one found', () => {
    const reader = NodeReader.of(parseSingle('(module "R")'), ['footprint', 'module']);
    expect(reader.keyword).toBe('module');
    expect(reader.construct).toBe('footprint');
  });

  it('reports the field and found value on type mismatches', () => {
    const reader = NodeReader.of(parseSingle('(via (at x 2))'), 'via');
    const at = reader.requireChild('at');
    expect(() => NodeReader.of(at, 'at').number(1, 'x')).toThrow("Invalid 'at': field 'x' expected a number, found symbol 'x'");
  });

  it('reports a missing required child', () => {
    const reader = NodeReader.of(parseSingle('(via)'), 'via');
    expect(() => reader.requireChild('at')).toThrow("Invalid 'via': field 'at' expected '(at ...)', found nothing");
  });

  it('rejects non-integers where an integer is required', () => {
    const reader = NodeReader.of(parseSingle('(net 1.5 "A")'), 'net');
    expect(() => reader.integer(1, 'number')).toThrow(SchemaError);
  });

  it('consumes each child once', () => {
    const reader = NodeReader.of(parseSingle('(x (a 1) (a 2))'), 'x');
    expect(reader.childNumber('a')).toBe(1);
    expect(reader.childNumber('a')).toBe(2);
    expect(reader.childNumber('a')).toBeUndefined();
  });

  it('reads boolean tokens with their written form', () => {
    const reader = NodeReader.of(parseSingle('(x locked (hide) (exclude_from_sim no))'), 'x');
    expect(reader.bool('locked')).toEqual({ value: true, form: 'bare' });
    expect(reader.bool('hide')).toEqual({ value: true, form: 'empty' });
    expect(reader.bool('exclude_from_sim')).toEqual({ value: false, form: 'yes-no' });
    expect(reader.bool('dnp')).toBeUndefined();
  });

  it('collects remaining atoms', () => {
    const reader = NodeReader.of(parseSingle('(layers "F.Cu" "B.Cu" "F.Mask")'), 'layers');
    expect(reader.atomsFrom(1)).toEqual(['F.Cu', 'B.Cu', 'F.Mask']);
    expect(reader.extras()).toEqual([]);
  });

  it('anchors unread children after the nearest read one', () => {
    const node = parseSingle('(thing (a 1) (x 9) (a 2) (y) z)');
    const reader = NodeReader.of(node, 'thing');
    reader.children('a');

    const extras = reader.extras();
    expect(extras.map((e) => [keyOf(e.item), e.after, e.occurrence])).toEqual([
      ['(x', '(a', 1],
      ['(y', '(a', 2],
      ['z', '(a', 2],
    ]);
    expect(reader.consumedKeys()).toEqual(['(a', '(a']);
  });

  it('anchors leading unread children to the keyword', () => {
    const reader = NodeReader.of(parseSingle('(thing (x 1) (a 2))'), 'thing');
    reader.child('a');
    expect(reader.extras()).toEqual([expect.objectContaining({ after: 'thing', occurrence: 1 })]);
  });
});
