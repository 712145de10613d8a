import { describe, it, expect } from 'vitest';
import { footprintCodec, fpTextCodec, modelCodec, padCodec } from '../../../src/schema/footprint';
import type { Entity, SchemaCodec } from '../../../src/schema/codec';
import { formatList } from '../../../src/parser/formatter';
import { carryLayout } from '../../../src/parser/layout';
import { findExpr, keywordOf } from '../../../src/parser/nodeAccessor';
import { parseSingle, type SExprList } from '../../../src/parser/sexpr';

function rewrite<T extends Entity>(codec: SchemaCodec<T>, source: SExprList, entity: T): string {
  const fresh = codec.encode(entity);
  carryLayout(fresh, source);
  return formatList(fresh);
}

describe('unit: pad', () => {
  const text =
    '(pad "1" smd roundrect (at -0.825 0) (size 0.8 0.95) (layers "F.Cu" "F.Paste" "F.Mask") (roundrect_rratio 0.25) (net 1 "GND") (uuid "p-1"))';

  it('decodes the connected net', () => {
    const pad = padCodec.decode(parseSingle(text));
    expect(pad.number).toBe('1');
    expect(pad.padType).toBe('smd');
    expect(pad.shape).toBe('roundrect');
    expect(pad.size).toEqual({ w: 0.8, h: 0.95 });
    expect(pad.net?.number).toBe(1);
    expect(pad.net?.name).toBe('GND');
    expect(pad.roundrectRatio).toBe(0.25);
  });

  it('writes an unmodified pad back byte for byte', () => {
    const source = parseSingle(text);
    expect(rewrite(padCodec, source, padCodec.decode(source))).toBe(text);
  });

  it('drops the net when it is removed', () => {
    const pad = padCodec.decode(parseSingle(text));
    pad.net = undefined;
    expect(findExpr(padCodec.encode(pad), 'net')).toBeUndefined();
  });

  it('reads oval drills', () => {
    const oval = '(pad "" np_thru_hole oval (at 0 0) (size 1.2 2) (drill oval 0.6 1.4) (layers "*.Cu" "*.Mask"))';
    const source = parseSingle(oval);
    const pad = padCodec.decode(source);
    expect(pad.drill).toEqual({ oval: true, diameter: 0.6, width: 1.4, offset: undefined });
    expect(rewrite(padCodec, source, pad)).toBe(oval);
  });

  it('reads drill offsets', () => {
    const pad = padCodec.decode(parseSingle('(pad "2" thru_hole circle (at 0 0) (size 2 2) (drill 1 (offset 0.1 0)) (layers "*.Cu"))'));
    expect(pad.drill).toEqual({ oval: false, diameter: 1, width: undefined, offset: { x: 0.1, y: 0 } });
  });
});

describe('unit: footprint text', () => {
  it('reads the knockout flag on the layer', () => {
    const text = '(fp_text user "X" (at 0 0) (layer "F.SilkS" knockout) (uuid "t-1") (effects (font (size 1 1) (thickness 0.15))))';
    const source = parseSingle(text);
    const item = fpTextCodec.decode(source);
    expect(item.knockout).toBe(true);
    expect(item.layer).toBe('F.SilkS');
    expect(item.effects.font.thickness).toBe(0.15);
    expect(rewrite(fpTextCodec, source, item)).toBe(text);
  });

  it('writes a bare hide for new hidden text', () => {
    const item = fpTextCodec.create();
    item.uuid = undefined;
    item.hide = true;
    item.text = 'REF**';
    expect(formatList(fpTextCodec.encode(item))).toBe(
      '(fp_text user "REF**"\n\t(at 0 0)\n\t(layer "F.SilkS") hide\n\t(effects\n\t\t(font\n\t\t\t(size 1.27 1.27)\n\t\t)\n\t)\n)',
    );
  });
});

describe('unit: footprint', () => {
  it('keeps the legacy module keyword', () => {
    const text = '(module R_0603 (layer F.Cu) (tedit 5F68FEEE) (at 1 2))';
    const source = parseSingle(text);
    const footprint = footprintCodec.decode(source);
    expect(footprint.legacy).toBe(true);
    expect(footprint.libId).toBe('R_0603');
    expect(footprint.tedit).toBe('5F68FEEE');
    expect(rewrite(footprintCodec, source, footprint)).toBe(text);
  });

  it('writes new footprints with the current keyword and header', () => {
    const footprint = footprintCodec.create();
    footprint.libId = 'TestPoint';
    expect(formatList(footprintCodec.encode(footprint))).toBe(
      '(footprint "TestPoint"\n\t(version 20240108)\n\t(generator "pcbnew")\n\t(generator_version "8.0")\n\t(layer "F.Cu")\n)',
    );
  });

  it('reads legacy model offsets written as at', () => {
    const model = modelCodec.decode(parseSingle('(model "x.wrl" (at (xyz 0.1 0 0)) (scale (xyz 1 1 1)) (rotate (xyz 0 0 90)))'));
    expect(model.offset).toEqual({ x: 0.1, y: 0, z: 0 });
    expect(model.rotate).toEqual({ x: 0, y: 0, z: 90 });
    expect(formatList(modelCodec.encode(model))).toBe(
      '(model "x.wrl"\n\t(at\n\t\t(xyz 0.1 0 0)\n\t)\n\t(scale\n\t\t(xyz 1 1 1)\n\t)\n\t(rotate\n\t\t(xyz 0 0 90)\n\t)\n)',
    );
  });

  it('writes new model offsets as offset', () => {
    const model = modelCodec.create();
    model.path = 'y.step';
    expect(modelCodec.encode(model).items.slice(2).map(keywordOf)).toEqual(['offset', 'scale', 'rotate']);
  });

  it('writes a KiCad 5 module with its model back byte for byte', () => {
    const text =
      '(module R_0603 (layer F.Cu) (tedit 5F68FEEE)\n  (model R.wrl\n    (at (xyz 0 0 0))\n    (scale (xyz 1 1 1))\n    (rotate (xyz 0 0 0))\n  )\n)';
    const source = parseSingle(text);
    const footprint = footprintCodec.decode(source);
    expect(footprint.models[0].offsetKeyword).toBe('at');
    expect(rewrite(footprintCodec, source, footprint)).toBe(text);
  });

  it('adds new pads behind the existing ones', () => {
    const text =
      '(footprint "X" (layer "F.Cu") (pad "1" smd rect (at 0 0) (size 1 1) (layers "F.Cu")) (pad "2" smd rect (at 1 0) (size 1 1) (layers "F.Cu")) (embedded_fonts no))';
    const footprint = footprintCodec.decode(parseSingle(text));
    const pad = padCodec.create();
    pad.number = '3';
    footprint.pads.push(pad);
    const node = footprintCodec.encode(footprint);
    expect(node.items.slice(-4).map(keywordOf)).toEqual(['pad', 'pad', 'pad', 'embedded_fonts']);
    expect(footprint.extras[0].endOfRun).toBe(true);
  });
});
