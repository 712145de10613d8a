import { describe, it, expect } from 'vitest';
import {
  boardGeneralCodec, boardSetupCodec, boardTextCodec, dimensionCodec, targetCodec, zoneCodec,
} from '../../../src/schema/boardItems';
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

describe('unit: board text', () => {
  it('round-trips text with a knockout layer', () => {
    const text =
      '(gr_text "Hello" (at 10 20 90) (layer "F.SilkS" knockout) (uuid "t-1") (effects (font (size 1 1) (thickness 0.15)) (justify left)))';
    const source = parseSingle(text);
    const item = boardTextCodec.decode(source);
    expect(item).toMatchObject({ text: 'Hello', layer: 'F.SilkS', knockout: true, locked: false });
    expect(item.position).toEqual({ x: 10, y: 20, angle: 90 });
    expect(item.effects.justify).toEqual(['left']);
    expect(rewrite(boardTextCodec, source, item)).toBe(text);
  });

  it('reads the text after a bare locked', () => {
    const text = '(gr_text locked "X" (at 0 0) (layer "F.Cu") (effects (font (size 1 1))))';
    const source = parseSingle(text);
    const item = boardTextCodec.decode(source);
    expect(item.locked).toBe(true);
    expect(item.text).toBe('X');
    expect(rewrite(boardTextCodec, source, item)).toBe(text);
  });
});

describe('unit: dimension', () => {
  const text =
    '(dimension (type aligned) (layer "Dwgs.User") (uuid "d-1") (pts (xy 0 0) (xy 10 0)) (height 2) (gr_text "10 mm" (at 5 -2) (layer "Dwgs.User") (effects (font (size 1 1)))) (format (prefix "") (suffix "") (units 3) (units_format 1) (precision 4)) (style (thickness 0.1) (arrow_length 1.27) (text_position_mode 0) (extension_height 0.58642) (extension_offset 0.5) (keep_text_aligned yes)))';

  it('decodes geometry, text, format and style', () => {
    const dimension = dimensionCodec.decode(parseSingle(text));
    expect(dimension.dimensionType).toBe('aligned');
    expect(dimension.points).toEqual([{ x: 0, y: 0 }, { x: 10, y: 0 }]);
    expect(dimension.height).toBe(2);
    expect(dimension.text?.text).toBe('10 mm');
    expect(dimension.format).toMatchObject({ units: 3, unitsFormat: 1, precision: 4 });
    expect(dimension.style?.keepTextAligned).toBe(true);
  });

  it('writes an unmodified dimension back byte for byte', () => {
    const source = parseSingle(text);
    expect(rewrite(dimensionCodec, source, dimensionCodec.decode(source))).toBe(text);
  });

  it('changes only the edited height', () => {
    const source = parseSingle(text);
    const dimension = dimensionCodec.decode(source);
    dimension.height = 3.5;
    expect(rewrite(dimensionCodec, source, dimension)).toBe(text.replace('(height 2)', '(height 3.5)'));
  });
});

describe('unit: target', () => {
  it('round-trips alignment targets', () => {
    const text = '(target plus (at 10 10) (size 5) (width 0.1) (layer "Edge.Cuts") (uuid "tg-1"))';
    const source = parseSingle(text);
    const target = targetCodec.decode(source);
    expect(target).toMatchObject({ shape: 'plus', size: 5, width: 0.1, layer: 'Edge.Cuts' });
    expect(rewrite(targetCodec, source, target)).toBe(text);
  });
});

describe('unit: zone', () => {
  const copper =
    '(zone (net 1) (net_name "GND") (layer "B.Cu") (uuid "z-1") (hatch edge 0.5) (connect_pads (clearance 0.5)) (min_thickness 0.25) (filled_areas_thickness no) (fill yes (thermal_gap 0.5) (thermal_bridge_width 0.5)) (polygon (pts (xy 0 0) (xy 10 0) (xy 10 10) (xy 0 10))) (filled_polygon (layer "B.Cu") (pts (xy 0.5 0.5) (xy 9.5 0.5) (xy 9.5 9.5))))';

  it('decodes the outline and the filled copper', () => {
    const zone = zoneCodec.decode(parseSingle(copper));
    expect(zone).toMatchObject({ net: 1, netName: 'GND', layer: 'B.Cu', minThickness: 0.25, filledAreasThickness: false });
    expect(zone.hatch).toEqual({ style: 'edge', pitch: 0.5 });
    expect(zone.connectPads).toEqual({ mode: undefined, clearance: 0.5 });
    expect(zone.fill).toMatchObject({ filled: true, thermalGap: 0.5 });
    expect(zone.polygons).toHaveLength(1);
    expect(zone.polygons[0]).toHaveLength(4);
    expect(zone.filledPolygons[0].points).toHaveLength(3);
  });

  it('writes an unmodified zone back byte for byte', () => {
    const source = parseSingle(copper);
    expect(rewrite(zoneCodec, source, zoneCodec.decode(source))).toBe(copper);
  });

  it('reads keepout rules on several layers', () => {
    const keepout =
      '(zone (net 0) (net_name "") (layers "F.Cu" "B.Cu") (uuid "z-2") (hatch edge 0.5) (connect_pads (clearance 0)) (min_thickness 0.25) (keepout (tracks not_allowed) (vias not_allowed) (pads allowed) (copperpour not_allowed) (footprints allowed)) (fill (thermal_gap 0.5) (thermal_bridge_width 0.5)) (polygon (pts (xy 0 0) (xy 5 0) (xy 5 5))))';
    const source = parseSingle(keepout);
    const zone = zoneCodec.decode(source);
    expect(zone.layer).toBeUndefined();
    expect(zone.layers).toEqual(['F.Cu', 'B.Cu']);
    expect(zone.keepout?.map((k) => `${k.item}=${k.rule}`)).toEqual([
      'tracks=not_allowed', 'vias=not_allowed', 'pads=allowed', 'copperpour=not_allowed', 'footprints=allowed',
    ]);
    expect(zone.fill?.filled).toBe(false);
    expect(rewrite(zoneCodec, source, zone)).toBe(keepout);
  });

  it('creates an unfilled single-layer zone', () => {
    const node = zoneCodec.encode(zoneCodec.create());
    expect(node.items.slice(1).map(keywordOf)).toEqual([
      'net', 'net_name', 'layer', 'uuid', 'hatch', 'connect_pads', 'min_thickness', 'filled_areas_thickness', 'fill',
    ]);
  });
});

describe('unit: general and setup', () => {
  it('round-trips the current general block', () => {
    const text = '(general (thickness 1.6) (legacy_teardrops no))';
    const source = parseSingle(text);
    const general = boardGeneralCodec.decode(source);
    expect(general).toMatchObject({ thickness: 1.6, legacyTeardrops: false });
    expect(rewrite(boardGeneralCodec, source, general)).toBe(text);
  });

  it('reads the item counts of KiCad 5 boards', () => {
    const text = '(general (links 2) (no_connects 0) (area 0 0 0 0) (thickness 1.6) (drawings 3) (tracks 5) (zones 0) (modules 1) (nets 2))';
    const source = parseSingle(text);
    const general = boardGeneralCodec.decode(source);
    expect(general).toMatchObject({ drawings: 3, tracks: 5, zones: 0, modules: 1, nets: 2 });
    expect(general.extras.map((e) => keywordOf(e.item))).toEqual(['links', 'no_connects', 'area']);
    expect(rewrite(boardGeneralCodec, source, general)).toBe(text);
  });

  it('keeps plot parameters among the setup extras', () => {
    const text =
      '(setup (pad_to_mask_clearance 0) (allow_soldermask_bridges_in_footprints no) (aux_axis_origin 100 50) (pcbplotparams (layerselection 0x00010fc_ffffffff)))';
    const source = parseSingle(text);
    const setup = boardSetupCodec.decode(source);
    expect(setup.padToMaskClearance).toBe(0);
    expect(setup.allowSolderMaskBridgesInFootprints).toBe(false);
    expect(setup.auxAxisOrigin).toEqual({ x: 100, y: 50 });
    expect(setup.extras.map((e) => keywordOf(e.item))).toEqual(['pcbplotparams']);
    expect(rewrite(boardSetupCodec, source, setup)).toBe(text);
  });
});
