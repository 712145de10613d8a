import { describe, it, expect } from 'vitest';
import { libSymbolCodec, pinCodec, pinNamesCodec, symbolLibraryCodec, symbolUnitCodec } from '../../../src/schema/symbolLib';
import { isRawItem, type Entity, type SchemaCodec } from '../../../src/schema/codec';
import { formatList } from '../../../src/parser/formatter';
import { carryLayout } from '../../../src/parser/layout';
import { parseSingle } from '../../../src/parser/sexpr';

function roundTrip<T extends Entity>(codec: SchemaCodec<T>, text: string): string {
  const source = parseSingle(text);
  const fresh = codec.encode(codec.decode(source));
  carryLayout(fresh, source);
  return formatList(fresh);
}

describe('unit: symbol pins', () => {
  const text =
    '(pin power_in line (at 0 0 90) (length 0) hide (name "GND" (effects (font (size 1.27 1.27)))) (number "1" (effects (font (size 1.27 1.27)))))';

  it('reads a hidden power pin', () => {
    const pin = pinCodec.decode(parseSingle(text));
    expect(pin.electricalType).toBe('power_in');
    expect(pin.graphicStyle).toBe('line');
    expect(pin.position.angle).toBe(90);
    expect(pin.hide).toBe(true);
    expect(pin.name).toBe('GND');
    expect(pin.number).toBe('1');
  });

  it('keeps the bare hide flag in place', () => {
    expect(roundTrip(pinCodec, text)).toBe(text);
  });

  it('reads alternate pin functions', () => {
    const pin = pinCodec.decode(
      parseSingle('(pin bidirectional line (at 0 0 0) (length 2.54) (name "PA0") (number "1") (alternate "TX" output line) (alternate "CLK" input clock))'),
    );
    expect(pin.alternates).toEqual([
      { name: 'TX', electricalType: 'output', graphicStyle: 'line' },
      { name: 'CLK', electricalType: 'input', graphicStyle: 'clock' },
    ]);
  });

  it('writes new pins in yes/no form', () => {
    const pin = pinCodec.create();
    pin.hide = true;
    pin.nameEffects = undefined;
    pin.numberEffects = undefined;
    expect(formatList(pinCodec.encode(pin))).toBe(
      '(pin passive line\n\t(at 0 0 0)\n\t(length 2.54)\n\t(hide yes)\n\t(name "~")\n\t(number "1")\n)',
    );
  });
});

describe('unit: library symbols', () => {
  it('reads pin name settings', () => {
    const names = pinNamesCodec.decode(parseSingle('(pin_names (offset 1.016) hide)'));
    expect(names).toMatchObject({ offset: 1.016, hide: true });
    expect(roundTrip(pinNamesCodec, '(pin_names (offset 1.016) hide)')).toBe('(pin_names (offset 1.016) hide)');
  });

  it('keeps unit graphics verbatim around decoded pins', () => {
    const text =
      '(symbol "R_1_1" (unit_name "A") (rectangle (start -1 -2) (end 1 2)) (pin passive line (at 0 3.81 270) (length 1.27) (name "~") (number "1")))';
    const unit = symbolUnitCodec.decode(parseSingle(text));
    expect(unit.unitName).toBe('A');
    expect(unit.items).toHaveLength(2);
    expect(isRawItem(unit.items[0])).toBe(true);
    expect(unit.items[1].type).toBe('pin');
    expect(roundTrip(symbolUnitCodec, text)).toBe(text);
  });

  it('decodes polylines and text in a unit', () => {
    const text =
      '(symbol "U_1_1" (polyline (pts (xy 0 0) (xy 1.27 1.27)) (stroke (width 0) (type default)) (fill (type none))) (text "A" (at 0 0 0) (effects (font (size 1.27 1.27)))) (pin input line (at -2.54 0 0) (length 2.54) (name "IN") (number "1")))';
    const unit = symbolUnitCodec.decode(parseSingle(text));
    expect(unit.items.map((item) => item.type)).toEqual(['polyline', 'text', 'pin']);
    expect(roundTrip(symbolUnitCodec, text)).toBe(text);
  });

  it('reads power symbols and their flags', () => {
    const symbol = libSymbolCodec.decode(
      parseSingle('(symbol "GND" (power) (pin_names (offset 0)) (exclude_from_sim no) (in_bom yes) (on_board yes) (property "Reference" "#PWR"))'),
    );
    expect(symbol.power).toBe(true);
    expect(symbol.pinNames?.offset).toBe(0);
    expect(symbol.excludeFromSim).toBe(false);
    expect(symbol.inBom).toBe(true);
    expect(symbol.properties[0].value).toBe('#PWR');
  });

  it('creates symbols that are in the BOM and on the board', () => {
    const symbol = libSymbolCodec.create();
    symbol.id = 'New';
    expect(formatList(libSymbolCodec.encode(symbol))).toBe(
      '(symbol "New"\n\t(exclude_from_sim no)\n\t(in_bom yes)\n\t(on_board yes)\n)',
    );
  });

  it('creates libraries with the editor header', () => {
    expect(formatList(symbolLibraryCodec.encode(symbolLibraryCodec.create()))).toBe(
      '(kicad_symbol_lib\n\t(version 20231120)\n\t(generator "kicad_symbol_editor")\n\t(generator_version "8.0")\n)',
    );
  });
});
