import { describe, it, expect } from 'vitest';
import { boardCodec, groupCodec, segmentCodec, trackRegistry, viaCodec } from '../../../src/schema/board';
import type { Entity, SchemaCodec } from '../../../src/schema/codec';
import { formatList } from '../../../src/parser/formatter';
import { carryLayout } from '../../../src/parser/layout';
import { findExpr, keywordOf } from '../../../src/parser/nodeAccessor';
import { parseSingle, type SExprList } from '../../../src/parser/sexpr';
import { SchemaError } from '../../../src/shared/errors';

function rewrite<T extends Entity>(codec: SchemaCodec<T>, source: SExprList, entity: T): string {
  const fresh = codec.encode(entity);
  carryLayout(fresh, source);
  return formatList(fresh);
}

describe('unit: via', () => {
  const text = '(via (at 10 20) (size 0.6) (layers F.Cu B.Cu))';

  it('decodes a minimal through via', () => {
    const via = viaCodec.decode(parseSingle(text));
    expect(via.position).toEqual({ x: 10, y: 20, angle: undefined });
    expect(via.size).toBe(0.6);
    expect(via.layers).toEqual(['F.Cu', 'B.Cu']);
    expect(via.drill).toBeUndefined();
    expect(via.net).toBeUndefined();
    expect(via.uuid).toBeUndefined();
    expect(via.viaType).toBeUndefined();
  });

  it('writes an unmodified via back byte for byte', () => {
    const source = parseSingle(text);
    expect(rewrite(viaCodec, source, viaCodec.decode(source))).toBe(text);
  });

  it('changes only the edited coordinate', () => {
    const source = parseSingle(text);
    const via = viaCodec.decode(source);
    via.position.x = 12.5;
    expect(rewrite(viaCodec, source, via)).toBe('(via (at 12.5 20) (size 0.6) (layers F.Cu B.Cu))');
  });

  it('reads blind and micro vias', () => {
    const via = viaCodec.decode(parseSingle('(via micro (at 0 0) (size 0.3) (drill 0.1) (layers "F.Cu" "In1.Cu") (net 2))'));
    expect(via.viaType).toBe('micro');
    expect(via.drill).toBe(0.1);
    expect(via.net).toBe(2);
  });

  it('refuses a pad', () => {
    expect(() => viaCodec.decode(parseSingle('(pad "1" smd rect (at 0 0) (size 1 1))'))).toThrow(
      "Invalid 'via': field 'keyword' expected 'via', found 'pad'",
    );
  });

  it('requires a position', () => {
    expect(() => viaCodec.decode(parseSingle('(via (size 0.6))'))).toThrow(SchemaError);
  });

  it('creates vias with default size, drill and layers', () => {
    const node = viaCodec.encode(viaCodec.create());
    expect(node.items.slice(1).map(keywordOf)).toEqual(['at', 'size', 'drill', 'layers', 'net', 'uuid']);
    expect(formatList(node).startsWith('(via\n\t(at 0 0)\n\t(size 0.6)\n\t(drill 0.3)\n\t(layers "F.Cu" "B.Cu")\n\t(net 0)\n\t(uuid "')).toBe(true);
  });
});

describe('unit: segment', () => {
  const text = '(segment (start 100 50) (end 105 50) (width 0.2500) (layer "F.Cu") (net 1) (uuid "seg-1"))';

  it('keeps the written spelling of unchanged numbers', () => {
    const source = parseSingle(text);
    expect(rewrite(segmentCodec, source, segmentCodec.decode(source))).toBe(text);
  });

  it('writes an edited width canonically', () => {
    const source = parseSingle(text);
    const segment = segmentCodec.decode(source);
    segment.width = 0.3;
    expect(rewrite(segmentCodec, source, segment)).toBe(
      '(segment (start 100 50) (end 105 50) (width 0.3) (layer "F.Cu") (net 1) (uuid "seg-1"))',
    );
  });

  it('keeps a bare locked flag in front', () => {
    const locked = '(segment locked (start 0 0) (end 1 0) (width 0.2) (layer "B.Cu") (net 0))';
    const source = parseSingle(locked);
    const segment = segmentCodec.decode(source);
    expect(segment.locked).toBe(true);
    expect(rewrite(segmentCodec, source, segment)).toBe(locked);
  });

  it('keeps surplus coordinates inside a point', () => {
    const odd = '(segment (start 0 0 9) (end 1 0) (width 0.2) (layer "B.Cu") (net 0))';
    const source = parseSingle(odd);
    const segment = segmentCodec.decode(source);
    expect(rewrite(segmentCodec, source, segment)).toBe(odd);
    segment.start.x = 5;
    expect(rewrite(segmentCodec, source, segment)).toBe(odd.replace('(start 0 0 9)', '(start 5 0 9)'));
  });

  it('dispatches tracks by keyword', () => {
    const item = trackRegistry.decode(parseSingle(text));
    expect(item.type).toBe('segment');
  });
});

describe('unit: group', () => {
  it('round-trips members', () => {
    const text = '(group "" (uuid "g-1") (members "a-1" "b-2"))';
    const source = parseSingle(text);
    const group = groupCodec.decode(source);
    expect(group.members).toEqual(['a-1', 'b-2']);
    expect(rewrite(groupCodec, source, group)).toBe(text);
  });

  it('reads KiCad 6 group ids', () => {
    const group = groupCodec.decode(parseSingle('(group "G" (id 5F1A) (members a))'));
    expect(group.uuid).toEqual({ key: 'tstamp', value: '5F1A' });
    expect(formatList(groupCodec.encode(group))).toBe('(group "G"\n\t(id 5F1A)\n\t(members "a")\n)');
  });
});

describe('unit: board', () => {
  const text = '(kicad_pcb (version 20240108) (generator "pcbnew") (layers (0 "F.Cu" signal) (44 "Edge.Cuts" user)) (embedded_fonts no))';

  it('reads the layer table', () => {
    const board = boardCodec.decode(parseSingle(text));
    expect(board.layers).toEqual([
      { id: 0, name: 'F.Cu', type: 'signal', userName: undefined },
      { id: 44, name: 'Edge.Cuts', type: 'user', userName: undefined },
    ]);
  });

  it('carries unmodelled items through', () => {
    const source = parseSingle(text);
    const board = boardCodec.decode(source);
    expect(board.extras.map((e) => keywordOf(e.item))).toEqual(['embedded_fonts']);
    expect(rewrite(boardCodec, source, board)).toBe(text);
  });

  it('keeps unknown atoms of a layer entry', () => {
    const future = '(kicad_pcb (version 20240108) (generator "pcbnew") (layers (0 "F.Cu" signal "Top" future) (44 "Edge.Cuts" user)))';
    const source = parseSingle(future);
    const board = boardCodec.decode(source);
    expect(board.layers[0]).toEqual({ id: 0, name: 'F.Cu', type: 'signal', userName: 'Top' });
    expect(rewrite(boardCodec, source, board)).toBe(future);
    board.layers[0].userName = 'Front';
    expect(rewrite(boardCodec, source, board)).toBe(future.replace('"Top"', '"Front"'));
  });

  it('creates a board with the default layer stack and net 0', () => {
    const board = boardCodec.create();
    expect(board.layers).toHaveLength(15);
    expect(board.nets).toEqual([{ number: 0, name: '', extras: [] }]);
    expect(findExpr(boardCodec.encode(board), 'setup')).toBeDefined();
  });
});
