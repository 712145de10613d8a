import { describe, it, expect } from 'vitest';
import { getDocumentKind, getDocumentKindByKeyword } from '../../../src/shared/fileTypes';

describe('unit: file types', () => {
  it('maps extensions to document kinds', () => {
    expect(getDocumentKind('/work/demo.kicad_pcb')).toBe('board');
    expect(getDocumentKind('lib/R_0603.kicad_mod')).toBe('footprint');
    expect(getDocumentKind('C:\\work\\Demo.KICAD_SCH')).toBe('schematic');
    expect(getDocumentKind('rules/board.kicad_dru')).toBe('design-rules');
  });

  it('recognizes library tables by name', () => {
    expect(getDocumentKind('/work/fp-lib-table')).toBe('fp-lib-table');
    expect(getDocumentKind('sym-lib-table')).toBe('sym-lib-table');
  });

  it('ignores dots in directory names', () => {
    expect(getDocumentKind('/work/v1.kicad_pcb/notes')).toBeUndefined();
    expect(getDocumentKind('readme.txt')).toBeUndefined();
  });

  it('maps root keywords, legacy ones included', () => {
    expect(getDocumentKindByKeyword('kicad_pcb')).toBe('board');
    expect(getDocumentKindByKeyword('module')).toBe('footprint');
    expect(getDocumentKindByKeyword('page_layout')).toBe('worksheet');
    expect(getDocumentKindByKeyword('rule')).toBe('design-rules');
    expect(getDocumentKindByKeyword('net')).toBeUndefined();
  });
});
