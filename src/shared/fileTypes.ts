export type DocumentKind =
  | 'board'
  | 'schematic'
  | 'footprint'
  | 'symbol-lib'
  | 'worksheet'
  | 'design-rules'
  | 'fp-lib-table'
  | 'sym-lib-table';

/** Get the extension from a file path (works with both separators) */
function getExtension(filePath: string): string {
  const lastDot = filePath.lastIndexOf('.');
  const lastSlash = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf('\\'));
  if (lastDot <= lastSlash) return '';
  return filePath.slice(lastDot).toLowerCase();
}

function getBaseName(filePath: string): string {
  const lastSlash = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf('\\'));
  return filePath.slice(lastSlash + 1);
}

/** File name to document kind mapping */
export function getDocumentKind(filePath: string): DocumentKind | undefined {
  switch (getBaseName(filePath)) {
    case 'fp-lib-table': return 'fp-lib-table';
    case 'sym-lib-table': return 'sym-lib-table';
  }
  switch (getExtension(filePath)) {
    case '.kicad_pcb': return 'board';
    case '.kicad_sch': return 'schematic';
    case '.kicad_mod': return 'footprint';
    case '.kicad_sym': return 'symbol-lib';
    case '.kicad_wks': return 'worksheet';
    case '.kicad_dru': return 'design-rules';
    default: return undefined;
  }
}

/** Root keyword to document kind mapping, for files with unexpected names */
export function getDocumentKindByKeyword(keyword: string): DocumentKind | undefined {
  switch (keyword) {
    case 'kicad_pcb': return 'board';
    case 'kicad_sch': return 'schematic';
    case 'footprint': case 'module': return 'footprint';
    case 'kicad_symbol_lib': return 'symbol-lib';
    case 'kicad_wks': case 'page_layout': return 'worksheet';
    case 'version': case 'rule': return 'design-rules';
    case 'fp_lib_table': return 'fp-lib-table';
    case 'sym_lib_table': return 'sym-lib-table';
    default: return undefined;
  }
}

/** Known KiCad S-expression file extensions */
export const KICAD_EXTENSIONS = [
  '.kicad_pcb', '.kicad_sch', '.kicad_mod',
  '.kicad_sym', '.kicad_wks', '.kicad_dru',
] as const;

/** Library tables carry no extension */
export const LIBRARY_TABLE_NAMES = ['fp-lib-table', 'sym-lib-table'] as const;
