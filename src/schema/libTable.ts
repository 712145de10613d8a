/**
 * Footprint and symbol library tables (fp-lib-table, sym-lib-table).
 */

import type { LibraryConfig } from '../shared/config';
import { list, str } from '../parser/sexpr';
import { defineCodec, emitBool, readBool, type EmitStep, type Entity } from './codec';

// --- Types ---

export interface LibraryEntry extends Entity {
  name: string;
  /** KiCad, Legacy, Eagle, ... */
  type: string;
  uri: string;
  options: string;
  description: string;
  disabled: boolean;
  hidden: boolean;
}

export interface LibraryTable extends Entity {
  /** fp_lib_table or sym_lib_table */
  tableType: 'fp_lib_table' | 'sym_lib_table';
  version?: number;
  libs: LibraryEntry[];
}

// --- Codecs ---

export const libraryEntryCodec = defineCodec<LibraryEntry>({
  keyword: 'lib',
  read(reader) {
    const entry: LibraryEntry = {
      name: reader.childString('name') ?? '',
      type: reader.childString('type') ?? 'KiCad',
      uri: reader.childString('uri') ?? '',
      options: reader.childString('options') ?? '',
      description: reader.childString('descr') ?? '',
      disabled: false,
      hidden: false,
      extras: [],
    };
    entry.disabled = readBool(entry, reader.bool('disabled'), 'disabled') ?? false;
    entry.hidden = readBool(entry, reader.bool('hidden'), 'hidden') ?? false;
    return entry;
  },
  plan: [
    { field: 'name', emit: (l) => list('name', str(l.name)) },
    { field: 'type', emit: (l) => list('type', str(l.type)) },
    { field: 'uri', emit: (l) => list('uri', str(l.uri)) },
    { field: 'options', emit: (l) => list('options', str(l.options)) },
    { field: 'descr', emit: (l) => list('descr', str(l.description)) },
    { field: 'disabled', emit: (l) => emitBool(l, 'disabled', l.disabled, 'empty') },
    { field: 'hidden', emit: (l) => emitBool(l, 'hidden', l.hidden, 'empty') },
  ],
  create: () => ({
    name: '',
    type: 'KiCad',
    uri: '',
    options: '',
    description: '',
    disabled: false,
    hidden: false,
    extras: [],
  }),
});

function tableCodec(keyword: LibraryTable['tableType']) {
  const plan: EmitStep<LibraryTable>[] = [
    { field: 'version', when: (t) => t.version !== undefined, emit: (t) => list('version', t.version ?? 0) },
    { field: 'lib', emit: (t) => t.libs.map(libraryEntryCodec.encode) },
  ];
  return defineCodec<LibraryTable>({
    keyword,
    read(reader) {
      return {
        tableType: keyword,
        version: reader.childInteger('version'),
        libs: reader.decodeChildren('lib', libraryEntryCodec.decode),
        extras: [],
      };
    },
    plan,
    create: (config: LibraryConfig) => ({
      tableType: keyword,
      version: config.versions[keyword === 'fp_lib_table' ? 'fp-lib-table' : 'sym-lib-table'],
      libs: [],
      extras: [],
    }),
  });
}

export const footprintLibTableCodec = tableCodec('fp_lib_table');
export const symbolLibTableCodec = tableCodec('sym_lib_table');
