/**
 * KiCad file facade
 *
 * Loads a file from disk (or text), detects its kind, decodes it into the typed
 * document for that kind and writes it back. Saving replays the whitespace and
 * number spelling of the loaded file wherever the content is unchanged.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { DEFAULT_CONFIG, type LibraryConfig } from '../shared/config';
import { EmptyDocumentError, FileIOError, SExprSyntaxError, SchemaError, UnsupportedVersionError } from '../shared/errors';
import { getDocumentKind, getDocumentKindByKeyword, type DocumentKind } from '../shared/fileTypes';
import { serializeSExpression } from '../parser/formatter';
import { carryDocumentLayout } from '../parser/layout';
import { getNumberValue, keywordOf } from '../parser/nodeAccessor';
import { isNumberAtom, parseSExpression, type SExprDocument } from '../parser/sexpr';
import { boardCodec, type PcbBoard } from '../schema/board';
import type { Entity, SchemaCodec } from '../schema/codec';
import { createDesignRules, decodeDesignRules, encodeDesignRules, type DesignRules } from '../schema/designRules';
import { footprintCodec, type PcbFootprint } from '../schema/footprint';
import { footprintLibTableCodec, symbolLibTableCodec, type LibraryTable } from '../schema/libTable';
import { schematicCodec, type KicadSchematic } from '../schema/schematic';
import { symbolLibraryCodec, type SymbolLibrary } from '../schema/symbolLib';
import { worksheetCodec, type Worksheet } from '../schema/worksheet';

// --- Types ---

/** Typed document of each file kind */
export interface DocumentTypes {
  'board': PcbBoard;
  'footprint': PcbFootprint;
  'schematic': KicadSchematic;
  'symbol-lib': SymbolLibrary;
  'worksheet': Worksheet;
  'design-rules': DesignRules;
  'fp-lib-table': LibraryTable;
  'sym-lib-table': LibraryTable;
}

export interface LoadOptions {
  /** Skip detection and decode as this kind */
  kind?: DocumentKind;
  encoding?: BufferEncoding;
  config?: LibraryConfig;
}

export interface FromStringOptions {
  config?: LibraryConfig;
  /** Default destination for save() */
  path?: string;
}

export interface SaveOptions {
  /** Destination; defaults to the path the file was loaded from or last saved to */
  path?: string;
  encoding?: BufferEncoding;
}

interface DocumentHandler<T> {
  decode(tree: SExprDocument): T;
  encode(document: T): SExprDocument;
  create(config: LibraryConfig): T;
}

// --- Handlers ---

/** Kinds whose file is one root list */
function singleRoot<T extends Entity>(codec: SchemaCodec<T>): DocumentHandler<T> {
  return {
    decode(tree) {
      const extra = tree.forms[1];
      if (extra !== undefined) {
        throw new SExprSyntaxError('Expected a single top-level list', extra.position ?? { offset: 0, line: 1, column: 1 });
      }
      return codec.decode(tree.forms[0]);
    },
    encode: (document) => ({ forms: [codec.encode(document)] }),
    create: (config) => codec.create(config),
  };
}

const HANDLERS: { [K in DocumentKind]: DocumentHandler<DocumentTypes[K]> } = {
  'board': singleRoot(boardCodec),
  'footprint': singleRoot(footprintCodec),
  'schematic': singleRoot(schematicCodec),
  'symbol-lib': singleRoot(symbolLibraryCodec),
  'worksheet': singleRoot(worksheetCodec),
  'design-rules': { decode: decodeDesignRules, encode: encodeDesignRules, create: createDesignRules },
  'fp-lib-table': singleRoot(footprintLibTableCodec),
  'sym-lib-table': singleRoot(symbolLibTableCodec),
};

function handlerFor<K extends DocumentKind>(kind: K): DocumentHandler<DocumentTypes[K]> {
  return HANDLERS[kind];
}

/** Root `(version N)` of a parsed file; rules files carry it as a top-level form */
function rootVersion(kind: DocumentKind, tree: SExprDocument): number | undefined {
  if (kind === 'design-rules') {
    const form = tree.forms.find((f) => keywordOf(f) === 'version');
    const value = form?.items[1];
    return isNumberAtom(value) ? value.value : undefined;
  }
  return getNumberValue(tree.forms[0], 'version');
}

function detectKind(tree: SExprDocument, origin: string): DocumentKind {
  const keyword = keywordOf(tree.forms[0]);
  const kind = keyword !== undefined ? getDocumentKindByKeyword(keyword) : undefined;
  if (kind === undefined) {
    throw new SchemaError(origin, 'keyword', 'a KiCad root keyword', `'${keyword ?? ''}'`);
  }
  return kind;
}

function decodeDocument<K extends DocumentKind>(
  kind: K,
  tree: SExprDocument,
  config: LibraryConfig,
  origin: string,
): DocumentTypes[K] {
  const handler = handlerFor(kind);
  const version = rootVersion(kind, tree);
  const latest = config.latestKnownVersions[kind];
  if (version === undefined || version <= latest) {
    return handler.decode(tree);
  }

  config.logger.warn(`[load] ${origin}: ${kind} version ${version} is newer than ${latest}, decoding best-effort`);
  try {
    return handler.decode(tree);
  } catch (error) {
    if (error instanceof SchemaError) {
      throw new UnsupportedVersionError(kind, String(version), error);
    }
    throw error;
  }
}

function parseText(text: string, origin?: string, kind?: DocumentKind): SExprDocument {
  try {
    return parseSExpression(text, { lineComments: kind === 'design-rules' });
  } catch (error) {
    if (error instanceof EmptyDocumentError && origin !== undefined) {
      throw new EmptyDocumentError(origin);
    }
    throw error;
  }
}

// --- File ---

export class KicadFile<K extends DocumentKind = DocumentKind> {
  private filePath?: string;
  private encoding: BufferEncoding;

  private constructor(
    readonly kind: K,
    /** Typed content; edit it in place and save() */
    readonly document: DocumentTypes[K],
    readonly config: LibraryConfig,
    /** Tree as read, used to carry layout over on save */
    private readonly source?: SExprDocument,
    filePath?: string,
    encoding?: BufferEncoding,
  ) {
    this.filePath = filePath;
    this.encoding = encoding ?? config.encoding;
  }

  get path(): string | undefined {
    return this.filePath;
  }

  /** Read and decode a file. Nothing is returned unless the whole file decodes. */
  static async load<K extends DocumentKind>(filePath: string, options: LoadOptions & { kind: K }): Promise<KicadFile<K>>;
  static async load(filePath: string, options?: LoadOptions): Promise<KicadFile>;
  static async load(filePath: string, options: LoadOptions = {}): Promise<KicadFile> {
    const config = options.config ?? DEFAULT_CONFIG;
    const encoding = options.encoding ?? config.encoding;

    let text: string;
    try {
      text = await fs.readFile(filePath, { encoding });
    } catch (error) {
      throw new FileIOError(filePath, 'read', error);
    }

    const known = options.kind ?? getDocumentKind(filePath);
    const tree = parseText(text, filePath, known);
    const kind = known ?? detectKind(tree, filePath);
    const document = decodeDocument(kind, tree, config, filePath);
    config.logger.debug(`[load] ${filePath} (${kind}, ${text.length} chars)`);
    return new KicadFile(kind, document, config, tree, filePath, encoding);
  }

  static fromString<K extends DocumentKind>(text: string, kind: K, options?: FromStringOptions): KicadFile<K>;
  static fromString(text: string, kind?: DocumentKind, options?: FromStringOptions): KicadFile;
  static fromString(text: string, kind?: DocumentKind, options: FromStringOptions = {}): KicadFile {
    const config = options.config ?? DEFAULT_CONFIG;
    const known = kind ?? (options.path !== undefined ? getDocumentKind(options.path) : undefined);
    const tree = parseText(text, options.path, known);
    const origin = options.path ?? '<string>';
    const resolved = known ?? detectKind(tree, origin);
    return new KicadFile(resolved, decodeDocument(resolved, tree, config, origin), config, tree, options.path);
  }

  /** A new, empty document with the defaults KiCad gives a new file */
  static create<K extends DocumentKind>(kind: K, config: LibraryConfig = DEFAULT_CONFIG): KicadFile<K> {
    return new KicadFile(kind, handlerFor(kind).create(config), config);
  }

  /** The text save() would write */
  toString(): string {
    const fresh = handlerFor(this.kind).encode(this.document);
    if (this.source) carryDocumentLayout(fresh, this.source);
    return serializeSExpression(fresh, this.config.format);
  }

  /**
   * Write through a temporary sibling file renamed over the destination, so the
   * destination is either fully replaced or left as it was.
   */
  async save(options: SaveOptions = {}): Promise<void> {
    const target = options.path ?? this.filePath;
    if (target === undefined) {
      throw new FileIOError('', 'write', new Error('No destination path given'));
    }
    const encoding = options.encoding ?? this.encoding;
    const text = this.toString();
    const temp = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);

    try {
      await fs.writeFile(temp, text, { encoding });
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new FileIOError(target, 'write', error);
    }

    this.filePath = target;
    this.encoding = encoding;
    this.config.logger.debug(`[save] ${target} (${this.kind}, ${text.length} chars)`);
  }
}

/** Narrow a loaded file of unknown kind */
export function isKind<K extends DocumentKind>(file: KicadFile, kind: K): file is KicadFile<K> {
  return file.kind === kind;
}
