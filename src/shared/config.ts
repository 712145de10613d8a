/**
 * Library configuration
 *
 * Defaults used when creating new documents and items, formatter settings and the
 * logger. A config is an immutable value: build one with createConfig() and pass it
 * explicitly to create()/load()/save().
 */

import type { DocumentKind } from './fileTypes';

export type Logger = Pick<Console, 'debug' | 'warn'>;

export interface FormatOptions {
  /** Indentation unit, one per nesting depth */
  indent: string;
  /** Keep font/stroke/fill/... lists on their parent's line */
  compact: boolean;
}

export interface LibraryConfig {
  /** `version` token written into new documents */
  readonly versions: Readonly<Record<DocumentKind, number>>;
  /** Newest version this library knows; newer files are decoded best-effort */
  readonly latestKnownVersions: Readonly<Record<DocumentKind, number>>;
  /** `generator` token written into new documents */
  readonly generators: Readonly<Record<DocumentKind, string>>;
  readonly generatorVersion: string;
  readonly format: Readonly<FormatOptions>;
  readonly encoding: BufferEncoding;
  readonly logger: Logger;
}

export interface ConfigOverrides {
  versions?: Partial<Record<DocumentKind, number>>;
  latestKnownVersions?: Partial<Record<DocumentKind, number>>;
  generators?: Partial<Record<DocumentKind, string>>;
  generatorVersion?: string;
  format?: Partial<FormatOptions>;
  encoding?: BufferEncoding;
  logger?: Logger;
}

const DEFAULT_VERSIONS: Record<DocumentKind, number> = {
  'board': 20240108,
  'footprint': 20240108,
  'schematic': 20231120,
  'symbol-lib': 20231120,
  'worksheet': 20231118,
  'design-rules': 1,
  'fp-lib-table': 7,
  'sym-lib-table': 7,
};

const LATEST_KNOWN_VERSIONS: Record<DocumentKind, number> = {
  'board': 20241229,
  'footprint': 20241229,
  'schematic': 20250114,
  'symbol-lib': 20241209,
  'worksheet': 20231118,
  'design-rules': 1,
  'fp-lib-table': 7,
  'sym-lib-table': 7,
};

const DEFAULT_GENERATORS: Record<DocumentKind, string> = {
  'board': 'pcbnew',
  'footprint': 'pcbnew',
  'schematic': 'eeschema',
  'symbol-lib': 'kicad_symbol_editor',
  'worksheet': 'pl_editor',
  'design-rules': '',
  'fp-lib-table': '',
  'sym-lib-table': '',
};

export const DEFAULT_FORMAT: Readonly<FormatOptions> = Object.freeze({
  indent: '\t',
  compact: false,
});

export const DEFAULT_CONFIG: LibraryConfig = createConfig();

export function createConfig(overrides: ConfigOverrides = {}): LibraryConfig {
  return Object.freeze({
    versions: Object.freeze({ ...DEFAULT_VERSIONS, ...overrides.versions }),
    latestKnownVersions: Object.freeze({ ...LATEST_KNOWN_VERSIONS, ...overrides.latestKnownVersions }),
    generators: Object.freeze({ ...DEFAULT_GENERATORS, ...overrides.generators }),
    generatorVersion: overrides.generatorVersion ?? '8.0',
    format: Object.freeze({ ...DEFAULT_FORMAT, ...overrides.format }),
    encoding: overrides.encoding ?? 'utf-8',
    logger: overrides.logger ?? console,
  });
}
