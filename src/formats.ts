import ini from 'ini';
import * as yaml from 'js-yaml';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import {
  isDocumentMap,
  parseKeyPath,
  toDocumentValue,
  type DocumentMap,
} from './document.js';
import { FormatError, InvalidPathError, errorMessage } from './errors.js';

export const FILE_FORMATS = ['json', 'yaml', 'toml', 'ini'] as const;

export type FileFormat = (typeof FILE_FORMATS)[number];

const FORMAT_ALIASES = new Map<string, FileFormat>([
  ['json', 'json'],
  ['yaml', 'yaml'],
  ['yml', 'yaml'],
  ['toml', 'toml'],
  ['ini', 'ini'],
]);

/** Case-insensitive format lookup; "yml" is accepted for YAML */
export function normalizeFormat(format: string): FileFormat {
  const normalized = FORMAT_ALIASES.get(format.trim().toLowerCase());
  if (!normalized) {
    throw new FormatError(`unsupported file format: ${format}`);
  }
  return normalized;
}

export interface DocumentCodec {
  parse(text: string): DocumentMap;
  serialize(document: DocumentMap): string;
}

function asDocumentMap(format: FileFormat, parsed: unknown): DocumentMap {
  const value = toDocumentValue(parsed ?? {});
  if (!isDocumentMap(value)) {
    throw new FormatError(`invalid ${format} document: top level is not a map`);
  }
  return value;
}

function guarded(format: FileFormat, parse: (text: string) => unknown) {
  return (text: string): DocumentMap => {
    let parsed: unknown;
    try {
      parsed = parse(text);
    } catch (err) {
      throw new FormatError(`invalid ${format} document: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return asDocumentMap(format, parsed);
  };
}

const INI_SECTION_HEADER = /^(\s*\[)([^\]\r\n]*)(\][ \t]*\r?)$/gm;

/**
 * `ini` nests sections on unescaped dots; section names here are literal, so
 * `[server.main]` is one top-level key.
 */
function escapeIniSections(text: string): string {
  return text.replace(
    INI_SECTION_HEADER,
    (_header, open: string, name: string, close: string) =>
      `${open}${name.replace(/(?<!\\)\./g, '\\.')}${close}`
  );
}

function unescapeIniSections(text: string): string {
  return text.replace(
    INI_SECTION_HEADER,
    (_header, open: string, name: string, close: string) =>
      `${open}${name.replaceAll('\\.', '.')}${close}`
  );
}

const CODECS: Record<FileFormat, DocumentCodec> = {
  json: {
    parse: guarded('json', (text) => JSON.parse(text)),
    serialize: (document) => `${JSON.stringify(document, null, 2)}\n`,
  },
  yaml: {
    parse: guarded('yaml', (text) => yaml.load(text)),
    serialize: (document) => yaml.dump(document),
  },
  toml: {
    parse: guarded('toml', (text) => parseToml(text)),
    serialize: (document) => stringifyToml(document),
  },
  ini: {
    parse: guarded('ini', (text) => ini.parse(escapeIniSections(text))),
    serialize: (document) =>
      unescapeIniSections(ini.stringify(document, { whitespace: true })),
  },
};

export function codecFor(format: FileFormat): DocumentCodec {
  return CODECS[format];
}

/**
 * Check a key path against the rules of a format. INI paths must be exactly
 * `section/key`.
 */
export function validateKeyPath(format: FileFormat, keyPath: string): void {
  const segments = parseKeyPath(keyPath);
  if (format === 'ini' && segments.length !== 2) {
    throw new InvalidPathError(keyPath, 'INI paths must be section/key');
  }
}
