import { InvalidPathError } from './errors.js';

export type DocumentScalar = string | number | bigint | boolean | Date | null;

export interface DocumentMap {
  [key: string]: DocumentValue;
}

/** Format-independent tree every codec parses into and serializes from */
export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentMap;

export function isDocumentMap(value: unknown): value is DocumentMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Split a key path into its segments.
 *
 * E.g. "server/public_ip" → ["server", "public_ip"]
 */
export function parseKeyPath(keyPath: string): string[] {
  const segments = keyPath.split('/');
  if (segments.some((segment) => segment === '')) {
    throw new InvalidPathError(keyPath, 'empty segment');
  }
  return segments;
}

function ownValue(map: DocumentMap, key: string): DocumentValue | undefined {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}

/**
 * Read the value at `keyPath`. Returns undefined when a key along the way is
 * absent or null; throws `InvalidPathError` when an intermediate key holds
 * some other non-map value.
 */
export function getAtPath(root: DocumentMap, keyPath: string): DocumentValue | undefined {
  const segments = parseKeyPath(keyPath);
  let current = root;

  for (const [i, key] of segments.slice(0, -1).entries()) {
    const next = ownValue(current, key);
    if (next === undefined || next === null) return undefined;
    if (!isDocumentMap(next)) {
      throw new InvalidPathError(keyPath, `"${key}" (step ${i + 1}) is not a map`);
    }
    current = next;
  }

  const last = segments[segments.length - 1] ?? '';
  return ownValue(current, last);
}

/**
 * Write `value` at `keyPath`, creating missing intermediate maps. Throws
 * `InvalidPathError` when an intermediate key holds something other than a
 * map.
 */
export function setAtPath(root: DocumentMap, keyPath: string, value: DocumentValue): void {
  const segments = parseKeyPath(keyPath);
  let current = root;

  for (const [i, key] of segments.slice(0, -1).entries()) {
    let next = ownValue(current, key);
    if (next === undefined || next === null) {
      next = {};
      defineValue(current, key, next);
    }
    if (!isDocumentMap(next)) {
      throw new InvalidPathError(keyPath, `"${key}" (step ${i + 1}) is not a map`);
    }
    current = next;
  }

  const last = segments[segments.length - 1] ?? '';
  defineValue(current, last, value);
}

/** Own-property assignment, so keys such as "__proto__" stay plain data */
function defineValue(map: DocumentMap, key: string, value: DocumentValue): void {
  Object.defineProperty(map, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

/**
 * Convert parser output into a `DocumentValue`, rejecting anything a
 * document cannot hold (functions, symbols, undefined).
 */
export function toDocumentValue(value: unknown, where = '(root)'): DocumentValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => toDocumentValue(item, `${where}[${i}]`));
  }
  if (typeof value === 'object') {
    const map: DocumentMap = {};
    for (const [key, item] of Object.entries(value)) {
      defineValue(map, key, toDocumentValue(item, `${where}.${key}`));
    }
    return map;
  }
  throw new TypeError(`unsupported value at ${where}: ${typeof value}`);
}
