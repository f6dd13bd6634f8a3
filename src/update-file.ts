import { readFile, writeFile } from 'node:fs/promises';
import { writeFileAtomic } from './atomic-write.js';
import { getAtPath, setAtPath, type DocumentMap } from './document.js';
import { FileAccessError } from './errors.js';
import { codecFor, validateKeyPath } from './formats.js';
import { mergeIpWithMask } from './ip-mask.js';
import { silentLogger, type Logger } from './logger.js';
import type { FileTarget, FileUpdateResult } from './types.js';

export const BACKUP_SUFFIX = '.backup';

export interface FileUpdateOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

function fsErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

/** Map missing files and permission problems onto the error taxonomy */
function translateFsError(err: unknown, path: string): unknown {
  const code = fsErrorCode(err);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new FileAccessError('file-not-found', path, { cause: err });
  }
  if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
    return new FileAccessError('permission-denied', path, { cause: err });
  }
  return err;
}

async function readTarget(target: FileTarget): Promise<{ raw: Buffer; document: DocumentMap }> {
  validateKeyPath(target.format, target.keyPath);

  let raw: Buffer;
  try {
    raw = await readFile(target.path);
  } catch (err) {
    throw translateFsError(err, target.path);
  }

  return { raw, document: codecFor(target.format).parse(raw.toString('utf8')) };
}

/**
 * Current value at the target's key path, or undefined if the key is absent.
 * Non-string scalars are returned as they are.
 */
export async function getFileValue(target: FileTarget): Promise<unknown> {
  const { document } = await readTarget(target);
  return getAtPath(document, target.keyPath);
}

/**
 * Point the value at `target.keyPath` to `ip`.
 *
 * 1. Parses the file and reads the current value
 * 2. Skips the write when the mask-merged value is already in place
 * 3. Copies the original bytes to `<path>.backup` if `backup` is set
 * 4. Writes the re-serialized document atomically
 *
 * A missing or non-string current value does not stop the write; the result
 * is flagged `degraded`.
 */
export async function updateFile(
  target: FileTarget,
  ip: string,
  options: FileUpdateOptions = {}
): Promise<FileUpdateResult> {
  const logger = (options.logger ?? silentLogger).child({ target: target.name });
  const { signal } = options;

  signal?.throwIfAborted();
  const { raw, document } = await readTarget(target);
  const current = getAtPath(document, target.keyPath);

  let value = ip;
  let previous: string | undefined;
  let degraded = false;

  if (typeof current === 'string') {
    previous = current;
    value = mergeIpWithMask(current, ip, logger);
    if (value === current) {
      logger.debug(`${target.path}:${target.keyPath} already holds '${current}'`);
      return {
        target: target.name,
        path: target.path,
        status: 'unchanged',
        previous,
        value,
        degraded,
      };
    }
  } else {
    degraded = true;
    logger.warn(
      current === undefined
        ? `${target.path}:${target.keyPath} not found, writing it`
        : `${target.path}:${target.keyPath} is not a string, overwriting it`
    );
  }

  signal?.throwIfAborted();

  let backupPath: string | undefined;
  if (target.backup) {
    backupPath = `${target.path}${BACKUP_SUFFIX}`;
    try {
      await writeFile(backupPath, raw);
    } catch (err) {
      throw translateFsError(err, backupPath);
    }
  }

  setAtPath(document, target.keyPath, value);
  const serialized = codecFor(target.format).serialize(document);

  try {
    await writeFileAtomic(target.path, serialized);
  } catch (err) {
    throw translateFsError(err, target.path);
  }

  logger.info(
    `${target.path}:${target.keyPath} updated from '${previous ?? '(none)'}' to '${value}'`
  );

  return {
    target: target.name,
    path: target.path,
    status: 'updated',
    ...(previous !== undefined ? { previous } : {}),
    value,
    degraded,
    ...(backupPath ? { backupPath } : {}),
  };
}

export interface FileCheckResult {
  target: string;
  path: string;
  /** Undefined when the key is absent */
  value: unknown;
}

/** Confirm a target's file exists, parses and has a valid key path */
export async function checkFileTarget(target: FileTarget): Promise<FileCheckResult> {
  return { target: target.name, path: target.path, value: await getFileValue(target) };
}
