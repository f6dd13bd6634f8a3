import { randomBytes } from 'node:crypto';
import { open, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Replace `path` with `data` so readers only ever see the old or the new
 * content: write a temp file beside it, fsync, close, then rename over the
 * original. The original file mode is kept. The temp file is removed if any
 * step fails.
 */
export async function writeFileAtomic(
  path: string,
  data: string | Uint8Array
): Promise<void> {
  const tempPath = join(
    dirname(path),
    `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`
  );

  let mode: number | undefined;
  try {
    mode = (await stat(path)).mode & 0o7777;
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }

  try {
    const handle = await open(tempPath, 'wx', mode ?? 0o644);
    try {
      await handle.writeFile(data);
      await handle.sync();
      if (mode !== undefined) await handle.chmod(mode);
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
  );
}
