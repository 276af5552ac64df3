import fs from 'node:fs/promises';

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Remove `dir` if it has no entries. Returns whether it was removed. */
export async function removeIfEmpty(dir: string): Promise<boolean> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
  if (entries.length > 0) return false;
  await fs.rmdir(dir);
  return true;
}
