import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Replace a file's contents via a sibling temp file and rename.
 *
 * @param mode - Permission bits to give the new file (the replaced file's mode)
 */
export async function writeFileAtomic(target: string, content: string, mode?: number): Promise<void> {
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.tmp.${String(process.pid)}.${String(Date.now())}`
  );

  try {
    await fs.writeFile(tempPath, content, { encoding: 'utf-8' });
    if (mode !== undefined) {
      await fs.chmod(tempPath, mode & 0o7777);
    }
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
