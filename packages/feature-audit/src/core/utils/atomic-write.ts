/**
 * Atomic Write Utilities
 *
 * Report files are written to a temporary sibling and renamed into place,
 * so an interrupted run leaves either the previous report or the new one.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @param encoding - File encoding (default: 'utf-8')
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('reports/critical_features.csv', csv);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent runs from sharing a temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    // Temp file may not exist yet; the write error is what propagates
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}
