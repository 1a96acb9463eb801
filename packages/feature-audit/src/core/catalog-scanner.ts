/**
 * Catalog Scanner
 *
 * Harvests the header row of every `.tsv` file in a directory without
 * loading the rest of the file.
 *
 * @module core/catalog-scanner
 */

import { open, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { Catalog } from './types.js';
import { describeError, logger as defaultLogger, type Logger } from './utils/logger.js';

export const DATA_FILE_EXTENSION = '.tsv';

const HEADER_CHUNK_BYTES = 64 * 1024;
const LINE_FEED = 0x0a;

/**
 * Read bytes up to the first line feed and decode them as UTF-8
 *
 * A leading BOM is dropped by the decoder; invalid UTF-8 throws.
 */
export async function readFirstLine(filePath: string): Promise<string> {
  const handle = await open(filePath, 'r');
  try {
    const chunks: Buffer[] = [];
    let position = 0;

    for (;;) {
      const buffer = Buffer.alloc(HEADER_CHUNK_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
      if (bytesRead === 0) break;

      const chunk = buffer.subarray(0, bytesRead);
      const newline = chunk.indexOf(LINE_FEED);
      if (newline !== -1) {
        chunks.push(chunk.subarray(0, newline));
        break;
      }
      chunks.push(chunk);
      position += bytesRead;
    }

    return new TextDecoder('utf-8', { fatal: true }).decode(Buffer.concat(chunks));
  } finally {
    await handle.close();
  }
}

/**
 * Split a header line into column names
 */
export function parseHeaderLine(line: string): string[] {
  return line.trim().split('\t');
}

/**
 * List data files in a directory, sorted by name
 *
 * Hidden files are skipped, as a shell glob would. Symbolic links are
 * listed without being followed; a broken one fails when it is read.
 */
export async function listDataFiles(dataDir: string): Promise<string[]> {
  const entries = await readdir(dataDir, { withFileTypes: true });
  return entries
    .filter(
      (entry) =>
        (entry.isFile() || entry.isSymbolicLink()) &&
        !entry.name.startsWith('.') &&
        extname(entry.name) === DATA_FILE_EXTENSION
    )
    .map((entry) => entry.name)
    .sort();
}

/**
 * Build the per-file column catalog for a data directory
 *
 * Unreadable files are logged and skipped; an unreadable directory gives
 * an empty catalog.
 */
export async function scanCatalog(
  dataDir: string,
  log: Logger = defaultLogger
): Promise<Catalog> {
  log.info(`Scanning tsv files in ${dataDir} directory...`);
  const catalog = new Map<string, readonly string[]>();

  let fileNames: string[];
  try {
    fileNames = await listDataFiles(dataDir);
  } catch (error) {
    log.error('Error getting node features', { path: dataDir, error: describeError(error) });
    return catalog;
  }

  for (const fileName of fileNames) {
    log.debug(`Processing file: ${fileName}`);
    try {
      const header = await readFirstLine(join(dataDir, fileName));
      catalog.set(fileName, parseHeaderLine(header));
    } catch (error) {
      log.error(`Error processing file ${fileName}`, { error: describeError(error) });
    }
  }

  log.info(`Successfully processed ${catalog.size} tsv files`);
  return catalog;
}
