/**
 * Test Fixtures
 *
 * Temporary directories and a recording logger shared by the unit tests.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Logger, LogLevel, LogMetadata } from '../../core/utils/logger.js';

export interface RecordedLog {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata?: LogMetadata;
}

export interface RecordingLogger extends Logger {
  readonly entries: RecordedLog[];
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: RecordedLog[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, metadata?: LogMetadata): void => {
      entries.push({ level, message, metadata });
    };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    messages: (level) =>
      entries.filter((entry) => entry.level === level).map((entry) => entry.message),
  };
}

export interface TempWorkspace {
  readonly root: string;
  path(...segments: string[]): string;
  write(relativePath: string, content: string | Uint8Array): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(): Promise<TempWorkspace> {
  const root = await mkdtemp(join(tmpdir(), 'feature-audit-'));

  return {
    root,
    path: (...segments) => join(root, ...segments),
    async write(relativePath, content) {
      const filePath = join(root, relativePath);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content);
      return filePath;
    },
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

/**
 * Build a reference-table CSV with the 11 positional columns filled in
 *
 * Each row is [rawName, classification, canonicalName].
 */
export function referenceCsv(rows: ReadonlyArray<readonly [string, string, string]>): string {
  const header = [
    'name',
    'description',
    'source',
    'priority',
    'c4',
    'c5',
    'c6',
    'c7',
    'c8',
    'c9',
    'property',
  ].join(',');

  const lines = rows.map(([rawName, classification, canonicalName]) =>
    [rawName, 'desc', 'src', classification, '', '', '', '', '', '', canonicalName].join(',')
  );
  return [header, ...lines].join('\n') + '\n';
}
