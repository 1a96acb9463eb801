/**
 * CLI Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CLILogger, formatDuration } from '../../../cli/lib/logger.js';

describe('CLILogger', () => {
  const spies = {
    debug: vi.spyOn(console, 'debug'),
    info: vi.spyOn(console, 'info'),
    warn: vi.spyOn(console, 'warn'),
    error: vi.spyOn(console, 'error'),
  };

  beforeEach(() => {
    for (const spy of Object.values(spies)) {
      spy.mockImplementation(() => undefined);
    }
  });

  afterEach(() => {
    for (const spy of Object.values(spies)) {
      spy.mockReset();
    }
  });

  it('should drop entries below the configured level', () => {
    const logger = new CLILogger({ level: 'warn', json: false, color: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(spies.debug).not.toHaveBeenCalled();
    expect(spies.info).not.toHaveBeenCalled();
    expect(spies.warn).toHaveBeenCalledTimes(1);
  });

  it('should write human-readable lines with metadata', () => {
    const logger = new CLILogger({ level: 'info', json: false, color: false });

    logger.error('Error processing file a.tsv', { error: 'boom', files: ['a', 'b'] });

    const line = String(spies.error.mock.calls[0]?.[0]);
    expect(line).toMatch(
      /^\d{4}-\d{2}-\d{2}T[\d:.]+Z ERROR Error processing file a\.tsv \(error=boom files=\["a","b"\]\)$/
    );
  });

  it('should write JSON lines with command context', () => {
    const logger = new CLILogger({ level: 'info', json: true });

    logger.commandStart('analyze', { dataDir: 'data' });
    logger.info('Scanning', { files: 2 });

    const entries = spies.info.mock.calls.map((call): unknown => JSON.parse(String(call[0])));
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'Starting analyze',
      service: 'feature-audit',
      command: 'analyze',
      dataDir: 'data',
    });
    expect(entries[1]).toMatchObject({ message: 'Scanning', command: 'analyze', files: 2 });
  });

  it('should report a failed command as a warning', () => {
    const logger = new CLILogger({ level: 'info', json: true });

    logger.commandEnd(false, { reports: 3 });

    const entry: unknown = JSON.parse(String(spies.warn.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'warn',
      message: 'Analysis completed with errors',
      reports: 3,
    });
  });
});

describe('formatDuration', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(125000)).toBe('2m 5.0s');
  });
});
