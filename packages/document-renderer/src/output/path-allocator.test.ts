import type { LoggerMethods } from '@quillkit/logger';

import { mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  PathAllocator,
  formatFileTimestamp,
  sanitizeBaseName,
} from './path-allocator';

const FIXED_NOW = new Date(2024, 9, 23, 14, 30, 22);

describe('formatFileTimestamp', () => {
  test('formats local time with zero padding', () => {
    expect(formatFileTimestamp(FIXED_NOW)).toBe('2024-10-23_14-30-22');
    expect(formatFileTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe(
      '2025-01-02_03-04-05',
    );
  });
});

describe('sanitizeBaseName', () => {
  test('defaults to export', () => {
    expect(sanitizeBaseName()).toBe('export');
    expect(sanitizeBaseName('')).toBe('export');
    expect(sanitizeBaseName('   ')).toBe('export');
  });

  test('reduces a name to its stem', () => {
    expect(sanitizeBaseName('report.docx')).toBe('report');
    expect(sanitizeBaseName('../drafts/Q3 summary.pdf')).toBe('Q3 summary');
    expect(sanitizeBaseName('C:\\Users\\me\\notes.txt')).toBe('notes');
  });

  test('replaces characters that are unsafe in filenames', () => {
    expect(sanitizeBaseName('plan: v2?*')).toBe('plan_ v2__');
    expect(sanitizeBaseName('a<b>|c"d')).toBe('a_b__c_d');
  });

  test('falls back when only dots remain', () => {
    expect(sanitizeBaseName('..')).toBe('export');
  });
});

describe('PathAllocator', () => {
  let workDir: string;
  let mockLogger: LoggerMethods;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'quillkit-paths-'));
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  function createAllocator(directory = workDir): PathAllocator {
    return new PathAllocator(mockLogger, { directory, now: () => FIXED_NOW });
  }

  test('reserves a timestamped path per document kind', async () => {
    const allocator = createAllocator();

    const wordPath = await allocator.allocatePath('word');
    const pdfPath = await allocator.allocatePath('pdf', 'report');

    expect(wordPath).toBe(join(workDir, 'export_2024-10-23_14-30-22.docx'));
    expect(pdfPath).toBe(join(workDir, 'report_2024-10-23_14-30-22.pdf'));
    expect((await stat(wordPath)).size).toBe(0);
  });

  test('creates the output directory when missing', async () => {
    const directory = join(workDir, 'nested', 'exports');

    const path = await createAllocator(directory).allocatePath('word');

    expect(path).toBe(join(directory, 'export_2024-10-23_14-30-22.docx'));
  });

  test('appends a counter when the name is taken', async () => {
    await writeFile(join(workDir, 'export_2024-10-23_14-30-22.docx'), 'old');
    const allocator = createAllocator();

    const first = await allocator.allocatePath('word');
    const second = await allocator.allocatePath('word');

    expect(basename(first)).toBe('export_2024-10-23_14-30-22_1.docx');
    expect(basename(second)).toBe('export_2024-10-23_14-30-22_2.docx');
  });

  test('hands out distinct paths to concurrent allocations', async () => {
    const allocator = createAllocator();

    const paths = await Promise.all(
      Array.from({ length: 10 }, () => allocator.allocatePath('pdf')),
    );

    expect(new Set(paths).size).toBe(10);
    expect((await readdir(workDir)).sort()).toEqual(
      paths.map((path) => basename(path)).sort(),
    );
  });

  test('propagates errors other than an existing file', async () => {
    const blocker = join(workDir, 'not-a-dir');
    await writeFile(blocker, '');

    await expect(
      createAllocator(join(blocker, 'exports')).allocatePath('word'),
    ).rejects.toThrow(/EEXIST|ENOTDIR/);
  });

  test('release removes the reserved file and tolerates a missing one', async () => {
    const allocator = createAllocator();
    const path = await allocator.allocatePath('word');

    await allocator.release(path);
    await allocator.release(path);

    expect(await readdir(workDir)).toEqual([]);
  });
});
