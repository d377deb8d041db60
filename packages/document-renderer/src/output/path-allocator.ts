import type { LoggerMethods } from '@quillkit/logger';

import { DOCUMENT_EXTENSIONS, type DocumentKind } from '@quillkit/model';
import { mkdir, open, rm } from 'node:fs/promises';
import { join, parse } from 'node:path';

const DEFAULT_BASE_NAME = 'export';
const MAX_SUFFIX = 9999;

// Reserved on at least one of the platforms we write to
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

export interface PathAllocatorOptions {
  /**
   * Output directory, created on first allocation
   */
  directory: string;

  /**
   * Clock used for the filename timestamp
   */
  now?: () => Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * `YYYY-MM-DD_HH-mm-ss` in local time
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * Reduce a user-supplied name to a safe filename stem. Falls back to
 * `export` when nothing usable is left.
 */
export function sanitizeBaseName(customName?: string): string {
  if (!customName) return DEFAULT_BASE_NAME;

  const stem = parse(customName.trim().replace(/\\/g, '/')).name;
  const safe = stem.replace(UNSAFE_FILENAME_CHARS, '_').trim();

  return safe === '' || /^\.+$/.test(safe) ? DEFAULT_BASE_NAME : safe;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Hands out unique output paths in one directory.
 *
 * Every path is reserved by creating the file exclusively, so two runs that
 * allocate in the same second get `name_<ts>.ext` and `name_<ts>_1.ext`.
 */
export class PathAllocator {
  private readonly directory: string;
  private readonly now: () => Date;

  constructor(
    private readonly logger: LoggerMethods,
    options: PathAllocatorOptions,
  ) {
    this.directory = options.directory;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reserve a new, empty file for a document of `kind`
   */
  async allocatePath(kind: DocumentKind, customName?: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });

    const stem = `${sanitizeBaseName(customName)}_${formatFileTimestamp(this.now())}`;
    const extension = DOCUMENT_EXTENSIONS[kind];

    for (let suffix = 0; suffix <= MAX_SUFFIX; suffix++) {
      const filename =
        suffix === 0
          ? `${stem}.${extension}`
          : `${stem}_${suffix}.${extension}`;
      const candidate = join(this.directory, filename);

      try {
        const handle = await open(candidate, 'wx');
        await handle.close();
        this.logger.debug(`[PathAllocator] Reserved ${candidate}`);
        return candidate;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }

    throw new Error(
      `No free filename for ${stem}.${extension} in ${this.directory}`,
    );
  }

  /**
   * Remove a reserved or partially written file
   */
  async release(path: string): Promise<void> {
    await rm(path, { force: true });
    this.logger.debug(`[PathAllocator] Released ${path}`);
  }
}
