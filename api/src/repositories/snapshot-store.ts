/**
 * Snapshot Store
 * @module repositories/snapshot-store
 *
 * File-backed storage of baseline snapshots under
 * `<rootDir>/<scopeFolder>/<operationFolder>/<file>.json`.
 */

import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type Snapshot, isSnapshot } from '../types/snapshot.js';
import { InvalidInputError, SnapshotNotFoundError, SnapshotStoreError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { type Result, ok, err } from '../utils/result.js';

// ============================================================================
// Types
// ============================================================================

export type SnapshotStoreFailure = InvalidInputError | SnapshotNotFoundError | SnapshotStoreError;

export interface ISnapshotStore {
  /**
   * Write a snapshot to a timestamped file and return the file name
   */
  save(
    scopeFolder: string,
    operationFolder: string,
    baseName: string,
    snapshot: Snapshot,
    now?: Date
  ): Promise<Result<string, SnapshotStoreFailure>>;

  load(scopeFolder: string, operationFolder: string, fileName: string): Promise<Result<Snapshot, SnapshotStoreFailure>>;

  /**
   * Sorted names of the .json files in an operation folder
   */
  list(scopeFolder: string, operationFolder: string): Promise<Result<string[], SnapshotStoreFailure>>;
}

export interface SnapshotStoreOptions {
  readonly logger?: StructuredLogger;
}

const JSON_EXTENSION = '.json';
const JSON_INDENT = 4;

// ============================================================================
// Naming
// ============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `<baseName>-YYYY-MM-DD_HH-MM-SS.json` in local time
 */
export function timestampedFileName(baseName: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `${baseName}-${date}_${time}${JSON_EXTENSION}`;
}

function validateSegment(segment: string, label: string): InvalidInputError | null {
  if (segment.length === 0 || segment.includes('/') || segment.includes('\\') || segment.includes('..')) {
    return new InvalidInputError(`Invalid ${label}: '${segment}'`, { details: { [label]: segment } });
  }
  return null;
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ============================================================================
// Implementation
// ============================================================================

export class FileSnapshotStore implements ISnapshotStore {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly rootDir: string,
    options: SnapshotStoreOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('snapshot-store');
  }

  async save(
    scopeFolder: string,
    operationFolder: string,
    baseName: string,
    snapshot: Snapshot,
    now: Date = new Date()
  ): Promise<Result<string, SnapshotStoreFailure>> {
    const folder = this.resolveFolder(scopeFolder, operationFolder);
    if (folder instanceof InvalidInputError) {
      return err(folder);
    }

    const fileName = timestampedFileName(baseName, now);
    const invalidName = validateSegment(fileName, 'fileName');
    if (invalidName) {
      return err(invalidName);
    }

    const location = join(folder, fileName);
    const content = JSON.stringify(snapshot, null, JSON_INDENT);

    try {
      await mkdir(folder, { recursive: true });
      await writeFile(location, content, 'utf-8');
    } catch (error) {
      return err(
        new SnapshotStoreError(`Failed to save snapshot to ${location}`, {
          cause: error instanceof Error ? error : undefined,
        })
      );
    }

    this.logger.snapshotStored(location, Buffer.byteLength(content));
    return ok(fileName);
  }

  async load(
    scopeFolder: string,
    operationFolder: string,
    fileName: string
  ): Promise<Result<Snapshot, SnapshotStoreFailure>> {
    const folder = this.resolveFolder(scopeFolder, operationFolder);
    if (folder instanceof InvalidInputError) {
      return err(folder);
    }
    const invalidName = validateSegment(fileName, 'fileName');
    if (invalidName) {
      return err(invalidName);
    }

    const location = join(folder, fileName);
    let content: string;
    try {
      content = await readFile(location, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return err(new SnapshotNotFoundError(location));
      }
      return err(
        new SnapshotStoreError(`Failed to read snapshot ${location}`, {
          cause: error instanceof Error ? error : undefined,
        })
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return err(
        new SnapshotStoreError(`Malformed JSON in snapshot ${location}`, {
          cause: error instanceof Error ? error : undefined,
        })
      );
    }

    if (!isSnapshot(parsed)) {
      return err(new SnapshotStoreError(`Snapshot ${location} holds a non-JSON value`));
    }

    this.logger.snapshotLoaded(location);
    return ok(parsed);
  }

  async list(scopeFolder: string, operationFolder: string): Promise<Result<string[], SnapshotStoreFailure>> {
    const folder = this.resolveFolder(scopeFolder, operationFolder);
    if (folder instanceof InvalidInputError) {
      return err(folder);
    }

    try {
      const entries = await readdir(folder);
      const files = entries.filter((entry) => entry.endsWith(JSON_EXTENSION)).sort();
      this.logger.debug({ folder, count: files.length }, 'Listed snapshot files');
      return ok(files);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.warn({ folder }, 'Snapshot folder does not exist, no files to list');
        return ok([]);
      }
      return err(
        new SnapshotStoreError(`Failed to list snapshots in ${folder}`, {
          cause: error instanceof Error ? error : undefined,
        })
      );
    }
  }

  private resolveFolder(scopeFolder: string, operationFolder: string): string | InvalidInputError {
    return (
      validateSegment(scopeFolder, 'scopeFolder') ??
      validateSegment(operationFolder, 'operationFolder') ??
      join(this.rootDir, scopeFolder, operationFolder)
    );
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createSnapshotStore(rootDir: string, options?: SnapshotStoreOptions): ISnapshotStore {
  return new FileSnapshotStore(rootDir, options);
}
