import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';

import { ArchiveUnavailableError, describeError } from './errors';

export const DEFAULT_ARCHIVE_ROOT = '/hydrodata/national_obs';
export const INDEX_DATABASE_FILENAME = 'point_obs.sqlite';

export interface ArchiveOptions {
  /** Directory holding the index database, record files and network lists. */
  root?: string;
  databasePath?: string;
}

export interface ResolvedArchive {
  root: string;
  databasePath: string;
}

export function resolveArchive(options: ArchiveOptions = {}): ResolvedArchive {
  const root = path.resolve(options.root ?? DEFAULT_ARCHIVE_ROOT);
  const databasePath = options.databasePath
    ? path.resolve(options.databasePath)
    : path.join(root, INDEX_DATABASE_FILENAME);
  return { root, databasePath };
}

export function resolveArchivePath(archive: ResolvedArchive, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(archive.root, filePath);
}

/**
 * Opens the site index read-only, runs `fn` and closes the handle again. Any
 * failure to open or query the database surfaces as ArchiveUnavailableError.
 */
export function withIndexDatabase<T>(archive: ResolvedArchive, fn: (db: SqliteDatabase) => T): T {
  let db: SqliteDatabase;
  try {
    db = new Database(archive.databasePath, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new ArchiveUnavailableError(archive.databasePath, describeError(error));
  }

  try {
    return fn(db);
  } catch (error) {
    if (error instanceof ArchiveUnavailableError) {
      throw error;
    }
    if (isSqliteError(error)) {
      throw new ArchiveUnavailableError(archive.databasePath, error.message);
    }
    throw error;
  } finally {
    db.close();
  }
}

function isSqliteError(error: unknown): error is { code: string; message: string } {
  return Boolean(
    error &&
      typeof error === 'object' &&
      'code' in error &&
      typeof (error as { code?: unknown }).code === 'string' &&
      (error as { code: string }).code.startsWith('SQLITE_')
  );
}

export function tableColumns(db: SqliteDatabase, table: string): Set<string> {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return new Set(rows.map((row) => row.name));
}
