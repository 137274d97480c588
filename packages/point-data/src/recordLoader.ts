import { readFile, stat } from 'node:fs/promises';

import { recordFileName, type CatalogEntry, type FileStorage, type TableStorage } from './catalog';
import { resolveArchivePath, withIndexDatabase, type ResolvedArchive } from './archive';
import {
  QueryAbortedError,
  RecordFileCorruptError,
  RecordFileMissingError,
  RecordFileTooLargeError
} from './errors';
import type { ObservationRecord, SiteRecord } from './schema';
import { isWithinWindow, toEpochMillis, type TimeWindow } from './timestamps';

export const DEFAULT_MAX_RECORD_FILE_BYTES = 256 * 1024 * 1024;

export interface LoadRecordsOptions {
  window: TimeWindow;
  minNumObs: number;
  maxRecordFileBytes?: number;
  signal?: AbortSignal;
  /** Records already read for table-backed entries, keyed by site id. */
  tableRecords?: ReadonlyMap<string, RawRecord[]>;
}

export interface RawRecord {
  timestamp: string;
  value: number;
  extras?: Record<string, string | null>;
}

class RecordParseError extends Error {}

const unquote = (cell: string): string => {
  const trimmed = cell.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/""/g, '"');
  }
  return trimmed;
};

const parseValue = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return null;
  }
  const cell = unquote(raw);
  if (cell.length === 0) {
    return null;
  }
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
};

/**
 * Parses a per-site record file. The first column holds the timestamp; the
 * value comes from `valueField` when the header names it. A two-column file
 * may name its value column differently; a wider one must carry `valueField`.
 * Rows without a numeric value are gaps, not observations.
 */
export function parseRecordFile(content: string, valueField: string): RawRecord[] {
  const lines = content.split(/\r?\n/);
  let headerIndex = lines.findIndex((line) => line.trim().length > 0);
  if (headerIndex < 0) {
    return [];
  }

  const header = lines[headerIndex].split(',').map(unquote);
  if (header.length < 2) {
    throw new RecordParseError('expected a timestamp column and a value column');
  }
  const named = header.indexOf(valueField);
  if (named <= 0 && header.length > 2) {
    throw new RecordParseError(`no '${valueField}' column`);
  }
  const valueIndex = named > 0 ? named : 1;

  const records: RawRecord[] = [];
  for (headerIndex += 1; headerIndex < lines.length; headerIndex += 1) {
    const line = lines[headerIndex];
    if (line.trim().length === 0) {
      continue;
    }
    const cells = line.split(',');
    const timestamp = unquote(cells[0] ?? '');
    if (toEpochMillis(timestamp) === null) {
      throw new RecordParseError(`line ${headerIndex + 1} has an unreadable timestamp '${timestamp}'`);
    }
    const value = parseValue(cells[valueIndex]);
    if (value !== null) {
      records.push({ timestamp, value });
    }
  }
  return records;
}

async function readSiteFile(
  archive: ResolvedArchive,
  entry: CatalogEntry,
  storage: FileStorage,
  site: SiteRecord,
  options: LoadRecordsOptions
): Promise<RawRecord[]> {
  const relative = site.filePath ?? recordFileName(entry, site.siteId) ?? site.siteId;
  const filePath = resolveArchivePath(archive, relative);
  const limit = options.maxRecordFileBytes ?? DEFAULT_MAX_RECORD_FILE_BYTES;

  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new RecordFileMissingError(site.siteId, filePath);
    }
    size = info.size;
  } catch (error) {
    if (error instanceof RecordFileMissingError) {
      throw error;
    }
    throw new RecordFileMissingError(site.siteId, filePath);
  }
  if (size > limit) {
    throw new RecordFileTooLargeError(site.siteId, filePath, size, limit);
  }

  let content: string;
  try {
    content = await readFile(filePath, { encoding: 'utf8', signal: options.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new QueryAbortedError();
    }
    throw new RecordFileMissingError(site.siteId, filePath);
  }

  try {
    return parseRecordFile(content, storage.valueField);
  } catch (error) {
    if (error instanceof RecordParseError) {
      throw new RecordFileCorruptError(site.siteId, filePath, error.message);
    }
    throw error;
  }
}

type DiscreteRow = Record<string, string | number | null>;

// Stays well below SQLite's bound-parameter limit.
const TABLE_SITE_BATCH = 500;

/**
 * Reads the table-backed records of every listed site with a single index
 * connection, grouped by site id in table order.
 */
export function readTableRecords(
  archive: ResolvedArchive,
  storage: TableStorage,
  siteIds: readonly string[]
): Map<string, RawRecord[]> {
  const grouped = new Map<string, RawRecord[]>();
  if (siteIds.length === 0) {
    return grouped;
  }

  const columns = ['site_id', storage.dateColumn, storage.valueColumn, ...storage.extraColumns];
  return withIndexDatabase(archive, (db) => {
    for (let offset = 0; offset < siteIds.length; offset += TABLE_SITE_BATCH) {
      const batch = siteIds.slice(offset, offset + TABLE_SITE_BATCH);
      const placeholders = batch.map(() => '?').join(', ');
      const rows = db
        .prepare(
          `SELECT ${columns.join(', ')} FROM ${storage.table} WHERE site_id IN (${placeholders}) ORDER BY rowid ASC`
        )
        .all(...batch) as DiscreteRow[];

      for (const row of rows) {
        const rawValue = row[storage.valueColumn];
        const value = typeof rawValue === 'number' ? rawValue : parseValue(rawValue ?? undefined);
        const timestamp = row[storage.dateColumn];
        if (value === null || timestamp === null || timestamp === undefined) {
          continue;
        }
        const extras: Record<string, string | null> = {};
        for (const column of storage.extraColumns) {
          const extra = row[column];
          extras[column] = extra === null || extra === undefined ? null : String(extra);
        }
        const siteId = String(row.site_id);
        const records = grouped.get(siteId) ?? [];
        records.push({ timestamp: String(timestamp), value, extras });
        grouped.set(siteId, records);
      }
    }
    return grouped;
  });
}

/**
 * Loads one site's observations inside the window. Returns null when fewer
 * than `minNumObs` records fall in the window; that site is then excluded
 * from the observations and the metadata alike.
 */
export async function loadRecords(
  archive: ResolvedArchive,
  entry: CatalogEntry,
  site: SiteRecord,
  options: LoadRecordsOptions
): Promise<ObservationRecord[] | null> {
  if (options.signal?.aborted) {
    throw new QueryAbortedError();
  }

  let raw: RawRecord[];
  if (entry.storage.kind === 'file') {
    raw = await readSiteFile(archive, entry, entry.storage, site, options);
  } else {
    const tableRecords = options.tableRecords ?? readTableRecords(archive, entry.storage, [site.siteId]);
    raw = tableRecords.get(site.siteId) ?? [];
  }

  const observations: ObservationRecord[] = [];
  for (const record of raw) {
    const at = toEpochMillis(record.timestamp);
    if (at === null || !isWithinWindow(at, options.window)) {
      continue;
    }
    const observation: ObservationRecord = { siteId: site.siteId, timestamp: record.timestamp, value: record.value };
    if (record.extras) {
      observation.extras = record.extras;
    }
    observations.push(observation);
  }

  return observations.length >= options.minNumObs ? observations : null;
}
