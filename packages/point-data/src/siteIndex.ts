import { z } from 'zod';

import { recordFileName, type CatalogEntry } from './catalog';
import { tableColumns, withIndexDatabase, type ResolvedArchive } from './archive';
import { ArchiveUnavailableError } from './errors';
import type { SiteAttributeValue, SiteRecord } from './schema';

const text = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const coordinate = z
  .union([z.number(), z.string()])
  .nullable()
  .optional()
  .transform((value) => {
    if (value === null || value === undefined || value === '') {
      return null;
    }
    const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const siteRowSchema = z.object({
  site_id: z.union([z.string(), z.number()]).transform((value) => String(value)),
  site_name: text,
  site_type: text,
  agency: text,
  state: text,
  latitude: coordinate,
  longitude: coordinate,
  var_id: z.number().int(),
  first_date_data_available: text,
  last_date_data_available: text,
  record_count: z.number().int().nullable().transform((value) => value ?? 0),
  file_path: text
});

const CORE_COLUMNS = new Set(Object.keys(siteRowSchema.shape));

const toAttributeValue = (value: unknown): SiteAttributeValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return String(value);
};

function toSiteRecord(
  row: Record<string, unknown>,
  entry: CatalogEntry,
  databasePath: string
): SiteRecord {
  const parsed = siteRowSchema.safeParse(row);
  if (!parsed.success) {
    const siteId = typeof row.site_id === 'string' ? row.site_id : String(row.site_id ?? '<unknown>');
    const issue = parsed.error.issues[0];
    throw new ArchiveUnavailableError(
      databasePath,
      `site index row for ${siteId} is malformed (${issue?.path.join('.') ?? 'row'}: ${issue?.message ?? 'invalid'})`
    );
  }

  const data = parsed.data;
  const attributes: Record<string, SiteAttributeValue> = {};
  for (const [column, value] of Object.entries(row)) {
    if (!CORE_COLUMNS.has(column)) {
      attributes[column] = toAttributeValue(value);
    }
  }

  return {
    siteId: data.site_id,
    siteName: data.site_name,
    siteType: data.site_type,
    agency: data.agency,
    state: data.state,
    latitude: data.latitude,
    longitude: data.longitude,
    varId: data.var_id,
    firstDateDataAvailable: data.first_date_data_available,
    lastDateDataAvailable: data.last_date_data_available,
    recordCount: data.record_count,
    filePath: data.file_path && data.file_path.length > 0 ? data.file_path : recordFileName(entry, data.site_id),
    attributes
  };
}

/**
 * Lists every site the index holds for the catalog entry, in index order.
 * Sites registered for the variable but without any data
 * (`first_date_data_available` empty or 'None') are not candidates.
 */
export function listSites(archive: ResolvedArchive, entry: CatalogEntry): SiteRecord[] {
  return withIndexDatabase(archive, (db) => {
    const observationColumns = tableColumns(db, 'observations');
    if (observationColumns.size === 0) {
      throw new ArchiveUnavailableError(archive.databasePath, 'site index has no observations table');
    }
    const filePathColumn = observationColumns.has('file_path') ? 'o.file_path' : 'NULL';

    const rows = db
      .prepare(
        `SELECT s.*, o.var_id AS var_id,
                o.first_date_data_available AS first_date_data_available,
                o.last_date_data_available AS last_date_data_available,
                o.record_count AS record_count,
                ${filePathColumn} AS file_path
         FROM observations o
         INNER JOIN sites s ON s.site_id = o.site_id
         WHERE o.var_id = ?
           AND o.first_date_data_available IS NOT NULL
           AND o.first_date_data_available <> 'None'
         ORDER BY o.rowid ASC`
      )
      .all(entry.varId) as Array<Record<string, unknown>>;

    return rows.map((row) => toSiteRecord(row, entry, archive.databasePath));
  });
}
