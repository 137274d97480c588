import type {
  MetadataRow,
  MetadataTable,
  ObservationOrder,
  ObservationRecord,
  PointDataResult,
  SiteRecord
} from './schema';
import { toEpochMillis } from './timestamps';

export const METADATA_COLUMNS = [
  'site_id',
  'site_name',
  'site_type',
  'agency',
  'state',
  'latitude',
  'longitude',
  'var_id',
  'first_date_data_available',
  'last_date_data_available',
  'record_count',
  'file_path'
] as const;

export interface LoadedSite {
  site: SiteRecord;
  observations: ObservationRecord[];
}

export interface AssembleOptions {
  returnMetadata: boolean;
  allAttributes: boolean;
  order?: ObservationOrder;
}

function metadataRow(site: SiteRecord, allAttributes: boolean): MetadataRow {
  const row: MetadataRow = {
    site_id: site.siteId,
    site_name: site.siteName,
    site_type: site.siteType,
    agency: site.agency,
    state: site.state,
    latitude: site.latitude,
    longitude: site.longitude,
    var_id: site.varId,
    first_date_data_available: site.firstDateDataAvailable,
    last_date_data_available: site.lastDateDataAvailable,
    record_count: site.recordCount,
    file_path: site.filePath
  };
  if (allAttributes) {
    for (const [column, value] of Object.entries(site.attributes)) {
      if (!(column in row)) {
        row[column] = value;
      }
    }
  }
  return row;
}

function attributeColumns(sites: readonly SiteRecord[]): string[] {
  const reserved = new Set<string>(METADATA_COLUMNS);
  const extra: string[] = [];
  for (const site of sites) {
    for (const column of Object.keys(site.attributes)) {
      if (!reserved.has(column)) {
        reserved.add(column);
        extra.push(column);
      }
    }
  }
  return extra;
}

export function buildMetadataTable(sites: readonly SiteRecord[], allAttributes: boolean): MetadataTable {
  const columns: string[] = [...METADATA_COLUMNS];
  if (allAttributes) {
    columns.push(...attributeColumns(sites));
  }
  const rows = sites.map((site) => {
    const row = metadataRow(site, allAttributes);
    for (const column of columns) {
      if (!(column in row)) {
        row[column] = null;
      }
    }
    return row;
  });
  return { columns, rows };
}

const compareObservations = (left: ObservationRecord, right: ObservationRecord): number => {
  if (left.siteId !== right.siteId) {
    return left.siteId < right.siteId ? -1 : 1;
  }
  const leftAt = toEpochMillis(left.timestamp);
  const rightAt = toEpochMillis(right.timestamp);
  if (leftAt !== null && rightAt !== null) {
    return leftAt - rightAt;
  }
  if (left.timestamp === right.timestamp) {
    return 0;
  }
  return left.timestamp < right.timestamp ? -1 : 1;
};

/**
 * Joins the per-site tables in site order. Chronological order sorts by
 * (site id, timestamp); Array#sort is stable, so ties keep load order.
 */
export function assembleResult(loaded: readonly LoadedSite[], options: AssembleOptions): PointDataResult {
  const observations = loaded.flatMap((entry) => entry.observations);
  if (options.order === 'chronological') {
    observations.sort(compareObservations);
  }

  const metadata = options.returnMetadata
    ? buildMetadataTable(
        loaded.map((entry) => entry.site),
        options.allAttributes
      )
    : null;

  return { observations, metadata };
}
