import { resolveArchive, tableColumns, withIndexDatabase, type ArchiveOptions } from './archive';
import { DATA_SOURCES, type DataSource } from './catalog';
import { UnsupportedCombinationError } from './errors';

export const DATA_POLICIES: Readonly<Record<DataSource, string>> = {
  usgs_nwis: [
    'Most U.S. Geological Survey (USGS) information resides in the public domain and may be used without',
    'restriction, though proper credit is requested. An example credit statement would be:',
    '"(Product or data name) courtesy of the U.S. Geological Survey".',
    'Source: https://www.usgs.gov/information-policies-and-instructions/acknowledging-or-crediting-usgs'
  ].join('\n'),
  usda_nrcs: [
    'Most information presented on the USDA web site is considered public domain information. It may be',
    'freely distributed or copied, but use of appropriate byline/photo/image credits is requested.',
    'Attribution may be cited as: "U.S. Department of Agriculture".',
    'Source: https://www.usda.gov/policies-and-links'
  ].join('\n'),
  ameriflux: [
    'AmeriFlux sites follow the CC-BY-4.0 license: users may share and adapt the material for any purpose.',
    'Acknowledge the AmeriFlux data resource with: "Funding for the AmeriFlux data portal was provided by',
    'the U.S. Department of Energy Office of Science."',
    "Each AmeriFlux site used must also be cited with its data product DOI, available from the full",
    'metadata or by passing site ids to the citation lookup.',
    'Source: https://ameriflux.lbl.gov/data/data-policy/'
  ].join('\n')
};

export interface SiteDoi {
  siteId: string;
  doi: string | null;
}

export interface CitationInformation {
  dataSource: DataSource;
  policy: string;
  /** Present only when site ids were requested. */
  siteDois: SiteDoi[] | null;
}

export interface CitationOptions {
  siteIds?: readonly string[];
  archive?: ArchiveOptions;
}

const isDataSource = (value: string): value is DataSource =>
  (DATA_SOURCES as readonly string[]).includes(value);

export function getCitationInformation(dataSource: string, options: CitationOptions = {}): CitationInformation {
  if (!isDataSource(dataSource)) {
    throw new UnsupportedCombinationError({ data_source: dataSource });
  }

  const policy = DATA_POLICIES[dataSource];
  const siteIds = options.siteIds;
  if (!siteIds) {
    return { dataSource, policy, siteDois: null };
  }
  if (siteIds.length === 0) {
    return { dataSource, policy, siteDois: [] };
  }

  const archive = resolveArchive(options.archive);
  const siteDois = withIndexDatabase(archive, (db) => {
    const doiColumn = tableColumns(db, 'sites').has('doi') ? 'doi' : 'NULL';
    const placeholders = siteIds.map(() => '?').join(', ');
    const rows = db
      .prepare(`SELECT site_id, ${doiColumn} AS doi FROM sites WHERE site_id IN (${placeholders})`)
      .all(...siteIds) as Array<{ site_id: string | number; doi: string | null }>;
    const bySite = new Map(rows.map((row) => [String(row.site_id), row.doi]));
    return siteIds
      .filter((siteId) => bySite.has(siteId))
      .map((siteId) => ({ siteId, doi: bySite.get(siteId) ?? null }));
  });

  return { dataSource, policy, siteDois };
}
