import { resolveArchive, type ArchiveOptions } from './archive';
import { assembleResult, type LoadedSite } from './assembler';
import { CATALOG, resolveCatalogEntry, type CatalogEntry } from './catalog';
import { QueryAbortedError } from './errors';
import { silentLogger, type PointDataLogger } from './logger';
import { assertNetworksSupported, loadNetworkSiteIds } from './networks';
import { DEFAULT_LOAD_CONCURRENCY, mapWithConcurrency } from './pool';
import { loadRecords, readTableRecords } from './recordLoader';
import { parsePointDataQuery, type PointDataQueryInput, type PointDataResult } from './schema';
import { assertValidCriteria, filterSites, type SiteFilterCriteria } from './siteFilter';
import { listSites } from './siteIndex';
import { buildTimeWindow } from './timestamps';

export interface QueryOptions {
  archive?: ArchiveOptions;
  logger?: PointDataLogger;
  signal?: AbortSignal;
  /** Upper bound on record files read at once. */
  loadConcurrency?: number;
  maxRecordFileBytes?: number;
  catalog?: readonly CatalogEntry[];
}

export interface QueryStats {
  varId: number;
  indexedSites: number;
  candidateSites: number;
  loadedSites: number;
  skippedSites: number;
  observations: number;
}

export interface QueryOutcome {
  result: PointDataResult;
  stats: QueryStats;
}

const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new QueryAbortedError();
  }
};

/**
 * Runs a point data query and reports how many sites each stage kept.
 * Validation happens before the archive is touched.
 */
export async function runPointDataQuery(
  input: PointDataQueryInput,
  options: QueryOptions = {}
): Promise<QueryOutcome> {
  const logger = options.logger ?? silentLogger;
  const query = parsePointDataQuery(input);
  const entry = resolveCatalogEntry(query, options.catalog ?? CATALOG);

  const criteria: SiteFilterCriteria = {
    latitudeRange: query.latitudeRange,
    longitudeRange: query.longitudeRange,
    siteIds: query.siteIds,
    state: query.state,
    dateStart: query.dateStart,
    dateEnd: query.dateEnd
  };
  assertValidCriteria(criteria);
  if (query.siteNetworks) {
    assertNetworksSupported(entry, query.siteNetworks);
  }
  throwIfAborted(options.signal);

  const archive = resolveArchive(options.archive);
  const sites = listSites(archive, entry);
  if (query.siteNetworks) {
    criteria.networkSiteIds = await loadNetworkSiteIds(archive, entry, query.siteNetworks);
  }
  const candidates = filterSites(sites, criteria);
  logger.debug(
    { varId: entry.varId, indexedSites: sites.length, candidateSites: candidates.length },
    'point data sites resolved'
  );

  const window = buildTimeWindow(query.dateStart, query.dateEnd);
  const tableRecords =
    entry.storage.kind === 'table'
      ? readTableRecords(archive, entry.storage, candidates.map((site) => site.siteId))
      : undefined;
  const loaded = await mapWithConcurrency(
    candidates,
    options.loadConcurrency ?? DEFAULT_LOAD_CONCURRENCY,
    (site) =>
      loadRecords(archive, entry, site, {
        window,
        minNumObs: query.minNumObs,
        maxRecordFileBytes: options.maxRecordFileBytes,
        signal: options.signal,
        tableRecords
      }),
    options.signal
  );
  throwIfAborted(options.signal);

  const surviving: LoadedSite[] = [];
  loaded.forEach((observations, index) => {
    if (observations) {
      surviving.push({ site: candidates[index], observations });
    }
  });

  const result = assembleResult(surviving, {
    returnMetadata: query.returnMetadata,
    allAttributes: query.allAttributes,
    order: query.order
  });

  const stats: QueryStats = {
    varId: entry.varId,
    indexedSites: sites.length,
    candidateSites: candidates.length,
    loadedSites: surviving.length,
    skippedSites: candidates.length - surviving.length,
    observations: result.observations.length
  };
  logger.info(stats, 'point data query completed');

  return { result, stats };
}

export async function queryPointData(
  input: PointDataQueryInput,
  options: QueryOptions = {}
): Promise<PointDataResult> {
  const { result } = await runPointDataQuery(input, options);
  return result;
}
