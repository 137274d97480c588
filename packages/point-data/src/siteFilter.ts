import { InvalidRangeError } from './errors';
import type { Range, SiteRecord } from './schema';
import { buildTimeWindow, toEpochMillis, type TimeWindow } from './timestamps';

export interface SiteFilterCriteria {
  latitudeRange?: Range;
  longitudeRange?: Range;
  siteIds?: readonly string[];
  state?: readonly string[];
  /** Union of the member ids of the requested site networks. */
  networkSiteIds?: ReadonlySet<string>;
  dateStart?: string;
  dateEnd?: string;
}

type SitePredicate = (site: SiteRecord) => boolean;

export function assertValidCriteria(criteria: SiteFilterCriteria): void {
  const ranges: Array<[string, Range | undefined]> = [
    ['latitude_range', criteria.latitudeRange],
    ['longitude_range', criteria.longitudeRange]
  ];
  for (const [field, range] of ranges) {
    if (range && range[0] > range[1]) {
      throw new InvalidRangeError(field, range[0], range[1]);
    }
  }

  if (criteria.dateStart !== undefined && criteria.dateEnd !== undefined) {
    const window = buildTimeWindow(criteria.dateStart, criteria.dateEnd);
    if (window.start !== null && window.end !== null && window.start > window.end) {
      throw new InvalidRangeError('date', criteria.dateStart, criteria.dateEnd);
    }
  }
}

const withinRange = (value: number | null, [min, max]: Range): boolean =>
  value !== null && value >= min && value <= max;

// A site whose availability cannot intersect the window has no records to load.
const overlapsWindow = (site: SiteRecord, window: TimeWindow): boolean => {
  if (window.start !== null && site.lastDateDataAvailable) {
    const last = toEpochMillis(site.lastDateDataAvailable, 'end');
    if (last !== null && last < window.start) {
      return false;
    }
  }
  if (window.end !== null && site.firstDateDataAvailable) {
    const first = toEpochMillis(site.firstDateDataAvailable, 'start');
    if (first !== null && first > window.end) {
      return false;
    }
  }
  return true;
};

export function buildSitePredicates(criteria: SiteFilterCriteria): SitePredicate[] {
  const predicates: SitePredicate[] = [];
  const { latitudeRange, longitudeRange, siteIds, state, networkSiteIds } = criteria;

  if (latitudeRange) {
    predicates.push((site) => withinRange(site.latitude, latitudeRange));
  }
  if (longitudeRange) {
    predicates.push((site) => withinRange(site.longitude, longitudeRange));
  }
  if (siteIds) {
    const wanted = new Set(siteIds);
    predicates.push((site) => wanted.has(site.siteId));
  }
  if (state) {
    const wanted = new Set(state.map((code) => code.trim().toUpperCase()));
    predicates.push((site) => site.state !== null && wanted.has(site.state.trim().toUpperCase()));
  }
  if (networkSiteIds) {
    predicates.push((site) => networkSiteIds.has(site.siteId));
  }
  if (criteria.dateStart !== undefined || criteria.dateEnd !== undefined) {
    const window = buildTimeWindow(criteria.dateStart, criteria.dateEnd);
    predicates.push((site) => overlapsWindow(site, window));
  }

  return predicates;
}

/**
 * Keeps the sites matching every provided criterion, in their original order.
 * Criteria are independent predicates, so the result does not depend on the
 * order they are applied in.
 */
export function filterSites(sites: readonly SiteRecord[], criteria: SiteFilterCriteria = {}): SiteRecord[] {
  assertValidCriteria(criteria);
  const predicates = buildSitePredicates(criteria);
  if (predicates.length === 0) {
    return [...sites];
  }
  return sites.filter((site) => predicates.every((predicate) => predicate(site)));
}
