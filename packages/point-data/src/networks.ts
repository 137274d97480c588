import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { CatalogEntry } from './catalog';
import type { ResolvedArchive } from './archive';
import { ArchiveUnavailableError, UnsupportedNetworkError, describeError } from './errors';

export const SITE_NETWORKS: Readonly<Record<string, Readonly<Record<string, readonly string[]>>>> = {
  usgs_nwis: {
    streamflow: ['camels', 'gagesii_reference', 'gagesii', 'hcdn2009'],
    wtd: ['climate_response_network']
  }
};

export function availableNetworks(dataSource: string, variable: string): readonly string[] {
  return SITE_NETWORKS[dataSource]?.[variable] ?? [];
}

export function assertNetworksSupported(entry: CatalogEntry, networks: readonly string[]): void {
  const allowed = availableNetworks(entry.dataSource, entry.variable);
  for (const network of networks) {
    if (!allowed.includes(network)) {
      throw new UnsupportedNetworkError(network, entry.dataSource, entry.variable, allowed);
    }
  }
}

export function networkListPath(
  archive: ResolvedArchive,
  entry: CatalogEntry,
  network: string
): string {
  return path.join(archive.root, 'network_lists', entry.dataSource, entry.variable, `${network}.csv`);
}

/**
 * Reads the member site ids of each named network (one id per line, first
 * column) and returns their union.
 */
export async function loadNetworkSiteIds(
  archive: ResolvedArchive,
  entry: CatalogEntry,
  networks: readonly string[]
): Promise<Set<string>> {
  assertNetworksSupported(entry, networks);

  const siteIds = new Set<string>();
  for (const network of networks) {
    const listPath = networkListPath(archive, entry, network);
    let content: string;
    try {
      content = await readFile(listPath, 'utf8');
    } catch (error) {
      throw new ArchiveUnavailableError(listPath, describeError(error));
    }

    for (const line of content.split(/\r?\n/)) {
      const siteId = line.split(',')[0]?.trim();
      if (siteId) {
        siteIds.add(siteId);
      }
    }
  }
  return siteIds;
}
