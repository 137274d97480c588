import { CATALOG, type CatalogEntry } from './catalog';

export interface AvailableSource {
  variableName: string;
  units: string;
  dataSource: string;
  variable: string;
  temporalResolution: string;
  aggregation: string;
  depthLevel: number | null;
}

export function listAvailableSources(catalog: readonly CatalogEntry[] = CATALOG): AvailableSource[] {
  return catalog.map((entry) => ({
    variableName: entry.variableName,
    units: entry.units,
    dataSource: entry.dataSource,
    variable: entry.variable,
    temporalResolution: entry.temporalResolution,
    aggregation: entry.aggregation,
    depthLevel: entry.depthLevel
  }));
}

const HEADERS = [
  'variable_name',
  'units',
  'data_source',
  'variable',
  'temporal_resolution',
  'aggregation',
  'depth_level'
] as const;

const cells = (source: AvailableSource): string[] => [
  source.variableName,
  source.units,
  source.dataSource,
  source.variable,
  source.temporalResolution,
  source.aggregation,
  source.depthLevel === null ? '' : String(source.depthLevel)
];

/** Renders the availability listing as an aligned plain-text table. */
export function formatAvailableSources(sources: readonly AvailableSource[]): string {
  const body = sources.map(cells);
  const widths = HEADERS.map((header, column) =>
    Math.max(header.length, ...body.map((row) => row[column].length))
  );
  const render = (row: readonly string[]) =>
    row
      .map((cell, column) => cell.padEnd(widths[column]))
      .join('  ')
      .trimEnd();
  return [render(HEADERS), ...body.map(render)].join('\n');
}
