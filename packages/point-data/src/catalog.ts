import { InvalidDepthError, MissingDepthError, UnsupportedCombinationError } from './errors';

export const DATA_SOURCES = ['usgs_nwis', 'usda_nrcs', 'ameriflux'] as const;
export type DataSource = (typeof DATA_SOURCES)[number];

export const TEMPORAL_RESOLUTIONS = ['hourly', 'daily', 'instantaneous'] as const;
export type TemporalResolution = (typeof TEMPORAL_RESOLUTIONS)[number];

export const AGGREGATIONS = [
  'average',
  'instantaneous',
  'total',
  'total, snow-adjusted',
  'start-of-day',
  'accumulated',
  'minimum',
  'maximum'
] as const;
export type Aggregation = (typeof AGGREGATIONS)[number];

export const SOIL_MOISTURE = 'soil moisture';

export const DEPTH_LEVELS = [2, 4, 8, 20, 40] as const;
export type DepthLevel = (typeof DEPTH_LEVELS)[number];

/** Timestamps of hourly series are UTC; daily and discrete series use the site's local clock. */
export type TimeConvention = 'utc' | 'local';

export interface FileStorage {
  kind: 'file';
  /** Directory under the archive root holding one file per site. */
  directory: string;
  fileExtension: string;
  /** Column of the record file that carries the observed value. */
  valueField: string;
}

export interface TableStorage {
  kind: 'table';
  table: string;
  dateColumn: string;
  valueColumn: string;
  extraColumns: readonly string[];
}

export type RecordStorage = FileStorage | TableStorage;

export interface CatalogEntry {
  varId: number;
  dataSource: DataSource;
  variable: string;
  temporalResolution: TemporalResolution;
  aggregation: Aggregation;
  depthLevel: DepthLevel | null;
  variableName: string;
  units: string;
  timeConvention: TimeConvention;
  storage: RecordStorage;
}

export interface CatalogKey {
  dataSource: string;
  variable: string;
  temporalResolution: string;
  aggregation: string;
  depthLevel?: number | null;
}

type EntryShape = Omit<CatalogEntry, 'storage' | 'depthLevel' | 'timeConvention'> & {
  depthLevel?: DepthLevel;
};

const perSiteFiles = (shape: EntryShape, directory: string, valueField: string): CatalogEntry => ({
  ...shape,
  depthLevel: shape.depthLevel ?? null,
  timeConvention: shape.temporalResolution === 'hourly' ? 'utc' : 'local',
  storage: { kind: 'file', directory, fileExtension: '.csv', valueField }
});

const soilMoisture = (varId: number, depthLevel: DepthLevel): CatalogEntry =>
  perSiteFiles(
    {
      varId,
      dataSource: 'usda_nrcs',
      variable: SOIL_MOISTURE,
      temporalResolution: 'daily',
      aggregation: 'start-of-day',
      depthLevel,
      variableName: `soil moisture at ${depthLevel} inches`,
      units: 'pct'
    },
    'soil_moisture/data/daily',
    `sms_${depthLevel}in`
  );

const flux = (
  varId: number,
  variable: string,
  aggregation: Aggregation,
  units: string,
  valueField: string
): CatalogEntry =>
  perSiteFiles(
    {
      varId,
      dataSource: 'ameriflux',
      variable,
      temporalResolution: 'hourly',
      aggregation,
      variableName: variable,
      units
    },
    'ameriflux/data/hourly',
    valueField
  );

const usgs = (
  varId: number,
  variable: 'streamflow' | 'wtd',
  temporalResolution: 'hourly' | 'daily',
  units: string
): CatalogEntry =>
  perSiteFiles(
    {
      varId,
      dataSource: 'usgs_nwis',
      variable,
      temporalResolution,
      aggregation: 'average',
      variableName: variable === 'streamflow' ? 'streamflow' : 'water table depth',
      units
    },
    `${variable === 'streamflow' ? 'streamflow' : 'groundwater'}/data/${temporalResolution}`,
    variable
  );

const nrcsDaily = (
  varId: number,
  variable: string,
  aggregation: Aggregation,
  variableName: string,
  units: string,
  directory: string,
  valueField: string
): CatalogEntry =>
  perSiteFiles(
    { varId, dataSource: 'usda_nrcs', variable, temporalResolution: 'daily', aggregation, variableName, units },
    directory,
    valueField
  );

const PRECIPITATION_DIR = 'point_meteorology/NRCS_precipitation/data/daily';
const TEMPERATURE_DIR = 'point_meteorology/NRCS_temperature/data/daily';

export const CATALOG: readonly CatalogEntry[] = Object.freeze([
  usgs(1, 'streamflow', 'hourly', 'cms'),
  usgs(2, 'streamflow', 'daily', 'cms'),
  usgs(3, 'wtd', 'hourly', 'm'),
  usgs(4, 'wtd', 'daily', 'm'),
  {
    varId: 5,
    dataSource: 'usgs_nwis',
    variable: 'wtd',
    temporalResolution: 'instantaneous',
    aggregation: 'instantaneous',
    depthLevel: null,
    variableName: 'water table depth',
    units: 'm',
    timeConvention: 'local',
    storage: {
      kind: 'table',
      table: 'wtd_discrete_data',
      dateColumn: 'date',
      valueColumn: 'wtd',
      extraColumns: ['pumping_status']
    }
  },
  nrcsDaily(6, 'swe', 'start-of-day', 'snow water equivalent', 'mm', 'swe/data/daily', 'swe'),
  nrcsDaily(7, 'precipitation', 'accumulated', 'precipitation', 'mm', PRECIPITATION_DIR, 'precip_acc'),
  nrcsDaily(8, 'precipitation', 'total', 'precipitation', 'mm', PRECIPITATION_DIR, 'precip_inc'),
  nrcsDaily(9, 'precipitation', 'total, snow-adjusted', 'precipitation', 'mm', PRECIPITATION_DIR, 'precip_inc_sa'),
  nrcsDaily(10, 'temperature', 'minimum', 'air temperature', 'C', TEMPERATURE_DIR, 'temp_min'),
  nrcsDaily(11, 'temperature', 'maximum', 'air temperature', 'C', TEMPERATURE_DIR, 'temp_max'),
  nrcsDaily(12, 'temperature', 'average', 'air temperature', 'C', TEMPERATURE_DIR, 'temp_avg'),
  soilMoisture(13, 2),
  soilMoisture(14, 4),
  soilMoisture(15, 8),
  soilMoisture(16, 20),
  soilMoisture(17, 40),
  flux(18, 'latent heat flux', 'total', 'w/m2', 'latent heat flux'),
  flux(19, 'sensible heat flux', 'total', 'w/m2', 'sensible heat flux'),
  flux(20, 'shortwave radiation', 'total', 'w/m2', 'shortwave radiation'),
  flux(21, 'longwave radiation', 'total', 'w/m2', 'longwave radiation'),
  flux(22, 'vapor pressure deficit', 'average', 'hPa', 'vapor pressure deficit'),
  flux(23, 'temperature', 'average', 'C', 'air temperature'),
  flux(24, 'wind speed', 'average', 'm/s', 'wind speed')
]);

const isDepthLevel = (value: number): value is DepthLevel =>
  (DEPTH_LEVELS as readonly number[]).includes(value);

/**
 * Resolves a query key against the catalog. Depth rules for soil moisture are
 * checked first so a missing or unknown depth is reported as such rather than
 * as an unregistered combination.
 */
export function resolveCatalogEntry(
  key: CatalogKey,
  catalog: readonly CatalogEntry[] = CATALOG
): CatalogEntry {
  let depthLevel: DepthLevel | null = null;
  if (key.variable === SOIL_MOISTURE) {
    if (key.depthLevel === undefined || key.depthLevel === null) {
      throw new MissingDepthError(key.variable);
    }
    if (!isDepthLevel(key.depthLevel)) {
      throw new InvalidDepthError(key.depthLevel, DEPTH_LEVELS);
    }
    depthLevel = key.depthLevel;
  }

  const entry = catalog.find(
    (candidate) =>
      candidate.dataSource === key.dataSource &&
      candidate.variable === key.variable &&
      candidate.temporalResolution === key.temporalResolution &&
      candidate.aggregation === key.aggregation &&
      candidate.depthLevel === depthLevel
  );

  if (!entry) {
    throw new UnsupportedCombinationError({
      data_source: key.dataSource,
      variable: key.variable,
      temporal_resolution: key.temporalResolution,
      aggregation: key.aggregation,
      depth_level: depthLevel
    });
  }

  return entry;
}

export function recordFileName(entry: CatalogEntry, siteId: string): string | null {
  if (entry.storage.kind !== 'file') {
    return null;
  }
  return `${entry.storage.directory}/${siteId}${entry.storage.fileExtension}`;
}
