import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';

import {
  formatAvailableSources,
  getCitationInformation,
  listAvailableSources,
  queryPointData,
  type ArchiveOptions,
  type MetadataTable,
  type ObservationRecord,
  type PointDataResult
} from '@point-obs/point-data';
import { loadEnvConfig, numberRangeVar, pathVar, type EnvSource } from '@point-obs/shared';

type GlobalOptions = {
  archiveRoot?: string;
  database?: string;
  json?: boolean;
};

type QueryCommandOptions = {
  depthLevel?: number;
  dateStart?: string;
  dateEnd?: string;
  latitudeRange?: [number, number];
  longitudeRange?: [number, number];
  siteId?: string[];
  state?: string[];
  network?: string[];
  minNumObs?: number;
  metadata?: boolean;
  allAttributes?: boolean;
  chronological?: boolean;
};

const cliEnvSchema = z.object({
  POINT_DATA_ARCHIVE_ROOT: pathVar(),
  POINT_DATA_DATABASE_PATH: pathVar()
});

const rangeParser = numberRangeVar();

function parseRange(value: string): [number, number] {
  const result = rangeParser.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected two numbers written as 'a,b' or '[a, b]', got '${value}'`);
  }
  if (!result.data) {
    throw new InvalidArgumentError('Range must not be empty');
  }
  return result.data;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'`);
  }
  return parsed;
}

function csvCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function observationsToCsv(observations: readonly ObservationRecord[]): string[] {
  const extraColumns: string[] = [];
  for (const row of observations) {
    for (const key of Object.keys(row.extras ?? {})) {
      if (!extraColumns.includes(key)) {
        extraColumns.push(key);
      }
    }
  }
  const header = ['site_id', 'timestamp', 'value', ...extraColumns].join(',');
  const lines = observations.map((row) =>
    [row.siteId, row.timestamp, row.value, ...extraColumns.map((column) => row.extras?.[column])]
      .map(csvCell)
      .join(',')
  );
  return [header, ...lines];
}

function metadataToCsv(metadata: MetadataTable): string[] {
  return [
    metadata.columns.join(','),
    ...metadata.rows.map((row) => metadata.columns.map((column) => csvCell(row[column])).join(','))
  ];
}

function formatResult(result: PointDataResult, asJson: boolean | undefined): string {
  if (asJson) {
    return JSON.stringify(result, null, 2);
  }
  const lines = observationsToCsv(result.observations);
  if (result.metadata) {
    lines.push('', ...metadataToCsv(result.metadata));
  }
  return lines.join('\n');
}

type CliDependencies = {
  print?: (text: string) => void;
  env?: EnvSource;
};

export function createInterface(deps: CliDependencies = {}): Command {
  const print = deps.print ?? ((text: string) => console.log(text));
  const program = new Command();
  program
    .name('point-data')
    .description('Query point observations from a hydrologic observation archive')
    .option('--archive-root <dir>', 'Archive root directory (defaults to POINT_DATA_ARCHIVE_ROOT)')
    .option('--database <path>', 'Site index database (defaults to POINT_DATA_DATABASE_PATH)')
    .option('--json', 'Output JSON instead of text');

  const resolveArchiveOptions = (options: GlobalOptions): ArchiveOptions => {
    const env = loadEnvConfig(cliEnvSchema, { env: deps.env, context: 'point-data-cli' });
    return {
      root: options.archiveRoot ?? env.POINT_DATA_ARCHIVE_ROOT,
      databasePath: options.database ?? env.POINT_DATA_DATABASE_PATH
    };
  };

  program
    .command('sources')
    .description('List every supported data source, variable and aggregation')
    .action(() => {
      const options = program.opts<GlobalOptions>();
      const sources = listAvailableSources();
      print(options.json ? JSON.stringify(sources, null, 2) : formatAvailableSources(sources));
    });

  program
    .command('query')
    .description('Query observations and optional site metadata')
    .argument('<dataSource>', 'Data source, e.g. usgs_nwis')
    .argument('<variable>', 'Variable, e.g. streamflow')
    .argument('<temporalResolution>', 'Temporal resolution, e.g. daily')
    .argument('<aggregation>', 'Aggregation, e.g. average')
    .option('--depth-level <inches>', 'Soil moisture sensor depth', parseInteger)
    .option('--date-start <date>', 'Inclusive start date or date-time')
    .option('--date-end <date>', 'Inclusive end date or date-time')
    .option('--latitude-range <a,b>', 'Inclusive latitude bounds', parseRange)
    .option('--longitude-range <a,b>', 'Inclusive longitude bounds', parseRange)
    .option('--site-id <id...>', 'Restrict to these site ids')
    .option('--state <code...>', 'Restrict to these state codes')
    .option('--network <name...>', 'Restrict to these site networks')
    .option('--min-num-obs <count>', 'Minimum in-window records per site', parseInteger)
    .option('--metadata', 'Include site metadata', false)
    .option('--all-attributes', 'Include every site index attribute in the metadata', false)
    .option('--chronological', 'Order observations by site id, then timestamp', false)
    .action(
      async (
        dataSource: string,
        variable: string,
        temporalResolution: string,
        aggregation: string,
        cmdOptions: QueryCommandOptions
      ) => {
        const options = program.opts<GlobalOptions>();
        const result = await queryPointData(
          {
            dataSource,
            variable,
            temporalResolution,
            aggregation,
            depthLevel: cmdOptions.depthLevel,
            dateStart: cmdOptions.dateStart,
            dateEnd: cmdOptions.dateEnd,
            latitudeRange: cmdOptions.latitudeRange,
            longitudeRange: cmdOptions.longitudeRange,
            siteIds: cmdOptions.siteId,
            state: cmdOptions.state,
            siteNetworks: cmdOptions.network,
            minNumObs: cmdOptions.minNumObs,
            returnMetadata: Boolean(cmdOptions.metadata || cmdOptions.allAttributes),
            allAttributes: Boolean(cmdOptions.allAttributes),
            order: cmdOptions.chronological ? 'chronological' : 'site'
          },
          { archive: resolveArchiveOptions(options) }
        );
        print(formatResult(result, options.json));
      }
    );

  program
    .command('citation')
    .description('Show the data policy for a source and DOIs for selected sites')
    .argument('<dataSource>', 'Data source, e.g. ameriflux')
    .option('--site-id <id...>', 'Look up DOIs for these site ids')
    .action((dataSource: string, cmdOptions: { siteId?: string[] }) => {
      const options = program.opts<GlobalOptions>();
      const citation = getCitationInformation(dataSource, {
        siteIds: cmdOptions.siteId,
        archive: cmdOptions.siteId ? resolveArchiveOptions(options) : undefined
      });
      if (options.json) {
        print(JSON.stringify(citation, null, 2));
        return;
      }
      const lines = [citation.policy];
      if (citation.siteDois) {
        lines.push('', ...citation.siteDois.map(({ siteId, doi }) => `${siteId}: ${doi ?? 'no DOI on record'}`));
      }
      print(lines.join('\n'));
    });

  return program;
}
