export type PointDataErrorKind = 'validation' | 'archive' | 'aborted';

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class PointDataError extends Error {
  readonly kind: PointDataErrorKind;

  constructor(message: string, kind: PointDataErrorKind) {
    super(message);
    this.name = 'PointDataError';
    this.kind = kind;
  }
}

export class UnsupportedCombinationError extends PointDataError {
  readonly code = 'UNSUPPORTED_COMBINATION';
  readonly key: Record<string, string | number | null>;

  constructor(key: Record<string, string | number | null>) {
    const described = Object.entries(key)
      .filter(([, value]) => value !== null)
      .map(([name, value]) => `${name}=${String(value)}`)
      .join(', ');
    super(`The combination ${described} is not a registered data source`, 'validation');
    this.name = 'UnsupportedCombinationError';
    this.key = key;
  }
}

export class MissingDepthError extends PointDataError {
  readonly code = 'MISSING_DEPTH';

  constructor(variable: string) {
    super(`depth_level is required when variable is '${variable}'`, 'validation');
    this.name = 'MissingDepthError';
  }
}

export class InvalidDepthError extends PointDataError {
  readonly code = 'INVALID_DEPTH';
  readonly depthLevel: number;

  constructor(depthLevel: number, allowed: readonly number[]) {
    super(`depth_level ${depthLevel} is not supported; expected one of ${allowed.join(', ')}`, 'validation');
    this.name = 'InvalidDepthError';
    this.depthLevel = depthLevel;
  }
}

export class InvalidRangeError extends PointDataError {
  readonly code = 'INVALID_RANGE';
  readonly field: string;

  constructor(field: string, lower: string | number, upper: string | number) {
    super(`${field} lower bound ${lower} is greater than upper bound ${upper}`, 'validation');
    this.name = 'InvalidRangeError';
    this.field = field;
  }
}

export class UnsupportedNetworkError extends PointDataError {
  readonly code = 'UNSUPPORTED_NETWORK';
  readonly network: string;

  constructor(network: string, dataSource: string, variable: string, allowed: readonly string[]) {
    const options = allowed.length > 0 ? allowed.join(', ') : 'none';
    super(
      `Network '${network}' is not available for ${dataSource}/${variable}; supported networks: ${options}`,
      'validation'
    );
    this.name = 'UnsupportedNetworkError';
    this.network = network;
  }
}

export class QueryValidationError extends PointDataError {
  readonly code = 'QUERY_VALIDATION_FAILED';
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message, 'validation');
    this.name = 'QueryValidationError';
    this.issues = issues;
  }
}

export class ArchiveUnavailableError extends PointDataError {
  readonly code = 'ARCHIVE_UNAVAILABLE';
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Archive resource ${path} is unavailable: ${reason}`, 'archive');
    this.name = 'ArchiveUnavailableError';
    this.path = path;
  }
}

export class RecordFileMissingError extends PointDataError {
  readonly code = 'RECORD_FILE_MISSING';
  readonly siteId: string;
  readonly path: string;

  constructor(siteId: string, path: string) {
    super(`Record file for site ${siteId} is missing or unreadable: ${path}`, 'archive');
    this.name = 'RecordFileMissingError';
    this.siteId = siteId;
    this.path = path;
  }
}

export class RecordFileCorruptError extends PointDataError {
  readonly code = 'RECORD_FILE_CORRUPT';
  readonly siteId: string;
  readonly path: string;

  constructor(siteId: string, path: string, reason: string) {
    super(`Record file for site ${siteId} could not be parsed (${path}): ${reason}`, 'archive');
    this.name = 'RecordFileCorruptError';
    this.siteId = siteId;
    this.path = path;
  }
}

export class RecordFileTooLargeError extends PointDataError {
  readonly code = 'RECORD_FILE_TOO_LARGE';
  readonly siteId: string;
  readonly path: string;

  constructor(siteId: string, path: string, size: number, limit: number) {
    super(`Record file for site ${siteId} is ${size} bytes, above the ${limit} byte limit: ${path}`, 'archive');
    this.name = 'RecordFileTooLargeError';
    this.siteId = siteId;
    this.path = path;
  }
}

export class QueryAbortedError extends PointDataError {
  readonly code = 'QUERY_ABORTED';

  constructor() {
    super('Point data query was aborted', 'aborted');
    this.name = 'QueryAbortedError';
  }
}
