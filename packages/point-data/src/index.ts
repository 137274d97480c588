export * from './errors';
export * from './catalog';
export * from './schema';
export * from './archive';
export * from './siteIndex';
export * from './siteFilter';
export * from './networks';
export * from './recordLoader';
export * from './assembler';
export * from './pool';
export * from './query';
export * from './sources';
export * from './citations';
export { silentLogger, type PointDataLogger } from './logger';
export { buildTimeWindow, isWithinWindow, toEpochMillis, type TimeWindow } from './timestamps';
