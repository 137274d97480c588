import type { ResolvedArchive } from '@point-obs/point-data';

import type { PointDataMetrics } from './metrics';
import type { PointDataServiceConfig } from './config';

export interface AppContext {
  config: PointDataServiceConfig;
  archive: ResolvedArchive;
  metrics: PointDataMetrics;
}
