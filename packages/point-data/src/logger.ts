import pino from 'pino';
import type { BaseLogger } from 'pino';

export type PointDataLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn'>;

export const silentLogger: PointDataLogger = pino({ level: 'silent' });
