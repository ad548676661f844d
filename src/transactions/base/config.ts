import { z } from 'zod';

import { LOG_LEVELS, logger as defaultLogger, Logger } from '../../utils/logger';
import type { DashboardConfig } from './types';

type EnvLoader = (key: string) => string | undefined;

const ENV_PREFIX = 'APT_DASHBOARD';

const DashboardConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).optional(),
  headerScanRows: z.number().int().positive().max(100).default(20),
  cacheSize: z.number().int().nonnegative().max(64).default(8),
  newBuildCutoffYear: z.number().int().min(1900).max(2100).default(2015),
  topN: z.number().int().positive().max(100).default(10),
});

const defaultEnvLoader: EnvLoader = key => process.env[key];

export interface LoadConfigOptions {
  overrides?: Partial<DashboardConfig>;
  logger?: Logger;
  env?: EnvLoader;
}

export const loadDashboardConfig = (options: LoadConfigOptions = {}): DashboardConfig => {
  const env = options.env ?? defaultEnvLoader;
  const logger = options.logger ?? defaultLogger;

  const raw: Record<string, unknown> = {
    logLevel: options.overrides?.logLevel ?? env(`${ENV_PREFIX}_LOG_LEVEL`),
    headerScanRows:
      options.overrides?.headerScanRows ?? parseOptionalInt(env(`${ENV_PREFIX}_HEADER_SCAN_ROWS`)),
    cacheSize: options.overrides?.cacheSize ?? parseOptionalInt(env(`${ENV_PREFIX}_CACHE_SIZE`)),
    newBuildCutoffYear:
      options.overrides?.newBuildCutoffYear ??
      parseOptionalInt(env(`${ENV_PREFIX}_NEW_BUILD_CUTOFF_YEAR`)),
    topN: options.overrides?.topN ?? parseOptionalInt(env(`${ENV_PREFIX}_TOP_N`)),
  };

  const result = DashboardConfigSchema.safeParse(raw);
  if (!result.success) {
    logger.error('Dashboard configuration validation failed', { issues: result.error.issues });
    throw new Error('대시보드 설정값을 확인해주세요.');
  }

  const config = result.data;
  logger.debug('Dashboard configuration loaded', { config });

  return config;
};

const parseOptionalInt = (value?: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};
