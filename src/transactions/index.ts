export * from './base/errors';
export * from './base/types';
export { loadDashboardConfig, type LoadConfigOptions } from './base/config';
export { WarningCollector, type RowCoercionWarning } from './base/warnings';
export { REGION_CODE_MAP } from './data/regionCodes';
export { RegionCodeRegistry, regionCodeRegistry } from './RegionCodeRegistry';
export { detectSchema, matchesKnownSchema } from './SchemaDetector';
export {
  SchemaNormalizer,
  type AutoTransformResult,
  type NormalizeResult,
} from './SchemaNormalizer';
export {
  PreprocessingPipeline,
  isCancelled,
  parseCompactDate,
  type PreprocessResult,
} from './PreprocessingPipeline';
export * from './types/transaction.types';
export * from './utils/premiumAnalyzer';
export * from './utils/transactionAnalyzer';
