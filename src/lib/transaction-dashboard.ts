import { readFile as readFileFromDisk } from 'fs/promises';
import { basename } from 'path';

import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import { loadDashboardConfig } from '../transactions/base/config';
import { isTransactionError, UnknownSchemaError, type TransactionError } from '../transactions/base/errors';
import type { DashboardConfig, SchemaKind } from '../transactions/base/types';
import type { RowCoercionWarning } from '../transactions/base/warnings';
import { PreprocessingPipeline } from '../transactions/PreprocessingPipeline';
import { RegionCodeRegistry } from '../transactions/RegionCodeRegistry';
import { SchemaNormalizer } from '../transactions/SchemaNormalizer';
import type { PreprocessedRow } from '../transactions/types/transaction.types';
import {
  PremiumAnalyzer,
  type AppreciationOptions,
  type AppreciationResult,
  type HighFloorPremium,
  type RiseTrendResult,
} from '../transactions/utils/premiumAnalyzer';
import {
  TransactionAnalyzer,
  type BuildYearPoint,
  type ComplexPriceRange,
  type ComplexRank,
  type GroupStat,
  type MonthlyTrendPoint,
  type PriceBandCount,
  type TransactionFilter,
  type TransactionSummary,
  type WeeklyPoint,
} from '../transactions/utils/transactionAnalyzer';
import { readWorkbook } from './workbook-loader';

export interface TransactionDataset {
  fileName: string;
  schema: SchemaKind;
  columns: string[];
  rows: PreprocessedRow[];
  cancelledCount: number;
  warnings: RowCoercionWarning[];
}

export type DatasetLoadResult =
  | { status: 'success'; dataset: TransactionDataset }
  | {
      status: 'error';
      fileName: string;
      kind: TransactionError['code'] | 'UNEXPECTED';
      message: string;
      /** Present for unknown-schema failures so the user can see what the file had. */
      columns?: string[];
    };

export interface AnalysisReport {
  fileName: string;
  totalCount: number;
  cancelledCount: number;
  filter: TransactionFilter;
  summary: TransactionSummary;
  regions: GroupStat[];
  areas: GroupStat[];
  floors: GroupStat[];
  priceBands: PriceBandCount[];
  monthlyTrend: GroupStat[];
  monthlyPriceTrend: MonthlyTrendPoint[];
  weeklyTrend: WeeklyPoint[];
  buildYears: BuildYearPoint[];
  buildingAge: GroupStat[];
  topComplexesByAmount: ComplexRank[];
  topComplexesByPricePerPyeong: ComplexRank[];
  complexPriceRanges: ComplexPriceRange[];
  highFloorPremium: HighFloorPremium | null;
  appreciation: AppreciationResult;
  riseTrend: RiseTrendResult;
}

type FileReader = (filePath: string) => Promise<Buffer>;

export interface TransactionDashboardOptions {
  config?: Partial<DashboardConfig>;
  env?: (key: string) => string | undefined;
  readFile?: FileReader;
}

/**
 * Presentation-side entry point: loads a workbook, runs it through
 * detect → normalize → preprocess, and builds the dashboard aggregates.
 * Path loads are memoized per instance; the core itself keeps no state.
 */
export class TransactionDashboardClient {
  private readonly config: DashboardConfig;
  private readonly logger: Logger;
  private readonly normalizer: SchemaNormalizer;
  private readonly pipeline: PreprocessingPipeline;
  private readonly readFile: FileReader;
  private readonly cache = new Map<string, TransactionDataset>();

  constructor(options: TransactionDashboardOptions = {}, logger: Logger = defaultLogger) {
    this.config = loadDashboardConfig({ overrides: options.config, env: options.env, logger });
    this.logger = logger.child('dashboard');
    if (this.config.logLevel) {
      this.logger.setLevel(this.config.logLevel);
    }

    this.normalizer = new SchemaNormalizer(this.logger, new RegionCodeRegistry(this.logger));
    this.pipeline = new PreprocessingPipeline(this.logger);
    this.readFile = options.readFile ?? (filePath => readFileFromDisk(filePath));
  }

  get settings(): Readonly<DashboardConfig> {
    return this.config;
  }

  async loadFromPath(filePath: string): Promise<DatasetLoadResult> {
    const cached = this.cache.get(filePath);
    if (cached) {
      // refresh recency
      this.cache.delete(filePath);
      this.cache.set(filePath, cached);
      this.logger.debug('Dataset served from cache', { filePath });
      return { status: 'success', dataset: cached };
    }

    const fileName = basename(filePath);
    let data: Buffer;
    try {
      data = await this.readFile(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to read transaction file', { filePath, message });
      return {
        status: 'error',
        fileName,
        kind: 'UNEXPECTED',
        message: `파일을 열 수 없습니다: ${fileName}`,
      };
    }

    const result = this.loadFromBuffer(data, fileName);
    if (result.status === 'success') {
      this.remember(filePath, result.dataset);
    }
    return result;
  }

  /** Uploaded files are not cached. */
  loadFromBuffer(data: Buffer, fileName: string): DatasetLoadResult {
    try {
      return { status: 'success', dataset: this.buildDataset(data, fileName) };
    } catch (error) {
      return this.toErrorResult(error, fileName);
    }
  }

  analyze(
    dataset: TransactionDataset,
    filter: TransactionFilter = {},
    appreciationOptions: AppreciationOptions = {},
  ): AnalysisReport {
    const rows = TransactionAnalyzer.filterTransactions(dataset.rows, filter);
    const topN = this.config.topN;

    return {
      fileName: dataset.fileName,
      totalCount: dataset.rows.length,
      cancelledCount: dataset.cancelledCount,
      filter,
      summary: TransactionAnalyzer.summarize(rows),
      regions: TransactionAnalyzer.regionSummary(rows),
      areas: TransactionAnalyzer.areaSummary(rows),
      floors: TransactionAnalyzer.floorSummary(rows),
      priceBands: TransactionAnalyzer.priceBandDistribution(rows),
      monthlyTrend: TransactionAnalyzer.monthlyTrend(rows),
      monthlyPriceTrend: TransactionAnalyzer.monthlyPriceTrend(rows),
      weeklyTrend: TransactionAnalyzer.weeklyTrend(rows),
      buildYears: TransactionAnalyzer.buildYearTrend(rows),
      buildingAge: TransactionAnalyzer.buildingAgeComparison(rows, this.config.newBuildCutoffYear),
      topComplexesByAmount: TransactionAnalyzer.topComplexes(rows, 'amount', topN),
      topComplexesByPricePerPyeong: TransactionAnalyzer.topComplexes(rows, 'pricePerPyeong', topN),
      complexPriceRanges: TransactionAnalyzer.complexPriceRanges(rows, topN),
      highFloorPremium: PremiumAnalyzer.highFloorPremium(rows),
      appreciation: PremiumAnalyzer.appreciation(rows, appreciationOptions),
      riseTrend: PremiumAnalyzer.riseTrend(rows, appreciationOptions),
    };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private buildDataset(data: Buffer, fileName: string): TransactionDataset {
    const raw = readWorkbook(data, {
      fileName,
      headerScanRows: this.config.headerScanRows,
      logger: this.logger,
    });

    const transformed = this.normalizer.autoTransform(raw);
    const processed = this.pipeline.preprocess(transformed.table);

    this.logger.info('Transaction file loaded', {
      fileName,
      schema: transformed.schema,
      rows: processed.table.rows.length,
      cancelledCount: processed.cancelledCount,
      warnings: transformed.warnings.length + processed.warnings.length,
    });

    return {
      fileName,
      schema: transformed.schema,
      columns: processed.table.columns,
      rows: processed.table.rows,
      cancelledCount: processed.cancelledCount,
      warnings: [...transformed.warnings, ...processed.warnings],
    };
  }

  private remember(filePath: string, dataset: TransactionDataset): void {
    if (this.config.cacheSize === 0) return;
    this.cache.set(filePath, dataset);
    while (this.cache.size > this.config.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  private toErrorResult(error: unknown, fileName: string): DatasetLoadResult {
    if (isTransactionError(error)) {
      this.logger.warn('Transaction file rejected', { fileName, kind: error.code });
      return {
        status: 'error',
        fileName,
        kind: error.code,
        message: error.message,
        columns: error instanceof UnknownSchemaError ? error.columns : undefined,
      };
    }

    const message = error instanceof Error ? error.message : '알 수 없는 오류가 발생했습니다.';
    this.logger.error('Unexpected failure while loading transactions', { fileName, message });
    return { status: 'error', fileName, kind: 'UNEXPECTED', message };
  }
}
