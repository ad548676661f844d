import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import { MissingColumnsError } from './base/errors';
import type { RawRow, SchemaKind, Table } from './base/types';
import { WarningCollector, type RowCoercionWarning } from './base/warnings';
import { RegionCodeRegistry } from './RegionCodeRegistry';
import { detectSchema } from './SchemaDetector';
import {
  LEGACY_COLUMN_ORDER,
  LEGACY_COLUMNS,
  NEW_API_COLUMNS,
  NEW_API_REQUIRED_COLUMNS,
  type LegacyRow,
} from './types/transaction.types';
import { cellToString, isMissing, parseDealAmount, toInteger, toNumber } from './utils/coerce';

export interface NormalizeResult {
  table: Table<LegacyRow>;
  warnings: RowCoercionWarning[];
}

export interface AutoTransformResult {
  schema: SchemaKind;
  table: Table;
  warnings: RowCoercionWarning[];
}

/**
 * Rewrites an apartment-trade API export into the legacy 실거래가 layout.
 * Holds no per-call state: every `normalize` call builds its own warning list.
 */
export class SchemaNormalizer {
  private readonly logger: Logger;
  private readonly registry: RegionCodeRegistry;

  constructor(logger: Logger = defaultLogger, registry?: RegionCodeRegistry) {
    this.logger = logger.child('normalizer');
    this.registry = registry ?? new RegionCodeRegistry(logger);
  }

  normalize(table: Table): NormalizeResult {
    const available = new Set(table.columns);
    const missing = NEW_API_REQUIRED_COLUMNS.filter(column => !available.has(column));
    if (missing.length > 0) {
      throw new MissingColumnsError(missing, [...table.columns]);
    }

    const hasCancellation = available.has(NEW_API_COLUMNS.cancellationDay);
    const warnings = new WarningCollector(this.logger);

    const rows = table.rows.map((source, index) =>
      this.normalizeRow(source, index + 1, hasCancellation, warnings),
    );

    if (warnings.size > 0) {
      this.logger.info('Normalized with row warnings', {
        rows: rows.length,
        warnings: warnings.size,
      });
    }

    return {
      table: { columns: [...LEGACY_COLUMN_ORDER], rows },
      warnings: warnings.toArray(),
    };
  }

  /** Detects the schema and normalizes only when the table is not already legacy. */
  autoTransform(table: Table): AutoTransformResult {
    const schema = detectSchema(table);
    if (schema === 'legacy') {
      return { schema, table, warnings: [] };
    }

    const { table: normalized, warnings } = this.normalize(table);
    return { schema, table: normalized, warnings };
  }

  private normalizeRow(
    source: RawRow,
    rowNumber: number,
    hasCancellation: boolean,
    warnings: WarningCollector,
  ): LegacyRow {
    const area = toNumber(source[NEW_API_COLUMNS.exclusiveArea]);
    if (Number.isNaN(area)) {
      warnings.add({
        row: rowNumber,
        field: NEW_API_COLUMNS.exclusiveArea,
        value: source[NEW_API_COLUMNS.exclusiveArea],
        message: `Failed to parse exclusive area: ${cellToString(source[NEW_API_COLUMNS.exclusiveArea])}`,
      });
    }

    let dealAmount = parseDealAmount(source[NEW_API_COLUMNS.dealAmount]);
    if (dealAmount === null) {
      warnings.add({
        row: rowNumber,
        field: NEW_API_COLUMNS.dealAmount,
        value: source[NEW_API_COLUMNS.dealAmount],
        message: `Failed to parse deal amount: ${cellToString(source[NEW_API_COLUMNS.dealAmount])}. Using 0.`,
      });
      dealAmount = 0;
    }

    const cancellation = source[NEW_API_COLUMNS.cancellationDay];

    return {
      [LEGACY_COLUMNS.rowNumber]: rowNumber,
      [LEGACY_COLUMNS.regionName]: this.composeRegionName(source, rowNumber, warnings),
      [LEGACY_COLUMNS.complexName]: source[NEW_API_COLUMNS.complexName],
      [LEGACY_COLUMNS.exclusiveArea]: area,
      [LEGACY_COLUMNS.contractYearMonth]: this.composeYearMonth(source, rowNumber, warnings),
      [LEGACY_COLUMNS.contractDay]: source[NEW_API_COLUMNS.dealDay],
      [LEGACY_COLUMNS.dealAmount]: dealAmount,
      [LEGACY_COLUMNS.floor]: source[NEW_API_COLUMNS.floor],
      [LEGACY_COLUMNS.buildYear]: source[NEW_API_COLUMNS.buildYear],
      [LEGACY_COLUMNS.cancellationDate]:
        hasCancellation && !isMissing(cancellation) ? cancellation : '',
    };
  }

  private composeRegionName(source: RawRow, rowNumber: number, warnings: WarningCollector): string {
    const regionName = this.registry.lookup(source[NEW_API_COLUMNS.regionCode], warnings, rowNumber);
    const dong = cellToString(source[NEW_API_COLUMNS.legalDong]).trim();
    return [regionName, dong].filter(part => part !== '').join(' ');
  }

  private composeYearMonth(source: RawRow, rowNumber: number, warnings: WarningCollector): number {
    const year = toInteger(source[NEW_API_COLUMNS.dealYear]);
    const month = toInteger(source[NEW_API_COLUMNS.dealMonth]);
    if (year === null || month === null) {
      warnings.add({
        row: rowNumber,
        field: year === null ? NEW_API_COLUMNS.dealYear : NEW_API_COLUMNS.dealMonth,
        value: year === null ? source[NEW_API_COLUMNS.dealYear] : source[NEW_API_COLUMNS.dealMonth],
        message: `Failed to parse year/month: ${cellToString(source[NEW_API_COLUMNS.dealYear])}/${cellToString(source[NEW_API_COLUMNS.dealMonth])}`,
      });
      return 0;
    }
    return year * 100 + month;
  }
}
