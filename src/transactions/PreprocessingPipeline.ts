import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import { DateParseError, type DateParseFailure } from './base/errors';
import type { CellValue, RawRow, Table } from './base/types';
import { WarningCollector, type RowCoercionWarning } from './base/warnings';
import {
  DERIVED_COLUMNS,
  LEGACY_COLUMNS,
  SQM_PER_PYEONG,
  type PreprocessedRow,
} from './types/transaction.types';
import { cellToString, isMissing, parseDealAmount, toNumber } from './utils/coerce';

export interface PreprocessResult {
  table: Table<PreprocessedRow>;
  /** Rows dropped because 해제사유발생일 was filled in. */
  cancelledCount: number;
  warnings: RowCoercionWarning[];
}

const NOT_CANCELLED_MARKERS = new Set(['-', '', 'nan', 'None']);

const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

export const isCancelled = (value: CellValue): boolean => {
  if (isMissing(value)) return false;
  return !NOT_CANCELLED_MARKERS.has(cellToString(value).trim());
};

/** Strict YYYYMMDD parse; returns null for anything that is not a real calendar day. */
export const parseCompactDate = (value: string): Date | null => {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
};

export class PreprocessingPipeline {
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger.child('preprocess');
  }

  /**
   * Filters cancelled deals and derives 거래일자, 평수 and 평당가(만원).
   *
   * Numeric coercions degrade to 0 or NaN, but a single unparseable contract
   * date fails the whole table with {@link DateParseError}. The asymmetry with
   * the normalizer's per-row leniency is intentional.
   */
  preprocess(table: Table): PreprocessResult {
    const warnings = new WarningCollector(this.logger);

    const { rows: kept, cancelledCount } = this.filterCancelled(table);
    const amounts = this.coerceAmounts(kept, warnings);
    const dates = this.deriveDates(kept);

    const rows = kept.map((row, index): PreprocessedRow => {
      const dealAmount = amounts[index];
      const areaPyeong = toNumber(row[LEGACY_COLUMNS.exclusiveArea]) / SQM_PER_PYEONG;
      return {
        ...row,
        [LEGACY_COLUMNS.dealAmount]: dealAmount,
        [DERIVED_COLUMNS.transactionDate]: dates[index],
        [DERIVED_COLUMNS.areaPyeong]: areaPyeong,
        [DERIVED_COLUMNS.pricePerPyeong]: dealAmount / areaPyeong,
      };
    });

    const columns = [...table.columns];
    Object.values(DERIVED_COLUMNS).forEach(column => {
      if (!columns.includes(column)) columns.push(column);
    });

    if (cancelledCount > 0) {
      this.logger.info('Excluded cancelled transactions', { cancelledCount, remaining: rows.length });
    }

    return {
      table: { columns, rows },
      cancelledCount,
      warnings: warnings.toArray(),
    };
  }

  private filterCancelled(table: Table): { rows: RawRow[]; cancelledCount: number } {
    if (!table.columns.includes(LEGACY_COLUMNS.cancellationDate)) {
      return { rows: table.rows, cancelledCount: 0 };
    }

    const rows = table.rows.filter(row => !isCancelled(row[LEGACY_COLUMNS.cancellationDate]));
    return { rows, cancelledCount: table.rows.length - rows.length };
  }

  /**
   * A column holding any text is parsed as text. An all-numeric column is
   * kept as is, with non-numeric cells turned into NaN.
   */
  private coerceAmounts(rows: RawRow[], warnings: WarningCollector): number[] {
    const values = rows.map(row => row[LEGACY_COLUMNS.dealAmount]);
    const isText = values.some(value => typeof value === 'string');

    if (!isText) {
      return values.map(value => (typeof value === 'number' ? value : NaN));
    }

    return values.map((value, index) => {
      const parsed = typeof value === 'number' && Number.isInteger(value) ? value : parseDealAmount(value);
      if (parsed !== null) return parsed;

      warnings.add({
        row: index + 1,
        field: LEGACY_COLUMNS.dealAmount,
        value,
        message: `Failed to parse deal amount: ${cellToString(value)}. Using 0.`,
      });
      return 0;
    });
  }

  private deriveDates(rows: RawRow[]): Date[] {
    const failures: DateParseFailure[] = [];

    const dates = rows.map((row, index) => {
      const day = cellToString(row[LEGACY_COLUMNS.contractDay]).padStart(2, '0');
      const compact = `${cellToString(row[LEGACY_COLUMNS.contractYearMonth])}${day}`;
      const parsed = parseCompactDate(compact);
      if (!parsed) {
        failures.push({ row: index + 1, value: compact });
        return new Date(NaN);
      }
      return parsed;
    });

    if (failures.length > 0) {
      this.logger.error('Contract date parsing failed', {
        failures: failures.length,
        first: failures[0],
      });
      throw new DateParseError(failures);
    }

    return dates;
  }
}
