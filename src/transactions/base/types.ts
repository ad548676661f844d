import type { LogLevel } from '../../utils/logger';

export type CellValue = string | number | boolean | Date | null | undefined;

export type RawRow = Record<string, CellValue>;

/**
 * In-memory table handed over by the workbook loader (or any caller).
 * `columns` keeps header order and is the only thing schema detection looks at.
 */
export interface Table<TRow extends RawRow = RawRow> {
  columns: string[];
  rows: TRow[];
}

export type SchemaKind = 'legacy' | 'new_api';

export interface DashboardConfig {
  logLevel?: LogLevel;
  headerScanRows: number;
  cacheSize: number;
  newBuildCutoffYear: number;
  topN: number;
}
