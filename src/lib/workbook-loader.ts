import * as XLSX from 'xlsx';

import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import { WorkbookLoadError } from '../transactions/base/errors';
import type { CellValue, RawRow, Table } from '../transactions/base/types';
import { matchesKnownSchema } from '../transactions/SchemaDetector';
import { cellToString, isMissing } from '../transactions/utils/coerce';

export interface ReadWorkbookOptions {
  fileName?: string;
  /** How many leading rows may hold notes before the header row. */
  headerScanRows?: number;
  logger?: Logger;
}

const DEFAULT_HEADER_SCAN_ROWS = 20;

/**
 * Reads the first sheet of an .xlsx/.xls workbook into a {@link Table}.
 * 실거래가 공개시스템 downloads start with a block of notes, so the header is
 * the first row that carries a known column signature (row 0 otherwise).
 */
export const readWorkbook = (data: Buffer, options: ReadWorkbookOptions = {}): Table => {
  const fileName = options.fileName ?? 'workbook';
  const logger = (options.logger ?? defaultLogger).child('workbook');

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer', cellDates: false });
  } catch (error) {
    throw new WorkbookLoadError(fileName, error instanceof Error ? error.message : String(error));
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new WorkbookLoadError(fileName, '시트가 없습니다.');
  }

  const matrix = XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });

  const headerIndex = findHeaderRow(matrix, options.headerScanRows ?? DEFAULT_HEADER_SCAN_ROWS);
  const columns = buildColumns(matrix[headerIndex] ?? []);
  const rows = matrix
    .slice(headerIndex + 1)
    .filter(cells => !isBlankRow(cells))
    .map(cells => toRecord(columns, cells));

  logger.debug('Workbook loaded', {
    fileName,
    sheetName,
    headerRow: headerIndex + 1,
    columns: columns.length,
    rows: rows.length,
  });

  return { columns, rows };
};

const headerCells = (cells: CellValue[]): string[] => cells.map(cell => cellToString(cell).trim());

const findHeaderRow = (matrix: CellValue[][], scanRows: number): number => {
  const limit = Math.min(scanRows, matrix.length);
  for (let index = 0; index < limit; index += 1) {
    if (matchesKnownSchema(headerCells(matrix[index]))) {
      return index;
    }
  }
  return 0;
};

// Blank headers become "Unnamed: i" and repeats get ".1", ".2" suffixes.
const buildColumns = (cells: CellValue[]): string[] => {
  const seen = new Map<string, number>();
  return headerCells(cells).map((name, index) => {
    const base = name || `Unnamed: ${index}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
};

const isBlankRow = (cells: CellValue[]): boolean =>
  cells.every(cell => isMissing(cell) || (typeof cell === 'string' && cell.trim() === ''));

const toRecord = (columns: string[], cells: CellValue[]): RawRow => {
  const record: RawRow = {};
  columns.forEach((column, index) => {
    const value = cells[index];
    record[column] = value === undefined ? null : value;
  });
  return record;
};
