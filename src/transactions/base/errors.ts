/**
 * Fatal errors raised by the normalization core. They propagate unmodified;
 * turning them into user-facing messages is the dashboard client's job.
 */

const COLUMN_PREVIEW_LIMIT = 10;

export class UnknownSchemaError extends Error {
  readonly code = 'UNKNOWN_SCHEMA';
  /** Sorted column names of the rejected table. */
  readonly columns: string[];

  constructor(columns: string[]) {
    const sorted = [...columns].sort();
    let preview = sorted.slice(0, COLUMN_PREVIEW_LIMIT).join(', ');
    if (sorted.length > COLUMN_PREVIEW_LIMIT) {
      preview += `, ... (${sorted.length - COLUMN_PREVIEW_LIMIT} more)`;
    }

    super(
      '파일 형식을 확인할 수 없습니다. ' +
        '기존 형식(시군구, 단지명, 거래금액(만원)) 또는 ' +
        '신규 API 형식(sggCd, aptNm, dealAmount) 컬럼이 필요합니다. ' +
        `발견된 컬럼: ${preview}`,
    );
    this.name = 'UnknownSchemaError';
    this.columns = sorted;
  }
}

export class MissingColumnsError extends Error {
  readonly code = 'MISSING_COLUMNS';

  constructor(
    readonly missing: string[],
    readonly available: string[],
  ) {
    super(
      `변환에 필요한 컬럼이 없습니다: ${missing.join(', ')}. ` +
        `사용 가능한 컬럼: ${available.join(', ')}`,
    );
    this.name = 'MissingColumnsError';
  }
}

export interface DateParseFailure {
  /** 1-based position among the rows that survived cancellation filtering. */
  row: number;
  value: string;
}

export class DateParseError extends Error {
  readonly code = 'DATE_PARSE_ERROR';

  constructor(readonly failures: DateParseFailure[]) {
    const samples = failures
      .slice(0, 3)
      .map(failure => `${failure.row}행 '${failure.value}'`)
      .join(', ');
    super(
      `계약일자를 YYYYMMDD 형식으로 변환할 수 없습니다 (${failures.length}건). 예: ${samples}`,
    );
    this.name = 'DateParseError';
  }
}

export class WorkbookLoadError extends Error {
  readonly code = 'WORKBOOK_LOAD_ERROR';

  constructor(
    readonly fileName: string,
    reason: string,
  ) {
    super(`엑셀 파일을 읽을 수 없습니다 (${fileName}): ${reason}`);
    this.name = 'WorkbookLoadError';
  }
}

export type TransactionError =
  | UnknownSchemaError
  | MissingColumnsError
  | DateParseError
  | WorkbookLoadError;

export const isTransactionError = (error: unknown): error is TransactionError =>
  error instanceof UnknownSchemaError ||
  error instanceof MissingColumnsError ||
  error instanceof DateParseError ||
  error instanceof WorkbookLoadError;
