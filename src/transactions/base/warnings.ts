import type { Logger } from '../../utils/logger';
import type { CellValue } from './types';

export interface RowCoercionWarning {
  /** 1-based data row, or 0 when the warning is not tied to a row. */
  row: number;
  field: string;
  value: CellValue;
  message: string;
}

/**
 * Per-call sink for non-fatal coercion problems. Each normalize/preprocess
 * call owns its collector, so nothing leaks between runs.
 */
export class WarningCollector {
  private readonly items: RowCoercionWarning[] = [];

  constructor(private readonly logger?: Logger) {}

  add(warning: RowCoercionWarning): void {
    this.items.push(warning);
    this.logger?.warn(warning.message, {
      row: warning.row,
      field: warning.field,
      value: warning.value,
    });
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): RowCoercionWarning[] {
    return [...this.items];
  }
}
