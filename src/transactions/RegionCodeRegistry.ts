import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import type { CellValue } from './base/types';
import type { WarningCollector } from './base/warnings';
import { REGION_CODE_MAP } from './data/regionCodes';
import { NEW_API_COLUMNS } from './types/transaction.types';
import { cellToString } from './utils/coerce';

export class RegionCodeRegistry {
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger.child('region-codes');
  }

  /**
   * Resolves a 5-digit 시군구 code to "시도 시군구". Float artifacts such as
   * "11380.0" are cut at the decimal point. Unknown codes come back unchanged,
   * blank codes as '', and both are reported to `warnings` when given.
   */
  lookup(code: CellValue, warnings?: WarningCollector, row = 0): string {
    const normalized = this.normalizeCode(code);
    if (!normalized) {
      this.report('Region code is missing; region name left blank', code, warnings, row);
      return '';
    }

    if (this.hasCode(normalized)) {
      return REGION_CODE_MAP[normalized];
    }

    this.report(
      `Region code '${normalized}' not found in mapping table; using code as-is`,
      code,
      warnings,
      row,
    );
    return normalized;
  }

  isKnown(code: CellValue): boolean {
    const normalized = this.normalizeCode(code);
    return normalized !== '' && this.hasCode(normalized);
  }

  allCodes(): Record<string, string> {
    return { ...REGION_CODE_MAP };
  }

  private report(message: string, code: CellValue, warnings: WarningCollector | undefined, row: number): void {
    if (warnings) {
      warnings.add({ row, field: NEW_API_COLUMNS.regionCode, value: code, message });
    } else {
      this.logger.warn(message);
    }
  }

  private hasCode(code: string): boolean {
    return Object.prototype.hasOwnProperty.call(REGION_CODE_MAP, code);
  }

  private normalizeCode(code: CellValue): string {
    const trimmed = cellToString(code).trim();
    const dot = trimmed.indexOf('.');
    return dot >= 0 ? trimmed.slice(0, dot) : trimmed;
  }
}

export const regionCodeRegistry = new RegionCodeRegistry();
