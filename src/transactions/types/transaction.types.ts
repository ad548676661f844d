import type { CellValue, RawRow } from '../base/types';

// Column headers of the 국토교통부 실거래가 공개시스템 download.
export const LEGACY_COLUMNS = {
  rowNumber: 'NO',
  regionName: '시군구',
  complexName: '단지명',
  exclusiveArea: '전용면적(㎡)',
  contractYearMonth: '계약년월',
  contractDay: '계약일',
  dealAmount: '거래금액(만원)',
  floor: '층',
  buildYear: '건축년도',
  cancellationDate: '해제사유발생일',
} as const;

// Field names of the apartment trade API (RTMSDataSvcAptTrade) export.
export const NEW_API_COLUMNS = {
  regionCode: 'sggCd',
  legalDong: 'umdNm',
  complexName: 'aptNm',
  exclusiveArea: 'excluUseAr',
  dealYear: 'dealYear',
  dealMonth: 'dealMonth',
  dealDay: 'dealDay',
  dealAmount: 'dealAmount',
  floor: 'floor',
  buildYear: 'buildYear',
  cancellationDay: 'cdealDay',
} as const;

export const DERIVED_COLUMNS = {
  transactionDate: '거래일자',
  areaPyeong: '평수',
  pricePerPyeong: '평당가(만원)',
} as const;

export const LEGACY_SIGNATURE: readonly string[] = [
  LEGACY_COLUMNS.regionName,
  LEGACY_COLUMNS.complexName,
  LEGACY_COLUMNS.dealAmount,
];

export const NEW_API_SIGNATURE: readonly string[] = [
  NEW_API_COLUMNS.regionCode,
  NEW_API_COLUMNS.complexName,
  NEW_API_COLUMNS.dealAmount,
];

export const NEW_API_REQUIRED_COLUMNS: readonly string[] = [
  NEW_API_COLUMNS.regionCode,
  NEW_API_COLUMNS.complexName,
  NEW_API_COLUMNS.exclusiveArea,
  NEW_API_COLUMNS.dealYear,
  NEW_API_COLUMNS.dealMonth,
  NEW_API_COLUMNS.dealDay,
  NEW_API_COLUMNS.dealAmount,
  NEW_API_COLUMNS.floor,
  NEW_API_COLUMNS.buildYear,
];

export const LEGACY_COLUMN_ORDER: string[] = Object.values(LEGACY_COLUMNS);

/** 1평 ≈ 3.3㎡ */
export const SQM_PER_PYEONG = 3.3;

export interface LegacyRow extends RawRow {
  NO: number;
  시군구: string;
  단지명: CellValue;
  '전용면적(㎡)': number;
  계약년월: number;
  계약일: CellValue;
  '거래금액(만원)': number;
  층: CellValue;
  건축년도: CellValue;
  해제사유발생일: CellValue;
}

export interface PreprocessedRow extends RawRow {
  '거래금액(만원)': number;
  거래일자: Date;
  평수: number;
  '평당가(만원)': number;
}
