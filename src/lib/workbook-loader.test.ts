import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';

import { Logger } from '../utils/logger';
import { WorkbookLoadError } from '../transactions/base/errors';
import type { CellValue } from '../transactions/base/types';
import { readWorkbook } from './workbook-loader';

const silent = new Logger('error', () => undefined);

const toWorkbookBuffer = (rows: CellValue[][]): Buffer => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
};

const LEGACY_HEADER = ['NO', '시군구', '단지명', '전용면적(㎡)', '계약년월', '계약일', '거래금액(만원)', '층', '건축년도', '해제사유발생일'];

describe('readWorkbook', () => {
  it('reads a sheet whose first row is the header', () => {
    const data = toWorkbookBuffer([
      ['sggCd', 'aptNm', 'dealAmount'],
      ['11380', '북한산힐스테이트', '85,000'],
    ]);

    expect(readWorkbook(data, { logger: silent })).toEqual({
      columns: ['sggCd', 'aptNm', 'dealAmount'],
      rows: [{ sggCd: '11380', aptNm: '북한산힐스테이트', dealAmount: '85,000' }],
    });
  });

  it('skips the notes block above the header', () => {
    const data = toWorkbookBuffer([
      ['□ 본 자료는 계약일 기준입니다.'],
      ['□ 단위: 만원'],
      LEGACY_HEADER,
      [1, '서울특별시 은평구 불광동', '불광미성', 59.4, 202407, 5, '54,000', 7, 1986, '-'],
    ]);

    const table = readWorkbook(data, { logger: silent });
    expect(table.columns).toEqual(LEGACY_HEADER);
    expect(table.rows).toEqual([
      {
        NO: 1,
        시군구: '서울특별시 은평구 불광동',
        단지명: '불광미성',
        '전용면적(㎡)': 59.4,
        계약년월: 202407,
        계약일: 5,
        '거래금액(만원)': '54,000',
        층: 7,
        건축년도: 1986,
        해제사유발생일: '-',
      },
    ]);
  });

  it('fills empty cells with null and drops blank rows', () => {
    const data = toWorkbookBuffer([
      ['sggCd', 'aptNm', 'dealAmount', 'cdealDay'],
      ['11380', 'A', '1,000', null],
      [null, null, null, null],
      ['11440', 'B', '2,000', '24.08.01'],
    ]);

    const table = readWorkbook(data, { logger: silent });
    expect(table.rows).toEqual([
      { sggCd: '11380', aptNm: 'A', dealAmount: '1,000', cdealDay: null },
      { sggCd: '11440', aptNm: 'B', dealAmount: '2,000', cdealDay: '24.08.01' },
    ]);
  });

  it('names blank headers and disambiguates repeated ones', () => {
    const data = toWorkbookBuffer([
      ['sggCd', 'aptNm', 'dealAmount', '', 'aptNm'],
      ['11380', 'A', '1,000', 'x', 'B'],
    ]);

    const table = readWorkbook(data, { logger: silent });
    expect(table.columns).toEqual(['sggCd', 'aptNm', 'dealAmount', 'Unnamed: 3', 'aptNm.1']);
    expect(table.rows[0]['aptNm.1']).toBe('B');
  });

  it('falls back to the first row when no known header is found', () => {
    const data = toWorkbookBuffer([
      ['foo', 'bar'],
      [1, 2],
    ]);
    expect(readWorkbook(data, { logger: silent })).toEqual({
      columns: ['foo', 'bar'],
      rows: [{ foo: 1, bar: 2 }],
    });
  });

  it('only scans the configured number of leading rows for the header', () => {
    const data = toWorkbookBuffer([['안내'], ['안내'], ['안내'], ['sggCd', 'aptNm', 'dealAmount']]);
    const table = readWorkbook(data, { logger: silent, headerScanRows: 2 });
    expect(table.columns[0]).toBe('안내');
  });

  it('wraps unreadable input in WorkbookLoadError', () => {
    const corrupt = Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(32, 0xff)]);
    expect(() => readWorkbook(corrupt, { fileName: 'broken.xlsx', logger: silent })).toThrow(WorkbookLoadError);
  });
});
