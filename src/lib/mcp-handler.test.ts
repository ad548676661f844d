import * as XLSX from 'xlsx';
import { describe, expect, it, vi } from 'vitest';

import { Logger } from '../utils/logger';
import type { CellValue } from '../transactions/base/types';
import { MCPHandler } from './mcp-handler';
import { TransactionDashboardClient } from './transaction-dashboard';
import type { MCPResponse } from './types';

const silent = new Logger('error', () => undefined);

const toWorkbookBuffer = (rows: CellValue[][]): Buffer => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
};

const files: Record<string, Buffer> = {
  '/data/deals.xlsx': toWorkbookBuffer([
    ['sggCd', 'umdNm', 'aptNm', 'excluUseAr', 'dealYear', 'dealMonth', 'dealDay', 'dealAmount', 'floor', 'buildYear', 'cdealDay'],
    ['11380', '불광동', '북한산힐스테이트', 59.4, 2024, 7, 5, '59,400', 12, 2010, null],
    ['11440', '아현동', '마포래미안푸르지오', 84.9, 2024, 8, 20, '99,000', 20, 2014, null],
    ['11380', '불광동', '북한산힐스테이트', 59.4, 2024, 8, 1, '60,000', 3, 2010, '24.08.15'],
  ]),
  '/data/other.xlsx': toWorkbookBuffer([
    ['price', 'name'],
    [1, 'x'],
  ]),
};

const createHandler = () => {
  const client = new TransactionDashboardClient(
    {
      env: () => undefined,
      readFile: async filePath => {
        const data = files[filePath];
        if (!data) throw new Error(`ENOENT: ${filePath}`);
        return data;
      },
    },
    silent,
  );
  return { client, handler: new MCPHandler(client, silent) };
};

const call = (handler: MCPHandler, name: string, args?: unknown) =>
  handler.handleRequest({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name, arguments: args } });

const textOf = (response: MCPResponse): string => {
  const result = response.result;
  if (typeof result !== 'object' || result === null || !('content' in result) || !Array.isArray(result.content)) {
    throw new Error('expected text content');
  }
  const [first] = result.content;
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('expected text content');
  }
  return first.text;
};

describe('MCPHandler', () => {
  it('answers initialize with the server info', async () => {
    const { handler } = createHandler();
    const response = await handler.handleRequest({ jsonrpc: '2.0', id: 'init', method: 'initialize' });
    expect(response).toMatchObject({
      jsonrpc: '2.0',
      id: 'init',
      result: { serverInfo: { name: 'apt-transaction-dashboard', version: '1.0.0' } },
    });
  });

  it('lists both tools', async () => {
    const { handler } = createHandler();
    const response = await handler.handleRequest({ jsonrpc: '2.0', id: 2, method: 'tools/list' });
    expect(response.result).toMatchObject({
      tools: [{ name: 'analyze_transactions' }, { name: 'lookup_region_code' }],
    });
  });

  it('rejects unknown methods and tools', async () => {
    const { handler } = createHandler();
    expect(await handler.handleRequest({ jsonrpc: '2.0', id: 3, method: 'resources/list' })).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32601, message: 'Unknown method: resources/list' },
    });
    expect((await call(handler, 'forecast_prices')).error).toEqual({
      code: -32601,
      message: 'Unknown tool: forecast_prices',
    });
  });

  it('validates tool call parameters', async () => {
    const { handler } = createHandler();

    const noParams = await handler.handleRequest({ jsonrpc: '2.0', id: 4, method: 'tools/call' });
    expect(noParams.error).toEqual({ code: -32602, message: '필수 파라미터 "params"가 누락되었습니다.' });

    const noName = await handler.handleRequest({ jsonrpc: '2.0', id: 5, method: 'tools/call', params: {} });
    expect(noName.error).toEqual({ code: -32602, message: '필수 파라미터 "name"이 누락되었습니다.' });

    const badDate = await call(handler, 'analyze_transactions', { filePath: '/data/deals.xlsx', startDate: '2024/01/01' });
    expect(badDate.error).toEqual({
      code: -32602,
      message: '잘못된 파라미터입니다. startDate: 날짜는 YYYY-MM-DD 형식이어야 합니다.',
    });

    const badUnit = await call(handler, 'analyze_transactions', { filePath: '/data/deals.xlsx', trendUnit: 'week' });
    expect(badUnit.error?.code).toBe(-32602);

    const impossibleDate = await call(handler, 'analyze_transactions', { filePath: '/data/deals.xlsx', endDate: '2024-02-30' });
    expect(impossibleDate.error?.code).toBe(-32602);
  });

  describe('lookup_region_code', () => {
    it('resolves known codes given as text or number', async () => {
      const { handler } = createHandler();
      expect(textOf(await call(handler, 'lookup_region_code', { code: '11380' }))).toBe('📍 11380 → 서울특별시 은평구');
      expect(textOf(await call(handler, 'lookup_region_code', { code: 11440 }))).toBe('📍 11440 → 서울특별시 마포구');
    });

    it('flags unknown codes', async () => {
      const { handler } = createHandler();
      expect(textOf(await call(handler, 'lookup_region_code', { code: '41135' }))).toBe(
        '⚠️ 등록되지 않은 지역코드입니다: 41135',
      );
    });
  });

  describe('analyze_transactions', () => {
    it('renders the report for a workbook', async () => {
      const { handler } = createHandler();
      const lines = textOf(await call(handler, 'analyze_transactions', { filePath: '/data/deals.xlsx' })).split('\n');

      expect(lines[0]).toBe('🏢 **deals.xlsx 실거래가 분석**');
      expect(lines).toContain('🚫 취소된 거래 1건 제외됨');
      expect(lines).toContain('• 거래건수: 2건');
      expect(lines).toContain('• 평균 거래금액: 79,200만원');
      expect(lines).toContain('• 최고가 / 최저가: 99,000 / 59,400만원');
      expect(lines).toContain('📅 최근 거래월: 2024년 8월 (1건)');
      expect(lines).toContain('• 전월 대비 평균 거래금액: +66.7%');
    });

    it('applies the filter arguments', async () => {
      const { handler } = createHandler();
      const text = textOf(
        await call(handler, 'analyze_transactions', {
          filePath: '/data/deals.xlsx',
          startDate: '2024-08-01',
          endDate: '2024-08-31',
        }),
      );
      expect(text.split('\n')).toContain('• 거래건수: 1건');
    });

    it('says so when no deal matches', async () => {
      const { handler } = createHandler();
      const text = textOf(
        await call(handler, 'analyze_transactions', { filePath: '/data/deals.xlsx', complexKeyword: '자이' }),
      );
      expect(text).toBe('🏢 **deals.xlsx 실거래가 분석**\n\n🚫 취소된 거래 1건 제외됨\n\n⚠️ 조건에 맞는 거래가 없습니다.');
    });

    it('shows load failures with the file columns', async () => {
      const { handler } = createHandler();

      const missing = textOf(await call(handler, 'analyze_transactions', { filePath: '/data/none.xlsx' }));
      expect(missing).toBe('❌ 파일을 열 수 없습니다: none.xlsx');

      const other = textOf(await call(handler, 'analyze_transactions', { filePath: '/data/other.xlsx' }));
      expect(other.startsWith('❌ 파일 형식을 확인할 수 없습니다.')).toBe(true);
      expect(other.endsWith('\n\n파일의 컬럼: name, price')).toBe(true);
    });

    it('turns unexpected failures into internal errors', async () => {
      const { client, handler } = createHandler();
      vi.spyOn(client, 'loadFromPath').mockRejectedValue(new Error('boom'));
      const response = await call(handler, 'analyze_transactions', { filePath: '/data/deals.xlsx' });
      expect(response.error).toEqual({ code: -32603, message: 'Internal error: boom' });
    });
  });
});
