import { describe, expect, it } from 'vitest';

import type { PreprocessedRow } from '../types/transaction.types';
import { mean, TransactionAnalyzer } from './transactionAnalyzer';

interface DealInput {
  region?: string;
  complex?: string;
  area?: number;
  amount: number;
  date: string;
  floor?: string | number;
  buildYear?: number;
}

const deal = ({
  region = '서울특별시 은평구 불광동',
  complex = '불광미성',
  area = 59.4,
  amount,
  date,
  floor = 7,
  buildYear = 2000,
}: DealInput): PreprocessedRow => ({
  시군구: region,
  단지명: complex,
  '전용면적(㎡)': area,
  '거래금액(만원)': amount,
  층: floor,
  건축년도: buildYear,
  거래일자: new Date(`${date}T00:00:00.000Z`),
  평수: area / 3.3,
  '평당가(만원)': amount / (area / 3.3),
});

describe('mean', () => {
  it('skips non-finite values', () => {
    expect(mean([1, 2, NaN, Infinity, 3])).toBe(2);
    expect(mean([NaN])).toBeNull();
    expect(mean([])).toBeNull();
  });
});

describe('TransactionAnalyzer', () => {
  const rows = [
    deal({ complex: '불광미성', amount: 50000, date: '2024-01-10', area: 33, floor: 3 }),
    deal({ complex: '북한산힐스테이트', amount: 90000, date: '2024-02-03', area: 84.9, floor: '15층' }),
    deal({
      region: '서울특별시 마포구 아현동',
      complex: '마포래미안푸르지오',
      amount: 180000,
      date: '2024-02-20',
      area: 84.9,
      floor: 22,
      buildYear: 2014,
    }),
    deal({
      region: '서울특별시 마포구 아현동',
      complex: '마포래미안푸르지오',
      amount: 240000,
      date: '2024-03-05',
      area: 114,
      floor: 31,
      buildYear: 2016,
    }),
  ];

  describe('filterTransactions', () => {
    it('returns everything with an empty filter', () => {
      expect(TransactionAnalyzer.filterTransactions(rows, { regions: [], complexes: [] })).toHaveLength(4);
    });

    it('filters by region and keyword', () => {
      const byRegion = TransactionAnalyzer.filterTransactions(rows, { regions: ['서울특별시 마포구 아현동'] });
      expect(byRegion.map(row => row['거래금액(만원)'])).toEqual([180000, 240000]);

      const byKeyword = TransactionAnalyzer.filterTransactions(rows, { complexKeyword: ' 힐스 ' });
      expect(byKeyword.map(row => row.단지명)).toEqual(['북한산힐스테이트']);
    });

    it('treats date and area bounds as inclusive', () => {
      const filtered = TransactionAnalyzer.filterTransactions(rows, {
        startDate: new Date('2024-02-03T00:00:00.000Z'),
        endDate: new Date('2024-02-20T00:00:00.000Z'),
        minArea: 84.9,
        maxArea: 84.9,
      });
      expect(filtered.map(row => row['거래금액(만원)'])).toEqual([90000, 180000]);
    });

    it('drops rows without an area once an area bound is set', () => {
      const withNaN = [...rows, deal({ amount: 1000, date: '2024-01-01', area: NaN })];
      expect(TransactionAnalyzer.filterTransactions(withNaN, { minArea: 0 })).toHaveLength(4);
      expect(TransactionAnalyzer.filterTransactions(withNaN)).toHaveLength(5);
    });
  });

  it('summarizes amounts and price per pyeong', () => {
    const summary = TransactionAnalyzer.summarize(rows);
    expect(summary.count).toBe(4);
    expect(summary.averageAmount).toBe(140000);
    expect(summary.maxAmount).toBe(240000);
    expect(summary.minAmount).toBe(50000);
    expect(TransactionAnalyzer.summarize([])).toEqual({
      count: 0,
      averageAmount: null,
      averagePricePerPyeong: null,
      maxAmount: null,
      minAmount: null,
    });
  });

  it('classifies areas on the category boundaries', () => {
    expect(TransactionAnalyzer.classifyArea(59.99)).toBe('소형(59㎡이하)');
    expect(TransactionAnalyzer.classifyArea(60)).toBe('중소형(59~84㎡)');
    expect(TransactionAnalyzer.classifyArea(85)).toBe('중형(85~102㎡)');
    expect(TransactionAnalyzer.classifyArea(102)).toBe('중대형(102~135㎡)');
    expect(TransactionAnalyzer.classifyArea(135)).toBe('대형(135㎡초과)');
    expect(TransactionAnalyzer.classifyArea(NaN)).toBeNull();
  });

  it('parses and classifies floors', () => {
    expect(TransactionAnalyzer.parseFloor('12층')).toBe(12);
    expect(TransactionAnalyzer.parseFloor(' 3 ')).toBe(3);
    expect(TransactionAnalyzer.parseFloor('지하')).toBeNull();
    expect(TransactionAnalyzer.classifyFloor(5)).toBe('저층(1~5층)');
    expect(TransactionAnalyzer.classifyFloor('15층')).toBe('중층(6~15층)');
    expect(TransactionAnalyzer.classifyFloor(30)).toBe('고층(16~30층)');
    expect(TransactionAnalyzer.classifyFloor(31)).toBe('초고층(31층 이상)');
    expect(TransactionAnalyzer.classifyFloor(null)).toBe('정보없음');
  });

  it('uses right-closed price bands', () => {
    expect(TransactionAnalyzer.classifyPriceBand(50000)).toBe('5억 미만');
    expect(TransactionAnalyzer.classifyPriceBand(50001)).toBe('5억~10억');
    expect(TransactionAnalyzer.classifyPriceBand(300001)).toBe('30억 이상');
    expect(TransactionAnalyzer.classifyPriceBand(0)).toBeNull();
  });

  it('counts every price band, including empty ones', () => {
    expect(TransactionAnalyzer.priceBandDistribution(rows)).toEqual([
      { band: '5억 미만', count: 1 },
      { band: '5억~10억', count: 1 },
      { band: '10억~15억', count: 0 },
      { band: '15억~20억', count: 1 },
      { band: '20억~30억', count: 1 },
      { band: '30억 이상', count: 0 },
    ]);
  });

  it('orders region groups by deal count', () => {
    const regions = TransactionAnalyzer.regionSummary([
      ...rows,
      deal({ region: '서울특별시 마포구 아현동', amount: 120000, date: '2024-03-06' }),
    ]);
    expect(regions.map(group => [group.key, group.count])).toEqual([
      ['서울특별시 마포구 아현동', 3],
      ['서울특별시 은평구 불광동', 2],
    ]);
    expect(regions[0].minAmount).toBe(120000);
    expect(regions[0].maxAmount).toBe(240000);
  });

  it('keeps area and floor groups in category order', () => {
    expect(TransactionAnalyzer.areaSummary(rows).map(group => group.key)).toEqual([
      '소형(59㎡이하)',
      '중소형(59~84㎡)',
      '중대형(102~135㎡)',
    ]);
    expect(TransactionAnalyzer.floorSummary(rows).map(group => group.key)).toEqual([
      '저층(1~5층)',
      '중층(6~15층)',
      '고층(16~30층)',
      '초고층(31층 이상)',
    ]);
  });

  it('builds the monthly trend in ascending order', () => {
    const trend = TransactionAnalyzer.monthlyTrend([...rows].reverse());
    expect(trend.map(point => [point.key, point.count, point.averageAmount])).toEqual([
      ['2024-01', 1, 50000],
      ['2024-02', 2, 135000],
      ['2024-03', 1, 240000],
    ]);
  });

  it('groups deals into Monday-starting weeks', () => {
    const trend = TransactionAnalyzer.weeklyTrend([
      ...rows,
      deal({ amount: 70000, date: '2024-01-14' }),
    ]);
    expect(trend).toEqual([
      { week: '2024-01-08/2024-01-14', count: 2, averageAmount: 60000 },
      { week: '2024-01-29/2024-02-04', count: 1, averageAmount: 90000 },
      { week: '2024-02-19/2024-02-25', count: 1, averageAmount: 180000 },
      { week: '2024-03-04/2024-03-10', count: 1, averageAmount: 240000 },
    ]);
  });

  it('adds month-over-month change and trailing averages to the monthly trend', () => {
    const trend = TransactionAnalyzer.monthlyPriceTrend(rows);

    expect(trend.map(point => point.yearMonth)).toEqual(['2024-01', '2024-02', '2024-03']);
    expect(trend[0].changeRate).toBeNull();
    expect(trend[1].changeRate).toBeCloseTo(170, 8);
    expect(trend[2].changeRate).toBeCloseTo(77.7778, 3);
    expect(trend.map(point => point.movingAverage3)).toEqual([50000, 92500, expect.closeTo(141666.667, 2)]);
    expect(trend[2].movingAverage6).toBeCloseTo(141666.667, 2);
  });

  it('leaves the change rate empty after a month whose mean is 0', () => {
    const trend = TransactionAnalyzer.monthlyPriceTrend([
      deal({ amount: 0, date: '2024-01-05' }),
      deal({ amount: 1000, date: '2024-02-05' }),
    ]);
    expect(trend[1].changeRate).toBeNull();
  });

  it('reports price ranges of the busiest complexes', () => {
    expect(TransactionAnalyzer.complexPriceRanges(rows, 2)).toEqual([
      {
        complexName: '마포래미안푸르지오',
        count: 2,
        minAmount: 180000,
        maxAmount: 240000,
        averageAmount: 210000,
      },
      { complexName: '불광미성', count: 1, minAmount: 50000, maxAmount: 50000, averageAmount: 50000 },
    ]);
  });

  it('groups by build year and building age', () => {
    expect(TransactionAnalyzer.buildYearTrend(rows)).toEqual([
      { buildYear: 2000, count: 2, averageAmount: 70000 },
      { buildYear: 2014, count: 1, averageAmount: 180000 },
      { buildYear: 2016, count: 1, averageAmount: 240000 },
    ]);
    expect(
      TransactionAnalyzer.buildingAgeComparison(rows, 2015).map(group => [group.key, group.count]),
    ).toEqual([
      ['신축', 1],
      ['구축', 3],
    ]);
  });

  it('ranks complexes by average amount', () => {
    expect(TransactionAnalyzer.topComplexes(rows, 'amount', 2)).toEqual([
      { complexName: '마포래미안푸르지오', count: 2, average: 210000 },
      { complexName: '북한산힐스테이트', count: 1, average: 90000 },
    ]);
  });

  it('formats year-month keys in Korean', () => {
    expect(TransactionAnalyzer.formatYearMonthKorean('2025-01')).toBe('2025년 1월');
    expect(TransactionAnalyzer.formatYearMonthKorean('합계')).toBe('합계');
  });
});
