import type { CellValue } from '../base/types';
import type { PreprocessedRow } from '../types/transaction.types';
import { DERIVED_COLUMNS, LEGACY_COLUMNS } from '../types/transaction.types';
import { cellToString, toInteger, toNumber } from './coerce';

export const AREA_CATEGORIES = [
  '소형(59㎡이하)',
  '중소형(59~84㎡)',
  '중형(85~102㎡)',
  '중대형(102~135㎡)',
  '대형(135㎡초과)',
] as const;

export type AreaCategory = (typeof AREA_CATEGORIES)[number];

export const FLOOR_CATEGORIES = [
  '저층(1~5층)',
  '중층(6~15층)',
  '고층(16~30층)',
  '초고층(31층 이상)',
  '정보없음',
] as const;

export type FloorCategory = (typeof FLOOR_CATEGORIES)[number];

const PRICE_BAND_EDGES = [0, 50000, 100000, 150000, 200000, 300000, 9999999];

export const PRICE_BANDS = [
  '5억 미만',
  '5억~10억',
  '10억~15억',
  '15억~20억',
  '20억~30억',
  '30억 이상',
] as const;

export type PriceBand = (typeof PRICE_BANDS)[number];

export interface TransactionFilter {
  regions?: string[];
  complexes?: string[];
  complexKeyword?: string;
  startDate?: Date;
  endDate?: Date;
  minArea?: number;
  maxArea?: number;
}

export interface TransactionSummary {
  count: number;
  averageAmount: number | null;
  averagePricePerPyeong: number | null;
  maxAmount: number | null;
  minAmount: number | null;
}

export interface GroupStat {
  key: string;
  count: number;
  averageAmount: number | null;
  minAmount: number | null;
  maxAmount: number | null;
  averagePricePerPyeong: number | null;
}

export interface PriceBandCount {
  band: PriceBand;
  count: number;
}

export interface BuildYearPoint {
  buildYear: number;
  count: number;
  averageAmount: number | null;
}

export interface ComplexRank {
  complexName: string;
  count: number;
  average: number;
}

export type ComplexMetric = 'amount' | 'pricePerPyeong';

export interface WeeklyPoint {
  /** Monday-to-Sunday span, e.g. "2024-07-01/2024-07-07". */
  week: string;
  count: number;
  averageAmount: number | null;
}

export interface MonthlyTrendPoint {
  yearMonth: string;
  count: number;
  averageAmount: number | null;
  /** Percent change of the mean amount from the previous month in the series. */
  changeRate: number | null;
  movingAverage3: number | null;
  movingAverage6: number | null;
}

export interface ComplexPriceRange {
  complexName: string;
  count: number;
  minAmount: number | null;
  maxAmount: number | null;
  averageAmount: number | null;
}

type KeyFn = (row: PreprocessedRow) => string | null;

export const regionOf = (row: PreprocessedRow): string => cellToString(row[LEGACY_COLUMNS.regionName]);
export const complexOf = (row: PreprocessedRow): string => cellToString(row[LEGACY_COLUMNS.complexName]);
export const areaOf = (row: PreprocessedRow): number => toNumber(row[LEGACY_COLUMNS.exclusiveArea]);
export const amountOf = (row: PreprocessedRow): number => row[LEGACY_COLUMNS.dealAmount];
export const pricePerPyeongOf = (row: PreprocessedRow): number => row[DERIVED_COLUMNS.pricePerPyeong];
export const dateOf = (row: PreprocessedRow): Date => row[DERIVED_COLUMNS.transactionDate];

/** Mean over finite values only; null when nothing is left. */
export const mean = (values: number[]): number | null => {
  const finite = values.filter(value => Number.isFinite(value));
  if (finite.length === 0) return null;
  return finite.reduce((sum, value) => sum + value, 0) / finite.length;
};

const finiteMax = (values: number[]): number | null =>
  values.reduce<number | null>(
    (max, value) => (Number.isFinite(value) && (max === null || value > max) ? value : max),
    null,
  );

const finiteMin = (values: number[]): number | null =>
  values.reduce<number | null>(
    (min, value) => (Number.isFinite(value) && (min === null || value < min) ? value : min),
    null,
  );

const DAY_MS = 24 * 60 * 60 * 1000;

const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const yearMonthKey = (date: Date): string =>
  `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;

const weekKey = (date: Date): string => {
  const monday = new Date(date.getTime() - ((date.getUTCDay() + 6) % 7) * DAY_MS);
  const sunday = new Date(monday.getTime() + 6 * DAY_MS);
  return `${isoDate(monday)}/${isoDate(sunday)}`;
};

/** Mean of the last `window` non-null values up to and including `index`. */
const trailingMean = (values: Array<number | null>, index: number, window: number): number | null => {
  const slice = values
    .slice(Math.max(0, index - window + 1), index + 1)
    .filter((value): value is number => value !== null);
  return mean(slice);
};

export class TransactionAnalyzer {
  static filterTransactions(rows: PreprocessedRow[], filter: TransactionFilter = {}): PreprocessedRow[] {
    const regions = filter.regions?.length ? new Set(filter.regions) : null;
    const complexes = filter.complexes?.length ? new Set(filter.complexes) : null;
    const keyword = filter.complexKeyword?.trim().toLowerCase() ?? '';

    return rows.filter(row => {
      if (regions && !regions.has(regionOf(row))) return false;

      const complexName = complexOf(row);
      if (complexes && !complexes.has(complexName)) return false;
      if (keyword && !complexName.toLowerCase().includes(keyword)) return false;

      const time = dateOf(row).getTime();
      if (filter.startDate && !(time >= filter.startDate.getTime())) return false;
      if (filter.endDate && !(time <= filter.endDate.getTime())) return false;

      const area = areaOf(row);
      if (filter.minArea !== undefined && !(area >= filter.minArea)) return false;
      if (filter.maxArea !== undefined && !(area <= filter.maxArea)) return false;

      return true;
    });
  }

  static summarize(rows: PreprocessedRow[]): TransactionSummary {
    const amounts = rows.map(amountOf);
    return {
      count: rows.length,
      averageAmount: mean(amounts),
      averagePricePerPyeong: mean(rows.map(pricePerPyeongOf)),
      maxAmount: finiteMax(amounts),
      minAmount: finiteMin(amounts),
    };
  }

  static classifyArea(sqm: number): AreaCategory | null {
    if (!Number.isFinite(sqm)) return null;
    if (sqm < 60) return '소형(59㎡이하)';
    if (sqm < 85) return '중소형(59~84㎡)';
    if (sqm < 102) return '중형(85~102㎡)';
    if (sqm < 135) return '중대형(102~135㎡)';
    return '대형(135㎡초과)';
  }

  /** 12, "12", "12층" → 12; anything else → null. */
  static parseFloor(value: CellValue): number | null {
    if (typeof value === 'string') {
      return toInteger(value.replace(/층/g, ''));
    }
    return toInteger(value);
  }

  static classifyFloor(value: CellValue): FloorCategory {
    const floor = this.parseFloor(value);
    if (floor === null) return '정보없음';
    if (floor <= 5) return '저층(1~5층)';
    if (floor <= 15) return '중층(6~15층)';
    if (floor <= 30) return '고층(16~30층)';
    return '초고층(31층 이상)';
  }

  /** Right-closed bins: 50000 belongs to "5억 미만", 50001 to "5억~10억". */
  static classifyPriceBand(amount: number): PriceBand | null {
    for (let index = 0; index < PRICE_BANDS.length; index += 1) {
      if (amount > PRICE_BAND_EDGES[index] && amount <= PRICE_BAND_EDGES[index + 1]) {
        return PRICE_BANDS[index];
      }
    }
    return null;
  }

  static groupStats(rows: PreprocessedRow[], keyFn: KeyFn, order?: readonly string[]): GroupStat[] {
    const groups = new Map<string, PreprocessedRow[]>();
    rows.forEach(row => {
      const key = keyFn(row);
      if (key === null) return;
      const bucket = groups.get(key);
      if (bucket) {
        bucket.push(row);
      } else {
        groups.set(key, [row]);
      }
    });

    const stats = Array.from(groups.entries()).map(([key, bucket]) => {
      const amounts = bucket.map(amountOf);
      return {
        key,
        count: bucket.length,
        averageAmount: mean(amounts),
        minAmount: finiteMin(amounts),
        maxAmount: finiteMax(amounts),
        averagePricePerPyeong: mean(bucket.map(pricePerPyeongOf)),
      };
    });

    if (order) {
      const rank = (key: string) => {
        const position = order.indexOf(key);
        return position === -1 ? order.length : position;
      };
      stats.sort((a, b) => rank(a.key) - rank(b.key));
    }

    return stats;
  }

  static regionSummary(rows: PreprocessedRow[]): GroupStat[] {
    return this.groupStats(rows, regionOf).sort((a, b) => b.count - a.count);
  }

  static areaSummary(rows: PreprocessedRow[]): GroupStat[] {
    return this.groupStats(rows, row => this.classifyArea(areaOf(row)), AREA_CATEGORIES);
  }

  static floorSummary(rows: PreprocessedRow[]): GroupStat[] {
    return this.groupStats(
      rows,
      row => this.classifyFloor(row[LEGACY_COLUMNS.floor]),
      FLOOR_CATEGORIES,
    );
  }

  static priceBandDistribution(rows: PreprocessedRow[]): PriceBandCount[] {
    const counts = new Map<PriceBand, number>(PRICE_BANDS.map(band => [band, 0]));
    rows.forEach(row => {
      const band = this.classifyPriceBand(amountOf(row));
      if (band) counts.set(band, (counts.get(band) ?? 0) + 1);
    });
    return PRICE_BANDS.map(band => ({ band, count: counts.get(band) ?? 0 }));
  }

  static monthlyTrend(rows: PreprocessedRow[]): GroupStat[] {
    return this.groupStats(rows, row => yearMonthKey(dateOf(row))).sort((a, b) =>
      a.key.localeCompare(b.key),
    );
  }

  /** Deal count and mean amount per Monday-starting week, ascending. */
  static weeklyTrend(rows: PreprocessedRow[]): WeeklyPoint[] {
    return this.groupStats(rows, row => weekKey(dateOf(row)))
      .sort((a, b) => a.key.localeCompare(b.key))
      .map(stat => ({ week: stat.key, count: stat.count, averageAmount: stat.averageAmount }));
  }

  /**
   * Monthly means with the change from the previous month and 3/6-month
   * trailing averages. A window averages whatever months it has, so the
   * first months are averaged over fewer points.
   */
  static monthlyPriceTrend(rows: PreprocessedRow[]): MonthlyTrendPoint[] {
    const months = this.monthlyTrend(rows);
    const averages = months.map(month => month.averageAmount);

    return months.map((month, index) => {
      const previous = index > 0 ? averages[index - 1] : null;
      const current = month.averageAmount;
      return {
        yearMonth: month.key,
        count: month.count,
        averageAmount: current,
        changeRate:
          previous === null || previous === 0 || current === null
            ? null
            : ((current - previous) / previous) * 100,
        movingAverage3: trailingMean(averages, index, 3),
        movingAverage6: trailingMean(averages, index, 6),
      };
    });
  }

  static buildYearTrend(rows: PreprocessedRow[]): BuildYearPoint[] {
    return this.groupStats(rows, row => {
      const year = toInteger(row[LEGACY_COLUMNS.buildYear]);
      return year === null ? null : String(year);
    })
      .map(stat => ({
        buildYear: Number(stat.key),
        count: stat.count,
        averageAmount: stat.averageAmount,
      }))
      .sort((a, b) => a.buildYear - b.buildYear);
  }

  /** 신축 when built in or after `cutoffYear`, 구축 otherwise. */
  static buildingAgeComparison(rows: PreprocessedRow[], cutoffYear: number): GroupStat[] {
    return this.groupStats(
      rows,
      row => {
        const year = toInteger(row[LEGACY_COLUMNS.buildYear]);
        if (year === null) return null;
        return year >= cutoffYear ? '신축' : '구축';
      },
      ['신축', '구축'],
    );
  }

  static topComplexes(rows: PreprocessedRow[], metric: ComplexMetric, limit: number): ComplexRank[] {
    const ranks: ComplexRank[] = [];

    this.groupStats(rows, complexOf).forEach(stat => {
      const average = metric === 'amount' ? stat.averageAmount : stat.averagePricePerPyeong;
      if (average !== null) {
        ranks.push({ complexName: stat.key, count: stat.count, average });
      }
    });

    return ranks.sort((a, b) => b.average - a.average).slice(0, limit);
  }

  /**
   * Min, max and mean amount of the `limit` complexes with the most deals,
   * ordered by mean amount descending.
   */
  static complexPriceRanges(rows: PreprocessedRow[], limit = 10): ComplexPriceRange[] {
    return this.groupStats(rows, complexOf)
      .sort((a, b) => b.count - a.count)
      .slice(0, limit)
      .map(stat => ({
        complexName: stat.key,
        count: stat.count,
        minAmount: stat.minAmount,
        maxAmount: stat.maxAmount,
        averageAmount: stat.averageAmount,
      }))
      .sort((a, b) => (b.averageAmount ?? -Infinity) - (a.averageAmount ?? -Infinity));
  }

  /** "2025-01" → "2025년 1월"; other strings pass through. */
  static formatYearMonthKorean(value: string): string {
    const match = /^(\d{4})-(\d{1,2})$/.exec(value);
    if (!match) return value;
    return `${match[1]}년 ${Number(match[2])}월`;
  }
}
