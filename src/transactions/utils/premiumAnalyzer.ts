import type { PreprocessedRow } from '../types/transaction.types';
import { LEGACY_COLUMNS } from '../types/transaction.types';
import {
  TransactionAnalyzer,
  amountOf,
  areaOf,
  complexOf,
  dateOf,
  mean,
  pricePerPyeongOf,
  yearMonthKey,
} from './transactionAnalyzer';

export type ComparisonPeriod = 3 | 6 | 12;

export type ComparisonCriteria = 'complex' | 'complex_area' | 'complex_area_floor';

export interface HighFloorPremium {
  /** 90th percentile of the floor numbers; floors at or above it count as top floors. */
  threshold: number;
  topCount: number;
  restCount: number;
  topAveragePricePerPyeong: number;
  restAveragePricePerPyeong: number;
  premiumAmount: number;
  premiumRate: number;
}

export interface GroupAppreciation {
  groupKey: string;
  complexName: string;
  pastAverage: number;
  currentAverage: number;
  riseAmount: number;
  riseRate: number;
}

export interface TransactionPremium {
  complexName: string;
  transactionDate: Date;
  dealAmount: number;
  pastAverage: number;
  premium: number;
  premiumRate: number;
}

export interface MonthlyPremium {
  yearMonth: string;
  averagePremium: number;
  averagePremiumRate: number;
}

export type TrendUnit = 'month' | 'quarter';

export interface AppreciationOptions {
  periodMonths?: ComparisonPeriod;
  criteria?: ComparisonCriteria;
  /** Bucket size of the rise-trend series. */
  trendUnit?: TrendUnit;
}

export interface RiseTrendPoint {
  /** "2024-07" for months, "2024Q3" for quarters. */
  period: string;
  label: string;
  averageAmount: number;
  /** Against the mean of the whole past period. */
  riseRate: number | null;
  /** Against the first period of the series. */
  cumulativeRate: number | null;
}

export type RiseTrendResult =
  | { status: 'insufficient'; unit: TrendUnit; periodMonths: ComparisonPeriod }
  | {
      status: 'success';
      unit: TrendUnit;
      periodMonths: ComparisonPeriod;
      pastAverage: number;
      points: RiseTrendPoint[];
    };

export type AppreciationResult =
  | {
      status: 'insufficient';
      periodMonths: ComparisonPeriod;
      criteria: ComparisonCriteria;
      anchorDate: Date | null;
      cutoffDate: Date | null;
      currentCount: number;
      pastCount: number;
    }
  | {
      status: 'success';
      periodMonths: ComparisonPeriod;
      criteria: ComparisonCriteria;
      anchorDate: Date;
      cutoffDate: Date;
      currentCount: number;
      pastCount: number;
      groups: GroupAppreciation[];
      premiums: TransactionPremium[];
      monthlyPremiums: MonthlyPremium[];
    };

/** Linear-interpolated quantile of an already sorted list. */
export const quantile = (sorted: number[], q: number): number => {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

/** Calendar-month subtraction; the day is clamped to the target month's length. */
export const subtractMonths = (date: Date, months: number): Date => {
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() - months;
  const year = Math.floor(totalMonths / 12);
  const month = totalMonths - year * 12;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return new Date(Date.UTC(year, month, Math.min(date.getUTCDate(), lastDay)));
};

const periodKey = (date: Date, unit: TrendUnit): string =>
  unit === 'month'
    ? yearMonthKey(date)
    : `${date.getUTCFullYear()}Q${Math.floor(date.getUTCMonth() / 3) + 1}`;

const periodLabel = (key: string, unit: TrendUnit): string => {
  if (unit === 'month') return TransactionAnalyzer.formatYearMonthKorean(key);
  const [year, quarter] = key.split('Q');
  return `${year}년 ${quarter}분기`;
};

const rate = (value: number, base: number): number | null =>
  base === 0 ? null : ((value - base) / base) * 100;

interface PeriodSplit {
  anchorDate: Date;
  cutoffDate: Date;
  current: PreprocessedRow[];
  past: PreprocessedRow[];
}

const splitAtPeriod = (rows: PreprocessedRow[], periodMonths: ComparisonPeriod): PeriodSplit => {
  const anchorDate = new Date(
    rows.reduce((latest, row) => Math.max(latest, dateOf(row).getTime()), -Infinity),
  );
  const cutoffDate = subtractMonths(anchorDate, periodMonths);
  const cutoff = cutoffDate.getTime();
  return {
    anchorDate,
    cutoffDate,
    current: rows.filter(row => dateOf(row).getTime() > cutoff),
    past: rows.filter(row => dateOf(row).getTime() <= cutoff),
  };
};

const areaShortLabel = (row: PreprocessedRow): string => {
  const category = TransactionAnalyzer.classifyArea(areaOf(row));
  if (category === null) return '기타';
  return category.slice(0, category.indexOf('('));
};

const floorShortLabel = (row: PreprocessedRow): string => {
  const floor = TransactionAnalyzer.parseFloor(row[LEGACY_COLUMNS.floor]);
  if (floor === null) return '기타';
  if (floor <= 5) return '저층';
  if (floor <= 15) return '중층';
  if (floor <= 30) return '고층';
  return '초고층';
};

export class PremiumAnalyzer {
  static groupKey(row: PreprocessedRow, criteria: ComparisonCriteria): string {
    const complexName = complexOf(row);
    switch (criteria) {
      case 'complex':
        return complexName;
      case 'complex_area':
        return `${complexName}_${areaShortLabel(row)}`;
      default:
        return `${complexName}_${areaShortLabel(row)}_${floorShortLabel(row)}`;
    }
  }

  /**
   * Compares the mean price per pyeong of the top 10% floors with the rest.
   * Returns null when there are no parseable floors or one side is empty.
   */
  static highFloorPremium(rows: PreprocessedRow[]): HighFloorPremium | null {
    const withFloor = rows
      .map(row => ({ row, floor: TransactionAnalyzer.parseFloor(row[LEGACY_COLUMNS.floor]) }))
      .filter((entry): entry is { row: PreprocessedRow; floor: number } => entry.floor !== null);

    if (withFloor.length === 0) return null;

    const threshold = quantile(
      withFloor.map(entry => entry.floor).sort((a, b) => a - b),
      0.9,
    );
    const top = withFloor.filter(entry => entry.floor >= threshold).map(entry => entry.row);
    const rest = withFloor.filter(entry => entry.floor < threshold).map(entry => entry.row);

    const topAverage = mean(top.map(pricePerPyeongOf));
    const restAverage = mean(rest.map(pricePerPyeongOf));
    if (topAverage === null || restAverage === null || restAverage === 0) return null;

    return {
      threshold,
      topCount: top.length,
      restCount: rest.length,
      topAveragePricePerPyeong: topAverage,
      restAveragePricePerPyeong: restAverage,
      premiumAmount: topAverage - restAverage,
      premiumRate: ((topAverage - restAverage) / restAverage) * 100,
    };
  }

  /**
   * Splits the rows at `periodMonths` before the latest deal and compares each
   * group's recent mean with its earlier mean (신고가 추세). Groups without
   * deals on both sides, or with a non-positive earlier mean, are left out.
   */
  static appreciation(rows: PreprocessedRow[], options: AppreciationOptions = {}): AppreciationResult {
    const periodMonths = options.periodMonths ?? 6;
    const criteria = options.criteria ?? 'complex';

    if (rows.length === 0) {
      return {
        status: 'insufficient',
        periodMonths,
        criteria,
        anchorDate: null,
        cutoffDate: null,
        currentCount: 0,
        pastCount: 0,
      };
    }

    const { anchorDate, cutoffDate, current, past } = splitAtPeriod(rows, periodMonths);

    if (past.length === 0) {
      return {
        status: 'insufficient',
        periodMonths,
        criteria,
        anchorDate,
        cutoffDate,
        currentCount: current.length,
        pastCount: 0,
      };
    }

    const pastAverages = this.averageByGroup(past, criteria);
    const currentAverages = this.averageByGroup(current, criteria);

    const groups: GroupAppreciation[] = [];
    currentAverages.forEach((entry, groupKey) => {
      const pastEntry = pastAverages.get(groupKey);
      if (!pastEntry || pastEntry.average <= 0) return;
      groups.push({
        groupKey,
        complexName: entry.complexName,
        pastAverage: pastEntry.average,
        currentAverage: entry.average,
        riseAmount: entry.average - pastEntry.average,
        riseRate: ((entry.average - pastEntry.average) / pastEntry.average) * 100,
      });
    });
    groups.sort((a, b) => b.riseRate - a.riseRate);

    const premiums: TransactionPremium[] = [];
    current.forEach(row => {
      const pastEntry = pastAverages.get(this.groupKey(row, criteria));
      if (!pastEntry || pastEntry.average <= 0) return;
      const dealAmount = amountOf(row);
      const premium = dealAmount - pastEntry.average;
      premiums.push({
        complexName: complexOf(row),
        transactionDate: dateOf(row),
        dealAmount,
        pastAverage: pastEntry.average,
        premium,
        premiumRate: (premium / pastEntry.average) * 100,
      });
    });

    return {
      status: 'success',
      periodMonths,
      criteria,
      anchorDate,
      cutoffDate,
      currentCount: current.length,
      pastCount: past.length,
      groups,
      premiums: [...premiums].sort((a, b) => b.premium - a.premium),
      monthlyPremiums: this.monthlyPremiums(premiums),
    };
  }

  /**
   * Mean amount of each month or quarter in the recent period, compared with
   * the mean of the whole earlier period and with the first recent period.
   */
  static riseTrend(rows: PreprocessedRow[], options: AppreciationOptions = {}): RiseTrendResult {
    const periodMonths = options.periodMonths ?? 6;
    const unit = options.trendUnit ?? 'month';
    if (rows.length === 0) return { status: 'insufficient', unit, periodMonths };

    const { current, past } = splitAtPeriod(rows, periodMonths);
    const pastAverage = mean(past.map(amountOf));
    if (pastAverage === null) return { status: 'insufficient', unit, periodMonths };

    const buckets = new Map<string, number[]>();
    current.forEach(row => {
      const key = periodKey(dateOf(row), unit);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(amountOf(row));
      } else {
        buckets.set(key, [amountOf(row)]);
      }
    });

    const averages: Array<{ period: string; averageAmount: number }> = [];
    Array.from(buckets.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .forEach(([period, amounts]) => {
        const averageAmount = mean(amounts);
        if (averageAmount !== null) averages.push({ period, averageAmount });
      });

    const first = averages.length > 0 ? averages[0].averageAmount : 0;
    return {
      status: 'success',
      unit,
      periodMonths,
      pastAverage,
      points: averages.map(({ period, averageAmount }) => ({
        period,
        label: periodLabel(period, unit),
        averageAmount,
        riseRate: rate(averageAmount, pastAverage),
        cumulativeRate: rate(averageAmount, first),
      })),
    };
  }

  private static averageByGroup(
    rows: PreprocessedRow[],
    criteria: ComparisonCriteria,
  ): Map<string, { complexName: string; average: number }> {
    const buckets = new Map<string, { complexName: string; amounts: number[] }>();
    rows.forEach(row => {
      const key = this.groupKey(row, criteria);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.amounts.push(amountOf(row));
      } else {
        buckets.set(key, { complexName: complexOf(row), amounts: [amountOf(row)] });
      }
    });

    const averages = new Map<string, { complexName: string; average: number }>();
    buckets.forEach((bucket, key) => {
      const average = mean(bucket.amounts);
      if (average !== null) averages.set(key, { complexName: bucket.complexName, average });
    });
    return averages;
  }

  private static monthlyPremiums(premiums: TransactionPremium[]): MonthlyPremium[] {
    const buckets = new Map<string, TransactionPremium[]>();
    premiums.forEach(entry => {
      const key = yearMonthKey(entry.transactionDate);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(entry);
      } else {
        buckets.set(key, [entry]);
      }
    });

    return Array.from(buckets.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([yearMonth, bucket]) => ({
        yearMonth,
        averagePremium: mean(bucket.map(entry => entry.premium)) ?? 0,
        averagePremiumRate: mean(bucket.map(entry => entry.premiumRate)) ?? 0,
      }));
  }
}
