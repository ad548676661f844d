import { z } from 'zod';

import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import { parseCompactDate } from '../transactions/PreprocessingPipeline';
import { RegionCodeRegistry } from '../transactions/RegionCodeRegistry';
import type { GroupStat } from '../transactions/utils/transactionAnalyzer';
import { TransactionAnalyzer } from '../transactions/utils/transactionAnalyzer';
import {
  TransactionDashboardClient,
  type AnalysisReport,
  type DatasetLoadResult,
} from './transaction-dashboard';
import type { MCPRequest, MCPResponse, MCPTextContent, MCPTool } from './types';

const SERVER_NAME = 'apt-transaction-dashboard';
const SERVER_VERSION = '1.0.0';

const DateArgument = z.string().transform((value, ctx) => {
  const parsed = /^\d{4}-\d{2}-\d{2}$/.test(value) ? parseCompactDate(value.replace(/-/g, '')) : null;
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: '날짜는 YYYY-MM-DD 형식이어야 합니다.' });
    return z.NEVER;
  }
  return parsed;
});

const AnalyzeArgumentsSchema = z.object({
  filePath: z.string().min(1, '파일 경로를 입력해주세요.'),
  regions: z.array(z.string()).optional(),
  complexKeyword: z.string().optional(),
  startDate: DateArgument.optional(),
  endDate: DateArgument.optional(),
  minArea: z.number().nonnegative().optional(),
  maxArea: z.number().positive().optional(),
  periodMonths: z.union([z.literal(3), z.literal(6), z.literal(12)]).optional(),
  criteria: z.enum(['complex', 'complex_area', 'complex_area_floor']).optional(),
  trendUnit: z.enum(['month', 'quarter']).optional(),
});

const LookupArgumentsSchema = z.object({
  code: z.union([z.string().min(1), z.number()]),
});

const ToolCallSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional(),
});

const TOOLS: MCPTool[] = [
  {
    name: 'analyze_transactions',
    description: '아파트 실거래가 엑셀 파일(기존 형식 또는 신규 API 형식)을 정규화하고 요약 분석',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: { type: 'string', description: '.xlsx/.xls 파일 경로' },
        regions: { type: 'array', items: { type: 'string' }, description: '시군구 필터' },
        complexKeyword: { type: 'string', description: '단지명 검색어' },
        startDate: { type: 'string', description: '조회 시작일 (YYYY-MM-DD)' },
        endDate: { type: 'string', description: '조회 종료일 (YYYY-MM-DD)' },
        minArea: { type: 'number', description: '최소 전용면적(㎡)' },
        maxArea: { type: 'number', description: '최대 전용면적(㎡)' },
        periodMonths: { type: 'number', enum: [3, 6, 12], description: '신고가 비교 기간(개월)' },
        criteria: {
          type: 'string',
          enum: ['complex', 'complex_area', 'complex_area_floor'],
          description: '신고가 비교 조건',
        },
        trendUnit: {
          type: 'string',
          enum: ['month', 'quarter'],
          description: '상승률 추이 단위 (월별/분기별)',
        },
      },
      required: ['filePath'],
    },
  },
  {
    name: 'lookup_region_code',
    description: '시군구 코드(5자리)를 지역명으로 변환',
    inputSchema: {
      type: 'object',
      properties: {
        code: { type: 'string', description: '시군구 코드 (예: 11380)' },
      },
      required: ['code'],
    },
  },
];

const formatNumber = (value: number | null): string =>
  value === null ? '-' : Math.round(value).toLocaleString('ko-KR');

export class MCPHandler {
  private readonly client: TransactionDashboardClient;
  private readonly registry: RegionCodeRegistry;
  private readonly logger: Logger;

  constructor(client?: TransactionDashboardClient, logger: Logger = defaultLogger) {
    this.logger = logger.child('mcp');
    this.client = client ?? new TransactionDashboardClient({}, logger);
    this.registry = new RegionCodeRegistry(logger);
  }

  async handleRequest(request: MCPRequest): Promise<MCPResponse> {
    const { method, params, id } = request;
    try {
      switch (method) {
        case 'initialize':
          return this.handleInitialize(id);

        case 'tools/list':
          return { jsonrpc: '2.0', id, result: { tools: TOOLS } };

        case 'tools/call':
          return await this.handleToolsCall(id, params);

        default:
          return this.error(id, -32601, `Unknown method: ${method}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Tool request failed', { method, message });
      return this.error(id, -32603, `Internal error: ${message}`);
    }
  }

  private handleInitialize(id: MCPResponse['id']): MCPResponse {
    return {
      jsonrpc: '2.0',
      id,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: {
          tools: {
            listChanged: false,
          },
        },
        serverInfo: {
          name: SERVER_NAME,
          version: SERVER_VERSION,
        },
      },
    };
  }

  private async handleToolsCall(id: MCPResponse['id'], params: unknown): Promise<MCPResponse> {
    if (params === undefined || params === null) {
      return this.error(id, -32602, '필수 파라미터 "params"가 누락되었습니다.');
    }

    const call = ToolCallSchema.safeParse(params);
    if (!call.success) {
      return this.error(id, -32602, '필수 파라미터 "name"이 누락되었습니다.');
    }

    const { name, arguments: args } = call.data;

    switch (name) {
      case 'analyze_transactions': {
        const parsed = AnalyzeArgumentsSchema.safeParse(args ?? {});
        if (!parsed.success) {
          return this.error(id, -32602, this.describeIssues(parsed.error));
        }
        const { filePath, periodMonths, criteria, trendUnit, ...filter } = parsed.data;
        const loaded = await this.client.loadFromPath(filePath);
        const text =
          loaded.status === 'success'
            ? this.formatReport(this.client.analyze(loaded.dataset, filter, { periodMonths, criteria, trendUnit }))
            : this.formatLoadError(loaded);
        return this.text(id, text);
      }

      case 'lookup_region_code': {
        const parsed = LookupArgumentsSchema.safeParse(args ?? {});
        if (!parsed.success) {
          return this.error(id, -32602, this.describeIssues(parsed.error));
        }
        const { code } = parsed.data;
        if (!this.registry.isKnown(code)) {
          return this.text(id, `⚠️ 등록되지 않은 지역코드입니다: ${code}`);
        }
        return this.text(id, `📍 ${code} → ${this.registry.lookup(code)}`);
      }

      default:
        return this.error(id, -32601, `Unknown tool: ${name}`);
    }
  }

  private formatLoadError(result: Extract<DatasetLoadResult, { status: 'error' }>): string {
    let output = `❌ ${result.message}`;
    if (result.columns) {
      output += `\n\n파일의 컬럼: ${result.columns.join(', ')}`;
    }
    return output;
  }

  private formatReport(report: AnalysisReport): string {
    const { summary } = report;
    let output = `🏢 **${report.fileName} 실거래가 분석**\n\n`;

    if (report.cancelledCount > 0) {
      output += `🚫 취소된 거래 ${report.cancelledCount}건 제외됨\n\n`;
    }

    if (summary.count === 0) {
      return `${output}⚠️ 조건에 맞는 거래가 없습니다.`;
    }

    output += '📊 **핵심 지표**\n';
    output += `• 거래건수: ${summary.count.toLocaleString('ko-KR')}건\n`;
    output += `• 평균 거래금액: ${formatNumber(summary.averageAmount)}만원\n`;
    output += `• 평균 평당가: ${formatNumber(summary.averagePricePerPyeong)}만원\n`;
    output += `• 최고가 / 최저가: ${formatNumber(summary.maxAmount)} / ${formatNumber(summary.minAmount)}만원\n`;

    output += '\n🗺️ **지역별 거래**\n';
    output += this.formatGroups(report.regions.slice(0, 5));

    output += '\n📐 **평형대별 평균 평당가**\n';
    output += this.formatGroups(report.areas);

    output += '\n🏢 **층수 구간별 평균 평당가**\n';
    output += this.formatGroups(report.floors);

    if (report.monthlyPriceTrend.length > 0) {
      const latest = report.monthlyPriceTrend[report.monthlyPriceTrend.length - 1];
      output += `\n📅 최근 거래월: ${TransactionAnalyzer.formatYearMonthKorean(latest.yearMonth)} (${latest.count}건)\n`;
      if (latest.changeRate !== null) {
        const sign = latest.changeRate >= 0 ? '+' : '';
        output += `• 전월 대비 평균 거래금액: ${sign}${latest.changeRate.toFixed(1)}%\n`;
      }
    }

    if (report.highFloorPremium) {
      const premium = report.highFloorPremium;
      output += `\n📈 고층 프리미엄: ${premium.premiumRate.toFixed(2)}% (${premium.threshold}층 이상 기준)\n`;
    }

    const { appreciation } = report;
    if (appreciation.status === 'success' && appreciation.groups.length > 0) {
      output += `\n📈 **${appreciation.periodMonths}개월 전 대비 상승률 TOP 3**\n`;
      appreciation.groups.slice(0, 3).forEach((group, index) => {
        output += `${index + 1}. ${group.complexName}: ${group.riseRate.toFixed(1)}% (${formatNumber(group.pastAverage)} → ${formatNumber(group.currentAverage)}만원)\n`;
      });
    }

    const { riseTrend } = report;
    if (riseTrend.status === 'success' && riseTrend.points.length > 0) {
      output += `\n📊 **과거 ${riseTrend.periodMonths}개월 평균 대비 상승률 추이**\n`;
      riseTrend.points.forEach(point => {
        const riseRate = point.riseRate === null ? '-' : `${point.riseRate.toFixed(1)}%`;
        output += `• ${point.label}: ${formatNumber(point.averageAmount)}만원 (${riseRate})\n`;
      });
    }

    return output.trimEnd();
  }

  private formatGroups(groups: GroupStat[]): string {
    return groups
      .map(
        group =>
          `• ${group.key}: ${group.count}건, 평균 ${formatNumber(group.averageAmount)}만원, 평당 ${formatNumber(group.averagePricePerPyeong)}만원\n`,
      )
      .join('');
  }

  private describeIssues(error: z.ZodError): string {
    const details = error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    return `잘못된 파라미터입니다. ${details}`;
  }

  private text(id: MCPResponse['id'], text: string): MCPResponse {
    const result: MCPTextContent = { content: [{ type: 'text', text }] };
    return { jsonrpc: '2.0', id, result };
  }

  private error(id: MCPResponse['id'], code: number, message: string): MCPResponse {
    return { jsonrpc: '2.0', id, error: { code, message } };
  }
}
