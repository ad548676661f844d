export type {
  AnalysisReport,
  DatasetLoadResult,
  TransactionDataset,
  TransactionDashboardOptions,
} from './transaction-dashboard';

export interface MCPRequest {
  jsonrpc: string;
  id: string | number | null;
  method: string;
  params?: unknown;
}

export interface MCPError {
  code: number;
  message: string;
}

export interface MCPResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: MCPError;
}

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: string;
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface MCPTextContent {
  content: Array<{ type: 'text'; text: string }>;
}
