export { MCPHandler } from './mcp-handler';
export { TransactionDashboardClient } from './transaction-dashboard';
export { readWorkbook, type ReadWorkbookOptions } from './workbook-loader';
export * from './types';
