import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';
import type { CategoryCounts } from '../../domain/entities/CategoryStats.js';
import { errorMessage } from '../../shared/Logger.js';

function signed(value: number): string {
  return `${value > 0 ? '+' : ''}${value}`;
}

function countLines(counts: CategoryCounts): string[] {
  return Object.entries(counts).map(([key, value]) => `  ${key}: ${signed(value)}`);
}

function pairLines(pairs: Record<string, CategoryCounts>): string[] {
  return Object.entries(pairs).flatMap(([category1, counts]) =>
    Object.entries(counts).map(([category2, value]) => `  ${category1} / ${category2}: ${signed(value)}`),
  );
}

/**
 * MCP Tool: ndf_stats
 * 對應 CLI: ndf-ingest stats
 */
export function registerStatsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'ndf_stats',
    'Compare eligible documents on disk with indexed documents, per category',
    async () => {
      try {
        const report = await deps.reconcile.reconcile();
        const lines: string[] = [
          '# Index Reconciliation',
          '',
          `Document root: ${report.docRoot}`,
          `Documents on disk: ${report.disk.total}`,
          `Documents in index: ${report.index.total}`,
          `Missing from index: ${report.diff.totalMissing}`,
          '',
          '## Missing by category 1 (disk − index)',
          ...countLines(report.diff.byCategory1Missing),
          '',
          '## Missing by category 2 (disk − index)',
          ...countLines(report.diff.byCategory2Missing),
          '',
          '## Missing by category pair (disk − index)',
          ...pairLines(report.diff.byCategoryPairMissing),
        ];

        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
        };
      } catch (err) {
        return {
          content: [{ type: 'text' as const, text: `Stats failed: ${errorMessage(err)}` }],
          isError: true,
        };
      }
    },
  );
}
