import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';
import { errorMessage } from '../../shared/Logger.js';

/**
 * MCP Tool: ndf_ingest
 * 對應 CLI: ndf-ingest ingest（不含監看模式）
 */
export function registerIngestTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'ndf_ingest',
    'Run a full indexing pass over the document tree',
    async () => {
      try {
        await deps.indexer.ensureIndex();
        const stats = await deps.ingest.runFullPass();

        const lines = [
          '# Indexing Complete',
          '',
          `Documents indexed: ${stats.docsIndexed}`,
          `Documents failed: ${stats.docsFailed}`,
          `Extracted: ${stats.extracted}`,
          `Skipped extraction (oversized): ${stats.oversized}`,
          `Extraction failed (indexed by title): ${stats.extractionFailed}`,
          `Duration: ${stats.durationMs}ms`,
        ];

        if (stats.warnings.length > 0) {
          lines.push('', '## Failures');
          for (const w of stats.warnings) {
            lines.push(`  - ${w}`);
          }
        }

        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
          isError: stats.docsFailed > 0 && stats.docsIndexed === 0,
        };
      } catch (err) {
        return {
          content: [{ type: 'text' as const, text: `Ingest failed: ${errorMessage(err)}` }],
          isError: true,
        };
      }
    },
  );
}
