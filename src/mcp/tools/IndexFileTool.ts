import path from 'node:path';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorMessage } from '../../shared/Logger.js';

/**
 * MCP Tool: ndf_index_file
 * 分類並索引單一檔案（路徑可為絕對路徑或相對於文件根目錄）。
 */
export function registerIndexFileTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'ndf_index_file',
    'Classify and index a single file under the document root',
    {
      path: z.string().min(1).describe('Absolute path, or path relative to the document root'),
    },
    async ({ path: filePath }) => {
      const absPath = path.resolve(deps.scan.rootDir, filePath);
      try {
        const doc = await deps.scan.classifyFile(absPath);
        if (!doc) {
          return {
            content: [{
              type: 'text' as const,
              text: `Not indexed: ${absPath} is not an eligible document (needs <category 1>/<category 2>/file with an allowed extension).`,
            }],
            isError: true,
          };
        }

        const { record, extraction } = await deps.indexer.indexDocument(doc);
        const lines = [
          '# Indexed',
          '',
          `Path: ${record.path}`,
          `Id: ${record.id}`,
          `Categories: ${record.category1} / ${record.category2}`,
          `Title: ${record.title}`,
          `Extraction: ${extraction}`,
        ];
        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
        };
      } catch (err) {
        return {
          content: [{ type: 'text' as const, text: `Indexing failed for ${absPath}: ${errorMessage(err)}` }],
          isError: true,
        };
      }
    },
  );
}
