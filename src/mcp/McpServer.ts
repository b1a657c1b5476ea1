import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ScanUseCase } from '../application/ScanUseCase.js';
import type { IndexUseCase } from '../application/IndexUseCase.js';
import type { IngestUseCase } from '../application/IngestUseCase.js';
import type { ReconcileUseCase } from '../application/ReconcileUseCase.js';
import { registerStatsTool } from './tools/StatsTool.js';
import { registerIndexFileTool } from './tools/IndexFileTool.js';
import { registerIngestTool } from './tools/IngestTool.js';

/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊 ingestion 工具。
 * 工具與 CLI 指令對應：stats ↔ ndf_stats、ingest ↔ ndf_ingest。
 */

export interface McpDependencies {
  scan: ScanUseCase;
  indexer: IndexUseCase;
  ingest: IngestUseCase;
  reconcile: ReconcileUseCase;
  version: string;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'ndf-ingest', version: deps.version },
    { instructions: buildInstructions(deps.scan.rootDir) },
  );

  registerStatsTool(server, deps);
  registerIndexFileTool(server, deps);
  registerIngestTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(docRoot: string): string {
  return [
    'ndf-ingest: keeps a full-text index of expense-report documents in sync with the document tree.',
    '',
    'Available tools:',
    '- ndf_stats: Compare eligible documents on disk with indexed documents per category',
    '- ndf_index_file: Classify and index a single file',
    '- ndf_ingest: Run a full indexing pass over the document tree',
    '',
    'Documents live under <root>/<category 1>/<category 2>/...; files closer to the root are not indexed.',
    'Indexing is idempotent: records are keyed by the SHA-256 of the file content.',
    '',
    `Document root: ${docRoot}`,
  ].join('\n');
}
