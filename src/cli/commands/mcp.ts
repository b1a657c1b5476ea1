import type { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createPipeline, assertDocumentRoot } from '../pipeline.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { PACKAGE_VERSION } from '../../shared/version.js';

interface McpCommandOptions {
  baseDir: string;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   ndf-ingest mcp [--base-dir .]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server (stdio) exposing the ingestion tools')
    .option('--base-dir <path>', 'Directory holding .ndf-ingest.json; relative paths resolve against it', '.')
    .action(async (opts: McpCommandOptions) => {
      const pipeline = createPipeline(loadConfig(opts.baseDir));
      await assertDocumentRoot(pipeline);

      const server = createMcpServer({
        scan: pipeline.scan,
        indexer: pipeline.indexer,
        ingest: pipeline.ingest,
        reconcile: pipeline.reconcile,
        version: PACKAGE_VERSION,
      });

      // stdio 模式：持續執行直到 stdin 關閉；log 只寫 stderr，不會混進協定
      await server.connect(new StdioServerTransport());
      pipeline.logger.info('MCP server listening on stdio', { docRoot: pipeline.config.documents.root });

      process.on('SIGINT', () => {
        void server.close().finally(() => process.exit(0));
      });
    });
}
