#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { registerIngestCommand } from './commands/ingest.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerScanCommand } from './commands/scan.js';
import { registerMcpCommand } from './commands/mcp.js';
import { IngestError } from '../domain/errors/DomainErrors.js';
import { errorMessage } from '../shared/Logger.js';
import { PACKAGE_VERSION } from '../shared/version.js';

const program = new Command();

program
  .name('ndf-ingest')
  .description('Index expense-report documents into a full-text search engine and keep the index in sync')
  .version(PACKAGE_VERSION);

registerIngestCommand(program);
registerStatsCommand(program);
registerScanCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    const code = err instanceof IngestError ? ` [${err.code}]` : '';
    process.stderr.write(`Error${code}: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
