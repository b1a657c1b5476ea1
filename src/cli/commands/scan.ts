import type { Command } from 'commander';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createPipeline } from '../pipeline.js';
import type { ClassifiedDocument } from '../../domain/entities/Document.js';
import { OutputFormatter, parseOutputFormat } from '../formatters/OutputFormatter.js';

interface ScanCommandOptions {
  baseDir: string;
  all: boolean;
  brief: boolean;
  format: string;
}

/** 註冊 scan 指令：列出會被索引的文件，不呼叫任何外部服務 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('List the documents the initial pass would index (no indexing)')
    .option('--base-dir <path>', 'Directory holding .ndf-ingest.json; relative paths resolve against it', '.')
    .option('--all', 'Ignore category filters and MAX_DOCS', false)
    .option('--brief', 'Print paths only', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: ScanCommandOptions) => {
      const format = parseOutputFormat(opts.format);
      const { scan } = createPipeline(loadConfig(opts.baseDir));
      const formatter = new OutputFormatter();

      const docs: ClassifiedDocument[] = [];
      for await (const doc of scan.discover({ ignoreAllowLists: opts.all, ignoreCap: opts.all })) {
        docs.push(doc);
      }

      process.stdout.write(formatter.formatDocuments(docs, format, opts.brief ? 'brief' : 'normal') + '\n');
    });
}
