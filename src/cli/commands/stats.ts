import type { Command } from 'commander';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createPipeline } from '../pipeline.js';
import { OutputFormatter, parseOutputFormat } from '../formatters/OutputFormatter.js';

interface StatsCommandOptions {
  baseDir: string;
  format: string;
}

/** 註冊 stats 指令：磁碟與索引的文件數對帳 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Compare eligible documents on disk with indexed documents per category')
    .option('--base-dir <path>', 'Directory holding .ndf-ingest.json; relative paths resolve against it', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: StatsCommandOptions) => {
      const format = parseOutputFormat(opts.format);
      const pipeline = createPipeline(loadConfig(opts.baseDir));
      const formatter = new OutputFormatter();

      const report = await pipeline.reconcile.reconcile();

      process.stdout.write(formatter.formatObject(report, format) + '\n');
      process.exitCode = report.diff.totalMissing === 0 ? 0 : 2;
    });
}
