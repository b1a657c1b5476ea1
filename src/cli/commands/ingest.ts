import type { Command } from 'commander';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createPipeline, assertDocumentRoot, type Pipeline } from '../pipeline.js';
import type { IngestStats } from '../../application/dto/IngestStats.js';
import { OutputFormatter, parseOutputFormat } from '../formatters/OutputFormatter.js';

interface IngestCommandOptions {
  baseDir: string;
  initial: boolean;
  watch: boolean;
  format: string;
}

export interface RunIngestOptions {
  initial: boolean;
  watch: boolean;
  /** 監看模式下阻塞直到收到中斷 */
  untilStopped?: () => Promise<void>;
  onInitialPass?: (stats: IngestStats) => void;
}

/** 等待 SIGINT / SIGTERM 其中之一 */
export function waitForSignal(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (): void => {
      for (const signal of signals) process.off(signal, onSignal);
      resolve();
    };
    for (const signal of signals) process.once(signal, onSignal);
  });
}

/**
 * ingest 流程
 * 1. 確認索引存在（失敗即中止）
 * 2. 監看模式先開始監看，批次期間新增的檔案也會被索引
 * 3. 批次索引
 * 4. 監看模式等待中斷，之後優雅停止
 */
export async function runIngest(pipeline: Pipeline, options: RunIngestOptions): Promise<IngestStats | undefined> {
  const { logger } = pipeline;
  if (!options.initial && !options.watch) {
    logger.info('Nothing to do (neither initial pass nor watch mode)');
    return undefined;
  }

  await pipeline.indexer.ensureIndex();

  if (options.watch) {
    await assertDocumentRoot(pipeline);
    pipeline.watch.start();
  }

  let stats: IngestStats | undefined;
  try {
    if (options.initial) {
      stats = await pipeline.ingest.runFullPass();
      options.onInitialPass?.(stats);
    }
    if (options.watch) {
      await (options.untilStopped ?? waitForSignal)();
    }
  } finally {
    if (options.watch) {
      await pipeline.watch.stop();
    }
  }
  return stats;
}

/** 註冊 ingest 指令 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Index the document tree and optionally keep watching it')
    .option('--base-dir <path>', 'Directory holding .ndf-ingest.json; relative paths resolve against it', '.')
    .option('--no-initial', 'Skip the initial full indexing pass')
    .option('--watch', 'Watch DOC_ROOT and index new or modified files', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: IngestCommandOptions) => {
      const format = parseOutputFormat(opts.format);
      const config = loadConfig(opts.baseDir);
      const pipeline = createPipeline(config);
      const formatter = new OutputFormatter();

      await runIngest(pipeline, {
        initial: opts.initial,
        watch: opts.watch,
        onInitialPass: (stats) => {
          process.stdout.write(formatter.formatObject(stats, format) + '\n');
        },
      });
    });
}
