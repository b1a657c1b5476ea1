import type { FileEvent, FileWatcherPort, WatchSubscription } from '../domain/ports/FileWatcherPort.js';
import type { ScanUseCase } from './ScanUseCase.js';
import type { IndexUseCase } from './IndexUseCase.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface WatchStats {
  eventsReceived: number;
  docsIndexed: number;
  docsFailed: number;
  /** 目錄、已不存在的路徑或不符分類規則的檔案 */
  eventsIgnored: number;
}

/**
 * 監看用例：檔案新增或修改時重新分類並索引該檔案
 *
 * 不做 debounce：同一檔案的重複事件只會產生相同 id 的 upsert。
 * 事件依到達順序排隊、一次處理一個（一次只有一個檔案在記憶體中送抽取）。
 * stop() 先停止接收事件、等待佇列清空，最後才釋放檔案系統監看。
 */
export class WatchUseCase {
  private subscription?: WatchSubscription;
  private accepting = false;
  private readonly pending: FileEvent[] = [];
  private draining?: Promise<void>;
  private readonly counters: WatchStats = {
    eventsReceived: 0, docsIndexed: 0, docsFailed: 0, eventsIgnored: 0,
  };
  private readonly logger: Logger;

  constructor(
    private readonly watcher: FileWatcherPort,
    private readonly scan: ScanUseCase,
    private readonly indexer: IndexUseCase,
    logger: Logger = new Logger('WatchUseCase'),
  ) {
    this.logger = logger;
  }

  get isRunning(): boolean {
    return this.accepting;
  }

  get stats(): WatchStats {
    return { ...this.counters };
  }

  start(): void {
    if (this.subscription) return;
    this.accepting = true;
    this.subscription = this.watcher.subscribe(this.scan.rootDir, (event) => this.handleEvent(event));
    this.logger.info('Watch mode on', { root: this.scan.rootDir });
  }

  /** 等待佇列中所有事件處理完成 */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async stop(): Promise<void> {
    if (!this.subscription) return;
    this.accepting = false;
    await this.idle();
    this.subscription.close();
    this.subscription = undefined;
    this.logger.info('Watch mode off', { ...this.counters });
  }

  private handleEvent(event: FileEvent): void {
    if (!this.accepting) return;
    this.counters.eventsReceived++;
    this.pending.push(event);
    this.schedule();
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = undefined;
      if (this.pending.length > 0) this.schedule();
    });
  }

  private async drain(): Promise<void> {
    let event = this.pending.shift();
    while (event) {
      await this.process(event);
      event = this.pending.shift();
    }
  }

  private async process(event: FileEvent): Promise<void> {
    try {
      const doc = await this.scan.classifyFile(event.path);
      if (!doc) {
        this.counters.eventsIgnored++;
        return;
      }
      const { record } = await this.indexer.indexDocument(doc);
      this.counters.docsIndexed++;
      this.logger.info('Indexed', { path: doc.path, id: record.id, event: event.kind });
    } catch (err) {
      this.counters.docsFailed++;
      this.logger.error('Failed to index document', { path: event.path, error: errorMessage(err) });
    }
  }
}
