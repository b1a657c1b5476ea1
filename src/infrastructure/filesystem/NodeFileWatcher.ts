import { watch } from 'node:fs';
import path from 'node:path';
import type {
  FileEventHandler,
  FileWatcherPort,
  WatchSubscription,
} from '../../domain/ports/FileWatcherPort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/**
 * 以 Node 內建 fs.watch（recursive）監看整棵文件樹
 *
 * fs.watch 只區分 rename / change：rename 對應新增（也包含刪除與改名，
 * 由呼叫端 stat 後過濾），change 對應修改。
 */
export class NodeFileWatcher implements FileWatcherPort {
  constructor(private readonly logger: Logger = new Logger('NodeFileWatcher')) {}

  subscribe(rootDir: string, handler: FileEventHandler): WatchSubscription {
    const watcher = watch(rootDir, { recursive: true }, (eventType, filename) => {
      if (!filename) return;
      handler({
        kind: eventType === 'rename' ? 'created' : 'modified',
        path: path.join(rootDir, filename),
      });
    });

    watcher.on('error', (err) => {
      this.logger.error('Watcher error', { root: rootDir, error: errorMessage(err) });
    });

    return {
      close: () => watcher.close(),
    };
  }
}
