export type FileEventKind = 'created' | 'modified';

export interface FileEvent {
  kind: FileEventKind;
  /** 絕對路徑 */
  path: string;
}

export type FileEventHandler = (event: FileEvent) => void;

export interface WatchSubscription {
  close(): void;
}

/** 遞迴監看目錄的檔案事件 */
export interface FileWatcherPort {
  subscribe(rootDir: string, handler: FileEventHandler): WatchSubscription;
}
