export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogWriter = (line: string) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line + '\n');
};

/** 結構化 JSON logger（一行一筆，寫到 stderr） */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = 'info',
    private readonly write: LogWriter = stderrWriter,
  ) {}

  /** 建立共用 level 與 writer 的子 logger */
  child(context: string): Logger {
    return new Logger(context, this.minLevel, this.write);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[this.minLevel]) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    this.write(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 將未知錯誤轉為可記錄的訊息字串 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
