export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

export type UpstreamService = 'extraction' | 'index';

/** 所有 ingestion domain 錯誤的基底類別 */
export abstract class IngestError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

/** 抽取服務或索引服務無法連線、逾時或回傳非 2xx */
export class UpstreamServiceError extends IngestError {
  readonly classification = 'retryable' as const;
  readonly code = 'UPSTREAM_SERVICE';

  constructor(
    public readonly service: UpstreamService,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Degradable ---

/** 抽取重試用盡；呼叫端改以只有標題的 record 索引 */
export class ExtractionFailedError extends IngestError {
  readonly classification = 'degradable' as const;
  readonly code = 'EXTRACTION_FAILED';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Extraction failed for "${filePath}"`, options);
  }
}

// --- Manual ---

export class IndexSetupError extends IngestError {
  readonly classification = 'manual' as const;
  readonly code = 'INDEX_SETUP';

  constructor(
    public readonly indexName: string,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class DocumentRootMissingError extends IngestError {
  readonly classification = 'manual' as const;
  readonly code = 'DOC_ROOT_MISSING';

  constructor(
    public readonly root: string,
    options?: ErrorOptions,
  ) {
    super(`Document root "${root}" does not exist or is not a directory. Set DOC_ROOT.`, options);
  }
}

/**
 * 是否值得重試：非 domain 錯誤（fetch 的連線錯誤、逾時）與 retryable 類別
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof IngestError) return err.classification === 'retryable';
  return true;
}
