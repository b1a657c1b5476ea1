import { z } from 'zod';
import type {
  ExtractorPort,
  ExtractionRequest,
  ExtractionResponse,
} from '../../domain/ports/ExtractorPort.js';
import { UpstreamServiceError } from '../../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/**
 * Apache Tika Server Adapter
 *
 * 一次抽取 = 兩個獨立的 PUT：
 * - /meta：JSON metadata（title、Content-Type）
 * - /tika：純文字內容
 * 兩者都成功才算成功；非 2xx、連線錯誤、逾時一律拋出 UpstreamServiceError。
 */

export interface TikaConfig {
  baseUrl: string;
  metaTimeoutMs: number;
  textTimeoutMs: number;
}

/** Tika metadata 的值可能是字串或字串陣列 */
const MetadataSchema = z.record(z.unknown());

type Metadata = z.infer<typeof MetadataSchema>;

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

function pick(metadata: Metadata, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = firstString(metadata[key])?.trim();
    if (value) return value;
  }
  return undefined;
}

export class TikaExtractorAdapter implements ExtractorPort {
  readonly providerId = 'tika';
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(
    private readonly config: TikaConfig,
    logger: Logger = new Logger('TikaExtractorAdapter'),
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.logger = logger;
  }

  async extract(request: ExtractionRequest): Promise<ExtractionResponse> {
    const metaResponse = await this.put('/meta', request, 'application/json', this.config.metaTimeoutMs);
    const metadata = await this.parseMetadata(metaResponse, request.fileName);

    const textResponse = await this.put('/tika', request, 'text/plain', this.config.textTimeoutMs);
    const text = await textResponse.text();

    return {
      title: pick(metadata, 'title', 'dc:title'),
      text,
      mediaType: pick(metadata, 'Content-Type', 'Content-Type-Parsed') ?? '',
    };
  }

  private async put(
    endpoint: string,
    request: ExtractionRequest,
    accept: string,
    timeoutMs: number,
  ): Promise<Response> {
    const url = `${this.baseUrl}${endpoint}`;
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'PUT',
        headers: { Accept: accept },
        body: request.bytes,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new UpstreamServiceError(
        'extraction',
        `Extraction request ${endpoint} failed: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new UpstreamServiceError(
        'extraction',
        `Extraction service returned ${response.status} for ${endpoint}`,
        response.status,
      );
    }
    return response;
  }

  /** metadata 無法解析時視為空 metadata，標題會退回檔名 */
  private async parseMetadata(response: Response, fileName: string): Promise<Metadata> {
    try {
      const parsed = MetadataSchema.safeParse(await response.json());
      if (parsed.success) return parsed.data;
      this.logger.warn('Unexpected metadata shape, ignoring', { fileName });
    } catch (err) {
      this.logger.warn('Unparseable metadata response, ignoring', { fileName, error: errorMessage(err) });
    }
    return {};
  }
}
