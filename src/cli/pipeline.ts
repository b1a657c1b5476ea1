import type { IngestConfig } from '../config/types.js';
import { ScanUseCase } from '../application/ScanUseCase.js';
import { ContentExtractor } from '../application/ContentExtractor.js';
import { IndexUseCase } from '../application/IndexUseCase.js';
import { IngestUseCase } from '../application/IngestUseCase.js';
import { WatchUseCase } from '../application/WatchUseCase.js';
import { ReconcileUseCase } from '../application/ReconcileUseCase.js';
import { ClassificationFilter } from '../domain/value-objects/ClassificationFilter.js';
import { DocumentRootMissingError } from '../domain/errors/DomainErrors.js';
import { FileSystemDocumentTree } from '../infrastructure/filesystem/FileSystemDocumentTree.js';
import { NodeFileWatcher } from '../infrastructure/filesystem/NodeFileWatcher.js';
import { TikaExtractorAdapter } from '../infrastructure/extraction/TikaExtractorAdapter.js';
import { OpenSearchIndexAdapter } from '../infrastructure/search/OpenSearchIndexAdapter.js';
import { FALLBACK_MAPPING, readIndexMapping } from '../infrastructure/search/IndexMapping.js';
import { Logger } from '../shared/Logger.js';

/** 組好的 ingestion 元件 */
export interface Pipeline {
  config: IngestConfig;
  logger: Logger;
  tree: FileSystemDocumentTree;
  scan: ScanUseCase;
  indexer: IndexUseCase;
  ingest: IngestUseCase;
  watch: WatchUseCase;
  reconcile: ReconcileUseCase;
}

/** 依設定建立所有依賴（CLI 與 MCP 共用） */
export function createPipeline(config: IngestConfig, logger?: Logger): Pipeline {
  const root = logger ?? new Logger('ndf-ingest', config.logLevel);
  const tree = new FileSystemDocumentTree();

  const scan = new ScanUseCase(tree, {
    rootDir: config.documents.root,
    filter: new ClassificationFilter({
      allowedExtensions: config.documents.allowedExtensions,
      category1AllowList: config.documents.category1AllowList,
      category2AllowList: config.documents.category2AllowList,
    }),
    maxDocs: config.documents.maxDocs,
  }, root.child('ScanUseCase'));

  const index = new OpenSearchIndexAdapter(config.index);
  const extractor = new ContentExtractor(
    new TikaExtractorAdapter(config.extraction, root.child('TikaExtractorAdapter')),
    tree,
    { maxExtractMb: config.extraction.maxExtractMb, retry: config.retry },
    root.child('ContentExtractor'),
  );

  const indexer = new IndexUseCase(index, extractor, tree, {
    retry: config.retry,
    loadMapping: () => readIndexMapping(config.index.mappingPath),
    fallbackMapping: FALLBACK_MAPPING,
  }, root.child('IndexUseCase'));

  return {
    config,
    logger: root,
    tree,
    scan,
    indexer,
    ingest: new IngestUseCase(scan, indexer, config.progress, root.child('IngestUseCase')),
    watch: new WatchUseCase(
      new NodeFileWatcher(root.child('NodeFileWatcher')),
      scan,
      indexer,
      root.child('WatchUseCase'),
    ),
    reconcile: new ReconcileUseCase(scan, index, root.child('ReconcileUseCase')),
  };
}

/** 監看模式與 MCP server 需要實際存在的文件根目錄 */
export async function assertDocumentRoot(pipeline: Pipeline): Promise<void> {
  if (!(await pipeline.tree.directoryExists(pipeline.config.documents.root))) {
    throw new DocumentRootMissingError(pipeline.config.documents.root);
  }
}
