export { loadConfig, defaultConfig, appConfigSchema, CONFIG_FILE_NAME } from './config/appConfig';
export type { AppConfig, LoadConfigOptions } from './config/appConfig';

export * from './types/errors';
export type * from './types/hyperlink';
export type * from './types/dependency';
export { FIND_REPLACE_STATUS } from './types/find-replace';
export type {
  FindReplaceStatus,
  LinkTargetScope,
  FindReplaceResult,
  FileFindReplaceResult,
  BulkFindReplaceResult,
  BulkRunConfig,
} from './types/find-replace';

export { DocxDocument, RELATIONSHIP_TYPES } from './services/document/DocxDocument';
export type { Relationship, RelationshipKind } from './services/document/DocxDocument';

export { normalizeTarget } from './services/links/LinkNormalizer';
export type { NormalizeOptions } from './services/links/LinkNormalizer';
export { getLinks, collectLinksForFiles, parseFieldHyperlinkUrl } from './services/links/LinkExtractor';
export { listDocxFiles, scanFolderStructure, isEligibleDocument } from './services/files/FileScanner';
export type { FileNode, FolderNode, ScanOptions } from './services/files/FileScanner';

export { findReplaceText } from './services/findReplace/TextFindReplace';
export { findReplaceLinks } from './services/findReplace/LinkFindReplace';
export type { LinkFindReplaceOptions } from './services/findReplace/LinkFindReplace';
export {
  captureOriginal,
  computeBackupPath,
  excludeBackupCopies,
  resolveBackupRoot,
} from './services/backup/BackupService';
export { bulkFindReplaceText, bulkFindReplaceLinks } from './services/bulk/BulkOrchestrator';
export { buildDependencies } from './services/graph/DependencyGraphBuilder';
export { buildLinkRows, buildLinksWorkbook, writeLinksWorkbook } from './services/export/LinkExporter';
export type { LinkRow } from './services/export/LinkExporter';
export { analyzeFile } from './services/analysis/DocumentAnalyzer';
export type { DocumentAnalysis } from './services/analysis/DocumentAnalyzer';

export * as handlers from './api/handlers';
export { logger, initializeLogging } from './utils/logger';
