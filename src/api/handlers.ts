/**
 * Request handlers for every user-facing operation
 *
 * Each handler validates its request with zod and answers with
 * `{ success: true, ... }` or `{ success: false, error, code? }`. Request
 * problems (missing path, nonexistent path, missing search text) are
 * InputErrors; failures inside a bulk run stay on the file they belong to.
 */

import { existsSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { AppConfig } from '@/config/appConfig';
import { DocxProcessingError, ErrorCode, InputError, getErrorMessage } from '@/types/errors';
import { logger } from '@/utils/logger';
import { analyzeFile } from '@/services/analysis/DocumentAnalyzer';
import { resolveBackupRoot } from '@/services/backup/BackupService';
import { bulkFindReplaceLinks, bulkFindReplaceText } from '@/services/bulk/BulkOrchestrator';
import { buildLinkRows, buildLinksWorkbook, writeLinksWorkbook } from '@/services/export/LinkExporter';
import { listDocxFiles, scanFolderStructure } from '@/services/files/FileScanner';
import { findReplaceText } from '@/services/findReplace/TextFindReplace';
import { buildDependencies } from '@/services/graph/DependencyGraphBuilder';
import { collectLinksForFiles } from '@/services/links/LinkExtractor';

const log = logger.namespace('Handlers');

export type HandlerSuccess<T> = { success: true } & T;

export interface HandlerFailure {
  success: false;
  error: string;
  code?: ErrorCode;
}

export type HandlerResult<T> = HandlerSuccess<T> | HandlerFailure;

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const pathField = z.string({ required_error: 'Path does not exist' }).min(1, 'Path does not exist');

export const pathRequestSchema = z.object({ path: pathField });

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const exportLinksRequestSchema = z.object({
  path: z.string().min(1).optional(),
  rows: z.array(z.array(cellSchema)).optional(),
  outPath: z.string().min(1).optional(),
});

export const findReplaceRequestSchema = z.object({
  path: pathField,
  findText: z.string().optional(),
  replaceText: z.string().optional(),
});

export const bulkFindReplaceRequestSchema = z.object({
  path: pathField,
  findText: z.string().optional(),
  replaceText: z.string().optional(),
  saveCopies: z.boolean().default(true),
});

export const bulkLinksFindReplaceRequestSchema = bulkFindReplaceRequestSchema.extend({
  target: z.enum(['name', 'url', 'both']).default('both'),
});

export type ExportLinksRequest = z.input<typeof exportLinksRequestSchema>;
export type FindReplaceRequest = z.input<typeof findReplaceRequestSchema>;
export type BulkFindReplaceRequest = z.input<typeof bulkFindReplaceRequestSchema>;
export type BulkLinksFindReplaceRequest = z.input<typeof bulkLinksFindReplaceRequestSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseRequest<S extends z.ZodTypeAny>(schema: S, request: unknown): z.output<S> {
  const result = schema.safeParse(request ?? {});
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InputError(message, result.error.issues);
  }
  return result.data;
}

/** Absolute form of a request path that must exist */
function existingPath(value: string, message = 'Path does not exist'): string {
  const resolved = path.resolve(value);
  if (!existsSync(resolved)) {
    throw new InputError(message, { path: value });
  }
  return resolved;
}

function requireFindText(findText: string | undefined): string {
  if (!findText) {
    throw new InputError('No find text provided');
  }
  return findText;
}

async function respond<T extends object>(operation: string, run: () => Promise<T>): Promise<HandlerResult<T>> {
  try {
    const result = await run();
    return Object.assign({ success: true as const }, result);
  } catch (error) {
    const message = getErrorMessage(error);
    if (error instanceof InputError) {
      log.warn(`${operation}: ${message}`);
    } else {
      log.error(`${operation} failed: ${message}`);
    }
    const failure: HandlerFailure = { success: false, error: message };
    if (error instanceof DocxProcessingError) {
      failure.code = error.code;
    }
    return failure;
  }
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/** Folder tree of a root with its eligible documents */
export function scanDirectory(request: unknown, config: AppConfig) {
  return respond('scan', async () => {
    const { path: rawPath } = parseRequest(pathRequestSchema, request);
    const root = existingPath(rawPath);
    return { structure: await scanFolderStructure(root, config) };
  });
}

/** Links of every document under a root, with totals and the dependency graph */
export function bulkLinks(request: unknown, config: AppConfig) {
  return respond('bulkLinks', async () => {
    const { path: rawPath } = parseRequest(pathRequestSchema, request);
    const root = existingPath(rawPath);

    const files = await listDocxFiles(root, config);
    const linkData = await collectLinksForFiles(files, { ...config, baseDir: root });
    const totalLinks = linkData.reduce((sum, item) => sum + item.links.length, 0);
    return {
      files: linkData,
      totalLinks,
      dependencies: buildDependencies(root, files, linkData),
    };
  });
}

/**
 * Links workbook, either collected from a root or built from given rows.
 * Written to `outPath` when one is given.
 */
export function exportLinksXlsx(request: unknown, config: AppConfig) {
  return respond('exportLinksXlsx', async () => {
    const parsed = parseRequest(exportLinksRequestSchema, request);

    let rows = parsed.rows ?? [];
    if (parsed.path) {
      const root = existingPath(parsed.path);
      const files = await listDocxFiles(root, config);
      rows = buildLinkRows(await collectLinksForFiles(files, { ...config, baseDir: root }));
    }

    if (parsed.outPath) {
      const outPath = await writeLinksWorkbook(rows, path.resolve(parsed.outPath));
      return { rowCount: rows.length, outPath };
    }
    return { rowCount: rows.length, workbook: buildLinksWorkbook(rows) };
  });
}

/** Body-text find/replace in one file; no backup is taken */
export function findReplace(request: unknown, _config: AppConfig) {
  return respond('findReplace', async () => {
    const parsed = parseRequest(findReplaceRequestSchema, request);
    const filePath = existingPath(parsed.path, 'File not found');
    // Empty find text reports 'No find text provided' without opening the file
    return findReplaceText(filePath, parsed.findText ?? '', parsed.replaceText);
  });
}

/** Body-text find/replace across every document under a root */
export function bulkFindReplace(request: unknown, config: AppConfig) {
  return respond('bulkFindReplace', async () => {
    const parsed = parseRequest(bulkFindReplaceRequestSchema, request);
    const root = existingPath(parsed.path);
    const findText = requireFindText(parsed.findText);

    const files = await listDocxFiles(root, config);
    const backupRoot = parsed.saveCopies ? resolveBackupRoot(root, config) : undefined;
    return bulkFindReplaceText(files, findText, parsed.replaceText, { baseDir: root, backupRoot });
  });
}

/** Hyperlink find/replace across every document under a root */
export function bulkLinksFindReplace(request: unknown, config: AppConfig) {
  return respond('bulkLinksFindReplace', async () => {
    const parsed = parseRequest(bulkLinksFindReplaceRequestSchema, request);
    const root = existingPath(parsed.path);
    const findText = requireFindText(parsed.findText);

    const files = await listDocxFiles(root, config);
    const backupRoot = parsed.saveCopies ? resolveBackupRoot(root, config) : undefined;
    return bulkFindReplaceLinks(files, findText, parsed.replaceText, parsed.target, {
      baseDir: root,
      backupRoot,
    });
  });
}

/** Track-changes flag and links of a single document */
export function analyze(request: unknown, config: AppConfig) {
  return respond('analyze', async () => {
    const { path: rawPath } = parseRequest(pathRequestSchema, request);
    return analyzeFile(existingPath(rawPath, 'File not found'), config);
  });
}
