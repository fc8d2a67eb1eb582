/**
 * Error taxonomy for document inspection and find/replace
 *
 * Request-level failures (InputError) short-circuit a call. Everything else is
 * scoped to one file and ends up on that file's result entry.
 */

export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  INVALID_DOCX = 'INVALID_DOCX',
  PARSE_ERROR = 'PARSE_ERROR',
  SAVE_ERROR = 'SAVE_ERROR',
  MUTATION_ERROR = 'MUTATION_ERROR',
  BACKUP_ERROR = 'BACKUP_ERROR',
}

export class DocxProcessingError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = 'DocxProcessingError';
  }
}

/** Missing/invalid path, missing search text, nonexistent root */
export class InputError extends DocxProcessingError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.INVALID_INPUT, details);
    this.name = 'InputError';
  }
}

export class DocumentOpenError extends DocxProcessingError {
  constructor(filePath: string, cause: unknown) {
    super(
      `Failed to open document ${filePath}: ${getErrorMessage(cause)}`,
      ErrorCode.INVALID_DOCX,
      { filePath }
    );
    this.name = 'DocumentOpenError';
  }
}

export class DocumentParseError extends DocxProcessingError {
  constructor(partName: string, cause: unknown) {
    super(`Failed to parse ${partName}: ${getErrorMessage(cause)}`, ErrorCode.PARSE_ERROR, {
      partName,
    });
    this.name = 'DocumentParseError';
  }
}

export class DocumentSaveError extends DocxProcessingError {
  constructor(filePath: string, cause: unknown) {
    super(`Failed to save document ${filePath}: ${getErrorMessage(cause)}`, ErrorCode.SAVE_ERROR, {
      filePath,
    });
    this.name = 'DocumentSaveError';
  }
}

export class MutationError extends DocxProcessingError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.MUTATION_ERROR, details);
    this.name = 'MutationError';
  }
}

export class BackupError extends DocxProcessingError {
  constructor(sourcePath: string, backupPath: string, cause: unknown) {
    super(
      `Failed to back up ${sourcePath} to ${backupPath}: ${getErrorMessage(cause)}`,
      ErrorCode.BACKUP_ERROR,
      { sourcePath, backupPath }
    );
    this.name = 'BackupError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
