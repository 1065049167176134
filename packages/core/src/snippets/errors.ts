import { ZodError } from 'zod';

export type SnippetErrorCode = 'IMPORT_FAILED' | 'EXPORT_FAILED';

/**
 * Base class for failures the host is expected to show the user.
 */
export class SnippetLibraryError extends Error {
  constructor(
    message: string,
    readonly code: SnippetErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SnippetLibraryError';
  }
}

export class SnippetImportError extends SnippetLibraryError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Failed to import snippets from ${filePath}: ${describeError(cause)}`, 'IMPORT_FAILED', {
      cause,
    });
    this.name = 'SnippetImportError';
  }
}

export class SnippetExportError extends SnippetLibraryError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Failed to export snippets to ${filePath}: ${describeError(cause)}`, 'EXPORT_FAILED', {
      cause,
    });
    this.name = 'SnippetExportError';
  }
}

/**
 * One-line reason for a caught value. Zod errors report their first issue
 * as `path: message` instead of the full issue dump.
 */
export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    if (!issue) return 'Invalid snippet file';
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${where}: ${issue.message}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
