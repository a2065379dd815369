export type DocumentStoreErrorCode = 'store_corrupt' | 'store_unreadable' | 'store_unwritable';

export class DocumentStoreError extends Error {
  readonly code: DocumentStoreErrorCode;
  readonly filePath: string | null;

  constructor(code: DocumentStoreErrorCode, message: string, opts?: { filePath?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'DocumentStoreError';
    this.code = code;
    this.filePath = opts?.filePath ?? null;
  }
}

export function isDocumentStoreError(e: unknown): e is DocumentStoreError {
  return e instanceof DocumentStoreError;
}
