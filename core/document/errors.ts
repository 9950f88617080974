/**
 * I/O failure while loading or saving a document. The storage error is
 * kept as `cause`.
 */
export class DocumentIOError extends Error {
  readonly operation: 'load' | 'save';
  readonly path: string;

  constructor(operation: 'load' | 'save', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = 'DocumentIOError';
    this.operation = operation;
    this.path = path;
  }
}
