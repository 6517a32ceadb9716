export type PipelineErrorCode = 'PARSE_ERROR' | 'SCHEMA_ERROR' | 'STORAGE_IO_ERROR' | 'NOT_FOUND';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single malformed row. Callers skip the row rather than abort. */
export class ParseError extends PipelineError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    readonly row: number,
  ) {
    super(message);
  }
}

/** The file as a whole does not fit: required columns are missing, or stored rows are invalid. */
export class SchemaError extends PipelineError {
  readonly code = 'SCHEMA_ERROR';

  constructor(
    message: string,
    readonly missingColumns: string[],
    readonly invalidRows: number[] = [],
  ) {
    super(message);
  }
}

export class StorageIOError extends PipelineError {
  readonly code = 'STORAGE_IO_ERROR';

  constructor(
    message: string,
    readonly path: string,
    readonly missing = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND';
}
