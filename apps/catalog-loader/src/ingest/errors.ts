/**
 * Loader error taxonomy.
 *
 * MalformedFile and MalformedRecord are recovered locally: they are collected
 * into the run summary, never thrown out of the coordinator. The rest are
 * fatal and end the run.
 */

export type CatalogIngestErrorCode =
  | 'MALFORMED_FILE'
  | 'MALFORMED_RECORD'
  | 'BATCH_FAILURE'
  | 'NO_INPUT_FILES'
  | 'INPUT_UNREADABLE'
  | 'CONNECTION_ERROR'
  | 'SCHEMA_PERMISSION';

export abstract class CatalogIngestError extends Error {
  abstract readonly code: CatalogIngestErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedFile extends CatalogIngestError {
  override readonly code = 'MALFORMED_FILE';
  readonly file: string;
  /** 1-based. */
  readonly line: number;
  /** 1-based. */
  readonly column: number;
  readonly reason: string;

  constructor(params: { file: string; line: number; column: number; reason: string }) {
    super(
      `Invalid JSON in ${params.file} (line ${params.line}, col ${params.column}): ${params.reason}`
    );
    this.file = params.file;
    this.line = params.line;
    this.column = params.column;
    this.reason = params.reason;
  }
}

export type MalformedRecordReason =
  | 'not_an_object'
  | 'missing_id'
  | 'invalid_id'
  | 'invalid_price'
  | 'negative_price';

export class MalformedRecord extends CatalogIngestError {
  override readonly code = 'MALFORMED_RECORD';
  readonly file: string;
  /** 0-based ordinal of the record within its file. */
  readonly index: number;
  /** 1-based line of the record for line-delimited files, null for array files. */
  readonly line: number | null;
  readonly reason: MalformedRecordReason;
  readonly detail: string;

  constructor(params: {
    file: string;
    index: number;
    line: number | null;
    reason: MalformedRecordReason;
    detail: string;
  }) {
    const where = params.line === null ? `record #${params.index}` : `line ${params.line}`;
    super(`${params.file} ${where}: ${params.reason} (${params.detail})`);
    this.file = params.file;
    this.index = params.index;
    this.line = params.line;
    this.reason = params.reason;
    this.detail = params.detail;
  }
}

const BATCH_ID_PREVIEW = 10;

export class BatchFailure extends CatalogIngestError {
  override readonly code = 'BATCH_FAILURE';
  /** 0-based position of the batch in the run. */
  readonly batchIndex: number;
  readonly productIds: readonly number[];

  constructor(params: { batchIndex: number; productIds: readonly number[]; cause: unknown }) {
    const preview = params.productIds.slice(0, BATCH_ID_PREVIEW).join(', ');
    const more =
      params.productIds.length > BATCH_ID_PREVIEW
        ? `, +${params.productIds.length - BATCH_ID_PREVIEW} more`
        : '';
    const causeMessage = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super(
      `Batch ${params.batchIndex} failed for ${params.productIds.length} product(s) [${preview}${more}]: ${causeMessage}`,
      { cause: params.cause }
    );
    this.batchIndex = params.batchIndex;
    this.productIds = params.productIds;
  }
}

export class NoInputFiles extends CatalogIngestError {
  override readonly code = 'NO_INPUT_FILES';
  readonly dataPath: string;

  constructor(dataPath: string, detail: 'not_found' | 'no_matching_files') {
    super(
      detail === 'not_found'
        ? `Path not found: ${dataPath}`
        : `No files matching products_*.json found in: ${dataPath}`
    );
    this.dataPath = dataPath;
  }
}

export class InputUnreadable extends CatalogIngestError {
  override readonly code = 'INPUT_UNREADABLE';
  readonly file: string;

  constructor(file: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${file}: ${causeMessage}`, { cause });
    this.file = file;
  }
}

export class ConnectionError extends CatalogIngestError {
  override readonly code = 'CONNECTION_ERROR';

  constructor(target: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(`Could not prepare PostgreSQL at ${target}: ${causeMessage}`, { cause });
  }
}

export class SchemaPermissionError extends CatalogIngestError {
  override readonly code = 'SCHEMA_PERMISSION';

  constructor(cause: unknown) {
    super('Permission denied: user lacks CREATE/USAGE privileges on the schema', { cause });
  }

  /** Statements a superuser can run to let `user` create the catalog tables. */
  grantStatements(user: string, database: string): readonly string[] {
    return [
      `GRANT USAGE, CREATE ON SCHEMA public TO ${user};`,
      `GRANT CONNECT ON DATABASE ${database} TO ${user};`,
    ];
  }
}
