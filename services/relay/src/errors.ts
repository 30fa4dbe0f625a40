/** Caller-correctable failures map to 400, storage and codec failures to 500. */
export type YoinkErrorKind =
  | 'missing_topic'
  | 'multi_valued_parameter'
  | 'invalid_parameter'
  | 'invalid_number'
  | 'number_out_of_range'
  | 'malformed_content'
  | 'storage_failure'
  | 'content_decode_failure';

const STATUS: Record<YoinkErrorKind, 400 | 500> = {
  missing_topic: 400,
  multi_valued_parameter: 400,
  invalid_parameter: 400,
  invalid_number: 400,
  number_out_of_range: 400,
  malformed_content: 500,
  storage_failure: 500,
  content_decode_failure: 500,
};

/** Body sent for every failed request. */
export interface ErrorBody {
  error: string;
  detail: string;
  status: number;
}

export class YoinkError extends Error {
  readonly kind: YoinkErrorKind;
  readonly status: 400 | 500;
  /** Human label; `message` holds the underlying cause. */
  readonly detail: string;

  constructor(kind: YoinkErrorKind, cause: string, detail: string) {
    super(cause);
    this.name = 'YoinkError';
    this.kind = kind;
    this.status = STATUS[kind];
    this.detail = detail;
  }

  get isClientError(): boolean {
    return this.status < 500;
  }

  toBody(): ErrorBody {
    return { error: this.message, detail: this.detail, status: this.status };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function missingTopic(): YoinkError {
  return new YoinkError('missing_topic', 'topic is empty', 'Error validating topic name');
}

export function storageFailure(err: unknown, op: 'write' | 'read'): YoinkError {
  const detail = op === 'write' ? 'Error inserting data to database' : 'Error getting data from database';
  return new YoinkError('storage_failure', errorMessage(err), detail);
}
