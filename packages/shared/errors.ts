export type PlannerErrorCode =
  | 'invalid_date'
  | 'no_topics'
  | 'no_schedule'
  | 'too_many_topics'
  | 'unsupported_file'
  | 'invalid_input'
  | 'unknown_operation';

export class PlannerError extends Error {
  readonly code: PlannerErrorCode;

  constructor(code: PlannerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDateError extends PlannerError {
  constructor(message: string) {
    super('invalid_date', message);
  }
}

export class NoTopicsError extends PlannerError {
  constructor(message = 'No topics found. Process documents first.') {
    super('no_topics', message);
  }
}

export class NoScheduleError extends PlannerError {
  constructor(message = 'No schedule found. Generate a schedule first.') {
    super('no_schedule', message);
  }
}

export class TooManyTopicsError extends PlannerError {
  readonly limit: number;

  constructor(count: number, limit: number) {
    super('too_many_topics', `${count} topics exceed the limit of ${limit}. Reset topics or raise PLANNER_MAX_TOPICS.`);
    this.limit = limit;
  }
}

export class UnsupportedFileError extends PlannerError {
  constructor(filename: string) {
    super('unsupported_file', `Not a PDF: ${filename}`);
  }
}

export class ValidationError extends PlannerError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

export class UnknownOperationError extends PlannerError {
  constructor(operation: string) {
    super('unknown_operation', `Unsupported operation: ${operation}`);
  }
}

export function isPlannerError(err: unknown): err is PlannerError {
  return err instanceof PlannerError;
}
