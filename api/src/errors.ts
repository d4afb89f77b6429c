export class GradebookError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class MissingColumnError extends GradebookError {
  readonly column: string;
  readonly source: string;

  constructor(column: string, source: string) {
    super(`Missing required column "${column}" in ${source}`, 422);
    this.column = column;
    this.source = source;
  }
}

export class SchemaMismatchError extends GradebookError {
  readonly source: string;

  constructor(message: string, source: string) {
    super(`${message} in ${source}`, 422);
    this.source = source;
  }
}

export class WeightSumError extends GradebookError {
  readonly total: number;

  constructor(total: number) {
    super(`Weights sum to ${total.toFixed(2)}. Must be 1.0.`, 400);
    this.total = total;
  }
}

export class ValidationError extends GradebookError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends GradebookError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class StudentNotFoundError extends NotFoundError {
  readonly studentId: string;

  constructor(studentId: string) {
    super(`Student ${studentId} not found`);
    this.studentId = studentId;
  }
}
