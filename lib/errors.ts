export type FieldIssue = {
  field: string;
  message: string;
};

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ApiError {
  constructor(readonly detail: FieldIssue[]) {
    super('Validation failed.', 422);
  }
}

export class InvalidIdentifierError extends ApiError {
  constructor(resource: string) {
    super(`Invalid ${resource} id.`, 400);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource.charAt(0).toUpperCase()}${resource.slice(1)} not found.`, 404);
  }
}

export class StoreUnavailableError extends ApiError {
  constructor(message = 'Database is not configured.') {
    super(message, 503);
  }
}
