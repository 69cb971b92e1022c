export type ValidationErrors = Record<string, string[]>;

export class HttpError extends Error {
  override name = 'HttpError';

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export class ValidationError extends HttpError {
  override name = 'ValidationError';

  constructor(readonly errors: ValidationErrors) {
    super(firstMessage(errors), 422);
  }
}

export class NotFoundError extends HttpError {
  override name = 'NotFoundError';

  constructor(message = 'Not Found') {
    super(message, 404);
  }
}

export class SystemActorDeletionError extends HttpError {
  override name = 'SystemActorDeletionError';

  constructor() {
    super('The system user cannot be deleted.', 409);
  }
}

function firstMessage(errors: ValidationErrors): string {
  for (const messages of Object.values(errors)) {
    if (messages.length) return messages[0];
  }
  return 'The given data was invalid.';
}
