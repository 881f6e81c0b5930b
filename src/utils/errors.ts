export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 404, 'SESSION_NOT_FOUND');
  }
}

export class SessionLimitError extends AppError {
  constructor(max: number) {
    super(`Maximum session limit reached (${max})`, 429, 'SESSION_LIMIT_REACHED');
  }
}

export class InvalidSessionTokenError extends AppError {
  constructor(sessionId: string) {
    super(`Invalid or missing session token for session: ${sessionId}`, 401, 'INVALID_SESSION_TOKEN');
  }
}

export class UnauthorizedAccessError extends AppError {
  readonly resource: string;
  readonly pluginId?: string;

  constructor(resource: string, pluginId?: string) {
    const who = pluginId ? `Plugin '${pluginId}'` : 'Caller';
    super(`${who} is not authorized to access ${resource}`, 403, 'UNAUTHORIZED_ACCESS');
    this.resource = resource;
    this.pluginId = pluginId;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class AuthRequiredError extends AppError {
  constructor() {
    super('Invalid or missing auth token', 401, 'AUTH_REQUIRED');
  }
}
