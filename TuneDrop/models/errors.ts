export type SelectionErrorType = 'SESSION_EXPIRED' | 'INVALID_SELECTION';

/**
 * Raised when a button press cannot be matched to the user's current session.
 * Both variants are user mistakes (or stale buttons), not system failures.
 */
export class SelectionError extends Error {
  readonly type: SelectionErrorType;

  constructor(type: SelectionErrorType, message: string) {
    super(message);
    this.name = 'SelectionError';
    this.type = type;
  }
}

/** No session entry exists for the user. */
export class SessionExpiredError extends SelectionError {
  constructor(userId: number) {
    super('SESSION_EXPIRED', `No session for user ${userId}`);
    this.name = 'SessionExpiredError';
  }
}

/** The entry exists but the selection does not point into it. */
export class InvalidSelectionError extends SelectionError {
  constructor(reason: string) {
    super('INVALID_SELECTION', reason);
    this.name = 'InvalidSelectionError';
  }
}

export type Collaborator = 'media' | 'lyrics' | 'membership';

/** Transport or process failure of an external collaborator. */
export class CollaboratorUnavailableError extends Error {
  readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CollaboratorUnavailableError';
    this.collaborator = collaborator;
  }
}

export class PersistenceFailureError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`Database operation "${operation}" failed`, { cause });
    this.name = 'PersistenceFailureError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
