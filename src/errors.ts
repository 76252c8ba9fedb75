/**
 * Election Error Classes
 *
 * Typed error hierarchy for znode-election operations.
 */

/** Base error context for all election errors */
export interface BaseErrorContext {
  message?: string;
  code?: string;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  hint?: string;
  [key: string]: unknown;
}

/** Serialized error format */
export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  thrownAt?: Date;
  retriable?: boolean;
  suggestion?: string;
  hint?: string;
  description?: string;
  data?: Record<string, unknown>;
  original?: unknown;
  stack?: string;
}

export class BaseError extends Error {
  thrownAt: Date;
  code?: string;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  hint?: string;
  data: Record<string, unknown>;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      original,
      description,
      suggestion,
      retriable,
      hint,
      ...rest
    } = context;

    super(message);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    } else {
      this.stack = new Error(message).stack;
    }

    this.name = this.constructor.name;
    this.thrownAt = new Date();
    this.code = code;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.hint = hint;
    this.data = {
      ...rest,
      message,
      suggestion: this.suggestion,
      retriable: this.retriable,
      hint: this.hint,
    };
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      thrownAt: this.thrownAt,
      retriable: this.retriable,
      suggestion: this.suggestion,
      hint: this.hint,
      description: this.description,
      data: this.data,
      original: this.original,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

export interface ElectionErrorDetails {
  code?: string;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  hint?: string;
  [key: string]: unknown;
}

export class ElectionError extends BaseError {
  constructor(message: string, details: ElectionErrorDetails = {}) {
    super({ ...details, message });
  }
}

export interface NotConfiguredErrorDetails extends ElectionErrorDetails {
  setting?: string;
}

/**
 * Thrown by `start()` when a required collaborator (the coordination client,
 * or the path of a {@link NodeReader}) was never provided.
 */
export class NotConfiguredError extends ElectionError {
  setting: string;

  constructor(message: string, details: NotConfiguredErrorDetails = {}) {
    const { setting = 'unknown', ...rest } = details;
    super(message, {
      ...rest,
      setting,
      code: 'NOT_CONFIGURED',
      retriable: false,
      suggestion: rest.suggestion ?? `Provide "${setting}" before calling start().`,
    });
    this.setting = setting;
  }
}

export interface InvalidStateErrorDetails extends ElectionErrorDetails {
  currentState?: string;
  expectedState?: string;
}

export class InvalidStateError extends ElectionError {
  currentState: string;
  expectedState?: string;

  constructor(message: string, details: InvalidStateErrorDetails = {}) {
    const { currentState = 'unknown', expectedState, ...rest } = details;
    super(message, {
      ...rest,
      currentState,
      expectedState,
      code: 'INVALID_STATE',
      retriable: false,
    });
    this.currentState = currentState;
    this.expectedState = expectedState;
  }
}

export interface DuplicateSessionErrorDetails extends ElectionErrorDetails {
  sessionId?: string;
}

/** Thrown by the in-process coordination service when a session id is reused. */
export class DuplicateSessionError extends ElectionError {
  sessionId: string;

  constructor(message: string, details: DuplicateSessionErrorDetails = {}) {
    const { sessionId = 'unknown', ...rest } = details;
    super(message, {
      ...rest,
      sessionId,
      code: 'DUPLICATE_SESSION',
      retriable: false,
      suggestion: rest.suggestion ?? 'Close the existing session or connect with another sessionId.',
    });
    this.sessionId = sessionId;
  }
}

export function isElectionError(error: unknown): error is ElectionError {
  return error instanceof ElectionError;
}
