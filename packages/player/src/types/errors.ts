/**
 * Custom error classes
 */

export class PlayerError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlayerError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, PlayerError.prototype);

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging/debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * A single problem found while validating a command, event or config
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends PlayerError {
  constructor(
    message: string,
    public readonly validationErrors: ValidationIssue[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', undefined, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class UnknownCommandError extends PlayerError {
  constructor(
    public readonly command: string,
    context?: Record<string, unknown>
  ) {
    super(`No handler defined for command: ${command}`, 'UNKNOWN_COMMAND', undefined, context);
    this.name = 'UnknownCommandError';
    Object.setPrototypeOf(this, UnknownCommandError.prototype);
  }
}

export class PlayerReleasedError extends PlayerError {
  constructor(context?: Record<string, unknown>) {
    super(
      'Player has been released and cannot be used anymore',
      'PLAYER_RELEASED',
      undefined,
      context
    );
    this.name = 'PlayerReleasedError';
    Object.setPrototypeOf(this, PlayerReleasedError.prototype);
  }
}

export class CommandDroppedError extends PlayerError {
  constructor(
    public readonly command: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Command ${command} was dropped before it could run`,
      'COMMAND_DROPPED',
      undefined,
      context
    );
    this.name = 'CommandDroppedError';
    Object.setPrototypeOf(this, CommandDroppedError.prototype);
  }
}

export class MediaResolutionError extends PlayerError {
  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'MEDIA_RESOLUTION_ERROR', originalError, context);
    this.name = 'MediaResolutionError';
    Object.setPrototypeOf(this, MediaResolutionError.prototype);
  }
}

export class NativeCommandError extends PlayerError {
  constructor(
    public readonly command: string,
    originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(
      `Native command ${command} failed: ${describeError(originalError)}`,
      'NATIVE_COMMAND_ERROR',
      originalError,
      context
    );
    this.name = 'NativeCommandError';
    Object.setPrototypeOf(this, NativeCommandError.prototype);
  }
}

export class SubscriberError extends PlayerError {
  constructor(
    public readonly subscriptionId: string,
    public readonly event: string,
    originalError?: unknown
  ) {
    super(
      `Subscriber ${subscriptionId} failed on ${event}: ${describeError(originalError)}`,
      'SUBSCRIBER_ERROR',
      originalError,
      { subscriptionId, event }
    );
    this.name = 'SubscriberError';
    Object.setPrototypeOf(this, SubscriberError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
