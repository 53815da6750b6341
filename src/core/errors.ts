/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Thrown when a path carries no `vNNN` version marker.
 * Recovered per node during display-candidate selection.
 */
export class NoVersionTokenError extends AppError {
  constructor(public readonly path: string) {
    super(`No version token found in path: "${path}"`, 'NO_VERSION_TOKEN');
    this.name = 'NoVersionTokenError';
  }
}

/**
 * Thrown when no selected node yields a non-empty, parseable path.
 * The session never opens and no node is modified.
 */
export class NoDisplayableNodeError extends AppError {
  constructor(public readonly nodeCount: number) {
    super(
      nodeCount === 0
        ? 'No node selected'
        : `None of the ${nodeCount} selected node(s) has a versioned path`,
      'NO_DISPLAYABLE_NODE'
    );
    this.name = 'NoDisplayableNodeError';
  }
}

/**
 * Error thrown when a format decoder fails to parse or decode image data.
 * The error message includes the format name for easy identification.
 */
export class DecoderError extends AppError {
  constructor(format: string, detail: string) {
    super(`[${format}] ${detail}`, 'DECODER_ERROR');
    this.name = 'DecoderError';
  }
}

/**
 * Error thrown when a navigation session operation fails
 * (e.g. a command issued against a disposed session).
 */
export class SessionError extends AppError {
  constructor(detail: string) {
    super(detail, 'SESSION_ERROR');
    this.name = 'SessionError';
  }
}

/**
 * Error thrown when invalid arguments are passed to an API method
 * (e.g. wrong type, out of range, missing required field).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}
