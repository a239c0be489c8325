/**
 * Error codes for maze construction.
 *
 * Growth itself cannot fail, so every code describes a rejected
 * configuration.
 */
export type MazeErrorCode = "INVALID_DIMENSIONS" | "INVALID_PARAMETER";

/**
 * Unified error type for maze construction.
 *
 * @example
 * ```typescript
 * throw MazeError.invalidDimensions(
 *   "Grid too small for 3 trees",
 *   { width: 12, height: 12, treeCount: 3 },
 * );
 * ```
 */
export class MazeError extends Error {
  readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  /**
   * Grid too small (or a seed outside it) for the requested layout.
   */
  static invalidDimensions(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("INVALID_DIMENSIONS", message, details);
  }

  /**
   * A parameter outside its supported domain.
   */
  static invalidParameter(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("INVALID_PARAMETER", message, details);
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
