/**
 * Typed error classes for loading and parsing Nex scene sources.
 */

/** Base class for every error raised by the Nex runtime packages. */
export class NexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NexError';
  }
}

/** The source text is missing the mandatory `game` marker. */
export class SceneSyntaxError extends NexError {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'SceneSyntaxError';
  }
}

export interface SceneValidationIssue {
  /** Location inside the IR, e.g. `objects[1].scale`. */
  readonly path: string;
  readonly message: string;
}

/** The parsed IR violates one of its invariants. */
export class SceneValidationError extends NexError {
  constructor(
    public readonly issues: readonly SceneValidationIssue[],
    public readonly filePath?: string,
  ) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super(filePath ? `${filePath}: invalid scene (${summary})` : `Invalid scene (${summary})`);
    this.name = 'SceneValidationError';
  }
}

/** Reading scene source text failed. */
export class SourceLoadError extends NexError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Failed to load source "${path}": ${reason}`);
    this.name = 'SourceLoadError';
  }
}

/** Render an unknown thrown value as a single log-friendly line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
