/**
 * The transform pass broke one of its own invariants. Never caused by the
 * code being mutated; instrumentation must stop.
 */
export class TransformError extends Error {
  constructor(
    message: string,
    public readonly file?: string,
    public readonly line?: number,
  ) {
    super(message);
    this.name = 'TransformError';
  }
}

export class SourceParseError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    public readonly diagnostics: string[],
  ) {
    super(message);
    this.name = 'SourceParseError';
  }
}
