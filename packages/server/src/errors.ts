/**
 * Failures raised inside the engine. None of them cross the public API:
 * callers see absence, and the error is logged where it is caught.
 */
export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The grammar could not produce a tree for a file. */
export class ParseError extends EngineError {
  constructor(
    readonly uri: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to parse ${uri}`, options);
  }
}

export class UnsupportedLanguageError extends EngineError {
  constructor(readonly languageId: string) {
    super(`No language profile registered for '${languageId}'`);
  }
}

export class TimeoutError extends EngineError {
  constructor(
    readonly label: string,
    readonly ms: number,
  ) {
    super(`${label} timed out after ${ms}ms`);
  }
}

export class CancelledError extends EngineError {
  constructor(label = "operation") {
    super(`${label} was cancelled`);
  }
}
