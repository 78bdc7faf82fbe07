export class ScrapeError extends Error {
  constructor(
    message: string,
    readonly council: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ScrapeError';
  }
}

export class FixtureError extends Error {
  constructor(
    message: string,
    readonly fixturePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FixtureError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause === undefined ? error.message : `${error.message} (cause: ${describeError(error.cause)})`;
  }
  return String(error);
}
