export class MissingArgumentError extends Error {
  constructor(public readonly argument: string) {
    super(`Missing required argument: ${argument}`);
    this.name = 'MissingArgumentError';
  }
}

export class InvalidArgumentError extends Error {
  constructor(public readonly argument: string, expected: string) {
    super(`Invalid argument ${argument}: expected ${expected}`);
    this.name = 'InvalidArgumentError';
  }
}

/** Raised when the provider answers with something we cannot shape into a result. */
export class ProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
