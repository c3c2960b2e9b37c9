export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GenerationError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}
