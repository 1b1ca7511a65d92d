/** Missing or malformed agents/tasks prompt documents. The improvement loop cannot run without them. */
export class PromptConfigError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'PromptConfigError';
  }
}

/** Invalid environment configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class GenerationTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

export class LLMUnavailableError extends Error {
  constructor(message = 'No LLM API key configured') {
    super(message);
    this.name = 'LLMUnavailableError';
  }
}

export interface ErrorBody {
  error: { code: string; message: string; retryable: boolean };
}

export function errorResponse(code: string, message: string, retryable: boolean): ErrorBody {
  return { error: { code, message, retryable } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
