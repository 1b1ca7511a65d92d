import OpenAI from 'openai';

// --- LLM Service Interface ---

export interface CompletionRequest {
  system: string;
  user: string;
  temperature?: number;
}

/** Free-text completion backend used by the generator, analyzer and adapter. */
export interface LLMService {
  complete(request: CompletionRequest): Promise<string>;
}

// --- Configuration ---

export interface LLMServiceConfig {
  apiKey: string;
  baseURL?: string;
  model?: string;
  maxRetries?: number;
  initialRetryDelayMs?: number;
  timeoutMs?: number;
}

const DEFAULT_CONFIG = {
  model: 'gpt-4',
  maxRetries: 3,
  initialRetryDelayMs: 1000,
  timeoutMs: 60000,
  temperature: 0.3,
} as const;

// --- Retry & Parsing Utilities (exported for testing) ---

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a JSON payload out of model text. Accepts bare JSON or JSON wrapped
 * in a markdown code fence.
 */
export function parseJsonResponse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    const fenceMatch = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (fenceMatch) {
      return JSON.parse(fenceMatch[1].trim());
    }
    throw new Error(`Failed to parse LLM response as JSON: ${raw.slice(0, 200)}`);
  }
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  initialDelayMs: number,
  sleepFn: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let lastError = new Error('No attempts were made');
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < maxRetries) {
        const delay = initialDelayMs * Math.pow(2, attempt);
        await sleepFn(delay);
      }
    }
  }
  throw lastError;
}

/** Replace every `{{key}}` placeholder. Unknown placeholders are left as they are. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(vars)) {
    result = result.split(`{{${key}}}`).join(value);
  }
  return result;
}

// --- OpenAI Implementation ---

export class OpenAILLMService implements LLMService {
  private client: OpenAI;
  private model: string;
  private maxRetries: number;
  private initialRetryDelayMs: number;
  private timeoutMs: number;

  constructor(config: LLMServiceConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.model = config.model ?? DEFAULT_CONFIG.model;
    this.maxRetries = config.maxRetries ?? DEFAULT_CONFIG.maxRetries;
    this.initialRetryDelayMs = config.initialRetryDelayMs ?? DEFAULT_CONFIG.initialRetryDelayMs;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs;
  }

  private async callLLM(request: CompletionRequest): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature ?? DEFAULT_CONFIG.temperature,
        },
        { signal: controller.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('LLM returned empty response');
      }
      return content;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async complete(request: CompletionRequest): Promise<string> {
    return retryWithBackoff(
      () => this.callLLM(request),
      this.maxRetries,
      this.initialRetryDelayMs
    );
  }
}
