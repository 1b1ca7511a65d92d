import { LLMService, OpenAILLMService, CompletionRequest } from './llm-service';
import { loadConfig, LLMSettings } from '../config';
import { LLMUnavailableError } from '../errors';

/**
 * Used when no API key is configured. Every call rejects, so the analyzer
 * and adapter run their rule-based strategies and generation fails per test.
 */
export class OfflineLLMService implements LLMService {
  async complete(_request: CompletionRequest): Promise<string> {
    throw new LLMUnavailableError();
  }
}

let overriddenLLMService: LLMService | null = null;

/**
 * Override the LLM service instance (useful for testing).
 */
export function setLLMService(service: LLMService | null): void {
  overriddenLLMService = service;
}

/**
 * Create or return the LLM service.
 * Uses the OpenAI client when an API key is configured, otherwise the offline service.
 */
export function getLLMService(settings: LLMSettings = loadConfig().llm): LLMService {
  if (overriddenLLMService) {
    return overriddenLLMService;
  }

  if (settings.apiKey) {
    return new OpenAILLMService({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL,
      model: settings.model,
    });
  }

  console.warn('[llm] No API key configured; using offline service with rule-based fallbacks');
  return new OfflineLLMService();
}
