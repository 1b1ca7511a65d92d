import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

/** Nearest directory at or above `start` holding a package.json; `start` itself when none does. */
export function findProjectRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

// Same answer from src/ under the test runner and from dist/src/ once built.
export const ROOT_DIR = findProjectRoot(__dirname);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).optional(),
  AGENTS_CONFIG_PATH: z.string().min(1).default('config/agents.yaml'),
  TASKS_CONFIG_PATH: z.string().min(1).default('config/tasks.yaml'),
  IMPROVEMENT_LOG_DIR: z.string().min(1).default('improvement_logs'),
  PROMPT_BACKUP_DIR: z.string().min(1).default('prompt_backups'),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
});

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const OPENROUTER_DEFAULT_MODEL = 'openai/gpt-4-turbo';

export interface LLMSettings {
  apiKey?: string;
  baseURL?: string;
  model?: string;
}

export interface AppConfig {
  port: number;
  llm: LLMSettings;
  agentsConfigPath: string;
  tasksConfigPath: string;
  logDir: string;
  backupDir: string;
  generationTimeoutMs: number;
}

function resolveFromRoot(p: string): string {
  return path.isAbsolute(p) ? p : path.join(ROOT_DIR, p);
}

/**
 * Read configuration from the environment (.env is loaded first).
 * An OpenRouter key is used when no OpenAI key is present.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  const useOpenRouter = !e.OPENAI_API_KEY && !!e.OPENROUTER_API_KEY;
  const llm: LLMSettings = useOpenRouter
    ? {
        apiKey: e.OPENROUTER_API_KEY,
        baseURL: e.OPENAI_BASE_URL ?? OPENROUTER_BASE_URL,
        model: e.LLM_MODEL ?? OPENROUTER_DEFAULT_MODEL,
      }
    : { apiKey: e.OPENAI_API_KEY, baseURL: e.OPENAI_BASE_URL, model: e.LLM_MODEL };

  return {
    port: e.PORT,
    llm,
    agentsConfigPath: resolveFromRoot(e.AGENTS_CONFIG_PATH),
    tasksConfigPath: resolveFromRoot(e.TASKS_CONFIG_PATH),
    logDir: resolveFromRoot(e.IMPROVEMENT_LOG_DIR),
    backupDir: resolveFromRoot(e.PROMPT_BACKUP_DIR),
    generationTimeoutMs: e.GENERATION_TIMEOUT_MS,
  };
}
