import { Router, Request, Response } from 'express';
import { PromptStore } from '../services/prompt-store';
import { PromptConfigError, errorMessage, errorResponse } from '../errors';

export function createPromptsRouter(store: PromptStore): Router {
  const router = Router();

  // GET /api/prompts - Current agent and task definitions
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const { agents, tasks } = await store.load();
      res.json({ agents, tasks });
    } catch (err) {
      if (err instanceof PromptConfigError) {
        res.status(500).json(errorResponse('PROMPT_CONFIG_ERROR', `${err.message} (${err.filePath})`, false));
        return;
      }
      res.status(500).json(errorResponse('PROMPTS_FETCH_FAILED', `Failed to load prompts: ${errorMessage(err)}`, true));
    }
  });

  return router;
}
