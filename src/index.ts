import express, { ErrorRequestHandler } from 'express';
import cors from 'cors';
import { AppContext, createContext, createOrchestrator } from './context';
import { createScoresRouter } from './routes/scores';
import { createEmailsRouter } from './routes/emails';
import { createTestRunsRouter } from './routes/test-runs';
import { createPromptsRouter } from './routes/prompts';
import { createImprovementRunsRouter } from './routes/improvement-runs';
import { ImprovementRunRegistry } from './services/improvement-orchestrator';
import { errorMessage, errorResponse } from './errors';

export function createApp(ctx: AppContext): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const registry = new ImprovementRunRegistry((runId, config) => createOrchestrator(ctx, runId, config));
  app.use('/api/scores', createScoresRouter());
  app.use('/api/emails', createEmailsRouter(ctx.generator));
  app.use('/api/test-runs', createTestRunsRouter(ctx.generator, ctx.config.generationTimeoutMs));
  app.use('/api/prompts', createPromptsRouter(ctx.store));
  app.use('/api/improvement-runs', createImprovementRunsRouter(registry, ctx.config.backupDir));

  const handleError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json(errorResponse('INVALID_INPUT', 'Request body is not valid JSON', false));
      return;
    }
    console.error(`[api] Unhandled error: ${errorMessage(err)}`);
    res.status(500).json(errorResponse('INTERNAL_ERROR', errorMessage(err), true));
  };
  app.use(handleError);

  return app;
}

if (require.main === module) {
  try {
    const ctx = createContext();
    createApp(ctx).listen(ctx.config.port, () => {
      console.log(`Outreach quality optimizer running on port ${ctx.config.port}`);
    });
  } catch (err) {
    console.error(`Failed to start server: ${errorMessage(err)}`);
    process.exit(2);
  }
}
