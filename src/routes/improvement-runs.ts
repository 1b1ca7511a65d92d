import { Router, Request, Response } from 'express';
import {
  DEFAULT_IMPROVEMENT_CONFIG,
  ImprovementConfig,
  ImprovementEvent,
  ImprovementRunRegistry,
  RunInProgressError,
} from '../services/improvement-orchestrator';
import { errorMessage, errorResponse } from '../errors';
import { ImprovementRunRequestSchema, describeIssues } from './schemas';

export function createImprovementRunsRouter(registry: ImprovementRunRegistry, backupDir?: string): Router {
  const router = Router();

  // POST /api/improvement-runs - Start an improvement run in the background
  router.post('/', (req: Request, res: Response) => {
    const parsed = ImprovementRunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json(errorResponse('INVALID_INPUT', describeIssues(parsed.error), false));
      return;
    }

    const body = parsed.data;
    const config: ImprovementConfig = {
      maxIterations: body.maxIterations ?? DEFAULT_IMPROVEMENT_CONFIG.maxIterations,
      targetPassRate: body.targetPassRate ?? DEFAULT_IMPROVEMENT_CONFIG.targetPassRate,
      numProspects: body.numProspects ?? DEFAULT_IMPROVEMENT_CONFIG.numProspects,
      backupDir: body.testOnly ? undefined : backupDir,
    };

    try {
      const id = registry.start({ config, testOnly: body.testOnly });
      res.status(201).json({ id, status: 'running' });
    } catch (err) {
      if (err instanceof RunInProgressError) {
        res.status(409).json(errorResponse('RUN_IN_PROGRESS', err.message, true));
        return;
      }
      res.status(500).json(errorResponse('RUN_START_FAILED', `Failed to start run: ${errorMessage(err)}`, true));
    }
  });

  // GET /api/improvement-runs/:id - Run status, with the report once finished
  router.get('/:id', (req: Request, res: Response) => {
    const id = req.params.id;
    const record = registry.get(id);
    if (!record) {
      res.status(404).json(errorResponse('RUN_NOT_FOUND', `Improvement run '${id}' not found`, false));
      return;
    }
    res.json(record);
  });

  // GET /api/improvement-runs/:id/events - SSE endpoint for real-time progress
  router.get('/:id/events', (req: Request, res: Response) => {
    const id = req.params.id;
    const record = registry.get(id);
    if (!record) {
      res.status(404).json(errorResponse('RUN_NOT_FOUND', `Improvement run '${id}' not found`, false));
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const isLast = (event: ImprovementEvent) => event.type === 'finished' || event.type === 'error';
    const send = (event: ImprovementEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    // Replay what already happened
    for (const event of record.events) send(event);
    if (record.status !== 'running' || record.events.some(isLast)) {
      res.end();
      return;
    }

    const listener = (event: ImprovementEvent) => {
      send(event);
      if (isLast(event)) {
        res.end();
      }
    };

    registry.addEventListener(id, listener);

    req.on('close', () => {
      registry.removeEventListener(id, listener);
    });
  });

  return router;
}
