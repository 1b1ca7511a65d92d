import { Router, Request, Response } from 'express';
import { EmailGenerator } from '../services/email-generator';
import { runWithQualityValidation } from '../services/quality-gate';
import { errorMessage, errorResponse } from '../errors';
import { GenerateEmailRequestSchema, describeIssues } from './schemas';

export function createEmailsRouter(generator: EmailGenerator): Router {
  const router = Router();

  // POST /api/emails - Generate one email, regenerating until the score is acceptable
  router.post('/', async (req: Request, res: Response) => {
    const parsed = GenerateEmailRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(errorResponse('INVALID_INPUT', describeIssues(parsed.error), false));
      return;
    }

    try {
      const { prospect, maxAttempts } = parsed.data;
      res.json(await runWithQualityValidation(generator, prospect, { maxAttempts }));
    } catch (err) {
      res.status(502).json(errorResponse('GENERATION_FAILED', `Email generation failed: ${errorMessage(err)}`, true));
    }
  });

  return router;
}
