import { Router, Request, Response } from 'express';
import { scoreEmail } from '../scoring/quality-scorer';
import { buildRetryHints, getImprovementSuggestions, shouldRegenerate } from '../scoring/regeneration-policy';
import { errorResponse } from '../errors';
import { ScoreRequestSchema, describeIssues } from './schemas';

export function createScoresRouter(): Router {
  const router = Router();

  // POST /api/scores - Score one email without generating anything
  router.post('/', (req: Request, res: Response) => {
    const parsed = ScoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(errorResponse('INVALID_INPUT', describeIssues(parsed.error), false));
      return;
    }

    const { email, research, prospect } = parsed.data;
    const score = scoreEmail(email, research, prospect);
    const suggestions = getImprovementSuggestions(score);
    res.json({
      score,
      decision: shouldRegenerate(score),
      suggestions,
      retryHints: buildRetryHints(suggestions),
    });
  });

  return router;
}
