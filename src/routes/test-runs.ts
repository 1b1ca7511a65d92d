import { Router, Request, Response } from 'express';
import { EmailGenerator } from '../services/email-generator';
import { DEFAULT_TARGET_PASS_RATE, TestRunner } from '../services/test-runner';
import { errorMessage, errorResponse } from '../errors';
import { TestRunRequestSchema, describeIssues } from './schemas';

export function createTestRunsRouter(generator: EmailGenerator, defaultTimeoutMs: number): Router {
  const router = Router();

  // POST /api/test-runs - Run prospects through the generator and score each email
  router.post('/', async (req: Request, res: Response) => {
    const parsed = TestRunRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(errorResponse('INVALID_INPUT', describeIssues(parsed.error), false));
      return;
    }

    try {
      const { prospects, targetPassRate, timeoutMs } = parsed.data;
      const runner = new TestRunner(generator, { timeoutMs: timeoutMs ?? defaultTimeoutMs });
      const suite = await runner.runTestSuite(prospects, targetPassRate ?? DEFAULT_TARGET_PASS_RATE);
      res.json(suite);
    } catch (err) {
      res.status(500).json(errorResponse('TEST_RUN_FAILED', `Failed to run tests: ${errorMessage(err)}`, true));
    }
  });

  return router;
}
