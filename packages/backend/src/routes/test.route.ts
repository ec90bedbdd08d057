import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { validate, TestRequestSchema, type ValidTestRequest } from '../middleware/validate.middleware.js';
import { runTestJob, type JobDeps } from '../services/job.service.js';

export function createTestRouter(deps: JobDeps): Router {
  const testRouter = Router();

  testRouter.post(
    '/',
    validate(TestRequestSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      const request = req.body as ValidTestRequest;

      try {
        console.log(
          `[test] Request: test_case=${request.test_case ?? deps.config.defaultTestCase} ` +
          `test_id=${request.test_id} debug=${request.debug ?? false} ` +
          `deploycode=${request.deploycode.length} chars`,
        );
        const result = await runTestJob(request, deps);
        console.log(`[test] ${request.test_id}: ${result.message}`);
        res.json(result);
      } catch (err) {
        next(err);
      }
    }
  );

  return testRouter;
}
