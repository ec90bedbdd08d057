import type { Request, Response, NextFunction } from 'express';
import { z, ZodSchema } from 'zod';
import type { TestResponse } from '@symtest/shared';

export function validate<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      const body: TestResponse = {
        success: false,
        message: 'Invalid request body',
        output: '',
        error: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
      };
      res.status(400).json(body);
      return;
    }
    req.body = result.data;
    next();
  };
}

// Identifiers end up in a Solidity contract name and a file name
const identifier = (what: string) =>
  z.string()
    .min(1, `${what} must not be empty`)
    .max(64, `${what} must be at most 64 characters`)
    .regex(/^[A-Za-z0-9_]+$/, `${what} may only contain letters, digits and underscores`);

export const TestRequestSchema = z.object({
  deploycode: z.string(),
  test_id: identifier('test_id'),
  function_name: identifier('function_name').optional(),
  // C<test_id>_test.t.sol is what a job writes; never read one back as a template
  test_case: identifier('test_case')
    .regex(/^[^C]/, 'test_case must not start with "C"; that prefix is reserved for generated test files')
    .optional(),
  debug: z.boolean().optional(),
});

export type ValidTestRequest = z.infer<typeof TestRequestSchema>;
