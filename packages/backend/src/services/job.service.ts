import type { TestResponse } from '@symtest/shared';
import type { RunnerConfig } from '../config.js';
import type { ValidTestRequest } from '../middleware/validate.middleware.js';
import { HttpError } from '../errors.js';
import type { CommandRunner } from './process.service.js';
import { materializeTestFile, removeTestFile, type GeneratedTestFile } from './template.service.js';
import { compileSandbox, runHalmos, type ToolOutcome } from './halmos.service.js';
import { claimTestId, releaseTestId, getRunningCount } from './inflight.service.js';

export interface JobDeps {
  config: RunnerConfig;
  run: CommandRunner;
}

function toResponse(outcome: ToolOutcome): TestResponse {
  const response: TestResponse = {
    success: outcome.success,
    message: outcome.message,
    output: outcome.output,
  };
  if (!outcome.success) response.error = outcome.output || outcome.message;
  return response;
}

/**
 * One request, start to finish: fill in the template, compile, run halmos,
 * clean up. Tool failures come back as success=false; request and template
 * problems are thrown as HttpError.
 */
export async function runTestJob(request: ValidTestRequest, { config, run }: JobDeps): Promise<TestResponse> {
  const testCase = request.test_case ?? config.defaultTestCase;
  const functionName = request.function_name ?? config.halmos.defaultFunction;
  const testId = request.test_id;

  if (!claimTestId(testId)) {
    throw new HttpError(409, `A test with test_id ${testId} is already running`);
  }
  console.log(`[test] Started ${testId} (${getRunningCount()} running)`);

  let generated: GeneratedTestFile | undefined;
  try {
    generated = await materializeTestFile(config.testDir, testCase, testId, request.deploycode);

    if (config.forge.build) {
      const build = await compileSandbox(config, generated.fileName, run);
      if (!build.success) return toResponse(build);
    }

    const outcome = await runHalmos(config, { contractName: generated.contractName, functionName }, run);
    return toResponse(outcome);
  } finally {
    if (generated) {
      if (request.debug) {
        console.log(`[test] Debug mode: keeping ${generated.path}`);
      } else {
        await removeTestFile(generated.path);
      }
    }
    releaseTestId(testId);
  }
}
