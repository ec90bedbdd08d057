import type { TestResponse } from '@symtest/shared';
import type { ContractRow } from './csv.js';
import type { CreationCodeStore } from './store.js';
import type { SubmitTest } from './client.js';
import { withRetry, sleep as defaultSleep } from './retry.js';
import { saveResult } from './results.js';
import { stripHexPrefix } from './hex.js';

/** Where creation bytecode comes from when the local store has none. */
export interface CreationCodeSource {
  name: string;
  fetch(row: ContractRow, chainId: number): Promise<string | null>;
}

export interface BatchOptions {
  chainId: number;
  testCase: string;
  resultsDir: string;
  idPrefix: string;
  /** Pause between contracts. */
  delayMs: number;
  lookupAttempts: number;
  lookupRetryDelayMs: number;
}

export interface BatchDeps {
  store: CreationCodeStore;
  source: CreationCodeSource;
  submit: SubmitTest;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface BatchSummary {
  total: number;
  fetched: number;
  passed: number;
  results: Array<{ address: string; testId: string | null; success: boolean; file: string }>;
}

export const DEFAULT_BATCH_OPTIONS: Omit<BatchOptions, 'chainId'> = {
  testCase: 'uniswap_callback',
  resultsDir: 'result',
  idPrefix: '',
  delayMs: 500,
  lookupAttempts: 5,
  lookupRetryDelayMs: 2000,
};

/** Local store first, then the remote source with retries; stores what it fetches. */
export async function resolveCreationCode(
  row: ContractRow,
  options: Pick<BatchOptions, 'chainId' | 'lookupAttempts' | 'lookupRetryDelayMs'>,
  deps: Pick<BatchDeps, 'store' | 'source' | 'sleep'>,
): Promise<string | null> {
  const cached = deps.store.get(row.address, options.chainId);
  if (cached) {
    console.log('[batch]   creation code found in local store');
    return cached;
  }

  console.log(`[batch]   not in local store, fetching from ${deps.source.name}...`);
  try {
    const code = await withRetry(async () => {
      const found = await deps.source.fetch(row, options.chainId);
      if (found === null) throw new Error(`no creation code for ${row.address}`);
      return found;
    }, {
      attempts: options.lookupAttempts,
      delayMs: options.lookupRetryDelayMs,
      sleep: deps.sleep,
      onRetry: (attempt, err) => console.warn(`[batch]   attempt ${attempt} failed: ${err.message}; retrying`),
    });
    deps.store.save(row.address, options.chainId, code);
    console.log('[batch]   saved to local store');
    return stripHexPrefix(code);
  } catch (err) {
    console.error(`[batch]   giving up after ${options.lookupAttempts} attempts: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * For each contract: resolve its creation code, run it through POST /test and
 * write the response to the results directory. Contracts are handled one at a
 * time; test ids count the contracts that reached the test step.
 */
export async function runBatch(rows: ContractRow[], options: BatchOptions, deps: BatchDeps): Promise<BatchSummary> {
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const summary: BatchSummary = { total: rows.length, fetched: 0, passed: 0, results: [] };
  let nextId = 1;

  for (const [index, row] of rows.entries()) {
    console.log(`[batch] [${index + 1}/${rows.length}] ${row.address}`);

    const code = await resolveCreationCode(row, options, deps);
    let result: TestResponse;
    let testId: string | null = null;

    if (code === null) {
      result = { success: false, message: 'Creation code not found', output: '' };
    } else {
      summary.fetched++;
      testId = `${options.idPrefix}${nextId++}`;
      console.log(`[batch]   running test ${testId} (${code.length / 2} bytes)`);
      result = await deps.submit({ deploycode: code, test_case: options.testCase, test_id: testId });
      if (result.success) summary.passed++;
      console.log(`[batch]   ${result.success ? 'passed' : 'failed'}: ${result.message}`);
    }

    const file = await saveResult(options.resultsDir, row.address, result, now());
    summary.results.push({ address: row.address, testId, success: result.success, file });

    if (index < rows.length - 1 && options.delayMs > 0) await sleep(options.delayMs);
  }

  return summary;
}
