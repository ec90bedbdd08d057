import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, type RunnerConfig } from '../src/config.js';

export const TEMPLATE = `pragma solidity ^0.8.20;

contract TestUniswapCallback is Test {
    function setUp() public {
        bytes memory deploycode = hex"";
    }
}
`;

export interface Sandbox {
  config: RunnerConfig;
  cleanup(): Promise<void>;
}

/** A throwaway sandbox directory holding uniswap_callback_test.t.sol. */
export async function makeSandbox(env: Record<string, string> = {}, template = TEMPLATE): Promise<Sandbox> {
  const dir = await mkdtemp(join(tmpdir(), 'symtest-'));
  const config = loadConfig({ SANDBOX_DIR: dir, ...env });
  await mkdir(config.testDir, { recursive: true });
  await writeFile(join(config.testDir, 'uniswap_callback_test.t.sol'), template, 'utf8');
  return {
    config,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
