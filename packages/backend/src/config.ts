import { resolve, join } from 'path';

export interface RunnerConfig {
  port: number;
  corsOrigin: string;
  jsonLimit: string;
  /** Foundry project the verification tool runs in. */
  sandboxDir: string;
  /** Holds the templates and the generated test files. */
  testDir: string;
  defaultTestCase: string;
  forge: {
    bin: string;
    build: boolean;
    timeoutMs: number;
  };
  halmos: {
    bin: string;
    defaultFunction: string;
    timeoutMs: number;
    extraArgs: string[];
  };
}

type Env = Record<string, string | undefined>;

function int_env(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const val = Number(raw);
  if (!Number.isInteger(val) || val <= 0) {
    throw new Error(`Invalid value for environment variable ${name}: ${raw}`);
  }
  return val;
}

function bool_env(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`Invalid value for environment variable ${name}: ${raw}`);
}

export function loadConfig(env: Env = process.env): RunnerConfig {
  const sandboxDir = resolve(env['SANDBOX_DIR'] ?? join(process.cwd(), 'sandbox'));

  return {
    port: int_env(env, 'PORT', 8005),
    corsOrigin: env['CORS_ORIGIN'] ?? '*',
    jsonLimit: env['JSON_LIMIT'] ?? '5mb',
    sandboxDir,
    testDir: join(sandboxDir, env['TEST_SUBDIR'] ?? 'test'),
    defaultTestCase: env['DEFAULT_TEST_CASE'] ?? 'uniswap_callback',
    forge: {
      bin: env['FORGE_BIN'] ?? 'forge',
      build: bool_env(env, 'FORGE_BUILD', true),
      timeoutMs: int_env(env, 'FORGE_TIMEOUT_MS', 120_000),
    },
    halmos: {
      bin: env['HALMOS_BIN'] ?? 'halmos',
      defaultFunction: env['HALMOS_DEFAULT_FUNCTION'] ?? 'test',
      timeoutMs: int_env(env, 'HALMOS_TIMEOUT_MS', 300_000),
      extraArgs: (env['HALMOS_EXTRA_ARGS'] ?? '').split(/\s+/).filter(Boolean),
    },
  };
}
