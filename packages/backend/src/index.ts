import 'dotenv/config';
import { existsSync } from 'fs';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { runCommand, toolVersion } from './services/process.service.js';

const config = loadConfig();

if (!existsSync(config.sandboxDir)) {
  throw new Error(`Sandbox directory does not exist: ${config.sandboxDir}`);
}

async function preflight(): Promise<void> {
  for (const bin of [config.forge.bin, config.halmos.bin]) {
    const version = await toolVersion(bin);
    if (version === null) {
      console.warn(`[server] ${bin} not found; test requests will fail until it is installed`);
    } else {
      console.log(`[server] ${bin}: ${version}`);
    }
  }
}

const app = createApp({ config, run: runCommand });

app.listen(config.port, () => {
  console.log(`[server] Symbolic test runner on http://localhost:${config.port} (sandbox ${config.sandboxDir})`);
  preflight().catch((err: unknown) => {
    console.error('[server] Preflight failed:', err);
  });
});
