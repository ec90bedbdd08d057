import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { TestResponse } from '@symtest/shared';

const RULE = '='.repeat(80);

export function resultFileName(address: string): string {
  return `${address.toLowerCase().replace(/^0x/, '')}.txt`;
}

export function formatResult(address: string, result: TestResponse, testedAt: Date): string {
  const parts = [
    `${RULE}\nContract: ${address}\nTested at: ${testedAt.toISOString()}\n${RULE}\n`,
    `Full response:\n${JSON.stringify(result, null, 2)}\n`,
  ];
  if (result.output) {
    parts.push(`${RULE}\nOutput:\n${RULE}\n${result.output}\n`);
  }
  if (result.error && result.error !== result.output) {
    parts.push(`${RULE}\nError:\n${RULE}\n${result.error}\n`);
  }
  return parts.join('\n');
}

/** Write one contract's result to `<dir>/<address without 0x>.txt`. */
export async function saveResult(dir: string, address: string, result: TestResponse, testedAt = new Date()): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, resultFileName(address));
  await writeFile(path, formatResult(address, result, testedAt), 'utf8');
  return path;
}
