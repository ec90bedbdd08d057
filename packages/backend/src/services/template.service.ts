import { readFile, writeFile, unlink } from 'fs/promises';
import { join } from 'path';
import { HttpError } from '../errors.js';

// The template's test contract: `contract TestSomething is Test {`
const TEST_CONTRACT_DECL = /contract\s+(Test\w+)\s+is/;
// Empty bytecode literal the request's deploycode is written into
const DEPLOYCODE_SLOT = 'bytes memory deploycode = hex"";';

export interface GeneratedTestFile {
  path: string;
  fileName: string;
  contractName: string;
}

export function templateFileName(testCase: string): string {
  return `${testCase}_test.t.sol`;
}

export function generatedFileName(testId: string): string {
  return `C${testId}_test.t.sol`;
}

export function testContractName(testId: string): string {
  return `Test${testId}`;
}

export function extractTestContractName(source: string): string | null {
  return TEST_CONTRACT_DECL.exec(source)?.[1] ?? null;
}

/** Strip a 0x prefix and whitespace; rejects anything that is not whole bytes of hex. */
export function normalizeDeploycode(raw: string): string {
  let code = raw.trim();
  if (code.startsWith('0x') || code.startsWith('0X')) code = code.slice(2);
  code = code.replace(/\s+/g, '');

  if (!/^[0-9a-fA-F]*$/.test(code)) {
    throw new HttpError(400, 'Invalid hex string: deploycode may only contain hexadecimal digits');
  }
  if (code.length % 2 !== 0) {
    throw new HttpError(400, 'Invalid hex string: deploycode has an odd number of digits');
  }
  return code;
}

/** Rename the template's test contract and fill in the bytecode literal. */
export function renderTestSource(template: string, contractName: string, deploycode: string): string {
  const templateContract = extractTestContractName(template);
  if (!templateContract) {
    throw new HttpError(500, 'Template has no contract whose name starts with "Test"');
  }
  if (!template.includes(DEPLOYCODE_SLOT)) {
    throw new HttpError(500, `Template has no deploycode definition: ${DEPLOYCODE_SLOT}`);
  }

  return template
    .replace(new RegExp(`contract\\s+${templateContract}\\s+is`, 'g'), () => `contract ${contractName} is`)
    .replaceAll(DEPLOYCODE_SLOT, () => `bytes memory deploycode = hex"${deploycode}";`);
}

export async function readTemplate(testDir: string, testCase: string): Promise<string> {
  const path = join(testDir, templateFileName(testCase));
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new HttpError(404, `Test template not found: ${templateFileName(testCase)}`);
    }
    throw new HttpError(500, `Failed to read test template ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Fill in the template for `testCase` and write it next to the template as
 * C<testId>_test.t.sol. The file is created exclusively, so a second job with
 * the same id fails instead of overwriting the first one's file.
 */
export async function materializeTestFile(
  testDir: string,
  testCase: string,
  testId: string,
  deploycode: string,
): Promise<GeneratedTestFile> {
  const code = normalizeDeploycode(deploycode);
  const template = await readTemplate(testDir, testCase);
  const contractName = testContractName(testId);
  const content = renderTestSource(template, contractName, code);

  const fileName = generatedFileName(testId);
  const path = join(testDir, fileName);
  try {
    await writeFile(path, content, { encoding: 'utf8', flag: 'wx' });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      throw new HttpError(409, `Generated test file already exists: ${fileName}`);
    }
    throw err;
  }

  console.log(`[template] Wrote ${path} (contract ${contractName}, ${code.length / 2} bytes of deploycode)`);
  return { path, fileName, contractName };
}

/** Delete a generated file; failures are logged, never thrown. */
export async function removeTestFile(path: string): Promise<void> {
  try {
    await unlink(path);
    console.log(`[template] Removed ${path}`);
  } catch (err) {
    console.error(`[template] Failed to remove ${path}:`, err);
  }
}
