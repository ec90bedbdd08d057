import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  extractTestContractName,
  normalizeDeploycode,
  renderTestSource,
  materializeTestFile,
  removeTestFile,
  generatedFileName,
} from '../src/services/template.service.js';
import { HttpError } from '../src/errors.js';
import { makeSandbox, TEMPLATE, type Sandbox } from './helpers.js';

describe('normalizeDeploycode', () => {
  it('strips the 0x prefix and whitespace', () => {
    expect(normalizeDeploycode('  0x6080\n6040 52 ')).toBe('6080604052');
    expect(normalizeDeploycode('0XABcd')).toBe('ABcd');
  });

  it('accepts empty bytecode', () => {
    expect(normalizeDeploycode('')).toBe('');
    expect(normalizeDeploycode('0x')).toBe('');
  });

  it('rejects non-hex characters', () => {
    expect(() => normalizeDeploycode('0x60g0')).toThrow('Invalid hex string: deploycode may only contain hexadecimal digits');
  });

  it('rejects a half byte', () => {
    const err = (() => {
      try {
        normalizeDeploycode('608');
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 400, message: 'Invalid hex string: deploycode has an odd number of digits' });
  });
});

describe('extractTestContractName', () => {
  it('finds the first contract whose name starts with Test', () => {
    const source = 'contract Helper is Base {}\ncontract TestVault is Test, SymTest {}\ncontract TestOther is Test {}';
    expect(extractTestContractName(source)).toBe('TestVault');
  });

  it('returns null when there is none', () => {
    expect(extractTestContractName('contract Vault {}')).toBeNull();
  });
});

describe('renderTestSource', () => {
  it('renames the test contract and fills in the bytecode', () => {
    expect(renderTestSource(TEMPLATE, 'Test42', 'deadbeef')).toBe(`pragma solidity ^0.8.20;

contract Test42 is Test {
    function setUp() public {
        bytes memory deploycode = hex"deadbeef";
    }
}
`);
  });

  it('leaves contracts with a longer name alone', () => {
    const source = 'contract TestA is Test {}\ncontract TestAB is TestA {}\nbytes memory deploycode = hex"";';
    expect(renderTestSource(source, 'Test1', '')).toBe(
      'contract Test1 is Test {}\ncontract TestAB is TestA {}\nbytes memory deploycode = hex"";',
    );
  });

  it('fails on a template without a deploycode slot', () => {
    expect(() => renderTestSource('contract TestA is Test {}', 'Test1', '00')).toThrow(
      'Template has no deploycode definition: bytes memory deploycode = hex"";',
    );
  });

  it('fails on a template without a test contract', () => {
    expect(() => renderTestSource('bytes memory deploycode = hex"";', 'Test1', '00')).toThrow(
      'Template has no contract whose name starts with "Test"',
    );
  });
});

describe('materializeTestFile', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    sandbox = await makeSandbox();
  });

  afterEach(async () => {
    await sandbox.cleanup();
    vi.restoreAllMocks();
  });

  it('writes C<id>_test.t.sol next to the template', async () => {
    const file = await materializeTestFile(sandbox.config.testDir, 'uniswap_callback', '12', '0x00ff');

    expect(file).toEqual({
      path: join(sandbox.config.testDir, 'C12_test.t.sol'),
      fileName: 'C12_test.t.sol',
      contractName: 'Test12',
    });
    const content = await readFile(file.path, 'utf8');
    expect(content).toContain('contract Test12 is Test {');
    expect(content).toContain('bytes memory deploycode = hex"00ff";');
  });

  it('refuses to overwrite an existing generated file', async () => {
    await writeFile(join(sandbox.config.testDir, generatedFileName('12')), 'in use', 'utf8');

    await expect(materializeTestFile(sandbox.config.testDir, 'uniswap_callback', '12', '')).rejects.toMatchObject({
      status: 409,
      message: 'Generated test file already exists: C12_test.t.sol',
    });
    expect(await readFile(join(sandbox.config.testDir, 'C12_test.t.sol'), 'utf8')).toBe('in use');
  });

  it('answers 404 for a missing template', async () => {
    await expect(materializeTestFile(sandbox.config.testDir, 'flashloan', '1', '')).rejects.toMatchObject({
      status: 404,
      message: 'Test template not found: flashloan_test.t.sol',
    });
  });

  it('removeTestFile logs instead of throwing when the file is gone', async () => {
    await expect(removeTestFile(join(sandbox.config.testDir, 'C99_test.t.sol'))).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledOnce();
  });
});
