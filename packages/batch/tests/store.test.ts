import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CreationCodeStore } from '../src/store.js';

describe('CreationCodeStore', () => {
  let store: CreationCodeStore;

  beforeEach(() => {
    store = new CreationCodeStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('returns null for an unknown contract', () => {
    expect(store.get('0xabc', 1)).toBeNull();
  });

  it('keys by lower-cased address and chain id, storing code without 0x', () => {
    store.save('0xABC', 1, '0x6080');

    expect(store.get('0xabc', 1)).toBe('6080');
    expect(store.get('0xAbC', 1)).toBe('6080');
    expect(store.get('0xabc', 56)).toBeNull();
  });

  it('replaces an existing entry', () => {
    store.save('0xabc', 1, '6080');
    store.save('0xabc', 1, '6060');

    expect(store.get('0xabc', 1)).toBe('6060');
    expect(store.count()).toBe(1);
  });
});
