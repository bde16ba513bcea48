import { describe, it, expect } from 'vitest';
import { generateId, secretsEqual } from '../crypto/index.js';

describe('secretsEqual', () => {
  it('should match identical secrets', () => {
    expect(secretsEqual('test-secret', 'test-secret')).toBe(true);
  });

  it('should reject different secrets of any length', () => {
    expect(secretsEqual('test-secreT', 'test-secret')).toBe(false);
    expect(secretsEqual('test', 'test-secret')).toBe(false);
    expect(secretsEqual('', 'test-secret')).toBe(false);
  });
});

describe('generateId', () => {
  it('should produce distinct url-safe ids', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId()));

    expect(ids.size).toBe(50);
    for (const id of ids) {
      expect(id).toMatch(/^[A-Za-z0-9_-]{22}$/);
    }
  });
});
