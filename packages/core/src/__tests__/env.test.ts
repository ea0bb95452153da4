import { describe, it, expect } from 'vitest';
import { validateEnv } from '../env.js';
import { ValidationError } from '../errors.js';

const credentials = {
  FRESHSALES_DOMAIN: 'acme',
  FRESHSALES_API_KEY: 'test-secret',
};

describe('validateEnv', () => {
  it('should apply defaults', () => {
    const env = validateEnv(credentials);

    expect(env.NODE_ENV).toBe('development');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.FRESHSALES_TIMEOUT_MS).toBe(30000);
    expect(env.FRESHSALES_PER_PAGE).toBeUndefined();
  });

  it('should parse numeric settings', () => {
    const env = validateEnv({
      ...credentials,
      FRESHSALES_PER_PAGE: '100',
      FRESHSALES_TIMEOUT_MS: '5000',
    });

    expect(env.FRESHSALES_PER_PAGE).toBe(100);
    expect(env.FRESHSALES_TIMEOUT_MS).toBe(5000);
  });

  it('should require credentials', () => {
    expect(() => validateEnv({})).toThrow(ValidationError);
  });

  it('should list failing fields in the message', () => {
    expect(() => validateEnv({ FRESHSALES_DOMAIN: 'acme' })).toThrow(
      /FRESHSALES_API_KEY: Required/
    );
  });

  it('should reject an out-of-range page size', () => {
    expect(() => validateEnv({ ...credentials, FRESHSALES_PER_PAGE: '500' })).toThrow(
      ValidationError
    );
  });

  it('should accept silent log level', () => {
    expect(validateEnv({ ...credentials, LOG_LEVEL: 'silent' }).LOG_LEVEL).toBe('silent');
  });
});
