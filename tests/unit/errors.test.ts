import { describe, it, expect } from 'vitest';
import { CacheStoreError, ConfigurationError, SearchBackendError } from '../../src/errors.js';

describe('ConfigurationError', () => {
  it('has correct name', () => {
    expect(new ConfigurationError('msg').name).toBe('ConfigurationError');
  });

  it('is instanceof ConfigurationError and Error', () => {
    const err = new ConfigurationError('msg');
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toBeInstanceOf(Error);
  });

  it('stores the message', () => {
    expect(new ConfigurationError('Search client not set.').message).toBe('Search client not set.');
  });

  it('has a stack trace', () => {
    expect(new ConfigurationError('msg').stack).toBeDefined();
  });
});

describe('SearchBackendError', () => {
  it('has correct name', () => {
    expect(new SearchBackendError('msg').name).toBe('SearchBackendError');
  });

  it('is instanceof SearchBackendError and Error', () => {
    const err = new SearchBackendError('msg');
    expect(err).toBeInstanceOf(SearchBackendError);
    expect(err).toBeInstanceOf(Error);
  });

  it('cause and statusCode are undefined when not provided', () => {
    const err = new SearchBackendError('msg');
    expect(err.cause).toBeUndefined();
    expect(err.statusCode).toBeUndefined();
  });

  it('stores the cause and status code', () => {
    const root = new Error('root');
    const err = new SearchBackendError('msg', root, 503);
    expect(err.cause).toBe(root);
    expect(err.statusCode).toBe(503);
  });
});

describe('CacheStoreError', () => {
  it('has correct name', () => {
    expect(new CacheStoreError('msg').name).toBe('CacheStoreError');
  });

  it('is instanceof CacheStoreError and Error', () => {
    const err = new CacheStoreError('msg');
    expect(err).toBeInstanceOf(CacheStoreError);
    expect(err).toBeInstanceOf(Error);
  });

  it('cause can be any value', () => {
    expect(new CacheStoreError('msg', { code: '57P01' }).cause).toEqual({ code: '57P01' });
  });
});
