/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  SonarError,
  CompileError,
  ConfigError,
  MissingSourceFileError,
  NoBackendConfiguredError,
  DirectoryError,
  TempWriteError,
  OutputWriteError,
  CacheStoreError,
  ErrorCodes,
  toSonarError,
} from '../../../src/utils/errors.js';

describe('SonarError', () => {
  it('should carry code, message and details', () => {
    const error = new SonarError('C001', 'Compile failed', { key: 'k' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SonarError');
    expect(error.code).toBe('C001');
    expect(error.details).toEqual({ key: 'k' });
    expect(error.stack).toContain('SonarError');
  });

  it('should serialize to JSON', () => {
    expect(new ConfigError('S001', 'Bad config').toJSON()).toEqual({
      name: 'ConfigError',
      code: 'S001',
      message: 'Bad config',
      details: undefined,
    });
  });
});

describe('MissingSourceFileError', () => {
  it('should name the fragment and path', () => {
    const error = new MissingSourceFileError('header', '/themes/bartik/header.scss');

    expect(error.message).toBe('Stylesheet source not found: /themes/bartik/header.scss (fragment "header")');
    expect(error.code).toBe(ErrorCodes.MISSING_SOURCE_FILE);
    expect(error.fragmentId).toBe('header');
    expect(error.sourcePath).toBe('/themes/bartik/header.scss');
  });
});

describe('NoBackendConfiguredError', () => {
  it('should be a CompileError', () => {
    const error = new NoBackendConfiguredError();

    expect(error).toBeInstanceOf(CompileError);
    expect(error.code).toBe('C002');
    expect(error.details).toBeUndefined();
  });

  it('should mention the requested backend', () => {
    const error = new NoBackendConfiguredError('stylus');

    expect(error.message).toBe('No stylesheet compiler backend registered for "stylus"');
    expect(error.details).toEqual({ requested: 'stylus' });
  });
});

describe('output errors', () => {
  it.each([
    [new DirectoryError('x'), 'DirectoryError', 'W001'],
    [new TempWriteError('x'), 'TempWriteError', 'W002'],
    [new OutputWriteError('x'), 'OutputWriteError', 'W003'],
    [new CacheStoreError('x'), 'CacheStoreError', 'W004'],
  ])('%s should have its own name and code', (error, name, code) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error).toBeInstanceOf(SonarError);
  });
});

describe('toSonarError', () => {
  const wrap = (message: string) => new CompileError(ErrorCodes.COMPILE_FAILED, message);

  it('should keep SonarErrors unchanged', () => {
    const original = new DirectoryError('no dir');

    expect(toSonarError(original, wrap)).toBe(original);
  });

  it('should wrap plain errors', () => {
    const wrapped = toSonarError(new Error('boom'), wrap);

    expect(wrapped).toBeInstanceOf(CompileError);
    expect(wrapped.message).toBe('boom');
  });

  it('should wrap thrown non-errors', () => {
    expect(toSonarError('oops', wrap).message).toBe('oops');
  });
});

describe('ErrorCodes', () => {
  it('should be unique', () => {
    const codes = Object.values(ErrorCodes);

    expect(new Set(codes).size).toBe(codes.length);
  });
});
