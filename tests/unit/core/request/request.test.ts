/**
 * Tests for compilation request construction.
 */
import { describe, it, expect } from 'vitest';
import { createCompilationRequest } from '../../../../src/core/request/request.js';
import { fileFragment, inlineFragment } from '../../../../src/core/fragments/types.js';
import { RequestError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('createCompilationRequest', () => {
  it('keeps fragments in input order', () => {
    const request = createCompilationRequest({
      theme: 'bartik',
      fragments: [
        ['f2', inlineFragment('b {}')],
        ['f1', fileFragment('a.scss')],
      ],
      requestedAt: 100,
    });

    expect([...request.fragments.keys()]).toEqual(['f2', 'f1']);
    expect(request.fragments.get('f1')).toEqual({ kind: 'file', payload: 'a.scss' });
    expect(request.requestedAt).toBe(100);
  });

  it('stamps the request with the clock when no time is given', () => {
    const request = createCompilationRequest({ theme: 'bartik', fragments: [] }, () => 4242);

    expect(request.requestedAt).toBe(4242);
  });

  it('accepts a Map as input', () => {
    const request = createCompilationRequest({
      theme: 'bartik',
      fragments: new Map([['f1', inlineFragment('a {}')]]),
      liveMode: true,
    });

    expect(request.fragments.size).toBe(1);
    expect(request.liveMode).toBe(true);
  });

  it('freezes the request', () => {
    const request = createCompilationRequest({ theme: 'bartik', fragments: [] });

    expect(Object.isFrozen(request)).toBe(true);
  });

  it('rejects duplicate identifiers', () => {
    expect(() =>
      createCompilationRequest({
        theme: 'bartik',
        fragments: [
          ['f1', inlineFragment('a {}')],
          ['f1', inlineFragment('b {}')],
        ],
      })
    ).toThrow('Duplicate fragment identifier "f1"');
  });

  it('rejects empty identifiers', () => {
    expect(() =>
      createCompilationRequest({ theme: 'bartik', fragments: [['', inlineFragment('a {}')]] })
    ).toThrow('Fragment identifiers must not be empty');
  });

  it('rejects file fragments without a path', () => {
    expect(() =>
      createCompilationRequest({ theme: 'bartik', fragments: [['f1', fileFragment('')]] })
    ).toThrow('Invalid fragment "f1": payload: File fragment path is empty');
  });

  it.each(['', '..', '.', 'a/b', 'bar tik'])('rejects theme %j', (theme) => {
    let caught: unknown;
    try {
      createCompilationRequest({ theme, fragments: [] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RequestError);
    expect(caught).toMatchObject({ code: ErrorCodes.INVALID_REQUEST });
  });

  it('accepts dotted and dashed theme names', () => {
    expect(createCompilationRequest({ theme: 'my_theme-2.0', fragments: [] }).theme).toBe('my_theme-2.0');
  });
});
