import { describe, it, expect } from 'vitest';
import {
  CtxpickError,
  DiscoveryError,
  NoFilesSelectedError,
  OutputError,
  ReadError,
  SelectionCancelledError,
  describeError,
  isQuietExit,
} from '../../../src/lib/errors.js';

describe('errors', () => {
  it('carries a code and the subclass name', () => {
    const error = new DiscoveryError('/work', 'Path does not exist');
    expect(error).toBeInstanceOf(CtxpickError);
    expect(error.code).toBe('DISCOVERY_FAILED');
    expect(error.name).toBe('DiscoveryError');
    expect(error.message).toBe('Path does not exist: /work');
    expect(error.path).toBe('/work');
  });

  it('folds the cause into read and output messages', () => {
    const cause = new Error('EACCES');
    expect(new ReadError('a.ts', cause).message).toBe('Failed to read a.ts: EACCES');
    expect(new OutputError('Failed to copy to clipboard', cause).message).toBe('Failed to copy to clipboard: EACCES');
    expect(new OutputError('Failed to write to console').message).toBe('Failed to write to console');
  });

  it('treats cancellation and empty selection as quiet exits', () => {
    expect(isQuietExit(new SelectionCancelledError())).toBe(true);
    expect(isQuietExit(new NoFilesSelectedError())).toBe(true);
    expect(isQuietExit(new OutputError('nope'))).toBe(false);
    expect(isQuietExit(new Error('x'))).toBe(false);
  });

  it('uses default reasons', () => {
    expect(new SelectionCancelledError().message).toBe('selection cancelled');
    expect(new NoFilesSelectedError().message).toBe('no files selected');
  });

  it('describes non-Error values', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(new Error('boxed'))).toBe('boxed');
  });
});
