import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdirSync, readFileSync, rmSync } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import clipboardy from 'clipboardy';
import { describeTarget, preview, resolveOutputTarget, writeOutput } from '../../../src/output/writer.js';
import { OutputError } from '../../../src/lib/errors.js';

vi.mock('clipboardy', () => ({ default: { write: vi.fn() } }));

function fakeStdout() {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
  };
}

const TEST_DIR = join(tmpdir(), 'ctxpick-writer-test-' + Date.now());

describe('resolveOutputTarget', () => {
  it('prefers the clipboard over a file', () => {
    expect(resolveOutputTarget('out.txt', true)).toEqual({ kind: 'clipboard' });
  });

  it('falls back to the console', () => {
    expect(resolveOutputTarget()).toEqual({ kind: 'console' });
    expect(resolveOutputTarget('out.txt')).toEqual({ kind: 'file', path: 'out.txt' });
  });
});

describe('preview', () => {
  it('cuts at the limit and marks the cut', () => {
    expect(preview('abcdef', 3)).toBe('abc...');
    expect(preview('abc', 3)).toBe('abc');
  });

  it('does not split surrogate pairs', () => {
    expect(preview('😀😀😀', 2)).toBe('😀😀...');
  });
});

describe('describeTarget', () => {
  it('names each sink', () => {
    expect(describeTarget({ kind: 'console' })).toBe('console');
    expect(describeTarget({ kind: 'clipboard' })).toBe('clipboard');
    expect(describeTarget({ kind: 'file', path: 'out.txt' })).toBe(resolve('out.txt'));
  });
});

describe('writeOutput', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.mocked(clipboardy.write).mockReset();
  });

  it('writes the content to a file', async () => {
    mkdirSync(TEST_DIR, { recursive: true });
    const path = join(TEST_DIR, 'context.txt');

    await writeOutput('hello', { kind: 'file', path });

    expect(readFileSync(path, 'utf-8')).toBe('hello');
  });

  it('wraps file failures in OutputError', async () => {
    const path = join(TEST_DIR, 'missing-dir', 'context.txt');
    await expect(writeOutput('hello', { kind: 'file', path })).rejects.toThrow(OutputError);
  });

  it('prints to the console with a trailing newline', async () => {
    const stdout = fakeStdout();
    await writeOutput('hello', { kind: 'console' }, stdout);
    expect(stdout.chunks).toEqual(['hello\n']);
  });

  it('copies to the clipboard and prints a preview', async () => {
    vi.mocked(clipboardy.write).mockResolvedValue(undefined);
    const stdout = fakeStdout();
    const content = 'x'.repeat(250);

    await writeOutput(content, { kind: 'clipboard' }, stdout);

    expect(clipboardy.write).toHaveBeenCalledWith(content);
    expect(stdout.chunks).toEqual([
      `\n📋 Content copied to clipboard!\n\nPreview of copied content:\n\n${'x'.repeat(200)}...\n`,
    ]);
  });

  it('wraps clipboard failures in OutputError', async () => {
    vi.mocked(clipboardy.write).mockRejectedValue(new Error('no display'));
    const stdout = fakeStdout();

    await expect(writeOutput('hello', { kind: 'clipboard' }, stdout))
      .rejects.toThrow('Failed to copy to clipboard: no display');
    expect(stdout.chunks).toEqual([]);
  });
});
