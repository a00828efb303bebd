import { describe, it, expect, vi, afterEach, beforeEach, type MockInstance } from 'vitest';
import { logDebug, logInfo, logWarn, logError, errorMessage } from './log.js';
import { CorpusLoadError } from './errors.js';

describe('errorMessage', () => {
  it('extracts message from Error instance', () => {
    expect(errorMessage(new Error('test'))).toBe('test');
  });

  it('appends the cause message when present', () => {
    const err = new CorpusLoadError('words.txt', new Error('ENOENT'));
    expect(errorMessage(err)).toBe('Could not load corpus from words.txt: ENOENT');
  });

  it('converts non-Error to string', () => {
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage('oops')).toBe('oops');
    expect(errorMessage(null)).toBe('null');
  });
});

describe('log functions', () => {
  let writeSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    writeSpy.mockRestore();
  });

  function firstLine(): string {
    return String(writeSpy.mock.calls[0][0]);
  }

  it('logDebug writes to stderr at debug level', () => {
    vi.stubEnv('SPELL_LOG_LEVEL', 'debug');
    logDebug('model', 'hello');
    expect(writeSpy).toHaveBeenCalledOnce();
    expect(firstLine()).toMatch(/^\[[^\]]+\] \[DEBUG\] \[model\] hello\n$/);
  });

  it('logDebug is suppressed at the default info level', () => {
    vi.stubEnv('SPELL_LOG_LEVEL', '');
    logDebug('model', 'hello');
    logInfo('model', 'built');
    expect(writeSpy).toHaveBeenCalledOnce();
    expect(firstLine()).toContain('[INFO] [model] built');
  });

  it('ignores an unrecognised level and falls back to info', () => {
    vi.stubEnv('SPELL_LOG_LEVEL', 'verbose');
    logDebug('a', 'b');
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('logError writes at error level', () => {
    vi.stubEnv('SPELL_LOG_LEVEL', 'error');
    logWarn('ctx', 'ignored');
    logError('ctx', 'failed');
    expect(writeSpy).toHaveBeenCalledOnce();
    expect(firstLine()).toContain('[ERROR] [ctx] failed');
  });

  it('silent level suppresses everything', () => {
    vi.stubEnv('SPELL_LOG_LEVEL', 'silent');
    logDebug('a', 'b');
    logInfo('a', 'b');
    logWarn('a', 'b');
    logError('a', 'b');
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('includes extra data as JSON', () => {
    vi.stubEnv('SPELL_LOG_LEVEL', 'debug');
    logWarn('corpus', 'empty file', { file: 'a.txt', words: 0 });
    expect(firstLine()).toContain('empty file {"file":"a.txt","words":0}');
  });
});
