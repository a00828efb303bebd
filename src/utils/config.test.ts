import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  ENV_OVERRIDES,
  KNOWN_KEYS,
  loadConfig,
  parseConfigValue,
  setCorpusOverride,
  toCheckerOptions,
  validateConfig,
} from './config.js';
import type { Config } from '../types.js';

function baseConfig(): Config {
  return { ...DEFAULT_CONFIG, corpus: ['big.txt'] };
}

describe('applyEnvOverrides', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns config unchanged when no env vars are set', () => {
    vi.stubEnv('SPELL_CORPUS', '');
    vi.stubEnv('SPELL_MATCH_MODE', '');
    vi.stubEnv('SPELL_ALPHABET', '');
    const config = baseConfig();
    expect(applyEnvOverrides(config)).toEqual(config);
  });

  it('splits SPELL_CORPUS on commas', () => {
    vi.stubEnv('SPELL_CORPUS', 'a.txt, books/*.txt ,');
    expect(applyEnvOverrides(baseConfig()).corpus).toEqual(['a.txt', 'books/*.txt']);
  });

  it('overrides matchMode from SPELL_MATCH_MODE', () => {
    vi.stubEnv('SPELL_MATCH_MODE', 'word');
    expect(applyEnvOverrides(baseConfig()).matchMode).toBe('word');
  });

  it('ignores invalid SPELL_MATCH_MODE and SPELL_ALPHABET values', () => {
    vi.stubEnv('SPELL_MATCH_MODE', 'fuzzy');
    vi.stubEnv('SPELL_ALPHABET', 'ABC');
    const result = applyEnvOverrides(baseConfig());
    expect(result.matchMode).toBe('substring');
    expect(result.alphabet).toBe(DEFAULT_CONFIG.alphabet);
  });

  it('does not mutate the original config object', () => {
    vi.stubEnv('SPELL_CORPUS', 'other.txt');
    const config = baseConfig();
    applyEnvOverrides(config);
    expect(config.corpus).toEqual(['big.txt']);
  });
});

describe('ENV_OVERRIDES', () => {
  it('maps env var names to config fields', () => {
    expect(ENV_OVERRIDES).toEqual({
      SPELL_CORPUS: 'corpus',
      SPELL_MATCH_MODE: 'matchMode',
      SPELL_ALPHABET: 'alphabet',
    });
  });
});

describe('validateConfig', () => {
  it('passes through valid config with no warnings', () => {
    const raw = {
      corpus: ['a.txt'],
      encoding: 'latin1',
      alphabet: 'abc',
      omitFinalLetter: true,
      matchMode: 'word',
      maxWordLength: 20,
      suggestionLimit: 3,
    };
    const { config, warnings } = validateConfig(raw);
    expect(warnings).toHaveLength(0);
    expect(config).toEqual(raw);
  });

  it('warns on unknown keys and removes them', () => {
    const { config, warnings } = validateConfig({ corpus: [], bogusKey: 'hello' });
    expect(warnings).toEqual(['Unknown config key "bogusKey", ignoring']);
    expect(config).toEqual({ corpus: [] });
  });

  it('rejects mistyped values', () => {
    const { config, warnings } = validateConfig({
      corpus: 'a.txt',
      omitFinalLetter: 'yes',
      matchMode: 'fuzzy',
      encoding: 'klingon',
    });
    expect(config).toEqual({});
    expect(warnings).toHaveLength(4);
  });

  it('rejects alphabets with repeats or non a-z letters', () => {
    expect(validateConfig({ alphabet: 'abca' }).warnings).toHaveLength(1);
    expect(validateConfig({ alphabet: 'abé' }).warnings).toHaveLength(1);
  });

  it('rejects out-of-range and fractional numbers', () => {
    const { config, warnings } = validateConfig({ maxWordLength: 0, suggestionLimit: 2.5 });
    expect(config).toEqual({});
    expect(warnings).toEqual([
      'Config key "maxWordLength" value 0 is out of range [1, 256], using default',
      'Config key "suggestionLimit" should be an integer, using default',
    ]);
  });

  it('knows every default key', () => {
    expect([...KNOWN_KEYS].sort()).toEqual(Object.keys(DEFAULT_CONFIG).sort());
  });
});

describe('parseConfigValue', () => {
  it('parses numbers', () => {
    expect(parseConfigValue('suggestionLimit', '10')).toEqual({ suggestionLimit: 10 });
  });

  it('parses booleans', () => {
    expect(parseConfigValue('omitFinalLetter', '1')).toEqual({ omitFinalLetter: true });
    expect(() => parseConfigValue('omitFinalLetter', 'maybe')).toThrow('Invalid boolean: maybe');
  });

  it('parses corpus lists from commas or JSON', () => {
    expect(parseConfigValue('corpus', 'a.txt,b.txt')).toEqual({ corpus: ['a.txt', 'b.txt'] });
    expect(parseConfigValue('corpus', '["c.txt"]')).toEqual({ corpus: ['c.txt'] });
  });

  it('rejects unknown keys and invalid values', () => {
    expect(() => parseConfigValue('colour', 'red')).toThrow('Unknown config key: colour');
    expect(() => parseConfigValue('matchMode', 'fuzzy')).toThrow('Config key "matchMode"');
    expect(() => parseConfigValue('maxWordLength', '999')).toThrow('out of range');
  });
});

describe('toCheckerOptions', () => {
  it('passes the model settings through', () => {
    expect(toCheckerOptions({ ...baseConfig(), matchMode: 'word', maxWordLength: 12 })).toEqual({
      alphabet: DEFAULT_CONFIG.alphabet,
      omitFinalLetter: false,
      matchMode: 'word',
      maxWordLength: 12,
    });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'corpus-spell-config-'));
    vi.stubEnv('SPELL_CONFIG_DIR', dir);
    vi.stubEnv('SPELL_CORPUS', '');
    vi.stubEnv('SPELL_MATCH_MODE', '');
    vi.stubEnv('SPELL_ALPHABET', '');
  });

  afterEach(() => {
    setCorpusOverride(undefined);
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes defaults on first load', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    const path = join(dir, 'config.json');
    expect(existsSync(path)).toBe(true);
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(DEFAULT_CONFIG);
  });

  it('merges a saved config over the defaults', () => {
    writeFileSync(join(dir, 'config.json'), JSON.stringify({ corpus: ['x.txt'], suggestionLimit: 9, extra: 1 }));
    const config = loadConfig();
    expect(config.corpus).toEqual(['x.txt']);
    expect(config.suggestionLimit).toBe(9);
    expect(config.matchMode).toBe('substring');
  });

  it('falls back to defaults when the file is not a JSON object', () => {
    writeFileSync(join(dir, 'config.json'), '[1, 2]');
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('applies the command-line corpus override last', () => {
    vi.stubEnv('SPELL_CORPUS', 'env.txt');
    setCorpusOverride(['cli.txt']);
    expect(loadConfig().corpus).toEqual(['cli.txt']);
  });
});
