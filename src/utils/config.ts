// Configuration loading and management

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Config, MatchMode } from '../types.js';
import type { SpellCheckerOptions } from '../core/spell-checker.js';
import { DEFAULT_ALPHABET } from '../core/candidates.js';
import { logWarn, errorMessage } from './log.js';

export const DEFAULT_CONFIG: Config = {
  corpus: [],
  encoding: 'utf-8',
  alphabet: DEFAULT_ALPHABET,
  omitFinalLetter: false,
  matchMode: 'substring',
  maxWordLength: 32,
  suggestionLimit: 5,
};

/** All valid top-level Config field names. */
export const KNOWN_KEYS = new Set<string>(Object.keys(DEFAULT_CONFIG));

const NUMERIC_RANGES = {
  maxWordLength: [1, 256],
  suggestionLimit: [1, 100],
} as const;

const MATCH_MODES: readonly MatchMode[] = ['substring', 'word'];

function isMatchMode(value: unknown): value is MatchMode {
  return MATCH_MODES.some(mode => mode === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/** Lowercase a-z letters, each at most once. */
export function isValidAlphabet(value: unknown): value is string {
  return typeof value === 'string' && /^[a-z]+$/.test(value) && new Set(value).size === value.length;
}

function checkRange(key: keyof typeof NUMERIC_RANGES, value: unknown, warnings: string[]): number | undefined {
  const [min, max] = NUMERIC_RANGES[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    warnings.push(`Config key "${key}" should be an integer, using default`);
    return undefined;
  }
  if (value < min || value > max) {
    warnings.push(`Config key "${key}" value ${value} is out of range [${min}, ${max}], using default`);
    return undefined;
  }
  return value;
}

export function validateConfig(raw: Record<string, unknown>): { config: Partial<Config>; warnings: string[] } {
  const warnings: string[] = [];
  const config: Partial<Config> = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'corpus':
        if (isStringArray(value)) config.corpus = value;
        else warnings.push('Config key "corpus" should be an array of strings, using default');
        break;
      case 'encoding':
        if (typeof value === 'string' && Buffer.isEncoding(value)) config.encoding = value;
        else warnings.push(`Config key "encoding" is not a supported encoding, using default`);
        break;
      case 'alphabet':
        if (isValidAlphabet(value)) config.alphabet = value;
        else warnings.push('Config key "alphabet" should be distinct lowercase letters a-z, using default');
        break;
      case 'omitFinalLetter':
        if (typeof value === 'boolean') config.omitFinalLetter = value;
        else warnings.push('Config key "omitFinalLetter" should be a boolean, using default');
        break;
      case 'matchMode':
        if (isMatchMode(value)) config.matchMode = value;
        else warnings.push(`Config key "matchMode" should be one of ${MATCH_MODES.join(', ')}, using default`);
        break;
      case 'maxWordLength':
      case 'suggestionLimit': {
        const checked = checkRange(key, value, warnings);
        if (checked !== undefined) config[key] = checked;
        break;
      }
      default:
        warnings.push(`Unknown config key "${key}", ignoring`);
    }
  }

  return { config, warnings };
}

/** Maps environment variable names to the Config field they override. */
export const ENV_OVERRIDES: Record<string, keyof Config> = {
  SPELL_CORPUS: 'corpus',
  SPELL_MATCH_MODE: 'matchMode',
  SPELL_ALPHABET: 'alphabet',
};

export function applyEnvOverrides(config: Config): Config {
  const result = { ...config };

  const corpus = process.env.SPELL_CORPUS;
  if (corpus) {
    result.corpus = corpus.split(',').map(s => s.trim()).filter(s => s.length > 0);
  }

  const matchMode = process.env.SPELL_MATCH_MODE;
  if (matchMode) {
    if (isMatchMode(matchMode)) result.matchMode = matchMode;
    else logWarn('config', `Ignoring SPELL_MATCH_MODE="${matchMode}"`);
  }

  const alphabet = process.env.SPELL_ALPHABET;
  if (alphabet) {
    if (isValidAlphabet(alphabet)) result.alphabet = alphabet;
    else logWarn('config', `Ignoring SPELL_ALPHABET="${alphabet}"`);
  }

  return result;
}

/** Parse a command-line value for a config key and validate it. Throws on bad input. */
export function parseConfigValue(key: string, value: string): Partial<Config> {
  if (!KNOWN_KEYS.has(key)) {
    throw new Error(`Unknown config key: ${key}`);
  }

  let parsed: unknown = value;
  if (key === 'corpus') {
    parsed = value.startsWith('[') ? parseJson(value) : value.split(',').map(s => s.trim()).filter(Boolean);
  } else if (key === 'omitFinalLetter') {
    if (!['true', 'false', '1', '0'].includes(value)) {
      throw new Error(`Invalid boolean: ${value} (use true/false/1/0)`);
    }
    parsed = value === 'true' || value === '1';
  } else if (key in NUMERIC_RANGES) {
    parsed = Number(value);
  }

  const { config, warnings } = validateConfig({ [key]: parsed });
  if (warnings.length > 0) throw new Error(warnings[0]);
  return config;
}

function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new Error(`Invalid JSON: ${errorMessage(err)}`);
  }
}

export function toCheckerOptions(config: Config): SpellCheckerOptions {
  return {
    alphabet: config.alphabet,
    omitFinalLetter: config.omitFinalLetter,
    matchMode: config.matchMode,
    maxWordLength: config.maxWordLength,
  };
}

export function getConfigDir(): string {
  return process.env.SPELL_CONFIG_DIR || join(homedir(), '.corpus-spell');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

let corpusOverride: string[] | undefined;

export function setCorpusOverride(sources: string[] | undefined): void {
  corpusOverride = sources && sources.length > 0 ? sources : undefined;
}

export function loadConfig(): Config {
  ensureConfigDir();
  const path = getConfigPath();

  let config: Config;
  if (!existsSync(path)) {
    saveConfig(DEFAULT_CONFIG);
    config = { ...DEFAULT_CONFIG };
  } else {
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('expected a JSON object');
      }
      const { config: validated, warnings } = validateConfig({ ...parsed });
      for (const w of warnings) {
        logWarn('config', w);
      }
      config = { ...DEFAULT_CONFIG, ...validated };
    } catch (err) {
      logWarn('config', `Could not read ${path}, using defaults`, { error: errorMessage(err) });
      config = { ...DEFAULT_CONFIG };
    }
  }

  config = applyEnvOverrides(config);

  if (corpusOverride) {
    config = { ...config, corpus: corpusOverride };
  }

  return config;
}

export function saveConfig(config: Config): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2));
}
