import type { CorpusStats, SpellCheckItem } from '../types.js';

export type CheckFormat = 'human' | 'json' | 'csv' | 'markdown';

export const CHECK_FORMATS: readonly CheckFormat[] = ['human', 'json', 'csv', 'markdown'];

export function isCheckFormat(value: string): value is CheckFormat {
  return CHECK_FORMATS.some(format => format === value);
}

function limited(item: SpellCheckItem, limit?: number): readonly string[] {
  return limit === undefined ? item.suggestedAlternatives : item.suggestedAlternatives.slice(0, limit);
}

export function formatCheckJson(items: readonly SpellCheckItem[], limit?: number): string {
  const results = items.map(item => ({
    suspectedWord: item.suspectedWord,
    suggestedAlternatives: limited(item, limit),
  }));
  return JSON.stringify({ results }, null, 2);
}

export function formatCheckCsv(items: readonly SpellCheckItem[], limit?: number): string {
  const header = 'suspectedWord,suggestedAlternatives';
  const rows = items.map(item => `${item.suspectedWord},"${limited(item, limit).join(' ')}"`);
  return [header, ...rows].join('\n');
}

export function formatCheckMarkdown(items: readonly SpellCheckItem[], limit?: number): string {
  const header = '| # | Word | Suggestions |\n|---|------|-------------|';
  const rows = items.map((item, i) => {
    const suggestions = limited(item, limit);
    return `| ${i + 1} | ${item.suspectedWord} | ${suggestions.length > 0 ? suggestions.join(', ') : '-'} |`;
  });
  return [header, ...rows].join('\n');
}

export function formatStatsJson(stats: CorpusStats, files: string[]): string {
  return JSON.stringify({ files, ...stats }, null, 2);
}
