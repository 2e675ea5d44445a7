import { SearchResult } from './types';

type RelevanceText = Pick<SearchResult, 'title' | 'snippet' | 'link'>;

const resultText = (result: RelevanceText): string => `${result.title} ${result.snippet} ${result.link}`.toLowerCase();

export const keywordMatch = (result: RelevanceText, keywords: string[]): boolean => {
  if (keywords.length === 0) return true;
  const text = resultText(result);
  return keywords.some((keyword) => text.includes(keyword.toLowerCase()));
};

// Plain containment: intent phrases are multi-word, so no word boundaries.
export const intentMatch = (text: string, phrases: string[]): boolean => {
  const lowered = text.toLowerCase();
  return phrases.some((phrase) => lowered.includes(phrase.toLowerCase()));
};

export const strictFilter = <T extends SearchResult>(results: T[], keywords: string[], intentPhrases: string[]): T[] =>
  results.filter((result) => {
    if (result.origin === 'places') return true;
    return keywordMatch(result, keywords) || intentMatch(`${result.title} ${result.snippet}`, intentPhrases);
  });
