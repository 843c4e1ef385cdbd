import { ParseError } from '../lib/errors.js';
import { extractJsonObject } from '../lib/llm-client.js';
import type { JournalEntry, JournalTopic } from '../services/reference-data/index.js';

export const MAX_RECOMMENDATIONS = 12;

// Minimum match score and the factor applied to a journal's low bound. Below 3 the journal is not a fit.
const MATCH_SCORE_RULES: readonly (readonly [number, number])[] = [
  [6, 0.9],
  [5, 0.95],
  [4, 1],
  [3, 1.05],
];

const MAIN_KEYWORD_WEIGHT = 2;
const PERIPHERAL_KEYWORD_WEIGHT = 1;

export interface KeywordSelection {
  main: string | null;
  peripherals: string[];
}

export const NO_KEYWORDS: KeywordSelection = { main: null, peripherals: [] };

export interface JournalRecommendation {
  journalId: string;
  journalName: string;
  referenceMark: string | null;
  lowBound: number;
  adjustedThreshold: number;
  matchScore: number;
}

/**
 * Reads `{"main_keyword": ..., "peripheral_keywords": [...]}`. Peripherals are
 * trimmed and deduplicated ignoring case, and never repeat the main keyword.
 */
export function parseKeywordSelection(text: string): KeywordSelection {
  const json = extractJsonObject(text);
  const rawMain = json.main_keyword;
  const rawPeripherals = json.peripheral_keywords ?? [];

  let main: string | null = null;
  if (typeof rawMain === 'string') {
    main = rawMain.trim() || null;
  } else if (rawMain !== undefined && rawMain !== null) {
    throw new ParseError('main_keyword must be a string');
  }
  if (!Array.isArray(rawPeripherals)) {
    throw new ParseError('peripheral_keywords must be an array');
  }

  const seen = new Set(main ? [main.toLowerCase()] : []);
  const peripherals: string[] = [];

  for (const value of rawPeripherals) {
    if (typeof value !== 'string') continue;
    const keyword = value.trim();
    if (!keyword || seen.has(keyword.toLowerCase())) continue;
    seen.add(keyword.toLowerCase());
    peripherals.push(keyword);
  }

  return { main, peripherals };
}

export function adjustedThreshold(lowBound: number, matchScore: number): number | null {
  const rule = MATCH_SCORE_RULES.find(([minimum]) => matchScore >= minimum);
  return rule ? lowBound * rule[1] : null;
}

/**
 * Journals whose topic fit lowers (or only slightly raises) their bar enough
 * for `overallScore` to clear it. Each journal topic score (1 or 2) is
 * weighted 2 when it is the main keyword's topic and 1 for a peripheral one.
 * Returns at most the twelve with the highest adjusted thresholds, lowest first.
 */
export function recommendJournals(
  topics: readonly JournalTopic[],
  journals: readonly JournalEntry[],
  keywords: KeywordSelection,
  overallScore: number,
): JournalRecommendation[] {
  const known = new Map(topics.map(topic => [topic.name.toLowerCase(), topic.name]));
  const weights = new Map<string, number>();

  if (keywords.main && known.has(keywords.main.toLowerCase())) {
    weights.set(keywords.main.toLowerCase(), MAIN_KEYWORD_WEIGHT);
  }
  for (const keyword of keywords.peripherals) {
    const key = keyword.toLowerCase();
    if (known.has(key) && !weights.has(key)) weights.set(key, PERIPHERAL_KEYWORD_WEIGHT);
  }

  const matches: JournalRecommendation[] = [];
  for (const journal of journals) {
    const matchScore = Object.entries(journal.topicScores)
      .reduce((sum, [topic, score]) => sum + (weights.get(topic.toLowerCase()) ?? 0) * score, 0);

    const threshold = adjustedThreshold(journal.lowBound, matchScore);
    if (threshold === null || overallScore < threshold) continue;

    matches.push({
      journalId: journal.id,
      journalName: journal.name,
      referenceMark: journal.referenceMark,
      lowBound: journal.lowBound,
      adjustedThreshold: threshold,
      matchScore,
    });
  }

  matches.sort((a, b) => a.adjustedThreshold - b.adjustedThreshold);
  return matches.slice(-MAX_RECOMMENDATIONS);
}
