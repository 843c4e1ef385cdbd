import { z } from 'zod';
import { EXECUTION_POLICIES, GRADER_COMPLETION_UNITS, GRADER_DOCX_PENALTY, GRADER_SAMPLING } from '../config/modules.js';
import { DOCX_MIME } from '../lib/document-extractor.js';
import { documentAt, estimateTextTokens, textDocumentSchema } from './documents.js';
import { applyPenalty, formatGradingRun, parseGradingRun, summarizeRuns } from './grader-scoring.js';
import { NO_KEYWORDS, parseKeywordSelection, recommendJournals } from './journal-match.js';
import type { PlannedItem, ToolModule } from './types.js';

const payloadSchema = z.object({
  documents: z.array(textDocumentSchema).length(1, 'Upload exactly one manuscript'),
});

export type GraderPayload = z.infer<typeof payloadSchema>;

const itemSchema = z.object({ slot: z.number().int().positive() });
type GraderItem = z.infer<typeof itemSchema>;

const RESPONSE_TOKENS = 512;
const KEYWORD_EXCERPT_CHARS = 10_000;

const DEFAULT_PROMPTS = {
  grading_instructions: [
    'You assess academic manuscripts. Estimate, as integer percentages, the chance that the manuscript',
    'would be sent out for external review at journals of six prestige levels, Level 1 being the most selective',
    'and Level 6 the least. Percentages must not decrease from Level 1 to Level 6.',
    'Weigh methodological rigour, novelty, relevance, clarity and whether the conclusions follow from the results.',
    '',
    'Respond with a strict JSON object and nothing else:',
    '{"Level 1": <int>, "Level 2": <int>, "Level 3": <int>, "Level 4": <int>, "Level 5": <int>, "Level 6": <int>, "justification": "<one sentence>"}',
  ].join('\n'),
  keyword_selection: [
    'You analyze an academic manuscript to identify its primary and secondary research focuses.',
    'Choose from the following keywords only:',
    '{{KEYWORDS}}',
    '',
    'Output valid JSON with a single "main_keyword" (string) and up to three distinct items in',
    '"peripheral_keywords" (array). Peripheral keywords must differ from the main keyword.',
    'If none apply beyond the main topic, return an empty array for peripherals.',
  ].join('\n'),
};

const drawRun = (ordinal: number): PlannedItem<GraderItem> => ({ ordinal, label: `Run ${ordinal}`, input: { slot: ordinal } });

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * Scores a manuscript by sampling the model until twelve runs parse (at most
 * thirty attempts, at least eight valid), then picks topic keywords and
 * recommends journals whose bar the score clears.
 */
export const graderModule: ToolModule<GraderPayload, GraderItem> = {
  key: 'grader',
  label: 'Manuscript grader',
  unitLabel: 'manuscripts',
  payloadSchema,
  itemSchema,
  defaults: {
    models: { grading: 'claude-sonnet-4-20250514', keywords: 'claude-sonnet-4-20250514' },
    prompts: DEFAULT_PROMPTS,
  },
  rounds: [
    {
      round: 1,
      label: 'Scoring runs',
      policy: EXECUTION_POLICIES.grader.scoring,
      sampling: { ...GRADER_SAMPLING, draw: drawRun },
      plan: () => [drawRun(1)],
      async request(ctx) {
        const manuscript = documentAt(ctx.payload.documents, 0);
        return {
          model: ctx.settings.model('grading'),
          system: ctx.settings.prompt('grading_instructions'),
          messages: [{ role: 'user', text: `Manuscript to grade:\n\n${manuscript.text}` }],
          maxTokens: RESPONSE_TOKENS,
        };
      },
      parse: (text) => formatGradingRun(parseGradingRun(text)),
    },
    {
      round: 2,
      label: 'Keyword selection',
      policy: EXECUTION_POLICIES.grader.keywords,
      plan: (_payload, _completed, settings) =>
        settings.reference.topics.length > 0 ? [{ ordinal: 1, label: 'Keywords', input: { slot: 1 } }] : [],
      async request(ctx) {
        const manuscript = documentAt(ctx.payload.documents, 0);
        const keywords = ctx.settings.reference.topics
          .map(topic => topic.name.trim())
          .filter(name => name.length > 0)
          .join(', ');

        return {
          model: ctx.settings.model('keywords'),
          system: ctx.settings.prompt('keyword_selection').replaceAll('{{KEYWORDS}}', keywords),
          messages: [{
            role: 'user',
            text: `Manuscript (first ${KEYWORD_EXCERPT_CHARS} characters):\n\n${manuscript.text.slice(0, KEYWORD_EXCERPT_CHARS)}`,
          }],
          maxTokens: RESPONSE_TOKENS,
        };
      },
      parse: (text) => JSON.stringify(parseKeywordSelection(text)),
    },
  ],
  completionUnits: GRADER_COMPLETION_UNITS,
  projectedUnits: () => GRADER_COMPLETION_UNITS,
  estimateTokens: (payload) =>
    (GRADER_SAMPLING.target + 1) * (estimateTextTokens(documentAt(payload.documents, 0).text) + RESPONSE_TOKENS),
  async assemble(ctx, completed, rounds) {
    const manuscript = documentAt(ctx.payload.documents, 0);
    const runs = completed.filter(item => item.round === 1).map(item => parseGradingRun(item.text));
    let summary = summarizeRuns(runs);

    const docx = manuscript.mimeType === DOCX_MIME;
    if (docx) summary = applyPenalty(summary, GRADER_DOCX_PENALTY);

    const keywordItem = completed.find(item => item.round === 2);
    const keywords = keywordItem ? parseKeywordSelection(keywordItem.text) : NO_KEYWORDS;
    const { topics, journals } = ctx.settings.reference;
    const recommendations = recommendJournals(topics, journals, keywords, summary.iqmScore);

    ctx.log.info({ validRuns: summary.validRuns, recommendations: recommendations.length }, 'Grading assembled');

    return {
      artifacts: {},
      result: {
        iqmScore: round2(summary.iqmScore),
        perLevel: summary.perLevel.map(round2),
        validRuns: summary.validRuns,
        keptRuns: summary.keptRuns,
        attemptedRuns: rounds.find(tally => tally.round === 1)?.total ?? runs.length,
        justification: summary.justification,
        docxPenaltyApplied: docx,
        keywords: { main: keywords.main, peripherals: keywords.peripherals },
        recommendations: recommendations.map(r => ({ ...r, adjustedThreshold: round2(r.adjustedThreshold) })),
      },
    };
  },
};
