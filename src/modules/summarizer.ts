import { z } from 'zod';
import { EXECUTION_POLICIES } from '../config/modules.js';
import {
  MAX_DOCUMENTS,
  documentAt,
  documentItemSchema,
  estimateTextTokens,
  padOrdinal,
  planDocuments,
  textDocumentSchema,
  type DocumentItem,
} from './documents.js';
import type { CompletedItem, RunContext, ToolModule } from './types.js';

const payloadSchema = z.object({
  documents: z.array(textDocumentSchema).min(1).max(MAX_DOCUMENTS),
  documentKind: z.enum(['research', 'general']).default('general'),
  translateTo: z.string().trim().min(1).nullable().default(null),
});

export type SummarizerPayload = z.infer<typeof payloadSchema>;

const SUMMARY_BUDGET_TOKENS = 1024;

const DEFAULT_PROMPTS = {
  research_summary: [
    'You summarize research articles for busy readers.',
    'Write a structured summary with the headings Background, Methods, Findings and Implications.',
    'Keep numbers, sample sizes and effect sizes exactly as reported. Do not add information that is not in the article.',
  ].join('\n'),
  general_summary: [
    'You summarize documents for busy readers.',
    'Write a concise summary of the main points in plain prose, followed by a short list of key takeaways.',
    'Do not add information that is not in the document.',
  ].join('\n'),
  translation: [
    'Translate the text below into {{LANGUAGE}}.',
    'Preserve headings, lists and numbers. Return only the translation.',
  ].join('\n'),
};

function summaryOf(completed: CompletedItem<DocumentItem>[], ordinal: number): CompletedItem<DocumentItem> {
  const summary = completed.find(item => item.round === 1 && item.ordinal === ordinal);
  if (!summary) throw new Error(`No summary for document ${ordinal}`);
  return summary;
}

async function writeCombined(
  ctx: RunContext<SummarizerPayload>,
  fileName: string,
  items: CompletedItem<DocumentItem>[],
): Promise<string> {
  const path = await ctx.storage.writeText(ctx.moduleKey, ctx.jobId, fileName, '');
  for (const item of [...items].sort((a, b) => a.ordinal - b.ordinal)) {
    await ctx.storage.appendSection(path, `## ${item.ordinal}. ${item.label}`, item.text);
  }
  return path;
}

export const summarizerModule: ToolModule<SummarizerPayload, DocumentItem> = {
  key: 'summarizer',
  label: 'Document summarizer',
  unitLabel: 'documents',
  payloadSchema,
  itemSchema: documentItemSchema,
  defaults: {
    models: {
      summary: 'claude-sonnet-4-20250514',
      translation: 'claude-sonnet-4-20250514',
    },
    prompts: DEFAULT_PROMPTS,
  },
  rounds: [
    {
      round: 1,
      label: 'Summaries',
      policy: EXECUTION_POLICIES.summarizer.summaries,
      plan: (payload) => planDocuments(payload.documents),
      async request(ctx, item) {
        const doc = documentAt(ctx.payload.documents, item.input.document);
        const promptKey = ctx.payload.documentKind === 'research' ? 'research_summary' : 'general_summary';
        return {
          model: ctx.settings.model('summary'),
          system: ctx.settings.prompt(promptKey),
          messages: [{ role: 'user', text: `Document: ${doc.fileName}\n\n${doc.text}` }],
          maxTokens: SUMMARY_BUDGET_TOKENS * 4,
        };
      },
      outputFile: (item) => `summary_${padOrdinal(item.ordinal)}.txt`,
    },
    {
      round: 2,
      label: 'Translations',
      policy: EXECUTION_POLICIES.summarizer.translations,
      plan(payload, completed) {
        if (!payload.translateTo) return [];
        return completed
          .filter(item => item.round === 1)
          .sort((a, b) => a.ordinal - b.ordinal)
          .map(item => ({ ordinal: item.ordinal, label: item.label, input: item.input }));
      },
      async request(ctx, item, completed) {
        const language = ctx.payload.translateTo ?? 'English';
        return {
          model: ctx.settings.model('translation'),
          system: ctx.settings.prompt('translation').replaceAll('{{LANGUAGE}}', language),
          messages: [{ role: 'user', text: summaryOf(completed, item.ordinal).text }],
          maxTokens: SUMMARY_BUDGET_TOKENS * 4,
        };
      },
      outputFile: (item) => `translation_${padOrdinal(item.ordinal)}.txt`,
    },
  ],
  projectedUnits: (payload) => payload.documents.length,
  estimateTokens(payload) {
    const summaries = payload.documents.reduce(
      (sum, doc) => sum + estimateTextTokens(doc.text) + SUMMARY_BUDGET_TOKENS,
      0,
    );
    const translations = payload.translateTo ? payload.documents.length * SUMMARY_BUDGET_TOKENS * 2 : 0;
    return summaries + translations;
  },
  async assemble(ctx, completed) {
    const artifacts: Record<string, string> = {
      'combined_summary.txt': await writeCombined(ctx, 'combined_summary.txt', completed.filter(i => i.round === 1)),
    };

    const translations = completed.filter(i => i.round === 2);
    if (translations.length > 0) {
      artifacts['combined_translation.txt'] = await writeCombined(ctx, 'combined_translation.txt', translations);
    }

    return { artifacts };
  },
};
