import { z } from 'zod';
import { EXECUTION_POLICIES, REVIEWER_SLOTS } from '../config/modules.js';
import type { FileAttachment } from '../lib/llm-client.js';
import { documentAt, estimateTextTokens, sourceDocumentSchema } from './documents.js';
import type { AssembledOutput, CompletedItem, PlannedItem, RunContext, ToolModule } from './types.js';

const LANGUAGES = { en: 'English', zh: 'Chinese' } as const;

const payloadSchema = z.object({
  documents: z
    .array(sourceDocumentSchema.refine(doc => doc.mimeType === 'application/pdf', { message: 'The reviewer accepts PDF manuscripts only' }))
    .length(1, 'Upload exactly one manuscript'),
  language: z.enum(['en', 'zh']).default('en'),
});

export type ReviewerPayload = z.infer<typeof payloadSchema>;

const itemSchema = z.object({
  slot: z.number().int().nonnegative(),
  model: z.string().min(1),
});
type ReviewerItem = z.infer<typeof itemSchema>;

const REVIEW_TOKENS = 8192;
// Rough size of a manuscript PDF once the provider has rendered it.
const PDF_OVERHEAD_TOKENS = 20_000;

const DEFAULT_PROMPTS = {
  round1: [
    'You are an experienced peer reviewer. Read the attached manuscript and write a review in {{LANGUAGE}}.',
    'Cover: summary of the contribution, major concerns, minor concerns, and a recommendation',
    '(accept, minor revision, major revision or reject). Use Markdown headings.',
  ].join('\n'),
  round2: [
    'You are the handling editor. Below are independent reviews of the attached manuscript.',
    'Write a meta-review in {{LANGUAGE}} that reconciles them: points of agreement, points of disagreement',
    'and your own judgement, the most important requested changes, and an overall recommendation.',
  ].join('\n'),
  round3: [
    'Check the meta-review below against the attached manuscript. Flag any claim about the manuscript that',
    'the manuscript does not support, correct it, and produce the final report in {{LANGUAGE}} in Markdown.',
  ].join('\n'),
};

const defaultModels: Record<string, string> = {
  round2: 'claude-sonnet-4-20250514',
  round3: 'claude-sonnet-4-20250514',
};
for (let slot = 1; slot <= REVIEWER_SLOTS; slot++) {
  defaultModels[`round1_model_${slot}`] = 'claude-sonnet-4-20250514';
}

async function manuscript(ctx: RunContext<ReviewerPayload>): Promise<FileAttachment> {
  const doc = documentAt(ctx.payload.documents, 0);
  return { kind: 'pdf', filename: doc.fileName, data: await ctx.storage.read(doc.sourcePath) };
}

function promptFor(ctx: RunContext<ReviewerPayload>, key: keyof typeof DEFAULT_PROMPTS): string {
  return ctx.settings.prompt(key).replaceAll('{{LANGUAGE}}', LANGUAGES[ctx.payload.language]);
}

function inRound(completed: CompletedItem<ReviewerItem>[], round: number): CompletedItem<ReviewerItem>[] {
  return completed.filter(item => item.round === round).sort((a, b) => a.ordinal - b.ordinal);
}

export const reviewerModule: ToolModule<ReviewerPayload, ReviewerItem> = {
  key: 'reviewer',
  label: 'Peer reviewer',
  unitLabel: 'manuscripts',
  payloadSchema,
  itemSchema,
  defaults: { models: defaultModels, prompts: DEFAULT_PROMPTS },
  rounds: [
    {
      round: 1,
      label: 'Reviews',
      policy: EXECUTION_POLICIES.reviewer.reviews,
      plan(_payload, _completed, settings): PlannedItem<ReviewerItem>[] {
        return Array.from({ length: REVIEWER_SLOTS }, (_, i) => {
          const model = settings.model(`round1_model_${i + 1}`);
          return { ordinal: i + 1, label: `Reviewer ${i + 1} (${model})`, input: { slot: i + 1, model } };
        });
      },
      async request(ctx, item) {
        return {
          model: item.input.model,
          system: promptFor(ctx, 'round1'),
          messages: [{ role: 'user', text: 'Please review the attached manuscript.' }],
          attachments: [await manuscript(ctx)],
          maxTokens: REVIEW_TOKENS,
        };
      },
      outputFile: (item) => `round1_review_${item.ordinal}.md`,
    },
    {
      round: 2,
      label: 'Meta-review',
      policy: EXECUTION_POLICIES.reviewer.metaReview,
      plan: (_payload, _completed, settings) => [
        { ordinal: 1, label: 'Meta-review', input: { slot: 0, model: settings.model('round2') } },
      ],
      async request(ctx, item, completed) {
        const reviews = inRound(completed, 1)
          .map((review, i) => `## Review ${i + 1}\n\n${review.text.trim()}`)
          .join('\n\n');
        return {
          model: item.input.model,
          system: promptFor(ctx, 'round2'),
          messages: [{ role: 'user', text: reviews }],
          attachments: [await manuscript(ctx)],
          maxTokens: REVIEW_TOKENS,
        };
      },
      outputFile: () => 'round2_meta_review.md',
    },
    {
      round: 3,
      label: 'Fact check',
      policy: EXECUTION_POLICIES.reviewer.factCheck,
      plan: (_payload, _completed, settings) => [
        { ordinal: 1, label: 'Final report', input: { slot: 0, model: settings.model('round3') } },
      ],
      async request(ctx, item, completed) {
        const [metaReview] = inRound(completed, 2);
        if (!metaReview) throw new Error('Fact check planned without a meta-review');
        return {
          model: item.input.model,
          system: promptFor(ctx, 'round3'),
          messages: [{ role: 'user', text: metaReview.text }],
          attachments: [await manuscript(ctx)],
          maxTokens: REVIEW_TOKENS,
        };
      },
      outputFile: () => 'round3_final_report.md',
    },
  ],
  projectedUnits: () => EXECUTION_POLICIES.reviewer.factCheck.unitsPerItem,
  estimateTokens(payload) {
    const doc = documentAt(payload.documents, 0);
    const perCall = Math.max(estimateTextTokens(doc.text), PDF_OVERHEAD_TOKENS) + REVIEW_TOKENS;
    return perCall * (REVIEWER_SLOTS + 2);
  },
  async assemble(_ctx, completed): Promise<AssembledOutput> {
    const [report] = inRound(completed, 3);
    return { artifacts: report?.outputPath ? { 'round3_final_report.md': report.outputPath } : {} };
  },
};
