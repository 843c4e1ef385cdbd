import { z } from 'zod';
import { EXECUTION_POLICIES, TRANSLATION_CHUNK_MAX_PARAGRAPHS, TRANSLATION_CHUNK_MAX_WORDS } from '../config/modules.js';
import type { GlossaryTerm } from '../services/reference-data/index.js';
import { MAX_DOCUMENTS, documentAt, estimateTextTokens, padOrdinal, textDocumentSchema, type SourceDocument } from './documents.js';
import { PARAGRAPH_SEPARATOR, joinChunk, planChunks, splitParagraphs, splitTranslation } from './translation-chunks.js';
import type { PlannedItem, ToolModule } from './types.js';

const DIRECTIONS = ['en_to_zh', 'zh_to_en'] as const;
export type TranslationDirection = (typeof DIRECTIONS)[number];

const payloadSchema = z.object({
  documents: z.array(textDocumentSchema).min(1).max(MAX_DOCUMENTS),
  direction: z.enum(DIRECTIONS).default('en_to_zh'),
});

export type TranslatorPayload = z.infer<typeof payloadSchema>;

const itemSchema = z.object({
  document: z.number().int().nonnegative(),
  paragraphs: z.array(z.number().int().nonnegative()).min(1),
});

type ChunkItem = z.infer<typeof itemSchema>;

const CHUNK_LIMITS = { maxParagraphs: TRANSLATION_CHUNK_MAX_PARAGRAPHS, maxWords: TRANSLATION_CHUNK_MAX_WORDS };
const CHUNK_RESPONSE_TOKENS = 4096;

const LANGUAGES: Record<TranslationDirection, { from: string; to: string }> = {
  en_to_zh: { from: 'EN', to: 'CN' },
  zh_to_en: { from: 'CN', to: 'EN' },
};

const DEFAULT_PROMPTS: Record<TranslationDirection, string> = {
  en_to_zh: [
    'You are an expert translator for academic manuscripts from English (EN) to Chinese (CN).',
    'Maintain formal academic tone and style in CN.',
    'Use the glossary consistently. Each entry is EN -> CN:',
    '{{GLOSSARY}}',
    'The input contains paragraphs separated by the exact marker {{PARAGRAPH_SEPARATOR}}.',
    'Return the translated paragraphs with the same marker between them.',
    'If a paragraph is only a URL or citation, return it unchanged.',
  ].join('\n'),
  zh_to_en: [
    'You are an expert translator for academic manuscripts from Chinese (CN) to English (EN).',
    'Maintain formal academic tone and style in EN (British academic English preferred).',
    'Use the glossary consistently. Each entry is CN -> EN:',
    '{{GLOSSARY}}',
    'The input contains paragraphs separated by the exact marker {{PARAGRAPH_SEPARATOR}}.',
    'Return the translated paragraphs with the same marker between them.',
    'If a paragraph is only a URL or citation, return it unchanged.',
  ].join('\n'),
};

export function formatGlossary(terms: readonly GlossaryTerm[], direction: TranslationDirection): string {
  if (terms.length === 0) return 'No glossary entries configured.';
  return terms
    .map(term => direction === 'en_to_zh'
      ? `EN: ${term.sourceTerm} -> CN: ${term.targetTerm}`
      : `CN: ${term.targetTerm} -> EN: ${term.sourceTerm}`)
    .join('\n');
}

/** One item per chunk of every document, numbered across the whole job. */
export function planTranslation(documents: readonly SourceDocument[]): PlannedItem<ChunkItem>[] {
  const items: PlannedItem<ChunkItem>[] = [];
  documents.forEach((doc, document) => {
    const chunks = planChunks(splitParagraphs(doc.text), CHUNK_LIMITS);
    chunks.forEach((paragraphs, i) => {
      items.push({
        ordinal: items.length + 1,
        label: `${doc.fileName} (part ${i + 1}/${chunks.length})`,
        input: { document, paragraphs },
      });
    });
  });
  return items;
}

export const translatorModule: ToolModule<TranslatorPayload, ChunkItem> = {
  key: 'translator',
  label: 'Document translator',
  unitLabel: 'documents',
  payloadSchema,
  itemSchema,
  defaults: {
    models: { translation: 'claude-sonnet-4-20250514' },
    prompts: DEFAULT_PROMPTS,
  },
  rounds: [
    {
      round: 1,
      label: 'Translations',
      policy: EXECUTION_POLICIES.translator.chunks,
      plan: (payload) => planTranslation(payload.documents),
      async request(ctx, item) {
        const { direction } = ctx.payload;
        const { from, to } = LANGUAGES[direction];
        const doc = documentAt(ctx.payload.documents, item.input.document);
        const chunk = joinChunk(splitParagraphs(doc.text), item.input.paragraphs);
        const separators = item.input.paragraphs.length - 1;

        const system = ctx.settings.prompt(direction)
          .replaceAll('{{GLOSSARY}}', formatGlossary(ctx.settings.reference.glossary, direction))
          .replaceAll('{{PARAGRAPH_SEPARATOR}}', PARAGRAPH_SEPARATOR);

        const text = [
          `Translate the following ${from} paragraphs into ${to}.`,
          `CRITICAL: You must preserve EXACTLY ${separators} occurrences of the separator ${PARAGRAPH_SEPARATOR} in your output.`,
          `Each ${PARAGRAPH_SEPARATOR} separator marks a paragraph boundary and must appear in the exact same positions in your translation.`,
          '',
          'Input text:',
          chunk,
        ].join('\n');

        return {
          model: ctx.settings.model('translation'),
          system,
          messages: [{ role: 'user', text }],
          maxTokens: CHUNK_RESPONSE_TOKENS,
        };
      },
      parse: (text, _ctx, item) =>
        splitTranslation(text, item.input.paragraphs.length).join(PARAGRAPH_SEPARATOR),
    },
  ],
  projectedUnits: (payload) => payload.documents.length,
  // Input plus an output of about the same length.
  estimateTokens: (payload) => payload.documents.reduce((sum, doc) => sum + estimateTextTokens(doc.text) * 2, 0),
  async assemble(ctx, completed) {
    const artifacts: Record<string, string> = {};
    const failedDocuments: string[] = [];

    for (const [index, doc] of ctx.payload.documents.entries()) {
      const lines = splitParagraphs(doc.text);
      const expected = planChunks(lines, CHUNK_LIMITS).length;
      const chunks = completed.filter(item => item.input.document === index);

      if (chunks.length !== expected) {
        failedDocuments.push(doc.fileName);
        continue;
      }

      const translated = lines.map(line => line.trim());
      for (const chunk of chunks) {
        const parts = splitTranslation(chunk.text, chunk.input.paragraphs.length);
        chunk.input.paragraphs.forEach((line, i) => {
          translated[line] = parts[i] ?? '';
        });
      }

      const fileName = `translated_${padOrdinal(index + 1)}.txt`;
      artifacts[fileName] = await ctx.storage.writeText(ctx.moduleKey, ctx.jobId, fileName, translated.join('\n'));
    }

    const translatedCount = Object.keys(artifacts).length;
    if (translatedCount === 0) {
      throw new Error('No document was translated completely');
    }
    if (failedDocuments.length > 0) {
      ctx.log.warn({ failedDocuments }, 'Some documents were not translated completely');
    }

    return {
      artifacts,
      result: { documents: ctx.payload.documents.length, translated: translatedCount, failedDocuments },
      units: translatedCount,
    };
  },
};
