import { z } from 'zod';
import type { PlannedItem } from './types.js';

export const sourceDocumentSchema = z.object({
  fileName: z.string().min(1),
  mimeType: z.string().min(1),
  sourcePath: z.string().min(1),
  text: z.string(),
});

export type SourceDocument = z.infer<typeof sourceDocumentSchema>;

export const textDocumentSchema = sourceDocumentSchema.refine(
  doc => doc.text.trim().length > 0,
  doc => ({ message: `No text could be extracted from ${doc.fileName}` }),
);

export const documentItemSchema = z.object({
  document: z.number().int().nonnegative(),
});

export type DocumentItem = z.infer<typeof documentItemSchema>;

export const MAX_DOCUMENTS = 20;

export function planDocuments(documents: readonly SourceDocument[]): PlannedItem<DocumentItem>[] {
  return documents.map((doc, index) => ({ ordinal: index + 1, label: doc.fileName, input: { document: index } }));
}

export function documentAt(documents: readonly SourceDocument[], index: number): SourceDocument {
  const doc = documents[index];
  if (!doc) throw new Error(`Document ${index} is not part of this job`);
  return doc;
}

/** Rough token count for quota projection: four characters per token. */
export function estimateTextTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function padOrdinal(ordinal: number): string {
  return String(ordinal).padStart(3, '0');
}
